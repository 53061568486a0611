/**
 * @fileoverview Compact token signing, verification and decoding
 * @module signet-tokens/tokens
 */

export * from './constants';
export * from './compact';
export * from './sign';
export * from './validators';
export * from './verify';
