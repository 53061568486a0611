/**
 * @fileoverview Claims Model
 * @module signet-tokens/claims
 * @description Merging claim sources before signing, and decoding verified
 * payloads into mappings or structured records afterwards.
 */

export * from './merge';
export * from './decode';
