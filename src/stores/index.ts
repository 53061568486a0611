/**
 * @fileoverview Revocation stores
 * @module signet-tokens/stores
 */

export * from './blocklist';
export { InMemoryBlocklist } from './memory-blocklist';
