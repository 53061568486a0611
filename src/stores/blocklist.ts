/**
 * @fileoverview Revocation Store Contract
 *
 * Options and identifier derivation shared by revocation stores. A store
 * implements `RevocationChecker` so the verifier can consult it; everything
 * else on a store (invalidation, sweeping, lifecycle) belongs to the host.
 *
 * @module signet-tokens/stores/blocklist
 */

import { base64urlEncode } from '../crypto';
import { Clock, RevocationChecker, VerifiedToken } from '../types';

/* ============================================================================
 * DEFAULTS
 * ========================================================================= */

/** Sweep period covering every shard once, in milliseconds. */
export const DEFAULT_SWEEP_INTERVAL = 60_000;

export const DEFAULT_SHARD_COUNT = 4;

/** Revocation lifetime for tokens without `exp`, in seconds. */
export const DEFAULT_REVOCATION_TTL = 3600;

/* ============================================================================
 * OPTIONS
 * ========================================================================= */

export interface BlocklistOptions {
  /** Time for one full pass over all shards, in ms (default: 60 000) */
  sweepInterval?: number;
  /** Number of independent partitions (default: 4) */
  shards?: number;
  /** Time source (default: `Date.now`) */
  clock?: Clock;
  /** Seconds an entry lives when the token has no `exp` (default: 3600) */
  defaultTtl?: number;
  /** Derive the identifier a token is tracked under (default: `tokenIdentifier`) */
  identify?: (token: VerifiedToken) => string;
  /** Called after every sweep with the number of entries removed */
  onSweep?: (removed: number) => void;
}

/**
 * Store contract for hosts that manage revocations.
 */
export interface Blocklist extends RevocationChecker {
  /** Block `id` until `expiry` (epoch seconds). Overwrites any existing entry. */
  invalidate(id: string, expiry: number): void;
  /** Block a verified token until its `exp`, or for the default TTL. Returns its identifier. */
  invalidateToken(token: VerifiedToken): string;
  remove(id: string): boolean;
  /** Number of stored entries, expired or not. */
  count(): number;
  /** Remove every entry whose expiry is at or before now. */
  sweep(): number;
  start(): void;
  stop(): void;
}

/* ============================================================================
 * IDENTIFIERS
 * ========================================================================= */

/**
 * Default revocation identifier: the signature as transmitted.
 *
 * Signatures have a fixed size per algorithm, so memory use does not grow
 * with payload size.
 */
export function tokenIdentifier(token: VerifiedToken): string {
  return base64urlEncode(token.signature);
}
