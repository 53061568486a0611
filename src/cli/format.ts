/**
 * Pure helpers behind the CLI output
 */

import * as crypto from 'crypto';
import { isPlainObject, nowSeconds } from '../claims';
import { Algorithm, Clock } from '../types';
import { isAlgorithm } from '../crypto';

/**
 * Format timestamp to readable date
 */
export function formatTimestamp(timestamp: number): string {
  return new Date(timestamp * 1000).toISOString();
}

/**
 * Check if an `exp` value lies in the past
 */
export function isExpired(exp: number, clock: Clock = Date.now): boolean {
  return exp < nowSeconds(clock);
}

/**
 * Get time until expiration, or since it for expired tokens
 */
export function getTimeRemaining(exp: number, clock: Clock = Date.now): string {
  const diff = exp - nowSeconds(clock);

  if (diff < 0) {
    const absDiff = Math.abs(diff);
    if (absDiff < 60) return `${absDiff}s ago`;
    if (absDiff < 3600) return `${Math.floor(absDiff / 60)}m ago`;
    if (absDiff < 86400) return `${Math.floor(absDiff / 3600)}h ago`;
    return `${Math.floor(absDiff / 86400)}d ago`;
  }

  if (diff < 60) return `${diff}s`;
  if (diff < 3600) return `${Math.floor(diff / 60)}m ${diff % 60}s`;
  if (diff < 86400) return `${Math.floor(diff / 3600)}h ${Math.floor((diff % 3600) / 60)}m`;
  return `${Math.floor(diff / 86400)}d ${Math.floor((diff % 86400) / 3600)}h`;
}

/**
 * Parse an algorithm name given on the command line
 */
export function parseAlgorithm(value: string): Algorithm {
  if (!isAlgorithm(value)) {
    throw new Error(`Unknown algorithm: ${value}`);
  }
  return value;
}

/**
 * Parse a claims argument; it must be a JSON object
 */
export function parseClaimsJson(text: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new Error('Claims must be valid JSON');
  }
  if (!isPlainObject(parsed)) {
    throw new Error('Claims must be a JSON object');
  }
  return parsed;
}

/**
 * Load a PEM key for signing (private) or verifying (public).
 * A private key PEM is accepted for verification too.
 */
export function loadPemKey(pem: string, use: 'sign' | 'verify'): crypto.KeyObject {
  return use === 'sign' ? crypto.createPrivateKey(pem) : crypto.createPublicKey(pem);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
