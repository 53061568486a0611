/**
 * signet-tokens - Token Signing
 */

import { sign, isAlgorithm, SigningKey } from '../crypto';
import { applyMaxAge, mergeClaims } from '../claims';
import {
  Algorithm,
  ClaimSource,
  Clock,
  TokenError,
  TokenHeader,
  TOKEN_ERRORS,
  TOKEN_ERROR_MESSAGE_HELPERS,
  TOKEN_TYPE,
} from '../types';
import { appendSignature, encodeSigningInput } from './compact';

export interface SignTokenOptions {
  /** Algorithm to sign with */
  algorithm: Algorithm;
  /** HMAC secret or private `KeyObject` matching the algorithm */
  key: SigningKey;
  /** Claim sources, merged in order (later wins) */
  claims?: ClaimSource | readonly ClaimSource[];
  /** Lifetime in seconds; fills `iat` and `exp` when they are not set */
  maxAge?: number;
  /** Time source (default: `Date.now`) */
  clock?: Clock;
}

function isSourceList(claims: ClaimSource | readonly ClaimSource[]): claims is readonly ClaimSource[] {
  return Array.isArray(claims);
}

/**
 * Create a signed compact token.
 *
 * @throws {TokenError} `UNKNOWN_ALGORITHM`, `KEY_MISMATCH`, or
 * `CLAIMS_DECODE_ERROR`. No partial token is ever returned.
 *
 * @example
 * ```typescript
 * const token = signToken({
 *   algorithm: Algorithm.HS256,
 *   key: secret,
 *   claims: { foo: 'bar' },
 *   maxAge: 15 * 60,
 * });
 * ```
 */
export function signToken(options: SignTokenOptions): string {
  const { algorithm, key, claims = [], maxAge, clock = Date.now } = options;

  if (!isAlgorithm(algorithm)) {
    throw new TokenError(TOKEN_ERRORS.UNKNOWN_ALGORITHM, TOKEN_ERROR_MESSAGE_HELPERS.unknownAlgorithm(algorithm));
  }

  const header: TokenHeader = {
    alg: algorithm,
    typ: TOKEN_TYPE,
  };

  let payload = mergeClaims(isSourceList(claims) ? claims : [claims]);
  if (maxAge !== undefined) {
    payload = applyMaxAge(payload, maxAge, clock);
  }

  const signingInput = encodeSigningInput(header, payload);
  return appendSignature(signingInput, sign(signingInput, key, algorithm));
}
