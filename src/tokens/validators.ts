/**
 * signet-tokens - Claim Validators
 * Time-claim validation and opt-in checks run after it
 */

import {
  StandardClaims,
  TokenError,
  TOKEN_ERRORS,
  TOKEN_ERROR_MESSAGES,
  TOKEN_ERROR_MESSAGE_HELPERS,
} from '../types';

/**
 * Values every validator sees.
 */
export interface ValidationContext {
  /** Current time in seconds since the epoch. */
  now: number;
  /** Clock skew tolerance in seconds. */
  leeway: number;
}

/**
 * A claim check. Returns the error to fail with, or `undefined` to pass.
 */
export type ClaimValidator = (claims: Readonly<StandardClaims>, context: ValidationContext) => TokenError | undefined;

/**
 * `nbf` and `exp` checks. Equality with now is valid on both sides; `iat`
 * is informational only. A context that cannot be compared against fails
 * with `INVALID_OPTIONS`.
 */
export function validateTimeClaims(
  claims: Readonly<StandardClaims>,
  { now, leeway }: ValidationContext
): TokenError | undefined {
  if (!Number.isFinite(leeway) || leeway < 0) {
    return new TokenError(TOKEN_ERRORS.INVALID_OPTIONS, TOKEN_ERROR_MESSAGES.INVALID_LEEWAY);
  }
  if (!Number.isFinite(now)) {
    return new TokenError(TOKEN_ERRORS.INVALID_OPTIONS, TOKEN_ERROR_MESSAGES.INVALID_CLOCK);
  }
  if (claims.nbf !== undefined && claims.nbf - leeway > now) {
    return new TokenError(TOKEN_ERRORS.TOKEN_NOT_YET_VALID, TOKEN_ERROR_MESSAGES.TOKEN_NOT_YET_VALID, 'nbf');
  }
  if (claims.exp !== undefined && claims.exp + leeway < now) {
    return new TokenError(TOKEN_ERRORS.TOKEN_EXPIRED, TOKEN_ERROR_MESSAGES.TOKEN_HAS_EXPIRED, 'exp');
  }
  return undefined;
}

export interface ExpectedClaims {
  iss?: string;
  sub?: string;
  jti?: string;
  /** Passes when the token audience contains any of these. */
  aud?: string | string[];
}

function toList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function mismatch(name: string): TokenError {
  return new TokenError(TOKEN_ERRORS.CLAIM_MISMATCH, TOKEN_ERROR_MESSAGE_HELPERS.claimMismatch(name), name);
}

/**
 * Require identity claims to hold the given values.
 *
 * @example
 * ```typescript
 * verifyToken({
 *   token,
 *   key,
 *   validators: [expectClaims({ iss: 'https://issuer.example', aud: 'api' })],
 * });
 * ```
 */
export function expectClaims(expected: ExpectedClaims): ClaimValidator {
  return claims => {
    for (const name of ['iss', 'sub', 'jti'] as const) {
      const value = expected[name];
      if (value !== undefined && claims[name] !== value) {
        return mismatch(name);
      }
    }
    if (expected.aud !== undefined) {
      const tokenAudience = toList(claims.aud);
      if (!toList(expected.aud).some(a => tokenAudience.includes(a))) {
        return mismatch('aud');
      }
    }
    return undefined;
  };
}

/**
 * Reject tokens whose `iat` lies beyond now plus leeway.
 */
export function rejectFutureIssuedAt(): ClaimValidator {
  return (claims, { now, leeway }) => {
    if (claims.iat !== undefined && claims.iat - leeway > now) {
      return new TokenError(TOKEN_ERRORS.ISSUED_IN_FUTURE, TOKEN_ERROR_MESSAGES.TOKEN_ISSUED_IN_FUTURE, 'iat');
    }
    return undefined;
  };
}
