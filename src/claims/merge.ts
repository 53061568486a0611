/**
 * signet-tokens - Claims Merge Policy
 * Merge policy for claim sources and the standard claim view of a payload
 */

import {
  ClaimSet,
  ClaimSource,
  ClaimsRecord,
  Clock,
  StandardClaims,
  STANDARD_CLAIM_NAMES,
  StandardClaimName,
  TokenError,
  TOKEN_ERRORS,
  TOKEN_ERROR_MESSAGES,
  TOKEN_ERROR_MESSAGE_HELPERS,
} from '../types';

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Current time in whole seconds since the epoch.
 */
export function nowSeconds(clock: Clock = Date.now): number {
  return Math.floor(clock() / 1000);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Own member of a decoded object, or `undefined`. Inherited members such
 * as `constructor` never count as claims.
 */
export function ownClaim(tree: Record<string, unknown>, name: string): unknown {
  return Object.prototype.hasOwnProperty.call(tree, name) ? tree[name] : undefined;
}

/**
 * Store a claim as an own data property. Plain assignment would treat a
 * `__proto__` claim as a prototype change.
 */
function setClaim(tree: Record<string, unknown>, name: string, value: unknown): void {
  Object.defineProperty(tree, name, { value, enumerable: true, writable: true, configurable: true });
}

function isClaimsRecord(source: ClaimSource): source is ClaimsRecord {
  return typeof source.toJSON === 'function';
}

function isStandardClaimName(name: string): name is StandardClaimName {
  return (STANDARD_CLAIM_NAMES as readonly string[]).includes(name);
}

function isNumericDate(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isAudience(value: unknown): value is string | string[] {
  return typeof value === 'string' || (Array.isArray(value) && value.every(v => typeof v === 'string'));
}

function invalidClaim(name: string): TokenError {
  return new TokenError(TOKEN_ERRORS.CLAIMS_DECODE_ERROR, TOKEN_ERROR_MESSAGE_HELPERS.invalidClaim(name), name);
}

// ============================================================================
// STANDARD CLAIMS
// ============================================================================

/**
 * Read the registered claims out of a decoded payload object.
 *
 * @throws {TokenError} `CLAIMS_DECODE_ERROR` when a registered claim is
 * present with the wrong JSON type.
 */
export function extractStandardClaims(payload: Record<string, unknown>): StandardClaims {
  const claims: StandardClaims = {};
  const [nbf, iat, exp, jti, iss, sub, aud] = STANDARD_CLAIM_NAMES.map(name => ownClaim(payload, name));

  for (const [name, value] of [['nbf', nbf], ['iat', iat], ['exp', exp]] as const) {
    if (value === undefined) continue;
    if (!isNumericDate(value)) throw invalidClaim(name);
    claims[name] = value;
  }
  for (const [name, value] of [['jti', jti], ['iss', iss], ['sub', sub]] as const) {
    if (value === undefined) continue;
    if (typeof value !== 'string') throw invalidClaim(name);
    claims[name] = value;
  }
  if (aud !== undefined) {
    if (!isAudience(aud)) throw invalidClaim('aud');
    claims.aud = aud;
  }

  return claims;
}

/**
 * Split a claim set into its registered and custom parts.
 */
export function splitClaims(claims: Record<string, unknown>): {
  standard: StandardClaims;
  custom: Record<string, unknown>;
} {
  const custom: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(claims)) {
    if (!isStandardClaimName(name)) {
      setClaim(custom, name, value);
    }
  }
  return { standard: extractStandardClaims(claims), custom };
}

// ============================================================================
// MERGE POLICY
// ============================================================================

/**
 * Merge claim sources in call order.
 *
 * Later sources win key-wise, for registered and custom claims alike.
 * A key whose value is `undefined` counts as not set and never overrides.
 *
 * @throws {TokenError} `CLAIMS_DECODE_ERROR` when a record renders to
 * something other than an object, or a registered claim has the wrong type.
 */
export function mergeClaims(sources: readonly ClaimSource[]): ClaimSet {
  const merged: Record<string, unknown> = {};

  for (const source of sources) {
    const rendered: unknown = isClaimsRecord(source) ? source.toJSON() : source;
    if (!isPlainObject(rendered)) {
      throw new TokenError(TOKEN_ERRORS.CLAIMS_DECODE_ERROR, TOKEN_ERROR_MESSAGES.PAYLOAD_NOT_JSON_OBJECT);
    }
    for (const [name, value] of Object.entries(rendered)) {
      if (value !== undefined) {
        setClaim(merged, name, value);
      }
    }
  }

  return { ...merged, ...extractStandardClaims(merged) };
}

/**
 * Fill `iat` with now and `exp` with now + `maxAge` (seconds), leaving
 * either untouched when already set. A non-positive `maxAge` is a no-op.
 */
export function applyMaxAge(claims: ClaimSet, maxAge: number, clock: Clock = Date.now): ClaimSet {
  if (!(maxAge > 0)) {
    return claims;
  }
  const now = nowSeconds(clock);
  return {
    ...claims,
    iat: claims.iat ?? now,
    exp: claims.exp ?? now + Math.floor(maxAge),
  };
}
