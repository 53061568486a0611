/**
 * signet-tokens - Compact Codec
 * Builds and parses the three-segment `header.payload.signature` form
 */

import { base64urlDecode, base64urlEncode, encodeJSON, isAlgorithm } from '../crypto';
import { extractStandardClaims, isPlainObject, nowSeconds, parsePayload } from '../claims';
import {
  Clock,
  ClaimSet,
  DecodedToken,
  TokenError,
  TokenHeader,
  TOKEN_ERRORS,
  TOKEN_ERROR_MESSAGES,
  TOKEN_ERROR_MESSAGE_HELPERS,
} from '../types';
import { TOKEN_DELIMITER_COUNT, TOKEN_SEGMENT_DELIMITER } from './constants';

/**
 * The three transmitted segments, still base64url-encoded.
 */
export type TokenSegments = readonly [header: string, payload: string, signature: string];

// ============================================================================
// ENCODING
// ============================================================================

/**
 * Serialize header and claims into the `header.payload` signing input
 */
export function encodeSigningInput(header: TokenHeader, claims: ClaimSet): string {
  return `${encodeJSON(header)}${TOKEN_SEGMENT_DELIMITER}${encodeJSON(claims)}`;
}

/**
 * Append an encoded signature to a signing input
 */
export function appendSignature(signingInput: string, signature: Buffer): string {
  return `${signingInput}${TOKEN_SEGMENT_DELIMITER}${base64urlEncode(signature)}`;
}

// ============================================================================
// DECODING
// ============================================================================

/**
 * Split a token into its segments.
 *
 * @throws {TokenError} `MALFORMED_TOKEN` unless there are exactly two delimiters.
 */
export function splitToken(token: string): TokenSegments {
  const parts = token.split(TOKEN_SEGMENT_DELIMITER);
  if (parts.length !== TOKEN_DELIMITER_COUNT + 1) {
    throw new TokenError(TOKEN_ERRORS.MALFORMED_TOKEN, TOKEN_ERROR_MESSAGES.TOKEN_MUST_HAVE_3_PARTS);
  }
  const [header, payload, signature] = parts;
  return [header, payload, signature];
}

/**
 * The exact bytes the signature covers: everything before the last delimiter.
 */
export function signingInputOf(token: string): string {
  return token.slice(0, token.lastIndexOf(TOKEN_SEGMENT_DELIMITER));
}

/**
 * Decode and validate the header segment.
 *
 * @throws {TokenError} `ENCODING_ERROR` for invalid base64url,
 * `MALFORMED_TOKEN` when the header is not a JSON object, and
 * `UNKNOWN_ALGORITHM` when `alg` is not registered.
 */
export function parseHeader(segment: string): { header: TokenHeader; headerBytes: Buffer } {
  const headerBytes = base64urlDecode(segment);

  let parsed: unknown;
  try {
    parsed = JSON.parse(headerBytes.toString('utf8'));
  } catch {
    throw new TokenError(TOKEN_ERRORS.MALFORMED_TOKEN, TOKEN_ERROR_MESSAGES.INVALID_HEADER);
  }
  if (!isPlainObject(parsed)) {
    throw new TokenError(TOKEN_ERRORS.MALFORMED_TOKEN, TOKEN_ERROR_MESSAGES.INVALID_HEADER);
  }

  const { alg, typ } = parsed;
  if (!isAlgorithm(alg)) {
    throw new TokenError(TOKEN_ERRORS.UNKNOWN_ALGORITHM, TOKEN_ERROR_MESSAGE_HELPERS.unknownAlgorithm(alg));
  }

  const header: TokenHeader = { alg };
  if (typeof typ === 'string') {
    header.typ = typ;
  }
  return { header, headerBytes };
}

/**
 * Decode a token without verification.
 * Useful for inspecting token contents; never use the result for access decisions.
 */
export function decodeToken(token: string): DecodedToken {
  const [headerSegment, payloadSegment, signature] = splitToken(token);
  const { header } = parseHeader(headerSegment);
  const payload = parsePayload(base64urlDecode(payloadSegment));

  return {
    header,
    claims: { ...payload, ...extractStandardClaims(payload) },
    signature,
  };
}

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

/**
 * Check if a token is expired (without full verification).
 * Tokens that cannot be decoded count as expired; tokens without `exp` never expire.
 */
export function isTokenExpired(token: string, leeway: number = 0, clock: Clock = Date.now): boolean {
  try {
    const { exp } = decodeToken(token).claims;
    return exp !== undefined && exp + leeway < nowSeconds(clock);
  } catch {
    return true;
  }
}

/**
 * Get token expiration time
 */
export function getTokenExpiration(token: string): Date | null {
  try {
    const { exp } = decodeToken(token).claims;
    return exp === undefined ? null : new Date(exp * 1000);
  } catch {
    return null;
  }
}

/**
 * Get time until token expires (in seconds), or `null` when it does not expire
 */
export function getTimeUntilExpiration(token: string, clock: Clock = Date.now): number | null {
  try {
    const { exp } = decodeToken(token).claims;
    return exp === undefined ? null : Math.max(0, exp - nowSeconds(clock));
  } catch {
    return 0;
  }
}
