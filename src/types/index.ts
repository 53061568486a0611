/**
 * signet-tokens - Core Types
 *
 * This module defines the TypeScript types, interfaces, and error helpers
 * shared by every part of the library. The types in this file are the
 * canonical source of truth for:
 *
 * - Signature algorithm identifiers and the token header
 * - Standard claim structure and claim sources
 * - Verified token shape and verification results
 * - Standardized error codes and the `TokenError` class
 * - Option contracts for signing, verification, and revocation
 */

// ============================================================================
// ALGORITHM TYPES
// ============================================================================

/**
 * Supported signature algorithms.
 *
 * @enum {string}
 * @property {string} HS256 - HMAC using SHA-256
 * @property {string} HS384 - HMAC using SHA-384
 * @property {string} HS512 - HMAC using SHA-512
 * @property {string} RS256 - RSA PKCS#1 v1.5 using SHA-256
 * @property {string} RS384 - RSA PKCS#1 v1.5 using SHA-384
 * @property {string} RS512 - RSA PKCS#1 v1.5 using SHA-512
 * @property {string} PS256 - RSA-PSS using SHA-256
 * @property {string} PS384 - RSA-PSS using SHA-384
 * @property {string} PS512 - RSA-PSS using SHA-512
 * @property {string} ES256 - ECDSA using P-256 and SHA-256
 * @property {string} ES384 - ECDSA using P-384 and SHA-384
 * @property {string} ES512 - ECDSA using P-521 and SHA-512
 * @property {string} EdDSA - Ed25519 signatures
 */
export enum Algorithm {
  // HMAC (shared secret)
  HS256 = 'HS256',
  HS384 = 'HS384',
  HS512 = 'HS512',
  // RSA (PKCS#1 v1.5)
  RS256 = 'RS256',
  RS384 = 'RS384',
  RS512 = 'RS512',
  // RSA-PSS (Probabilistic Signature Scheme)
  PS256 = 'PS256',
  PS384 = 'PS384',
  PS512 = 'PS512',
  // ECDSA
  ES256 = 'ES256',
  ES384 = 'ES384',
  ES512 = 'ES512',
  // Edwards curve
  EdDSA = 'EdDSA',
}

/**
 * Type tag written into every header.
 */
export const TOKEN_TYPE = 'JWT' as const;

/**
 * Token header. Built once per sign call and never mutated. `typ` is
 * always written as `JWT` but is not required when decoding.
 */
export interface TokenHeader {
  alg: Algorithm;
  typ?: string;
}

// ============================================================================
// CLAIM TYPES
// ============================================================================

/**
 * Registered claims understood by the verifier.
 *
 * Every field is optional: absence means "not asserted", never zero.
 */
export interface StandardClaims {
  /** Not-before time as a UNIX timestamp (seconds). */
  nbf?: number;
  /** Issued-at time as a UNIX timestamp (seconds). */
  iat?: number;
  /** Expiration time as a UNIX timestamp (seconds). */
  exp?: number;
  /** Opaque token identifier. */
  jti?: string;
  /** Issuer. */
  iss?: string;
  /** Subject. */
  sub?: string;
  /** Intended audience(s). */
  aud?: string | string[];
}

/**
 * Names of the registered claims, in encoding order.
 */
export const STANDARD_CLAIM_NAMES = ['nbf', 'iat', 'exp', 'jti', 'iss', 'sub', 'aud'] as const;

export type StandardClaimName = (typeof STANDARD_CLAIM_NAMES)[number];

/**
 * Structured record that knows how to render itself as claims.
 */
export interface ClaimsRecord {
  toJSON(): Record<string, unknown>;
}

/**
 * A single claim source handed to the encoder: either an open key/value
 * mapping (standard claims included) or a structured record. Registered
 * claims are type-checked when sources are merged.
 */
export type ClaimSource = Record<string, unknown> | ClaimsRecord;

/**
 * The merged JSON object encoded into the payload segment.
 */
export type ClaimSet = StandardClaims & Record<string, unknown>;

// ============================================================================
// CLOCK
// ============================================================================

/**
 * Injectable time source returning epoch milliseconds.
 */
export type Clock = () => number;

// ============================================================================
// ERROR TYPES
// ============================================================================

/**
 * Stable, machine-readable error codes.
 *
 * Each code maps to a human-readable key (`TOKEN_ERROR_KEYS`) and an
 * HTTP status hint (`TOKEN_ERROR_STATUS`).
 */
export type TokenErrorCode =
  | 'SGN-400-01' // malformed_token
  | 'SGN-400-02' // encoding_error
  | 'SGN-400-03' // unknown_algorithm
  | 'SGN-400-04' // claims_decode_error
  | 'SGN-400-05' // missing_required_field
  | 'SGN-401-01' // token_expired
  | 'SGN-401-02' // signature_invalid
  | 'SGN-401-03' // token_not_yet_valid
  | 'SGN-401-04' // token_blocked
  | 'SGN-401-05' // issued_in_future
  | 'SGN-403-01' // claim_mismatch
  | 'SGN-500-01' // key_mismatch
  | 'SGN-500-02'; // invalid_options

/**
 * Constant helpers for error codes.
 */
export const TOKEN_ERRORS = {
  // 400 - Bad Request
  MALFORMED_TOKEN: 'SGN-400-01' as const,
  ENCODING_ERROR: 'SGN-400-02' as const,
  UNKNOWN_ALGORITHM: 'SGN-400-03' as const,
  CLAIMS_DECODE_ERROR: 'SGN-400-04' as const,
  MISSING_REQUIRED_FIELD: 'SGN-400-05' as const,
  // 401 - Unauthorized
  TOKEN_EXPIRED: 'SGN-401-01' as const,
  SIGNATURE_INVALID: 'SGN-401-02' as const,
  TOKEN_NOT_YET_VALID: 'SGN-401-03' as const,
  BLOCKED: 'SGN-401-04' as const,
  ISSUED_IN_FUTURE: 'SGN-401-05' as const,
  // 403 - Forbidden
  CLAIM_MISMATCH: 'SGN-403-01' as const,
  // 500 - Server Error
  KEY_MISMATCH: 'SGN-500-01' as const,
  INVALID_OPTIONS: 'SGN-500-02' as const,
} as const;

/**
 * Fixed error messages. Messages carrying dynamic values are built by
 * `TOKEN_ERROR_MESSAGE_HELPERS`.
 */
export const TOKEN_ERROR_MESSAGES = {
  TOKEN_MUST_HAVE_3_PARTS: 'Token must have exactly 3 segments',
  INVALID_HEADER: 'Invalid token header',
  INVALID_BASE64URL: 'Segment is not canonical unpadded base64url',
  SIGNATURE_VERIFICATION_FAILED: 'Signature verification failed',
  TOKEN_HAS_EXPIRED: 'Token has expired',
  TOKEN_NOT_YET_VALID: 'Token is not valid yet',
  TOKEN_ISSUED_IN_FUTURE: 'Token was issued in the future',
  TOKEN_BLOCKED: 'Token has been revoked',
  PAYLOAD_NOT_JSON_OBJECT: 'Payload is not a JSON object',
  FAILED_TO_VERIFY_TOKEN: 'Failed to verify token',
  EMPTY_SECRET: 'HMAC secret must not be empty',
  PUBLIC_KEY_CANNOT_SIGN: 'A private key is required for signing',
  INVALID_LEEWAY: 'Leeway must be a finite, non-negative number of seconds',
  INVALID_CLOCK: 'Clock must return a finite time',
} as const;

/**
 * Helper functions for dynamic error messages.
 */
export const TOKEN_ERROR_MESSAGE_HELPERS = {
  unknownAlgorithm: (alg: unknown): string => `Unknown algorithm: ${String(alg)}`,
  algorithmNotAllowed: (alg: string): string => `Algorithm ${alg} is not allowed`,
  keyMismatch: (alg: string, detail: string): string => `Key does not fit ${alg}: ${detail}`,
  invalidClaim: (name: string): string => `Claim "${name}" has an invalid type`,
  missingField: (name: string): string => `Required field "${name}" is missing`,
  claimMismatch: (name: string): string => `Claim "${name}" does not match`,
} as const;

/**
 * Maps error codes to stable, human-readable error keys.
 */
export const TOKEN_ERROR_KEYS: Record<TokenErrorCode, string> = {
  'SGN-400-01': 'malformed_token',
  'SGN-400-02': 'encoding_error',
  'SGN-400-03': 'unknown_algorithm',
  'SGN-400-04': 'claims_decode_error',
  'SGN-400-05': 'missing_required_field',
  'SGN-401-01': 'token_expired',
  'SGN-401-02': 'signature_invalid',
  'SGN-401-03': 'token_not_yet_valid',
  'SGN-401-04': 'token_blocked',
  'SGN-401-05': 'issued_in_future',
  'SGN-403-01': 'claim_mismatch',
  'SGN-500-01': 'key_mismatch',
  'SGN-500-02': 'invalid_options',
};

/**
 * Maps error codes to HTTP status codes, for layers that expose
 * verification over HTTP.
 */
export const TOKEN_ERROR_STATUS: Record<TokenErrorCode, number> = {
  'SGN-400-01': 400,
  'SGN-400-02': 400,
  'SGN-400-03': 400,
  'SGN-400-04': 400,
  'SGN-400-05': 400,
  'SGN-401-01': 401,
  'SGN-401-02': 401,
  'SGN-401-03': 401,
  'SGN-401-04': 401,
  'SGN-401-05': 401,
  'SGN-403-01': 403,
  'SGN-500-01': 500,
  'SGN-500-02': 500,
};

/**
 * Structured error type thrown (or returned) by every signing,
 * verification, and decoding path.
 */
export class TokenError extends Error {
  public readonly errorCode: TokenErrorCode;
  public readonly errorKey: string;
  public readonly httpStatus: number;
  /** Claim or record field the error is about, when there is one. */
  public readonly field?: string;
  public readonly timestamp: number;

  constructor(code: TokenErrorCode, message?: string, field?: string) {
    super(message || TOKEN_ERROR_KEYS[code]);
    this.name = 'TokenError';
    this.errorCode = code;
    this.errorKey = TOKEN_ERROR_KEYS[code];
    this.httpStatus = TOKEN_ERROR_STATUS[code];
    this.field = field;
    this.timestamp = Math.floor(Date.now() / 1000);
  }

  toJSON() {
    return {
      error: this.errorKey,
      error_code: this.errorCode,
      message: this.message,
      ...(this.field !== undefined && { field: this.field }),
      timestamp: this.timestamp,
    };
  }
}

// ============================================================================
// RESULT TYPES
// ============================================================================

/**
 * Output of a successful verifier pass. Read-only to callers.
 *
 * The object is frozen, but `Object.freeze` does not reach into the
 * `Buffer` fields. Each verification allocates its own buffers, so they
 * belong to the caller; writing to them changes what later decodes of
 * this result (and `tokenIdentifier`) see.
 */
export interface VerifiedToken {
  /** The exact token text that was verified. */
  readonly token: string;
  readonly header: Readonly<TokenHeader>;
  /** Decoded header segment. */
  readonly headerBytes: Buffer;
  /** Decoded payload segment. */
  readonly payload: Buffer;
  /** Decoded signature segment. */
  readonly signature: Buffer;
  readonly claims: Readonly<StandardClaims>;
}

/**
 * Verification outcome. Claims are only ever reachable on the valid arm.
 */
export type VerificationResult =
  | { valid: true; token: VerifiedToken }
  | { valid: false; error: TokenError };

/**
 * Token decoded without any signature or time check.
 */
export interface DecodedToken {
  header: TokenHeader;
  claims: ClaimSet;
  /** Signature segment as transmitted (base64url). */
  signature: string;
}

// ============================================================================
// REVOCATION
// ============================================================================

/**
 * Revocation collaborator consulted by the verifier.
 */
export interface RevocationChecker {
  /** Identifier under which a verified token is tracked. */
  identify(token: VerifiedToken): string;
  isBlocked(id: string): boolean;
}
