/**
 * @fileoverview signet-tokens
 * @module signet-tokens
 * @description Compact signed authorization tokens: a registry of signature
 * algorithms, a claims model, a single-pass verifier, and an optional
 * revocation blocklist.
 *
 * The library consists of four primary components:
 * - **Crypto**: Native Node.js implementations of every signature scheme
 * - **Claims**: Merge policy, max-age handling, and post-verification decoding
 * - **Tokens**: Compact encoding, signing, verification, and validators
 * - **Stores**: In-memory revocation blocklist with a background sweep
 *
 * @example
 * ```typescript
 * import { Algorithm, signToken, verifyToken, decodeCustomClaims } from 'signet-tokens';
 *
 * const token = signToken({
 *   algorithm: Algorithm.HS256,
 *   key: 'test-secret',
 *   claims: { foo: 'bar' },
 *   maxAge: 900,
 * });
 *
 * const result = verifyToken({ token, key: 'test-secret' });
 * if (result.valid) {
 *   decodeCustomClaims(result.token); // { foo: 'bar' }
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// TYPES & CONSTANTS
// ============================================================================

export * from './types';

// ============================================================================
// CRYPTO UTILITIES
// ============================================================================

export {
  // Signing & verification
  sign,
  verify,

  // Key generation
  generateSecret,
  generateKeyPair,

  // Identifiers
  generateTokenId,
  generateRandomString,

  // Encoding
  base64urlEncode,
  base64urlDecode,
  encodeJSON,
  decodeJSON,

  // Registry
  ALGORITHM_CONFIG,
  SUPPORTED_ALGORITHMS,
  isAlgorithm,
  isHmacAlgorithm,
} from './crypto';

export type { SecretKey, SigningKey, HmacAlgorithm, AsymmetricAlgorithm, AsymmetricKeyPair } from './crypto';
export type { AlgorithmConfig } from './crypto/AlgorithmConfig';

// ============================================================================
// CLAIMS
// ============================================================================

export {
  mergeClaims,
  applyMaxAge,
  splitClaims,
  extractStandardClaims,
  decodeClaims,
  decodeCustomClaims,
  RecordShape,
  readString,
  readNumber,
  readInteger,
  readBoolean,
  readStringArray,
  readAudience,
  readObject,
} from './claims';

export type { DecodeMode, DecodeOptions, ClaimReader, FieldOptions, FieldDescriptor, PayloadSource } from './claims';

// ============================================================================
// TOKENS
// ============================================================================

export {
  signToken,
  verifyToken,
  decodeToken,
  isTokenExpired,
  getTokenExpiration,
  getTimeUntilExpiration,
  validateTimeClaims,
  expectClaims,
  rejectFutureIssuedAt,
  DEFAULT_LEEWAY,
} from './tokens';

export type { SignTokenOptions, VerifyTokenOptions, ClaimValidator, ValidationContext, ExpectedClaims } from './tokens';

// ============================================================================
// STORES
// ============================================================================

export {
  InMemoryBlocklist,
  tokenIdentifier,
  DEFAULT_SWEEP_INTERVAL,
  DEFAULT_SHARD_COUNT,
  DEFAULT_REVOCATION_TTL,
} from './stores';

export type { Blocklist, BlocklistOptions } from './stores';

// ============================================================================
// VERSION
// ============================================================================

/**
 * Current library version.
 * @constant VERSION
 */
export const VERSION = '1.0.0';
