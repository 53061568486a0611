// ============================================================================
// CRYPTOGRAPHIC CONSTANTS
// ============================================================================

import { Algorithm } from '../types';

/**
 * @enum HashAlgorithm
 * @description Supported hash algorithms for cryptographic operations.
 */
export enum HashAlgorithm {
  SHA256 = 'sha256',
  SHA384 = 'sha384',
  SHA512 = 'sha512',
}

/**
 * @enum ECCurve
 * @description Supported elliptic curves, by OpenSSL name.
 */
export enum ECCurve {
  P256 = 'prime256v1',
  P384 = 'secp384r1',
  P521 = 'secp521r1',
}

/**
 * @constant MIN_RSA_MODULUS_LENGTH
 * @description Smallest RSA modulus, in bits, accepted for signing.
 */
export const MIN_RSA_MODULUS_LENGTH = 2048;

/**
 * @constant DEFAULT_RSA_MODULUS_LENGTH
 * @description Default RSA key size in bits.
 */
export const DEFAULT_RSA_MODULUS_LENGTH = 2048;

/**
 * @constant HMAC_SECRET_LENGTHS
 * @description Generated secret sizes in bytes, one digest length each.
 */
export const HMAC_SECRET_LENGTHS: Readonly<Record<Algorithm.HS256 | Algorithm.HS384 | Algorithm.HS512, number>> = {
  [Algorithm.HS256]: 32,
  [Algorithm.HS384]: 48,
  [Algorithm.HS512]: 64,
} as const;

/**
 * @constant DEFAULT_RANDOM_STRING_LENGTH
 * @description Default length for random string generation in bytes.
 */
export const DEFAULT_RANDOM_STRING_LENGTH = 32;

/**
 * @constant TOKEN_ID_PREFIX
 * @description Prefix for generated token identifiers.
 */
export const TOKEN_ID_PREFIX = 'tkn_';

// ============================================================================
// ALGORITHM CONFIGURATION
// ============================================================================

/**
 * Registry entry for one algorithm. Each arm holds only what its scheme
 * needs; `kind` is matched exhaustively by the signer and verifier.
 */
export type AlgorithmConfig =
  | { kind: 'hmac'; hash: HashAlgorithm }
  | { kind: 'rsa'; hash: HashAlgorithm }
  | { kind: 'rsa-pss'; hash: HashAlgorithm; saltLength: number }
  | { kind: 'ec'; hash: HashAlgorithm; curve: ECCurve; size: number }
  | { kind: 'eddsa' };

export type AlgorithmKind = AlgorithmConfig['kind'];

/**
 * @constant ALGORITHM_CONFIG
 * @description Parameters for every supported algorithm. PSS salt length
 * equals the digest length; `size` is the byte width of each of `r` and `s`.
 */
export const ALGORITHM_CONFIG: Readonly<Record<Algorithm, AlgorithmConfig>> = {
  [Algorithm.HS256]: { kind: 'hmac', hash: HashAlgorithm.SHA256 },
  [Algorithm.HS384]: { kind: 'hmac', hash: HashAlgorithm.SHA384 },
  [Algorithm.HS512]: { kind: 'hmac', hash: HashAlgorithm.SHA512 },
  [Algorithm.RS256]: { kind: 'rsa', hash: HashAlgorithm.SHA256 },
  [Algorithm.RS384]: { kind: 'rsa', hash: HashAlgorithm.SHA384 },
  [Algorithm.RS512]: { kind: 'rsa', hash: HashAlgorithm.SHA512 },
  [Algorithm.PS256]: { kind: 'rsa-pss', hash: HashAlgorithm.SHA256, saltLength: 32 },
  [Algorithm.PS384]: { kind: 'rsa-pss', hash: HashAlgorithm.SHA384, saltLength: 48 },
  [Algorithm.PS512]: { kind: 'rsa-pss', hash: HashAlgorithm.SHA512, saltLength: 64 },
  [Algorithm.ES256]: { kind: 'ec', hash: HashAlgorithm.SHA256, curve: ECCurve.P256, size: 32 },
  [Algorithm.ES384]: { kind: 'ec', hash: HashAlgorithm.SHA384, curve: ECCurve.P384, size: 48 },
  [Algorithm.ES512]: { kind: 'ec', hash: HashAlgorithm.SHA512, curve: ECCurve.P521, size: 66 },
  [Algorithm.EdDSA]: { kind: 'eddsa' },
} as const;

/**
 * Every supported algorithm identifier, in registry order.
 */
export const SUPPORTED_ALGORITHMS: readonly Algorithm[] = Object.values(Algorithm);

/**
 * Narrow an arbitrary header value to a registered algorithm.
 */
export function isAlgorithm(value: unknown): value is Algorithm {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(ALGORITHM_CONFIG, value);
}
