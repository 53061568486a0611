/**
 * signet-tokens - Algorithm Registry
 * Native Node.js crypto implementation of every supported signature scheme
 */

import * as crypto from 'crypto';
import {
  Algorithm,
  TokenError,
  TOKEN_ERRORS,
  TOKEN_ERROR_MESSAGES,
  TOKEN_ERROR_MESSAGE_HELPERS,
} from '../types';
import {
  ALGORITHM_CONFIG,
  AlgorithmConfig,
  DEFAULT_RANDOM_STRING_LENGTH,
  DEFAULT_RSA_MODULUS_LENGTH,
  HMAC_SECRET_LENGTHS,
  MIN_RSA_MODULUS_LENGTH,
  TOKEN_ID_PREFIX,
} from './AlgorithmConfig';

// ============================================================================
// KEY TYPES
// ============================================================================

/**
 * Raw shared secret for the HMAC family.
 */
export type SecretKey = Uint8Array | string;

/**
 * Any key the registry accepts. Asymmetric variants require a `KeyObject`
 * produced by the caller's key loader.
 */
export type SigningKey = SecretKey | crypto.KeyObject;

export type HmacAlgorithm = Algorithm.HS256 | Algorithm.HS384 | Algorithm.HS512;

export type AsymmetricAlgorithm = Exclude<Algorithm, HmacAlgorithm>;

export function isHmacAlgorithm(algorithm: Algorithm): algorithm is HmacAlgorithm {
  return ALGORITHM_CONFIG[algorithm].kind === 'hmac';
}

export interface AsymmetricKeyPair {
  algorithm: AsymmetricAlgorithm;
  privateKey: crypto.KeyObject;
  publicKey: crypto.KeyObject;
}

// ============================================================================
// BASE64URL UTILITIES
// ============================================================================

const BASE64URL_ALPHABET = /^[A-Za-z0-9_-]*$/;

/**
 * Encode buffer to unpadded base64url
 */
export function base64urlEncode(data: Buffer | string): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  return buffer.toString('base64url');
}

/**
 * Decode unpadded base64url to buffer.
 *
 * Rejects padding, characters outside the URL-safe alphabet, impossible
 * lengths, and encodings whose unused trailing bits are not zero.
 */
export function base64urlDecode(str: string): Buffer {
  if (!BASE64URL_ALPHABET.test(str) || str.length % 4 === 1) {
    throw new TokenError(TOKEN_ERRORS.ENCODING_ERROR, TOKEN_ERROR_MESSAGES.INVALID_BASE64URL);
  }
  const decoded = Buffer.from(str, 'base64url');
  if (decoded.toString('base64url') !== str) {
    throw new TokenError(TOKEN_ERRORS.ENCODING_ERROR, TOKEN_ERROR_MESSAGES.INVALID_BASE64URL);
  }
  return decoded;
}

/**
 * Encode object to base64url JSON
 */
export function encodeJSON(obj: unknown): string {
  return base64urlEncode(JSON.stringify(obj));
}

/**
 * Decode base64url JSON. The result is untyped until the caller narrows it.
 */
export function decodeJSON(str: string): unknown {
  return JSON.parse(base64urlDecode(str).toString('utf8'));
}

// ============================================================================
// KEY CHECKS
// ============================================================================

type KeyUse = 'sign' | 'verify';

function assertNever(value: never): never {
  throw new Error(`Unhandled algorithm configuration: ${JSON.stringify(value)}`);
}

/**
 * Resolve a shared secret for the HMAC family, or explain why the key
 * does not qualify.
 */
function resolveSecret(key: SigningKey): crypto.KeyObject | Uint8Array | string {
  if (key instanceof crypto.KeyObject) {
    if (key.type !== 'secret') {
      throw new Error(`expected a secret key, got a ${key.type} key`);
    }
    if (!key.symmetricKeySize) {
      throw new Error(TOKEN_ERROR_MESSAGES.EMPTY_SECRET);
    }
    return key;
  }
  if (key.length === 0) {
    throw new Error(TOKEN_ERROR_MESSAGES.EMPTY_SECRET);
  }
  return key;
}

/**
 * Check that an asymmetric key matches the variant's key type, curve, and
 * size. Returns the key on success; throws a plain `Error` describing the
 * mismatch otherwise.
 */
function resolveAsymmetricKey(
  key: SigningKey,
  config: Exclude<AlgorithmConfig, { kind: 'hmac' }>,
  use: KeyUse
): crypto.KeyObject {
  if (!(key instanceof crypto.KeyObject) || key.type === 'secret') {
    throw new Error('expected an asymmetric KeyObject');
  }
  if (use === 'sign' && key.type !== 'private') {
    throw new Error(TOKEN_ERROR_MESSAGES.PUBLIC_KEY_CANNOT_SIGN);
  }

  const keyType = key.asymmetricKeyType;
  const details: crypto.AsymmetricKeyDetails = key.asymmetricKeyDetails ?? {};

  switch (config.kind) {
    case 'rsa':
    case 'rsa-pss': {
      const accepted = config.kind === 'rsa' ? keyType === 'rsa' : keyType === 'rsa' || keyType === 'rsa-pss';
      if (!accepted) {
        throw new Error(`expected an RSA key, got ${keyType ?? 'unknown'}`);
      }
      if ((details.modulusLength ?? 0) < MIN_RSA_MODULUS_LENGTH) {
        throw new Error(`RSA modulus must be at least ${MIN_RSA_MODULUS_LENGTH} bits`);
      }
      return key;
    }
    case 'ec':
      if (keyType !== 'ec') {
        throw new Error(`expected an EC key, got ${keyType ?? 'unknown'}`);
      }
      if (details.namedCurve !== config.curve) {
        throw new Error(`expected curve ${config.curve}, got ${details.namedCurve ?? 'unknown'}`);
      }
      return key;
    case 'eddsa':
      if (keyType !== 'ed25519') {
        throw new Error(`expected an Ed25519 key, got ${keyType ?? 'unknown'}`);
      }
      return key;
    default:
      return assertNever(config);
  }
}

// ============================================================================
// SIGNING
// ============================================================================

function toBuffer(data: string | Buffer): Buffer {
  return typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
}

function computeSignature(data: Buffer, key: SigningKey, config: AlgorithmConfig): Buffer {
  switch (config.kind) {
    case 'hmac':
      return crypto.createHmac(config.hash, resolveSecret(key)).update(data).digest();
    case 'rsa':
      return crypto.sign(config.hash, data, {
        key: resolveAsymmetricKey(key, config, 'sign'),
        padding: crypto.constants.RSA_PKCS1_PADDING,
      });
    case 'rsa-pss':
      return crypto.sign(config.hash, data, {
        key: resolveAsymmetricKey(key, config, 'sign'),
        padding: crypto.constants.RSA_PKCS1_PSS_PADDING,
        saltLength: config.saltLength,
      });
    case 'ec':
      // Fixed-width r||s, not DER
      return crypto.sign(config.hash, data, {
        key: resolveAsymmetricKey(key, config, 'sign'),
        dsaEncoding: 'ieee-p1363',
      });
    case 'eddsa':
      return crypto.sign(null, data, resolveAsymmetricKey(key, config, 'sign'));
    default:
      return assertNever(config);
  }
}

/**
 * Sign data with the key for the given algorithm.
 *
 * @throws {TokenError} `KEY_MISMATCH` when the key's type, curve, or size
 * does not fit the algorithm.
 */
export function sign(data: string | Buffer, key: SigningKey, algorithm: Algorithm): Buffer {
  const config = ALGORITHM_CONFIG[algorithm];
  try {
    return computeSignature(toBuffer(data), key, config);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new TokenError(TOKEN_ERRORS.KEY_MISMATCH, TOKEN_ERROR_MESSAGE_HELPERS.keyMismatch(algorithm, detail));
  }
}

// ============================================================================
// VERIFICATION
// ============================================================================

function checkSignature(data: Buffer, signature: Buffer, key: SigningKey, config: AlgorithmConfig): boolean {
  switch (config.kind) {
    case 'hmac': {
      const expected = crypto.createHmac(config.hash, resolveSecret(key)).update(data).digest();
      return expected.length === signature.length && crypto.timingSafeEqual(expected, signature);
    }
    case 'rsa':
      return crypto.verify(
        config.hash,
        data,
        { key: resolveAsymmetricKey(key, config, 'verify'), padding: crypto.constants.RSA_PKCS1_PADDING },
        signature
      );
    case 'rsa-pss':
      return crypto.verify(
        config.hash,
        data,
        {
          key: resolveAsymmetricKey(key, config, 'verify'),
          padding: crypto.constants.RSA_PKCS1_PSS_PADDING,
          saltLength: config.saltLength,
        },
        signature
      );
    case 'ec':
      if (signature.length !== config.size * 2) {
        return false;
      }
      return crypto.verify(
        config.hash,
        data,
        { key: resolveAsymmetricKey(key, config, 'verify'), dsaEncoding: 'ieee-p1363' },
        signature
      );
    case 'eddsa':
      return crypto.verify(null, data, resolveAsymmetricKey(key, config, 'verify'), signature);
    default:
      return assertNever(config);
  }
}

/**
 * Verify a signature. Any mismatch, including a key that does not fit the
 * algorithm, yields `false` without saying why.
 */
export function verify(data: string | Buffer, signature: Buffer, key: SigningKey, algorithm: Algorithm): boolean {
  const config = ALGORITHM_CONFIG[algorithm];
  try {
    return checkSignature(toBuffer(data), signature, key, config);
  } catch {
    return false;
  }
}

// ============================================================================
// KEY GENERATION
// ============================================================================

/**
 * Generate a random HMAC secret as long as the algorithm's digest
 */
export function generateSecret(algorithm: HmacAlgorithm = Algorithm.HS256): Buffer {
  return crypto.randomBytes(HMAC_SECRET_LENGTHS[algorithm]);
}

function keyPairCallback(
  algorithm: AsymmetricAlgorithm,
  resolve: (pair: AsymmetricKeyPair) => void,
  reject: (reason: Error) => void
) {
  return (err: Error | null, publicKey: crypto.KeyObject, privateKey: crypto.KeyObject) => {
    if (err) {
      reject(err);
    } else {
      resolve({ algorithm, publicKey, privateKey });
    }
  };
}

/**
 * Generate a key pair of the type, curve, and size the algorithm expects
 */
export async function generateKeyPair(
  algorithm: AsymmetricAlgorithm = Algorithm.ES256,
  modulusLength: number = DEFAULT_RSA_MODULUS_LENGTH
): Promise<AsymmetricKeyPair> {
  const config = ALGORITHM_CONFIG[algorithm];

  return new Promise((resolve, reject) => {
    const done = keyPairCallback(algorithm, resolve, reject);
    switch (config.kind) {
      case 'rsa':
      case 'rsa-pss':
        crypto.generateKeyPair('rsa', { modulusLength }, done);
        return;
      case 'ec':
        crypto.generateKeyPair('ec', { namedCurve: config.curve }, done);
        return;
      case 'eddsa':
        crypto.generateKeyPair('ed25519', {}, done);
        return;
      case 'hmac':
        reject(new Error(`${algorithm} uses a shared secret, not a key pair`));
        return;
      default:
        assertNever(config);
    }
  });
}

// ============================================================================
// RANDOM UTILITIES
// ============================================================================

/**
 * Generate a cryptographically secure random string
 */
export function generateRandomString(length: number = DEFAULT_RANDOM_STRING_LENGTH): string {
  return base64urlEncode(crypto.randomBytes(length));
}

/**
 * Generate a unique token ID, suitable for the `jti` claim
 */
export function generateTokenId(): string {
  return `${TOKEN_ID_PREFIX}${generateRandomString(24)}`;
}

export { ALGORITHM_CONFIG, SUPPORTED_ALGORITHMS, isAlgorithm } from './AlgorithmConfig';
