/**
 * signet-tokens - Algorithm Registry Tests
 */

import { describe, it, expect, beforeAll } from 'vitest';
import * as crypto from 'crypto';
import {
  base64urlEncode,
  base64urlDecode,
  encodeJSON,
  decodeJSON,
  generateKeyPair,
  generateSecret,
  generateRandomString,
  generateTokenId,
  isAlgorithm,
  isHmacAlgorithm,
  sign,
  verify,
  SUPPORTED_ALGORITHMS,
  AsymmetricAlgorithm,
  AsymmetricKeyPair,
  HmacAlgorithm,
} from '../../src/crypto';
import { Algorithm, TokenError, TOKEN_ERRORS } from '../../src/types';

function captureError(fn: () => unknown): TokenError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TokenError) return error;
    throw error;
  }
  throw new Error('Expected a TokenError');
}

describe('Base64URL Utilities', () => {
  describe('base64urlEncode', () => {
    it('should encode string to unpadded base64url', () => {
      const encoded = base64urlEncode('Hello, World!');
      expect(encoded).toBe('SGVsbG8sIFdvcmxkIQ');
    });

    it('should encode buffer to base64url', () => {
      expect(base64urlEncode(Buffer.from('Test Data'))).toBe('VGVzdCBEYXRh');
    });

    it('should use the URL-safe alphabet', () => {
      expect(base64urlEncode(Buffer.from([0xfb, 0xff]))).toBe('-_8');
    });

    it('should handle empty input', () => {
      expect(base64urlEncode('')).toBe('');
    });
  });

  describe('base64urlDecode', () => {
    it('should decode base64url to buffer', () => {
      expect(base64urlDecode('SGVsbG8sIFdvcmxkIQ').toString('utf8')).toBe('Hello, World!');
    });

    it('should decode inputs that would need padding', () => {
      expect(base64urlDecode('YQ').toString('utf8')).toBe('a');
      expect(base64urlDecode('YWI').toString('utf8')).toBe('ab');
      expect(base64urlDecode('YWJj').toString('utf8')).toBe('abc');
    });

    it('should decode the URL-safe alphabet', () => {
      expect(base64urlDecode('-_8')).toEqual(Buffer.from([0xfb, 0xff]));
    });

    it('should reject padding', () => {
      expect(captureError(() => base64urlDecode('YQ==')).errorCode).toBe(TOKEN_ERRORS.ENCODING_ERROR);
    });

    it('should reject characters from the standard alphabet', () => {
      expect(captureError(() => base64urlDecode('+/8')).errorCode).toBe(TOKEN_ERRORS.ENCODING_ERROR);
    });

    it('should reject impossible lengths', () => {
      expect(captureError(() => base64urlDecode('YWJjZ')).errorCode).toBe(TOKEN_ERRORS.ENCODING_ERROR);
    });

    it('should reject non-zero trailing bits', () => {
      expect(captureError(() => base64urlDecode('YR')).errorCode).toBe(TOKEN_ERRORS.ENCODING_ERROR);
    });
  });

  describe('JSON encoding', () => {
    it('should encode objects as base64url JSON', () => {
      expect(encodeJSON({ foo: 'bar' })).toBe('eyJmb28iOiJiYXIifQ');
    });

    it('should decode base64url JSON', () => {
      expect(decodeJSON('eyJmb28iOiJiYXIifQ')).toEqual({ foo: 'bar' });
    });
  });
});

describe('Algorithm registry', () => {
  it('should register every algorithm', () => {
    expect(SUPPORTED_ALGORITHMS).toEqual([
      'HS256',
      'HS384',
      'HS512',
      'RS256',
      'RS384',
      'RS512',
      'PS256',
      'PS384',
      'PS512',
      'ES256',
      'ES384',
      'ES512',
      'EdDSA',
    ]);
  });

  it('should recognize algorithm identifiers', () => {
    expect(isAlgorithm('ES256')).toBe(true);
    expect(isAlgorithm('none')).toBe(false);
    expect(isAlgorithm('toString')).toBe(false);
    expect(isAlgorithm(256)).toBe(false);
  });

  it('should tell HMAC variants apart', () => {
    expect(isHmacAlgorithm(Algorithm.HS384)).toBe(true);
    expect(isHmacAlgorithm(Algorithm.PS384)).toBe(false);
  });
});

describe('HMAC', () => {
  it('should produce the standard HMAC-SHA256 digest', () => {
    const mac = sign('The quick brown fox jumps over the lazy dog', 'key', Algorithm.HS256);
    expect(mac.toString('hex')).toBe('f7bc83f430538424b13298e6aa6fb143ef4d59a14946175997479dbc2d1a3cd8');
  });

  it.each<[HmacAlgorithm, number]>([
    [Algorithm.HS256, 32],
    [Algorithm.HS384, 48],
    [Algorithm.HS512, 64],
  ])('should sign and verify with %s', (algorithm, length) => {
    const secret = generateSecret(algorithm);
    expect(secret.length).toBe(length);

    const mac = sign('payload', secret, algorithm);
    expect(mac.length).toBe(length);
    expect(verify('payload', mac, secret, algorithm)).toBe(true);
    expect(verify('payload!', mac, secret, algorithm)).toBe(false);
  });

  it('should accept a secret KeyObject', () => {
    const key = crypto.createSecretKey(Buffer.from('test-secret'));
    const mac = sign('payload', key, Algorithm.HS256);
    expect(verify('payload', mac, 'test-secret', Algorithm.HS256)).toBe(true);
  });

  it('should reject a MAC of the wrong length', () => {
    const mac = sign('payload', 'test-secret', Algorithm.HS256);
    expect(verify('payload', mac.subarray(0, 16), 'test-secret', Algorithm.HS256)).toBe(false);
  });

  it('should refuse an empty secret', () => {
    const error = captureError(() => sign('payload', '', Algorithm.HS256));
    expect(error.errorCode).toBe(TOKEN_ERRORS.KEY_MISMATCH);
    expect(error.message).toBe('Key does not fit HS256: HMAC secret must not be empty');
  });

  it('should refuse an asymmetric key', async () => {
    const { privateKey } = await generateKeyPair(Algorithm.ES256);
    expect(captureError(() => sign('payload', privateKey, Algorithm.HS256)).errorCode).toBe(
      TOKEN_ERRORS.KEY_MISMATCH
    );
  });
});

describe('Asymmetric signatures', () => {
  let rsa: AsymmetricKeyPair;
  const pairs = new Map<AsymmetricAlgorithm, AsymmetricKeyPair>();

  beforeAll(async () => {
    rsa = await generateKeyPair(Algorithm.RS256);
    for (const algorithm of [Algorithm.ES256, Algorithm.ES384, Algorithm.ES512, Algorithm.EdDSA] as const) {
      pairs.set(algorithm, await generateKeyPair(algorithm));
    }
  });

  function keysFor(algorithm: AsymmetricAlgorithm): AsymmetricKeyPair {
    return pairs.get(algorithm) ?? rsa;
  }

  it.each<[AsymmetricAlgorithm, number]>([
    [Algorithm.RS256, 256],
    [Algorithm.RS384, 256],
    [Algorithm.RS512, 256],
    [Algorithm.PS256, 256],
    [Algorithm.PS384, 256],
    [Algorithm.PS512, 256],
    [Algorithm.ES256, 64],
    [Algorithm.ES384, 96],
    [Algorithm.ES512, 132],
    [Algorithm.EdDSA, 64],
  ])('should sign and verify with %s', (algorithm, length) => {
    const { privateKey, publicKey } = keysFor(algorithm);
    const signature = sign('payload', privateKey, algorithm);

    expect(signature.length).toBe(length);
    expect(verify('payload', signature, publicKey, algorithm)).toBe(true);
    expect(verify('payload', signature, privateKey, algorithm)).toBe(true);
    expect(verify('payloaD', signature, publicKey, algorithm)).toBe(false);
  });

  it('should not verify a PKCS#1 signature as PSS', () => {
    const signature = sign('payload', rsa.privateKey, Algorithm.RS256);
    expect(verify('payload', signature, rsa.publicKey, Algorithm.PS256)).toBe(false);
  });

  it('should reject an ECDSA signature of the wrong width', () => {
    const { privateKey, publicKey } = keysFor(Algorithm.ES256);
    const signature = sign('payload', privateKey, Algorithm.ES256);
    expect(verify('payload', Buffer.concat([signature, Buffer.from([0])]), publicKey, Algorithm.ES256)).toBe(false);
  });

  describe('key mismatch', () => {
    it('should refuse to sign with a public key', () => {
      const error = captureError(() => sign('payload', keysFor(Algorithm.ES256).publicKey, Algorithm.ES256));
      expect(error.errorCode).toBe(TOKEN_ERRORS.KEY_MISMATCH);
      expect(error.message).toBe('Key does not fit ES256: A private key is required for signing');
    });

    it('should refuse a key on the wrong curve', () => {
      const error = captureError(() => sign('payload', keysFor(Algorithm.ES384).privateKey, Algorithm.ES256));
      expect(error.message).toBe('Key does not fit ES256: expected curve prime256v1, got secp384r1');
    });

    it('should refuse an EC key for RSA', () => {
      const error = captureError(() => sign('payload', keysFor(Algorithm.ES256).privateKey, Algorithm.RS256));
      expect(error.message).toBe('Key does not fit RS256: expected an RSA key, got ec');
    });

    it('should refuse an RSA modulus below 2048 bits', () => {
      const { privateKey } = crypto.generateKeyPairSync('rsa', { modulusLength: 1024 });
      const error = captureError(() => sign('payload', privateKey, Algorithm.RS256));
      expect(error.errorCode).toBe(TOKEN_ERRORS.KEY_MISMATCH);
      expect(error.message).toBe('Key does not fit RS256: RSA modulus must be at least 2048 bits');
    });

    it('should refuse a shared secret for EdDSA', () => {
      const error = captureError(() => sign('payload', 'test-secret', Algorithm.EdDSA));
      expect(error.message).toBe('Key does not fit EdDSA: expected an asymmetric KeyObject');
    });

    it('should answer false rather than throw when verifying with a mismatched key', () => {
      const signature = sign('payload', keysFor(Algorithm.EdDSA).privateKey, Algorithm.EdDSA);
      expect(verify('payload', signature, 'test-secret', Algorithm.EdDSA)).toBe(false);
      expect(verify('payload', signature, rsa.publicKey, Algorithm.EdDSA)).toBe(false);
    });
  });
});

describe('Random Utilities', () => {
  it('should generate random strings of the requested byte length', () => {
    const value = generateRandomString(24);
    expect(value).toMatch(/^[A-Za-z0-9_-]{32}$/);
    expect(generateRandomString(24)).not.toBe(value);
  });

  it('should generate prefixed token identifiers', () => {
    expect(generateTokenId()).toMatch(/^tkn_[A-Za-z0-9_-]{32}$/);
  });
});
