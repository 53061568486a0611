/**
 * signet-tokens - CLI Formatting Tests
 */

import { describe, it, expect } from 'vitest';
import * as crypto from 'crypto';
import {
  describeError,
  formatTimestamp,
  getTimeRemaining,
  isExpired,
  loadPemKey,
  parseAlgorithm,
  parseClaimsJson,
} from '../../src/cli/format';
import { Algorithm } from '../../src/types';

const T = 1_700_000_000;
const clock = () => T * 1000;

describe('formatTimestamp', () => {
  it('should render seconds as ISO time', () => {
    expect(formatTimestamp(T)).toBe('2023-11-14T22:13:20.000Z');
  });
});

describe('isExpired', () => {
  it('should compare against the clock', () => {
    expect(isExpired(T, clock)).toBe(false);
    expect(isExpired(T - 1, clock)).toBe(true);
  });
});

describe('getTimeRemaining', () => {
  it.each<[number, string]>([
    [T + 45, '45s'],
    [T + 125, '2m 5s'],
    [T + 7320, '2h 2m'],
    [T + 90000, '1d 1h'],
    [T - 30, '30s ago'],
    [T - 600, '10m ago'],
    [T - 7200, '2h ago'],
    [T - 172800, '2d ago'],
  ])('should describe exp %i', (exp, expected) => {
    expect(getTimeRemaining(exp, clock)).toBe(expected);
  });
});

describe('parseAlgorithm', () => {
  it('should accept registered names', () => {
    expect(parseAlgorithm('EdDSA')).toBe(Algorithm.EdDSA);
  });

  it('should reject unknown names', () => {
    expect(() => parseAlgorithm('none')).toThrowError('Unknown algorithm: none');
  });
});

describe('parseClaimsJson', () => {
  it('should parse a JSON object', () => {
    expect(parseClaimsJson('{"sub":"user-1","n":2}')).toEqual({ sub: 'user-1', n: 2 });
  });

  it('should reject invalid JSON', () => {
    expect(() => parseClaimsJson('{sub')).toThrowError('Claims must be valid JSON');
  });

  it('should reject JSON that is not an object', () => {
    expect(() => parseClaimsJson('[1]')).toThrowError('Claims must be a JSON object');
  });
});

describe('loadPemKey', () => {
  const { privateKey } = crypto.generateKeyPairSync('ed25519');
  const privatePem = privateKey.export({ type: 'pkcs8', format: 'pem' }).toString();

  it('should load a private key for signing', () => {
    expect(loadPemKey(privatePem, 'sign').type).toBe('private');
  });

  it('should derive a public key for verifying', () => {
    const key = loadPemKey(privatePem, 'verify');
    expect(key.type).toBe('public');
    expect(key.asymmetricKeyType).toBe('ed25519');
  });
});

describe('describeError', () => {
  it('should prefer the error message', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});
