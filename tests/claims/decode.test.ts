/**
 * signet-tokens - Claims Decoding Tests
 */

import { describe, it, expect } from 'vitest';
import {
  RecordShape,
  decodeClaims,
  decodeCustomClaims,
  parsePayload,
  readAudience,
  readBoolean,
  readInteger,
  readString,
  readStringArray,
} from '../../src/claims';
import { TokenError, TOKEN_ERRORS } from '../../src/types';

interface Profile {
  username: string;
  age?: number;
  admin: boolean;
  tags: string[];
}

const ProfileShape = new RecordShape<Profile>(() => ({ username: '', admin: false, tags: [] }))
  .field('username', readString, { required: true })
  .field('age', readInteger)
  .field('admin', readBoolean, { name: 'is_admin' })
  .field('tags', readStringArray);

function payload(value: unknown): Buffer {
  return Buffer.from(JSON.stringify(value));
}

function captureError(fn: () => unknown): TokenError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TokenError) return error;
    throw error;
  }
  throw new Error('Expected a TokenError');
}

describe('parsePayload', () => {
  it('should parse a JSON object', () => {
    expect(parsePayload(payload({ foo: 'bar' }))).toEqual({ foo: 'bar' });
  });

  it('should reject invalid JSON', () => {
    expect(captureError(() => parsePayload(Buffer.from('{foo'))).errorCode).toBe(TOKEN_ERRORS.CLAIMS_DECODE_ERROR);
  });

  it('should reject JSON that is not an object', () => {
    expect(captureError(() => parsePayload(payload(['foo']))).errorCode).toBe(TOKEN_ERRORS.CLAIMS_DECODE_ERROR);
    expect(captureError(() => parsePayload(payload('foo'))).errorCode).toBe(TOKEN_ERRORS.CLAIMS_DECODE_ERROR);
  });
});

describe('decodeClaims into a mapping', () => {
  it('should return every member', () => {
    expect(decodeClaims(payload({ sub: 'user-1', foo: 'bar' }))).toEqual({ sub: 'user-1', foo: 'bar' });
  });

  it('should ignore required names in lenient mode', () => {
    expect(decodeClaims(payload({ foo: '' }), { required: ['foo', 'bar'] })).toEqual({ foo: '' });
  });

  it('should fail on an absent required member in strict mode', () => {
    const error = captureError(() => decodeClaims(payload({ foo: 'x' }), { mode: 'strict', required: ['bar'] }));
    expect(error.errorCode).toBe(TOKEN_ERRORS.MISSING_REQUIRED_FIELD);
    expect(error.field).toBe('bar');
  });

  it.each<[unknown]>([[''], [0], [false], [null], [[]], [{}]])('should treat %j as missing in strict mode', value => {
    const error = captureError(() => decodeClaims(payload({ foo: value }), { mode: 'strict', required: ['foo'] }));
    expect(error.errorCode).toBe(TOKEN_ERRORS.MISSING_REQUIRED_FIELD);
  });

  it('should not count inherited members as present', () => {
    const error = captureError(() =>
      decodeClaims(payload({ foo: 'x' }), { mode: 'strict', required: ['constructor', 'toString'] })
    );
    expect(error.errorCode).toBe(TOKEN_ERRORS.MISSING_REQUIRED_FIELD);
    expect(error.field).toBe('constructor');
  });

  it('should pass in strict mode when required members hold values', () => {
    expect(decodeClaims(payload({ foo: 'x', n: 1 }), { mode: 'strict', required: ['foo', 'n'] })).toEqual({
      foo: 'x',
      n: 1,
    });
  });
});

describe('decodeClaims into a record', () => {
  it('should fill declared fields and ignore unknown members', () => {
    const profile = decodeClaims(payload({ username: 'ann', age: 31, is_admin: true, extra: 'x' }), ProfileShape);
    expect(profile).toEqual({ username: 'ann', age: 31, admin: true, tags: [] });
  });

  it('should keep defaults for absent and null members', () => {
    const profile = decodeClaims(payload({ username: null }), ProfileShape);
    expect(profile).toEqual({ username: '', admin: false, tags: [] });
  });

  it('should fail on a type mismatch', () => {
    const error = captureError(() => decodeClaims(payload({ username: 'ann', age: 31.5 }), ProfileShape));
    expect(error.errorCode).toBe(TOKEN_ERRORS.CLAIMS_DECODE_ERROR);
    expect(error.field).toBe('age');
  });

  it('should fail on an absent required field in strict mode', () => {
    const error = captureError(() => decodeClaims(payload({ age: 31 }), ProfileShape, { mode: 'strict' }));
    expect(error.errorCode).toBe(TOKEN_ERRORS.MISSING_REQUIRED_FIELD);
    expect(error.message).toBe('Required field "username" is missing');
  });

  it('should fail on a zero-valued required field in strict mode', () => {
    const error = captureError(() => decodeClaims(payload({ username: '' }), ProfileShape, { mode: 'strict' }));
    expect(error.field).toBe('username');
  });

  it('should not require optional fields in strict mode', () => {
    const profile = decodeClaims(payload({ username: 'ann', tags: [] }), ProfileShape, { mode: 'strict' });
    expect(profile).toEqual({ username: 'ann', admin: false, tags: [] });
  });

  it('should decode the same payload the same way into either destination', () => {
    const bytes = payload({ username: 'ann', is_admin: false, tags: ['a', 'b'] });
    const mapping = decodeClaims(bytes);
    const profile = decodeClaims(bytes, ProfileShape);

    expect(profile.username).toBe(mapping.username);
    expect(profile.admin).toBe(mapping.is_admin);
    expect(profile.tags).toEqual(mapping.tags);
  });

  it('should leave fields named after inherited members at their defaults', () => {
    interface Labels {
      label: string;
    }
    const LabelsShape = new RecordShape<Labels>(() => ({ label: 'none' })).field('label', readString, {
      name: 'toString',
    });

    expect(decodeClaims(payload({ foo: 'x' }), LabelsShape)).toEqual({ label: 'none' });
    expect(decodeClaims(payload({ toString: 'custom' }), LabelsShape)).toEqual({ label: 'custom' });
  });

  it('should hand out a fresh record each time', () => {
    const first = decodeClaims(payload({ username: 'ann', tags: ['a'] }), ProfileShape);
    const second = decodeClaims(payload({ username: 'bob' }), ProfileShape);
    expect(first.tags).toEqual(['a']);
    expect(second.tags).toEqual([]);
  });
});

describe('decodeCustomClaims', () => {
  it('should drop registered claims', () => {
    expect(decodeCustomClaims(payload({ iat: 1, exp: 2, sub: 'user-1', foo: 'bar' }))).toEqual({ foo: 'bar' });
  });
});

describe('readers', () => {
  it('should read integers only', () => {
    expect(readInteger(3)).toBe(3);
    expect(readInteger(1.5)).toBeUndefined();
    expect(readInteger('3')).toBeUndefined();
  });

  it('should read string arrays only', () => {
    expect(readStringArray(['a', 'b'])).toEqual(['a', 'b']);
    expect(readStringArray(['a', 1])).toBeUndefined();
  });

  it('should read a single or multiple audiences', () => {
    expect(readAudience('api')).toBe('api');
    expect(readAudience(['api', 'web'])).toEqual(['api', 'web']);
    expect(readAudience(7)).toBeUndefined();
  });
});
