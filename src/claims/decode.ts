/**
 * signet-tokens - Claims Decoding
 *
 * Decodes a verified payload into either an open mapping or a structured
 * record described by a `RecordShape`. Both destinations read the same
 * JSON tree, so one payload decodes the same way into either.
 */

import {
  TokenError,
  TOKEN_ERRORS,
  TOKEN_ERROR_MESSAGES,
  TOKEN_ERROR_MESSAGE_HELPERS,
  VerifiedToken,
} from '../types';
import { isPlainObject, ownClaim, splitClaims } from './merge';

// ============================================================================
// TYPES
// ============================================================================

/**
 * - `lenient`: missing and unknown fields are ignored.
 * - `strict`: a field marked required that is absent or holds a
 *   zero-equivalent value (`""`, `0`, `false`, `null`, `[]`, `{}`) fails.
 */
export type DecodeMode = 'lenient' | 'strict';

export interface DecodeOptions {
  /** Decode mode (default: `lenient`). */
  mode?: DecodeMode;
  /** Required member names, for mapping destinations. */
  required?: readonly string[];
}

/**
 * Converts a raw JSON value into a destination slot's type, returning
 * `undefined` when the value has the wrong shape.
 */
export type ClaimReader<V> = (value: unknown) => V | undefined;

export interface FieldOptions {
  /** JSON member name (default: the slot name). */
  name?: string;
  required?: boolean;
}

/**
 * One entry of a record's field descriptor list.
 */
export interface FieldDescriptor<T> {
  name: string;
  required: boolean;
  /** Store `value` into its slot on `target`; `false` on a type mismatch. */
  assign(target: T, value: unknown): boolean;
}

/**
 * Payload bytes, or the verified token carrying them.
 */
export type PayloadSource = VerifiedToken | Uint8Array;

// ============================================================================
// RECORD SHAPES
// ============================================================================

/**
 * Field descriptor list for a structured destination record.
 *
 * @example
 * ```typescript
 * interface Profile { username: string; age?: number }
 *
 * const ProfileShape = new RecordShape<Profile>(() => ({ username: '' }))
 *   .field('username', readString, { required: true })
 *   .field('age', readInteger);
 *
 * const profile = decodeClaims(verified, ProfileShape, { mode: 'strict' });
 * ```
 */
export class RecordShape<T> {
  private readonly fields: FieldDescriptor<T>[] = [];

  constructor(private readonly create: () => T) {}

  field<K extends keyof T>(slot: K, read: ClaimReader<T[K]>, options: FieldOptions = {}): this {
    this.fields.push({
      name: options.name ?? String(slot),
      required: options.required ?? false,
      assign: (target, value) => {
        const decoded = read(value);
        if (decoded === undefined) return false;
        target[slot] = decoded;
        return true;
      },
    });
    return this;
  }

  get descriptors(): readonly FieldDescriptor<T>[] {
    return this.fields;
  }

  /** Fresh destination holding the record's defaults. */
  instantiate(): T {
    return this.create();
  }
}

// ============================================================================
// READERS
// ============================================================================

export const readString: ClaimReader<string> = value => (typeof value === 'string' ? value : undefined);

export const readNumber: ClaimReader<number> = value =>
  typeof value === 'number' && Number.isFinite(value) ? value : undefined;

export const readInteger: ClaimReader<number> = value =>
  typeof value === 'number' && Number.isInteger(value) ? value : undefined;

export const readBoolean: ClaimReader<boolean> = value => (typeof value === 'boolean' ? value : undefined);

export const readStringArray: ClaimReader<string[]> = value =>
  Array.isArray(value) && value.every(v => typeof v === 'string') ? value.map(String) : undefined;

/** Accepts a single string or an array of strings. */
export const readAudience: ClaimReader<string | string[]> = value =>
  readString(value) ?? readStringArray(value);

/** Any JSON object. */
export const readObject: ClaimReader<Record<string, unknown>> = value =>
  isPlainObject(value) ? value : undefined;

// ============================================================================
// DECODING
// ============================================================================

function isZeroValue(value: unknown): boolean {
  if (value === null || value === '' || value === 0 || value === false) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isPlainObject(value)) return Object.keys(value).length === 0;
  return false;
}

function missingField(name: string): TokenError {
  return new TokenError(TOKEN_ERRORS.MISSING_REQUIRED_FIELD, TOKEN_ERROR_MESSAGE_HELPERS.missingField(name), name);
}

/**
 * Parse payload bytes into a JSON object.
 *
 * @throws {TokenError} `CLAIMS_DECODE_ERROR` when the bytes are not JSON or
 * not an object.
 */
export function parsePayload(source: PayloadSource): Record<string, unknown> {
  const bytes = source instanceof Uint8Array ? source : source.payload;
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(bytes).toString('utf8'));
  } catch {
    throw new TokenError(TOKEN_ERRORS.CLAIMS_DECODE_ERROR, TOKEN_ERROR_MESSAGES.PAYLOAD_NOT_JSON_OBJECT);
  }
  if (!isPlainObject(parsed)) {
    throw new TokenError(TOKEN_ERRORS.CLAIMS_DECODE_ERROR, TOKEN_ERROR_MESSAGES.PAYLOAD_NOT_JSON_OBJECT);
  }
  return parsed;
}

function decodeIntoMapping(tree: Record<string, unknown>, options: DecodeOptions): Record<string, unknown> {
  if (options.mode === 'strict') {
    for (const name of options.required ?? []) {
      const value = ownClaim(tree, name);
      if (value === undefined || isZeroValue(value)) {
        throw missingField(name);
      }
    }
  }
  return { ...tree };
}

function decodeIntoRecord<T>(tree: Record<string, unknown>, shape: RecordShape<T>, options: DecodeOptions): T {
  const strict = options.mode === 'strict';
  const target = shape.instantiate();

  for (const field of shape.descriptors) {
    const value = ownClaim(tree, field.name);
    if (strict && field.required && (value === undefined || isZeroValue(value))) {
      throw missingField(field.name);
    }
    if (value === undefined || value === null) continue;
    if (!field.assign(target, value)) {
      throw new TokenError(
        TOKEN_ERRORS.CLAIMS_DECODE_ERROR,
        TOKEN_ERROR_MESSAGE_HELPERS.invalidClaim(field.name),
        field.name
      );
    }
  }

  return target;
}

/**
 * Decode a payload into an open mapping of every member.
 */
export function decodeClaims(source: PayloadSource, options?: DecodeOptions): Record<string, unknown>;
/**
 * Decode a payload into a structured record.
 */
export function decodeClaims<T>(source: PayloadSource, shape: RecordShape<T>, options?: DecodeOptions): T;
export function decodeClaims<T>(
  source: PayloadSource,
  shapeOrOptions?: RecordShape<T> | DecodeOptions,
  options: DecodeOptions = {}
): T | Record<string, unknown> {
  const tree = parsePayload(source);
  if (shapeOrOptions instanceof RecordShape) {
    return decodeIntoRecord(tree, shapeOrOptions, options);
  }
  return decodeIntoMapping(tree, shapeOrOptions ?? {});
}

/**
 * Decode only the non-registered members of a payload.
 */
export function decodeCustomClaims(source: PayloadSource): Record<string, unknown> {
  return splitClaims(parsePayload(source)).custom;
}
