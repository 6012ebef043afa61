/**
 * @fileoverview Structured data formats.
 *
 * A `DataFormat` turns raw body bytes plus the request's content type into a
 * validated, immutable value, or throws `ValidationFailedError`. Parsing is
 * the validation: a value returned by `parse` has passed its schema.
 *
 * @example
 * ```typescript
 * const Token = json({ token: 'string' });
 *
 * const data = Token.parse(encoder.encode('{"token":"abc"}'), { mediaType: 'application/json' });
 * data.token; // 'abc'
 * ```
 */

import { MediaTypes, type ContentType } from './content-type.js';
import { ValidationFailedError } from './errors.js';
import {
  compileSchema,
  type CompiledSchema,
  type InferSchema,
  type SchemaDefinition,
  type SchemaOptions,
} from './schema.js';

/** Parses and serializes one kind of structured payload. */
export interface DataFormat<T> {
  /** Short name used in documentation. */
  readonly kind: 'binary' | 'json' | 'form';
  /** Media type written by `serialize`, and required by `parse` unless `binary`. */
  readonly mediaType: string;
  /** Compiled schema, for schema-typed formats. */
  readonly schema?: CompiledSchema<T>;
  /** Validates raw bytes. Never mutates `raw`. */
  parse(raw: Uint8Array, contentType: ContentType): T;
  /** Encodes a value for a response body. */
  serialize(value: T): Uint8Array;
}

/** Value type produced by a format. */
export type DataOf<F> = F extends DataFormat<infer T> ? T : never;

const encoder = new TextEncoder();

/** Validates a media type and charset, then decodes text. */
function decodeText(raw: Uint8Array, contentType: ContentType, expected: string): string {
  if (!contentType.mediaType) {
    throw new ValidationFailedError(`Content type required: ${expected}`);
  }
  if (contentType.mediaType !== expected) {
    throw new ValidationFailedError(
      `Unexpected content type: ${contentType.mediaType} (expected ${expected})`
    );
  }

  const charset = contentType.charset ?? 'utf-8';
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset, { fatal: true });
  } catch {
    throw new ValidationFailedError(`Unsupported charset: ${charset}`);
  }

  try {
    return decoder.decode(raw);
  } catch {
    throw new ValidationFailedError(`Body is not valid ${charset}`);
  }
}

// =============================================================================
// Binary
// =============================================================================

/** Raw payload. */
export interface BinaryData {
  readonly raw: Uint8Array;
}

/**
 * Accepts any bytes, with or without a content type.
 *
 * The value holds a copy, so later changes to the caller's buffer do not leak in.
 */
export function binary(mediaType: string = MediaTypes.binary): DataFormat<BinaryData> {
  return {
    kind: 'binary',
    mediaType,
    parse(raw) {
      return Object.freeze({ raw: raw.slice() });
    },
    serialize(value) {
      return value.raw;
    },
  };
}

// =============================================================================
// JSON
// =============================================================================

/** Options for `json()`. */
export type JsonOptions = Pick<SchemaOptions, 'extraFields'>;

/**
 * JSON object validated against a schema.
 *
 * The request must declare `application/json`. The charset defaults to UTF-8.
 * Values must already have their declared types; nothing is coerced.
 */
export function json<const T extends SchemaDefinition>(
  definition: T,
  options: JsonOptions = {}
): DataFormat<InferSchema<T>> {
  const schema = compileSchema(definition, { ...options, mode: 'strict' });

  return {
    kind: 'json',
    mediaType: MediaTypes.json,
    schema,
    parse(raw, contentType) {
      const text = decodeText(raw, contentType, MediaTypes.json);
      let value: unknown;
      try {
        value = JSON.parse(text);
      } catch (error) {
        throw new ValidationFailedError(
          `Malformed JSON: ${error instanceof Error ? error.message : String(error)}`
        );
      }
      return schema.parse(value);
    },
    serialize(value) {
      return encoder.encode(JSON.stringify(value));
    },
  };
}

// =============================================================================
// Form
// =============================================================================

/** Options for `form()`. */
export type FormOptions = Pick<SchemaOptions, 'extraFields'>;

function isListDeclaration(field: unknown): boolean {
  return Array.isArray(field) || (typeof field === 'string' && field.includes('[]'));
}

/**
 * `application/x-www-form-urlencoded` body validated against a schema.
 *
 * Values are coerced from strings. A key declared as a scalar that occurs more
 * than once fails validation. Keys declared as lists (`'string[]'`) collect
 * every occurrence.
 */
export function form<const T extends SchemaDefinition>(
  definition: T,
  options: FormOptions = {}
): DataFormat<InferSchema<T>> {
  const schema = compileSchema(definition, { ...options, mode: 'coerce' });

  return {
    kind: 'form',
    mediaType: MediaTypes.form,
    schema,
    parse(raw, contentType) {
      const params = new URLSearchParams(decodeText(raw, contentType, MediaTypes.form));
      const fields = new Map<string, unknown>();
      for (const key of new Set(params.keys())) {
        const values = params.getAll(key);
        if (Object.hasOwn(definition, key) && isListDeclaration(definition[key])) {
          fields.set(key, values);
        } else if (values.length > 1) {
          throw new ValidationFailedError(`Duplicate form field: ${key}`, {
            [key]: ['Duplicate field'],
          });
        } else {
          fields.set(key, values[0]);
        }
      }
      // fromEntries defines own properties, so `__proto__` stays a field.
      return schema.parse(Object.fromEntries(fields));
    },
    serialize(value) {
      const params = new URLSearchParams();
      for (const [key, item] of Object.entries(value)) {
        if (Array.isArray(item)) {
          for (const element of item) params.append(key, String(element));
        } else if (item !== undefined) {
          params.append(key, String(item));
        }
      }
      return encoder.encode(params.toString());
    },
  };
}
