/**
 * @fileoverview Schema types and validation utilities.
 *
 * Shorthand schema definitions for structured request data, interpreted by a
 * single generic validator. No external dependencies.
 *
 * Supported types:
 * - Primitives: `'string'`, `'number'`, `'integer'`, `'boolean'`
 * - Optional: `'string?'`, `'number?'`, `'integer?'`, `'boolean?'`
 * - Primitive lists: `'string[]'`, `'number[]?'`, ...
 * - Nested objects: `{ field: { nested: 'string' } }`
 * - Lists of objects or lists: `{ items: [{ name: 'string' }] }`
 *
 * Two modes share the validator. `strict` (JSON) requires every value to
 * already have its declared type. `coerce` (forms, query strings) converts
 * strings to numbers and booleans.
 *
 * @example
 * ```typescript
 * const user = compileSchema({
 *   name: 'string',
 *   age: 'integer',
 *   tags: 'string[]?',
 *   address: { city: 'string', zip: 'string?' },
 * });
 *
 * const result = user.safeParse({ name: 'Alice', age: 30 });
 * if (result.success) {
 *   result.data.address.city; // string
 * }
 * ```
 */

import { ValidationFailedError } from './errors.js';

/** Primitive type strings. */
export type PrimitiveType = 'string' | 'number' | 'integer' | 'boolean';

/** Optional primitive type strings. */
export type OptionalPrimitiveType = `${PrimitiveType}?`;

/** Array type strings. */
export type ArrayType = `${PrimitiveType}[]`;

/** Optional array type strings. */
export type OptionalArrayType = `${PrimitiveType}[]?`;

/** All supported type strings. */
export type SchemaType = PrimitiveType | OptionalPrimitiveType | ArrayType | OptionalArrayType;

/** One schema field: a type string, a nested schema, or a one-element list declaration. */
export type SchemaField = SchemaType | SchemaDefinition | readonly [SchemaField];

/** Schema definition using shorthand syntax. */
export interface SchemaDefinition {
  readonly [key: string]: SchemaField;
}

/** Maps primitive type strings to TypeScript types. */
export type PrimitiveTypeMap = {
  string: string;
  number: number;
  integer: number;
  boolean: boolean;
};

/** Checks if a schema field type is optional (ends with ?). */
type IsOptionalField<T> = T extends `${string}?` ? true : false;

/** Infers TypeScript type from a schema field. */
export type InferSchemaField<T> =
  T extends `${infer P extends PrimitiveType}[]?`
    ? readonly PrimitiveTypeMap[P][]
    : T extends `${infer P extends PrimitiveType}[]`
      ? readonly PrimitiveTypeMap[P][]
      : T extends `${infer P extends PrimitiveType}?`
        ? PrimitiveTypeMap[P]
        : T extends PrimitiveType
          ? PrimitiveTypeMap[T]
          : T extends readonly [infer E]
            ? readonly InferSchemaField<E>[]
            : T extends SchemaDefinition
              ? InferSchema<T>
              : never;

/** Gets keys of required fields (non-optional types). */
type RequiredKeys<T extends SchemaDefinition> = {
  [K in keyof T]: IsOptionalField<T[K]> extends true ? never : K;
}[keyof T];

/** Gets keys of optional fields (types ending with ?). */
type OptionalKeys<T extends SchemaDefinition> = {
  [K in keyof T]: IsOptionalField<T[K]> extends true ? K : never;
}[keyof T];

/**
 * Infers TypeScript type from schema definition.
 *
 * Required fields become required properties, optional fields (ending with ?)
 * become optional properties. Validated data is frozen, so every property is
 * read-only.
 */
export type InferSchema<T extends SchemaDefinition> = {
  readonly [K in RequiredKeys<T>]: InferSchemaField<T[K]>;
} & {
  readonly [K in OptionalKeys<T>]?: InferSchemaField<T[K]>;
};

/** Error object returned when validation fails. */
export interface ValidationError {
  flatten: () => { fieldErrors: Record<string, string[]> };
}

/** Validation result matching Zod's safeParse API for compatibility. */
export type ValidationResult<T> =
  | { success: true; data: T; error?: undefined }
  | { success: false; data?: undefined; error: ValidationError };

/** Validation behaviour. */
export interface SchemaOptions {
  /** `strict` for JSON values, `coerce` for string-valued sources (default: `strict`). */
  mode?: 'strict' | 'coerce';
  /** What to do with fields the schema does not declare (default: `ignore`). */
  extraFields?: 'ignore' | 'reject';
}

/** Compiled schema with validate methods. */
export interface CompiledSchema<T> {
  /** The source definition. */
  readonly definition: SchemaDefinition;
  /** Options the schema was compiled with. */
  readonly options: SchemaOptions;
  safeParse: (data: unknown) => ValidationResult<T>;
  /** Like `safeParse`, but throws `ValidationFailedError`. */
  parse: (data: unknown) => T;
}

/** Valid base types for primitives and arrays. */
const PRIMITIVE_TYPES: readonly string[] = ['string', 'number', 'integer', 'boolean'];

/** Parsed form of a type string. */
interface TypeString {
  base: string;
  optional: boolean;
  array: boolean;
}

type FieldErrors = Record<string, string[]>;

type FieldResult = { ok: true; value: unknown } | { ok: false; errors: FieldErrors };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Checks if a schema field is a list declaration. */
function isListField(field: SchemaField): field is readonly [SchemaField] {
  return Array.isArray(field);
}

/** Checks if a schema field is a nested object (not a type string). */
function isNestedSchema(field: SchemaField): field is SchemaDefinition {
  return typeof field === 'object' && field !== null && !Array.isArray(field);
}

function parseTypeString(type: string): TypeString {
  const optional = type.endsWith('?');
  let base = optional ? type.slice(0, -1) : type;
  const array = base.endsWith('[]');
  if (array) {
    base = base.slice(0, -2);
  }
  return { base, optional, array };
}

/** Defines an own property, so `__proto__` is stored like any other key. */
function define<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function mergeErrors(target: FieldErrors, source: FieldErrors): void {
  for (const [path, messages] of Object.entries(source)) {
    define(target, path, messages);
  }
}

function fail(path: string, message: string): FieldResult {
  return { ok: false, errors: { [path || '$']: [message] } };
}

/** Validates a single primitive value. In coerce mode strings are converted. */
function validatePrimitive(
  value: unknown,
  baseType: string,
  coerce: boolean
): { ok: true; value: unknown } | { ok: false; message: string } {
  switch (baseType) {
    case 'string':
      if (typeof value === 'string') return { ok: true, value };
      if (coerce && (typeof value === 'number' || typeof value === 'boolean')) {
        return { ok: true, value: String(value) };
      }
      return { ok: false, message: 'Expected string' };

    case 'number':
    case 'integer': {
      let num: number | undefined;
      if (typeof value === 'number') {
        num = value;
      } else if (coerce && typeof value === 'string' && value.trim() !== '') {
        num = Number(value);
      }
      if (num === undefined || !Number.isFinite(num)) {
        return { ok: false, message: `Expected ${baseType}` };
      }
      if (baseType === 'integer' && !Number.isInteger(num)) {
        return { ok: false, message: 'Expected integer' };
      }
      return { ok: true, value: num };
    }

    case 'boolean': {
      if (typeof value === 'boolean') return { ok: true, value };
      if (coerce) {
        if (value === 'true' || value === '1') return { ok: true, value: true };
        if (value === 'false' || value === '0') return { ok: true, value: false };
      }
      return { ok: false, message: coerce ? 'Expected boolean (true/false)' : 'Expected boolean' };
    }

    default:
      return { ok: false, message: `Unknown type: ${baseType}` };
  }
}

class Validator {
  private readonly coerce: boolean;
  private readonly rejectExtra: boolean;

  constructor(options: SchemaOptions) {
    this.coerce = options.mode === 'coerce';
    this.rejectExtra = options.extraFields === 'reject';
  }

  private isMissing(value: unknown): boolean {
    if (value === undefined) return true;
    return this.coerce ? value === '' : value === null;
  }

  field(field: SchemaField, value: unknown, path: string): FieldResult {
    if (isListField(field)) {
      if (this.isMissing(value)) return fail(path, 'Required');
      return this.list(field[0], value, path);
    }

    if (isNestedSchema(field)) {
      if (this.isMissing(value)) return fail(path, 'Required');
      if (!isRecord(value)) return fail(path, 'Expected object');
      return this.object(field, value, path);
    }

    const type = parseTypeString(field);
    if (this.isMissing(value)) {
      return type.optional ? { ok: true, value: undefined } : fail(path, 'Required');
    }

    if (type.array) {
      if (!Array.isArray(value)) return fail(path, 'Expected array');
      const items: unknown[] = [];
      for (let i = 0; i < value.length; i++) {
        const item = validatePrimitive(value[i], type.base, this.coerce);
        if (!item.ok) return fail(`${path}[${i}]`, item.message);
        items.push(item.value);
      }
      return { ok: true, value: items };
    }

    const result = validatePrimitive(value, type.base, this.coerce);
    return result.ok ? result : fail(path, result.message);
  }

  list(element: SchemaField, value: unknown, path: string): FieldResult {
    if (!Array.isArray(value)) return fail(path, 'Expected array');
    const items: unknown[] = [];
    const errors: FieldErrors = {};
    for (let i = 0; i < value.length; i++) {
      const item = this.field(element, value[i], `${path}[${i}]`);
      if (item.ok) {
        items.push(item.value);
      } else {
        mergeErrors(errors, item.errors);
      }
    }
    return Object.keys(errors).length > 0 ? { ok: false, errors } : { ok: true, value: items };
  }

  object(schema: SchemaDefinition, data: Record<string, unknown>, parentPath: string): FieldResult {
    const result: Record<string, unknown> = {};
    const errors: FieldErrors = {};

    for (const [key, field] of Object.entries(schema)) {
      const path = parentPath ? `${parentPath}.${key}` : key;
      const item = this.field(field, Object.hasOwn(data, key) ? data[key] : undefined, path);
      if (!item.ok) {
        mergeErrors(errors, item.errors);
      } else if (item.value !== undefined) {
        define(result, key, item.value);
      }
    }

    if (this.rejectExtra) {
      for (const key of Object.keys(data)) {
        if (!Object.hasOwn(schema, key)) {
          define(errors, parentPath ? `${parentPath}.${key}` : key, ['Unexpected field']);
        }
      }
    }

    return Object.keys(errors).length > 0 ? { ok: false, errors } : { ok: true, value: result };
  }
}

/** Freezes a validated value and everything under it. */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/** Validates schema definition at compile time. */
function validateSchemaDefinition(field: SchemaField, path: string): void {
  if (isListField(field)) {
    if (field.length !== 1) {
      throw new Error(`List declaration at '${path}' must have exactly one element`);
    }
    validateSchemaDefinition(field[0], `${path}[]`);
  } else if (isNestedSchema(field)) {
    for (const [key, child] of Object.entries(field)) {
      validateSchemaDefinition(child, path ? `${path}.${key}` : key);
    }
  } else if (!PRIMITIVE_TYPES.includes(parseTypeString(field).base)) {
    throw new Error(`Unknown type '${field}' at '${path}'`);
  }
}

/** Builds a one-line summary of field errors. */
export function summarizeErrors(fieldErrors: Record<string, readonly string[]>): string {
  const parts = Object.entries(fieldErrors).map(([path, messages]) => `${path}: ${messages.join(', ')}`);
  return parts.length > 0 ? `Invalid data (${parts.join('; ')})` : 'Invalid data';
}

/**
 * Compiles a schema definition into a validator.
 *
 * Provides a Zod-compatible `safeParse` API and a throwing `parse`. Data that
 * passes is a new, deeply frozen object holding only the declared fields.
 *
 * @throws Error if the definition uses an unknown type string.
 *
 * @example
 * ```typescript
 * const token = compileSchema({ token: 'string' });
 *
 * token.parse({ token: 'abcdefg' }).token; // 'abcdefg'
 * token.safeParse({ token: 123 }).success; // false
 * ```
 */
export function compileSchema<const T extends SchemaDefinition>(
  schema: T,
  options: SchemaOptions = {}
): CompiledSchema<InferSchema<T>> {
  validateSchemaDefinition(schema, '');
  const validator = new Validator(options);

  const safeParse = (data: unknown): ValidationResult<InferSchema<T>> => {
    const result = isRecord(data) ? validator.object(schema, data, '') : fail('', 'Expected object');
    if (!result.ok) {
      const fieldErrors = result.errors;
      return { success: false, error: { flatten: () => ({ fieldErrors }) } };
    }
    return { success: true, data: deepFreeze(result.value) as InferSchema<T> };
  };

  return {
    definition: schema,
    options,
    safeParse,
    parse(data: unknown): InferSchema<T> {
      const result = safeParse(data);
      if (!result.success) {
        const { fieldErrors } = result.error.flatten();
        throw new ValidationFailedError(summarizeErrors(fieldErrors), fieldErrors);
      }
      return result.data;
    },
  };
}

// =============================================================================
// JSON Schema export
// =============================================================================

/** JSON Schema fragment as used by OpenAPI 3.0. */
export interface JsonSchema {
  type?: string;
  format?: string;
  items?: JsonSchema;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
}

/** Converts one schema field to a JSON Schema fragment. */
export function fieldToJsonSchema(field: SchemaField, options: SchemaOptions = {}): JsonSchema {
  if (isListField(field)) {
    return { type: 'array', items: fieldToJsonSchema(field[0], options) };
  }
  if (isNestedSchema(field)) {
    return toJsonSchema(field, options);
  }
  const { base, array } = parseTypeString(field);
  const item: JsonSchema = { type: base };
  return array ? { type: 'array', items: item } : item;
}

/** Converts a schema definition to an OpenAPI-compatible JSON Schema object. */
export function toJsonSchema(schema: SchemaDefinition, options: SchemaOptions = {}): JsonSchema {
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];

  for (const [key, field] of Object.entries(schema)) {
    properties[key] = fieldToJsonSchema(field, options);
    if (typeof field !== 'string' || !field.endsWith('?')) {
      required.push(key);
    }
  }

  const result: JsonSchema = { type: 'object', properties };
  if (required.length > 0) {
    result.required = required;
  }
  if (options.extraFields === 'reject') {
    result.additionalProperties = false;
  }
  return result;
}
