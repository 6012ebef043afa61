import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ValidationFailedError } from './errors.js';
import { compileSchema, summarizeErrors, toJsonSchema, type SchemaDefinition } from './schema.js';

describe('schema', () => {
  describe('compileSchema() in strict mode', () => {
    it('accepts a matching string field', () => {
      const schema = compileSchema({ token: 'string' });
      const result = schema.safeParse({ token: 'abcdefg' });
      assert.strictEqual(result.success, true);
      if (result.success) {
        assert.strictEqual(result.data.token, 'abcdefg');
      }
    });

    it('rejects a number where a string is declared', () => {
      const schema = compileSchema({ token: 'string' });
      const result = schema.safeParse({ token: 123 });
      assert.strictEqual(result.success, false);
      if (!result.success) {
        assert.deepStrictEqual(result.error.flatten().fieldErrors, { token: ['Expected string'] });
      }
    });

    it('rejects a missing required field', () => {
      const schema = compileSchema({ token: 'string' });
      const result = schema.safeParse({});
      assert.strictEqual(result.success, false);
      if (!result.success) {
        assert.deepStrictEqual(result.error.flatten().fieldErrors, { token: ['Required'] });
      }
    });

    it('does not coerce numeric strings', () => {
      const schema = compileSchema({ count: 'number' });
      assert.strictEqual(schema.safeParse({ count: '42' }).success, false);
      assert.strictEqual(schema.safeParse({ count: 42 }).success, true);
    });

    it('does not coerce boolean strings', () => {
      const schema = compileSchema({ active: 'boolean' });
      assert.strictEqual(schema.safeParse({ active: 'true' }).success, false);
      assert.strictEqual(schema.safeParse({ active: false }).success, true);
    });

    it('distinguishes integer from number', () => {
      const schema = compileSchema({ n: 'integer' });
      assert.strictEqual(schema.safeParse({ n: 3 }).success, true);
      const result = schema.safeParse({ n: 3.5 });
      assert.strictEqual(result.success, false);
      if (!result.success) {
        assert.deepStrictEqual(result.error.flatten().fieldErrors, { n: ['Expected integer'] });
      }
    });

    it('treats null as absent for optional fields', () => {
      const schema = compileSchema({ nickname: 'string?' });
      const result = schema.safeParse({ nickname: null });
      assert.strictEqual(result.success, true);
      if (result.success) {
        assert.strictEqual(result.data.nickname, undefined);
      }
    });

    it('rejects null for required fields', () => {
      const schema = compileSchema({ name: 'string' });
      assert.strictEqual(schema.safeParse({ name: null }).success, false);
    });

    it('rejects a non-object payload', () => {
      const schema = compileSchema({ name: 'string' });
      const result = schema.safeParse(['name']);
      assert.strictEqual(result.success, false);
      if (!result.success) {
        assert.deepStrictEqual(result.error.flatten().fieldErrors, { $: ['Expected object'] });
      }
    });

    it('compiles multiple fields', () => {
      const schema = compileSchema({
        name: 'string',
        age: 'integer',
        active: 'boolean',
        nickname: 'string?',
      });

      const result = schema.safeParse({ name: 'alice', age: 30, active: true });

      assert.strictEqual(result.success, true);
      if (result.success) {
        assert.strictEqual(result.data.name, 'alice');
        assert.strictEqual(result.data.age, 30);
        assert.strictEqual(result.data.active, true);
        assert.strictEqual(result.data.nickname, undefined);
      }
    });

    it('reports every failing field', () => {
      const schema = compileSchema({ a: 'string', b: 'number' });
      const result = schema.safeParse({ a: 1, b: 'x' });
      assert.strictEqual(result.success, false);
      if (!result.success) {
        assert.deepStrictEqual(result.error.flatten().fieldErrors, {
          a: ['Expected string'],
          b: ['Expected number'],
        });
      }
    });

    it('throws for unknown type', () => {
      const definition: SchemaDefinition = JSON.parse('{"field":"unknown"}');
      assert.throws(() => compileSchema(definition), /Unknown type 'unknown' at 'field'/);
    });

    it('compiles empty schema', () => {
      const schema = compileSchema({});
      const result = schema.safeParse({});
      assert.strictEqual(result.success, true);
    });
  });

  describe('extra fields', () => {
    it('ignores undeclared fields by default', () => {
      const schema = compileSchema({ name: 'string' });
      const result = schema.safeParse({ name: 'alice', extra: 'ignored' });
      assert.strictEqual(result.success, true);
      if (result.success) {
        assert.strictEqual(result.data.name, 'alice');
        assert.strictEqual('extra' in result.data, false);
      }
    });

    it('rejects undeclared fields when configured', () => {
      const schema = compileSchema({ name: 'string' }, { extraFields: 'reject' });
      const result = schema.safeParse({ name: 'alice', extra: 'x' });
      assert.strictEqual(result.success, false);
      if (!result.success) {
        assert.deepStrictEqual(result.error.flatten().fieldErrors, { extra: ['Unexpected field'] });
      }
    });

    it('rejects undeclared nested fields when configured', () => {
      const schema = compileSchema({ user: { name: 'string' } }, { extraFields: 'reject' });
      const result = schema.safeParse({ user: { name: 'a', role: 'admin' } });
      assert.strictEqual(result.success, false);
      if (!result.success) {
        assert.deepStrictEqual(result.error.flatten().fieldErrors, {
          'user.role': ['Unexpected field'],
        });
      }
    });
  });

  describe('inherited names', () => {
    it('treats an omitted optional field named like an Object member as absent', () => {
      const schema = compileSchema({ toString: 'string?', name: 'string' });
      const result = schema.safeParse(JSON.parse('{"name":"a"}'));
      assert.strictEqual(result.success, true);
      if (result.success) {
        assert.strictEqual(Object.hasOwn(result.data, 'toString'), false);
      }
    });

    it('reports an omitted required field named like an Object member as required', () => {
      const schema = compileSchema({ constructor: 'string' });
      const result = schema.safeParse({});
      assert.strictEqual(result.success, false);
      if (!result.success) {
        assert.deepStrictEqual(result.error.flatten().fieldErrors, { constructor: ['Required'] });
      }
    });

    it('validates such fields when present', () => {
      const schema = compileSchema({ valueOf: 'integer' });
      assert.deepStrictEqual(schema.parse(JSON.parse('{"valueOf":3}')), { valueOf: 3 });
    });
  });

  describe('compileSchema() in coerce mode', () => {
    const coerce = { mode: 'coerce' } as const;

    it('coerces numbers', () => {
      const schema = compileSchema({ count: 'number' }, coerce);
      const result = schema.safeParse({ count: '42' });
      assert.strictEqual(result.success, true);
      if (result.success) {
        assert.strictEqual(result.data.count, 42);
      }
    });

    it('correctly coerces "false" string to false (not truthy)', () => {
      const schema = compileSchema({ active: 'boolean' }, coerce);
      const result = schema.safeParse({ active: 'false' });
      assert.strictEqual(result.success, true);
      if (result.success) {
        assert.strictEqual(result.data.active, false);
      }
    });

    it('correctly coerces "1" string to true', () => {
      const schema = compileSchema({ active: 'boolean' }, coerce);
      const result = schema.safeParse({ active: '1' });
      assert.strictEqual(result.success, true);
      if (result.success) {
        assert.strictEqual(result.data.active, true);
      }
    });

    it('rejects invalid boolean values', () => {
      const schema = compileSchema({ active: 'boolean' }, coerce);
      assert.strictEqual(schema.safeParse({ active: 'yes' }).success, false);
    });

    it('fails for invalid number', () => {
      const schema = compileSchema({ count: 'number' }, coerce);
      assert.strictEqual(schema.safeParse({ count: 'not-a-number' }).success, false);
    });

    it('treats an empty string as absent', () => {
      const schema = compileSchema({ name: 'string?', count: 'number' }, coerce);
      const result = schema.safeParse({ name: '', count: '' });
      assert.strictEqual(result.success, false);
      if (!result.success) {
        assert.deepStrictEqual(result.error.flatten().fieldErrors, { count: ['Required'] });
      }
    });

    it('coerces number array elements from strings', () => {
      const schema = compileSchema({ scores: 'number[]' }, coerce);
      const result = schema.safeParse({ scores: ['1', '2', '3'] });
      assert.strictEqual(result.success, true);
      if (result.success) {
        assert.deepStrictEqual(result.data.scores, [1, 2, 3]);
      }
    });
  });

  describe('lists', () => {
    it('compiles string array type', () => {
      const schema = compileSchema({ tags: 'string[]' });
      const result = schema.safeParse({ tags: ['a', 'b', 'c'] });
      assert.strictEqual(result.success, true);
      if (result.success) {
        assert.deepStrictEqual(result.data.tags, ['a', 'b', 'c']);
      }
    });

    it('fails for non-array when array expected', () => {
      const schema = compileSchema({ tags: 'string[]' });
      assert.strictEqual(schema.safeParse({ tags: 'not-an-array' }).success, false);
    });

    it('names the failing element', () => {
      const schema = compileSchema({ scores: 'number[]' });
      const result = schema.safeParse({ scores: [1, 'x', 3] });
      assert.strictEqual(result.success, false);
      if (!result.success) {
        assert.deepStrictEqual(result.error.flatten().fieldErrors, { 'scores[1]': ['Expected number'] });
      }
    });

    it('accepts empty array', () => {
      const schema = compileSchema({ tags: 'string[]' });
      const result = schema.safeParse({ tags: [] });
      assert.strictEqual(result.success, true);
      if (result.success) {
        assert.deepStrictEqual(result.data.tags, []);
      }
    });

    it('validates lists of nested schemas', () => {
      const schema = compileSchema({ items: [{ name: 'string', qty: 'integer' }] });
      const ok = schema.safeParse({ items: [{ name: 'pen', qty: 2 }] });
      assert.strictEqual(ok.success, true);
      if (ok.success) {
        assert.strictEqual(ok.data.items[0].name, 'pen');
      }

      const bad = schema.safeParse({ items: [{ name: 'pen', qty: 2 }, { name: 'ink' }] });
      assert.strictEqual(bad.success, false);
      if (!bad.success) {
        assert.deepStrictEqual(bad.error.flatten().fieldErrors, { 'items[1].qty': ['Required'] });
      }
    });

    it('validates lists of lists', () => {
      const schema = compileSchema({ grid: ['integer[]'] });
      assert.strictEqual(schema.safeParse({ grid: [[1, 2], [3]] }).success, true);
      assert.strictEqual(schema.safeParse({ grid: [[1, 'x']] }).success, false);
    });

    it('rejects list declarations with more than one element', () => {
      const definition: SchemaDefinition = JSON.parse('{"items":["string","number"]}');
      assert.throws(() => compileSchema(definition), /exactly one element/);
    });
  });

  describe('nested objects', () => {
    it('compiles nested object schema', () => {
      const schema = compileSchema({
        address: { street: 'string', city: 'string' },
      });
      const result = schema.safeParse({
        address: { street: '123 Main St', city: 'Springfield' },
      });
      assert.strictEqual(result.success, true);
      if (result.success) {
        assert.deepStrictEqual(result.data.address, {
          street: '123 Main St',
          city: 'Springfield',
        });
      }
    });

    it('reports nested field paths', () => {
      const schema = compileSchema({
        address: { street: 'string', zip: 'string' },
      });
      const result = schema.safeParse({ address: { street: '123 Main St' } });
      assert.strictEqual(result.success, false);
      if (!result.success) {
        assert.deepStrictEqual(result.error.flatten().fieldErrors, { 'address.zip': ['Required'] });
      }
    });

    it('fails for non-object when nested object expected', () => {
      const schema = compileSchema({ address: { street: 'string' } });
      assert.strictEqual(schema.safeParse({ address: 'not-an-object' }).success, false);
    });
  });

  describe('immutability', () => {
    it('freezes validated data deeply', () => {
      const schema = compileSchema({ user: { tags: 'string[]' } });
      const result = schema.safeParse({ user: { tags: ['a'] } });
      assert.strictEqual(result.success, true);
      if (result.success) {
        assert.strictEqual(Object.isFrozen(result.data), true);
        assert.strictEqual(Object.isFrozen(result.data.user), true);
        assert.strictEqual(Object.isFrozen(result.data.user.tags), true);
      }
    });

    it('does not touch the input', () => {
      const input = { user: { tags: ['a'] } };
      compileSchema({ user: { tags: 'string[]' } }).parse(input);
      assert.strictEqual(Object.isFrozen(input), false);
      assert.strictEqual(Object.isFrozen(input.user.tags), false);
    });
  });

  describe('parse()', () => {
    it('returns the data on success', () => {
      const schema = compileSchema({ token: 'string' });
      assert.deepStrictEqual(schema.parse({ token: 'abc' }), { token: 'abc' });
    });

    it('throws ValidationFailedError naming the field', () => {
      const schema = compileSchema({ token: 'string' });
      assert.throws(
        () => schema.parse({ token: 123 }),
        (error: unknown) =>
          error instanceof ValidationFailedError &&
          error.message === 'Invalid data (token: Expected string)' &&
          error.fieldErrors.token?.[0] === 'Expected string'
      );
    });
  });

  describe('summarizeErrors()', () => {
    it('joins field messages', () => {
      assert.strictEqual(
        summarizeErrors({ a: ['Required'], 'b[0]': ['Expected number', 'Too small'] }),
        'Invalid data (a: Required; b[0]: Expected number, Too small)'
      );
    });
  });

  describe('toJsonSchema()', () => {
    it('describes fields, lists and required keys', () => {
      assert.deepStrictEqual(
        toJsonSchema({ name: 'string', tags: 'string[]?', items: [{ qty: 'integer' }] }),
        {
          type: 'object',
          properties: {
            name: { type: 'string' },
            tags: { type: 'array', items: { type: 'string' } },
            items: {
              type: 'array',
              items: { type: 'object', properties: { qty: { type: 'integer' } }, required: ['qty'] },
            },
          },
          required: ['name', 'items'],
        }
      );
    });

    it('closes every object level when extra fields are rejected', () => {
      assert.deepStrictEqual(toJsonSchema({ user: { name: 'string' } }, { extraFields: 'reject' }), {
        type: 'object',
        properties: {
          user: {
            type: 'object',
            properties: { name: { type: 'string' } },
            required: ['name'],
            additionalProperties: false,
          },
        },
        required: ['user'],
        additionalProperties: false,
      });
    });

    it('keeps the options a schema was compiled with', () => {
      const schema = compileSchema({ name: 'string' }, { mode: 'coerce', extraFields: 'reject' });
      assert.deepStrictEqual(schema.options, { mode: 'coerce', extraFields: 'reject' });
    });
  });
});
