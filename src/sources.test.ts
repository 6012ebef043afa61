import { describe, it } from 'node:test';
import assert from 'node:assert';
import { json } from './data.js';
import {
  ClientNotAllowedError,
  ConfigurationError,
  ErrorInfo,
  HeaderNotFoundError,
  NotUniqueError,
  PayloadTooLargeError,
  QueryNotFoundError,
  UnsupportedMediaTypeError,
} from './errors.js';
import { createRequest } from './request.js';
import { body, collectArguments, header, query, restrictClient, type Injected } from './sources.js';

describe('sources', () => {
  describe('query()', () => {
    it('injects the first value, or undefined', async () => {
      const page = query('page');
      assert.strictEqual(await page.extract(createRequest({ path: '/?page=2&page=3' })), '2');
      assert.strictEqual(await page.extract(createRequest({ path: '/' })), undefined);
    });

    it('injects every value with many', async () => {
      const tags = query('tag', { many: true });
      assert.deepStrictEqual(await tags.extract(createRequest({ path: '/?tag=a&tag=b' })), ['a', 'b']);
      assert.deepStrictEqual(await tags.extract(createRequest({ path: '/' })), []);
    });

    it('raises the absence error', async () => {
      const absent = new QueryNotFoundError('q');
      const q = query('q', { absent });
      await assert.rejects(q.extract(createRequest({ path: '/' })), (error: unknown) => error === absent);
      assert.strictEqual(q.required, true);
    });

    it('raises the multiplicity error for scalars', async () => {
      const q = query('q', { notUnique: true });
      await assert.rejects(q.extract(createRequest({ path: '/?q=1&q=2' })), NotUniqueError);
      assert.strictEqual(await q.extract(createRequest({ path: '/?q=1' })), '1');
    });

    it('never raises the multiplicity error with many', async () => {
      const q = query('q', { many: true, notUnique: true });
      assert.deepStrictEqual(await q.extract(createRequest({ path: '/?q=1&q=2' })), ['1', '2']);
      assert.deepStrictEqual(q.errors, []);
    });

    it('maps every value', async () => {
      const ids = query('id', { many: true, map: Number });
      assert.deepStrictEqual(await ids.extract(createRequest({ path: '/?id=1&id=22' })), [1, 22]);
      const id = query('id', { map: Number });
      assert.strictEqual(await id.extract(createRequest({ path: '/?id=5' })), 5);
    });

    it('raises the absence error before mapping', async () => {
      let mapped = 0;
      const q = query('n', {
        absent: new QueryNotFoundError('n'),
        map: (raw) => {
          mapped++;
          return raw.length;
        },
      });
      await assert.rejects(q.extract(createRequest({ path: '/' })), QueryNotFoundError);
      assert.strictEqual(mapped, 0);
    });

    it('types inline mappers from the raw string', async () => {
      const completed = query('completed', { map: (raw) => raw === 'true' || raw === '1' });
      const value: boolean | undefined = await completed.extract(createRequest({ path: '/?completed=1' }));
      assert.strictEqual(value, true);

      const sizes = query('size', { many: true, map: (raw) => raw.toUpperCase() });
      const values: string[] = await sizes.extract(createRequest({ path: '/?size=s&size=xl' }));
      assert.deepStrictEqual(values, ['S', 'XL']);
    });
  });

  describe('header()', () => {
    it('matches names case-insensitively', async () => {
      const token = header('X-Token');
      const request = createRequest({ path: '/', headers: { x_token: 'test-secret' } });
      assert.strictEqual(await token.extract(request), 'test-secret');
    });

    it('raises a configured HeaderNotFoundError', async () => {
      const token = header('X-Token', { absent: new HeaderNotFoundError('X-Token') });
      await assert.rejects(token.extract(createRequest({ path: '/' })), {
        name: 'HeaderNotFoundError',
        status: 400,
      });
    });

    it('describes itself for documentation', () => {
      const absent = new HeaderNotFoundError('X-Token');
      const token = header('X-Token', { absent, description: 'API token' });
      assert.strictEqual(token.kind, 'header');
      assert.strictEqual(token.key, 'X-Token');
      assert.strictEqual(token.description, 'API token');
      assert.deepStrictEqual(token.errors, [absent]);
    });
  });

  describe('body()', () => {
    const Token = json({ token: 'string' });

    it('injects validated data', async () => {
      const request = createRequest({
        path: '/',
        headers: { 'Content-Type': 'application/json' },
        body: '{"token":"abc"}',
      });
      assert.deepStrictEqual(await body(Token).extract(request), { token: 'abc' });
    });

    it('converts validation failures to 415 by default', async () => {
      const request = createRequest({ path: '/', body: '{"token":"abc"}' });
      await assert.rejects(body(Token).extract(request), (error: unknown) => {
        return error instanceof UnsupportedMediaTypeError && error.status === 415;
      });
    });

    it('converts validation failures to the configured error', async () => {
      const invalid = new ErrorInfo('Bad token', { status: 422 });
      const request = createRequest({
        path: '/',
        headers: { 'Content-Type': 'application/json' },
        body: '{"token":1}',
      });
      await assert.rejects(body(Token, { error: invalid }).extract(request), (error: unknown) => error === invalid);
    });

    it('lets other failures through', async () => {
      const request = createRequest({
        path: '/',
        headers: { 'Content-Type': 'application/json' },
        body: '{"token":"abc"}',
        maxBodySize: 4,
      });
      await assert.rejects(body(Token).extract(request), PayloadTooLargeError);
    });
  });

  describe('restrictClient()', () => {
    const from = (ip: string, port?: number) => createRequest({ path: '/', client: { ip, port } });

    it('injects a listed client', async () => {
      const local = restrictClient([{ ip: '127.0.0.1' }]);
      assert.deepStrictEqual(await local.extract(from('127.0.0.1', 4000)), { ip: '127.0.0.1', port: 4000 });
    });

    it('treats localhost and IPv4-mapped addresses as IPv4', async () => {
      const local = restrictClient([{ ip: 'localhost' }]);
      assert.strictEqual((await local.extract(from('::ffff:127.0.0.1'))).ip, '::ffff:127.0.0.1');
    });

    it('admits only the listed ports of an address', async () => {
      const gateway = restrictClient([{ ip: '10.0.0.7', port: 8443 }]);
      assert.strictEqual((await gateway.extract(from('10.0.0.7', 8443))).port, 8443);
      await assert.rejects(gateway.extract(from('10.0.0.7', 8080)), ClientNotAllowedError);
    });

    it('merges rules for the same address', async () => {
      const gateway = restrictClient([{ ip: '10.0.0.7', port: 8443 }, { ip: '10.0.0.7' }]);
      assert.strictEqual((await gateway.extract(from('10.0.0.7', 8080))).port, 8080);
    });

    it('raises the configured error for other clients', async () => {
      const denied = new ErrorInfo('Internal only', { status: 404 });
      const internal = restrictClient([{ ip: '10.0.0.7' }], { error: denied });
      await assert.rejects(internal.extract(from('192.0.2.1')), (error: unknown) => error === denied);
      assert.deepStrictEqual(internal.errors, [denied]);
    });

    it('refuses requests without a client address', async () => {
      const local = restrictClient([{ ip: '127.0.0.1' }]);
      await assert.rejects(local.extract(createRequest({ path: '/' })), {
        name: 'ClientNotAllowedError',
        status: 403,
      });
    });

    it('rejects invalid addresses at declaration', () => {
      assert.throws(() => restrictClient([{ ip: '300.1.1.1' }]), ConfigurationError);
      assert.throws(() => restrictClient([{ ip: 'example' }]), /example is not a valid IP address/);
    });
  });

  describe('collectArguments()', () => {
    it('returns values innermost-first', async () => {
      const request = createRequest({ path: '/timeline?after=X&before=Y' });
      const args = await collectArguments([query('before'), query('after')], request);
      assert.deepStrictEqual(args, ['X', 'Y']);
    });

    it('types the injected values in callback order', async () => {
      const sources = [
        query('before', { absent: new QueryNotFoundError('before') }),
        query('limit', { map: Number }),
      ] as const;
      const request = createRequest({ path: '/timeline?before=Y&limit=3' });
      const [limit, before] = await collectArguments(sources, request);
      const expected: Injected<typeof sources> = [3, 'Y'];
      assert.deepStrictEqual([limit, before], expected);
    });

    it('extracts outermost-first and stops at the first failure', async () => {
      const order: string[] = [];
      const tracked = (name: string, fail: boolean) => ({
        ...query(name),
        async extract() {
          order.push(name);
          if (fail) throw new QueryNotFoundError(name);
          return name;
        },
      });
      const request = createRequest({ path: '/' });
      await assert.rejects(
        collectArguments([tracked('outer', false), tracked('middle', true), tracked('inner', false)], request),
        QueryNotFoundError
      );
      assert.deepStrictEqual(order, ['outer', 'middle']);
    });
  });
});
