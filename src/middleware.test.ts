/**
 * @fileoverview Tests for core middleware functionality.
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { createRequest } from './request.js';
import { type Middleware, type MiddlewareContext, compose, runMiddleware } from './middleware.js';
import type { ServerResponse } from './types.js';

function respond(status: number): ServerResponse {
  return { status, headers: [], body: [] };
}

describe('Middleware', () => {
  let context: MiddlewareContext;

  beforeEach(() => {
    context = { request: createRequest({ path: '/test' }) };
  });

  describe('runMiddleware', () => {
    it('should run middleware in order', async () => {
      const order: number[] = [];

      const middleware1: Middleware = async (ctx, next) => {
        order.push(1);
        const response = await next();
        order.push(4);
        return response;
      };

      const middleware2: Middleware = async (ctx, next) => {
        order.push(2);
        const response = await next();
        order.push(3);
        return response;
      };

      const finalHandler = async () => {
        order.push(0);
        return respond(200);
      };

      const response = await runMiddleware([middleware1, middleware2], context, finalHandler);

      assert.strictEqual(response.status, 200);
      assert.deepStrictEqual(order, [1, 2, 0, 3, 4]);
    });

    it('should allow middleware to short-circuit', async () => {
      const order: number[] = [];

      const middleware1: Middleware = async () => {
        order.push(1);
        return respond(401);
      };

      const middleware2: Middleware = async (ctx, next) => {
        order.push(2);
        return next();
      };

      const response = await runMiddleware([middleware1, middleware2], context, async () => {
        order.push(0);
        return respond(200);
      });

      assert.strictEqual(response.status, 401);
      assert.deepStrictEqual(order, [1]);
    });

    it('should pass context through middleware', async () => {
      const middleware1: Middleware = async (ctx, next) => {
        ctx.user = 'ann';
        return next();
      };

      let seen: unknown;
      const middleware2: Middleware = async (ctx, next) => {
        seen = ctx.user;
        return next();
      };

      await runMiddleware([middleware1, middleware2], context, async () => respond(200));
      assert.strictEqual(seen, 'ann');
    });

    it('should propagate errors through middleware chain', async () => {
      const middleware: Middleware = async (ctx, next) => next();
      await assert.rejects(
        runMiddleware([middleware], context, async () => {
          throw new Error('boom');
        }),
        /boom/
      );
    });

    it('should handle empty middleware array', async () => {
      const response = await runMiddleware([], context, async () => respond(204));
      assert.strictEqual(response.status, 204);
    });

    it('should allow middleware to transform responses', async () => {
      const middleware: Middleware = async (ctx, next) => {
        const response = await next();
        return { ...response, headers: [...response.headers, ['X-Powered-By', 'stemroute']] };
      };
      const response = await runMiddleware([middleware], context, async () => respond(200));
      assert.deepStrictEqual(response.headers, [['X-Powered-By', 'stemroute']]);
    });
  });

  describe('compose', () => {
    it('should compose multiple middleware into one', async () => {
      const order: string[] = [];
      const a: Middleware = async (ctx, next) => {
        order.push('a');
        return next();
      };
      const b: Middleware = async (ctx, next) => {
        order.push('b');
        return next();
      };
      const c: Middleware = async (ctx, next) => {
        order.push('c');
        return next();
      };

      const response = await runMiddleware([compose(a, b), c], context, async () => {
        order.push('final');
        return respond(200);
      });

      assert.strictEqual(response.status, 200);
      assert.deepStrictEqual(order, ['a', 'b', 'c', 'final']);
    });

    it('should handle empty composition', async () => {
      const response = await runMiddleware([compose()], context, async () => respond(202));
      assert.strictEqual(response.status, 202);
    });
  });
});
