/**
 * @fileoverview Hono adapter.
 *
 * Registers every route of a dispatcher's router on a Hono app. Hono only
 * forwards: resolution, method lookup and errors stay with the dispatcher, so
 * responses match what `dispatcher.handler()` would produce.
 */

import type { Context, Hono } from 'hono';
import type { Dispatcher } from './dispatcher.js';
import type { Segment } from './router.js';
import type { ClientAddress } from './types.js';

/** Options for `mount()`. */
export interface MountOptions {
  /**
   * Reads the peer address from the Hono context, e.g. through the runtime's
   * `getConnInfo` helper. Without it requests carry no client address.
   */
  client?: (c: Context) => ClientAddress | undefined;
}

/** Converts segments to a Hono path (`/users/:p0`). */
function toHonoPath(basePath: string, segments: readonly Segment[]): string {
  const tokens = segments.map((segment, index) =>
    segment.kind === 'static' ? segment.value : `:p${index}`
  );
  const path = `${basePath}/${tokens.join('/')}`.replace(/\/+/g, '/');
  return path.length > 1 ? path.replace(/\/$/, '') : path;
}

/**
 * Mounts a dispatcher onto a Hono app.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * mount(app, dispatcher, '/api', {
 *   client: (c) => {
 *     const { remote } = getConnInfo(c);
 *     return remote.address ? { ip: remote.address, port: remote.port } : undefined;
 *   },
 * });
 * ```
 */
export function mount(app: Hono, dispatcher: Dispatcher, basePath = '', options: MountOptions = {}): void {
  const bridge = { basePath };
  const registered = new Set<string>();

  for (const entry of dispatcher.router.entries()) {
    const path = toHonoPath(basePath, entry.segments);
    if (registered.has(path)) continue;
    registered.add(path);
    app.all(path, (c) => dispatcher.handleFetch(c.req.raw, options.client?.(c), bridge));
  }
}
