/**
 * @fileoverview Segment-tree router.
 *
 * Routes are sequences of segments. A static segment matches one path token
 * by exact equality; a flexible segment matches any non-empty token (or the
 * tokens its matcher accepts) and captures it. Matching is exact-length: there
 * are no wildcard suffixes.
 *
 * The tree has one level per path depth. Each node holds a map from literal
 * token to child plus at most one flexible child. Resolution tries the literal
 * child first and falls back to the flexible child only when the literal
 * subtree yields no complete match, so a literal always wins over a flexible
 * segment that could match the same token.
 *
 * @example
 * ```typescript
 * const router = new Router<EndpointClass>()
 *   .register('/users/me', CurrentUser)
 *   .register('/users/$id', User)
 *   .register(['orders', digits(6)], Order, { version: [1, 2] });
 *
 * router.resolve(['users', 'me'])?.target;        // CurrentUser
 * router.resolve(['users', '42'])?.flexibleSegments; // ['42']
 * router.resolve(['v2', 'orders', '004211'])?.target; // Order
 * ```
 */

import { ConfigurationError, RouteConflictError } from './errors.js';

// =============================================================================
// Segments
// =============================================================================

/** Restricts which tokens a flexible segment accepts. */
export interface SegmentMatcher {
  /** Identity used to detect conflicting flexible segments, e.g. `digits(4)`. */
  readonly id: string;
  test(token: string): boolean;
}

/** Matches one token by exact equality. */
export interface StaticSegment {
  readonly kind: 'static';
  readonly value: string;
}

/** Matches any non-empty token accepted by `matcher`, capturing its value. */
export interface FlexibleSegment {
  readonly kind: 'flexible';
  /** Name used in documentation and route strings. */
  readonly name?: string;
  readonly matcher?: SegmentMatcher;
}

export type Segment = StaticSegment | FlexibleSegment;

/**
 * A route as written at registration.
 *
 * Strings like `/users/$id` treat `$name` tokens as flexible. In arrays, plain
 * strings are always static.
 */
export type RouteInput = string | readonly (string | Segment)[];

/** Creates a static segment. */
export function literal(value: string): StaticSegment {
  return { kind: 'static', value };
}

/** Creates a flexible segment that accepts any non-empty token. */
export function flexible(name?: string): FlexibleSegment {
  return name === undefined ? { kind: 'flexible' } : { kind: 'flexible', name };
}

/** Flexible segment accepting exactly `count` ASCII digits. */
export function digits(count: number, name?: string): FlexibleSegment {
  if (!Number.isInteger(count) || count < 1) {
    throw new ConfigurationError(`digits() needs a positive integer, got ${count}`);
  }
  const pattern = new RegExp(`^[0-9]{${count}}$`);
  return {
    ...flexible(name),
    matcher: { id: `digits(${count})`, test: (token) => pattern.test(token) },
  };
}

/** Options for `anyString()`. */
export interface AnyStringOptions {
  name?: string;
  /** Longest accepted token, in characters. */
  max?: number;
}

/** Flexible segment accepting any non-empty token, optionally length-limited. */
export function anyString(options: AnyStringOptions = {}): FlexibleSegment {
  const { max } = options;
  if (max === undefined) {
    return flexible(options.name);
  }
  if (!Number.isInteger(max) || max < 1) {
    throw new ConfigurationError(`anyString() max must be a positive integer, got ${max}`);
  }
  return {
    ...flexible(options.name),
    matcher: { id: `string(${max})`, test: (token) => token.length <= max },
  };
}

function toSegment(segment: string | Segment): Segment {
  return typeof segment === 'string' ? literal(segment) : segment;
}

/** Parses a route input into segments. */
export function parseRoute(route: RouteInput): Segment[] {
  if (typeof route !== 'string') {
    return route.map(toSegment);
  }
  const trimmed = route.replace(/^\/+/, '').replace(/\/+$/, '');
  if (!trimmed) return [];
  return trimmed.split('/').map((token) => {
    if (token.startsWith('$')) {
      return flexible(token.length > 1 ? token.slice(1) : undefined);
    }
    return literal(token);
  });
}

/** Formats segments as a route string: `/users/$id`, `/`. */
export function formatRoute(segments: readonly Segment[]): string {
  const tokens = segments.map((segment) => {
    if (segment.kind === 'static') return segment.value;
    const name = `$${segment.name ?? ''}`;
    return segment.matcher ? `${name}<${segment.matcher.id}>` : name;
  });
  return `/${tokens.join('/')}`;
}

// =============================================================================
// Router
// =============================================================================

/** One registered route. */
export interface RouteEntry<T> {
  readonly segments: readonly Segment[];
  readonly target: T;
  /** Construction arguments forwarded to the target's setup step. */
  readonly parcel: readonly unknown[];
  /** API version the route was registered under, if any. */
  readonly version?: number;
}

/** Result of resolving a request path. */
export interface ResolvedMatch<T> {
  readonly target: T;
  /** Captured flexible tokens, in route order. */
  readonly flexibleSegments: readonly string[];
  readonly parcel: readonly unknown[];
  readonly route: RouteEntry<T>;
}

/** Router configuration. */
export interface RouterOptions {
  /** Prefix of version segments (default: `v`, giving `v1`, `v2`, ...). */
  versionPrefix?: string;
  /** Insert the version segment in front of versioned routes (default: true). */
  insertVersion?: boolean;
}

/** Options for `register()`. */
export interface RegisterOptions {
  /** Construction arguments forwarded to the target's setup step. */
  parcel?: readonly unknown[];
  /** Serve the route under one or more version prefixes. */
  version?: number | readonly number[];
}

/** Options for `graft()`. */
export interface GraftOptions {
  /** Prefix for every grafted route. */
  onto?: RouteInput;
}

interface RouteNode<T> {
  readonly statics: Map<string, RouteNode<T>>;
  flexible?: { readonly segment: FlexibleSegment; readonly node: RouteNode<T> };
  entry?: RouteEntry<T>;
}

function createNode<T>(): RouteNode<T> {
  return { statics: new Map() };
}

function sameMatcher(a: FlexibleSegment, b: FlexibleSegment): boolean {
  return a.matcher?.id === b.matcher?.id;
}

/**
 * Maps path segment sequences to targets.
 *
 * Built once before serving; `freeze()` makes it read-only.
 */
export class Router<T> {
  private readonly root: RouteNode<T> = createNode();
  private readonly registered: RouteEntry<T>[] = [];
  private readonly versionPrefix: string;
  private readonly insertVersion: boolean;
  private isFrozen = false;

  constructor(options: RouterOptions = {}) {
    this.versionPrefix = options.versionPrefix ?? 'v';
    this.insertVersion = options.insertVersion ?? true;
  }

  /** True once `freeze()` has been called. */
  get frozen(): boolean {
    return this.isFrozen;
  }

  /**
   * Registers a route.
   *
   * @throws RouteConflictError if the same segment sequence is already
   *   registered, or a flexible segment with a different matcher occupies the
   *   same position.
   * @throws ConfigurationError after `freeze()`.
   */
  register(route: RouteInput, target: T, options: RegisterOptions = {}): this {
    const segments = parseRoute(route);
    const parcel = options.parcel ?? [];

    if (options.version === undefined) {
      this.insert({ segments, target, parcel });
      return this;
    }

    const versions = typeof options.version === 'number' ? [options.version] : options.version;
    if (versions.length === 0) {
      throw new ConfigurationError(`Empty version list for ${formatRoute(segments)}`);
    }
    for (const version of versions) {
      const prefixed = this.insertVersion
        ? [literal(`${this.versionPrefix}${version}`), ...segments]
        : segments;
      this.insert({ segments: prefixed, target, parcel, version });
    }
    return this;
  }

  /**
   * Copies every route of another router, optionally under a prefix.
   *
   * Targets, parcels and versions carry over unchanged.
   */
  graft(other: Router<T>, options: GraftOptions = {}): this {
    const prefix = options.onto === undefined ? [] : parseRoute(options.onto);
    for (const entry of other.entries()) {
      this.insert({ ...entry, segments: [...prefix, ...entry.segments] });
    }
    return this;
  }

  /** Makes the router read-only. */
  freeze(): this {
    this.isFrozen = true;
    return this;
  }

  /** Every registered route, in registration order. */
  entries(): readonly RouteEntry<T>[] {
    return this.registered;
  }

  /** Segment sequences registered for a target. */
  routesOf(target: T): (readonly Segment[])[] {
    return this.registered.filter((entry) => entry.target === target).map((entry) => entry.segments);
  }

  /**
   * Resolves decoded path tokens.
   *
   * Returns `undefined` when no route matches in full.
   */
  resolve(path: readonly string[]): ResolvedMatch<T> | undefined {
    const captured: string[] = [];
    const entry = this.walk(this.root, path, 0, captured);
    if (!entry) return undefined;
    return {
      target: entry.target,
      flexibleSegments: captured,
      parcel: entry.parcel,
      route: entry,
    };
  }

  private walk(
    node: RouteNode<T>,
    path: readonly string[],
    depth: number,
    captured: string[]
  ): RouteEntry<T> | undefined {
    if (depth === path.length) {
      return node.entry;
    }

    const token = path[depth];
    const child = node.statics.get(token);
    if (child) {
      const found = this.walk(child, path, depth + 1, captured);
      if (found) return found;
    }

    const flex = node.flexible;
    if (flex && token !== '' && (flex.segment.matcher?.test(token) ?? true)) {
      captured.push(token);
      const found = this.walk(flex.node, path, depth + 1, captured);
      if (found) return found;
      captured.pop();
    }

    return undefined;
  }

  private insert(entry: RouteEntry<T>): void {
    if (this.isFrozen) {
      throw new ConfigurationError(
        `Cannot register ${formatRoute(entry.segments)}: router is frozen`
      );
    }

    let node = this.root;
    for (const segment of entry.segments) {
      if (segment.kind === 'static') {
        let child = node.statics.get(segment.value);
        if (!child) {
          child = createNode();
          node.statics.set(segment.value, child);
        }
        node = child;
      } else if (node.flexible) {
        if (!sameMatcher(node.flexible.segment, segment)) {
          throw new RouteConflictError(formatRoute(entry.segments));
        }
        node = node.flexible.node;
      } else {
        const child = createNode<T>();
        node.flexible = { segment, node: child };
        node = child;
      }
    }

    if (node.entry) {
      throw new RouteConflictError(formatRoute(entry.segments));
    }
    node.entry = entry;
    this.registered.push(entry);
  }
}
