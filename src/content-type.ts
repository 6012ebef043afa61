/**
 * @fileoverview Content-Type header parsing and formatting.
 *
 * Only the media type and the `charset` and `boundary` parameters are
 * understood. Other parameters are dropped.
 */

/** Parsed `Content-Type` header. */
export interface ContentType {
  /** Lower-cased media type, e.g. `application/json`. */
  mediaType?: string;
  /** Lower-cased charset, e.g. `utf-8`. */
  charset?: string;
  boundary?: string;
}

/** Media types the built-in data formats use. */
export const MediaTypes = {
  json: 'application/json',
  form: 'application/x-www-form-urlencoded',
  plain: 'text/plain',
  binary: 'application/octet-stream',
} as const;

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Parses a `Content-Type` header value.
 *
 * @example
 * ```typescript
 * parseContentType('Application/JSON; charset=UTF-8');
 * // { mediaType: 'application/json', charset: 'utf-8' }
 * ```
 */
export function parseContentType(header: string | undefined | null): ContentType {
  const result: ContentType = {};
  if (!header) {
    return result;
  }

  const [head, ...params] = header.split(';');
  const mediaType = head.trim().toLowerCase();
  if (mediaType) {
    result.mediaType = mediaType;
  }

  for (const param of params) {
    const eq = param.indexOf('=');
    if (eq === -1) continue;
    const key = param.slice(0, eq).trim().toLowerCase();
    const value = unquote(param.slice(eq + 1).trim());
    if (key === 'charset' && value) {
      result.charset = value.toLowerCase();
    } else if (key === 'boundary' && value) {
      result.boundary = value;
    }
  }

  return result;
}

/** Formats a parsed content type back into a header value. */
export function formatContentType(contentType: ContentType): string | undefined {
  if (!contentType.mediaType) {
    return undefined;
  }
  let value = contentType.mediaType;
  if (contentType.charset) {
    value += `; charset=${contentType.charset}`;
  }
  if (contentType.boundary) {
    value += `; boundary=${contentType.boundary}`;
  }
  return value;
}
