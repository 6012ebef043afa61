/**
 * @fileoverview OpenAPI documentation generation.
 *
 * Generates OpenAPI 3.0 documentation from a router of endpoint classes.
 *
 * - Flexible segments become path parameters (`$id` becomes `{id}`; unnamed
 *   ones are numbered `{param1}`, `{param2}`, ...)
 * - Header and query sources become parameters
 * - Body sources become the request body
 * - `output` formats describe the 200 response
 * - Errors declared by sources or by the method become extra responses
 */

import type { DataFormat } from './data.js';
import { compileEndpoint, type CompiledMethod, type EndpointClass } from './endpoint.js';
import type { Router, Segment } from './router.js';
import { toJsonSchema, type JsonSchema } from './schema.js';
import { METHOD_NAMES } from './types.js';

/** OpenAPI parameter object. */
export interface OpenApiParameter {
  name: string;
  in: 'path' | 'query' | 'header';
  required: boolean;
  schema: JsonSchema;
  description?: string;
}

/** OpenAPI media type map. */
export type OpenApiContent = Record<string, { schema: JsonSchema }>;

/** OpenAPI operation object. */
export interface OpenApiOperation {
  summary?: string;
  description?: string;
  parameters?: OpenApiParameter[];
  requestBody?: { required: boolean; content: OpenApiContent };
  responses: Record<string, { description: string; content?: OpenApiContent }>;
}

/** OpenAPI document. */
export interface OpenApiDocument {
  openapi: '3.0.0';
  info: { title: string; version: string; description?: string };
  paths: Record<string, Record<string, OpenApiOperation>>;
}

/** Converts segments to an OpenAPI path and its path parameters. */
function describePath(segments: readonly Segment[]): { path: string; parameters: OpenApiParameter[] } {
  const parameters: OpenApiParameter[] = [];
  const tokens = segments.map((segment) => {
    if (segment.kind === 'static') return segment.value;
    const name = segment.name ?? `param${parameters.length + 1}`;
    const parameter: OpenApiParameter = { name, in: 'path', required: true, schema: { type: 'string' } };
    if (segment.matcher) {
      parameter.description = `Accepts ${segment.matcher.id}`;
    }
    parameters.push(parameter);
    return `{${name}}`;
  });
  return { path: `/${tokens.join('/')}`, parameters };
}

function formatContent(format: DataFormat<unknown>): OpenApiContent {
  const schema: JsonSchema = format.schema
    ? toJsonSchema(format.schema.definition, format.schema.options)
    : { type: 'string', format: 'binary' };
  return { [format.mediaType]: { schema } };
}

function describeOperation(entry: CompiledMethod, pathParameters: OpenApiParameter[]): OpenApiOperation {
  const { declaration } = entry;
  const operation: OpenApiOperation = {
    summary: declaration.summary,
    description: declaration.description,
    responses: {
      200: declaration.output
        ? { description: 'Successful response', content: formatContent(declaration.output) }
        : { description: 'Successful response' },
    },
  };

  const parameters = [...pathParameters];
  const errors = [...(declaration.errors ?? [])];

  // Listed outermost first; the order here follows the declaration.
  for (const source of entry.sources) {
    errors.push(...source.errors);
    if (source.kind === 'body' && source.format) {
      operation.requestBody = { required: true, content: formatContent(source.format) };
    } else if ((source.kind === 'header' || source.kind === 'query') && source.key !== undefined) {
      const parameter: OpenApiParameter = {
        name: source.key,
        in: source.kind,
        required: source.required,
        schema: source.many ? { type: 'array', items: { type: 'string' } } : { type: 'string' },
      };
      if (source.description) {
        parameter.description = source.description;
      }
      parameters.push(parameter);
    }
  }

  if (parameters.length > 0) {
    operation.parameters = parameters;
  }

  for (const error of errors) {
    const existing = operation.responses[error.status];
    if (!existing) {
      operation.responses[error.status] = { description: error.message };
    } else if (!existing.description.split('; ').includes(error.message)) {
      existing.description = `${existing.description}; ${error.message}`;
    }
  }

  return operation;
}

/**
 * Generates OpenAPI documentation from a router.
 */
export function generateDocs(config: {
  title: string;
  version: string;
  description?: string;
  router: Router<EndpointClass>;
}): OpenApiDocument {
  const paths: Record<string, Record<string, OpenApiOperation>> = {};

  for (const route of config.router.entries()) {
    const compiled = compileEndpoint(route.target);
    const { path, parameters } = describePath(route.segments);
    const operations = (paths[path] ??= {});

    for (const [method, entry] of compiled.methods) {
      operations[METHOD_NAMES[method]] = describeOperation(entry, parameters);
    }
  }

  return {
    openapi: '3.0.0',
    info: {
      title: config.title,
      version: config.version,
      description: config.description,
    },
    paths,
  };
}
