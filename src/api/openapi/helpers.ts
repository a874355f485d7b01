/**
 * Reusable OpenAPI spec builders for common patterns.
 */
import type { ParameterObject, ResponseObject, SchemaObject } from './types.ts';

/** Create a $ref to a component schema */
export function ref(schemaName: string): SchemaObject {
  return { $ref: `#/components/schemas/${schemaName}` };
}

/** Standard integer id path parameter */
export function idParam(name = 'id', description = 'Resource id'): ParameterObject {
  return {
    name,
    in: 'path',
    required: true,
    description,
    schema: { type: 'integer', minimum: 1 },
  };
}

/** Standard error response map for given status codes */
export function errorResponses(...codes: number[]): Record<string, ResponseObject> {
  const map: Record<number, { description: string; schema: string }> = {
    400: { description: 'Bad request: invalid parameters or body', schema: 'ValidationError' },
    401: { description: 'Unauthorized: missing or invalid bearer token', schema: 'Error' },
    404: { description: 'Not found, or owned by another user', schema: 'Error' },
    413: { description: 'Uploaded file too large', schema: 'Error' },
    429: { description: 'Too many requests: rate limit exceeded', schema: 'Error' },
    500: { description: 'Internal server error', schema: 'Error' },
    503: { description: 'Service unavailable', schema: 'Error' },
  };
  const result: Record<string, ResponseObject> = {};
  for (const code of codes) {
    const entry = map[code];
    result[String(code)] = {
      description: entry?.description ?? `Error ${code}`,
      content: { 'application/json': { schema: ref(entry?.schema ?? 'Error') } },
    };
  }
  return result;
}

/** JSON request body helper */
export function jsonBody(schema: SchemaObject, required = true): {
  required: boolean;
  content: { 'application/json': { schema: SchemaObject } };
} {
  return {
    required,
    content: { 'application/json': { schema } },
  };
}

/** JSON response helper */
export function jsonResponse(
  description: string,
  schema: SchemaObject,
): ResponseObject {
  return {
    description,
    content: { 'application/json': { schema } },
  };
}

/** A bare JSON array of `itemSchema` (list endpoints are not enveloped) */
export function arrayOf(itemSchema: SchemaObject): SchemaObject {
  return { type: 'array', items: itemSchema };
}
