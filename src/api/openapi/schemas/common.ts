/**
 * Shared OpenAPI schemas used across multiple domain modules.
 */
import type { SchemaObject } from '../types.ts';

export function commonSchemas(): Record<string, SchemaObject> {
  return {
    Error: {
      type: 'object',
      description: 'Standard error response returned by the API when a request fails',
      properties: {
        error: {
          type: 'string',
          description: 'Human-readable error message describing what went wrong',
          example: 'Not Found',
        },
      },
      required: ['error'],
    },
    ValidationError: {
      type: 'object',
      description: 'Rejected input, with messages grouped by field',
      properties: {
        error: {
          type: 'string',
          example: 'Validation failed',
        },
        details: {
          type: 'object',
          description: 'Field name to list of messages; form-level problems use `non_field_errors`',
          additionalProperties: { type: 'array', items: { type: 'string' } },
          example: { email: ['user with this email already exists.'] },
        },
      },
      required: ['error'],
    },
  };
}
