/**
 * Typed API errors and the Fastify error handler that maps them to responses.
 */
import type { FastifyError, FastifyInstance } from 'fastify';
import { ZodError } from 'zod';

/** Field name → list of human-readable messages. */
export type FieldErrors = Record<string, string[]>;

export class ValidationError extends Error {
  readonly details: FieldErrors;

  constructor(details: FieldErrors, message = 'Validation failed') {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }

  /** Shorthand for a single offending field. */
  static field(field: string, message: string): ValidationError {
    return new ValidationError({ [field]: [message] });
  }
}

export class NotFoundError extends Error {
  constructor(public resource: string) {
    super(`${resource} not found`);
    this.name = 'NotFoundError';
  }
}

export class AuthenticationError extends Error {
  constructor(message = 'unauthorized') {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/** Collapse a ZodError into per-field messages; form-level issues go under `non_field_errors`. */
export function zodFieldErrors(err: ZodError): FieldErrors {
  const flat = err.flatten();
  const details: FieldErrors = {};
  for (const [field, messages] of Object.entries(flat.fieldErrors)) {
    if (Array.isArray(messages) && messages.length > 0) {
      details[field] = messages.filter((m): m is string => typeof m === 'string');
    }
  }
  if (flat.formErrors.length > 0) {
    details.non_field_errors = flat.formErrors;
  }
  return details;
}

/**
 * Install the error and not-found handlers.
 *
 * Fastify's own 4xx errors (bad JSON, payload too large, rate limit) pass
 * through with their status code.
 */
export function registerErrorHandlers(app: FastifyInstance): void {
  app.setErrorHandler((error: FastifyError | Error, req, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({ error: 'Validation failed', details: zodFieldErrors(error) });
    }
    if (error instanceof ValidationError) {
      return reply.code(400).send({ error: error.message, details: error.details });
    }
    if (error instanceof NotFoundError) {
      return reply.code(404).send({ error: 'Not Found' });
    }
    if (error instanceof AuthenticationError) {
      return reply.code(401).send({ error: error.message });
    }

    const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;
    if (statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send({ error: error.message });
    }

    req.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({ error: 'Internal Server Error' });
  });

  app.setNotFoundHandler((_req, reply) => reply.code(404).send({ error: 'Not Found' }));
}
