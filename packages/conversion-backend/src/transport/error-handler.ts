// packages/conversion-backend/src/transport/error-handler.ts
//
// Stable, serializable error descriptions and the Fastify error handler built on them.
// Internal failures are reported with a generic message; details go to the log only.
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

import { type ErrorDescription, type ErrorKind, isConversionError } from '@docuqueue/contracts';

import { logger } from '../infrastructure/logger.js';

export interface ErrorResponse {
  error: string;
  message: string;
  timestamp: string;
  requestId?: string;
}

const INTERNAL_MESSAGE = 'An internal server error occurred';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  queue_full: 503,
  rate_limited: 429,
  validation: 400,
  size_limit: 413,
  page_limit: 400,
  acquire_timeout: 503,
  engine_load: 503,
  engine: 502,
  publish: 502,
  token_not_found: 404,
  path_traversal: 400,
  configuration: 500,
  invalid_transition: 409,
};

function clientStatusCode(error: unknown): number | null {
  if (
    error &&
    typeof error === 'object' &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return error.statusCode;
  }
  return null;
}

// describeError.declaration()
export function describeError(error: unknown): ErrorDescription {
  if (isConversionError(error)) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof ZodError) {
    return { kind: 'validation', message: error.issues[0]?.message ?? 'Validation failed' };
  }
  if (clientStatusCode(error) !== null && error instanceof Error) {
    return { kind: 'client_error', message: error.message };
  }
  return { kind: 'internal', message: INTERNAL_MESSAGE };
}

export function httpStatusFor(error: unknown): number {
  if (isConversionError(error)) return STATUS_BY_KIND[error.kind];
  if (error instanceof ZodError) return 400;
  return clientStatusCode(error) ?? 500;
}

/**
 * Global error handler for Fastify.
 */
export function errorHandler(error: unknown, request: FastifyRequest, reply: FastifyReply): void {
  const description = describeError(error);
  const statusCode = httpStatusFor(error);

  const logContext = {
    event: 'http_error',
    kind: description.kind,
    method: request.method,
    url: request.url,
    requestId: request.id,
    error: error instanceof Error ? { name: error.name, message: error.message } : String(error),
  };
  if (statusCode >= 500) {
    logger.error('HTTP request failed with server error', logContext);
  } else {
    logger.warn('HTTP request failed with client error', logContext);
  }

  if (description.kind === 'rate_limited') {
    reply.header('retry-after', '1');
  }

  const body: ErrorResponse = {
    error: description.kind,
    message: description.message,
    timestamp: new Date().toISOString(),
    requestId: request.id,
  };
  void reply.code(statusCode).send(body);
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler(errorHandler);
}
