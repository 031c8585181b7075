import {
  EngineError,
  PageLimitError,
  QueueFullError,
  SizeLimitError,
  TokenNotFoundError,
} from '@docuqueue/contracts';
import Fastify, { type FastifyInstance } from 'fastify';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { describeError, httpStatusFor, registerErrorHandler } from '../src/transport/error-handler.js';

vi.mock('../src/infrastructure/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/infrastructure/logger.js')>();
  return {
    ...actual,
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  };
});

/**
 * Intent:
 * - Every failure maps to a stable { kind, message } and an HTTP status.
 * - Unknown errors never leak their message to clients.
 */

describe('transport/error-handler', () => {
  describe('describeError', () => {
    it('keeps the kind and message of domain errors', () => {
      expect(describeError(new QueueFullError(3))).toEqual({
        kind: 'queue_full',
        message: 'Job queue is full (capacity 3)',
      });
      expect(describeError(new SizeLimitError(5 * 1024 * 1024))).toEqual({
        kind: 'size_limit',
        message: 'File size exceeds limit of 5MB',
      });
      expect(describeError(new TokenNotFoundError())).toEqual({
        kind: 'token_not_found',
        message: 'Download token not found or expired',
      });
    });

    it('reports the first schema issue as a validation error', () => {
      const result = z.object({ url: z.string() }).safeParse({});
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(describeError(result.error)).toEqual({ kind: 'validation', message: 'Required' });
      }
    });

    it('hides unknown failures behind a generic message', () => {
      expect(describeError(new Error('ECONNRESET on /var/secret'))).toEqual({
        kind: 'internal',
        message: 'An internal server error occurred',
      });
      expect(describeError('plain string')).toMatchObject({ kind: 'internal' });
    });
  });

  it('maps error kinds to HTTP statuses', () => {
    expect(httpStatusFor(new QueueFullError(1))).toBe(503);
    expect(httpStatusFor(new SizeLimitError(1))).toBe(413);
    expect(httpStatusFor(new PageLimitError(10, 5))).toBe(400);
    expect(httpStatusFor(new EngineError('bad payload'))).toBe(502);
    expect(httpStatusFor(new TokenNotFoundError())).toBe(404);
    expect(httpStatusFor(new Error('boom'))).toBe(500);
  });

  describe('Fastify integration', () => {
    let app: FastifyInstance;

    afterEach(async () => {
      await app.close();
    });

    function buildApp(): FastifyInstance {
      app = Fastify({ logger: false });
      registerErrorHandler(app);
      app.get('/full', async () => {
        throw new QueueFullError(7);
      });
      app.get('/crash', async () => {
        throw new Error('database password leaked');
      });
      app.post('/echo', async (request) => request.body);
      return app;
    }

    it('renders domain errors with their status', async () => {
      const response = await buildApp().inject({ method: 'GET', url: '/full' });

      expect(response.statusCode).toBe(503);
      const body = response.json();
      expect(body).toMatchObject({ error: 'queue_full', message: 'Job queue is full (capacity 7)' });
      expect(typeof body.timestamp).toBe('string');
      expect(typeof body.requestId).toBe('string');
    });

    it('renders unknown errors as a generic 500', async () => {
      const response = await buildApp().inject({ method: 'GET', url: '/crash' });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toMatchObject({
        error: 'internal',
        message: 'An internal server error occurred',
      });
    });

    it('passes framework client errors through as 4xx', async () => {
      const response = await buildApp().inject({
        method: 'POST',
        url: '/echo',
        headers: { 'content-type': 'application/json' },
        payload: '{"broken":',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: 'client_error' });
    });
  });
});
