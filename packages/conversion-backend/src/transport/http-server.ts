// packages/conversion-backend/src/transport/http-server.ts
//
// Fastify app over a wired runtime: error handler, optional per-client rate
// limiting and the core routes.
import Fastify, { type FastifyInstance } from 'fastify';

import { registerCoreRoutes } from './core-routes.js';
import { registerErrorHandler } from './error-handler.js';
import { createRateLimitMiddleware } from './rate-limit-middleware.js';
import type { ConversionRuntime } from './worker-runner.js';

export function createHttpServer(runtime: ConversionRuntime): FastifyInstance {
  const { config, objectStore } = runtime;
  const app = Fastify({
    logger: false,
  });

  registerErrorHandler(app);

  if (runtime.rateLimiter) {
    app.addHook(
      'preHandler',
      createRateLimitMiddleware(runtime.rateLimiter, {
        exemptPaths: config.rateLimit.exemptPaths,
      }),
    );
  }

  registerCoreRoutes(app, {
    queue: runtime.queue,
    resources: runtime.resources,
    metrics: runtime.metrics,
    publisher: runtime.publisher,
    storageRoot: config.storage.root,
    maxUploadMb: config.limits.maxUploadMb,
    downloads: {
      tokens: runtime.tokens,
      storageRoot: config.storage.root,
      backend: config.publish.backend,
      objectKeyFor: objectStore ? (relativeKey) => objectStore.getFullKey(relativeKey) : undefined,
    },
  });

  return app;
}
