// packages/conversion-backend/src/transport/core-routes.ts
//
// Minimal HTTP surface over the scheduling core:
// - GET  /healthz                                -> engine device/backend status and queue depth
// - GET  /metrics                                -> in-process metrics snapshot
// - POST /v1/tasks                               -> submit a remote document by URL
// - GET  /v1/tasks/:taskId                       -> job status
// - POST /v1/tasks/:taskId/publish               -> publish a succeeded job's artifacts
// - GET  /v1/tasks/:taskId/result.md             -> combined markdown
// - GET  /v1/tasks/:taskId/result.json           -> layout document
// - GET  /v1/tasks/:taskId/download.zip          -> packed archive
// - GET  /v1/tasks/:taskId/result-images/:name   -> one extracted image
// - POST /v1/tasks/:taskId/tokens                -> issue a download token for one artifact
// - GET  /v1/download/:token                     -> redeem a token (file stream or redirect)
import { createReadStream } from 'node:fs';

import type { FastifyInstance, FastifyReply } from 'fastify';
import mime from 'mime-types';
import { z } from 'zod';

import { type DownloadTokenDeps, issueDownloadToken, redeemDownloadToken } from '../application/download-tokens.js';
import { getJobResultFile, type JobResultTarget } from '../application/get-job-result.js';
import { getJobStatus } from '../application/get-job-status.js';
import type { JobQueue } from '../application/job-queue.js';
import { publishJob } from '../application/publish-job.js';
import { submitJob } from '../application/submit-job.js';
import { logger } from '../infrastructure/logger.js';
import type { Metrics } from '../infrastructure/metrics.js';
import type { Publisher } from '../infrastructure/publisher.js';
import type { ResourceManager } from '../infrastructure/resource-manager.js';

export interface CoreRouteOptions {
  queue: JobQueue;
  resources: Pick<ResourceManager, 'status'>;
  metrics: Metrics;
  publisher: Publisher;
  storageRoot: string;
  maxUploadMb: number;
  downloads: DownloadTokenDeps;
}

const submitBodySchema = z.object({
  url: z.string().min(1, 'url is required'),
  options: z.record(z.unknown()).optional(),
});

const tokenBodySchema = z.object({
  kind: z.enum(['markdown', 'json', 'archive']),
  maxUses: z.number().int().min(1).max(100).optional(),
  ttlSeconds: z.number().int().min(0).optional(),
});

export function registerCoreRoutes(app: FastifyInstance, options: CoreRouteOptions): void {
  const { queue, resources, metrics, publisher, storageRoot, downloads } = options;

  const sendResult = async (reply: FastifyReply, taskId: string, target: JobResultTarget) => {
    const filePath = await getJobResultFile(taskId, target, { queue, storageRoot });
    if (!filePath) {
      return reply.code(404).send({ error: 'not_found', message: 'Result not found' });
    }
    const contentType = mime.lookup(filePath) || 'application/octet-stream';
    return reply.type(contentType).send(createReadStream(filePath));
  };

  app.get('/healthz', async () => ({
    status: 'ok',
    engine: resources.status(),
    queue: {
      size: queue.queueSize(),
      capacity: queue.capacity(),
      workers: queue.activeWorkers(),
      runningWorkers: queue.runningWorkers(),
    },
  }));

  app.get('/metrics', async () => metrics.snapshot());

  app.post('/v1/tasks', async (request, reply) => {
    const body = submitBodySchema.parse(request.body);
    const result = await submitJob(
      { url: body.url, options: body.options },
      { queue, storageRoot, maxUploadMb: options.maxUploadMb },
    );

    logger.info('HTTP request handled', {
      event: 'http_request',
      route: 'POST /v1/tasks',
      statusCode: 202,
      jobId: result.jobId,
    });
    return reply.code(202).send({ taskId: result.jobId });
  });

  app.get<{ Params: { taskId: string } }>('/v1/tasks/:taskId', async (request, reply) => {
    const status = await getJobStatus(request.params.taskId, { queue, storageRoot });
    if (!status) {
      return reply.code(404).send({ error: 'not_found', message: 'Task not found' });
    }
    return reply.send(status);
  });

  app.post<{ Params: { taskId: string } }>('/v1/tasks/:taskId/publish', async (request, reply) => {
    const published = await publishJob(request.params.taskId, { queue, publisher, storageRoot });
    return reply.send(published);
  });

  app.get<{ Params: { taskId: string } }>('/v1/tasks/:taskId/result.md', async (request, reply) =>
    sendResult(reply, request.params.taskId, { kind: 'markdown' }),
  );

  app.get<{ Params: { taskId: string } }>('/v1/tasks/:taskId/result.json', async (request, reply) =>
    sendResult(reply, request.params.taskId, { kind: 'json' }),
  );

  app.get<{ Params: { taskId: string } }>('/v1/tasks/:taskId/download.zip', async (request, reply) =>
    sendResult(reply, request.params.taskId, { kind: 'archive' }),
  );

  app.get<{ Params: { taskId: string; name: string } }>(
    '/v1/tasks/:taskId/result-images/:name',
    async (request, reply) => sendResult(reply, request.params.taskId, { image: request.params.name }),
  );

  app.post<{ Params: { taskId: string } }>('/v1/tasks/:taskId/tokens', async (request, reply) => {
    const body = tokenBodySchema.parse(request.body);
    const issued = await issueDownloadToken({ jobId: request.params.taskId, ...body }, downloads);
    return reply.code(201).send(issued);
  });

  app.get<{ Params: { token: string } }>('/v1/download/:token', async (request, reply) => {
    const delivery = await redeemDownloadToken(request.params.token, downloads);
    if (delivery.type === 'redirect') {
      return reply.code(302).header('location', delivery.url).send();
    }
    const contentType = mime.lookup(delivery.path) || 'application/octet-stream';
    return reply.type(contentType).send(createReadStream(delivery.path));
  });
}
