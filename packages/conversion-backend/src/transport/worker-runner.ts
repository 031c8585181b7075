// packages/conversion-backend/src/transport/worker-runner.ts
// Process entrypoint: wires the scheduling core and serves it over HTTP.
// Usage from the repository root:
//   npm run build && npm start
// which runs packages/conversion-backend/dist/transport/worker-runner.js.
//
// The service:
// - Loads .env and builds the typed config.
// - Sweeps old job directories, loads the token table.
// - Starts the job workers, the engine idle watcher and the rate-limit sweep.
// - Shuts everything down on SIGINT/SIGTERM.
import { fileURLToPath } from 'node:url';

import { loadEnvFiles } from '@docuqueue/shared-infrastructure';

import { ConversionPipeline } from '../application/conversion-pipeline.js';
import { JobQueue } from '../application/job-queue.js';
import { type ConversionBackendConfig, loadConfig } from '../config/env.js';
import { type MemoryProbe, NvidiaSmiProbe } from '../infrastructure/device-probe.js';
import { createHttpEngineFactory, type EngineFactory } from '../infrastructure/inference-engine.js';
import { cleanupOldJobs } from '../infrastructure/job-storage.js';
import { errorMessage, logger } from '../infrastructure/logger.js';
import { type Metrics, metrics as defaultMetrics } from '../infrastructure/metrics.js';
import { createPublisher, type Publisher } from '../infrastructure/publisher.js';
import { ResourceManager } from '../infrastructure/resource-manager.js';
import { createS3StorageAdapter, type S3StorageAdapter } from '../infrastructure/s3-storage-adapter.js';
import { TokenStore } from '../infrastructure/token-store.js';
import { createHttpServer } from './http-server.js';
import { RateLimiterService } from './rate-limit-middleware.js';

export interface ConversionRuntime {
  config: ConversionBackendConfig;
  metrics: Metrics;
  resources: ResourceManager;
  pipeline: ConversionPipeline;
  queue: JobQueue;
  tokens: TokenStore;
  publisher: Publisher;
  objectStore: S3StorageAdapter | null;
  rateLimiter: RateLimiterService | null;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface RuntimeOverrides {
  engineFactory?: EngineFactory;
  probe?: MemoryProbe;
  metrics?: Metrics;
  objectStore?: S3StorageAdapter | null;
}

// createRuntime.declaration()
export function createRuntime(
  config: ConversionBackendConfig,
  overrides: RuntimeOverrides = {},
): ConversionRuntime {
  const metrics = overrides.metrics ?? defaultMetrics;
  const objectStore =
    overrides.objectStore !== undefined ? overrides.objectStore : createS3StorageAdapter(config.publish);

  const resources = new ResourceManager(
    {
      ...config.resources,
      maxWorkers: config.queue.maxWorkers,
      pollIntervalMs: config.queue.pollIntervalMs,
    },
    {
      engineFactory: overrides.engineFactory ?? createHttpEngineFactory(config.engine),
      probe: overrides.probe ?? new NvidiaSmiProbe(),
      metrics,
    },
  );

  const pipeline = new ConversionPipeline(
    resources,
    { ...config.limits, loadTimeoutSeconds: config.resources.loadTimeoutSeconds },
    { metrics },
  );

  const publisher = createPublisher(config.publish.backend, {
    store: objectStore,
    bucket: config.publish.s3.bucket,
    prefix: config.publish.s3.prefix,
    signExpireSeconds: config.publish.s3.signExpireSeconds,
  });

  const queue = new JobQueue(
    {
      maxQueueSize: config.queue.maxQueueSize,
      maxWorkers: config.queue.maxWorkers,
      pollIntervalMs: config.queue.pollIntervalMs,
      autoPublish: config.publish.autoPublish,
    },
    { pipeline, publisher, metrics },
  );

  const tokens = new TokenStore(
    {
      storePath: config.tokens.storePath,
      storageRoot: config.storage.root,
      backend: config.publish.backend,
      defaultTtlSeconds: config.tokens.defaultTtlSeconds,
      signExpireSeconds: config.publish.s3.signExpireSeconds,
    },
    {
      signUrl: objectStore
        ? (objectKey, expiresIn) => objectStore.generatePresignedUrl(objectKey, expiresIn)
        : undefined,
    },
  );

  const rateLimiter = config.rateLimit.enabled
    ? new RateLimiterService({
        ratePerSecond: config.rateLimit.ratePerSecond,
        burst: config.rateLimit.burst,
      })
    : null;

  return {
    config,
    metrics,
    resources,
    pipeline,
    queue,
    tokens,
    publisher,
    objectStore,
    rateLimiter,
    async start() {
      const removed = await cleanupOldJobs(config.storage.root, config.storage.maxJobRetention);
      logger.info('Retention sweep finished', { component: 'runtime', removed: removed.length });
      await tokens.load();
      resources.start();
      rateLimiter?.start();
      queue.start();
    },
    async stop() {
      rateLimiter?.stop();
      const drained = await queue.stop();
      if (!drained) {
        logger.warn('Workers still busy at shutdown', { component: 'runtime' });
      }
      await resources.stop();
    },
  };
}

// startService.declaration()
export async function startService(): Promise<void> {
  const envSummary = loadEnvFiles();
  const config = loadConfig();
  logger.info('Configuration loaded', {
    component: 'runtime',
    envFiles: envSummary.loadedFiles,
    engineBackend: config.resources.backend,
    publishBackend: config.publish.backend,
  });

  const runtime = createRuntime(config);
  await runtime.start();

  const app = createHttpServer(runtime);
  await app.listen({ host: config.server.host, port: config.server.port });
  logger.info('HTTP server listening', {
    component: 'runtime',
    host: config.server.host,
    port: config.server.port,
  });

  const shutdown = async (signal: string) => {
    logger.info(`Shutting down (${signal})`, { component: 'runtime' });
    try {
      await app.close();
      await runtime.stop();
      logger.info('Shut down cleanly', { component: 'runtime' });
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', { component: 'runtime', error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

// Run when executed as the entry script rather than imported.
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startService().catch((error: unknown) => {
    logger.error(error instanceof Error ? error : String(error), {
      component: 'runtime',
      message: 'Failed to start service',
    });
    process.exit(1);
  });
}
