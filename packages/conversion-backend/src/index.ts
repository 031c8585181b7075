export { ConversionPipeline, planBatches } from './application/conversion-pipeline.js';
export type { PipelineLimits, PipelineResult } from './application/conversion-pipeline.js';
export { issueDownloadToken, redeemDownloadToken } from './application/download-tokens.js';
export { getJobResultFile } from './application/get-job-result.js';
export { getJobStatus } from './application/get-job-status.js';
export { JobQueue } from './application/job-queue.js';
export type { JobQueueOptions } from './application/job-queue.js';
export { publishJob } from './application/publish-job.js';
export { conversionOptionsSchema, parseConversionOptions, submitJob } from './application/submit-job.js';
export type { SubmitJobRequest, SubmitJobResponse } from './application/submit-job.js';
export { loadConfig } from './config/env.js';
export type { ConversionBackendConfig, EngineBackendKind } from './config/env.js';
export { subscribeJobEvents, waitForJobFinished } from './domain/job-events.js';
export type { JobEvent } from './domain/job-events.js';
export type { ConversionOptions, JobInput, JobRecord } from './domain/job-model.js';
export { HttpInferenceEngine, createHttpEngineFactory } from './infrastructure/inference-engine.js';
export type {
  Device,
  EngineFactory,
  InferenceEngine,
  PageResult,
  PredictOptions,
} from './infrastructure/inference-engine.js';
export { ResourceManager } from './infrastructure/resource-manager.js';
export type { ResourceManagerOptions, ResourceStatus } from './infrastructure/resource-manager.js';
export { TokenStore } from './infrastructure/token-store.js';
export { describeError } from './transport/error-handler.js';
export { createHttpServer } from './transport/http-server.js';
export { RateLimiterService } from './transport/rate-limit-middleware.js';
export { createRuntime, startService } from './transport/worker-runner.js';
export type { ConversionRuntime } from './transport/worker-runner.js';
