// packages/conversion-backend/src/application/job-queue.ts
// Bounded in-memory FIFO feeding a fixed pool of async worker loops.
// Flow per dequeued job:
// 1. queued -> processing, persist.
// 2. Run the conversion pipeline.
// 3. processing -> succeeded | failed (error message kept), finishedAt, persist.
// 4. Optional auto-publish; a publish failure is logged and never downgrades the job.
import { setTimeout as sleep } from 'node:timers/promises';

import type { PublishInfo } from '@docuqueue/contracts';

import { publishJobEvent } from '../domain/job-events.js';
import { assertTransition, type JobRecord, toStatusFile } from '../domain/job-model.js';
import { saveStatus } from '../infrastructure/job-storage.js';
import { createJobLogger, errorMessage, type Logger, logger } from '../infrastructure/logger.js';
import { type Metrics, metrics as defaultMetrics } from '../infrastructure/metrics.js';
import type { Publisher } from '../infrastructure/publisher.js';
import type { ConversionPipeline } from './conversion-pipeline.js';

const STOP = Symbol('stop');

type JobUpdate = Partial<Pick<JobRecord, 'status' | 'startedAt' | 'finishedAt' | 'message' | 'published'>>;

type QueueItem = JobRecord | typeof STOP;

export interface JobQueueOptions {
  maxQueueSize: number;
  maxWorkers: number;
  pollIntervalMs?: number;
  stopTimeoutMs?: number;
  autoPublish?: boolean;
}

export interface JobQueueDeps {
  pipeline: Pick<ConversionPipeline, 'run'>;
  publisher?: Publisher;
  metrics?: Metrics;
  /** Milliseconds clock. */
  now?: () => number;
}

export class JobQueue {
  private readonly pending: QueueItem[] = [];
  private readonly waiters: Array<(item: QueueItem | null) => void> = [];
  private readonly jobs = new Map<string, JobRecord>();
  private workers: Array<Promise<void>> = [];
  private reserved = 0;
  private running = 0;
  private stopping = false;

  private readonly pollIntervalMs: number;
  private readonly stopTimeoutMs: number;
  private readonly metrics: Metrics;
  private readonly now: () => number;

  constructor(
    private readonly options: JobQueueOptions,
    private readonly deps: JobQueueDeps,
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 5000;
    this.metrics = deps.metrics ?? defaultMetrics;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Non-blocking enqueue. Resolves false when the queue is at capacity; a
   * rejected job is neither tracked nor persisted.
   */
  async submit(job: JobRecord): Promise<boolean> {
    if (this.isFull()) {
      logger.warn('Job queue full; rejecting submission', {
        jobId: job.id,
        event: 'queue_full',
        capacity: this.options.maxQueueSize,
      });
      return false;
    }

    // Hold a slot while the initial status is written so concurrent
    // submissions cannot overshoot capacity.
    this.reserved += 1;
    try {
      this.jobs.set(job.id, job);
      await saveStatus(job.paths, toStatusFile(job));
      this.push(job);
    } catch (error) {
      this.jobs.delete(job.id);
      throw error;
    } finally {
      this.reserved -= 1;
    }

    publishJobEvent({ type: 'job_created', job });
    this.metrics.increment('tasks_submitted_total');
    this.updateGauges();
    return true;
  }

  get(jobId: string): JobRecord | undefined {
    return this.jobs.get(jobId);
  }

  /**
   * Attach publish info to a tracked job and persist it.
   */
  async recordPublished(job: JobRecord, published: PublishInfo): Promise<void> {
    await this.commit(job, { published });
  }

  start(): void {
    if (this.workers.length > 0) return;
    this.stopping = false;
    for (let index = 0; index < Math.max(1, this.options.maxWorkers); index += 1) {
      this.workers.push(this.workerLoop(index));
    }
    logger.info('Job workers started', { component: 'job-queue', workers: this.workers.length });
    this.updateGauges();
  }

  /**
   * Signal workers to exit and wait up to `stopTimeoutMs` for them. A worker
   * in the middle of a job finishes that job first. Resolves true when every
   * worker exited in time.
   */
  async stop(): Promise<boolean> {
    if (this.workers.length === 0) return true;
    this.stopping = true;
    for (let i = 0; i < this.workers.length; i += 1) {
      this.push(STOP);
    }

    const drained = await Promise.race([
      Promise.all(this.workers).then(() => true),
      sleep(this.stopTimeoutMs, false, { ref: false }),
    ]);

    for (let i = this.pending.length - 1; i >= 0; i -= 1) {
      if (this.pending[i] === STOP) this.pending.splice(i, 1);
    }
    this.workers = [];
    logger.info('Job workers stopped', { component: 'job-queue', drained });
    return drained;
  }

  queueSize(): number {
    return this.pending.filter((item) => item !== STOP).length;
  }

  capacity(): number {
    return this.options.maxQueueSize;
  }

  isFull(): boolean {
    return this.queueSize() + this.reserved >= this.options.maxQueueSize;
  }

  activeWorkers(): number {
    return this.workers.length;
  }

  runningWorkers(): number {
    return this.running;
  }

  private push(item: QueueItem): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }
    this.pending.push(item);
  }

  /**
   * Next item, or null when nothing arrived within `timeoutMs`.
   */
  private take(timeoutMs: number): Promise<QueueItem | null> {
    const next = this.pending.shift();
    if (next !== undefined) return Promise.resolve(next);

    return new Promise((resolve) => {
      const waiter = (item: QueueItem | null) => {
        clearTimeout(timer);
        resolve(item);
      };
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        resolve(null);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  private async workerLoop(index: number): Promise<void> {
    while (!this.stopping) {
      const item = await this.take(this.pollIntervalMs);
      if (item === null) continue;
      if (item === STOP) break;

      this.running += 1;
      this.updateGauges();
      try {
        await this.execute(item);
      } catch (error) {
        logger.error('Worker failed to process job', {
          component: 'job-queue',
          worker: index,
          jobId: item.id,
          error: errorMessage(error),
        });
      } finally {
        this.running -= 1;
        this.updateGauges();
      }
    }
  }

  private async execute(job: JobRecord): Promise<void> {
    const log = createJobLogger(job.id);

    const startedAt = Math.max(this.nowSeconds(), job.queuedAt);
    await this.commit(job, { status: 'processing', startedAt });

    let outcome: JobUpdate;
    try {
      await this.deps.pipeline.run(job.input, job.paths, job.options, log);
      outcome = { status: 'succeeded' };
      this.metrics.increment('tasks_succeeded_total');
      log.info('Job succeeded', { event: 'job_succeeded' });
    } catch (error) {
      outcome = { status: 'failed', message: errorMessage(error) };
      this.metrics.increment('tasks_failed_total');
      log.error(error instanceof Error ? error : String(error), { event: 'job_failed' });
    }

    await this.commit(job, { ...outcome, finishedAt: Math.max(this.nowSeconds(), startedAt) });

    if (job.status === 'succeeded' && this.options.autoPublish && this.deps.publisher) {
      await this.autoPublish(job, log);
    }
  }

  private async autoPublish(job: JobRecord, log: Logger): Promise<void> {
    const publisher = this.deps.publisher;
    if (!publisher) return;
    let published: PublishInfo;
    try {
      published = await publisher.publish(job.id, job.paths);
    } catch (error) {
      log.warn('Auto-publish failed; job stays succeeded', {
        event: 'publish_failed',
        error: errorMessage(error),
      });
      return;
    }
    await this.commit(job, { published });
  }

  /**
   * Write the updated status file first, then apply the update to the shared
   * record. Readers of the in-memory record never see a state the file lacks.
   */
  private async commit(job: JobRecord, update: JobUpdate): Promise<void> {
    if (update.status !== undefined) {
      assertTransition(job.status, update.status);
    }
    await saveStatus(job.paths, toStatusFile({ ...job, ...update }));
    Object.assign(job, update);
    publishJobEvent({ type: 'job_state_changed', job });
  }

  private nowSeconds(): number {
    return this.now() / 1000;
  }

  private updateGauges(): void {
    this.metrics.gauge('queue_size', this.queueSize());
    this.metrics.gauge('running_workers', this.running);
  }
}
