// packages/conversion-backend/src/infrastructure/resource-manager.ts
// Owner of the single, expensive inference engine instance.
// - Lazy, single-flight engine construction with a primary -> fallback backend chain.
// - Serializes inference for backends that cannot run two invocations at once.
// - Admits GPU work only while measured accelerator memory leaves room for it.
// - Idle watcher unloads the engine once nothing has used it for a while.
import { setTimeout as sleep } from 'node:timers/promises';

import { AcquireTimeoutError, EngineLoadError } from '@docuqueue/contracts';

import type { EngineBackendKind } from '../config/env.js';
import type { MemoryProbe } from './device-probe.js';
import type { Device, EngineFactory, InferenceEngine } from './inference-engine.js';
import { errorMessage, logger } from './logger.js';
import { type Metrics, metrics as defaultMetrics } from './metrics.js';

const FALLBACK_BACKEND: EngineBackendKind = 'standard';
const MIN_MEM_PER_JOB_GB = 0.1;

export interface ResourceManagerOptions {
  backend: EngineBackendKind;
  forceCpu: boolean;
  dynamicWorkers: boolean;
  maxWorkers: number;
  memPerJobGb: number;
  reserveGpuMemGb: number;
  minSystemMemoryGb: number;
  gpuIndex: number;
  idleUnloadSeconds: number;
  pollIntervalMs?: number;
  idleCheckIntervalMs?: number;
}

export interface ResourceManagerDeps {
  engineFactory: EngineFactory;
  probe: MemoryProbe;
  metrics?: Metrics;
  /** Milliseconds clock, injectable for tests. */
  now?: () => number;
}

export interface ResourceStatus {
  device: Device;
  backend: EngineBackendKind;
  fallbackReason: string | null;
  loaded: boolean;
  inFlight: number;
}

export class ResourceManager {
  private engine: InferenceEngine | null = null;
  private loading: Promise<InferenceEngine> | null = null;
  private inferenceLocked = false;
  private inFlight = 0;
  private holders = 0;
  private lastUsedAt: number;
  private device: Device = 'unknown';
  private activeBackend: EngineBackendKind;
  private fallbackReason: string | null = null;
  private idleTimer: ReturnType<typeof setInterval> | null = null;

  private readonly pollIntervalMs: number;
  private readonly idleCheckIntervalMs: number;
  private readonly metrics: Metrics;
  private readonly now: () => number;

  constructor(
    private readonly options: ResourceManagerOptions,
    private readonly deps: ResourceManagerDeps,
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.idleCheckIntervalMs = options.idleCheckIntervalMs ?? 1000;
    this.metrics = deps.metrics ?? defaultMetrics;
    this.now = deps.now ?? Date.now;
    this.activeBackend = options.backend;
    this.lastUsedAt = this.now();
  }

  /**
   * Run `fn` with exclusive (or memory-gated) access to the loaded engine.
   * Every acquired resource is released on all exit paths.
   */
  async withInference<T>(
    fn: (engine: InferenceEngine) => Promise<T>,
    options: { timeoutMs: number },
  ): Promise<T> {
    const startedAt = this.now();
    let lockHeld = false;
    let slotHeld = false;
    this.holders += 1;

    try {
      if (this.activeBackend !== 'concurrent') {
        await this.acquireInferenceLock(startedAt, options.timeoutMs);
        lockHeld = true;
      }

      const engine = await this.getEngine();

      if (this.device === 'gpu' && this.activeBackend !== 'concurrent') {
        await this.acquireGpuSlot(startedAt, options.timeoutMs);
        slotHeld = true;
      }

      return await fn(engine);
    } finally {
      if (slotHeld) {
        this.inFlight = Math.max(0, this.inFlight - 1);
      }
      if (lockHeld) {
        this.inferenceLocked = false;
      }
      this.holders -= 1;
      this.lastUsedAt = this.now();
    }
  }

  private async acquireInferenceLock(startedAt: number, timeoutMs: number): Promise<void> {
    while (this.inferenceLocked) {
      if (this.now() - startedAt > timeoutMs) {
        throw new AcquireTimeoutError('Timed out waiting for the inference lock');
      }
      await sleep(this.pollIntervalMs);
    }
    this.inferenceLocked = true;
  }

  private async acquireGpuSlot(startedAt: number, timeoutMs: number): Promise<void> {
    for (;;) {
      if (await this.systemMemoryAvailable()) {
        const allowed = await this.allowedConcurrency();
        if (this.inFlight < allowed) {
          this.inFlight += 1;
          return;
        }
      }
      if (this.now() - startedAt > timeoutMs) {
        throw new AcquireTimeoutError('Timed out waiting for GPU memory');
      }
      await sleep(this.pollIntervalMs);
    }
  }

  private async systemMemoryAvailable(): Promise<boolean> {
    const reading = await this.deps.probe.systemMemory();
    if (reading && reading.freeGb < this.options.minSystemMemoryGb) {
      logger.warn('System memory pressure', {
        component: 'resource-manager',
        availableGb: Number(reading.freeGb.toFixed(2)),
        totalGb: Number(reading.totalGb.toFixed(2)),
      });
      return false;
    }
    return true;
  }

  /**
   * Concurrent GPU tasks the accelerator can take right now:
   * `floor((free - reserve) / perJob)`, clamped to [1, maxWorkers].
   */
  async allowedConcurrency(): Promise<number> {
    if (!this.options.dynamicWorkers || this.device !== 'gpu') return 1;

    const reading = await this.deps.probe.gpuMemory(this.options.gpuIndex);
    if (!reading) return 1;

    const usable = Math.max(0, reading.freeGb - Math.max(0, this.options.reserveGpuMemGb));
    const perJob = Math.max(MIN_MEM_PER_JOB_GB, this.options.memPerJobGb);
    const allowed = Math.max(1, Math.floor(usable / perJob));

    logger.debug('GPU memory check', {
      component: 'resource-manager',
      freeGb: reading.freeGb,
      totalGb: reading.totalGb,
      usableGb: usable,
      perJobGb: perJob,
      allowed,
    });

    return Math.max(1, Math.min(this.options.maxWorkers, allowed));
  }

  private async getEngine(): Promise<InferenceEngine> {
    if (this.engine) {
      this.lastUsedAt = this.now();
      return this.engine;
    }
    if (!this.loading) {
      this.loading = this.load().finally(() => {
        this.loading = null;
      });
    }
    const engine = await this.loading;
    this.lastUsedAt = this.now();
    return engine;
  }

  private async load(): Promise<InferenceEngine> {
    const device = await this.selectDevice();
    const primary = this.options.backend;

    try {
      let engine: InferenceEngine;
      try {
        engine = await this.deps.engineFactory.create(primary, device);
      } catch (error) {
        if (primary === FALLBACK_BACKEND) throw error;
        this.fallbackReason = `${primary} init failed: ${errorMessage(error)}`;
        logger.warn('Primary engine backend failed, falling back', {
          component: 'resource-manager',
          backend: primary,
          fallback: FALLBACK_BACKEND,
          error: errorMessage(error),
        });
        engine = await this.deps.engineFactory.create(FALLBACK_BACKEND, device);
      }

      this.engine = engine;
      this.activeBackend = engine.backend;
      this.device = device;
      logger.info('Inference engine loaded', {
        component: 'resource-manager',
        backend: this.activeBackend,
        device,
      });
      return engine;
    } catch (error) {
      this.device = 'unknown';
      this.fallbackReason = `load failed: ${errorMessage(error)}`;
      throw new EngineLoadError(`Failed to load inference engine: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async selectDevice(): Promise<Device> {
    if (this.options.forceCpu) {
      logger.info('Runtime device selected: cpu (forced)', { component: 'resource-manager' });
      return 'cpu';
    }
    const gpu = await this.deps.probe.gpuMemory(this.options.gpuIndex);
    const device: Device = gpu ? 'gpu' : 'cpu';
    logger.info(`Runtime device selected: ${device}`, { component: 'resource-manager' });
    return device;
  }

  /**
   * Start the watcher: each tick refreshes the GPU memory gauges and unloads
   * an idle engine. Safe to call more than once.
   */
  start(): void {
    if (this.idleTimer) return;
    this.idleTimer = setInterval(() => {
      this.tick().catch((error) => {
        logger.error('Resource watcher tick failed', {
          component: 'resource-manager',
          error: errorMessage(error),
        });
      });
    }, this.idleCheckIntervalMs);
    this.idleTimer.unref();
  }

  private async tick(): Promise<void> {
    await this.refreshMetrics();
    await this.sweepIdle();
  }

  /**
   * Unload the engine when it has been idle long enough and nobody holds it.
   * Returns true when an unload happened.
   */
  async sweepIdle(): Promise<boolean> {
    if (!this.engine || this.loading) return false;
    if (this.inFlight > 0 || this.holders > 0) return false;

    const idleMs = this.now() - this.lastUsedAt;
    if (idleMs < this.options.idleUnloadSeconds * 1000) return false;

    logger.info('Unloading idle inference engine', {
      component: 'resource-manager',
      idleSeconds: Math.round(idleMs / 1000),
    });
    await this.unload();
    return true;
  }

  private async unload(): Promise<void> {
    const engine = this.engine;
    this.engine = null;
    if (engine?.dispose) {
      await engine.dispose();
    }
  }

  /**
   * Stop the watcher and release the engine (graceful shutdown).
   */
  async stop(): Promise<void> {
    if (this.idleTimer) {
      clearInterval(this.idleTimer);
      this.idleTimer = null;
    }
    await this.unload();
  }

  status(): ResourceStatus {
    return {
      device: this.device,
      backend: this.activeBackend,
      fallbackReason: this.fallbackReason,
      loaded: this.engine !== null,
      inFlight: this.inFlight,
    };
  }

  async refreshMetrics(): Promise<void> {
    const reading = await this.deps.probe.gpuMemory(this.options.gpuIndex);
    if (!reading) return;
    this.metrics.gauge('gpu_memory_free_gb', reading.freeGb);
    this.metrics.gauge('gpu_memory_total_gb', reading.totalGb);
  }
}
