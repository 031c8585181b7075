// packages/conversion-backend/src/infrastructure/inference-engine.ts
// Capability interface for the document-conversion engine plus an adapter
// that talks to an inference sidecar over HTTP.
//
// Sidecar contract:
//   GET  /health          -> 200 once the model is loaded on the requested device
//   POST /predict         -> { pages: [{ page_index, res, markdown: { text, images } }] }
//   POST /unload          -> releases accelerator memory held by the sidecar
import { EngineError, EngineLoadError } from '@docuqueue/contracts';
import { z } from 'zod';

import type { EngineBackendKind } from '../config/env.js';
import { errorMessage } from './logger.js';

export type Device = 'gpu' | 'cpu' | 'unknown';

export interface PredictOptions {
  isOcr: boolean;
  enableFormula: boolean;
  enableTable: boolean;
  language: string;
  /** 1-based page ranges, e.g. "1-50" or "1-3,7". Omitted means every page. */
  pageRanges?: string;
  modelVariant?: string;
}

export interface PageResult {
  pageIndex: number;
  json: Record<string, unknown>;
  markdown: {
    text: string;
    images: Record<string, Uint8Array>;
  };
}

export interface InferenceEngine {
  readonly backend: EngineBackendKind;
  predict(inputPath: string, options: PredictOptions): Promise<PageResult[]>;
  dispose?(): Promise<void>;
}

export interface EngineFactory {
  create(backend: EngineBackendKind, device: Device): Promise<InferenceEngine>;
}

const predictResponseSchema = z.object({
  pages: z.array(
    z.object({
      page_index: z.number().int(),
      res: z.record(z.unknown()),
      markdown: z.object({
        text: z.string(),
        images: z.record(z.string()).default({}),
      }),
    }),
  ),
});

export class HttpInferenceEngine implements InferenceEngine {
  constructor(
    readonly backend: EngineBackendKind,
    private readonly baseUrl: string,
    private readonly device: Device,
    private readonly requestTimeoutMs: number,
  ) {}

  async checkHealth(): Promise<void> {
    const url = new URL('/health', this.baseUrl);
    url.searchParams.set('device', this.device);
    const response = await fetch(url, { signal: AbortSignal.timeout(this.requestTimeoutMs) });
    if (!response.ok) {
      throw new Error(`health check returned HTTP ${response.status}`);
    }
  }

  async predict(inputPath: string, options: PredictOptions): Promise<PageResult[]> {
    let body: unknown;
    try {
      const response = await fetch(new URL('/predict', this.baseUrl), {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({
          input_path: inputPath,
          device: this.device,
          is_ocr: options.isOcr,
          enable_formula: options.enableFormula,
          enable_table: options.enableTable,
          language: options.language,
          page_ranges: options.pageRanges ?? null,
          model_version: options.modelVariant ?? null,
        }),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
      if (!response.ok) {
        throw new Error(`predict returned HTTP ${response.status}: ${await response.text()}`);
      }
      body = await response.json();
    } catch (error) {
      throw new EngineError(`Inference failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = predictResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EngineError(`Inference returned an unexpected payload: ${parsed.error.message}`);
    }

    return parsed.data.pages.map((page) => ({
      pageIndex: page.page_index,
      json: page.res,
      markdown: {
        text: page.markdown.text,
        images: Object.fromEntries(
          Object.entries(page.markdown.images).map(([name, data]) => [
            name,
            new Uint8Array(Buffer.from(data, 'base64')),
          ]),
        ),
      },
    }));
  }

  async dispose(): Promise<void> {
    const response = await fetch(new URL('/unload', this.baseUrl), {
      method: 'POST',
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });
    if (!response.ok) {
      throw new Error(`unload returned HTTP ${response.status}`);
    }
  }
}

export function createHttpEngineFactory(config: {
  endpoint: string;
  concurrentEndpoint?: string;
  requestTimeoutMs: number;
}): EngineFactory {
  return {
    async create(backend, device) {
      const baseUrl = backend === 'concurrent' ? config.concurrentEndpoint : config.endpoint;
      if (!baseUrl) {
        throw new EngineLoadError(`No endpoint configured for ${backend} backend`);
      }
      const engine = new HttpInferenceEngine(backend, baseUrl, device, config.requestTimeoutMs);
      try {
        await engine.checkHealth();
      } catch (error) {
        throw new EngineLoadError(`${backend} engine unavailable: ${errorMessage(error)}`, {
          cause: error,
        });
      }
      return engine;
    },
  };
}
