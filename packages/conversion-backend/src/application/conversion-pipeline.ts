// packages/conversion-backend/src/application/conversion-pipeline.ts
//
// Executes one job against the shared engine:
// 1) materialize the input (download when remote)
// 2) enforce size / page ceilings before touching the engine
// 3) run in one pass, or in sequential page batches for large documents
// 4) persist layout.json, full.md and images/ under the job's output dir
// 5) optionally zip the output dir into result.zip
import { mkdir, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { SizeLimitError, PageLimitError } from '@docuqueue/contracts';
import { writeJsonAtomic } from '@docuqueue/shared-infrastructure';

import type { ConversionOptions, JobInput } from '../domain/job-model.js';
import { downloadToFile } from '../infrastructure/input-fetcher.js';
import type { PageResult, PredictOptions } from '../infrastructure/inference-engine.js';
import { type JobPaths, packArchive, sanitizeFileName } from '../infrastructure/job-storage.js';
import { type Logger, logger as rootLogger } from '../infrastructure/logger.js';
import { type Metrics, metrics as defaultMetrics } from '../infrastructure/metrics.js';
import { getPdfPageCount } from '../infrastructure/pdf-inspector.js';
import type { ResourceManager } from '../infrastructure/resource-manager.js';

const BYTES_PER_MB = 1024 * 1024;
const MIN_ACQUIRE_TIMEOUT_SECONDS = 60;

export interface PipelineLimits {
  maxUploadMb: number;
  maxPages: number;
  enableAutoBatch: boolean;
  batchPageSize: number;
  downloadTimeoutMs: number;
  loadTimeoutSeconds: number;
}

export interface PipelineDeps {
  countPages?: (filePath: string) => Promise<number | null>;
  metrics?: Metrics;
}

export interface PipelineResult {
  pageCount: number | null;
  batches: number;
  pages: number;
  images: number;
  archive: string | null;
}

interface LayoutPage {
  page_index: number;
  res: Record<string, unknown>;
}

/**
 * Page ranges covering 1..totalPages in chunks of batchSize: "1-50", "51-100", ...
 */
export function planBatches(totalPages: number, batchSize: number): string[] {
  const size = Math.max(1, batchSize);
  const ranges: string[] = [];
  for (let start = 1; start <= totalPages; start += size) {
    const end = Math.min(start + size - 1, totalPages);
    ranges.push(`${start}-${end}`);
  }
  return ranges;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Accumulates engine output for one job and writes it to the output dir.
 */
class ArtifactWriter {
  private readonly layout: LayoutPage[] = [];
  private readonly markdown: string[] = [];
  private readonly writtenImages = new Set<string>();
  private pageCount = 0;

  constructor(private readonly paths: JobPaths) {}

  get pages(): number {
    return this.pageCount;
  }

  get images(): number {
    return this.writtenImages.size;
  }

  async appendBatch(results: PageResult[]): Promise<void> {
    for (const result of results) {
      this.layout.push({ page_index: result.pageIndex, res: result.json });
      let text = result.markdown.text;

      for (const [rawName, data] of Object.entries(result.markdown.images)) {
        const name = sanitizeFileName(rawName);
        if (!name) continue;

        let target = name;
        if (this.writtenImages.has(name)) {
          // Another page already produced this name; namespace by page.
          target = `p${result.pageIndex}_${name}`;
          text = text.replace(
            new RegExp(`(^|[/("'\\s])${escapeRegExp(name)}`, 'g'),
            `$1${target}`,
          );
        }
        await writeFile(path.join(this.paths.imagesDir, target), data);
        this.writtenImages.add(target);
      }

      if (text.trim()) {
        this.markdown.push(text);
      }
      this.pageCount += 1;
    }

    await writeJsonAtomic(this.paths.jsonFile, { pages: this.layout });
  }

  async finish(): Promise<void> {
    await writeFile(this.paths.mdFile, this.markdown.join('\n\n'), 'utf8');
  }
}

export class ConversionPipeline {
  private readonly countPages: (filePath: string) => Promise<number | null>;
  private readonly metrics: Metrics;

  constructor(
    private readonly resources: Pick<ResourceManager, 'withInference'>,
    private readonly limits: PipelineLimits,
    deps: PipelineDeps = {},
  ) {
    this.countPages = deps.countPages ?? getPdfPageCount;
    this.metrics = deps.metrics ?? defaultMetrics;
  }

  async run(
    input: JobInput,
    paths: JobPaths,
    options: ConversionOptions,
    log: Logger = rootLogger,
  ): Promise<PipelineResult> {
    const maxBytes = Math.max(1, this.limits.maxUploadMb) * BYTES_PER_MB;

    if (input.kind === 'url') {
      await downloadToFile(input.url, paths.inputFile, {
        maxBytes,
        timeoutMs: this.limits.downloadTimeoutMs,
      });
    }

    const { size } = await stat(paths.inputFile);
    if (size > maxBytes) {
      throw new SizeLimitError(maxBytes);
    }

    const pageCount = await this.countPages(paths.inputFile);
    if (pageCount !== null && pageCount > this.limits.maxPages) {
      throw new PageLimitError(pageCount, this.limits.maxPages);
    }

    const batched =
      this.limits.enableAutoBatch &&
      pageCount !== null &&
      pageCount > this.limits.batchPageSize &&
      !options.pageRanges;
    const ranges: Array<string | undefined> =
      batched && pageCount !== null
        ? planBatches(pageCount, this.limits.batchPageSize)
        : [options.pageRanges];

    log.info('Pipeline started', {
      event: 'pipeline_started',
      pages: pageCount,
      batches: ranges.length,
      inputKind: input.kind,
      modelVariant: options.modelVariant,
      language: options.language,
      isOcr: options.isOcr,
      enableFormula: options.enableFormula,
      enableTable: options.enableTable,
      bbox: options.bbox,
    });

    const startedAt = Date.now();
    const timeoutMs = Math.max(MIN_ACQUIRE_TIMEOUT_SECONDS, this.limits.loadTimeoutSeconds) * 1000;
    await mkdir(paths.imagesDir, { recursive: true });
    const writer = new ArtifactWriter(paths);

    for (const pageRanges of ranges) {
      const predictOptions: PredictOptions = {
        isOcr: options.isOcr,
        enableFormula: options.enableFormula,
        enableTable: options.enableTable,
        language: options.language,
      };
      if (pageRanges) predictOptions.pageRanges = pageRanges;
      if (options.modelVariant) predictOptions.modelVariant = options.modelVariant;

      const results = await this.resources.withInference(
        (engine) => engine.predict(paths.inputFile, predictOptions),
        { timeoutMs },
      );
      await writer.appendBatch(results);
      log.debug('Batch persisted', { pageRanges, pages: results.length });
    }
    await writer.finish();

    const archive = options.packArchive ? await packArchive(paths) : null;

    const elapsedMs = Date.now() - startedAt;
    this.metrics.timing('pipeline_duration_ms', elapsedMs);
    log.info('Pipeline finished', {
      event: 'pipeline_finished',
      pages: writer.pages,
      images: writer.images,
      elapsedMs,
    });

    return {
      pageCount,
      batches: ranges.length,
      pages: writer.pages,
      images: writer.images,
      archive,
    };
  }
}
