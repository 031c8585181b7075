// packages/conversion-backend/src/application/submit-job.ts
//
// Application service for submitting a new conversion job.
// - Validates the input source and conversion options.
// - Lays out the job directory and stores an uploaded file.
// - Hands the job to the queue; a full queue rejects it and the directory is removed.
import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { writeFile } from 'node:fs/promises';

import { z } from 'zod';

import { QueueFullError, SizeLimitError, ValidationError } from '@docuqueue/contracts';

import { type ConversionOptions, createJobRecord, type JobInput } from '../domain/job-model.js';
import { createJobPaths, removeJob } from '../infrastructure/job-storage.js';
import { createJobLogger } from '../infrastructure/logger.js';
import type { JobQueue } from './job-queue.js';

const PAGE_RANGES_PATTERN = /^\d+(-\d+)?(,\d+(-\d+)?)*$/;

export const conversionOptionsSchema = z.object({
  isOcr: z.boolean().default(true),
  enableFormula: z.boolean().default(true),
  enableTable: z.boolean().default(true),
  language: z.string().trim().min(1).default('ch'),
  pageRanges: z
    .string()
    .regex(PAGE_RANGES_PATTERN, 'pageRanges must look like "1-3,5"')
    .optional(),
  modelVariant: z.string().trim().min(1).optional(),
  packArchive: z.boolean().default(true),
  bbox: z.boolean().default(true),
});

export interface SubmitJobRequest {
  file?: { fileName: string; content: Uint8Array };
  url?: string;
  options?: unknown;
}

export interface SubmitJobResponse {
  jobId: string;
}

export interface SubmitJobDeps {
  queue: Pick<JobQueue, 'submit' | 'capacity'>;
  storageRoot: string;
  maxUploadMb: number;
  generateId?: () => string;
  /** Milliseconds clock. */
  now?: () => number;
}

export function parseConversionOptions(raw: unknown): ConversionOptions {
  const parsed = conversionOptionsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ValidationError(`${where}${issue?.message ?? 'invalid options'}`, 'invalid_options');
  }
  return parsed.data;
}

function resolveInput(req: SubmitJobRequest): { input: JobInput; fileName: string } {
  if (req.file && req.url) {
    throw new ValidationError('Provide either a file or a url, not both', 'ambiguous_input');
  }
  if (req.file) {
    return { input: { kind: 'file' }, fileName: req.file.fileName };
  }
  if (req.url) {
    let parsed: URL;
    try {
      parsed = new URL(req.url);
    } catch {
      throw new ValidationError('url must be an absolute http(s) URL', 'invalid_url');
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ValidationError('url must be an absolute http(s) URL', 'invalid_url');
    }
    return { input: { kind: 'url', url: parsed.toString() }, fileName: path.posix.basename(parsed.pathname) };
  }
  throw new ValidationError('A file or a url is required', 'input_required');
}

// submitJob.declaration()
export async function submitJob(
  req: SubmitJobRequest,
  deps: SubmitJobDeps,
): Promise<SubmitJobResponse> {
  const { input, fileName } = resolveInput(req);
  const options = parseConversionOptions(req.options);

  const maxBytes = Math.max(1, deps.maxUploadMb) * 1024 * 1024;
  if (req.file && req.file.content.byteLength > maxBytes) {
    throw new SizeLimitError(maxBytes);
  }

  const jobId = (deps.generateId ?? randomUUID)();
  const log = createJobLogger(jobId);
  const paths = await createJobPaths(deps.storageRoot, jobId, fileName);

  let accepted = false;
  try {
    if (req.file) {
      await writeFile(paths.inputFile, req.file.content);
    }
    const job = createJobRecord({
      id: jobId,
      input,
      options,
      paths,
      queuedAt: (deps.now ?? Date.now)() / 1000,
    });
    accepted = await deps.queue.submit(job);
  } finally {
    if (!accepted) {
      await removeJob(deps.storageRoot, jobId);
    }
  }

  if (!accepted) {
    throw new QueueFullError(deps.queue.capacity());
  }

  log.info('Job submitted', { event: 'job_submitted', inputKind: input.kind });
  return { jobId };
}
