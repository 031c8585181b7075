// packages/conversion-backend/src/domain/job-model.ts

// Job domain model for the conversion backend.
// A job is created by the submission path, mutated only by the worker that
// dequeued it and mirrored to `job_status.json` on every transition.
import {
  InvalidTransitionError,
  type JobStatus,
  type JobStatusDto,
  type JobStatusFile,
  type PublishInfo,
} from '@docuqueue/contracts';

import type { JobPaths } from '../infrastructure/job-storage.js';

export type { JobStatus };

export type JobInput = { kind: 'file' } | { kind: 'url'; url: string };

export interface ConversionOptions {
  isOcr: boolean;
  enableFormula: boolean;
  enableTable: boolean;
  language: string;
  pageRanges?: string;
  modelVariant?: string;
  packArchive: boolean;
  bbox: boolean;
}

export interface JobRecord {
  id: string;
  input: JobInput;
  options: ConversionOptions;
  paths: JobPaths;
  status: JobStatus;
  queuedAt: number;
  startedAt: number | null;
  finishedAt: number | null;
  message: string | null;
  published: PublishInfo | null;
}

export function createJobRecord(params: {
  id: string;
  input: JobInput;
  options: ConversionOptions;
  paths: JobPaths;
  queuedAt?: number;
}): JobRecord {
  return {
    id: params.id,
    input: params.input,
    options: params.options,
    paths: params.paths,
    status: 'queued',
    queuedAt: params.queuedAt ?? Date.now() / 1000,
    startedAt: null,
    finishedAt: null,
    message: null,
    published: null,
  };
}

// canTransition.declaration()
export function canTransition(from: JobStatus, to: JobStatus): boolean {
  if (from === to) return true;

  switch (from) {
    case 'queued':
      // queued -> processing, or canceled before any worker picked it up
      return to === 'processing' || to === 'canceled';
    case 'processing':
      return to === 'succeeded' || to === 'failed';
    case 'succeeded':
    case 'failed':
    case 'canceled':
      return false;
    default:
      return false;
  }
}

export function assertTransition(from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(`Invalid job status transition: ${from} -> ${to}`);
  }
}

export function isTerminal(status: JobStatus): boolean {
  return status === 'succeeded' || status === 'failed' || status === 'canceled';
}

export function toStatusFile(job: JobRecord): JobStatusFile {
  const file: JobStatusFile = {
    task_id: job.id,
    status: job.status,
    queued_at: job.queuedAt,
    started_at: job.startedAt,
    finished_at: job.finishedAt,
    message: job.message,
  };
  if (job.published) {
    file.published = job.published;
  }
  return file;
}

function toIso(seconds: number | null): string | null {
  return seconds === null ? null : new Date(seconds * 1000).toISOString();
}

export function statusFileToDto(file: JobStatusFile): JobStatusDto {
  return {
    taskId: file.task_id,
    status: file.status,
    queuedAt: new Date(file.queued_at * 1000).toISOString(),
    startedAt: toIso(file.started_at),
    finishedAt: toIso(file.finished_at),
    message: file.message,
    published: file.published ?? null,
  };
}
