export type JobStatus = 'queued' | 'processing' | 'succeeded' | 'failed' | 'canceled';

export type ResultKind = 'markdown' | 'json' | 'archive';

export type PublishBackend = 'local' | 'remote';

export interface PublishInfo {
  backend: PublishBackend;
  mdUrl: string;
  jsonUrl: string;
  zipUrl: string;
  imagesUrlPrefix: string;
}

/**
 * Shape of `job_status.json` under each job root. Timestamps are epoch seconds.
 */
export interface JobStatusFile {
  task_id: string;
  status: JobStatus;
  queued_at: number;
  started_at: number | null;
  finished_at: number | null;
  message: string | null;
  published?: PublishInfo;
}

export interface JobStatusDto {
  taskId: string;
  status: JobStatus;
  queuedAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  message: string | null;
  published: PublishInfo | null;
}

/**
 * Persisted download token, keyed by `token` in the token store file.
 * `expire_at` is epoch seconds.
 */
export interface TokenRecord {
  token: string;
  backend: PublishBackend;
  task_id: string;
  kind: ResultKind;
  object_key?: string;
  file_path?: string;
  max_downloads: number;
  remain: number;
  expire_at: number;
}

export type DownloadDelivery =
  | { type: 'redirect'; url: string }
  | { type: 'file'; path: string };

export interface ErrorDescription {
  kind: string;
  message: string;
}

export * from './errors.js';
