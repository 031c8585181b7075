// packages/conversion-backend/src/infrastructure/publisher.ts
//
// Makes a finished job's artifacts reachable:
// - local: service-relative download URLs (files stay under the job root)
// - remote: upload to the S3-compatible store and hand out signed URLs
import { createReadStream } from 'node:fs';
import { readdir } from 'node:fs/promises';
import path from 'node:path';

import mime from 'mime-types';

import { type PublishInfo, PublishError, type ResultKind } from '@docuqueue/contracts';

import type { JobPaths } from './job-storage.js';
import { exists } from './job-storage.js';
import { logger } from './logger.js';
import type { RemoteObjectStore } from './s3-storage-adapter.js';

const ARTIFACT_NAMES: Record<ResultKind, string> = {
  markdown: 'full.md',
  json: 'layout.json',
  archive: 'result.zip',
};

export interface Publisher {
  readonly backend: PublishInfo['backend'];
  publish(jobId: string, paths: JobPaths): Promise<PublishInfo>;
}

export function artifactPath(paths: JobPaths, kind: ResultKind): string {
  switch (kind) {
    case 'markdown':
      return paths.mdFile;
    case 'json':
      return paths.jsonFile;
    case 'archive':
      return paths.zipFile;
  }
}

export class LocalPublisher implements Publisher {
  readonly backend = 'local' as const;

  async publish(jobId: string): Promise<PublishInfo> {
    const base = `/v1/tasks/${jobId}`;
    return {
      backend: 'local',
      mdUrl: `${base}/result.md`,
      jsonUrl: `${base}/result.json`,
      zipUrl: `${base}/download.zip`,
      imagesUrlPrefix: `${base}/result-images`,
    };
  }
}

export class RemotePublisher implements Publisher {
  readonly backend = 'remote' as const;

  constructor(
    private readonly store: RemoteObjectStore,
    private readonly options: { bucket: string; prefix: string; signExpireSeconds: number },
  ) {}

  /** Store key of an artifact relative to the adapter's configured prefix. */
  static relativeKey(jobId: string, kind: ResultKind): string {
    return `${jobId}/${ARTIFACT_NAMES[kind]}`;
  }

  async publish(jobId: string, paths: JobPaths): Promise<PublishInfo> {
    const urls: Record<ResultKind, string> = { markdown: '', json: '', archive: '' };

    for (const kind of ['markdown', 'json', 'archive'] as const) {
      const file = artifactPath(paths, kind);
      if (!(await exists(file))) continue;
      const { key } = await this.store.uploadFile(
        RemotePublisher.relativeKey(jobId, kind),
        createReadStream(file),
        contentTypeFor(file),
      );
      urls[kind] = await this.store.generatePresignedUrl(key, this.options.signExpireSeconds);
    }

    if (await exists(paths.imagesDir)) {
      const images = await readdir(paths.imagesDir, { withFileTypes: true });
      for (const image of images.filter((entry) => entry.isFile())) {
        const file = path.join(paths.imagesDir, image.name);
        await this.store.uploadFile(
          `${jobId}/images/${image.name}`,
          createReadStream(file),
          contentTypeFor(file),
        );
      }
    }

    const prefix = this.options.prefix.replace(/\/+$/, '');
    logger.info('Published job artifacts', { jobId, component: 'publisher', backend: 'remote' });
    return {
      backend: 'remote',
      mdUrl: urls.markdown,
      jsonUrl: urls.json,
      zipUrl: urls.archive,
      imagesUrlPrefix: `s3://${this.options.bucket}/${prefix ? `${prefix}/` : ''}${jobId}/images/`,
    };
  }
}

function contentTypeFor(file: string): string {
  const type = mime.lookup(file);
  if (!type) return 'application/octet-stream';
  return type === 'text/markdown' ? 'text/markdown; charset=utf-8' : type;
}

export function createPublisher(
  backend: PublishInfo['backend'],
  remote: {
    store: RemoteObjectStore | null;
    bucket?: string;
    prefix: string;
    signExpireSeconds: number;
  },
): Publisher {
  if (backend === 'local') return new LocalPublisher();
  if (!remote.store || !remote.bucket) {
    throw new PublishError('Remote publishing requires a configured object store');
  }
  return new RemotePublisher(remote.store, {
    bucket: remote.bucket,
    prefix: remote.prefix,
    signExpireSeconds: remote.signExpireSeconds,
  });
}
