import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { Readable } from 'node:stream';

import { PublishError } from '@docuqueue/contracts';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createJobPaths, type JobPaths } from '../src/infrastructure/job-storage.js';
import {
  artifactPath,
  createPublisher,
  LocalPublisher,
  RemotePublisher,
} from '../src/infrastructure/publisher.js';
import type { FileUploadResult, RemoteObjectStore } from '../src/infrastructure/s3-storage-adapter.js';

vi.mock('../src/infrastructure/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/infrastructure/logger.js')>();
  return {
    ...actual,
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  };
});

const JOB_ID = '1a2b3c4d-1111-4222-8333-444455556666';

class RecordingStore implements RemoteObjectStore {
  readonly uploads: Array<{ key: string; body: string; mimeType: string }> = [];

  async uploadFile(key: string, content: Readable | Buffer, mimeType: string): Promise<FileUploadResult> {
    let body: string;
    if (Buffer.isBuffer(content)) {
      body = content.toString('utf8');
    } else {
      const chunks: Buffer[] = [];
      for await (const chunk of content) {
        chunks.push(Buffer.from(chunk));
      }
      body = Buffer.concat(chunks).toString('utf8');
    }
    this.uploads.push({ key, body, mimeType });
    return { key: `results/${key}` };
  }

  async generatePresignedUrl(key: string, expiresIn = 3600): Promise<string> {
    return `https://objects.test/${key}?expires=${expiresIn}`;
  }
}

describe('infrastructure/publisher', () => {
  let root: string;
  let paths: JobPaths;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'docuqueue-publish-'));
    paths = await createJobPaths(root, JOB_ID, 'doc.pdf');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('maps result kinds to artifact files', () => {
    expect(artifactPath(paths, 'markdown')).toBe(paths.mdFile);
    expect(artifactPath(paths, 'json')).toBe(paths.jsonFile);
    expect(artifactPath(paths, 'archive')).toBe(paths.zipFile);
  });

  it('returns service-relative URLs for local publishing', async () => {
    const info = await new LocalPublisher().publish(JOB_ID);
    expect(info).toEqual({
      backend: 'local',
      mdUrl: `/v1/tasks/${JOB_ID}/result.md`,
      jsonUrl: `/v1/tasks/${JOB_ID}/result.json`,
      zipUrl: `/v1/tasks/${JOB_ID}/download.zip`,
      imagesUrlPrefix: `/v1/tasks/${JOB_ID}/result-images`,
    });
  });

  it('uploads existing artifacts and images and signs their keys', async () => {
    await writeFile(paths.mdFile, '# Heading');
    await writeFile(paths.zipFile, 'zip-bytes');
    await writeFile(path.join(paths.imagesDir, 'fig.png'), 'png-bytes');
    const store = new RecordingStore();
    const publisher = new RemotePublisher(store, {
      bucket: 'docs',
      prefix: 'results/',
      signExpireSeconds: 90,
    });

    const info = await publisher.publish(JOB_ID, paths);

    expect(store.uploads).toEqual([
      { key: `${JOB_ID}/full.md`, body: '# Heading', mimeType: 'text/markdown; charset=utf-8' },
      { key: `${JOB_ID}/result.zip`, body: 'zip-bytes', mimeType: 'application/zip' },
      { key: `${JOB_ID}/images/fig.png`, body: 'png-bytes', mimeType: 'image/png' },
    ]);
    expect(info).toEqual({
      backend: 'remote',
      mdUrl: `https://objects.test/results/${JOB_ID}/full.md?expires=90`,
      jsonUrl: '',
      zipUrl: `https://objects.test/results/${JOB_ID}/result.zip?expires=90`,
      imagesUrlPrefix: `s3://docs/results/${JOB_ID}/images/`,
    });
  });

  it('builds relative keys per artifact kind', () => {
    expect(RemotePublisher.relativeKey(JOB_ID, 'json')).toBe(`${JOB_ID}/layout.json`);
  });

  it('requires a store for remote publishing', () => {
    expect(() => createPublisher('remote', { store: null, prefix: '', signExpireSeconds: 60 })).toThrow(
      PublishError,
    );
    expect(createPublisher('local', { store: null, prefix: '', signExpireSeconds: 60 })).toBeInstanceOf(
      LocalPublisher,
    );
    expect(
      createPublisher('remote', {
        store: new RecordingStore(),
        bucket: 'docs',
        prefix: '',
        signExpireSeconds: 60,
      }),
    ).toBeInstanceOf(RemotePublisher);
  });
});
