import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { PathTraversalError } from '@docuqueue/contracts';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { getJobResultFile } from '../src/application/get-job-result.js';
import { createJobPaths, type JobPaths, saveStatus } from '../src/infrastructure/job-storage.js';

const JOB_ID = 'ffffffff-6666-4666-8666-666666666666';

describe('application/get-job-result', () => {
  let root: string;
  let paths: JobPaths;
  const queue = { get: () => undefined };

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'docuqueue-result-'));
    paths = await createJobPaths(root, JOB_ID, 'doc.pdf');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function writeStatus(status: 'succeeded' | 'failed'): Promise<void> {
    await saveStatus(paths, {
      task_id: JOB_ID,
      status,
      queued_at: 1,
      started_at: 2,
      finished_at: 3,
      message: null,
    });
  }

  it('resolves artifacts and images of a succeeded job', async () => {
    await writeStatus('succeeded');
    await writeFile(paths.mdFile, '# Result');
    await writeFile(path.join(paths.imagesDir, 'fig.png'), 'png');

    const deps = { queue, storageRoot: root };
    expect(await getJobResultFile(JOB_ID, { kind: 'markdown' }, deps)).toBe(paths.mdFile);
    expect(await getJobResultFile(JOB_ID, { image: 'fig.png' }, deps)).toBe(
      path.join(paths.imagesDir, 'fig.png'),
    );
    expect(await getJobResultFile(JOB_ID, { kind: 'archive' }, deps)).toBeNull();
  });

  it('serves nothing for unfinished, failed or unknown jobs', async () => {
    const deps = { queue, storageRoot: root };
    await writeFile(paths.mdFile, '# Partial');

    expect(await getJobResultFile(JOB_ID, { kind: 'markdown' }, deps)).toBeNull();
    await writeStatus('failed');
    expect(await getJobResultFile(JOB_ID, { kind: 'markdown' }, deps)).toBeNull();
    expect(await getJobResultFile('not-a-uuid', { kind: 'markdown' }, deps)).toBeNull();
  });

  it('keeps image lookups inside the images directory', async () => {
    await writeStatus('succeeded');

    await expect(
      getJobResultFile(JOB_ID, { image: '../job_status.json' }, { queue, storageRoot: root }),
    ).rejects.toThrow(PathTraversalError);
  });
});
