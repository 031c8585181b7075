import { mkdtemp, mkdir, readFile, rm, stat, utimes, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  cleanupOldJobs,
  createJobPaths,
  getJobPaths,
  isValidJobId,
  loadStatus,
  packArchive,
  resolveInsideRoot,
  sanitizeFileName,
  saveStatus,
} from '../src/infrastructure/job-storage.js';

vi.mock('../src/infrastructure/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

const JOB_ID = '3f1c2a4e-8b7d-4c6e-9a10-1234567890ab';

describe('infrastructure/job-storage', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'docuqueue-storage-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('validates job ids as UUIDs', () => {
    expect(isValidJobId(JOB_ID)).toBe(true);
    expect(isValidJobId('../etc')).toBe(false);
    expect(isValidJobId('')).toBe(false);
  });

  it('keeps resolved paths under the root', () => {
    expect(resolveInsideRoot('/srv/jobs', 'a/b.md')).toBe(path.resolve('/srv/jobs/a/b.md'));
    expect(() => resolveInsideRoot('/srv/jobs', '../secret')).toThrow('path traversal');
    expect(() => resolveInsideRoot('/srv/jobs', '/etc/passwd')).toThrow('path traversal');
    expect(() => resolveInsideRoot('/srv/jobs', '.')).toThrow('path traversal');
  });

  it('sanitizes engine-provided names to their base name', () => {
    expect(sanitizeFileName('images/page_1.jpg')).toBe('page_1.jpg');
    expect(sanitizeFileName('..\\..\\evil.png')).toBe('evil.png');
    expect(sanitizeFileName('../')).toBe('');
    expect(sanitizeFileName('/abs/path/x.png')).toBe('x.png');
  });

  it('lays out job directories and picks a safe input extension', async () => {
    const pdfPaths = await createJobPaths(root, JOB_ID, 'Report.PDF');
    expect(pdfPaths.inputFile).toBe(path.join(root, JOB_ID, 'input.pdf'));
    expect(pdfPaths.mdFile).toBe(path.join(root, JOB_ID, 'output', 'full.md'));
    expect(pdfPaths.jsonFile).toBe(path.join(root, JOB_ID, 'output', 'layout.json'));
    expect(pdfPaths.zipFile).toBe(path.join(root, JOB_ID, 'result.zip'));
    expect((await stat(pdfPaths.imagesDir)).isDirectory()).toBe(true);

    const other = await createJobPaths(root, 'b0000000-0000-4000-8000-000000000000', 'run.sh');
    expect(path.basename(other.inputFile)).toBe('input.pdf');
  });

  it('finds an existing input by extension', async () => {
    const created = await createJobPaths(root, JOB_ID, 'scan.png');
    await writeFile(created.inputFile, 'png');
    const found = await getJobPaths(root, JOB_ID);
    expect(found.inputFile).toBe(path.join(root, JOB_ID, 'input.png'));
  });

  it('round-trips status files and ignores invalid ones', async () => {
    const paths = await createJobPaths(root, JOB_ID, 'doc.pdf');
    await saveStatus(paths, {
      task_id: JOB_ID,
      status: 'queued',
      queued_at: 100,
      started_at: null,
      finished_at: null,
      message: null,
    });

    const loaded = await loadStatus(root, JOB_ID);
    expect(loaded?.status).toBe('queued');
    expect(loaded?.queued_at).toBe(100);

    await writeFile(path.join(paths.root, 'job_status.json'), '{"task_id": 1}');
    expect(await loadStatus(root, JOB_ID)).toBeNull();
    expect(await loadStatus(root, 'not-a-uuid')).toBeNull();
    expect(await loadStatus(root, 'c0000000-0000-4000-8000-000000000000')).toBeNull();
  });

  it('packs the output directory contents at the archive root', async () => {
    const paths = await createJobPaths(root, JOB_ID, 'doc.pdf');
    await writeFile(paths.mdFile, '# Title');
    await writeFile(paths.jsonFile, '{"pages":[]}');
    await writeFile(path.join(paths.imagesDir, 'fig.png'), 'img');

    const zipFile = await packArchive(paths);
    expect(zipFile).toBe(paths.zipFile);

    const bytes = await readFile(zipFile);
    // local file header signature
    expect(bytes.readUInt32LE(0)).toBe(0x04034b50);
    const listing = bytes.toString('latin1');
    expect(listing).toContain('full.md');
    expect(listing).toContain('images/fig.png');
    expect(listing).not.toContain('output/');
    expect(listing).not.toContain(JOB_ID);
  });

  it('retains only the most recent job directories', async () => {
    const names = ['old', 'mid', 'new'];
    for (const [index, name] of names.entries()) {
      const dir = path.join(root, name);
      await mkdir(dir);
      const time = new Date(Date.UTC(2024, 0, index + 1));
      await utimes(dir, time, time);
    }
    await mkdir(path.join(root, 'tmp'));

    const removed = await cleanupOldJobs(root, 2);
    expect(removed).toEqual(['old']);
    await expect(stat(path.join(root, 'mid'))).resolves.toBeDefined();
    await expect(stat(path.join(root, 'tmp'))).resolves.toBeDefined();
    await expect(stat(path.join(root, 'old'))).rejects.toThrow();
  });
});
