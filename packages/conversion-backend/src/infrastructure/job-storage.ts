// packages/conversion-backend/src/infrastructure/job-storage.ts
//
// Per-job directory layout on local disk:
//   <root>/<jobId>/input.<ext>
//   <root>/<jobId>/job_status.json
//   <root>/<jobId>/output/{full.md,layout.json,images/}
//   <root>/<jobId>/result.zip
import { createWriteStream } from 'node:fs';
import { mkdir, readdir, rename, rm, stat } from 'node:fs/promises';
import path from 'node:path';

import archiver from 'archiver';
import { z } from 'zod';

import { type JobStatusFile, PathTraversalError } from '@docuqueue/contracts';
import { readJsonFile, writeJsonAtomic } from '@docuqueue/shared-infrastructure';

import { logger } from './logger.js';

export const STATUS_FILE = 'job_status.json';

const SAFE_INPUT_EXTENSIONS = ['.pdf', '.png', '.jpg', '.jpeg'] as const;
const JOB_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface JobPaths {
  root: string;
  inputFile: string;
  outputDir: string;
  imagesDir: string;
  mdFile: string;
  jsonFile: string;
  zipFile: string;
}

export function isValidJobId(jobId: string): boolean {
  return JOB_ID_PATTERN.test(jobId);
}

/**
 * Resolve `target` and make sure it stays under `root`.
 */
export function resolveInsideRoot(root: string, target: string): string {
  const resolvedRoot = path.resolve(root);
  const resolved = path.resolve(resolvedRoot, target);
  const relative = path.relative(resolvedRoot, resolved);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PathTraversalError(target);
  }
  return resolved;
}

/**
 * Keep only the base name of an engine- or user-supplied file name.
 */
export function sanitizeFileName(name: string): string {
  const base = path.posix.basename(name.replaceAll('\\', '/'));
  return base === '.' || base === '..' ? '' : base;
}

function inputExtension(fileName: string): string {
  const ext = path.extname(fileName).toLowerCase();
  return SAFE_INPUT_EXTENSIONS.find((safe) => safe === ext) ?? '.pdf';
}

function buildPaths(root: string, inputFile: string): JobPaths {
  const outputDir = path.join(root, 'output');
  return {
    root,
    inputFile,
    outputDir,
    imagesDir: path.join(outputDir, 'images'),
    mdFile: path.join(outputDir, 'full.md'),
    jsonFile: path.join(outputDir, 'layout.json'),
    zipFile: path.join(root, 'result.zip'),
  };
}

export async function createJobPaths(
  storageRoot: string,
  jobId: string,
  fileName: string,
): Promise<JobPaths> {
  const root = resolveInsideRoot(storageRoot, jobId);
  const paths = buildPaths(root, path.join(root, `input${inputExtension(fileName)}`));
  await mkdir(paths.imagesDir, { recursive: true });
  return paths;
}

/**
 * Paths of an existing job. The input file is whichever allowed extension exists.
 */
export async function getJobPaths(storageRoot: string, jobId: string): Promise<JobPaths> {
  const root = resolveInsideRoot(storageRoot, jobId);
  for (const ext of SAFE_INPUT_EXTENSIONS) {
    const candidate = path.join(root, `input${ext}`);
    if (await exists(candidate)) {
      return buildPaths(root, candidate);
    }
  }
  return buildPaths(root, path.join(root, 'input.pdf'));
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

const jobStatusFileSchema = z.object({
  task_id: z.string(),
  status: z.enum(['queued', 'processing', 'succeeded', 'failed', 'canceled']),
  queued_at: z.number(),
  started_at: z.number().nullable(),
  finished_at: z.number().nullable(),
  message: z.string().nullable(),
  published: z
    .object({
      backend: z.enum(['local', 'remote']),
      mdUrl: z.string(),
      jsonUrl: z.string(),
      zipUrl: z.string(),
      imagesUrlPrefix: z.string(),
    })
    .optional(),
});

export async function saveStatus(paths: JobPaths, status: JobStatusFile): Promise<void> {
  await writeJsonAtomic(path.join(paths.root, STATUS_FILE), status);
}

/**
 * Reads a job's status snapshot. Absent or unreadable files mean the job was
 * never created or has been purged.
 */
export async function loadStatus(storageRoot: string, jobId: string): Promise<JobStatusFile | null> {
  if (!isValidJobId(jobId)) return null;
  const file = path.join(resolveInsideRoot(storageRoot, jobId), STATUS_FILE);
  try {
    const parsed = jobStatusFileSchema.safeParse(await readJsonFile(file));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    logger.warn('Unreadable job status file', { jobId, error: String(error) });
    return null;
  }
}

/**
 * Zip the output directory so that its contents (full.md, layout.json,
 * images/) sit at the archive root.
 */
export async function packArchive(paths: JobPaths): Promise<string> {
  const tmpFile = `${paths.zipFile}.tmp`;
  await rm(tmpFile, { force: true });

  const output = createWriteStream(tmpFile);
  const archive = archiver('zip', { zlib: { level: 9 } });
  const closed = new Promise<void>((resolve, reject) => {
    output.on('close', () => resolve());
    output.on('error', reject);
    archive.on('error', reject);
  });

  archive.pipe(output);
  archive.directory(paths.outputDir, false);
  await archive.finalize();
  await closed;

  await rename(tmpFile, paths.zipFile);
  return paths.zipFile;
}

export async function removeJob(storageRoot: string, jobId: string): Promise<void> {
  await rm(resolveInsideRoot(storageRoot, jobId), { recursive: true, force: true });
}

/**
 * Retention sweep: keep the `maxRetention` most recently modified job
 * directories and delete the rest. Returns the removed job ids.
 */
export async function cleanupOldJobs(storageRoot: string, maxRetention: number): Promise<string[]> {
  await mkdir(storageRoot, { recursive: true });
  const entries = await readdir(storageRoot, { withFileTypes: true });
  const dirs = await Promise.all(
    entries
      .filter((entry) => entry.isDirectory() && entry.name !== 'tmp')
      .map(async (entry) => {
        const info = await stat(path.join(storageRoot, entry.name));
        return { name: entry.name, mtimeMs: info.mtimeMs };
      }),
  );

  dirs.sort((a, b) => b.mtimeMs - a.mtimeMs);
  const stale = dirs.slice(Math.max(0, maxRetention));
  for (const dir of stale) {
    await rm(path.join(storageRoot, dir.name), { recursive: true, force: true });
  }

  if (stale.length > 0) {
    logger.info('Removed expired job directories', {
      event: 'retention_sweep',
      removed: stale.length,
    });
  }
  return stale.map((dir) => dir.name);
}
