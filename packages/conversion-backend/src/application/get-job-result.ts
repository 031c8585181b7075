// packages/conversion-backend/src/application/get-job-result.ts
// Resolves the on-disk artifact behind the links the local publisher hands out.
// Anything not servable (unknown job, unfinished job, missing file) is null.
import type { ResultKind } from '@docuqueue/contracts';

import { exists, getJobPaths, isValidJobId, loadStatus, resolveInsideRoot } from '../infrastructure/job-storage.js';
import { artifactPath } from '../infrastructure/publisher.js';
import type { JobQueue } from './job-queue.js';

export type JobResultTarget = { kind: ResultKind } | { image: string };

export interface GetJobResultDeps {
  queue: Pick<JobQueue, 'get'>;
  storageRoot: string;
}

// getJobResultFile.declaration()
export async function getJobResultFile(
  jobId: string,
  target: JobResultTarget,
  deps: GetJobResultDeps,
): Promise<string | null> {
  if (!isValidJobId(jobId)) return null;

  const tracked = deps.queue.get(jobId);
  const status = tracked ? tracked.status : (await loadStatus(deps.storageRoot, jobId))?.status;
  if (status !== 'succeeded') return null;

  const paths = tracked ? tracked.paths : await getJobPaths(deps.storageRoot, jobId);
  const filePath =
    'kind' in target ? artifactPath(paths, target.kind) : resolveInsideRoot(paths.imagesDir, target.image);
  return (await exists(filePath)) ? filePath : null;
}
