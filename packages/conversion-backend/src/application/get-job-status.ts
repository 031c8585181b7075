// packages/conversion-backend/src/application/get-job-status.ts
// Application service for fetching job status by ID.
// Jobs still tracked by this process answer from memory; anything older is
// read back from its job_status.json.
import type { JobStatusDto } from '@docuqueue/contracts';

import { statusFileToDto, toStatusFile } from '../domain/job-model.js';
import { isValidJobId, loadStatus } from '../infrastructure/job-storage.js';
import type { JobQueue } from './job-queue.js';

export type GetJobStatusResponse = JobStatusDto;

export interface GetJobStatusDeps {
  queue: Pick<JobQueue, 'get'>;
  storageRoot: string;
}

// getJobStatus.declaration()
export async function getJobStatus(
  jobId: string,
  deps: GetJobStatusDeps,
): Promise<GetJobStatusResponse | null> {
  if (!jobId || !isValidJobId(jobId)) return null;

  const tracked = deps.queue.get(jobId);
  if (tracked) {
    return statusFileToDto(toStatusFile(tracked));
  }

  const persisted = await loadStatus(deps.storageRoot, jobId);
  return persisted ? statusFileToDto(persisted) : null;
}
