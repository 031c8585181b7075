// packages/conversion-backend/src/application/publish-job.ts
//
// Manual publish of a succeeded job's artifacts through the configured
// publisher. Tracked jobs are updated through the queue; older jobs only
// exist on disk and get their status file rewritten.
import { type PublishInfo, ValidationError } from '@docuqueue/contracts';

import { getJobPaths, isValidJobId, loadStatus, saveStatus } from '../infrastructure/job-storage.js';
import { logger } from '../infrastructure/logger.js';
import type { Publisher } from '../infrastructure/publisher.js';
import type { JobQueue } from './job-queue.js';

export interface PublishJobDeps {
  queue: Pick<JobQueue, 'get' | 'recordPublished'>;
  publisher: Publisher;
  storageRoot: string;
}

// publishJob.declaration()
export async function publishJob(jobId: string, deps: PublishJobDeps): Promise<PublishInfo> {
  if (!isValidJobId(jobId)) {
    throw new ValidationError('Invalid task id', 'invalid_task_id');
  }

  const tracked = deps.queue.get(jobId);
  if (tracked) {
    if (tracked.status !== 'succeeded') {
      throw new ValidationError('Task has not succeeded', 'task_not_ready');
    }
    const published = await deps.publisher.publish(jobId, tracked.paths);
    await deps.queue.recordPublished(tracked, published);
    logger.info('Job published', { jobId, backend: published.backend });
    return published;
  }

  const persisted = await loadStatus(deps.storageRoot, jobId);
  if (!persisted || persisted.status !== 'succeeded') {
    throw new ValidationError('Task has not succeeded', 'task_not_ready');
  }
  const paths = await getJobPaths(deps.storageRoot, jobId);
  const published = await deps.publisher.publish(jobId, paths);
  await saveStatus(paths, { ...persisted, published });
  logger.info('Job published', { jobId, backend: published.backend });
  return published;
}
