// packages/conversion-backend/src/domain/job-events.ts
//
// In-memory event bus broadcasting job lifecycle updates.
// Singleton EventEmitter so all publishers/subscribers share the same bus.

import { EventEmitter } from 'node:events';

import type { JobRecord } from './job-model.js';

export type JobEventType = 'job_created' | 'job_state_changed';

export interface JobEvent {
  type: JobEventType;
  job: JobRecord;
}

const jobEventEmitter = new EventEmitter();
jobEventEmitter.setMaxListeners(0);

export function publishJobEvent(event: JobEvent): void {
  jobEventEmitter.emit(event.type, event);
}

export function subscribeJobEvents(
  listener: (event: JobEvent) => void,
  options?: { jobIds?: string[] },
): () => void {
  const jobIds = options?.jobIds && options.jobIds.length > 0 ? new Set(options.jobIds) : null;

  const handler = (event: JobEvent) => {
    if (jobIds && !jobIds.has(event.job.id)) return;
    listener(event);
  };

  jobEventEmitter.on('job_created', handler);
  jobEventEmitter.on('job_state_changed', handler);

  return () => {
    jobEventEmitter.off('job_created', handler);
    jobEventEmitter.off('job_state_changed', handler);
  };
}

/**
 * Resolves once the job reaches a terminal status. The snapshot is copied
 * because the worker keeps mutating the record afterwards (e.g. publishing).
 */
export function waitForJobFinished(jobId: string): Promise<JobRecord> {
  return new Promise((resolve) => {
    const unsubscribe = subscribeJobEvents(
      (event) => {
        if (event.type !== 'job_state_changed' || event.job.finishedAt === null) return;
        unsubscribe();
        resolve({ ...event.job });
      },
      { jobIds: [jobId] },
    );
  });
}
