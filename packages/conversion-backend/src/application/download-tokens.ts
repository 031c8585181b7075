// packages/conversion-backend/src/application/download-tokens.ts
//
// Issue and redeem capability tokens for a finished job's artifacts.
// - local backend: the token carries the artifact's path under the job root.
// - remote backend: the token carries the object key; redemption presigns a fresh URL.
import {
  type DownloadDelivery,
  type PublishBackend,
  type ResultKind,
  TokenNotFoundError,
  ValidationError,
} from '@docuqueue/contracts';

import { exists, getJobPaths, isValidJobId, loadStatus } from '../infrastructure/job-storage.js';
import { logger } from '../infrastructure/logger.js';
import { artifactPath, RemotePublisher } from '../infrastructure/publisher.js';
import type { TokenStore } from '../infrastructure/token-store.js';

export interface IssueDownloadTokenRequest {
  jobId: string;
  kind: ResultKind;
  maxUses?: number;
  ttlSeconds?: number;
}

export interface IssueDownloadTokenResponse {
  token: string;
  url: string;
  expireAt: number;
  maxDownloads: number;
}

export interface DownloadTokenDeps {
  tokens: Pick<TokenStore, 'createToken' | 'consume'>;
  storageRoot: string;
  backend: PublishBackend;
  /** Maps a prefix-relative object key to the full key in the bucket. */
  objectKeyFor?: (relativeKey: string) => string;
}

// issueDownloadToken.declaration()
export async function issueDownloadToken(
  req: IssueDownloadTokenRequest,
  deps: DownloadTokenDeps,
): Promise<IssueDownloadTokenResponse> {
  if (!isValidJobId(req.jobId)) {
    throw new ValidationError('Invalid task id', 'invalid_task_id');
  }

  const status = await loadStatus(deps.storageRoot, req.jobId);
  if (!status || status.status !== 'succeeded') {
    throw new ValidationError('Task has not succeeded', 'task_not_ready');
  }

  let locator: { filePath: string } | { objectKey: string };
  if (deps.backend === 'remote') {
    if (status.published?.backend !== 'remote') {
      throw new ValidationError('Task results have not been published', 'not_published');
    }
    const relativeKey = RemotePublisher.relativeKey(req.jobId, req.kind);
    locator = { objectKey: deps.objectKeyFor ? deps.objectKeyFor(relativeKey) : relativeKey };
  } else {
    const paths = await getJobPaths(deps.storageRoot, req.jobId);
    const filePath = artifactPath(paths, req.kind);
    if (!(await exists(filePath))) {
      throw new ValidationError(`No ${req.kind} result for this task`, 'artifact_missing');
    }
    locator = { filePath };
  }

  const record = await deps.tokens.createToken({
    jobId: req.jobId,
    kind: req.kind,
    maxUses: req.maxUses,
    ttlSeconds: req.ttlSeconds,
    ...locator,
  });

  logger.info('Download token issued', {
    jobId: req.jobId,
    kind: req.kind,
    maxDownloads: record.max_downloads,
  });

  return {
    token: record.token,
    url: `/v1/download/${record.token}`,
    expireAt: record.expire_at,
    maxDownloads: record.max_downloads,
  };
}

// redeemDownloadToken.declaration()
export async function redeemDownloadToken(
  token: string,
  deps: Pick<DownloadTokenDeps, 'tokens'>,
): Promise<DownloadDelivery> {
  const consumed = await deps.tokens.consume(token);
  if (!consumed) {
    throw new TokenNotFoundError();
  }
  return consumed.delivery;
}
