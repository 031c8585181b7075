// packages/conversion-backend/src/infrastructure/token-store.ts
//
// Limited-use, time-boxed download tokens persisted as one JSON map keyed by
// token string. Every read-modify-persist cycle runs inside an exclusive
// section so two consumers can never both observe the last remaining use.
import { randomBytes } from 'node:crypto';

import { z } from 'zod';

import {
  type DownloadDelivery,
  type PublishBackend,
  PublishError,
  type ResultKind,
  type TokenRecord,
} from '@docuqueue/contracts';
import { readJsonFile, writeJsonAtomic } from '@docuqueue/shared-infrastructure';

import { resolveInsideRoot } from './job-storage.js';
import { errorMessage, logger } from './logger.js';

const tokenRecordSchema = z.object({
  token: z.string(),
  backend: z.enum(['local', 'remote']),
  task_id: z.string(),
  kind: z.enum(['markdown', 'json', 'archive']),
  object_key: z.string().optional(),
  file_path: z.string().optional(),
  max_downloads: z.number().int(),
  remain: z.number().int(),
  expire_at: z.number(),
});

const tokenTableSchema = z.record(tokenRecordSchema);

export interface TokenStoreOptions {
  storePath: string;
  /** Local deliveries must resolve under this directory. */
  storageRoot: string;
  backend: PublishBackend;
  defaultTtlSeconds: number;
  signExpireSeconds: number;
}

export interface TokenStoreDeps {
  /** Presigns a GET for an object key; required for remote tokens. */
  signUrl?: (objectKey: string, expiresIn: number) => Promise<string>;
  /** Milliseconds clock. */
  now?: () => number;
  generateToken?: () => string;
}

export interface CreateTokenInput {
  jobId: string;
  kind: ResultKind;
  filePath?: string;
  objectKey?: string;
  maxUses?: number;
  ttlSeconds?: number;
}

export interface ConsumedToken {
  record: TokenRecord;
  delivery: DownloadDelivery;
}

export class TokenStore {
  private table = new Map<string, TokenRecord>();
  private queue: Promise<void> = Promise.resolve();
  private readonly now: () => number;
  private readonly generateToken: () => string;

  constructor(
    private readonly options: TokenStoreOptions,
    private readonly deps: TokenStoreDeps = {},
  ) {
    this.now = deps.now ?? Date.now;
    this.generateToken = deps.generateToken ?? (() => randomBytes(24).toString('base64url'));
  }

  /**
   * Load the persisted table. A missing file starts empty; an unreadable one
   * is discarded with a warning.
   */
  async load(): Promise<void> {
    await this.exclusive(async () => {
      let raw: unknown;
      try {
        raw = await readJsonFile(this.options.storePath);
      } catch (error) {
        logger.warn('Token store unreadable, starting empty', {
          component: 'token-store',
          error: errorMessage(error),
        });
        this.table = new Map();
        return;
      }
      if (raw === null) {
        this.table = new Map();
        return;
      }
      const parsed = tokenTableSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn('Token store has an invalid shape, starting empty', {
          component: 'token-store',
        });
        this.table = new Map();
        return;
      }
      this.table = new Map(Object.entries(parsed.data));
    });
  }

  async createToken(input: CreateTokenInput): Promise<TokenRecord> {
    const maxUses = Math.max(1, input.maxUses ?? 1);
    const ttlSeconds = Math.max(0, input.ttlSeconds ?? this.options.defaultTtlSeconds);
    const record: TokenRecord = {
      token: this.generateToken(),
      backend: this.options.backend,
      task_id: input.jobId,
      kind: input.kind,
      max_downloads: maxUses,
      remain: maxUses,
      expire_at: this.nowSeconds() + ttlSeconds,
    };
    if (input.objectKey !== undefined) record.object_key = input.objectKey;
    if (input.filePath !== undefined) record.file_path = input.filePath;

    return this.exclusive(async () => {
      this.table.set(record.token, record);
      await this.persist();
      return { ...record };
    });
  }

  /**
   * Spend one use. Returns null for unknown or dead tokens (dead ones are purged).
   * The returned record reflects the state after the decrement.
   */
  async consume(token: string): Promise<ConsumedToken | null> {
    return this.exclusive(async () => {
      const current = this.table.get(token);
      if (!current) return null;

      if (this.isDead(current)) {
        this.table.delete(token);
        await this.persist();
        return null;
      }

      const delivery = await this.deliveryFor(current);
      const record: TokenRecord = { ...current, remain: current.remain - 1 };
      this.table.set(token, record);
      await this.persist();
      return { record: { ...record }, delivery };
    });
  }

  /**
   * Drop every expired or spent token. Returns how many were removed.
   */
  async purgeDead(): Promise<number> {
    return this.exclusive(async () => {
      const dead = [...this.table.values()].filter((record) => this.isDead(record));
      for (const record of dead) {
        this.table.delete(record.token);
      }
      if (dead.length > 0) {
        await this.persist();
      }
      return dead.length;
    });
  }

  size(): number {
    return this.table.size;
  }

  private isDead(record: TokenRecord): boolean {
    return record.remain <= 0 || this.nowSeconds() >= record.expire_at;
  }

  private async deliveryFor(record: TokenRecord): Promise<DownloadDelivery> {
    if (record.backend === 'remote') {
      if (!record.object_key || !this.deps.signUrl) {
        throw new PublishError('Remote token cannot be signed');
      }
      const url = await this.deps.signUrl(record.object_key, this.options.signExpireSeconds);
      return { type: 'redirect', url };
    }
    if (!record.file_path) {
      throw new PublishError('Local token has no file path');
    }
    return { type: 'file', path: resolveInsideRoot(this.options.storageRoot, record.file_path) };
  }

  private nowSeconds(): number {
    return this.now() / 1000;
  }

  private async persist(): Promise<void> {
    await writeJsonAtomic(this.options.storePath, Object.fromEntries(this.table));
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
