// packages/conversion-backend/src/config/env.ts
// Centralized environment-based configuration for the conversion backend.
// - Safe single-host defaults (local storage, one worker, serialized engine).
// - Remote publishing (S3-compatible) is optional and enabled via env flags.
// - Only throws when a feature is explicitly enabled but misconfigured.
import { ConfigurationError } from '@docuqueue/contracts';
import {
  readBool,
  readFloat,
  readInt,
  readList,
  readString,
} from '@docuqueue/shared-infrastructure';

export type NodeEnv = 'development' | 'test' | 'production';

export type EngineBackendKind = 'standard' | 'concurrent';

export interface ConversionBackendConfig {
  nodeEnv: NodeEnv;
  server: {
    host: string;
    port: number;
  };
  storage: {
    root: string;
    maxJobRetention: number;
  };
  queue: {
    maxQueueSize: number;
    maxWorkers: number;
    pollIntervalMs: number;
  };
  resources: {
    backend: EngineBackendKind;
    forceCpu: boolean;
    dynamicWorkers: boolean;
    memPerJobGb: number;
    reserveGpuMemGb: number;
    minSystemMemoryGb: number;
    gpuIndex: number;
    idleUnloadSeconds: number;
    loadTimeoutSeconds: number;
  };
  engine: {
    endpoint: string;
    concurrentEndpoint?: string;
    requestTimeoutMs: number;
  };
  limits: {
    maxUploadMb: number;
    maxPages: number;
    enableAutoBatch: boolean;
    batchPageSize: number;
    downloadTimeoutMs: number;
  };
  publish: {
    backend: 'local' | 'remote';
    autoPublish: boolean;
    s3: {
      endpoint?: string;
      region: string;
      bucket?: string;
      accessKeyId?: string;
      secretAccessKey?: string;
      prefix: string;
      signExpireSeconds: number;
    };
  };
  tokens: {
    storePath: string;
    defaultTtlSeconds: number;
  };
  rateLimit: {
    enabled: boolean;
    ratePerSecond: number;
    burst: number;
    exemptPaths: string[];
  };
}

const NODE_ENVS: readonly NodeEnv[] = ['development', 'test', 'production'];

function readNodeEnv(): NodeEnv {
  const value = readString('NODE_ENV', 'development');
  return NODE_ENVS.find((env) => env === value) ?? 'development';
}

// loadConfig.declaration()
export function loadConfig(): ConversionBackendConfig {
  const nodeEnv = readNodeEnv();

  // Storage
  const storageRoot = readString('STORAGE_ROOT', 'data/jobs');
  const maxJobRetention = readInt('MAX_JOB_RETENTION', 1000);

  // Queue + workers
  const maxQueueSize = Math.max(1, readInt('MAX_QUEUE_SIZE', 100));
  const maxWorkers = Math.max(1, readInt('MAX_WORKERS', 1));
  const pollIntervalMs = readInt('QUEUE_POLL_INTERVAL_MS', 500);

  // Engine backend selection
  const backendEnv = readString('ENGINE_BACKEND', 'standard');
  if (backendEnv !== 'standard' && backendEnv !== 'concurrent') {
    throw new ConfigurationError('ENGINE_BACKEND must be either "standard" or "concurrent"');
  }
  const engineEndpoint = readString('ENGINE_ENDPOINT', 'http://127.0.0.1:8001');
  const concurrentEndpoint = readString('ENGINE_CONCURRENT_ENDPOINT');
  if (backendEnv === 'concurrent' && !concurrentEndpoint) {
    throw new ConfigurationError('ENGINE_BACKEND=concurrent requires ENGINE_CONCURRENT_ENDPOINT');
  }

  // Publishing
  const publishBackendEnv = readString('PUBLISH_BACKEND', 'local');
  if (publishBackendEnv !== 'local' && publishBackendEnv !== 'remote') {
    throw new ConfigurationError('PUBLISH_BACKEND must be either "local" or "remote"');
  }
  const s3Bucket = readString('S3_BUCKET_NAME') || readString('S3_BUCKET');
  const s3AccessKeyId = readString('S3_ACCESS_KEY_ID') || readString('AWS_ACCESS_KEY_ID');
  const s3SecretAccessKey =
    readString('S3_SECRET_ACCESS_KEY') || readString('AWS_SECRET_ACCESS_KEY');
  if (publishBackendEnv === 'remote' && !(s3Bucket && s3AccessKeyId && s3SecretAccessKey)) {
    throw new ConfigurationError(
      'PUBLISH_BACKEND=remote requires S3_BUCKET_NAME and S3_ACCESS_KEY_ID/S3_SECRET_ACCESS_KEY (or AWS_ equivalents)',
    );
  }

  return {
    nodeEnv,
    server: {
      host: readString('HOST', '0.0.0.0'),
      port: readInt('PORT', 8000),
    },
    storage: {
      root: storageRoot,
      maxJobRetention,
    },
    queue: {
      maxQueueSize,
      maxWorkers,
      pollIntervalMs,
    },
    resources: {
      backend: backendEnv,
      forceCpu: readBool('FORCE_CPU', false),
      dynamicWorkers: readBool('DYNAMIC_WORKERS', true),
      memPerJobGb: readFloat('MEM_PER_JOB_GB', 8),
      reserveGpuMemGb: readFloat('RESERVE_GPU_MEM_GB', 1),
      minSystemMemoryGb: readFloat('MIN_SYSTEM_MEMORY_GB', 2),
      gpuIndex: readInt('GPU_INDEX', 0),
      idleUnloadSeconds: readInt('IDLE_UNLOAD_SECONDS', 600),
      loadTimeoutSeconds: readInt('LOAD_TIMEOUT_SECONDS', 180),
    },
    engine: {
      endpoint: engineEndpoint,
      concurrentEndpoint,
      requestTimeoutMs: readInt('ENGINE_REQUEST_TIMEOUT_MS', 30 * 60 * 1000),
    },
    limits: {
      maxUploadMb: Math.max(1, readInt('MAX_UPLOAD_MB', 200)),
      maxPages: readInt('MAX_PAGES', 500),
      enableAutoBatch: readBool('ENABLE_AUTO_BATCH', true),
      batchPageSize: Math.max(1, readInt('BATCH_PAGE_SIZE', 50)),
      downloadTimeoutMs: readInt('DOWNLOAD_TIMEOUT_MS', 60_000),
    },
    publish: {
      backend: publishBackendEnv,
      autoPublish: readBool('AUTO_PUBLISH', false),
      s3: {
        endpoint: readString('S3_ENDPOINT'),
        region: readString('AWS_REGION', 'us-east-1'),
        bucket: s3Bucket,
        accessKeyId: s3AccessKeyId,
        secretAccessKey: s3SecretAccessKey,
        prefix: readString('S3_PATH_PREFIX', 'conversions'),
        signExpireSeconds: readInt('S3_SIGN_EXPIRE_SECONDS', 3600),
      },
    },
    tokens: {
      storePath: readString('TOKEN_STORE_PATH', 'data/tokens/tokens.json'),
      defaultTtlSeconds: readInt('TOKEN_DEFAULT_TTL_SECONDS', 3600),
    },
    rateLimit: {
      enabled: readBool('RATE_LIMIT_ENABLED', true),
      ratePerSecond: readFloat('RATE_LIMIT_RPS', 10),
      burst: readInt('RATE_LIMIT_BURST', 20),
      exemptPaths: readList('RATE_LIMIT_EXEMPT', ['/healthz', '/metrics']),
    },
  };
}
