// packages/conversion-backend/src/infrastructure/device-probe.ts
// Accelerator and host memory readings used by the resource gate.
// GPU numbers come from `nvidia-smi`; when the tool is missing or fails the
// probe reports `null` and callers treat the host as CPU-only.
import { execFile } from 'node:child_process';
import os from 'node:os';
import { promisify } from 'node:util';

import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

const MIB_PER_GIB = 1024;
const BYTES_PER_GIB = 1024 ** 3;

export interface MemoryReading {
  freeGb: number;
  totalGb: number;
}

export interface MemoryProbe {
  gpuMemory(gpuIndex: number): Promise<MemoryReading | null>;
  systemMemory(): Promise<MemoryReading | null>;
}

/**
 * Parse `nvidia-smi --query-gpu=memory.free,memory.total --format=csv,noheader,nounits`
 * output (MiB values) into GiB.
 */
export function parseNvidiaSmiMemory(stdout: string): MemoryReading | null {
  const line = stdout
    .split('\n')
    .map((row) => row.trim())
    .find((row) => row.length > 0);
  if (!line) return null;

  const [freeRaw, totalRaw] = line.split(',').map((part) => Number(part.trim()));
  if (freeRaw === undefined || totalRaw === undefined) return null;
  if (!Number.isFinite(freeRaw) || !Number.isFinite(totalRaw)) return null;

  return { freeGb: freeRaw / MIB_PER_GIB, totalGb: totalRaw / MIB_PER_GIB };
}

export class NvidiaSmiProbe implements MemoryProbe {
  constructor(private readonly command = 'nvidia-smi') {}

  async gpuMemory(gpuIndex: number): Promise<MemoryReading | null> {
    try {
      const { stdout } = await execFileAsync(
        this.command,
        [
          '--query-gpu=memory.free,memory.total',
          '--format=csv,noheader,nounits',
          '-i',
          String(gpuIndex),
        ],
        { timeout: 5000 },
      );
      return parseNvidiaSmiMemory(stdout);
    } catch (error) {
      logger.debug('GPU memory query failed', {
        component: 'device-probe',
        error: String(error),
      });
      return null;
    }
  }

  async systemMemory(): Promise<MemoryReading | null> {
    return { freeGb: os.freemem() / BYTES_PER_GIB, totalGb: os.totalmem() / BYTES_PER_GIB };
  }
}
