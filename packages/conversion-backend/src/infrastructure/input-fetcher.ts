// packages/conversion-backend/src/infrastructure/input-fetcher.ts
// Streams a remote input document to local storage under a byte ceiling.
import { createWriteStream } from 'node:fs';
import { rm } from 'node:fs/promises';
import { Readable, Transform, type TransformCallback } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { ReadableStream as NodeReadableStream } from 'node:stream/web';

import { SizeLimitError, ValidationError } from '@docuqueue/contracts';

class ByteLimit extends Transform {
  private received = 0;

  constructor(private readonly limitBytes: number) {
    super();
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.received += chunk.length;
    if (this.received > this.limitBytes) {
      callback(new SizeLimitError(this.limitBytes));
      return;
    }
    callback(null, chunk);
  }

  bytesReceived(): number {
    return this.received;
  }
}

export async function downloadToFile(
  url: string,
  destination: string,
  options: { maxBytes: number; timeoutMs: number },
): Promise<number> {
  const response = await fetch(url, { signal: AbortSignal.timeout(options.timeoutMs) });
  if (!response.ok || !response.body) {
    throw new ValidationError(`Failed to download input: HTTP ${response.status}`, 'download_failed');
  }

  const declared = Number(response.headers.get('content-length'));
  if (Number.isFinite(declared) && declared > options.maxBytes) {
    await response.body.cancel();
    throw new SizeLimitError(options.maxBytes);
  }

  const limiter = new ByteLimit(options.maxBytes);
  try {
    await pipeline(
      Readable.fromWeb(response.body as unknown as NodeReadableStream),
      limiter,
      createWriteStream(destination),
    );
  } catch (error) {
    await rm(destination, { force: true });
    throw error;
  }
  return limiter.bytesReceived();
}
