import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { SizeLimitError, ValidationError } from '@docuqueue/contracts';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { downloadToFile } from '../src/infrastructure/input-fetcher.js';

describe('infrastructure/input-fetcher', () => {
  let dir: string;
  let destination: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'docuqueue-fetch-'));
    destination = path.join(dir, 'input.pdf');
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  it('streams the body to disk and returns the byte count', async () => {
    const fetchMock = vi.fn(async () => new Response('%PDF-1.7 test body'));
    vi.stubGlobal('fetch', fetchMock);

    const bytes = await downloadToFile('https://docs.test/a.pdf', destination, {
      maxBytes: 1024,
      timeoutMs: 1000,
    });

    expect(bytes).toBe(18);
    expect(await readFile(destination, 'utf8')).toBe('%PDF-1.7 test body');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('maps non-2xx responses to a validation error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('missing', { status: 404 })));

    const attempt = downloadToFile('https://docs.test/missing.pdf', destination, {
      maxBytes: 1024,
      timeoutMs: 1000,
    });
    await expect(attempt).rejects.toThrow(ValidationError);
    await expect(attempt).rejects.toThrow('Failed to download input: HTTP 404');
  });

  it('rejects a declared length over the limit before reading', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('0123456789', { headers: { 'content-length': '10' } })),
    );

    await expect(
      downloadToFile('https://docs.test/big.pdf', destination, { maxBytes: 5, timeoutMs: 1000 }),
    ).rejects.toThrow(SizeLimitError);
    await expect(stat(destination)).rejects.toThrow();
  });

  it('stops streaming once the limit is crossed and removes the partial file', async () => {
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new Uint8Array(4));
        controller.enqueue(new Uint8Array(4));
        controller.close();
      },
    });
    vi.stubGlobal('fetch', vi.fn(async () => new Response(body)));

    await expect(
      downloadToFile('https://docs.test/chunked.pdf', destination, { maxBytes: 6, timeoutMs: 1000 }),
    ).rejects.toThrow(SizeLimitError);
    await expect(stat(destination)).rejects.toThrow();
  });
});
