import { mkdtemp, readFile, rm, stat } from 'fs/promises';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { DownloadError, TooLargeError } from '@/lib/errors';
import { createHttpClient } from '@/lib/http/client';
import { FetchService, parseContentLength } from '../fetchService';
import type { ProgressUpdate } from '../../utils/progress';
import { brokenStream, chunks, fakeAdapter, type FakeRoute } from '../../tests/fakes';

const MEDIA_URL = 'https://cdn.example/x.mp4';

describe('FetchService', () => {
  let dir: string;
  let destination: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'fetch-test-'));
    destination = path.join(dir, 'out.mp4');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function fetcherWith(route: FakeRoute, maxBytes?: number) {
    const sleep = vi.fn(async () => {});
    const fetcher = new FetchService({
      client: createHttpClient({ adapter: fakeAdapter(route) }),
      sleep,
      maxBytes,
      throttle: { minIntervalMs: 0, maxIntervalMs: 0, now: () => 0 },
    });
    return { fetcher, sleep };
  }

  it('writes exactly the bytes it receives', async () => {
    const body = chunks(5, 1000);
    const { fetcher } = fetcherWith(() => ({ headers: { 'content-length': '5000' }, body }));

    await expect(fetcher.fetchToFile(MEDIA_URL, destination)).resolves.toBe(5000);
    expect((await stat(destination)).size).toBe(5000);
    expect(await readFile(destination)).toEqual(Buffer.concat(body));
  });

  it('streams without a Content-Length', async () => {
    const { fetcher } = fetcherWith(() => ({ body: chunks(3, 7) }));

    await expect(fetcher.fetchToFile(MEDIA_URL, destination)).resolves.toBe(21);
  });

  it('reports increasing percentages', async () => {
    const { fetcher } = fetcherWith(() => ({ headers: { 'content-length': '40' }, body: chunks(4, 10) }));
    const updates: ProgressUpdate[] = [];

    await fetcher.fetchToFile(MEDIA_URL, destination, { onProgress: (u) => void updates.push(u) });

    expect(updates.map((u) => u.percent)).toEqual([25, 50, 75, 100]);
  });

  it('rejects an oversized declared length before writing, without retrying', async () => {
    const route = vi.fn<FakeRoute>(() => ({ headers: { 'content-length': '2000000000' }, body: chunks(1, 10) }));
    const { fetcher, sleep } = fetcherWith(route);

    await expect(fetcher.fetchToFile(MEDIA_URL, destination)).rejects.toBeInstanceOf(TooLargeError);
    expect(route).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    await expect(stat(destination)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('stops a stream that grows past the limit, without retrying', async () => {
    const route = vi.fn<FakeRoute>(() => ({ body: chunks(3, 10) }));
    const { fetcher, sleep } = fetcherWith(route, 25);

    await expect(fetcher.fetchToFile(MEDIA_URL, destination)).rejects.toMatchObject({ size: 30, limit: 25 });
    expect(route).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('releases the response stream when the destination cannot be opened', async () => {
    const streams: Readable[] = [];
    const { fetcher } = fetcherWith(() => {
      const stream = Readable.from(chunks(2, 10));
      streams.push(stream);
      return { stream };
    });

    await expect(fetcher.fetchToFile(MEDIA_URL, path.join(dir, 'missing', 'out.mp4'))).rejects.toBeInstanceOf(
      DownloadError
    );
    expect(streams).toHaveLength(3);
    expect(streams.map((stream) => stream.destroyed)).toEqual([true, true, true]);
  });

  it('recovers from two transient failures', async () => {
    let calls = 0;
    const { fetcher, sleep } = fetcherWith(() => {
      calls++;
      if (calls < 3) return { status: 502 };
      return { headers: { 'content-length': '10' }, body: chunks(1, 10) };
    });
    const onRetry = vi.fn();

    await expect(fetcher.fetchToFile(MEDIA_URL, destination, { onRetry })).resolves.toBe(10);
    expect(onRetry.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2]);
    expect(sleep).toHaveBeenCalledWith(3000);
  });

  it('restarts each attempt from byte zero', async () => {
    let calls = 0;
    const { fetcher } = fetcherWith(() => {
      calls++;
      return calls === 1 ? { stream: brokenStream(30) } : { body: chunks(1, 10) };
    });

    await expect(fetcher.fetchToFile(MEDIA_URL, destination)).resolves.toBe(10);
    expect(calls).toBe(2);
    expect((await stat(destination)).size).toBe(10);
  });

  it('gives up after three failures with a DownloadError', async () => {
    const route = vi.fn<FakeRoute>(() => ({ status: 500 }));
    const { fetcher } = fetcherWith(route);
    const onFailure = vi.fn();

    const error = await fetcher.fetchToFile(MEDIA_URL, destination, { onFailure }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DownloadError);
    expect(error).toMatchObject({ message: 'HTTP 500' });
    expect(route).toHaveBeenCalledTimes(3);
    expect(onFailure).toHaveBeenCalledWith(error);
  });
});

describe('parseContentLength', () => {
  it('accepts numeric strings and numbers', () => {
    expect(parseContentLength('1234')).toBe(1234);
    expect(parseContentLength(99)).toBe(99);
  });

  it('ignores anything else', () => {
    expect(parseContentLength(undefined)).toBeNull();
    expect(parseContentLength('abc')).toBeNull();
    expect(parseContentLength('-5')).toBeNull();
  });
});
