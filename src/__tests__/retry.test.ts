import { describe, expect, it, vi } from 'vitest';
import { OperationCanceledError } from '../cancellation.js';
import { createRetryingDispatcher, sleep, withRetry } from '../retry.js';
import type { UploadDispatchFn, UploadResult, UploadTask } from '../types.js';

const task: UploadTask = { filePath: '/w/a.mp4', backend: 'yandex-disk', destinationFolder: '', filename: 'a.mp4' };

const backendFailure: UploadResult = {
  status: 'error',
  filename: 'a.mp4',
  error: 'Yandex Disk API error: HTTP 503',
  kind: 'backend',
};

const success: UploadResult = {
  status: 'success',
  filename: 'a.mp4',
  payload: { backend: 'yandex-disk', url: 'https://disk.test/a' },
};

describe('withRetry', () => {
  it('returns the first successful attempt', async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`attempt ${attempt} failed`);
      return 'ok';
    });

    await expect(withRetry(3, fn, { backoffMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('rethrows the last error once attempts run out', async () => {
    const fn = vi.fn(async (attempt: number): Promise<string> => {
      throw new Error(`attempt ${attempt} failed`);
    });

    await expect(withRetry(2, fn, { backoffMs: 0 })).rejects.toThrow('attempt 2 failed');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => 'never');

    await expect(withRetry(3, fn, { signal: controller.signal })).rejects.toBeInstanceOf(OperationCanceledError);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('sleep', () => {
  it('rejects when aborted mid-wait', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationCanceledError);
  });
});

describe('createRetryingDispatcher', () => {
  it('returns the dispatcher unchanged for a single attempt', () => {
    const dispatch: UploadDispatchFn = async () => success;
    expect(createRetryingDispatcher(dispatch, 1)).toBe(dispatch);
  });

  it('retries backend failures until one succeeds', async () => {
    const dispatch = vi
      .fn<UploadDispatchFn>()
      .mockResolvedValueOnce(backendFailure)
      .mockResolvedValueOnce(success);

    const result = await createRetryingDispatcher(dispatch, 3, 0)(task);

    expect(result).toEqual(success);
    expect(dispatch).toHaveBeenCalledTimes(2);
  });

  it('returns the last backend failure after all attempts', async () => {
    const dispatch = vi.fn<UploadDispatchFn>(async () => backendFailure);

    const result = await createRetryingDispatcher(dispatch, 3, 0)(task);

    expect(result).toEqual(backendFailure);
    expect(dispatch).toHaveBeenCalledTimes(3);
  });

  it('does not retry credential failures', async () => {
    const failure: UploadResult = {
      status: 'error',
      filename: 'a.mp4',
      error: 'YANDEX_DISK_TOKEN is not configured.',
      kind: 'credentials',
    };
    const dispatch = vi.fn<UploadDispatchFn>(async () => failure);

    const result = await createRetryingDispatcher(dispatch, 3, 0)(task);

    expect(result).toEqual(failure);
    expect(dispatch).toHaveBeenCalledTimes(1);
  });
});
