import { OperationCanceledError } from './cancellation.js';
import { logger } from './logger.js';
import type { UploadDispatchFn, UploadResult } from './types.js';

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCanceledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new OperationCanceledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Runs `fn` up to `attempts` times with a linearly growing pause between tries.
 */
export async function withRetry<T>(
  attempts: number,
  fn: (attempt: number) => Promise<T>,
  options: { signal?: AbortSignal; backoffMs?: number } = {},
): Promise<T> {
  const maxAttempts = Math.max(1, attempts);
  const backoffMs = options.backoffMs ?? 400;
  let lastError: unknown;

  for (let i = 1; i <= maxAttempts; i += 1) {
    if (options.signal?.aborted) {
      throw new OperationCanceledError();
    }
    try {
      return await fn(i);
    } catch (error) {
      lastError = error;
      if (i === maxAttempts) {
        break;
      }
      await sleep(i * backoffMs, options.signal);
    }
  }

  throw lastError;
}

class RetryableUploadFailure extends Error {
  constructor(readonly result: UploadResult) {
    super(result.status === 'error' ? result.error : 'upload failed');
  }
}

/**
 * Wraps a dispatcher so error results of kind `backend` are re-dispatched.
 * Credential, filesystem and unknown-backend failures come back untouched.
 */
export const createRetryingDispatcher = (
  dispatch: UploadDispatchFn,
  attempts: number,
  backoffMs = 400,
): UploadDispatchFn => {
  if (attempts <= 1) {
    return dispatch;
  }

  return async (task) => {
    try {
      return await withRetry(
        attempts,
        async (attempt) => {
          const result = await dispatch(task);
          if (result.status === 'error' && result.kind === 'backend') {
            logger.warn('upload', `Attempt ${attempt}/${attempts} for '${task.filename}' failed: ${result.error}`);
            throw new RetryableUploadFailure(result);
          }
          return result;
        },
        { backoffMs },
      );
    } catch (error) {
      if (error instanceof RetryableUploadFailure) {
        return error.result;
      }
      throw error;
    }
  };
};
