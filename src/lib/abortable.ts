/**
 * Abortable helpers
 * 可被 AbortSignal 中斷的等待，取代阻塞式 sleep
 */

import { CancelledError } from './errors.js';

export function cancelledBy(signal: AbortSignal): CancelledError {
  return new CancelledError('Operation cancelled', signal.reason);
}

/**
 * signal 已中斷時拋出 CancelledError
 */
export function ensureNotAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw cancelledBy(signal);
  }
}

/**
 * 等待 ms 毫秒；signal 中斷時立即以 CancelledError 拒絕
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledBy(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) {
        reject(cancelledBy(signal));
      }
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * 等待 promise；signal 先中斷時以 CancelledError 拒絕（promise 本身不受影響）
 */
export function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(cancelledBy(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(cancelledBy(signal));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
