import { OperationAbortedError } from '../core/errors/LightSourceError';

/**
 * Wait that rejects with OperationAbortedError once the signal aborts
 */
export function delay(ms: number, signal?: AbortSignal, operation: string = 'delay'): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new OperationAbortedError(operation));
  }
  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationAbortedError(operation));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function ensureNotAborted(signal: AbortSignal, operation: string): void {
  if (signal.aborted) {
    throw new OperationAbortedError(operation);
  }
}
