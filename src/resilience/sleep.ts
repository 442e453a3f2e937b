import { OperationCancelledError } from './errors';

/**
 * Non-blocking wait. Rejects with OperationCancelledError when the signal
 * aborts before the timer fires.
 */
export type Sleeper = (ms: number, operationName: string, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = (ms, operationName, signal) => {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError(operationName));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationCancelledError(operationName));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
