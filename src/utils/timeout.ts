import { TimeoutError } from '../pipeline/errors.js';

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise rejects with a TimeoutError at the deadline even if the task ignores
 * the signal, so no caller is ever left waiting on a stuck collaborator.
 */
export function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);

    task(controller.signal).then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

export const secondsToMs = (seconds: number): number => Math.round(seconds * 1000);
