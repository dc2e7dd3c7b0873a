import { TimeoutError } from '../errors';

/**
 * Race a promise against a timer. The timer is always cleared.
 * The underlying operation is not cancelled; see withAbortableTimeout.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Like withTimeout, but the operation gets a signal that aborts when the timer
 * fires, when it rejects, or when the parent signal aborts.
 */
export async function withAbortableTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation: string,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onAbort, { once: true });
  }

  try {
    return await withTimeout(run(controller.signal), timeoutMs, operation);
  } catch (error) {
    controller.abort();
    throw error;
  } finally {
    parent?.removeEventListener('abort', onAbort);
  }
}
