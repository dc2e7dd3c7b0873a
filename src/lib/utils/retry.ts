/**
 * HTTP Retry Logic with Exponential Backoff
 * Retries 408/429/5xx responses and network-level failures
 */

export interface RetryOptions {
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
  retryableStatuses?: number[];
  /** Spread delays to 50-100% of the computed backoff. */
  jitter?: boolean;
  /** Overrides the default retryable-error check. */
  shouldRetry?: (error: unknown) => boolean;
}

/** Thrown by callers for a non-2xx response so the status can drive the retry decision. */
export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, statusText: string) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

const DEFAULT_OPTIONS = {
  maxRetries: 3,
  initialDelay: 1000, // 1 second
  maxDelay: 30000, // 30 seconds
  backoffMultiplier: 2,
  retryableStatuses: [408, 429, 500, 502, 503, 504],
  jitter: false,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calculate delay with exponential backoff
 */
export function calculateDelay(
  attempt: number,
  initialDelay: number,
  maxDelay: number,
  multiplier: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

/**
 * Check if error is retryable
 */
export function isRetryableError(error: unknown, retryableStatuses: number[]): boolean {
  if (error instanceof HttpStatusError) {
    return retryableStatuses.includes(error.status);
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return true;
    }
    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('network') ||
      message.includes('fetch failed') ||
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('enotfound')
    );
  }

  return false;
}

/**
 * Retry a function with exponential backoff
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const shouldRetry =
    opts.shouldRetry ?? ((error: unknown) => isRetryableError(error, opts.retryableStatuses));
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === opts.maxRetries || !shouldRetry(error)) {
        break;
      }

      const baseDelay = calculateDelay(
        attempt,
        opts.initialDelay,
        opts.maxDelay,
        opts.backoffMultiplier
      );
      const delay = opts.jitter ? baseDelay * (0.5 + Math.random() * 0.5) : baseDelay;

      await sleep(delay);
    }
  }

  throw lastError;
}
