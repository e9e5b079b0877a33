import { classifyError, type FailureKind } from '../pipeline/errors.js';

export const sleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolveSleep, rejectSleep) => {
    if (signal?.aborted) {
      rejectSleep(new Error('Operation aborted'));
      return;
    }

    let timeout: NodeJS.Timeout;

    const onAbort = () => {
      clearTimeout(timeout);
      if (signal) {
        signal.removeEventListener('abort', onAbort);
      }
      rejectSleep(new Error('Operation aborted'));
    };

    timeout = setTimeout(() => {
      if (signal) {
        signal.removeEventListener('abort', onAbort);
      }
      resolveSleep();
    }, ms);

    if (signal) {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

/**
 * Retry configuration interface for controlling backoff and retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts after the first call */
  maxRetries: number;
  /** Initial delay in milliseconds before first retry */
  initialDelayMs: number;
  /** Maximum delay between retries in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Whether to use full jitter strategy */
  useJitter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  useJitter: true,
};

/**
 * Calculates backoff delay using full jitter strategy
 *
 * @param attemptNumber - Current retry attempt number (0-indexed)
 */
export function calculateBackoffDelay(attemptNumber: number, config: RetryConfig): number {
  const { initialDelayMs, maxDelayMs, backoffMultiplier, useJitter } = config;

  const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, attemptNumber);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  if (useJitter) {
    return Math.random() * cappedDelay;
  }

  return cappedDelay;
}

/** Timeouts and transient failures are worth another attempt; everything else surfaces */
export const isRetryable = (kind: FailureKind): boolean => kind === 'Transient' || kind === 'Timeout';

export interface RetryOptions {
  config?: Partial<RetryConfig>;
  signal?: AbortSignal;
  shouldRetry?: (kind: FailureKind, error: unknown) => boolean;
  onRetry?: (attempt: number, kind: FailureKind, error: unknown, delayMs: number) => void;
}

/**
 * Runs `operation` until it succeeds, a non-retryable failure occurs, or
 * `maxRetries` retries have been spent. The last error is rethrown as-is.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.config };
  const shouldRetry = options.shouldRetry ?? isRetryable;

  let attemptNumber = 0;

  for (;;) {
    try {
      return await operation(attemptNumber);
    } catch (error) {
      const kind = classifyError(error);

      if (!shouldRetry(kind, error) || attemptNumber >= config.maxRetries) {
        throw error;
      }

      const delay = calculateBackoffDelay(attemptNumber, config);
      attemptNumber++;
      options.onRetry?.(attemptNumber, kind, error, delay);
      await sleep(delay, options.signal);
    }
  }
}

/**
 * Circuit Breaker pattern implementation
 * Prevents repeated failures by opening the circuit after threshold is reached
 */
export class CircuitBreaker {
  private failureCount = 0;
  private state: 'CLOSED' | 'OPEN' | 'HALF_OPEN' = 'CLOSED';
  private lastFailureTime: number | null = null;

  constructor(
    private threshold: number,
    private timeoutMs: number,
    private now: () => number = Date.now
  ) {}

  recordSuccess(): void {
    this.failureCount = 0;
    this.state = 'CLOSED';
    this.lastFailureTime = null;
  }

  recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.failureCount >= this.threshold) {
      this.state = 'OPEN';
    }
  }

  /**
   * Whether an attempt may go ahead. An open circuit moves to half-open once
   * the timeout has passed since the last failure.
   */
  allowsAttempt(): boolean {
    if (this.state !== 'OPEN') {
      return true;
    }

    const timeSinceLastFailure = this.now() - (this.lastFailureTime ?? 0);
    if (timeSinceLastFailure >= this.timeoutMs) {
      this.state = 'HALF_OPEN';
      return true;
    }

    return false;
  }

  getState(): 'CLOSED' | 'OPEN' | 'HALF_OPEN' {
    return this.state;
  }

  getFailureCount(): number {
    return this.failureCount;
  }
}
