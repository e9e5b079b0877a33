/**
 * Failure taxonomy shared by the containers, the orchestrator and the adapters.
 *
 * - NotFound: pop from an empty queue/cache, nothing left to serve
 * - Timeout: a collaborator call exceeded its bound
 * - Rejected: a policy skip (clip outside the duration window), not a fault;
 *   reported as a `skipped` download outcome rather than thrown
 * - Transient: expected to succeed on retry
 * - Fatal: no session can be established, or no content after all retries
 */
export type FailureKind = 'NotFound' | 'Timeout' | 'Rejected' | 'Transient' | 'Fatal';

export class PipelineError extends Error {
  constructor(
    public readonly kind: FailureKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
    Object.setPrototypeOf(this, PipelineError.prototype);
  }
}

export class NotFoundError extends PipelineError {
  constructor(message: string) {
    super('NotFound', message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class TimeoutError extends PipelineError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super('Timeout', `${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

export class TransientError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('Transient', message, options);
    this.name = 'TransientError';
    Object.setPrototypeOf(this, TransientError.prototype);
  }
}

export class FatalError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('Fatal', message, options);
    this.name = 'FatalError';
    Object.setPrototypeOf(this, FatalError.prototype);
  }
}

/**
 * Pushing into a full DiscoveryQueue. A caller bug rather than a runtime
 * failure, so it sits outside the taxonomy.
 */
export class QueueCapacityError extends Error {
  constructor(public readonly capacity: number) {
    super(`Queue is at capacity (${capacity}); remove an entry before pushing`);
    this.name = 'QueueCapacityError';
    Object.setPrototypeOf(this, QueueCapacityError.prototype);
  }
}

/**
 * Maps an arbitrary thrown value onto the taxonomy.
 * Unknown failures are treated as transient so the cycle keeps going.
 */
export function classifyError(error: unknown): FailureKind {
  if (error instanceof PipelineError) {
    return error.kind;
  }

  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();

  if (message.includes('timeout') || message.includes('timed out') || message.includes('etimedout')) {
    return 'Timeout';
  }

  return 'Transient';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
