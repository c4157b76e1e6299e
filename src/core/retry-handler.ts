// src/core/retry-handler.ts

export interface RetryPolicy {
  maxAttempts?: number;                // Default: unbounded when timeoutMs is set, otherwise 3
  backoff: 'exponential' | 'linear' | 'fixed';
  initialDelay?: number;               // Default: 1000 ms
  maxDelay?: number;                   // Default: 30000 ms
  timeoutMs?: number;                  // Give up once the next wait would cross this budget
}

export interface RetryContext {
  attemptNumber: number;              // Current attempt (0-indexed)
  maxAttempts: number;
  elapsedMs: number;
  lastError?: unknown;
  delays: number[];                   // Delay history in ms
}

export class RetryHandler {
  constructor(
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Execute a function until it succeeds, attempts run out, or the time budget is spent.
   * The last error is rethrown unchanged.
   */
  async executeWithRetry<T>(
    fn: () => Promise<T>,
    policy: RetryPolicy,
    onRetry?: (context: RetryContext) => void,
    shouldRetry: (error: unknown) => boolean = () => true
  ): Promise<T> {
    const maxAttempts = policy.maxAttempts ?? (policy.timeoutMs !== undefined ? Number.POSITIVE_INFINITY : 3);
    const startedAt = this.now();
    const context: RetryContext = {
      attemptNumber: 0,
      maxAttempts,
      elapsedMs: 0,
      delays: []
    };

    for (let attempt = 0; ; attempt++) {
      context.attemptNumber = attempt;

      try {
        return await fn();
      } catch (error) {
        context.lastError = error;
        context.elapsedMs = this.now() - startedAt;

        if (attempt >= maxAttempts - 1 || !shouldRetry(error)) {
          throw error;
        }

        const delay = this.calculateDelay(attempt, policy);
        if (policy.timeoutMs !== undefined && context.elapsedMs + delay > policy.timeoutMs) {
          throw error;
        }
        context.delays.push(delay);

        onRetry?.(context);

        await this.sleep(delay);
      }
    }
  }

  /**
   * Delay before the retry that follows `attempt` (0-indexed), capped at maxDelay.
   */
  calculateDelay(attempt: number, policy: RetryPolicy): number {
    const initialDelay = policy.initialDelay ?? 1000;
    const maxDelay = policy.maxDelay ?? 30000;

    let delay: number;

    switch (policy.backoff) {
      case 'exponential':
        delay = initialDelay * Math.pow(2, attempt);
        break;

      case 'linear':
        delay = initialDelay * (attempt + 1);
        break;

      case 'fixed':
      default:
        delay = initialDelay;
        break;
    }

    return Math.min(delay, maxDelay);
  }

  static formatDelay(ms: number): string {
    if (ms < 1000) {
      return `${ms}ms`;
    } else if (ms < 60000) {
      return `${(ms / 1000).toFixed(1)}s`;
    } else {
      return `${(ms / 60000).toFixed(1)}m`;
    }
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
