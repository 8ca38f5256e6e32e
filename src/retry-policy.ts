export interface RetryPolicyOptions<K extends string> {
  /** Total attempts including the first one. */
  maxAttempts: number;
  /**
   * Delay before each retry, in milliseconds. The last value repeats when
   * there are more retries than entries.
   */
  backoffMs: readonly number[];
  /** Kinds worth another attempt. Everything else fails immediately. */
  retryOn: Iterable<K>;
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryContext {
  attempt: number;
  delayMs: number;
  error: unknown;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

/**
 * Bounded retry schedule shared by the oracle path and durable writes.
 *
 * The policy never inspects error classes itself; callers pass `kindOf` to
 * map a thrown value to a kind, or `null` for errors that must not be retried.
 */
export class RetryPolicy<K extends string> {
  readonly maxAttempts: number;
  private backoffMs: readonly number[];
  private retryOn: ReadonlySet<K>;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: RetryPolicyOptions<K>) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.backoffMs = options.backoffMs.length > 0 ? [...options.backoffMs] : [0];
    this.retryOn = new Set(options.retryOn);
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Delay before retry number `retry` (1-based). */
  delayFor(retry: number, hintMs?: number): number {
    const index = Math.min(retry - 1, this.backoffMs.length - 1);
    const scheduled = this.backoffMs[Math.max(0, index)] ?? 0;
    return hintMs !== undefined ? Math.max(scheduled, hintMs) : scheduled;
  }

  isRetryable(kind: K | null): boolean {
    return kind !== null && this.retryOn.has(kind);
  }

  /**
   * Run `fn` until it succeeds, the error is not retryable, or attempts run
   * out. The last error is rethrown unchanged.
   */
  async run<T>(
    fn: (attempt: number) => Promise<T>,
    kindOf: (error: unknown) => K | null,
    hooks?: {
      onRetry?: (context: RetryContext) => void;
      delayHint?: (error: unknown) => number | undefined;
    },
  ): Promise<T> {
    let attempt = 1;
    for (;;) {
      try {
        return await fn(attempt);
      } catch (error) {
        if (attempt >= this.maxAttempts || !this.isRetryable(kindOf(error))) {
          throw error;
        }
        const delayMs = this.delayFor(attempt, hooks?.delayHint?.(error));
        hooks?.onRetry?.({ attempt, delayMs, error });
        if (delayMs > 0) await this.sleep(delayMs);
        attempt++;
      }
    }
  }
}
