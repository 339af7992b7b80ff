import { NotFoundError, RetryError, describeError } from "../errors.js";

/**
 * Substrings (lower-case) that mark a failure as transient
 */
export const RETRYABLE_MARKERS = [
  "rate",
  "limit",
  "429",
  "too many",
  "timeout",
  "timed out",
  "connection",
  "temporarily",
  "unavailable",
  "502",
  "503",
  "504",
] as const;

export interface RetryEvent {
  /** Zero-based index of the attempt that failed */
  attempt: number;
  delayMs: number;
  message: string;
  label?: string;
}

export interface RetryOptions {
  /**
   * Retries after the first attempt
   * @default 5
   */
  maxRetries?: number;
  /**
   * Delay before the first retry; doubles on each further retry
   * @default 500
   */
  baseDelayMs?: number;
  /** Replaces the real timer; tests pass a recorder */
  sleep?: (ms: number) => Promise<void>;
  /** Called before each backoff sleep */
  onRetry?: (event: RetryEvent) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Whether an error's rendered message chain looks transient
 */
export function isRetryableError(err: unknown): boolean {
  if (err instanceof NotFoundError) return false;
  const message = describeError(err).toLowerCase();
  return RETRYABLE_MARKERS.some((marker) => message.includes(marker));
}

/**
 * Runs idempotent reads with bounded exponential backoff.
 * Holds no state between calls and may be shared by concurrent requests.
 */
export class RetryExecutor {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onRetry?: (event: RetryEvent) => void;

  constructor(options: RetryOptions = {}) {
    this.maxRetries = options.maxRetries ?? 5;
    this.baseDelayMs = options.baseDelayMs ?? 500;
    this.sleep = options.sleep ?? sleep;
    this.onRetry = options.onRetry;
  }

  /**
   * Resolve with the first success, or reject with one RetryError holding
   * every attempt's message in order
   */
  async run<T>(operation: () => Promise<T>, label?: string): Promise<T> {
    const attempts: string[] = [];

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (err) {
        const message = describeError(err);
        attempts.push(`Attempt ${attempt + 1}: ${message}`);

        if (!isRetryableError(err) || attempt + 1 > this.maxRetries) {
          throw new RetryError(attempts, err);
        }

        const delayMs = this.baseDelayMs * 2 ** attempt;
        this.onRetry?.({ attempt, delayMs, message, label });
        await this.sleep(delayMs);
      }
    }

    // maxRetries < 0 leaves the loop without running anything
    throw new RetryError(attempts, new Error(`No attempts made (maxRetries=${this.maxRetries})`));
  }
}
