import { setTimeout } from "node:timers/promises";
import { toError } from "../errors/probe-errors";

/**
 * Options for the retry mechanism
 */
export type RetryOptions = {
  /** Maximum number of attempts (including the first one) */
  maxAttempts?: number;
  /** Initial delay in milliseconds */
  initialDelay?: number;
  /** Maximum delay in milliseconds */
  maxDelay?: number;
  /** Backoff factor (multiplier for each retry), 1 for a constant interval */
  backoffFactor?: number;
  /** Jitter factor to avoid thundering herd (0-1) */
  jitter?: number;
  /** Function to determine whether an error is retryable */
  isRetryable?: (error: Error) => boolean;
  /** Function to call before each retry */
  onRetry?: (attempt: number, delay: number, error: Error) => void;
};

/**
 * Result of a retry operation, including metadata about attempts
 */
export type RetryResult<T> =
  | {
      successful: true;
      result: T;
      /** The number of attempts made (1 = no retries) */
      attempts: number;
      /** The total time elapsed in milliseconds */
      totalTime: number;
    }
  | {
      successful: false;
      /** The last error encountered */
      lastError: Error;
      attempts: number;
      totalTime: number;
    };

const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelay: 100,
  maxDelay: 5000,
  backoffFactor: 2,
  jitter: 0.1,
  isRetryable: () => true,
  onRetry: () => {},
} as const;

/**
 * Sleep for a given duration with optional jitter
 *
 * @param ms Base milliseconds to sleep
 * @param jitter Jitter factor (0-1)
 */
async function sleep(ms: number, jitter: number): Promise<void> {
  let delay = ms;

  if (jitter > 0) {
    const jitterAmount = ms * jitter;
    delay = ms + Math.random() * jitterAmount - jitterAmount / 2;
  }

  await setTimeout(Math.max(0, delay));
}

/**
 * Calculate the delay for the next retry using exponential backoff
 *
 * @param attempt Current attempt number (0-based)
 */
export function calculateBackOff(
  attempt: number,
  options: Required<RetryOptions>,
): number {
  return Math.min(
    options.initialDelay * options.backoffFactor ** attempt,
    options.maxDelay,
  );
}

/**
 * Execute an operation with automatic retries using exponential backoff.
 * Never rejects: the outcome, including the last error, is in the result.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<RetryResult<T>> {
  const startTime = Date.now();
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };

  let attempts = 0;
  let lastError: Error = new Error("Operation was never attempted");

  while (attempts < opts.maxAttempts) {
    attempts++;

    try {
      const result = await operation(attempts);

      return {
        successful: true,
        result,
        attempts,
        totalTime: Date.now() - startTime,
      };
    } catch (err) {
      lastError = toError(err);

      if (attempts >= opts.maxAttempts || !opts.isRetryable(lastError)) {
        break;
      }

      const delay = calculateBackOff(attempts - 1, opts);

      opts.onRetry(attempts, delay, lastError);

      await sleep(delay, opts.jitter);
    }
  }

  return {
    successful: false,
    lastError,
    attempts,
    totalTime: Date.now() - startTime,
  };
}
