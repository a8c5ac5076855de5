import {
  RecordNotSettledError,
  SettleTimeoutError,
} from "../errors/probe-errors";
import type { Logger } from "../logger";
import {
  type NetworkSession,
  type RecordHandle,
  countOfflineSubkeys,
} from "../network";
import { withRetry } from "../utils/retry";
import {
  DEFAULT_SETTLE_MAX_ATTEMPTS,
  DEFAULT_SETTLE_POLL_INTERVAL,
} from "./probe.constants";

export type SettleWaiterOptions = {
  /** Delay between propagation checks in milliseconds (default: 1 second) */
  pollInterval?: number;
  /** Number of checks before giving up (default: 120) */
  maxAttempts?: number;
  logger?: Logger;
};

export type SettleResult = {
  attempts: number;
  elapsedMs: number;
};

/**
 * Polls a freshly written record until the network reports no offline
 * subkeys, giving up with a SettleTimeoutError after a bounded number of checks.
 */
export class SettleWaiter {
  private readonly pollInterval: number;
  private readonly maxAttempts: number;
  private readonly log?: Logger;

  constructor(options: SettleWaiterOptions = {}) {
    this.pollInterval = options.pollInterval ?? DEFAULT_SETTLE_POLL_INTERVAL;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_SETTLE_MAX_ATTEMPTS;
    this.log = options.logger;
  }

  /**
   * @throws SettleTimeoutError when the record never settles
   * @throws TransportError when a propagation check itself fails
   */
  async waitForSettle(
    session: NetworkSession,
    handle: RecordHandle,
  ): Promise<SettleResult> {
    const outcome = await withRetry(
      async () => {
        const offline = countOfflineSubkeys(
          await session.inspectPropagation(handle),
        );
        if (offline > 0) {
          throw new RecordNotSettledError(offline);
        }
      },
      {
        maxAttempts: this.maxAttempts,
        initialDelay: this.pollInterval,
        maxDelay: this.pollInterval,
        backoffFactor: 1,
        jitter: 0,
        isRetryable: (error) => error instanceof RecordNotSettledError,
        onRetry: (attempt, _delay, error) => {
          this.log?.trace(
            { recordKey: handle.key, attempt, reason: error.message },
            "record_not_settled",
          );
        },
      },
    );

    if (outcome.successful) {
      return { attempts: outcome.attempts, elapsedMs: outcome.totalTime };
    }

    if (outcome.lastError instanceof RecordNotSettledError) {
      throw new SettleTimeoutError(
        handle.key,
        outcome.attempts,
        outcome.lastError.remainingSubkeys,
      );
    }

    throw outcome.lastError;
  }
}
