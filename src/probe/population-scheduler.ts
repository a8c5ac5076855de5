import {
  type ProbeRecord,
  type ProbeRecordMap,
  countActive,
  isActive,
  mergeRecords,
  partitionDue,
} from "../core";
import { ConnectionUnavailableError, toError } from "../errors/probe-errors";
import { type Logger, createLogger } from "../logger";
import type { NetworkClient, NetworkSession } from "../network";
import type { ProbeStore } from "../store";
import { type Clock, systemClock } from "../utils/clock";
import { type RetryOptions, withRetry } from "../utils/retry";
import { settleAll } from "../utils/settle-all";
import { EvaluationExecutor } from "./evaluation-executor";
import { ProbeFactory } from "./probe-factory";
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_CONNECT_ATTEMPTS,
  DEFAULT_CONNECT_RETRY_DELAY,
  DEFAULT_TARGET_POPULATION,
} from "./probe.constants";

export type PopulationSchedulerOptions = {
  store: ProbeStore;
  network: NetworkClient;
  /** Number of active probes to maintain (default: 10) */
  targetPopulation?: number;
  /** Maximum evaluations or creations in flight at once (default: 32) */
  concurrency?: number;
  /** Purge stale routes once connected (default: true) */
  purgeRoutes?: boolean;
  /** Retry policy for establishing the session */
  connectRetry?: RetryOptions;
  executor?: EvaluationExecutor;
  factory?: ProbeFactory;
  clock?: Clock;
  logger?: Logger;
};

/**
 * Outcome counters of one maintenance cycle
 */
export type CycleSummary = {
  /** Probes that were due and evaluated */
  evaluated: number;
  succeeded: number;
  failed: number;
  /** New probes added to the store */
  created: number;
  creationFailures: number;
  /** Active probes after the cycle */
  active: number;
  /** All probes in the store after the cycle */
  total: number;
};

/**
 * Runs maintenance cycles: evaluates every due probe, tops the active
 * population back up to the target, and persists the store once at the end.
 */
export class PopulationScheduler {
  private readonly store: ProbeStore;
  private readonly network: NetworkClient;
  private readonly targetPopulation: number;
  private readonly concurrency: number;
  private readonly purgeRoutes: boolean;
  private readonly connectRetry: RetryOptions;
  private readonly executor: EvaluationExecutor;
  private readonly factory: ProbeFactory;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: PopulationSchedulerOptions) {
    this.store = options.store;
    this.network = options.network;
    this.targetPopulation = options.targetPopulation ?? DEFAULT_TARGET_POPULATION;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.purgeRoutes = options.purgeRoutes ?? true;
    this.connectRetry = {
      maxAttempts: DEFAULT_CONNECT_ATTEMPTS,
      initialDelay: DEFAULT_CONNECT_RETRY_DELAY,
      ...options.connectRetry,
    };
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger("scheduler");
    this.executor =
      options.executor ??
      new EvaluationExecutor({ clock: this.clock, logger: this.log });
    this.factory =
      options.factory ?? new ProbeFactory({ clock: this.clock, logger: this.log });

    if (!Number.isInteger(this.targetPopulation) || this.targetPopulation < 0) {
      throw new Error("Target population must be a non-negative integer");
    }
  }

  /**
   * Run one full maintenance cycle.
   *
   * @throws CorruptStoreError if the stored snapshot cannot be read
   * @throws ConnectionUnavailableError if no session can be established;
   *   the store is left untouched
   */
  async runCycle(): Promise<CycleSummary> {
    const records = await this.store.load();
    this.log.info(
      { records: records.size, active: countActive(records.values()) },
      "cycle_started",
    );

    const session = await this.connect();
    const { evaluated, created, creationFailures } = await this.maintain(
      session,
      records,
    ).finally(() => this.disconnect(session));

    await this.store.save(records);

    const succeeded = evaluated.filter(isActive).length;
    const summary: CycleSummary = {
      evaluated: evaluated.length,
      succeeded,
      failed: evaluated.length - succeeded,
      created: created.length,
      creationFailures,
      active: countActive(records.values()),
      total: records.size,
    };

    this.log.info(summary, "cycle_completed");
    return summary;
  }

  /**
   * Evaluate, then top up the population. Both batches merge into `records`.
   */
  private async maintain(
    session: NetworkSession,
    records: ProbeRecordMap,
  ): Promise<{
    evaluated: ProbeRecord[];
    created: ProbeRecord[];
    creationFailures: number;
  }> {
    await this.purge(session);

    const evaluated = await this.evaluateDue(session, records);
    mergeRecords(records, evaluated);

    const deficit = Math.max(
      0,
      this.targetPopulation - countActive(records.values()),
    );
    const { created, creationFailures } = await this.createProbes(
      session,
      deficit,
    );
    mergeRecords(records, created);

    return { evaluated, created, creationFailures };
  }

  private async connect(): Promise<NetworkSession> {
    const outcome = await withRetry(() => this.network.connect(), {
      ...this.connectRetry,
      onRetry: (attempt, delay, error) => {
        this.log.warn(
          { endpoint: this.network.endpoint, attempt, delay, reason: error.message },
          "connect_retry",
        );
        this.connectRetry.onRetry?.(attempt, delay, error);
      },
    });

    if (outcome.successful) {
      return outcome.result;
    }

    if (outcome.lastError instanceof ConnectionUnavailableError) {
      throw outcome.lastError;
    }
    throw new ConnectionUnavailableError(
      this.network.endpoint,
      outcome.lastError.message,
    );
  }

  private async purge(session: NetworkSession): Promise<void> {
    if (!this.purgeRoutes) {
      return;
    }

    try {
      await session.debugPurge("routes");
    } catch (err) {
      this.log.warn({ reason: toError(err).message }, "purge_routes_failed");
    }
  }

  private async disconnect(session: NetworkSession): Promise<void> {
    try {
      await this.network.disconnect(session);
    } catch (err) {
      this.log.warn({ reason: toError(err).message }, "disconnect_failed");
    }
  }

  /**
   * Evaluate every due probe and wait for all of them.
   */
  private async evaluateDue(
    session: NetworkSession,
    records: ProbeRecordMap,
  ): Promise<ProbeRecord[]> {
    const { due } = partitionDue(records, this.clock.now());
    if (!due.length) {
      return [];
    }

    this.log.info({ due: due.length }, "evaluating_due_probes");

    const results = await settleAll(
      due.map((record) => () => this.executor.evaluate(session, record)),
      this.concurrency,
    );

    return results.map((result, index) => {
      if (result.status === "fulfilled") {
        return result.value;
      }
      // The executor does not reject; keep the record as it was if it ever does
      this.log.error(
        { recordKey: due[index].recordKey, reason: toError(result.reason).message },
        "evaluation_rejected",
      );
      return due[index];
    });
  }

  /**
   * Create `count` probes concurrently; failed attempts are dropped.
   */
  private async createProbes(
    session: NetworkSession,
    count: number,
  ): Promise<{ created: ProbeRecord[]; creationFailures: number }> {
    if (count === 0) {
      return { created: [], creationFailures: 0 };
    }

    this.log.info({ count }, "creating_probes");

    const results = await settleAll(
      Array.from({ length: count }, () => () => this.factory.create(session)),
      this.concurrency,
    );

    const created: ProbeRecord[] = [];
    let creationFailures = 0;

    for (const result of results) {
      if (result.status === "fulfilled") {
        created.push(result.value);
      } else {
        creationFailures++;
        const error = toError(result.reason);
        this.log.warn(
          { error: error.name, reason: error.message },
          "probe_creation_failed",
        );
      }
    }

    return { created, creationFailures };
  }
}
