import type { ProbeConfig } from "./config";
import { ConfigError, CycleInProgressError } from "./errors/probe-errors";
import { type Logger, createLogger } from "./logger";
import { MemoryNetwork, type NetworkClient, VeilidClient } from "./network";
import {
  type CycleSummary,
  PopulationScheduler,
  ProbeFactory,
  SettleWaiter,
} from "./probe";
import {
  CycleLock,
  FileProbeStore,
  type ProbeStore,
  createProbeStore,
} from "./store";
import type { Clock } from "./utils/clock";

export type MaintenanceResult =
  | { status: "completed"; summary: CycleSummary }
  | { status: "skipped"; reason: string };

/**
 * Collaborators that replace the ones built from configuration
 */
export type MaintenanceDependencies = {
  network?: NetworkClient;
  store?: ProbeStore;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
};

export function createNetworkClient(config: ProbeConfig): NetworkClient {
  return config.network === "memory"
    ? new MemoryNetwork()
    : new VeilidClient({
        host: config.veilidHost,
        port: config.veilidPort,
        rpcTimeout: config.rpcTimeoutMs,
      });
}

/**
 * Run one maintenance cycle as configured. A file store is locked for the
 * duration of the cycle; if another cycle holds the lock this one is skipped.
 *
 * @throws CorruptStoreError | ConnectionUnavailableError
 */
export async function runMaintenance(
  config: ProbeConfig,
  dependencies: MaintenanceDependencies = {},
): Promise<MaintenanceResult> {
  const log = dependencies.logger ?? createLogger("maintenance");
  const store =
    dependencies.store ??
    createProbeStore(config.storeLocation, { timeout: config.rpcTimeoutMs });
  const network = dependencies.network ?? createNetworkClient(config);

  const scheduler = new PopulationScheduler({
    store,
    network,
    targetPopulation: config.targetPopulation,
    concurrency: config.concurrency,
    purgeRoutes: config.purgeRoutes,
    connectRetry: { maxAttempts: config.connectAttempts },
    clock: dependencies.clock,
    logger: log,
    factory: new ProbeFactory({
      evaluationIntervalsH: config.evaluationIntervalsH,
      payloadMinBytes: config.payloadMinBytes,
      payloadMaxBytes: config.payloadMaxBytes,
      settleWaiter: new SettleWaiter({
        pollInterval: config.settlePollIntervalMs,
        maxAttempts: config.settleMaxAttempts,
        logger: log,
      }),
      clock: dependencies.clock,
      random: dependencies.random,
      logger: log,
    }),
  });

  const lock =
    store instanceof FileProbeStore
      ? new CycleLock(store.location, { staleAfter: config.staleLockMs })
      : null;

  try {
    await lock?.acquire();
  } catch (err) {
    if (err instanceof CycleInProgressError) {
      log.info({ lock: err.lockPath }, "cycle_skipped");
      return { status: "skipped", reason: err.message };
    }
    throw err;
  }

  try {
    return { status: "completed", summary: await scheduler.runCycle() };
  } finally {
    await lock?.release();
  }
}

/**
 * Process exit code for an error that ended a run. Probe failures never get
 * here, only conditions that stop a cycle from running at all.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigError ? 2 : 1;
}
