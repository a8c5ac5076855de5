import { setTimeout } from "node:timers/promises";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { InMemoryProbeStore } from "../__fixtures__/in-memory-store.fixture";
import {
  type ManualClock,
  createManualClock,
} from "../__fixtures__/manual-clock.fixture";
import {
  FIXTURE_NOW,
  createProbeFixture,
} from "../__fixtures__/probe-record.fixture";
import {
  DEFAULT_EVALUATION_INTERVALS_H,
  type ProbeRecord,
  type ProbeRecordMap,
  countActive,
} from "../core";
import {
  ConnectionUnavailableError,
  CorruptStoreError,
} from "../errors/probe-errors";
import { MemoryNetwork, type NetworkSession } from "../network";
import { EvaluationExecutor } from "./evaluation-executor";
import {
  PopulationScheduler,
  type PopulationSchedulerOptions,
} from "./population-scheduler";
import { ProbeFactory } from "./probe-factory";
import { SettleWaiter } from "./settle-waiter";

/**
 * Executor that records how many evaluations run at the same time
 */
class TrackingExecutor extends EvaluationExecutor {
  inFlight = 0;
  maxInFlight = 0;

  async evaluate(session: NetworkSession, record: ProbeRecord): Promise<ProbeRecord> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await setTimeout(5);
      return await super.evaluate(session, record);
    } finally {
      this.inFlight--;
    }
  }
}

function storeOf(...records: ProbeRecord[]): ProbeRecordMap {
  return new Map(records.map((record) => [record.recordKey, record]));
}

function snapshotOf(store: InMemoryProbeStore): ProbeRecordMap {
  if (!store.snapshot) {
    throw new Error("store was never saved");
  }
  return store.snapshot;
}

describe("PopulationScheduler", () => {
  let network: MemoryNetwork;
  let clock: ManualClock;
  let store: InMemoryProbeStore;

  const createScheduler = (
    overrides: Partial<PopulationSchedulerOptions> = {},
  ): PopulationScheduler =>
    new PopulationScheduler({
      store,
      network,
      clock,
      targetPopulation: 1,
      connectRetry: { maxAttempts: 1 },
      factory: new ProbeFactory({
        clock,
        settleWaiter: new SettleWaiter({ pollInterval: 0 }),
      }),
      ...overrides,
    });

  beforeEach(() => {
    network = new MemoryNetwork();
    clock = createManualClock(FIXTURE_NOW);
    store = new InMemoryProbeStore();
  });

  describe("#runCycle", () => {
    it("should fill an empty store up to the target population", async () => {
      // GIVEN
      const scheduler = createScheduler({ targetPopulation: 100 });

      // WHEN
      const summary = await scheduler.runCycle();

      // THEN
      const records = snapshotOf(store);
      expect(records.size).toBe(100);
      expect(countActive(records.values())).toBe(100);
      expect(new Set([...records.values()].map((r) => r.recordKey)).size).toBe(100);
      for (const [key, record] of records) {
        expect(record.recordKey).toBe(key);
        expect(DEFAULT_EVALUATION_INTERVALS_H).toContain(record.evaluationIntervalH);
        expect(record.nextEvaluationUnixtime).toBe(FIXTURE_NOW);
        expect(record.evaluationStartUnixtimes).toEqual([]);
      }
      expect(summary).toEqual({
        evaluated: 0,
        succeeded: 0,
        failed: 0,
        created: 100,
        creationFailures: 0,
        active: 100,
        total: 100,
      });
      expect(store.saves).toBe(1);
    });

    it("should advance a due probe by one interval after a successful read", async () => {
      // GIVEN
      store = new InMemoryProbeStore(storeOf(createProbeFixture("VLD0:due")));
      network.seedRecord("VLD0:due", new Uint8Array(500));
      const scheduler = createScheduler();

      // WHEN
      const summary = await scheduler.runCycle();

      // THEN
      const probe = snapshotOf(store).get("VLD0:due");
      expect(probe?.nextEvaluationUnixtime).toBe(FIXTURE_NOW - 10 + 3600);
      expect(probe?.evaluationStartUnixtimes).toEqual([FIXTURE_NOW]);
      expect(probe?.evaluationDurationsS).toEqual([0]);
      expect(summary).toEqual({
        evaluated: 1,
        succeeded: 1,
        failed: 0,
        created: 0,
        creationFailures: 0,
        active: 1,
        total: 1,
      });
    });

    it("should terminate a mismatching probe and create a replacement", async () => {
      // GIVEN
      store = new InMemoryProbeStore(storeOf(createProbeFixture("VLD0:short")));
      network.seedRecord("VLD0:short", new Uint8Array(499));
      const scheduler = createScheduler();

      // WHEN
      const summary = await scheduler.runCycle();

      // THEN
      const records = snapshotOf(store);
      const failed = records.get("VLD0:short");
      expect(failed?.nextEvaluationUnixtime).toBeNull();
      expect(failed?.failureReason).toBe(
        "payload size mismatch: expected 500 bytes, got 499",
      );
      expect(failed?.evaluationStartUnixtimes).toHaveLength(1);
      expect(records.size).toBe(2);
      expect(countActive(records.values())).toBe(1);
      expect(summary.failed).toBe(1);
      expect(summary.created).toBe(1);
    });

    it("should leave probes that are not yet due untouched", async () => {
      // GIVEN
      const future = createProbeFixture("VLD0:future", {
        nextEvaluationUnixtime: FIXTURE_NOW + 60,
      });
      const exactlyNow = createProbeFixture("VLD0:now", {
        nextEvaluationUnixtime: FIXTURE_NOW,
      });
      store = new InMemoryProbeStore(storeOf(future, exactlyNow));
      const scheduler = createScheduler({ targetPopulation: 2 });

      // WHEN
      const summary = await scheduler.runCycle();

      // THEN
      expect(snapshotOf(store).get("VLD0:future")).toEqual(future);
      expect(snapshotOf(store).get("VLD0:now")).toEqual(exactlyNow);
      expect(summary.evaluated).toBe(0);
      expect(network.getStats().open).toBe(0);
    });

    it("should keep terminated probes and exclude them from the active count", async () => {
      // GIVEN
      const dead = createProbeFixture("VLD0:dead", {
        nextEvaluationUnixtime: null,
        failureReason: "read failed: TryAgain",
        evaluationStartUnixtimes: [FIXTURE_NOW - 100],
        evaluationDurationsS: [2],
      });
      store = new InMemoryProbeStore(storeOf(dead));
      const scheduler = createScheduler({ targetPopulation: 2 });

      // WHEN
      const summary = await scheduler.runCycle();

      // THEN
      expect(snapshotOf(store).get("VLD0:dead")).toEqual(dead);
      expect(summary.created).toBe(2);
      expect(summary.total).toBe(3);
      expect(summary.active).toBe(2);
    });

    it("should isolate a failing evaluation from its siblings", async () => {
      // GIVEN
      store = new InMemoryProbeStore(
        storeOf(
          createProbeFixture("VLD0:a"),
          createProbeFixture("VLD0:b"),
          createProbeFixture("VLD0:c"),
        ),
      );
      network.seedRecord("VLD0:a", new Uint8Array(500));
      network.seedRecord("VLD0:c", new Uint8Array(500));
      const scheduler = createScheduler({ targetPopulation: 3 });

      // WHEN
      const summary = await scheduler.runCycle();

      // THEN
      const records = snapshotOf(store);
      expect(records.get("VLD0:a")?.nextEvaluationUnixtime).toBe(FIXTURE_NOW - 10 + 3600);
      expect(records.get("VLD0:b")?.nextEvaluationUnixtime).toBeNull();
      expect(records.get("VLD0:c")?.nextEvaluationUnixtime).toBe(FIXTURE_NOW - 10 + 3600);
      expect(summary).toMatchObject({ evaluated: 3, succeeded: 2, failed: 1, created: 1 });
    });

    it("should drop failed creations without aborting the cycle", async () => {
      // GIVEN
      network.failNext("create", 2);
      const scheduler = createScheduler({ targetPopulation: 5 });

      // WHEN
      const summary = await scheduler.runCycle();

      // THEN
      expect(summary.created).toBe(3);
      expect(summary.creationFailures).toBe(2);
      expect(snapshotOf(store).size).toBe(3);
      expect(countActive(snapshotOf(store).values())).toBe(3);
    });

    it("should drop creations that never settle", async () => {
      // GIVEN
      network.setSettleAfterPolls(5);
      const scheduler = createScheduler({
        targetPopulation: 2,
        factory: new ProbeFactory({
          clock,
          settleWaiter: new SettleWaiter({ pollInterval: 0, maxAttempts: 2 }),
        }),
      });

      // WHEN
      const summary = await scheduler.runCycle();

      // THEN
      expect(summary.created).toBe(0);
      expect(summary.creationFailures).toBe(2);
      expect(snapshotOf(store).size).toBe(0);
      expect(store.saves).toBe(1);
    });

    it("should abort without saving when no connection can be made", async () => {
      // GIVEN
      store = new InMemoryProbeStore(storeOf(createProbeFixture("VLD0:kept")));
      network.failAlways("connect", "connection refused");
      const scheduler = createScheduler({
        connectRetry: { maxAttempts: 2, initialDelay: 0 },
      });

      // WHEN
      const cycle = scheduler.runCycle();

      // THEN
      await expect(cycle).rejects.toBeInstanceOf(ConnectionUnavailableError);
      expect(network.getStats().connect).toBe(2);
      expect(store.saves).toBe(0);
    });

    it("should recover when a later connection attempt succeeds", async () => {
      // GIVEN
      network.failNext("connect", 1);
      const scheduler = createScheduler({
        connectRetry: { maxAttempts: 3, initialDelay: 0 },
      });

      // WHEN
      const summary = await scheduler.runCycle();

      // THEN
      expect(network.getStats().connect).toBe(2);
      expect(summary.created).toBe(1);
    });

    it("should not connect when the store is corrupt", async () => {
      // GIVEN
      vi.spyOn(store, "load").mockRejectedValue(
        new CorruptStoreError("memory://probes", "Unexpected token"),
      );
      const scheduler = createScheduler();

      // WHEN
      const cycle = scheduler.runCycle();

      // THEN
      await expect(cycle).rejects.toBeInstanceOf(CorruptStoreError);
      expect(network.getStats().connect).toBe(0);
      expect(store.saves).toBe(0);
    });

    it("should purge routes once per cycle unless disabled", async () => {
      // GIVEN
      const purging = createScheduler({ targetPopulation: 0 });
      const quiet = createScheduler({ targetPopulation: 0, purgeRoutes: false });

      // WHEN
      await purging.runCycle();
      await quiet.runCycle();

      // THEN
      expect(network.getStats().purge).toBe(1);
    });

    it("should continue the cycle when purging routes fails", async () => {
      // GIVEN
      network.failNext("purge");
      const scheduler = createScheduler();

      // WHEN
      const summary = await scheduler.runCycle();

      // THEN
      expect(summary.created).toBe(1);
    });

    it("should disconnect the session before saving", async () => {
      // GIVEN
      const order: string[] = [];
      vi.spyOn(network, "disconnect").mockImplementation(async () => {
        order.push("disconnect");
      });
      vi.spyOn(store, "save").mockImplementation(async () => {
        order.push("save");
      });
      const scheduler = createScheduler();

      // WHEN
      await scheduler.runCycle();

      // THEN
      expect(order).toEqual(["disconnect", "save"]);
    });

    it("should cap the number of evaluations in flight", async () => {
      // GIVEN
      const probes = Array.from({ length: 10 }, (_, i) =>
        createProbeFixture(`VLD0:p${i}`),
      );
      for (const probe of probes) {
        network.seedRecord(probe.recordKey, new Uint8Array(500));
      }
      store = new InMemoryProbeStore(storeOf(...probes));
      const executor = new TrackingExecutor({ clock });
      const scheduler = createScheduler({
        targetPopulation: 10,
        concurrency: 3,
        executor,
      });

      // WHEN
      const summary = await scheduler.runCycle();

      // THEN
      expect(executor.maxInFlight).toBe(3);
      expect(summary.succeeded).toBe(10);
    });

    it("should keep history aligned, terminality final and the store growing across cycles", async () => {
      // GIVEN
      const scheduler = createScheduler({ targetPopulation: 3 });
      await scheduler.runCycle();
      const afterFirst = snapshotOf(store);
      const [lostKey] = afterFirst.keys();
      network.loseRecord(lostKey);

      // WHEN
      clock.advance(2 * 3600);
      await scheduler.runCycle();
      const afterSecond = snapshotOf(store);
      clock.advance(700 * 3600);
      await scheduler.runCycle();
      const afterThird = snapshotOf(store);

      // THEN
      expect(afterFirst.size).toBe(3);
      expect(afterSecond.size).toBe(4);
      expect(afterThird.size).toBeGreaterThanOrEqual(afterSecond.size);
      expect(afterSecond.get(lostKey)?.nextEvaluationUnixtime).toBeNull();
      expect(afterThird.get(lostKey)).toEqual(afterSecond.get(lostKey));
      for (const snapshot of [afterFirst, afterSecond, afterThird]) {
        expect(countActive(snapshot.values())).toBe(3);
        for (const record of snapshot.values()) {
          expect(record.evaluationDurationsS).toHaveLength(
            record.evaluationStartUnixtimes.length,
          );
        }
      }
    });
  });

  describe("constructor", () => {
    it("should reject a negative target population", () => {
      expect(() => createScheduler({ targetPopulation: -1 })).toThrow(
        "Target population must be a non-negative integer",
      );
    });
  });
});
