import {
  DEFAULT_EVALUATION_INTERVALS_H,
  DEFAULT_PAYLOAD_MAX_BYTES,
  DEFAULT_PAYLOAD_MIN_BYTES,
  PROBE_SUBKEY,
  type ProbeRecord,
} from "../core";
import { type Logger, createLogger } from "../logger";
import type { NetworkSession, RecordHandle } from "../network";
import { type Clock, systemClock } from "../utils/clock";
import { SettleWaiter } from "./settle-waiter";

// getRandomValues fills at most 65536 bytes per call
const MAX_RANDOM_CHUNK = 65_536;

export type ProbeFactoryOptions = {
  evaluationIntervalsH?: readonly number[];
  payloadMinBytes?: number;
  payloadMaxBytes?: number;
  settleWaiter?: SettleWaiter;
  clock?: Clock;
  /** Uniform random number in [0, 1), used for sizes and intervals */
  random?: () => number;
  logger?: Logger;
};

/**
 * Random bytes of the requested length
 */
export function randomPayload(length: number): Uint8Array {
  const payload = new Uint8Array(length);
  for (let offset = 0; offset < length; offset += MAX_RANDOM_CHUNK) {
    crypto.getRandomValues(
      payload.subarray(offset, Math.min(offset + MAX_RANDOM_CHUNK, length)),
    );
  }
  return payload;
}

/**
 * Uniform integer in [min, max]
 */
export function randomInt(min: number, max: number, random: () => number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Creates new probes: writes a random payload to a fresh single-subkey record
 * and waits for it to settle before handing back an active ProbeRecord.
 */
export class ProbeFactory {
  private readonly intervalsH: readonly number[];
  private readonly payloadMinBytes: number;
  private readonly payloadMaxBytes: number;
  private readonly settleWaiter: SettleWaiter;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly log: Logger;

  constructor(options: ProbeFactoryOptions = {}) {
    this.intervalsH = options.evaluationIntervalsH ?? DEFAULT_EVALUATION_INTERVALS_H;
    this.payloadMinBytes = options.payloadMinBytes ?? DEFAULT_PAYLOAD_MIN_BYTES;
    this.payloadMaxBytes = options.payloadMaxBytes ?? DEFAULT_PAYLOAD_MAX_BYTES;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.log = options.logger ?? createLogger("probe-factory");
    this.settleWaiter =
      options.settleWaiter ?? new SettleWaiter({ logger: this.log });

    if (!this.intervalsH.length) {
      throw new Error("At least one evaluation interval is required");
    }
    if (
      this.payloadMinBytes < 1 ||
      this.payloadMaxBytes < this.payloadMinBytes
    ) {
      throw new Error(
        `Invalid payload size range [${this.payloadMinBytes}, ${this.payloadMaxBytes}]`,
      );
    }
  }

  /**
   * Create one probe. On failure the record handle is closed and the error
   * propagates; nothing partial is returned.
   *
   * @throws TransportError | SettleTimeoutError
   */
  async create(session: NetworkSession): Promise<ProbeRecord> {
    const payload = randomPayload(
      randomInt(this.payloadMinBytes, this.payloadMaxBytes, this.random),
    );
    const evaluationIntervalH =
      this.intervalsH[randomInt(0, this.intervalsH.length - 1, this.random)];

    const createdAt = this.clock.now();
    const handle = await session.createRecord({ kind: "DFLT", subkeyCount: 1 });

    try {
      await session.writeSubkey(handle, PROBE_SUBKEY, payload);
      const settle = await this.settleWaiter.waitForSettle(session, handle);
      this.log.debug(
        { recordKey: handle.key, attempts: settle.attempts },
        "record_settled",
      );
    } catch (err) {
      await this.closeQuietly(session, handle);
      throw err;
    }

    await session.closeRecord(handle);

    const settledAt = this.clock.now();

    return {
      recordKey: handle.key,
      payloadSizeBytes: payload.length,
      evaluationIntervalH,
      nextEvaluationUnixtime: settledAt,
      evaluationStartUnixtimes: [],
      evaluationDurationsS: [],
      settleDurationS: Math.max(0, settledAt - createdAt),
    };
  }

  private async closeQuietly(
    session: NetworkSession,
    handle: RecordHandle,
  ): Promise<void> {
    try {
      await session.closeRecord(handle);
    } catch (err) {
      this.log.warn({ recordKey: handle.key, err }, "close_after_failed_create_failed");
    }
  }
}
