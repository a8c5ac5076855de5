import {
  PROBE_SUBKEY,
  type ProbeRecord,
  SECONDS_PER_HOUR,
} from "../core";
import { DataIntegrityError, toError } from "../errors/probe-errors";
import { type Logger, createLogger } from "../logger";
import type { NetworkSession } from "../network";
import { type Clock, systemClock } from "../utils/clock";

export type EvaluationExecutorOptions = {
  clock?: Clock;
  logger?: Logger;
};

/**
 * Runs one read attempt against the network for a single active probe and
 * folds the outcome into a new version of the record.
 */
export class EvaluationExecutor {
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: EvaluationExecutorOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger("evaluation");
  }

  /**
   * Evaluate a probe. Never rejects: any failure becomes a terminal record.
   *
   * On success the schedule advances by exactly one interval from the
   * previously scheduled time, so a late run does not shift later ones.
   */
  async evaluate(
    session: NetworkSession,
    record: ProbeRecord,
  ): Promise<ProbeRecord> {
    const scheduled = record.nextEvaluationUnixtime;
    if (scheduled === null) {
      return record;
    }

    const startedAt = this.clock.now();

    try {
      await this.readAndVerify(session, record);
    } catch (err) {
      const error = toError(err);
      this.log.info(
        { recordKey: record.recordKey, error: error.name, reason: error.message },
        "probe_failed",
      );

      return {
        ...this.withAttempt(record, startedAt),
        nextEvaluationUnixtime: null,
        failureReason: error.message,
      };
    }

    this.log.debug({ recordKey: record.recordKey }, "probe_succeeded");

    return {
      ...this.withAttempt(record, startedAt),
      nextEvaluationUnixtime:
        scheduled + record.evaluationIntervalH * SECONDS_PER_HOUR,
    };
  }

  private async readAndVerify(
    session: NetworkSession,
    record: ProbeRecord,
  ): Promise<void> {
    const handle = await session.openRecord(record.recordKey);

    let value: Uint8Array | undefined;
    try {
      value = await session.readSubkey(handle, PROBE_SUBKEY, true);
    } catch (err) {
      await session.closeRecord(handle).catch((closeErr: unknown) => {
        this.log.warn(
          { recordKey: record.recordKey, err: closeErr },
          "close_after_failed_read_failed",
        );
      });
      throw err;
    }

    await session.closeRecord(handle);

    if (value === undefined) {
      throw new DataIntegrityError(
        record.recordKey,
        `value missing for subkey ${PROBE_SUBKEY}`,
      );
    }

    if (value.length !== record.payloadSizeBytes) {
      throw new DataIntegrityError(
        record.recordKey,
        `payload size mismatch: expected ${record.payloadSizeBytes} bytes, got ${value.length}`,
      );
    }
  }

  private withAttempt(record: ProbeRecord, startedAt: number): ProbeRecord {
    return {
      ...record,
      evaluationStartUnixtimes: [...record.evaluationStartUnixtimes, startedAt],
      evaluationDurationsS: [
        ...record.evaluationDurationsS,
        Math.max(0, this.clock.now() - startedAt),
      ],
    };
  }
}
