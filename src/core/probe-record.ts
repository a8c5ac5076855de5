/**
 * A ProbeRecord tracks one DHT record under test: what was written, how often
 * it is re-read, and the history of every read attempt.
 */
export type ProbeRecord = {
  /** Identity assigned by the network layer at creation */
  readonly recordKey: string;
  readonly payloadSizeBytes: number;
  readonly evaluationIntervalH: number;
  /** Unix seconds of the next scheduled read; null once the probe has failed */
  readonly nextEvaluationUnixtime: number | null;
  readonly evaluationStartUnixtimes: readonly number[];
  /** Index-aligned with evaluationStartUnixtimes */
  readonly evaluationDurationsS: readonly number[];
  readonly failureReason?: string;
  /** Seconds between record creation and confirmed propagation */
  readonly settleDurationS?: number;
};

/**
 * All probes known to the store, keyed by record key
 */
export type ProbeRecordMap = Map<string, ProbeRecord>;

/**
 * An active probe is one that has not failed and is still scheduled.
 */
export function isActive(record: ProbeRecord): boolean {
  return record.nextEvaluationUnixtime !== null;
}

/**
 * A probe is due once its scheduled time lies strictly in the past.
 */
export function isDue(record: ProbeRecord, now: number): boolean {
  return (
    record.nextEvaluationUnixtime !== null &&
    record.nextEvaluationUnixtime < now
  );
}

export function countActive(records: Iterable<ProbeRecord>): number {
  let count = 0;
  for (const record of records) {
    if (isActive(record)) {
      count++;
    }
  }
  return count;
}

/**
 * Split the store into probes to evaluate now and everything else.
 */
export function partitionDue(
  records: ProbeRecordMap,
  now: number,
): { due: ProbeRecord[]; rest: ProbeRecord[] } {
  const due: ProbeRecord[] = [];
  const rest: ProbeRecord[] = [];

  for (const record of records.values()) {
    if (isDue(record, now)) {
      due.push(record);
    } else {
      rest.push(record);
    }
  }

  return { due, rest };
}

/**
 * Write each record into the map under its own key, replacing older versions.
 */
export function mergeRecords(
  records: ProbeRecordMap,
  updates: Iterable<ProbeRecord>,
): ProbeRecordMap {
  for (const record of updates) {
    records.set(record.recordKey, record);
  }
  return records;
}
