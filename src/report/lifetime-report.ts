import { type ProbeRecord, SECONDS_PER_HOUR, isActive } from "../core";

export const LIFETIME_BIN_HOURS = 1;
export const PAYLOAD_BIN_BYTES = 1000;

export type HistogramBin = {
  /** Inclusive lower edge of the bin */
  binStart: number;
  count: number;
};

export type LifetimeStats = {
  count: number;
  /** Probes evaluated at least twice, which is what a lifetime needs */
  withLifetime: number;
  minH?: number;
  medianH?: number;
  maxH?: number;
};

export type IntervalReport = LifetimeStats & {
  intervalH: number;
  histogramH: HistogramBin[];
};

export type GroupReport = LifetimeStats & {
  byInterval: IntervalReport[];
};

export type LifetimeReport = {
  total: number;
  active: GroupReport;
  failed: GroupReport;
  payloadSizes: {
    active: HistogramBin[];
    failed: HistogramBin[];
  };
  failureReasons: { reason: string; count: number }[];
};

/**
 * Seconds between the first and last evaluation plus the last one's duration.
 * Undefined until the probe has been evaluated twice.
 */
export function lifetimeSeconds(record: ProbeRecord): number | undefined {
  const starts = record.evaluationStartUnixtimes;
  const durations = record.evaluationDurationsS;

  if (starts.length < 2) {
    return undefined;
  }

  return (
    starts[starts.length - 1] - starts[0] + durations[durations.length - 1]
  );
}

export function median(values: readonly number[]): number | undefined {
  if (!values.length) {
    return undefined;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);

  return sorted.length % 2
    ? sorted[middle]
    : (sorted[middle - 1] + sorted[middle]) / 2;
}

export function histogram(
  values: readonly number[],
  binSize: number,
): HistogramBin[] {
  const bins = new Map<number, number>();

  for (const value of values) {
    const binStart = Math.floor(value / binSize) * binSize;
    bins.set(binStart, (bins.get(binStart) ?? 0) + 1);
  }

  return [...bins.entries()]
    .sort(([a], [b]) => a - b)
    .map(([binStart, count]) => ({ binStart, count }));
}

function lifetimeStats(records: readonly ProbeRecord[]): LifetimeStats {
  const hours = lifetimeHours(records);

  return {
    count: records.length,
    withLifetime: hours.length,
    ...(hours.length > 0 && {
      minH: Math.min(...hours),
      medianH: median(hours),
      maxH: Math.max(...hours),
    }),
  };
}

function lifetimeHours(records: readonly ProbeRecord[]): number[] {
  const hours: number[] = [];
  for (const record of records) {
    const seconds = lifetimeSeconds(record);
    if (seconds !== undefined) {
      hours.push(seconds / SECONDS_PER_HOUR);
    }
  }
  return hours;
}

function groupReport(records: readonly ProbeRecord[]): GroupReport {
  const byInterval = new Map<number, ProbeRecord[]>();
  for (const record of records) {
    const group = byInterval.get(record.evaluationIntervalH) ?? [];
    group.push(record);
    byInterval.set(record.evaluationIntervalH, group);
  }

  return {
    ...lifetimeStats(records),
    byInterval: [...byInterval.entries()]
      .sort(([a], [b]) => a - b)
      .map(([intervalH, group]) => ({
        intervalH,
        ...lifetimeStats(group),
        histogramH: histogram(lifetimeHours(group), LIFETIME_BIN_HOURS),
      })),
  };
}

/**
 * Failure reasons without their per-record detail, e.g.
 * "payload size mismatch: expected 5 bytes, got 4" → "payload size mismatch"
 */
export function failureCategory(reason: string): string {
  const separator = reason.indexOf(":");
  return (separator === -1 ? reason : reason.slice(0, separator)).trim();
}

/**
 * Summarise a result set: how long probes survived, split by outcome and
 * evaluation interval, and how payload size relates to failure.
 */
export function buildLifetimeReport(
  records: Iterable<ProbeRecord>,
): LifetimeReport {
  const active: ProbeRecord[] = [];
  const failed: ProbeRecord[] = [];

  for (const record of records) {
    (isActive(record) ? active : failed).push(record);
  }

  const reasons = new Map<string, number>();
  for (const record of failed) {
    const category = failureCategory(record.failureReason ?? "unknown");
    reasons.set(category, (reasons.get(category) ?? 0) + 1);
  }

  return {
    total: active.length + failed.length,
    active: groupReport(active),
    failed: groupReport(failed),
    payloadSizes: {
      active: histogram(
        active.map((record) => record.payloadSizeBytes),
        PAYLOAD_BIN_BYTES,
      ),
      failed: histogram(
        failed.map((record) => record.payloadSizeBytes),
        PAYLOAD_BIN_BYTES,
      ),
    },
    failureReasons: [...reasons.entries()]
      .sort(([a, countA], [b, countB]) => countB - countA || a.localeCompare(b))
      .map(([reason, count]) => ({ reason, count })),
  };
}
