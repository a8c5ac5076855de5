import type { ProbeRecord } from "../core";

export const FIXTURE_NOW = 1_700_000_000;

export function createProbeFixture(
  key: string,
  overrides: Partial<Omit<ProbeRecord, "recordKey">> = {},
): ProbeRecord {
  return {
    recordKey: key,
    payloadSizeBytes: 500,
    evaluationIntervalH: 1,
    nextEvaluationUnixtime: FIXTURE_NOW - 10,
    evaluationStartUnixtimes: [],
    evaluationDurationsS: [],
    ...overrides,
  };
}
