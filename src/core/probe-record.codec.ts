import { z } from "zod";
import type { ProbeRecord, ProbeRecordMap } from "./probe-record";

/**
 * Persisted shape of one probe. Field names are shared with the report and
 * any external analysis of the result document, so they never change.
 */
const storedProbeSchema = z
  .object({
    payload_size_b: z.number().int().positive(),
    evaluation_time_interval_h: z.number().int().positive(),
    next_evaluation_unixtime: z.number().nullable(),
    evaluation_start_unixtimes: z.array(z.number()),
    evaluation_durations_s: z.array(z.number().nonnegative()),
    failure_reason: z.string().optional(),
    settle_duration_s: z.number().nonnegative().optional(),
  })
  .refine(
    (probe) =>
      probe.evaluation_start_unixtimes.length ===
      probe.evaluation_durations_s.length,
    {
      message:
        "evaluation_start_unixtimes and evaluation_durations_s differ in length",
    },
  );

export const storedDocumentSchema = z.record(z.string().min(1), storedProbeSchema);

export type StoredProbe = z.infer<typeof storedProbeSchema>;
export type StoredDocument = z.infer<typeof storedDocumentSchema>;

export function encodeProbe(record: ProbeRecord): StoredProbe {
  return {
    payload_size_b: record.payloadSizeBytes,
    evaluation_time_interval_h: record.evaluationIntervalH,
    next_evaluation_unixtime: record.nextEvaluationUnixtime,
    evaluation_start_unixtimes: [...record.evaluationStartUnixtimes],
    evaluation_durations_s: [...record.evaluationDurationsS],
    ...(record.failureReason !== undefined && {
      failure_reason: record.failureReason,
    }),
    ...(record.settleDurationS !== undefined && {
      settle_duration_s: record.settleDurationS,
    }),
  };
}

export function decodeProbe(recordKey: string, stored: StoredProbe): ProbeRecord {
  return {
    recordKey,
    payloadSizeBytes: stored.payload_size_b,
    evaluationIntervalH: stored.evaluation_time_interval_h,
    nextEvaluationUnixtime: stored.next_evaluation_unixtime,
    evaluationStartUnixtimes: stored.evaluation_start_unixtimes,
    evaluationDurationsS: stored.evaluation_durations_s,
    ...(stored.failure_reason !== undefined && {
      failureReason: stored.failure_reason,
    }),
    ...(stored.settle_duration_s !== undefined && {
      settleDurationS: stored.settle_duration_s,
    }),
  };
}

export function encodeDocument(records: ProbeRecordMap): StoredDocument {
  const document: StoredDocument = {};
  for (const [key, record] of records) {
    document[key] = encodeProbe(record);
  }
  return document;
}

/**
 * Validate raw parsed JSON and turn it into a record map.
 * @throws z.ZodError if the document does not match the persisted schema
 */
export function decodeDocument(raw: unknown): ProbeRecordMap {
  const document = storedDocumentSchema.parse(raw);
  const records: ProbeRecordMap = new Map();
  for (const [key, stored] of Object.entries(document)) {
    records.set(key, decodeProbe(key, stored));
  }
  return records;
}

/**
 * Flatten a zod error into "path: message" lines
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}
