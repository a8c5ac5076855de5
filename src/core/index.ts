export {
  countActive,
  isActive,
  isDue,
  mergeRecords,
  partitionDue,
} from "./probe-record";
export type { ProbeRecord, ProbeRecordMap } from "./probe-record";
export {
  decodeDocument,
  decodeProbe,
  describeIssues,
  encodeDocument,
  encodeProbe,
} from "./probe-record.codec";
export type { StoredDocument, StoredProbe } from "./probe-record.codec";
export * from "./probe-record.constants";
