export { formatLifetimeReport } from "./format-report";
export {
  LIFETIME_BIN_HOURS,
  PAYLOAD_BIN_BYTES,
  buildLifetimeReport,
  failureCategory,
  histogram,
  lifetimeSeconds,
  median,
} from "./lifetime-report";
export type {
  GroupReport,
  HistogramBin,
  IntervalReport,
  LifetimeReport,
  LifetimeStats,
} from "./lifetime-report";
