export const SECONDS_PER_HOUR = 60 * 60;
export const DEFAULT_EVALUATION_INTERVALS_H = [1, 12, 24, 168, 672] as const;
export const DEFAULT_PAYLOAD_MIN_BYTES = 1;
export const DEFAULT_PAYLOAD_MAX_BYTES = 32_000;
export const PROBE_SUBKEY = 0; // Probes use a single-subkey record
