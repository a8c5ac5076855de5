import type { ProbeRecordMap } from "../core";

/**
 * Durable snapshot of every probe, always read and written as a whole
 */
export interface ProbeStore {
  /** File path or URL the snapshot lives at */
  readonly location: string;
  /**
   * Load the last saved snapshot, or an empty map when none exists yet.
   * @throws CorruptStoreError if a snapshot exists but cannot be parsed
   */
  load(): Promise<ProbeRecordMap>;
  /** Replace the snapshot atomically */
  save(records: ProbeRecordMap): Promise<void>;
}
