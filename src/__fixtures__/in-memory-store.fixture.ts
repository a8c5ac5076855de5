import type { ProbeRecordMap } from "../core";
import type { ProbeStore } from "../store";

/**
 * ProbeStore kept in memory. Saved maps are copied so later mutation of the
 * scheduler's map cannot leak into the "persisted" snapshot.
 */
export class InMemoryProbeStore implements ProbeStore {
  readonly location = "memory://probes";
  snapshot: ProbeRecordMap | null;
  saves = 0;

  constructor(initial: ProbeRecordMap | null = null) {
    this.snapshot = initial ? new Map(initial) : null;
  }

  async load(): Promise<ProbeRecordMap> {
    return new Map(this.snapshot ?? []);
  }

  async save(records: ProbeRecordMap): Promise<void> {
    this.saves++;
    this.snapshot = new Map(records);
  }
}
