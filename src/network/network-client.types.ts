/**
 * Schema of a record to create. Probes only need the default schema with a
 * single subkey owned by the creator.
 */
export type RecordSchema = {
  kind: "DFLT";
  subkeyCount: number;
};

/**
 * An open record as returned by create/open
 */
export type RecordHandle = {
  readonly key: string;
  readonly subkeyCount: number;
};

/**
 * Inclusive range of subkeys that have not propagated yet: [start, end]
 */
export type OfflineRange = readonly [start: number, end: number];

export type PurgeScope = "routes" | "records";

/**
 * A connected session against the DHT. Every method may reject with a
 * TransportError.
 */
export interface NetworkSession {
  /** Administrative reset of stale state left by a prior run */
  debugPurge(scope: PurgeScope): Promise<void>;
  createRecord(schema: RecordSchema): Promise<RecordHandle>;
  openRecord(key: string): Promise<RecordHandle>;
  closeRecord(handle: RecordHandle): Promise<void>;
  writeSubkey(
    handle: RecordHandle,
    index: number,
    data: Uint8Array,
  ): Promise<void>;
  /**
   * Read one subkey. With forceRefresh the value is fetched from the network
   * instead of the local cache. Resolves undefined when no value exists.
   */
  readSubkey(
    handle: RecordHandle,
    index: number,
    forceRefresh: boolean,
  ): Promise<Uint8Array | undefined>;
  inspectPropagation(handle: RecordHandle): Promise<OfflineRange[]>;
}

/**
 * Entry point to the network layer
 */
export interface NetworkClient {
  /** Human-readable address used in logs and errors */
  readonly endpoint: string;
  /** @throws ConnectionUnavailableError */
  connect(): Promise<NetworkSession>;
  disconnect(session: NetworkSession): Promise<void>;
}

/**
 * Count of subkeys still offline across all ranges
 */
export function countOfflineSubkeys(ranges: readonly OfflineRange[]): number {
  return ranges.reduce((total, [start, end]) => total + (end - start + 1), 0);
}
