import bs58 from "bs58";
import {
  ConnectionUnavailableError,
  TransportError,
} from "../errors/probe-errors";
import type {
  NetworkClient,
  NetworkSession,
  OfflineRange,
  PurgeScope,
  RecordHandle,
  RecordSchema,
} from "./network-client.types";

export const MEMORY_KEY_PREFIX = "VLD0:" as const;
const KEY_SIZE_IN_BYTES = 32;

/**
 * Operations whose next calls can be made to fail
 */
export type MemoryOperation =
  | "connect"
  | "purge"
  | "create"
  | "open"
  | "close"
  | "write"
  | "read"
  | "inspect";

export type MemoryNetworkOptions = {
  /** Number of propagation checks reporting offline subkeys before a write settles (default: 0) */
  settleAfterPolls?: number;
  /** Simulated latency of every call in milliseconds (default: 0) */
  latency?: number;
};

type StoredRecord = {
  subkeyCount: number;
  subkeys: Map<number, Uint8Array>;
  pollsUntilSettled: number;
};

type Fault = {
  remaining: number;
  reason: string;
};

/**
 * Per-operation call counters
 */
export type MemoryNetworkStats = Record<MemoryOperation, number> & {
  forcedReads: number;
  openHandles: number;
};

/**
 * An in-process DHT. Records live in a map; propagation and failures are
 * simulated so the probe lifecycle can run without a network.
 */
export class MemoryNetwork implements NetworkClient {
  readonly endpoint = "memory";
  private readonly records: Map<string, StoredRecord> = new Map();
  private readonly faults: Map<MemoryOperation, Fault> = new Map();
  private settleAfterPolls: number;
  private readonly latency: number;
  private readonly stats: MemoryNetworkStats = {
    connect: 0,
    purge: 0,
    create: 0,
    open: 0,
    close: 0,
    write: 0,
    read: 0,
    inspect: 0,
    forcedReads: 0,
    openHandles: 0,
  };

  constructor(options: MemoryNetworkOptions = {}) {
    this.settleAfterPolls = options.settleAfterPolls ?? 0;
    this.latency = options.latency ?? 0;
  }

  async connect(): Promise<NetworkSession> {
    await this.call("connect");
    return new MemorySession(this);
  }

  async disconnect(session: NetworkSession): Promise<void> {
    if (session instanceof MemorySession) {
      session.invalidate();
    }
  }

  /**
   * Make the next `count` calls of an operation fail
   */
  failNext(operation: MemoryOperation, count = 1, reason = "simulated failure"): void {
    this.faults.set(operation, { remaining: count, reason });
  }

  /**
   * Make every future call of an operation fail
   */
  failAlways(operation: MemoryOperation, reason = "simulated failure"): void {
    this.failNext(operation, Number.POSITIVE_INFINITY, reason);
  }

  clearFaults(): void {
    this.faults.clear();
  }

  setSettleAfterPolls(polls: number): void {
    this.settleAfterPolls = polls;
  }

  /**
   * Drop a record from the network as if every peer had forgotten it
   */
  loseRecord(key: string): void {
    this.records.delete(key);
  }

  /**
   * Cut a stored subkey value down to `length` bytes
   */
  truncateRecord(key: string, length: number, index = 0): void {
    const value = this.records.get(key)?.subkeys.get(index);
    if (value) {
      this.records.get(key)?.subkeys.set(index, value.slice(0, length));
    }
  }

  /**
   * Place a record directly, bypassing create/write
   */
  seedRecord(key: string, value: Uint8Array): void {
    this.records.set(key, {
      subkeyCount: 1,
      subkeys: new Map([[0, new Uint8Array(value)]]),
      pollsUntilSettled: 0,
    });
  }

  hasRecord(key: string): boolean {
    return this.records.has(key);
  }

  get recordCount(): number {
    return this.records.size;
  }

  getStats(): MemoryNetworkStats {
    return { ...this.stats };
  }

  /** @internal */
  async call(operation: MemoryOperation): Promise<void> {
    this.stats[operation]++;

    if (this.latency > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.latency));
    }

    const fault = this.faults.get(operation);
    if (fault && fault.remaining > 0) {
      fault.remaining--;
      if (fault.remaining === 0) {
        this.faults.delete(operation);
      }

      if (operation === "connect") {
        throw new ConnectionUnavailableError(this.endpoint, fault.reason);
      }
      throw new TransportError(operation, fault.reason);
    }
  }

  /** @internal */
  createStoredRecord(schema: RecordSchema): RecordHandle {
    const key = `${MEMORY_KEY_PREFIX}${bs58.encode(
      crypto.getRandomValues(new Uint8Array(KEY_SIZE_IN_BYTES)),
    )}`;

    this.records.set(key, {
      subkeyCount: schema.subkeyCount,
      subkeys: new Map(),
      pollsUntilSettled: 0,
    });
    this.stats.openHandles++;

    return { key, subkeyCount: schema.subkeyCount };
  }

  /** @internal */
  getStoredRecord(operation: string, key: string): StoredRecord {
    const record = this.records.get(key);
    if (!record) {
      throw new TransportError(operation, `record ${key} not found`);
    }
    return record;
  }

  /** @internal */
  markWritten(record: StoredRecord): void {
    record.pollsUntilSettled = this.settleAfterPolls;
  }

  /** @internal */
  trackHandle(delta: 1 | -1): void {
    this.stats.openHandles += delta;
  }

  /** @internal */
  countForcedRead(): void {
    this.stats.forcedReads++;
  }
}

/**
 * A session on a MemoryNetwork. Calls fail once the session is disconnected.
 */
export class MemorySession implements NetworkSession {
  private active = true;

  constructor(private readonly network: MemoryNetwork) {}

  invalidate(): void {
    this.active = false;
  }

  async debugPurge(_scope: PurgeScope): Promise<void> {
    await this.enter("purge");
  }

  async createRecord(schema: RecordSchema): Promise<RecordHandle> {
    await this.enter("create");
    return this.network.createStoredRecord(schema);
  }

  async openRecord(key: string): Promise<RecordHandle> {
    await this.enter("open");
    const record = this.network.getStoredRecord("open", key);
    this.network.trackHandle(1);
    return { key, subkeyCount: record.subkeyCount };
  }

  async closeRecord(_handle: RecordHandle): Promise<void> {
    await this.enter("close");
    this.network.trackHandle(-1);
  }

  async writeSubkey(
    handle: RecordHandle,
    index: number,
    data: Uint8Array,
  ): Promise<void> {
    await this.enter("write");
    const record = this.network.getStoredRecord("write", handle.key);

    if (index < 0 || index >= record.subkeyCount) {
      throw new TransportError("write", `subkey ${index} out of range`);
    }

    record.subkeys.set(index, new Uint8Array(data));
    this.network.markWritten(record);
  }

  async readSubkey(
    handle: RecordHandle,
    index: number,
    forceRefresh: boolean,
  ): Promise<Uint8Array | undefined> {
    await this.enter("read");
    if (forceRefresh) {
      this.network.countForcedRead();
    }

    const value = this.network.getStoredRecord("read", handle.key).subkeys.get(index);
    return value ? new Uint8Array(value) : undefined;
  }

  async inspectPropagation(handle: RecordHandle): Promise<OfflineRange[]> {
    await this.enter("inspect");
    const record = this.network.getStoredRecord("inspect", handle.key);

    if (record.pollsUntilSettled > 0) {
      record.pollsUntilSettled--;
      return [[0, record.subkeyCount - 1]];
    }

    return [];
  }

  private async enter(operation: MemoryOperation): Promise<void> {
    if (!this.active) {
      throw new TransportError(operation, "session is disconnected");
    }
    await this.network.call(operation);
  }
}
