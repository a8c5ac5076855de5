import { type ProbeRecordMap, encodeDocument } from "../core";
import { TransportError, toError } from "../errors/probe-errors";
import { type Logger, createLogger } from "../logger";
import { DEFAULT_RPC_TIMEOUT } from "../network/network-client.constants";
import { parseSnapshot } from "./parse-snapshot";
import type { ProbeStore } from "./probe-store.types";

export type HttpProbeStoreOptions = {
  /** Replacement for the global fetch */
  fetch?: typeof fetch;
  /** Extra request headers, e.g. authorization */
  headers?: Record<string, string>;
  /** Deadline for each request in milliseconds (default: 30 seconds) */
  timeout?: number;
};

/**
 * Snapshot served over HTTP: loaded with GET, replaced with a single PUT.
 * A 404 means no snapshot exists yet.
 */
export class HttpProbeStore implements ProbeStore {
  private readonly fetchImpl: typeof fetch;
  private readonly headers: Record<string, string>;
  private readonly timeout: number;
  private readonly log: Logger;

  constructor(
    readonly location: string,
    options: HttpProbeStoreOptions = {},
  ) {
    this.fetchImpl = options.fetch ?? fetch;
    this.headers = options.headers ?? {};
    this.timeout = options.timeout ?? DEFAULT_RPC_TIMEOUT;
    this.log = createLogger("http-store").child({ location });
  }

  async load(): Promise<ProbeRecordMap> {
    const response = await this.send("load", {
      method: "GET",
      headers: { accept: "application/json", ...this.headers },
    });

    if (response.status === 404) {
      this.log.info("no_snapshot_found");
      return new Map();
    }

    if (!response.ok) {
      throw new TransportError("load", `HTTP ${response.status}`);
    }

    const records = parseSnapshot(this.location, await response.text());
    this.log.debug({ records: records.size }, "snapshot_loaded");
    return records;
  }

  async save(records: ProbeRecordMap): Promise<void> {
    const response = await this.send("save", {
      method: "PUT",
      headers: { "content-type": "application/json", ...this.headers },
      body: JSON.stringify(encodeDocument(records)),
    });

    if (!response.ok) {
      throw new TransportError("save", `HTTP ${response.status}`);
    }

    this.log.debug({ records: records.size }, "snapshot_saved");
  }

  private async send(operation: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(this.location, {
        ...init,
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (err) {
      throw new TransportError(operation, toError(err).message);
    }
  }
}
