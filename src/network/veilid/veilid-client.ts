import { z } from "zod";
import {
  ConnectionUnavailableError,
  TransportError,
  toError,
} from "../../errors/probe-errors";
import { type Logger, createLogger } from "../../logger";
import {
  DEFAULT_VEILID_HOST,
  DEFAULT_VEILID_PORT,
} from "../network-client.constants";
import type {
  NetworkClient,
  NetworkSession,
  OfflineRange,
  PurgeScope,
  RecordHandle,
  RecordSchema,
} from "../network-client.types";
import {
  JsonApiConnection,
  type JsonApiConnectionOptions,
} from "./json-api-connection";

export type VeilidClientOptions = Partial<JsonApiConnectionOptions>;

const routingContextIdSchema = z.number().int();

const recordDescriptorSchema = z.object({
  key: z.string().min(1),
  schema: z
    .object({
      kind: z.string(),
      o_cnt: z.number().int().optional(),
    })
    .passthrough()
    .optional(),
});

const valueDataSchema = z
  .object({
    seq: z.number().int().optional(),
    data: z.string(),
  })
  .passthrough()
  .nullable();

const recordReportSchema = z
  .object({
    offline_subkeys: z.array(z.tuple([z.number().int(), z.number().int()])),
  })
  .passthrough();

/**
 * Parse an API value or fail the call it came from with a TransportError
 */
function parseValue<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  operation: string,
): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new TransportError(operation, "unexpected response shape");
  }
  return parsed.data;
}

function toHandle(descriptor: z.infer<typeof recordDescriptorSchema>): RecordHandle {
  return {
    key: descriptor.key,
    subkeyCount: descriptor.schema?.o_cnt ?? 1,
  };
}

/**
 * A routing context on a veilid-server, exposed as a probe network session
 */
export class VeilidSession implements NetworkSession {
  constructor(
    private readonly connection: JsonApiConnection,
    readonly routingContextId: number,
  ) {}

  async debugPurge(scope: PurgeScope): Promise<void> {
    await this.connection.request("Debug", { command: `purge ${scope}` });
  }

  async createRecord(schema: RecordSchema): Promise<RecordHandle> {
    const value = await this.routingContext("CreateDhtRecord", {
      schema: { kind: schema.kind, o_cnt: schema.subkeyCount },
    });
    return toHandle(parseValue(recordDescriptorSchema, value, "CreateDhtRecord"));
  }

  async openRecord(key: string): Promise<RecordHandle> {
    const value = await this.routingContext("OpenDhtRecord", { key });
    return toHandle(parseValue(recordDescriptorSchema, value, "OpenDhtRecord"));
  }

  async closeRecord(handle: RecordHandle): Promise<void> {
    await this.routingContext("CloseDhtRecord", { key: handle.key });
  }

  async writeSubkey(
    handle: RecordHandle,
    index: number,
    data: Uint8Array,
  ): Promise<void> {
    await this.routingContext("SetDhtValue", {
      key: handle.key,
      subkey: index,
      data: Buffer.from(data).toString("base64url"),
    });
  }

  async readSubkey(
    handle: RecordHandle,
    index: number,
    forceRefresh: boolean,
  ): Promise<Uint8Array | undefined> {
    const value = await this.routingContext("GetDhtValue", {
      key: handle.key,
      subkey: index,
      force_refresh: forceRefresh,
    });
    const valueData = parseValue(valueDataSchema, value, "GetDhtValue");

    if (!valueData) {
      return undefined;
    }

    return new Uint8Array(Buffer.from(valueData.data, "base64url"));
  }

  async inspectPropagation(handle: RecordHandle): Promise<OfflineRange[]> {
    const value = await this.routingContext("InspectDhtRecord", {
      key: handle.key,
      subkeys: [],
      scope: "Local",
    });
    return parseValue(recordReportSchema, value, "InspectDhtRecord")
      .offline_subkeys;
  }

  /** @internal */
  async release(): Promise<void> {
    await this.routingContext("Release");
  }

  private routingContext(
    rcOp: string,
    params: Record<string, unknown> = {},
  ): Promise<unknown> {
    return this.connection.request("RoutingContext", {
      rc_id: this.routingContextId,
      rc_op: rcOp,
      ...params,
    });
  }
}

/**
 * Network client for a local veilid-server speaking the JSON API over TCP
 */
export class VeilidClient implements NetworkClient {
  private readonly connectionOptions: JsonApiConnectionOptions;
  private readonly sessions: Map<NetworkSession, JsonApiConnection> = new Map();
  private readonly log: Logger;

  constructor(options: VeilidClientOptions = {}) {
    this.connectionOptions = {
      ...options,
      host: options.host ?? DEFAULT_VEILID_HOST,
      port: options.port ?? DEFAULT_VEILID_PORT,
    };
    this.log = createLogger("veilid-client").child({
      endpoint: this.endpoint,
    });
  }

  get endpoint(): string {
    return `${this.connectionOptions.host}:${this.connectionOptions.port}`;
  }

  async connect(): Promise<NetworkSession> {
    const connection = new JsonApiConnection(this.connectionOptions);

    try {
      await connection.open();
      const value = await connection.request("NewRoutingContext");
      const rcId = parseValue(routingContextIdSchema, value, "NewRoutingContext");
      const session = new VeilidSession(connection, rcId);

      this.sessions.set(session, connection);
      this.log.debug({ routingContextId: rcId }, "session_opened");

      return session;
    } catch (err) {
      await connection.close();
      throw new ConnectionUnavailableError(this.endpoint, toError(err).message);
    }
  }

  async disconnect(session: NetworkSession): Promise<void> {
    const connection = this.sessions.get(session);
    if (!connection) {
      return;
    }

    this.sessions.delete(session);

    try {
      if (session instanceof VeilidSession) {
        await session.release();
      }
    } finally {
      await connection.close();
    }
  }
}
