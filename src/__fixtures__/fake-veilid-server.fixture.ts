import { type Server, type Socket, createServer } from "node:net";
import { z } from "zod";

const requestSchema = z
  .object({
    id: z.number(),
    op: z.string(),
    rc_op: z.string().optional(),
    key: z.string().optional(),
    data: z.string().optional(),
    schema: z.object({ o_cnt: z.number() }).partial().optional(),
  })
  .passthrough();

export type FakeRequest = z.infer<typeof requestSchema>;

export type FakeVeilidServerOptions = {
  /** Keep connections open after the client ends its side */
  allowHalfOpen?: boolean;
};

type Reply = { value: unknown } | { error: { kind: string; message: string } };

/**
 * veilid-server stand-in listening on localhost. Speaks the newline-delimited
 * JSON API for the calls the probe makes and keeps records in memory.
 */
export class FakeVeilidServer {
  readonly requests: FakeRequest[] = [];
  readonly records: Map<string, string | null> = new Map();
  /** Operations (op or rc_op) that never get a response */
  readonly silent: Set<string> = new Set();
  offlineSubkeys: [number, number][] = [];
  /** Deliver each response in two writes */
  splitWrites = false;
  /** Send an unsolicited update before each response */
  sendUpdates = false;

  private readonly server: Server;
  private readonly sockets: Set<Socket> = new Set();
  private created = 0;

  constructor(options: FakeVeilidServerOptions = {}) {
    this.server = createServer(
      { allowHalfOpen: options.allowHalfOpen ?? false },
      (socket) => this.accept(socket),
    );
  }

  async listen(): Promise<number> {
    await new Promise<void>((resolve) => {
      this.server.listen(0, "127.0.0.1", () => resolve());
    });
    const address = this.server.address();
    if (address === null || typeof address === "string") {
      throw new Error("fake server has no TCP address");
    }
    return address.port;
  }

  async close(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  /** rc_op, or op outside a routing context, of every request received */
  get operations(): string[] {
    return this.requests.map((request) => request.rc_op ?? request.op);
  }

  private accept(socket: Socket): void {
    this.sockets.add(socket);
    socket.on("close", () => this.sockets.delete(socket));
    socket.setEncoding("utf8");

    let buffer = "";
    socket.on("data", (chunk: string) => {
      buffer += chunk;
      let newline = buffer.indexOf("\n");
      while (newline !== -1) {
        const line = buffer.slice(0, newline);
        buffer = buffer.slice(newline + 1);
        this.handle(socket, requestSchema.parse(JSON.parse(line)));
        newline = buffer.indexOf("\n");
      }
    });
  }

  private handle(socket: Socket, request: FakeRequest): void {
    this.requests.push(request);
    const operation = request.rc_op ?? request.op;
    if (this.silent.has(operation)) {
      return;
    }

    if (this.sendUpdates) {
      socket.write(`${JSON.stringify({ type: "Update", kind: "Log" })}\n`);
    }

    const line = `${JSON.stringify({
      type: "Response",
      id: request.id,
      op: request.op,
      ...this.reply(operation, request),
    })}\n`;

    if (this.splitWrites) {
      const middle = Math.floor(line.length / 2);
      socket.write(line.slice(0, middle));
      setImmediate(() => socket.write(line.slice(middle)));
    } else {
      socket.write(line);
    }
  }

  private reply(operation: string, request: FakeRequest): Reply {
    const key = request.key ?? "";

    switch (operation) {
      case "NewRoutingContext":
        return { value: 7 };
      case "Debug":
      case "Release":
      case "CloseDhtRecord":
        return { value: null };
      case "CreateDhtRecord": {
        const created = `VLD0:fake${++this.created}`;
        this.records.set(created, null);
        return {
          value: {
            key: created,
            owner: "owner",
            schema: { kind: "DFLT", o_cnt: request.schema?.o_cnt ?? 1 },
          },
        };
      }
      case "OpenDhtRecord":
        return this.records.has(key)
          ? { value: { key, owner: "owner", schema: { kind: "DFLT", o_cnt: 1 } } }
          : { error: { kind: "KeyNotFound", message: key } };
      case "SetDhtValue":
        this.records.set(key, request.data ?? null);
        return { value: null };
      case "GetDhtValue": {
        const data = this.records.get(key);
        return { value: data ? { seq: 0, data, writer: "writer" } : null };
      }
      case "InspectDhtRecord":
        return {
          value: {
            subkeys: [[0, 0]],
            offline_subkeys: this.offlineSubkeys,
          },
        };
      default:
        return { error: { kind: "InvalidArgument", message: operation } };
    }
  }
}
