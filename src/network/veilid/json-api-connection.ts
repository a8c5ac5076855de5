import { type Socket, createConnection } from "node:net";
import { z } from "zod";
import { TransportError } from "../../errors/probe-errors";
import { type Logger, createLogger } from "../../logger";
import {
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_RPC_TIMEOUT,
} from "../network-client.constants";

export type JsonApiConnectionOptions = {
  host: string;
  port: number;
  /** Per-request timeout in milliseconds (default: 30 seconds) */
  rpcTimeout?: number;
  /** Timeout for establishing the TCP connection (default: 10 seconds) */
  connectTimeout?: number;
};

const apiErrorSchema = z.object({
  kind: z.string(),
  message: z.string().optional(),
});

const responseSchema = z.object({
  type: z.literal("Response"),
  id: z.number(),
  value: z.unknown().optional(),
  error: apiErrorSchema.optional(),
});

const messageSchema = z.object({ type: z.string() }).passthrough();

type RequestOutcome =
  | { ok: true; value: unknown }
  | { ok: false; error: TransportError };

type PendingRequest = {
  operation: string;
  resolve: (value: unknown) => void;
  reject: (error: TransportError) => void;
  timer: NodeJS.Timeout;
};

/**
 * Newline-delimited JSON request/response channel to a veilid-server.
 * Requests are multiplexed by id; unsolicited updates are ignored.
 */
export class JsonApiConnection {
  private socket: Socket | null = null;
  private buffer = "";
  private nextId = 1;
  private readonly pending: Map<number, PendingRequest> = new Map();
  private readonly rpcTimeout: number;
  private readonly connectTimeout: number;
  private readonly log: Logger;

  constructor(private readonly options: JsonApiConnectionOptions) {
    this.rpcTimeout = options.rpcTimeout ?? DEFAULT_RPC_TIMEOUT;
    this.connectTimeout = options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT;
    this.log = createLogger("json-api").child({ endpoint: this.endpoint });
  }

  get endpoint(): string {
    return `${this.options.host}:${this.options.port}`;
  }

  get isOpen(): boolean {
    return this.socket !== null;
  }

  /**
   * Open the TCP connection.
   * @throws TransportError if the server cannot be reached in time
   */
  async open(): Promise<void> {
    if (this.socket) {
      return;
    }

    const socket = await new Promise<Socket>((resolve, reject) => {
      const pendingSocket = createConnection({
        host: this.options.host,
        port: this.options.port,
      });

      const timer = setTimeout(() => {
        pendingSocket.destroy();
        reject(
          new TransportError(
            "connect",
            `timed out after ${this.connectTimeout}ms`,
          ),
        );
      }, this.connectTimeout);

      pendingSocket.once("error", (err) => {
        clearTimeout(timer);
        reject(new TransportError("connect", err.message));
      });

      pendingSocket.once("connect", () => {
        clearTimeout(timer);
        pendingSocket.removeAllListeners("error");
        resolve(pendingSocket);
      });
    });

    socket.setEncoding("utf8");
    socket.on("data", (chunk: string) => this.handleData(chunk));
    socket.on("error", (err) => {
      this.log.warn({ err }, "socket_error");
    });
    socket.on("close", () => this.handleClose());

    this.socket = socket;
    this.log.debug("connected");
  }

  /**
   * Send one request and wait for its response value.
   * @throws TransportError on timeout, closed connection or an API error
   */
  async request(
    op: string,
    params: Record<string, unknown> = {},
  ): Promise<unknown> {
    const socket = this.socket;
    const operation = typeof params.rc_op === "string" ? params.rc_op : op;

    if (!socket) {
      throw new TransportError(operation, "connection is not open");
    }

    const id = this.nextId++;
    const line = `${JSON.stringify({ id, op, ...params })}\n`;

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(
          new TransportError(operation, `timed out after ${this.rpcTimeout}ms`),
        );
      }, this.rpcTimeout);

      this.pending.set(id, { operation, resolve, reject, timer });

      socket.write(line, (err) => {
        if (err) {
          this.settle(id, {
            ok: false,
            error: new TransportError(operation, err.message),
          });
        }
      });
    });
  }

  /**
   * Close the connection. Requests still in flight are rejected. A peer
   * that has not closed its side within the connect timeout is dropped.
   */
  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.log.warn({ timeout: this.connectTimeout }, "close_timed_out");
        socket.destroy();
      }, this.connectTimeout);

      socket.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
      socket.end();
    });
  }

  private handleData(chunk: string): void {
    this.buffer += chunk;

    let newline = this.buffer.indexOf("\n");
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).trim();
      this.buffer = this.buffer.slice(newline + 1);

      if (line) {
        this.handleLine(line);
      }

      newline = this.buffer.indexOf("\n");
    }
  }

  private handleLine(line: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      this.log.warn({ line: line.slice(0, 200) }, "unparseable_message");
      return;
    }

    const message = messageSchema.safeParse(parsed);
    if (!message.success) {
      this.log.warn({ line: line.slice(0, 200) }, "unexpected_message");
      return;
    }

    if (message.data.type !== "Response") {
      this.log.debug({ type: message.data.type }, "ignored_update");
      return;
    }

    const response = responseSchema.safeParse(parsed);
    if (!response.success) {
      this.log.warn({ line: line.slice(0, 200) }, "malformed_response");
      return;
    }

    const { id, value, error } = response.data;
    const request = this.pending.get(id);
    if (!request) {
      this.log.debug({ id }, "response_without_request");
      return;
    }

    if (error) {
      const reason = error.message
        ? `${error.kind}: ${error.message}`
        : error.kind;
      this.settle(id, {
        ok: false,
        error: new TransportError(request.operation, reason),
      });
    } else {
      this.settle(id, { ok: true, value: value ?? null });
    }
  }

  private settle(id: number, outcome: RequestOutcome): void {
    const request = this.pending.get(id);
    if (!request) {
      return;
    }

    this.pending.delete(id);
    clearTimeout(request.timer);

    if (outcome.ok) {
      request.resolve(outcome.value);
    } else {
      request.reject(outcome.error);
    }
  }

  private handleClose(): void {
    this.socket = null;
    this.buffer = "";

    for (const id of [...this.pending.keys()]) {
      const request = this.pending.get(id);
      if (request) {
        this.settle(id, {
          ok: false,
          error: new TransportError(request.operation, "connection closed"),
        });
      }
    }

    this.log.debug("closed");
  }
}
