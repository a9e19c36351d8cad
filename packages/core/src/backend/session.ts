import {
  BackendCallError,
  BackendNotConnectedError,
  BackendTimeoutError,
  errorMessage,
} from "../infra/errors.js";
import { isRecord } from "../infra/json.js";
import { createLogger } from "../infra/logger.js";
import {
  ErrorCodes,
  type JsonRpcId,
  JsonRpcRequestSchema,
  JsonRpcResponseSchema,
} from "./protocol.js";
import type { MessageTransport } from "./transport.js";

const log = createLogger("backend");

interface PendingRequest {
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Request/response bookkeeping on top of a transport: assigns ids, matches
 * replies, and fails requests that outlive their timeout.
 */
export class RpcSession {
  private nextId = 1;
  private readonly pending = new Map<JsonRpcId, PendingRequest>();
  private closed = false;

  constructor(private readonly transport: MessageTransport) {
    transport.onMessage((message) => this.handleMessage(message));
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  request(
    method: string,
    params: Record<string, unknown>,
    timeoutMs: number,
  ): Promise<unknown> {
    if (this.closed || !this.transport.connected) {
      return Promise.reject(new BackendNotConnectedError(method));
    }

    const id = this.nextId++;
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new BackendTimeoutError(method, timeoutMs));
      }, timeoutMs);
      this.pending.set(id, { method, resolve, reject, timer });

      try {
        this.transport.send({ jsonrpc: "2.0", id, method, params });
      } catch (error) {
        clearTimeout(timer);
        this.pending.delete(id);
        reject(new BackendCallError(method, errorMessage(error), error));
      }
    });
  }

  notify(method: string, params?: Record<string, unknown>): void {
    if (this.closed || !this.transport.connected) {
      throw new BackendNotConnectedError(method);
    }
    this.transport.send(params ? { jsonrpc: "2.0", method, params } : { jsonrpc: "2.0", method });
  }

  /** Fails every outstanding request. Further requests are refused. */
  close(reason = "Backend session closed"): void {
    this.closed = true;
    for (const [id, entry] of this.pending) {
      clearTimeout(entry.timer);
      this.pending.delete(id);
      entry.reject(new BackendCallError(entry.method, reason));
    }
  }

  private handleMessage(message: unknown): void {
    if (isRecord(message) && "method" in message) {
      this.handleServerMessage(message);
      return;
    }

    const parsed = JsonRpcResponseSchema.safeParse(message);
    if (!parsed.success) {
      log.debug("Ignoring malformed backend message");
      return;
    }

    const response = parsed.data;
    const entry = this.pending.get(response.id);
    if (!entry) {
      log.debug(`Ignoring response for unknown request id ${String(response.id)}`);
      return;
    }
    clearTimeout(entry.timer);
    this.pending.delete(response.id);

    if ("error" in response) {
      entry.reject(new BackendCallError(entry.method, response.error.message, response.error));
    } else {
      entry.resolve(response.result);
    }
  }

  /** Requests and notifications initiated by the backend. */
  private handleServerMessage(message: unknown): void {
    const parsed = JsonRpcRequestSchema.safeParse(message);
    if (!parsed.success) {
      log.debug("Ignoring malformed backend request");
      return;
    }
    const { id, method } = parsed.data;
    if (id === undefined) {
      log.debug(`Backend notification: ${method}`);
      return;
    }
    if (!this.transport.connected) {
      return;
    }
    if (method === "ping") {
      this.transport.send({ jsonrpc: "2.0", id, result: {} });
      return;
    }
    this.transport.send({
      jsonrpc: "2.0",
      id,
      error: { code: ErrorCodes.METHOD_NOT_FOUND, message: `Method not found: ${method}` },
    });
  }
}
