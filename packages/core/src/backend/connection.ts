import type { ResolvedBackendConfig } from "../config/types.js";
import {
  BackendConnectionError,
  BackendNotConnectedError,
  errorMessage,
} from "../infra/errors.js";
import { APP_NAME, APP_VERSION } from "../infra/app-info.js";
import { createLogger } from "../infra/logger.js";
import { RetryExhaustedError, withRetry } from "../infra/retry.js";
import { InitializeResultSchema, PROTOCOL_VERSION } from "./protocol.js";
import { RpcSession } from "./session.js";
import { type MessageTransport, StdioTransport } from "./transport.js";

const log = createLogger("backend");

export const CLIENT_INFO = { name: APP_NAME, version: APP_VERSION } as const;

export type ConnectionState = "disconnected" | "connecting" | "connected";

export type TransportFactory = (config: ResolvedBackendConfig) => MessageTransport;

const stdioTransportFactory: TransportFactory = (config) =>
  new StdioTransport({
    command: config.command,
    args: config.args,
    cwd: config.cwd,
    env: config.env,
  });

/**
 * Owns the single session with the semantic backend. `connect()` retries
 * with exponential backoff; a dropped process moves the state back to
 * disconnected and the next caller reconnects.
 */
export class BackendConnection {
  private _state: ConnectionState = "disconnected";
  private transport: MessageTransport | null = null;
  private session: RpcSession | null = null;
  private connecting: Promise<void> | null = null;
  private readonly createTransport: TransportFactory;

  constructor(
    private readonly config: ResolvedBackendConfig,
    options?: { createTransport?: TransportFactory },
  ) {
    this.createTransport = options?.createTransport ?? stdioTransportFactory;
  }

  get state(): ConnectionState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state === "connected";
  }

  /**
   * Establishes the session, reusing a live one. Concurrent callers share
   * the same attempt.
   * @throws BackendConnectionError once every attempt has failed
   */
  async connect(): Promise<void> {
    if (this._state === "connected") {
      return;
    }
    const pending =
      this.connecting ??
      this.connectWithRetry().finally(() => {
        this.connecting = null;
      });
    this.connecting = pending;
    return pending;
  }

  /**
   * Invokes a backend tool and returns its raw result.
   * @throws BackendNotConnectedError when no session is open
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
    const session = this.session;
    if (this._state !== "connected" || !session) {
      throw new BackendNotConnectedError(name);
    }
    return session.request(
      "tools/call",
      { name, arguments: args },
      this.config.callTimeoutMs,
    );
  }

  async disconnect(): Promise<void> {
    const session = this.session;
    const transport = this.transport;
    this.session = null;
    this.transport = null;
    this._state = "disconnected";

    session?.close("Backend disconnected");
    if (transport) {
      try {
        await transport.close();
      } catch (error) {
        log.warn(`Error closing backend: ${errorMessage(error)}`);
      }
      log.info("Disconnected from backend");
    }
  }

  private async connectWithRetry(): Promise<void> {
    this._state = "connecting";
    const maxAttempts = this.config.connectAttempts;
    try {
      await withRetry(
        async (attempt) => {
          try {
            await this.openSession();
          } catch (error) {
            log.warn(
              `Backend connect attempt ${attempt + 1}/${maxAttempts} failed: ${errorMessage(error)}`,
            );
            throw error;
          }
        },
        {
          maxAttempts,
          initialDelayMs: this.config.initialDelayMs,
          onRetry: (_err, _attempt, delayMs) => {
            log.debug(`Retrying backend connect in ${delayMs}ms`);
          },
        },
      );
    } catch (error) {
      this._state = "disconnected";
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      log.error(`Backend unavailable after ${maxAttempts} attempts: ${errorMessage(cause)}`);
      throw new BackendConnectionError(
        `Could not connect to backend after ${maxAttempts} attempts: ${errorMessage(cause)}`,
        maxAttempts,
        cause,
      );
    }
    this._state = "connected";
    log.info(`Connected to backend (${this.config.command} in ${this.config.cwd})`);
  }

  /** One attempt: spawn, handshake, then announce readiness. */
  private async openSession(): Promise<void> {
    const transport = this.createTransport(this.config);
    const session = new RpcSession(transport);
    transport.onClose((reason) => {
      session.close(reason);
      if (this.transport !== transport) {
        return;
      }
      log.warn(`Backend connection lost: ${reason}`);
      this.session = null;
      this.transport = null;
      this._state = "disconnected";
    });

    try {
      await transport.start();
      const result = await session.request(
        "initialize",
        {
          protocolVersion: PROTOCOL_VERSION,
          capabilities: {},
          clientInfo: CLIENT_INFO,
        },
        this.config.initTimeoutMs,
      );
      const init = InitializeResultSchema.safeParse(result);
      if (!init.success) {
        throw new Error("Backend returned an invalid initialize result");
      }
      session.notify("notifications/initialized");
      log.debug(
        `Backend handshake done (protocol ${init.data.protocolVersion}${init.data.serverInfo ? `, ${init.data.serverInfo.name}` : ""})`,
      );
    } catch (error) {
      session.close(errorMessage(error));
      await transport.close().catch((closeError: unknown) => {
        log.debug(`Error closing failed backend attempt: ${errorMessage(closeError)}`);
      });
      throw error;
    }

    this.transport = transport;
    this.session = session;
  }
}
