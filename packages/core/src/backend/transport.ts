import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable, Writable } from "node:stream";
import { createLogger } from "../infra/logger.js";
import type { JsonRpcMessage } from "./protocol.js";

const log = createLogger("backend");

/**
 * Moves JSON-RPC messages to and from the backend. Knows nothing about
 * request ids or the handshake; that is the session's job.
 */
export interface MessageTransport {
  readonly connected: boolean;
  start(): Promise<void>;
  send(message: JsonRpcMessage): void;
  onMessage(handler: (message: unknown) => void): void;
  onClose(handler: (reason: string) => void): void;
  close(): Promise<void>;
}

/** The parts of a child process the stdio transport uses. */
export interface BackendProcess extends EventEmitter {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnBackend = (
  command: string,
  args: readonly string[],
  options: { cwd: string; env: NodeJS.ProcessEnv },
) => BackendProcess;

export interface StdioTransportOptions {
  command: string;
  args: readonly string[];
  cwd: string;
  env?: Record<string, string>;
  /** Grace period between SIGTERM and SIGKILL on close. */
  killTimeoutMs?: number;
  spawn?: SpawnBackend;
}

const spawnBackend: SpawnBackend = (command, args, options) =>
  spawn(command, [...args], { cwd: options.cwd, env: options.env, stdio: "pipe" });

/**
 * Spawns the backend as a child process and speaks line-delimited JSON-RPC
 * over its stdin/stdout. Stderr is forwarded to the debug log.
 */
export class StdioTransport implements MessageTransport {
  private process: BackendProcess | null = null;
  private buffer = "";
  private _connected = false;
  private messageHandler?: (message: unknown) => void;
  private closeHandler?: (reason: string) => void;

  constructor(private readonly options: StdioTransportOptions) {}

  get connected(): boolean {
    return this._connected;
  }

  /**
   * Spawns the process and resolves once it is running.
   * @throws Error when the command cannot be started (e.g. ENOENT)
   */
  async start(): Promise<void> {
    if (this.process) {
      throw new Error("Transport already started");
    }

    const env = { ...process.env, ...(this.options.env ?? {}) };
    const spawnFn = this.options.spawn ?? spawnBackend;
    const child = spawnFn(this.options.command, this.options.args, {
      cwd: this.options.cwd,
      env,
    });
    this.process = child;
    this.buffer = "";

    child.stdout.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => this.handleData(chunk));
    child.stderr.setEncoding("utf-8");
    child.stderr.on("data", (chunk: string) => {
      const text = chunk.trimEnd();
      if (text) log.debug(`backend stderr: ${text}`);
    });
    child.stdin.on("error", (err: Error) => {
      log.debug(`backend stdin error: ${err.message}`);
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off("error", onError);
        resolve();
      };
      const onError = (err: Error): void => {
        child.off("spawn", onSpawn);
        this.process = null;
        reject(err);
      };
      child.once("spawn", onSpawn);
      child.once("error", onError);
    });

    child.on("error", (err: Error) => {
      log.warn(`Backend process error: ${err.message}`);
    });
    child.on("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      this.handleExit(child, code, signal);
    });
    this._connected = true;
  }

  send(message: JsonRpcMessage): void {
    const child = this.process;
    if (!this._connected || !child) {
      throw new Error("Backend process is not running");
    }
    child.stdin.write(`${JSON.stringify(message)}\n`);
  }

  onMessage(handler: (message: unknown) => void): void {
    this.messageHandler = handler;
  }

  onClose(handler: (reason: string) => void): void {
    this.closeHandler = handler;
  }

  /**
   * Terminates the process: SIGTERM, then SIGKILL once the grace period
   * runs out. Safe to call when nothing is running.
   */
  async close(): Promise<void> {
    const child = this.process;
    this.process = null;
    this._connected = false;
    if (!child || child.exitCode !== null) {
      return;
    }

    const exited = new Promise<void>((resolve) => {
      child.once("exit", () => resolve());
    });
    child.stdin.end();
    child.kill("SIGTERM");

    let timer: NodeJS.Timeout | undefined;
    const gracePeriod = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.options.killTimeoutMs ?? 2000);
    });
    const outcome = await Promise.race([exited, gracePeriod]);
    clearTimeout(timer);
    if (outcome === "timeout") {
      child.kill("SIGKILL");
    }
  }

  private handleExit(
    child: BackendProcess,
    code: number | null,
    signal: NodeJS.Signals | null,
  ): void {
    if (this.process !== child) {
      return;
    }
    this.process = null;
    this._connected = false;
    const reason = signal
      ? `Backend process killed by ${signal}`
      : `Backend process exited with code ${code ?? "unknown"}`;
    log.warn(reason);
    this.closeHandler?.(reason);
  }

  private handleData(chunk: string): void {
    this.buffer += chunk;
    let idx = this.buffer.indexOf("\n");
    while (idx !== -1) {
      const line = this.buffer.slice(0, idx).trim();
      this.buffer = this.buffer.slice(idx + 1);
      if (line) {
        this.dispatchLine(line);
      }
      idx = this.buffer.indexOf("\n");
    }
  }

  private dispatchLine(line: string): void {
    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch {
      log.debug(`Ignoring non-JSON line from backend: ${line.slice(0, 200)}`);
      return;
    }
    this.messageHandler?.(message);
  }
}
