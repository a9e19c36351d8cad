import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { type Mock, describe, expect, it, vi } from "vitest";
import { type BackendProcess, type SpawnBackend, StdioTransport } from "./transport.js";

class FakeProcess extends EventEmitter implements BackendProcess {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  exitCode: number | null = null;
  readonly signals: Array<NodeJS.Signals | number | undefined> = [];
  exitOnSignal = true;

  kill(signal?: NodeJS.Signals | number): boolean {
    this.signals.push(signal);
    if (this.exitOnSignal || signal === "SIGKILL") {
      setImmediate(() => this.exit(null, typeof signal === "string" ? signal : "SIGTERM"));
    }
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.exitCode = code ?? 1;
    this.emit("exit", code, signal);
  }
}

function setup(): { transport: StdioTransport; child: FakeProcess; spawn: Mock<SpawnBackend> } {
  const child = new FakeProcess();
  const spawn = vi.fn<SpawnBackend>(() => {
    setImmediate(() => child.emit("spawn"));
    return child;
  });
  const transport = new StdioTransport({
    command: "uv",
    args: ["run", "rlm-server"],
    cwd: "/opt/rlm",
    env: { RLM_MODE: "test" },
    killTimeoutMs: 50,
    spawn,
  });
  return { transport, child, spawn };
}

function readWritten(stream: PassThrough): string {
  const chunk: unknown = stream.read();
  return chunk === null ? "" : String(chunk);
}

describe("StdioTransport", () => {
  it("spawns the command in the backend directory with merged env", async () => {
    const { transport, spawn } = setup();
    await transport.start();

    expect(transport.connected).toBe(true);
    expect(spawn).toHaveBeenCalledTimes(1);
    expect(spawn).toHaveBeenCalledWith(
      "uv",
      ["run", "rlm-server"],
      expect.objectContaining({ cwd: "/opt/rlm" }),
    );
    expect(spawn.mock.calls[0]?.[2].env.RLM_MODE).toBe("test");
  });

  it("rejects start when the process fails to spawn", async () => {
    const child = new FakeProcess();
    const transport = new StdioTransport({
      command: "missing-binary",
      args: [],
      cwd: "/opt/rlm",
      spawn: () => {
        setImmediate(() => child.emit("error", new Error("spawn missing-binary ENOENT")));
        return child;
      },
    });

    await expect(transport.start()).rejects.toThrow("ENOENT");
    expect(transport.connected).toBe(false);
  });

  it("writes one JSON document per line", async () => {
    const { transport, child } = setup();
    await transport.start();

    transport.send({ jsonrpc: "2.0", id: 1, method: "tools/list" });

    expect(readWritten(child.stdin)).toBe('{"jsonrpc":"2.0","id":1,"method":"tools/list"}\n');
  });

  it("reassembles messages split across chunks and skips non-JSON lines", async () => {
    const { transport, child } = setup();
    const received: unknown[] = [];
    transport.onMessage((message) => received.push(message));
    await transport.start();

    child.stdout.write('{"jsonrpc":"2.0",');
    child.stdout.write('"id":1,"result":{}}\nstarting up...\n{"jsonrpc":"2.0","id":2,"result":3}\n');
    await new Promise((resolve) => setImmediate(resolve));

    expect(received).toEqual([
      { jsonrpc: "2.0", id: 1, result: {} },
      { jsonrpc: "2.0", id: 2, result: 3 },
    ]);
  });

  it("reports an unexpected exit through onClose", async () => {
    const { transport, child } = setup();
    const onClose = vi.fn();
    transport.onClose(onClose);
    await transport.start();

    child.exit(2);

    expect(onClose).toHaveBeenCalledWith("Backend process exited with code 2");
    expect(transport.connected).toBe(false);
    expect(() => transport.send({ jsonrpc: "2.0", method: "ping" })).toThrow(
      "Backend process is not running",
    );
  });

  it("terminates with SIGTERM on close without reporting a loss", async () => {
    const { transport, child } = setup();
    const onClose = vi.fn();
    transport.onClose(onClose);
    await transport.start();

    await transport.close();

    expect(child.signals).toEqual(["SIGTERM"]);
    expect(onClose).not.toHaveBeenCalled();
    expect(transport.connected).toBe(false);
  });

  it("falls back to SIGKILL when the process ignores SIGTERM", async () => {
    const { transport, child } = setup();
    child.exitOnSignal = false;
    await transport.start();

    await transport.close();

    expect(child.signals).toEqual(["SIGTERM", "SIGKILL"]);
  });

  it("keeps running when the process emits a late error", async () => {
    const { transport, child } = setup();
    await transport.start();

    expect(() => child.emit("error", new Error("kill EPERM"))).not.toThrow();
    expect(transport.connected).toBe(true);
  });

  it("refuses to start twice", async () => {
    const { transport } = setup();
    await transport.start();
    await expect(transport.start()).rejects.toThrow("Transport already started");
  });
});
