import { afterEach, describe, expect, it, vi } from "vitest";
import {
  createLogger,
  isLogLevel,
  redactSensitive,
  setDefaultLogLevel,
  setDefaultRedaction,
} from "./logger.js";

describe("redactSensitive", () => {
  it("redacts token fields", () => {
    const result = redactSensitive({ token: "test-secret" });
    expect(result).toEqual({ token: "[REDACTED]" });
  });

  it("redacts apiKey and api_key fields", () => {
    const result = redactSensitive({ apiKey: "placeholder", api_key: "placeholder" });
    expect(result).toEqual({ apiKey: "[REDACTED]", api_key: "[REDACTED]" });
  });

  it("redacts nested sensitive fields", () => {
    const result = redactSensitive({
      backend: {
        cwd: "/opt/rlm",
        auth: { token: "test-secret", mode: "token" },
      },
    });
    expect(result).toEqual({
      backend: {
        cwd: "/opt/rlm",
        auth: { token: "[REDACTED]", mode: "token" },
      },
    });
  });

  it("preserves non-sensitive fields", () => {
    const result = redactSensitive({
      command: "uv",
      maxResults: 5,
      enabled: true,
    });
    expect(result).toEqual({ command: "uv", maxResults: 5, enabled: true });
  });

  it("handles arrays", () => {
    const result = redactSensitive([
      { password: "pass", id: 1 },
      { name: "x" },
    ]);
    expect(result).toEqual([{ password: "[REDACTED]", id: 1 }, { name: "x" }]);
  });

  it("handles null, undefined and primitives", () => {
    expect(redactSensitive(null)).toBeNull();
    expect(redactSensitive(undefined)).toBeUndefined();
    expect(redactSensitive("string")).toBe("string");
    expect(redactSensitive(42)).toBe(42);
  });

  it("only redacts string values in sensitive keys", () => {
    const result = redactSensitive({ token: 12345, password: null });
    expect(result).toEqual({ token: 12345, password: null });
  });
});

describe("isLogLevel", () => {
  it("accepts known levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("fatal")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("")).toBe(false);
  });
});

describe("createLogger", () => {
  afterEach(() => {
    setDefaultLogLevel("info");
    setDefaultRedaction(true);
    vi.restoreAllMocks();
  });

  it("writes to stderr and never to stdout", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const consoleLog = vi.spyOn(console, "log").mockImplementation(() => undefined);

    createLogger("test").warn("careful");

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0]?.[0])).toContain("careful");
    expect(stdout).not.toHaveBeenCalled();
    expect(consoleLog).not.toHaveBeenCalled();
  });

  it("drops messages below the configured level", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    const log = createLogger("test", { level: "warn" });
    log.info("hidden");
    log.error("shown");

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0]?.[0])).toContain("shown");
  });

  it("uses the default level for loggers created afterwards", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    setDefaultLogLevel("error");
    createLogger("test").warn("hidden");

    expect(stderr).not.toHaveBeenCalled();
  });

  it("masks secret keys unless redaction is switched off", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    createLogger("test").info({ apiKey: "test-secret" });
    setDefaultRedaction(false);
    createLogger("test").info({ apiKey: "test-secret" });

    expect(String(stderr.mock.calls[0]?.[0])).toContain("[REDACTED]");
    expect(String(stderr.mock.calls[0]?.[0])).not.toContain("test-secret");
    expect(String(stderr.mock.calls[1]?.[0])).toContain("test-secret");
  });
});
