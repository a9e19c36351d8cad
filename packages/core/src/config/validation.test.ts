import { describe, expect, it } from "vitest";
import { ConfigError } from "../infra/errors.js";
import { RecallConfigSchema } from "./schema.js";
import type { RecallConfig } from "./types.js";
import { validateConfig } from "./validation.js";

function makeConfig(raw: Record<string, unknown> = {}): RecallConfig {
  return RecallConfigSchema.parse(raw);
}

describe("validateConfig", () => {
  it("passes for defaults", () => {
    expect(() => validateConfig(makeConfig())).not.toThrow();
  });

  it("rejects an error excerpt longer than the excerpt", () => {
    const config = makeConfig({
      limits: { excerptLength: 50, errorExcerptLength: 80 },
    });
    expect(() => validateConfig(config)).toThrow(ConfigError);
    expect(() => validateConfig(config)).toThrow(
      /limits\.errorExcerptLength \(80\) must not exceed limits\.excerptLength \(50\)/,
    );
  });

  it("rejects a call deadline shorter than the handshake deadline", () => {
    const config = makeConfig({
      backend: { initTimeoutMs: 5000, callTimeoutMs: 1000 },
    });
    expect(() => validateConfig(config)).toThrow(/backend\.callTimeoutMs \(1000\)/);
  });

  it("reports every problem at once", () => {
    const config = makeConfig({
      limits: { excerptLength: 10, errorExcerptLength: 20 },
      backend: { initTimeoutMs: 5000, callTimeoutMs: 1000 },
    });
    let message = "";
    try {
      validateConfig(config);
    } catch (err) {
      message = err instanceof Error ? err.message : "";
    }
    expect(message.split("\n")).toHaveLength(3);
  });
});
