import { ConfigError } from "../infra/errors.js";
import type { RecallConfig } from "./types.js";

/**
 * Cross-field validation that goes beyond what the Zod schema handles.
 */
export function validateConfig(config: RecallConfig): void {
  const errors: string[] = [];
  const { limits, backend } = config;

  if (limits.errorExcerptLength > limits.excerptLength) {
    errors.push(
      `limits.errorExcerptLength (${limits.errorExcerptLength}) must not exceed ` +
        `limits.excerptLength (${limits.excerptLength}).`,
    );
  }

  if (backend.callTimeoutMs < backend.initTimeoutMs) {
    errors.push(
      `backend.callTimeoutMs (${backend.callTimeoutMs}) must be at least ` +
        `backend.initTimeoutMs (${backend.initTimeoutMs}).`,
    );
  }

  if (errors.length > 0) {
    throw new ConfigError(
      `Config validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`,
    );
  }
}
