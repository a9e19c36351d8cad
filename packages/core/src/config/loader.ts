import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import JSON5 from "json5";
import { ConfigError } from "../infra/errors.js";
import { type JsonObject, isRecord } from "../infra/json.js";
import { DEFAULT_CONFIG_FILE, ENV } from "./defaults.js";
import { RecallConfigSchema } from "./schema.js";
import type { RecallConfig, ResolvedBackendConfig } from "./types.js";
import { validateConfig } from "./validation.js";

export interface LoadConfigOptions {
  /** Explicit config file. Must exist when given. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

type RawConfig = JsonObject;

async function readRawConfig(options: LoadConfigOptions): Promise<RawConfig> {
  const explicit = options.configPath !== undefined;
  const filePath = resolve(
    options.cwd ?? process.cwd(),
    options.configPath ?? DEFAULT_CONFIG_FILE,
  );

  if (!existsSync(filePath)) {
    if (explicit) {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    return {};
  }

  const raw = await readFile(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON or JSON5: ${filePath}`, err);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain an object: ${filePath}`);
  }
  return parsed;
}

function section(raw: RawConfig, key: string): RawConfig {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

/**
 * Environment variables win over the file. Only non-empty values count.
 */
function applyEnvOverrides(raw: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const merged: RawConfig = { ...raw };

  const backendPath = env[ENV.backendPath];
  if (backendPath) {
    merged.backend = { ...section(raw, "backend"), cwd: backendPath };
  }

  const projectsDir = env[ENV.projectsDir];
  if (projectsDir) {
    merged.corpus = { ...section(raw, "corpus"), projectsDir };
  }

  const logLevel = env[ENV.logLevel];
  if (logLevel) {
    merged.logging = { ...section(raw, "logging"), level: logLevel };
  }

  return merged;
}

/**
 * Load config from an optional JSON/JSON5 file plus environment overrides,
 * then validate it. The backend location is not checked here; commands that
 * talk to the backend call {@link resolveBackendConfig}.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<RecallConfig> {
  const raw = applyEnvOverrides(
    await readRawConfig(options),
    options.env ?? process.env,
  );

  const result = RecallConfigSchema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`,
    );
    throw new ConfigError(
      `Config validation failed:\n${messages.map((m) => `  - ${m}`).join("\n")}`,
      result.error,
    );
  }

  validateConfig(result.data);
  return result.data;
}

export function resolveBackendConfig(config: RecallConfig): ResolvedBackendConfig {
  const { cwd } = config.backend;
  if (!cwd) {
    throw new ConfigError(
      `${ENV.backendPath} environment variable not set. ` +
        "Set it to the path of your RLM installation.",
    );
  }
  return { ...config.backend, cwd };
}
