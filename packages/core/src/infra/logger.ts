import { formatWithOptions } from "node:util";
import { Logger } from "tslog";

/**
 * Patterns that indicate a value should be redacted in logs.
 */
const SENSITIVE_KEY_PATTERNS = [
  /token/i,
  /password/i,
  /secret/i,
  /api[_-]?key/i,
  /auth/i,
  /credential/i,
  /private[_-]?key/i,
  /access[_-]?key/i,
];

/**
 * Recursively redact sensitive values from objects before printing.
 */
export function redactSensitive(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;
  if (typeof obj !== "object") return obj;

  if (Array.isArray(obj)) {
    return obj.map(redactSensitive);
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key) && typeof value === "string") {
      result[key] = "[REDACTED]";
    } else if (typeof value === "object" && value !== null) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS = [
  "silly",
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
] as const satisfies readonly LogLevel[];

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

let defaultLevel: LogLevel = "info";
let defaultRedact = true;

/**
 * Set the level used by loggers created without an explicit one.
 * Loggers that already exist keep their level.
 */
export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

/** Whether loggers created without an explicit `redact` mask secrets. */
export function setDefaultRedaction(enabled: boolean): void {
  defaultRedact = enabled;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Pretty output goes to stderr: stdout carries the JSON-RPC stream
 * when the server is running.
 */
function writeToStderr(
  logMetaMarkup: string,
  logArgs: unknown[],
  logErrors: string[],
): void {
  const errors =
    (logErrors.length > 0 && logArgs.length > 0 ? "\n" : "") +
    logErrors.join("\n");
  process.stderr.write(
    `${logMetaMarkup}${formatWithOptions({ colors: false }, ...logArgs)}${errors}\n`,
  );
}

export function createLogger(
  name: string,
  options?: { level?: LogLevel; redact?: boolean },
): Logger<unknown> {
  const level = options?.level ?? defaultLevel;
  const shouldRedact = options?.redact ?? defaultRedact;

  const logger = new Logger<unknown>({
    name,
    minLevel: LOG_LEVEL_MAP[level],
    type: "pretty",
    stylePrettyLogs: false,
    overwrite: {
      transportFormatted: writeToStderr,
    },
    ...(shouldRedact && {
      maskValuesOfKeys: [
        "token",
        "password",
        "secret",
        "apiKey",
        "api_key",
        "accessKey",
        "privateKey",
        "credential",
        "authorization",
      ],
      maskPlaceholder: "[REDACTED]",
    }),
  });

  return logger;
}
