export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", 500, cause);
    this.name = "ConfigError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "VALIDATION_ERROR", 400, cause);
    this.name = "ValidationError";
  }
}

/**
 * The backend could not be reached after every connect attempt.
 * Recall queries recover from this by answering with keyword matches only.
 */
export class BackendConnectionError extends AppError {
  constructor(
    message: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(message, "BACKEND_UNAVAILABLE", 503, cause);
    this.name = "BackendConnectionError";
  }
}

/**
 * A call was issued while no backend session is open. This is a caller bug,
 * never retried.
 */
export class BackendNotConnectedError extends AppError {
  constructor(operation: string) {
    super(
      `Not connected to backend (attempted "${operation}")`,
      "BACKEND_NOT_CONNECTED",
      500,
    );
    this.name = "BackendNotConnectedError";
  }
}

export class BackendTimeoutError extends AppError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(
      `Backend call "${operation}" timed out after ${timeoutMs}ms`,
      "BACKEND_TIMEOUT",
      504,
    );
    this.name = "BackendTimeoutError";
  }
}

export class BackendCallError extends AppError {
  constructor(
    public readonly operation: string,
    message: string,
    cause?: unknown,
  ) {
    super(`Backend call "${operation}" failed: ${message}`, "BACKEND_CALL_FAILED", 502, cause);
    this.name = "BackendCallError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
