import {
  ErrorCodes,
  type JsonRpcError,
  type JsonRpcId,
  JsonRpcRequestSchema,
  type JsonRpcResponse,
} from "../backend/protocol.js";

export interface IncomingRequest {
  /** Absent for notifications. */
  id?: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

/**
 * Parse and validate one line from the client.
 */
export function parseRequest(
  raw: string,
): { ok: true; request: IncomingRequest } | { ok: false; error: JsonRpcError } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return {
      ok: false,
      error: { code: ErrorCodes.PARSE_ERROR, message: "Invalid JSON" },
    };
  }

  const result = JsonRpcRequestSchema.safeParse(parsed);
  if (!result.success) {
    return {
      ok: false,
      error: {
        code: ErrorCodes.INVALID_REQUEST,
        message: `Invalid request: ${result.error.issues.map((i) => i.message).join(", ")}`,
      },
    };
  }

  return { ok: true, request: result.data };
}

export function buildResponse(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}

export function buildErrorResponse(
  id: JsonRpcId | null,
  code: number,
  message: string,
): JsonRpcResponse {
  return { jsonrpc: "2.0", id, error: { code, message } };
}

/** One frame per line. */
export function serializeFrame(frame: unknown): string {
  return `${JSON.stringify(frame)}\n`;
}
