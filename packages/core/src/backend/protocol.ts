import { z } from "zod";

/**
 * JSON-RPC 2.0 frames exchanged with the backend, one JSON document per line.
 */

export type JsonRpcId = number | string;

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcNotification {
  jsonrpc: "2.0";
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccess {
  jsonrpc: "2.0";
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcFailure {
  jsonrpc: "2.0";
  id: JsonRpcId | null;
  error: JsonRpcError;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

/** Standard JSON-RPC error codes. */
export const ErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

export const PROTOCOL_VERSION = "2024-11-05";

const IdSchema = z.union([z.number(), z.string()]);

export const JsonRpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const JsonRpcResponseSchema = z.union([
  z.object({
    jsonrpc: z.literal("2.0"),
    id: IdSchema,
    error: JsonRpcErrorSchema,
  }),
  z.object({
    jsonrpc: z.literal("2.0"),
    id: IdSchema,
    result: z.unknown(),
  }),
]);

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: IdSchema.optional(),
  method: z.string().min(1).max(256),
  params: z.record(z.unknown()).optional(),
});

export const InitializeResultSchema = z
  .object({
    protocolVersion: z.string(),
    serverInfo: z
      .object({ name: z.string(), version: z.string().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();
