import { z } from "zod";
import { BackendCallError } from "../infra/errors.js";
import { type JsonObject, parseJsonObject } from "../infra/json.js";

/**
 * Backend tool results, parsed at the boundary into one of a fixed set of
 * shapes. Anything that does not fit is "invalid" and carries no data.
 */
export type ToolPayload =
  | { kind: "json"; data: JsonObject }
  | { kind: "text"; text: string }
  | { kind: "error"; message: string }
  | { kind: "empty" }
  | { kind: "invalid" };

const ToolResultSchema = z.object({
  content: z
    .array(
      z
        .object({
          type: z.string(),
          text: z.string().optional(),
        })
        .passthrough(),
    )
    .default([]),
  isError: z.boolean().optional(),
});

const InspectPayloadSchema = z.object({
  chunk_count: z.number().int().min(1),
});

const BatchPayloadSchema = z.object({
  results: z.array(
    z.object({
      response: z.string().nullish(),
    }),
  ),
});

export function classifyToolResult(raw: unknown): ToolPayload {
  const parsed = ToolResultSchema.safeParse(raw);
  if (!parsed.success) {
    return { kind: "invalid" };
  }

  const texts = parsed.data.content.flatMap((item) =>
    item.type === "text" && item.text !== undefined ? [item.text] : [],
  );

  if (parsed.data.isError) {
    return { kind: "error", message: texts.join("\n") || "unknown error" };
  }

  for (const text of texts) {
    const data = parseJsonObject(text);
    if (data) {
      return { kind: "json", data };
    }
  }

  const text = texts.join("\n");
  return text ? { kind: "text", text } : { kind: "empty" };
}

/**
 * @throws BackendCallError when the backend flagged the tool call as failed
 */
export function assertToolSucceeded(operation: string, payload: ToolPayload): void {
  if (payload.kind === "error") {
    throw new BackendCallError(operation, payload.message);
  }
}

/** Segment count from an inspect reply; one segment when it cannot be read. */
export function parseSegmentCount(payload: ToolPayload): number {
  if (payload.kind !== "json") {
    return 1;
  }
  const parsed = InspectPayloadSchema.safeParse(payload.data);
  return parsed.success ? parsed.data.chunk_count : 1;
}

/** Non-empty responses from a batch reply, in order. */
export function parseBatchResponses(payload: ToolPayload): string[] {
  if (payload.kind !== "json") {
    return [];
  }
  const parsed = BatchPayloadSchema.safeParse(payload.data);
  if (!parsed.success) {
    return [];
  }
  return parsed.data.results.flatMap((result) => (result.response ? [result.response] : []));
}
