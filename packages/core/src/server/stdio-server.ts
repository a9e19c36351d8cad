import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { z } from "zod";
import { ErrorCodes, PROTOCOL_VERSION } from "../backend/protocol.js";
import { APP_NAME, APP_VERSION } from "../infra/app-info.js";
import { ValidationError, errorMessage } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import type { RecallService } from "../recall/service.js";
import {
  buildErrorResponse,
  buildResponse,
  parseRequest,
  serializeFrame,
} from "./frames.js";
import { TOOL_DEFINITIONS, type ToolHandler, createToolHandlers, toToolResult } from "./tools.js";

const log = createLogger("server");

export type MethodHandler = (
  params: Record<string, unknown> | undefined,
) => Promise<unknown> | unknown;

export interface StdioServerOptions {
  service: RecallService;
  input?: Readable;
  output?: Writable;
}

const ToolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
});

export function createMethods(tools: Map<string, ToolHandler>): Map<string, MethodHandler> {
  return new Map<string, MethodHandler>([
    [
      "initialize",
      () => ({
        protocolVersion: PROTOCOL_VERSION,
        capabilities: { tools: {} },
        serverInfo: { name: APP_NAME, version: APP_VERSION },
      }),
    ],
    ["notifications/initialized", () => undefined],
    ["ping", () => ({})],
    ["tools/list", () => ({ tools: TOOL_DEFINITIONS })],
    [
      "tools/call",
      async (params) => {
        const parsed = ToolCallParamsSchema.safeParse(params ?? {});
        if (!parsed.success) {
          throw new ValidationError("tools/call requires a tool name", parsed.error);
        }
        const handler = tools.get(parsed.data.name);
        if (!handler) {
          throw new ValidationError(`Unknown tool: ${parsed.data.name}`);
        }
        return toToolResult(await handler(parsed.data.arguments));
      },
    ],
  ]);
}

/**
 * Line-delimited JSON-RPC server over a pair of streams (stdin/stdout by
 * default). Requests are handled as they arrive; replies may come back out
 * of order.
 */
export class StdioServer {
  private readonly methods: Map<string, MethodHandler>;
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: StdioServerOptions) {
    this.methods = createMethods(createToolHandlers(options.service));
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  /** Returns the serialized reply, or null when none is due. */
  async handleLine(line: string): Promise<string | null> {
    const parsed = parseRequest(line);
    if (!parsed.ok) {
      return serializeFrame(buildErrorResponse(null, parsed.error.code, parsed.error.message));
    }

    const { id, method, params } = parsed.request;
    const handler = this.methods.get(method);

    if (id === undefined) {
      if (handler) {
        await handler(params);
      } else {
        log.debug(`Ignoring notification ${method}`);
      }
      return null;
    }

    if (!handler) {
      return serializeFrame(
        buildErrorResponse(id, ErrorCodes.METHOD_NOT_FOUND, `Method not found: ${method}`),
      );
    }

    try {
      const result = await handler(params);
      return serializeFrame(buildResponse(id, result ?? {}));
    } catch (err) {
      if (err instanceof ValidationError) {
        return serializeFrame(buildErrorResponse(id, ErrorCodes.INVALID_PARAMS, err.message));
      }
      log.error(`Method ${method} error: ${errorMessage(err)}`);
      return serializeFrame(
        buildErrorResponse(id, ErrorCodes.INTERNAL_ERROR, errorMessage(err)),
      );
    }
  }

  /** Serves until the input stream ends, then waits for outstanding replies. */
  async run(): Promise<void> {
    const rl = readline.createInterface({ input: this.input, crlfDelay: Infinity });
    log.info("Recall server listening on stdio");

    for await (const line of rl) {
      if (!line.trim()) continue;
      const task = this.dispatch(line);
      this.inFlight.add(task);
      void task.finally(() => this.inFlight.delete(task));
    }

    await Promise.all(this.inFlight);
    log.info("Input closed, server stopping");
  }

  private async dispatch(line: string): Promise<void> {
    try {
      const reply = await this.handleLine(line);
      if (reply) {
        this.output.write(reply);
      }
    } catch (err) {
      log.error(`Failed to handle message: ${errorMessage(err)}`);
    }
  }
}
