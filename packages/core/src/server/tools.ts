import { z } from "zod";
import { DEFAULT_TIMELINE_DAYS } from "../corpus/reports.js";
import { ValidationError } from "../infra/errors.js";
import type { RecallService } from "../recall/service.js";

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export interface ToolResult {
  content: Array<{ type: "text"; text: string }>;
}

export type ToolHandler = (args: Record<string, unknown>) => Promise<unknown>;

const ProjectsArgsSchema = z.object({});

const TimelineArgsSchema = z.object({
  days: z.number().int().nonnegative().default(DEFAULT_TIMELINE_DAYS),
  project: z.string().optional(),
});

// A missing query is answered as data (MISSING_QUERY), not rejected here.
const RecallArgsSchema = z.object({
  query: z.string().optional(),
  project: z.string().optional(),
});

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    name: "memory_projects",
    description: "List every project in the conversation history with session counts and sizes",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "memory_timeline",
    description: "Recent sessions with their summaries, newest first",
    inputSchema: {
      type: "object",
      properties: {
        days: {
          type: "integer",
          description: `How many days to look back (default: ${DEFAULT_TIMELINE_DAYS})`,
          default: DEFAULT_TIMELINE_DAYS,
        },
        project: {
          type: "string",
          description: "Only sessions whose project path contains this text",
        },
      },
    },
  },
  {
    name: "memory_recall",
    description: "Semantic search across past conversations",
    inputSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "Natural language question about past conversations",
        },
        project: {
          type: "string",
          description: "Only search projects whose path contains this text",
        },
      },
      required: ["query"],
    },
  },
];

function parseArgs<T extends z.ZodTypeAny>(
  tool: string,
  schema: T,
  args: Record<string, unknown>,
): z.infer<T> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ValidationError(`Invalid arguments for ${tool}: ${issues}`, parsed.error);
  }
  return parsed.data;
}

export function createToolHandlers(service: RecallService): Map<string, ToolHandler> {
  return new Map<string, ToolHandler>([
    [
      "memory_projects",
      async (args) => {
        parseArgs("memory_projects", ProjectsArgsSchema, args);
        return service.listProjects();
      },
    ],
    [
      "memory_timeline",
      async (args) => {
        const { days, project } = parseArgs("memory_timeline", TimelineArgsSchema, args);
        return service.timeline({ days, project });
      },
    ],
    [
      "memory_recall",
      async (args) => {
        const { query, project } = parseArgs("memory_recall", RecallArgsSchema, args);
        return service.recall({ query, project });
      },
    ],
  ]);
}

export function toToolResult(data: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(data, null, 2) }] };
}
