import { z } from "zod";
import { LOG_LEVELS } from "../infra/logger.js";
import { getDefaultProjectsDir } from "./defaults.js";

export const BackendSchema = z.object({
  command: z.string().min(1).default("uv"),
  args: z.array(z.string()).default(["run", "rlm-server"]),
  /** Working directory of the backend installation. Required to connect. */
  cwd: z.string().min(1).optional(),
  env: z.record(z.string()).default({}),
  connectAttempts: z.number().int().min(1).max(10).default(3),
  initialDelayMs: z.number().int().positive().default(1000),
  initTimeoutMs: z.number().int().positive().default(10_000),
  callTimeoutMs: z.number().int().positive().default(120_000),
});

export const CorpusSchema = z.object({
  projectsDir: z.string().min(1).default(getDefaultProjectsDir),
  sessionExtension: z
    .string()
    .regex(/^\.[A-Za-z0-9]+$/, "must look like .jsonl")
    .default(".jsonl"),
});

export const LimitsSchema = z.object({
  maxSessionBytes: z.number().int().positive().default(500_000),
  maxLinesPerSession: z.number().int().positive().default(500),
  maxCandidates: z.number().int().positive().default(10),
  maxResults: z.number().int().positive().default(5),
  segmentLines: z.number().int().positive().default(100),
  maxSegments: z.number().int().positive().default(5),
  concurrency: z.number().int().positive().default(2),
  excerptLength: z.number().int().positive().default(500),
  errorExcerptLength: z.number().int().positive().default(100),
});

export const SemanticSchema = z.object({
  provider: z.string().min(1).default("claude-sdk"),
  model: z.string().min(1).default("claude-haiku-4-5-20251101"),
});

export const LoggingSchema = z.object({
  level: z.enum(LOG_LEVELS).default("info"),
  redactSecrets: z.boolean().default(true),
});

export const RecallConfigSchema = z.object({
  backend: BackendSchema.default({}),
  corpus: CorpusSchema.default({}),
  limits: LimitsSchema.default({}),
  semantic: SemanticSchema.default({}),
  logging: LoggingSchema.default({}),
});
