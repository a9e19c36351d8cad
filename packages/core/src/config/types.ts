import type { z } from "zod";
import type {
  BackendSchema,
  CorpusSchema,
  LimitsSchema,
  LoggingSchema,
  RecallConfigSchema,
  SemanticSchema,
} from "./schema.js";

export type RecallConfig = z.infer<typeof RecallConfigSchema>;
export type BackendConfig = z.infer<typeof BackendSchema>;
export type CorpusConfig = z.infer<typeof CorpusSchema>;
export type LimitsConfig = z.infer<typeof LimitsSchema>;
export type SemanticConfig = z.infer<typeof SemanticSchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;

/** Backend settings once the required location has been checked. */
export type ResolvedBackendConfig = BackendConfig & { cwd: string };
