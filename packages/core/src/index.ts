// Config
export { RecallConfigSchema } from "./config/schema.js";
export type {
  BackendConfig,
  CorpusConfig,
  LimitsConfig,
  LoggingConfig,
  RecallConfig,
  ResolvedBackendConfig,
  SemanticConfig,
} from "./config/types.js";
export { DEFAULT_CONFIG_FILE, ENV, getDefaultProjectsDir } from "./config/defaults.js";
export { loadConfig, resolveBackendConfig } from "./config/loader.js";
export type { LoadConfigOptions } from "./config/loader.js";
export { validateConfig } from "./config/validation.js";

// Infrastructure
export {
  createLogger,
  redactSensitive,
  setDefaultLogLevel,
  setDefaultRedaction,
} from "./infra/logger.js";
export type { LogLevel } from "./infra/logger.js";
export {
  AppError,
  BackendCallError,
  BackendConnectionError,
  BackendNotConnectedError,
  BackendTimeoutError,
  ConfigError,
  ValidationError,
} from "./infra/errors.js";
export { withRetry, RetryExhaustedError } from "./infra/retry.js";
export type { RetryOptions } from "./infra/retry.js";
export { SerialQueue } from "./infra/serial-queue.js";

// Corpus
export { decodeProjectPath } from "./corpus/paths.js";
export {
  collectSessions,
  extractSessionInfo,
  listProjectDirs,
  readSessionContent,
  readSessionMeta,
} from "./corpus/scanner.js";
export { listProjects, listTimeline } from "./corpus/reports.js";
export type {
  ProjectEntry,
  ProjectsReport,
  SessionSummary,
  TimelineReport,
} from "./corpus/reports.js";
export type { SessionFile, SessionInfo, SessionMeta } from "./corpus/types.js";

// Backend
export { BackendConnection } from "./backend/connection.js";
export type { ConnectionState, TransportFactory } from "./backend/connection.js";
export { StdioTransport } from "./backend/transport.js";
export type { MessageTransport } from "./backend/transport.js";
export { classifyToolResult } from "./backend/responses.js";
export type { ToolPayload } from "./backend/responses.js";

// Recall
export { extractKeywords } from "./recall/keywords.js";
export { findCandidates } from "./recall/candidates.js";
export type { Candidate } from "./recall/candidates.js";
export { SemanticSearcher } from "./recall/semantic-search.js";
export type { BackendClient } from "./recall/semantic-search.js";
export { deduplicateResults, degradedResults } from "./recall/results.js";
export type { RelevanceKind, ResultEntry } from "./recall/results.js";
export { RecallService } from "./recall/service.js";
export type {
  RecallBackend,
  RecallReport,
  RecallRequest,
  RecallResponse,
} from "./recall/service.js";

// Server
export { StdioServer } from "./server/stdio-server.js";
export { TOOL_DEFINITIONS } from "./server/tools.js";
