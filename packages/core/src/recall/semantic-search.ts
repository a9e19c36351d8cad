import type { LimitsConfig, SemanticConfig } from "../config/types.js";
import { readSessionContent } from "../corpus/scanner.js";
import {
  assertToolSucceeded,
  classifyToolResult,
  parseBatchResponses,
  parseSegmentCount,
  type ToolPayload,
} from "../backend/responses.js";
import { errorMessage } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import type { Candidate } from "./candidates.js";
import { type ResultEntry, buildResultEntry, truncateCodePoints } from "./results.js";

const log = createLogger("recall");

/** The slice of the backend connection the searcher needs. */
export interface BackendClient {
  callTool(name: string, args: Record<string, unknown>): Promise<unknown>;
}

export const BackendTools = {
  load: "rlm_load_context",
  chunk: "rlm_chunk_context",
  inspect: "rlm_inspect_context",
  batch: "rlm_sub_query_batch",
  clear: "rlm_clear_context",
} as const;

export function contextName(sessionId: string): string {
  return `session_${sessionId}`;
}

export function subQueryText(query: string): string {
  return `Find information relevant to: ${query}`;
}

/**
 * Runs a query against each candidate's transcript on the backend: load,
 * segment, inspect, batch sub-query, then clear.
 */
export class SemanticSearcher {
  constructor(
    private readonly backend: BackendClient,
    private readonly limits: LimitsConfig,
    private readonly semantic: SemanticConfig,
  ) {}

  /**
   * Candidates are processed one after another. A failure is logged and
   * turned into an "error" entry for that candidate only.
   */
  async searchCandidates(candidates: readonly Candidate[], query: string): Promise<ResultEntry[]> {
    const results: ResultEntry[] = [];
    for (const candidate of candidates) {
      try {
        results.push(...(await this.searchSession(candidate, query)));
      } catch (error) {
        const message = errorMessage(error);
        log.warn(`Error processing session ${candidate.sessionId}: ${message}`);
        results.push(
          buildResultEntry(
            candidate,
            "error",
            `Error during semantic search: ${truncateCodePoints(message, this.limits.errorExcerptLength)}`,
          ),
        );
      }
    }
    return results;
  }

  /** @throws whatever the read or any backend call throws */
  async searchSession(candidate: Candidate, query: string): Promise<ResultEntry[]> {
    const content = await readSessionContent(candidate.file, this.limits);
    const name = contextName(candidate.sessionId);

    try {
      await this.call(BackendTools.load, { name, content });
      await this.call(BackendTools.chunk, {
        name,
        strategy: "lines",
        size: this.limits.segmentLines,
      });

      const segments = parseSegmentCount(await this.call(BackendTools.inspect, { name }));
      const segmentCount = Math.min(segments, this.limits.maxSegments);

      const batch = await this.call(BackendTools.batch, {
        query: subQueryText(query),
        context_name: name,
        chunk_indices: Array.from({ length: segmentCount }, (_, i) => i),
        provider: this.semantic.provider,
        model: this.semantic.model,
        concurrency: this.limits.concurrency,
      });

      return parseBatchResponses(batch).map((response) =>
        buildResultEntry(
          candidate,
          "semantic_match",
          truncateCodePoints(response, this.limits.excerptLength),
        ),
      );
    } finally {
      await this.clearContext(name);
    }
  }

  private async call(tool: string, args: Record<string, unknown>): Promise<ToolPayload> {
    const payload = classifyToolResult(await this.backend.callTool(tool, args));
    assertToolSucceeded(tool, payload);
    return payload;
  }

  private async clearContext(name: string): Promise<void> {
    try {
      await this.call(BackendTools.clear, { name });
    } catch (error) {
      log.warn(`Failed to clear backend context ${name}: ${errorMessage(error)}`);
    }
  }
}
