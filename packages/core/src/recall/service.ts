import type { CorpusConfig, LimitsConfig, SemanticConfig } from "../config/types.js";
import {
  type ProjectsReport,
  type TimelineReport,
  listProjects,
  listTimeline,
} from "../corpus/reports.js";
import { pathExists } from "../corpus/scanner.js";
import { errorMessage } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import { SerialQueue } from "../infra/serial-queue.js";
import { type Candidate, findCandidates } from "./candidates.js";
import { extractKeywords } from "./keywords.js";
import {
  DEGRADED_NOTE,
  type ResultEntry,
  deduplicateResults,
  degradedResults,
} from "./results.js";
import { type BackendClient, SemanticSearcher } from "./semantic-search.js";

const log = createLogger("recall");

export const NO_CORPUS_SUGGESTION = "No Claude projects directory found";

/** A backend that can be (re)connected on demand. */
export interface RecallBackend extends BackendClient {
  connect(): Promise<void>;
}

export interface RecallResponse {
  results: ResultEntry[];
  total_sessions_searched: number;
  note?: string;
  suggestion?: string;
}

export interface RecallErrorResponse {
  error: "MISSING_QUERY";
  message: string;
}

export type RecallReport = RecallResponse | RecallErrorResponse;

export interface RecallRequest {
  query?: string;
  project?: string;
}

export interface RecallServiceOptions {
  backend: RecallBackend;
  corpus: CorpusConfig;
  limits: LimitsConfig;
  semantic: SemanticConfig;
}

export function noCandidatesSuggestion(keywords: readonly string[]): string {
  return `No sessions found matching keywords: ${JSON.stringify(keywords)}. Try broader terms.`;
}

/**
 * The three query-facing operations over a transcript corpus. Recall
 * queries that reach the backend run one at a time.
 */
export class RecallService {
  private readonly searcher: SemanticSearcher;
  private readonly queue = new SerialQueue();

  constructor(private readonly options: RecallServiceOptions) {
    this.searcher = new SemanticSearcher(options.backend, options.limits, options.semantic);
  }

  listProjects(): Promise<ProjectsReport> {
    const { projectsDir, sessionExtension } = this.options.corpus;
    return listProjects(projectsDir, sessionExtension);
  }

  timeline(options: { days?: number; project?: string } = {}): Promise<TimelineReport> {
    const { projectsDir, sessionExtension } = this.options.corpus;
    return listTimeline(projectsDir, { ...options, extension: sessionExtension });
  }

  async recall(request: RecallRequest): Promise<RecallReport> {
    const query = request.query?.trim() ?? "";
    if (!query) {
      return { error: "MISSING_QUERY", message: "Query parameter is required" };
    }

    const { projectsDir, sessionExtension } = this.options.corpus;
    if (!(await pathExists(projectsDir))) {
      return { results: [], total_sessions_searched: 0, suggestion: NO_CORPUS_SUGGESTION };
    }

    const keywords = extractKeywords(query);
    const candidates = await findCandidates(projectsDir, keywords, {
      project: request.project,
      limit: this.options.limits.maxCandidates,
      extension: sessionExtension,
    });

    if (candidates.length === 0) {
      return {
        results: [],
        total_sessions_searched: 0,
        suggestion: noCandidatesSuggestion(keywords),
      };
    }

    return this.queue.enqueue(() => this.searchWithBackend(candidates, query));
  }

  private async searchWithBackend(
    candidates: readonly Candidate[],
    query: string,
  ): Promise<RecallResponse> {
    const { maxResults } = this.options.limits;

    try {
      await this.options.backend.connect();
    } catch (error) {
      log.warn(`Semantic backend unavailable, falling back to keyword matches: ${errorMessage(error)}`);
      return {
        results: degradedResults(candidates, maxResults),
        total_sessions_searched: candidates.length,
        note: DEGRADED_NOTE,
      };
    }

    const entries = await this.searcher.searchCandidates(candidates, query);
    return {
      results: deduplicateResults(entries, maxResults),
      total_sessions_searched: candidates.length,
    };
  }
}
