import { NO_SUMMARY } from "../corpus/reports.js";
import type { SessionInfo } from "../corpus/types.js";

export type RelevanceKind = "semantic_match" | "keyword_match" | "error";

export interface ResultEntry {
  session_id: string;
  project: string;
  summary: string;
  timestamp: string | null;
  relevance: RelevanceKind;
  excerpt: string;
}

export const DEGRADED_NOTE = "Semantic search unavailable - showing keyword matches";
export const DEGRADED_EXCERPT = "Semantic backend unavailable - showing keyword matches only";

/** Cut to at most `max` code points, so surrogate pairs stay whole. */
export function truncateCodePoints(text: string, max: number): string {
  const points = Array.from(text);
  return points.length <= max ? text : points.slice(0, max).join("");
}

export function buildResultEntry(
  session: SessionInfo,
  relevance: RelevanceKind,
  excerpt: string,
): ResultEntry {
  return {
    session_id: session.sessionId,
    project: session.projectPath,
    summary: session.summary ?? NO_SUMMARY,
    timestamp: session.timestamp ?? null,
    relevance,
    excerpt,
  };
}

/** First entry per session wins; stops once `maxResults` are kept. */
export function deduplicateResults(
  entries: readonly ResultEntry[],
  maxResults: number,
): ResultEntry[] {
  const seen = new Set<string>();
  const unique: ResultEntry[] = [];
  for (const entry of entries) {
    if (unique.length >= maxResults) break;
    if (seen.has(entry.session_id)) continue;
    seen.add(entry.session_id);
    unique.push(entry);
  }
  return unique;
}

/** Keyword-only answer used when the semantic backend cannot be reached. */
export function degradedResults(
  candidates: readonly SessionInfo[],
  maxResults: number,
): ResultEntry[] {
  return candidates
    .slice(0, maxResults)
    .map((candidate) => buildResultEntry(candidate, "keyword_match", DEGRADED_EXCERPT));
}
