import { matchesProjectFilter } from "../corpus/paths.js";
import { compareByTimestampDesc } from "../corpus/reports.js";
import { collectSessions, listProjectDirs } from "../corpus/scanner.js";
import type { SessionInfo } from "../corpus/types.js";
import { matchesAnyKeyword } from "./keywords.js";

/**
 * A session picked for semantic search. Its `file` is where the transcript
 * content is read from.
 */
export type Candidate = SessionInfo;

export interface CandidateOptions {
  /** Only projects whose decoded path contains this substring. */
  project?: string;
  limit: number;
  extension?: string;
}

/**
 * Sessions whose summary contains any keyword, newest first, capped at
 * `limit`. An empty keyword list selects nothing.
 */
export async function findCandidates(
  root: string,
  keywords: readonly string[],
  options: CandidateOptions,
): Promise<Candidate[]> {
  if (keywords.length === 0) {
    return [];
  }

  const matching: Candidate[] = [];
  for (const project of await listProjectDirs(root)) {
    if (!matchesProjectFilter(project.projectPath, options.project)) {
      continue;
    }
    for (const session of await collectSessions(project, options.extension)) {
      if (matchesAnyKeyword(session.summary, keywords)) {
        matching.push(session);
      }
    }
  }

  matching.sort(compareByTimestampDesc);
  return matching.slice(0, options.limit);
}
