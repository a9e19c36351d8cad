import { matchesProjectFilter } from "./paths.js";
import {
  DEFAULT_SESSION_EXTENSION,
  directorySize,
  extractSessionInfo,
  listProjectDirs,
  listSessionFiles,
} from "./scanner.js";
import type { SessionInfo } from "./types.js";

const BYTES_PER_MB = 1024 * 1024;
const BYTES_PER_GB = 1024 * 1024 * 1024;
const DAY_MS = 24 * 60 * 60 * 1000;

export const NO_SUMMARY = "No summary available";
export const DEFAULT_TIMELINE_DAYS = 7;

export interface ProjectEntry {
  path: string;
  session_count: number;
  /** ISO time of the newest session file, null for an empty project. */
  last_used: string | null;
  total_size_mb: number;
}

export interface ProjectsReport {
  projects: ProjectEntry[];
  total_projects: number;
  total_sessions: number;
  total_size_gb: number;
}

export interface SessionSummary {
  session_id: string;
  project: string;
  summary: string;
  timestamp: string | null;
  model: string | null;
}

export interface TimelineReport {
  sessions: SessionSummary[];
  total_sessions: number;
  date_range: string;
}

export interface TimelineOptions {
  days?: number;
  project?: string;
  extension?: string;
  now?: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function toSessionSummary(info: SessionInfo): SessionSummary {
  return {
    session_id: info.sessionId,
    project: info.projectPath,
    summary: info.summary ?? NO_SUMMARY,
    timestamp: info.timestamp ?? null,
    model: info.model ?? null,
  };
}

/** Descending by timestamp; a missing timestamp sorts as "" and lands last. */
export function compareByTimestampDesc(
  a: { timestamp?: string | null },
  b: { timestamp?: string | null },
): number {
  const left = a.timestamp ?? "";
  const right = b.timestamp ?? "";
  if (left === right) return 0;
  return left < right ? 1 : -1;
}

/**
 * Every project under the corpus root with its session count, size on disk
 * and last use, newest first.
 */
export async function listProjects(
  root: string,
  extension: string = DEFAULT_SESSION_EXTENSION,
): Promise<ProjectsReport> {
  const dirs = await listProjectDirs(root);

  const projects: ProjectEntry[] = [];
  let totalSessions = 0;
  let totalBytes = 0;

  for (const dir of dirs) {
    const sessions = await listSessionFiles(dir.dirPath, extension);
    const sizeBytes = await directorySize(dir.dirPath);
    const lastUsedMs = sessions.reduce<number | null>(
      (latest, s) => (latest === null || s.mtimeMs > latest ? s.mtimeMs : latest),
      null,
    );

    projects.push({
      path: dir.projectPath,
      session_count: sessions.length,
      last_used: lastUsedMs === null ? null : new Date(lastUsedMs).toISOString(),
      total_size_mb: round2(sizeBytes / BYTES_PER_MB),
    });

    totalSessions += sessions.length;
    totalBytes += sizeBytes;
  }

  projects.sort((a, b) =>
    compareByTimestampDesc({ timestamp: a.last_used }, { timestamp: b.last_used }),
  );

  return {
    projects,
    total_projects: projects.length,
    total_sessions: totalSessions,
    total_size_gb: round2(totalBytes / BYTES_PER_GB),
  };
}

/**
 * Sessions whose file changed within the last `days` days, newest first.
 */
export async function listTimeline(
  root: string,
  options: TimelineOptions = {},
): Promise<TimelineReport> {
  const days = options.days ?? DEFAULT_TIMELINE_DAYS;
  const cutoff = (options.now ?? Date.now()) - days * DAY_MS;
  const dirs = await listProjectDirs(root);

  const sessions: SessionSummary[] = [];
  for (const dir of dirs) {
    if (!matchesProjectFilter(dir.projectPath, options.project)) {
      continue;
    }

    const files = await listSessionFiles(dir.dirPath, options.extension);
    for (const file of files) {
      if (file.mtimeMs < cutoff) {
        continue;
      }
      const info = await extractSessionInfo(file, dir.projectPath);
      if (info) {
        sessions.push(toSessionSummary(info));
      }
    }
  }

  sessions.sort(compareByTimestampDesc);

  return {
    sessions,
    total_sessions: sessions.length,
    date_range: `Last ${days} days`,
  };
}
