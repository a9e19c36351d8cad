/** An immediate subdirectory of the corpus root. */
export interface ProjectDir {
  /** Encoded directory name, e.g. `-Users-jane-projects-api`. */
  name: string;
  dirPath: string;
  /** Decoded filesystem path the project stands for. */
  projectPath: string;
}

/** One transcript file, described without reading it. */
export interface SessionFile {
  sessionId: string;
  filePath: string;
  size: number;
  mtimeMs: number;
}

/** Metadata pulled from a transcript's records. */
export interface SessionMeta {
  summary?: string;
  timestamp?: string;
  model?: string;
}

export interface SessionInfo extends SessionMeta {
  sessionId: string;
  projectPath: string;
  file: SessionFile;
}

export interface ContentLimits {
  maxSessionBytes: number;
  maxLinesPerSession: number;
}
