import { createReadStream, type Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import readline from "node:readline";
import { errorMessage } from "../infra/errors.js";
import { isErrnoCode, isRecord, parseJsonObject } from "../infra/json.js";
import { createLogger } from "../infra/logger.js";
import { decodeProjectPath } from "./paths.js";
import type {
  ContentLimits,
  ProjectDir,
  SessionFile,
  SessionInfo,
  SessionMeta,
} from "./types.js";

const log = createLogger("corpus");

export const DEFAULT_SESSION_EXTENSION = ".jsonl";

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return false;
    }
    throw error;
  }
}

type EntryKind = "directory" | "file" | "other";

/**
 * Classify a directory entry, following symbolic links to their target.
 * A broken link is logged and reported as "other".
 */
async function entryKind(parent: string, entry: Dirent): Promise<EntryKind> {
  if (entry.isDirectory()) return "directory";
  if (entry.isFile()) return "file";
  if (!entry.isSymbolicLink()) return "other";

  const linkPath = path.join(parent, entry.name);
  try {
    const target = await fs.stat(linkPath);
    if (target.isDirectory()) return "directory";
    return target.isFile() ? "file" : "other";
  } catch (error) {
    log.warn(`Skipping unreadable link ${linkPath}: ${errorMessage(error)}`);
    return "other";
  }
}

/**
 * Immediate subdirectories of the corpus root. A missing root is an empty
 * corpus.
 */
export async function listProjectDirs(root: string): Promise<ProjectDir[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return [];
    }
    throw error;
  }

  const dirs: ProjectDir[] = [];
  for (const entry of entries) {
    if ((await entryKind(root, entry)) !== "directory") continue;
    dirs.push({
      name: entry.name,
      dirPath: path.join(root, entry.name),
      projectPath: decodeProjectPath(entry.name),
    });
  }
  return dirs;
}

/**
 * Transcript files directly inside a project directory. Files that vanish
 * between listing and stat are left out.
 */
export async function listSessionFiles(
  dirPath: string,
  extension: string = DEFAULT_SESSION_EXTENSION,
): Promise<SessionFile[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    log.warn(`Cannot list sessions in ${dirPath}: ${errorMessage(error)}`);
    return [];
  }

  const files: SessionFile[] = [];
  for (const entry of entries) {
    if (!entry.name.endsWith(extension) || (await entryKind(dirPath, entry)) !== "file") {
      continue;
    }
    const filePath = path.join(dirPath, entry.name);
    try {
      const stat = await fs.stat(filePath);
      files.push({
        sessionId: entry.name.slice(0, -extension.length),
        filePath,
        size: stat.size,
        mtimeMs: stat.mtimeMs,
      });
    } catch (error) {
      log.warn(`Cannot stat session ${filePath}: ${errorMessage(error)}`);
    }
  }
  return files;
}

/** Total size of every file below a directory. */
export async function directorySize(dirPath: string): Promise<number> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    log.warn(`Cannot measure ${dirPath}: ${errorMessage(error)}`);
    return 0;
  }

  let total = 0;
  for (const entry of entries) {
    const fullPath = path.join(dirPath, entry.name);
    // Linked directories are not descended into; linked files count.
    if (entry.isDirectory()) {
      total += await directorySize(fullPath);
    } else if ((await entryKind(dirPath, entry)) === "file") {
      try {
        total += (await fs.stat(fullPath)).size;
      } catch (error) {
        log.warn(`Cannot stat ${fullPath}: ${errorMessage(error)}`);
      }
    }
  }
  return total;
}

/**
 * Stream a file line by line. Returning `false` from `onLine` stops reading.
 */
export async function forEachLine(
  filePath: string,
  onLine: (line: string) => boolean | void,
): Promise<void> {
  const stream = createReadStream(filePath, { encoding: "utf8" });
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });

  return new Promise((resolve, reject) => {
    let done = false;
    const finish = (err?: Error): void => {
      if (done) return;
      done = true;
      rl.close();
      stream.destroy();
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    };

    rl.on("line", (line) => {
      if (done) return;
      if (onLine(line) === false) {
        finish();
      }
    });
    rl.on("close", () => finish());
    rl.on("error", (err) => finish(err));
    stream.on("error", (err) => finish(err));
  });
}

function pickModel(message: unknown): string | undefined {
  if (!isRecord(message)) return undefined;
  const { model } = message;
  return typeof model === "string" && model ? model : undefined;
}

/**
 * Pull summary, first user timestamp and first assistant model out of a
 * transcript without parsing it whole. Lines that are not JSON objects and
 * records of other types are skipped. The first value of each kind wins.
 */
export async function readSessionMeta(filePath: string): Promise<SessionMeta> {
  const meta: SessionMeta = {};

  await forEachLine(filePath, (rawLine) => {
    const line = rawLine.trim();
    if (!line) return;

    const record = parseJsonObject(line);
    if (!record) return;

    if (record.type === "summary" && meta.summary === undefined) {
      if (typeof record.summary === "string" && record.summary) {
        meta.summary = record.summary;
      }
    } else if (record.type === "user" && meta.timestamp === undefined) {
      if (typeof record.timestamp === "string" && record.timestamp) {
        meta.timestamp = record.timestamp;
      }
    } else if (record.type === "assistant" && meta.model === undefined) {
      const model = pickModel(record.message);
      if (model) {
        meta.model = model;
      }
    }

    if (meta.summary && meta.timestamp && meta.model) {
      return false;
    }
  });

  return meta;
}

/**
 * Metadata for one session, or null when the file cannot be read. A bad
 * file is logged and skipped; it never fails the scan.
 */
export async function extractSessionInfo(
  file: SessionFile,
  projectPath: string,
): Promise<SessionInfo | null> {
  try {
    const meta = await readSessionMeta(file.filePath);
    return { sessionId: file.sessionId, projectPath, file, ...meta };
  } catch (error) {
    log.warn(`Error reading session ${file.filePath}: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Full transcript text for loading into the backend. Files over
 * `maxSessionBytes` are cut to their first `maxLinesPerSession` lines;
 * the rest of the conversation is not searched.
 */
export async function readSessionContent(
  file: Pick<SessionFile, "filePath" | "sessionId">,
  limits: ContentLimits,
): Promise<string> {
  const { size } = await fs.stat(file.filePath);
  if (size <= limits.maxSessionBytes) {
    return fs.readFile(file.filePath, "utf-8");
  }

  log.info(
    `Session ${file.sessionId} is ${Math.round(size / 1024)}KB, truncating to ${limits.maxLinesPerSession} lines`,
  );

  const lines: string[] = [];
  await forEachLine(file.filePath, (line) => {
    lines.push(line);
    return lines.length < limits.maxLinesPerSession;
  });
  return lines.map((line) => `${line}\n`).join("");
}

/** Every readable session of a project, in directory order. */
export async function collectSessions(
  project: ProjectDir,
  extension: string = DEFAULT_SESSION_EXTENSION,
): Promise<SessionInfo[]> {
  const files = await listSessionFiles(project.dirPath, extension);
  const sessions: SessionInfo[] = [];
  for (const file of files) {
    const info = await extractSessionInfo(file, project.projectPath);
    if (info) {
      sessions.push(info);
    }
  }
  return sessions;
}
