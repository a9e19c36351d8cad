import { homedir } from "node:os";
import { join } from "node:path";

export const DEFAULT_CONFIG_FILE = "recall.json";

/** Environment variables that override file settings. */
export const ENV = {
  backendPath: "RLM_SERVER_PATH",
  projectsDir: "RECALL_PROJECTS_DIR",
  logLevel: "RECALL_LOG_LEVEL",
} as const;

export function getDefaultProjectsDir(): string {
  return join(homedir(), ".claude", "projects");
}
