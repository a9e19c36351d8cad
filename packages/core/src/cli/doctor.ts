import { execFileSync } from "node:child_process";
import { accessSync, constants, existsSync, statSync } from "node:fs";
import path from "node:path";
import type { RecallConfig } from "../config/types.js";
import { ENV } from "../config/defaults.js";
import { createLogger } from "../infra/logger.js";

const log = createLogger("doctor");

export interface DoctorCheck {
  name: string;
  status: "pass" | "warn" | "fail";
  message: string;
}

export interface DoctorReport {
  checks: DoctorCheck[];
  ok: boolean;
}

const MIN_NODE_MAJOR = 20;

/**
 * Run all doctor diagnostic checks against a loaded configuration.
 */
export async function runDoctorChecks(
  config: RecallConfig,
  nodeVersion: string = process.version,
): Promise<DoctorReport> {
  const checks: DoctorCheck[] = [
    checkNodeVersion(nodeVersion),
    checkCorpusRoot(config.corpus.projectsDir),
    checkBackendDirectory(config.backend.cwd),
    checkBackendCommand(config.backend.command),
  ];

  const ok = checks.every((c) => c.status !== "fail");
  return { checks, ok };
}

function checkNodeVersion(version: string): DoctorCheck {
  const majorText = /^v(\d+)\./.exec(version)?.[1];
  const major = majorText === undefined ? Number.NaN : parseInt(majorText, 10);
  if (Number.isNaN(major)) {
    return {
      name: "Node version",
      status: "fail",
      message: `Unable to parse Node.js version: ${version}`,
    };
  }

  if (major >= MIN_NODE_MAJOR) {
    return {
      name: "Node version",
      status: "pass",
      message: `Node.js ${version} >= v${MIN_NODE_MAJOR}.0.0`,
    };
  }

  return {
    name: "Node version",
    status: "fail",
    message: `Node.js ${version} is below minimum v${MIN_NODE_MAJOR}.0.0`,
  };
}

function checkCorpusRoot(projectsDir: string): DoctorCheck {
  if (!existsSync(projectsDir)) {
    return {
      name: "Projects directory",
      status: "warn",
      message: `No Claude projects directory found at ${projectsDir}`,
    };
  }

  try {
    accessSync(projectsDir, constants.R_OK);
    return {
      name: "Projects directory",
      status: "pass",
      message: `${projectsDir} exists and is readable`,
    };
  } catch {
    return {
      name: "Projects directory",
      status: "fail",
      message: `${projectsDir} exists but is not readable`,
    };
  }
}

function checkBackendDirectory(cwd: string | undefined): DoctorCheck {
  if (!cwd) {
    return {
      name: "Backend directory",
      status: "fail",
      message: `${ENV.backendPath} is not set (semantic search will be unavailable)`,
    };
  }

  if (!existsSync(cwd) || !statSync(cwd).isDirectory()) {
    return {
      name: "Backend directory",
      status: "fail",
      message: `Backend directory does not exist: ${cwd}`,
    };
  }

  return {
    name: "Backend directory",
    status: "pass",
    message: `Backend directory found: ${cwd}`,
  };
}

function checkBackendCommand(command: string): DoctorCheck {
  if (command.includes(path.sep)) {
    return existsSync(command)
      ? { name: "Backend command", status: "pass", message: `${command} exists` }
      : { name: "Backend command", status: "fail", message: `${command} does not exist` };
  }

  try {
    const lookup = process.platform === "win32" ? "where" : "which";
    const resolved = execFileSync(lookup, [command], {
      encoding: "utf-8",
      timeout: 5_000,
    });
    const first = resolved.trim().split("\n")[0] ?? command;
    return {
      name: "Backend command",
      status: "pass",
      message: `${command} found at ${first}`,
    };
  } catch {
    log.debug(`Lookup of ${command} on PATH failed`);
    return {
      name: "Backend command",
      status: "fail",
      message: `${command} was not found on PATH`,
    };
  }
}

/**
 * Format a doctor report as human-readable text.
 * Uses [PASS], [WARN], [FAIL] prefixes.
 */
export function formatDoctorResults(report: DoctorReport): string {
  const lines = report.checks.map((check) => {
    const prefix =
      check.status === "pass"
        ? "[PASS]"
        : check.status === "warn"
          ? "[WARN]"
          : "[FAIL]";
    return `${prefix} ${check.name}: ${check.message}`;
  });

  lines.push("");
  lines.push(
    report.ok ? "All checks passed." : "Some checks failed. See above.",
  );

  return lines.join("\n");
}
