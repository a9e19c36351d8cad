#!/usr/bin/env node

import "dotenv/config";
import { Command } from "commander";
import type { RecallConfig } from "./config/types.js";
import { APP_NAME, APP_VERSION } from "./infra/app-info.js";

const program = new Command();

program
  .name(APP_NAME)
  .description("Recall past coding-assistant conversations from their transcripts")
  .version(APP_VERSION);

interface ConfigOption {
  config?: string;
}

/**
 * Loads configuration and applies its logging settings. Modules that log are
 * imported after this so their loggers pick up the configured level.
 */
async function loadRuntimeConfig(options: ConfigOption): Promise<RecallConfig> {
  const { loadConfig } = await import("./config/loader.js");
  const { setDefaultLogLevel, setDefaultRedaction } = await import("./infra/logger.js");

  const config = await loadConfig({ configPath: options.config });
  setDefaultLogLevel(config.logging.level);
  setDefaultRedaction(config.logging.redactSecrets);
  return config;
}

function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

function fail(err: unknown): never {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

// --- serve ---
program
  .command("serve")
  .description("Run the recall tools as a JSON-RPC server on stdin/stdout")
  .option("-c, --config <path>", "Path to config file")
  .action(async (options: ConfigOption) => {
    try {
      const config = await loadRuntimeConfig(options);
      const { resolveBackendConfig } = await import("./config/loader.js");
      const backendConfig = resolveBackendConfig(config);

      const { createLogger } = await import("./infra/logger.js");
      const { BackendConnection } = await import("./backend/connection.js");
      const { RecallService } = await import("./recall/service.js");
      const { StdioServer } = await import("./server/stdio-server.js");

      const log = createLogger("server");
      const connection = new BackendConnection(backendConfig);
      const service = new RecallService({
        backend: connection,
        corpus: config.corpus,
        limits: config.limits,
        semantic: config.semantic,
      });
      const server = new StdioServer({ service });

      let stopping = false;
      const shutdown = async (reason: string): Promise<void> => {
        if (stopping) return;
        stopping = true;
        log.info(`Shutting down (${reason})`);
        await connection.disconnect();
        log.info("Backend disconnected");
        process.exit(0);
      };

      process.on("SIGINT", () => void shutdown("SIGINT"));
      process.on("SIGTERM", () => void shutdown("SIGTERM"));

      await server.run();
      await shutdown("input closed");
    } catch (err) {
      fail(err);
    }
  });

// --- projects ---
program
  .command("projects")
  .description("List projects with session counts and sizes")
  .option("-c, --config <path>", "Path to config file")
  .action(async (options: ConfigOption) => {
    try {
      const config = await loadRuntimeConfig(options);
      const { listProjects } = await import("./corpus/reports.js");
      printJson(await listProjects(config.corpus.projectsDir, config.corpus.sessionExtension));
    } catch (err) {
      fail(err);
    }
  });

// --- timeline ---
program
  .command("timeline")
  .description("Show recent sessions with their summaries")
  .option("-c, --config <path>", "Path to config file")
  .option("-d, --days <number>", "Days to look back", "7")
  .option("-p, --project <text>", "Only projects whose path contains this text")
  .action(async (options: ConfigOption & { days: string; project?: string }) => {
    try {
      const days = parseInt(options.days, 10);
      if (Number.isNaN(days) || days < 1) {
        fail(new Error(`--days must be a positive integer, got "${options.days}"`));
      }
      const config = await loadRuntimeConfig(options);
      const { listTimeline } = await import("./corpus/reports.js");
      printJson(
        await listTimeline(config.corpus.projectsDir, {
          days,
          project: options.project,
          extension: config.corpus.sessionExtension,
        }),
      );
    } catch (err) {
      fail(err);
    }
  });

// --- recall ---
program
  .command("recall <query>")
  .description("Search past conversations for a question")
  .option("-c, --config <path>", "Path to config file")
  .option("-p, --project <text>", "Only projects whose path contains this text")
  .action(async (query: string, options: ConfigOption & { project?: string }) => {
    try {
      const config = await loadRuntimeConfig(options);
      const { resolveBackendConfig } = await import("./config/loader.js");
      const { BackendConnection } = await import("./backend/connection.js");
      const { RecallService } = await import("./recall/service.js");

      const connection = new BackendConnection(resolveBackendConfig(config));
      const service = new RecallService({
        backend: connection,
        corpus: config.corpus,
        limits: config.limits,
        semantic: config.semantic,
      });

      try {
        printJson(await service.recall({ query, project: options.project }));
      } finally {
        await connection.disconnect();
      }
    } catch (err) {
      fail(err);
    }
  });

// --- doctor ---
program
  .command("doctor")
  .description("Run diagnostic checks on the installation")
  .option("-c, --config <path>", "Path to config file")
  .action(async (options: ConfigOption) => {
    try {
      const config = await loadRuntimeConfig(options);
      const { runDoctorChecks, formatDoctorResults } = await import("./cli/doctor.js");

      const report = await runDoctorChecks(config);
      console.log(formatDoctorResults(report));

      if (!report.ok) {
        process.exit(1);
      }
    } catch (err) {
      fail(err);
    }
  });

// --- config show ---
program
  .command("config")
  .command("show")
  .description("Display current config (secrets redacted)")
  .option("-c, --config <path>", "Path to config file")
  .action(async (options: ConfigOption) => {
    try {
      const config = await loadRuntimeConfig(options);
      const { redactSensitive } = await import("./infra/logger.js");
      printJson(redactSensitive(config));
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync().catch(fail);
