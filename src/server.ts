#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { resolve as resolvePath } from "node:path";
import process from "node:process";
import { pathToFileURL } from "node:url";

import { readConductorEnv } from "./config/env.js";
import { loadServerConfig, type ConductorConfig } from "./config/serverConfig.js";
import { describeError } from "./errors.js";
import { StructuredLogger } from "./logger.js";
import { createConductor } from "./orchestrator/runtime.js";
import { parseConductorCliOptions, type ConductorCliOptions } from "./serverOptions.js";

export * from "./orchestrator/runtime.js";

/**
 * Starts the conductor on stdio. Command-line flags take precedence over the
 * `CONDUCTOR_*` environment. Logs go to stderr since stdout carries the MCP
 * protocol.
 */
async function main(): Promise<void> {
  const env = readConductorEnv();
  const bootLogger = new StructuredLogger({ stream: "stderr" });

  let cli: ConductorCliOptions;
  try {
    cli = parseConductorCliOptions(process.argv.slice(2));
  } catch (error) {
    bootLogger.error("cli_options_invalid", { message: describeError(error) });
    process.exit(1);
  }

  const logFile = cli.logFile ?? env.logFile;
  const logger = new StructuredLogger({
    stream: "stderr",
    level: cli.logLevel ?? env.logLevel,
    logFile: logFile ? resolvePath(logFile) : null,
  });

  const configPath = cli.configPath ?? env.configPath;
  let config: ConductorConfig | undefined;
  if (configPath) {
    try {
      config = await loadServerConfig(resolvePath(configPath));
    } catch (error) {
      logger.error("config_invalid", { path: configPath, message: describeError(error) });
      await logger.flush();
      process.exit(1);
    }
  }

  const dataDir = cli.dataDir ?? env.dataDir;
  const conductor = await createConductor({
    logger,
    config,
    dataDir: dataDir ? resolvePath(dataDir) : undefined,
    localServers: cli.localServers ?? env.localServers,
    dispatch: env.dispatch,
  });

  const transport = new StdioServerTransport();
  await conductor.server.connect(transport);
  logger.info("mcp_started", { transport: "stdio", config: configPath ?? null });

  process.on("SIGINT", () => {
    logger.warn("shutdown_signal", { signal: "SIGINT" });
    conductor
      .close()
      .catch((error: unknown) => {
        process.stderr.write(`shutdown failed: ${describeError(error)}\n`);
      })
      .finally(() => process.exit(0));
  });
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    process.stderr.write(`mcp-conductor failed to start: ${describeError(error)}\n`);
    process.exit(1);
  });
}
