#!/usr/bin/env node
import { randomBytes } from "node:crypto";
import { homedir } from "node:os";
import { join } from "node:path";
import * as promClient from "prom-client";
import { CompositeMetricsCollector } from "../adapters/composite-metrics-collector.js";
import { ConsoleMetricsCollector } from "../adapters/console-metrics-collector.js";
import { DirectoryBundleStorage } from "../adapters/directory-bundle-storage.js";
import { NodeProcessManager } from "../adapters/node-process-manager.js";
import { NodeTemporaryDirectory } from "../adapters/node-temporary-directory.js";
import { PrometheusMetricsCollector } from "../adapters/prometheus-metrics-collector.js";
import { LogLevel, parseLogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { XcodebuildTarget } from "../adapters/xcodebuild-target.js";
import { errorMessage } from "../errors.js";
import { createXcdeltaServer } from "../http/server.js";
import type { ManagerConfig } from "../types/config.js";
import { createXCTestManager } from "../xctest/xctest-manager.js";

const VERSION = "0.1.0";

// ── Types ──────────────────────────────────────────────────────────────────

interface CliConfig {
  port: number;
  host: string;
  apiKey?: string;
  dataDir: string;
  udid?: string;
  xcodebuildPath: string;
  logLevel: LogLevel;
  manager: ManagerConfig;
}

// ── Arg parsing ────────────────────────────────────────────────────────────

function printHelp(): void {
  console.log(`
  xcdelta — run XCTest bundles and poll their results incrementally

  Usage: xcdelta --udid <udid> [options]

  Options:
    --udid <udid>          Simulator or device to run tests on (required)
    --port <n>             HTTP port (default: 7878)
    --host <addr>          Bind address (default: 127.0.0.1)
    --api-key <key>        Bearer key for every request (default: generated)
    --data-dir <path>      Directory holding bundles/<bundleId>.xctestrun (default: ~/.xcdelta)
    --xcodebuild <path>    Path to xcodebuild (default: "xcodebuild")
    --max-sessions <n>     Live session cap (default: 50)
    --retention-ms <n>     Keep finished sessions pollable this long (default: 300000)
    --log-level <level>    debug | info | warn | error (default: info)
    --help, -h             Show this help
`);
}

function fail(message: string): never {
  console.error(`Error: ${message}\nRun with --help for usage.`);
  process.exit(1);
}

function valueOf(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith("--")) fail(`${flag} requires a value`);
  return value;
}

function integerOf(argv: string[], index: number, flag: string): number {
  const value = Number.parseInt(valueOf(argv, index, flag), 10);
  if (Number.isNaN(value)) fail(`${flag} requires a number`);
  return value;
}

function parseArgs(argv: string[]): CliConfig {
  const config: CliConfig = {
    port: 7878,
    host: "127.0.0.1",
    dataDir: join(homedir(), ".xcdelta"),
    xcodebuildPath: "xcodebuild",
    logLevel: LogLevel.INFO,
    manager: {},
  };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--udid":
        config.udid = valueOf(argv, ++i, arg);
        break;
      case "--port":
        config.port = integerOf(argv, ++i, arg);
        break;
      case "--host":
        config.host = valueOf(argv, ++i, arg);
        break;
      case "--api-key":
        config.apiKey = valueOf(argv, ++i, arg);
        break;
      case "--data-dir":
        config.dataDir = valueOf(argv, ++i, arg);
        break;
      case "--xcodebuild":
        config.xcodebuildPath = valueOf(argv, ++i, arg);
        break;
      case "--max-sessions":
        config.manager.maxConcurrentSessions = integerOf(argv, ++i, arg);
        break;
      case "--retention-ms":
        config.manager.reaper = { retentionMs: integerOf(argv, ++i, arg) };
        break;
      case "--log-level": {
        const level = parseLogLevel(valueOf(argv, ++i, arg));
        if (level === undefined) fail("--log-level must be one of debug, info, warn, error");
        config.logLevel = level;
        break;
      }
      case "--help":
      case "-h":
        printHelp();
        process.exit(0);
        break;
      default:
        fail(`Unknown option: ${arg}`);
    }
  }

  return config;
}

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const config = parseArgs(process.argv);
  const udid = config.udid;
  if (!udid) fail("--udid is required");

  const logger = new StructuredLogger({
    component: "xcdelta",
    level: config.logLevel,
    bindings: { udid },
  });

  // 1. Collaborators for the target
  const prometheus = new PrometheusMetricsCollector(promClient);
  // Console first: its totals back /health
  const metrics = new CompositeMetricsCollector(
    [new ConsoleMetricsCollector(logger), prometheus],
    logger,
  );
  const target = new XcodebuildTarget({
    udid,
    processManager: new NodeProcessManager(),
    xcodebuildPath: config.xcodebuildPath,
    logger,
  });
  const manager = createXCTestManager({
    target,
    bundleStorage: new DirectoryBundleStorage(join(config.dataDir, "bundles")),
    temporaryDirectory: new NodeTemporaryDirectory(),
    config: config.manager,
    logger,
    metrics,
  });

  // 2. HTTP server
  const apiKey = config.apiKey ?? randomBytes(24).toString("base64url");
  const httpServer = createXcdeltaServer({
    service: manager,
    apiKey,
    healthContext: { version: VERSION, metrics },
    prometheusCollector: prometheus,
    logger,
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "EADDRINUSE") {
        fail(`Port ${config.port} is already in use. Try --port ${config.port + 1}`);
      }
      reject(err);
    });
    httpServer.listen(config.port, config.host, () => resolve());
  });
  manager.start();

  // 3. Startup banner
  console.log(`
  xcdelta v${VERSION}

  Local:   http://${config.host}:${config.port}
  Target:  ${udid}
  Bundles: ${join(config.dataDir, "bundles")}
  API Key: ${config.apiKey ? "(from --api-key)" : apiKey}

  API requests require: Authorization: Bearer <key>

  Press Ctrl+C to stop
`);

  // 4. Graceful shutdown
  let shuttingDown = false;
  let forceExitTimer: ReturnType<typeof setTimeout> | null = null;

  const shutdown = async () => {
    if (shuttingDown) {
      console.log("\n  Force exiting...");
      if (forceExitTimer) clearTimeout(forceExitTimer);
      process.exit(1);
    }
    shuttingDown = true;
    console.log("\n  Shutting down...");

    forceExitTimer = setTimeout(() => {
      console.error("  Shutdown timed out, force exiting.");
      process.exit(1);
    }, 60_000);

    try {
      await manager.stop();
    } catch (err) {
      logger.error("Failed to stop sessions", { error: err });
    }

    httpServer.close(() => {
      if (forceExitTimer) clearTimeout(forceExitTimer);
      process.exit(0);
    });
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      console.error(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
