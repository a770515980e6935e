/**
 * Main entry point for the SteamCMD downloader.
 *
 * Initializes and starts all services:
 * - SteamCMD installer and login check
 * - Download supervisor (one SteamCMD process at a time)
 * - HTTP server (dashboard + API + published files)
 */

import { mkdir } from "node:fs/promises";
import { pathToFileURL } from "node:url";

import { loadConfigFromEnv, type Config } from "./config.ts";
import {
  closeSinks,
  consoleSink,
  createFileSink,
  createLogger,
  errorMessage,
  type LogSink,
} from "./logger.ts";
import { createServer } from "./server/index.ts";
import { createAuthenticator } from "./services/authenticator.ts";
import { createDownloader } from "./services/downloader.ts";
import { createInstaller } from "./services/installer.ts";
import { createLinkPublisher } from "./services/link-publisher.ts";
import { defaultProcessRunner } from "./services/process-runner.ts";

// Until the configured logger exists
const bootLog = createLogger({ component: "main" });

// ============================================================================
// Graceful Shutdown
// ============================================================================

interface Cleanup {
  name: string;
  fn: () => void | Promise<void>;
}

const cleanupTasks: Cleanup[] = [];
let shuttingDown = false;

function registerCleanup(name: string, fn: () => void | Promise<void>): void {
  cleanupTasks.push({ name, fn });
}

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  bootLog.info(`Received ${signal}, shutting down...`);

  for (const task of cleanupTasks.reverse()) {
    try {
      bootLog.info(`Cleaning up: ${task.name}`);
      await task.fn();
    } catch (err) {
      bootLog.error(`Error during cleanup of ${task.name}`, { error: errorMessage(err) });
    }
  }

  bootLog.info("Shutdown complete");
  process.exit(0);
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  // 1. Parse configuration
  const configResult = loadConfigFromEnv();
  if (!configResult.ok) {
    bootLog.error("Configuration error", {
      errors: configResult.errors.map((e) => `${e.field}: ${e.message}`),
    });
    process.exit(1);
  }
  const config: Config = configResult.config;

  // 2. Logging to console and the log file
  const sinks: LogSink[] = [consoleSink, createFileSink(config.logFile)];
  const log = createLogger({ component: "main", level: config.logLevel, sinks });
  registerCleanup("Log file", () => closeSinks(sinks));

  log.info("Starting SteamCMD downloader...");
  log.info("Configuration loaded", {
    port: config.port,
    steamcmdDir: config.steamcmdDir,
    gamesDir: config.gamesDir,
    publicDir: config.publicDir,
    publicUrl: config.publicUrl,
  });

  // 3. Working directories
  for (const dir of [config.steamcmdDir, config.gamesDir, config.publicDir]) {
    await mkdir(dir, { recursive: true });
  }

  // 4. Initialize services
  const runner = defaultProcessRunner;

  const installer = createInstaller(
    {
      steamcmdDir: config.steamcmdDir,
      steamcmdPath: config.steamcmdPath,
      steamcmdDownloadUrl: config.steamcmdDownloadUrl,
      platform: process.platform,
    },
    runner,
    log.child("installer"),
  );

  if (await installer.isInstalled()) {
    log.info("SteamCMD is installed and ready");
  } else {
    log.warn("SteamCMD is not installed. Install it from the dashboard or POST /api/steamcmd/install");
  }

  const authenticator = createAuthenticator(
    { steamcmdPath: config.steamcmdPath },
    runner,
    log.child("auth"),
  );

  const publisher = createLinkPublisher(
    { publicDir: config.publicDir, publicUrl: config.publicUrl },
    log.child("publisher"),
  );

  const downloader = createDownloader({
    config: {
      steamcmdPath: config.steamcmdPath,
      gamesDir: config.gamesDir,
      validateDownloads: config.validateDownloads,
    },
    runner,
    installer,
    authenticator,
    publisher,
    log: log.child("downloader"),
  });
  registerCleanup("Downloader", () => downloader.shutdown());

  // 5. HTTP server
  const server = createServer({
    config,
    downloader,
    installer,
    log: log.child("http"),
  });
  server.start();
  registerCleanup("HTTP Server", () => server.stop());

  log.info(`Dashboard available at ${config.publicUrl}`);

  // 6. Signal handlers
  process.on("SIGINT", () => {
    shutdown("SIGINT").catch((err: unknown) => bootLog.error("Shutdown failed", { error: errorMessage(err) }));
  });
  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch((err: unknown) => bootLog.error("Shutdown failed", { error: errorMessage(err) }));
  });
}

// ============================================================================
// Entry Point
// ============================================================================

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    bootLog.error("Fatal error", { error: errorMessage(err) });
    process.exit(1);
  });
}
