/**
 * Download supervisor.
 *
 * Owns the session store and the one running SteamCMD process with its
 * monitor task. Starting, cancelling and status queries all go through
 * here so both the JSON API and the dashboard share one state.
 *
 * A start request while a download is preparing or running is rejected
 * with a conflict. After a terminal state, a still-draining previous
 * process is terminated and its monitor awaited before the reset.
 */

import { mkdir } from "node:fs/promises";
import { join } from "node:path";

import { errorMessage, type Logger } from "../logger.ts";
import type { Authenticator } from "./authenticator.ts";
import type { Installer } from "./installer.ts";
import type { LinkPublisher } from "./link-publisher.ts";
import { monitorDownload } from "./monitor.ts";
import {
  buildDownloadArgs,
  type Credentials,
  type ProcessRunner,
  type RunningProcess,
} from "./process-runner.ts";
import { createSessionStore, isActiveStatus, resolveAppId, type SessionStore } from "./session.ts";
import { buildStatusReport, formatStatusText, type StatusReport } from "./status.ts";

// ============================================================================
// Types
// ============================================================================

export interface DownloaderConfig {
  steamcmdPath: string;
  gamesDir: string;
  validateDownloads: boolean;
}

export interface DownloaderDependencies {
  config: DownloaderConfig;
  runner: ProcessRunner;
  installer: Installer;
  authenticator: Authenticator;
  publisher: LinkPublisher;
  log: Logger;
  store?: SessionStore;
  clock?: () => number;
  /** Creates the app's working directory */
  ensureDir?: (path: string) => Promise<void>;
  /** How long to wait for a terminated process before detaching its monitor (default: 15000) */
  drainTimeoutMs?: number;
}

export interface StartRequest {
  /** App id or a URL containing app/<id> */
  game: string;
  username?: string;
  password?: string;
  anonymous?: boolean;
}

export type StartErrorType =
  | "invalid_input"
  | "not_installed"
  | "conflict"
  | "auth_failed"
  | "cancelled"
  | "filesystem_error"
  | "spawn_failed";

export interface StartError {
  type: StartErrorType;
  message: string;
}

export type StartResult =
  | { ok: true; appId: string; message: string }
  | { ok: false; error: StartError };

/**
 * Formatted status for the control surface.
 */
export interface StatusView {
  text: string;
  /** 0-100, for a progress indicator */
  progress: number;
  session: StatusReport;
}

interface MonitorTask {
  appId: string;
  process: RunningProcess;
  done: Promise<void>;
  detach: AbortController;
}

// ============================================================================
// Pure Helpers
// ============================================================================

/**
 * Credentials from a start request, or an error message when a named
 * login is missing its username or password.
 */
export function resolveCredentials(
  request: StartRequest,
): { ok: true; credentials: Credentials } | { ok: false; message: string } {
  if (request.anonymous) {
    return { ok: true, credentials: { anonymous: true } };
  }

  const username = request.username?.trim();
  const password = request.password;
  if (!username || !password) {
    return {
      ok: false,
      message: "Steam username and password are required unless logging in anonymously.",
    };
  }

  return { ok: true, credentials: { anonymous: false, username, password } };
}

export function appInstallDir(gamesDir: string, appId: string): string {
  return join(gamesDir, `app_${appId}`);
}

function failure(type: StartErrorType, message: string): StartResult {
  return { ok: false, error: { type, message } };
}

/**
 * Resolves true once `promise` settles, or false after `ms` milliseconds.
 */
async function settlesWithin(promise: Promise<void>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });

  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// ============================================================================
// Downloader
// ============================================================================

export function createDownloader(deps: DownloaderDependencies) {
  const { config, runner, installer, authenticator, publisher, log } = deps;
  const clock = deps.clock ?? Date.now;
  const store = deps.store ?? createSessionStore(clock);
  const ensureDir = deps.ensureDir ?? (async (path: string) => {
    await mkdir(path, { recursive: true });
  });
  const drainTimeoutMs = deps.drainTimeoutMs ?? 15_000;

  let task: MonitorTask | null = null;
  let starting = false;

  /**
   * Terminate and await the previous monitor task, if any. A monitor whose
   * process outlives `drainTimeoutMs` is detached from the session.
   */
  async function drainPreviousTask(): Promise<void> {
    if (!task) return;

    const previous = task;
    task = null;
    if (previous.process.kill()) {
      log.info(`Terminated leftover SteamCMD process for game ID ${previous.appId}`);
    }

    if (!(await settlesWithin(previous.done, drainTimeoutMs))) {
      previous.detach.abort();
      log.warn(`SteamCMD process for game ID ${previous.appId} did not exit, detached its monitor`, {
        pid: previous.process.pid,
      });
    }
  }

  /**
   * Mark the session failed before or during spawn.
   */
  function failSession(type: StartErrorType, message: string): StartResult {
    store.transition("error");
    store.appendLog(`Error: ${message}`);
    log.error(`Download error: ${message}`, { appId: store.peek().appId });
    return failure(type, `Download error: ${message}`);
  }

  function supervise(appId: string, child: RunningProcess, installDir: string): MonitorTask {
    const detach = new AbortController();
    const done = monitorDownload(child, {
      store,
      publisher,
      log,
      appId,
      installDir,
      clock,
      signal: detach.signal,
    }).catch((err: unknown) => {
      const message = errorMessage(err);
      log.error("Download monitor failed", { appId, error: message });
      if (!detach.signal.aborted && store.peek().appId === appId && store.transition("error")) {
        store.appendLog(`Error: ${message}`);
      }
    });

    return { appId, process: child, done, detach };
  }

  /**
   * Validate a request, log in, and start SteamCMD with a monitor task.
   * Resolves as soon as the process runs; progress is read via getStatus().
   */
  async function start(request: StartRequest): Promise<StartResult> {
    const appId = resolveAppId(request.game);
    if (!appId) {
      return failure(
        "invalid_input",
        "Invalid game ID or URL. Please provide a valid Steam app ID or URL.",
      );
    }

    const credentials = resolveCredentials(request);
    if (!credentials.ok) {
      return failure("invalid_input", credentials.message);
    }

    if (!(await installer.isInstalled())) {
      return failure("not_installed", "SteamCMD not installed. Please install it first.");
    }

    if (starting || isActiveStatus(store.peek().status)) {
      return failure("conflict", "A download is already in progress. Cancel it before starting another.");
    }

    starting = true;
    try {
      const login = await authenticator.login(credentials.credentials);
      if (!login.ok) {
        return failure("auth_failed", login.message);
      }

      await drainPreviousTask();

      store.reset(appId);
      const installDir = appInstallDir(config.gamesDir, appId);

      try {
        await ensureDir(installDir);
      } catch (err) {
        return failSession("filesystem_error", errorMessage(err));
      }

      if (store.peek().status === "cancelled") {
        return failure("cancelled", "Download cancelled");
      }

      log.info(`Starting download for game ID: ${appId}`);
      const args = buildDownloadArgs({
        credentials: credentials.credentials,
        installDir,
        appId,
        validate: config.validateDownloads,
      });

      let child: RunningProcess;
      try {
        child = await runner.spawn(config.steamcmdPath, args);
      } catch (err) {
        return failSession("spawn_failed", errorMessage(err));
      }

      task = supervise(appId, child, installDir);

      // Cancelled while the process was spawning
      if (!store.transition("downloading")) {
        child.kill();
        return failure("cancelled", "Download cancelled");
      }

      return { ok: true, appId, message: "Download started" };
    } finally {
      starting = false;
    }
  }

  /**
   * Cancel the current download. Only a preparing or downloading session
   * can be cancelled; the monitor finalizes once the process exits.
   */
  function cancel(): boolean {
    if (!store.transition("cancelled")) {
      return false;
    }

    const appId = store.peek().appId;
    if (task && task.appId === appId) {
      task.process.kill();
    }

    log.info("Download cancelled", { appId });
    return true;
  }

  function getStatus(): StatusView {
    const session = buildStatusReport(store.get(), clock());
    return {
      text: formatStatusText(session),
      progress: session.percent,
      session,
    };
  }

  function isBusy(): boolean {
    return starting || isActiveStatus(store.peek().status);
  }

  /**
   * Wait for the current monitor task to finish (it does when SteamCMD exits).
   */
  async function waitForIdle(): Promise<void> {
    await task?.done;
  }

  /**
   * Cancel any running download and wait for its monitor to finish.
   */
  async function shutdown(): Promise<void> {
    cancel();
    await drainPreviousTask();
  }

  return {
    start,
    cancel,
    getStatus,
    isBusy,
    waitForIdle,
    shutdown,
    store,
  };
}

/**
 * Type for the downloader instance.
 */
export type Downloader = ReturnType<typeof createDownloader>;
