/**
 * Monitor loop for a running SteamCMD download.
 *
 * Consumes the child's line stream, feeds the progress parser, watches for
 * success/failure markers and finalizes the session once the process exits.
 */

import { errorMessage, type Logger } from "../logger.ts";
import type { LinkPublisher } from "./link-publisher.ts";
import type { RunningProcess } from "./process-runner.ts";
import { parseProgressLine } from "./progress-parser.ts";
import type { SessionStore } from "./session.ts";

export const SUCCESS_MARKER = "Success!";
export const FAILURE_MARKERS: readonly string[] = ["ERROR!", "Failed"];

export interface MonitorDependencies {
  store: SessionStore;
  publisher: LinkPublisher;
  log: Logger;
  appId: string;
  /** Directory SteamCMD installs into; handed to the publisher */
  installDir: string;
  clock?: () => number;
  /** Once aborted, the monitor stops writing to the session and returns */
  signal?: AbortSignal;
}

export type LineOutcome = "success" | "failure" | null;

/**
 * Classify a line by the markers it carries. Success wins over failure.
 */
export function classifyLine(line: string): LineOutcome {
  if (line.includes(SUCCESS_MARKER)) return "success";
  if (FAILURE_MARKERS.some((marker) => line.includes(marker))) return "failure";
  return null;
}

/**
 * Run the monitor loop until the child's output ends and it has exited.
 */
export async function monitorDownload(
  child: RunningProcess,
  deps: MonitorDependencies,
): Promise<void> {
  const { store, publisher, log, appId, installDir, signal } = deps;
  const clock = deps.clock ?? Date.now;

  for await (const line of child.lines) {
    if (signal?.aborted) return;

    store.appendLog(line);
    log.debug(line);

    const session = store.peek();
    store.applyMetrics(parseProgressLine(line, session, session.startedAt, clock()));

    const outcome = classifyLine(line);
    if (outcome === "success") {
      if (store.transition("completed")) {
        log.info(`Download completed for game ID ${appId}`);
        await publishLinks();
      }
    } else if (outcome === "failure") {
      if (store.transition("error")) {
        log.error(`Download failed for game ID ${appId}`, { line });
      }
    }
  }

  const exit = await child.exited;
  if (signal?.aborted) return;

  if (store.peek().status === "downloading") {
    store.transition("error");
    store.appendLog(`Process ended unexpectedly (exit code ${exit.code ?? exit.signal ?? "unknown"})`);
    log.error(`SteamCMD exited unexpectedly for game ID ${appId}`, {
      code: exit.code,
      signal: exit.signal,
      error: exit.error,
    });
  } else {
    log.debug(`SteamCMD exited for game ID ${appId}`, { code: exit.code, signal: exit.signal });
  }

  async function publishLinks(): Promise<void> {
    try {
      const links = await publisher.publish(appId, installDir);
      store.publishLinks(links);
    } catch (err) {
      const message = errorMessage(err);
      store.appendLog(`Failed to create public links: ${message}`);
      log.error("Failed to create public links", { appId, error: message });
    }
  }
}
