/**
 * SteamCMD process runner.
 *
 * Design:
 * - Pure command builders for SteamCMD arguments (testable)
 * - Process runner interface for dependency injection
 * - Long-running children expose their merged stdout/stderr as a line stream
 * - Long-running children are killed as a process group
 */

import { spawn as spawnChild } from "node:child_process";
import { once } from "node:events";
import { createInterface } from "node:readline";
import { PassThrough, type Readable } from "node:stream";

// ============================================================================
// Types
// ============================================================================

/**
 * Steam login used for +login.
 */
export type Credentials =
  | { anonymous: true }
  | { anonymous: false; username: string; password: string };

/**
 * Options for an app download command.
 */
export interface DownloadCommandOptions {
  credentials: Credentials;
  /** Directory passed to +force_install_dir */
  installDir: string;
  appId: string;
  /** Append `validate` to +app_update (default: true) */
  validate?: boolean;
}

/**
 * Output of a process that ran to completion.
 */
export interface ProcessOutput {
  success: boolean;
  code: number;
  stdout: string;
  stderr: string;
}

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: string;
}

/**
 * Handle on a spawned, still running process.
 */
export interface RunningProcess {
  pid: number | undefined;
  /** stdout and stderr merged, one entry per line as it arrives */
  lines: AsyncIterable<string>;
  exited: Promise<ProcessExit>;
  /**
   * Terminate the process and whatever it started, escalating to SIGKILL
   * if it is still running after a grace period. Returns false if it
   * already exited.
   */
  kill(): boolean;
}

/**
 * Process runner interface for dependency injection.
 */
export interface ProcessRunner {
  run(cmd: string, args: string[]): Promise<ProcessOutput>;
  /** Resolves once the child has spawned, rejects if it could not be. */
  spawn(cmd: string, args: string[]): Promise<RunningProcess>;
}

// ============================================================================
// Command Builders (pure functions)
// ============================================================================

export function buildLoginArgs(credentials: Credentials): string[] {
  if (credentials.anonymous) {
    return ["+login", "anonymous"];
  }
  return ["+login", credentials.username, credentials.password];
}

/**
 * Build SteamCMD arguments that log in, install an app and quit.
 */
export function buildDownloadArgs(options: DownloadCommandOptions): string[] {
  const args = buildLoginArgs(options.credentials);

  args.push("+force_install_dir", options.installDir);
  args.push("+app_update", options.appId);

  if (options.validate !== false) {
    args.push("validate");
  }

  args.push("+quit");
  return args;
}

// ============================================================================
// Line Stream
// ============================================================================

/**
 * Split each stream into lines on \n, \r\n or a bare \r, then merge the
 * lines of all streams in arrival order. Lines are buffered until the
 * consumer reads them.
 */
export function mergeLines(streams: Readable[]): AsyncIterable<string> {
  const merged = new PassThrough({ objectMode: true });
  let open = streams.length;

  if (open === 0) {
    merged.end();
  }

  for (const stream of streams) {
    const reader = createInterface({ input: stream, crlfDelay: Infinity });
    reader.on("line", (line) => {
      merged.write(line);
    });
    reader.once("close", () => {
      open -= 1;
      if (open === 0) {
        merged.end();
      }
    });
  }

  return {
    async *[Symbol.asyncIterator]() {
      for await (const chunk of merged) {
        if (typeof chunk === "string") {
          yield chunk;
        }
      }
    },
  };
}

// ============================================================================
// Default Runner
// ============================================================================

export interface ProcessRunnerOptions {
  /** Milliseconds between SIGTERM and SIGKILL when killing a spawned process (default: 5000) */
  killGraceMs?: number;
}

/**
 * Process runner using node:child_process.
 *
 * Spawned processes lead their own process group. kill() signals the whole
 * group, so a launcher script and the binary it runs in the foreground
 * stop together.
 */
export function createProcessRunner(options: ProcessRunnerOptions = {}): ProcessRunner {
  const killGraceMs = options.killGraceMs ?? 5000;

  return {
    run(cmd: string, args: string[]): Promise<ProcessOutput> {
      return new Promise((resolve) => {
        let stdout = "";
        let stderr = "";

        const child = spawnChild(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });
        child.stdout.setEncoding("utf8");
        child.stderr.setEncoding("utf8");
        child.stdout.on("data", (chunk: string) => {
          stdout += chunk;
        });
        child.stderr.on("data", (chunk: string) => {
          stderr += chunk;
        });

        child.once("error", (error) => {
          resolve({ success: false, code: -1, stdout, stderr: error.message });
        });
        child.once("close", (code) => {
          resolve({ success: code === 0, code: code ?? -1, stdout, stderr });
        });
      });
    },

    async spawn(cmd: string, args: string[]): Promise<RunningProcess> {
      const child = spawnChild(cmd, args, { stdio: ["ignore", "pipe", "pipe"], detached: true });
      const lines = mergeLines([child.stdout, child.stderr]);

      let lastError: string | undefined;
      let closed = false;
      let escalation: NodeJS.Timeout | undefined;

      const exited = new Promise<ProcessExit>((resolve) => {
        child.once("close", (code, signal) => {
          closed = true;
          clearTimeout(escalation);
          resolve({ code, signal, error: lastError });
        });
      });

      await once(child, "spawn");

      child.on("error", (error) => {
        lastError = error.message;
      });

      function signalGroup(signal: NodeJS.Signals): boolean {
        const pid = child.pid;
        if (pid === undefined || process.platform === "win32") {
          return child.kill(signal);
        }
        try {
          process.kill(-pid, signal);
          return true;
        } catch {
          // Group already gone; the direct child may still be reaped
          return child.kill(signal);
        }
      }

      return {
        pid: child.pid,
        lines,
        exited,
        kill() {
          if (closed) {
            return false;
          }
          const sent = signalGroup("SIGTERM");
          if (sent && escalation === undefined) {
            escalation = setTimeout(() => {
              if (!closed) {
                signalGroup("SIGKILL");
              }
            }, killGraceMs);
            escalation.unref();
          }
          return sent;
        },
      };
    },
  };
}

export const defaultProcessRunner: ProcessRunner = createProcessRunner();
