/**
 * In-process fakes shared by the test suites.
 */

import { createLogger, createMemorySink, type Logger } from "../src/logger.ts";
import type { Authenticator, LoginResult } from "../src/services/authenticator.ts";
import type { Installer } from "../src/services/installer.ts";
import type { LinkPublisher } from "../src/services/link-publisher.ts";
import type {
  ProcessExit,
  ProcessOutput,
  ProcessRunner,
  RunningProcess,
} from "../src/services/process-runner.ts";
import type { PublishedLink } from "../src/services/session.ts";

export function createTestLogger(): { log: Logger; lines: string[] } {
  const sink = createMemorySink();
  const log = createLogger({
    component: "test",
    level: "debug",
    sinks: [sink],
    clock: () => new Date("2024-01-01T00:00:00.000Z"),
  });
  return { log, lines: sink.lines };
}

// ============================================================================
// Fake Process
// ============================================================================

export interface FakeProcess {
  process: RunningProcess;
  /** Push one output line to the consumer */
  emit(line: string): void;
  /** End the output and resolve `exited` */
  exit(code?: number | null, signal?: NodeJS.Signals | null): void;
  killed(): boolean;
}

/**
 * `ignoreKill` keeps the process running after kill(), like a child that
 * traps SIGTERM.
 */
export function createFakeProcess(options: { ignoreKill?: boolean } = {}): FakeProcess {
  const queue: string[] = [];
  let waiting: ((result: IteratorResult<string>) => void) | null = null;
  let ended = false;
  let wasKilled = false;
  let resolveExit: (exit: ProcessExit) => void = () => {};
  const exited = new Promise<ProcessExit>((resolve) => {
    resolveExit = resolve;
  });

  const iterator: AsyncIterator<string> = {
    next() {
      const line = queue.shift();
      if (line !== undefined) {
        return Promise.resolve({ done: false, value: line });
      }
      if (ended) {
        return Promise.resolve({ done: true, value: undefined });
      }
      return new Promise((resolve) => {
        waiting = resolve;
      });
    },
  };

  function emit(line: string): void {
    const pending = waiting;
    if (pending) {
      waiting = null;
      pending({ done: false, value: line });
    } else {
      queue.push(line);
    }
  }

  function exit(code: number | null = 0, signal: NodeJS.Signals | null = null): void {
    if (ended) return;
    ended = true;
    const pending = waiting;
    if (pending && queue.length === 0) {
      waiting = null;
      pending({ done: true, value: undefined });
    }
    resolveExit({ code, signal });
  }

  const handle: RunningProcess = {
    pid: 4242,
    lines: { [Symbol.asyncIterator]: () => iterator },
    exited,
    kill() {
      if (ended) return false;
      wasKilled = true;
      if (!options.ignoreKill) {
        exit(null, "SIGTERM");
      }
      return true;
    },
  };

  return { process: handle, emit, exit, killed: () => wasKilled };
}

/**
 * Process whose output is fixed up front and which exits right after it.
 */
export function scriptedProcess(lines: string[], code: number | null = 0): FakeProcess {
  const fake = createFakeProcess();
  for (const line of lines) {
    fake.emit(line);
  }
  fake.exit(code);
  return fake;
}

// ============================================================================
// Fake Runner
// ============================================================================

export interface RunnerCall {
  cmd: string;
  args: string[];
}

export interface FakeRunner extends ProcessRunner {
  runCalls: RunnerCall[];
  spawnCalls: RunnerCall[];
}

export function createFakeRunner(options: {
  run?: (cmd: string, args: string[]) => ProcessOutput;
  spawn?: (cmd: string, args: string[]) => RunningProcess | Promise<RunningProcess>;
} = {}): FakeRunner {
  const runCalls: RunnerCall[] = [];
  const spawnCalls: RunnerCall[] = [];

  return {
    runCalls,
    spawnCalls,
    run(cmd, args) {
      runCalls.push({ cmd, args });
      const output = options.run?.(cmd, args) ?? { success: true, code: 0, stdout: "", stderr: "" };
      return Promise.resolve(output);
    },
    async spawn(cmd, args) {
      spawnCalls.push({ cmd, args });
      if (!options.spawn) {
        throw new Error("spawn not configured");
      }
      return options.spawn(cmd, args);
    },
  };
}

// ============================================================================
// Fake Services
// ============================================================================

export function createFakeInstaller(installed = true): Installer & { installCalls: number } {
  const installer = {
    installCalls: 0,
    isInstalled: () => Promise.resolve(installed),
    install: () => {
      installer.installCalls += 1;
      return Promise.resolve(installed);
    },
  };
  return installer;
}

export function createFakeAuthenticator(result: LoginResult = { ok: true, message: "Login successful" }): Authenticator {
  return {
    login: () => Promise.resolve(result),
  };
}

export function createFakePublisher(
  links: PublishedLink[] = [
    { label: "Game Files Directory", url: "http://localhost:7860/public/app_10" },
  ],
): LinkPublisher & { calls: { appId: string; sourceDir: string }[] } {
  const calls: { appId: string; sourceDir: string }[] = [];
  return {
    calls,
    publish(appId, sourceDir) {
      calls.push({ appId, sourceDir });
      return Promise.resolve(links);
    },
  };
}
