import { join } from "node:path";

import { describe, expect, it } from "vitest";

import {
  appInstallDir,
  createDownloader,
  resolveCredentials,
  type DownloaderDependencies,
} from "../src/services/downloader.ts";
import {
  createFakeAuthenticator,
  createFakeInstaller,
  createFakeProcess,
  createFakePublisher,
  createFakeRunner,
  createTestLogger,
  type FakeProcess,
  type FakeRunner,
} from "./helpers.ts";

interface Harness {
  downloader: ReturnType<typeof createDownloader>;
  runner: FakeRunner;
  processes: FakeProcess[];
  publisher: ReturnType<typeof createFakePublisher>;
}

function setup(overrides: Partial<DownloaderDependencies> = {}): Harness {
  const processes: FakeProcess[] = [];
  const runner = createFakeRunner({
    spawn: () => {
      const fake = createFakeProcess();
      processes.push(fake);
      return fake.process;
    },
  });
  const publisher = createFakePublisher();

  const downloader = createDownloader({
    config: { steamcmdPath: "/steamcmd/steamcmd.sh", gamesDir: "/games", validateDownloads: true },
    runner,
    installer: createFakeInstaller(true),
    authenticator: createFakeAuthenticator(),
    publisher,
    log: createTestLogger().log,
    clock: () => 1_000_000,
    ensureDir: () => Promise.resolve(),
    ...overrides,
  });

  return { downloader, runner, processes, publisher };
}

describe("resolveCredentials", () => {
  it("should use anonymous login when requested", () => {
    expect(resolveCredentials({ game: "10", anonymous: true, username: "ignored" })).toEqual({
      ok: true,
      credentials: { anonymous: true },
    });
  });

  it("should require a username and password otherwise", () => {
    expect(resolveCredentials({ game: "10", username: "player" })).toEqual({
      ok: false,
      message: "Steam username and password are required unless logging in anonymously.",
    });
  });

  it("should trim the username", () => {
    expect(resolveCredentials({ game: "10", username: " player ", password: "test-secret" })).toEqual({
      ok: true,
      credentials: { anonymous: false, username: "player", password: "test-secret" },
    });
  });
});

describe("appInstallDir", () => {
  it("should place each app in its own directory", () => {
    expect(appInstallDir("/games", "10")).toBe(join("/games", "app_10"));
  });
});

describe("createDownloader", () => {
  describe("start", () => {
    it("should reject input without an app id", async () => {
      const { downloader, runner } = setup();

      const result = await downloader.start({ game: "half-life", anonymous: true });

      expect(result).toEqual({
        ok: false,
        error: {
          type: "invalid_input",
          message: "Invalid game ID or URL. Please provide a valid Steam app ID or URL.",
        },
      });
      expect(runner.spawnCalls).toEqual([]);
    });

    it("should reject a named login without a password", async () => {
      const { downloader } = setup();
      const result = await downloader.start({ game: "10", username: "player" });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.type).toBe("invalid_input");
      }
    });

    it("should refuse to start before SteamCMD is installed", async () => {
      const { downloader } = setup({ installer: createFakeInstaller(false) });

      const result = await downloader.start({ game: "10", anonymous: true });

      expect(result).toEqual({
        ok: false,
        error: { type: "not_installed", message: "SteamCMD not installed. Please install it first." },
      });
    });

    it("should leave the session untouched when login fails", async () => {
      const { downloader, runner } = setup({
        authenticator: createFakeAuthenticator({ ok: false, message: "Login failed. Please check your credentials." }),
      });

      const result = await downloader.start({ game: "10", username: "player", password: "test-secret" });

      expect(result).toEqual({
        ok: false,
        error: { type: "auth_failed", message: "Login failed. Please check your credentials." },
      });
      expect(downloader.getStatus().session.status).toBe("idle");
      expect(runner.spawnCalls).toEqual([]);
    });

    it("should spawn SteamCMD and enter the downloading state", async () => {
      const { downloader, runner } = setup();

      const result = await downloader.start({
        game: "https://store.steampowered.com/app/10/CounterStrike/",
        anonymous: true,
      });

      expect(result).toEqual({ ok: true, appId: "10", message: "Download started" });
      expect(runner.spawnCalls).toEqual([
        {
          cmd: "/steamcmd/steamcmd.sh",
          args: [
            "+login",
            "anonymous",
            "+force_install_dir",
            join("/games", "app_10"),
            "+app_update",
            "10",
            "validate",
            "+quit",
          ],
        },
      ]);

      const session = downloader.getStatus().session;
      expect(session.status).toBe("downloading");
      expect(session.appId).toBe("10");
      expect(session.startedAt).toBe(1_000_000);
      expect(downloader.isBusy()).toBe(true);
    });

    it("should pass credentials and skip validate when disabled", async () => {
      const { downloader, runner } = setup({
        config: { steamcmdPath: "/steamcmd/steamcmd.sh", gamesDir: "/games", validateDownloads: false },
      });

      await downloader.start({ game: "10", username: "player", password: "test-secret" });

      expect(runner.spawnCalls[0].args).toEqual([
        "+login",
        "player",
        "test-secret",
        "+force_install_dir",
        join("/games", "app_10"),
        "+app_update",
        "10",
        "+quit",
      ]);
    });

    it("should complete and publish when SteamCMD reports success", async () => {
      const { downloader, processes, publisher } = setup();
      await downloader.start({ game: "10", anonymous: true });

      processes[0].emit("Success! App '10' fully installed.");
      processes[0].exit(0);
      await downloader.waitForIdle();

      const view = downloader.getStatus();
      expect(view.session.status).toBe("completed");
      expect(view.progress).toBe(100);
      expect(publisher.calls).toEqual([{ appId: "10", sourceDir: join("/games", "app_10") }]);
      expect(downloader.isBusy()).toBe(false);
    });

    it("should reject a second download while one is running", async () => {
      const { downloader, runner } = setup();
      await downloader.start({ game: "10", anonymous: true });

      const result = await downloader.start({ game: "20", anonymous: true });

      expect(result).toEqual({
        ok: false,
        error: {
          type: "conflict",
          message: "A download is already in progress. Cancel it before starting another.",
        },
      });
      expect(runner.spawnCalls).toHaveLength(1);
    });

    it("should let only one of two simultaneous requests through", async () => {
      const { downloader, runner } = setup();

      const [first, second] = await Promise.all([
        downloader.start({ game: "10", anonymous: true }),
        downloader.start({ game: "20", anonymous: true }),
      ]);

      expect(first.ok).toBe(true);
      expect(second.ok).toBe(false);
      if (!second.ok) {
        expect(second.error.type).toBe("conflict");
      }
      expect(runner.spawnCalls).toHaveLength(1);
    });

    it("should start a new download after the previous one finished", async () => {
      const { downloader, processes } = setup();
      await downloader.start({ game: "10", anonymous: true });
      processes[0].emit("ERROR! Failed to install app '10' (No subscription)");
      processes[0].exit(8);
      await downloader.waitForIdle();
      expect(downloader.getStatus().session.status).toBe("error");

      const result = await downloader.start({ game: "20", anonymous: true });

      expect(result.ok).toBe(true);
      expect(downloader.getStatus().session.appId).toBe("20");
      expect(downloader.getStatus().session.log).toEqual([]);
    });

    it("should terminate a previous process still draining output", async () => {
      const { downloader, processes } = setup();
      await downloader.start({ game: "10", anonymous: true });
      processes[0].emit("ERROR! Failed to install app '10' (No subscription)");
      await new Promise<void>((resolve) => setImmediate(resolve));
      expect(downloader.getStatus().session.status).toBe("error");

      const result = await downloader.start({ game: "20", anonymous: true });

      expect(result.ok).toBe(true);
      expect(processes[0].killed()).toBe(true);
      expect(downloader.getStatus().session.status).toBe("downloading");
    });

    it("should not wait forever for a previous process that ignores termination", async () => {
      const processes: FakeProcess[] = [];
      const { downloader } = setup({
        drainTimeoutMs: 20,
        runner: createFakeRunner({
          spawn: () => {
            const fake = createFakeProcess({ ignoreKill: processes.length === 0 });
            processes.push(fake);
            return fake.process;
          },
        }),
      });
      await downloader.start({ game: "10", anonymous: true });
      processes[0].emit("ERROR! Failed to install app '10' (No subscription)");
      await new Promise<void>((resolve) => setImmediate(resolve));

      const second = await downloader.start({ game: "20", anonymous: true });
      expect(second.ok).toBe(true);
      expect(processes[0].killed()).toBe(true);

      processes[0].emit("2 MB / 8 MB");
      processes[0].exit(null, "SIGKILL");
      await new Promise<void>((resolve) => setImmediate(resolve));

      const { session } = downloader.getStatus();
      expect(session.appId).toBe("20");
      expect(session.status).toBe("downloading");
      expect(session.log).toEqual([]);
      expect(session.bytesDone).toBe(0);

      expect(downloader.cancel()).toBe(true);
      await downloader.waitForIdle();
      const third = await downloader.start({ game: "30", anonymous: true });
      expect(third.ok).toBe(true);
      expect(downloader.getStatus().session.appId).toBe("30");
    });

    it("should fail the session when the working directory cannot be created", async () => {
      const { downloader, runner } = setup({
        ensureDir: () => Promise.reject(new Error("EACCES: permission denied")),
      });

      const result = await downloader.start({ game: "10", anonymous: true });

      expect(result).toEqual({
        ok: false,
        error: { type: "filesystem_error", message: "Download error: EACCES: permission denied" },
      });
      expect(downloader.getStatus().session.status).toBe("error");
      expect(runner.spawnCalls).toEqual([]);
    });

    it("should fail the session when SteamCMD cannot be spawned", async () => {
      const { downloader } = setup({
        runner: createFakeRunner({
          spawn: () => Promise.reject(new Error("spawn /steamcmd/steamcmd.sh ENOENT")),
        }),
      });

      const result = await downloader.start({ game: "10", anonymous: true });

      expect(result).toEqual({
        ok: false,
        error: { type: "spawn_failed", message: "Download error: spawn /steamcmd/steamcmd.sh ENOENT" },
      });
      const session = downloader.getStatus().session;
      expect(session.status).toBe("error");
      expect(session.log).toEqual(["Error: spawn /steamcmd/steamcmd.sh ENOENT"]);
    });
  });

  describe("cancel", () => {
    it("should report that nothing is running", () => {
      const { downloader } = setup();
      expect(downloader.cancel()).toBe(false);
    });

    it("should cancel and terminate the running download", async () => {
      const { downloader, processes } = setup();
      await downloader.start({ game: "10", anonymous: true });

      expect(downloader.cancel()).toBe(true);
      expect(processes[0].killed()).toBe(true);

      await downloader.waitForIdle();
      expect(downloader.getStatus().session.status).toBe("cancelled");
      expect(downloader.cancel()).toBe(false);
    });

    it("should stop a download cancelled while it was being prepared", async () => {
      let release: () => void = () => {};
      const { downloader, runner } = setup({
        ensureDir: () => new Promise<void>((resolve) => {
          release = resolve;
        }),
      });

      const pending = downloader.start({ game: "10", anonymous: true });
      await new Promise<void>((resolve) => setImmediate(resolve));
      expect(downloader.getStatus().session.status).toBe("preparing");

      expect(downloader.cancel()).toBe(true);
      release();

      expect(await pending).toEqual({ ok: false, error: { type: "cancelled", message: "Download cancelled" } });
      expect(runner.spawnCalls).toEqual([]);
      expect(downloader.getStatus().session.status).toBe("cancelled");
    });
  });

  describe("getStatus", () => {
    it("should report an idle downloader", () => {
      const { downloader } = setup();
      const view = downloader.getStatus();
      expect(view.text).toBe("No active downloads");
      expect(view.progress).toBe(0);
      expect(view.session.status).toBe("idle");
    });
  });

  describe("shutdown", () => {
    it("should cancel the running download and wait for it", async () => {
      const { downloader, processes } = setup();
      await downloader.start({ game: "10", anonymous: true });

      await downloader.shutdown();

      expect(processes[0].killed()).toBe(true);
      expect(downloader.getStatus().session.status).toBe("cancelled");
    });
  });
});
