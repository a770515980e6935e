/**
 * SteamCMD installer.
 *
 * Handles:
 * - Checking the launcher is present and executable
 * - Streaming the platform archive to disk
 * - Extracting it with the system tar and letting SteamCMD update itself
 */

import { access, chmod, constants, mkdir, open, rm } from "node:fs/promises";
import { join } from "node:path";

import { errorMessage, type Logger } from "../logger.ts";
import type { ProcessRunner } from "./process-runner.ts";

// ============================================================================
// Types
// ============================================================================

export interface InstallerConfig {
  steamcmdDir: string;
  steamcmdPath: string;
  steamcmdDownloadUrl: string;
  platform: NodeJS.Platform;
}

export interface Installer {
  isInstalled(): Promise<boolean>;
  install(): Promise<boolean>;
}

export type HttpDownloadResult =
  | { ok: true; size: number }
  | { ok: false; error: string };

/**
 * HTTP downloader interface for dependency injection.
 */
export interface HttpDownloader {
  downloadToFile(url: string, outputPath: string): Promise<HttpDownloadResult>;
}

/**
 * File system interface for dependency injection.
 */
export interface InstallerFileSystem {
  isFile(path: string): Promise<boolean>;
  isExecutable(path: string): Promise<boolean>;
  makeExecutable(path: string): Promise<void>;
  mkdir(path: string): Promise<void>;
  remove(path: string): Promise<void>;
}

// ============================================================================
// Defaults
// ============================================================================

/**
 * Default HTTP downloader using fetch, writing chunks straight to disk.
 */
export const defaultHttpDownloader: HttpDownloader = {
  async downloadToFile(url, outputPath) {
    let response: Response;
    try {
      response = await fetch(url);
    } catch (err) {
      return { ok: false, error: `Request failed: ${errorMessage(err)}` };
    }

    if (!response.ok || !response.body) {
      return { ok: false, error: `HTTP ${response.status} ${response.statusText}` };
    }

    const file = await open(outputPath, "w");
    let size = 0;
    try {
      const reader = response.body.getReader();
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        await file.write(value);
        size += value.byteLength;
      }
      return { ok: true, size };
    } catch (err) {
      return { ok: false, error: `Download interrupted: ${errorMessage(err)}` };
    } finally {
      await file.close();
    }
  },
};

async function canAccess(path: string, mode: number): Promise<boolean> {
  try {
    await access(path, mode);
    return true;
  } catch {
    return false;
  }
}

export const defaultInstallerFileSystem: InstallerFileSystem = {
  isFile: (path) => canAccess(path, constants.F_OK),
  isExecutable: (path) => canAccess(path, constants.X_OK),
  makeExecutable: (path) => chmod(path, 0o755),
  mkdir: async (path) => {
    await mkdir(path, { recursive: true });
  },
  remove: (path) => rm(path, { force: true }),
};

// ============================================================================
// Pure Functions
// ============================================================================

export function archiveFilename(downloadUrl: string): string {
  return downloadUrl.endsWith(".zip") ? "steamcmd_installer.zip" : "steamcmd_installer.tar.gz";
}

/**
 * tar arguments extracting an archive into a directory. bsdtar (macOS,
 * Windows) also reads zip archives with -xf.
 */
export function buildExtractArgs(archivePath: string, destination: string): string[] {
  const mode = archivePath.endsWith(".zip") ? "-xf" : "-xzf";
  return [mode, archivePath, "-C", destination];
}

// ============================================================================
// Installer
// ============================================================================

export function createInstaller(
  config: InstallerConfig,
  runner: ProcessRunner,
  log: Logger,
  fs: InstallerFileSystem = defaultInstallerFileSystem,
  downloader: HttpDownloader = defaultHttpDownloader,
): Installer {
  const isWindows = config.platform === "win32";

  async function isInstalled(): Promise<boolean> {
    if (isWindows) {
      return fs.isFile(config.steamcmdPath);
    }
    return (await fs.isFile(config.steamcmdPath)) && (await fs.isExecutable(config.steamcmdPath));
  }

  let pending: Promise<boolean> | null = null;

  /**
   * Install SteamCMD. Concurrent calls share the running installation.
   */
  function install(): Promise<boolean> {
    if (!pending) {
      pending = runInstall().finally(() => {
        pending = null;
      });
    }
    return pending;
  }

  async function runInstall(): Promise<boolean> {
    try {
      log.info("Installing SteamCMD...", { url: config.steamcmdDownloadUrl });
      await fs.mkdir(config.steamcmdDir);

      const archivePath = join(config.steamcmdDir, archiveFilename(config.steamcmdDownloadUrl));
      const download = await downloader.downloadToFile(config.steamcmdDownloadUrl, archivePath);
      if (!download.ok) {
        log.error(`Failed to install SteamCMD: ${download.error}`);
        return false;
      }
      log.info("SteamCMD archive downloaded", { bytes: download.size });

      const extract = await runner.run("tar", buildExtractArgs(archivePath, config.steamcmdDir));
      if (!extract.success) {
        log.error(`Failed to install SteamCMD: archive extraction failed (code ${extract.code})`, {
          stderr: extract.stderr.trim(),
        });
        return false;
      }

      if (!isWindows) {
        await fs.makeExecutable(config.steamcmdPath);
      }
      await fs.remove(archivePath);

      if (!(await isInstalled())) {
        log.error("Failed to install SteamCMD correctly", { path: config.steamcmdPath });
        return false;
      }

      log.info("SteamCMD installed successfully");

      // First run downloads SteamCMD's own updates
      const update = await runner.run(config.steamcmdPath, ["+quit"]);
      if (!update.success) {
        log.warn("SteamCMD self-update exited with an error", { code: update.code });
      }

      return true;
    } catch (err) {
      log.error(`Failed to install SteamCMD: ${errorMessage(err)}`);
      return false;
    }
  }

  return { isInstalled, install };
}
