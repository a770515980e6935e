/**
 * Link publisher.
 *
 * Exposes a finished download under the public directory (symlink, or a
 * copy where links are refused), writes a manifest of its files and
 * returns the public URLs.
 */

import { cp, readdir, rm, symlink, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { normalizeUrl } from "../config.ts";
import type { Logger } from "../logger.ts";
import type { PublishedLink } from "./session.ts";

export const MANIFEST_FILENAME = "manifest.txt";

// ============================================================================
// Types
// ============================================================================

export interface LinkPublisherConfig {
  publicDir: string;
  /** Base URL of this server, without trailing slash */
  publicUrl: string;
}

export interface LinkPublisher {
  publish(appId: string, sourceDir: string): Promise<PublishedLink[]>;
}

/**
 * File system interface for dependency injection.
 */
export interface PublisherFileSystem {
  remove(path: string): Promise<void>;
  link(target: string, path: string): Promise<void>;
  copyDir(source: string, destination: string): Promise<void>;
  listFiles(dir: string): Promise<string[]>;
  writeText(path: string, content: string): Promise<void>;
}

// ============================================================================
// Pure Functions
// ============================================================================

export function publicDirName(appId: string): string {
  return `app_${appId}`;
}

export function buildPublicLinks(publicUrl: string, appId: string): PublishedLink[] {
  const base = `${normalizeUrl(publicUrl)}/public/${publicDirName(appId)}`;
  return [
    { label: "Game Files Directory", url: base },
    { label: "Game Files Manifest", url: `${base}/${MANIFEST_FILENAME}` },
  ];
}

/**
 * Manifest body: one relative path per line, the manifest itself excluded.
 */
export function buildManifest(files: string[]): string {
  const entries = files.filter((file) => file !== MANIFEST_FILENAME).sort();
  return entries.map((file) => `${file}\n`).join("");
}

// ============================================================================
// Default File System
// ============================================================================

/**
 * Recursively list files below `dir` as POSIX-style relative paths.
 */
async function listFilesRecursive(dir: string, prefix = ""): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFilesRecursive(join(dir, entry.name), relative)));
    } else {
      files.push(relative);
    }
  }

  return files;
}

export const defaultPublisherFileSystem: PublisherFileSystem = {
  // rm does not follow symlinks, so an old link is removed without touching its target
  remove: (path) => rm(path, { recursive: true, force: true }),
  link: (target, path) => symlink(target, path, "dir"),
  copyDir: (source, destination) => cp(source, destination, { recursive: true }),
  listFiles: (dir) => listFilesRecursive(dir),
  writeText: (path, content) => writeFile(path, content, "utf8"),
};

// ============================================================================
// Publisher
// ============================================================================

export function createLinkPublisher(
  config: LinkPublisherConfig,
  log: Logger,
  fs: PublisherFileSystem = defaultPublisherFileSystem,
): LinkPublisher {
  async function publish(appId: string, sourceDir: string): Promise<PublishedLink[]> {
    const publicPath = join(config.publicDir, publicDirName(appId));

    await fs.remove(publicPath);

    try {
      await fs.link(sourceDir, publicPath);
    } catch (err) {
      log.warn("Symlink refused, copying files instead", {
        appId,
        error: err instanceof Error ? err.message : String(err),
      });
      await fs.copyDir(sourceDir, publicPath);
    }

    const files = await fs.listFiles(sourceDir);
    await fs.writeText(join(publicPath, MANIFEST_FILENAME), buildManifest(files));

    log.info(`Public links created for game ID ${appId}`, { files: files.length });
    return buildPublicLinks(config.publicUrl, appId);
  }

  return { publish };
}
