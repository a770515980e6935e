/**
 * Configuration types and parsing for the SteamCMD downloader.
 * All functions except loadConfigFromEnv are pure and easily testable.
 */

import { join, resolve } from "node:path";

import type { LogLevel } from "./logger.ts";

export interface Config {
  port: number;
  host: string;
  /** Directory SteamCMD is installed into */
  steamcmdDir: string;
  /** Launcher script/executable inside steamcmdDir */
  steamcmdPath: string;
  steamcmdDownloadUrl: string;
  /** Working directories for downloaded apps (app_<id>) */
  gamesDir: string;
  /** Directory served under /public */
  publicDir: string;
  /** Base URL used when building public links */
  publicUrl: string;
  logFile: string;
  logLevel: LogLevel;
  /** Pass `validate` to +app_update */
  validateDownloads: boolean;
}

export interface ConfigInput {
  PORT?: string;
  HOST?: string;
  STEAMCMD_DIR?: string;
  STEAMCMD_DOWNLOAD_URL?: string;
  GAMES_DIR?: string;
  PUBLIC_DIR?: string;
  PUBLIC_URL?: string;
  RAILWAY_PUBLIC_URL?: string;
  LOG_FILE?: string;
  LOG_LEVEL?: string;
  VALIDATE_DOWNLOADS?: string;
}

/**
 * Where relative paths resolve from and which SteamCMD build to use.
 */
export interface ConfigContext {
  cwd: string;
  platform: NodeJS.Platform;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export type ConfigResult =
  | { ok: true; config: Config }
  | { ok: false; errors: ConfigError[] };

const STEAMCMD_ARCHIVES: Record<string, string> = {
  win32: "https://steamcdn-a.akamaihd.net/client/installer/steamcmd.zip",
  darwin: "https://steamcdn-a.akamaihd.net/client/installer/steamcmd_osx.tar.gz",
  linux: "https://steamcdn-a.akamaihd.net/client/installer/steamcmd_linux.tar.gz",
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Default SteamCMD archive URL for a platform.
 */
export function defaultDownloadUrl(platform: NodeJS.Platform): string {
  return STEAMCMD_ARCHIVES[platform] ?? STEAMCMD_ARCHIVES.linux;
}

/**
 * Name of the SteamCMD launcher for a platform.
 */
export function steamcmdExecutable(platform: NodeJS.Platform): string {
  return platform === "win32" ? "steamcmd.exe" : "steamcmd.sh";
}

/**
 * Parse and validate configuration from environment variables.
 * Pure function - no I/O, only transforms input to output.
 */
export function parseConfig(input: ConfigInput, context: ConfigContext): ConfigResult {
  const errors: ConfigError[] = [];

  const port = parsePort(input.PORT);
  if (port.error) {
    errors.push(port.error);
  }

  const logLevel = parseLogLevel(input.LOG_LEVEL);
  if (logLevel.error) {
    errors.push(logLevel.error);
  }

  const validateDownloads = parseBoolean(input.VALIDATE_DOWNLOADS, "VALIDATE_DOWNLOADS", true);
  if (validateDownloads.error) {
    errors.push(validateDownloads.error);
  }

  const steamcmdDownloadUrl = input.STEAMCMD_DOWNLOAD_URL?.trim() || defaultDownloadUrl(context.platform);
  if (!isValidUrl(steamcmdDownloadUrl)) {
    errors.push(
      new ConfigError(
        `STEAMCMD_DOWNLOAD_URL must be a valid URL, got: ${steamcmdDownloadUrl}`,
        "STEAMCMD_DOWNLOAD_URL",
      ),
    );
  }

  const publicUrlField = input.PUBLIC_URL?.trim() ? "PUBLIC_URL" : "RAILWAY_PUBLIC_URL";
  const publicUrlInput = input.PUBLIC_URL?.trim() || input.RAILWAY_PUBLIC_URL?.trim();
  if (publicUrlInput && !isValidUrl(publicUrlInput)) {
    errors.push(
      new ConfigError(`${publicUrlField} must be a valid URL, got: ${publicUrlInput}`, publicUrlField),
    );
  }

  if (
    port.value === undefined ||
    logLevel.value === undefined ||
    validateDownloads.value === undefined ||
    errors.length > 0
  ) {
    return { ok: false, errors };
  }

  const steamcmdDir = resolvePath(context.cwd, input.STEAMCMD_DIR, "steamcmd");

  return {
    ok: true,
    config: {
      port: port.value,
      host: input.HOST?.trim() || "0.0.0.0",
      steamcmdDir,
      steamcmdPath: join(steamcmdDir, steamcmdExecutable(context.platform)),
      steamcmdDownloadUrl,
      gamesDir: resolvePath(context.cwd, input.GAMES_DIR, "games"),
      publicDir: resolvePath(context.cwd, input.PUBLIC_DIR, "public"),
      publicUrl: normalizeUrl(publicUrlInput || `http://localhost:${port.value}`),
      logFile: resolvePath(context.cwd, input.LOG_FILE, "steamcmd_downloader.log"),
      logLevel: logLevel.value,
      validateDownloads: validateDownloads.value,
    },
  };
}

/**
 * Load config from process.env (convenience wrapper).
 * This is the only impure function - it reads from the environment.
 */
export function loadConfigFromEnv(): ConfigResult {
  const env = process.env;
  return parseConfig(
    {
      PORT: env.PORT,
      HOST: env.HOST,
      STEAMCMD_DIR: env.STEAMCMD_DIR,
      STEAMCMD_DOWNLOAD_URL: env.STEAMCMD_DOWNLOAD_URL,
      GAMES_DIR: env.GAMES_DIR,
      PUBLIC_DIR: env.PUBLIC_DIR,
      PUBLIC_URL: env.PUBLIC_URL,
      RAILWAY_PUBLIC_URL: env.RAILWAY_PUBLIC_URL,
      LOG_FILE: env.LOG_FILE,
      LOG_LEVEL: env.LOG_LEVEL,
      VALIDATE_DOWNLOADS: env.VALIDATE_DOWNLOADS,
    },
    { cwd: process.cwd(), platform: process.platform },
  );
}

// Helper functions (pure)

interface ParseResult<T> {
  value?: T;
  error?: ConfigError;
}

function resolvePath(cwd: string, value: string | undefined, fallback: string): string {
  return resolve(cwd, value?.trim() || fallback);
}

function parsePort(value: string | undefined): ParseResult<number> {
  if (!value || value.trim() === "") {
    return { value: 7860 };
  }

  const num = Number(value.trim());
  if (!Number.isInteger(num) || num < 1 || num > 65535) {
    return {
      error: new ConfigError(
        `PORT must be a valid port number (1-65535), got: ${value}`,
        "PORT",
      ),
    };
  }

  return { value: num };
}

function parseLogLevel(value: string | undefined): ParseResult<LogLevel> {
  if (!value || value.trim() === "") {
    return { value: "info" };
  }

  const normalized = value.trim().toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    return {
      error: new ConfigError(
        `LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got: ${value}`,
        "LOG_LEVEL",
      ),
    };
  }

  return { value: level };
}

function parseBoolean(
  value: string | undefined,
  field: string,
  defaultValue: boolean,
): ParseResult<boolean> {
  if (!value || value.trim() === "") {
    return { value: defaultValue };
  }

  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return { value: true };
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return { value: false };
  }

  return {
    error: new ConfigError(`${field} must be a boolean, got: ${value}`, field),
  };
}

/**
 * Validate a URL string.
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Normalize URL by removing trailing slash.
 */
export function normalizeUrl(url: string): string {
  return url.replace(/\/+$/, "");
}
