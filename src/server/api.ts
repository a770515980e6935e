/**
 * REST API for the downloader service.
 *
 * Endpoints:
 * - GET  /api/steamcmd          - Whether SteamCMD is installed
 * - POST /api/steamcmd/install  - Install SteamCMD
 * - POST /api/downloads         - Start a download
 * - POST /api/downloads/cancel  - Cancel the current download
 * - GET  /api/status            - Current session status
 */

import { Hono, type Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";

import type { Downloader, StartErrorType, StartRequest } from "../services/downloader.ts";
import type { Installer } from "../services/installer.ts";

// ============================================================================
// Types
// ============================================================================

/**
 * API dependencies.
 */
export interface ApiDependencies {
  downloader: Downloader;
  installer: Installer;
}

// ============================================================================
// Helpers
// ============================================================================

const START_ERROR_STATUS: Record<StartErrorType, ContentfulStatusCode> = {
  invalid_input: 400,
  auth_failed: 401,
  conflict: 409,
  cancelled: 409,
  not_installed: 503,
  filesystem_error: 500,
  spawn_failed: 500,
};

export function startErrorStatus(type: StartErrorType): ContentfulStatusCode {
  return START_ERROR_STATUS[type];
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Validate a start request body. Returns an error message when invalid.
 */
export function parseStartRequest(body: unknown): StartRequest | string {
  if (typeof body !== "object" || body === null) {
    return "Request body must be a JSON object";
  }

  const game: unknown = Reflect.get(body, "game");
  if (typeof game !== "string" || !game.trim()) {
    return "game is required";
  }

  const anonymous: unknown = Reflect.get(body, "anonymous");
  if (anonymous !== undefined && typeof anonymous !== "boolean") {
    return "anonymous must be a boolean";
  }

  return {
    game,
    username: optionalString(Reflect.get(body, "username")),
    password: optionalString(Reflect.get(body, "password")),
    anonymous: anonymous === true,
  };
}

// ============================================================================
// API Factory
// ============================================================================

/**
 * Create the API router.
 */
export function createApiRouter(deps: ApiDependencies) {
  const { downloader, installer } = deps;

  const api = new Hono();

  // ==========================================================================
  // SteamCMD
  // ==========================================================================

  api.get("/steamcmd", async (c: Context) => {
    return c.json({ installed: await installer.isInstalled() });
  });

  api.post("/steamcmd/install", async (c: Context) => {
    const success = await installer.install();
    if (!success) {
      return c.json({ success, message: "SteamCMD installation failed" }, 500);
    }
    return c.json({ success, message: "SteamCMD successfully installed" });
  });

  // ==========================================================================
  // Downloads
  // ==========================================================================

  api.post("/downloads", async (c: Context) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Invalid JSON body" }, 400);
    }

    const request = parseStartRequest(body);
    if (typeof request === "string") {
      return c.json({ error: request }, 400);
    }

    const result = await downloader.start(request);
    if (!result.ok) {
      return c.json({ error: result.error.message, type: result.error.type }, startErrorStatus(result.error.type));
    }

    return c.json({ appId: result.appId, message: result.message }, 202);
  });

  api.post("/downloads/cancel", (c: Context) => {
    if (!downloader.cancel()) {
      return c.json({ error: "No active download to cancel" }, 409);
    }
    return c.json({ message: "Download cancelled" });
  });

  // ==========================================================================
  // Status
  // ==========================================================================

  api.get("/status", (c: Context) => {
    const view = downloader.getStatus();
    return c.json({
      text: view.text,
      progress: view.progress,
      session: view.session,
    });
  });

  return api;
}
