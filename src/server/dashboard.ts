/**
 * Dashboard UI for the downloader service.
 *
 * Server-rendered HTML using HTMX; the status panel polls
 * /dashboard/status. All rendering logic is in templates.ts.
 */

import { Hono, type Context } from "hono";

import type { Downloader } from "../services/downloader.ts";
import type { Installer } from "../services/installer.ts";
import {
  renderDashboardPage,
  renderInstallStatus,
  renderMessage,
  renderStatusPanel,
} from "./templates.ts";

// ============================================================================
// Types
// ============================================================================

export interface DashboardDependencies {
  downloader: Downloader;
  installer: Installer;
}

// ============================================================================
// Helpers
// ============================================================================

function formField(body: Record<string, unknown>, name: string): string | undefined {
  const value = body[name];
  return typeof value === "string" ? value : undefined;
}

/**
 * Render the full dashboard page.
 */
export async function dashboardHtml(deps: DashboardDependencies): Promise<string> {
  return renderDashboardPage({
    installed: await deps.installer.isInstalled(),
    status: deps.downloader.getStatus(),
  });
}

// ============================================================================
// Router
// ============================================================================

/**
 * Create the router serving HTMX fragments under /dashboard.
 */
export function createDashboardRouter(deps: DashboardDependencies) {
  const { downloader, installer } = deps;

  const dashboard = new Hono();

  dashboard.get("/status", (c: Context) => {
    return c.html(renderStatusPanel(downloader.getStatus()));
  });

  dashboard.get("/steamcmd", async (c: Context) => {
    return c.html(renderInstallStatus(await installer.isInstalled()));
  });

  dashboard.post("/install", async (c: Context) => {
    const success = await installer.install();
    const message = success ? "SteamCMD successfully installed" : "SteamCMD installation failed";
    return c.html(renderInstallStatus(await installer.isInstalled(), message));
  });

  dashboard.post("/download", async (c: Context) => {
    const body = await c.req.parseBody();
    const result = await downloader.start({
      game: formField(body, "game") ?? "",
      username: formField(body, "username"),
      password: formField(body, "password"),
      anonymous: formField(body, "anonymous") === "on",
    });

    if (!result.ok) {
      return c.html(renderMessage(result.error.message, "error"));
    }
    return c.html(renderMessage(`${result.message} for game ID ${result.appId}`, "success"));
  });

  dashboard.post("/cancel", (c: Context) => {
    if (!downloader.cancel()) {
      return c.html(renderMessage("No active download to cancel", "info"));
    }
    return c.html(renderMessage("Download cancelled", "success"));
  });

  return dashboard;
}
