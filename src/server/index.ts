/**
 * Main HTTP server for the SteamCMD downloader.
 *
 * Routes:
 * - /            - Dashboard page
 * - /dashboard/* - HTMX fragments for the dashboard
 * - /api/*       - JSON API
 * - /public/*    - Published game files
 * - /health      - Health check
 */

import { readdir, stat } from "node:fs/promises";
import { relative, resolve, sep } from "node:path";

import { serve, type ServerType } from "@hono/node-server";
import { serveStatic } from "@hono/node-server/serve-static";
import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";

import type { Config } from "../config.ts";
import type { Logger } from "../logger.ts";
import type { Downloader } from "../services/downloader.ts";
import type { Installer } from "../services/installer.ts";

import { createApiRouter } from "./api.ts";
import { createDashboardRouter, dashboardHtml } from "./dashboard.ts";
import { escapeHtml } from "./templates.ts";

// ============================================================================
// Types
// ============================================================================

export interface ServerDependencies {
  config: Pick<Config, "port" | "host" | "publicDir">;
  downloader: Downloader;
  installer: Installer;
  log: Logger;
}

/**
 * Server instance.
 */
export interface Server {
  app: Hono;
  start(): void;
  stop(): Promise<void>;
}

// ============================================================================
// Public Directory Listing
// ============================================================================

/**
 * Resolve a request path under the public directory, or null when it
 * points outside of it.
 */
export function resolvePublicPath(publicDir: string, requestPath: string): string | null {
  let decoded: string;
  try {
    decoded = decodeURIComponent(requestPath);
  } catch {
    return null;
  }

  const root = resolve(publicDir);
  const target = resolve(root, `.${decoded}`);
  if (target !== root && !target.startsWith(root + sep)) {
    return null;
  }
  return target;
}

/**
 * Simple HTML index of a published directory.
 */
export function renderDirectoryListing(urlPath: string, entries: { name: string; isDirectory: boolean }[]): string {
  const base = urlPath.endsWith("/") ? urlPath : `${urlPath}/`;
  const items = [...entries]
    .sort((a, b) => a.name.localeCompare(b.name))
    .map((entry) => {
      const name = entry.isDirectory ? `${entry.name}/` : entry.name;
      return `<li><a href="${escapeHtml(base + encodeURIComponent(entry.name))}${entry.isDirectory ? "/" : ""}">${escapeHtml(name)}</a></li>`;
    })
    .join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head><meta charset="UTF-8"><title>Index of ${escapeHtml(base)}</title></head>
<body>
<h1>Index of ${escapeHtml(base)}</h1>
<ul>
${items}
</ul>
</body>
</html>`;
}

// ============================================================================
// Server Factory
// ============================================================================

/**
 * Create the HTTP server.
 */
export function createServer(deps: ServerDependencies): Server {
  const { config, downloader, installer, log } = deps;

  // Create Hono app
  const app = new Hono();

  // Middleware
  app.use("*", logger((message: string) => log.info(message)));
  app.use("*", cors({
    origin: "*",
    allowMethods: ["GET", "POST", "OPTIONS"],
    allowHeaders: ["Content-Type"],
  }));

  // ==========================================================================
  // API and Dashboard
  // ==========================================================================

  app.route("/api", createApiRouter({ downloader, installer }));
  app.route("/dashboard", createDashboardRouter({ downloader, installer }));

  app.get("/", async (c: Context) => {
    return c.html(await dashboardHtml({ downloader, installer }));
  });

  // ==========================================================================
  // Published Files
  // ==========================================================================

  app.use(
    "/public/*",
    serveStatic({
      root: relative(process.cwd(), config.publicDir) || ".",
      rewriteRequestPath: (path) => path.replace(/^\/public/, ""),
    }),
  );

  app.get("/public/*", async (c: Context) => {
    const target = resolvePublicPath(config.publicDir, c.req.path.replace(/^\/public/, ""));
    if (!target) {
      return c.text("Not Found", 404);
    }

    try {
      if (!(await stat(target)).isDirectory()) {
        return c.text("Not Found", 404);
      }
      const entries = await readdir(target, { withFileTypes: true });
      return c.html(renderDirectoryListing(
        c.req.path,
        entries.map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() })),
      ));
    } catch {
      return c.text("Not Found", 404);
    }
  });

  // ==========================================================================
  // Health Check
  // ==========================================================================

  app.get("/health", (c: Context) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // ==========================================================================
  // Server Lifecycle
  // ==========================================================================

  let server: ServerType | null = null;

  function start(): void {
    log.info(`Starting server on ${config.host}:${config.port}...`);

    server = serve(
      { fetch: app.fetch, port: config.port, hostname: config.host },
      (info) => {
        log.info(`Server listening on http://${config.host}:${info.port}`);
      },
    );
  }

  function stop(): Promise<void> {
    const current = server;
    server = null;
    if (!current) {
      return Promise.resolve();
    }

    return new Promise((resolveStop, reject) => {
      current.close((err?: Error) => {
        if (err) {
          reject(err);
          return;
        }
        log.info("Server stopped");
        resolveStop();
      });
    });
  }

  return {
    app,
    start,
    stop,
  };
}
