/**
 * HTML templates for the dashboard.
 *
 * All functions return HTML strings. Fragments returned to HTMX requests
 * keep the id of the element they replace so hx-swap="outerHTML" works.
 */

import type { SessionStatus } from "../services/session.ts";
import type { StatusView } from "../services/downloader.ts";

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Escape HTML entities.
 */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

/**
 * Format megabytes, switching to GB past 1024 MB.
 */
export function formatMegabytes(mb: number): string {
  if (mb >= 1024) {
    return `${(mb / 1024).toFixed(2)} GB`;
  }
  return `${mb.toFixed(2)} MB`;
}

/**
 * Format a transfer rate in MB/s.
 */
export function formatRate(mbPerSecond: number): string {
  if (!mbPerSecond) return "";
  return `${formatMegabytes(mbPerSecond)}/s`;
}

/**
 * Get status label for display.
 */
export function getStatusLabel(status: SessionStatus): string {
  const labels: Record<SessionStatus, string> = {
    idle: "Idle",
    preparing: "Preparing...",
    downloading: "Downloading",
    completed: "Completed",
    error: "Error",
    cancelled: "Cancelled",
  };
  return labels[status];
}

/**
 * Last `count` lines of a log.
 */
export function tailLines(lines: readonly string[], count: number): string[] {
  return lines.slice(Math.max(0, lines.length - count));
}

export type MessageVariant = "success" | "error" | "info";

// ============================================================================
// Fragments
// ============================================================================

/**
 * Result message shown under the forms.
 */
export function renderMessage(message: string, variant: MessageVariant): string {
  return `<div id="action-message" class="message ${variant}">${escapeHtml(message)}</div>`;
}

/**
 * SteamCMD install panel.
 */
export function renderInstallStatus(installed: boolean, message?: string): string {
  const statusText = installed ? "SteamCMD is installed and ready" : "SteamCMD is not installed";
  const messageHtml = message ? `<div class="item-meta">${escapeHtml(message)}</div>` : "";

  return `
<section id="install-panel" class="card">
  <h2>SteamCMD</h2>
  <div class="install-row">
    <span class="status-badge status-${installed ? "ok" : "error"}">${statusText}</span>
    <button hx-post="/dashboard/install" hx-target="#install-panel" hx-swap="outerHTML" hx-disabled-elt="this">
      <span class="htmx-indicator">Installing...</span>
      <span class="button-text">${installed ? "Reinstall SteamCMD" : "Install SteamCMD"}</span>
    </button>
  </div>
  ${messageHtml}
</section>`;
}

/**
 * Live status panel, re-requested by HTMX every two seconds.
 */
export function renderStatusPanel(view: StatusView): string {
  const { session } = view;
  const percent = Math.min(100, Math.max(0, view.progress));

  const linksHtml = session.status === "completed" && session.publishedLinks.length > 0
    ? `
  <ul class="links">
    ${session.publishedLinks
      .map((link) => `<li>${escapeHtml(link.label)}: <a href="${escapeHtml(link.url)}" target="_blank" rel="noopener">${escapeHtml(link.url)}</a></li>`)
      .join("\n    ")}
  </ul>`
    : "";

  const logHtml = session.log.length > 0
    ? `
  <details class="log">
    <summary>SteamCMD output (${session.log.length} lines)</summary>
    <pre>${escapeHtml(tailLines(session.log, 50).join("\n"))}</pre>
  </details>`
    : "";

  const rateText = formatRate(session.rate);

  return `
<section id="status-panel" class="card" hx-get="/dashboard/status" hx-trigger="every 2s" hx-swap="outerHTML">
  <h2>Download Status <span class="status-badge status-${session.status}">${getStatusLabel(session.status)}</span></h2>
  <div class="progress-bar" role="progressbar" aria-valuemin="0" aria-valuemax="100" aria-valuenow="${percent}">
    <div class="progress-fill" style="width: ${percent}%"></div>
  </div>
  <div class="item-meta">${percent.toFixed(1)}%${rateText ? ` &bull; ${rateText}` : ""}</div>
  <pre class="status-text">${escapeHtml(view.text)}</pre>${linksHtml}${logHtml}
</section>`;
}

// ============================================================================
// Full Dashboard Page
// ============================================================================

export interface DashboardData {
  installed: boolean;
  status: StatusView;
}

/**
 * Render full dashboard page HTML.
 */
export function renderDashboardPage(data: DashboardData): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>SteamCMD Downloader</title>
  <script src="https://unpkg.com/htmx.org@2.0.4"></script>
  <style>
    :root {
      --bg: #171a21;
      --bg-card: #1b2838;
      --bg-input: #0e141b;
      --text: #eee;
      --text-muted: #8f98a0;
      --accent: #66c0f4;
      --success: #4ade80;
      --warning: #fbbf24;
      --error: #f87171;
      --border: #2a475e;
    }

    * { box-sizing: border-box; margin: 0; padding: 0; }

    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      background: var(--bg);
      color: var(--text);
      min-height: 100vh;
      padding: 20px;
    }

    .container { max-width: 960px; margin: 0 auto; }

    header {
      margin-bottom: 24px;
      padding-bottom: 16px;
      border-bottom: 1px solid var(--border);
    }

    h1 { font-size: 24px; }
    h2 { font-size: 18px; margin-bottom: 12px; }

    .card {
      background: var(--bg-card);
      border: 1px solid var(--border);
      border-radius: 12px;
      padding: 20px;
      margin-bottom: 20px;
    }

    .grid { display: grid; grid-template-columns: 1fr 1fr; gap: 16px; }
    @media (max-width: 700px) { .grid { grid-template-columns: 1fr; } }

    label { display: block; font-size: 14px; color: var(--text-muted); margin-bottom: 4px; }
    label.inline { display: flex; gap: 8px; align-items: center; margin-top: 8px; }

    input[type="text"], input[type="password"] {
      width: 100%;
      padding: 10px 12px;
      margin-bottom: 12px;
      border-radius: 8px;
      border: 1px solid var(--border);
      background: var(--bg-input);
      color: var(--text);
    }

    button {
      padding: 10px 18px;
      border-radius: 8px;
      border: none;
      background: var(--accent);
      color: #0e141b;
      font-weight: 600;
      cursor: pointer;
    }

    button.secondary { background: transparent; color: var(--text); border: 1px solid var(--border); }
    button:disabled { opacity: 0.6; cursor: default; }

    .actions { display: flex; gap: 8px; margin-top: 8px; }
    .install-row { display: flex; justify-content: space-between; align-items: center; gap: 12px; }

    .status-badge {
      display: inline-block;
      padding: 2px 10px;
      border-radius: 999px;
      font-size: 12px;
      text-transform: uppercase;
      border: 1px solid var(--border);
    }
    .status-ok, .status-completed { color: var(--success); }
    .status-error { color: var(--error); }
    .status-cancelled { color: var(--warning); }
    .status-preparing, .status-downloading { color: var(--accent); }

    .progress-bar {
      height: 10px;
      border-radius: 5px;
      background: var(--bg-input);
      overflow: hidden;
      margin-bottom: 6px;
    }
    .progress-fill { height: 100%; background: var(--accent); transition: width 0.5s; }

    .item-meta { font-size: 13px; color: var(--text-muted); margin-top: 4px; }

    pre {
      background: var(--bg-input);
      border-radius: 8px;
      padding: 12px;
      margin-top: 12px;
      font-size: 13px;
      white-space: pre-wrap;
      word-break: break-word;
    }
    .log summary { cursor: pointer; margin-top: 12px; color: var(--text-muted); }
    .links { margin: 12px 0 0 20px; }
    .links a { color: var(--accent); }

    .message { margin-top: 12px; font-size: 14px; }
    .message.success { color: var(--success); }
    .message.error { color: var(--error); }
    .message.info { color: var(--text-muted); }

    .htmx-indicator { display: none; }
    .htmx-request .htmx-indicator, .htmx-request.htmx-indicator { display: inline; }
    .htmx-request .button-text { display: none; }
  </style>
</head>
<body>
  <div class="container">
    <header>
      <h1>SteamCMD Game Downloader</h1>
    </header>

    ${renderInstallStatus(data.installed)}

    <section class="card">
      <h2>Download</h2>
      <form hx-post="/dashboard/download" hx-target="#action-message" hx-swap="outerHTML" hx-disabled-elt="find button">
        <div class="grid">
          <div>
            <label for="username">Steam Username</label>
            <input type="text" id="username" name="username" autocomplete="username">
            <label for="password">Steam Password</label>
            <input type="password" id="password" name="password" autocomplete="current-password">
            <label class="inline"><input type="checkbox" name="anonymous" value="on"> Login Anonymously (for free games)</label>
          </div>
          <div>
            <label for="game">Game ID or URL</label>
            <input type="text" id="game" name="game" placeholder="Enter Steam App ID or URL" required>
            <div class="actions">
              <button type="submit">Download Game</button>
              <button type="button" class="secondary" hx-post="/dashboard/cancel" hx-target="#action-message" hx-swap="outerHTML">Cancel Download</button>
            </div>
          </div>
        </div>
      </form>
      ${renderMessage("", "info")}
    </section>

    ${renderStatusPanel(data.status)}
  </div>
</body>
</html>`;
}
