/**
 * Status reporter: read-only snapshots of the session with display fields.
 */

import type { Session } from "./session.ts";

export const REMAINING_PLACEHOLDER = "calculating...";

export interface StatusReport extends Session {
  elapsedSeconds: number;
  /** H:MM:SS since the session started, "0:00:00" before that */
  elapsed: string;
  /** H:MM:SS until completion, or the placeholder while unknown */
  remaining: string;
}

/**
 * Format whole seconds as H:MM:SS, prefixed with "N day(s), " past a day.
 */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;

  const clock = `${hours}:${String(minutes).padStart(2, "0")}:${String(secs).padStart(2, "0")}`;
  if (days === 0) {
    return clock;
  }
  return `${days} day${days === 1 ? "" : "s"}, ${clock}`;
}

export function buildStatusReport(session: Session, now: number): StatusReport {
  const elapsedSeconds = session.startedAt === null
    ? 0
    : Math.max(0, Math.floor((now - session.startedAt) / 1000));

  return Object.freeze({
    ...session,
    elapsedSeconds,
    elapsed: formatDuration(elapsedSeconds),
    remaining: session.etaSeconds === null ? REMAINING_PLACEHOLDER : formatDuration(session.etaSeconds),
  });
}

/**
 * Human-readable status panel text.
 */
export function formatStatusText(report: StatusReport): string {
  if (report.status === "idle") {
    return "No active downloads";
  }

  const lines = [
    `Status: ${report.status.toUpperCase()}`,
    `Game ID: ${report.appId ?? ""}`,
    `Progress: ${report.percent.toFixed(1)}%`,
    `Size: ${report.bytesDone.toFixed(2)} MB / ${report.bytesTotal.toFixed(2)} MB`,
    `Elapsed Time: ${report.elapsed}`,
    `Remaining Time: ${report.remaining}`,
  ];

  if (report.status === "completed" && report.publishedLinks.length > 0) {
    lines.push("", "Download Complete! Public Links:");
    for (const link of report.publishedLinks) {
      lines.push(`- ${link.label}: ${link.url}`);
    }
  }

  return `${lines.join("\n")}\n`;
}
