/**
 * Progress parser for SteamCMD output.
 *
 * Every output format assumption lives here. A line that matches nothing
 * is "no update", never an error.
 */

// ============================================================================
// Types
// ============================================================================

export type SizeUnit = "KB" | "MB" | "GB";

/**
 * Transfer metrics tracked for a session. Sizes are in megabytes.
 */
export interface ProgressMetrics {
  percent: number;
  bytesDone: number;
  bytesTotal: number;
  /** MB per second, cumulative average since the session started */
  rate: number;
  /** Whole seconds remaining, null until a positive rate is known */
  etaSeconds: number | null;
}

export const EMPTY_METRICS: Readonly<ProgressMetrics> = Object.freeze({
  percent: 0,
  bytesDone: 0,
  bytesTotal: 0,
  rate: 0,
  etaSeconds: null,
});

const PERCENT_PATTERN = /(\d+\.?\d*)%/;
const SIZE_PATTERN = /(\d+\.?\d*) (KB|MB|GB) \/ (\d+\.?\d*) (KB|MB|GB)/;

// ============================================================================
// Unit Conversion
// ============================================================================

export function toMegabytes(value: number, unit: SizeUnit): number {
  switch (unit) {
    case "KB":
      return value / 1024;
    case "GB":
      return value * 1024;
    case "MB":
      return value;
  }
}

export function fromMegabytes(value: number, unit: SizeUnit): number {
  switch (unit) {
    case "KB":
      return value * 1024;
    case "GB":
      return value / 1024;
    case "MB":
      return value;
  }
}

function isSizeUnit(value: string): value is SizeUnit {
  return value === "KB" || value === "MB" || value === "GB";
}

// ============================================================================
// Parser
// ============================================================================

/**
 * Extract a percentage such as "12.5%" from a line. Values above 100 are
 * not progress and are ignored.
 */
export function parsePercent(line: string): number | null {
  const match = PERCENT_PATTERN.exec(line);
  if (!match) return null;

  const percent = parseFloat(match[1]);
  return percent <= 100 ? percent : null;
}

/**
 * Extract a "<done> <unit> / <total> <unit>" expression, normalized to MB.
 */
export function parseSizes(line: string): { done: number; total: number } | null {
  const match = SIZE_PATTERN.exec(line);
  if (!match) return null;

  const [, doneText, doneUnit, totalText, totalUnit] = match;
  if (!isSizeUnit(doneUnit) || !isSizeUnit(totalUnit)) return null;

  return {
    done: toMegabytes(parseFloat(doneText), doneUnit),
    total: toMegabytes(parseFloat(totalText), totalUnit),
  };
}

/**
 * Apply one output line to the current metrics.
 *
 * Rate and ETA are only recomputed when the line carried sizes and the
 * session has a start time. Returns the input object when nothing matched.
 */
export function parseProgressLine(
  line: string,
  metrics: ProgressMetrics,
  startedAt: number | null,
  now: number,
): ProgressMetrics {
  const percent = parsePercent(line);
  const sizes = parseSizes(line);

  if (percent === null && sizes === null) {
    return metrics;
  }

  const next: ProgressMetrics = {
    percent: metrics.percent,
    bytesDone: metrics.bytesDone,
    bytesTotal: metrics.bytesTotal,
    rate: metrics.rate,
    etaSeconds: metrics.etaSeconds,
  };

  if (percent !== null) {
    next.percent = percent;
  }

  if (sizes !== null) {
    next.bytesDone = sizes.done;
    next.bytesTotal = sizes.total;

    if (startedAt !== null) {
      const elapsedSeconds = (now - startedAt) / 1000;
      if (elapsedSeconds > 0) {
        next.rate = sizes.done / elapsedSeconds;

        if (next.rate > 0) {
          next.etaSeconds = Math.max(0, Math.floor((sizes.total - sizes.done) / next.rate));
        }
      }
    }
  }

  return next;
}
