/**
 * Download session state.
 *
 * A single record describes the current (or most recent) download. Every
 * update swaps in a new frozen object, so readers always see a whole
 * record and never a half-written pair of metrics.
 *
 * Output lines go to an append-only buffer; a record only holds the
 * buffer's length, and get() copies that many lines out when read.
 */

import { EMPTY_METRICS, type ProgressMetrics } from "./progress-parser.ts";

// ============================================================================
// Types
// ============================================================================

export type SessionStatus =
  | "idle"
  | "preparing"
  | "downloading"
  | "completed"
  | "error"
  | "cancelled";

export interface PublishedLink {
  label: string;
  url: string;
}

export interface Session extends ProgressMetrics {
  appId: string | null;
  status: SessionStatus;
  /** Epoch milliseconds, set when the session left idle */
  startedAt: number | null;
  log: readonly string[];
  publishedLinks: readonly PublishedLink[];
}

/**
 * Session as held by the store: the log is kept as a line count into the
 * store's buffer.
 */
export type SessionState = Omit<Session, "log"> & { logLength: number };

const TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  idle: [],
  preparing: ["downloading", "error", "cancelled"],
  downloading: ["completed", "error", "cancelled"],
  completed: [],
  error: [],
  cancelled: [],
};

// ============================================================================
// Pure Helpers
// ============================================================================

/**
 * Whether `from -> to` is allowed by transition(). `preparing` is only
 * reachable through reset().
 */
export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isActiveStatus(status: SessionStatus): boolean {
  return status === "preparing" || status === "downloading";
}

export function isTerminalStatus(status: SessionStatus): boolean {
  return status === "completed" || status === "error" || status === "cancelled";
}

/**
 * Resolve a Steam app id from a bare id or any string containing
 * `app/<digits>`, such as a store URL.
 */
export function resolveAppId(input: string): string | null {
  const trimmed = input.trim();
  if (/^\d+$/.test(trimmed)) {
    return trimmed;
  }

  const match = /app\/(\d+)/.exec(trimmed);
  return match ? match[1] : null;
}

export function createIdleSession(): Session {
  const session: Session = {
    ...EMPTY_METRICS,
    appId: null,
    status: "idle",
    startedAt: null,
    log: Object.freeze([]),
    publishedLinks: Object.freeze([]),
  };
  return Object.freeze(session);
}

// ============================================================================
// Session Store
// ============================================================================

/**
 * Create the session store. `clock` returns epoch milliseconds.
 */
export function createSessionStore(clock: () => number = Date.now) {
  const idle: SessionState = {
    ...EMPTY_METRICS,
    appId: null,
    status: "idle",
    startedAt: null,
    logLength: 0,
    publishedLinks: Object.freeze([]),
  };
  let current: SessionState = Object.freeze(idle);
  let lines: string[] = [];
  let snapshot: Session | null = null;

  function commit(next: SessionState): void {
    current = Object.freeze(next);
    snapshot = null;
  }

  /**
   * Current record. The object is frozen and never mutated afterwards;
   * repeated reads without an update in between return the same object.
   */
  function get(): Session {
    if (snapshot === null) {
      const { logLength, ...rest } = current;
      snapshot = Object.freeze({ ...rest, log: Object.freeze(lines.slice(0, logLength)) });
    }
    return snapshot;
  }

  /**
   * Current record without its log. Cheap to call once per output line.
   */
  function peek(): SessionState {
    return current;
  }

  /**
   * Replace the session wholesale for a new download.
   */
  function reset(appId: string): Session {
    lines = [];
    commit({
      ...EMPTY_METRICS,
      appId,
      status: "preparing",
      startedAt: clock(),
      logLength: 0,
      publishedLinks: Object.freeze([]),
    });
    return get();
  }

  /**
   * Move to another status. Returns false, changing nothing, when the
   * transition is not allowed from the current status.
   */
  function transition(to: SessionStatus): boolean {
    if (!canTransition(current.status, to)) {
      return false;
    }

    commit({
      ...current,
      status: to,
      percent: to === "completed" ? 100 : current.percent,
    });
    return true;
  }

  function applyMetrics(metrics: ProgressMetrics): void {
    if (
      metrics.percent === current.percent &&
      metrics.bytesDone === current.bytesDone &&
      metrics.bytesTotal === current.bytesTotal &&
      metrics.rate === current.rate &&
      metrics.etaSeconds === current.etaSeconds
    ) {
      return;
    }

    commit({
      ...current,
      percent: current.status === "completed" ? 100 : metrics.percent,
      bytesDone: metrics.bytesDone,
      bytesTotal: metrics.bytesTotal,
      rate: metrics.rate,
      etaSeconds: metrics.etaSeconds,
    });
  }

  function appendLog(line: string): void {
    lines.push(line);
    commit({
      ...current,
      logLength: lines.length,
    });
  }

  /**
   * Store public links. Ignored unless the session completed.
   */
  function publishLinks(links: readonly PublishedLink[]): boolean {
    if (current.status !== "completed") {
      return false;
    }

    commit({
      ...current,
      publishedLinks: Object.freeze(links.map((link) => ({ ...link }))),
    });
    return true;
  }

  return {
    get,
    peek,
    reset,
    transition,
    applyMetrics,
    appendLog,
    publishLinks,
  };
}

/**
 * Type for the session store instance.
 */
export type SessionStore = ReturnType<typeof createSessionStore>;
