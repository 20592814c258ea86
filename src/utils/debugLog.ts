/**
 * debugLog.ts
 *
 * Structured runtime logger for the materializer and its CLI.
 * - log(level, event, meta) with debug/info/warn/error helpers
 * - every entry is kept in an in-memory summary (getSummary/resetSummary) so
 *   tests and callers can inspect what a run reported
 * - timedAsync(event, meta, fn) records start/end/duration of async steps
 *
 * Gate: debug and info entries reach the console only when debugging is
 * enabled (setDebugEnabled(true) or S2DM_RDF_DEBUG=1|true). Warnings and
 * errors are always printed, to stderr.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  ts: string;
  level: LogLevel;
  event: string;
  meta: LogMeta;
}

export interface LogSummary {
  startedAt: string;
  logs: LogEntry[];
  counters: Record<string, number>;
}

const MAX_ENTRIES = 10000;

function nowIso() {
  return new Date().toISOString();
}

function envDebugFlag(): boolean {
  const raw = process.env.S2DM_RDF_DEBUG;
  return raw === "1" || raw === "true";
}

let debugEnabled = envDebugFlag();
let summary: LogSummary = { startedAt: nowIso(), logs: [], counters: {} };

export function setDebugEnabled(enabled: boolean) {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

function writeConsole(entry: LogEntry) {
  const tag = `[s2dm-rdf] ${entry.event}`;
  const hasMeta = Object.keys(entry.meta).length > 0;
  switch (entry.level) {
    case "error":
      if (hasMeta) console.error(tag, entry.meta);
      else console.error(tag);
      return;
    case "warn":
      if (hasMeta) console.warn(tag, entry.meta);
      else console.warn(tag);
      return;
    case "info":
    case "debug":
      if (!debugEnabled) return;
      if (hasMeta) console.error(tag, entry.meta);
      else console.error(tag);
  }
}

export function incr(counterName: string, n: number = 1) {
  summary.counters[counterName] = (summary.counters[counterName] ?? 0) + n;
}

export function log(level: LogLevel, eventName: string, meta?: LogMeta) {
  const entry: LogEntry = { ts: nowIso(), level, event: eventName, meta: meta ?? {} };
  summary.logs.push(entry);
  if (summary.logs.length > MAX_ENTRIES) summary.logs.shift();
  writeConsole(entry);
}

// convenience helpers
export function debug(event: string, meta?: LogMeta) { log("debug", event, meta); }
export function info(event: string, meta?: LogMeta) { log("info", event, meta); }
export function warn(event: string, meta?: LogMeta) { log("warn", event, meta); }
export function error(event: string, meta?: LogMeta) { log("error", event, meta); }

/**
 * timedAsync - run an async function, record start/end and duration in logs.
 * Failures are recorded as a debug-level `<event>.error` and rethrown
 * unchanged; reporting the error itself is left to the caller.
 */
export async function timedAsync<T>(eventName: string, meta: LogMeta | undefined, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  debug(`${eventName}.start`, { ...(meta ?? {}) });
  try {
    const res = await fn();
    debug(`${eventName}.end`, { durationMs: Date.now() - start, ...(meta ?? {}) });
    return res;
  } catch (err) {
    debug(`${eventName}.error`, {
      durationMs: Date.now() - start,
      error: err instanceof Error ? err.message : String(err),
      ...(meta ?? {}),
    });
    throw err;
  }
}

/**
 * getSummary - returns a copy of the current summary for external tooling
 */
export function getSummary(): LogSummary {
  return {
    startedAt: summary.startedAt,
    logs: summary.logs.map((entry) => ({ ...entry, meta: { ...entry.meta } })),
    counters: { ...summary.counters },
  };
}

export function resetSummary() {
  summary = { startedAt: nowIso(), logs: [], counters: {} };
}
