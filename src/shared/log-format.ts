import type { LogLevel, LogMeta } from "../core/ports/logger.js";
import { bgRed, dim, gray, green, red, white, yellow } from "./ansi.js";

// ── Helpers ─────────────────────────────────────────────────────────────

const clock = (): string => {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, "0");
  const m = String(d.getMinutes()).padStart(2, "0");
  const s = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
};

const levelBadge = (level: LogLevel): string => {
  switch (level) {
    case "debug":
      return gray("DBG");
    case "info":
      return green("INF");
    case "warn":
      return yellow("WRN");
    case "error":
      return red("ERR");
    case "fatal":
      return bgRed("FTL");
  }
};

const formatValue = (v: unknown): string => {
  if (v instanceof Error) return v.message;
  if (typeof v === "object" && v !== null) return JSON.stringify(v);
  return String(v);
};

const formatMeta = (meta: LogMeta): string => {
  const entries = Object.entries(meta).filter(([, v]) => v !== undefined);
  if (entries.length === 0) return "";
  const parts = entries.map(([k, v]) => `${dim(k)}${dim("=")}${white(formatValue(v))}`);
  return ` ${parts.join(" ")}`;
};

/**
 * Format a structured log entry for a terminal.
 *
 *   INF 12:34:56.789 Login attempt  service=auth username=voter1
 */
export const formatLogEntry = (level: LogLevel, msg: string, meta: LogMeta): string => {
  const ts = dim(gray(clock()));
  const badge = levelBadge(level);
  const metaStr = formatMeta(meta);
  return `  ${badge} ${ts} ${white(msg)}${metaStr}\n`;
};

/**
 * Format a log entry as one JSON line (for log aggregators).
 */
export const formatJsonEntry = (level: LogLevel, msg: string, meta: LogMeta): string => {
  const entry: LogMeta = {
    level,
    msg,
    time: new Date().toISOString(),
    ...meta,
  };
  return `${JSON.stringify(entry)}\n`;
};
