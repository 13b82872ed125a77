/**
 * Diagnostic log sink.
 *
 * Components receive a sink instead of writing to a process-wide logger, so
 * tests and diagnostics overlays can capture their trace lines.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
  source: string | null;
}

export interface LogSink {
  log(level: LogLevel, message: string, source?: string): void;
}

/** Sink bound to one source tag, e.g. `[BLE]`. */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

export function scopedLog(sink: LogSink, source: string): Logger {
  return {
    debug: (message) => sink.log("debug", message, source),
    info: (message) => sink.log("info", message, source),
    warn: (message) => sink.log("warn", message, source),
    error: (message) => sink.log("error", message, source),
  };
}

/** `HH:MM:SS.mmm` in local time. */
export function formatTime(timestamp: number): string {
  const d = new Date(timestamp);
  const pad = (n: number, width = 2) => n.toString().padStart(width, "0");
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
}

export function formatEntry(entry: LogEntry): string {
  const prefix = entry.source ? `[${entry.source}] ` : "";
  return `${formatTime(entry.timestamp)} ${entry.level.toUpperCase()} ${prefix}${entry.message}`;
}

export class ConsoleLogSink implements LogSink {
  constructor(private readonly minLevel: LogLevel = "info") {}

  log(level: LogLevel, message: string, source?: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    const line = formatEntry({
      timestamp: Date.now(),
      level,
      message,
      source: source ?? null,
    });
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  }
}

/** Keeps the most recent entries in memory, oldest first. */
export class MemoryLogSink implements LogSink {
  private entries: LogEntry[] = [];

  constructor(private readonly maxEntries = 500) {}

  log(level: LogLevel, message: string, source?: string): void {
    this.entries.push({ timestamp: Date.now(), level, message, source: source ?? null });
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }
  }

  getEntries(): readonly LogEntry[] {
    return this.entries;
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((e) => level === undefined || e.level === level)
      .map((e) => e.message);
  }

  clear(): void {
    this.entries = [];
  }
}
