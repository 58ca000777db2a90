/**
 * Structured logging for store operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  namespace?: string;
  op?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Receives formatted log lines; defaults to the console
 */
export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

export class Logger {
  #enabled = true;
  #minLevel: LogLevel;
  #sink: LogSink;

  constructor(options: { minLevel?: LogLevel; sink?: LogSink } = {}) {
    this.#minLevel = options.minLevel ?? "info";
    this.#sink = options.sink ?? consoleSink;
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled || !this.#shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.namespace || entry.op) {
      parts.push(`${entry.namespace ?? ""}/${entry.op ?? ""}`);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    this.#sink(level, parts.join(" "));
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  #shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }
}

/**
 * Global logger instance
 * TIMEKV_DEBUG enables debug output
 */
export const logger = new Logger({
  minLevel: process.env.TIMEKV_DEBUG ? "debug" : "info",
});
