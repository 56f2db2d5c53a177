/**
 * Structured logging for index operations
 *
 * Everything goes to stderr: stdout belongs to the CLI's results.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  /** Index directory the event concerns */
  index?: string;
  url?: string;
  message?: string;
  details?: Record<string, unknown>;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

class Logger {
  #enabled = true;
  #minLevel: LogLevel = "info";

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;
    if (level === "debug" && !process.env.TOPICSEARCH_DEBUG) return;
    if (level !== "debug" && LEVELS.indexOf(level) < LEVELS.indexOf(this.#minLevel)) return;

    const entry: LogEntry = {
      ...data,
      timestamp: new Date().toISOString(),
      level,
      event,
    };

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.index) {
      parts.push(entry.index);
    }

    if (entry.url) {
      parts.push(entry.url);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    const line = parts.join(" ");
    if (level === "warn") {
      console.warn(line);
    } else {
      console.error(line);
    }
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

  /**
   * Drop info/warn/error entries below this level (debug is governed by TOPICSEARCH_DEBUG)
   */
  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
