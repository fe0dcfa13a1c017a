/**
 * Structured logging for store, retrieval and completion events
 *
 * Everything goes to stderr: stdout belongs to CLI output and protocol frames.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogThreshold = LogLevel | "silent";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  message?: string;
  details?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogThreshold(value: string): value is LogThreshold {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Parse a threshold name, ignoring case and surrounding whitespace
 */
export function parseLogThreshold(raw: string | undefined): LogThreshold | undefined {
  if (!raw) return undefined;
  const lowered = raw.trim().toLowerCase();
  return isLogThreshold(lowered) ? lowered : undefined;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export class Logger {
  #threshold: LogThreshold;
  #sink: LogSink;

  constructor(threshold: LogThreshold = "warn", sink: LogSink = stderrSink) {
    this.#threshold = threshold;
    this.#sink = sink;
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.#threshold]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    this.#sink(parts.join(" "));
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

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.#threshold];
  }

  get threshold(): LogThreshold {
    return this.#threshold;
  }

  get sink(): LogSink {
    return this.#sink;
  }

  setThreshold(threshold: LogThreshold): void {
    this.#threshold = threshold;
  }

  setSink(sink: LogSink): void {
    this.#sink = sink;
  }
}

/**
 * Global logger instance (ORBITRAG_LOG_LEVEL, default "warn")
 */
export const logger = new Logger(parseLogThreshold(process.env.ORBITRAG_LOG_LEVEL) ?? "warn");
