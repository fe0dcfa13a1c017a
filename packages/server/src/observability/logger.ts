/**
 * Structured logging to stderr for MCP server observability
 * All logs go to stderr since stdout is reserved for MCP protocol
 */

import { parseLogThreshold, type LogLevel, type LogThreshold } from "@orbitrag/sdk";

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  tool?: string;
  duration_ms?: number;
  err_code?: string;
  err_message?: string;
  [key: string]: unknown;
}

export type LogWriter = (line: string) => void;

const LEVELS: LogThreshold[] = ["debug", "info", "warn", "error", "silent"];

export class Logger {
  #minLevel: LogThreshold;
  #write: LogWriter;

  constructor(
    minLevel: LogThreshold = "info",
    write: LogWriter = (line) => {
      process.stderr.write(`${line}\n`);
    }
  ) {
    this.#minLevel = minLevel;
    this.#write = write;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    // Always use stderr to avoid polluting stdout (MCP protocol channel)
    this.#write(JSON.stringify(logEvent));
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log("error", event, data);
  }

  // Helper for tool execution logging
  toolCall(tool: string, duration_ms: number, success: boolean, err?: Error): void {
    if (success) {
      this.info("tool.success", { tool, duration_ms });
    } else {
      this.error("tool.error", {
        tool,
        duration_ms,
        err_code: errorCode(err) ?? "UNKNOWN",
        err_message: err?.message ?? "unknown error",
      });
    }
  }
}

/**
 * String form of an error's `code` property, if it has one
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && err.code !== undefined && err.code !== null) {
    return String(err.code);
  }
  return undefined;
}

// Singleton logger instance
export const logger = new Logger(parseLogThreshold(process.env.ORBITRAG_LOG_LEVEL) ?? "info");
