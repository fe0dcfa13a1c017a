/**
 * Log capture for asserting on structured events
 */

import type { Logger, LogThreshold } from "@orbitrag/sdk";

export interface LogCapture {
  lines: string[];
  /** Lines whose event tag matches */
  events(event: string): string[];
  /** Put back the threshold and sink the logger had before capture */
  restore(): void;
}

/**
 * Route a logger into memory until restore() is called
 */
export function captureLogs(target: Logger, threshold: LogThreshold = "debug"): LogCapture {
  const previousThreshold = target.threshold;
  const previousSink = target.sink;
  const lines: string[] = [];
  target.setThreshold(threshold);
  target.setSink((line) => {
    lines.push(line);
  });

  return {
    lines,
    events: (event) => lines.filter((line) => line.includes(`[${event}]`)),
    restore: () => {
      target.setThreshold(previousThreshold);
      target.setSink(previousSink);
    },
  };
}
