/**
 * Telemetry and observability helpers
 */

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Format a metric line: `metric <key> k=v ...`
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ") + "\n";
}

/**
 * Emits metric lines to a writer when enabled
 */
export class Telemetry {
  constructor(
    private readonly enabled: boolean,
    private readonly write: (content: string) => void
  ) {}

  emitMetric(key: string, fields: Record<string, unknown>): void {
    if (!this.enabled) {
      return;
    }
    this.write(formatMetric(key, fields));
  }

  /**
   * Wrap an async function with timing metrics
   */
  async withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    let success = false;

    try {
      const result = await fn();
      success = true;
      return result;
    } finally {
      const duration = Date.now() - start;
      this.emitMetric(label, {
        duration_ms: duration,
        success,
      });
    }
  }
}
