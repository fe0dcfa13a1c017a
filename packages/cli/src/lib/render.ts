/**
 * Output rendering helpers
 */

import type { LoadResult, SessionStats } from "@orbitrag/sdk";

type Color = "red" | "green" | "yellow";

/**
 * Serialize JSON for stdout, one document per line
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function renderJson(data: unknown, options?: { raw?: boolean }): string {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  return `${json}\n`;
}

/**
 * One line per entry
 */
export function renderLines(lines: string[]): string {
  return lines.map((line) => `${line}\n`).join("");
}

export function describeLoad(result: LoadResult, source: string): string {
  return (
    `Loaded ${source}: ${result.chunks} chunks, ratio ${result.compressionRatio}, ` +
    `${result.indexedKeywords} keywords, integrity ${result.integrity}`
  );
}

export function describeStats(stats: SessionStats): string[] {
  return [
    `Chunks: ${stats.chunks}`,
    `Units: ${stats.units}`,
    `Indexed keywords: ${stats.indexedKeywords}`,
    `Level: ${stats.level}`,
    `States per unit: ${stats.statesPerUnit}`,
    `Integrity: ${stats.integrity}`,
  ];
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
