/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";

/**
 * Streams and file access used by commands; tests substitute their own
 */
export interface CliIO {
  stdout: (content: string) => void;
  stderr: (content: string) => void;
  readStdin: () => Promise<string>;
  isStdinTTY: () => boolean;
  readFile: (filePath: string) => Promise<string>;
}

/**
 * Read from stdin with size limit (default 10MB)
 * @param maxBytes - Maximum bytes to read (default 10MB)
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 10 * 1024 * 1024): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit during streaming
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * Read a UTF-8 text document, dropping a leading BOM
 */
export async function readTextFile(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath, "utf8");
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}

/**
 * Process-backed I/O
 */
export const processIO: CliIO = {
  stdout: (content) => {
    process.stdout.write(content);
  },
  stderr: (content) => {
    process.stderr.write(content);
  },
  readStdin: () => readStdin(),
  isStdinTTY,
  readFile: readTextFile,
};
