/**
 * In-process CLI testing utilities
 */

/**
 * Collected output of one program run
 */
export interface OutputCapture {
  write: (text: string) => void;
  /** Everything written so far */
  text(): string;
  clear(): void;
}

export function createOutputCapture(): OutputCapture {
  let buffer = "";
  return {
    write: (text) => {
      buffer += text;
    },
    text: () => buffer,
    clear: () => {
      buffer = "";
    },
  };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
