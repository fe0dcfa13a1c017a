/**
 * Boundary operations for drivers (CLI, MCP server, scripts)
 *
 * init() returns the session handle; load/ask/stats take it back explicitly
 * and degrade to an error result when it is missing.
 */

import type {
  DocumentSummary,
  ErrorResult,
  InitResult,
  LoadResult,
  SessionStats,
} from "./types.js";
import { Session, type SessionOptions } from "./session.js";
import { slotCount } from "./state-bank.js";
import { DEFAULT_LEVEL, DEFAULT_TOP_K } from "./config.js";
import { logger } from "./observability/logs.js";

export const NOT_INITIALIZED = "Not initialized. Call init() first.";

/**
 * Create a fresh, empty session for a completion endpoint
 *
 * `declaredStateCount` always describes the default level, whatever level the
 * session was opened with.
 * @throws {InvalidConfigurationError} If the level is not a positive integer
 */
export function init(options: SessionOptions): InitResult<Session> {
  const session = new Session(options);
  logger.info("session.init", {
    details: { model: session.model, level: session.store.level },
  });
  return {
    success: true,
    model: session.model,
    declaredStateCount: slotCount(DEFAULT_LEVEL),
    session,
  };
}

/**
 * Load a document with the default chunk size
 */
export function load(session: Session | undefined, text: string): LoadResult | ErrorResult {
  if (!session) {
    return { error: NOT_INITIALIZED };
  }
  return toLoadResult(session.load(text));
}

/**
 * Reduce a document summary to the reported load result
 */
export function toLoadResult(summary: DocumentSummary): LoadResult {
  return {
    success: true,
    chunks: summary.chunks,
    compressionRatio: formatRatio(summary.compressionRatio),
    indexedKeywords: summary.indexedKeywords,
    integrity: summary.integrity,
  };
}

/**
 * Ask a question against the loaded fragments
 */
export async function ask(
  session: Session | undefined,
  question: string,
  topK: number = DEFAULT_TOP_K
): Promise<string> {
  if (!session) {
    return `ERROR: ${NOT_INITIALIZED}`;
  }
  return session.ask(question, { topK });
}

export function stats(session: Session | undefined): SessionStats | ErrorResult {
  if (!session) {
    return { error: "Not initialized" };
  }
  return session.stats();
}

/**
 * Two decimals followed by the multiplication sign, e.g. "0.05×"
 */
export function formatRatio(ratio: number): string {
  return `${ratio.toFixed(2)}×`;
}

export function isErrorResult(value: object): value is ErrorResult {
  return "error" in value && typeof value.error === "string";
}
