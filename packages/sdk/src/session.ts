/**
 * Session: one fragment store, its retriever and a completion client
 *
 * A session is created by init() and handed back to the caller, who threads it
 * through later calls. Nothing is shared between sessions.
 */

import type { AskOptions, DocumentSummary, FragmentStoreOptions, SessionStats } from "./types.js";
import { FragmentStore } from "./store.js";
import { KeywordRetriever } from "./retriever.js";
import { CompletionClient, type CompletionClientOptions } from "./completion/client.js";
import { describeError } from "./errors.js";
import { DEFAULT_CHUNK_SIZE, DEFAULT_TOP_K, INTEGRITY_LABEL } from "./config.js";
import { logger } from "./observability/logs.js";

export interface SessionOptions extends CompletionClientOptions, FragmentStoreOptions {}

/** Prefix of every answer produced from a failed completion call */
export const COMPLETION_ERROR_PREFIX = "ERROR calling LLM: ";

/**
 * Prompt sent to the completion endpoint when retrieval is used
 */
export function buildPrompt(question: string, context: string): string {
  return `Context:\n${context}\n\nQuestion: ${question}\n\nAnswer based on the context above:`;
}

export class Session {
  readonly store: FragmentStore;
  readonly retriever: KeywordRetriever;
  readonly client: CompletionClient;

  /**
   * @throws {InvalidConfigurationError} If the level is not a positive integer
   * @throws {InvalidOptionError} If a completion option is out of range
   */
  constructor(options: SessionOptions) {
    this.store = new FragmentStore(options);
    this.retriever = new KeywordRetriever(this.store);
    this.client = new CompletionClient(options);
  }

  get model(): string {
    return this.client.model;
  }

  /**
   * Chunk, encode and index a document
   */
  load(text: string, chunkSize: number = DEFAULT_CHUNK_SIZE): DocumentSummary {
    return this.store.storeDocument(text, chunkSize);
  }

  /**
   * Retrieved context for a query, without calling the endpoint
   */
  search(query: string, topK: number = DEFAULT_TOP_K): string {
    return this.retriever.retrieve(query, topK);
  }

  /**
   * Answer a question, augmenting it with retrieved context
   *
   * Transport and response failures are returned as an answer starting with
   * "ERROR calling LLM: " instead of being thrown.
   *
   * @throws {InvalidOptionError} If topK is not a non-negative integer
   */
  async ask(question: string, options: AskOptions = {}): Promise<string> {
    const useMemory = options.useMemory ?? true;
    const prompt = useMemory
      ? buildPrompt(question, this.retriever.retrieve(question, options.topK ?? DEFAULT_TOP_K))
      : question;

    try {
      return await this.client.answer(prompt);
    } catch (err) {
      const detail = describeError(err);
      logger.warn("session.ask.failed", { message: detail });
      return `${COMPLETION_ERROR_PREFIX}${detail}`;
    }
  }

  stats(): SessionStats {
    const { chunks, units, indexedKeywords } = this.store.stats();
    return {
      chunks,
      units,
      indexedKeywords,
      level: this.store.level,
      statesPerUnit: this.store.slotCount,
      integrity: INTEGRITY_LABEL,
    };
  }
}
