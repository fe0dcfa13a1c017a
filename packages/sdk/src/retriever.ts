/**
 * Keyword retrieval over a fragment store
 *
 * Scoring is additive term frequency: every occurrence of a fragment id under
 * a query keyword adds 1, and repeated query keywords count again. There is no
 * inverse-document-frequency weighting.
 */

import type { Ranking, RetrievalHit } from "./types.js";
import type { FragmentStore } from "./store.js";
import { tokenize } from "./tokenize.js";
import { validateNonNegativeInt } from "./validation.js";
import { DEFAULT_TOP_K } from "./config.js";
import { logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";

/** Separator placed between fragments in the returned context */
export const CONTEXT_SEPARATOR = "\n\n";

export class KeywordRetriever {
  #store: FragmentStore;

  constructor(store: FragmentStore) {
    this.#store = store;
  }

  /**
   * Rank fragments for a query
   *
   * Ties keep the order in which fragments first scored. With no scored
   * fragment at all, the first `topK` fragments in store order are returned
   * with score 0.
   *
   * @throws {InvalidOptionError} If topK is not a non-negative integer
   */
  rank(query: string, topK: number = DEFAULT_TOP_K): Ranking {
    validateNonNegativeInt(topK, "topK");

    const scores = new Map<string, number>();
    for (const word of tokenize(query)) {
      for (const id of this.#store.index.lookup(word)) {
        scores.set(id, (scores.get(id) ?? 0) + 1);
      }
    }

    if (scores.size === 0) {
      const hits = this.#store
        .ids()
        .slice(0, topK)
        .map((id): RetrievalHit => ({ id, score: 0 }));
      return { hits, fallback: true };
    }

    // Array.prototype.sort is stable, so equal scores keep first-seen order
    const hits = [...scores]
      .map(([id, score]): RetrievalHit => ({ id, score }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
    return { hits, fallback: false };
  }

  /**
   * Concatenated text of the top fragments, separated by a blank line
   * @throws {InvalidOptionError} If topK is not a non-negative integer
   */
  retrieve(query: string, topK: number = DEFAULT_TOP_K): string {
    const startTime = performance.now();
    const { hits, fallback } = this.rank(query, topK);

    const parts: string[] = [];
    for (const hit of hits) {
      const text = this.#store.text(hit.id);
      if (text !== undefined) {
        parts.push(text);
      }
    }

    const duration = performance.now() - startTime;
    metrics.recordRetrieval(duration, fallback);
    logger.info(fallback ? "retrieve.fallback" : "retrieve.scored", {
      details: { hits: parts.length, topK, durationMs: duration.toFixed(2) },
    });

    return parts.join(CONTEXT_SEPARATOR);
  }
}
