/**
 * Keyword index: normalized word → fragment ids
 *
 * Invariants:
 * - Id lists keep append order (store order) and may repeat an id, once per
 *   occurrence of the word in the fragment
 * - The index only grows; re-storing a fragment leaves its old entries in place
 */

import { tokenize } from "./tokenize.js";
import { logger } from "./observability/logs.js";

/**
 * Index data structure: word → fragment ids
 */
export type KeywordData = Map<string, string[]>;

const EMPTY: readonly string[] = Object.freeze([]);

export class KeywordIndex {
  #entries: KeywordData = new Map();

  /**
   * Append `fragmentId` once for every keyword occurrence in text
   * @returns Number of keyword occurrences appended
   */
  index(fragmentId: string, text: string): number {
    const words = tokenize(text);
    for (const word of words) {
      let ids = this.#entries.get(word);
      if (!ids) {
        ids = [];
        this.#entries.set(word, ids);
      }
      ids.push(fragmentId);
    }

    logger.debug("index.update", {
      details: { fragmentId, occurrences: words.length, keywords: this.#entries.size },
    });
    return words.length;
  }

  /**
   * Fragment ids recorded for a normalized word, in store order
   */
  lookup(word: string): readonly string[] {
    return this.#entries.get(word) ?? EMPTY;
  }

  has(word: string): boolean {
    return this.#entries.has(word);
  }

  /**
   * Number of distinct indexed words
   */
  get size(): number {
    return this.#entries.size;
  }

  /**
   * Indexed words in first-seen order
   */
  keywords(): string[] {
    return [...this.#entries.keys()];
  }
}
