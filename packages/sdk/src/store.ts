/**
 * Fragment store: encoded fragments, their keyword index and running stats
 */

import type {
  Fragment,
  FragmentStoreOptions,
  StoreFragmentResult,
  DocumentSummary,
  StoreStats,
  RandomSource,
} from "./types.js";
import { EncodableUnit } from "./unit.js";
import { KeywordIndex } from "./indexes.js";
import { contentHash, fragmentId } from "./hash.js";
import { codePointLength, splitWords } from "./tokenize.js";
import { slotCount } from "./state-bank.js";
import { defaultRandom } from "./random.js";
import { validateLevel, validatePositiveInt, validateTimeStep } from "./validation.js";
import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_FIELD_STRENGTH,
  DEFAULT_LEVEL,
  DEFAULT_TIME_STEP,
  INTEGRITY_LABEL,
} from "./config.js";
import { logger } from "./observability/logs.js";

interface StoredFragment extends Fragment {
  unit: EncodableUnit;
}

/**
 * Split text into consecutive groups of `chunkSize` words joined by single spaces
 * @throws {InvalidOptionError} If chunkSize is not a positive integer
 */
export function chunkWords(text: string, chunkSize: number = DEFAULT_CHUNK_SIZE): string[] {
  validatePositiveInt(chunkSize, "chunkSize");
  const words = splitWords(text);
  const chunks: string[] = [];
  for (let i = 0; i < words.length; i += chunkSize) {
    chunks.push(words.slice(i, i + chunkSize).join(" "));
  }
  return chunks;
}

/**
 * Declared ratio: text length over units × level²; 0 when nothing is stored
 */
export function compressionRatio(text: string, units: number, level: number): number {
  const compressedSize = units * level * level;
  return compressedSize > 0 ? codePointLength(text) / compressedSize : 0;
}

/**
 * In-memory fragment store
 *
 * Each fragment's text hash is encoded into its own unit, propagated once and
 * verified; the text is indexed in the same synchronous step, so the store and
 * the index never disagree about which fragments exist.
 *
 * @example
 * ```typescript
 * const store = new FragmentStore({ level: 15 });
 * const summary = store.storeDocument(text);
 * const context = new KeywordRetriever(store).retrieve("transformer attention");
 * ```
 */
export class FragmentStore {
  readonly level: number;
  readonly slotCount: number;
  readonly index = new KeywordIndex();
  #fragments = new Map<string, StoredFragment>();
  #fieldStrength: number;
  #timeStep: number;
  #random: RandomSource;
  #chunks = 0;
  #units = 0;

  /**
   * @throws {InvalidConfigurationError} If level is not a positive integer
   */
  constructor(options: FragmentStoreOptions = {}) {
    this.level = options.level ?? DEFAULT_LEVEL;
    validateLevel(this.level);
    this.slotCount = slotCount(this.level);
    this.#fieldStrength = options.fieldStrength ?? DEFAULT_FIELD_STRENGTH;
    this.#timeStep = options.timeStep ?? DEFAULT_TIME_STEP;
    validateTimeStep(this.#timeStep);
    this.#random = options.random ?? defaultRandom;
  }

  /**
   * Encode, verify and index one fragment
   *
   * An existing id is overwritten in place; its earlier index entries remain.
   */
  storeFragment(id: string, text: string): StoreFragmentResult {
    const unit = new EncodableUnit({
      level: this.level,
      fieldStrength: this.#fieldStrength,
      random: this.#random,
    });

    const hash = contentHash(text);
    unit.encode(hash % (1n << BigInt(unit.slotCount)));

    const original = unit.decode();
    unit.propagate(this.#timeStep);
    const integrity = unit.verify(original);

    const overwritten = this.#fragments.has(id);
    this.#fragments.set(id, {
      id,
      text,
      hash,
      integrity,
      encoded: original,
      slotCount: unit.slotCount,
      unit,
    });
    this.index.index(id, text);

    this.#chunks++;
    this.#units++;

    if (!integrity) {
      logger.error("store.integrity", { details: { id } });
    }
    logger.debug("store.fragment", {
      details: { id, overwritten, occupied: unit.occupiedCount() },
    });

    return { id, slotCount: unit.slotCount, integrity };
  }

  /**
   * Chunk a document by words and store every chunk under its content-derived id
   * @throws {InvalidOptionError} If chunkSize is not a positive integer
   */
  storeDocument(text: string, chunkSize: number = DEFAULT_CHUNK_SIZE): DocumentSummary {
    const ids: string[] = [];
    for (const chunk of chunkWords(text, chunkSize)) {
      const id = fragmentId(chunk);
      this.storeFragment(id, chunk);
      ids.push(id);
    }

    const summary: DocumentSummary = {
      chunks: ids.length,
      units: this.#units,
      compressionRatio: compressionRatio(text, this.#units, this.level),
      indexedKeywords: this.index.size,
      integrity: INTEGRITY_LABEL,
      ids,
    };

    logger.info("store.document", {
      details: {
        chunks: summary.chunks,
        units: summary.units,
        keywords: summary.indexedKeywords,
      },
    });
    return summary;
  }

  /**
   * Fragment by id, without its unit
   */
  get(id: string): Fragment | undefined {
    const stored = this.#fragments.get(id);
    if (!stored) return undefined;
    const { unit: _unit, ...fragment } = stored;
    return fragment;
  }

  /**
   * The unit backing a fragment
   */
  unit(id: string): EncodableUnit | undefined {
    return this.#fragments.get(id)?.unit;
  }

  has(id: string): boolean {
    return this.#fragments.has(id);
  }

  /**
   * Fragment ids in first-insertion order
   */
  ids(): string[] {
    return [...this.#fragments.keys()];
  }

  /**
   * Raw text of a fragment
   */
  text(id: string): string | undefined {
    return this.#fragments.get(id)?.text;
  }

  /**
   * Number of distinct fragment ids held
   */
  get size(): number {
    return this.#fragments.size;
  }

  stats(): StoreStats {
    return {
      chunks: this.#chunks,
      units: this.#units,
      indexedKeywords: this.index.size,
    };
  }
}
