/**
 * Core types for orbitrag
 */

/**
 * Source of uniform random numbers in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Quantum-number address of a slot
 */
export interface SlotAddress {
  /** Shell index, 1..level */
  n: number;
  /** 0..n-1 */
  l: number;
  /** -l..l */
  m: number;
}

/**
 * One addressable unit of encoded state
 *
 * `energy` and `phase` are decoration: only `occupied` carries the encoded bit.
 */
export interface Slot extends SlotAddress {
  occupied: boolean;
  /** -13.6 / n² */
  energy: number;
  /** Radians in [0, 2π) */
  phase: number;
}

/**
 * Options for constructing an encodable unit
 */
export interface UnitOptions {
  /** State bank level (default: 15) */
  level?: number;
  /** Scalar applied during propagation (default: 1.0) */
  fieldStrength?: number;
  /** Phase source for occupied slots (default: Math.random) */
  random?: RandomSource;
}

/**
 * A stored, indexed unit of source text
 */
export interface Fragment {
  id: string;
  /** Raw fragment text */
  text: string;
  /** Full MD5 digest of the text as a non-negative integer */
  hash: bigint;
  /** Result of verify() after the initial propagation step */
  integrity: boolean;
  /** Value captured from decode() before propagation */
  encoded: bigint;
  /** Slots in the fragment's unit */
  slotCount: number;
}

/**
 * Result of storing one fragment
 */
export interface StoreFragmentResult {
  id: string;
  slotCount: number;
  integrity: boolean;
}

/**
 * Aggregate result of storing a whole document
 */
export interface DocumentSummary {
  /** Fragments produced by this call */
  chunks: number;
  /** Running total of units held by the store */
  units: number;
  /** Declared ratio: text length / (units × level²); not a measured size */
  compressionRatio: number;
  /** Distinct words in the keyword index */
  indexedKeywords: number;
  integrity: string;
  /** Fragment ids in document order */
  ids: string[];
}

/**
 * Running counters kept alongside the store and index
 */
export interface StoreStats {
  chunks: number;
  units: number;
  indexedKeywords: number;
}

/**
 * Options for opening a fragment store
 */
export interface FragmentStoreOptions extends UnitOptions {
  /** Propagation step applied after encoding (default: 0.01) */
  timeStep?: number;
}

/**
 * A ranked fragment id
 */
export interface RetrievalHit {
  id: string;
  score: number;
}

/**
 * Ranking produced for a query
 */
export interface Ranking {
  hits: RetrievalHit[];
  /** True when no query token matched and store order was used */
  fallback: boolean;
}

/**
 * Settings for the remote completion endpoint
 */
export interface CompletionOptions {
  endpoint: string;
  /** Bearer credential; empty for local endpoints */
  apiKey: string;
  model: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Sampling temperature (default: 0.3) */
  temperature?: number;
  /** Token budget (default: 500) */
  maxTokens?: number;
}

/**
 * Options for a single question
 */
export interface AskOptions {
  /** Fragments placed in the prompt (default: 8) */
  topK?: number;
  /** Send the bare question without retrieval when false (default: true) */
  useMemory?: boolean;
}

/**
 * Result of init()
 */
export interface InitResult<S> {
  success: true;
  model: string;
  /** Slot count of the default level */
  declaredStateCount: number;
  session: S;
}

/**
 * Result of load()
 */
export interface LoadResult {
  success: true;
  chunks: number;
  /** Ratio with two decimals followed by "×" */
  compressionRatio: string;
  indexedKeywords: number;
  integrity: string;
}

/**
 * Result of stats()
 */
export interface SessionStats {
  chunks: number;
  units: number;
  indexedKeywords: number;
  level: number;
  statesPerUnit: number;
  integrity: string;
}

/**
 * Structured error returned by boundary operations
 */
export interface ErrorResult {
  error: string;
}
