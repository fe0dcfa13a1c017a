/**
 * Random sources for slot phases
 */

import type { RandomSource } from "./types.js";

/**
 * Default source backed by Math.random
 */
export const defaultRandom: RandomSource = () => Math.random();

/**
 * Deterministic mulberry32 generator
 * @param seed - Any integer; only the low 32 bits are used
 */
export function seededRandom(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}
