/**
 * Text generators for store and retrieval tests
 */

/**
 * `count` distinct words: "w0 w1 w2 ..." with the given prefix
 */
export function makeWords(count: number, prefix = "w"): string {
  const words: string[] = [];
  for (let i = 0; i < count; i++) {
    words.push(`${prefix}${i}`);
  }
  return words.join(" ");
}

/**
 * A document of exactly `chunks × chunkSize` words
 */
export function makeDocument(chunks: number, chunkSize: number, prefix = "w"): string {
  return makeWords(chunks * chunkSize, prefix);
}
