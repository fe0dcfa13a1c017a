/**
 * Keyword normalization shared by the index and the retriever
 */

/** Characters removed from both ends of every token */
export const STRIP_CHARACTERS = ".,!?;:\"'()[]{}";

/** Tokens must be longer than this (in code points) to be indexed */
export const MIN_KEYWORD_LENGTH = 3;

const STRIP_SET = new Set(STRIP_CHARACTERS);

/**
 * Split on any run of whitespace, dropping empty pieces
 */
export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Length in code points rather than UTF-16 units
 */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Remove strip characters from both ends of a token
 */
export function stripToken(token: string): string {
  let start = 0;
  let end = token.length;
  while (start < end && STRIP_SET.has(token.charAt(start))) start++;
  while (end > start && STRIP_SET.has(token.charAt(end - 1))) end--;
  return token.slice(start, end);
}

/**
 * Lowercase, split, strip, and keep tokens longer than three characters
 *
 * Repeated words are kept so callers can weight by term frequency.
 */
export function tokenize(text: string): string[] {
  const keywords: string[] = [];
  for (const word of splitWords(text.toLowerCase())) {
    const clean = stripToken(word);
    if (codePointLength(clean) > MIN_KEYWORD_LENGTH) {
      keywords.push(clean);
    }
  }
  return keywords;
}
