/**
 * Word tokenizer for the inverted index
 */

// Anything that is not alphabetic, numeric, "_" or "-" separates words
const WORD_SEPARATOR = /[^\p{Alphabetic}\p{N}_-]+/u;

/** Shortest indexed word, in UTF-8 bytes */
export const MIN_WORD_LENGTH = 2;

/**
 * Split text into lower-cased words of at least MIN_WORD_LENGTH bytes
 *
 * A single ASCII character is dropped; a single non-ASCII letter such as "é"
 * or "剑" is kept.
 * @param text - Text to split
 * @param into - Optional set to collect into (deduplicates across calls)
 * @returns The set of words
 */
export function tokenize(text: string, into: Set<string> = new Set()): Set<string> {
  for (const part of text.split(WORD_SEPARATOR)) {
    if (part.length === 0) continue;

    const word = part.toLowerCase();
    if (Buffer.byteLength(word, "utf8") < MIN_WORD_LENGTH) continue;

    into.add(word);
  }
  return into;
}
