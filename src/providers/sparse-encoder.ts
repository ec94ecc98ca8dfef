import type { SparseVector } from "./types.js";

// Term ids live in a 2^31 space so they stay valid unsigned 32-bit Qdrant indices.
const TERM_ID_SPACE = 2 ** 31;

export const tokenize = (text: string): string[] =>
  text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .split(/\s+/)
    .filter((term) => term.length > 1);

/** FNV-1a over UTF-16 code units, folded into the term id space. */
export const hashTerm = (term: string): number => {
  let hash = 0x811c9dc5;
  for (let index = 0; index < term.length; index += 1) {
    hash ^= term.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0) % TERM_ID_SPACE;
};

/**
 * Encodes text as hashed, log-scaled term frequencies. Indices are sorted and
 * unique; colliding terms share one count.
 */
export const encodeSparse = (text: string): SparseVector => {
  const frequencies = new Map<number, number>();
  for (const term of tokenize(text)) {
    const termId = hashTerm(term);
    frequencies.set(termId, (frequencies.get(termId) ?? 0) + 1);
  }

  const sorted = [...frequencies.entries()].sort((left, right) => left[0] - right[0]);
  return {
    indices: sorted.map(([termId]) => termId),
    values: sorted.map(([, count]) => Math.log1p(count))
  };
};
