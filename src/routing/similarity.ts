import { tokenize } from "../utils";

export type SimilarityFn = (a: string, b: string) => number;

// Jaccard overlap of lower-cased whitespace tokens.
export const wordOverlapSimilarity: SimilarityFn = (a, b) => {
  const wordsA = new Set(tokenize(a));
  const wordsB = new Set(tokenize(b));
  if (wordsA.size === 0 && wordsB.size === 0) {
    return 1;
  }
  let shared = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) {
      shared += 1;
    }
  }
  const union = wordsA.size + wordsB.size - shared;
  return union === 0 ? 0 : shared / union;
};
