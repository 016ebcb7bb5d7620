import {
  CATEGORY_MATCH_BONUS,
  COOCCURRENCE_BONUS,
  DOMAIN_MATCH_BONUS,
  GENERAL_DOMAIN,
  OPPOSITE_POLARITY_PENALTY,
  SAME_POLARITY_BONUS,
  SECONDARY_CATEGORY_BONUS,
} from "../constants.js";
import { checkedAdd, checkedMul, scaledDot, truncDiv } from "../math/fixedPoint.js";
import type { CooccurrenceTracker } from "../store/CooccurrenceTracker.js";
import type { VocabularyStore } from "../store/VocabularyStore.js";

/** The read-only slice of the store the similarity score depends on. */
export interface SimilaritySource {
  vocabulary: VocabularyStore;
  cooccurrence: CooccurrenceTracker;
}

/**
 * Fixed-point similarity between two tokens.
 *
 * Embedding dot products (the context one halved, and only when
 * `includeContext` is set) plus bonuses for matching categories, a shared
 * non-general domain, joint appearances, and agreeing polarity. Opposing
 * polarity is penalized. Returns 0 when either id is outside the vocabulary.
 */
export function similarity(
  source: SimilaritySource,
  tokenA: number,
  tokenB: number,
  includeContext: boolean,
): number {
  const { vocabulary, cooccurrence } = source;
  if (!vocabulary.has(tokenA) || !vocabulary.has(tokenB)) {
    return 0;
  }

  let score = scaledDot(vocabulary.semanticOf(tokenA), vocabulary.semanticOf(tokenB));
  if (includeContext) {
    const contextDot = scaledDot(vocabulary.contextOf(tokenA), vocabulary.contextOf(tokenB));
    score = checkedAdd(score, truncDiv(contextDot, 2));
  }

  const a = vocabulary.peek(tokenA);
  const b = vocabulary.peek(tokenB);

  if (a.category === b.category) {
    score += CATEGORY_MATCH_BONUS;
  } else if (a.secondaryCategory === b.category || b.secondaryCategory === a.category) {
    score += SECONDARY_CATEGORY_BONUS;
  }

  if (a.domainRelevance !== GENERAL_DOMAIN && a.domainRelevance === b.domainRelevance) {
    score += DOMAIN_MATCH_BONUS;
  }

  score = checkedAdd(score, checkedMul(COOCCURRENCE_BONUS, cooccurrence.get(tokenA, tokenB)));

  if (a.sentiment !== 0 && b.sentiment !== 0) {
    score += Math.sign(a.sentiment) === Math.sign(b.sentiment)
      ? SAME_POLARITY_BONUS
      : OPPOSITE_POLARITY_PENALTY;
  }

  return score;
}
