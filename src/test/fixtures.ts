/**
 * Shared builders for the test suites.
 */

import { CONTEXT_DIM, SEMANTIC_DIM } from "../constants.js";
import { SentimentClassifier } from "../engine/SentimentClassifier.js";
import { Logger } from "../logger.js";
import type { VocabularyBatch } from "../types.js";

export const T0 = 1_700_000_000;

export interface TokenSpec {
  id: number;
  word?: string;
  sentiment?: number;
  flags?: number;
  category?: number;
  secondaryCategory?: number;
  weight?: number;
  contextInfluence?: number;
  domainRelevance?: number;
  domainStrength?: number;
}

/** Builds a parallel-array batch; unspecified fields take neutral values. */
export function batchOf(specs: readonly TokenSpec[]): VocabularyBatch {
  return {
    tokenIds: specs.map((s) => s.id),
    words: specs.map((s) => s.word ?? `w${s.id}`),
    sentiments: specs.map((s) => s.sentiment ?? 0),
    flags: specs.map((s) => s.flags ?? 0),
    categories: specs.map((s) => s.category ?? 0),
    weights: specs.map((s) => s.weight ?? 1),
    domainRelevance: specs.map((s) => s.domainRelevance ?? 0),
    secondaryCategories: specs.map((s) => s.secondaryCategory ?? 0),
    contextInfluence: specs.map((s) => s.contextInfluence ?? 1),
    domainStrengths: specs.map((s) => s.domainStrength ?? 1),
  };
}

/** A vector of `length` zeros with the given leading components. */
export function vec(length: number, leading: readonly number[] = []): number[] {
  const v = new Array<number>(length).fill(0);
  leading.slice(0, length).forEach((x, i) => {
    v[i] = x;
  });
  return v;
}

export const semantic = (leading: readonly number[] = []) => vec(SEMANTIC_DIM, leading);
export const context = (leading: readonly number[] = []) => vec(CONTEXT_DIM, leading);

/** A logger that prints nothing below `error`. */
export const quietLogger = () => new Logger({ level: "error" });

/**
 * One token, "great" (id 0): sentiment +4, weight 8, general domain,
 * semantic dim 0 = 1000. Class 5 scores semantic dim 0 at 1000.
 */
export function singleTokenClassifier(clock: () => number = () => T0): SentimentClassifier {
  const classifier = new SentimentClassifier({ clock, logger: quietLogger() });
  classifier.setVocabulary("trainer", batchOf([{ id: 0, word: "great", sentiment: 4, weight: 8 }]));
  classifier.setTokenEmbedding("trainer", 0, semantic([1000]), context());
  classifier.setClassWeights("trainer", 5, semantic([1000]), context());
  return classifier;
}
