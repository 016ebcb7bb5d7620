/**
 * The read-only half of a classification: domain detection, aggregation, per-class
 * scoring, modulation and the decision. Everything here reads the store and
 * returns values; nothing is written.
 */

import {
  CLASS_COUNT,
  CONFIDENCE_BASE,
  CONTEXT_DIM,
  MAX_INPUT_TOKENS,
  RECENCY_DIVISOR,
  RECENCY_WINDOW_SECONDS,
  SEMANTIC_DIM,
  SENTIMENT_MULTIPLIER,
  TOPIC_DIVISOR,
} from "../constants.js";
import { ValidationError } from "../errors.js";
import {
  accumulateScaled,
  checkedAdd,
  checkedMul,
  divideAll,
  scaledDot,
  truncDiv,
  zeros,
} from "../math/fixedPoint.js";
import type { ClassifierStore } from "../store/ClassifierStore.js";
import type { VocabularyStore } from "../store/VocabularyStore.js";
import type { ScoreBreakdown, UserContext } from "../types.js";
import { similarity } from "./similarity.js";

/** Weighted mean of the input's embeddings and sentiment. */
export interface Aggregate {
  semantic: number[];
  context: number[];
  sentiment: number;
  totalWeight: number;
}

/**
 * Checks the input before anything else runs.
 *
 * @throws {ValidationError} on empty or oversized input, an empty
 *   vocabulary, or an id outside the vocabulary.
 */
export function validateInput(tokens: readonly number[], vocabulary: VocabularyStore): void {
  if (tokens.length === 0) {
    throw new ValidationError("empty-input", ["at least one token is required"]);
  }
  if (tokens.length > MAX_INPUT_TOKENS) {
    throw new ValidationError("input-too-long", [
      `got ${tokens.length} tokens, limit is ${MAX_INPUT_TOKENS}`,
    ]);
  }
  if (vocabulary.size === 0) {
    throw new ValidationError("vocabulary-empty", ["vocabulary has not been initialized"]);
  }
  const invalid = tokens
    .map((token, position) => ({ token, position }))
    .filter(({ token }) => !vocabulary.has(token))
    .map(({ token, position }) => `token ${token} at position ${position} is not below ${vocabulary.size}`);
  if (invalid.length > 0) {
    throw new ValidationError("token-out-of-range", invalid);
  }
}

/**
 * Weight-scaled sums of every token's vectors and sentiment, divided by the
 * total weight. A token's weight is multiplied by its context influence
 * when that influence is non-zero.
 */
export function aggregate(tokens: readonly number[], vocabulary: VocabularyStore): Aggregate {
  const semantic = zeros(SEMANTIC_DIM);
  const context = zeros(CONTEXT_DIM);
  let sentiment = 0;
  let totalWeight = 0;

  for (const token of tokens) {
    const meta = vocabulary.peek(token);
    const weight = meta.contextInfluence !== 0
      ? checkedMul(meta.weight, meta.contextInfluence)
      : meta.weight;
    accumulateScaled(semantic, vocabulary.semanticOf(token), weight);
    accumulateScaled(context, vocabulary.contextOf(token), weight);
    sentiment = checkedAdd(sentiment, checkedMul(meta.sentiment, weight));
    totalWeight = checkedAdd(totalWeight, weight);
  }

  if (totalWeight === 0) {
    return { semantic, context, sentiment, totalWeight };
  }
  return {
    semantic: divideAll(semantic, totalWeight),
    context: divideAll(context, totalWeight),
    sentiment: truncDiv(sentiment, totalWeight),
    totalWeight,
  };
}

/**
 * Contribution of the caller's recent activity, identical for every class.
 *
 * The previous input counts while it is less than an hour old; each
 * non-empty topic slot counts against every input token.
 */
export function historyTerm(
  store: ClassifierStore,
  ctx: UserContext,
  tokens: readonly number[],
  now: number,
): number {
  let term = 0;
  const first = tokens[0] ?? 0;

  if (ctx.totalInteractions > 0 && now - ctx.lastInteraction < RECENCY_WINDOW_SECONDS) {
    term = checkedAdd(term, truncDiv(similarity(store, first, ctx.lastInputToken, true), RECENCY_DIVISOR));
  }

  for (const topic of ctx.topicBuffer) {
    if (topic === 0) continue;
    for (const token of tokens) {
      term = checkedAdd(term, truncDiv(similarity(store, token, topic, false), TOPIC_DIVISOR));
    }
  }
  return term;
}

/**
 * Index of the strictly greatest score; ties keep the lower index.
 */
export function argmax(scores: readonly number[]): number {
  let best = 0;
  for (let c = 1; c < scores.length; c++) {
    if ((scores[c] ?? 0) > (scores[best] ?? 0)) best = c;
  }
  return best;
}

/**
 * Shifts every score by `1000 − max` and returns the winner's share of the
 * shifted sum, times 1000. Scores far below the max shift negative, so the
 * result is not bounded to [0, 1000]; a non-positive sum yields 0.
 */
export function confidenceOf(scores: readonly number[], winner: number): number {
  const max = scores[winner] ?? 0;
  const shifted = scores.map((score) => checkedAdd(checkedAdd(score, -max), CONFIDENCE_BASE));
  const sum = shifted.reduce((acc, value) => checkedAdd(acc, value), 0);
  if (sum <= 0) {
    return 0;
  }
  return truncDiv(checkedMul(shifted[winner] ?? 0, CONFIDENCE_BASE), sum);
}

/**
 * Scores `tokens` against a read-only view of `store`. Input must already
 * have passed {@link validateInput}.
 */
export function scoreInput(
  store: ClassifierStore,
  ctx: UserContext,
  tokens: readonly number[],
  now: number,
): ScoreBreakdown {
  const { vocabulary, domains, users } = store;
  const domain = domains.detect(tokens, vocabulary);
  const agg = aggregate(tokens, vocabulary);
  const sentimentTerm = checkedMul(agg.sentiment, SENTIMENT_MULTIPLIER);
  const shared = historyTerm(store, ctx, tokens, now);

  const scores = Array.from({ length: CLASS_COUNT }, (_, c) => {
    const weights = vocabulary.classWeightsOf(c);
    let score = checkedAdd(scaledDot(agg.semantic, weights.semantic), scaledDot(agg.context, weights.context));
    score = checkedAdd(score, sentimentTerm);
    return checkedAdd(score, shared);
  });

  domains.apply(domain, scores);
  users.adapt(ctx, scores);

  const classId = argmax(scores);
  return {
    classId,
    confidence: confidenceOf(scores, classId),
    domain,
    scores,
    totalSentiment: agg.sentiment,
  };
}
