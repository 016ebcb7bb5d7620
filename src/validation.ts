/**
 * zod schemas for every value the classifier accepts from outside.
 *
 * Schemas check shape and numeric ranges; cross-field rules (parallel array
 * lengths, batch size) are checked separately so the resulting
 * {@link ValidationError} names the constraint that failed.
 */

import { z } from "zod";
import {
  CATEGORY_COUNT,
  CLASS_COUNT,
  CONTEXT_DIM,
  DOMAIN_BIAS_LIMIT,
  DOMAIN_COUNT,
  DOMAIN_INTENSITY_MAX,
  DOMAIN_STRENGTH_MAX,
  EMBEDDING_LIMIT,
  FLAGS_MAX,
  MAX_VOCAB_SIZE,
  MAX_WEIGHT,
  MIN_WEIGHT,
  SEMANTIC_DIM,
  SENTIMENT_LIMIT,
} from "./constants.js";
import { ValidationError, type ValidationConstraint } from "./errors.js";
import type { VocabularyBatch } from "./types.js";

const int = z.number().int();

export const tokenIdSchema = int.min(0).max(MAX_VOCAB_SIZE - 1);
export const classIdSchema = int.min(0).max(CLASS_COUNT - 1);
export const domainIdSchema = int.min(0).max(DOMAIN_COUNT - 1);
export const categorySchema = int.min(0).max(CATEGORY_COUNT - 1);
export const sentimentSchema = int.min(-SENTIMENT_LIMIT).max(SENTIMENT_LIMIT);
export const flagsSchema = int.min(0).max(FLAGS_MAX);
export const weightSchema = int.min(MIN_WEIGHT).max(MAX_WEIGHT);
export const domainStrengthSchema = int.min(0).max(DOMAIN_STRENGTH_MAX);

const component = int.min(-EMBEDDING_LIMIT).max(EMBEDDING_LIMIT);
export const semanticVectorSchema = z.array(component).length(SEMANTIC_DIM);
export const contextVectorSchema = z.array(component).length(CONTEXT_DIM);

export const domainBiasSchema = z
  .array(int.min(-DOMAIN_BIAS_LIMIT).max(DOMAIN_BIAS_LIMIT))
  .length(CLASS_COUNT);
export const domainIntensitySchema = int.min(0).max(DOMAIN_INTENSITY_MAX);

export const vocabularyBatchSchema = z.object({
  tokenIds: z.array(tokenIdSchema),
  words: z.array(z.string()),
  sentiments: z.array(sentimentSchema),
  flags: z.array(flagsSchema),
  categories: z.array(categorySchema),
  weights: z.array(weightSchema),
  domainRelevance: z.array(domainIdSchema),
  secondaryCategories: z.array(categorySchema),
  contextInfluence: z.array(weightSchema),
  domainStrengths: z.array(domainStrengthSchema).optional(),
});

/**
 * Parses `value` with `schema`, converting a zod failure into a
 * {@link ValidationError} that lists every issue with its path.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  constraint: ValidationConstraint = "value-out-of-range",
): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(
      constraint,
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    );
  }
  return parsed.data;
}

/**
 * Validates a whole vocabulary batch. Nothing is written unless this returns.
 */
export function validateVocabularyBatch(batch: VocabularyBatch): VocabularyBatch {
  const expected = batch.tokenIds.length;
  const lengths: Record<string, number | undefined> = {
    words: batch.words.length,
    sentiments: batch.sentiments.length,
    flags: batch.flags.length,
    categories: batch.categories.length,
    weights: batch.weights.length,
    domainRelevance: batch.domainRelevance.length,
    secondaryCategories: batch.secondaryCategories.length,
    contextInfluence: batch.contextInfluence.length,
    domainStrengths: batch.domainStrengths?.length,
  };
  const mismatched = Object.entries(lengths)
    .filter(([, len]) => len !== undefined && len !== expected)
    .map(([field, len]) => `${field} has ${len} entries, expected ${expected}`);
  if (mismatched.length > 0) {
    throw new ValidationError("length-mismatch", mismatched);
  }
  if (expected > MAX_VOCAB_SIZE) {
    throw new ValidationError("batch-too-large", [
      `batch has ${expected} entries, limit is ${MAX_VOCAB_SIZE}`,
    ]);
  }
  return parseOrThrow(vocabularyBatchSchema, batch);
}
