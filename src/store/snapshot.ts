import { z } from "zod";
import {
  CLASS_COUNT,
  CLASS_HISTORY_MAX,
  COOCCURRENCE_MAX,
  DOMAIN_COUNT,
  GLOBAL_COUNTER_MAX,
  INTERACTION_MAX,
  MAX_VOCAB_SIZE,
  MAX_WEIGHT,
  TOKEN_COUNTER_MAX,
  TOPIC_SLOTS,
  USER_BIAS_LIMIT,
} from "../constants.js";
import {
  categorySchema,
  contextVectorSchema,
  domainBiasSchema,
  domainIdSchema,
  domainIntensitySchema,
  domainStrengthSchema,
  flagsSchema,
  semanticVectorSchema,
  sentimentSchema,
  tokenIdSchema,
} from "../validation.js";

const counter = (max: number) => z.number().int().min(0).max(max);

// Unwritten token slots hold zero weights, so weight fields accept 0 here.
const storedWeight = z.number().int().min(0).max(MAX_WEIGHT);

const tokenSchema = z.object({
  word: z.string(),
  sentiment: sentimentSchema,
  flags: flagsSchema,
  category: categorySchema,
  secondaryCategory: categorySchema,
  weight: storedWeight,
  contextInfluence: storedWeight,
  domainRelevance: domainIdSchema,
  domainStrength: domainStrengthSchema,
  usageCount: counter(TOKEN_COUNTER_MAX),
  cooccurrenceCount: counter(TOKEN_COUNTER_MAX),
});

const weightsSchema = z.object({
  semantic: semanticVectorSchema,
  context: contextVectorSchema,
});

const userContextSchema = z.object({
  lastInteraction: z.number().int().min(0),
  lastInputToken: tokenIdSchema,
  topicBuffer: z.array(tokenIdSchema).length(TOPIC_SLOTS),
  classHistory: z.array(counter(CLASS_HISTORY_MAX)).length(CLASS_COUNT),
  totalInteractions: counter(INTERACTION_MAX),
  sentimentBias: z.number().int().min(-USER_BIAS_LIMIT).max(USER_BIAS_LIMIT),
  primaryDomain: domainIdSchema,
});

/**
 * Full data model in plain JSON form, as handed to and from durable storage.
 */
export const classifierSnapshotSchema = z
  .object({
    vocabulary: z.object({
      vocabSize: z.number().int().min(0).max(MAX_VOCAB_SIZE),
      tokens: z.array(tokenSchema).max(MAX_VOCAB_SIZE),
      embeddings: z.array(weightsSchema.extend({ tokenId: tokenIdSchema })),
      wordIndex: z.array(z.tuple([z.string(), tokenIdSchema])),
      classWeights: z.array(weightsSchema).length(CLASS_COUNT),
    }),
    cooccurrence: z.array(z.tuple([tokenIdSchema, tokenIdSchema, counter(COOCCURRENCE_MAX)])),
    domains: z.array(z.object({ bias: domainBiasSchema, intensity: domainIntensitySchema })).length(DOMAIN_COUNT),
    users: z.array(z.tuple([z.string(), userContextSchema])),
    stats: z.object({
      totalClassifications: counter(GLOBAL_COUNTER_MAX),
      correctPredictions: counter(GLOBAL_COUNTER_MAX),
      classDistribution: z.array(counter(GLOBAL_COUNTER_MAX)).length(CLASS_COUNT),
    }),
  })
  .superRefine((snapshot, ctx) => {
    const { vocabSize, tokens } = snapshot.vocabulary;
    if (tokens.length !== vocabSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["vocabulary", "tokens"],
        message: `expected ${vocabSize} tokens, got ${tokens.length}`,
      });
    }
    snapshot.vocabulary.wordIndex.forEach(([word, id], i) => {
      if (id >= vocabSize || tokens[id]?.word !== word) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["vocabulary", "wordIndex", i],
          message: `"${word}" does not name token ${id}`,
        });
      }
    });
  });

export type ClassifierSnapshot = z.infer<typeof classifierSnapshotSchema>;
