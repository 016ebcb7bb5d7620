/**
 * Fixed dimensions and tuning constants of the classifier.
 *
 * Everything here is part of the determinism contract: two engines that
 * disagree on any of these values will not reproduce each other's results.
 */

/** Fixed-point scale factor. An embedding component of 1000 represents 1.0. */
export const SCALE = 1000;

export const SEMANTIC_DIM = 24;
export const CONTEXT_DIM = 8;
export const CLASS_COUNT = 7;
export const DOMAIN_COUNT = 10;
export const CATEGORY_COUNT = 9;

export const MAX_VOCAB_SIZE = 1024;
export const MAX_INPUT_TOKENS = 16;
export const TOPIC_SLOTS = 3;

export const NEUTRAL_CLASS = 3;
export const GENERAL_DOMAIN = 0;

// Saturation caps
export const COOCCURRENCE_MAX = 65_535;
export const CLASS_HISTORY_MAX = 255;
export const INTERACTION_MAX = 65_535;
export const TOKEN_COUNTER_MAX = 4_294_967_295;
export const GLOBAL_COUNTER_MAX = Number.MAX_SAFE_INTEGER;

/** Seconds during which a caller's previous input still influences scoring. */
export const RECENCY_WINDOW_SECONDS = 3600;

// Similarity bonuses
export const CATEGORY_MATCH_BONUS = 150;
export const SECONDARY_CATEGORY_BONUS = 75;
export const DOMAIN_MATCH_BONUS = 100;
export const COOCCURRENCE_BONUS = 5;
export const SAME_POLARITY_BONUS = 50;
export const OPPOSITE_POLARITY_PENALTY = -30;

// Score composition
export const SENTIMENT_MULTIPLIER = 15;
export const RECENCY_DIVISOR = 10;
export const TOPIC_DIVISOR = 20;
export const DOMAIN_BIAS_MULTIPLIER = 10;
export const USER_BIAS_MULTIPLIER = 20;
export const HISTORY_MULTIPLIER = 5;
export const CONFIDENCE_BASE = 1000;

// Write bounds
export const MIN_WEIGHT = 1;
export const MAX_WEIGHT = 10;
export const SENTIMENT_LIMIT = 100;
export const FLAGS_MAX = 0xff;
export const DOMAIN_STRENGTH_MAX = 10;
export const DEFAULT_DOMAIN_STRENGTH = 1;
export const EMBEDDING_LIMIT = 10_000;
export const DOMAIN_BIAS_LIMIT = 100;
export const DOMAIN_INTENSITY_MAX = 100;
export const DEFAULT_DOMAIN_INTENSITY = 1;
export const USER_BIAS_LIMIT = 100;

export const CLASS_NAMES = [
  "very negative",
  "negative",
  "slightly negative",
  "neutral",
  "slightly positive",
  "positive",
  "very positive",
] as const;

export const DOMAIN_NAMES = [
  "general",
  "technology",
  "finance",
  "health",
  "sports",
  "entertainment",
  "politics",
  "education",
  "travel",
  "food",
] as const;

export const CATEGORY_NAMES = [
  "general",
  "emotion",
  "quality",
  "action",
  "intensity",
  "negation",
  "social",
  "temporal",
  "descriptive",
] as const;

/** Non-exclusive token flag bits. */
export const TokenFlag = {
  Positive: 1 << 0,
  Negative: 1 << 1,
  Emotional: 1 << 2,
  DomainSpecific: 1 << 3,
  Intense: 1 << 4,
  Ambiguous: 1 << 5,
  Sarcastic: 1 << 6,
  ContextDependent: 1 << 7,
} as const;

export type TokenFlag = (typeof TokenFlag)[keyof typeof TokenFlag];
