/**
 * Data model shared by the stores, the engine and the adapters.
 */

/** Per-token metadata written by `setVocabulary`. */
export interface TokenMetadata {
  word: string;
  /** Signed polarity of the token. */
  sentiment: number;
  /** Bit set of {@link TokenFlag} values. */
  flags: number;
  category: number;
  secondaryCategory: number;
  /** Aggregation weight in [1, 10]. */
  weight: number;
  /** Multiplies `weight` during aggregation, in [1, 10]. */
  contextInfluence: number;
  /** Domain tag in [0, 10); 0 is "general". */
  domainRelevance: number;
  /** Vote this token casts for its domain during detection. */
  domainStrength: number;
  /** Times the token appeared in a classification input. */
  usageCount: number;
  /** Times the token was paired with another token in an input. */
  cooccurrenceCount: number;
}

/**
 * One bulk vocabulary write. Every array is parallel to `tokenIds`.
 */
export interface VocabularyBatch {
  tokenIds: readonly number[];
  words: readonly string[];
  sentiments: readonly number[];
  flags: readonly number[];
  categories: readonly number[];
  weights: readonly number[];
  domainRelevance: readonly number[];
  secondaryCategories: readonly number[];
  contextInfluence: readonly number[];
  /** Defaults to 1 for every entry when omitted. */
  domainStrengths?: readonly number[];
}

/** Adaptive state kept per caller. */
export interface UserContext {
  /** Unix seconds of the last classification. */
  lastInteraction: number;
  lastInputToken: number;
  /** Most recent first; 0 marks an empty slot. */
  topicBuffer: number[];
  classHistory: number[];
  totalInteractions: number;
  sentimentBias: number;
  primaryDomain: number;
}

/** Per-domain score modulation. */
export interface DomainModifier {
  /** Signed bias per class. */
  bias: number[];
  intensity: number;
}

/** Monotonic global counters. */
export interface GlobalStats {
  totalClassifications: number;
  /** Reserved for the feedback path; never incremented by the engine. */
  correctPredictions: number;
  classDistribution: number[];
}

export interface ClassificationResult {
  classId: number;
  confidence: number;
  domain: number;
}

/** Everything scoring computes, before anything is committed. */
export interface ScoreBreakdown extends ClassificationResult {
  scores: number[];
  totalSentiment: number;
}

/** Payload of the notification emitted after every committed classification. */
export interface ClassificationEvent extends ClassificationResult {
  caller: string;
  inputText: string;
  timestamp: number;
}

/** Payload of the notification emitted after every vocabulary write. */
export interface VocabularyUpdateEvent {
  count: number;
  trainer: string;
}
