/**
 * sentiment-state-classifier
 *
 * A deterministic, fixed-point sentiment classifier over token ids that
 * adapts to each caller's interaction history.
 */

export * from "./constants.js";
export {
  checkedAdd,
  checkedMul,
  truncDiv,
  scaledDot,
  saturatingIncrement,
} from "./math/fixedPoint.js";
export {
  SentimentClassifier,
  type SentimentClassifierConfig,
  type ClassifierStatsSnapshot,
} from "./engine/SentimentClassifier.js";
export { similarity, type SimilaritySource } from "./engine/similarity.js";
export {
  aggregate,
  argmax,
  confidenceOf,
  scoreInput,
  validateInput,
  type Aggregate,
} from "./engine/scoring.js";
export { ClassifierStore } from "./store/ClassifierStore.js";
export { VocabularyStore, type ClassWeights } from "./store/VocabularyStore.js";
export { CooccurrenceTracker } from "./store/CooccurrenceTracker.js";
export { DomainModel } from "./store/DomainModel.js";
export { UserContextStore } from "./store/UserContextStore.js";
export { classifierSnapshotSchema, type ClassifierSnapshot } from "./store/snapshot.js";
export {
  ADMIN_ROLE,
  TRAINER_ROLE,
  InMemoryAccessControl,
  openAccess,
  type AccessControl,
} from "./access/AccessControl.js";
export { Logger, logger, type LogLevel, type LogListener } from "./logger.js";
export type * from "./types.js";
export {
  ClassifierError,
  ValidationError,
  PermissionError,
  SuspendedError,
  ArithmeticOverflowError,
  type ValidationConstraint,
} from "./errors.js";
