import { openAccess, TRAINER_ROLE, type AccessControl } from "../access/AccessControl.js";
import { CLASS_COUNT } from "../constants.js";
import { ClassifierError, PermissionError, SuspendedError } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { ClassifierStore } from "../store/ClassifierStore.js";
import type {
  ClassificationEvent,
  ClassificationResult,
  GlobalStats,
  TokenMetadata,
  UserContext,
  VocabularyBatch,
  VocabularyUpdateEvent,
} from "../types.js";
import { scoreInput, validateInput } from "./scoring.js";
import { similarity } from "./similarity.js";

/**
 * Configuration for the SentimentClassifier.
 */
export interface SentimentClassifierConfig {
  /** State to operate on. A fresh, empty store is created when omitted. */
  store?: ClassifierStore;

  /**
   * Pause switch and role table consulted by the guarded entry points.
   * @default openAccess
   */
  access?: AccessControl;

  /**
   * Current time in unix seconds. Inject a fixed clock to replay a log.
   * @default () => Math.floor(Date.now() / 1000)
   */
  clock?: () => number;

  /** @default the shared library logger */
  logger?: Logger;

  /**
   * Optional callback invoked after every committed classification, once
   * listeners have been notified.
   */
  onClassified?: (event: ClassificationEvent) => void;

  /** Optional callback invoked after every accepted vocabulary write. */
  onVocabularyUpdated?: (event: VocabularyUpdateEvent) => void;
}

/**
 * A point-in-time view of the classifier's global statistics.
 */
export interface ClassifierStatsSnapshot {
  vocabSize: number;
  totalClassifications: number;
  classDistribution: number[];
  /** The most recent committed classification, if any. */
  lastClassification: ClassificationEvent | null;
}

/**
 * SentimentClassifier is the entry point to the fixed-point engine.
 *
 * Every public operation is synchronous and validates its whole input before
 * touching the store, so a rejected call leaves the state exactly as it was
 * and accepted calls commit as one unit. Given the same store contents, the
 * same clock reading and the same input, it returns the same result.
 */
export class SentimentClassifier {
  readonly store: ClassifierStore;
  private readonly access: AccessControl;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private readonly onClassified?: (event: ClassificationEvent) => void;
  private readonly onVocabularyUpdated?: (event: VocabularyUpdateEvent) => void;

  private readonly listeners = new Set<() => void>();
  private lastClassification: ClassificationEvent | null = null;
  private cachedSnapshot: ClassifierStatsSnapshot | null = null;

  constructor(config: SentimentClassifierConfig = {}) {
    this.store = config.store ?? new ClassifierStore();
    this.access = config.access ?? openAccess;
    this.clock = config.clock ?? (() => Math.floor(Date.now() / 1000));
    this.logger = (config.logger ?? defaultLogger).child("engine");
    this.onClassified = config.onClassified;
    this.onVocabularyUpdated = config.onVocabularyUpdated;
  }

  /**
   * Classifies 1–16 token ids on behalf of `caller` and commits the result
   * into the caller's context and the global statistics.
   *
   * @throws {SuspendedError} while paused.
   * @throws {ValidationError} on empty or oversized input, an empty
   *   vocabulary, or an unknown token id.
   */
  classifySentiment(caller: string, tokens: readonly number[]): ClassificationResult {
    this.guard("classifySentiment");
    const input = [...tokens];
    this.runValidated("classifySentiment", () => validateInput(input, this.store.vocabulary));

    const now = this.clock();
    const { vocabulary, cooccurrence, users } = this.store;

    input.forEach((token) => vocabulary.recordUsage(token));
    cooccurrence.recordInput(input, (a, b) => {
      vocabulary.recordPairing(a);
      vocabulary.recordPairing(b);
    });
    const inputText = input.map((token) => vocabulary.peek(token).word).join(" ");

    const { classId, confidence, domain } = scoreInput(this.store, users.get(caller), input, now);

    users.record(caller, { timestamp: now, firstToken: input[0] ?? 0, classId, domain });
    this.store.recordClassification(classId);

    const event: ClassificationEvent = { caller, classId, confidence, inputText, domain, timestamp: now };
    this.lastClassification = event;
    this.logger.debug("Classified input", event);
    this.notify();
    this.onClassified?.(event);

    return { classId, confidence, domain };
  }

  /**
   * Bulk-writes vocabulary metadata. The whole batch is validated first.
   *
   * @throws {PermissionError} unless `trainer` holds the trainer role.
   */
  setVocabulary(trainer: string, batch: VocabularyBatch): void {
    this.guard("setVocabulary", trainer);
    const count = this.runValidated("setVocabulary", () => this.store.vocabulary.setVocabulary(batch));
    const event: VocabularyUpdateEvent = { count, trainer };
    this.logger.info("Vocabulary updated", event);
    this.notify();
    this.onVocabularyUpdated?.(event);
  }

  setTokenEmbedding(
    trainer: string,
    tokenId: number,
    semantic: readonly number[],
    context: readonly number[],
  ): void {
    this.guard("setTokenEmbedding", trainer);
    this.runValidated("setTokenEmbedding", () =>
      this.store.vocabulary.setTokenEmbedding(tokenId, semantic, context),
    );
    this.logger.info("Token embedding updated", { trainer, tokenId });
  }

  setClassWeights(
    trainer: string,
    classId: number,
    semantic: readonly number[],
    context: readonly number[],
  ): void {
    this.guard("setClassWeights", trainer);
    this.runValidated("setClassWeights", () =>
      this.store.vocabulary.setClassWeights(classId, semantic, context),
    );
    this.logger.info("Class weights updated", { trainer, classId });
  }

  setDomainModifier(trainer: string, domain: number, bias: readonly number[], intensity: number): void {
    this.guard("setDomainModifier", trainer);
    this.runValidated("setDomainModifier", () =>
      this.store.domains.setModifier(domain, bias, intensity),
    );
    this.logger.info("Domain modifier updated", { trainer, domain, intensity });
  }

  // ─── Read-only accessors ────────────────────────────────────────────────

  similarity(tokenA: number, tokenB: number, includeContext: boolean): number {
    return similarity(this.store, tokenA, tokenB, includeContext);
  }

  getCooccurrence(tokenA: number, tokenB: number): number {
    return this.store.cooccurrence.get(tokenA, tokenB);
  }

  getWord(tokenId: number): string | undefined {
    return this.store.vocabulary.getWord(tokenId);
  }

  getTokenId(word: string): number | undefined {
    return this.store.vocabulary.getTokenId(word);
  }

  getTokenMetadata(tokenId: number): TokenMetadata | undefined {
    return this.store.vocabulary.getMetadata(tokenId);
  }

  getVocabSize(): number {
    return this.store.vocabulary.size;
  }

  getPhraseCount(): number {
    return this.store.vocabulary.phraseCount;
  }

  getTotalClassifications(): number {
    return this.store.getStats().totalClassifications;
  }

  getCorrectPredictions(): number {
    return this.store.getStats().correctPredictions;
  }

  getClassDistribution(classId: number): number {
    if (!Number.isInteger(classId) || classId < 0 || classId >= CLASS_COUNT) {
      return 0;
    }
    return this.store.getStats().classDistribution[classId] ?? 0;
  }

  getStats(): GlobalStats {
    return this.store.getStats();
  }

  getUserContext(caller: string): UserContext {
    return this.store.users.get(caller);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────────

  /**
   * Subscribes to committed state changes. Returns an unsubscribe function.
   *
   * Listeners run synchronously after the store has been written. An
   * exception thrown by a listener propagates to the caller of the
   * mutating operation, but the commit stands: the statistics, user context
   * and counters already reflect the call, and `onClassified` is skipped
   * for that call.
   */
  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Returns the current statistics. The same object is returned until the
   * next committed change, so it is safe for `useSyncExternalStore`.
   */
  getSnapshot(): ClassifierStatsSnapshot {
    if (this.cachedSnapshot === null) {
      const stats = this.store.getStats();
      this.cachedSnapshot = {
        vocabSize: this.store.vocabulary.size,
        totalClassifications: stats.totalClassifications,
        classDistribution: stats.classDistribution,
        lastClassification: this.lastClassification,
      };
    }
    return this.cachedSnapshot;
  }

  private notify(): void {
    this.cachedSnapshot = null;
    this.listeners.forEach((l) => l());
  }

  private guard(operation: string, trainer?: string): void {
    if (this.access.isPaused()) {
      this.logger.warn(`Rejected ${operation}: paused`);
      throw new SuspendedError(operation);
    }
    if (trainer !== undefined && !this.access.hasRole(TRAINER_ROLE, trainer)) {
      this.logger.warn(`Rejected ${operation}: missing role`, { trainer });
      throw new PermissionError(TRAINER_ROLE, trainer);
    }
  }

  private runValidated<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof ClassifierError) {
        this.logger.warn(`Rejected ${operation}: ${err.message}`);
      }
      throw err;
    }
  }
}
