import { CLASS_COUNT, GLOBAL_COUNTER_MAX } from "../constants.js";
import { ValidationError } from "../errors.js";
import { saturatingIncrement, zeros } from "../math/fixedPoint.js";
import type { GlobalStats } from "../types.js";
import { CooccurrenceTracker } from "./CooccurrenceTracker.js";
import { DomainModel } from "./DomainModel.js";
import { UserContextStore } from "./UserContextStore.js";
import { VocabularyStore } from "./VocabularyStore.js";
import { classifierSnapshotSchema, type ClassifierSnapshot } from "./snapshot.js";

/**
 * The single owned state of one classifier: vocabulary, co-occurrence
 * counts, domain modifiers, per-caller contexts and global statistics.
 *
 * Handed to the classifier explicitly so embedders can share, persist or
 * clone it; nothing in the library keeps module-level state.
 */
export class ClassifierStore {
  readonly vocabulary = new VocabularyStore();
  readonly cooccurrence = new CooccurrenceTracker();
  readonly domains = new DomainModel();
  readonly users = new UserContextStore();
  private readonly stats: GlobalStats = {
    totalClassifications: 0,
    correctPredictions: 0,
    classDistribution: zeros(CLASS_COUNT),
  };

  getStats(): GlobalStats {
    return { ...this.stats, classDistribution: [...this.stats.classDistribution] };
  }

  recordClassification(classId: number): void {
    this.stats.totalClassifications = saturatingIncrement(
      this.stats.totalClassifications,
      GLOBAL_COUNTER_MAX,
    );
    this.stats.classDistribution[classId] = saturatingIncrement(
      this.stats.classDistribution[classId] ?? 0,
      GLOBAL_COUNTER_MAX,
    );
  }

  /** Plain JSON copy of the whole data model. */
  toSnapshot(): ClassifierSnapshot {
    return {
      vocabulary: this.vocabulary.dump(),
      cooccurrence: this.cooccurrence.entries(),
      domains: this.domains.dump(),
      users: this.users.dump(),
      stats: this.getStats(),
    };
  }

  /**
   * Rebuilds a store from a snapshot produced by {@link toSnapshot}.
   *
   * @throws {ValidationError} when `value` is not a well-formed snapshot.
   */
  static fromSnapshot(value: unknown): ClassifierStore {
    const parsed = classifierSnapshotSchema.safeParse(value);
    if (!parsed.success) {
      throw new ValidationError(
        "invalid-snapshot",
        parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      );
    }
    const snapshot = parsed.data;
    const store = new ClassifierStore();
    store.vocabulary.load(snapshot.vocabulary);
    store.cooccurrence.load(snapshot.cooccurrence);
    store.domains.load(snapshot.domains);
    store.users.load(snapshot.users);
    store.stats.totalClassifications = snapshot.stats.totalClassifications;
    store.stats.correctPredictions = snapshot.stats.correctPredictions;
    store.stats.classDistribution = [...snapshot.stats.classDistribution];
    return store;
  }

  /** Independent deep copy. */
  clone(): ClassifierStore {
    return ClassifierStore.fromSnapshot(this.toSnapshot());
  }
}
