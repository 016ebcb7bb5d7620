import { useSyncExternalStore } from "react";
import type {
  ClassifierStatsSnapshot,
  SentimentClassifier,
} from "../engine/SentimentClassifier.js";

/**
 * React hook that subscribes to a `SentimentClassifier` and returns its
 * current statistics snapshot.
 *
 * Built on `useSyncExternalStore`; the component re-renders after every
 * committed classification or vocabulary write.
 */
export const useClassifierStats = (classifier: SentimentClassifier): ClassifierStatsSnapshot => {
  return useSyncExternalStore(
    (listener) => classifier.subscribe(listener),
    () => classifier.getSnapshot(),
  );
};
