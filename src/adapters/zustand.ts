import type { StateCreator } from "zustand";
import type { SentimentClassifier } from "../engine/SentimentClassifier.js";
import { logger } from "../logger.js";
import type { ClassificationResult } from "../types.js";

/** One classification request derived from a state transition. */
export interface ClassificationRequest {
  caller: string;
  tokens: readonly number[];
}

/**
 * Maps a Zustand state transition to a classification request.
 * Return `null` to skip the update (noise filtering).
 */
export type ClassificationMapper<T> = (
  state: T,
  previousState: T,
) => ClassificationRequest | null | undefined;

/**
 * Zustand middleware that classifies the token ids a state change produces.
 *
 * The `set` call runs first and is never rolled back; classification
 * happens synchronously right after it. A rejected request never reaches
 * `onResult`.
 *
 * @param onResult Receives each committed result with its request.
 * @param onError  Receives errors thrown by the classifier.
 *                 Defaults to logging them through the library logger.
 */
export const sentimentMiddleware =
  <T>(
    classifier: SentimentClassifier,
    mapper: ClassificationMapper<T>,
    config: StateCreator<T>,
    onResult?: (result: ClassificationResult, request: ClassificationRequest) => void,
    onError: (error: unknown) => void = (error) => logger.error("Classification failed", error),
  ): StateCreator<T> =>
  (set, get, api) =>
    config(
      (partial: T | Partial<T> | ((state: T) => T | Partial<T>), replace?: boolean) => {
        const prevState = get();
        // Let Zustand perform the normal synchronous update first.
        // eslint-disable-next-line @typescript-eslint/no-explicit-any
        set(partial as any, replace as any);
        const nextState = get();

        const request = mapper(nextState, prevState);
        if (!request) {
          return;
        }

        let result: ClassificationResult;
        try {
          result = classifier.classifySentiment(request.caller, request.tokens);
        } catch (error) {
          onError(error);
          return;
        }
        onResult?.(result, request);
      },
      get,
      api,
    );
