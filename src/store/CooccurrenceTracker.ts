import { COOCCURRENCE_MAX, MAX_VOCAB_SIZE } from "../constants.js";
import { saturatingIncrement } from "../math/fixedPoint.js";

/** `[tokenA, tokenB, count]` for one directed pair. */
export type CooccurrenceEntry = [number, number, number];

/**
 * Saturating counters over ordered token pairs.
 *
 * Stored sparsely; an absent pair reads as 0. Counters only grow.
 */
export class CooccurrenceTracker {
  private readonly counts = new Map<number, number>();

  private static key(a: number, b: number): number {
    return a * MAX_VOCAB_SIZE + b;
  }

  private static inRange(id: number): boolean {
    return Number.isInteger(id) && id >= 0 && id < MAX_VOCAB_SIZE;
  }

  /** Raw counter for `(a, b)`; 0 when either id is outside the id space. */
  get(a: number, b: number): number {
    if (!CooccurrenceTracker.inRange(a) || !CooccurrenceTracker.inRange(b)) {
      return 0;
    }
    return this.counts.get(CooccurrenceTracker.key(a, b)) ?? 0;
  }

  /** Bumps `(a, b)` and `(b, a)` by one each. */
  increment(a: number, b: number): void {
    this.bump(a, b);
    this.bump(b, a);
  }

  /**
   * Records every pair of input positions `i < j` whose ids differ.
   *
   * @param onPair called with both ids of each recorded pair
   */
  recordInput(tokens: readonly number[], onPair?: (a: number, b: number) => void): void {
    for (let i = 0; i < tokens.length; i++) {
      for (let j = i + 1; j < tokens.length; j++) {
        const a = tokens[i];
        const b = tokens[j];
        if (a === undefined || b === undefined || a === b) continue;
        this.increment(a, b);
        onPair?.(a, b);
      }
    }
  }

  entries(): CooccurrenceEntry[] {
    return [...this.counts.entries()].map(([key, count]): CooccurrenceEntry => [
      Math.floor(key / MAX_VOCAB_SIZE),
      key % MAX_VOCAB_SIZE,
      count,
    ]);
  }

  load(entries: readonly CooccurrenceEntry[]): void {
    this.counts.clear();
    entries.forEach(([a, b, count]) => {
      if (count > 0) this.counts.set(CooccurrenceTracker.key(a, b), count);
    });
  }

  private bump(a: number, b: number): void {
    const key = CooccurrenceTracker.key(a, b);
    this.counts.set(key, saturatingIncrement(this.counts.get(key) ?? 0, COOCCURRENCE_MAX));
  }
}
