import { describe, it, expect, vi } from "vitest";
import { CooccurrenceTracker } from "./CooccurrenceTracker.js";
import { COOCCURRENCE_MAX } from "../constants.js";

describe("CooccurrenceTracker", () => {
  it("reads unseen pairs as zero", () => {
    expect(new CooccurrenceTracker().get(3, 4)).toBe(0);
  });

  it("counts every pair of an input in both directions", () => {
    const tracker = new CooccurrenceTracker();
    tracker.recordInput([1, 2, 3]);

    expect(tracker.get(1, 2)).toBe(1);
    expect(tracker.get(2, 1)).toBe(1);
    expect(tracker.get(1, 3)).toBe(1);
    expect(tracker.get(3, 2)).toBe(1);
  });

  it("skips identical ids but pairs repeated tokens once per occurrence", () => {
    const tracker = new CooccurrenceTracker();
    const onPair = vi.fn();
    tracker.recordInput([1, 1, 2], onPair);

    expect(tracker.get(1, 1)).toBe(0);
    expect(tracker.get(1, 2)).toBe(2);
    expect(tracker.get(2, 1)).toBe(2);
    expect(onPair).toHaveBeenCalledTimes(2);
    expect(onPair).toHaveBeenCalledWith(1, 2);
  });

  it("reads ids outside the id space as zero instead of aliasing another pair", () => {
    const tracker = new CooccurrenceTracker();
    tracker.recordInput([0, 1]);

    // 0 * 1024 + 1024 would share a key with (1, 0).
    expect(tracker.get(1, 0)).toBe(1);
    expect(tracker.get(0, 1024)).toBe(0);
    expect(tracker.get(-1, 1025)).toBe(0);
    expect(tracker.get(0.5, 1)).toBe(0);
  });

  it("saturates instead of wrapping", () => {
    const tracker = new CooccurrenceTracker();
    for (let i = 0; i < COOCCURRENCE_MAX + 5; i++) {
      tracker.increment(7, 8);
    }
    expect(tracker.get(7, 8)).toBe(COOCCURRENCE_MAX);
    expect(tracker.get(8, 7)).toBe(COOCCURRENCE_MAX);
  });

  it("exports and reloads its entries", () => {
    const tracker = new CooccurrenceTracker();
    tracker.recordInput([5, 1023]);

    const copy = new CooccurrenceTracker();
    copy.load(tracker.entries());

    expect(tracker.entries()).toEqual([
      [5, 1023, 1],
      [1023, 5, 1],
    ]);
    expect(copy.get(1023, 5)).toBe(1);
  });
});
