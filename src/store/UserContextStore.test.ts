import { describe, it, expect } from "vitest";
import { emptyUserContext, UserContextStore } from "./UserContextStore.js";
import { CLASS_HISTORY_MAX, INTERACTION_MAX } from "../constants.js";

const interaction = (firstToken: number, classId = 3, domain = 0) => ({
  timestamp: 100,
  firstToken,
  classId,
  domain,
});

describe("UserContextStore", () => {
  it("returns an all-zero context for an unknown caller", () => {
    const users = new UserContextStore();
    expect(users.get("nobody")).toEqual(emptyUserContext());
    expect(users.has("nobody")).toBe(false);
  });

  it("records the last input, history and interaction count", () => {
    const users = new UserContextStore();
    users.record("alice", { timestamp: 42, firstToken: 9, classId: 5, domain: 0 });

    expect(users.get("alice")).toEqual({
      lastInteraction: 42,
      lastInputToken: 9,
      topicBuffer: [9, 0, 0],
      classHistory: [0, 0, 0, 0, 0, 1, 0],
      totalInteractions: 1,
      sentimentBias: 0,
      primaryDomain: 0,
    });
  });

  it("keeps the three most recent first tokens, newest first", () => {
    const users = new UserContextStore();
    [1, 2, 3, 4].forEach((token) => users.record("alice", interaction(token)));
    expect(users.get("alice").topicBuffer).toEqual([4, 3, 2]);
  });

  it("only moves the primary domain for non-general results", () => {
    const users = new UserContextStore();
    users.record("alice", interaction(1, 3, 6));
    users.record("alice", interaction(2, 3, 0));
    expect(users.get("alice").primaryDomain).toBe(6);
  });

  it("saturates history entries and the interaction counter", () => {
    const users = new UserContextStore();
    for (let i = 0; i < INTERACTION_MAX + 3; i++) {
      users.record("alice", interaction(1, 2));
    }
    const ctx = users.get("alice");
    expect(ctx.classHistory[2]).toBe(CLASS_HISTORY_MAX);
    expect(ctx.totalInteractions).toBe(INTERACTION_MAX);
  });

  it("keeps callers independent", () => {
    const users = new UserContextStore();
    users.record("alice", interaction(1, 6));
    expect(users.get("bob").totalInteractions).toBe(0);
  });

  it("hands out copies", () => {
    const users = new UserContextStore();
    users.record("alice", interaction(1));
    users.get("alice").topicBuffer[0] = 99;
    expect(users.get("alice").topicBuffer[0]).toBe(1);
  });
});

describe("UserContextStore.adapt", () => {
  it("shifts classes around neutral by bias × 20", () => {
    const users = new UserContextStore();
    const scores = [0, 0, 0, 0, 0, 0, 0];
    users.adapt({ ...emptyUserContext(), sentimentBias: 2 }, scores);
    expect(scores).toEqual([-40, -40, -40, 0, 40, 40, 40]);
  });

  it("reinforces previously chosen classes by 5 per entry", () => {
    const users = new UserContextStore();
    users.record("alice", interaction(1, 5));
    users.record("alice", interaction(1, 5));
    users.record("alice", interaction(1, 0));
    const scores = [0, 0, 0, 0, 0, 0, 0];

    users.adapt(users.get("alice"), scores);

    expect(scores).toEqual([5, 0, 0, 0, 0, 10, 0]);
  });

  it("does nothing for a fresh context", () => {
    const scores = [1, 2, 3, 4, 5, 6, 7];
    new UserContextStore().adapt(emptyUserContext(), scores);
    expect(scores).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });
});
