import { describe, it, expect } from "vitest";
import { VocabularyStore } from "./VocabularyStore.js";
import { ValidationError } from "../errors.js";
import { batchOf, context, semantic } from "../test/fixtures.js";
import { MAX_VOCAB_SIZE } from "../constants.js";

describe("VocabularyStore.setVocabulary", () => {
  it("writes metadata and extends the size to the highest id", () => {
    const store = new VocabularyStore();
    const written = store.setVocabulary(
      batchOf([
        { id: 0, word: "good", sentiment: 3, category: 2, weight: 5, contextInfluence: 2, domainRelevance: 4 },
        { id: 4, word: "bad", sentiment: -3 },
      ]),
    );

    expect(written).toBe(2);
    expect(store.size).toBe(5);
    expect(store.getMetadata(0)).toEqual({
      word: "good",
      sentiment: 3,
      flags: 0,
      category: 2,
      secondaryCategory: 0,
      weight: 5,
      contextInfluence: 2,
      domainRelevance: 4,
      domainStrength: 1,
      usageCount: 0,
      cooccurrenceCount: 0,
    });
    expect(store.getWord(4)).toBe("bad");
    expect(store.getTokenId("bad")).toBe(4);
  });

  it("never shrinks the vocabulary", () => {
    const store = new VocabularyStore();
    store.setVocabulary(batchOf([{ id: 9 }]));
    store.setVocabulary(batchOf([{ id: 2 }]));
    expect(store.size).toBe(10);
  });

  it("defaults domain strength to 1 and honours explicit strengths", () => {
    const store = new VocabularyStore();
    const batch = batchOf([{ id: 0 }, { id: 1 }]);
    store.setVocabulary({ ...batch, domainStrengths: undefined });
    expect(store.getMetadata(1)?.domainStrength).toBe(1);

    store.setVocabulary(batchOf([{ id: 1, domainStrength: 7 }]));
    expect(store.getMetadata(1)?.domainStrength).toBe(7);
  });

  it("drops the old word mapping when a token is renamed", () => {
    const store = new VocabularyStore();
    store.setVocabulary(batchOf([{ id: 3, word: "fine" }]));
    store.setVocabulary(batchOf([{ id: 3, word: "okay" }]));

    expect(store.getTokenId("fine")).toBeUndefined();
    expect(store.getTokenId("okay")).toBe(3);
  });

  it("resets usage and co-occurrence counters when a token is overwritten", () => {
    const store = new VocabularyStore();
    store.setVocabulary(batchOf([{ id: 0 }, { id: 1 }]));
    store.recordUsage(0);
    store.recordUsage(0);
    store.recordPairing(0);
    store.recordUsage(1);
    store.setVocabulary(batchOf([{ id: 0, sentiment: 2 }]));

    expect(store.getMetadata(0)?.usageCount).toBe(0);
    expect(store.getMetadata(0)?.cooccurrenceCount).toBe(0);
    expect(store.getMetadata(0)?.sentiment).toBe(2);
    expect(store.getMetadata(1)?.usageCount).toBe(1);
  });

  it("rejects mismatched lengths without touching existing entries", () => {
    const store = new VocabularyStore();
    store.setVocabulary(batchOf([{ id: 0, word: "keep", weight: 4 }]));
    const before = store.getMetadata(0);

    const batch = batchOf([{ id: 0, word: "replace" }, { id: 7 }]);
    let caught: unknown;
    try {
      store.setVocabulary({ ...batch, weights: [3] });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect((caught as ValidationError).constraint).toBe("length-mismatch");
    expect((caught as ValidationError).issues).toEqual(["weights has 1 entries, expected 2"]);
    expect(store.size).toBe(1);
    expect(store.getMetadata(0)).toEqual(before);
    expect(store.getTokenId("replace")).toBeUndefined();
  });

  it.each([
    ["weight 0", { id: 0, weight: 0 }],
    ["weight 11", { id: 0, weight: 11 }],
    ["context influence 0", { id: 0, contextInfluence: 0 }],
    ["context influence 11", { id: 0, contextInfluence: 11 }],
    ["domain relevance 10", { id: 0, domainRelevance: 10 }],
    ["token id 1024", { id: 1024 }],
    ["category 9", { id: 0, category: 9 }],
  ])("rejects %s as out of range", (_label, spec) => {
    const store = new VocabularyStore();
    expect(() => store.setVocabulary(batchOf([{ id: 1 }, spec]))).toThrow(ValidationError);
    expect(store.size).toBe(0);
  });

  it("rejects batches above the vocabulary cap", () => {
    const store = new VocabularyStore();
    const specs = Array.from({ length: MAX_VOCAB_SIZE + 1 }, (_, i) => ({ id: i % MAX_VOCAB_SIZE }));
    expect(() => store.setVocabulary(batchOf(specs))).toThrow(/batch-too-large/);
    expect(store.size).toBe(0);
  });
});

describe("VocabularyStore embeddings", () => {
  it("stores token embeddings and class weights", () => {
    const store = new VocabularyStore();
    store.setTokenEmbedding(2, semantic([100, -200]), context([7]));
    store.setClassWeights(6, semantic([1000]), context([0, 500]));

    expect(store.semanticOf(2).slice(0, 3)).toEqual([100, -200, 0]);
    expect(store.contextOf(2)[0]).toBe(7);
    expect(store.classWeightsOf(6).context.slice(0, 2)).toEqual([0, 500]);
  });

  it("rejects vectors of the wrong dimension or magnitude", () => {
    const store = new VocabularyStore();
    expect(() => store.setTokenEmbedding(0, [1, 2, 3], context())).toThrow(ValidationError);
    expect(() => store.setTokenEmbedding(0, semantic([10_001]), context())).toThrow(ValidationError);
    expect(() => store.setClassWeights(7, semantic(), context())).toThrow(ValidationError);
    expect(store.semanticOf(0)[0]).toBe(0);
  });
});

describe("VocabularyStore accessors", () => {
  it("reports unwritten ids as absent", () => {
    const store = new VocabularyStore();
    store.setVocabulary(batchOf([{ id: 0 }, { id: 4 }]));
    expect(store.has(4)).toBe(true);
    expect(store.has(5)).toBe(false);
    expect(store.has(-1)).toBe(false);
    expect(store.getMetadata(5)).toBeUndefined();
    expect(store.getWord(5)).toBeUndefined();
  });

  it("counts multi-word entries as phrases", () => {
    const store = new VocabularyStore();
    store.setVocabulary(batchOf([
      { id: 0, word: "good" },
      { id: 1, word: "not bad" },
      { id: 2, word: "over the moon" },
    ]));
    expect(store.phraseCount).toBe(2);
  });
});
