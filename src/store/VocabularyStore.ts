import {
  CLASS_COUNT,
  CONTEXT_DIM,
  DEFAULT_DOMAIN_STRENGTH,
  MAX_VOCAB_SIZE,
  SEMANTIC_DIM,
  TOKEN_COUNTER_MAX,
} from "../constants.js";
import { saturatingIncrement, zeros } from "../math/fixedPoint.js";
import type { TokenMetadata, VocabularyBatch } from "../types.js";
import {
  classIdSchema,
  contextVectorSchema,
  parseOrThrow,
  semanticVectorSchema,
  tokenIdSchema,
  validateVocabularyBatch,
} from "../validation.js";

/** A class's linear scoring template. */
export interface ClassWeights {
  semantic: number[];
  context: number[];
}

export interface TokenEmbedding {
  tokenId: number;
  semantic: number[];
  context: number[];
}

/** Plain-data form of the store, as carried in a snapshot. */
export interface VocabularyDump {
  vocabSize: number;
  tokens: TokenMetadata[];
  embeddings: TokenEmbedding[];
  wordIndex: [string, number][];
  classWeights: ClassWeights[];
}

function emptyMetadata(): TokenMetadata {
  return {
    word: "",
    sentiment: 0,
    flags: 0,
    category: 0,
    secondaryCategory: 0,
    weight: 0,
    contextInfluence: 0,
    domainRelevance: 0,
    domainStrength: 0,
    usageCount: 0,
    cooccurrenceCount: 0,
  };
}

/**
 * Token metadata, token embeddings and class templates, indexed by id.
 *
 * Slots exist for every id below {@link MAX_VOCAB_SIZE}; `size` only tracks
 * how far the vocabulary has been written. Tokens are never deleted.
 */
export class VocabularyStore {
  private readonly metadata: TokenMetadata[];
  private readonly semantic: number[][];
  private readonly context: number[][];
  private readonly classWeights: ClassWeights[];
  private readonly wordIndex = new Map<string, number>();
  private vocabSize = 0;

  constructor() {
    this.metadata = Array.from({ length: MAX_VOCAB_SIZE }, emptyMetadata);
    this.semantic = Array.from({ length: MAX_VOCAB_SIZE }, () => zeros(SEMANTIC_DIM));
    this.context = Array.from({ length: MAX_VOCAB_SIZE }, () => zeros(CONTEXT_DIM));
    this.classWeights = Array.from({ length: CLASS_COUNT }, () => ({
      semantic: zeros(SEMANTIC_DIM),
      context: zeros(CONTEXT_DIM),
    }));
  }

  get size(): number {
    return this.vocabSize;
  }

  /** True when `tokenId` addresses a written slot. */
  has(tokenId: number): boolean {
    return Number.isInteger(tokenId) && tokenId >= 0 && tokenId < this.vocabSize;
  }

  /**
   * Validates and applies a whole batch. A rejected batch changes nothing.
   *
   * @returns the number of tokens written.
   */
  setVocabulary(batch: VocabularyBatch): number {
    const valid = validateVocabularyBatch(batch);
    let highest = this.vocabSize - 1;

    valid.tokenIds.forEach((id, i) => {
      const previous = this.metadata[id] ?? emptyMetadata();
      if (previous.word !== "" && this.wordIndex.get(previous.word) === id) {
        this.wordIndex.delete(previous.word);
      }
      const word = valid.words[i] ?? "";
      this.metadata[id] = {
        word,
        sentiment: valid.sentiments[i] ?? 0,
        flags: valid.flags[i] ?? 0,
        category: valid.categories[i] ?? 0,
        secondaryCategory: valid.secondaryCategories[i] ?? 0,
        weight: valid.weights[i] ?? 0,
        contextInfluence: valid.contextInfluence[i] ?? 0,
        domainRelevance: valid.domainRelevance[i] ?? 0,
        domainStrength: valid.domainStrengths?.[i] ?? DEFAULT_DOMAIN_STRENGTH,
        usageCount: 0,
        cooccurrenceCount: 0,
      };
      if (word !== "") {
        this.wordIndex.set(word, id);
      }
      highest = Math.max(highest, id);
    });

    this.vocabSize = highest + 1;
    return valid.tokenIds.length;
  }

  setTokenEmbedding(tokenId: number, semantic: readonly number[], context: readonly number[]): void {
    const id = parseOrThrow(tokenIdSchema, tokenId);
    const sem = parseOrThrow(semanticVectorSchema, semantic);
    const ctx = parseOrThrow(contextVectorSchema, context);
    this.semantic[id] = [...sem];
    this.context[id] = [...ctx];
  }

  setClassWeights(classId: number, semantic: readonly number[], context: readonly number[]): void {
    const id = parseOrThrow(classIdSchema, classId);
    const sem = parseOrThrow(semanticVectorSchema, semantic);
    const ctx = parseOrThrow(contextVectorSchema, context);
    this.classWeights[id] = { semantic: [...sem], context: [...ctx] };
  }

  /** Live metadata record; callers outside the store get copies via {@link getMetadata}. */
  peek(tokenId: number): TokenMetadata {
    return this.metadata[tokenId] ?? emptyMetadata();
  }

  getMetadata(tokenId: number): TokenMetadata | undefined {
    return this.has(tokenId) ? { ...this.peek(tokenId) } : undefined;
  }

  getWord(tokenId: number): string | undefined {
    return this.has(tokenId) ? this.peek(tokenId).word : undefined;
  }

  getTokenId(word: string): number | undefined {
    return this.wordIndex.get(word);
  }

  semanticOf(tokenId: number): readonly number[] {
    return this.semantic[tokenId] ?? zeros(SEMANTIC_DIM);
  }

  contextOf(tokenId: number): readonly number[] {
    return this.context[tokenId] ?? zeros(CONTEXT_DIM);
  }

  classWeightsOf(classId: number): ClassWeights {
    return this.classWeights[classId] ?? { semantic: zeros(SEMANTIC_DIM), context: zeros(CONTEXT_DIM) };
  }

  /** Entries whose word spans more than one whitespace-separated part. */
  get phraseCount(): number {
    let count = 0;
    for (let id = 0; id < this.vocabSize; id++) {
      if (/\s/.test(this.peek(id).word.trim())) count++;
    }
    return count;
  }

  recordUsage(tokenId: number): void {
    const meta = this.peek(tokenId);
    meta.usageCount = saturatingIncrement(meta.usageCount, TOKEN_COUNTER_MAX);
  }

  recordPairing(tokenId: number): void {
    const meta = this.peek(tokenId);
    meta.cooccurrenceCount = saturatingIncrement(meta.cooccurrenceCount, TOKEN_COUNTER_MAX);
  }

  /** Replaces every slot at once; used when restoring a snapshot. */
  load(state: VocabularyDump): void {
    this.wordIndex.clear();
    for (let id = 0; id < MAX_VOCAB_SIZE; id++) {
      const meta = state.tokens[id];
      this.metadata[id] = meta ? { ...meta } : emptyMetadata();
      this.semantic[id] = zeros(SEMANTIC_DIM);
      this.context[id] = zeros(CONTEXT_DIM);
    }
    state.embeddings.forEach(({ tokenId, semantic, context }) => {
      this.semantic[tokenId] = [...semantic];
      this.context[tokenId] = [...context];
    });
    state.wordIndex.forEach(([word, id]) => this.wordIndex.set(word, id));
    state.classWeights.forEach((weights, classId) => {
      this.classWeights[classId] = { semantic: [...weights.semantic], context: [...weights.context] };
    });
    this.vocabSize = state.vocabSize;
  }

  /** Copies of the written metadata plus every non-zero embedding slot. */
  dump(): VocabularyDump {
    const isSet = (v: readonly number[]) => v.some((x) => x !== 0);
    const embeddings: TokenEmbedding[] = [];
    for (let id = 0; id < MAX_VOCAB_SIZE; id++) {
      const semantic = this.semanticOf(id);
      const context = this.contextOf(id);
      if (isSet(semantic) || isSet(context)) {
        embeddings.push({ tokenId: id, semantic: [...semantic], context: [...context] });
      }
    }
    return {
      vocabSize: this.vocabSize,
      tokens: Array.from({ length: this.vocabSize }, (_, id) => ({ ...this.peek(id) })),
      embeddings,
      wordIndex: [...this.wordIndex.entries()],
      classWeights: this.classWeights.map((w) => ({ semantic: [...w.semantic], context: [...w.context] })),
    };
  }
}
