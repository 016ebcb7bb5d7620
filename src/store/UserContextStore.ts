import {
  CLASS_COUNT,
  CLASS_HISTORY_MAX,
  GENERAL_DOMAIN,
  HISTORY_MULTIPLIER,
  INTERACTION_MAX,
  NEUTRAL_CLASS,
  TOPIC_SLOTS,
  USER_BIAS_MULTIPLIER,
} from "../constants.js";
import { checkedAdd, checkedMul, saturatingIncrement, zeros } from "../math/fixedPoint.js";
import type { UserContext } from "../types.js";

export function emptyUserContext(): UserContext {
  return {
    lastInteraction: 0,
    lastInputToken: 0,
    topicBuffer: zeros(TOPIC_SLOTS),
    classHistory: zeros(CLASS_COUNT),
    totalInteractions: 0,
    sentimentBias: 0,
    primaryDomain: GENERAL_DOMAIN,
  };
}

function copyContext(ctx: UserContext): UserContext {
  return { ...ctx, topicBuffer: [...ctx.topicBuffer], classHistory: [...ctx.classHistory] };
}

/** What a committed classification writes into its caller's context. */
export interface InteractionRecord {
  timestamp: number;
  firstToken: number;
  classId: number;
  domain: number;
}

/**
 * Adaptive per-caller state. A caller only ever touches its own entry.
 */
export class UserContextStore {
  private readonly contexts = new Map<string, UserContext>();

  /** The caller's context, or an all-zero one if it has never classified. */
  get(caller: string): UserContext {
    const ctx = this.contexts.get(caller);
    return ctx ? copyContext(ctx) : emptyUserContext();
  }

  has(caller: string): boolean {
    return this.contexts.has(caller);
  }

  /**
   * Applies the caller's sentiment bias and class history to `scores` in place.
   * Classes above neutral gain `bias × 20`, classes below it lose the same;
   * each class then gains `5 × history[class]` once the caller has history.
   */
  adapt(ctx: UserContext, scores: number[]): void {
    if (ctx.sentimentBias !== 0) {
      const shift = checkedMul(ctx.sentimentBias, USER_BIAS_MULTIPLIER);
      for (let c = 0; c < CLASS_COUNT; c++) {
        if (c > NEUTRAL_CLASS) scores[c] = checkedAdd(scores[c] ?? 0, shift);
        else if (c < NEUTRAL_CLASS) scores[c] = checkedAdd(scores[c] ?? 0, -shift);
      }
    }
    if (ctx.totalInteractions > 0) {
      for (let c = 0; c < CLASS_COUNT; c++) {
        scores[c] = checkedAdd(scores[c] ?? 0, checkedMul(HISTORY_MULTIPLIER, ctx.classHistory[c] ?? 0));
      }
    }
  }

  /** Writes one committed interaction into the caller's context. */
  record(caller: string, interaction: InteractionRecord): void {
    const ctx = this.contexts.get(caller) ?? emptyUserContext();
    ctx.lastInteraction = interaction.timestamp;
    ctx.lastInputToken = interaction.firstToken;
    if (interaction.domain !== GENERAL_DOMAIN) {
      ctx.primaryDomain = interaction.domain;
    }
    ctx.topicBuffer = [interaction.firstToken, ...ctx.topicBuffer].slice(0, TOPIC_SLOTS);
    ctx.classHistory[interaction.classId] = saturatingIncrement(
      ctx.classHistory[interaction.classId] ?? 0,
      CLASS_HISTORY_MAX,
    );
    ctx.totalInteractions = saturatingIncrement(ctx.totalInteractions, INTERACTION_MAX);
    this.contexts.set(caller, ctx);
  }

  dump(): [string, UserContext][] {
    return [...this.contexts.entries()].map(([caller, ctx]) => [caller, copyContext(ctx)]);
  }

  load(entries: readonly (readonly [string, UserContext])[]): void {
    this.contexts.clear();
    entries.forEach(([caller, ctx]) => this.contexts.set(caller, copyContext(ctx)));
  }
}
