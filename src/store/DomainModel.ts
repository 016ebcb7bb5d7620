import {
  CLASS_COUNT,
  DEFAULT_DOMAIN_INTENSITY,
  DOMAIN_BIAS_MULTIPLIER,
  DOMAIN_COUNT,
  GENERAL_DOMAIN,
} from "../constants.js";
import { checkedAdd, checkedMul, zeros } from "../math/fixedPoint.js";
import type { DomainModifier } from "../types.js";
import {
  domainBiasSchema,
  domainIdSchema,
  domainIntensitySchema,
  parseOrThrow,
} from "../validation.js";
import type { VocabularyStore } from "./VocabularyStore.js";

function neutralModifier(): DomainModifier {
  return { bias: zeros(CLASS_COUNT), intensity: DEFAULT_DOMAIN_INTENSITY };
}

/**
 * Per-domain class biases, plus detection of the domain an input belongs to.
 */
export class DomainModel {
  private readonly modifiers: DomainModifier[] = Array.from(
    { length: DOMAIN_COUNT },
    neutralModifier,
  );

  getModifier(domain: number): DomainModifier | undefined {
    const modifier = this.modifiers[domain];
    return modifier ? { bias: [...modifier.bias], intensity: modifier.intensity } : undefined;
  }

  setModifier(domain: number, bias: readonly number[], intensity: number): void {
    const id = parseOrThrow(domainIdSchema, domain);
    this.modifiers[id] = {
      bias: [...parseOrThrow(domainBiasSchema, bias)],
      intensity: parseOrThrow(domainIntensitySchema, intensity),
    };
  }

  /**
   * Sums each token's domain strength into its tagged domain and returns the
   * domain with the strictly highest total. Ties keep the lower id, so an
   * input without tagged tokens resolves to "general".
   */
  detect(tokens: readonly number[], vocabulary: VocabularyStore): number {
    const totals = zeros(DOMAIN_COUNT);
    for (const token of tokens) {
      const { domainRelevance, domainStrength } = vocabulary.peek(token);
      if (domainStrength !== 0 && domainRelevance < DOMAIN_COUNT) {
        totals[domainRelevance] = checkedAdd(totals[domainRelevance] ?? 0, domainStrength);
      }
    }

    let best = GENERAL_DOMAIN;
    let bestScore = totals[GENERAL_DOMAIN] ?? 0;
    for (let domain = 1; domain < DOMAIN_COUNT; domain++) {
      const score = totals[domain] ?? 0;
      if (score > bestScore) {
        best = domain;
        bestScore = score;
      }
    }
    return best;
  }

  /** Adds `bias[c] × intensity × 10` to each class score in place. */
  apply(domain: number, scores: number[]): void {
    const modifier = this.modifiers[domain];
    if (domain === GENERAL_DOMAIN || !modifier || modifier.intensity === 0) {
      return;
    }
    for (let c = 0; c < CLASS_COUNT; c++) {
      const delta = checkedMul(
        checkedMul(modifier.bias[c] ?? 0, modifier.intensity),
        DOMAIN_BIAS_MULTIPLIER,
      );
      scores[c] = checkedAdd(scores[c] ?? 0, delta);
    }
  }

  dump(): DomainModifier[] {
    return this.modifiers.map((m) => ({ bias: [...m.bias], intensity: m.intensity }));
  }

  load(modifiers: readonly DomainModifier[]): void {
    modifiers.forEach((m, domain) => {
      this.modifiers[domain] = { bias: [...m.bias], intensity: m.intensity };
    });
  }
}
