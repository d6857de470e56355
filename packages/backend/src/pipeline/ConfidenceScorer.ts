import type { MatchAction } from "@graphmerge/shared";
import type { AppConfig } from "../config.js";
import { populatedCount, textOf, type PropertySource } from "./propertyAccess.js";
import { universalIdentifierMatch, type UniversalIdentifier } from "./matchers/BaseNodeMatcher.js";
import type { NodeMatcherRegistry } from "./matchers/NodeMatcherRegistry.js";

export interface ConfidenceSettings {
  autoMergeThreshold: number;
  autoRejectThreshold: number;
  richnessBonus: number;
  sparsityPenalty: number;
  genericityPenalty: number;
  /** Both sides need at least this many identifying fields for the bonus. */
  richFieldCount: number;
  /** Either side at or below this many identifying fields draws the penalty. */
  sparseFieldCount: number;
  genericTerms: string[];
}

export const DEFAULT_GENERIC_TERMS = [
  "truck",
  "car",
  "vehicle",
  "bike",
  "item",
  "asset",
  "equipment",
  "tool",
  "part",
  "component",
  "thing",
  "object",
  "unknown"
];

export const DEFAULT_CONFIDENCE_SETTINGS: ConfidenceSettings = {
  autoMergeThreshold: 0.9,
  autoRejectThreshold: 0.3,
  richnessBonus: 0.1,
  sparsityPenalty: 0.2,
  genericityPenalty: 0.15,
  richFieldCount: 3,
  sparseFieldCount: 1,
  genericTerms: DEFAULT_GENERIC_TERMS
};

export function confidenceSettingsFromConfig(config: AppConfig): ConfidenceSettings {
  return {
    ...DEFAULT_CONFIDENCE_SETTINGS,
    autoMergeThreshold: config.AUTO_MERGE_THRESHOLD,
    autoRejectThreshold: config.AUTO_REJECT_THRESHOLD,
    richnessBonus: config.RICHNESS_BONUS,
    sparsityPenalty: config.SPARSITY_PENALTY,
    genericityPenalty: config.GENERICITY_PENALTY
  };
}

export interface FiredMethod {
  id: string;
  score: number;
  weight: number;
}

export interface ConfidenceModifiers {
  richness: number;
  sparsity: number;
  genericity: number;
}

export interface ConfidenceScore {
  confidence: number;
  firedMethods: FiredMethod[];
  universalMatch: UniversalIdentifier | null;
  modifiers: ConfidenceModifiers;
}

const NO_MODIFIERS: ConfidenceModifiers = { richness: 0, sparsity: 0, genericity: 0 };

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  const rounded = Math.round(value * 1_000_000) / 1_000_000;
  return Math.min(1, Math.max(0, rounded));
}

export class ConfidenceScorer {
  readonly settings: ConfidenceSettings;
  private readonly genericTerms: Set<string>;

  constructor(
    private readonly registry: NodeMatcherRegistry,
    settings: Partial<ConfidenceSettings> = {}
  ) {
    this.settings = { ...DEFAULT_CONFIDENCE_SETTINGS, ...settings };
    this.genericTerms = new Set(this.settings.genericTerms.map((term) => term.toLowerCase()));
  }

  score(type: string, a: PropertySource, b: PropertySource): ConfidenceScore {
    const universalMatch = universalIdentifierMatch(a, b);
    if (universalMatch !== null) {
      return { confidence: 1, firedMethods: [], universalMatch, modifiers: NO_MODIFIERS };
    }

    const matcher = this.registry.forType(type);
    const firedMethods: FiredMethod[] = [];
    for (const method of matcher.fuzzyEqualityMethods()) {
      const score = matcher.evaluateMethod(method, a, b);
      if (score !== null) {
        firedMethods.push({ id: method.id, score: clampConfidence(score), weight: method.weight });
      }
    }

    const totalWeight = firedMethods.reduce((sum, method) => sum + method.weight, 0);
    const weighted =
      totalWeight > 0
        ? firedMethods.reduce((sum, method) => sum + method.score * method.weight, 0) / totalWeight
        : 0;

    const modifiers = this.modifiers(matcher.identifyingFields(), a, b);
    const confidence = clampConfidence(
      weighted + modifiers.richness - modifiers.sparsity - modifiers.genericity
    );

    return { confidence, firedMethods, universalMatch: null, modifiers };
  }

  /** Boundaries are inclusive on both ends. */
  decide(confidence: number): MatchAction {
    if (confidence >= this.settings.autoMergeThreshold) {
      return "auto_merge";
    }
    if (confidence <= this.settings.autoRejectThreshold) {
      return "auto_reject";
    }
    return "human_review";
  }

  isGenericName(properties: PropertySource): boolean {
    const name = textOf(properties, "name")?.toLowerCase();
    return name !== undefined && this.genericTerms.has(name);
  }

  private modifiers(identifyingFields: string[], a: PropertySource, b: PropertySource): ConfidenceModifiers {
    const countA = populatedCount(a, identifyingFields);
    const countB = populatedCount(b, identifyingFields);
    const { richFieldCount, sparseFieldCount } = this.settings;

    let richness = 0;
    let sparsity = 0;
    if (countA >= richFieldCount && countB >= richFieldCount) {
      richness = this.settings.richnessBonus;
    } else if (countA <= sparseFieldCount || countB <= sparseFieldCount) {
      sparsity = this.settings.sparsityPenalty;
    }

    const genericity =
      this.isGenericName(a) || this.isGenericName(b) ? this.settings.genericityPenalty : 0;

    return { richness, sparsity, genericity };
  }
}
