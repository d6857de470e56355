import type { PropertySource } from "../propertyAccess.js";

export type MatcherKind = "default" | "address" | "person" | "asset";

export interface EqualityMethod {
  id: string;
  /** Reliability of the signal; exact identifiers weigh most. */
  weight: number;
  /** Confidence in [0, 1] when the method fires, `null` when it does not. */
  evaluate(a: PropertySource, b: PropertySource): number | null;
}

export interface NodeMatcher {
  readonly kind: MatcherKind;
  embeddingProperties(): string[];
  embeddingText(properties: PropertySource): string;
  fuzzyEqualityMethods(): readonly EqualityMethod[];
  similarityThreshold(): number;
  identifyingFields(): string[];
  projectionFields(): string[];
  matchNodes(a: PropertySource, b: PropertySource): boolean;
  /** Runs one method, treating a thrown error as "did not fire". */
  evaluateMethod(method: EqualityMethod, a: PropertySource, b: PropertySource): number | null;
}
