import type { Logger } from "../../utils/logger.js";
import { digitsOnly, textOf, type PropertySource } from "../propertyAccess.js";
import type { EqualityMethod, MatcherKind, NodeMatcher } from "./types.js";

export type UniversalIdentifier = "id" | "email" | "phone" | "ssn";

const UNIVERSAL_FIELDS = ["id", "email", "phone", "phone_number", "ssn"];

/**
 * Identifiers that settle a match for every entity type, checked before any
 * type-specific method.
 */
export function universalIdentifierMatch(a: PropertySource, b: PropertySource): UniversalIdentifier | null {
  const idA = textOf(a, "id");
  if (idA !== undefined && idA === textOf(b, "id")) {
    return "id";
  }

  const emailA = textOf(a, "email")?.toLowerCase();
  if (emailA !== undefined && emailA === textOf(b, "email")?.toLowerCase()) {
    return "email";
  }

  const phoneA = digitsOnly(textOf(a, "phone", "phone_number") ?? "");
  const phoneB = digitsOnly(textOf(b, "phone", "phone_number") ?? "");
  if (phoneA.length >= 7 && phoneA === phoneB) {
    return "phone";
  }

  const ssnA = digitsOnly(textOf(a, "ssn") ?? "");
  if (ssnA.length > 0 && ssnA === digitsOnly(textOf(b, "ssn") ?? "")) {
    return "ssn";
  }

  return null;
}

export abstract class BaseNodeMatcher implements NodeMatcher {
  abstract readonly kind: MatcherKind;
  protected abstract readonly methods: readonly EqualityMethod[];

  constructor(
    protected readonly logger: Logger,
    private readonly defaultThreshold = 0.8
  ) {}

  embeddingProperties(): string[] {
    return ["name", "title", "description"];
  }

  embeddingText(properties: PropertySource): string {
    return this.embeddingProperties()
      .map((key) => textOf(properties, key))
      .filter((value): value is string => value !== undefined)
      .join(". ");
  }

  fuzzyEqualityMethods(): readonly EqualityMethod[] {
    return this.methods;
  }

  similarityThreshold(): number {
    return this.defaultThreshold;
  }

  abstract identifyingFields(): string[];

  projectionFields(): string[] {
    return [
      ...new Set([...UNIVERSAL_FIELDS, ...this.embeddingProperties(), ...this.identifyingFields()])
    ];
  }

  matchNodes(a: PropertySource, b: PropertySource): boolean {
    if (universalIdentifierMatch(a, b) !== null) {
      return true;
    }
    return this.methods.some((method) => this.evaluateMethod(method, a, b) !== null);
  }

  evaluateMethod(method: EqualityMethod, a: PropertySource, b: PropertySource): number | null {
    try {
      return method.evaluate(a, b);
    } catch (error) {
      this.logger.debug(
        { matcher: this.kind, method: method.id, err: error instanceof Error ? error.message : String(error) },
        "Equality method failed"
      );
      return null;
    }
  }
}
