import { stringSimilarity } from "../similarity.js";
import { textOf, type PropertySource } from "../propertyAccess.js";
import { BaseNodeMatcher } from "./BaseNodeMatcher.js";
import type { EqualityMethod } from "./types.js";

function normalizedText(value: string | undefined): string {
  return (value ?? "").toLowerCase().replace(/\s+/g, " ").trim();
}

export class DefaultMatcher extends BaseNodeMatcher {
  readonly kind = "default";

  protected readonly methods: readonly EqualityMethod[] = [
    {
      id: "exact_id_match",
      weight: 1,
      evaluate: (a, b) => {
        const idA = textOf(a, "id");
        return idA !== undefined && idA === textOf(b, "id") ? 1 : null;
      }
    },
    {
      id: "name_similarity_match",
      weight: 0.5,
      evaluate: (a, b) => this.nameSimilarity(a, b)
    },
    {
      id: "description_match",
      weight: 0.4,
      evaluate: (a, b) => {
        const left = normalizedText(textOf(a, "description"));
        return left.length > 0 && left === normalizedText(textOf(b, "description")) ? 0.8 : null;
      }
    }
  ];

  identifyingFields(): string[] {
    return ["id", "name", "title", "description"];
  }

  private nameSimilarity(a: PropertySource, b: PropertySource): number | null {
    const nameA = textOf(a, "name", "title");
    const nameB = textOf(b, "name", "title");
    if (nameA === undefined || nameB === undefined) {
      return null;
    }
    const similarity = stringSimilarity(nameA, nameB);
    return similarity >= 0.9 ? similarity : null;
  }
}
