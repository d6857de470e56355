import { stringSimilarity } from "../similarity.js";
import { alphanumericUpper, textOf, type PropertySource } from "../propertyAccess.js";
import { BaseNodeMatcher } from "./BaseNodeMatcher.js";
import type { EqualityMethod } from "./types.js";

export const UNIQUE_IDENTIFIER_KEYS = [
  "license_plate",
  "vin",
  "part_number",
  "registration",
  "barcode",
  "product_code"
];

const BRAND_KEYS = ["brand", "make", "manufacturer"];
const NAME_STOPWORDS = new Set(["the", "a", "an", "my", "our", "new", "old", "used"]);

function nameWords(properties: PropertySource): string[] {
  return (textOf(properties, "name") ?? "")
    .split(/\s+/)
    .filter((word) => word.length > 0 && !NAME_STOPWORDS.has(word.toLowerCase()));
}

/** Explicit brand field, else the leading word of a multi-word name. */
export function extractBrand(properties: PropertySource): string | undefined {
  const explicit = textOf(properties, ...BRAND_KEYS);
  if (explicit !== undefined) {
    return explicit.toLowerCase();
  }
  const words = nameWords(properties);
  const first = words[0];
  return words.length > 1 && first !== undefined && first.length > 2 ? first.toLowerCase() : undefined;
}

/** Explicit model field, else the first later name word that looks like a model. */
export function extractModel(properties: PropertySource): string | undefined {
  const explicit = textOf(properties, "model");
  if (explicit !== undefined) {
    return explicit.toLowerCase();
  }
  const rest = nameWords(properties).slice(1);
  const candidate = rest.find((word) => /\d/.test(word) || word.length > 4) ?? rest[0];
  return candidate?.toLowerCase();
}

/** Both sides name a brand explicitly and the brands disagree. */
function brandsConflict(a: PropertySource, b: PropertySource): boolean {
  const left = textOf(a, ...BRAND_KEYS);
  const right = textOf(b, ...BRAND_KEYS);
  return left !== undefined && right !== undefined && stringSimilarity(left, right) < 0.8;
}

function componentConfidence(left: string | undefined, right: string | undefined, floor: number): number {
  if (left === undefined || right === undefined) {
    return floor;
  }
  if (left === right) {
    return 1;
  }
  return Math.max(stringSimilarity(left, right), floor);
}

export class AssetMatcher extends BaseNodeMatcher {
  readonly kind = "asset";

  protected readonly methods: readonly EqualityMethod[] = [
    {
      id: "exact_serial_number_match",
      weight: 1,
      evaluate: (a, b) => {
        const serial = textOf(a, "serial_number", "serial")?.toLowerCase();
        return serial !== undefined && serial === textOf(b, "serial_number", "serial")?.toLowerCase() ? 1 : null;
      }
    },
    {
      id: "exact_unique_identifier_match",
      weight: 0.95,
      evaluate: (a, b) => {
        for (const key of UNIQUE_IDENTIFIER_KEYS) {
          const left = alphanumericUpper(textOf(a, key) ?? "");
          if (left.length > 0 && left === alphanumericUpper(textOf(b, key) ?? "")) {
            return 1;
          }
        }
        return null;
      }
    },
    {
      id: "brand_and_model_match",
      weight: 0.7,
      evaluate: (a, b) => this.brandAndModelMatch(a, b)
    },
    {
      id: "asset_name_similarity_match",
      weight: 0.5,
      evaluate: (a, b) => {
        if (brandsConflict(a, b)) {
          return null;
        }
        const nameA = textOf(a, "name");
        const nameB = textOf(b, "name");
        if (nameA === undefined || nameB === undefined) {
          return null;
        }
        const similarity = stringSimilarity(nameA, nameB);
        return similarity >= 0.85 ? similarity * 0.8 : null;
      }
    }
  ];

  override embeddingProperties(): string[] {
    return ["name", "brand", "make", "model", "serial_number", "license_plate", "description", "category"];
  }

  identifyingFields(): string[] {
    return ["serial_number", "license_plate", "vin", "part_number", "barcode", "brand", "model", "name"];
  }

  override projectionFields(): string[] {
    return [
      ...new Set([...super.projectionFields(), ...UNIQUE_IDENTIFIER_KEYS, ...BRAND_KEYS, "serial", "model"])
    ];
  }

  private brandAndModelMatch(a: PropertySource, b: PropertySource): number | null {
    if (brandsConflict(a, b)) {
      return null;
    }

    const brandA = extractBrand(a);
    const brandB = extractBrand(b);
    const modelA = extractModel(a);
    const modelB = extractModel(b);
    if (modelA === undefined || modelB === undefined) {
      return null;
    }

    const modelSimilarity = stringSimilarity(modelA, modelB);
    const brandSimilarity =
      brandA !== undefined && brandB !== undefined ? stringSimilarity(brandA, brandB) : 0;
    const nameA = textOf(a, "name");
    const nameB = textOf(b, "name");
    const nameSimilarity = nameA !== undefined && nameB !== undefined ? stringSimilarity(nameA, nameB) : 0;

    const fires =
      (brandSimilarity >= 0.8 && modelSimilarity >= 0.7) ||
      (modelSimilarity >= 0.7 && nameSimilarity >= 0.6);
    if (!fires) {
      return null;
    }

    return (componentConfidence(brandA, brandB, 0.3) + componentConfidence(modelA, modelB, 0.4)) / 2;
  }
}
