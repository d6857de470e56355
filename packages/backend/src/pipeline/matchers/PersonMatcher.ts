import type { PropertyValue } from "@graphmerge/shared";
import { stringSimilarity } from "../similarity.js";
import { alphanumericUpper, digitsOnly, firstNonBlank, textOf, type PropertySource } from "../propertyAccess.js";
import { BaseNodeMatcher } from "./BaseNodeMatcher.js";
import type { EqualityMethod } from "./types.js";

const GOVERNMENT_ID_KEYS = ["ssn", "national_id", "passport_number", "tax_id"];
const ALIAS_KEYS = ["aliases", "aka", "nicknames"];

export function fullName(properties: PropertySource): string | undefined {
  const explicit = textOf(properties, "full_name", "name");
  if (explicit !== undefined) {
    return explicit;
  }
  const parts = [textOf(properties, "first_name"), textOf(properties, "last_name")].filter(
    (part): part is string => part !== undefined
  );
  return parts.length > 0 ? parts.join(" ") : undefined;
}

function lastName(properties: PropertySource): string | undefined {
  return textOf(properties, "last_name") ?? fullName(properties)?.split(/\s+/).at(-1);
}

function firstInitial(properties: PropertySource): string | undefined {
  const first = textOf(properties, "first_name") ?? fullName(properties)?.split(/\s+/)[0];
  return first?.charAt(0).toLowerCase();
}

function emailDomain(properties: PropertySource): string | undefined {
  const email = textOf(properties, "email")?.toLowerCase();
  const at = email?.lastIndexOf("@") ?? -1;
  return email !== undefined && at > 0 ? email.slice(at + 1) : undefined;
}

function aliasesOf(properties: PropertySource): string[] {
  const collect = (value: PropertyValue | undefined): string[] => {
    if (Array.isArray(value)) {
      return value.flatMap((item) => collect(item));
    }
    const text = firstNonBlank(value);
    return text === undefined ? [] : text.split(/[;,]/).map((item) => item.trim().toLowerCase());
  };
  return ALIAS_KEYS.flatMap((key) => collect(properties[key])).filter((alias) => alias.length > 0);
}

export class PersonMatcher extends BaseNodeMatcher {
  readonly kind = "person";

  protected readonly methods: readonly EqualityMethod[] = [
    {
      id: "exact_email_match",
      weight: 1,
      evaluate: (a, b) => {
        const email = textOf(a, "email")?.toLowerCase();
        return email !== undefined && email === textOf(b, "email")?.toLowerCase() ? 1 : null;
      }
    },
    {
      id: "exact_phone_match",
      weight: 0.95,
      evaluate: (a, b) => {
        const left = digitsOnly(textOf(a, "phone", "phone_number") ?? "");
        const right = digitsOnly(textOf(b, "phone", "phone_number") ?? "");
        if (left.length < 8 || right.length < 8) {
          return null;
        }
        return left.includes(right) || right.includes(left) ? 1 : null;
      }
    },
    {
      id: "government_id_match",
      weight: 1,
      evaluate: (a, b) => {
        for (const key of GOVERNMENT_ID_KEYS) {
          const left = alphanumericUpper(textOf(a, key) ?? "");
          if (left.length > 0 && left === alphanumericUpper(textOf(b, key) ?? "")) {
            return 1;
          }
        }
        return null;
      }
    },
    {
      id: "full_name_email_domain_match",
      weight: 0.75,
      evaluate: (a, b) => {
        const domain = emailDomain(a);
        if (domain === undefined || domain !== emailDomain(b)) {
          return null;
        }
        const similarity = this.nameSimilarity(a, b);
        return similarity !== null && similarity >= 0.8 ? similarity : null;
      }
    },
    {
      id: "alias_match",
      weight: 0.7,
      evaluate: (a, b) => {
        const nameA = fullName(a)?.toLowerCase();
        const nameB = fullName(b)?.toLowerCase();
        const hit =
          (nameA !== undefined && aliasesOf(b).includes(nameA)) ||
          (nameB !== undefined && aliasesOf(a).includes(nameB));
        return hit ? 0.85 : null;
      }
    },
    {
      id: "full_name_similarity_match",
      weight: 0.6,
      evaluate: (a, b) => {
        const similarity = this.nameSimilarity(a, b);
        return similarity !== null && similarity >= 0.9 ? similarity * 0.9 : null;
      }
    },
    {
      id: "last_name_first_initial_match",
      weight: 0.4,
      evaluate: (a, b) => {
        const lastA = lastName(a);
        const lastB = lastName(b);
        if (lastA === undefined || lastB === undefined || stringSimilarity(lastA, lastB) < 0.9) {
          return null;
        }
        const initialA = firstInitial(a);
        const initialB = firstInitial(b);
        const initialsAgree = initialA === undefined || initialB === undefined || initialA === initialB;
        return initialsAgree ? 0.6 : null;
      }
    }
  ];

  override embeddingProperties(): string[] {
    return [
      "full_name",
      "first_name",
      "last_name",
      "name",
      "email",
      "phone",
      "phone_number",
      "title",
      "company_name"
    ];
  }

  override similarityThreshold(): number {
    return 0.85;
  }

  identifyingFields(): string[] {
    return ["full_name", "name", "first_name", "last_name", "email", "phone", "phone_number", "ssn", "date_of_birth"];
  }

  override projectionFields(): string[] {
    return [...new Set([...super.projectionFields(), ...GOVERNMENT_ID_KEYS, ...ALIAS_KEYS])];
  }

  private nameSimilarity(a: PropertySource, b: PropertySource): number | null {
    const nameA = fullName(a);
    const nameB = fullName(b);
    if (nameA === undefined || nameB === undefined) {
      return null;
    }
    return stringSimilarity(nameA, nameB);
  }
}
