import type { PropertyMap, PropertyValue } from "@graphmerge/shared";

export type PropertySource = Readonly<PropertyMap>;

function scalarText(value: PropertyValue | undefined): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value.toISOString();
  }
  return undefined;
}

/** Arrays collapse to their first non-blank entry. */
export function firstNonBlank(value: PropertyValue | undefined): string | undefined {
  if (Array.isArray(value)) {
    for (const item of value) {
      const text = firstNonBlank(item);
      if (text !== undefined) {
        return text;
      }
    }
    return undefined;
  }
  return scalarText(value);
}

/** First populated value among `keys`, as trimmed text. */
export function textOf(properties: PropertySource, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const text = firstNonBlank(properties[key]);
    if (text !== undefined) {
      return text;
    }
  }
  return undefined;
}

export function hasValue(value: PropertyValue | undefined): boolean {
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value === "string") {
    return value.trim().length > 0;
  }
  if (Array.isArray(value)) {
    return value.some((item) => hasValue(item));
  }
  return true;
}

export function populatedCount(properties: PropertySource, keys: readonly string[]): number {
  return keys.filter((key) => hasValue(properties[key])).length;
}

export function digitsOnly(text: string): string {
  return text.replace(/\D/g, "");
}

export function alphanumericUpper(text: string): string {
  return text.toUpperCase().replace(/[^A-Z0-9]/g, "");
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}
