import type { PropertyScalar, StoredProperties, StoredPropertyValue } from "@graphmerge/shared";
import { componentLogger, type Logger } from "../utils/logger.js";
import { isPlainRecord } from "./propertyAccess.js";

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

export function sanitizeString(value: string): string {
  return value.replace(LONE_SURROGATE, "?");
}

function isMapLike(value: unknown): value is Record<string, unknown> | Map<unknown, unknown> {
  return value instanceof Map || isPlainRecord(value);
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  if (typeof value === "string") {
    return sanitizeString(value);
  }
  return value;
}

/**
 * Converts candidate property values into what the graph store accepts:
 * scalars and arrays. Nested maps become JSON strings.
 */
export class PropertyNormalizer {
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? componentLogger("PropertyNormalizer");
  }

  normalizeProperties(properties: Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>): StoredProperties {
    const entries = properties instanceof Map ? [...properties.entries()] : Object.entries(properties);
    const normalized: StoredProperties = {};

    for (const [key, value] of entries) {
      if (value === undefined) {
        continue;
      }
      normalized[key] = this.normalizeProperty(value, 0, key);
    }

    return normalized;
  }

  /**
   * Depth 0 is an entry of the top-level property bag. A map found there, or
   * anywhere deeper, is stored as its JSON encoding.
   */
  normalizeProperty(value: unknown, depth = 0, key?: string): StoredPropertyValue {
    try {
      return this.normalizeValue(value, depth);
    } catch (error) {
      this.logger.error(
        { key, depth, err: error instanceof Error ? error.message : String(error) },
        "Property normalization failed, storing null"
      );
      return null;
    }
  }

  private normalizeValue(value: unknown, depth: number): StoredPropertyValue {
    if (value === null || value === undefined) {
      return null;
    }

    switch (typeof value) {
      case "string":
        return sanitizeString(value);
      case "number":
        return Number.isFinite(value) ? value : null;
      case "boolean":
        return value;
      default:
        break;
    }

    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? null : value.toISOString();
    }

    if (Array.isArray(value)) {
      return this.normalizeArray(value, depth);
    }

    if (isMapLike(value)) {
      return JSON.stringify(value, jsonReplacer);
    }

    const fallback = String(value);
    this.logger.warn({ depth, valueType: typeof value }, "Unknown property type, storing string form");
    return sanitizeString(fallback);
  }

  /**
   * The store only takes flat, homogeneous lists: nested lists are flattened,
   * nulls dropped, and a list mixing kinds is stored as strings.
   */
  private normalizeArray(items: readonly unknown[], depth: number): StoredPropertyValue[] {
    const leaves: PropertyScalar[] = [];
    this.collectLeaves(items, depth + 1, leaves);

    const kinds = new Set(leaves.map((leaf) => typeof leaf));
    if (kinds.size <= 1) {
      return leaves;
    }
    return leaves.map((leaf) => String(leaf));
  }

  private collectLeaves(items: readonly unknown[], depth: number, leaves: PropertyScalar[]): void {
    for (const item of items) {
      if (Array.isArray(item)) {
        this.collectLeaves(item, depth + 1, leaves);
        continue;
      }
      const normalized = this.normalizeProperty(item, depth);
      if (normalized !== null && !Array.isArray(normalized)) {
        leaves.push(normalized);
      }
    }
  }
}
