import { describe, expect, it } from "vitest";
import { PropertyNormalizer, sanitizeString } from "../../../src/pipeline/PropertyNormalizer.js";
import { silentLogger } from "../../helpers/pipeline.js";

describe("PropertyNormalizer", () => {
  const normalizer = new PropertyNormalizer({ logger: silentLogger });

  it("passes scalars through and nulls non-finite numbers", () => {
    expect(normalizer.normalizeProperties({ name: "Ada", age: 36, active: true, empty: null })).toEqual({
      name: "Ada",
      age: 36,
      active: true,
      empty: null
    });
    expect(normalizer.normalizeProperty(Number.NaN)).toBeNull();
    expect(normalizer.normalizeProperty(Number.POSITIVE_INFINITY)).toBeNull();
  });

  it("converts dates to ISO strings", () => {
    expect(normalizer.normalizeProperty(new Date("2024-03-01T12:00:00.000Z"))).toBe("2024-03-01T12:00:00.000Z");
    expect(normalizer.normalizeProperty(new Date("not a date"))).toBeNull();
  });

  it("keeps homogeneous arrays as they are", () => {
    expect(normalizer.normalizeProperty([1, 2.5, 3])).toEqual([1, 2.5, 3]);
    expect(normalizer.normalizeProperty(["a", new Date("2024-01-02T00:00:00.000Z")])).toEqual([
      "a",
      "2024-01-02T00:00:00.000Z"
    ]);
    expect(normalizer.normalizeProperty([])).toEqual([]);
  });

  it("flattens nested arrays, drops nulls and stringifies mixed kinds", () => {
    expect(normalizer.normalizeProperties({ tags: ["a", 1, null, ["b", "c"], { k: 1 }] })).toEqual({
      tags: ["a", "1", "b", "c", '{"k":1}']
    });
    expect(normalizer.normalizeProperty([[1, [2]], null, 3])).toEqual([1, 2, 3]);
    expect(normalizer.normalizeProperty([true, 0])).toEqual(["true", "0"]);
  });

  it("stores a nested map at depth 0 as JSON that parses back to the same map", () => {
    const nested = { city: "Springfield", codes: [1, 2], inner: { ok: true } };
    const result = normalizer.normalizeProperties({ address: nested, label: "home" });

    expect(result.label).toBe("home");
    expect(typeof result.address).toBe("string");
    expect(JSON.parse(String(result.address))).toEqual(nested);
  });

  it("serializes Map instances and drops undefined keys", () => {
    const result = normalizer.normalizeProperties(
      new Map<string, unknown>([
        ["meta", new Map([["a", 1]])],
        ["skip", undefined]
      ])
    );
    expect(result).toEqual({ meta: '{"a":1}' });
  });

  it("replaces lone surrogates", () => {
    expect(sanitizeString("ok\uD800x")).toBe("ok?x");
    expect(sanitizeString("pair 😀")).toBe("pair 😀");
  });

  it("yields null for a value that cannot be serialized and keeps the rest", () => {
    const cyclic: Record<string, unknown> = { name: "loop" };
    cyclic.self = cyclic;

    expect(normalizer.normalizeProperties({ bad: cyclic, good: "yes" })).toEqual({ bad: null, good: "yes" });
    expect(normalizer.normalizeProperty({ big: 10n })).toBeNull();
  });

  it("stores unknown object types as their string form", () => {
    class Token {
      toString(): string {
        return "token-1";
      }
    }
    expect(normalizer.normalizeProperty(new Token())).toBe("token-1");
    expect(normalizer.normalizeProperty(5n)).toBe("5");
  });
});
