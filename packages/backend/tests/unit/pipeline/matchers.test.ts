import { describe, expect, it } from "vitest";
import { AddressMatcher } from "../../../src/pipeline/matchers/AddressMatcher.js";
import { AssetMatcher, extractBrand, extractModel } from "../../../src/pipeline/matchers/AssetMatcher.js";
import { universalIdentifierMatch } from "../../../src/pipeline/matchers/BaseNodeMatcher.js";
import { DefaultMatcher } from "../../../src/pipeline/matchers/DefaultMatcher.js";
import { NodeMatcherRegistry } from "../../../src/pipeline/matchers/NodeMatcherRegistry.js";
import { PersonMatcher } from "../../../src/pipeline/matchers/PersonMatcher.js";
import type { EqualityMethod, NodeMatcher } from "../../../src/pipeline/matchers/types.js";
import type { PropertySource } from "../../../src/pipeline/propertyAccess.js";
import { stringSimilarity } from "../../../src/pipeline/similarity.js";
import { silentLogger } from "../../helpers/pipeline.js";

function method(matcher: NodeMatcher, id: string): EqualityMethod {
  const found = matcher.fuzzyEqualityMethods().find((item) => item.id === id);
  if (!found) {
    throw new Error(`unknown method ${id}`);
  }
  return found;
}

function evaluate(matcher: NodeMatcher, id: string, a: PropertySource, b: PropertySource): number | null {
  return matcher.evaluateMethod(method(matcher, id), a, b);
}

describe("stringSimilarity", () => {
  it("compares case-insensitively and handles empty strings", () => {
    expect(stringSimilarity("Acme", "ACME")).toBe(1);
    expect(stringSimilarity("", "")).toBe(1);
    expect(stringSimilarity("abc", "")).toBe(0);
    expect(stringSimilarity("kitten", "sitting")).toBeCloseTo(4 / 7, 6);
  });
});

describe("universal identifiers", () => {
  it("short-circuits on id, email, phone and ssn", () => {
    expect(universalIdentifierMatch({ id: "p-1" }, { id: "p-1" })).toBe("id");
    expect(universalIdentifierMatch({ email: "A@Example.com" }, { email: "a@example.com" })).toBe("email");
    expect(universalIdentifierMatch({ phone: "(555) 123-4567" }, { phone_number: "555.123.4567" })).toBe("phone");
    expect(universalIdentifierMatch({ phone: "12-34" }, { phone: "1234" })).toBeNull();
    expect(universalIdentifierMatch({ ssn: "123-45-6789" }, { ssn: "123456789" })).toBe("ssn");
  });
});

describe("DefaultMatcher", () => {
  const matcher = new DefaultMatcher(silentLogger);

  it("fires name similarity only at 0.9 or above", () => {
    expect(evaluate(matcher, "name_similarity_match", { name: "Acme Corporation" }, { name: "Acme Corporations" })).toBeCloseTo(
      16 / 17,
      6
    );
    expect(evaluate(matcher, "name_similarity_match", { name: "Acme" }, { name: "Apex" })).toBeNull();
    expect(evaluate(matcher, "name_similarity_match", { title: "Report" }, { name: "report" })).toBe(1);
  });

  it("matches equal descriptions at a fixed score", () => {
    expect(
      evaluate(matcher, "description_match", { description: "A  small widget" }, { description: "a small widget" })
    ).toBe(0.8);
  });

  it("uses the configured vector threshold", () => {
    expect(matcher.similarityThreshold()).toBe(0.8);
    expect(new DefaultMatcher(silentLogger, 0.7).similarityThreshold()).toBe(0.7);
  });

  it("treats a method that throws as not firing", () => {
    const failing: EqualityMethod = {
      id: "failing",
      weight: 1,
      evaluate: () => {
        throw new Error("boom");
      }
    };
    expect(matcher.evaluateMethod(failing, {}, {})).toBeNull();
  });

  it("builds embedding text from name, title and description", () => {
    expect(matcher.embeddingText({ name: "Widget", description: "Blue", other: "x" })).toBe("Widget. Blue");
  });
});

describe("AddressMatcher", () => {
  const matcher = new AddressMatcher(silentLogger);
  const existing = { street: "123 North Main Street", city: "Springfield", state: "Illinois", postalCode: "62704" };
  const candidate = { street: "123 N Main St.", city: "springfield", state: "IL", zip: "62704-1234", country: "USA" };

  it("matches differently written forms of the same address", () => {
    expect(evaluate(matcher, "normalized_address_match", existing, candidate)).toBe(1);
    expect(evaluate(matcher, "street_number_street_name_match", existing, candidate)).toBe(1);
    expect(evaluate(matcher, "city_state_zip_match", existing, candidate)).toBeNull();
    expect(matcher.matchNodes(existing, candidate)).toBe(true);
  });

  it("does not match different house numbers on the same street", () => {
    expect(matcher.matchNodes({ street: "123 Main St" }, { street: "125 Main St" })).toBe(false);
  });

  it("matches partial addresses by city and state", () => {
    expect(
      evaluate(matcher, "city_state_zip_match", { city: "Springfield", state: "IL", zip: "62704" }, { city: "Springfield", state: "Illinois" })
    ).toBe(1);
  });

  it("matches coordinates within fifty meters", () => {
    const here = { latitude: 40, longitude: -89 };
    expect(evaluate(matcher, "coordinate_proximity_match", here, { lat: 40, lng: -89 })).toBe(1);
    expect(evaluate(matcher, "coordinate_proximity_match", here, { latitude: 40.0001, longitude: -89 })).toBeCloseTo(
      0.7776,
      3
    );
    expect(evaluate(matcher, "coordinate_proximity_match", here, { latitude: 40.001, longitude: -89 })).toBeNull();
  });

  it("has its own vector threshold", () => {
    expect(matcher.similarityThreshold()).toBe(0.75);
  });
});

describe("PersonMatcher", () => {
  const matcher = new PersonMatcher(silentLogger);

  it("matches phones by containment with at least eight digits", () => {
    expect(evaluate(matcher, "exact_phone_match", { phone: "+1 555 123 4567" }, { phone: "555-123-4567" })).toBe(1);
    expect(evaluate(matcher, "exact_phone_match", { phone: "1234567" }, { phone: "1234567" })).toBeNull();
  });

  it("matches government identifiers as alphanumerics", () => {
    expect(evaluate(matcher, "government_id_match", { passport_number: "x12 345" }, { passport_number: "X12345" })).toBe(1);
  });

  it("matches aliases in either direction", () => {
    expect(evaluate(matcher, "alias_match", { name: "Robert Jones" }, { name: "Bob Jones", aliases: ["Robert Jones"] })).toBe(
      0.85
    );
    expect(evaluate(matcher, "alias_match", { name: "Bobby", aka: "Rob; Bobby" }, { name: "Rob" })).toBe(0.85);
  });

  it("scores full names and surname with initial", () => {
    expect(evaluate(matcher, "full_name_similarity_match", { name: "Jane Doe" }, { first_name: "jane", last_name: "doe" })).toBe(
      0.9
    );
    expect(evaluate(matcher, "last_name_first_initial_match", { name: "J. Doe" }, { name: "Jane Doe" })).toBe(0.6);
    expect(evaluate(matcher, "last_name_first_initial_match", { name: "Mark Doe" }, { name: "Jane Doe" })).toBeNull();
  });

  it("requires a shared email domain for the domain method", () => {
    expect(
      evaluate(
        matcher,
        "full_name_email_domain_match",
        { name: "Jane Doe", email: "jane@corp.test" },
        { name: "Jane Doe", email: "j.doe@corp.test" }
      )
    ).toBe(1);
    expect(
      evaluate(
        matcher,
        "full_name_email_domain_match",
        { name: "Jane Doe", email: "jane@corp.test" },
        { name: "Jane Doe", email: "jane@other.test" }
      )
    ).toBeNull();
  });
});

describe("AssetMatcher", () => {
  const matcher = new AssetMatcher(silentLogger);

  it("matches serial numbers case-insensitively across keys", () => {
    expect(evaluate(matcher, "exact_serial_number_match", { serial_number: "SN-1" }, { serial: "sn-1" })).toBe(1);
  });

  it("matches unique identifiers after stripping punctuation", () => {
    expect(evaluate(matcher, "exact_unique_identifier_match", { vin: "1hg-cm82633a" }, { vin: "1HGCM82633A" })).toBe(1);
  });

  it("scores brand and model agreement", () => {
    expect(
      evaluate(
        matcher,
        "brand_and_model_match",
        { name: "Ford F-150", brand: "Ford", model: "F-150" },
        { name: "Ford F150 truck", make: "Ford", model: "F150" }
      )
    ).toBeCloseTo(0.9, 6);
  });

  it("blocks name and model methods when explicit brands disagree", () => {
    const ford = { name: "truck", brand: "Ford" };
    const chevy = { name: "truck", brand: "Chevy" };
    expect(evaluate(matcher, "asset_name_similarity_match", ford, chevy)).toBeNull();
    expect(evaluate(matcher, "brand_and_model_match", ford, chevy)).toBeNull();
    expect(matcher.matchNodes(ford, chevy)).toBe(false);
  });

  it("infers brand and model from a multi-word name", () => {
    expect(extractBrand({ name: "The Makita XR400 drill" })).toBe("makita");
    expect(extractModel({ name: "The Makita XR400 drill" })).toBe("xr400");
    expect(extractBrand({ name: "drill" })).toBeUndefined();
  });
});

describe("NodeMatcherRegistry", () => {
  const registry = new NodeMatcherRegistry({ logger: silentLogger, defaultSimilarityThreshold: 0.7 });

  it("maps types to matcher variants case-insensitively", () => {
    expect(registry.kindFor("Address")).toBe("address");
    expect(registry.kindFor("ADDRESS")).toBe("address");
    expect(registry.kindFor("contact")).toBe("person");
    expect(registry.kindFor("User")).toBe("person");
    expect(registry.kindFor("vehicle")).toBe("asset");
    expect(registry.kindFor("Widget")).toBe("default");
    expect(registry.kindFor("")).toBe("default");
  });

  it("passes the default threshold to matchers without their own", () => {
    expect(registry.forType("Widget").similarityThreshold()).toBe(0.7);
    expect(registry.forType("Person").similarityThreshold()).toBe(0.85);
  });

  it("accepts extra type mappings", () => {
    const custom = new NodeMatcherRegistry({ logger: silentLogger, typeMapping: { Employee: "person" } });
    expect(custom.kindFor("employee")).toBe("person");
  });
});
