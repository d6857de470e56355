import { describe, expect, it } from "vitest";
import type { GraphNode } from "@graphmerge/shared";
import { clampConfidence, ConfidenceScorer } from "../../../src/pipeline/ConfidenceScorer.js";
import { HumanReviewManager } from "../../../src/pipeline/HumanReviewManager.js";
import { NodeMatcherRegistry } from "../../../src/pipeline/matchers/NodeMatcherRegistry.js";
import { silentLogger } from "../../helpers/pipeline.js";

const registry = new NodeMatcherRegistry({ logger: silentLogger });

describe("ConfidenceScorer", () => {
  const scorer = new ConfidenceScorer(registry);

  it("scores an exact universal identifier as 1 without running methods", () => {
    const score = scorer.score("Person", { name: "Jonathan Smith", email: "jon@example.com" }, { name: "Jon Smith", email: "JON@example.com" });
    expect(score.confidence).toBe(1);
    expect(score.universalMatch).toBe("email");
    expect(score.firedMethods).toEqual([]);
  });

  it("merges the same address written two ways", () => {
    const score = scorer.score(
      "Address",
      { street: "123 North Main Street", city: "Springfield", state: "Illinois", postalCode: "62704" },
      { street: "123 N Main St.", city: "springfield", state: "IL", zip: "62704-1234", country: "USA" }
    );
    expect(score.firedMethods.map((method) => method.id)).toEqual([
      "normalized_address_match",
      "street_number_street_name_match"
    ]);
    expect(score.modifiers.richness).toBe(0.1);
    expect(score.confidence).toBe(1);
    expect(scorer.decide(score.confidence)).toBe("auto_merge");
  });

  it("applies the sparsity penalty to name-only people", () => {
    const score = scorer.score("Person", { name: "Jane Doe" }, { name: "Jane Doe" });
    expect(score.firedMethods.map((method) => method.id)).toEqual([
      "full_name_similarity_match",
      "last_name_first_initial_match"
    ]);
    expect(score.modifiers.sparsity).toBe(0.2);
    expect(score.confidence).toBe(0.58);
    expect(scorer.decide(score.confidence)).toBe("human_review");
  });

  it("adds the richness bonus when both sides carry three identifying fields", () => {
    const person = { first_name: "Jane", last_name: "Doe", date_of_birth: "1990-01-01" };
    const score = scorer.score("Person", person, { ...person });
    expect(score.modifiers).toEqual({ richness: 0.1, sparsity: 0, genericity: 0 });
    expect(score.confidence).toBe(0.88);
  });

  it("rejects generic assets of conflicting brands", () => {
    const score = scorer.score("Vehicle", { name: "truck", brand: "Ford" }, { name: "truck", brand: "Chevy" });
    expect(score.firedMethods).toEqual([]);
    expect(score.modifiers).toEqual({ richness: 0, sparsity: 0, genericity: 0.15 });
    expect(score.confidence).toBe(0);
    expect(scorer.decide(score.confidence)).toBe("auto_reject");
  });

  it("partitions scores with inclusive boundaries", () => {
    expect(scorer.decide(1)).toBe("auto_merge");
    expect(scorer.decide(0.9)).toBe("auto_merge");
    expect(scorer.decide(0.8999)).toBe("human_review");
    expect(scorer.decide(0.3001)).toBe("human_review");
    expect(scorer.decide(0.3)).toBe("auto_reject");
    expect(scorer.decide(0)).toBe("auto_reject");
  });

  it("honors configured thresholds", () => {
    const strict = new ConfidenceScorer(registry, { autoMergeThreshold: 0.95, autoRejectThreshold: 0.5 });
    expect(strict.decide(0.9)).toBe("human_review");
    expect(strict.decide(0.5)).toBe("auto_reject");
  });

  it("clamps and rounds confidence", () => {
    expect(clampConfidence(1.2)).toBe(1);
    expect(clampConfidence(-0.5)).toBe(0);
    expect(clampConfidence(Number.NaN)).toBe(0);
    expect(clampConfidence(0.1234567)).toBe(0.123457);
  });
});

describe("HumanReviewManager", () => {
  const scorer = new ConfidenceScorer(registry);
  const createdAt = new Date("2024-05-01T10:00:00.000Z");
  const manager = new HumanReviewManager(scorer, { createId: () => "review-1", now: () => createdAt });
  const existing: GraphNode = { id: "node-9", labels: ["Person"], properties: { name: "Jane Doe" } };

  it("emits a pending review for uncertain matches without persisting it", () => {
    const evaluation = manager.evaluate("Person", existing, { name: "Jane Doe" });

    expect(evaluation.decision).toEqual({
      score: 0.58,
      action: "human_review",
      reason: "matched by full_name_similarity_match, last_name_first_initial_match (confidence 0.580)",
      reviewId: "review-1"
    });
    expect(evaluation.pendingReview).toEqual({
      id: "review-1",
      nodeType: "Person",
      existingNodeId: "node-9",
      existingProperties: { name: "Jane Doe" },
      candidateProperties: { name: "Jane Doe" },
      confidenceScore: 0.58,
      status: "pending",
      createdAt
    });
  });

  it("decides certain matches without a review", () => {
    const evaluation = manager.evaluate(
      "Person",
      { ...existing, properties: { name: "Jane Doe", email: "jane@corp.test" } },
      { email: "jane@corp.test" }
    );
    expect(evaluation.decision).toEqual({
      score: 1,
      action: "auto_merge",
      reason: "exact email match (confidence 1.000)"
    });
    expect(evaluation.pendingReview).toBeUndefined();
  });
});
