import { describe, expect, it, vi } from "vitest";
import type { PropertyMap } from "@graphmerge/shared";
import { ConfidenceScorer } from "../../../src/pipeline/ConfidenceScorer.js";
import { HumanReviewManager } from "../../../src/pipeline/HumanReviewManager.js";
import { NodeMatcherRegistry } from "../../../src/pipeline/matchers/NodeMatcherRegistry.js";
import { NodeResolver, type ResolveOptions, type ResolveRequest } from "../../../src/pipeline/NodeResolver.js";
import { PropertyNormalizer } from "../../../src/pipeline/PropertyNormalizer.js";
import { SimilaritySearch } from "../../../src/pipeline/SimilaritySearch.js";
import { FakeEmbeddingGateway } from "../../helpers/FakeEmbeddingGateway.js";
import { FakeGraphStore } from "../../helpers/FakeGraphStore.js";
import { silentLogger } from "../../helpers/pipeline.js";

const normalizer = new PropertyNormalizer({ logger: silentLogger });

function request(type: string, properties: PropertyMap, options: Partial<ResolveOptions> = {}): ResolveRequest {
  return {
    type,
    properties,
    stored: normalizer.normalizeProperties(properties),
    options: { enableVectorSearch: false, enableHumanReview: true, ...options }
  };
}

function createResolver(
  store: FakeGraphStore,
  options: { embeddings?: FakeEmbeddingGateway; fuzzyCandidateLimit?: number } = {}
): NodeResolver {
  const registry = new NodeMatcherRegistry({ logger: silentLogger });
  return new NodeResolver({
    store,
    registry,
    similaritySearch: new SimilaritySearch(store, registry, { logger: silentLogger }),
    reviewManager: new HumanReviewManager(new ConfidenceScorer(registry), { createId: () => "review-1" }),
    embeddings: options.embeddings,
    fuzzyCandidateLimit: options.fuzzyCandidateLimit,
    logger: silentLogger
  });
}

describe("NodeResolver", () => {
  it("resolves by id before any other strategy", async () => {
    const store = new FakeGraphStore();
    store.seed("Widget", { name: "Widget" });
    const target = store.seed("Widget", { id: "w-1", name: "Old name" });

    const resolution = await createResolver(store).resolve(request("Widget", { id: "w-1", name: "Widget" }));
    expect(resolution.strategy).toBe("constraint");
    expect(resolution.node?.id).toBe(target.id);
  });

  it("resolves by unique properties", async () => {
    const store = new FakeGraphStore();
    const target = store.seed("Person", { email: "a@corp.test", name: "Ann" });

    const resolution = await createResolver(store).resolve(request("Person", { email: "a@corp.test", name: "Annie" }));
    expect(resolution.strategy).toBe("constraint");
    expect(resolution.node?.id).toBe(target.id);
  });

  it("resolves by embedding similarity and keeps the vector", async () => {
    const store = new FakeGraphStore();
    const target = store.seed("Widget", { name: "Gadget" }, [1, 0]);
    const embeddings = new FakeEmbeddingGateway({ "Widget alpha": [1, 0] });

    const resolution = await createResolver(store, { embeddings }).resolve(
      request("Widget", { name: "Widget alpha" }, { enableVectorSearch: true })
    );
    expect(resolution.strategy).toBe("vector");
    expect(resolution.node?.id).toBe(target.id);
    expect(resolution.similarity).toBe(1);
    expect(resolution.embedding).toEqual([1, 0]);
  });

  it("skips the vector step when it is disabled", async () => {
    const store = new FakeGraphStore();
    store.seed("Widget", { name: "Gadget" }, [1, 0]);
    const embeddings = new FakeEmbeddingGateway({ "Widget alpha": [1, 0] });

    const resolution = await createResolver(store, { embeddings }).resolve(request("Widget", { name: "Widget alpha" }));
    expect(resolution.strategy).toBe("new");
    expect(resolution.node).toBeNull();
    expect(embeddings.requests).toEqual([]);
  });

  it("returns the full stored node for a fuzzy match without review", async () => {
    const store = new FakeGraphStore();
    const target = store.seed("Widget", { name: "Acme Corporation", color: "red" });

    const resolution = await createResolver(store).resolve(
      request("Widget", { name: "Acme Corporations" }, { enableHumanReview: false })
    );
    expect(resolution.strategy).toBe("fuzzy");
    expect(resolution.node).toEqual({
      id: target.id,
      labels: ["Widget"],
      properties: { name: "Acme Corporation", color: "red" }
    });
  });

  it("collects a pending review for an uncertain fuzzy match", async () => {
    const store = new FakeGraphStore();
    const existing = store.seed("Widget", { name: "Acme Corporation" });

    const resolution = await createResolver(store).resolve(request("Widget", { name: "Acme Corporations" }));
    expect(resolution.strategy).toBe("new");
    expect(resolution.pendingReviews).toHaveLength(1);
    expect(resolution.pendingReviews[0]?.existingNodeId).toBe(existing.id);
    expect(resolution.pendingReviews[0]?.id).toBe("review-1");
  });

  it("treats an already stored candidate as a certain match", async () => {
    const store = new FakeGraphStore();
    const existing = store.seed("Person", { name: "Jane Doe" });

    const resolution = await createResolver(store).resolve(request("Person", { name: "Jane Doe" }));
    expect(resolution.strategy).toBe("fuzzy");
    expect(resolution.node?.id).toBe(existing.id);
    expect(resolution.decision?.action).toBe("auto_merge");
    expect(resolution.pendingReviews).toEqual([]);
  });

  it("falls back to exact property equality beyond the fuzzy window", async () => {
    const store = new FakeGraphStore();
    store.seed("Widget", { name: "Other" });
    const target = store.seed("Widget", { name: "Target", code: 7 });

    const resolution = await createResolver(store, { fuzzyCandidateLimit: 1 }).resolve(
      request("Widget", { name: "Target", code: 7 })
    );
    expect(resolution.strategy).toBe("property");
    expect(resolution.node?.id).toBe(target.id);
  });

  it("treats a failing strategy as no match and continues", async () => {
    const store = new FakeGraphStore();
    const existing = store.seed("Widget", { id: "w-1", name: "Widget" });
    vi.spyOn(store, "findNodes").mockRejectedValueOnce(new Error("timeout"));

    const resolution = await createResolver(store).resolve(request("Widget", { id: "w-1", name: "Widget" }));
    expect(resolution.strategy).toBe("fuzzy");
    expect(resolution.node?.id).toBe(existing.id);
  });
});
