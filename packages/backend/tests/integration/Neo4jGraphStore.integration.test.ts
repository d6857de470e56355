import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { GenericContainer, type StartedTestContainer } from "testcontainers";
import { Neo4jGraphStore } from "../../src/store/Neo4jGraphStore.js";
import type { ImportInput } from "../../src/pipeline/ImportOrchestrator.js";
import { createPipeline } from "../helpers/pipeline.js";

const runIntegration = process.env.RUN_NEO4J_INTEGRATION === "true";

describe.skipIf(!runIntegration)("Neo4jGraphStore integration", () => {
  let container: StartedTestContainer;
  let store: Neo4jGraphStore;

  beforeAll(async () => {
    container = await new GenericContainer("neo4j:5.26.0")
      .withEnvironment({
        NEO4J_AUTH: "neo4j/testpassword"
      })
      .withExposedPorts(7687)
      .start();

    store = new Neo4jGraphStore({
      uri: `bolt://${container.getHost()}:${container.getMappedPort(7687)}`,
      user: "neo4j",
      password: "testpassword",
      embeddingDimensions: 3
    });

    await store.connect();
  }, 120_000);

  afterAll(async () => {
    await store?.disconnect();
    await container?.stop();
  });

  beforeEach(async () => {
    const nodes = await store.listNodes(undefined, { limit: 10_000 });
    for (const node of nodes) {
      await store.deleteNode(node.id);
    }
  });

  it("creates, finds and updates nodes", async () => {
    const created = await store.createNode("Person", { name: "Ada Lovelace", tags: ["math", "poetry"], born: 1815 });

    expect(await store.getNodeById(created.id)).toEqual(created);
    expect((await store.findNodes({ label: "Person", where: { name: "Ada Lovelace" } }))[0]?.id).toBe(created.id);
    expect(await store.findNodes({ label: "Company", where: { name: "Ada Lovelace" } })).toEqual([]);

    const [projected] = await store.listNodes("Person", { fields: ["name"] });
    expect(projected?.properties).toEqual({ name: "Ada Lovelace" });

    const [bySubstring] = await store.findNodesByPropertySubstring("lovelace", { label: "Person" });
    expect(bySubstring?.id).toBe(created.id);

    const updated = await store.updateNodeProperties(created.id, { email: "ada@example.test", born: null });
    expect(updated?.properties).toEqual({ name: "Ada Lovelace", tags: ["math", "poetry"], email: "ada@example.test" });
  });

  it("creates and finds relationships", async () => {
    const ada = await store.createNode("Person", { name: "Ada" });
    const company = await store.createNode("Company", { name: "Analytical Engines" });

    const relationship = await store.createRelationship(ada.id, "WORKS_FOR", company.id, { since: "1842" });

    expect(await store.findRelationship(ada.id, "WORKS_FOR", company.id)).toEqual(relationship);
    expect(await store.findRelationship(company.id, "WORKS_FOR", ada.id)).toBeNull();
    expect(await store.getRelationshipsByNode(company.id)).toEqual([relationship]);
  });

  it("ranks nodes from the vector index on the [0, 1] cosine scale", async () => {
    const exact = await store.createNode("Widget", { name: "exact" }, [1, 0, 0]);
    const orthogonal = await store.createNode("Widget", { name: "orthogonal" }, [0, 1, 0]);
    await store.createNode("Gadget", { name: "other label" }, [1, 0, 0]);

    const strict = await store.vectorSearch("Widget", [1, 0, 0], { threshold: 0.9 });
    expect(strict.map((result) => result.node.id)).toEqual([exact.id]);
    expect(strict[0]?.similarity).toBeCloseTo(1, 6);

    const loose = await store.vectorSearch("Widget", [1, 0, 0], { threshold: 0.5 });
    expect(loose.map((result) => result.node.id)).toEqual([exact.id, orthogonal.id]);
    expect(loose[1]?.similarity).toBeCloseTo(0.5, 6);
  });

  it("rejects query vectors of the wrong size", async () => {
    await expect(store.vectorSearch("Widget", [1, 0])).rejects.toThrow(
      "Query vector has 2 dimensions, the Widget index expects 3"
    );
  });

  it("imports candidates end to end without duplicating", async () => {
    const { orchestrator } = createPipeline(store);
    const input: ImportInput = {
      entities: [
        { type: "Person", properties: { name: "Ada Lovelace", email: "ada@example.test" } },
        { type: "Company", properties: { name: "Analytical Engines" } }
      ],
      relationships: [{ source: "Ada Lovelace", target: "Analytical Engines", type: "works for" }]
    };

    const first = await orchestrator.import(input);
    const second = await orchestrator.import(input);

    expect(first.nodes.created).toBe(2);
    expect(first.relationships.created).toBe(1);
    expect(second.nodes).toMatchObject({ created: 0, skipped: 2, duplicates: 2 });
    expect(second.relationships).toMatchObject({ created: 0, skipped: 1 });
    expect(await store.listNodes(undefined)).toHaveLength(2);
  });
});
