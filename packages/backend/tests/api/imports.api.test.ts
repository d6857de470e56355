import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { createImportsRouter } from "../../src/routes/imports.js";
import { buildPipeline, type TestPipeline } from "../helpers/pipeline.js";

function createTestApp(pipeline: TestPipeline): ReturnType<typeof express> {
  const app = express();
  app.use(express.json());
  app.use("/api/imports", createImportsRouter({ orchestrator: pipeline.orchestrator }));
  return app;
}

describe("imports api", () => {
  it("imports entities and relationships and returns statistics", async () => {
    const pipeline = buildPipeline();
    pipeline.store.seed("Company", { name: "Analytical Engines" });

    const response = await request(createTestApp(pipeline))
      .post("/api/imports")
      .send({
        entities: [{ type: "Person", properties: { name: "Ada", born: 1815 } }],
        relationships: [{ source: "Ada", target: "Analytical Engines", type: "works for" }]
      });

    expect(response.status).toBe(200);
    expect(response.body.statistics.nodes).toEqual({
      total: 1,
      created: 1,
      updated: 0,
      skipped: 0,
      errors: 0,
      duplicates: 0
    });
    expect(response.body.statistics.relationships).toEqual({ total: 1, created: 1, skipped: 0, errors: 0 });
    expect(response.body.statistics.cancelled).toBe(false);
    expect(typeof response.body.statistics.startedAt).toBe("string");
    expect(pipeline.store.nodesOf("Person")[0]?.properties).toEqual({ name: "Ada", born: 1815 });
  });

  it("applies request options", async () => {
    const pipeline = buildPipeline();

    const response = await request(createTestApp(pipeline))
      .post("/api/imports")
      .send({ entities: [{ type: "Widget", properties: { name: "Gizmo" } }], options: { dryRun: true } });

    expect(response.status).toBe(200);
    expect(response.body.statistics.nodes.created).toBe(1);
    expect(pipeline.store.nodes.size).toBe(0);
  });

  it("counts malformed items as skipped and imports the rest", async () => {
    const pipeline = buildPipeline();

    const response = await request(createTestApp(pipeline))
      .post("/api/imports")
      .send({
        entities: [{ type: "Person", properties: { name: "Ada" } }, { properties: { name: "No type" } }, "junk"],
        relationships: [{ source: "Ada" }, { source: "Ada", target: 7 }]
      });

    expect(response.status).toBe(200);
    expect(response.body.statistics.nodes).toEqual({
      total: 3,
      created: 1,
      updated: 0,
      skipped: 2,
      errors: 0,
      duplicates: 0
    });
    expect(response.body.statistics.relationships).toEqual({ total: 2, created: 0, skipped: 2, errors: 0 });
    expect(pipeline.store.nodesOf("Person").map((node) => node.properties)).toEqual([{ name: "Ada" }]);
  });

  it("rejects a malformed envelope or options", async () => {
    const app = createTestApp(buildPipeline());

    const badEntities = await request(app).post("/api/imports").send({ entities: "nope" });
    expect(badEntities.status).toBe(400);
    expect(badEntities.body.error).toBe("Validation failed");
    expect(badEntities.body.details[0].path).toBe("entities");

    const badOptions = await request(app).post("/api/imports").send({ options: { batchSize: 0 } });
    expect(badOptions.status).toBe(400);
    expect(badOptions.body.details[0].path).toBe("options.batchSize");
  });

  it("answers 503 when the graph store cannot be reached", async () => {
    const pipeline = buildPipeline({ ensureConnected: () => Promise.reject(new Error("connection refused")) });

    const response = await request(createTestApp(pipeline))
      .post("/api/imports")
      .send({ entities: [{ type: "Widget", properties: { name: "Gizmo" } }] });

    expect(response.status).toBe(503);
    expect(response.body).toEqual({ error: "Graph store unavailable" });
  });
});
