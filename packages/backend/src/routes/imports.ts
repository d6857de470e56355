import { Router } from "express";
import { z } from "zod";
import type { ImportResponse } from "@graphmerge/shared";
import { validate } from "../middleware/validator.js";
import type { ImportOrchestrator } from "../pipeline/ImportOrchestrator.js";
import { propertyMapSchema } from "../pipeline/propertySchema.js";
import { getImportOrchestratorSingleton } from "../runtime/graphRuntime.js";
import { logger } from "../utils/logger.js";

const endpointSchema = z.union([z.string(), z.array(z.string())]);

// A malformed item becomes an empty placeholder that the importers count as
// skipped; only a malformed envelope or options object fails the request.
const entitySchema = z
  .object({
    type: z.string(),
    properties: propertyMapSchema
  })
  .catch({ type: "", properties: {} });

const relationshipSchema = z
  .object({
    source: endpointSchema,
    target: endpointSchema,
    type: z.string().optional(),
    properties: propertyMapSchema.optional(),
    sourceType: z.string().optional(),
    targetType: z.string().optional()
  })
  .catch({ source: "", target: "" });

const importBodySchema = z.object({
  entities: z.array(entitySchema).default([]),
  relationships: z.array(relationshipSchema).default([]),
  options: z
    .object({
      dryRun: z.boolean().optional(),
      enableVectorSearch: z.boolean().optional(),
      similarityThreshold: z.number().min(0).max(1).optional(),
      enableHumanReview: z.boolean().optional(),
      batchSize: z.number().int().min(1).max(1000).optional(),
      concurrency: z.number().int().min(1).max(32).optional()
    })
    .default({})
});

interface CreateImportsRouterOptions {
  orchestrator?: ImportOrchestrator;
}

export function createImportsRouter(options: CreateImportsRouterOptions = {}): Router {
  const getOrchestrator = () => options.orchestrator ?? getImportOrchestratorSingleton();
  const importsRouter = Router();

  importsRouter.post("/", validate({ body: importBodySchema }), async (req, res) => {
    const body = importBodySchema.parse(req.body);

    // The run stops scheduling new candidates once the client goes away.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    try {
      const statistics = await getOrchestrator().import(
        { entities: body.entities, relationships: body.relationships },
        body.options,
        controller.signal
      );
      const response: ImportResponse = { statistics };
      res.json(response);
    } catch (error) {
      logger.error({ err: error }, "Import aborted before it started");
      res.status(503).json({ error: "Graph store unavailable" });
    }
  });

  return importsRouter;
}
