import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import type { AbstractGraphStore } from "@graphmerge/shared";
import { appConfig } from "./config.js";
import { requestLogger } from "./middleware/logger.js";
import { apiRateLimiter, importRateLimiter } from "./middleware/rateLimiter.js";
import { createGraphRouter } from "./routes/graph.js";
import { createHealthRouter, type ServiceCheck } from "./routes/health.js";
import { createImportsRouter } from "./routes/imports.js";
import { createReviewsRouter } from "./routes/reviews.js";
import type { ImportOrchestrator } from "./pipeline/ImportOrchestrator.js";
import type { ReviewService } from "./services/ReviewService.js";
import { logger } from "./utils/logger.js";

/** Overrides for the runtime singletons; tests pass in-process stand-ins. */
export interface CreateAppOptions {
  store?: AbstractGraphStore;
  orchestrator?: ImportOrchestrator;
  reviewService?: ReviewService;
  checkNeo4j?: ServiceCheck;
  checkEmbedding?: ServiceCheck;
}

export function createApp(options: CreateAppOptions = {}): express.Express {
  const app = express();

  app.use(requestLogger);
  app.use(
    cors({
      origin: appConfig.CORS_ORIGIN
    })
  );
  app.use(express.json({ limit: appConfig.MAX_REQUEST_SIZE }));
  app.use(apiRateLimiter);

  app.use("/api/imports", importRateLimiter, createImportsRouter({ orchestrator: options.orchestrator }));
  app.use("/api/reviews", createReviewsRouter({ service: options.reviewService }));
  app.use("/api/graph", createGraphRouter({ store: options.store }));
  app.use(
    "/api/health",
    createHealthRouter({
      store: options.store,
      checkNeo4j: options.checkNeo4j,
      checkEmbedding: options.checkEmbedding
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
