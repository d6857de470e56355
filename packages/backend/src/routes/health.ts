import { Router } from "express";
import type { AbstractGraphStore, HealthResponse } from "@graphmerge/shared";
import { appConfig } from "../config.js";
import {
  ensureGraphStoreConnected,
  getEmbeddingServiceSingleton,
  getGraphStoreSingleton
} from "../runtime/graphRuntime.js";
import type { EmbeddingGateway } from "../services/embeddingTypes.js";
import { componentLogger, type Logger } from "../utils/logger.js";

export type ServiceConnectionStatus = "ok" | "failed" | "not_configured";

export type ServiceCheck = () => Promise<ServiceConnectionStatus>;

interface CreateHealthRouterOptions {
  store?: AbstractGraphStore;
  embeddings?: EmbeddingGateway;
  ensureStoreConnected?: () => Promise<void>;
  checkNeo4j?: ServiceCheck;
  checkEmbedding?: ServiceCheck;
  startTime?: number;
  logger?: Logger;
}

function hasValue(value: string): boolean {
  return value.trim().length > 0;
}

/**
 * Wraps a boolean health call into a status. A dependency that throws is
 * reported as failed and logged with the reason.
 */
function serviceCheck(
  service: string,
  configured: () => boolean,
  healthy: () => Promise<boolean>,
  logger: Logger
): ServiceCheck {
  return async () => {
    if (!configured()) {
      return "not_configured";
    }
    try {
      return (await healthy()) ? "ok" : "failed";
    } catch (error) {
      logger.warn({ service, err: error instanceof Error ? error.message : String(error) }, "Health check failed");
      return "failed";
    }
  };
}

function neo4jCheck(options: CreateHealthRouterOptions, logger: Logger): ServiceCheck {
  const injected = options.store;
  return serviceCheck(
    "neo4j",
    () =>
      injected !== undefined ||
      (hasValue(appConfig.NEO4J_URI) && hasValue(appConfig.NEO4J_USER) && hasValue(appConfig.NEO4J_PASSWORD)),
    async () => {
      const store = injected ?? getGraphStoreSingleton();
      const connect =
        options.ensureStoreConnected ?? (injected ? () => store.connect() : () => ensureGraphStoreConnected(store));
      await connect();
      return store.healthCheck();
    },
    logger
  );
}

function embeddingCheck(options: CreateHealthRouterOptions, logger: Logger): ServiceCheck {
  const injected = options.embeddings;
  return serviceCheck(
    "embedding",
    () => injected !== undefined || hasValue(appConfig.EMBEDDING_API_KEY),
    async () => {
      const embeddings = injected ?? getEmbeddingServiceSingleton();
      return embeddings.healthCheck ? embeddings.healthCheck() : true;
    },
    logger
  );
}

export function createHealthRouter(options: CreateHealthRouterOptions = {}): Router {
  const logger = options.logger ?? componentLogger("health");
  const checkNeo4j = options.checkNeo4j ?? neo4jCheck(options, logger);
  const checkEmbedding = options.checkEmbedding ?? embeddingCheck(options, logger);
  const startTime = options.startTime ?? Date.now();

  const healthRouter = Router();

  healthRouter.get("/", async (_req, res) => {
    const [neo4j, embedding] = await Promise.all([checkNeo4j(), checkEmbedding()]);
    const status: HealthResponse["status"] =
      neo4j === "failed" || embedding === "failed" ? "degraded" : "ok";

    const mem = process.memoryUsage();
    const response: HealthResponse = {
      status,
      timestamp: new Date().toISOString(),
      uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
      checks: {
        neo4j,
        embedding
      },
      memoryUsage: {
        rss: mem.rss,
        heapUsed: mem.heapUsed,
        heapTotal: mem.heapTotal
      }
    };
    res.json(response);
  });

  return healthRouter;
}
