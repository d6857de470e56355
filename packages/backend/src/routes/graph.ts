import { Router } from "express";
import type { AbstractGraphStore, GraphStatsResponse } from "@graphmerge/shared";
import { ensureGraphStoreConnected, getGraphStoreSingleton } from "../runtime/graphRuntime.js";
import { createStoreReadyGuard } from "./storeReady.js";

interface CreateGraphRouterOptions {
  store?: AbstractGraphStore;
  ensureStoreConnected?: () => Promise<void>;
}

export function createGraphRouter(options: CreateGraphRouterOptions = {}): Router {
  const store = options.store ?? getGraphStoreSingleton();
  const ensureStoreConnected =
    options.ensureStoreConnected ??
    (options.store ? () => store.connect() : () => ensureGraphStoreConnected(store));
  const ensureStoreReady = createStoreReadyGuard(ensureStoreConnected);
  const graphRouter = Router();

  graphRouter.get("/stats", async (_req, res, next) => {
    if (!(await ensureStoreReady(res))) {
      return;
    }

    try {
      const stats = await store.getStats();
      const response: GraphStatsResponse = {
        nodeCount: stats.nodeCount,
        relationshipCount: stats.relationshipCount,
        labelDistribution: stats.labelDistribution,
        relationshipTypeDistribution: stats.relationshipTypeDistribution
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  return graphRouter;
}
