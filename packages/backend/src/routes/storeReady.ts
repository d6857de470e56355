import type { Response } from "express";
import { logger } from "../utils/logger.js";

/** Answers 503 and returns false when the graph store cannot be reached. */
export function createStoreReadyGuard(
  ensureStoreConnected: () => Promise<void>
): (res: Response) => Promise<boolean> {
  return async (res) => {
    try {
      await ensureStoreConnected();
      return true;
    } catch (error) {
      logger.error({ err: error }, "Graph store connection failed");
      res.status(503).json({ error: "Graph store unavailable" });
      return false;
    }
  };
}
