import type { RequestHandler } from "express";
import { componentLogger } from "../utils/logger.js";

const httpLogger = componentLogger("http");

export const requestLogger: RequestHandler = (req, res, next) => {
  const startTime = Date.now();

  res.on("finish", () => {
    const entry = {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime
    };
    if (res.statusCode >= 500) {
      httpLogger.warn(entry, "HTTP request failed");
    } else {
      httpLogger.info(entry, "HTTP request");
    }
  });

  next();
};
