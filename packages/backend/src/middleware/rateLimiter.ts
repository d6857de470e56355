import rateLimit from "express-rate-limit";
import { appConfig } from "../config.js";

export const apiRateLimiter = rateLimit({
  windowMs: appConfig.RATE_LIMIT_WINDOW_MS,
  limit: appConfig.RATE_LIMIT_MAX,
  standardHeaders: true,
  legacyHeaders: false
});

// Each import fans out into many store and embedding calls.
export const importRateLimiter = rateLimit({
  windowMs: appConfig.RATE_LIMIT_WINDOW_MS,
  limit: Math.max(1, Math.floor(appConfig.RATE_LIMIT_MAX / 10)),
  standardHeaders: true,
  legacyHeaders: false,
  message: { error: "Too many import requests, retry later" }
});
