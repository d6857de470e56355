import pino, { type Logger } from "pino";
import { appConfig } from "../config.js";

export type { Logger };

export const logger = pino({
  level: appConfig.LOG_LEVEL
});

export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
