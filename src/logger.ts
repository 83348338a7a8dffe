import pino from "pino";
import { config } from "./config";

export const logger = pino({
  name: "spiral",
  level: config.logLevel
});

export const componentLogger = (component: string) => logger.child({ component });
