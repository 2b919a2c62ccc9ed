import pino from "pino";
import { config } from "./config";

export const logger = pino({
  name: config.serviceName,
  level: config.logLevel
});

export type { Logger } from "pino";
