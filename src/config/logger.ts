import { pino, type Logger } from "pino";
import type { AppConfig } from "./env.js";

/** Root logger; Fastify gets it as its loggerInstance and services take children. */
export function createLogger(config: Pick<AppConfig, "logLevel">): Logger {
  return pino({
    level: config.logLevel,
    base: { service: "flight-schedule-search" },
    redact: ["req.headers.authorization"],
  });
}
