import pino from "pino";

const env = process.env.NODE_ENV;
const pretty = env !== "production" && env !== "test";

/**
 * Root logger, shared by Fastify (`loggerInstance`) and the background
 * target managers. The level is lowered/raised from `--log.level` at startup.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || (env === "test" ? "silent" : "info"),
  ...(pretty
    ? {
        transport: {
          target: "pino-pretty",
          options: { colorize: true },
        },
      }
    : {}),
});

export type { BaseLogger } from "pino";
