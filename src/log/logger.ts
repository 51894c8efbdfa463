import pino, { type Logger } from "pino";

export type { Logger };

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || "info",
  base: { service: "biomed-digest" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export const getLogger = (module: string): Logger => logger.child({ module });
