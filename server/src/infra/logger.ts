// server/src/infra/logger.ts
import pino, { type Logger } from "pino";

export type { Logger };

export function createLogger(level: string = "info"): Logger {
  return pino({
    level,
    base: { service: "chat-trivia" },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
