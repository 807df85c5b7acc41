import { pino } from "pino";
import type { Logger } from "pino";

const logger: Logger = pino({
  name: "ber-tree",
  level: process.env.LOG_LEVEL || "info",
  transport:
    process.env.NODE_ENV === "development"
      ? {
          target: "pino-pretty",
          options: { colorize: true },
        }
      : undefined,
});

export default logger;

export function createLogger(name: string): Logger {
  return logger.child({ name });
}
