/**
 * Shared pino logger.
 *
 * Pretty-printed through pino-pretty outside production, structured JSON in
 * production. The scraper core logs through children of this instance; the
 * server entry sets its level from the configuration.
 */

import pino, { type Logger } from "pino";

const isDev = process.env.NODE_ENV !== "production";

export type { Logger };

export function createLogger(level = process.env.LOG_LEVEL || "info"): Logger {
  if (process.env.NODE_ENV === "test") {
    return pino({ level: "silent" });
  }

  return isDev
    ? pino({
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true },
        },
      })
    : pino({
        level,
        // Bearer tokens never reach the logs
        redact: ["req.headers.authorization"],
      });
}

export const logger = createLogger();
