import pino from "pino";

export type Logger = pino.Logger;

export const logger: Logger = pino({
  name: "video-archive",
  level: (process.env.LOG_LEVEL || "info").trim().toLowerCase(),
});

export function childLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
