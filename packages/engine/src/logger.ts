import pino, { type Logger } from "pino";

export type { Logger };

/** Root pino logger shared by the engine and the HTTP server. */
export function createLogger(level: string = process.env.LOG_LEVEL ?? "info"): Logger {
  return pino({ level, base: { service: "wayfarer" } });
}
