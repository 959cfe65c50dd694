import { pino, type BaseLogger, type Logger } from "pino";

export type { BaseLogger };

/** Standalone logger for components constructed outside a Fastify server */
export function createLogger(name: string): Logger {
  return pino({ name, level: process.env["LOG_LEVEL"] ?? "info" });
}
