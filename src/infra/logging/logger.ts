import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export function createLogger(bindings: Record<string, unknown> = {}): Logger {
  return pino(
    {
      level: process.env.LOG_LEVEL || "info",
      base: { service: "knowledge-ingest", ...bindings },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    // stdout carries the run summary and the MCP stdio transport.
    pino.destination(2),
  );
}

export const logger = createLogger();
