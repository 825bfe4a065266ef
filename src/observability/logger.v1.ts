// src/observability/logger.v1.ts
// pino logger for code running outside Fastify (scripts, standalone hosts).
// Inside the server the core receives `app.log`, which satisfies MarketLogger.

import pino, { type BaseLogger, type Logger } from "pino";

export type MarketLogger = Pick<BaseLogger, "info" | "warn" | "error" | "debug">;

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const isTestTooling = process.env.VITEST === "true" || nodeEnv === "test";

  return pino({
    level: process.env.LOG_LEVEL ?? "info",
    enabled: !isTestTooling,
    base: { ...bindings, service: "license-market" },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
