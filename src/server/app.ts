// src/server/app.ts
// Builds the Fastify app around a market host. index.ts listens; tests inject.

import cors from "@fastify/cors";
import Fastify, { type FastifyInstance } from "fastify";

import type { MarketConfig, ServerEnv } from "../config/marketConfig.v1";
import { MarketHostV1 } from "../market/marketHost.v1";
import { registerMarketRoutes, type MarketRegisterOptions } from "./marketplace/marketplace.routes";

export type BuildServerOptions = MarketRegisterOptions & {
  config: MarketConfig;
  logLevel?: string;
  // Fixes the platform capability handle instead of generating one.
  platformCapHandle?: string;
  // Pre-built host (tests, scripts); otherwise one is created on app.log.
  host?: MarketHostV1;
  // Log destination; stdout when omitted.
  logStream?: { write(msg: string): void };
};

export type BuiltServer = {
  app: FastifyInstance;
  host: MarketHostV1;
  platformCapHandle: string;
};

export async function buildServer(opts: BuildServerOptions): Promise<BuiltServer> {
  const level = opts.logLevel ?? "info";
  const app = Fastify({ logger: opts.logStream ? { level, stream: opts.logStream } : { level } });

  const host = opts.host ?? MarketHostV1.create({ config: opts.config, logger: app.log });
  const platformCapHandle = host.vault.deposit(host.platformCap, opts.platformCapHandle);

  await app.register(cors, { origin: true });

  app.get("/health", async () => ({ status: "ok" }));

  await registerMarketRoutes(app, host, {
    basePath: opts.basePath ?? "/market",
    getActorAddress: opts.getActorAddress,
    allowDevTopup: opts.allowDevTopup,
  });

  return { app, host, platformCapHandle };
}

/**
 * Builds the server from process settings. A generated platform handle is a
 * bearer credential: it goes to `announce` once and never into the log.
 */
export async function prepareServer(
  env: ServerEnv,
  config: MarketConfig,
  opts: { allowDevTopup: boolean; announce: (line: string) => void; logStream?: { write(msg: string): void } }
): Promise<BuiltServer> {
  const built = await buildServer({
    config,
    logLevel: env.LOG_LEVEL,
    platformCapHandle: env.PLATFORM_CAP_HANDLE,
    allowDevTopup: opts.allowDevTopup,
    logStream: opts.logStream,
  });
  if (!env.PLATFORM_CAP_HANDLE) opts.announce(`platform capability handle: ${built.platformCapHandle}`);
  return built;
}
