// src/config/marketConfig.v1.ts
// Fee schedule + oracle scale (JSON, zod-validated) and process env.

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

function readJsonFile<T>(absPath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  if (!fs.existsSync(absPath)) throw new Error(`CONFIG_NOT_FOUND: ${absPath}`);
  const raw = fs.readFileSync(absPath, "utf8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`CONFIG_INVALID_JSON: ${absPath}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `CONFIG_SCHEMA_VIOLATION: ${absPath}\n` +
        result.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n")
    );
  }
  return result.data;
}

function repoRootConfigPath(filename: string) {
  return path.join(process.cwd(), "config", filename);
}

// ---- Schemas ----

const UsdAmountSchema = z
  .union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)])
  .transform((v) => BigInt(v));

export const MarketConfigSchema = z.object({
  purchaseFeeRateBp: z.number().int().min(0).max(10_000),
  submissionFeeUsd: UsdAmountSchema,
  tokenDecimals: z.number().int().min(0).max(18),
});

const ServerEnvSchema = z.object({
  HOST: z.string().min(1).default("127.0.0.1"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  MARKET_CONFIG_PATH: z.string().min(1).optional(),
  PLATFORM_CAP_HANDLE: z.string().min(8).optional(),
});

// ---- Types ----
export type MarketConfig = z.infer<typeof MarketConfigSchema>;
export type ServerEnv = z.infer<typeof ServerEnvSchema>;

export function loadMarketConfig(absPath: string): MarketConfig {
  return readJsonFile(absPath, MarketConfigSchema);
}

export function loadMarketConfigDefault(env: Pick<ServerEnv, "MARKET_CONFIG_PATH"> = {}): MarketConfig {
  const p = env.MARKET_CONFIG_PATH ? path.resolve(env.MARKET_CONFIG_PATH) : repoRootConfigPath("market.default.json");
  return loadMarketConfig(p);
}

export function loadServerEnv(source: NodeJS.ProcessEnv = process.env): ServerEnv {
  const result = ServerEnvSchema.safeParse(source);
  if (!result.success) {
    throw new Error(
      "ENV_SCHEMA_VIOLATION:\n" + result.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n")
    );
  }
  return result.data;
}
