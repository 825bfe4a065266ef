// src/server/index.ts
import "dotenv/config";

import { loadMarketConfigDefault, loadServerEnv } from "../config/marketConfig.v1";
import { makeLogger } from "../observability/logger.v1";
import { prepareServer } from "./app";

const bootLogger = makeLogger({ component: "server" });

async function main() {
  const env = loadServerEnv();
  const config = loadMarketConfigDefault(env);

  const { app } = await prepareServer(env, config, {
    allowDevTopup: process.env.NODE_ENV !== "production",
    announce: (line) => console.log(line),
  });

  await app.listen({ port: env.PORT, host: env.HOST });
  app.log.info({ purchaseFeeRateBp: config.purchaseFeeRateBp, tokenDecimals: config.tokenDecimals }, "market ready");
}

main().catch((err) => {
  bootLogger.error({ err }, "server failed to start");
  process.exit(1);
});
