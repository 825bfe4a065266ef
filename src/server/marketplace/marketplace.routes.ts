// Market routes (API only, no UI)
// Design:
// - Every write goes through the ledger core; routes only parse, resolve
//   identity/capability handles and render views.
// - Amounts are decimal strings on the wire.
// - Errors surface as { ok: false, error: CODE, message } via handleRouteError.
//
// NOTE: These route modules take the host they operate on. Wire them into your server.

import type { FastifyInstance } from "fastify";

import type { MarketHostV1 } from "../../market/marketHost.v1";
import { registerAdminRoutes } from "./admin.routes";
import { registerCatalogRoutes } from "./catalog.routes";
import { registerListingsRoutes } from "./listings.routes";
import { registerOrdersRoutes } from "./orders.routes";
import { registerOwnershipRoutes } from "./ownership.routes";
import { type ActorResolver, handleRouteError } from "./utils";
import { registerWithdrawalRoutes } from "./withdrawals.routes";

export type MarketRegisterOptions = {
  basePath?: string; // default "/market"
  // Resolve the acting address (replace with your auth middleware).
  // If not provided, write routes require the `x-actor-address` header.
  getActorAddress?: ActorResolver;
  // Dev-only wallet top-up endpoint.
  allowDevTopup?: boolean;
};

export async function registerMarketRoutes(app: FastifyInstance, host: MarketHostV1, opts: MarketRegisterOptions = {}) {
  const basePath = opts.basePath ?? "/market";

  await app.register(
    async (subApp) => {
      subApp.setErrorHandler(handleRouteError);
      registerCatalogRoutes(subApp, host, opts);
      registerOrdersRoutes(subApp, host, opts);
      registerListingsRoutes(subApp, host, opts);
      registerWithdrawalRoutes(subApp, host, opts);
      registerOwnershipRoutes(subApp, host, opts);
      registerAdminRoutes(subApp, host, opts);
    },
    { prefix: basePath }
  );
}
