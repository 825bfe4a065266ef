// Wallet routes (actor). The dev top-up stands in for the external currency
// and is only registered when the server allows it.

import type { FastifyInstance } from "fastify";

import type { MarketHostV1 } from "../../market/marketHost.v1";
import type { MarketRegisterOptions } from "./marketplace.routes";
import { TopUpBodySchema } from "./schemas";
import { requireActorAddress } from "./utils";

export function registerOwnershipRoutes(app: FastifyInstance, host: MarketHostV1, opts: MarketRegisterOptions) {
  // GET /market/wallet
  app.get("/wallet", async (req, reply) => {
    const actor = requireActorAddress(req, reply, opts.getActorAddress);
    if (!actor) return reply;

    const entries = host.wallets.ledger(actor).map((t) => ({ ...t, amount: t.amount.toString() }));
    return reply.send({
      ok: true,
      address: actor,
      balance: host.wallets.balanceOf(actor).toString(),
      count: entries.length,
      entries,
    });
  });

  if (!opts.allowDevTopup) return;

  // POST /market/wallet/dev/topup
  // body: { amount }
  app.post("/wallet/dev/topup", async (req, reply) => {
    const actor = requireActorAddress(req, reply, opts.getActorAddress);
    if (!actor) return reply;

    const { amount } = TopUpBodySchema.parse(req.body ?? {});
    const balance = host.wallets.topUp(actor, amount);
    return reply.send({ ok: true, message: "TOPUP_OK", amount: amount.toString(), balance: balance.toString() });
  });
}
