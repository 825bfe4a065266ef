// Withdrawal routes. Each drains one pool in full into the caller's wallet.
// - platform pools: platform capability handle
// - per-game proceeds / royalties: that game's publisher capability handle
// - seller payouts: the caller's own address, no capability

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import type { MarketHostV1 } from "../../market/marketHost.v1";
import type { MarketRegisterOptions } from "./marketplace.routes";
import { capabilityHandle, requireActorAddress } from "./utils";

const GameParamsSchema = z.object({ gameId: z.string().min(1) });

export function registerWithdrawalRoutes(app: FastifyInstance, host: MarketHostV1, opts: MarketRegisterOptions) {
  const { vault } = host;

  app.post("/withdrawals/purchase-fees", async (req, reply) => {
    const actor = requireActorAddress(req, reply, opts.getActorAddress);
    if (!actor) return reply;

    const cap = vault.resolvePlatform(capabilityHandle(req));
    const amount = host.withdrawPurchaseFees(actor, cap);
    return reply.send({ ok: true, amount: amount.toString(), balance: host.wallets.balanceOf(actor).toString() });
  });

  app.post("/withdrawals/submission-fees", async (req, reply) => {
    const actor = requireActorAddress(req, reply, opts.getActorAddress);
    if (!actor) return reply;

    const cap = vault.resolvePlatform(capabilityHandle(req));
    const amount = host.withdrawSubmissionFees(actor, cap);
    return reply.send({ ok: true, amount: amount.toString(), balance: host.wallets.balanceOf(actor).toString() });
  });

  app.post("/withdrawals/games/:gameId/proceeds", async (req, reply) => {
    const actor = requireActorAddress(req, reply, opts.getActorAddress);
    if (!actor) return reply;

    const { gameId } = GameParamsSchema.parse(req.params);
    const cap = vault.resolvePublisher(capabilityHandle(req));
    const amount = host.withdrawGameProceeds(actor, cap, gameId);
    return reply.send({ ok: true, gameId, amount: amount.toString(), balance: host.wallets.balanceOf(actor).toString() });
  });

  app.post("/withdrawals/games/:gameId/royalties", async (req, reply) => {
    const actor = requireActorAddress(req, reply, opts.getActorAddress);
    if (!actor) return reply;

    const { gameId } = GameParamsSchema.parse(req.params);
    const cap = vault.resolvePublisher(capabilityHandle(req));
    const amount = host.withdrawRoyalties(actor, cap, gameId);
    return reply.send({ ok: true, gameId, amount: amount.toString(), balance: host.wallets.balanceOf(actor).toString() });
  });

  app.post("/withdrawals/payout", async (req, reply) => {
    const actor = requireActorAddress(req, reply, opts.getActorAddress);
    if (!actor) return reply;

    const amount = host.withdrawPayout(actor);
    return reply.send({ ok: true, amount: amount.toString(), balance: host.wallets.balanceOf(actor).toString() });
  });
}
