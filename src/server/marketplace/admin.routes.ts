// Platform admin: fee schedule, pool inspection, event log.

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import type { MarketHostV1 } from "../../market/marketHost.v1";
import type { MarketRegisterOptions } from "./marketplace.routes";
import { FeeScheduleBodySchema } from "./schemas";
import { capabilityHandle } from "./utils";

const EventsQuerySchema = z.object({
  since: z.coerce.number().int().nonnegative().default(0),
});

export function registerAdminRoutes(app: FastifyInstance, host: MarketHostV1, _opts: MarketRegisterOptions) {
  // POST /market/admin/fees (platform)
  // body: { purchaseFeeRateBp?, submissionFeeUsd? }
  app.post("/admin/fees", async (req) => {
    const patch = FeeScheduleBodySchema.parse(req.body ?? {});
    const cap = host.vault.resolvePlatform(capabilityHandle(req));
    const schedule = host.marketplace.setFeeSchedule(cap, patch);
    return {
      ok: true,
      schedule: {
        purchaseFeeRateBp: schedule.purchaseFeeRateBp,
        submissionFeeUsd: schedule.submissionFeeUsd.toString(),
        submissionFee: host.marketplace.submissionFeeInTokens().toString(),
      },
    };
  });

  // GET /market/admin/pools (platform)
  app.get("/admin/pools", async (req) => {
    host.vault.resolvePlatform(capabilityHandle(req));
    const market = host.marketplace.pools();
    const resale = host.resale.pools();
    const accounting = host.accounting();

    return {
      ok: true,
      submissionFees: market.submissionFees.toString(),
      purchaseFees: market.purchaseFees.toString(),
      gameProceeds: market.gameProceeds.map((e) => ({ gameId: e.gameId, value: e.value.toString() })),
      royalties: resale.royalties.map((e) => ({ gameId: e.gameId, value: e.value.toString() })),
      payouts: resale.payouts.map((e) => ({ address: e.address, value: e.value.toString() })),
      accounting: {
        paidIn: accounting.paidIn.toString(),
        held: accounting.held.toString(),
        withdrawn: accounting.withdrawn.toString(),
        balanced: accounting.balanced,
      },
    };
  });

  // GET /market/events?since=seq
  app.get("/events", async (req) => {
    const { since } = EventsQuerySchema.parse(req.query ?? {});
    const events = host.events.since(since);
    return { ok: true, count: events.length, events };
  });
}
