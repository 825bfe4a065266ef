// Purchase routes.
// - quote is read-only: effective price, token price and the fee split
// - purchase requires the exact token price; default is the quoted amount
// - authenticate binds the caller as the instance's current user

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import type { MarketHostV1 } from "../../market/marketHost.v1";
import type { MarketRegisterOptions } from "./marketplace.routes";
import { PurchaseBodySchema } from "./schemas";
import { requireActorAddress } from "./utils";
import { instanceView, purchaseQuoteView } from "./views";

const QuoteParamsSchema = z.object({ gameId: z.string().min(1), licenseId: z.string().min(1) });
const InstanceParamsSchema = z.object({ instanceId: z.string().min(1) });

export function registerOrdersRoutes(app: FastifyInstance, host: MarketHostV1, opts: MarketRegisterOptions) {
  // GET /market/games/:gameId/licenses/:licenseId/quote
  app.get("/games/:gameId/licenses/:licenseId/quote", async (req) => {
    const { gameId, licenseId } = QuoteParamsSchema.parse(req.params);
    return { ok: true, quote: purchaseQuoteView(host.marketplace.quotePurchase(gameId, licenseId)) };
  });

  // POST /market/purchases
  // body: { gameId, licenseId, payment? }
  app.post("/purchases", async (req, reply) => {
    const buyer = requireActorAddress(req, reply, opts.getActorAddress);
    if (!buyer) return reply;

    const body = PurchaseBodySchema.parse(req.body ?? {});
    const instance = host.purchase(buyer, body);
    return reply.code(201).send({ ok: true, instance: instanceView(instance) });
  });

  // POST /market/instances/:instanceId/authenticate
  app.post("/instances/:instanceId/authenticate", async (req, reply) => {
    const caller = requireActorAddress(req, reply, opts.getActorAddress);
    if (!caller) return reply;

    const { instanceId } = InstanceParamsSchema.parse(req.params);
    const instance = host.authenticate(caller, instanceId);
    return reply.send({ ok: true, instance: instanceView(instance) });
  });

  // GET /market/instances (caller's inventory)
  app.get("/instances", async (req, reply) => {
    const owner = requireActorAddress(req, reply, opts.getActorAddress);
    if (!owner) return reply;

    const instances = host.inventory.listByOwner(owner).map(instanceView);
    return reply.send({ ok: true, owner, count: instances.length, instances });
  });
}
