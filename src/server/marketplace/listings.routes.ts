// Resale listing routes.
// Listing takes the instance out of the caller's inventory; resell moves it
// to the buyer, delist returns it to the owner.

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import type { MarketHostV1 } from "../../market/marketHost.v1";
import type { MarketRegisterOptions } from "./marketplace.routes";
import { CreateListingBodySchema, ResellBodySchema } from "./schemas";
import { requireActorAddress } from "./utils";
import { instanceView, listingView, resaleQuoteView } from "./views";

const ListingParamsSchema = z.object({ listingId: z.string().min(1) });
const ListingQuerySchema = z.object({ gameId: z.string().min(1).optional() });

export function registerListingsRoutes(app: FastifyInstance, host: MarketHostV1, opts: MarketRegisterOptions) {
  // GET /market/listings?gameId=...
  app.get("/listings", async (req) => {
    const { gameId } = ListingQuerySchema.parse(req.query ?? {});
    const listings = host.resale.listListings({ gameId }).map(listingView);
    return { ok: true, count: listings.length, listings };
  });

  // GET /market/listings/:listingId
  app.get("/listings/:listingId", async (req) => {
    const { listingId } = ListingParamsSchema.parse(req.params);
    return { ok: true, listing: listingView(host.resale.getListing(listingId)) };
  });

  // GET /market/listings/:listingId/quote
  app.get("/listings/:listingId/quote", async (req) => {
    const { listingId } = ListingParamsSchema.parse(req.params);
    return { ok: true, quote: resaleQuoteView(host.resale.quoteResale(listingId)) };
  });

  // POST /market/listings
  // body: { instanceId, resellerName, description?, price }
  app.post("/listings", async (req, reply) => {
    const seller = requireActorAddress(req, reply, opts.getActorAddress);
    if (!seller) return reply;

    const body = CreateListingBodySchema.parse(req.body ?? {});
    const listing = host.list(seller, body);
    return reply.code(201).send({ ok: true, listing: listingView(listing) });
  });

  // POST /market/listings/:listingId/resell
  // body: { payment? }
  app.post("/listings/:listingId/resell", async (req, reply) => {
    const buyer = requireActorAddress(req, reply, opts.getActorAddress);
    if (!buyer) return reply;

    const { listingId } = ListingParamsSchema.parse(req.params);
    const { payment } = ResellBodySchema.parse(req.body ?? {});
    const instance = host.resell(buyer, { listingId, payment });
    return reply.send({ ok: true, instance: instanceView(instance) });
  });

  // POST /market/listings/:listingId/delist (owner)
  app.post("/listings/:listingId/delist", async (req, reply) => {
    const owner = requireActorAddress(req, reply, opts.getActorAddress);
    if (!owner) return reply;

    const { listingId } = ListingParamsSchema.parse(req.params);
    const instance = host.delist(owner, listingId);
    return reply.send({ ok: true, instance: instanceView(instance) });
  });
}
