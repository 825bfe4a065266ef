// Catalog routes: game registration, licenses, lookups, publisher updates.

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import type { MarketHostV1 } from "../../market/marketHost.v1";
import type { MarketRegisterOptions } from "./marketplace.routes";
import {
  GameMetadataPatchSchema,
  IndexParamSchema,
  LicenseFieldsSchema,
  LicensePatchSchema,
  RegisterGameBodySchema,
  SaleLockBodySchema,
} from "./schemas";
import { capabilityHandle, requireActorAddress } from "./utils";
import { gameView, licenseView } from "./views";

const GameParamsSchema = z.object({ gameId: z.string().min(1) });
const LicenseParamsSchema = GameParamsSchema.extend({ licenseId: z.string().min(1) });

export function registerCatalogRoutes(app: FastifyInstance, host: MarketHostV1, opts: MarketRegisterOptions) {
  const { marketplace, vault } = host;

  // POST /market/games
  // body: { gameId, metadata, saleLocked?, submissionFee? }
  // Pays the submission fee from the caller's wallet; returns the publisher capability handle.
  app.post("/games", async (req, reply) => {
    const actor = requireActorAddress(req, reply, opts.getActorAddress);
    if (!actor) return reply;

    const body = RegisterGameBodySchema.parse(req.body ?? {});
    const { game, publisherCap } = host.registerGame(actor, body);
    const handle = vault.deposit(publisherCap);

    return reply.code(201).send({ ok: true, game: gameView(game), publisherCapability: handle });
  });

  // GET /market/games
  app.get("/games", async () => {
    return { ok: true, count: marketplace.catalog.size, games: marketplace.catalog.listGames().map(gameView) };
  });

  // GET /market/games/at/:index
  app.get("/games/at/:index", async (req) => {
    const { index } = IndexParamSchema.parse(req.params);
    return { ok: true, game: gameView(marketplace.catalog.gameAt(index)) };
  });

  // GET /market/games/:gameId
  app.get("/games/:gameId", async (req) => {
    const { gameId } = GameParamsSchema.parse(req.params);
    return { ok: true, game: gameView(marketplace.catalog.getGame(gameId)) };
  });

  // PATCH /market/games/:gameId (publisher)
  app.patch("/games/:gameId", async (req) => {
    const { gameId } = GameParamsSchema.parse(req.params);
    const patch = GameMetadataPatchSchema.parse(req.body ?? {});
    const cap = vault.resolvePublisher(capabilityHandle(req));
    return { ok: true, game: gameView(marketplace.updateGame(cap, gameId, patch)) };
  });

  // POST /market/games/:gameId/sale-lock (publisher)
  app.post("/games/:gameId/sale-lock", async (req) => {
    const { gameId } = GameParamsSchema.parse(req.params);
    const { locked } = SaleLockBodySchema.parse(req.body ?? {});
    const cap = vault.resolvePublisher(capabilityHandle(req));
    return { ok: true, game: gameView(marketplace.setSaleLocked(cap, gameId, locked)) };
  });

  // POST /market/games/:gameId/licenses (publisher)
  app.post("/games/:gameId/licenses", async (req, reply) => {
    const { gameId } = GameParamsSchema.parse(req.params);
    const fields = LicenseFieldsSchema.parse(req.body ?? {});
    const cap = vault.resolvePublisher(capabilityHandle(req));
    const license = marketplace.createLicense(cap, gameId, fields);
    return reply.code(201).send({ ok: true, license: licenseView(license) });
  });

  // GET /market/games/:gameId/licenses/at/:index
  app.get("/games/:gameId/licenses/at/:index", async (req) => {
    const { gameId } = GameParamsSchema.parse(req.params);
    const { index } = IndexParamSchema.parse(req.params);
    return { ok: true, license: licenseView(marketplace.catalog.licenseAt(gameId, index)) };
  });

  // GET /market/games/:gameId/licenses/:licenseId
  app.get("/games/:gameId/licenses/:licenseId", async (req) => {
    const { gameId, licenseId } = LicenseParamsSchema.parse(req.params);
    return { ok: true, license: licenseView(marketplace.catalog.getLicense(gameId, licenseId)) };
  });

  // PATCH /market/games/:gameId/licenses/:licenseId (publisher)
  app.patch("/games/:gameId/licenses/:licenseId", async (req) => {
    const { gameId, licenseId } = LicenseParamsSchema.parse(req.params);
    const patch = LicensePatchSchema.parse(req.body ?? {});
    const cap = vault.resolvePublisher(capabilityHandle(req));
    return { ok: true, license: licenseView(marketplace.updateLicense(cap, gameId, licenseId, patch)) };
  });
}
