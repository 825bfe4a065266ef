import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { buildServer } from "../src/server/app";
import { TEST_CONFIG, makeHost } from "./helpers";

const PLATFORM = "cap_test_platform";

describe("market HTTP API", () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    const built = await buildServer({
      config: TEST_CONFIG,
      host: makeHost(),
      logLevel: "silent",
      platformCapHandle: PLATFORM,
      allowDevTopup: true,
    });
    app = built.app;
  });

  afterEach(async () => {
    await app.close();
  });

  async function topUp(address: string, amount: string) {
    const res = await app.inject({
      method: "POST",
      url: "/market/wallet/dev/topup",
      headers: { "x-actor-address": address },
      payload: { amount },
    });
    expect(res.statusCode).toBe(200);
  }

  /** Registers g1 with one license (10000, royalty 500bp) and returns the publisher handle. */
  async function seed(): Promise<string> {
    await topUp("0xpub", "10");
    const reg = await app.inject({
      method: "POST",
      url: "/market/games",
      headers: { "x-actor-address": "0xpub" },
      payload: { gameId: "g1", metadata: { name: "Sky Harbor", shortDescriptions: { codes: ["en"], texts: ["Airships"] } } },
    });
    expect(reg.statusCode).toBe(201);
    const { publisherCapability } = reg.json<{ publisherCapability: string }>();

    const lic = await app.inject({
      method: "POST",
      url: "/market/games/g1/licenses",
      headers: { "x-capability": publisherCapability },
      payload: { name: "Standard", publisherPrice: "10000", royaltyRate: 500, permitResale: true, limitAuthCount: 2 },
    });
    expect(lic.statusCode).toBe(201);
    return publisherCapability;
  }

  it("answers health checks", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok" });
  });

  it("registers a game and renders it with its license", async () => {
    const handle = await seed();
    expect(handle.startsWith("cap_")).toBe(true);

    const res = await app.inject({ method: "GET", url: "/market/games/g1" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      ok: true,
      game: {
        gameId: "g1",
        saleLocked: false,
        metadata: { name: "Sky Harbor", shortDescriptions: { en: "Airships" }, developer: "" },
        licenses: [
          {
            licenseId: "license_1",
            publisherPrice: "10000",
            discountRate: 0,
            royaltyRate: 500,
            permitResale: true,
            limitAuthCount: 2,
          },
        ],
      },
    });

    const at = await app.inject({ method: "GET", url: "/market/games/g1/licenses/at/0" });
    expect(at.json()).toMatchObject({ ok: true, license: { licenseId: "license_1" } });
  });

  it("quotes, sells and activates a license", async () => {
    await seed();

    const quote = await app.inject({ method: "GET", url: "/market/games/g1/licenses/license_1/quote" });
    expect(quote.json()).toEqual({
      ok: true,
      quote: {
        gameId: "g1",
        licenseId: "license_1",
        publisherPriceUsd: "10000",
        effectivePriceUsd: "10000",
        price: "10000",
        platformFee: "100",
        publisherProceeds: "9900",
      },
    });

    await topUp("0xbuyer", "10000");
    const bought = await app.inject({
      method: "POST",
      url: "/market/purchases",
      headers: { "x-actor-address": "0xbuyer" },
      payload: { gameId: "g1", licenseId: "license_1" },
    });
    expect(bought.statusCode).toBe(201);
    expect(bought.json()).toMatchObject({ ok: true, instance: { instanceId: "instance_1", owner: "0xbuyer", user: "0x0", authCount: 0 } });

    const auth = await app.inject({
      method: "POST",
      url: "/market/instances/instance_1/authenticate",
      headers: { "x-actor-address": "0xbuyer" },
    });
    expect(auth.json()).toMatchObject({ ok: true, instance: { user: "0xbuyer", authCount: 1 } });

    const mine = await app.inject({ method: "GET", url: "/market/instances", headers: { "x-actor-address": "0xbuyer" } });
    expect(mine.json()).toMatchObject({ ok: true, owner: "0xbuyer", count: 1 });

    const wallet = await app.inject({ method: "GET", url: "/market/wallet", headers: { "x-actor-address": "0xbuyer" } });
    expect(wallet.json()).toMatchObject({ ok: true, balance: "0", count: 2 });
  });

  it("lists, resells and pays out", async () => {
    const publisher = await seed();
    await topUp("0xseller", "10000");
    await app.inject({
      method: "POST",
      url: "/market/purchases",
      headers: { "x-actor-address": "0xseller" },
      payload: { gameId: "g1", licenseId: "license_1" },
    });

    const listed = await app.inject({
      method: "POST",
      url: "/market/listings",
      headers: { "x-actor-address": "0xseller" },
      payload: { instanceId: "instance_1", resellerName: "Seller", price: "2000" },
    });
    expect(listed.statusCode).toBe(201);
    expect(listed.json()).toMatchObject({ ok: true, listing: { listingId: "listing_1", price: "2000", description: "" } });

    const quote = await app.inject({ method: "GET", url: "/market/listings/listing_1/quote" });
    expect(quote.json()).toEqual({
      ok: true,
      quote: { listingId: "listing_1", priceUsd: "2000", price: "2000", royalty: "100", sellerPayout: "1900" },
    });

    await topUp("0xbuyer", "2000");
    const sold = await app.inject({
      method: "POST",
      url: "/market/listings/listing_1/resell",
      headers: { "x-actor-address": "0xbuyer" },
    });
    expect(sold.json()).toMatchObject({ ok: true, instance: { owner: "0xbuyer" } });

    const payout = await app.inject({
      method: "POST",
      url: "/market/withdrawals/payout",
      headers: { "x-actor-address": "0xseller" },
    });
    expect(payout.json()).toEqual({ ok: true, amount: "1900", balance: "1900" });

    const royalties = await app.inject({
      method: "POST",
      url: "/market/withdrawals/games/g1/royalties",
      headers: { "x-actor-address": "0xpub", "x-capability": publisher },
    });
    expect(royalties.json()).toEqual({ ok: true, gameId: "g1", amount: "100", balance: "100" });

    const pools = await app.inject({ method: "GET", url: "/market/admin/pools", headers: { "x-capability": PLATFORM } });
    expect(pools.json()).toMatchObject({
      ok: true,
      submissionFees: "10",
      purchaseFees: "100",
      gameProceeds: [{ gameId: "g1", value: "9900" }],
      royalties: [{ gameId: "g1", value: "0" }],
      payouts: [{ address: "0xseller", value: "0" }],
      accounting: { paidIn: "12010", held: "10010", withdrawn: "2000", balanced: true },
    });
  });

  it("lets the platform change fees and drain its pools", async () => {
    await seed();

    const fees = await app.inject({
      method: "POST",
      url: "/market/admin/fees",
      headers: { "x-capability": PLATFORM },
      payload: { purchaseFeeRateBp: 300 },
    });
    expect(fees.json()).toEqual({ ok: true, schedule: { purchaseFeeRateBp: 300, submissionFeeUsd: "10", submissionFee: "10" } });

    const drained = await app.inject({
      method: "POST",
      url: "/market/withdrawals/submission-fees",
      headers: { "x-actor-address": "0xops", "x-capability": PLATFORM },
    });
    expect(drained.json()).toEqual({ ok: true, amount: "10", balance: "10" });

    const events = await app.inject({ method: "GET", url: "/market/events?since=2" });
    expect(events.json<{ events: Array<{ seq: number; type: string }> }>().events.map((e) => [e.seq, e.type])).toEqual([
      [3, "FeeScheduleChanged"],
      [4, "Withdrawn"],
    ]);
  });

  describe("errors", () => {
    it("requires an actor address on writes", async () => {
      const res = await app.inject({ method: "POST", url: "/market/purchases", payload: { gameId: "g1", licenseId: "l" } });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toMatchObject({ ok: false, error: "UNAUTHORIZED" });
    });

    it("maps market errors to status codes", async () => {
      const publisher = await seed();

      const missing = await app.inject({ method: "GET", url: "/market/games/nope" });
      expect(missing.statusCode).toBe(404);
      expect(missing.json()).toEqual({ ok: false, error: "GameNotFound", message: "GameNotFound: nope" });

      const outOfRange = await app.inject({ method: "GET", url: "/market/games/at/3" });
      expect(outOfRange.statusCode).toBe(400);
      expect(outOfRange.json()).toMatchObject({ error: "IndexOutOfRange" });

      await topUp("0xpub", "10");
      const dup = await app.inject({
        method: "POST",
        url: "/market/games",
        headers: { "x-actor-address": "0xpub" },
        payload: { gameId: "g1", metadata: { name: "Again" } },
      });
      expect(dup.statusCode).toBe(409);

      const noCap = await app.inject({
        method: "POST",
        url: "/market/games/g1/licenses",
        payload: { name: "Free", publisherPrice: "0", limitAuthCount: 1 },
      });
      expect(noCap.statusCode).toBe(403);
      expect(noCap.json()).toMatchObject({ error: "NotPublisher" });

      const badRate = await app.inject({
        method: "POST",
        url: "/market/games/g1/licenses",
        headers: { "x-capability": publisher },
        payload: { name: "Odd", publisherPrice: "1", discountRate: 12_000, limitAuthCount: 1 },
      });
      expect(badRate.statusCode).toBe(422);
      expect(badRate.json()).toMatchObject({ error: "InvalidDiscountRate" });

      const broke = await app.inject({
        method: "POST",
        url: "/market/purchases",
        headers: { "x-actor-address": "0xbroke" },
        payload: { gameId: "g1", licenseId: "license_1" },
      });
      expect(broke.statusCode).toBe(402);
      expect(broke.json()).toMatchObject({ error: "InsufficientBalance" });

      const locked = await app.inject({
        method: "POST",
        url: "/market/games/g1/sale-lock",
        headers: { "x-capability": publisher },
        payload: { locked: true },
      });
      expect(locked.json()).toMatchObject({ ok: true, game: { saleLocked: true } });

      await topUp("0xbuyer", "10000");
      const refused = await app.inject({
        method: "POST",
        url: "/market/purchases",
        headers: { "x-actor-address": "0xbuyer" },
        payload: { gameId: "g1", licenseId: "license_1" },
      });
      expect(refused.statusCode).toBe(422);
      expect(refused.json()).toMatchObject({ error: "SaleLocked" });
    });

    it("rejects malformed bodies with 400", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/market/wallet/dev/topup",
        headers: { "x-actor-address": "0xa" },
        payload: { amount: "-5" },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        ok: false,
        error: "BAD_REQUEST",
        message: "amount: must be a non-negative integer string",
      });
    });

    it("refuses platform routes without the platform handle", async () => {
      const res = await app.inject({ method: "GET", url: "/market/admin/pools", headers: { "x-capability": "cap_wrong_handle" } });
      expect(res.statusCode).toBe(403);
      expect(res.json()).toMatchObject({ error: "NotAuthorized" });
    });
  });
});
