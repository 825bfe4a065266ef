import { describe, expect, it } from "vitest";

import { issuePlatformCapability } from "../src/auth/capability.v1";
import { Coin } from "../src/ledger/coin.v1";
import { MarketErrorV1 } from "../src/market/errors.v1";
import type { MarketHostV1 } from "../src/market/marketHost.v1";
import { makeHost, seedGame } from "./helpers";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    return e instanceof MarketErrorV1 ? e.code : `non-market: ${String(e)}`;
  }
  return undefined;
}

/** g1 / license_1 (10000, royalty 500bp, limit 2) bought by 0xseller as instance_1. */
function boughtInstance(host: MarketHostV1, license: Parameters<typeof seedGame>[1] = {}) {
  const seeded = seedGame(host, license);
  host.wallets.topUp("0xseller", 10_000n);
  const instance = host.purchase("0xseller", { gameId: "g1", licenseId: "license_1" });
  return { ...seeded, instance };
}

describe("listing", () => {
  it("moves the instance out of inventory into a listing", () => {
    const host = makeHost();
    const { instance } = boughtInstance(host);

    const listing = host.list("0xseller", {
      instanceId: instance.instanceId,
      resellerName: "Seller",
      description: "barely used",
      price: 8_000n,
    });

    expect(listing.listingId).toBe("listing_1");
    expect(listing.instance.instanceId).toBe("instance_1");
    expect(host.inventory.size).toBe(0);
    expect(host.resale.listListings({ gameId: "g1" }).map((l) => l.listingId)).toEqual(["listing_1"]);
    expect(host.resale.listListings({ gameId: "g2" })).toEqual([]);
  });

  it("rejects licenses that do not permit resale", () => {
    const host = makeHost();
    const { instance } = boughtInstance(host, { license: { permitResale: false } });

    expect(
      codeOf(() => host.list("0xseller", { instanceId: instance.instanceId, resellerName: "S", description: "", price: 1n }))
    ).toBe("ResaleNotPermitted");
    expect(host.inventory.size).toBe(1);
    expect(host.resale.size).toBe(0);
  });

  it("rejects an instance with no activations left", () => {
    const host = makeHost();
    const { instance } = boughtInstance(host, { license: { limitAuthCount: 1 } });
    host.authenticate("0xseller", instance.instanceId);

    expect(
      codeOf(() => host.list("0xseller", { instanceId: instance.instanceId, resellerName: "S", description: "", price: 1n }))
    ).toBe("AuthLimitExceeded");
  });

  it("rejects a caller who does not own the instance", () => {
    const host = makeHost();
    const { instance } = boughtInstance(host);

    expect(
      codeOf(() => host.list("0xthief", { instanceId: instance.instanceId, resellerName: "T", description: "", price: 1n }))
    ).toBe("NotOwner");
  });

  it("holds an instance in at most one listing at a time", () => {
    const host = makeHost();
    const { instance } = boughtInstance(host);
    const args = { instance, caller: "0xseller", resellerName: "S", description: "", price: 100n };

    const first = host.resale.list(args);
    expect(codeOf(() => host.resale.list(args))).toBe("NotOwner");
    expect(host.resale.size).toBe(1);

    host.resale.delist(first.listingId, "0xseller");
    expect(host.resale.list(args).listingId).toBe("listing_2");

    host.resale.resell({ listingId: "listing_2", payment: Coin.issue(100n), buyer: "0xbuyer" });
    expect(codeOf(() => host.resale.list({ ...args, caller: "0xbuyer" }))).toBeUndefined();
    expect(host.resale.pools()).toEqual({
      royalties: [{ gameId: "g1", value: 5n }],
      payouts: [{ address: "0xseller", value: 95n }],
    });
  });

  it("delists back to the owner's inventory", () => {
    const host = makeHost();
    const { instance } = boughtInstance(host);
    const { listingId } = host.list("0xseller", { instanceId: instance.instanceId, resellerName: "S", description: "", price: 5n });

    expect(codeOf(() => host.delist("0xother", listingId))).toBe("NotOwner");

    const back = host.delist("0xseller", listingId);
    expect(back.owner).toBe("0xseller");
    expect(host.inventory.listByOwner("0xseller").map((i) => i.instanceId)).toEqual(["instance_1"]);
    expect(codeOf(() => host.resale.getListing(listingId))).toBe("ListingNotFound");
  });
});

describe("resell", () => {
  it("pays royalty to the game and the rest to the seller, keeping activations", () => {
    const host = makeHost();
    const { instance } = boughtInstance(host);
    host.authenticate("0xseller", instance.instanceId);
    const { listingId } = host.list("0xseller", {
      instanceId: instance.instanceId,
      resellerName: "Seller",
      description: "",
      price: 10_000n,
    });

    const quote = host.resale.quoteResale(listingId);
    expect(quote).toEqual({ listingId, priceUsd: 10_000n, price: 10_000n, royalty: 500n, sellerPayout: 9_500n });

    host.wallets.topUp("0xbuyer", 10_000n);
    const sold = host.resell("0xbuyer", { listingId });

    expect(sold.owner).toBe("0xbuyer");
    expect(sold.authCount).toBe(1);
    expect(sold.user).toBe("0xseller");
    expect(host.wallets.balanceOf("0xbuyer")).toBe(0n);
    expect(host.resale.pools()).toEqual({
      royalties: [{ gameId: "g1", value: 500n }],
      payouts: [{ address: "0xseller", value: 9_500n }],
    });
    expect(host.resale.size).toBe(0);
    expect(host.inventory.listByOwner("0xbuyer").map((i) => i.instanceId)).toEqual(["instance_1"]);

    const activated = host.authenticate("0xbuyer", "instance_1");
    expect(activated.authCount).toBe(2);
    expect(activated.user).toBe("0xbuyer");
  });

  it("converts the USD listing price at resale time", () => {
    const host = makeHost({ tokenDecimals: 2 });
    const seeded = seedGame(host);
    host.wallets.topUp("0xseller", 1_000_000n);
    const instance = host.purchase("0xseller", { gameId: "g1", licenseId: "license_1" });
    const { listingId } = host.list("0xseller", { instanceId: instance.instanceId, resellerName: "S", description: "", price: 3n });

    expect(seeded.license.royaltyRate).toBe(500);
    expect(host.resale.quoteResale(listingId)).toEqual({ listingId, priceUsd: 3n, price: 300n, royalty: 15n, sellerPayout: 285n });
  });

  it("refunds an inexact payment and keeps the listing", () => {
    const host = makeHost();
    const { instance } = boughtInstance(host);
    const { listingId } = host.list("0xseller", { instanceId: instance.instanceId, resellerName: "S", description: "", price: 100n });
    host.wallets.topUp("0xbuyer", 500n);

    expect(codeOf(() => host.resell("0xbuyer", { listingId, payment: 99n }))).toBe("InsufficientFunds");
    expect(host.wallets.balanceOf("0xbuyer")).toBe(500n);
    expect(host.resale.getListing(listingId).instance.owner).toBe("0xseller");
    expect(host.resale.pools()).toEqual({ royalties: [], payouts: [] });
  });

  it("fails ListingNotFound once a listing has been bought", () => {
    const host = makeHost();
    const { instance } = boughtInstance(host);
    const { listingId } = host.list("0xseller", { instanceId: instance.instanceId, resellerName: "S", description: "", price: 0n });

    host.resell("0xbuyer", { listingId });
    expect(codeOf(() => host.resell("0xlate", { listingId }))).toBe("ListingNotFound");
  });
});

describe("withdrawals", () => {
  function soldOnce(host: MarketHostV1) {
    const seeded = boughtInstance(host);
    const { listingId } = host.list("0xseller", {
      instanceId: seeded.instance.instanceId,
      resellerName: "S",
      description: "",
      price: 10_000n,
    });
    host.wallets.topUp("0xbuyer", 10_000n);
    host.resell("0xbuyer", { listingId });
    return seeded;
  }

  it("drains every pool to its beneficiary and balances the books", () => {
    const host = makeHost();
    const { publisherCap } = soldOnce(host);

    expect(host.withdrawPurchaseFees("0xplatform", host.platformCap)).toBe(100n);
    expect(host.withdrawSubmissionFees("0xplatform", host.platformCap)).toBe(10n);
    expect(host.withdrawGameProceeds("0xpub", publisherCap, "g1")).toBe(9_900n);
    expect(host.withdrawRoyalties("0xpub", publisherCap, "g1")).toBe(500n);
    expect(host.withdrawPayout("0xseller")).toBe(9_500n);

    expect(host.wallets.balanceOf("0xplatform")).toBe(110n);
    expect(host.wallets.balanceOf("0xpub")).toBe(10_400n);
    expect(host.wallets.balanceOf("0xseller")).toBe(9_500n);
    expect(host.accounting()).toEqual({ paidIn: 20_010n, held: 0n, withdrawn: 20_010n, balanced: true });
    expect(host.events.ofType("Withdrawn").map((e) => e.payload.pool)).toEqual([
      "PURCHASE_FEES",
      "SUBMISSION_FEES",
      "GAME_PROCEEDS",
      "ROYALTIES",
      "PAYOUT",
    ]);
  });

  it("fails NoFundsAvailable on a second drain", () => {
    const host = makeHost();
    const { publisherCap } = soldOnce(host);
    host.withdrawGameProceeds("0xpub", publisherCap, "g1");
    host.withdrawPayout("0xseller");
    host.withdrawPurchaseFees("0xplatform", host.platformCap);

    expect(codeOf(() => host.withdrawGameProceeds("0xpub", publisherCap, "g1"))).toBe("NoFundsAvailable");
    expect(codeOf(() => host.withdrawPayout("0xseller"))).toBe("NoFundsAvailable");
    expect(codeOf(() => host.withdrawPurchaseFees("0xplatform", host.platformCap))).toBe("NoFundsAvailable");
    expect(codeOf(() => host.withdrawPayout("0xnobody"))).toBe("NoFundsAvailable");
  });

  it("requires the matching capability", () => {
    const host = makeHost();
    soldOnce(host);
    const { publisherCap: otherCap } = seedGame(host, { gameId: "g2" });
    const foreignPlatform = issuePlatformCapability("root_elsewhere");

    expect(codeOf(() => host.withdrawGameProceeds("0xpub", otherCap, "g1"))).toBe("NotPublisher");
    expect(codeOf(() => host.withdrawRoyalties("0xpub", otherCap, "g1"))).toBe("NotPublisher");
    expect(codeOf(() => host.withdrawPurchaseFees("0xpub", foreignPlatform))).toBe("NotAuthorized");
    expect(codeOf(() => host.marketplace.setFeeSchedule(foreignPlatform, { purchaseFeeRateBp: 0 }))).toBe("NotAuthorized");
    expect(host.accounting().balanced).toBe(true);
  });
});

describe("fee schedule", () => {
  it("applies a new purchase fee rate to later quotes", () => {
    const host = makeHost();
    seedGame(host);

    const schedule = host.marketplace.setFeeSchedule(host.platformCap, { purchaseFeeRateBp: 250 });
    expect(schedule).toEqual({ purchaseFeeRateBp: 250, submissionFeeUsd: 10n });
    expect(host.marketplace.quotePurchase("g1", "license_1").platformFee).toBe(250n);
    expect(host.events.ofType("FeeScheduleChanged").map((e) => e.payload)).toEqual([
      { purchaseFeeRateBp: 250, submissionFeeUsd: "10" },
    ]);
  });

  it("rejects an out-of-range rate and keeps the old schedule", () => {
    const host = makeHost();
    expect(codeOf(() => host.marketplace.setFeeSchedule(host.platformCap, { purchaseFeeRateBp: 10_001 }))).toBe(
      "InvalidFeeRate"
    );
    expect(host.marketplace.schedule.purchaseFeeRateBp).toBe(100);
  });

  it("charges the new submission fee on the next registration", () => {
    const host = makeHost();
    host.marketplace.setFeeSchedule(host.platformCap, { submissionFeeUsd: 25n });
    expect(host.marketplace.submissionFeeInTokens()).toBe(25n);
  });
});
