// src/market/resaleMarket.v1.ts
// Resale root: listings plus the two payout books. Royalties are keyed by
// game id, seller payouts by address; the books are separate so the key
// spaces cannot collide.
//
// A listed instance belongs to the listing until it is resold or delisted.
// Resale keeps authCount and user as they were.

import { authorizePublisher, type PublisherCapability } from "../auth/capability.v1";
import type { Coin, TokenAmount } from "../ledger/coin.v1";
import { EscrowBookV1 } from "../ledger/escrowBook.v1";
import { splitFee } from "../ledger/feeMath.v1";
import { takeExact } from "../ledger/valuePool.v1";
import type { MarketLogger } from "../observability/logger.v1";
import { fail } from "./errors.v1";
import type { EventSinkV1 } from "./events.v1";
import type { IdSourceV1 } from "./ids.v1";
import type { MarketplaceV1 } from "./marketplace.v1";
import type { Address, GameId, InstanceId, LicenseInstanceV1, ListingId, ResellerListingV1 } from "./types.v1";

export type ResaleMarketDepsV1 = {
  marketplace: MarketplaceV1;
  events: EventSinkV1;
  logger: MarketLogger;
  ids: IdSourceV1;
};

export type ResaleQuoteV1 = {
  listingId: ListingId;
  priceUsd: bigint;
  price: TokenAmount;
  royalty: TokenAmount;
  sellerPayout: TokenAmount;
};

export type ResalePoolsV1 = {
  royalties: Array<{ gameId: GameId; value: TokenAmount }>;
  payouts: Array<{ address: Address; value: TokenAmount }>;
};

export class ResaleMarketV1 {
  private readonly listings = new Map<ListingId, ResellerListingV1>();
  // Instances currently wrapped in a listing; the seller no longer holds them directly.
  private readonly listed = new Set<InstanceId>();
  private readonly royalties = new EscrowBookV1<GameId>("royalties");
  private readonly payouts = new EscrowBookV1<Address>("payouts");

  constructor(private readonly deps: ResaleMarketDepsV1) {}

  get size(): number {
    return this.listings.size;
  }

  getListing(listingId: ListingId): ResellerListingV1 {
    const listing = this.listings.get(listingId);
    if (!listing) fail("ListingNotFound", listingId);
    return listing;
  }

  listListings(filter: { gameId?: GameId } = {}): ResellerListingV1[] {
    const all = Array.from(this.listings.values());
    return filter.gameId ? all.filter((l) => l.instance.gameId === filter.gameId) : all;
  }

  /** Takes the instance out of direct ownership and wraps it in a new listing. */
  list(args: {
    instance: LicenseInstanceV1;
    caller: Address;
    resellerName: string;
    description: string;
    price: bigint;
  }): ResellerListingV1 {
    const { instance } = args;
    if (args.caller !== instance.owner) fail("NotOwner", `${args.caller} does not own ${instance.instanceId}`);
    if (this.listed.has(instance.instanceId)) fail("NotOwner", `${instance.instanceId} is held by an active listing`);

    const license = this.deps.marketplace.catalog.getLicense(instance.gameId, instance.licenseId);
    if (!license.permitResale) fail("ResaleNotPermitted", `${instance.gameId}/${instance.licenseId}`);
    this.deps.marketplace.assertActivationsLeft(instance);
    if (args.price < 0n) throw new RangeError(`LISTING_NEGATIVE_PRICE: ${args.price}`);

    const listing: ResellerListingV1 = {
      listingId: this.deps.ids("listing"),
      resellerName: args.resellerName,
      description: args.description,
      price: args.price,
      instance,
    };
    this.listings.set(listing.listingId, listing);
    this.listed.add(instance.instanceId);

    this.deps.events.emit({ type: "Listed", payload: { listingId: listing.listingId, instanceId: instance.instanceId } });
    this.deps.logger.info({ listingId: listing.listingId, instanceId: instance.instanceId }, "instance listed");
    return listing;
  }

  quoteResale(listingId: ListingId): ResaleQuoteV1 {
    const listing = this.getListing(listingId);
    const license = this.deps.marketplace.catalog.getLicense(listing.instance.gameId, listing.instance.licenseId);
    const price = this.deps.marketplace.oracle.usdToToken(listing.price);
    const { fee, remainder } = splitFee(price, license.royaltyRate);
    return { listingId, priceUsd: listing.price, price, royalty: fee, sellerPayout: remainder };
  }

  resell(args: { listingId: ListingId; payment: Coin; buyer: Address }): LicenseInstanceV1 {
    const quote = this.quoteResale(args.listingId);
    if (args.payment.value !== quote.price) {
      fail("InsufficientFunds", `expected exactly ${quote.price}, got ${args.payment.value}`);
    }

    const listing = this.getListing(args.listingId);
    const instance = listing.instance;
    const seller = instance.owner;

    if (quote.royalty > 0n) {
      this.royalties.deposit(instance.gameId, takeExact(args.payment, quote.royalty));
    }
    if (args.payment.value > 0n) this.payouts.deposit(seller, args.payment);

    instance.owner = args.buyer;
    this.listings.delete(args.listingId);
    this.listed.delete(instance.instanceId);

    this.deps.events.emit({ type: "Resold", payload: { listingId: args.listingId } });
    this.deps.logger.info(
      { listingId: args.listingId, instanceId: instance.instanceId, seller, buyer: args.buyer, price: quote.price.toString() },
      "instance resold"
    );
    return instance;
  }

  /** Withdraws a listing; the instance goes back to its owner untouched. */
  delist(listingId: ListingId, caller: Address): LicenseInstanceV1 {
    const listing = this.getListing(listingId);
    if (caller !== listing.instance.owner) fail("NotOwner", `${caller} does not own listing ${listingId}`);

    this.listings.delete(listingId);
    this.listed.delete(listing.instance.instanceId);
    this.deps.events.emit({ type: "Delisted", payload: { listingId } });
    return listing.instance;
  }

  withdrawRoyalties(cap: PublisherCapability, gameId: GameId): Coin {
    this.deps.marketplace.catalog.getGame(gameId);
    authorizePublisher(cap, gameId);
    const coin = this.royalties.drain(gameId);
    this.deps.events.emit({
      type: "Withdrawn",
      payload: { pool: "ROYALTIES", beneficiary: gameId, amount: coin.value.toString() },
    });
    return coin;
  }

  /** Identity is the caller's own address; no capability is involved. */
  withdrawPayout(caller: Address): Coin {
    const coin = this.payouts.drain(caller);
    this.deps.events.emit({
      type: "Withdrawn",
      payload: { pool: "PAYOUT", beneficiary: caller, amount: coin.value.toString() },
    });
    return coin;
  }

  pools(): ResalePoolsV1 {
    return {
      royalties: this.royalties.entries().map((e) => ({ gameId: e.key, value: e.value })),
      payouts: this.payouts.entries().map((e) => ({ address: e.key, value: e.value })),
    };
  }

  totalHeld(): TokenAmount {
    return this.royalties.total() + this.payouts.total();
  }
}
