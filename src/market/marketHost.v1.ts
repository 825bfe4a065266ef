// src/market/marketHost.v1.ts
// In-process host around the two roots. Supplies caller identity, wallets
// and inventory, and keeps running totals for the conservation check:
//
//   paidIn === marketplace.totalHeld() + resale.totalHeld() + withdrawn
//
// A payment is split out of the caller's wallet before the core runs. The
// core validates before it touches the coin, so on failure the coin still
// holds its full value and goes straight back.

import type { PlatformCapability, PublisherCapability } from "../auth/capability.v1";
import type { MarketConfig } from "../config/marketConfig.v1";
import type { Coin, TokenAmount } from "../ledger/coin.v1";
import type { MarketLogger } from "../observability/logger.v1";
import { FixedRatioPriceOracleV1, type PriceOracleV1 } from "../pricing/priceOracle.v1";
import { CapabilityVaultMemoryV1 } from "../store/capabilityVault.memory.v1";
import { InventoryStoreMemoryV1 } from "../store/inventoryStore.memory.v1";
import { WalletStoreMemoryV1, type WalletTxReasonV1 } from "../store/walletStore.memory.v1";
import { MemoryEventSinkV1 } from "./events.v1";
import { randomIds, type IdSourceV1 } from "./ids.v1";
import { MarketplaceV1 } from "./marketplace.v1";
import { ResaleMarketV1 } from "./resaleMarket.v1";
import type {
  Address,
  GameId,
  GameMetadataInputV1,
  GameV1,
  InstanceId,
  LicenseId,
  LicenseInstanceV1,
  ListingId,
  ResellerListingV1,
} from "./types.v1";

export type MarketHostOptionsV1 = {
  config: MarketConfig;
  logger: MarketLogger;
  ids?: IdSourceV1;
  oracle?: PriceOracleV1;
  clock?: () => string;
};

export type MarketAccountingV1 = {
  paidIn: TokenAmount;
  held: TokenAmount;
  withdrawn: TokenAmount;
  balanced: boolean;
};

export class MarketHostV1 {
  readonly marketplace: MarketplaceV1;
  readonly resale: ResaleMarketV1;
  readonly wallets: WalletStoreMemoryV1;
  readonly inventory = new InventoryStoreMemoryV1();
  readonly vault = new CapabilityVaultMemoryV1();
  readonly events: MemoryEventSinkV1;
  readonly platformCap: PlatformCapability;
  readonly config: MarketConfig;

  private paidIn = 0n;
  private withdrawn = 0n;

  private constructor(private readonly opts: MarketHostOptionsV1) {
    const ids = opts.ids ?? randomIds;
    const oracle = opts.oracle ?? new FixedRatioPriceOracleV1(opts.config.tokenDecimals);

    this.config = opts.config;
    this.events = new MemoryEventSinkV1({ logger: opts.logger, clock: opts.clock });
    this.wallets = new WalletStoreMemoryV1(opts.clock);

    const { marketplace, platformCap } = MarketplaceV1.create(
      { oracle, events: this.events, logger: opts.logger, ids },
      { purchaseFeeRateBp: opts.config.purchaseFeeRateBp, submissionFeeUsd: opts.config.submissionFeeUsd }
    );
    this.marketplace = marketplace;
    this.platformCap = platformCap;
    this.resale = new ResaleMarketV1({ marketplace, events: this.events, logger: opts.logger, ids });
  }

  static create(opts: MarketHostOptionsV1): MarketHostV1 {
    return new MarketHostV1(opts);
  }

  // -------------------------------
  // Payment plumbing
  // -------------------------------

  private withPayment<T>(
    caller: Address,
    amount: TokenAmount,
    reason: WalletTxReasonV1,
    run: (payment: Coin) => T
  ): T {
    const payment = this.wallets.debit(caller, amount, reason);
    let result: T;
    try {
      result = run(payment);
    } catch (e) {
      this.wallets.credit(caller, payment, "REFUND");
      throw e;
    }
    this.paidIn += amount;
    return result;
  }

  private payOut(caller: Address, coin: Coin): TokenAmount {
    const amount = coin.value;
    this.withdrawn += amount;
    this.wallets.credit(caller, coin, "WITHDRAWAL");
    this.opts.logger.info({ beneficiary: caller, amount: amount.toString() }, "withdrawal paid out");
    return amount;
  }

  // -------------------------------
  // Operations that move value or owned objects
  // -------------------------------

  registerGame(
    caller: Address,
    args: { gameId: GameId; metadata: GameMetadataInputV1; saleLocked: boolean; submissionFee?: TokenAmount }
  ): { game: GameV1; publisherCap: PublisherCapability } {
    this.marketplace.catalog.assertAvailable(args.gameId);
    const amount = args.submissionFee ?? this.marketplace.submissionFeeInTokens();
    return this.withPayment(caller, amount, "SUBMISSION_FEE", (submissionFee) =>
      this.marketplace.registerGame({
        gameId: args.gameId,
        metadata: args.metadata,
        saleLocked: args.saleLocked,
        submissionFee,
      })
    );
  }

  purchase(caller: Address, args: { gameId: GameId; licenseId: LicenseId; payment?: TokenAmount }): LicenseInstanceV1 {
    const amount = args.payment ?? this.marketplace.quotePurchase(args.gameId, args.licenseId).price;
    const instance = this.withPayment(caller, amount, "PURCHASE", (payment) =>
      this.marketplace.purchase({ gameId: args.gameId, licenseId: args.licenseId, payment, buyer: caller })
    );
    this.inventory.put(instance);
    return instance;
  }

  authenticate(caller: Address, instanceId: InstanceId): LicenseInstanceV1 {
    const instance = this.inventory.peek(instanceId);
    this.marketplace.authenticate(instance, caller);
    return instance;
  }

  list(
    caller: Address,
    args: { instanceId: InstanceId; resellerName: string; description: string; price: bigint }
  ): ResellerListingV1 {
    const instance = this.inventory.peek(args.instanceId);
    const listing = this.resale.list({
      instance,
      caller,
      resellerName: args.resellerName,
      description: args.description,
      price: args.price,
    });
    this.inventory.remove(args.instanceId);
    return listing;
  }

  resell(caller: Address, args: { listingId: ListingId; payment?: TokenAmount }): LicenseInstanceV1 {
    const amount = args.payment ?? this.resale.quoteResale(args.listingId).price;
    const instance = this.withPayment(caller, amount, "RESALE_PURCHASE", (payment) =>
      this.resale.resell({ listingId: args.listingId, payment, buyer: caller })
    );
    this.inventory.put(instance);
    return instance;
  }

  delist(caller: Address, listingId: ListingId): LicenseInstanceV1 {
    const instance = this.resale.delist(listingId, caller);
    this.inventory.put(instance);
    return instance;
  }

  // -------------------------------
  // Withdrawals (credited to the caller's wallet)
  // -------------------------------

  withdrawPurchaseFees(caller: Address, cap: PlatformCapability): TokenAmount {
    return this.payOut(caller, this.marketplace.withdrawPurchaseFees(cap));
  }

  withdrawSubmissionFees(caller: Address, cap: PlatformCapability): TokenAmount {
    return this.payOut(caller, this.marketplace.withdrawSubmissionFees(cap));
  }

  withdrawGameProceeds(caller: Address, cap: PublisherCapability, gameId: GameId): TokenAmount {
    return this.payOut(caller, this.marketplace.withdrawGameProceeds(cap, gameId));
  }

  withdrawRoyalties(caller: Address, cap: PublisherCapability, gameId: GameId): TokenAmount {
    return this.payOut(caller, this.resale.withdrawRoyalties(cap, gameId));
  }

  withdrawPayout(caller: Address): TokenAmount {
    return this.payOut(caller, this.resale.withdrawPayout(caller));
  }

  accounting(): MarketAccountingV1 {
    const held = this.marketplace.totalHeld() + this.resale.totalHeld();
    return {
      paidIn: this.paidIn,
      held,
      withdrawn: this.withdrawn,
      balanced: this.paidIn === held + this.withdrawn,
    };
  }
}
