// src/market/marketplace.v1.ts
// Marketplace root: submission-fee pool, purchase-fee pool, fee schedule,
// game catalog and per-game sale proceeds.
//
// Every operation runs its checks first and mutates last, so a thrown
// MarketErrorV1 leaves the root exactly as it was. Nothing here awaits, which
// keeps each call a single serializable step on the event loop.

import {
  authorize,
  authorizePublisher,
  issuePlatformCapability,
  issuePublisherCapability,
  type PlatformCapability,
  type PublisherCapability,
} from "../auth/capability.v1";
import type { Coin, TokenAmount } from "../ledger/coin.v1";
import { EscrowBookV1 } from "../ledger/escrowBook.v1";
import { discountedPrice, isValidBps, splitFee } from "../ledger/feeMath.v1";
import { ValuePool, takeExact } from "../ledger/valuePool.v1";
import type { MarketLogger } from "../observability/logger.v1";
import type { PriceOracleV1 } from "../pricing/priceOracle.v1";
import { CatalogStoreV1, type GameMetadataPatchV1, type LicensePatchV1 } from "./catalogStore.v1";
import { fail } from "./errors.v1";
import type { EventSinkV1 } from "./events.v1";
import type { IdSourceV1 } from "./ids.v1";
import {
  NULL_ADDRESS,
  type Address,
  type GameId,
  type GameMetadataInputV1,
  type GameV1,
  type LicenseFieldsInputV1,
  type LicenseId,
  type LicenseInstanceV1,
  type LicenseV1,
} from "./types.v1";

export type MarketplaceDepsV1 = {
  oracle: PriceOracleV1;
  events: EventSinkV1;
  logger: MarketLogger;
  ids: IdSourceV1;
};

export type FeeScheduleV1 = {
  purchaseFeeRateBp: number;
  submissionFeeUsd: bigint;
};

export type PurchaseQuoteV1 = {
  gameId: GameId;
  licenseId: LicenseId;
  publisherPriceUsd: bigint;
  effectivePriceUsd: bigint;
  price: TokenAmount;
  platformFee: TokenAmount;
  publisherProceeds: TokenAmount;
};

export type MarketplacePoolsV1 = {
  submissionFees: TokenAmount;
  purchaseFees: TokenAmount;
  gameProceeds: Array<{ gameId: GameId; value: TokenAmount }>;
};

export class MarketplaceV1 {
  readonly rootId: string;
  readonly catalog: CatalogStoreV1;

  private readonly submissionFees = new ValuePool("submission-fees");
  private readonly purchaseFees = new ValuePool("purchase-fees");
  private readonly gameProceeds = new EscrowBookV1<GameId>("game-proceeds");

  private _schedule: FeeScheduleV1;

  private constructor(private readonly deps: MarketplaceDepsV1, schedule: FeeScheduleV1) {
    if (!isValidBps(schedule.purchaseFeeRateBp)) fail("InvalidFeeRate", String(schedule.purchaseFeeRateBp));
    this.rootId = deps.ids("root");
    this.catalog = new CatalogStoreV1(deps.ids);
    this._schedule = { ...schedule };
  }

  /** Creates the root and hands its platform capability to the deployer. */
  static create(deps: MarketplaceDepsV1, schedule: FeeScheduleV1): { marketplace: MarketplaceV1; platformCap: PlatformCapability } {
    const marketplace = new MarketplaceV1(deps, schedule);
    return { marketplace, platformCap: issuePlatformCapability(marketplace.rootId) };
  }

  get schedule(): Readonly<FeeScheduleV1> {
    return this._schedule;
  }

  get oracle(): PriceOracleV1 {
    return this.deps.oracle;
  }

  submissionFeeInTokens(): TokenAmount {
    return this.deps.oracle.usdToToken(this._schedule.submissionFeeUsd);
  }

  // -------------------------------
  // Catalog
  // -------------------------------

  registerGame(args: {
    gameId: GameId;
    metadata: GameMetadataInputV1;
    saleLocked: boolean;
    submissionFee: Coin;
  }): { game: GameV1; publisherCap: PublisherCapability } {
    this.catalog.assertAvailable(args.gameId);

    const expected = this.submissionFeeInTokens();
    if (args.submissionFee.value !== expected) {
      fail("InsufficientFee", `expected ${expected}, got ${args.submissionFee.value}`);
    }

    const game = this.catalog.buildGame(args.gameId, args.metadata, args.saleLocked);

    this.submissionFees.deposit(args.submissionFee);
    const publisherCap = issuePublisherCapability(game.gameId);
    this.catalog.insertGame(game);

    this.deps.events.emit({ type: "GameRegistered", payload: { gameId: game.gameId } });
    this.deps.logger.info({ gameId: game.gameId }, "game registered");
    return { game, publisherCap };
  }

  createLicense(cap: PublisherCapability, gameId: GameId, fields: LicenseFieldsInputV1): LicenseV1 {
    const license = this.catalog.createLicense(cap, gameId, fields);
    this.deps.events.emit({ type: "LicenseCreated", payload: { gameId, licenseId: license.licenseId } });
    this.deps.logger.info({ gameId, licenseId: license.licenseId }, "license created");
    return license;
  }

  updateGame(cap: PublisherCapability, gameId: GameId, patch: GameMetadataPatchV1): GameV1 {
    const game = this.catalog.updateGame(cap, gameId, patch);
    this.deps.events.emit({ type: "GameUpdated", payload: { gameId } });
    return game;
  }

  updateLicense(cap: PublisherCapability, gameId: GameId, licenseId: LicenseId, patch: LicensePatchV1): LicenseV1 {
    const license = this.catalog.updateLicense(cap, gameId, licenseId, patch);
    this.deps.events.emit({ type: "LicenseUpdated", payload: { gameId, licenseId } });
    return license;
  }

  setSaleLocked(cap: PublisherCapability, gameId: GameId, locked: boolean): GameV1 {
    const game = this.catalog.setSaleLocked(cap, gameId, locked);
    this.deps.events.emit({ type: "GameUpdated", payload: { gameId } });
    return game;
  }

  // -------------------------------
  // Purchase
  // -------------------------------

  quotePurchase(gameId: GameId, licenseId: LicenseId): PurchaseQuoteV1 {
    const license = this.catalog.getLicense(gameId, licenseId);
    const effectivePriceUsd = discountedPrice(license.publisherPrice, license.discountRate);
    const price = this.deps.oracle.usdToToken(effectivePriceUsd);
    const { fee, remainder } = splitFee(price, this._schedule.purchaseFeeRateBp);
    return {
      gameId,
      licenseId,
      publisherPriceUsd: license.publisherPrice,
      effectivePriceUsd,
      price,
      platformFee: fee,
      publisherProceeds: remainder,
    };
  }

  purchase(args: { gameId: GameId; licenseId: LicenseId; payment: Coin; buyer: Address }): LicenseInstanceV1 {
    const game = this.catalog.getGame(args.gameId);
    const license = this.catalog.getLicense(args.gameId, args.licenseId);
    if (game.saleLocked) fail("SaleLocked", args.gameId);

    const quote = this.quotePurchase(args.gameId, args.licenseId);
    if (args.payment.value !== quote.price) {
      fail("InsufficientFunds", `expected exactly ${quote.price}, got ${args.payment.value}`);
    }

    if (quote.platformFee > 0n) {
      this.purchaseFees.deposit(takeExact(args.payment, quote.platformFee));
    }
    if (args.payment.value > 0n) this.gameProceeds.deposit(args.gameId, args.payment);

    const instance: LicenseInstanceV1 = {
      instanceId: this.deps.ids("instance"),
      gameId: args.gameId,
      licenseId: args.licenseId,
      authCount: 0,
      licenseName: license.name,
      licenseThumbnailUrl: license.thumbnailUrl,
      owner: args.buyer,
      user: NULL_ADDRESS,
    };

    this.deps.events.emit({
      type: "Purchased",
      payload: { gameId: args.gameId, licenseId: args.licenseId, instanceId: instance.instanceId },
    });
    this.deps.logger.info(
      { gameId: args.gameId, licenseId: args.licenseId, instanceId: instance.instanceId, price: quote.price.toString() },
      "license purchased"
    );
    return instance;
  }

  // -------------------------------
  // Activation
  // -------------------------------

  /** Binds `caller` as the instance's user; re-binding the current user is a no-op. */
  authenticate(instance: LicenseInstanceV1, caller: Address): void {
    if (caller !== instance.owner) fail("NotOwner", `${caller} does not own ${instance.instanceId}`);
    if (instance.user === caller) return;

    this.assertActivationsLeft(instance);
    instance.authCount += 1;
    instance.user = caller;

    this.deps.events.emit({ type: "Authenticated", payload: { instanceId: instance.instanceId, user: caller } });
  }

  /** Live check against the license's current cap. */
  assertActivationsLeft(instance: LicenseInstanceV1): LicenseV1 {
    const license = this.catalog.getLicense(instance.gameId, instance.licenseId);
    if (!(license.limitAuthCount > instance.authCount)) {
      fail("AuthLimitExceeded", `${instance.instanceId} used ${instance.authCount}/${license.limitAuthCount}`);
    }
    return license;
  }

  // -------------------------------
  // Platform admin + withdrawals
  // -------------------------------

  setFeeSchedule(cap: PlatformCapability, patch: Partial<FeeScheduleV1>): FeeScheduleV1 {
    authorize(cap, this.rootId);
    if (patch.purchaseFeeRateBp !== undefined && !isValidBps(patch.purchaseFeeRateBp)) {
      fail("InvalidFeeRate", `${patch.purchaseFeeRateBp} not in 0..10000`);
    }
    if (patch.submissionFeeUsd !== undefined && patch.submissionFeeUsd < 0n) {
      fail("InvalidFeeRate", `submission fee ${patch.submissionFeeUsd} is negative`);
    }

    this._schedule = {
      purchaseFeeRateBp: patch.purchaseFeeRateBp ?? this._schedule.purchaseFeeRateBp,
      submissionFeeUsd: patch.submissionFeeUsd ?? this._schedule.submissionFeeUsd,
    };
    this.deps.events.emit({
      type: "FeeScheduleChanged",
      payload: {
        purchaseFeeRateBp: this._schedule.purchaseFeeRateBp,
        submissionFeeUsd: this._schedule.submissionFeeUsd.toString(),
      },
    });
    return { ...this._schedule };
  }

  withdrawPurchaseFees(cap: PlatformCapability): Coin {
    authorize(cap, this.rootId);
    return this.drainPlatformPool(this.purchaseFees, "PURCHASE_FEES");
  }

  withdrawSubmissionFees(cap: PlatformCapability): Coin {
    authorize(cap, this.rootId);
    return this.drainPlatformPool(this.submissionFees, "SUBMISSION_FEES");
  }

  withdrawGameProceeds(cap: PublisherCapability, gameId: GameId): Coin {
    this.catalog.getGame(gameId);
    authorizePublisher(cap, gameId);
    const coin = this.gameProceeds.drain(gameId);
    this.deps.events.emit({
      type: "Withdrawn",
      payload: { pool: "GAME_PROCEEDS", beneficiary: gameId, amount: coin.value.toString() },
    });
    return coin;
  }

  private drainPlatformPool(pool: ValuePool, label: "PURCHASE_FEES" | "SUBMISSION_FEES"): Coin {
    if (pool.isEmpty) fail("NoFundsAvailable", pool.label);
    const coin = pool.withdrawAll();
    this.deps.events.emit({
      type: "Withdrawn",
      payload: { pool: label, beneficiary: this.rootId, amount: coin.value.toString() },
    });
    return coin;
  }

  pools(): MarketplacePoolsV1 {
    return {
      submissionFees: this.submissionFees.value,
      purchaseFees: this.purchaseFees.value,
      gameProceeds: this.gameProceeds.entries().map((e) => ({ gameId: e.key, value: e.value })),
    };
  }

  totalHeld(): TokenAmount {
    return this.submissionFees.value + this.purchaseFees.value + this.gameProceeds.total();
  }
}
