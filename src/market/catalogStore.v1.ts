// src/market/catalogStore.v1.ts
// Game catalog. Games are keyed by their human-assigned id and own their
// licenses. Positional lookups follow insertion order.
//
// Updates validate the whole patch before assigning anything. Issued
// instances keep their own name/thumbnail snapshot, so a license update
// never rewrites them.

import { authorizePublisher, type PublisherCapability } from "../auth/capability.v1";
import { isValidBps } from "../ledger/feeMath.v1";
import { fail } from "./errors.v1";
import type { IdSourceV1 } from "./ids.v1";
import { decodeLanguagePairs } from "./languagePairs.v1";
import type {
  GameId,
  GameMetadataInputV1,
  GameMetadataV1,
  GameV1,
  LicenseFieldsInputV1,
  LicenseId,
  LicenseV1,
} from "./types.v1";

export type GameMetadataPatchV1 = Partial<GameMetadataInputV1>;
export type LicensePatchV1 = Partial<LicenseFieldsInputV1>;

function assertLicenseNumbers(fields: {
  publisherPrice?: bigint;
  discountRate?: number;
  royaltyRate?: number;
  limitAuthCount?: number;
}) {
  if (fields.discountRate !== undefined && !isValidBps(fields.discountRate)) {
    fail("InvalidDiscountRate", `${fields.discountRate} not in 0..10000`);
  }
  if (fields.royaltyRate !== undefined && !isValidBps(fields.royaltyRate)) {
    fail("InvalidRoyaltyRate", `${fields.royaltyRate} not in 0..10000`);
  }
  if (fields.publisherPrice !== undefined && fields.publisherPrice < 0n) {
    throw new RangeError(`LICENSE_NEGATIVE_PRICE: ${fields.publisherPrice}`);
  }
  if (fields.limitAuthCount !== undefined && (!Number.isInteger(fields.limitAuthCount) || fields.limitAuthCount < 0)) {
    throw new RangeError(`LICENSE_INVALID_AUTH_LIMIT: ${fields.limitAuthCount}`);
  }
}

export function buildGameMetadata(input: GameMetadataInputV1): GameMetadataV1 {
  return {
    name: input.name,
    thumbnailUrl: input.thumbnailUrl,
    imageUrls: [...input.imageUrls],
    videoUrls: [...input.videoUrls],
    shortDescriptions: decodeLanguagePairs(input.shortDescriptions),
    genres: [...input.genres],
    developer: input.developer,
    publisher: input.publisher,
    languages: [...input.languages],
    platforms: [...input.platforms],
    systemRequirements: input.systemRequirements,
  };
}

export class CatalogStoreV1 {
  private readonly games = new Map<GameId, GameV1>();
  private readonly order: GameId[] = [];

  constructor(private readonly ids: IdSourceV1) {}

  get size(): number {
    return this.order.length;
  }

  has(gameId: GameId): boolean {
    return this.games.has(gameId);
  }

  assertAvailable(gameId: GameId): void {
    if (this.games.has(gameId)) fail("DuplicateGameId", gameId);
  }

  /** Validates and builds a game; nothing is stored until insertGame. */
  buildGame(gameId: GameId, metadata: GameMetadataInputV1, saleLocked: boolean): GameV1 {
    return {
      gameId,
      metadata: buildGameMetadata(metadata),
      saleLocked,
      licenses: new Map(),
      licenseOrder: [],
    };
  }

  insertGame(game: GameV1): void {
    this.assertAvailable(game.gameId);
    this.games.set(game.gameId, game);
    this.order.push(game.gameId);
  }

  getGame(gameId: GameId): GameV1 {
    const game = this.games.get(gameId);
    if (!game) fail("GameNotFound", gameId);
    return game;
  }

  getLicense(gameId: GameId, licenseId: LicenseId): LicenseV1 {
    const license = this.getGame(gameId).licenses.get(licenseId);
    if (!license) fail("LicenseNotFound", `${gameId}/${licenseId}`);
    return license;
  }

  gameAt(index: number): GameV1 {
    if (!Number.isInteger(index) || index < 0 || index >= this.order.length) {
      fail("IndexOutOfRange", `game index ${index} (size ${this.order.length})`);
    }
    return this.getGame(this.order[index]);
  }

  licenseAt(gameId: GameId, index: number): LicenseV1 {
    const game = this.getGame(gameId);
    if (!Number.isInteger(index) || index < 0 || index >= game.licenseOrder.length) {
      fail("IndexOutOfRange", `license index ${index} of ${gameId} (size ${game.licenseOrder.length})`);
    }
    return this.getLicense(gameId, game.licenseOrder[index]);
  }

  listGames(): GameV1[] {
    return this.order.map((id) => this.getGame(id));
  }

  createLicense(cap: PublisherCapability, gameId: GameId, fields: LicenseFieldsInputV1): LicenseV1 {
    const game = this.getGame(gameId);
    authorizePublisher(cap, gameId);
    assertLicenseNumbers(fields);
    const shortDescriptions = decodeLanguagePairs(fields.shortDescriptions);

    const license: LicenseV1 = {
      licenseId: this.ids("license"),
      gameId,
      name: fields.name,
      thumbnailUrl: fields.thumbnailUrl,
      shortDescriptions,
      publisherPrice: fields.publisherPrice,
      discountRate: fields.discountRate,
      royaltyRate: fields.royaltyRate,
      permitResale: fields.permitResale,
      limitAuthCount: fields.limitAuthCount,
    };

    game.licenses.set(license.licenseId, license);
    game.licenseOrder.push(license.licenseId);
    return license;
  }

  updateGame(cap: PublisherCapability, gameId: GameId, patch: GameMetadataPatchV1): GameV1 {
    const game = this.getGame(gameId);
    authorizePublisher(cap, gameId);

    const current = game.metadata;
    const shortDescriptions = patch.shortDescriptions
      ? decodeLanguagePairs(patch.shortDescriptions)
      : current.shortDescriptions;

    game.metadata = {
      name: patch.name ?? current.name,
      thumbnailUrl: patch.thumbnailUrl ?? current.thumbnailUrl,
      imageUrls: patch.imageUrls ? [...patch.imageUrls] : current.imageUrls,
      videoUrls: patch.videoUrls ? [...patch.videoUrls] : current.videoUrls,
      shortDescriptions,
      genres: patch.genres ? [...patch.genres] : current.genres,
      developer: patch.developer ?? current.developer,
      publisher: patch.publisher ?? current.publisher,
      languages: patch.languages ? [...patch.languages] : current.languages,
      platforms: patch.platforms ? [...patch.platforms] : current.platforms,
      systemRequirements: patch.systemRequirements ?? current.systemRequirements,
    };
    return game;
  }

  updateLicense(cap: PublisherCapability, gameId: GameId, licenseId: LicenseId, patch: LicensePatchV1): LicenseV1 {
    const license = this.getLicense(gameId, licenseId);
    authorizePublisher(cap, gameId);
    assertLicenseNumbers(patch);

    const shortDescriptions = patch.shortDescriptions
      ? decodeLanguagePairs(patch.shortDescriptions)
      : license.shortDescriptions;

    license.name = patch.name ?? license.name;
    license.thumbnailUrl = patch.thumbnailUrl ?? license.thumbnailUrl;
    license.shortDescriptions = shortDescriptions;
    license.publisherPrice = patch.publisherPrice ?? license.publisherPrice;
    license.discountRate = patch.discountRate ?? license.discountRate;
    license.royaltyRate = patch.royaltyRate ?? license.royaltyRate;
    license.permitResale = patch.permitResale ?? license.permitResale;
    license.limitAuthCount = patch.limitAuthCount ?? license.limitAuthCount;
    return license;
  }

  setSaleLocked(cap: PublisherCapability, gameId: GameId, locked: boolean): GameV1 {
    const game = this.getGame(gameId);
    authorizePublisher(cap, gameId);
    game.saleLocked = locked;
    return game;
  }
}
