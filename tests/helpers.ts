import type { MarketConfig } from "../src/config/marketConfig.v1";
import { sequentialIds } from "../src/market/ids.v1";
import { MarketHostV1 } from "../src/market/marketHost.v1";
import type { GameMetadataInputV1, LicenseFieldsInputV1 } from "../src/market/types.v1";
import { makeNoopLogger } from "../src/observability/logger.v1";

export const FIXED_AT = "2026-01-01T00:00:00.000Z";

// tokenDecimals 0 keeps token amounts equal to USD amounts.
export const TEST_CONFIG: MarketConfig = {
  purchaseFeeRateBp: 100,
  submissionFeeUsd: 10n,
  tokenDecimals: 0,
};

export function makeHost(config: Partial<MarketConfig> = {}): MarketHostV1 {
  return MarketHostV1.create({
    config: { ...TEST_CONFIG, ...config },
    logger: makeNoopLogger(),
    ids: sequentialIds(),
    clock: () => FIXED_AT,
  });
}

export function sampleMetadata(overrides: Partial<GameMetadataInputV1> = {}): GameMetadataInputV1 {
  return {
    name: "Sky Harbor",
    thumbnailUrl: "https://cdn.example.test/sky/thumb.png",
    imageUrls: ["https://cdn.example.test/sky/1.png"],
    videoUrls: [],
    shortDescriptions: { codes: ["en", "ko"], texts: ["Airship trading", "비행선 무역"] },
    genres: ["strategy"],
    developer: "Harbor Works",
    publisher: "Harbor Works",
    languages: ["en", "ko"],
    platforms: ["windows"],
    systemRequirements: "4GB RAM",
    ...overrides,
  };
}

export function sampleLicense(overrides: Partial<LicenseFieldsInputV1> = {}): LicenseFieldsInputV1 {
  return {
    name: "Standard",
    thumbnailUrl: "https://cdn.example.test/sky/standard.png",
    shortDescriptions: { codes: ["en"], texts: ["Base game"] },
    publisherPrice: 10_000n,
    discountRate: 0,
    royaltyRate: 500,
    permitResale: true,
    limitAuthCount: 2,
    ...overrides,
  };
}

/** Registers `gameId` for `publisher` (funding the fee) and adds one license. */
export function seedGame(
  host: MarketHostV1,
  args: { gameId?: string; publisher?: string; license?: Partial<LicenseFieldsInputV1>; saleLocked?: boolean } = {}
) {
  const publisher = args.publisher ?? "0xpub";
  const gameId = args.gameId ?? "g1";
  host.wallets.topUp(publisher, host.marketplace.submissionFeeInTokens());
  const { game, publisherCap } = host.registerGame(publisher, {
    gameId,
    metadata: sampleMetadata(),
    saleLocked: args.saleLocked ?? false,
  });
  const license = host.marketplace.createLicense(publisherCap, gameId, sampleLicense(args.license));
  return { game, publisherCap, license, publisher };
}
