// src/market/types.v1.ts

export type Address = string;
export type GameId = string;
export type LicenseId = string;
export type InstanceId = string;
export type ListingId = string;

export const NULL_ADDRESS: Address = "0x0";

/** Two-letter language code → text. */
export type LocalizedText = Record<string, string>;

/** Wire form of a localized field: parallel arrays of codes and texts. */
export type LanguagePairsInput = { codes: string[]; texts: string[] };

export type GameMetadataV1 = {
  name: string;
  thumbnailUrl: string;
  imageUrls: string[];
  videoUrls: string[];
  shortDescriptions: LocalizedText;
  genres: string[];
  developer: string;
  publisher: string;
  languages: string[];
  platforms: string[];
  systemRequirements: string;
};

export type GameMetadataInputV1 = Omit<GameMetadataV1, "shortDescriptions"> & {
  shortDescriptions: LanguagePairsInput;
};

export type LicenseV1 = {
  licenseId: LicenseId;
  gameId: GameId;
  name: string;
  thumbnailUrl: string;
  shortDescriptions: LocalizedText;
  publisherPrice: bigint; // USD units
  discountRate: number; // bp
  royaltyRate: number; // bp
  permitResale: boolean;
  limitAuthCount: number;
};

export type LicenseFieldsInputV1 = {
  name: string;
  thumbnailUrl: string;
  shortDescriptions: LanguagePairsInput;
  publisherPrice: bigint;
  discountRate: number;
  royaltyRate: number;
  permitResale: boolean;
  limitAuthCount: number;
};

export type GameV1 = {
  gameId: GameId;
  metadata: GameMetadataV1;
  saleLocked: boolean;
  licenses: Map<LicenseId, LicenseV1>;
  /** Insertion order of `licenses`, for positional lookup. */
  licenseOrder: LicenseId[];
};

export type LicenseInstanceV1 = {
  instanceId: InstanceId;
  gameId: GameId;
  licenseId: LicenseId;
  authCount: number;
  // snapshot at purchase time
  licenseName: string;
  licenseThumbnailUrl: string;
  owner: Address;
  user: Address;
};

export type ResellerListingV1 = {
  listingId: ListingId;
  resellerName: string;
  description: string;
  price: bigint; // USD units
  instance: LicenseInstanceV1;
};
