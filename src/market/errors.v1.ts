// src/market/errors.v1.ts
// Ledger error taxonomy. Every failure aborts the whole operation before any
// store is touched; callers branch on `code`, never on the message text.

export const IDENTITY_ERROR_CODES = [
  "DuplicateGameId",
  "GameNotFound",
  "LicenseNotFound",
  "ListingNotFound",
  "InstanceNotFound",
  "IndexOutOfRange",
] as const;

export const AUTHORIZATION_ERROR_CODES = ["NotPublisher", "NotOwner", "NotAuthorized"] as const;

export const FUNDS_ERROR_CODES = [
  "InsufficientFee",
  "InsufficientFunds",
  "InsufficientBalance",
  "NoFundsAvailable",
  "EmptyPool",
] as const;

export const POLICY_ERROR_CODES = [
  "InvalidDiscountRate",
  "InvalidRoyaltyRate",
  "InvalidFeeRate",
  "SaleLocked",
  "ResaleNotPermitted",
  "AuthLimitExceeded",
  "MalformedLanguagePair",
] as const;

export type IdentityErrorCode = (typeof IDENTITY_ERROR_CODES)[number];
export type AuthorizationErrorCode = (typeof AUTHORIZATION_ERROR_CODES)[number];
export type FundsErrorCode = (typeof FUNDS_ERROR_CODES)[number];
export type PolicyErrorCode = (typeof POLICY_ERROR_CODES)[number];

export type MarketErrorCode = IdentityErrorCode | AuthorizationErrorCode | FundsErrorCode | PolicyErrorCode;

export type MarketErrorGroup = "identity" | "authorization" | "funds" | "policy";

export class MarketErrorV1 extends Error {
  readonly code: MarketErrorCode;
  readonly detail: string;

  constructor(code: MarketErrorCode, detail = "") {
    super(detail ? `${code}: ${detail}` : code);
    this.name = "MarketErrorV1";
    this.code = code;
    this.detail = detail;
  }

  get group(): MarketErrorGroup {
    return errorGroupOf(this.code);
  }
}

export function isMarketError(e: unknown): e is MarketErrorV1 {
  return e instanceof MarketErrorV1;
}

const GROUP_BY_CODE = new Map<MarketErrorCode, MarketErrorGroup>([
  ...IDENTITY_ERROR_CODES.map((c) => [c, "identity"] as const),
  ...AUTHORIZATION_ERROR_CODES.map((c) => [c, "authorization"] as const),
  ...FUNDS_ERROR_CODES.map((c) => [c, "funds"] as const),
  ...POLICY_ERROR_CODES.map((c) => [c, "policy"] as const),
]);

export function errorGroupOf(code: MarketErrorCode): MarketErrorGroup {
  return GROUP_BY_CODE.get(code) ?? "policy";
}

export function fail(code: MarketErrorCode, detail?: string): never {
  throw new MarketErrorV1(code, detail);
}
