// Request body / param schemas. Amounts arrive as decimal strings (or safe
// integers) and leave zod as bigint. Rate ranges are left to the ledger so
// it can answer with its own error codes.

import { z } from "zod";

export const AmountSchema = z
  .union([z.string().regex(/^\d+$/, "must be a non-negative integer string"), z.number().int().nonnegative()])
  .transform((v) => BigInt(v));

export const LanguagePairsSchema = z.object({
  codes: z.array(z.string()),
  texts: z.array(z.string()),
});

const EMPTY_PAIRS = { codes: [], texts: [] };

export const GameMetadataSchema = z.object({
  name: z.string().min(1),
  thumbnailUrl: z.string().default(""),
  imageUrls: z.array(z.string()).default([]),
  videoUrls: z.array(z.string()).default([]),
  shortDescriptions: LanguagePairsSchema.default(EMPTY_PAIRS),
  genres: z.array(z.string()).default([]),
  developer: z.string().default(""),
  publisher: z.string().default(""),
  languages: z.array(z.string()).default([]),
  platforms: z.array(z.string()).default([]),
  systemRequirements: z.string().default(""),
});

export const RegisterGameBodySchema = z.object({
  gameId: z.string().min(1),
  metadata: GameMetadataSchema,
  saleLocked: z.boolean().default(false),
  submissionFee: AmountSchema.optional(),
});

export const GameMetadataPatchSchema = GameMetadataSchema.partial();

export const SaleLockBodySchema = z.object({ locked: z.boolean() });

export const LicenseFieldsSchema = z.object({
  name: z.string().min(1),
  thumbnailUrl: z.string().default(""),
  shortDescriptions: LanguagePairsSchema.default(EMPTY_PAIRS),
  publisherPrice: AmountSchema,
  discountRate: z.number().int().default(0),
  royaltyRate: z.number().int().default(0),
  permitResale: z.boolean().default(false),
  limitAuthCount: z.number().int().nonnegative(),
});

export const LicensePatchSchema = LicenseFieldsSchema.partial();

export const PurchaseBodySchema = z.object({
  gameId: z.string().min(1),
  licenseId: z.string().min(1),
  payment: AmountSchema.optional(),
});

export const CreateListingBodySchema = z.object({
  instanceId: z.string().min(1),
  resellerName: z.string().min(1),
  description: z.string().default(""),
  price: AmountSchema,
});

export const ResellBodySchema = z.object({
  payment: AmountSchema.optional(),
});

export const FeeScheduleBodySchema = z.object({
  purchaseFeeRateBp: z.number().int().optional(),
  submissionFeeUsd: AmountSchema.optional(),
});

export const TopUpBodySchema = z.object({
  amount: AmountSchema,
});

export const IndexParamSchema = z.object({
  index: z.coerce.number().int(),
});
