// src/ledger/feeMath.v1.ts
// Basis-point arithmetic. Integer only, always floor.

export const BPS_DENOMINATOR = 10_000n;

export function isValidBps(bp: number): boolean {
  return Number.isInteger(bp) && bp >= 0 && bp <= 10_000;
}

export function applyBps(amount: bigint, bp: number): bigint {
  return (amount * BigInt(bp)) / BPS_DENOMINATOR;
}

export function discountedPrice(publisherPrice: bigint, discountRateBp: number): bigint {
  if (discountRateBp <= 0) return publisherPrice;
  return publisherPrice - applyBps(publisherPrice, discountRateBp);
}

export type FeeSplitV1 = { fee: bigint; remainder: bigint };

export function splitFee(amount: bigint, bp: number): FeeSplitV1 {
  const fee = applyBps(amount, bp);
  return { fee, remainder: amount - fee };
}
