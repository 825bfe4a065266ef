// src/pricing/priceOracle.v1.ts
// USD → token conversion. The ledger treats the oracle as pure and
// synchronous; a live feed would refresh its rate outside any operation.

import type { TokenAmount } from "../ledger/coin.v1";

export interface PriceOracleV1 {
  usdToToken(usdAmount: bigint): TokenAmount;
}

export class FixedRatioPriceOracleV1 implements PriceOracleV1 {
  readonly scale: bigint;

  constructor(tokenDecimals: number) {
    if (!Number.isInteger(tokenDecimals) || tokenDecimals < 0) {
      throw new RangeError(`ORACLE_INVALID_DECIMALS: ${tokenDecimals}`);
    }
    this.scale = 10n ** BigInt(tokenDecimals);
  }

  usdToToken(usdAmount: bigint): TokenAmount {
    return usdAmount * this.scale;
  }
}
