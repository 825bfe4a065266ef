// src/store/walletStore.memory.v1.ts
// In-memory wallets. Each address holds one Coin; a debit splits an exact
// amount out of it.

import { Coin, type TokenAmount } from "../ledger/coin.v1";
import type { Address } from "../market/types.v1";

export type WalletTxReasonV1 =
  | "DEV_TOPUP"
  | "SUBMISSION_FEE"
  | "PURCHASE"
  | "RESALE_PURCHASE"
  | "REFUND"
  | "WITHDRAWAL";

export type WalletTxV1 = {
  address: Address;
  amount: TokenAmount; // signed
  reason: WalletTxReasonV1;
  at: string;
};

export class WalletStoreMemoryV1 {
  private readonly byAddress = new Map<Address, Coin>();
  private readonly txs: WalletTxV1[] = [];

  constructor(private readonly clock: () => string = () => new Date().toISOString()) {}

  balanceOf(address: Address): TokenAmount {
    return this.byAddress.get(address)?.value ?? 0n;
  }

  credit(address: Address, coin: Coin, reason: WalletTxReasonV1): void {
    const amount = coin.value;
    let wallet = this.byAddress.get(address);
    if (!wallet) {
      wallet = Coin.zero();
      this.byAddress.set(address, wallet);
    }
    wallet.join(coin);
    this.txs.push({ address, amount, reason, at: this.clock() });
  }

  /** Splits exactly `amount` out of the wallet; fails InsufficientBalance. */
  debit(address: Address, amount: TokenAmount, reason: WalletTxReasonV1): Coin {
    const wallet = this.byAddress.get(address) ?? Coin.zero();
    const coin = wallet.split(amount);
    this.txs.push({ address, amount: -amount, reason, at: this.clock() });
    return coin;
  }

  topUp(address: Address, amount: TokenAmount): TokenAmount {
    this.credit(address, Coin.issue(amount), "DEV_TOPUP");
    return this.balanceOf(address);
  }

  ledger(address?: Address): WalletTxV1[] {
    return address ? this.txs.filter((t) => t.address === address) : [...this.txs];
  }

  totalHeld(): TokenAmount {
    let sum = 0n;
    for (const coin of this.byAddress.values()) sum += coin.value;
    return sum;
  }
}
