// src/ledger/valuePool.v1.ts
// Accumulating balance. Grows only by deposit, shrinks only by withdrawAll.

import { fail } from "../market/errors.v1";
import { Coin, type TokenAmount } from "./coin.v1";

export class ValuePool {
  private readonly balance = Coin.zero();

  constructor(readonly label: string) {}

  get value(): TokenAmount {
    return this.balance.value;
  }

  get isEmpty(): boolean {
    return this.balance.value === 0n;
  }

  deposit(coin: Coin): void {
    this.balance.join(coin);
  }

  withdrawAll(): Coin {
    if (this.isEmpty) fail("EmptyPool", this.label);
    return this.balance.takeAll();
  }
}

/** Splits `amount` out of a caller-held coin. */
export function takeExact(from: Coin, amount: TokenAmount): Coin {
  return from.split(amount);
}
