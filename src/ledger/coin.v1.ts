// src/ledger/coin.v1.ts
// Currency primitive. Opaque unsigned integer balance; value moves between
// coins only through join/split, so a coin can never be copied.

import { fail } from "../market/errors.v1";

export type TokenAmount = bigint;

export class Coin {
  private _value: TokenAmount;

  private constructor(value: TokenAmount) {
    this._value = value;
  }

  static zero(): Coin {
    return new Coin(0n);
  }

  /**
   * Entry point for value created outside the ledger (wallet top-ups, test
   * fixtures). The ledger itself never calls this.
   */
  static issue(value: TokenAmount): Coin {
    if (value < 0n) throw new RangeError(`COIN_NEGATIVE_VALUE: ${value}`);
    return new Coin(value);
  }

  get value(): TokenAmount {
    return this._value;
  }

  /** Moves the whole of `other` into this coin; `other` is left at zero. */
  join(other: Coin): this {
    if (other === this) return this;
    this._value += other._value;
    other._value = 0n;
    return this;
  }

  split(amount: TokenAmount): Coin {
    if (amount < 0n) throw new RangeError(`COIN_NEGATIVE_SPLIT: ${amount}`);
    if (amount > this._value) {
      fail("InsufficientBalance", `requested ${amount}, available ${this._value}`);
    }
    this._value -= amount;
    return new Coin(amount);
  }

  /** Empties the coin, returning its value as a fresh one. */
  takeAll(): Coin {
    return this.split(this._value);
  }
}
