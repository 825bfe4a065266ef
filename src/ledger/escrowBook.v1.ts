// src/ledger/escrowBook.v1.ts
// Keyed escrow pools, created lazily on first deposit. Game-keyed and
// address-keyed books are separate instances so the two key spaces never mix.

import { fail } from "../market/errors.v1";
import type { Coin, TokenAmount } from "./coin.v1";
import { ValuePool } from "./valuePool.v1";

export type EscrowEntryV1<K extends string> = { key: K; value: TokenAmount };

export class EscrowBookV1<K extends string> {
  private readonly pools = new Map<K, ValuePool>();

  constructor(readonly label: string) {}

  deposit(key: K, coin: Coin): void {
    let pool = this.pools.get(key);
    if (!pool) {
      pool = new ValuePool(`${this.label}:${key}`);
      this.pools.set(key, pool);
    }
    pool.deposit(coin);
  }

  balanceOf(key: K): TokenAmount {
    return this.pools.get(key)?.value ?? 0n;
  }

  has(key: K): boolean {
    return this.pools.has(key);
  }

  /** Drains the entry for `key`; fails NoFundsAvailable if absent or empty. */
  drain(key: K): Coin {
    const pool = this.pools.get(key);
    if (!pool || pool.isEmpty) fail("NoFundsAvailable", `${this.label}:${key}`);
    return pool.withdrawAll();
  }

  total(): TokenAmount {
    let sum = 0n;
    for (const pool of this.pools.values()) sum += pool.value;
    return sum;
  }

  entries(): EscrowEntryV1<K>[] {
    return Array.from(this.pools.entries()).map(([key, pool]) => ({ key, value: pool.value }));
  }
}
