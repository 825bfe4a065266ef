// src/market/events.v1.ts
// Domain events. Emitted after an operation commits; fire-and-forget and
// never read back by the ledger.

import type { MarketLogger } from "../observability/logger.v1";
import type { Address, GameId, InstanceId, LicenseId, ListingId } from "./types.v1";

export type WithdrawnPoolV1 = "PURCHASE_FEES" | "SUBMISSION_FEES" | "GAME_PROCEEDS" | "ROYALTIES" | "PAYOUT";

export type MarketEventBodyV1 =
  | { type: "GameRegistered"; payload: { gameId: GameId } }
  | { type: "GameUpdated"; payload: { gameId: GameId } }
  | { type: "LicenseCreated"; payload: { gameId: GameId; licenseId: LicenseId } }
  | { type: "LicenseUpdated"; payload: { gameId: GameId; licenseId: LicenseId } }
  | { type: "Purchased"; payload: { gameId: GameId; licenseId: LicenseId; instanceId: InstanceId } }
  | { type: "Authenticated"; payload: { instanceId: InstanceId; user: Address } }
  | { type: "Listed"; payload: { listingId: ListingId; instanceId: InstanceId } }
  | { type: "Delisted"; payload: { listingId: ListingId } }
  | { type: "Resold"; payload: { listingId: ListingId } }
  | { type: "Withdrawn"; payload: { pool: WithdrawnPoolV1; beneficiary: string; amount: string } }
  | { type: "FeeScheduleChanged"; payload: { purchaseFeeRateBp: number; submissionFeeUsd: string } };

export type MarketEventTypeV1 = MarketEventBodyV1["type"];

export type MarketEventV1 = MarketEventBodyV1 & {
  seq: number;
  at: string; // ISO string
};

export interface EventSinkV1 {
  emit(event: MarketEventBodyV1): void;
}

export function nowIso(): string {
  return new Date().toISOString();
}

export function makeEvent(args: { seq: number; body: MarketEventBodyV1; at?: string }): MarketEventV1 {
  return { ...args.body, seq: args.seq, at: args.at ?? nowIso() };
}

/** Keeps every event in order; also mirrors them to a logger when given one. */
export class MemoryEventSinkV1 implements EventSinkV1 {
  private readonly _events: MarketEventV1[] = [];

  constructor(private readonly opts: { logger?: MarketLogger; clock?: () => string } = {}) {}

  emit(body: MarketEventBodyV1): void {
    const event = makeEvent({ seq: this._events.length + 1, body, at: this.opts.clock?.() });
    this._events.push(event);
    this.opts.logger?.info({ event }, `market event ${event.type}`);
  }

  get events(): readonly MarketEventV1[] {
    return this._events;
  }

  since(seq: number): MarketEventV1[] {
    return this._events.filter((e) => e.seq > seq);
  }

  ofType<T extends MarketEventTypeV1>(type: T): Array<Extract<MarketEventV1, { type: T }>> {
    return this._events.filter((e): e is Extract<MarketEventV1, { type: T }> => e.type === type);
  }
}
