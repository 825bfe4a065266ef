// src/auth/capability.v1.ts
// Bearer capabilities. A token only carries the id of the object it unlocks;
// authorization is equality against that id, never an owner lookup.
//
// Tokens can only be minted through the issue* functions below: the
// constructor key is module-private and the #genuine brand cannot be forged
// by a structurally identical object literal.

import { fail } from "../market/errors.v1";

const ISSUE_KEY: unique symbol = Symbol("capability.issue");

let serialCounter = 0;

export type CapabilityKind = "PLATFORM" | "PUBLISHER";

abstract class CapabilityBase<K extends CapabilityKind> {
  readonly #genuine = true;

  readonly serial: number;

  protected constructor(key: typeof ISSUE_KEY, readonly kind: K, readonly boundId: string) {
    if (key !== ISSUE_KEY) throw new TypeError("CAPABILITY_FORGED");
    this.serial = ++serialCounter;
  }

  static isGenuine(x: unknown): boolean {
    return typeof x === "object" && x !== null && #genuine in x;
  }
}

export class PlatformCapability extends CapabilityBase<"PLATFORM"> {
  constructor(key: typeof ISSUE_KEY, boundId: string) {
    super(key, "PLATFORM", boundId);
  }
}

export class PublisherCapability extends CapabilityBase<"PUBLISHER"> {
  constructor(key: typeof ISSUE_KEY, boundId: string) {
    super(key, "PUBLISHER", boundId);
  }
}

export type Capability = PlatformCapability | PublisherCapability;

export function issuePlatformCapability(rootId: string): PlatformCapability {
  return new PlatformCapability(ISSUE_KEY, rootId);
}

export function issuePublisherCapability(gameId: string): PublisherCapability {
  return new PublisherCapability(ISSUE_KEY, gameId);
}

function isBoundTo(token: Capability, kind: CapabilityKind, targetId: string): boolean {
  return CapabilityBase.isGenuine(token) && token.kind === kind && token.boundId === targetId;
}

/** Platform-level check; fails NotAuthorized. */
export function authorize(token: PlatformCapability, targetId: string): void {
  if (!isBoundTo(token, "PLATFORM", targetId)) fail("NotAuthorized", `capability not bound to ${targetId}`);
}

/** Per-game check; fails NotPublisher. */
export function authorizePublisher(token: PublisherCapability, gameId: string): void {
  if (!isBoundTo(token, "PUBLISHER", gameId)) fail("NotPublisher", `capability not bound to game ${gameId}`);
}
