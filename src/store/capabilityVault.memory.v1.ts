// src/store/capabilityVault.memory.v1.ts
// HTTP edge only. Capability objects cannot cross the wire, so the holder
// gets an opaque handle instead and presents it in `x-capability`. The core
// never sees handles; it authorizes the resolved object by bound id.

import { randomUUID } from "node:crypto";

import type { Capability, PlatformCapability, PublisherCapability } from "../auth/capability.v1";
import { fail } from "../market/errors.v1";

export class CapabilityVaultMemoryV1 {
  private readonly byHandle = new Map<string, Capability>();

  deposit(cap: Capability, handle: string = `cap_${randomUUID()}`): string {
    if (this.byHandle.has(handle)) throw new Error(`VAULT_DUPLICATE_HANDLE: ${handle}`);
    this.byHandle.set(handle, cap);
    return handle;
  }

  resolvePlatform(handle: string | null): PlatformCapability {
    const cap = handle ? this.byHandle.get(handle) : undefined;
    if (!cap || cap.kind !== "PLATFORM") fail("NotAuthorized", "platform capability required");
    return cap;
  }

  resolvePublisher(handle: string | null): PublisherCapability {
    const cap = handle ? this.byHandle.get(handle) : undefined;
    if (!cap || cap.kind !== "PUBLISHER") fail("NotPublisher", "publisher capability required");
    return cap;
  }
}
