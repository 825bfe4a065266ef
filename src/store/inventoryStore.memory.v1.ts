// src/store/inventoryStore.memory.v1.ts
// Instances in direct ownership. A listed instance is not here; it lives
// inside its listing until resold or delisted.

import { fail } from "../market/errors.v1";
import type { Address, InstanceId, LicenseInstanceV1 } from "../market/types.v1";

export class InventoryStoreMemoryV1 {
  private readonly byInstanceId = new Map<InstanceId, LicenseInstanceV1>();

  put(instance: LicenseInstanceV1): void {
    if (this.byInstanceId.has(instance.instanceId)) {
      throw new Error(`INVENTORY_DUPLICATE_INSTANCE_ID: ${instance.instanceId}`);
    }
    this.byInstanceId.set(instance.instanceId, instance);
  }

  peek(instanceId: InstanceId): LicenseInstanceV1 {
    const found = this.byInstanceId.get(instanceId);
    if (!found) fail("InstanceNotFound", instanceId);
    return found;
  }

  remove(instanceId: InstanceId): LicenseInstanceV1 {
    const found = this.peek(instanceId);
    this.byInstanceId.delete(instanceId);
    return found;
  }

  listByOwner(owner: Address): LicenseInstanceV1[] {
    return Array.from(this.byInstanceId.values()).filter((i) => i.owner === owner);
  }

  get size(): number {
    return this.byInstanceId.size;
  }
}
