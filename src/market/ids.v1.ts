// src/market/ids.v1.ts

import { randomUUID } from "node:crypto";

export type IdSourceV1 = (kind: "license" | "instance" | "listing" | "root") => string;

export const randomIds: IdSourceV1 = (kind) => `${kind}_${randomUUID()}`;

/** Deterministic ids (`license_1`, `instance_1`, ...) for tests and replays. */
export function sequentialIds(): IdSourceV1 {
  const counters = new Map<string, number>();
  return (kind) => {
    const n = (counters.get(kind) ?? 0) + 1;
    counters.set(kind, n);
    return `${kind}_${n}`;
  };
}
