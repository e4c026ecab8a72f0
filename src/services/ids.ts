// src/services/ids.ts
// Stable hashing and deterministic serialization helpers.

import { createHash } from "node:crypto";

export function safeNowIso(now: Date = new Date()): string {
  return now.toISOString();
}

/** Short, stable key for an arbitrary string (dedupe keys, signatures). */
export function shortHash(input: string, len = 16): string {
  return createHash("sha256").update(input, "utf8").digest("hex").slice(0, len);
}

/** Deterministic JSON stringify (sorted keys). */
export function stableJson(obj: unknown, indent?: number): string {
  return JSON.stringify(sortKeys(obj), null, indent);
}

/** Round to a fixed number of decimals so float noise never reaches serialized output. */
export function roundScore(n: number, decimals = 6): number {
  if (!Number.isFinite(n)) return 0;
  const f = Math.pow(10, decimals);
  return Math.round(n * f) / f;
}

/** Recursively sort object keys; undefined-valued keys are dropped the way JSON.stringify drops them. */
function sortKeys(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(sortKeys);
  if (v && typeof v === "object") {
    const sorted: Record<string, unknown> = {};
    for (const [k, val] of Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[k] = sortKeys(val);
    }
    return sorted;
  }
  return v;
}
