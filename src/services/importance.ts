// src/services/importance.ts
// Importance parsing, labels, and the fill-missing write.

import type { RecordStore } from "../domain/types.js";
import { debug } from "./log.js";

const log = debug("ledger:importance");

export type ImportanceLabel = "must_remember" | "nice_to_have" | "ignore" | "unknown";

const LABEL_TO_SCORE: Record<Exclude<ImportanceLabel, "unknown">, number> = {
  ignore: 0.0,
  nice_to_have: 0.5,
  must_remember: 0.8
};

const LABEL_ALIASES: Record<string, Exclude<ImportanceLabel, "unknown">> = {
  "must remember": "must_remember",
  "must-remember": "must_remember",
  "nice to have": "nice_to_have",
  "nice-to-have": "nice_to_have",
  low: "ignore",
  medium: "nice_to_have",
  high: "must_remember"
};

export function clamp01(x: number): number {
  if (!Number.isFinite(x)) return 0;
  return Math.max(0, Math.min(1, x));
}

export function labelFromScore(score: number | null | undefined): ImportanceLabel {
  if (score === null || score === undefined || !Number.isFinite(score)) return "unknown";
  const s = clamp01(score);
  if (s >= 0.8) return "must_remember";
  if (s >= 0.5) return "nice_to_have";
  return "ignore";
}

function normalizeLabel(v: unknown): Exclude<ImportanceLabel, "unknown"> | null {
  if (typeof v !== "string") return null;
  const key = v.trim().toLowerCase();
  const aliased = LABEL_ALIASES[key] ?? key.replace(/[- ]/g, "_");
  return aliased === "must_remember" || aliased === "nice_to_have" || aliased === "ignore" ? aliased : null;
}

/**
 * Accepts a number, `{ score }`, or `{ label }` (with aliases).
 * Returns a score clamped to [0, 1], or null when nothing parseable is present.
 */
export function parseImportance(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? clamp01(value) : null;
  if (value && typeof value === "object" && !Array.isArray(value)) {
    const score: unknown = Reflect.get(value, "score");
    if (typeof score === "number" && Number.isFinite(score)) return clamp01(score);
    const label = normalizeLabel(Reflect.get(value, "label"));
    if (label) return LABEL_TO_SCORE[label];
  }
  return null;
}

export interface FillImportanceResult {
  recordRef: string;
  applied: boolean;
  importance: number;
}

/**
 * Fill-missing importance write. The store performs the check and the write
 * atomically; an existing value is never replaced.
 */
export async function fillImportance(store: RecordStore, id: string, score: number): Promise<FillImportanceResult> {
  const importance = clamp01(score);
  const applied = await store.setImportanceIfAbsent(id, importance);
  log("fill", { id, importance, applied });
  return { recordRef: id, applied, importance };
}
