// src/domain/fusion.ts
// Hybrid score fusion + deduplication by provenance key.
//
// Pipeline: drop malformed → group by record id → per-family max
// (primary vs discounted fallback) → linear weighting → importance/trust
// multiplier → total-order sort → truncate.

import { InvariantError } from "./errors.js";
import {
  MODALITY_ORDER,
  type Candidate,
  type FusionWeights,
  type MemoryRecord,
  type Modality,
  type RankedCandidate
} from "./types.js";

export interface DroppedCandidate {
  recordRef: string | null;
  reason: "missing_provenance" | "missing_text";
}

export interface MergeOptions {
  limit?: number;
  /** Receives malformed candidates instead of them disappearing silently. */
  dropped?: DroppedCandidate[];
}

interface Group {
  record: MemoryRecord;
  scores: Partial<Record<Modality, number>>;
}

/** Validate, then group candidates by record id keeping the best raw score per modality. */
export function groupByRecord(candidates: Candidate[], dropped?: DroppedCandidate[]): Map<string, Group> {
  const groups = new Map<string, Group>();
  for (const c of candidates) {
    // Blank ids are rejected; the key itself is carried verbatim.
    const id = typeof c.record.id === "string" ? c.record.id : "";
    if (!id.trim()) {
      dropped?.push({ recordRef: null, reason: "missing_provenance" });
      continue;
    }
    if (!hasText(c.record)) {
      dropped?.push({ recordRef: id, reason: "missing_text" });
      continue;
    }

    const slot = groups.get(id);
    if (!slot) {
      const scores: Partial<Record<Modality, number>> = {};
      scores[c.modality] = c.score;
      groups.set(id, { record: c.record, scores });
      continue;
    }
    if (!sameContent(slot.record, c.record)) {
      throw new InvariantError(`duplicate provenance key with conflicting content: ${id}`);
    }
    const prev = slot.scores[c.modality];
    if (prev === undefined || c.score > prev) slot.scores[c.modality] = c.score;
  }
  return groups;
}

function hasText(r: MemoryRecord): boolean {
  return (typeof r.text === "string" && r.text.trim() !== "") ||
    (typeof r.text_companion === "string" && r.text_companion.trim() !== "");
}

function sameContent(a: MemoryRecord, b: MemoryRecord): boolean {
  return a.text === b.text && a.ts === b.ts && a.kind === b.kind;
}

/** Weighted per-modality contributions before the secondary boost. */
export function weightedContributions(
  scores: Partial<Record<Modality, number>>,
  w: FusionWeights
): Partial<Record<Modality, number>> {
  const out: Partial<Record<Modality, number>> = {};
  for (const m of MODALITY_ORDER) {
    const s = scores[m];
    if (s === undefined) continue;
    const base = m === "lexical" || m === "fallback-lexical" ? w.lexical : w.vector;
    const discount = m.startsWith("fallback-") ? w.fallbackDiscount : 1;
    out[m] = base * discount * s;
  }
  return out;
}

/**
 * Primary and fallback of the same family do not add up: the family
 * contributes its larger weighted score, so a fallback match only wins
 * when it beats the primary match after the discount.
 */
export function baseScore(contrib: Partial<Record<Modality, number>>): number {
  const lexical = Math.max(contrib["lexical"] ?? 0, contrib["fallback-lexical"] ?? 0);
  const vector = Math.max(contrib["vector"] ?? 0, contrib["fallback-vector"] ?? 0);
  return lexical + vector;
}

/**
 * Multiplier in [1 - untrustedPenalty, 1 + importanceBoost + trustedBoost].
 * With the resolver's clamps that is [0.5, 2.0]: a base score more than
 * four times another's can never be overtaken by boosts alone.
 */
export function boostMultiplier(record: MemoryRecord, w: FusionWeights): number {
  const importance = typeof record.importance === "number" && Number.isFinite(record.importance)
    ? Math.max(0, Math.min(1, record.importance))
    : 0;
  let m = 1 + w.importanceBoost * importance;
  if (record.trust === "trusted") m += w.trustedBoost;
  if (record.trust === "untrusted") m -= w.untrustedPenalty;
  return m;
}

function tsValue(ts: string): number {
  const n = Date.parse(ts);
  return Number.isNaN(n) ? 0 : n;
}

/** Total order: fused desc, importance desc, timestamp desc, id asc (code-unit order). */
export function compareRanked(a: RankedCandidate, b: RankedCandidate): number {
  if (a.score !== b.score) return b.score - a.score;
  const ia = a.record.importance ?? -1;
  const ib = b.record.importance ?? -1;
  if (ia !== ib) return ib - ia;
  const ta = tsValue(a.record.ts);
  const tb = tsValue(b.record.ts);
  if (ta !== tb) return tb - ta;
  if (a.record.id < b.record.id) return -1;
  if (a.record.id > b.record.id) return 1;
  return 0;
}

/** Same scores, keys in canonical modality order (serialization must not depend on arrival order). */
function canonicalScores(scores: Partial<Record<Modality, number>>): Partial<Record<Modality, number>> {
  const out: Partial<Record<Modality, number>> = {};
  for (const m of MODALITY_ORDER) {
    const s = scores[m];
    if (s !== undefined) out[m] = s;
  }
  return out;
}

function strongestModality(contrib: Partial<Record<Modality, number>>): Modality {
  let best: Modality = "lexical";
  let bestScore = -Infinity;
  for (const m of MODALITY_ORDER) {
    const s = contrib[m];
    if (s !== undefined && s > bestScore) {
      best = m;
      bestScore = s;
    }
  }
  return best;
}

/**
 * Merge candidates from all requests into one ranked, deduplicated list.
 * A pure function of the candidate multiset: arrival order never matters.
 */
export function merge(candidates: Candidate[], weights: FusionWeights, options: MergeOptions = {}): RankedCandidate[] {
  const groups = groupByRecord(candidates, options.dropped);

  const ranked: RankedCandidate[] = [];
  for (const { record, scores } of groups.values()) {
    const contrib = weightedContributions(scores, weights);
    const base = baseScore(contrib);
    if (base <= 0) continue;
    ranked.push({
      record,
      score: base * boostMultiplier(record, weights),
      rank: 0,
      modality: strongestModality(contrib),
      scores: canonicalScores(scores)
    });
  }

  ranked.sort(compareRanked);
  const limit = options.limit !== undefined ? Math.max(0, options.limit) : ranked.length;
  return ranked.slice(0, limit).map((r, i) => ({ ...r, rank: i + 1 }));
}
