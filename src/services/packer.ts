// src/services/packer.ts
// Context pack assembly: greedy admission under item and token budgets,
// trust gating, deterministic serialization, and a redaction-safe trace.

import type { DroppedCandidate } from "../domain/fusion.js";
import type {
  FallbackDecision,
  Modality,
  RankedCandidate,
  TrustPolicy,
  TrustTier,
  Warning
} from "../domain/types.js";
import { roundScore, safeNowIso, stableJson } from "./ids.js";
import { labelFromScore, type ImportanceLabel } from "./importance.js";
import type { LaneReport } from "./planner.js";
import { debug } from "./log.js";

const log = debug("ledger:pack");

export const PACK_SCHEMA = "context-pack.v1";
export const TRACE_KIND = "context-pack.trace.v1";

export interface PackBudget {
  budgetTokens: number;
  maxItems: number;
  trustPolicy: TrustPolicy;
}

export type ReasonCode =
  | "within_item_limit"
  | "within_budget"
  | "matched_lexical"
  | "matched_vector"
  | "matched_fallback"
  | "budget_exhausted"
  | "max_items_reached"
  | "trust_policy"
  | "missing_provenance"
  | "missing_text"
  | "duplicate_record";

export interface Citation {
  recordRef: string;
  source: string | null;
}

export interface PackItem {
  recordRef: string;
  layer: "L1";
  type: string;
  importance: number | null;
  importance_label: ImportanceLabel;
  trust: TrustTier;
  text: string;
  citations: Citation[];
}

export interface TraceEntry {
  recordRef: string | null;
  rank: number | null;
  decision: "included" | "excluded";
  reasons: ReasonCode[];
  detail: string | null;
  modality: Modality | null;
  score: number | null;
  scores: Partial<Record<Modality, number>>;
  trust: TrustTier | null;
  importance_label: ImportanceLabel;
  tokens: number | null;
}

export interface PackTrace {
  kind: typeof TRACE_KIND;
  ts: string;
  budgets: { budget_tokens: number; max_items: number; trust_policy: TrustPolicy };
  lanes: { requests: LaneReport[]; fallback: FallbackDecision | null };
  candidates: TraceEntry[];
  output: { included: number; excluded: number; used_tokens: number };
}

export interface ContextPack {
  schema: typeof PACK_SCHEMA;
  meta: {
    ts: string;
    query: string;
    budget_tokens: number;
    max_items: number;
    trust_policy: TrustPolicy;
    used_tokens: number;
  };
  bundle_text: string;
  items: PackItem[];
  notes: { warnings: Warning[]; fallback: FallbackDecision | null };
  trace: PackTrace;
}

export interface PackContext {
  now?: () => Date;
  lanes?: LaneReport[];
  fallback?: FallbackDecision | null;
  warnings?: Warning[];
  /** Candidates the scorer already dropped as malformed. */
  dropped?: DroppedCandidate[];
}

/** Deterministic length function: ~4 characters per token, at least 1. */
export function estimateTokens(text: string): number {
  return Math.max(1, Math.ceil(text.length / 4));
}

export function itemText(text: string): string {
  return text.replace(/\s*\n\s*/g, " ").trim();
}

export function bundleLine(item: PackItem): string {
  return `- [${item.recordRef}] ${item.text}`;
}

function matchReason(modality: Modality): ReasonCode {
  if (modality === "lexical") return "matched_lexical";
  if (modality === "vector") return "matched_vector";
  return "matched_fallback";
}

function roundScores(scores: Partial<Record<Modality, number>>): Partial<Record<Modality, number>> {
  const out: Partial<Record<Modality, number>> = {};
  for (const [m, s] of Object.entries(scores)) {
    if (isModality(m) && typeof s === "number") out[m] = roundScore(s);
  }
  return out;
}

function isModality(m: string): m is Modality {
  return m === "lexical" || m === "vector" || m === "fallback-lexical" || m === "fallback-vector";
}

function excluded(
  c: RankedCandidate | null,
  recordRef: string | null,
  reason: ReasonCode,
  detail: string,
  tokens: number | null = null
): TraceEntry {
  return {
    recordRef,
    rank: c ? c.rank : null,
    decision: "excluded",
    reasons: [reason],
    detail,
    modality: c ? c.modality : null,
    score: c ? roundScore(c.score) : null,
    scores: c ? roundScores(c.scores) : {},
    trust: c ? c.record.trust : null,
    importance_label: labelFromScore(c ? c.record.importance : null),
    tokens
  };
}

/**
 * Greedy selection in scorer order. An item that would overflow the token
 * budget is skipped and the scan continues, so a later smaller item can
 * still be admitted.
 */
export function pack(query: string, ranked: RankedCandidate[], budget: PackBudget, ctx: PackContext = {}): ContextPack {
  const ts = safeNowIso((ctx.now ?? (() => new Date()))());
  const budgetTokens = Math.max(0, Math.floor(budget.budgetTokens));
  const maxItems = Math.max(0, Math.floor(budget.maxItems));

  const items: PackItem[] = [];
  const entries: TraceEntry[] = [];
  const seen = new Set<string>();
  let used = 0;

  for (const d of ctx.dropped ?? []) {
    const detail = d.reason === "missing_provenance" ? "excluded: no provenance key" : "excluded: no text";
    entries.push(excluded(null, d.recordRef, d.reason, detail));
  }

  for (const c of ranked) {
    const r = c.record;
    const ref = typeof r.id === "string" ? r.id : "";
    if (!ref.trim()) {
      entries.push(excluded(c, null, "missing_provenance", "excluded: no provenance key"));
      continue;
    }
    if (seen.has(ref)) {
      entries.push(excluded(c, ref, "duplicate_record", "excluded: duplicate record"));
      continue;
    }
    seen.add(ref);

    if (budget.trustPolicy === "trusted-only" && r.trust !== "trusted") {
      entries.push(excluded(c, ref, "trust_policy", `excluded: trust=${r.trust} and policy=trusted-only`));
      continue;
    }

    const text = itemText(r.text || r.text_companion || "");
    if (!text) {
      entries.push(excluded(c, ref, "missing_text", "excluded: no text"));
      continue;
    }

    const tokens = estimateTokens(text);
    if (items.length >= maxItems) {
      entries.push(excluded(c, ref, "max_items_reached", "excluded: max items reached", tokens));
      continue;
    }
    if (used + tokens > budgetTokens) {
      entries.push(excluded(c, ref, "budget_exhausted", "excluded: budget exhausted", tokens));
      continue;
    }

    used += tokens;
    const importance = typeof r.importance === "number" ? roundScore(r.importance) : null;
    items.push({
      recordRef: ref,
      layer: "L1",
      type: r.kind,
      importance,
      importance_label: labelFromScore(importance),
      trust: r.trust,
      text,
      citations: [{ recordRef: ref, source: r.source_ref ?? null }]
    });
    entries.push({
      recordRef: ref,
      rank: c.rank,
      decision: "included",
      reasons: ["within_item_limit", "within_budget", matchReason(c.modality)],
      detail: null,
      modality: c.modality,
      score: roundScore(c.score),
      scores: roundScores(c.scores),
      trust: r.trust,
      importance_label: labelFromScore(importance),
      tokens
    });
  }

  const fallback = ctx.fallback ?? null;
  const trace: PackTrace = {
    kind: TRACE_KIND,
    ts,
    budgets: { budget_tokens: budgetTokens, max_items: maxItems, trust_policy: budget.trustPolicy },
    lanes: { requests: ctx.lanes ?? [], fallback },
    candidates: entries,
    output: { included: items.length, excluded: entries.length - items.length, used_tokens: used }
  };

  log("pack", trace.output);
  return {
    schema: PACK_SCHEMA,
    meta: {
      ts,
      query,
      budget_tokens: budgetTokens,
      max_items: maxItems,
      trust_policy: budget.trustPolicy,
      used_tokens: used
    },
    bundle_text: items.map(bundleLine).join("\n"),
    items,
    notes: { warnings: ctx.warnings ?? [], fallback },
    trace
  };
}

/** Sorted keys, two-space indent, trailing newline. */
export function serializePack(p: ContextPack): string {
  return stableJson(p, 2) + "\n";
}
