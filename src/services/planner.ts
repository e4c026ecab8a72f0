// src/services/planner.ts
// Query planning: primary lexical/vector requests, the cross-language
// fallback decision, and bounded concurrent execution against the store.

import { CancelledError, TimeoutError, errorMessage } from "../domain/errors.js";
import type {
  Candidate,
  EmbeddingStatus,
  FallbackDecision,
  Modality,
  RecordStore,
  SearchRequest,
  TextField,
  Warning
} from "../domain/types.js";
import type { ClampConfig, FallbackConfig, SearchTuning } from "./config.js";
import { clampEmbeddingInput, probeEmbedding, raceSignal, withTimeout, type EmbeddingGateway } from "./embedder.js";
import { checkFingerprint, type FingerprintCheck } from "./fingerprint.js";
import { debug, warn } from "./log.js";

const log = debug("ledger:planner");

// ---------------------------
// CJK terms
// ---------------------------

const CJK_RUN = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}]+/gu;
const CJK_HINTS = new Set(["zh", "ja", "ko", "cjk"]);
export const MAX_CJK_TERMS = 16;

export function hasCjk(text: string): boolean {
  return new RegExp(CJK_RUN.source, "u").test(text);
}

/** CJK runs followed by their overlapping bigrams; stable order, de-duplicated, capped. */
export function cjkTerms(text: string, max = MAX_CJK_TERMS): string[] {
  const runs = text.normalize("NFKC").match(CJK_RUN) ?? [];
  const out: string[] = [];
  const seen = new Set<string>();
  const push = (t: string) => {
    if (out.length < max && !seen.has(t)) {
      seen.add(t);
      out.push(t);
    }
  };
  for (const run of runs) push(run);
  for (const run of runs) {
    const chars = Array.from(run);
    for (let i = 0; i + 1 < chars.length; i++) push(chars[i] + chars[i + 1]);
  }
  return out;
}

/** Explicit hint wins (lower-cased); otherwise "cjk" when the query carries CJK text. */
export function inferLanguageHint(query: string, hint?: string | null): string | null {
  const h = hint?.trim().toLowerCase();
  if (h) return h;
  return hasCjk(query) ? "cjk" : null;
}

function primaryLanguage(hint: string | null): string | null {
  return hint ? hint.split(/[-_]/)[0] : null;
}

// ---------------------------
// Types
// ---------------------------

export interface PlanOptions {
  limit: number;
  fallbackThreshold?: number;
  fallbackEnabled?: boolean;
  companionQuery?: string | null;
}

export interface VectorCapability {
  available: boolean;
  embedding: EmbeddingStatus;
  fingerprint: FingerprintCheck | null;
  warnings: Warning[];
}

export interface Plan {
  query: string;
  languageHint: string | null;
  terms: string[];
  vector: VectorCapability;
  requests: SearchRequest[];
}

export type LaneStatus = "ok" | "failed" | "timeout" | "cancelled";

export interface LaneReport {
  key: number;
  modality: Modality;
  field: TextField;
  status: LaneStatus;
  hits: number;
}

export interface ExecuteResult {
  candidates: Candidate[];
  lanes: LaneReport[];
  warnings: Warning[];
}

export interface PlannerRun {
  plan: Plan;
  fallback: FallbackDecision;
  candidates: Candidate[];
  lanes: LaneReport[];
  warnings: Warning[];
}

export interface QueryPlannerDeps {
  store: RecordStore;
  gateway: EmbeddingGateway | null;
  /** Why the gateway is null (e.g. "not_configured"). */
  gatewayReason?: string;
  tuning: SearchTuning;
  fallback: FallbackConfig;
  clamp: ClampConfig;
}

const KEY_PRIMARY_LEXICAL = 0;
const KEY_PRIMARY_VECTOR = 1;
const KEY_FALLBACK_LEXICAL = 2;
const KEY_FALLBACK_VECTOR = 3;

function warning(code: Warning["code"], message: string): Warning {
  warn("ledger:planner", `${code}: ${message}`);
  return { code, message };
}

// ---------------------------
// Planner
// ---------------------------

export class QueryPlanner {
  constructor(private readonly deps: QueryPlannerDeps) {}

  /**
   * Vector search is trusted only when the gateway probe succeeded and the
   * index was built with the configured fingerprint.
   */
  async vectorCapability(signal?: AbortSignal): Promise<VectorCapability> {
    const { gateway, store, tuning } = this.deps;
    if (!gateway) {
      const reason = this.deps.gatewayReason ?? "not_configured";
      return {
        available: false,
        embedding: { available: false, reason },
        fingerprint: null,
        warnings: [warning("embedding_unavailable", `embedding provider unavailable (${reason}); vector search skipped`)]
      };
    }

    let embedding: EmbeddingStatus;
    try {
      // Shared and cached per gateway; abandon it here without aborting it.
      embedding = await raceSignal("embedding check", probeEmbedding(gateway, tuning.embedTimeoutMs), signal);
    } catch (err) {
      if (!(err instanceof CancelledError)) throw err;
      return { available: false, embedding: { available: false, reason: "cancelled" }, fingerprint: null, warnings: [] };
    }
    if (!embedding.available) {
      return {
        available: false,
        embedding,
        fingerprint: null,
        warnings: [warning("embedding_unavailable", `embedding probe failed (${embedding.reason}); vector search skipped`)]
      };
    }

    let fingerprint: FingerprintCheck;
    try {
      fingerprint = await withTimeout("fingerprint check", tuning.searchTimeoutMs, () => checkFingerprint(store, gateway), signal);
    } catch (err) {
      if (err instanceof CancelledError) {
        return { available: false, embedding, fingerprint: null, warnings: [] };
      }
      const w = err instanceof TimeoutError
        ? warning("search_timeout", `${errorMessage(err)}; vector search skipped`)
        : warning("search_failed", `fingerprint check: ${errorMessage(err)}; vector search skipped`);
      return { available: false, embedding, fingerprint: null, warnings: [w] };
    }
    if (!fingerprint.ok) {
      const w = fingerprint.reason === "unbuilt"
        ? warning("index_unbuilt", "vector index has not been built; run index.rebuild")
        : warning(
            "index_drift",
            `vector index built with ${fingerprint.currentFingerprint ?? "?"} but ${fingerprint.configuredFingerprint} is configured; run index.rebuild`
          );
      return { available: false, embedding, fingerprint, warnings: [w] };
    }
    return { available: true, embedding, fingerprint, warnings: [] };
  }

  /** Primary requests: lexical always, vector only when the capability allows it. */
  async plan(query: string, queryLanguageHint: string | null | undefined, options: PlanOptions, signal?: AbortSignal): Promise<Plan> {
    const languageHint = inferLanguageHint(query, queryLanguageHint);
    const lang = primaryLanguage(languageHint);
    const terms = hasCjk(query) || (lang !== null && CJK_HINTS.has(lang)) ? cjkTerms(query) : [];
    const vector = await this.vectorCapability(signal);
    const limit = this.candidateLimit(options.limit);

    const requests: SearchRequest[] = [
      { key: KEY_PRIMARY_LEXICAL, modality: "lexical", field: "text", query, terms, limit }
    ];
    if (vector.available) {
      requests.push({ key: KEY_PRIMARY_VECTOR, modality: "vector", field: "text", query, terms: [], limit });
    }
    log("plan", { languageHint, terms: terms.length, vector: vector.available });
    return { query, languageHint, terms, vector, requests };
  }

  /** Fallback requests target the companion-language field. */
  planFallback(query: string, vectorAvailable: boolean, limit: number): SearchRequest[] {
    const max = this.candidateLimit(limit);
    const terms = hasCjk(query) ? cjkTerms(query) : [];
    const requests: SearchRequest[] = [
      { key: KEY_FALLBACK_LEXICAL, modality: "fallback-lexical", field: "text_companion", query, terms, limit: max }
    ];
    if (vectorAvailable) {
      requests.push({ key: KEY_FALLBACK_VECTOR, modality: "fallback-vector", field: "text_companion", query, terms: [], limit: max });
    }
    return requests;
  }

  /** Candidate pool per request: limit × candidate multiplier. */
  private candidateLimit(limit: number): number {
    return Math.max(1, Math.floor(limit)) * this.deps.tuning.candidateMultiplier;
  }

  /** Execute requests concurrently; output order depends only on request keys. */
  async execute(requests: SearchRequest[], signal?: AbortSignal): Promise<ExecuteResult> {
    const embeddings = new Map<string, Promise<number[]>>();
    const settled = await Promise.all(requests.map((r) => this.runRequest(r, embeddings, signal)));

    const candidates: Candidate[] = [];
    const lanes: LaneReport[] = [];
    const warnings: Warning[] = [];
    const ordered = settled.slice().sort((a, b) => a.lane.key - b.lane.key);
    for (const s of ordered) {
      candidates.push(...s.candidates);
      lanes.push(s.lane);
      if (s.warning) warnings.push(s.warning);
    }
    return { candidates, lanes, warnings };
  }

  private async runRequest(
    req: SearchRequest,
    embeddings: Map<string, Promise<number[]>>,
    signal?: AbortSignal
  ): Promise<{ candidates: Candidate[]; lane: LaneReport; warning?: Warning }> {
    const { store, tuning } = this.deps;
    const lane = (status: LaneStatus, hits: number): LaneReport =>
      ({ key: req.key, modality: req.modality, field: req.field, status, hits });
    const isVector = req.modality === "vector" || req.modality === "fallback-vector";

    let queryVector: number[] | null = null;
    if (isVector) {
      try {
        queryVector = await this.embedQuery(req.query, embeddings, signal);
      } catch (err) {
        const status: LaneStatus = err instanceof CancelledError ? "cancelled" : err instanceof TimeoutError ? "timeout" : "failed";
        return { candidates: [], lane: lane(status, 0), warning: warning("embedding_failed", `${req.modality}: ${errorMessage(err)}`) };
      }
    }

    const vector = queryVector;
    try {
      const hits = await withTimeout(
        `${req.modality} search`,
        tuning.searchTimeoutMs,
        (s) => vector
          ? store.searchVector(req.field, vector, req.limit, s)
          : store.searchLexical(req.field, { text: req.query, terms: req.terms }, req.limit, s),
        signal
      );
      const candidates = hits
        .filter((h) => h.score > 0)
        .map((h): Candidate => ({ record: h.record, modality: req.modality, score: Math.min(1, h.score), requestKey: req.key }));
      return { candidates, lane: lane("ok", candidates.length) };
    } catch (err) {
      if (err instanceof CancelledError) {
        return { candidates: [], lane: lane("cancelled", 0) };
      }
      if (err instanceof TimeoutError) {
        return { candidates: [], lane: lane("timeout", 0), warning: warning("search_timeout", errorMessage(err)) };
      }
      return { candidates: [], lane: lane("failed", 0), warning: warning("search_failed", `${req.modality}: ${errorMessage(err)}`) };
    }
  }

  private embedQuery(text: string, cache: Map<string, Promise<number[]>>, signal?: AbortSignal): Promise<number[]> {
    const { gateway, tuning, clamp } = this.deps;
    if (!gateway) return Promise.reject(new Error("embedding gateway not configured"));
    const input = clampEmbeddingInput(text, clamp).text;
    let p = cache.get(input);
    if (!p) {
      p = withTimeout("query embedding", tuning.embedTimeoutMs, (s) => gateway.embed([input], s), signal).then((vs) => {
        if (vs.length !== 1 || vs[0].length === 0) throw new Error("empty query embedding");
        return vs[0];
      });
      cache.set(input, p);
    }
    return p;
  }

  /**
   * Fallback fires when enabled, the corpus has companion text, and the
   * primary results are empty or their top score is below the threshold.
   */
  shouldFallback(primary: Candidate[], hasCompanion: boolean, options: { enabled: boolean; threshold: number }): FallbackDecision {
    const topScore = primary.reduce((m, c) => Math.max(m, c.score), 0);
    if (!options.enabled) return { triggered: false, reason: "disabled", topScore };
    if (!hasCompanion) return { triggered: false, reason: "no_companion_text", topScore };
    if (primary.length === 0) return { triggered: true, reason: "primary_empty", topScore };
    if (topScore < options.threshold) return { triggered: true, reason: "low_confidence", topScore };
    return { triggered: false, reason: "confident", topScore };
  }

  /** Plan, execute primary, decide fallback, execute fallback. */
  async run(query: string, queryLanguageHint: string | null | undefined, options: PlanOptions, signal?: AbortSignal): Promise<PlannerRun> {
    const plan = await this.plan(query, queryLanguageHint, options, signal);
    const primary = await this.execute(plan.requests, signal);
    const warnings = [...plan.vector.warnings, ...primary.warnings];

    const enabled = options.fallbackEnabled ?? this.deps.fallback.enabled;
    const threshold = options.fallbackThreshold ?? this.deps.fallback.threshold;
    let hasCompanion = false;
    if (enabled) {
      try {
        hasCompanion = await withTimeout("companion check", this.deps.tuning.searchTimeoutMs, () => this.deps.store.hasCompanionText(), signal);
      } catch (err) {
        if (!(err instanceof CancelledError)) warnings.push(warning("search_failed", `companion check: ${errorMessage(err)}`));
      }
    }

    const fallback = this.shouldFallback(primary.candidates, hasCompanion, { enabled, threshold });
    log("fallback", fallback);
    if (!fallback.triggered || signal?.aborted) {
      return { plan, fallback, candidates: primary.candidates, lanes: primary.lanes, warnings };
    }

    const fallbackQuery = options.companionQuery?.trim() ? options.companionQuery.trim() : query;
    const fallbackRequests = this.planFallback(fallbackQuery, plan.vector.available, options.limit);
    const secondary = await this.execute(fallbackRequests, signal);
    return {
      plan: { ...plan, requests: [...plan.requests, ...fallbackRequests] },
      fallback,
      candidates: [...primary.candidates, ...secondary.candidates],
      lanes: [...primary.lanes, ...secondary.lanes],
      warnings: [...warnings, ...secondary.warnings]
    };
  }
}
