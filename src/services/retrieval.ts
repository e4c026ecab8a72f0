// src/services/retrieval.ts
// Search, pack, status and the explicit write paths wired together.

import { EmbeddingError, errorMessage } from "../domain/errors.js";
import { merge, type DroppedCandidate } from "../domain/fusion.js";
import type {
  FallbackDecision,
  FusionWeights,
  RankedCandidate,
  RecordStore,
  SearchResult,
  StatusSurface,
  TrustPolicy,
  Warning
} from "../domain/types.js";
import {
  normalizeFusionWeights,
  resolveEmbeddingConfig,
  resolveFallbackConfig,
  resolveFusionWeights,
  resolvePackingDefaults,
  resolveSearchTuning,
  type ClampConfig,
  type FallbackConfig,
  type PackingDefaults,
  type SearchTuning
} from "./config.js";
import { createEmbeddingGateway, withTimeout, type EmbeddingGateway } from "./embedder.js";
import { LAST_REBUILD_META_KEY, rebuild, type RebuildReport } from "./fingerprint.js";
import { roundScore } from "./ids.js";
import { fillImportance, parseImportance, type FillImportanceResult } from "./importance.js";
import { pack, type ContextPack } from "./packer.js";
import { QueryPlanner, type LaneReport } from "./planner.js";
import { debug, warn } from "./log.js";

const log = debug("ledger:retrieval");

export interface SearchInput {
  query: string;
  queryLanguageHint?: string | null;
  companionQuery?: string | null;
  limit?: number;
  fallbackThreshold?: number;
  fallbackEnabled?: boolean;
  weights?: Partial<FusionWeights>;
}

export interface SearchResponse {
  query: string;
  languageHint: string | null;
  results: SearchResult[];
  ranked: RankedCandidate[];
  fallback: FallbackDecision;
  lanes: LaneReport[];
  dropped: DroppedCandidate[];
  warnings: Warning[];
}

export interface PackInput extends SearchInput {
  budgetTokens?: number;
  maxItems?: number;
  trustPolicy?: TrustPolicy;
}

export interface RetrievalEngineDeps {
  store: RecordStore;
  gateway: EmbeddingGateway | null;
  gatewayReason?: string;
  weights: FusionWeights;
  fallback: FallbackConfig;
  tuning: SearchTuning;
  clamp: ClampConfig;
  packing: PackingDefaults;
  now?: () => Date;
}

export function toSearchResult(r: RankedCandidate): SearchResult {
  return {
    recordRef: r.record.id,
    score: roundScore(r.score),
    modality: r.modality,
    trust: r.record.trust,
    importance: r.record.importance
  };
}

export class RetrievalEngine {
  readonly planner: QueryPlanner;

  constructor(private readonly deps: RetrievalEngineDeps) {
    this.planner = new QueryPlanner({
      store: deps.store,
      gateway: deps.gateway,
      gatewayReason: deps.gatewayReason,
      tuning: deps.tuning,
      fallback: deps.fallback,
      clamp: deps.clamp
    });
  }

  async search(input: SearchInput, signal?: AbortSignal): Promise<SearchResponse> {
    const limit = Math.max(1, Math.floor(input.limit ?? this.deps.tuning.limit));
    const run = await this.planner.run(
      input.query,
      input.queryLanguageHint,
      {
        limit,
        companionQuery: input.companionQuery,
        fallbackEnabled: input.fallbackEnabled,
        fallbackThreshold: input.fallbackThreshold
      },
      signal
    );

    const weights = input.weights ? normalizeFusionWeights({ ...this.deps.weights, ...input.weights }) : this.deps.weights;
    const dropped: DroppedCandidate[] = [];
    const ranked = merge(run.candidates, weights, { limit, dropped });
    const warnings = [...run.warnings];
    if (dropped.length > 0) {
      const message = `${dropped.length} malformed record(s) excluded from scoring`;
      warn("ledger:retrieval", message);
      warnings.push({ code: "record_malformed", message });
    }

    log("search", { limit, candidates: run.candidates.length, ranked: ranked.length, fallback: run.fallback.reason });
    return {
      query: input.query,
      languageHint: run.plan.languageHint,
      results: ranked.map(toSearchResult),
      ranked,
      fallback: run.fallback,
      lanes: run.lanes,
      dropped,
      warnings
    };
  }

  async pack(input: PackInput, signal?: AbortSignal): Promise<ContextPack> {
    const d = this.deps.packing;
    const maxItems = Math.max(1, Math.floor(input.maxItems ?? d.maxItems));
    const res = await this.search({ ...input, limit: input.limit ?? Math.max(maxItems, this.deps.tuning.limit) }, signal);
    return pack(
      input.query,
      res.ranked,
      {
        budgetTokens: input.budgetTokens ?? d.budgetTokens,
        maxItems,
        trustPolicy: input.trustPolicy ?? d.trustPolicy
      },
      { now: this.deps.now, lanes: res.lanes, fallback: res.fallback, warnings: res.warnings, dropped: res.dropped }
    );
  }

  async status(): Promise<StatusSurface> {
    const capability = await this.planner.vectorCapability();
    const warnings = [...capability.warnings];
    let fts = false;
    let vector = false;
    let lastRebuild: string | null = null;
    const { store, tuning } = this.deps;
    try {
      const d = await withTimeout("index status", tuning.searchTimeoutMs, () => store.describeIndex());
      fts = d.fts;
      vector = d.vector && capability.available;
      lastRebuild = await withTimeout("last rebuild read", tuning.searchTimeoutMs, () => store.getMeta(LAST_REBUILD_META_KEY));
    } catch (err) {
      const message = `index status unavailable: ${errorMessage(err)}`;
      warn("ledger:retrieval", message);
      warnings.push({ code: "search_failed", message });
    }
    return { embedding: capability.embedding, index: { fts, vector, last_rebuild: lastRebuild }, warnings };
  }

  /** Accepts a number, `{score}` or `{label}`; unparseable input is rejected before any write. */
  async fillImportance(id: string, value: unknown): Promise<FillImportanceResult> {
    const score = parseImportance(value);
    if (score === null) throw new Error(`unparseable importance for ${id}`);
    return fillImportance(this.deps.store, id, score);
  }

  async rebuild(): Promise<RebuildReport> {
    const { gateway, gatewayReason } = this.deps;
    if (!gateway) throw new EmbeddingError(`cannot rebuild: embedding provider unavailable (${gatewayReason ?? "not_configured"})`);
    return rebuild(this.deps.store, gateway, { clamp: this.deps.clamp, timeoutMs: this.deps.tuning.embedTimeoutMs, now: this.deps.now });
  }
}

/** Engine over the given store with gateway, weights and budgets resolved from config. */
export function createRetrievalEngine(store: RecordStore, overrides: Partial<RetrievalEngineDeps> = {}): RetrievalEngine {
  const embedding = resolveEmbeddingConfig();
  const resolved = createEmbeddingGateway(embedding);
  return new RetrievalEngine({
    store,
    gateway: resolved.gateway,
    gatewayReason: resolved.reason,
    weights: resolveFusionWeights(),
    fallback: resolveFallbackConfig(),
    tuning: resolveSearchTuning(),
    clamp: embedding.clamp,
    packing: resolvePackingDefaults(),
    ...overrides
  });
}
