// src/domain/types.ts
// Shared type definitions for the memory ledger.

export type TrustTier = "trusted" | "unknown" | "untrusted";
export type TrustPolicy = "all" | "trusted-only";

/** Which text field a search targets. */
export type TextField = "text" | "text_companion";

export type Modality = "lexical" | "vector" | "fallback-lexical" | "fallback-vector";

/** Canonical modality order; used wherever modalities are listed or tie-broken. */
export const MODALITY_ORDER: readonly Modality[] = ["lexical", "vector", "fallback-lexical", "fallback-vector"];

export interface MemoryRecord {
  id: string;                     // provenance key
  text: string;
  text_companion?: string | null; // companion-language rendering (e.g. English)
  lang?: string | null;
  kind: string;                   // free-form: "task", "note", "error", ...
  summary: string;
  importance: number | null;      // fill-missing only
  trust: TrustTier;
  ts: string;                     // ISO timestamp
  source_ref?: string | null;
}

export interface StoreHit {
  record: MemoryRecord;
  score: number;                  // normalized to [0, 1], higher is better
}

export interface IndexDescription {
  fts: boolean;
  vector: boolean;
}

/** Lexical query: free text plus extra terms that must be matched as units (CJK runs, bigrams). */
export interface LexicalQuery {
  text: string;
  terms: string[];
}

export interface RecordVectors {
  primary?: number[];
  companion?: number[];
}

/**
 * Durable record store. Owned by ingestion; this core only reads records,
 * writes importance through the conditional write and index metadata
 * through rebuild.
 */
export interface RecordStore {
  searchLexical(field: TextField, query: LexicalQuery, limit: number, signal?: AbortSignal): Promise<StoreHit[]>;
  searchVector(field: TextField, vector: number[], limit: number, signal?: AbortSignal): Promise<StoreHit[]>;
  hasCompanionText(): Promise<boolean>;
  describeIndex(): Promise<IndexDescription>;
  getMeta(key: string): Promise<string | null>;
  setMeta(key: string, value: string): Promise<void>;
  /** Atomic "write if currently absent". Resolves true when the value was written. */
  setImportanceIfAbsent(id: string, importance: number): Promise<boolean>;
  scanRecords(opts: { since?: string; limit: number }): Promise<MemoryRecord[]>;
  listRecordIds(): Promise<string[]>;
  getRecord(id: string): Promise<MemoryRecord | null>;
  putVectors(id: string, vectors: RecordVectors): Promise<void>;
}

export interface SearchRequest {
  key: number;                    // deterministic ordering key
  modality: Modality;
  field: TextField;
  query: string;
  terms: string[];                // extra lexical terms (CJK runs/bigrams); empty for vector
  limit: number;
}

export interface Candidate {
  record: MemoryRecord;
  modality: Modality;
  score: number;
  requestKey: number;
}

export interface RankedCandidate {
  record: MemoryRecord;
  score: number;                  // fused
  rank: number;                   // 1-based
  modality: Modality;             // strongest weighted contribution
  scores: Partial<Record<Modality, number>>;
}

export interface FusionWeights {
  lexical: number;
  vector: number;
  fallbackDiscount: number;
  importanceBoost: number;
  trustedBoost: number;
  untrustedPenalty: number;
}

export interface Warning {
  code:
    | "embedding_unavailable"
    | "embedding_failed"
    | "index_unbuilt"
    | "index_drift"
    | "search_failed"
    | "search_timeout"
    | "record_malformed";
  message: string;
}

export type FallbackReason = "primary_empty" | "low_confidence" | "disabled" | "no_companion_text" | "confident";

export interface FallbackDecision {
  triggered: boolean;
  reason: FallbackReason;
  topScore: number;
}

/** External search output item. */
export interface SearchResult {
  recordRef: string;
  score: number;
  modality: Modality;
  trust: TrustTier;
  importance: number | null;
}

export type EmbeddingStatus =
  | { available: true; provider: string; model: string; fingerprint: string }
  | { available: false; reason: string };

export interface StatusSurface {
  embedding: EmbeddingStatus;
  index: { fts: boolean; vector: boolean; last_rebuild: string | null };
  warnings: Warning[];
}
