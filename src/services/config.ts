import fs from "fs";
import yaml from "js-yaml";
import type { FusionWeights, TrustPolicy } from "../domain/types.js";
import { errorMessage } from "../domain/errors.js";
import { warn } from "./log.js";

// Lightweight YAML-backed config loader with lazy caches and typed getters.
// Env vars named in the resolvers below take precedence over YAML values.

export type AnyObject = Record<string, unknown>;

let retrievalCache: AnyObject | null = null;
let packingCache: AnyObject | null = null;
let triageCache: AnyObject | null = null;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && Reflect.get(err, "code") === "ENOENT";
}

// A missing file means "use defaults"; an unreadable or malformed one is reported.
function safeLoadYaml(path: string): AnyObject {
  try {
    const raw = fs.readFileSync(path, "utf8");
    const doc = yaml.load(raw);
    return isPlainObject(doc) ? doc : {};
  } catch (err) {
    if (!isMissingFile(err)) warn("ledger:config", `ignoring ${path}: ${errorMessage(err)}`);
    return {};
  }
}

// Public: raw config objects

export function getRetrievalConfig(): AnyObject {
  if (!retrievalCache) {
    const basePath = process.env.LEDGER_RETRIEVAL_CONFIG_PATH || "config/retrieval.yaml";
    let merged = safeLoadYaml(basePath);

    // Overrides in order: file then JSON string (JSON takes precedence)
    const overridesFile = process.env.LEDGER_RETRIEVAL_OVERRIDES_FILE;
    if (overridesFile && overridesFile.trim().length > 0) {
      merged = deepMerge(merged, safeLoadJsonFile(overridesFile));
    }

    const overridesJson = process.env.LEDGER_RETRIEVAL_OVERRIDES_JSON;
    if (overridesJson && overridesJson.trim().length > 0) {
      try {
        const obj: unknown = JSON.parse(overridesJson);
        if (isPlainObject(obj)) {
          merged = deepMerge(merged, obj);
        }
      } catch (err) {
        warn("ledger:config", `ignoring LEDGER_RETRIEVAL_OVERRIDES_JSON: ${errorMessage(err)}`);
      }
    }

    retrievalCache = merged;
  }
  return retrievalCache;
}

export function getPackingConfig(): AnyObject {
  if (!packingCache) {
    packingCache = safeLoadYaml(process.env.LEDGER_PACKING_CONFIG_PATH || "config/packing.yaml");
  }
  return packingCache;
}

export function getTriageConfig(): AnyObject {
  if (!triageCache) {
    triageCache = safeLoadYaml(process.env.LEDGER_TRIAGE_CONFIG_PATH || "config/triage.yaml");
  }
  return triageCache;
}

// Path utilities

function getIn(obj: AnyObject, path: string): unknown {
  let cur: unknown = obj;
  for (const s of path.split(".")) {
    if (!isPlainObject(cur)) return undefined;
    cur = cur[s];
  }
  return cur;
}

function coerceNumber(v: unknown, dflt: number): number {
  if (typeof v === "number" && !Number.isNaN(v)) return v;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v);
    if (!Number.isNaN(n)) return n;
  }
  return dflt;
}

function coerceBoolean(v: unknown, dflt: boolean): boolean {
  if (typeof v === "boolean") return v;
  if (typeof v === "number") return v !== 0;
  if (typeof v === "string") {
    const s = v.trim().toLowerCase();
    if (s === "true") return true;
    if (s === "false") return false;
    if (s === "") return dflt;
    const n = Number(v);
    if (!Number.isNaN(n)) return n !== 0;
  }
  return dflt;
}

function coerceStringArray(v: unknown, dflt: string[]): string[] {
  if (Array.isArray(v)) return v.filter((x): x is string => typeof x === "string");
  return dflt;
}

// Deep merge for override application (arrays and scalars are replaced)
function isPlainObject(v: unknown): v is AnyObject {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function deepMerge(a: AnyObject, b: AnyObject): AnyObject {
  const out: AnyObject = { ...a };
  for (const k of Object.keys(b)) {
    const bv = b[k];
    const av = out[k];
    if (isPlainObject(av) && isPlainObject(bv)) {
      out[k] = deepMerge(av, bv);
    } else {
      out[k] = bv;
    }
  }
  return out;
}

function safeLoadJsonFile(path: string): AnyObject {
  try {
    const obj: unknown = JSON.parse(fs.readFileSync(path, "utf8"));
    return isPlainObject(obj) ? obj : {};
  } catch (err) {
    warn("ledger:config", `ignoring ${path}: ${errorMessage(err)}`);
    return {};
  }
}

function envValue(name: string): string | undefined {
  const v = process.env[name];
  return v !== undefined && v.trim() !== "" ? v.trim() : undefined;
}

function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

// Typed getters: retrieval (config/retrieval.yaml)

export function retrievalNumber(path: string, dflt: number): number {
  return coerceNumber(getIn(getRetrievalConfig(), path), dflt);
}

export function retrievalBoolean(path: string, dflt: boolean): boolean {
  return coerceBoolean(getIn(getRetrievalConfig(), path), dflt);
}

export function retrievalString(path: string, dflt: string): string {
  const v = getIn(getRetrievalConfig(), path);
  return typeof v === "string" ? v : dflt;
}

// Typed getters: packing (config/packing.yaml)

export function packingNumber(path: string, dflt: number): number {
  return coerceNumber(getIn(getPackingConfig(), path), dflt);
}

export function packingString(path: string, dflt: string): string {
  const v = getIn(getPackingConfig(), path);
  return typeof v === "string" ? v : dflt;
}

// Typed getters: triage (config/triage.yaml)

export function triageNumber(path: string, dflt: number): number {
  return coerceNumber(getIn(getTriageConfig(), path), dflt);
}

export function triageArray(path: string, dflt: string[]): string[] {
  return coerceStringArray(getIn(getTriageConfig(), path), dflt);
}

export function triageString(path: string, dflt: string): string {
  const v = getIn(getTriageConfig(), path);
  return typeof v === "string" ? v : dflt;
}

// Resolvers: typed config objects consumed by services

export const DEFAULT_FUSION_WEIGHTS: FusionWeights = {
  lexical: 0.5,
  vector: 0.5,
  fallbackDiscount: 0.8,
  importanceBoost: 0.1,
  trustedBoost: 0.1,
  untrustedPenalty: 0.1
};

/** Boost magnitudes are clamped so the multiplier stays within [0.5, 2.0]. */
export function normalizeFusionWeights(w: Partial<FusionWeights>): FusionWeights {
  const merged = { ...DEFAULT_FUSION_WEIGHTS, ...w };
  return {
    lexical: Math.max(0, merged.lexical),
    vector: Math.max(0, merged.vector),
    fallbackDiscount: merged.fallbackDiscount > 0 ? Math.min(1, merged.fallbackDiscount) : DEFAULT_FUSION_WEIGHTS.fallbackDiscount,
    importanceBoost: clamp(merged.importanceBoost, 0, 0.5),
    trustedBoost: clamp(merged.trustedBoost, 0, 0.5),
    untrustedPenalty: clamp(merged.untrustedPenalty, 0, 0.5)
  };
}

export function resolveFusionWeights(): FusionWeights {
  const d = DEFAULT_FUSION_WEIGHTS;
  return normalizeFusionWeights({
    lexical: retrievalNumber("fusion.weights.lexical", d.lexical),
    vector: retrievalNumber("fusion.weights.vector", d.vector),
    fallbackDiscount: retrievalNumber("fusion.fallback_discount", d.fallbackDiscount),
    importanceBoost: retrievalNumber("fusion.importance_boost", d.importanceBoost),
    trustedBoost: retrievalNumber("fusion.trust.trusted_boost", d.trustedBoost),
    untrustedPenalty: retrievalNumber("fusion.trust.untrusted_penalty", d.untrustedPenalty)
  });
}

export interface FallbackConfig {
  enabled: boolean;
  threshold: number;
}

export function resolveFallbackConfig(): FallbackConfig {
  return {
    enabled: coerceBoolean(envValue("LEDGER_FALLBACK_ENABLED"), retrievalBoolean("fallback.enabled", true)),
    threshold: coerceNumber(envValue("LEDGER_FALLBACK_THRESHOLD"), retrievalNumber("fallback.threshold", 0.35))
  };
}

export interface SearchTuning {
  limit: number;
  candidateMultiplier: number;
  searchTimeoutMs: number;
  embedTimeoutMs: number;
}

export function resolveSearchTuning(): SearchTuning {
  return {
    limit: Math.max(1, retrievalNumber("search.limit", 20)),
    candidateMultiplier: Math.max(1, retrievalNumber("search.candidate_multiplier", 3)),
    searchTimeoutMs: Math.max(1, retrievalNumber("search.timeout_ms", 5000)),
    embedTimeoutMs: Math.max(1, retrievalNumber("embedding.timeout_ms", 8000))
  };
}

export type EmbeddingProviderName = "none" | "openai" | "http" | "local-hash";

export interface ClampConfig {
  maxChars: number;
  headChars: number;
  maxBytes?: number;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  model: string;
  endpoint: string;
  apiKey: string;
  dim: number;
  timeoutMs: number;
  clamp: ClampConfig;
}

function parseProvider(v: string): EmbeddingProviderName {
  const s = v.trim().toLowerCase();
  if (s === "openai" || s === "http" || s === "local-hash") return s;
  return "none";
}

export function resolveEmbeddingConfig(): EmbeddingConfig {
  const provider = parseProvider(envValue("LEDGER_EMBED_PROVIDER") ?? retrievalString("embedding.provider", "none"));
  const dfltEndpoint = provider === "openai" ? "https://api.openai.com/v1" : "";
  return {
    provider,
    model: envValue("LEDGER_EMBED_MODEL") ?? retrievalString("embedding.model", "text-embedding-3-small"),
    endpoint: envValue("LEDGER_EMBED_ENDPOINT") ?? retrievalString("embedding.endpoint", dfltEndpoint),
    apiKey: envValue("LEDGER_EMBED_API_KEY") ?? envValue("OPENAI_API_KEY") ?? "",
    dim: Math.max(1, retrievalNumber("embedding.dim", 1536)),
    timeoutMs: Math.max(1, retrievalNumber("embedding.timeout_ms", 8000)),
    clamp: resolveClampConfig({
      maxChars: envValue("LEDGER_EMBED_MAX_CHARS") ?? getIn(getRetrievalConfig(), "embedding.clamp.max_chars"),
      headChars: envValue("LEDGER_EMBED_HEAD_CHARS") ?? getIn(getRetrievalConfig(), "embedding.clamp.head_chars"),
      maxBytes: envValue("LEDGER_EMBED_MAX_BYTES") ?? getIn(getRetrievalConfig(), "embedding.clamp.max_bytes")
    })
  };
}

export const DEFAULT_EMBEDDING_MAX_CHARS = 6000;
export const DEFAULT_EMBEDDING_HEAD_CHARS = 500;

/** Raw clamp knobs (strings from env or numbers from YAML) to bounded integers. */
export function resolveClampConfig(raw: { maxChars?: unknown; headChars?: unknown; maxBytes?: unknown }): ClampConfig {
  const maxChars = clampInt(raw.maxChars, DEFAULT_EMBEDDING_MAX_CHARS, 200, 200_000);
  const headChars = clampInt(raw.headChars, DEFAULT_EMBEDDING_HEAD_CHARS, 0, maxChars);
  const bytes = coerceNumber(raw.maxBytes, Number.NaN);
  return {
    maxChars,
    headChars,
    maxBytes: Number.isFinite(bytes) && bytes > 0 ? Math.floor(bytes) : undefined
  };
}

function clampInt(raw: unknown, fallback: number, min: number, max: number): number {
  const n = coerceNumber(raw, Number.NaN);
  if (!Number.isFinite(n)) return fallback;
  return clamp(Math.floor(n), min, max);
}

export interface PackingDefaults {
  budgetTokens: number;
  maxItems: number;
  trustPolicy: TrustPolicy;
}

export function parseTrustPolicy(v: string | undefined, dflt: TrustPolicy): TrustPolicy {
  const s = (v ?? "").trim().toLowerCase().replace(/_/g, "-");
  if (s === "all" || s === "trusted-only") return s;
  return dflt;
}

export function resolvePackingDefaults(): PackingDefaults {
  return {
    budgetTokens: Math.max(1, packingNumber("limits.budget_tokens", 1200)),
    maxItems: Math.max(1, packingNumber("limits.max_items", 12)),
    trustPolicy: parseTrustPolicy(envValue("LEDGER_TRUST_POLICY"), parseTrustPolicy(packingString("trust_policy", "all"), "all"))
  };
}

export interface TriageConfig {
  statePath: string;
  keywords: string[];
  importanceMin: number;
  errorThreshold: number;
  sinceMinutes: number;
  tasksSinceMinutes: number;
  renotifyAfterMinutes: number;
  scanLimit: number;
}

export const DEFAULT_TRIAGE_KEYWORDS = [
  "error",
  "failed",
  "exception",
  "traceback",
  "timeout",
  "rate_limit",
  "unauthorized",
  "forbidden",
  "not allowed",
  "db locked"
];

export function resolveTriageConfig(): TriageConfig {
  return {
    statePath: envValue("LEDGER_TRIAGE_STATE_PATH") ?? triageString("state_path", ".ledger/triage-state.json"),
    keywords: triageArray("errors.keywords", DEFAULT_TRIAGE_KEYWORDS).map((k) => k.trim().toLowerCase()).filter(Boolean),
    importanceMin: triageNumber("tasks.importance_min", 0.7),
    errorThreshold: Math.max(0, triageNumber("errors.threshold", 2)),
    sinceMinutes: Math.max(0, triageNumber("errors.since_minutes", 60)),
    tasksSinceMinutes: Math.max(0, triageNumber("tasks.since_minutes", 24 * 60)),
    renotifyAfterMinutes: Math.max(0, triageNumber("renotify_after_minutes", 7 * 24 * 60)),
    scanLimit: Math.max(1, triageNumber("scan_limit", 500))
  };
}

export interface StoreConfig {
  recordsIndex: string;
  metaIndex: string;
}

export function resolveStoreConfig(): StoreConfig {
  return {
    recordsIndex: envValue("LEDGER_RECORDS_INDEX") ?? retrievalString("store.records_index", "ledger-records"),
    metaIndex: envValue("LEDGER_META_INDEX") ?? retrievalString("store.meta_index", "ledger-meta")
  };
}

// Clear caches (tests)
export function __resetConfigCaches() {
  retrievalCache = null;
  packingCache = null;
  triageCache = null;
}
