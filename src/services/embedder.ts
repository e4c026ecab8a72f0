/* src/services/embedder.ts
   Embedding gateway adapters, input clamping, and the once-per-process probe.
   - openai:     POST {endpoint}/embeddings {input, model} -> {data: [{embedding}]}
   - http:       POST {endpoint} {texts, model, dim}       -> {vectors: number[][]}
   - local-hash: deterministic pseudo-embeddings (dev and tests)
   - none:       no gateway; vector search is skipped
   Calls are bounded by a timeout and never retried. Vectors are L2-normalized.
*/

import { Buffer } from "node:buffer";
import { CancelledError, EmbeddingError, TimeoutError, errorMessage } from "../domain/errors.js";
import type { EmbeddingStatus } from "../domain/types.js";
import type { ClampConfig, EmbeddingConfig } from "./config.js";
import { debug } from "./log.js";

const log = debug("ledger:embedder");

export interface EmbeddingGateway {
  readonly provider: string;
  readonly model: string;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/** Identifier of the provider/model pair a vector index was built with. */
export function computeFingerprint(provider: string, model: string): string {
  return `${provider.trim().toLowerCase()}:${model.trim()}`;
}

// ---------------------------
// Input clamping
// ---------------------------

export const CLIP_MARKER = "\n...\n";

export interface ClampResult {
  text: string;
  clipped: boolean;
  originalChars: number;
  clampedChars: number;
  originalBytes: number;
  clampedBytes: number;
}

function byteLen(s: string): number {
  return Buffer.byteLength(s, "utf8");
}

function tail(s: string, n: number): string {
  if (n <= 0) return "";
  return s.length <= n ? s : s.slice(s.length - n);
}

function head(s: string, n: number): string {
  if (n <= 0) return "";
  return s.length <= n ? s : s.slice(0, n);
}

/** Largest n such that slice(s, n) fits in maxBytes. */
function fitBytes(s: string, maxBytes: number, slice: (s: string, n: number) => string): string {
  if (byteLen(s) <= maxBytes) return s;
  let lo = 0;
  let hi = s.length;
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if (byteLen(slice(s, mid)) <= maxBytes) lo = mid;
    else hi = mid - 1;
  }
  return slice(s, lo);
}

/**
 * Keep the first headChars, then the marker, then as much of the tail as
 * fits in maxChars. maxBytes (optional) applies after the character clamp.
 */
export function clampEmbeddingInput(input: string, cfg: ClampConfig): ClampResult {
  const text = input ?? "";
  const maxChars = Math.max(1, cfg.maxChars);
  const headChars = Math.max(0, Math.min(cfg.headChars, maxChars));

  let out = text;
  let clipped = false;

  if (out.length > maxChars) {
    clipped = true;
    if (headChars === 0) {
      out = tail(out, maxChars);
    } else {
      const h = head(out, headChars);
      const budget = maxChars - h.length - CLIP_MARKER.length;
      out = budget <= 0 ? head(h, maxChars) : `${h}${CLIP_MARKER}${tail(out, budget)}`;
    }
  }

  const maxBytes = cfg.maxBytes;
  if (maxBytes && byteLen(out) > maxBytes) {
    clipped = true;
    const markerAt = out.indexOf(CLIP_MARKER);
    if (headChars === 0 || markerAt < 0) {
      out = fitBytes(out, maxBytes, tail);
    } else {
      const markerBytes = byteLen(CLIP_MARKER);
      const h = fitBytes(out.slice(0, markerAt), Math.max(0, maxBytes - markerBytes), head);
      const remaining = maxBytes - byteLen(h) - markerBytes;
      out = remaining <= 0 ? h : `${h}${CLIP_MARKER}${fitBytes(out.slice(markerAt + CLIP_MARKER.length), remaining, tail)}`;
    }
  }

  return {
    text: out,
    clipped,
    originalChars: text.length,
    clampedChars: out.length,
    originalBytes: byteLen(text),
    clampedBytes: byteLen(out)
  };
}

export function looksLikeInputTooLong(body: string): boolean {
  return (
    /maximum context length/i.test(body) ||
    /max context length/i.test(body) ||
    /requested\s+\d+\s+tokens/i.test(body) ||
    /Please reduce the length of the messages/i.test(body)
  );
}

// ---------------------------
// Timeout helper (shared with the planner)
// ---------------------------

/**
 * Run fn with an AbortSignal that fires on timeout or when the parent
 * signal aborts. The returned promise settles as soon as either happens;
 * the underlying call is abandoned, not awaited.
 */
export function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  const ctrl = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      ctrl.abort();
      reject(new CancelledError(label));
    };
    if (parent?.aborted) {
      onAbort();
      return;
    }
    const timer = setTimeout(() => {
      ctrl.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);
    parent?.addEventListener("abort", onAbort, { once: true });
    void Promise.resolve()
      .then(() => fn(ctrl.signal))
      .then(resolve, reject)
      .finally(() => {
        clearTimeout(timer);
        parent?.removeEventListener("abort", onAbort);
      });
  });
}

/**
 * Settle with `promise`, or reject with CancelledError as soon as `signal`
 * aborts. The underlying work is left running for other awaiters.
 */
export function raceSignal<T>(label: string, promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new CancelledError(label));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError(label));
    signal.addEventListener("abort", onAbort, { once: true });
    void promise.then(resolve, reject).finally(() => signal.removeEventListener("abort", onAbort));
  });
}

// ---------------------------
// Remote HTTP gateways
// ---------------------------

async function safeText(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch (err) {
    return `<unreadable body: ${errorMessage(err)}>`;
  }
}

function isNumberArray(v: unknown): v is number[] {
  return Array.isArray(v) && v.every((x) => typeof x === "number");
}

async function postJson(url: string, body: unknown, apiKey: string, signal?: AbortSignal): Promise<unknown> {
  const res = await fetch(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {})
    },
    body: JSON.stringify(body),
    signal
  });
  if (!res.ok) {
    const text = await safeText(res);
    throw new EmbeddingError(`HTTP ${res.status}: ${text.slice(0, 200)}`, looksLikeInputTooLong(text));
  }
  return res.json();
}

function readOpenAIVectors(body: unknown, count: number): number[][] {
  const data = body && typeof body === "object" ? Reflect.get(body, "data") : undefined;
  if (!Array.isArray(data) || data.length !== count) {
    throw new EmbeddingError("Malformed response: missing or invalid 'data'");
  }
  return data.map((item: unknown) => {
    const v = item && typeof item === "object" ? Reflect.get(item, "embedding") : undefined;
    if (!isNumberArray(v)) throw new EmbeddingError("Malformed response: item without 'embedding'");
    return v;
  });
}

function readVectors(body: unknown, count: number, dim: number): number[][] {
  const vectors = body && typeof body === "object" ? Reflect.get(body, "vectors") : undefined;
  if (!Array.isArray(vectors) || vectors.length !== count) {
    throw new EmbeddingError("Malformed response: missing or invalid 'vectors'");
  }
  return vectors.map((v: unknown) => {
    if (!isNumberArray(v) || v.length !== dim) {
      throw new EmbeddingError(`Vector has wrong dimension (expected ${dim})`);
    }
    return v;
  });
}

export class OpenAIEmbeddingGateway implements EmbeddingGateway {
  readonly provider = "openai";

  constructor(
    readonly model: string,
    private readonly baseUrl: string,
    private readonly apiKey: string
  ) {}

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    const url = `${this.baseUrl.replace(/\/+$/, "")}/embeddings`;
    const body = await postJson(url, { input: texts, model: this.model }, this.apiKey, signal);
    return readOpenAIVectors(body, texts.length).map(unitNormalize);
  }
}

export class HttpEmbeddingGateway implements EmbeddingGateway {
  readonly provider = "http";

  constructor(
    readonly model: string,
    private readonly endpoint: string,
    private readonly apiKey: string,
    private readonly dim: number
  ) {}

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    const body = await postJson(this.endpoint, { texts, model: this.model, dim: this.dim }, this.apiKey, signal);
    return readVectors(body, texts.length, this.dim).map(unitNormalize);
  }
}

// ---------------------------
// Deterministic local gateway
// ---------------------------
// Stable pseudo-embedding per input text: token hashes pick two slots
// each and add sinusoidal bumps. Not semantically meaningful; shared
// tokens do move vectors closer, which is enough for development.

export class LocalHashEmbeddingGateway implements EmbeddingGateway {
  readonly provider = "local-hash";

  constructor(readonly model: string = "local-hash-v1", private readonly dim: number = 256) {}

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((t) => unitNormalize(localHashEmbedding(t, this.dim)));
  }
}

function localHashEmbedding(text: string, dim: number): number[] {
  const vec = new Array<number>(dim).fill(0);
  for (const tok of simpleTokens(text)) {
    const h1 = murmur3(tok + "|a");
    const h2 = murmur3(tok + "|b");
    const phase = (h1 ^ h2) >>> 0;
    vec[Math.abs(h1) % dim] += 1 + Math.abs(Math.sin(phase * 0.0001));
    vec[Math.abs(h2) % dim] += 0.7 * (1 + Math.abs(Math.cos(phase * 0.0001)));
  }
  return vec;
}

function simpleTokens(s: string): string[] {
  return s
    .normalize("NFKC")
    .toLowerCase()
    .split(/[^\p{L}\p{N}_]+/u)
    .filter(Boolean)
    .slice(0, 1024);
}

// Murmur3 32-bit hash (x86 variant, simplified)
function murmur3(key: string, seed = 0): number {
  let h = seed ^ key.length;
  let i = 0;
  while (key.length >= i + 4) {
    let k =
      (key.charCodeAt(i) & 0xff) |
      ((key.charCodeAt(i + 1) & 0xff) << 8) |
      ((key.charCodeAt(i + 2) & 0xff) << 16) |
      ((key.charCodeAt(i + 3) & 0xff) << 24);
    k = Math.imul(k, 0xcc9e2d51);
    k = (k << 15) | (k >>> 17);
    k = Math.imul(k, 0x1b873593);
    h ^= k;
    h = (h << 13) | (h >>> 19);
    h = (Math.imul(h, 5) + 0xe6546b64) | 0;
    i += 4;
  }
  let k1 = 0;
  switch (key.length & 3) {
    case 3:
      k1 ^= (key.charCodeAt(i + 2) & 0xff) << 16;
    // falls through
    case 2:
      k1 ^= (key.charCodeAt(i + 1) & 0xff) << 8;
    // falls through
    case 1:
      k1 ^= key.charCodeAt(i) & 0xff;
      k1 = Math.imul(k1, 0xcc9e2d51);
      k1 = (k1 << 15) | (k1 >>> 17);
      k1 = Math.imul(k1, 0x1b873593);
      h ^= k1;
  }
  h ^= key.length;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h | 0;
}

// ---------------------------
// Vector utilities
// ---------------------------

export function unitNormalize(v: number[]): number[] {
  let norm = 0;
  for (let i = 0; i < v.length; i++) norm += v[i] * v[i];
  norm = Math.sqrt(norm) || 1;
  return v.map((x) => x / norm);
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;
  let dot = 0, na = 0, nb = 0;
  for (let i = 0; i < a.length; i++) { dot += a[i] * b[i]; na += a[i] * a[i]; nb += b[i] * b[i]; }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

// ---------------------------
// Factory + capability probe
// ---------------------------

export type GatewayResolution =
  | { gateway: EmbeddingGateway; reason?: undefined }
  | { gateway: null; reason: string };

export function createEmbeddingGateway(cfg: EmbeddingConfig): GatewayResolution {
  switch (cfg.provider) {
    case "openai":
      if (!cfg.apiKey) return { gateway: null, reason: "missing_api_key" };
      return { gateway: new OpenAIEmbeddingGateway(cfg.model, cfg.endpoint || "https://api.openai.com/v1", cfg.apiKey) };
    case "http":
      if (!cfg.endpoint) return { gateway: null, reason: "missing_endpoint" };
      return { gateway: new HttpEmbeddingGateway(cfg.model, cfg.endpoint, cfg.apiKey, cfg.dim) };
    case "local-hash":
      return { gateway: new LocalHashEmbeddingGateway(cfg.model, cfg.dim) };
    default:
      return { gateway: null, reason: "not_configured" };
  }
}

const probeCache = new WeakMap<EmbeddingGateway, Promise<EmbeddingStatus>>();

/**
 * One embed call per gateway instance per process; the result (including
 * failure) is cached and reused by every later query.
 */
export function probeEmbedding(gateway: EmbeddingGateway, timeoutMs: number): Promise<EmbeddingStatus> {
  const cached = probeCache.get(gateway);
  if (cached) return cached;

  const probe = withTimeout("embedding probe", timeoutMs, (signal) => gateway.embed(["ping"], signal))
    .then((vectors): EmbeddingStatus => {
      if (vectors.length !== 1 || vectors[0].length === 0) {
        return { available: false, reason: "probe_empty_vector" };
      }
      return {
        available: true,
        provider: gateway.provider,
        model: gateway.model,
        fingerprint: computeFingerprint(gateway.provider, gateway.model)
      };
    })
    .catch((err: unknown): EmbeddingStatus => {
      log("probe.failed", { provider: gateway.provider, error: errorMessage(err) });
      return { available: false, reason: `probe_failed: ${errorMessage(err)}` };
    });

  probeCache.set(gateway, probe);
  return probe;
}
