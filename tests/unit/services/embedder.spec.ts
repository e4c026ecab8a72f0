import { describe, it, expect, vi, afterEach } from "vitest";
import {
  CLIP_MARKER,
  HttpEmbeddingGateway,
  LocalHashEmbeddingGateway,
  OpenAIEmbeddingGateway,
  clampEmbeddingInput,
  computeFingerprint,
  cosineSimilarity,
  createEmbeddingGateway,
  looksLikeInputTooLong,
  probeEmbedding,
  raceSignal,
  unitNormalize,
  withTimeout
} from "../../../src/services/embedder";
import { CancelledError, EmbeddingError, TimeoutError } from "../../../src/domain/errors";
import type { EmbeddingConfig } from "../../../src/services/config";
import { FakeGateway } from "../../helpers/fake-gateway";

function cfg(partial: Partial<EmbeddingConfig>): EmbeddingConfig {
  return {
    provider: "none",
    model: "m",
    endpoint: "",
    apiKey: "",
    dim: 2,
    timeoutMs: 1000,
    clamp: { maxChars: 6000, headChars: 500 },
    ...partial
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("clampEmbeddingInput", () => {
  it("passes short input through untouched", () => {
    const r = clampEmbeddingInput("short text", { maxChars: 20, headChars: 5 });
    expect(r).toEqual({
      text: "short text",
      clipped: false,
      originalChars: 10,
      clampedChars: 10,
      originalBytes: 10,
      clampedBytes: 10
    });
  });

  it("keeps the head, a marker, and the tail", () => {
    const input = "abcdefghij".repeat(5);
    const r = clampEmbeddingInput(input, { maxChars: 20, headChars: 5 });
    expect(r.text).toBe(`abcde${CLIP_MARKER}abcdefghij`);
    expect(r.clipped).toBe(true);
    expect(r.originalChars).toBe(50);
    expect(r.clampedChars).toBe(20);
  });

  it("keeps only the tail when headChars is 0", () => {
    const r = clampEmbeddingInput("0123456789", { maxChars: 4, headChars: 0 });
    expect(r.text).toBe("6789");
  });

  it("applies the byte limit after the character limit", () => {
    const r = clampEmbeddingInput("é".repeat(10), { maxChars: 100, headChars: 0, maxBytes: 9 });
    expect(r.text).toBe("éééé");
    expect(r.clipped).toBe(true);
    expect(r.originalBytes).toBe(20);
    expect(r.clampedBytes).toBe(8);
  });
});

describe("vector helpers", () => {
  it("unit-normalizes", () => {
    const v = unitNormalize([3, 4]);
    expect(v[0]).toBeCloseTo(0.6);
    expect(v[1]).toBeCloseTo(0.8);
  });

  it("computes cosine similarity", () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBeCloseTo(0);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
  });

  it("builds fingerprints from provider and model", () => {
    expect(computeFingerprint(" OpenAI ", "text-embedding-3-small")).toBe("openai:text-embedding-3-small");
  });

  it("recognizes input-too-long errors", () => {
    expect(looksLikeInputTooLong("This model's maximum context length is 8192 tokens")).toBe(true);
    expect(looksLikeInputTooLong("rate limited")).toBe(false);
  });
});

describe("createEmbeddingGateway", () => {
  it("returns no gateway for provider none", () => {
    expect(createEmbeddingGateway(cfg({ provider: "none" }))).toEqual({ gateway: null, reason: "not_configured" });
  });

  it("requires an api key for openai and an endpoint for http", () => {
    expect(createEmbeddingGateway(cfg({ provider: "openai" })).reason).toBe("missing_api_key");
    expect(createEmbeddingGateway(cfg({ provider: "http" })).reason).toBe("missing_endpoint");
  });

  it("builds the local hash gateway", () => {
    const r = createEmbeddingGateway(cfg({ provider: "local-hash", model: "local-hash-v1", dim: 32 }));
    expect(r.gateway).toBeInstanceOf(LocalHashEmbeddingGateway);
    expect(r.gateway?.provider).toBe("local-hash");
  });
});

describe("LocalHashEmbeddingGateway", () => {
  it("is deterministic and unit length", async () => {
    const g = new LocalHashEmbeddingGateway("local-hash-v1", 64);
    const [a, b] = await g.embed(["timeout error", "timeout error"]);
    expect(a).toHaveLength(64);
    expect(a).toEqual(b);
    const norm = Math.sqrt(a.reduce((s, x) => s + x * x, 0));
    expect(norm).toBeCloseTo(1);
  });
});

describe("remote gateways", () => {
  it("calls the OpenAI-compatible endpoint and normalizes vectors", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ data: [{ embedding: [3, 4] }] }));
    vi.stubGlobal("fetch", fetchMock);

    const g = new OpenAIEmbeddingGateway("text-embedding-3-small", "https://embeddings.example.test/v1/", "test-secret");
    const out = await g.embed(["hello"]);

    expect(out[0][0]).toBeCloseTo(0.6);
    expect(out[0][1]).toBeCloseTo(0.8);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://embeddings.example.test/v1/embeddings");
    expect(init).toMatchObject({ method: "POST", headers: { Authorization: "Bearer test-secret" } });
    expect(JSON.parse(String(init?.body))).toEqual({ input: ["hello"], model: "text-embedding-3-small" });
  });

  it("flags input-too-long HTTP errors", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("maximum context length exceeded", { status: 400 })));
    const g = new OpenAIEmbeddingGateway("m", "https://embeddings.example.test/v1", "test-secret");
    const err = await g.embed(["x"]).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingError);
    expect(err).toMatchObject({ code: "embedding", tooLong: true });
  });

  it("rejects vectors of the wrong dimension from the http provider", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ vectors: [[1, 2, 3]] })));
    const g = new HttpEmbeddingGateway("m", "https://embeddings.example.test/embed", "", 2);
    await expect(g.embed(["x"])).rejects.toThrow("wrong dimension");
  });

  it("skips the request for an empty batch", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ vectors: [] }));
    vi.stubGlobal("fetch", fetchMock);
    const g = new HttpEmbeddingGateway("m", "https://embeddings.example.test/embed", "", 2);
    expect(await g.embed([])).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("probeEmbedding", () => {
  it("probes once per gateway and caches the result", async () => {
    const g = new FakeGateway();
    const first = await probeEmbedding(g, 1000);
    const second = await probeEmbedding(g, 1000);
    expect(first).toEqual({ available: true, provider: "fake", model: "fake-embed-1", fingerprint: "fake:fake-embed-1" });
    expect(second).toBe(first);
    expect(g.calls).toEqual([["ping"]]);
  });

  it("caches failures too", async () => {
    const g = new FakeGateway();
    g.failure = new Error("boom");
    expect(await probeEmbedding(g, 1000)).toEqual({ available: false, reason: "probe_failed: boom" });
    g.failure = null;
    expect((await probeEmbedding(g, 1000)).available).toBe(false);
    expect(g.calls).toHaveLength(1);
  });
});

describe("withTimeout", () => {
  it("resolves with the wrapped value", async () => {
    await expect(withTimeout("op", 100, async () => 42)).resolves.toBe(42);
  });

  it("rejects with TimeoutError when the call is too slow", async () => {
    const g = new FakeGateway();
    g.delayMs = 200;
    await expect(withTimeout("slow embed", 10, (s) => g.embed(["x"], s))).rejects.toBeInstanceOf(TimeoutError);
  });

  it("rejects with CancelledError when the parent signal aborts", async () => {
    const ctrl = new AbortController();
    ctrl.abort();
    await expect(withTimeout("op", 100, async () => 1, ctrl.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});

describe("raceSignal", () => {
  it("passes the value through without a signal", async () => {
    await expect(raceSignal("op", Promise.resolve(7))).resolves.toBe(7);
  });

  it("rejects on abort and leaves the shared work running", async () => {
    let finish: (v: number) => void = () => {};
    const shared = new Promise<number>((resolve) => {
      finish = resolve;
    });
    const ctrl = new AbortController();
    const raced = raceSignal("op", shared, ctrl.signal);
    ctrl.abort();

    await expect(raced).rejects.toBeInstanceOf(CancelledError);
    finish(3);
    await expect(shared).resolves.toBe(3);
  });
});
