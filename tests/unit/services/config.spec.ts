import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import {
  DEFAULT_FUSION_WEIGHTS,
  __resetConfigCaches,
  normalizeFusionWeights,
  parseTrustPolicy,
  resolveClampConfig,
  resolveEmbeddingConfig,
  resolveFallbackConfig,
  resolveFusionWeights,
  resolvePackingDefaults,
  resolveSearchTuning,
  resolveStoreConfig,
  resolveTriageConfig
} from "../../../src/services/config";

let originalEnv: NodeJS.ProcessEnv;
let dir: string;

function writeTmp(name: string, content: string): string {
  const p = path.join(dir, name);
  fs.writeFileSync(p, content, "utf8");
  return p;
}

beforeEach(() => {
  originalEnv = { ...process.env };
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "ledger-config-"));
  __resetConfigCaches();
});

afterEach(() => {
  process.env = originalEnv;
  __resetConfigCaches();
  vi.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("repository defaults", () => {
  it("resolves the shipped YAML files", () => {
    expect(resolveFusionWeights()).toEqual(DEFAULT_FUSION_WEIGHTS);
    expect(resolveFallbackConfig()).toEqual({ enabled: true, threshold: 0.35 });
    expect(resolveSearchTuning()).toEqual({ limit: 20, candidateMultiplier: 3, searchTimeoutMs: 5000, embedTimeoutMs: 8000 });
    expect(resolvePackingDefaults()).toEqual({ budgetTokens: 1200, maxItems: 12, trustPolicy: "all" });
    expect(resolveStoreConfig()).toEqual({ recordsIndex: "ledger-records", metaIndex: "ledger-meta" });
  });

  it("reads triage settings with the state path from the environment", () => {
    process.env.LEDGER_TRIAGE_STATE_PATH = "/tmp/ledger-test/state.json";
    const t = resolveTriageConfig();
    expect(t.statePath).toBe("/tmp/ledger-test/state.json");
    expect(t.importanceMin).toBe(0.7);
    expect(t.errorThreshold).toBe(2);
    expect(t.renotifyAfterMinutes).toBe(10080);
    expect(t.keywords).toContain("db locked");
  });
});

describe("retrieval overrides", () => {
  it("loads an alternate file and deep-merges the JSON override", () => {
    process.env.LEDGER_RETRIEVAL_CONFIG_PATH = writeTmp(
      "retrieval.yaml",
      "fusion:\n  weights:\n    lexical: 0.7\nfallback:\n  threshold: 0.5\n"
    );
    process.env.LEDGER_RETRIEVAL_OVERRIDES_JSON = JSON.stringify({ fallback: { threshold: 0.2 } });

    expect(resolveFusionWeights().lexical).toBe(0.7);
    expect(resolveFusionWeights().vector).toBe(0.5);
    expect(resolveFallbackConfig()).toEqual({ enabled: true, threshold: 0.2 });
  });

  it("applies the overrides file before the JSON string", () => {
    process.env.LEDGER_RETRIEVAL_CONFIG_PATH = writeTmp("retrieval.yaml", "fallback:\n  threshold: 0.5\n");
    process.env.LEDGER_RETRIEVAL_OVERRIDES_FILE = writeTmp(
      "overrides.json",
      JSON.stringify({ fallback: { enabled: false, threshold: 0.3 } })
    );
    process.env.LEDGER_RETRIEVAL_OVERRIDES_JSON = JSON.stringify({ fallback: { threshold: 0.2 } });

    expect(resolveFallbackConfig()).toEqual({ enabled: false, threshold: 0.2 });
  });

  it("lets environment variables win over YAML", () => {
    process.env.LEDGER_FALLBACK_ENABLED = "false";
    process.env.LEDGER_FALLBACK_THRESHOLD = "0.9";
    expect(resolveFallbackConfig()).toEqual({ enabled: false, threshold: 0.9 });
  });

  it("warns about malformed override JSON and keeps the YAML values", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    process.env.LEDGER_RETRIEVAL_OVERRIDES_JSON = "{not json";
    expect(resolveFallbackConfig().threshold).toBe(0.35);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(String(warnSpy.mock.calls[0][0])).toMatch(/^\[ledger:config\] ignoring LEDGER_RETRIEVAL_OVERRIDES_JSON/);
  });

  it("falls back to defaults silently when the YAML file is missing", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    process.env.LEDGER_RETRIEVAL_CONFIG_PATH = path.join(dir, "missing.yaml");
    expect(resolveFusionWeights()).toEqual(DEFAULT_FUSION_WEIGHTS);
    expect(warnSpy).not.toHaveBeenCalled();
  });
});

describe("fusion weight clamps", () => {
  it("bounds boosts and the fallback discount", () => {
    expect(
      normalizeFusionWeights({
        lexical: -1,
        trustedBoost: 2,
        untrustedPenalty: -1,
        importanceBoost: 0.7,
        fallbackDiscount: 0
      })
    ).toEqual({
      lexical: 0,
      vector: 0.5,
      fallbackDiscount: 0.8,
      importanceBoost: 0.5,
      trustedBoost: 0.5,
      untrustedPenalty: 0
    });
    expect(normalizeFusionWeights({ fallbackDiscount: 3 }).fallbackDiscount).toBe(1);
  });
});

describe("embedding config", () => {
  it("clamps the character limits into range", () => {
    expect(resolveClampConfig({})).toEqual({ maxChars: 6000, headChars: 500, maxBytes: undefined });
    expect(resolveClampConfig({ maxChars: "50" }).maxChars).toBe(200);
    expect(resolveClampConfig({ maxChars: 300000 }).maxChars).toBe(200000);
    expect(resolveClampConfig({ maxChars: "1000", headChars: 5000 }).headChars).toBe(1000);
    expect(resolveClampConfig({ maxBytes: "abc" }).maxBytes).toBeUndefined();
    expect(resolveClampConfig({ maxBytes: "24000" }).maxBytes).toBe(24000);
  });

  it("reads provider, key and clamp limits from the environment", () => {
    process.env.LEDGER_EMBED_PROVIDER = "OpenAI";
    process.env.OPENAI_API_KEY = "test-secret";
    process.env.LEDGER_EMBED_MAX_CHARS = "1000";
    process.env.LEDGER_EMBED_HEAD_CHARS = "100";
    const c = resolveEmbeddingConfig();
    expect(c.provider).toBe("openai");
    expect(c.endpoint).toBe("https://api.openai.com/v1");
    expect(c.apiKey).toBe("test-secret");
    expect(c.model).toBe("text-embedding-3-small");
    expect(c.clamp).toEqual({ maxChars: 1000, headChars: 100, maxBytes: undefined });
  });

  it("treats unknown providers as none", () => {
    process.env.LEDGER_EMBED_PROVIDER = "mystery";
    expect(resolveEmbeddingConfig().provider).toBe("none");
  });
});

describe("trust policy", () => {
  it("accepts both spellings of trusted-only", () => {
    expect(parseTrustPolicy("trusted_only", "all")).toBe("trusted-only");
    expect(parseTrustPolicy("TRUSTED-ONLY", "all")).toBe("trusted-only");
    expect(parseTrustPolicy("whatever", "all")).toBe("all");
    expect(parseTrustPolicy(undefined, "trusted-only")).toBe("trusted-only");
  });

  it("takes the policy from the environment", () => {
    process.env.LEDGER_TRUST_POLICY = "trusted-only";
    expect(resolvePackingDefaults().trustPolicy).toBe("trusted-only");
  });
});
