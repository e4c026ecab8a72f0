// src/routes/memory.ts
// Retrieval, packing, status and the explicit write tools.

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { stableJson } from "../services/ids.js";
import { serializePack } from "../services/packer.js";
import type { RetrievalEngine } from "../services/retrieval.js";
import { debug } from "../services/log.js";

const log = debug("ledger:routes");

/** One JSON text block with sorted keys. */
export function jsonContent(value: unknown): CallToolResult {
  return { content: [{ type: "text", text: stableJson(value, 2) }] };
}

const weightsShape = z
  .object({
    lexical: z.number().min(0).optional(),
    vector: z.number().min(0).optional(),
    fallbackDiscount: z.number().optional(),
    importanceBoost: z.number().optional(),
    trustedBoost: z.number().optional(),
    untrustedPenalty: z.number().optional()
  })
  .optional()
  .describe("Per-call fusion weight overrides (clamped)");

export const SearchArgs = {
  query: z.string().min(1).describe("Query text"),
  query_language_hint: z.string().optional().describe("Language tag of the query, e.g. 'en' or 'zh'"),
  companion_query: z.string().optional().describe("Companion-language translation used by the fallback search"),
  limit: z.number().int().positive().optional().describe("Max ranked results"),
  fallback_threshold: z.number().min(0).max(1).optional().describe("Top-score threshold below which fallback runs"),
  fallback_enabled: z.boolean().optional(),
  weights: weightsShape
};

export const PackArgs = {
  ...SearchArgs,
  budget_tokens: z.number().int().nonnegative().optional().describe("Token budget for packed items"),
  max_items: z.number().int().positive().optional().describe("Max packed items"),
  trust_policy: z.enum(["all", "trusted-only"]).optional()
};

export const FillImportanceArgs = {
  record_ref: z.string().min(1).describe("Record identifier"),
  importance: z
    .union([
      z.number(),
      z.object({ score: z.number() }),
      z.object({ label: z.string() })
    ])
    .describe("Score in [0,1], {score}, or {label: must_remember|nice_to_have|ignore}")
};

type SearchParams = z.infer<z.ZodObject<typeof SearchArgs>>;
type PackParams = z.infer<z.ZodObject<typeof PackArgs>>;
type FillImportanceParams = z.infer<z.ZodObject<typeof FillImportanceArgs>>;

function searchInput(args: SearchParams) {
  return {
    query: args.query,
    queryLanguageHint: args.query_language_hint ?? null,
    companionQuery: args.companion_query ?? null,
    limit: args.limit,
    fallbackThreshold: args.fallback_threshold,
    fallbackEnabled: args.fallback_enabled,
    weights: args.weights
  };
}

export async function handleSearch(engine: RetrievalEngine, args: SearchParams): Promise<CallToolResult> {
  const res = await engine.search(searchInput(args));
  log("memory.search", { results: res.results.length, warnings: res.warnings.length });
  return jsonContent({
    query: res.query,
    language_hint: res.languageHint,
    results: res.results,
    fallback: res.fallback,
    warnings: res.warnings
  });
}

export async function handlePack(engine: RetrievalEngine, args: PackParams): Promise<CallToolResult> {
  const pack = await engine.pack({
    ...searchInput(args),
    budgetTokens: args.budget_tokens,
    maxItems: args.max_items,
    trustPolicy: args.trust_policy
  });
  return { content: [{ type: "text", text: serializePack(pack) }] };
}

export async function handleStatus(engine: RetrievalEngine): Promise<CallToolResult> {
  return jsonContent(await engine.status());
}

export async function handleFillImportance(engine: RetrievalEngine, args: FillImportanceParams): Promise<CallToolResult> {
  return jsonContent(await engine.fillImportance(args.record_ref, args.importance));
}

export async function handleRebuild(engine: RetrievalEngine): Promise<CallToolResult> {
  return jsonContent(await engine.rebuild());
}

export function registerMemory(server: McpServer, engine: RetrievalEngine) {
  server.tool(
    "memory.search",
    "Hybrid lexical/vector search with cross-language fallback; returns ranked record references.",
    SearchArgs,
    async (args) => handleSearch(engine, args)
  );
  server.tool(
    "memory.pack",
    "Search, then pack ranked records into a bounded context pack with a redaction-safe trace.",
    PackArgs,
    async (args) => handlePack(engine, args)
  );
  server.tool(
    "memory.status",
    "Embedding availability, index fingerprint and last rebuild.",
    {},
    async () => handleStatus(engine)
  );
  server.tool(
    "memory.fill_importance",
    "Set a record's importance only if it has none; an existing value is never replaced.",
    FillImportanceArgs,
    async (args) => handleFillImportance(engine, args)
  );
  server.tool(
    "index.rebuild",
    "Re-embed all records with the configured provider and record the new index fingerprint.",
    {},
    async () => handleRebuild(engine)
  );
}
