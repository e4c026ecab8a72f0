// src/services/os-bootstrap.ts
// OpenSearch bootstrap: health gating, idempotent index setup, vector dim validation.
//
// Env:
//   LEDGER_BOOTSTRAP_OS=1                          -> run bootstrap at startup (wired from src/index.ts)
//   LEDGER_OS_AUTOFIX_VECTOR_DIM=true|false        -> adjust loaded mappings to the embedding dim (default: false)
//   CONFIG_INDEX_TEMPLATES_DIR=config/index-templates
// The expected dimension comes from embedding.dim in config/retrieval.yaml.

import fs from "fs";
import path from "path";
import { resolveEmbeddingConfig, resolveStoreConfig } from "./config.js";
import { assertHealthy, ensureIndex } from "./os-client.js";
import { debug } from "./log.js";

const log = debug("ledger:bootstrap");

export interface BootstrapOptions {
  validateVectorDims?: boolean;
  autoFixVectorDims?: boolean;
  templatesDir?: string;
  expectedDim?: number;
}

export interface BootstrapReport {
  created: string[];
  existing: string[];
}

type JsonObject = Record<string, unknown>;

function isObject(v: unknown): v is JsonObject {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function readJson(filePath: string): JsonObject {
  const doc: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isObject(doc)) throw new Error(`${filePath}: expected a JSON object`);
  return doc;
}

/**
 * Recursively visit an object and apply fn on any knn_vector mapping object:
 * { type: "knn_vector", dimension: number, ... }
 */
function visitKnnVectorMappings(obj: unknown, fn: (node: JsonObject) => void) {
  if (Array.isArray(obj)) {
    for (const v of obj) visitKnnVectorMappings(v, fn);
    return;
  }
  if (!isObject(obj)) return;
  if (obj.type === "knn_vector" && typeof obj.dimension === "number") {
    fn(obj);
  }
  for (const v of Object.values(obj)) {
    if (v && typeof v === "object") visitKnnVectorMappings(v, fn);
  }
}

/** All knn_vector dimensions found in a mapping/index body, in document order. */
export function findKnnVectorDimensions(body: unknown): number[] {
  const dims: number[] = [];
  visitKnnVectorMappings(body, (node) => {
    if (typeof node.dimension === "number") dims.push(node.dimension);
  });
  return dims;
}

/** Adjust all knn_vector dimension fields to the expected dimension (in-place). */
export function adjustAllKnnVectorDimensions(body: unknown, expectedDim: number): void {
  visitKnnVectorMappings(body, (node) => {
    node.dimension = expectedDim;
  });
}

/**
 * Validate that all knn_vector mappings across the bodies match expectedDim.
 * With autoFix, mismatches are corrected in place; otherwise one error lists them all.
 */
export function validateOrFixVectorDims(bodies: Array<{ name: string; body: unknown }>, expectedDim: number, autoFix: boolean) {
  const mismatches: Array<{ name: string; found: number[] }> = [];

  for (const { name, body } of bodies) {
    const dims = findKnnVectorDimensions(body);
    if (dims.every((d) => d === expectedDim)) continue;
    if (autoFix) {
      adjustAllKnnVectorDimensions(body, expectedDim);
      log("dims.fixed", { name, from: dims, to: expectedDim });
    } else {
      mismatches.push({ name, found: dims });
    }
  }

  if (mismatches.length > 0) {
    const details = mismatches
      .map((m) => `${m.name}: [${m.found.join(", ")}] (expected ${expectedDim})`)
      .join("; ");
    throw new Error(
      `Vector dimension mismatch in mappings: ${details}. Set embedding.dim to match the templates or LEDGER_OS_AUTOFIX_VECTOR_DIM=true to auto-adjust.`
    );
  }
}

/** Health check, then create the records and metadata indices if missing. */
export async function bootstrapOpenSearch(opts: BootstrapOptions = {}): Promise<BootstrapReport> {
  const {
    validateVectorDims = true,
    autoFixVectorDims = (process.env.LEDGER_OS_AUTOFIX_VECTOR_DIM || "false").toLowerCase() === "true",
    templatesDir = process.env.CONFIG_INDEX_TEMPLATES_DIR || "config/index-templates",
    expectedDim = resolveEmbeddingConfig().dim
  } = opts;
  const { recordsIndex, metaIndex } = resolveStoreConfig();

  await assertHealthy();

  const recordsBody = readJson(path.join(templatesDir, "ledger-records.json"));
  const metaBody = readJson(path.join(templatesDir, "ledger-meta.json"));
  if (validateVectorDims) {
    validateOrFixVectorDims([{ name: "ledger-records.json", body: recordsBody }], expectedDim, autoFixVectorDims);
  }

  const report: BootstrapReport = { created: [], existing: [] };
  for (const [name, body] of [[recordsIndex, recordsBody], [metaIndex, metaBody]] as const) {
    if (await ensureIndex(name, body)) report.created.push(name);
    else report.existing.push(name);
  }
  log("bootstrap.done", report);
  return report;
}
