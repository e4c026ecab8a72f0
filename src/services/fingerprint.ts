// src/services/fingerprint.ts
// Index fingerprint check (read-only) and the explicit rebuild that is its only writer.

import { errorMessage } from "../domain/errors.js";
import type { RecordStore, RecordVectors } from "../domain/types.js";
import type { ClampConfig } from "./config.js";
import { clampEmbeddingInput, computeFingerprint, withTimeout, type EmbeddingGateway } from "./embedder.js";
import { safeNowIso } from "./ids.js";
import { debug } from "./log.js";

const log = debug("ledger:fingerprint");

export const FINGERPRINT_META_KEY = "embedding_fingerprint";
export const LAST_REBUILD_META_KEY = "last_rebuild";

export type FingerprintCheck =
  | { ok: true; currentFingerprint: string; reason: "match" }
  | { ok: false; currentFingerprint: string | null; configuredFingerprint: string; reason: "unbuilt" | "drift" };

export async function checkFingerprint(
  store: RecordStore,
  configured: { provider: string; model: string }
): Promise<FingerprintCheck> {
  const configuredFingerprint = computeFingerprint(configured.provider, configured.model);
  const current = await store.getMeta(FINGERPRINT_META_KEY);
  if (!current) {
    return { ok: false, currentFingerprint: null, configuredFingerprint, reason: "unbuilt" };
  }
  if (current !== configuredFingerprint) {
    return { ok: false, currentFingerprint: current, configuredFingerprint, reason: "drift" };
  }
  return { ok: true, currentFingerprint: current, reason: "match" };
}

export interface RebuildOptions {
  clamp: ClampConfig;
  timeoutMs: number;
  now?: () => Date;
}

export interface RebuildReport {
  fingerprint: string;
  last_rebuild: string;
  records: number;
  embedded: number;
  clipped: number;
  skipped: string[];
}

/**
 * Re-embed every record with the current gateway, then record the new
 * fingerprint. Metadata is written last, so a failed rebuild leaves the
 * previous fingerprint (and the drift warning) in place.
 */
export async function rebuild(store: RecordStore, gateway: EmbeddingGateway, opts: RebuildOptions): Promise<RebuildReport> {
  const now = opts.now ?? (() => new Date());
  const ids = await store.listRecordIds();
  let embedded = 0;
  let clipped = 0;
  const skipped: string[] = [];

  for (const id of [...ids].sort()) {
    const record = await store.getRecord(id);
    if (!record || !record.text.trim()) {
      skipped.push(id);
      continue;
    }
    const primary = clampEmbeddingInput(record.text, opts.clamp);
    const companionText = record.text_companion?.trim() ? record.text_companion : null;
    const companion = companionText !== null ? clampEmbeddingInput(companionText, opts.clamp) : null;
    if (primary.clipped) clipped++;
    if (companion?.clipped) clipped++;

    const inputs = companion ? [primary.text, companion.text] : [primary.text];
    const vectors = await withTimeout(`embed ${id}`, opts.timeoutMs, (signal) => gateway.embed(inputs, signal));
    const out: RecordVectors = { primary: vectors[0] };
    if (companion) out.companion = vectors[1];
    await store.putVectors(id, out);
    embedded++;
  }

  const fingerprint = computeFingerprint(gateway.provider, gateway.model);
  const lastRebuild = safeNowIso(now());
  try {
    await store.setMeta(FINGERPRINT_META_KEY, fingerprint);
    await store.setMeta(LAST_REBUILD_META_KEY, lastRebuild);
  } catch (err) {
    log("meta.failed", errorMessage(err));
    throw err;
  }
  log("rebuild.done", { fingerprint, records: ids.length, embedded, clipped, skipped: skipped.length });
  return { fingerprint, last_rebuild: lastRebuild, records: ids.length, embedded, clipped, skipped };
}
