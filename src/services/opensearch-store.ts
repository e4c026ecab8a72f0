// src/services/opensearch-store.ts
// RecordStore over OpenSearch: BM25 lexical search, knn vector search,
// metadata documents, and the painless fill-missing importance write.

import { z } from "zod";
import type {
  IndexDescription,
  LexicalQuery,
  MemoryRecord,
  RecordStore,
  RecordVectors,
  StoreHit,
  TextField
} from "../domain/types.js";
import type { StoreConfig } from "./config.js";
import { findKnnVectorDimensions } from "./os-bootstrap.js";
import type { OpenSearchTransport } from "./os-client.js";
import { debug, warn } from "./log.js";

const log = debug("ledger:os-store");

const RecordSourceSchema = z.object({
  id: z.string().optional(),
  text: z.string().default(""),
  text_companion: z.string().nullable().optional(),
  lang: z.string().nullable().optional(),
  kind: z.string().default("note"),
  summary: z.string().default(""),
  importance: z.number().nullable().default(null),
  trust: z.enum(["trusted", "unknown", "untrusted"]).catch("unknown"),
  ts: z.string().default(""),
  source_ref: z.string().nullable().optional()
});

const HitsSchema = z.object({
  hits: z.object({
    hits: z.array(
      z.object({
        _id: z.string(),
        _score: z.number().nullable().optional(),
        _source: z.unknown().optional(),
        sort: z.array(z.union([z.string(), z.number()])).optional()
      })
    )
  })
});

const CountSchema = z.object({ count: z.number() });
const MetaSchema = z.object({ _source: z.object({ value: z.string() }) });
const UpdateSchema = z.object({ result: z.string() });

const VECTOR_FIELD: Record<TextField, string> = {
  text: "embedding",
  text_companion: "embedding_companion"
};

/** Page size for listRecordIds; pages are chained with search_after on `id`. */
export const LIST_PAGE_SIZE = 1000;

/** BM25 is unbounded; squash into [0, 1). */
export function squashBm25(score: number): number {
  return score > 0 ? score / (1 + score) : 0;
}

/** Lucene cosinesimil scores are (1 + cos) / 2; negative similarity maps to 0. */
export function knnScoreToCosine(score: number): number {
  return Math.max(0, Math.min(1, 2 * score - 1));
}

export function toRecord(id: string, source: unknown): MemoryRecord | null {
  const parsed = RecordSourceSchema.safeParse(source ?? {});
  if (!parsed.success) {
    warn("ledger:os-store", `record ${id} is malformed: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    return null;
  }
  const s = parsed.data;
  return {
    id: s.id ?? id,
    text: s.text,
    text_companion: s.text_companion ?? null,
    lang: s.lang ?? null,
    kind: s.kind,
    summary: s.summary,
    importance: s.importance,
    trust: s.trust,
    ts: s.ts,
    source_ref: s.source_ref ?? null
  };
}

const SOURCE_EXCLUDES = ["embedding", "embedding_companion"];

export class OpenSearchRecordStore implements RecordStore {
  constructor(
    private readonly transport: OpenSearchTransport,
    private readonly indices: StoreConfig
  ) {}

  private hitsOf(body: unknown, toScore: (s: number) => number): StoreHit[] {
    const parsed = HitsSchema.safeParse(body);
    if (!parsed.success) throw new Error(`unexpected search response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    const out: StoreHit[] = [];
    for (const h of parsed.data.hits.hits) {
      const record = toRecord(h._id, h._source);
      const score = toScore(h._score ?? 0);
      if (record && score > 0) out.push({ record, score });
    }
    return out;
  }

  async searchLexical(field: TextField, query: LexicalQuery, limit: number, signal?: AbortSignal): Promise<StoreHit[]> {
    const should: Array<Record<string, unknown>> = [];
    if (query.text.trim()) should.push({ match: { [field]: { query: query.text } } });
    for (const t of query.terms) should.push({ match_phrase: { [field]: t } });
    if (should.length === 0) return [];
    const body = await this.transport.search(
      this.indices.recordsIndex,
      {
        size: limit,
        _source: { excludes: SOURCE_EXCLUDES },
        query: { bool: { should, minimum_should_match: 1 } }
      },
      signal
    );
    return this.hitsOf(body, squashBm25);
  }

  async searchVector(field: TextField, vector: number[], limit: number, signal?: AbortSignal): Promise<StoreHit[]> {
    const body = await this.transport.search(
      this.indices.recordsIndex,
      {
        size: limit,
        _source: { excludes: SOURCE_EXCLUDES },
        query: { knn: { [VECTOR_FIELD[field]]: { vector, k: limit } } }
      },
      signal
    );
    return this.hitsOf(body, knnScoreToCosine);
  }

  async hasCompanionText(): Promise<boolean> {
    const body = await this.transport.count(this.indices.recordsIndex, {
      query: { exists: { field: "text_companion" } }
    });
    const parsed = CountSchema.safeParse(body);
    return parsed.success && parsed.data.count > 0;
  }

  async describeIndex(): Promise<IndexDescription> {
    const mapping = await this.transport.getMapping(this.indices.recordsIndex);
    if (mapping === null) return { fts: false, vector: false };
    return { fts: true, vector: findKnnVectorDimensions(mapping).length > 0 };
  }

  async getMeta(key: string): Promise<string | null> {
    const doc = await this.transport.get(this.indices.metaIndex, key);
    if (doc === null) return null;
    const parsed = MetaSchema.safeParse(doc);
    if (!parsed.success) {
      warn("ledger:os-store", `metadata ${key} is malformed; treating as absent`);
      return null;
    }
    return parsed.data._source.value;
  }

  async setMeta(key: string, value: string): Promise<void> {
    await this.transport.index(this.indices.metaIndex, key, { value, updated_at: new Date().toISOString() });
  }

  /** Painless script: write when absent, otherwise `noop`. One request, no read-then-write. */
  async setImportanceIfAbsent(id: string, importance: number): Promise<boolean> {
    const body = await this.transport.update(this.indices.recordsIndex, id, {
      script: {
        lang: "painless",
        source: "if (ctx._source.importance == null) { ctx._source.importance = params.v } else { ctx.op = 'noop' }",
        params: { v: importance }
      }
    });
    const parsed = UpdateSchema.safeParse(body);
    const applied = parsed.success && parsed.data.result === "updated";
    log("importance.fill", { id, applied });
    return applied;
  }

  async scanRecords(opts: { since?: string; limit: number }): Promise<MemoryRecord[]> {
    const body = await this.transport.search(this.indices.recordsIndex, {
      size: opts.limit,
      _source: { excludes: SOURCE_EXCLUDES },
      query: opts.since ? { range: { ts: { gte: opts.since } } } : { match_all: {} },
      sort: [{ ts: "desc" }, { id: "asc" }]
    });
    return this.hitsOf(body, () => 1).map((h) => h.record);
  }

  async listRecordIds(): Promise<string[]> {
    const ids: string[] = [];
    let after: Array<string | number> | undefined;
    for (;;) {
      const body = await this.transport.search(this.indices.recordsIndex, {
        size: LIST_PAGE_SIZE,
        _source: false,
        query: { match_all: {} },
        sort: [{ id: "asc" }],
        ...(after ? { search_after: after } : {})
      });
      const parsed = HitsSchema.safeParse(body);
      if (!parsed.success) throw new Error("unexpected search response while listing ids");
      const page = parsed.data.hits.hits;
      for (const h of page) ids.push(h._id);
      const last = page.at(-1);
      if (page.length < LIST_PAGE_SIZE || !last) break;
      after = last.sort ?? [last._id];
    }
    log("list.ids", { count: ids.length });
    return ids;
  }

  async getRecord(id: string): Promise<MemoryRecord | null> {
    const doc = await this.transport.get(this.indices.recordsIndex, id);
    if (doc === null || typeof doc !== "object") return null;
    return toRecord(id, Reflect.get(doc, "_source"));
  }

  async putVectors(id: string, vectors: RecordVectors): Promise<void> {
    const doc: Record<string, unknown> = {};
    if (vectors.primary) doc.embedding = vectors.primary;
    if (vectors.companion) doc.embedding_companion = vectors.companion;
    if (Object.keys(doc).length === 0) return;
    await this.transport.update(this.indices.recordsIndex, id, { doc });
  }
}
