// src/services/os-client.ts
// OpenSearch client factory + small helpers (singleton).
// Env:
//   OPENSEARCH_URL (default: http://localhost:9200)
//   OPENSEARCH_USERNAME / OPENSEARCH_PASSWORD (optional)
//   OPENSEARCH_SSL_REJECT_UNAUTHORIZED=false (optional; for self-signed local dev)
//   LEDGER_OS_MAX_RETRIES=0          client-level retries (searches are bounded by timeouts instead)
//   LEDGER_OS_TIMEOUT_MS=10000       per-request timeout
//   LEDGER_OS_MIN_HEALTH=yellow|green
//   LEDGER_OS_HEALTH_TIMEOUT_MS=30000

import { Client, type ClientOptions } from "@opensearch-project/opensearch";
import { errorMessage } from "../domain/errors.js";
import { debug } from "./log.js";

const log = debug("ledger:os-client");

let _client: Client | null = null;

function envNumber(name: string, dflt: number): number {
  const n = Number(process.env[name]);
  return Number.isFinite(n) && (process.env[name] ?? "").trim() !== "" ? n : dflt;
}

function nodeUrl(): string {
  return process.env.OPENSEARCH_URL || "http://localhost:9200";
}

export function getClient(): Client {
  if (_client) return _client;

  const node = nodeUrl();
  const username = process.env.OPENSEARCH_USERNAME;
  const password = process.env.OPENSEARCH_PASSWORD;
  const rejectUnauthorized = (process.env.OPENSEARCH_SSL_REJECT_UNAUTHORIZED ?? "true") !== "false";
  const maxRetries = envNumber("LEDGER_OS_MAX_RETRIES", 0);
  const requestTimeout = envNumber("LEDGER_OS_TIMEOUT_MS", 10000);

  const opts: ClientOptions = {
    node,
    maxRetries,
    requestTimeout,
    ssl: { rejectUnauthorized }
  };
  if (username && password) {
    opts.auth = { username, password };
  }

  log("client.init", { node, maxRetries, requestTimeout, rejectUnauthorized });
  _client = new Client(opts);
  return _client;
}

/** Read a string field from an unknown response body. */
function field(body: unknown, key: string): unknown {
  return body && typeof body === "object" ? Reflect.get(body, key) : undefined;
}

/** Wait for cluster health; throws with the node and root cause on failure. */
export async function assertHealthy(client: Client = getClient()): Promise<void> {
  const minStatus = (process.env.LEDGER_OS_MIN_HEALTH || "yellow").toLowerCase() === "green" ? "green" : "yellow";
  const timeoutMs = envNumber("LEDGER_OS_HEALTH_TIMEOUT_MS", 30000);
  const timeout = `${Math.max(1, Math.ceil(timeoutMs / 1000))}s`;
  const order: Record<string, number> = { red: 0, yellow: 1, green: 2 };

  try {
    const res = await client.cluster.health({ wait_for_status: minStatus, timeout });
    const status = String(field(res.body, "status") ?? "unknown");
    if ((order[status] ?? 0) < order[minStatus]) {
      throw new Error(`Cluster health '${status}' did not reach '${minStatus}' within ${timeout}`);
    }
  } catch (err) {
    throw new Error(`OpenSearch health check failed for ${nodeUrl()}. Root cause: ${errorMessage(err)}`);
  }
}

/** Small retry wrapper for bootstrap operations (never used on the query path). */
export async function withRetries<T>(fn: () => Promise<T>, attempts = 3, baseDelayMs = 150): Promise<T> {
  let lastErr: unknown;
  for (let i = 0; i < attempts; i++) {
    try {
      return await fn();
    } catch (e) {
      lastErr = e;
      log("retry", { attempt: i + 1, error: errorMessage(e) });
      if (i + 1 < attempts) {
        const delay = Math.min(2000, baseDelayMs * Math.pow(2, i));
        await new Promise((r) => setTimeout(r, delay));
      }
    }
  }
  throw lastErr instanceof Error ? lastErr : new Error(String(lastErr));
}

/** Ensure an index exists; if not, create it with the provided body (mappings/settings). */
export async function ensureIndex(name: string, body?: Record<string, unknown>, client: Client = getClient()): Promise<boolean> {
  return withRetries(async () => {
    const exists = await client.indices.exists({ index: name });
    if (exists.body) return false;
    await client.indices.create({ index: name, body });
    log("index.created", name);
    return true;
  });
}

// ---------------------------
// Transport used by the record store
// ---------------------------

/** The slice of the OpenSearch API the record store needs; bodies are returned untyped. */
export interface OpenSearchTransport {
  search(index: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<unknown>;
  count(index: string, body: Record<string, unknown>): Promise<unknown>;
  /** Resolves null when the document does not exist. */
  get(index: string, id: string): Promise<unknown>;
  index(index: string, id: string, document: Record<string, unknown>): Promise<unknown>;
  update(index: string, id: string, body: Record<string, unknown>): Promise<unknown>;
  /** Resolves null when the index does not exist. */
  getMapping(index: string): Promise<unknown>;
}

export function clientTransport(client: Client = getClient()): OpenSearchTransport {
  return {
    async search(index, body, signal) {
      const req = client.search({ index, body });
      const onAbort = () => req.abort();
      signal?.addEventListener("abort", onAbort, { once: true });
      try {
        return (await req).body;
      } finally {
        signal?.removeEventListener("abort", onAbort);
      }
    },
    async count(index, body) {
      return (await client.count({ index, body })).body;
    },
    async get(index, id) {
      const res = await client.get({ index, id }, { ignore: [404] });
      return field(res.body, "found") === true ? res.body : null;
    },
    async index(index, id, document) {
      return (await client.index({ index, id, body: document, refresh: true })).body;
    },
    async update(index, id, body) {
      return (await client.update({ index, id, body, refresh: true }, { ignore: [404] })).body;
    },
    async getMapping(index) {
      const res = await client.indices.getMapping({ index }, { ignore: [404] });
      return res.statusCode === 404 ? null : res.body;
    }
  };
}
