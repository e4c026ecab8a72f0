// src/services/triage.ts
// Deterministic triage: task and recurring-error alerts deduplicated
// against persisted state. No model calls.
//
// Run phases: LOAD_STATE → SCAN_RECORDS → CLASSIFY → DEDUPE_AGAINST_STATE
//             → PERSIST_STATE → EMIT_REPORT
// The state file is held under an exclusive lock for the whole run.

import fs, { type Stats } from "fs";
import path from "path";
import lockfile from "proper-lockfile";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { TriageLockError, TriageStateError, errorMessage } from "../domain/errors.js";
import { isTaskCandidate } from "../domain/task-markers.js";
import type { MemoryRecord, RecordStore } from "../domain/types.js";
import type { TriageConfig } from "./config.js";
import { safeNowIso, shortHash } from "./ids.js";
import { labelFromScore, type ImportanceLabel } from "./importance.js";
import { debug, warn } from "./log.js";

const log = debug("ledger:triage");

export const TRIAGE_SCHEMA = "triage.v1";

export type TriageMode = "heartbeat" | "tasks" | "errors";
export type TriagePhase =
  | "LOAD_STATE"
  | "SCAN_RECORDS"
  | "CLASSIFY"
  | "DEDUPE_AGAINST_STATE"
  | "PERSIST_STATE"
  | "EMIT_REPORT";

// ---------------------------
// State document
// ---------------------------

const AlertStateSchema = z.object({
  first_seen: z.string(),
  last_seen: z.string(),
  count: z.number().int().nonnegative(),
  type: z.enum(["task", "error"])
});

export const TriageStateSchema = z.object({
  version: z.literal(1),
  alerts: z.record(AlertStateSchema)
});

export type AlertState = z.infer<typeof AlertStateSchema>;
export type TriageState = z.infer<typeof TriageStateSchema>;

export function emptyTriageState(): TriageState {
  return { version: 1, alerts: {} };
}

export interface TriageStateStore {
  readonly path: string;
  /** Acquire the exclusive lock; resolves to its release function. Throws TriageLockError when held. */
  lock(): Promise<() => Promise<void>>;
  load(): Promise<TriageState>;
  save(state: TriageState): Promise<void>;
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && Reflect.get(err, "code") === code;
}

const PidLockSchema = z.object({ pid: z.number().int() });

function parseJsonOrNull(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    log("lock.unparseable", errorMessage(err));
    return null;
  }
}

/** Lock directories untouched for this long belong to a dead run and are reclaimed. */
export const TRIAGE_LOCK_STALE_MS = 60_000;

function pidAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return hasCode(err, "EPERM");
  }
}

/**
 * JSON file + `<path>.lock` held through proper-lockfile; writes go to a
 * temp file renamed into place.
 */
export class FileTriageStateStore implements TriageStateStore {
  constructor(readonly path: string, private readonly staleMs = TRIAGE_LOCK_STALE_MS) {}

  get lockPath(): string {
    return `${this.path}.lock`;
  }

  async lock(): Promise<() => Promise<void>> {
    await fs.promises.mkdir(path.dirname(this.path), { recursive: true });
    await this.clearPidLock();
    try {
      return await lockfile.lock(this.path, {
        lockfilePath: this.lockPath,
        realpath: false,
        stale: this.staleMs,
        onCompromised: (err) => {
          warn("ledger:triage", `state lock compromised: ${errorMessage(err)}`);
        }
      });
    } catch (err) {
      if (hasCode(err, "ELOCKED")) throw new TriageLockError(this.lockPath);
      throw new TriageStateError(`cannot create lock: ${errorMessage(err)}`, this.path);
    }
  }

  /**
   * Older runs left a plain `{pid, ts}` file at the lock path. Remove it when
   * its process is gone or it is older than the stale window.
   */
  private async clearPidLock(): Promise<void> {
    let stat: Stats;
    try {
      stat = await fs.promises.stat(this.lockPath);
    } catch (err) {
      if (hasCode(err, "ENOENT")) return;
      throw new TriageStateError(`cannot inspect lock: ${errorMessage(err)}`, this.path);
    }
    if (!stat.isFile()) return;

    const raw = await fs.promises.readFile(this.lockPath, "utf8").catch((err: unknown) => {
      if (hasCode(err, "ENOENT")) return null;
      throw new TriageStateError(`cannot read lock: ${errorMessage(err)}`, this.path);
    });
    if (raw === null) return;
    const owner = PidLockSchema.safeParse(parseJsonOrNull(raw));
    const dead = owner.success ? !pidAlive(owner.data.pid) : Date.now() - stat.mtimeMs > this.staleMs;
    if (!dead) throw new TriageLockError(this.lockPath);
    log("lock.reclaimed", { path: this.lockPath, pid: owner.success ? owner.data.pid : null });
    await fs.promises.rm(this.lockPath, { force: true });
  }

  async load(): Promise<TriageState> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.path, "utf8");
    } catch (err) {
      if (hasCode(err, "ENOENT")) return emptyTriageState();
      throw new TriageStateError(`cannot read triage state: ${errorMessage(err)}`, this.path);
    }
    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch (err) {
      throw new TriageStateError(`triage state is not valid JSON: ${errorMessage(err)}`, this.path);
    }
    const parsed = TriageStateSchema.safeParse(doc);
    if (!parsed.success) {
      throw new TriageStateError(`triage state failed validation: ${parsed.error.issues[0]?.message ?? "invalid"}`, this.path);
    }
    return parsed.data;
  }

  async save(state: TriageState): Promise<void> {
    const tmp = `${this.path}.${process.pid}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.path), { recursive: true });
      await fs.promises.writeFile(tmp, JSON.stringify(state, null, 2) + "\n", "utf8");
      await fs.promises.rename(tmp, this.path);
    } catch (err) {
      await fs.promises.rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
        warn("ledger:triage", `temp state cleanup failed: ${errorMessage(cleanupErr)}`);
      });
      throw new TriageStateError(`cannot write triage state: ${errorMessage(err)}`, this.path);
    }
  }
}

// ---------------------------
// Classification
// ---------------------------

const UUID_RE = /[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/g;
const HEX_RE = /\b[0-9a-f]{8,}\b/g;
export const SIGNATURE_MAX_CHARS = 160;

/** Stable grouping key for error-like records: volatile ids, hex and numbers masked. */
export function errorSignature(kind: string, text: string): string {
  const body = (text ?? "")
    .normalize("NFKC")
    .toLowerCase()
    .replace(UUID_RE, "<id>")
    .replace(HEX_RE, "<hex>")
    .replace(/\d+/g, "#")
    .replace(/\s+/g, " ")
    .trim()
    .slice(0, SIGNATURE_MAX_CHARS);
  const k = (kind ?? "").trim().toLowerCase() || "unknown";
  return `${k}:${body}`;
}

export function isErrorCandidate(record: Pick<MemoryRecord, "kind" | "summary">, keywords: string[]): boolean {
  if ((record.kind ?? "").trim().toLowerCase() === "error") return true;
  const summary = (record.summary ?? "").normalize("NFKC").toLowerCase();
  return summary !== "" && keywords.some((k) => summary.includes(k));
}

// ---------------------------
// Report
// ---------------------------

export type AlertStatus = "new" | "repeat" | "unconfirmed";

export interface TriageAlert {
  key: string;
  type: "task" | "error";
  status: AlertStatus;
  meets_threshold: boolean;
  recordRefs: string[];
  summary: string;
  importance: number | null;
  importance_label: ImportanceLabel;
  count: number;
}

export interface TriageReport {
  schema: typeof TRIAGE_SCHEMA;
  run_id: string;
  ts: string;
  ok: boolean;
  mode: TriageMode;
  needs_attention: boolean;
  found_new: boolean;
  alerts: TriageAlert[];
  counts: { scanned: number; tasks: number; errors: number; alerts: number; new: number };
  state: { path: string; persisted: boolean };
  error?: { phase: TriagePhase; message: string };
}

export interface TriageEngineDeps {
  store: RecordStore;
  stateStore: TriageStateStore;
  config: TriageConfig;
  now?: () => Date;
  runId?: () => string;
}

type Draft = Omit<TriageAlert, "status">;

const REF_SAMPLE = 5;

function minutesBefore(now: Date, minutes: number): Date {
  return new Date(now.getTime() - minutes * 60_000);
}

function within(record: MemoryRecord, since: Date): boolean {
  const t = Date.parse(record.ts);
  return !Number.isNaN(t) && t >= since.getTime();
}

export class TriageEngine {
  private phase: TriagePhase = "LOAD_STATE";

  constructor(private readonly deps: TriageEngineDeps) {}

  get currentPhase(): TriagePhase {
    return this.phase;
  }

  private enter(phase: TriagePhase) {
    this.phase = phase;
    log("phase", phase);
  }

  /**
   * Lock conflicts and unreadable state throw. A failed state write
   * yields ok:false with every alert "unconfirmed" and found_new false.
   */
  async run(mode: TriageMode = "heartbeat"): Promise<TriageReport> {
    const { store, stateStore, config } = this.deps;
    const now = (this.deps.now ?? (() => new Date()))();
    const ts = safeNowIso(now);
    const runId = this.deps.runId ? this.deps.runId() : uuidv4();

    const release = await stateStore.lock();
    try {
      this.enter("LOAD_STATE");
      const state = await stateStore.load();

      this.enter("SCAN_RECORDS");
      const wantTasks = mode !== "errors";
      const wantErrors = mode !== "tasks";
      const taskSince = minutesBefore(now, config.tasksSinceMinutes);
      const errorSince = minutesBefore(now, config.sinceMinutes);
      const since = !wantErrors ? taskSince : !wantTasks ? errorSince
        : new Date(Math.min(taskSince.getTime(), errorSince.getTime()));
      const records = await store.scanRecords({ since: safeNowIso(since), limit: config.scanLimit });

      this.enter("CLASSIFY");
      const drafts: Draft[] = [];
      let taskCount = 0;
      let errorCount = 0;
      if (wantTasks) {
        const tasks = this.classifyTasks(records.filter((r) => within(r, taskSince)));
        taskCount = tasks.length;
        drafts.push(...tasks);
      }
      if (wantErrors) {
        const errors = this.classifyErrors(records.filter((r) => within(r, errorSince)));
        errorCount = errors.matched;
        drafts.push(...errors.alerts);
      }
      drafts.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));

      this.enter("DEDUPE_AGAINST_STATE");
      const renotifyBefore = minutesBefore(now, config.renotifyAfterMinutes).getTime();
      const next: TriageState = { version: 1, alerts: { ...state.alerts } };
      const alerts: TriageAlert[] = drafts.map((d) => {
        const prev = state.alerts[d.key];
        const lastSeen = prev ? Date.parse(prev.last_seen) : Number.NaN;
        const stale = prev !== undefined && (Number.isNaN(lastSeen) || lastSeen < renotifyBefore);
        const isNew = prev === undefined || stale;
        next.alerts[d.key] = {
          first_seen: prev && !stale ? prev.first_seen : ts,
          last_seen: ts,
          count: (prev?.count ?? 0) + 1,
          type: d.type
        };
        return { ...d, status: isNew ? "new" : "repeat" };
      });

      this.enter("PERSIST_STATE");
      let persistError: string | null = null;
      try {
        await stateStore.save(next);
      } catch (err) {
        persistError = errorMessage(err);
        warn("ledger:triage", `state not persisted: ${persistError}`);
      }

      this.enter("EMIT_REPORT");
      const base = {
        schema: TRIAGE_SCHEMA,
        run_id: runId,
        ts,
        mode,
        counts: { scanned: records.length, tasks: taskCount, errors: errorCount, alerts: alerts.length, new: 0 }
      } as const;

      // Attention is judged on alerts that are new this run, whether or not the write landed.
      const fresh = alerts.filter((a) => a.status === "new");
      const needsAttention = fresh.some((a) => a.meets_threshold);

      if (persistError !== null) {
        const unconfirmed = alerts.map((a): TriageAlert => ({ ...a, status: "unconfirmed" }));
        return {
          ...base,
          ok: false,
          needs_attention: needsAttention,
          found_new: false,
          alerts: unconfirmed,
          state: { path: stateStore.path, persisted: false },
          error: { phase: "PERSIST_STATE", message: persistError }
        };
      }

      const report: TriageReport = {
        ...base,
        counts: { ...base.counts, new: fresh.length },
        ok: true,
        needs_attention: needsAttention,
        found_new: fresh.length > 0,
        alerts,
        state: { path: stateStore.path, persisted: true }
      };
      log("report", { mode, alerts: alerts.length, new: fresh.length, needs_attention: report.needs_attention });
      return report;
    } finally {
      await release();
    }
  }

  private classifyTasks(records: MemoryRecord[]): Draft[] {
    const { importanceMin } = this.deps.config;
    return records
      .filter((r) => typeof r.id === "string" && r.id.trim() !== "" && isTaskCandidate(r))
      .map((r): Draft => {
        const importance = typeof r.importance === "number" && Number.isFinite(r.importance) ? r.importance : null;
        return {
          key: `task:${r.id}`,
          type: "task",
          meets_threshold: importance !== null && importance >= importanceMin,
          recordRefs: [r.id],
          summary: r.summary.trim().slice(0, SIGNATURE_MAX_CHARS),
          importance,
          importance_label: labelFromScore(importance),
          count: 1
        };
      });
  }

  /** Signatures seen more than `errorThreshold` times in the window. */
  private classifyErrors(records: MemoryRecord[]): { matched: number; alerts: Draft[] } {
    const { keywords, errorThreshold } = this.deps.config;
    const groups = new Map<string, MemoryRecord[]>();
    let matched = 0;
    for (const r of records) {
      if (!isErrorCandidate(r, keywords)) continue;
      matched++;
      const sig = errorSignature(r.kind, r.summary || r.text);
      const list = groups.get(sig);
      if (list) list.push(r);
      else groups.set(sig, [r]);
    }

    const alerts: Draft[] = [];
    for (const [sig, list] of groups) {
      if (list.length <= errorThreshold) continue;
      const refs = list.map((r) => r.id).filter(Boolean).sort();
      alerts.push({
        key: `err:${shortHash(sig)}`,
        type: "error",
        meets_threshold: true,
        recordRefs: refs.slice(0, REF_SAMPLE),
        summary: sig,
        importance: null,
        importance_label: "unknown",
        count: list.length
      });
    }
    return { matched, alerts };
  }
}
