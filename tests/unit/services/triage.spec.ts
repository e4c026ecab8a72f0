import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import {
  FileTriageStateStore,
  TriageEngine,
  emptyTriageState,
  errorSignature,
  isErrorCandidate,
  type TriageState,
  type TriageStateStore
} from "../../../src/services/triage";
import { DEFAULT_TRIAGE_KEYWORDS, type TriageConfig } from "../../../src/services/config";
import { shortHash } from "../../../src/services/ids";
import { TriageLockError, TriageStateError } from "../../../src/domain/errors";
import { InMemoryRecordStore, makeRecord } from "../../helpers/memory-store";

const NOW = new Date("2026-06-01T12:00:00.000Z");
const ERR_KEY = `err:${shortHash("error:connection # refused at worker #")}`;

let dir: string;

function config(statePath: string): TriageConfig {
  return {
    statePath,
    keywords: DEFAULT_TRIAGE_KEYWORDS,
    importanceMin: 0.7,
    errorThreshold: 2,
    sinceMinutes: 60,
    tasksSinceMinutes: 1440,
    renotifyAfterMinutes: 10080,
    scanLimit: 500
  };
}

function ledger(): InMemoryRecordStore {
  return new InMemoryRecordStore([
    makeRecord({ id: "t1", kind: "task", summary: "Renew cert", importance: 0.9, ts: "2026-06-01T11:00:00.000Z" }),
    makeRecord({ id: "t2", kind: "note", summary: "TODO: tidy docs", importance: 0.2, ts: "2026-06-01T11:30:00.000Z" }),
    makeRecord({ id: "e1", kind: "error", summary: "Connection 10 refused at worker 3", ts: "2026-06-01T11:50:00.000Z" }),
    makeRecord({ id: "e2", kind: "error", summary: "Connection 11 refused at worker 4", ts: "2026-06-01T11:55:00.000Z" }),
    makeRecord({ id: "e3", kind: "error", summary: "connection 12 refused at worker 5", ts: "2026-06-01T11:58:00.000Z" }),
    makeRecord({ id: "e4", kind: "error", summary: "Connection 13 refused at worker 6", ts: "2026-06-01T09:00:00.000Z" })
  ]);
}

function engine(store: InMemoryRecordStore, stateStore: TriageStateStore, now = NOW): TriageEngine {
  return new TriageEngine({ store, stateStore, config: config(stateStore.path), now: () => now, runId: () => "run-1" });
}

class MemoryStateStore implements TriageStateStore {
  readonly path = "memory://triage-state";
  state: TriageState = emptyTriageState();
  saveError: Error | null = null;

  async lock(): Promise<() => Promise<void>> {
    return async () => {};
  }

  async load(): Promise<TriageState> {
    return this.state;
  }

  async save(state: TriageState): Promise<void> {
    if (this.saveError) throw this.saveError;
    this.state = state;
  }
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "ledger-triage-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("classification helpers", () => {
  it("masks volatile parts of error text", () => {
    expect(
      errorSignature("Error", "Job 42 failed: id 123e4567-e89b-12d3-a456-426614174000 hash deadbeef01")
    ).toBe("error:job # failed: id <id> hash <hex>");
    expect(errorSignature("", "  Disk\n\nfull  ")).toBe("unknown:disk full");
    expect(errorSignature("error", "x".repeat(300))).toBe(`error:${"x".repeat(160)}`);
  });

  it("treats kind=error or a keyword in the summary as error-like", () => {
    expect(isErrorCandidate({ kind: "Error", summary: "" }, DEFAULT_TRIAGE_KEYWORDS)).toBe(true);
    expect(isErrorCandidate({ kind: "note", summary: "Request TIMEOUT upstream" }, DEFAULT_TRIAGE_KEYWORDS)).toBe(true);
    expect(isErrorCandidate({ kind: "note", summary: "all good" }, DEFAULT_TRIAGE_KEYWORDS)).toBe(false);
  });
});

describe("TriageEngine", () => {
  it("reports tasks and recurring errors as new on the first run", async () => {
    const stateStore = new FileTriageStateStore(path.join(dir, "state.json"));
    const report = await engine(ledger(), stateStore).run("heartbeat");

    expect(report.ok).toBe(true);
    expect(report.run_id).toBe("run-1");
    expect(report.ts).toBe("2026-06-01T12:00:00.000Z");
    expect(report.alerts.map((a) => [a.key, a.status, a.meets_threshold])).toEqual([
      [ERR_KEY, "new", true],
      ["task:t1", "new", true],
      ["task:t2", "new", false]
    ]);
    expect(report.alerts[0]).toMatchObject({
      type: "error",
      recordRefs: ["e1", "e2", "e3"],
      summary: "error:connection # refused at worker #",
      count: 3
    });
    expect(report.alerts[1]).toMatchObject({ summary: "Renew cert", importance: 0.9, importance_label: "must_remember" });
    expect(report.counts).toEqual({ scanned: 6, tasks: 2, errors: 3, alerts: 3, new: 3 });
    expect(report.found_new).toBe(true);
    expect(report.needs_attention).toBe(true);
    expect(report.state).toEqual({ path: stateStore.path, persisted: true });

    const saved: unknown = JSON.parse(fs.readFileSync(stateStore.path, "utf8"));
    expect(saved).toEqual({
      version: 1,
      alerts: {
        [ERR_KEY]: { first_seen: report.ts, last_seen: report.ts, count: 1, type: "error" },
        "task:t1": { first_seen: report.ts, last_seen: report.ts, count: 1, type: "task" },
        "task:t2": { first_seen: report.ts, last_seen: report.ts, count: 1, type: "task" }
      }
    });
    expect(fs.existsSync(stateStore.lockPath)).toBe(false);
  });

  it("marks alerts as repeats on the next run", async () => {
    const stateStore = new FileTriageStateStore(path.join(dir, "state.json"));
    const store = ledger();
    await engine(store, stateStore).run("heartbeat");
    const later = new Date(NOW.getTime() + 5 * 60_000);
    const report = await engine(store, stateStore, later).run("heartbeat");

    expect(report.alerts.map((a) => a.status)).toEqual(["repeat", "repeat", "repeat"]);
    expect(report.found_new).toBe(false);
    expect(report.needs_attention).toBe(false);
    expect(report.counts.new).toBe(0);

    const saved = await stateStore.load();
    expect(saved.alerts["task:t1"]).toEqual({
      first_seen: "2026-06-01T12:00:00.000Z",
      last_seen: "2026-06-01T12:05:00.000Z",
      count: 2,
      type: "task"
    });
  });

  it("re-notifies an alert not seen within the renotify window", async () => {
    const stateStore = new MemoryStateStore();
    stateStore.state = {
      version: 1,
      alerts: {
        "task:t1": { first_seen: "2026-04-01T00:00:00.000Z", last_seen: "2026-05-20T00:00:00.000Z", count: 4, type: "task" }
      }
    };
    const report = await engine(ledger(), stateStore).run("tasks");

    expect(report.alerts.find((a) => a.key === "task:t1")?.status).toBe("new");
    expect(stateStore.state.alerts["task:t1"]).toEqual({
      first_seen: "2026-06-01T12:00:00.000Z",
      last_seen: "2026-06-01T12:00:00.000Z",
      count: 5,
      type: "task"
    });
  });

  it("limits the scan to the requested mode", async () => {
    const tasks = await engine(ledger(), new MemoryStateStore()).run("tasks");
    expect(tasks.alerts.map((a) => a.type)).toEqual(["task", "task"]);
    expect(tasks.counts.errors).toBe(0);

    const errors = await engine(ledger(), new MemoryStateStore()).run("errors");
    expect(errors.alerts.map((a) => a.key)).toEqual([ERR_KEY]);
    expect(errors.counts).toEqual({ scanned: 5, tasks: 0, errors: 3, alerts: 1, new: 1 });
  });

  it("does not alert on errors at or below the threshold", async () => {
    const store = new InMemoryRecordStore([
      makeRecord({ id: "e1", kind: "error", summary: "disk full", ts: "2026-06-01T11:50:00.000Z" }),
      makeRecord({ id: "e2", kind: "error", summary: "disk full", ts: "2026-06-01T11:51:00.000Z" })
    ]);
    const report = await engine(store, new MemoryStateStore()).run("errors");
    expect(report.alerts).toEqual([]);
    expect(report.counts.errors).toBe(2);
    expect(report.needs_attention).toBe(false);
  });

  it("returns unconfirmed alerts when the state cannot be saved", async () => {
    const stateStore = new MemoryStateStore();
    stateStore.saveError = new Error("disk full");
    const report = await engine(ledger(), stateStore).run("heartbeat");

    expect(report.ok).toBe(false);
    expect(report.alerts.map((a) => a.status)).toEqual(["unconfirmed", "unconfirmed", "unconfirmed"]);
    expect(report.found_new).toBe(false);
    expect(report.needs_attention).toBe(true);
    expect(report.state).toEqual({ path: "memory://triage-state", persisted: false });
    expect(report.error).toEqual({ phase: "PERSIST_STATE", message: "disk full" });
  });

  it("judges attention on new alerts even when the save fails", async () => {
    const stateStore = new MemoryStateStore();
    await engine(ledger(), stateStore).run("heartbeat");
    stateStore.saveError = new Error("disk full");
    const report = await engine(ledger(), stateStore).run("heartbeat");

    expect(report.ok).toBe(false);
    expect(report.alerts.map((a) => a.status)).toEqual(["unconfirmed", "unconfirmed", "unconfirmed"]);
    expect(report.needs_attention).toBe(false);
  });

  it("refuses to run while another run holds the lock", async () => {
    const stateStore = new FileTriageStateStore(path.join(dir, "state.json"));
    const release = await new FileTriageStateStore(stateStore.path).lock();
    try {
      await expect(engine(ledger(), stateStore).run()).rejects.toBeInstanceOf(TriageLockError);
      expect(fs.existsSync(stateStore.path)).toBe(false);
    } finally {
      await release();
    }
    expect((await engine(ledger(), stateStore).run()).ok).toBe(true);
  });

  it("reclaims a lock left behind by a crashed run", async () => {
    const stateStore = new FileTriageStateStore(path.join(dir, "state.json"));
    fs.mkdirSync(stateStore.lockPath);
    const old = new Date("2020-01-01T00:00:00.000Z");
    fs.utimesSync(stateStore.lockPath, old, old);

    const report = await engine(ledger(), stateStore).run("tasks");
    expect(report.ok).toBe(true);
    expect(fs.existsSync(stateStore.lockPath)).toBe(false);
  });

  it("reclaims a pid lock file whose process is gone", async () => {
    const stateStore = new FileTriageStateStore(path.join(dir, "state.json"));
    fs.writeFileSync(stateStore.lockPath, JSON.stringify({ pid: 999999, ts: "2020-01-01T00:00:00.000Z" }));

    const report = await engine(ledger(), stateStore).run("tasks");
    expect(report.ok).toBe(true);
    expect(fs.existsSync(stateStore.lockPath)).toBe(false);
  });

  it("keeps a pid lock file whose process is alive", async () => {
    const stateStore = new FileTriageStateStore(path.join(dir, "state.json"));
    fs.writeFileSync(stateStore.lockPath, JSON.stringify({ pid: process.pid, ts: "2026-06-01T11:59:00.000Z" }));

    await expect(engine(ledger(), stateStore).run()).rejects.toBeInstanceOf(TriageLockError);
    expect(fs.readFileSync(stateStore.lockPath, "utf8")).toContain(`"pid":${process.pid}`);
  });

  it("fails on a corrupt state file and releases the lock", async () => {
    const stateStore = new FileTriageStateStore(path.join(dir, "state.json"));
    fs.writeFileSync(stateStore.path, "{not json");
    const e = engine(ledger(), stateStore);

    await expect(e.run()).rejects.toBeInstanceOf(TriageStateError);
    expect(e.currentPhase).toBe("LOAD_STATE");
    expect(fs.existsSync(stateStore.lockPath)).toBe(false);
    expect(fs.readFileSync(stateStore.path, "utf8")).toBe("{not json");
  });

  it("rejects a state document with the wrong shape", async () => {
    const stateStore = new FileTriageStateStore(path.join(dir, "state.json"));
    fs.writeFileSync(stateStore.path, JSON.stringify({ version: 2, alerts: {} }));
    await expect(stateStore.load()).rejects.toThrow(/failed validation/);
  });
});
