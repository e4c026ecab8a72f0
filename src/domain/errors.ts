// src/domain/errors.ts
// Error taxonomy. Fail-open conditions become warnings instead of these.

export type LedgerErrorCode =
  | "invariant"
  | "triage_lock"
  | "triage_state"
  | "timeout"
  | "cancelled"
  | "embedding";

export class LedgerError extends Error {
  constructor(
    public code: LedgerErrorCode,
    message: string
  ) {
    super(message);
    this.name = "LedgerError";
  }
}

/** A core invariant is broken in the store (e.g. one provenance key, two contents). */
export class InvariantError extends LedgerError {
  constructor(message: string) {
    super("invariant", message);
    this.name = "InvariantError";
  }
}

export class TriageLockError extends LedgerError {
  constructor(public lockPath: string) {
    super("triage_lock", `Triage state is locked by another run: ${lockPath}`);
    this.name = "TriageLockError";
  }
}

export class TriageStateError extends LedgerError {
  constructor(message: string, public statePath: string) {
    super("triage_state", message);
    this.name = "TriageStateError";
  }
}

export class TimeoutError extends LedgerError {
  constructor(public label: string, public timeoutMs: number) {
    super("timeout", `${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class CancelledError extends LedgerError {
  constructor(public label: string) {
    super("cancelled", `${label} was cancelled`);
    this.name = "CancelledError";
  }
}

export class EmbeddingError extends LedgerError {
  constructor(message: string, public tooLong = false) {
    super("embedding", message);
    this.name = "EmbeddingError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
