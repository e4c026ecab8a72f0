/**
 * Lightweight namespaced debug logger.
 * Usage:
 *   import { debug } from "../services/log.js";
 *   const log = debug("ledger:planner");
 *   log("requests", { count: 3, fallback: false });
 *
 * Enable with environment variable:
 *   DEBUG=ledger:*                  // all ledger namespaces
 *   DEBUG=ledger:triage             // only triage
 *   DEBUG=ledger:planner,ledger:pack // multiple
 *
 * warn() is always on; degraded paths use it in addition to the
 * warnings attached to responses.
 */
export type Logger = (...args: unknown[]) => void;

function parsePatterns(s: string | undefined): string[] {
  return (s || "")
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
}

function matches(ns: string, pattern: string): boolean {
  if (pattern === "*" || pattern === ns) return true;
  if (pattern.endsWith("*")) {
    const base = pattern.slice(0, -1);
    return ns.startsWith(base);
  }
  return false;
}

export function debug(namespace: string): Logger {
  const patterns = parsePatterns(process.env.DEBUG);
  const enabled = patterns.length > 0 && patterns.some((p) => matches(namespace, p));
  if (!enabled) {
    // eslint-disable-next-line @typescript-eslint/no-empty-function
    return () => {};
  }
  return (...args: unknown[]) => {
    const ts = new Date().toISOString();
    // stderr: stdout carries the MCP stdio transport
    // eslint-disable-next-line no-console
    console.error(`[${ts}] ${namespace}`, ...args);
  };
}

export function warn(namespace: string, message: string): void {
  // eslint-disable-next-line no-console
  console.warn(`[${namespace}] ${message}`);
}
