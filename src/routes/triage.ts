// src/routes/triage.ts
// Deterministic triage as an MCP tool.

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { TriageEngine } from "../services/triage.js";
import { jsonContent } from "./memory.js";

export const TriageArgs = {
  mode: z.enum(["heartbeat", "tasks", "errors"]).optional().describe("heartbeat = tasks + errors (default)")
};

type TriageParams = z.infer<z.ZodObject<typeof TriageArgs>>;

export async function handleTriage(engine: TriageEngine, args: TriageParams): Promise<CallToolResult> {
  const report = await engine.run(args.mode ?? "heartbeat");
  return { ...jsonContent(report), isError: !report.ok };
}

export function registerTriage(server: McpServer, engine: TriageEngine) {
  server.tool(
    "triage.run",
    "Scan recent records for tasks and recurring errors; alerts are deduplicated against persisted state.",
    TriageArgs,
    async (args) => handleTriage(engine, args)
  );
}
