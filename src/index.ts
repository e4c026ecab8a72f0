import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerMemory } from "./routes/memory.js";
import { registerTriage } from "./routes/triage.js";
import { resolveStoreConfig, resolveTriageConfig } from "./services/config.js";
import { errorMessage } from "./domain/errors.js";
import { OpenSearchRecordStore } from "./services/opensearch-store.js";
import { bootstrapOpenSearch } from "./services/os-bootstrap.js";
import { clientTransport } from "./services/os-client.js";
import { createRetrievalEngine } from "./services/retrieval.js";
import { FileTriageStateStore, TriageEngine } from "./services/triage.js";

async function main() {
  const server = new McpServer({ name: "memory-ledger", version: "0.1.0" });

  const store = new OpenSearchRecordStore(clientTransport(), resolveStoreConfig());
  const triageConfig = resolveTriageConfig();

  registerMemory(server, createRetrievalEngine(store));
  registerTriage(
    server,
    new TriageEngine({ store, stateStore: new FileTriageStateStore(triageConfig.statePath), config: triageConfig })
  );

  // Optional bootstrap; a failure is reported and the server keeps serving (search fails open per call).
  const flag = (process.env.LEDGER_BOOTSTRAP_OS || "").toLowerCase();
  if (flag === "1" || flag === "true") {
    try {
      await bootstrapOpenSearch();
    } catch (err) {
      console.error("bootstrapOpenSearch failed (continuing to serve MCP):", errorMessage(err));
    }
  }

  const { StdioServerTransport } = await import("@modelcontextprotocol/sdk/server/stdio.js");
  await server.connect(new StdioServerTransport());
}

main().catch((err: unknown) => {
  console.error("memory-ledger MCP server failed to start:", err);
  process.exit(1);
});
