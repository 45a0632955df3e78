/**
 * caseflow — resumable case-workflow orchestrator
 *
 * Library entry point, plus `startServer`, which loads the data folder's
 * config, initializes the database, wires the orchestrator and serves it
 * as an MCP server over stdio.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadServerConfig } from "./config/loader.ts";
import { DatabaseEngine } from "./database/engine.ts";
import { LLMClient } from "./llm/client.ts";
import { CaseOrchestrator } from "./runtime/orchestrator.ts";
import {
  LLMOracleTransport,
  RuleOracleTransport,
  type OracleTransport,
} from "./runtime/oracle.ts";
import { LLMSummarizer } from "./runtime/summarizer.ts";
import { registerCaseTools, CASE_TOOL_NAMES } from "./server/tools.ts";
import { registerResources } from "./server/resources.ts";

export const VERSION = "0.1.0";

export { CaseOrchestrator } from "./runtime/orchestrator.ts";
export { WorkflowEngine } from "./runtime/workflow-engine.ts";
export { PollingManager } from "./runtime/polling-manager.ts";
export {
  DecisionOracle,
  LLMOracleTransport,
  RuleOracleTransport,
  parseDecision,
  type OracleTransport,
} from "./runtime/oracle.ts";
export { LLMSummarizer, normalizeSummary, type Summarizer, type SummaryDraft } from "./runtime/summarizer.ts";
export { createExecutors, cleanTranscript } from "./runtime/action-executor.ts";
export * from "./runtime/errors.ts";
export { CaseStore } from "./store/case-store.ts";
export { StatusLog } from "./store/status-log.ts";
export { DatabaseEngine } from "./database/engine.ts";
export { PersistenceError } from "./database/errors.ts";
export { LLMClient } from "./llm/client.ts";
export { loadServerConfig, parseServerConfig } from "./config/loader.ts";
export type * from "./types/case.ts";
export type * from "./types/workflow.ts";
export type * from "./types/config.ts";

/** Start the MCP server for a data folder and keep it running */
export async function startServer(dataPath: string): Promise<void> {
  console.error(`[caseflow] Loading data folder: ${dataPath}`);

  // 1. Load server config
  const config = await loadServerConfig(dataPath);

  // 2. Initialize the database
  const db = new DatabaseEngine(dataPath);
  await db.init();
  console.error(
    `[caseflow] Database initialized with collections: ${db.getCollectionNames().join(", ")}`,
  );

  // 3. Pick the decision transport
  const llm = new LLMClient(config.llm);
  let transport: OracleTransport;
  if (llm.isConfigured()) {
    transport = new LLMOracleTransport(llm);
    console.error(`[caseflow] Routing decisions with ${config.llm.provider}/${llm.model}`);
  } else {
    transport = new RuleOracleTransport();
    console.error(
      "[caseflow] LLM API key not configured; routing with built-in rules. " +
      `Summaries cannot be generated until ${config.llm.apiKeyEnvVar} is set.`,
    );
  }

  // 4. Wire the orchestrator and pick up parked cases
  const orchestrator = new CaseOrchestrator({
    db,
    transport,
    summarizer: new LLMSummarizer(llm),
    config: config.orchestrator,
  });
  await orchestrator.recover();

  // 5. Create and configure the MCP server
  const server = new McpServer(
    { name: "caseflow", version: VERSION },
    { capabilities: { logging: {} } },
  );
  registerCaseTools(server, orchestrator);
  registerResources(server, orchestrator, config);
  console.error(`[caseflow] Registered ${CASE_TOOL_NAMES.length} tools`);

  // 6. Connect via stdio transport
  const stdio = new StdioServerTransport();
  await server.connect(stdio);
  console.error("[caseflow] MCP server running on stdio");

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    console.error("[caseflow] Shutting down...");
    await orchestrator.shutdown();
    await server.close();
    process.exit(0);
  };
  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      console.error("[caseflow] Shutdown failed:", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}
