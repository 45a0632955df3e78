/**
 * MCP Resources — read-only context for a connecting client: the workflow
 * vocabulary, the active settings, and live statistics.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ReadResourceResult } from "@modelcontextprotocol/sdk/types.js";
import type { CaseOrchestrator } from "../runtime/orchestrator.ts";
import type { ServerConfig } from "../types/config.ts";
import { ACTION_LABELS, REENTRANT_ACTIONS, WORKFLOW_PHASES } from "../types/workflow.ts";
import { STATUS_LABELS } from "../types/case.ts";
import { CASE_TOOL_NAMES } from "./tools.ts";

/** Register MCP resources describing the orchestrator */
export function registerResources(
  server: McpServer,
  orchestrator: CaseOrchestrator,
  config: ServerConfig,
): void {
  // 1. Overview — the first thing a client reads
  server.registerResource(
    "overview",
    "caseflow://overview",
    {
      title: "Case Workflow Overview",
      description:
        "How cases move through the workflow, the action and status vocabulary, and the available tools. Read this first.",
      mimeType: "application/json",
    },
    async (uri): Promise<ReadResourceResult> => {
      const info = {
        gettingStarted: [
          "Call 'create_case' to open a case, then 'run_workflow' to drive it.",
          "A case without a transcript waits; 'provide_missing_input' supplies it and the next poll resumes the run.",
          "Use 'get_case_state' for the full trace, status history and interventions.",
        ],
        actions: ACTION_LABELS,
        reentrantActions: Array.from(REENTRANT_ACTIONS),
        phases: WORKFLOW_PHASES,
        statuses: STATUS_LABELS,
        tools: CASE_TOOL_NAMES,
        settings: {
          provider: config.llm.provider,
          model: config.llm.model,
          ...config.orchestrator,
        },
      };
      return json(uri.href, info);
    },
  );

  // 2. Live statistics
  server.registerResource(
    "statistics",
    "caseflow://statistics",
    {
      title: "Case Statistics",
      description: "Total cases, pending interventions and active poll loops.",
      mimeType: "application/json",
    },
    async (uri): Promise<ReadResourceResult> => json(uri.href, await orchestrator.getStatistics()),
  );
}

function json(uri: string, data: unknown): ReadResourceResult {
  return {
    contents: [
      {
        uri,
        mimeType: "application/json",
        text: JSON.stringify(data, null, 2),
      },
    ],
  };
}
