/**
 * Case tools — the MCP tools that drive and inspect consultation cases.
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { CaseOrchestrator } from "../runtime/orchestrator.ts";
import { errorCode } from "../runtime/errors.ts";
import { describeError } from "../database/errors.ts";

/** Names of every tool registered by `registerCaseTools` */
export const CASE_TOOL_NAMES = [
  "create_case",
  "run_workflow",
  "provide_missing_input",
  "get_case_state",
  "get_discharge_summary",
  "list_cases",
  "stop_polling",
  "delete_case",
  "get_statistics",
  "health_check",
] as const;

const caseIdShape = {
  case_id: z.string().min(1).describe("Case identifier"),
};

/** Register all case tools on the MCP server */
export function registerCaseTools(server: McpServer, orchestrator: CaseOrchestrator): void {
  registerCreateCase(server, orchestrator);
  registerRunWorkflow(server, orchestrator);
  registerProvideMissingInput(server, orchestrator);
  registerGetCaseState(server, orchestrator);
  registerGetDischargeSummary(server, orchestrator);
  registerListCases(server, orchestrator);
  registerStopPolling(server, orchestrator);
  registerDeleteCase(server, orchestrator);
  registerGetStatistics(server, orchestrator);
  registerHealthCheck(server, orchestrator);
}

/** create_case — open a new consultation case */
function registerCreateCase(server: McpServer, orchestrator: CaseOrchestrator): void {
  server.registerTool("create_case", {
    title: "Create Case",
    description:
      "Open a consultation case. The transcript is optional; without one the workflow will wait for it.",
    inputSchema: {
      ...caseIdShape,
      patient_id: z.string().min(1).describe("Patient identifier"),
      doctor_id: z.string().min(1).describe("Treating doctor identifier"),
      specialty: z.string().optional().describe("Clinical specialty (default: General)"),
      raw_transcript: z.string().optional().describe("Raw consultation transcript"),
    },
  }, async (args): Promise<CallToolResult> => {
    try {
      const created = await orchestrator.createCase({
        caseId: args.case_id,
        patientId: args.patient_id,
        doctorId: args.doctor_id,
        specialty: args.specialty,
        rawTranscript: args.raw_transcript,
      });
      return ok(created);
    } catch (e) {
      return err(e);
    }
  });
}

/** run_workflow — drive a case until it completes, fails or waits */
function registerRunWorkflow(server: McpServer, orchestrator: CaseOrchestrator): void {
  server.registerTool("run_workflow", {
    title: "Run Workflow",
    description:
      "Run the discharge-summary workflow for a case. Returns the final state with the full trace.",
    inputSchema: {
      ...caseIdShape,
      seed_message: z.string().optional().describe("First trace line for this run"),
    },
  }, async (args): Promise<CallToolResult> => {
    try {
      return ok(await orchestrator.run(args.case_id, args.seed_message));
    } catch (e) {
      return err(e);
    }
  });
}

/** provide_missing_input — supply the transcript a parked case is waiting for */
function registerProvideMissingInput(server: McpServer, orchestrator: CaseOrchestrator): void {
  server.registerTool("provide_missing_input", {
    title: "Provide Missing Input",
    description:
      "Set the raw transcript of a case. A waiting case resumes on its next poll.",
    inputSchema: {
      ...caseIdShape,
      transcript: z.string().min(1).describe("Raw consultation transcript"),
    },
  }, async (args): Promise<CallToolResult> => {
    try {
      const updated = await orchestrator.provideMissingInput(args.case_id, args.transcript);
      return ok({
        case_id: updated.case_id,
        transcript_length: args.transcript.length,
        message: "Transcript stored; the workflow resumes on its next poll",
      });
    } catch (e) {
      return err(e);
    }
  });
}

/** get_case_state — everything known about a case */
function registerGetCaseState(server: McpServer, orchestrator: CaseOrchestrator): void {
  server.registerTool("get_case_state", {
    title: "Get Case State",
    description:
      "Case record, status history, workflow logs, interventions, checkpoint, summary and polling state.",
    inputSchema: caseIdShape,
  }, async (args): Promise<CallToolResult> => {
    try {
      return ok(await orchestrator.getCaseState(args.case_id));
    } catch (e) {
      return err(e);
    }
  });
}

/** get_discharge_summary — the generated summary only */
function registerGetDischargeSummary(server: McpServer, orchestrator: CaseOrchestrator): void {
  server.registerTool("get_discharge_summary", {
    title: "Get Discharge Summary",
    description: "The discharge summary and medications of a case.",
    inputSchema: caseIdShape,
  }, async (args): Promise<CallToolResult> => {
    try {
      const summary = await orchestrator.getDischargeSummary(args.case_id);
      if (!summary) {
        return err(new Error(`Case "${args.case_id}" has no discharge summary yet`), "summary_not_found");
      }
      return ok(summary);
    } catch (e) {
      return err(e);
    }
  });
}

/** list_cases — newest cases first */
function registerListCases(server: McpServer, orchestrator: CaseOrchestrator): void {
  server.registerTool("list_cases", {
    title: "List Cases",
    description: "List cases, newest first, with pagination.",
    inputSchema: {
      limit: z.number().int().min(1).max(100).optional(),
      offset: z.number().int().min(0).optional(),
    },
  }, async (args): Promise<CallToolResult> => {
    try {
      return ok(await orchestrator.listCases(args.limit, args.offset));
    } catch (e) {
      return err(e);
    }
  });
}

/** stop_polling — cancel a case's poll loop */
function registerStopPolling(server: McpServer, orchestrator: CaseOrchestrator): void {
  server.registerTool("stop_polling", {
    title: "Stop Polling",
    description: "Stop polling a case for missing input. Safe to call repeatedly.",
    inputSchema: caseIdShape,
  }, async (args): Promise<CallToolResult> => {
    try {
      const wasActive = await orchestrator.stopPolling(args.case_id);
      return ok({ case_id: args.case_id, stopped: true, was_active: wasActive });
    } catch (e) {
      return err(e);
    }
  });
}

/** delete_case — remove a case and its derived records */
function registerDeleteCase(server: McpServer, orchestrator: CaseOrchestrator): void {
  server.registerTool("delete_case", {
    title: "Delete Case",
    description:
      "Delete a case with its summary, medications and checkpoint. Status history and logs are kept.",
    inputSchema: caseIdShape,
  }, async (args): Promise<CallToolResult> => {
    try {
      await orchestrator.deleteCase(args.case_id);
      return ok({ deleted: true, case_id: args.case_id });
    } catch (e) {
      return err(e);
    }
  });
}

/** get_statistics — counts across all cases */
function registerGetStatistics(server: McpServer, orchestrator: CaseOrchestrator): void {
  server.registerTool("get_statistics", {
    title: "Get Statistics",
    description: "Total cases, pending interventions and active poll loops.",
  }, async (): Promise<CallToolResult> => {
    try {
      return ok(await orchestrator.getStatistics());
    } catch (e) {
      return err(e);
    }
  });
}

/** health_check — storage reachability */
function registerHealthCheck(server: McpServer, orchestrator: CaseOrchestrator): void {
  server.registerTool("health_check", {
    title: "Health Check",
    description: "Report whether storage is reachable and which decision transport is active.",
  }, async (): Promise<CallToolResult> => {
    const report = await orchestrator.health();
    return report.healthy ? ok(report) : { ...ok(report), isError: true };
  });
}

// --- Helpers ---

function ok(data: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

function err(e: unknown, code = errorCode(e)): CallToolResult {
  if (code === "internal_error" || code === "persistence_error") {
    console.error(`[caseflow] Tool failed: ${describeError(e)}`);
  }
  return {
    content: [{ type: "text", text: JSON.stringify({ error: { code, message: describeError(e) } }) }],
    isError: true,
  };
}
