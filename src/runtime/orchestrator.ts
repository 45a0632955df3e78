/**
 * Case orchestrator — the operations the trigger surfaces (MCP tools, CLI)
 * call. Wires the store, oracle, executors, engine and polling manager
 * together and owns their lifecycle.
 */

import type { DatabaseEngine } from "../database/engine.ts";
import { describeError } from "../database/errors.ts";
import { CaseStore, type CaseListResult } from "../store/case-store.ts";
import type {
  Case,
  DischargeSummary,
  InterventionRecord,
  LogEntry,
  Medication,
  NewCaseInput,
  StatusEntry,
} from "../types/case.ts";
import type { OrchestratorConfig } from "../types/config.ts";
import type { FinalState, WorkflowCheckpoint } from "../types/workflow.ts";
import { createExecutors } from "./action-executor.ts";
import { DecisionOracle, type OracleTransport } from "./oracle.ts";
import { PollingManager } from "./polling-manager.ts";
import type { Summarizer } from "./summarizer.ts";
import { DEFAULT_SEED_MESSAGE, WorkflowEngine } from "./workflow-engine.ts";

export interface OrchestratorOptions {
  db: DatabaseEngine;
  transport: OracleTransport;
  summarizer: Summarizer;
  config: OrchestratorConfig;
}

export interface CaseState {
  case: Case;
  status: StatusEntry["status"] | "UNKNOWN";
  statusHistory: StatusEntry[];
  logs: LogEntry[];
  interventions: InterventionRecord[];
  checkpoint: WorkflowCheckpoint | null;
  summary: DischargeSummary | null;
  medications: Medication[];
  pollingActive: boolean;
}

export interface DischargeSummaryView {
  caseId: string;
  patientId: string;
  doctorId: string;
  specialty: string;
  history: string[];
  diagnosis: string[];
  examFindings: string | null;
  medications: Medication[];
  followupInstructions: string | null;
  finalStatus: DischargeSummary["final_status"];
}

export interface Statistics {
  totalCases: number;
  pendingInterventions: number;
  activePolls: number;
  activePollCaseIds: string[];
}

export interface HealthReport {
  healthy: boolean;
  storage: "ok" | "unreachable";
  oracle: string;
  activePolls: number;
  error?: string;
}

export class CaseOrchestrator {
  readonly store: CaseStore;
  readonly engine: WorkflowEngine;
  readonly polling: PollingManager;
  private db: DatabaseEngine;
  private oracle: DecisionOracle;

  constructor(options: OrchestratorOptions) {
    this.db = options.db;
    this.store = new CaseStore(options.db);
    this.polling = new PollingManager(this.store, options.config);
    this.oracle = new DecisionOracle(options.transport);
    this.engine = new WorkflowEngine({
      store: this.store,
      oracle: this.oracle,
      executors: createExecutors({
        store: this.store,
        summarizer: options.summarizer,
        polling: this.polling,
      }),
      polling: this.polling,
      config: options.config,
    });

    this.polling.onResume((caseId, seed) => this.engine.resumeParked(caseId, seed));
  }

  async createCase(input: NewCaseInput): Promise<Case> {
    const created = await this.store.createCase(input);
    console.error(`[caseflow] Case ${created.case_id} created`);
    return created;
  }

  async run(caseId: string, seedMessage = DEFAULT_SEED_MESSAGE): Promise<FinalState> {
    return this.engine.run(caseId, seedMessage);
  }

  /**
   * Supply the missing transcript. The next poll tick (or `run`) picks it
   * up; this call does not resume the workflow itself.
   */
  async provideMissingInput(caseId: string, transcript: string): Promise<Case> {
    const { store } = this;
    return this.engine.withCaseLock(caseId, () => store.db.transaction(async (tx) => {
      const updated = await store.updateCase(caseId, { raw_transcript: transcript }, tx);
      await store.statuses.append(caseId, "TRANSCRIPT_PROVIDED", tx);
      await store.appendLog(
        caseId,
        `[INPUT] Transcript provided (${transcript.length} chars)`,
        "INPUT",
        tx,
      );
      return updated;
    }));
  }

  async getCaseState(caseId: string): Promise<CaseState> {
    const { store } = this;
    const found = await store.requireCase(caseId);
    const statusHistory = await store.statuses.history(caseId);

    return {
      case: found,
      status: statusHistory.at(-1)?.status ?? "UNKNOWN",
      statusHistory,
      logs: await store.getLogs(caseId),
      interventions: await store.listInterventions(caseId),
      checkpoint: await store.getCheckpoint(caseId),
      summary: await store.getSummary(caseId),
      medications: await store.getMedications(caseId),
      pollingActive: this.polling.isPolling(caseId),
    };
  }

  /** The case's discharge summary, or null before one was generated */
  async getDischargeSummary(caseId: string): Promise<DischargeSummaryView | null> {
    const found = await this.store.requireCase(caseId);
    const summary = await this.store.getSummary(caseId);
    if (!summary) return null;

    return {
      caseId: found.case_id,
      patientId: found.patient_id,
      doctorId: found.doctor_id,
      specialty: found.specialty,
      history: summary.history,
      diagnosis: summary.diagnosis,
      examFindings: summary.exam_findings,
      medications: await this.store.getMedications(caseId),
      followupInstructions: summary.followup_instructions,
      finalStatus: summary.final_status,
    };
  }

  async listCases(limit?: number, offset?: number): Promise<CaseListResult> {
    return this.store.listCases(limit, offset);
  }

  async stopPolling(caseId: string): Promise<boolean> {
    return this.engine.withCaseLock(caseId, async () => {
      await this.store.requireCase(caseId);
      return this.polling.stopPolling(caseId);
    });
  }

  /** Waits for a run in progress, so nothing writes to the case afterwards */
  async deleteCase(caseId: string): Promise<void> {
    await this.engine.withCaseLock(caseId, async () => {
      await this.store.requireCase(caseId);
      await this.polling.stopPolling(caseId);
      await this.store.deleteCase(caseId);
    });
    console.error(`[caseflow] Case ${caseId} deleted`);
  }

  async getStatistics(): Promise<Statistics> {
    const stats = await this.store.statistics();
    const activePollCaseIds = this.polling.activeCaseIds();
    return {
      ...stats,
      activePolls: activePollCaseIds.length,
      activePollCaseIds,
    };
  }

  async health(): Promise<HealthReport> {
    const report: HealthReport = {
      healthy: true,
      storage: "ok",
      oracle: this.oracle.transportName,
      activePolls: this.polling.activeCaseIds().length,
    };
    try {
      await this.store.listCases(1);
    } catch (err) {
      report.healthy = false;
      report.storage = "unreachable";
      report.error = describeError(err);
    }
    return report;
  }

  /** Re-arm poll loops persisted as active by an earlier process */
  async recover(): Promise<string[]> {
    const recovered = await this.polling.recoverLoops();
    if (recovered.length > 0) {
      console.error(`[caseflow] Resumed polling for ${recovered.length} case(s)`);
    }
    return recovered;
  }

  /** Stop all poll loops and flush storage */
  async shutdown(): Promise<void> {
    this.polling.shutdown();
    await this.db.shutdown();
  }
}
