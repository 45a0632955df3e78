/**
 * Workflow engine — drives one case through decide → act → decide until
 * it completes, fails, or parks waiting for human input.
 *
 * The checkpoint is saved after every decision and around every step, so
 * a crashed or parked run picks up with its completed-action set intact.
 * Runs for the same case are serialised by a per-case lock.
 */

import { randomUUID } from "node:crypto";
import type { CaseStore } from "../store/case-store.ts";
import type { StatusLabel } from "../types/case.ts";
import type { OrchestratorConfig } from "../types/config.ts";
import {
  REENTRANT_ACTIONS,
  TERMINAL_PHASES,
  isStepAction,
  type CaseFacts,
  type CheckpointState,
  type DecisionContext,
  type FinalState,
  type OracleDecision,
  type RunOutcome,
  type WorkflowPhase,
} from "../types/workflow.ts";
import type { DecisionOracle } from "./oracle.ts";
import type { ExecutorRegistry } from "./action-executor.ts";
import type { PollingManager } from "./polling-manager.ts";
import { KeyedLock } from "../database/lock.ts";
import { PersistenceError, describeError } from "../database/errors.ts";
import { LoopGuardTripped } from "./errors.ts";

export const DEFAULT_SEED_MESSAGE = "[TRIGGER] Workflow started";
const RECENT_MESSAGE_WINDOW = 10;

export interface WorkflowEngineDeps {
  store: CaseStore;
  oracle: DecisionOracle;
  executors: ExecutorRegistry;
  polling: PollingManager;
  config: OrchestratorConfig;
}

/** Mutable bookkeeping for one invocation of `run` */
interface Invocation {
  checkpoint: CheckpointState;
  steps: number;
  consecutiveErrors: number;
}

export class WorkflowEngine {
  private deps: WorkflowEngineDeps;
  private caseLocks = new KeyedLock("case");

  constructor(deps: WorkflowEngineDeps) {
    this.deps = deps;
  }

  /**
   * Drive the case until it reaches a terminal or soft-terminal state.
   * Loop-guard trips end in a `failed` state rather than an exception;
   * storage failures propagate.
   */
  async run(caseId: string, seedMessage = DEFAULT_SEED_MESSAGE): Promise<FinalState> {
    return this.withCaseLock(caseId, () => this.runLocked(caseId, seedMessage));
  }

  /**
   * Resume a case parked on an intervention, if it still is. A case that
   * is not parked only has a satisfied intervention resolved. Returns null
   * when nothing was run.
   */
  async resumeParked(caseId: string, seedMessage: string): Promise<FinalState | null> {
    return this.withCaseLock(caseId, async () => {
      const { store, polling } = this.deps;
      const checkpoint = await store.getCheckpoint(caseId);
      if (checkpoint?.phase === "awaiting_intervention") {
        return this.runLocked(caseId, seedMessage);
      }
      await polling.resolveIfSatisfied(caseId);
      return null;
    });
  }

  /** Run `fn` as the case's only writer, after any run in progress */
  async withCaseLock<T>(caseId: string, fn: () => Promise<T>): Promise<T> {
    return this.caseLocks.withLock(caseId, randomUUID(), fn, this.deps.config.caseLockTimeoutMs);
  }

  /** Whether a run currently holds the case */
  isRunning(caseId: string): boolean {
    return this.caseLocks.isLocked(caseId);
  }

  private async runLocked(caseId: string, seedMessage: string): Promise<FinalState> {
    const { store, polling } = this.deps;
    await store.requireCase(caseId);

    const checkpoint = await this.loadOrStart(caseId);
    if (checkpoint.phase === "awaiting_intervention" && await polling.resolveIfSatisfied(caseId)) {
      checkpoint.messages.push("[POLLING] Missing input found; intervention resolved");
    }

    checkpoint.messages.push(seedMessage);
    checkpoint.phase = "deciding";
    checkpoint.invocations += 1;
    checkpoint.step_count = 0;
    await store.saveCheckpoint(checkpoint);
    console.error(`[engine] Run ${checkpoint.run_number} of ${caseId}: ${seedMessage}`);

    const invocation: Invocation = { checkpoint, steps: 0, consecutiveErrors: 0 };
    try {
      return await this.loop(invocation);
    } catch (err) {
      if (err instanceof LoopGuardTripped) return this.trip(invocation, err);
      throw err;
    }
  }

  private async loop(inv: Invocation): Promise<FinalState> {
    const { config, oracle, executors } = this.deps;
    const cp = inv.checkpoint;

    while (true) {
      if (inv.steps >= config.maxSteps) {
        throw new LoopGuardTripped(`step ceiling of ${config.maxSteps} decisions reached`);
      }

      const proposed = await oracle.decide(await this.buildContext(cp));
      inv.steps += 1;
      cp.step_count = inv.steps;

      const decision = this.applyRepeatGuard(cp, proposed);
      if (decision.action === "error") {
        inv.consecutiveErrors += 1;
        if (inv.consecutiveErrors > config.maxConsecutiveErrors) {
          throw new LoopGuardTripped(
            `"error" chosen ${inv.consecutiveErrors} times in a row (limit ${config.maxConsecutiveErrors})`,
          );
        }
      } else {
        inv.consecutiveErrors = 0;
      }

      await this.recordDecision(cp, decision);

      const action = decision.action;
      if (action === "complete") return this.complete(inv);
      if (action === "wait_for_transcript") return this.park(inv);
      if (action === "error") {
        await this.handleError(cp, decision.reasoning);
        continue;
      }
      if (!isStepAction(action)) continue;

      cp.phase = "executing";
      await this.deps.store.saveCheckpoint(cp);
      try {
        const result = await executors[action].execute(cp.case_id);
        cp.messages.push(result.message);
        if (!cp.completed_actions.includes(action)) cp.completed_actions.push(action);
        cp.phase = "deciding";
        await this.deps.store.saveCheckpoint(cp);
      } catch (err) {
        if (err instanceof PersistenceError) throw err;
        const reason = `${action} failed: ${describeError(err)}`;
        console.error(`[engine] ${cp.case_id}: ${reason}`);
        cp.messages.push(`[${action.toUpperCase()}] Failed: ${describeError(err)}`);
        cp.phase = "deciding";
        await this.handleError(cp, reason);
      }
    }
  }

  /**
   * A completed, non-re-entrant label is rewritten according to the repeat
   * policy. Under `fail` the run ends.
   */
  private applyRepeatGuard(cp: CheckpointState, decision: OracleDecision): OracleDecision {
    const { action } = decision;
    if (REENTRANT_ACTIONS.has(action) || !cp.completed_actions.includes(action)) {
      return decision;
    }

    const policy = this.deps.config.repeatPolicy;
    cp.messages.push(`[ORCHESTRATOR] "${action}" already completed (repeat policy: ${policy})`);
    switch (policy) {
      case "force_complete":
        return { action: "complete", reasoning: `"${action}" already completed; finishing`, valid: decision.valid };
      case "route_to_error":
        return { action: "error", reasoning: `Oracle repeated completed action "${action}"`, valid: decision.valid };
      case "fail":
        throw new LoopGuardTripped(`oracle repeated completed action "${action}"`);
    }
  }

  private async recordDecision(cp: CheckpointState, decision: OracleDecision): Promise<void> {
    const { store } = this.deps;
    const line = `[ORCHESTRATOR] Next: ${decision.action} | ${decision.reasoning}`;
    cp.last_decision = { action: decision.action, reasoning: decision.reasoning };
    cp.current_action = decision.action;
    cp.messages.push(line);

    await store.db.transaction(async (tx) => {
      await store.saveCheckpoint(cp, tx);
      await store.appendLog(cp.case_id, line, "DECISION", tx);
    });
  }

  private async handleError(cp: CheckpointState, reason: string): Promise<void> {
    const result = await this.deps.executors.error.execute(cp.case_id, reason);
    cp.messages.push(result.message);
    await this.deps.store.saveCheckpoint(cp);
  }

  private async complete(inv: Invocation): Promise<FinalState> {
    const { polling } = this.deps;
    const cp = inv.checkpoint;
    if (polling.isPolling(cp.case_id)) await polling.stopPolling(cp.case_id);

    cp.messages.push("[ORCHESTRATOR] Workflow complete");
    await this.settle(cp, "completed", "COMPLETED", "[ORCHESTRATOR] Workflow complete", "INFO");
    return this.finalState(inv, "completed");
  }

  private async park(inv: Invocation): Promise<FinalState> {
    const { polling, config } = this.deps;
    const cp = inv.checkpoint;

    await polling.raiseIntervention(
      cp.case_id,
      "MISSING_TRANSCRIPT",
      `Raw transcript missing or shorter than ${config.minTranscriptLength} characters`,
      ["raw_transcript"],
    );

    const line = `[WAIT] Waiting for transcript; polling every ${config.pollIntervalMs}ms`;
    cp.messages.push(line);
    await this.settle(cp, "awaiting_intervention", "AWAITING_INPUT", line, "INTERVENTION");
    return this.finalState(inv, "awaiting_intervention");
  }

  private async trip(inv: Invocation, err: LoopGuardTripped): Promise<FinalState> {
    const cp = inv.checkpoint;
    const line = `[ORCHESTRATOR] ${err.message}`;
    console.error(`[engine] ${cp.case_id}: ${err.message}`);

    cp.messages.push(line);
    await this.settle(cp, "failed", "FAILED", line, "ERROR");
    return this.finalState(inv, "failed", err.reason);
  }

  /** Write the phase change, its status entry and its log line together */
  private async settle(
    cp: CheckpointState,
    phase: WorkflowPhase,
    status: StatusLabel,
    line: string,
    logType: "INFO" | "INTERVENTION" | "ERROR",
  ): Promise<void> {
    const { store } = this.deps;
    cp.phase = phase;
    cp.current_action = null;
    await store.db.transaction(async (tx) => {
      await store.saveCheckpoint(cp, tx);
      await store.statuses.append(cp.case_id, status, tx);
      await store.appendLog(cp.case_id, line, logType, tx);
    });
  }

  /** Resume a live checkpoint, or start a new run after a terminal one */
  private async loadOrStart(caseId: string): Promise<CheckpointState> {
    const existing = await this.deps.store.getCheckpoint(caseId);
    if (existing && !TERMINAL_PHASES.has(existing.phase)) {
      const { _id, ...state } = existing;
      return state;
    }

    return {
      case_id: caseId,
      run_id: randomUUID(),
      run_number: (existing?.run_number ?? 0) + 1,
      phase: "deciding",
      current_action: null,
      messages: [],
      completed_actions: [],
      last_decision: null,
      step_count: 0,
      invocations: existing?.invocations ?? 0,
    };
  }

  private async buildContext(cp: CheckpointState): Promise<DecisionContext> {
    const { store, config } = this.deps;
    const caseId = cp.case_id;

    const found = await store.requireCase(caseId);
    const summary = await store.getSummary(caseId);
    const medications = await store.getMedications(caseId);
    const pending = await store.getPendingIntervention(caseId);
    const history = await store.statuses.history(caseId);
    const labels = history.map((entry) => entry.status);

    const facts: CaseFacts = {
      hasRawTranscript: (found.raw_transcript?.trim().length ?? 0) >= config.minTranscriptLength,
      rawTranscriptLength: found.raw_transcript?.length ?? 0,
      hasCleanedTranscript: !!found.cleaned_transcript?.trim(),
      hasSummary: summary !== null,
      historyItems: summary?.history.length ?? 0,
      diagnosisItems: summary?.diagnosis.length ?? 0,
      hasExamFindings: !!summary?.exam_findings?.trim(),
      medicationCount: medications.length,
      hasFollowup: !!summary?.followup_instructions?.trim(),
      summaryStatus: summary?.final_status ?? null,
      doctorNotified: labels.lastIndexOf("NOTIFIED_DOCTOR") > labels.lastIndexOf("VALIDATED"),
      pendingInterventions: pending ? 1 : 0,
    };

    return {
      caseId,
      currentStatus: labels.at(-1) ?? "UNKNOWN",
      facts,
      completedActions: [...cp.completed_actions],
      recentMessages: cp.messages.slice(-RECENT_MESSAGE_WINDOW),
    };
  }

  private async finalState(
    inv: Invocation,
    outcome: RunOutcome,
    diagnostic?: string,
  ): Promise<FinalState> {
    const { store, polling } = this.deps;
    const cp = inv.checkpoint;
    const pending = await store.getPendingIntervention(cp.case_id);

    const state: FinalState = {
      caseId: cp.case_id,
      runId: cp.run_id,
      outcome,
      status: await store.statuses.current(cp.case_id),
      messages: [...cp.messages],
      completedActions: [...cp.completed_actions],
      lastDecision: cp.last_decision,
      steps: inv.steps,
      waitingForInput: outcome === "awaiting_intervention",
      pollingActive: polling.isPolling(cp.case_id),
      missingFields: pending?.missing_fields ?? [],
    };
    if (diagnostic) state.diagnostic = diagnostic;
    return state;
  }
}
