/**
 * Workflow types — the action vocabulary of the state machine, the
 * persisted checkpoint, and what the engine hands back to its callers.
 */

import { z } from "zod";
import type { StatusLabel } from "./case.ts";

/** Every label the decision oracle may return */
export const ACTION_LABELS = [
  "wait_for_transcript",
  "resolve_intervention",
  "cleanup",
  "summarize",
  "validate",
  "notify",
  "error",
  "complete",
] as const;
export type ActionLabel = (typeof ACTION_LABELS)[number];

/** Labels bound to an action executor */
export const STEP_ACTIONS = [
  "resolve_intervention",
  "cleanup",
  "summarize",
  "validate",
  "notify",
] as const;
export type StepAction = (typeof STEP_ACTIONS)[number];

/** Labels that may be chosen again after they ran */
export const REENTRANT_ACTIONS: ReadonlySet<ActionLabel> = new Set<ActionLabel>([
  "complete",
  "error",
  "wait_for_transcript",
]);

export function isActionLabel(value: string): value is ActionLabel {
  return (ACTION_LABELS as readonly string[]).includes(value);
}

export function isStepAction(value: ActionLabel): value is StepAction {
  return (STEP_ACTIONS as readonly string[]).includes(value);
}

export const WORKFLOW_PHASES = [
  "deciding",
  "executing",
  "awaiting_intervention",
  "completed",
  "failed",
] as const;
export type WorkflowPhase = (typeof WORKFLOW_PHASES)[number];

export const TERMINAL_PHASES: ReadonlySet<WorkflowPhase> = new Set<WorkflowPhase>([
  "completed",
  "failed",
]);

export const DecisionSchema = z.object({
  action: z.enum(ACTION_LABELS),
  reasoning: z.string(),
});
export type Decision = z.infer<typeof DecisionSchema>;

/** Oracle output after validation */
export interface OracleDecision extends Decision {
  /** False when the raw output could not be turned into a known label */
  valid: boolean;
}

export const CheckpointSchema = z.object({
  _id: z.string(),
  case_id: z.string(),
  run_id: z.string(),
  run_number: z.number().int(),
  phase: z.enum(WORKFLOW_PHASES),
  current_action: z.enum(ACTION_LABELS).nullable(),
  messages: z.array(z.string()),
  completed_actions: z.array(z.enum(ACTION_LABELS)),
  last_decision: DecisionSchema.nullable(),
  step_count: z.number().int(),
  invocations: z.number().int(),
});
export type WorkflowCheckpoint = z.infer<typeof CheckpointSchema>;

/** Checkpoint fields the engine writes (the store owns `_id`) */
export type CheckpointState = Omit<WorkflowCheckpoint, "_id">;

/** Facts about a case the oracle reasons over */
export interface CaseFacts {
  hasRawTranscript: boolean;
  rawTranscriptLength: number;
  hasCleanedTranscript: boolean;
  hasSummary: boolean;
  historyItems: number;
  diagnosisItems: number;
  hasExamFindings: boolean;
  medicationCount: number;
  hasFollowup: boolean;
  summaryStatus: string | null;
  doctorNotified: boolean;
  pendingInterventions: number;
}

/** Snapshot passed to the decision oracle */
export interface DecisionContext {
  caseId: string;
  currentStatus: StatusLabel | "UNKNOWN";
  facts: CaseFacts;
  completedActions: ActionLabel[];
  /** Bounded window of the most recent trace messages */
  recentMessages: string[];
}

export type RunOutcome = "completed" | "failed" | "awaiting_intervention";

/** What `run` returns to the trigger surface */
export interface FinalState {
  caseId: string;
  runId: string;
  outcome: RunOutcome;
  status: StatusLabel | "UNKNOWN";
  messages: string[];
  completedActions: ActionLabel[];
  lastDecision: Decision | null;
  /** Decisions made during this invocation */
  steps: number;
  waitingForInput: boolean;
  pollingActive: boolean;
  missingFields: string[];
  diagnostic?: string;
}
