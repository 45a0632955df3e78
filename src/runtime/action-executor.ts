/**
 * Action executors — the fixed set of units of work the engine routes to.
 *
 * Each executor checks its own input first and throws PreconditionError
 * without writing anything when it is absent. Otherwise it commits its
 * derived fields, one status entry and one STEP log entry in a single
 * transaction. Running an executor twice leaves derived state unchanged.
 */

import { createHash } from "node:crypto";
import type { CaseStore } from "../store/case-store.ts";
import type { DataAccess } from "../database/transaction.ts";
import type { StatusLabel } from "../types/case.ts";
import type { StepAction } from "../types/workflow.ts";
import type { Summarizer } from "./summarizer.ts";
import { PreconditionError } from "./errors.ts";

export interface ExecutorResult {
  status: StatusLabel;
  /** Trace line describing what happened */
  message: string;
}

export interface ActionExecutor {
  readonly action: StepAction | "error";
  execute(caseId: string, note?: string): Promise<ExecutorResult>;
}

export type ExecutorRegistry = Record<StepAction | "error", ActionExecutor>;

/** Lets an executor stop a case's in-memory poll loop */
export interface PollingControl {
  cancel(caseId: string): void;
}

export interface ExecutorDeps {
  store: CaseStore;
  summarizer: Summarizer;
  polling: PollingControl;
}

const VALIDATION_CHECKS = [
  "history",
  "diagnosis",
  "exam_findings",
  "medications",
  "followup_instructions",
] as const;

/** Build one executor per step label, plus error handling */
export function createExecutors(deps: ExecutorDeps): ExecutorRegistry {
  return {
    resolve_intervention: executor("resolve_intervention", (caseId) => resolveIntervention(deps, caseId)),
    cleanup: executor("cleanup", (caseId) => cleanup(deps, caseId)),
    summarize: executor("summarize", (caseId) => summarize(deps, caseId)),
    validate: executor("validate", (caseId) => validate(deps, caseId)),
    notify: executor("notify", (caseId) => notify(deps, caseId)),
    error: executor("error", (caseId, note) => handleError(deps, caseId, note)),
  };
}

/**
 * Normalise a raw transcript: unify line endings, collapse runs of spaces
 * and blank lines, trim every line.
 */
export function cleanTranscript(raw: string): string {
  return raw
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/[ \t]+/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function transcriptHash(transcript: string): string {
  return createHash("sha256").update(transcript).digest("hex");
}

// --- Executors ---

async function resolveIntervention(deps: ExecutorDeps, caseId: string): Promise<ExecutorResult> {
  const { store } = deps;
  await store.requireCase(caseId);

  const result = await commitStep(deps, caseId, "INTERVENTION_RESOLVED", async (tx) => {
    const pending = await store.getPendingIntervention(caseId, tx);
    if (!pending) return "[RESOLVE] No pending intervention; nothing to resolve";

    await store.updateIntervention(pending._id, {
      status: "RESOLVED",
      polling_active: false,
      resolved_at: new Date().toISOString(),
      resolution: "input received",
    }, tx);
    return `[RESOLVE] Intervention ${pending.intervention_type} resolved`;
  });

  deps.polling.cancel(caseId);
  return result;
}

async function cleanup(deps: ExecutorDeps, caseId: string): Promise<ExecutorResult> {
  const { store } = deps;
  const found = await store.requireCase(caseId);
  const raw = found.raw_transcript;
  if (!raw || !raw.trim()) {
    throw new PreconditionError("cleanup", "raw transcript is empty");
  }

  const cleaned = cleanTranscript(raw);
  return commitStep(deps, caseId, "CLEANED", async (tx) => {
    if (found.cleaned_transcript === cleaned) {
      return `[CLEANUP] Transcript already clean (${cleaned.length} chars)`;
    }
    await store.updateCase(caseId, { cleaned_transcript: cleaned }, tx);
    return `[CLEANUP] Transcript cleaned (${raw.length} → ${cleaned.length} chars)`;
  });
}

async function summarize(deps: ExecutorDeps, caseId: string): Promise<ExecutorResult> {
  const { store } = deps;
  const found = await store.requireCase(caseId);
  const transcript = found.cleaned_transcript;
  if (!transcript || !transcript.trim()) {
    throw new PreconditionError("summarize", "cleaned transcript is empty");
  }

  const hash = transcriptHash(transcript);
  const existing = await store.getSummary(caseId);
  if (existing?.source_hash === hash) {
    return commitStep(deps, caseId, "SUMMARY_GENERATED", async () =>
      "[SUMMARIZE] Summary already matches the cleaned transcript");
  }

  // Summarizer runs outside the transaction; only its result is committed
  const draft = await deps.summarizer.summarize(transcript);

  return commitStep(deps, caseId, "SUMMARY_GENERATED", async (tx) => {
    await store.upsertSummary(caseId, {
      history: draft.history,
      diagnosis: draft.diagnosis,
      exam_findings: draft.examFindings,
      followup_instructions: draft.followupInstructions,
      final_status: "SUMMARY_GENERATED",
      source_hash: hash,
    }, tx);
    await store.replaceMedications(caseId, draft.medications, tx);
    return `[SUMMARIZE] Summary generated: ${draft.history.length} history items, ` +
      `${draft.diagnosis.length} diagnoses, ${draft.medications.length} medications`;
  });
}

async function validate(deps: ExecutorDeps, caseId: string): Promise<ExecutorResult> {
  const { store } = deps;
  await store.requireCase(caseId);
  const summary = await store.getSummary(caseId);
  if (!summary) {
    throw new PreconditionError("validate", "no discharge summary exists");
  }
  const medications = await store.getMedications(caseId);

  const present: Record<(typeof VALIDATION_CHECKS)[number], boolean> = {
    history: summary.history.length > 0,
    diagnosis: summary.diagnosis.length > 0,
    exam_findings: !!summary.exam_findings?.trim(),
    medications: medications.length > 0,
    followup_instructions: !!summary.followup_instructions?.trim(),
  };
  const missing = VALIDATION_CHECKS.filter((check) => !present[check]);
  const status = missing.length === 0 ? "VALIDATED" : "VALIDATION_FAILED";

  return commitStep(deps, caseId, status, async (tx) => {
    await store.upsertSummary(caseId, { final_status: status }, tx);
    return missing.length === 0
      ? "[VALIDATE] All required fields are present"
      : `[VALIDATE] Missing fields: ${missing.join(", ")}`;
  });
}

async function notify(deps: ExecutorDeps, caseId: string): Promise<ExecutorResult> {
  const { store } = deps;
  const found = await store.requireCase(caseId);
  const summary = await store.getSummary(caseId);
  if (summary?.final_status !== "VALIDATED") {
    throw new PreconditionError("notify", "discharge summary is not validated");
  }

  return commitStep(deps, caseId, "NOTIFIED_DOCTOR", async () =>
    `[NOTIFY] Doctor ${found.doctor_id} notified: discharge summary ready for review`);
}

async function handleError(deps: ExecutorDeps, caseId: string, note?: string): Promise<ExecutorResult> {
  const reason = note?.trim() || "unspecified error";
  console.error(`[executor] Escalating error for ${caseId}: ${reason}`);
  return commitStep(deps, caseId, "ERROR_HANDLED", async () =>
    `[ERROR] Handling error: ${reason}`, "ERROR");
}

// --- Helpers ---

function executor(
  action: StepAction | "error",
  run: (caseId: string, note?: string) => Promise<ExecutorResult>,
): ActionExecutor {
  return { action, execute: run };
}

/**
 * Commit an executor's writes with its status and log entry. `body`
 * stages the derived-field writes and returns the trace message.
 */
async function commitStep(
  deps: ExecutorDeps,
  caseId: string,
  status: StatusLabel,
  body: (tx: DataAccess) => Promise<string>,
  logType: "STEP" | "ERROR" = "STEP",
): Promise<ExecutorResult> {
  const { store } = deps;
  const message = await store.db.transaction(async (tx) => {
    const text = await body(tx);
    await store.statuses.append(caseId, status, tx);
    await store.appendLog(caseId, text, logType, tx);
    return text;
  });
  return { status, message };
}
