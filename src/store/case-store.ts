/**
 * Case Store — typed access to consultation cases and everything hanging
 * off them: discharge summaries, medications, workflow logs, intervention
 * records and the engine checkpoint.
 *
 * Every write takes an optional `access`; pass a transaction to make the
 * write part of a larger commit.
 */

import type { z } from "zod";
import type { DatabaseEngine } from "../database/engine.ts";
import type { DataAccess } from "../database/transaction.ts";
import { COLLECTIONS } from "../database/collections.ts";
import { PersistenceError } from "../database/errors.ts";
import type { PaginationMeta, StoredRecord } from "../types/database.ts";
import {
  CaseSchema,
  DischargeSummarySchema,
  InterventionRecordSchema,
  LogEntrySchema,
  StoredMedicationSchema,
  type Case,
  type DischargeSummary,
  type InterventionKind,
  type InterventionRecord,
  type LogEntry,
  type LogType,
  type Medication,
  type NewCaseInput,
} from "../types/case.ts";
import {
  CheckpointSchema,
  type CheckpointState,
  type WorkflowCheckpoint,
} from "../types/workflow.ts";
import { CaseNotFoundError, DuplicateCaseError } from "../runtime/errors.ts";
import { SequenceCounter, StatusLog } from "./status-log.ts";

type SummaryFields = Partial<
  Pick<
    DischargeSummary,
    "history" | "diagnosis" | "exam_findings" | "followup_instructions" | "final_status" | "source_hash"
  >
>;

type CaseFields = Partial<
  Pick<Case, "patient_id" | "doctor_id" | "specialty" | "raw_transcript" | "cleaned_transcript">
>;

type InterventionFields = Partial<
  Pick<
    InterventionRecord,
    "reason" | "missing_fields" | "status" | "polling_active" | "resolved_at" | "resolution"
  >
>;

export interface CaseListResult {
  cases: Case[];
  pagination: PaginationMeta;
}

export interface StoreStatistics {
  totalCases: number;
  pendingInterventions: number;
}

export class CaseStore {
  readonly db: DatabaseEngine;
  readonly statuses: StatusLog;
  private logSequence: SequenceCounter;

  constructor(db: DatabaseEngine) {
    this.db = db;
    this.statuses = new StatusLog(db);
    this.logSequence = new SequenceCounter(db, COLLECTIONS.logs);
  }

  // --- Cases ---

  /** Open a case with a CREATED status and an INFO log entry */
  async createCase(input: NewCaseInput): Promise<Case> {
    return this.db.transaction(async (tx) => {
      if (await this.getCase(input.caseId, tx)) {
        throw new DuplicateCaseError(input.caseId);
      }

      const rawTranscript = input.rawTranscript?.trim() ? input.rawTranscript : null;
      const record = await tx.create(COLLECTIONS.cases, {
        case_id: input.caseId,
        patient_id: input.patientId,
        doctor_id: input.doctorId,
        specialty: input.specialty?.trim() || "General",
        raw_transcript: rawTranscript,
      });

      await this.statuses.append(input.caseId, "CREATED", tx);
      await this.appendLog(
        input.caseId,
        `Case created for patient ${input.patientId}${rawTranscript ? " with transcript" : ""}`,
        "INFO",
        tx,
      );
      return parse(CaseSchema, record, COLLECTIONS.cases);
    });
  }

  async getCase(caseId: string, access: DataAccess = this.db): Promise<Case | null> {
    const record = await access.findOne(COLLECTIONS.cases, { case_id: caseId });
    return record ? parse(CaseSchema, record, COLLECTIONS.cases) : null;
  }

  /** Like `getCase`, but a missing case is an error */
  async requireCase(caseId: string, access: DataAccess = this.db): Promise<Case> {
    const found = await this.getCase(caseId, access);
    if (!found) throw new CaseNotFoundError(caseId);
    return found;
  }

  async updateCase(caseId: string, fields: CaseFields, access: DataAccess = this.db): Promise<Case> {
    const existing = await this.requireCase(caseId, access);
    const updated = await access.update(COLLECTIONS.cases, existing._id, fields);
    if (!updated) throw new CaseNotFoundError(caseId);
    return parse(CaseSchema, updated, COLLECTIONS.cases);
  }

  /** Newest cases first */
  async listCases(limit?: number, offset?: number): Promise<CaseListResult> {
    const result = await this.db.list(COLLECTIONS.cases, {
      sort_by: "_created_at",
      sort_order: "desc",
      limit,
      offset,
    });
    return {
      cases: result.data.map((r) => parse(CaseSchema, r, COLLECTIONS.cases)),
      pagination: result.pagination,
    };
  }

  /**
   * Remove a case, its summary, medications and checkpoint. Status history,
   * logs and intervention records stay; pending interventions are resolved.
   */
  async deleteCase(caseId: string): Promise<void> {
    await this.db.transaction(async (tx) => {
      const existing = await this.requireCase(caseId, tx);

      const checkpoint = await tx.findOne(COLLECTIONS.checkpoints, { case_id: caseId });
      if (checkpoint) await tx.delete(COLLECTIONS.checkpoints, checkpoint._id);

      const summary = await tx.findOne(COLLECTIONS.summaries, { case_id: caseId });
      if (summary) await tx.delete(COLLECTIONS.summaries, summary._id);

      for (const medication of await tx.find(COLLECTIONS.medications, { case_id: caseId })) {
        await tx.delete(COLLECTIONS.medications, medication._id);
      }

      const pending = await this.getPendingIntervention(caseId, tx);
      if (pending) {
        await this.updateIntervention(pending._id, {
          status: "RESOLVED",
          polling_active: false,
          resolved_at: new Date().toISOString(),
          resolution: "case deleted",
        }, tx);
      }

      await tx.delete(COLLECTIONS.cases, existing._id);
      await this.appendLog(caseId, "Case deleted", "INFO", tx);
    });
  }

  // --- Discharge summaries and medications ---

  async getSummary(caseId: string, access: DataAccess = this.db): Promise<DischargeSummary | null> {
    const record = await access.findOne(COLLECTIONS.summaries, { case_id: caseId });
    return record ? parse(DischargeSummarySchema, record, COLLECTIONS.summaries) : null;
  }

  /** Create the case's summary or update the one it has */
  async upsertSummary(
    caseId: string,
    fields: SummaryFields,
    access: DataAccess = this.db,
  ): Promise<DischargeSummary> {
    const existing = await access.findOne(COLLECTIONS.summaries, { case_id: caseId });
    const record = existing
      ? await access.update(COLLECTIONS.summaries, existing._id, fields)
      : await access.create(COLLECTIONS.summaries, { case_id: caseId, ...fields });
    if (!record) {
      throw new PersistenceError(COLLECTIONS.summaries, `summary for "${caseId}" vanished during update`);
    }
    return parse(DischargeSummarySchema, record, COLLECTIONS.summaries);
  }

  async getMedications(caseId: string, access: DataAccess = this.db): Promise<Medication[]> {
    const records = await access.find(COLLECTIONS.medications, { case_id: caseId });
    return records.map((r) => {
      const { name, dose, frequency } = parse(StoredMedicationSchema, r, COLLECTIONS.medications);
      return { name, dose, frequency };
    });
  }

  /** Replace the case's medication list as a whole */
  async replaceMedications(
    caseId: string,
    medications: Medication[],
    access: DataAccess = this.db,
  ): Promise<void> {
    for (const existing of await access.find(COLLECTIONS.medications, { case_id: caseId })) {
      await access.delete(COLLECTIONS.medications, existing._id);
    }
    for (const medication of medications) {
      await access.create(COLLECTIONS.medications, { case_id: caseId, ...medication });
    }
  }

  // --- Workflow logs ---

  async appendLog(
    caseId: string,
    message: string,
    logType: LogType,
    access: DataAccess = this.db,
  ): Promise<LogEntry> {
    const seq = await this.logSequence.next(caseId);
    const record = await access.create(COLLECTIONS.logs, {
      case_id: caseId,
      seq,
      message,
      log_type: logType,
    });
    return parse(LogEntrySchema, record, COLLECTIONS.logs);
  }

  /** Log entries in `seq` order */
  async getLogs(caseId: string): Promise<LogEntry[]> {
    const records = await this.db.find(COLLECTIONS.logs, { case_id: caseId });
    return records
      .map((r) => parse(LogEntrySchema, r, COLLECTIONS.logs))
      .sort((a, b) => a.seq - b.seq);
  }

  // --- Interventions ---

  async getPendingIntervention(
    caseId: string,
    access: DataAccess = this.db,
  ): Promise<InterventionRecord | null> {
    const records = await access.find(COLLECTIONS.interventions, { case_id: caseId });
    const pending = records.find((r) => r.status === "PENDING");
    return pending ? parse(InterventionRecordSchema, pending, COLLECTIONS.interventions) : null;
  }

  async listInterventions(caseId: string): Promise<InterventionRecord[]> {
    const records = await this.db.find(COLLECTIONS.interventions, { case_id: caseId });
    return records.map((r) => parse(InterventionRecordSchema, r, COLLECTIONS.interventions));
  }

  async createIntervention(
    caseId: string,
    kind: InterventionKind,
    reason: string,
    missingFields: string[],
    access: DataAccess = this.db,
  ): Promise<InterventionRecord> {
    const record = await access.create(COLLECTIONS.interventions, {
      case_id: caseId,
      intervention_type: kind,
      reason,
      missing_fields: missingFields,
    });
    return parse(InterventionRecordSchema, record, COLLECTIONS.interventions);
  }

  async updateIntervention(
    id: string,
    fields: InterventionFields,
    access: DataAccess = this.db,
  ): Promise<InterventionRecord> {
    const record = await access.update(COLLECTIONS.interventions, id, fields);
    if (!record) {
      throw new PersistenceError(COLLECTIONS.interventions, `intervention "${id}" not found`);
    }
    return parse(InterventionRecordSchema, record, COLLECTIONS.interventions);
  }

  // --- Checkpoints ---

  async getCheckpoint(caseId: string, access: DataAccess = this.db): Promise<WorkflowCheckpoint | null> {
    const record = await access.findOne(COLLECTIONS.checkpoints, { case_id: caseId });
    return record ? parse(CheckpointSchema, record, COLLECTIONS.checkpoints) : null;
  }

  /** Overwrite the case's checkpoint, creating it on first save */
  async saveCheckpoint(
    state: CheckpointState,
    access: DataAccess = this.db,
  ): Promise<WorkflowCheckpoint> {
    const existing = await access.findOne(COLLECTIONS.checkpoints, { case_id: state.case_id });
    const record = existing
      ? await access.update(COLLECTIONS.checkpoints, existing._id, { ...state })
      : await access.create(COLLECTIONS.checkpoints, { ...state });
    if (!record) {
      throw new PersistenceError(COLLECTIONS.checkpoints, `checkpoint for "${state.case_id}" vanished during update`);
    }
    return parse(CheckpointSchema, record, COLLECTIONS.checkpoints);
  }

  // --- Statistics ---

  async statistics(): Promise<StoreStatistics> {
    const pending = await this.db.find(COLLECTIONS.interventions, { status: "PENDING" });
    return {
      totalCases: this.db.count(COLLECTIONS.cases),
      pendingInterventions: pending.length,
    };
  }
}

/** Check a stored record against its schema */
function parse<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  record: StoredRecord,
  collection: string,
): T {
  const result = schema.safeParse(record);
  if (!result.success) {
    throw new PersistenceError(
      collection,
      `record "${record._id}" does not match its schema: ${result.error.message}`,
    );
  }
  return result.data;
}
