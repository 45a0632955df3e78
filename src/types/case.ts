/**
 * Case domain types. Each stored entity has a zod schema so records read
 * back from disk are checked before the rest of the system sees them.
 */

import { z } from "zod";

const systemFields = {
  _id: z.string(),
  _created_at: z.string(),
  _updated_at: z.string(),
};

/** Status labels written to the status log */
export const STATUS_LABELS = [
  "CREATED",
  "TRANSCRIPT_PROVIDED",
  "CLEANED",
  "SUMMARY_GENERATED",
  "VALIDATED",
  "VALIDATION_FAILED",
  "NOTIFIED_DOCTOR",
  "ERROR_HANDLED",
  "AWAITING_INPUT",
  "INTERVENTION_RESOLVED",
  "COMPLETED",
  "FAILED",
] as const;
export type StatusLabel = (typeof STATUS_LABELS)[number];

/** Workflow log categories */
export const LOG_TYPES = [
  "INFO",
  "STEP",
  "DECISION",
  "INTERVENTION",
  "POLLING",
  "RESUME",
  "INPUT",
  "ERROR",
] as const;
export type LogType = (typeof LOG_TYPES)[number];

export const INTERVENTION_KINDS = ["MISSING_TRANSCRIPT"] as const;
export type InterventionKind = (typeof INTERVENTION_KINDS)[number];

export const INTERVENTION_STATUSES = ["PENDING", "RESOLVED"] as const;
export type InterventionStatus = (typeof INTERVENTION_STATUSES)[number];

export const SUMMARY_STATUSES = [
  "SUMMARY_GENERATED",
  "VALIDATED",
  "VALIDATION_FAILED",
] as const;
export type SummaryStatus = (typeof SUMMARY_STATUSES)[number];

export const CaseSchema = z.object({
  ...systemFields,
  case_id: z.string(),
  patient_id: z.string(),
  doctor_id: z.string(),
  specialty: z.string(),
  raw_transcript: z.string().nullable(),
  cleaned_transcript: z.string().nullable(),
});
export type Case = z.infer<typeof CaseSchema>;

/** Fields supplied when a case is opened */
export interface NewCaseInput {
  caseId: string;
  patientId: string;
  doctorId: string;
  specialty?: string;
  rawTranscript?: string | null;
}

export const DischargeSummarySchema = z.object({
  ...systemFields,
  case_id: z.string(),
  history: z.array(z.string()),
  diagnosis: z.array(z.string()),
  exam_findings: z.string().nullable(),
  followup_instructions: z.string().nullable(),
  final_status: z.enum(SUMMARY_STATUSES).nullable(),
  source_hash: z.string().nullable(),
});
export type DischargeSummary = z.infer<typeof DischargeSummarySchema>;

export const MedicationSchema = z.object({
  name: z.string(),
  dose: z.string(),
  frequency: z.string(),
});
export type Medication = z.infer<typeof MedicationSchema>;

export const StoredMedicationSchema = MedicationSchema.extend({
  ...systemFields,
  case_id: z.string(),
});

export const StatusEntrySchema = z.object({
  _id: z.string(),
  _created_at: z.string(),
  case_id: z.string(),
  status: z.enum(STATUS_LABELS),
  seq: z.number().int(),
});
export type StatusEntry = z.infer<typeof StatusEntrySchema>;

export const LogEntrySchema = z.object({
  _id: z.string(),
  _created_at: z.string(),
  case_id: z.string(),
  seq: z.number().int(),
  message: z.string(),
  log_type: z.enum(LOG_TYPES),
});
export type LogEntry = z.infer<typeof LogEntrySchema>;

export const InterventionRecordSchema = z.object({
  ...systemFields,
  case_id: z.string(),
  intervention_type: z.enum(INTERVENTION_KINDS),
  reason: z.string(),
  missing_fields: z.array(z.string()),
  status: z.enum(INTERVENTION_STATUSES),
  polling_active: z.boolean(),
  resolved_at: z.string().nullable(),
  resolution: z.string().nullable(),
});
export type InterventionRecord = z.infer<typeof InterventionRecordSchema>;
