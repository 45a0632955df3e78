/** Collection definitions for consultation cases and their workflow records */

import type { CollectionDefinition } from "../types/database.ts";

export const COLLECTIONS = {
  cases: "cases",
  summaries: "summaries",
  medications: "medications",
  statuses: "statuses",
  logs: "logs",
  interventions: "interventions",
  checkpoints: "checkpoints",
} as const;
export type CollectionName = (typeof COLLECTIONS)[keyof typeof COLLECTIONS];

export const COLLECTION_DEFINITIONS: CollectionDefinition[] = [
  {
    name: COLLECTIONS.cases,
    prefix: "case",
    fields: [
      { name: "case_id", unique: true, indexed: true, immutable: true },
      { name: "patient_id", indexed: true },
      { name: "doctor_id", indexed: true },
      { name: "specialty", default: "General" },
      { name: "raw_transcript", default: null },
      { name: "cleaned_transcript", default: null },
    ],
  },
  {
    name: COLLECTIONS.summaries,
    prefix: "summary",
    fields: [
      { name: "case_id", unique: true, immutable: true },
      { name: "history", default: [] },
      { name: "diagnosis", default: [] },
      { name: "exam_findings", default: null },
      { name: "followup_instructions", default: null },
      { name: "final_status", default: null },
      { name: "source_hash", default: null },
    ],
  },
  {
    name: COLLECTIONS.medications,
    prefix: "medication",
    fields: [
      { name: "case_id", indexed: true, immutable: true },
      { name: "name" },
      { name: "dose" },
      { name: "frequency" },
    ],
  },
  {
    name: COLLECTIONS.statuses,
    prefix: "status",
    fields: [
      { name: "case_id", indexed: true, immutable: true },
      { name: "status", indexed: true },
      { name: "seq" },
    ],
  },
  {
    name: COLLECTIONS.logs,
    prefix: "log",
    fields: [
      { name: "case_id", indexed: true, immutable: true },
      { name: "seq" },
      { name: "message" },
      { name: "log_type", default: "INFO" },
    ],
  },
  {
    name: COLLECTIONS.interventions,
    prefix: "intervention",
    fields: [
      { name: "case_id", indexed: true, immutable: true },
      { name: "intervention_type" },
      { name: "reason" },
      { name: "missing_fields", default: [] },
      { name: "status", indexed: true, default: "PENDING" },
      { name: "polling_active", default: true },
      { name: "resolved_at", default: null },
      { name: "resolution", default: null },
    ],
  },
  {
    name: COLLECTIONS.checkpoints,
    prefix: "checkpoint",
    fields: [
      { name: "case_id", unique: true, immutable: true },
      { name: "run_id" },
      { name: "run_number", default: 1 },
      { name: "phase", default: "deciding" },
      { name: "current_action", default: null },
      { name: "messages", default: [] },
      { name: "completed_actions", default: [] },
      { name: "last_decision", default: null },
      { name: "step_count", default: 0 },
      { name: "invocations", default: 0 },
    ],
  },
];
