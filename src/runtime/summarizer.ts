/**
 * Summarizer — turns a cleaned transcript into discharge summary fields.
 */

import type { LLMClient } from "../llm/client.ts";
import { buildSummaryPrompt, buildSummarySystem } from "../llm/prompts.ts";
import type { Medication } from "../types/case.ts";
import { PreconditionError, SummaryParseError } from "./errors.ts";

export const UNSPECIFIED_TEXT = "Not clearly specified in the transcript.";
export const UNSPECIFIED_MEDICATION_PART = "Not specified";

export interface SummaryDraft {
  history: string[];
  diagnosis: string[];
  examFindings: string;
  medications: Medication[];
  followupInstructions: string;
}

export interface Summarizer {
  summarize(transcript: string): Promise<SummaryDraft>;
}

export class LLMSummarizer implements Summarizer {
  private llm: LLMClient;

  constructor(llm: LLMClient) {
    this.llm = llm;
  }

  async summarize(transcript: string): Promise<SummaryDraft> {
    if (!this.llm.isConfigured()) {
      throw new PreconditionError("summarize", `LLM API key not configured (set ${this.llm.apiKeyEnvVar})`);
    }

    const response = await this.llm.interpret({
      system: buildSummarySystem(),
      prompt: buildSummaryPrompt(transcript),
      jsonMode: true,
    });

    if (typeof response.json !== "object" || response.json === null || Array.isArray(response.json)) {
      throw new SummaryParseError("Summarizer did not return a JSON object");
    }
    return normalizeSummary(response.json);
  }
}

/**
 * Coerce loosely shaped summarizer output into a complete draft.
 * Empty text fields get a placeholder; string lists are trimmed and
 * emptied of blanks.
 */
export function normalizeSummary(raw: object): SummaryDraft {
  return {
    history: toStringList(field(raw, "history")),
    diagnosis: toStringList(field(raw, "diagnosis")),
    examFindings: toText(field(raw, "exam_findings")),
    medications: toMedications(field(raw, "medications")),
    followupInstructions: toText(
      field(raw, "follow_up_instructions") ?? field(raw, "followup_instructions"),
    ),
  };
}

function field(source: object, key: string): unknown {
  return key in source ? Reflect.get(source, key) : undefined;
}

function toStringList(value: unknown): string[] {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed ? [trimmed] : [];
  }
  if (!Array.isArray(value)) return [];

  const items: string[] = [];
  for (const item of value) {
    if (item === null || item === undefined) continue;
    const text = String(item).trim();
    if (text) items.push(text);
  }
  return items;
}

function toText(value: unknown): string {
  if (Array.isArray(value)) {
    const joined = toStringList(value).join("; ");
    return joined || UNSPECIFIED_TEXT;
  }
  if (typeof value === "string" && value.trim()) return value.trim();
  return UNSPECIFIED_TEXT;
}

function toMedications(value: unknown): Medication[] {
  if (!Array.isArray(value)) return [];

  const medications: Medication[] = [];
  for (const item of value) {
    if (typeof item === "string" && item.trim()) {
      medications.push({
        name: item.trim(),
        dose: UNSPECIFIED_MEDICATION_PART,
        frequency: UNSPECIFIED_MEDICATION_PART,
      });
    } else if (typeof item === "object" && item !== null) {
      medications.push({
        name: medicationPart(item, "name"),
        dose: medicationPart(item, "dose"),
        frequency: medicationPart(item, "frequency"),
      });
    }
  }
  return medications;
}

function medicationPart(item: object, key: "name" | "dose" | "frequency"): string {
  const value = field(item, key);
  if (typeof value === "string" && value.trim()) return value.trim();
  return UNSPECIFIED_MEDICATION_PART;
}
