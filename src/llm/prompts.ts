/**
 * Prompts for the two LLM roles: routing the workflow and summarizing a
 * consultation transcript.
 */

import type { DecisionContext } from "../types/workflow.ts";

/**
 * Build the system prompt for the routing decision.
 */
export function buildDecisionSystem(): string {
  return `You are the orchestrator of a clinical discharge-summary workflow. You decide the single next action for one consultation case, based only on the state you are given.

## Available actions

- "wait_for_transcript" — the raw transcript is missing or too short; pause until a human provides it
- "resolve_intervention" — a transcript has arrived while an intervention is still pending; close the intervention before anything else
- "cleanup" — normalise the raw transcript (requires a raw transcript)
- "summarize" — extract the discharge summary from the cleaned transcript (requires a cleaned transcript)
- "validate" — check the discharge summary for completeness (requires a summary)
- "notify" — notify the doctor (requires a validated summary)
- "complete" — every step is done, or the summary failed validation
- "error" — the state is inconsistent and needs escalation

## Decision rules

- No raw transcript: "wait_for_transcript"
- Raw transcript present and a pending intervention: "resolve_intervention"
- Raw transcript present but not cleaned: "cleanup"
- Cleaned but no summary: "summarize"
- Summary present but not validated: "validate"
- Validation failed: "complete"
- Validated but the doctor was not notified: "notify"
- Everything done: "complete"
- Never choose an action listed as completed, except "complete", "error" and "wait_for_transcript"

## Output format

Return ONLY a JSON object, no markdown formatting:

{ "action": "<one of the actions above>", "reasoning": "<one short sentence>" }`;
}

/**
 * Build the user message describing the case state.
 */
export function buildDecisionPrompt(context: DecisionContext): string {
  const { facts } = context;
  const completed = context.completedActions.length > 0
    ? context.completedActions.join(", ")
    : "None";
  const history = context.recentMessages.length > 0
    ? context.recentMessages.join(" | ")
    : "None";

  return `## Current state

- Case ID: ${context.caseId}
- Current status: ${context.currentStatus}
- Has raw transcript: ${facts.hasRawTranscript} (${facts.rawTranscriptLength} chars)
- Has cleaned transcript: ${facts.hasCleanedTranscript}
- Discharge summary exists: ${facts.hasSummary}
- Summary status: ${facts.summaryStatus ?? "None"}
- Doctor notified: ${facts.doctorNotified}
- Pending interventions: ${facts.pendingInterventions}
- Completed actions: ${completed}

## Discharge summary details

- History items: ${facts.historyItems}
- Diagnosis items: ${facts.diagnosisItems}
- Exam findings: ${facts.hasExamFindings ? "Present" : "Missing"}
- Medications: ${facts.medicationCount}
- Follow-up: ${facts.hasFollowup ? "Present" : "Missing"}

## Workflow history

${history}`;
}

/**
 * Build the system prompt for transcript summarization.
 */
export function buildSummarySystem(): string {
  return `You are a medical discharge summary assistant. From a cleaned consultation transcript, produce a SINGLE STRICT JSON object with ALL of these fields:

- "history": array of strings (each item can be a sentence)
- "exam_findings": string
- "diagnosis": array of strings
- "medications": array of objects with keys "name", "dose", "frequency"
- "follow_up_instructions": string

Rules:
- Do not leave any field empty.
- If something is not explicitly stated, write "Not clearly specified in the transcript."
- Return strict valid JSON only. No markdown, no comments, no extra text.`;
}

/**
 * Build the user message carrying the transcript.
 */
export function buildSummaryPrompt(transcript: string): string {
  return `## Transcript

${transcript}`;
}
