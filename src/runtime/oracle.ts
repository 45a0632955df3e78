/**
 * Decision oracle — asks a transport for the next action and turns its
 * free-text answer into a validated label.
 *
 * Transports are untrusted: anything that is not one JSON object naming a
 * known action becomes an `error` decision. One transport call per
 * decision, no retries.
 */

import type { LLMClient } from "../llm/client.ts";
import { extractJSON } from "../llm/client.ts";
import { buildDecisionPrompt, buildDecisionSystem } from "../llm/prompts.ts";
import {
  isActionLabel,
  type ActionLabel,
  type DecisionContext,
  type OracleDecision,
} from "../types/workflow.ts";
import { OraclePathError } from "./errors.ts";
import { describeError } from "../database/errors.ts";

const MAX_REASONING_LENGTH = 500;
const DEFAULT_REASONING = "No reasoning provided";

const ACTION_ALIASES: Record<string, ActionLabel> = {
  wait: "wait_for_transcript",
  wait_for_input: "wait_for_transcript",
  call_resolve_human_intervention: "resolve_intervention",
  resolve_human_intervention: "resolve_intervention",
  clean: "cleanup",
  clean_up: "cleanup",
  summarise: "summarize",
  notify_doctor: "notify",
  done: "complete",
};

/** Produces raw decision text for a context */
export interface OracleTransport {
  readonly name: string;
  request(context: DecisionContext): Promise<string>;
}

/** Routes through the configured LLM */
export class LLMOracleTransport implements OracleTransport {
  readonly name = "llm";
  private llm: LLMClient;

  constructor(llm: LLMClient) {
    this.llm = llm;
  }

  async request(context: DecisionContext): Promise<string> {
    const response = await this.llm.interpret({
      system: buildDecisionSystem(),
      prompt: buildDecisionPrompt(context),
      maxTokens: 512,
    });
    return response.text;
  }
}

/**
 * Deterministic routing over the case facts. Used when no LLM is
 * configured.
 */
export class RuleOracleTransport implements OracleTransport {
  readonly name = "rules";

  async request(context: DecisionContext): Promise<string> {
    const [action, reasoning] = decideByRules(context);
    return JSON.stringify({ action, reasoning });
  }
}

export function decideByRules(context: DecisionContext): [ActionLabel, string] {
  const { facts } = context;

  if (!facts.hasRawTranscript) {
    return ["wait_for_transcript", "Raw transcript is missing or too short"];
  }
  if (facts.pendingInterventions > 0) {
    return ["resolve_intervention", "Transcript arrived while an intervention is pending"];
  }
  if (!facts.hasCleanedTranscript) {
    return ["cleanup", "Raw transcript has not been cleaned"];
  }
  if (!facts.hasSummary) {
    return ["summarize", "Cleaned transcript has no discharge summary"];
  }
  if (facts.summaryStatus !== "VALIDATED" && facts.summaryStatus !== "VALIDATION_FAILED") {
    return ["validate", "Discharge summary has not been validated"];
  }
  if (facts.summaryStatus === "VALIDATION_FAILED") {
    return ["complete", "Summary failed validation; nothing further can run"];
  }
  if (!facts.doctorNotified) {
    return ["notify", "Summary validated; doctor not yet notified"];
  }
  return ["complete", "All steps done"];
}

export class DecisionOracle {
  private transport: OracleTransport;

  constructor(transport: OracleTransport) {
    this.transport = transport;
  }

  get transportName(): string {
    return this.transport.name;
  }

  async decide(context: DecisionContext): Promise<OracleDecision> {
    let raw: string;
    try {
      raw = await this.transport.request(context);
    } catch (err) {
      console.error(`[oracle] Transport "${this.transport.name}" failed for ${context.caseId}: ${describeError(err)}`);
      return invalid(`Oracle transport failed: ${describeError(err)}`);
    }

    try {
      return parseDecision(raw);
    } catch (err) {
      if (!(err instanceof OraclePathError)) throw err;
      console.error(`[oracle] ${err.message} (case ${context.caseId})`);
      return invalid(err.message);
    }
  }
}

/**
 * Turn raw oracle text into a decision.
 * @throws OraclePathError when no known action can be read from it
 */
export function parseDecision(raw: string): OracleDecision {
  const json = extractJSON(raw);
  if (typeof json !== "object" || json === null || Array.isArray(json)) {
    throw new OraclePathError("Oracle returned no JSON object", raw);
  }
  if (!("action" in json) || typeof json.action !== "string") {
    throw new OraclePathError("Oracle JSON has no string \"action\"", raw);
  }

  const action = normalizeAction(json.action);
  if (!action) {
    throw new OraclePathError(`Unknown action "${json.action}"`, raw);
  }

  const reasoning = "reasoning" in json && typeof json.reasoning === "string"
    ? cleanReasoning(json.reasoning)
    : DEFAULT_REASONING;

  return { action, reasoning, valid: true };
}

export function normalizeAction(label: string): ActionLabel | null {
  const key = label.trim().toLowerCase().replace(/[-\s]+/g, "_");
  if (isActionLabel(key)) return key;
  return ACTION_ALIASES[key] ?? null;
}

function cleanReasoning(reasoning: string): string {
  const collapsed = reasoning.replace(/\s+/g, " ").trim();
  if (!collapsed) return DEFAULT_REASONING;
  return collapsed.length > MAX_REASONING_LENGTH
    ? collapsed.slice(0, MAX_REASONING_LENGTH)
    : collapsed;
}

function invalid(reasoning: string): OracleDecision {
  return { action: "error", reasoning, valid: false };
}
