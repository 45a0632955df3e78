import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import { DatabaseEngine } from "../../database/engine.ts";
import { CaseOrchestrator } from "../orchestrator.ts";
import { RuleOracleTransport, type OracleTransport } from "../oracle.ts";
import type { Summarizer, SummaryDraft } from "../summarizer.ts";
import type { DecisionContext } from "../../types/workflow.ts";
import {
  DEFAULT_ORCHESTRATOR_CONFIG,
  type OrchestratorConfig,
} from "../../types/config.ts";

export const TRANSCRIPT =
  "Doctor: What brings you in today?\r\n" +
  "Patient:   I have had a dry cough   for two weeks.\r\n\r\n\r\n" +
  "Doctor: Lungs are clear. Take azithromycin 500 mg once daily and return in one week.";

export const DRAFT: SummaryDraft = {
  history: ["Dry cough for two weeks"],
  diagnosis: ["Acute bronchitis"],
  examFindings: "Lungs clear on auscultation",
  medications: [{ name: "Azithromycin", dose: "500 mg", frequency: "Once daily" }],
  followupInstructions: "Return in one week",
};

/** Replies from a fixed script; the last reply repeats once the script runs out */
export class ScriptedTransport implements OracleTransport {
  readonly name = "scripted";
  readonly contexts: DecisionContext[] = [];
  private replies: string[];

  constructor(replies: string[]) {
    this.replies = replies;
  }

  async request(context: DecisionContext): Promise<string> {
    this.contexts.push(context);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) throw new Error("script is empty");
    return reply;
  }
}

export function action(name: string, reasoning = "scripted"): string {
  return JSON.stringify({ action: name, reasoning });
}

export class StubSummarizer implements Summarizer {
  calls = 0;
  private draft: SummaryDraft;

  constructor(draft: SummaryDraft = DRAFT) {
    this.draft = draft;
  }

  async summarize(): Promise<SummaryDraft> {
    this.calls++;
    return structuredClone(this.draft);
  }
}

export interface TestHarness {
  dir: string;
  db: DatabaseEngine;
  orchestrator: CaseOrchestrator;
  summarizer: StubSummarizer;
  cleanup(): Promise<void>;
}

export async function createHarness(options: {
  transport?: OracleTransport;
  summarizer?: StubSummarizer;
  config?: Partial<OrchestratorConfig>;
} = {}): Promise<TestHarness> {
  const dir = join(tmpdir(), `caseflow-test-${randomUUID()}`);
  await mkdir(dir, { recursive: true });

  const db = new DatabaseEngine(dir);
  await db.init();

  const summarizer = options.summarizer ?? new StubSummarizer();
  const orchestrator = new CaseOrchestrator({
    db,
    transport: options.transport ?? new RuleOracleTransport(),
    summarizer,
    config: { ...DEFAULT_ORCHESTRATOR_CONFIG, ...options.config },
  });

  return {
    dir,
    db,
    orchestrator,
    summarizer,
    async cleanup() {
      await orchestrator.shutdown();
      await rm(dir, { recursive: true, force: true });
    },
  };
}

export async function openCase(
  harness: TestHarness,
  caseId: string,
  rawTranscript: string | null = TRANSCRIPT,
): Promise<void> {
  await harness.orchestrator.createCase({
    caseId,
    patientId: `patient-${caseId}`,
    doctorId: "doctor-7",
    rawTranscript,
  });
}
