import { describe, test, expect, afterEach } from "vitest";
import { CaseNotFoundError, DuplicateCaseError } from "../errors.ts";
import type { SummaryDraft } from "../summarizer.ts";
import {
  DRAFT,
  StubSummarizer,
  TRANSCRIPT,
  createHarness,
  openCase,
  type TestHarness,
} from "./helpers.ts";

let harness: TestHarness;

/** Holds summarize() open until released */
class GatedSummarizer extends StubSummarizer {
  readonly entered: Promise<void>;
  private markEntered: () => void = () => {};
  private open: () => void = () => {};
  private gate: Promise<void>;

  constructor() {
    super();
    this.entered = new Promise((resolve) => {
      this.markEntered = resolve;
    });
    this.gate = new Promise((resolve) => {
      this.open = resolve;
    });
  }

  release(): void {
    this.open();
  }

  async summarize(): Promise<SummaryDraft> {
    this.markEntered();
    await this.gate;
    return super.summarize();
  }
}

afterEach(async () => {
  await harness.cleanup();
});

describe("CaseOrchestrator", () => {
  test("rejects a duplicate case id", async () => {
    harness = await createHarness();
    await openCase(harness, "case-1");

    await expect(openCase(harness, "case-1")).rejects.toBeInstanceOf(DuplicateCaseError);
  });

  test("stores a blank transcript as missing", async () => {
    harness = await createHarness();
    await openCase(harness, "case-blank", "   ");

    const state = await harness.orchestrator.getCaseState("case-blank");
    expect(state.case.raw_transcript).toBeNull();
    expect(state.case.specialty).toBe("General");
    expect(state.status).toBe("CREATED");
    expect(state.logs.map((l) => l.message)).toEqual(["Case created for patient patient-case-blank"]);
  });

  test("provideMissingInput records the transcript without resuming", async () => {
    harness = await createHarness();
    await openCase(harness, "case-input", null);
    await harness.orchestrator.run("case-input");

    await harness.orchestrator.provideMissingInput("case-input", TRANSCRIPT);

    const state = await harness.orchestrator.getCaseState("case-input");
    expect(state.case.raw_transcript).toBe(TRANSCRIPT);
    expect(state.status).toBe("TRANSCRIPT_PROVIDED");
    expect(state.logs.at(-1)?.message).toBe(`[INPUT] Transcript provided (${TRANSCRIPT.length} chars)`);
    expect(state.checkpoint?.phase).toBe("awaiting_intervention");
  });

  test("provideMissingInput rejects an unknown case", async () => {
    harness = await createHarness();
    await expect(harness.orchestrator.provideMissingInput("nope", TRANSCRIPT))
      .rejects.toBeInstanceOf(CaseNotFoundError);
  });

  test("getDischargeSummary returns null until a summary exists", async () => {
    harness = await createHarness();
    await openCase(harness, "case-summary");

    expect(await harness.orchestrator.getDischargeSummary("case-summary")).toBeNull();

    await harness.orchestrator.run("case-summary");
    expect(await harness.orchestrator.getDischargeSummary("case-summary")).toEqual({
      caseId: "case-summary",
      patientId: "patient-case-summary",
      doctorId: "doctor-7",
      specialty: "General",
      history: DRAFT.history,
      diagnosis: DRAFT.diagnosis,
      examFindings: DRAFT.examFindings,
      medications: DRAFT.medications,
      followupInstructions: DRAFT.followupInstructions,
      finalStatus: "VALIDATED",
    });
  });

  test("lists cases with pagination", async () => {
    harness = await createHarness();
    await openCase(harness, "case-a");
    await openCase(harness, "case-b");
    await openCase(harness, "case-c");

    const page = await harness.orchestrator.listCases(2, 0);

    expect(page.cases).toHaveLength(2);
    expect(page.pagination.total).toBe(3);
    expect(page.pagination.has_more).toBe(true);
  });

  test("reports statistics including active polls", async () => {
    harness = await createHarness();
    await openCase(harness, "case-parked", null);
    await openCase(harness, "case-other");
    await harness.orchestrator.run("case-parked");

    expect(await harness.orchestrator.getStatistics()).toEqual({
      totalCases: 2,
      pendingInterventions: 1,
      activePolls: 1,
      activePollCaseIds: ["case-parked"],
    });
  });

  test("deleteCase stops polling and keeps the audit trail", async () => {
    harness = await createHarness();
    const { orchestrator } = harness;
    await openCase(harness, "case-gone", null);
    await orchestrator.run("case-gone");

    await orchestrator.deleteCase("case-gone");

    await expect(orchestrator.getCaseState("case-gone")).rejects.toBeInstanceOf(CaseNotFoundError);
    expect(orchestrator.polling.isPolling("case-gone")).toBe(false);
    expect(await orchestrator.store.getCheckpoint("case-gone")).toBeNull();

    const [record] = await orchestrator.store.listInterventions("case-gone");
    expect(record?.status).toBe("RESOLVED");
    expect(record?.resolution).toBe("case deleted");
    expect((await orchestrator.store.statuses.history("case-gone")).map((s) => s.status))
      .toEqual(["CREATED", "AWAITING_INPUT"]);
    expect((await orchestrator.store.getLogs("case-gone")).at(-1)?.message).toBe("Case deleted");

    const stats = await orchestrator.getStatistics();
    expect(stats.totalCases).toBe(0);
    expect(stats.pendingInterventions).toBe(0);
  });

  test("deleteCase waits for a run in progress", async () => {
    const summarizer = new GatedSummarizer();
    harness = await createHarness({ summarizer });
    const { orchestrator } = harness;
    await openCase(harness, "case-busy");

    const running = orchestrator.run("case-busy");
    await summarizer.entered;
    let deleted = false;
    const deleting = orchestrator.deleteCase("case-busy").then(() => {
      deleted = true;
    });
    await new Promise((resolve) => setTimeout(resolve, 100));

    expect(orchestrator.engine.isRunning("case-busy")).toBe(true);
    expect(deleted).toBe(false);

    summarizer.release();
    const state = await running;
    await deleting;

    expect(state.outcome).toBe("completed");
    expect(await orchestrator.store.getCheckpoint("case-busy")).toBeNull();
    expect(await orchestrator.store.getSummary("case-busy")).toBeNull();
    expect(await orchestrator.store.getMedications("case-busy")).toEqual([]);
    await expect(orchestrator.getCaseState("case-busy")).rejects.toBeInstanceOf(CaseNotFoundError);
  });

  test("stopPolling rejects an unknown case", async () => {
    harness = await createHarness();
    await expect(harness.orchestrator.stopPolling("nope")).rejects.toBeInstanceOf(CaseNotFoundError);
  });

  test("health reports storage and the oracle transport", async () => {
    harness = await createHarness();

    expect(await harness.orchestrator.health()).toEqual({
      healthy: true,
      storage: "ok",
      oracle: "rules",
      activePolls: 0,
    });
  });
});
