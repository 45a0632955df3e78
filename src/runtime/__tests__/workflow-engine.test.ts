import { describe, test, expect, afterEach, vi } from "vitest";
import { PersistenceError } from "../../database/errors.ts";
import { RESUME_SEED_MESSAGE } from "../polling-manager.ts";
import { DEFAULT_SEED_MESSAGE } from "../workflow-engine.ts";
import { ScriptedTransport, TRANSCRIPT, action, createHarness, openCase, type TestHarness } from "./helpers.ts";

let harness: TestHarness;

afterEach(async () => {
  vi.restoreAllMocks();
  await harness.cleanup();
});

async function statusLabels(caseId: string): Promise<string[]> {
  return (await harness.orchestrator.store.statuses.history(caseId)).map((s) => s.status);
}

describe("WorkflowEngine", () => {
  test("parks a case without a transcript", async () => {
    harness = await createHarness();
    await openCase(harness, "case-wait", null);

    const state = await harness.orchestrator.run("case-wait");

    expect(state.outcome).toBe("awaiting_intervention");
    expect(state.status).toBe("AWAITING_INPUT");
    expect(state.waitingForInput).toBe(true);
    expect(state.pollingActive).toBe(true);
    expect(state.missingFields).toEqual(["raw_transcript"]);
    expect(state.steps).toBe(1);

    const interventions = await harness.orchestrator.store.listInterventions("case-wait");
    expect(interventions).toHaveLength(1);
    expect(interventions[0]?.status).toBe("PENDING");
    expect(interventions[0]?.missing_fields).toEqual(["raw_transcript"]);
  });

  test("runs a complete case through every step", async () => {
    harness = await createHarness();
    await openCase(harness, "case-full");

    const state = await harness.orchestrator.run("case-full");

    expect(state.outcome).toBe("completed");
    expect(state.status).toBe("COMPLETED");
    expect(state.completedActions).toEqual(["cleanup", "summarize", "validate", "notify"]);
    expect(state.steps).toBe(5);
    expect(state.lastDecision).toEqual({ action: "complete", reasoning: "All steps done" });
    expect(state.messages[0]).toBe(DEFAULT_SEED_MESSAGE);
    expect(state.messages.at(-1)).toBe("[ORCHESTRATOR] Workflow complete");
    expect(await statusLabels("case-full")).toEqual([
      "CREATED",
      "CLEANED",
      "SUMMARY_GENERATED",
      "VALIDATED",
      "NOTIFIED_DOCTOR",
      "COMPLETED",
    ]);
  });

  test("audits every decision in the workflow log", async () => {
    harness = await createHarness();
    await openCase(harness, "case-audit");

    await harness.orchestrator.run("case-audit");

    const decisions = (await harness.orchestrator.store.getLogs("case-audit"))
      .filter((log) => log.log_type === "DECISION")
      .map((log) => log.message);
    expect(decisions).toEqual([
      "[ORCHESTRATOR] Next: cleanup | Raw transcript has not been cleaned",
      "[ORCHESTRATOR] Next: summarize | Cleaned transcript has no discharge summary",
      "[ORCHESTRATOR] Next: validate | Discharge summary has not been validated",
      "[ORCHESTRATOR] Next: notify | Summary validated; doctor not yet notified",
      "[ORCHESTRATOR] Next: complete | All steps done",
    ]);
  });

  test("completes without executing anything when the oracle says so", async () => {
    harness = await createHarness({ transport: new ScriptedTransport([action("complete")]) });
    await openCase(harness, "case-done");

    const state = await harness.orchestrator.run("case-done");

    expect(state.outcome).toBe("completed");
    expect(state.steps).toBe(1);
    expect(state.completedActions).toEqual([]);
    expect(harness.summarizer.calls).toBe(0);
    expect(await statusLabels("case-done")).toEqual(["CREATED", "COMPLETED"]);
  });

  test("routes an unknown action to error handling and decides again", async () => {
    harness = await createHarness({
      transport: new ScriptedTransport([action("not_a_real_action"), action("complete")]),
    });
    await openCase(harness, "case-bad");

    const state = await harness.orchestrator.run("case-bad");

    expect(state.outcome).toBe("completed");
    expect(state.steps).toBe(2);
    expect(state.messages).toContain('[ERROR] Handling error: Unknown action "not_a_real_action"');
    expect(await statusLabels("case-bad")).toEqual(["CREATED", "ERROR_HANDLED", "COMPLETED"]);
  });

  test("routes a failed executor to error handling", async () => {
    harness = await createHarness({
      transport: new ScriptedTransport([action("summarize"), action("complete")]),
    });
    await openCase(harness, "case-early");

    const state = await harness.orchestrator.run("case-early");

    expect(state.outcome).toBe("completed");
    expect(state.completedActions).toEqual([]);
    expect(state.messages).toContain("[SUMMARIZE] Failed: summarize: cleaned transcript is empty");
    expect(state.messages).toContain(
      "[ERROR] Handling error: summarize failed: summarize: cleaned transcript is empty",
    );
    expect(await statusLabels("case-early")).toEqual(["CREATED", "ERROR_HANDLED", "COMPLETED"]);
  });

  test("serialises concurrent runs of one case", async () => {
    harness = await createHarness();
    await openCase(harness, "case-race");

    const states = await Promise.all([
      harness.orchestrator.run("case-race"),
      harness.orchestrator.run("case-race"),
    ]);

    expect(states.map((s) => s.steps).sort((a, b) => a - b)).toEqual([1, 5]);
    expect(harness.summarizer.calls).toBe(1);
    expect(harness.orchestrator.engine.isRunning("case-race")).toBe(false);
  });
});

describe("repeat policy", () => {
  test("force_complete finishes the run", async () => {
    harness = await createHarness({
      transport: new ScriptedTransport([action("cleanup")]),
      config: { repeatPolicy: "force_complete" },
    });
    await openCase(harness, "case-force");

    const state = await harness.orchestrator.run("case-force");

    expect(state.outcome).toBe("completed");
    expect(state.steps).toBe(2);
    expect(state.completedActions).toEqual(["cleanup"]);
    expect(state.lastDecision).toEqual({ action: "complete", reasoning: '"cleanup" already completed; finishing' });
    expect(state.messages).toContain('[ORCHESTRATOR] "cleanup" already completed (repeat policy: force_complete)');
  });

  test("route_to_error sends the repeat to error handling", async () => {
    harness = await createHarness({
      transport: new ScriptedTransport([action("cleanup"), action("cleanup"), action("complete")]),
      config: { repeatPolicy: "route_to_error" },
    });
    await openCase(harness, "case-route");

    const state = await harness.orchestrator.run("case-route");

    expect(state.outcome).toBe("completed");
    expect(state.steps).toBe(3);
    expect(state.messages).toContain('[ERROR] Handling error: Oracle repeated completed action "cleanup"');
    expect(await statusLabels("case-route")).toEqual(["CREATED", "CLEANED", "ERROR_HANDLED", "COMPLETED"]);
  });

  test("fail ends the run with a diagnostic", async () => {
    harness = await createHarness({
      transport: new ScriptedTransport([action("cleanup")]),
      config: { repeatPolicy: "fail" },
    });
    await openCase(harness, "case-fail");

    const state = await harness.orchestrator.run("case-fail");

    expect(state.outcome).toBe("failed");
    expect(state.status).toBe("FAILED");
    expect(state.diagnostic).toBe('oracle repeated completed action "cleanup"');
    expect(state.messages.at(-1)).toBe('[ORCHESTRATOR] Loop guard tripped: oracle repeated completed action "cleanup"');
  });
});

describe("loop guards", () => {
  test("fails after too many consecutive error decisions", async () => {
    harness = await createHarness({
      transport: new ScriptedTransport([action("gibberish")]),
      config: { maxConsecutiveErrors: 3 },
    });
    await openCase(harness, "case-errors");

    const state = await harness.orchestrator.run("case-errors");

    expect(state.outcome).toBe("failed");
    expect(state.steps).toBe(4);
    expect(state.diagnostic).toBe('"error" chosen 4 times in a row (limit 3)');
    const labels = await statusLabels("case-errors");
    expect(labels.filter((l) => l === "ERROR_HANDLED")).toHaveLength(3);
    expect(labels.at(-1)).toBe("FAILED");
  });

  test("fails at the step ceiling", async () => {
    harness = await createHarness({
      transport: new ScriptedTransport([action("error")]),
      config: { maxSteps: 3, maxConsecutiveErrors: 10 },
    });
    await openCase(harness, "case-ceiling");

    const state = await harness.orchestrator.run("case-ceiling");

    expect(state.outcome).toBe("failed");
    expect(state.steps).toBe(3);
    expect(state.diagnostic).toBe("step ceiling of 3 decisions reached");
  });
});

describe("resumption", () => {
  test("resumes a parked case once the transcript arrives and a poll finds it", async () => {
    harness = await createHarness();
    const { orchestrator } = harness;
    await openCase(harness, "case-resume", null);
    await orchestrator.run("case-resume");

    await orchestrator.provideMissingInput("case-resume", TRANSCRIPT);
    expect(await orchestrator.polling.pollOnce("case-resume")).toBe("resumed");

    const state = await orchestrator.getCaseState("case-resume");
    expect(state.status).toBe("COMPLETED");
    expect(state.pollingActive).toBe(false);
    expect(state.interventions[0]?.status).toBe("RESOLVED");
    expect(state.interventions[0]?.resolution).toBe("input received");
    expect(state.checkpoint?.run_number).toBe(1);
    expect(state.checkpoint?.invocations).toBe(2);
    expect(state.checkpoint?.messages).toContain(RESUME_SEED_MESSAGE);
    expect(state.checkpoint?.completed_actions).toEqual(["cleanup", "summarize", "validate", "notify"]);
  });

  test("run resolves a satisfied intervention itself", async () => {
    harness = await createHarness();
    const { orchestrator } = harness;
    await openCase(harness, "case-manual", null);
    await orchestrator.run("case-manual");
    await orchestrator.provideMissingInput("case-manual", TRANSCRIPT);

    const state = await orchestrator.run("case-manual");

    expect(state.outcome).toBe("completed");
    expect(state.messages).toContain("[POLLING] Missing input found; intervention resolved");
    expect(state.pollingActive).toBe(false);
    expect(await orchestrator.store.getPendingIntervention("case-manual")).toBeNull();
  });

  test("re-decides a step interrupted mid-execution", async () => {
    harness = await createHarness();
    const { orchestrator } = harness;
    await openCase(harness, "case-crash");
    await orchestrator.store.saveCheckpoint({
      case_id: "case-crash",
      run_id: "run-crashed",
      run_number: 1,
      phase: "executing",
      current_action: "cleanup",
      messages: [DEFAULT_SEED_MESSAGE],
      completed_actions: [],
      last_decision: { action: "cleanup", reasoning: "Raw transcript has not been cleaned" },
      step_count: 1,
      invocations: 1,
    });

    const state = await orchestrator.run("case-crash");

    expect(state.runId).toBe("run-crashed");
    expect(state.outcome).toBe("completed");
    expect(state.completedActions).toEqual(["cleanup", "summarize", "validate", "notify"]);
    expect((await orchestrator.store.getCheckpoint("case-crash"))?.invocations).toBe(2);
  });

  test("starts a fresh run after a terminal one", async () => {
    harness = await createHarness();
    const { orchestrator } = harness;
    await openCase(harness, "case-again");
    const first = await orchestrator.run("case-again");

    const second = await orchestrator.run("case-again");

    expect(second.runId).not.toBe(first.runId);
    expect(second.steps).toBe(1);
    expect(second.completedActions).toEqual([]);
    expect(second.messages).toEqual([
      DEFAULT_SEED_MESSAGE,
      "[ORCHESTRATOR] Next: complete | All steps done",
      "[ORCHESTRATOR] Workflow complete",
    ]);
    const checkpoint = await orchestrator.store.getCheckpoint("case-again");
    expect(checkpoint?.run_number).toBe(2);
    expect(checkpoint?.invocations).toBe(2);
    expect(harness.summarizer.calls).toBe(1);
  });

  test("a storage failure ends the run and keeps the last committed step", async () => {
    harness = await createHarness();
    const { orchestrator } = harness;
    await openCase(harness, "case-disk");
    const upsert = vi.spyOn(orchestrator.store, "upsertSummary")
      .mockRejectedValueOnce(new PersistenceError("summaries", "disk full"));

    await expect(orchestrator.run("case-disk")).rejects.toBeInstanceOf(PersistenceError);

    const checkpoint = await orchestrator.store.getCheckpoint("case-disk");
    expect(checkpoint?.phase).toBe("executing");
    expect(checkpoint?.current_action).toBe("summarize");
    expect(checkpoint?.completed_actions).toEqual(["cleanup"]);
    expect(await statusLabels("case-disk")).toEqual(["CREATED", "CLEANED"]);
    expect(await orchestrator.store.getSummary("case-disk")).toBeNull();
    expect(orchestrator.engine.isRunning("case-disk")).toBe(false);

    upsert.mockRestore();
    const state = await orchestrator.run("case-disk");

    expect(state.outcome).toBe("completed");
    expect(state.completedActions).toEqual(["cleanup", "summarize", "validate", "notify"]);
  });
});
