import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import { DatabaseEngine } from "../../database/engine.ts";
import { CaseStore } from "../case-store.ts";
import { StatusLog } from "../status-log.ts";
import type { CheckpointState } from "../../types/workflow.ts";

let dir: string;
let db: DatabaseEngine;
let store: CaseStore;

beforeEach(async () => {
  dir = join(tmpdir(), `caseflow-store-${randomUUID()}`);
  await mkdir(dir, { recursive: true });
  db = new DatabaseEngine(dir);
  await db.init();
  store = new CaseStore(db);
});

afterEach(async () => {
  await db.shutdown();
  await rm(dir, { recursive: true, force: true });
});

describe("StatusLog", () => {
  test("reports UNKNOWN for a case without history", async () => {
    expect(await store.statuses.current("case-none")).toBe("UNKNOWN");
    expect(await store.statuses.latest("case-none")).toBeNull();
  });

  test("orders entries by sequence number", async () => {
    await store.statuses.append("case-seq", "CREATED");
    await store.statuses.append("case-seq", "CLEANED");
    await store.statuses.append("case-seq", "SUMMARY_GENERATED");

    const history = await store.statuses.history("case-seq");
    expect(history.map((e) => e.seq)).toEqual([1, 2, 3]);
    expect(await store.statuses.current("case-seq")).toBe("SUMMARY_GENERATED");
  });

  test("continues numbering after a restart", async () => {
    await store.statuses.append("case-restart", "CREATED");
    await store.statuses.append("case-restart", "CLEANED");

    const fresh = new StatusLog(db);
    const entry = await fresh.append("case-restart", "VALIDATED");

    expect(entry.seq).toBe(3);
  });

  test("keeps numbers unique across concurrent appends", async () => {
    await Promise.all([
      store.statuses.append("case-burst", "CREATED"),
      store.statuses.append("case-burst", "CLEANED"),
      store.statuses.append("case-burst", "VALIDATED"),
    ]);

    const seqs = (await store.statuses.history("case-burst")).map((e) => e.seq);
    expect(seqs).toEqual([1, 2, 3]);
  });
});

describe("CaseStore", () => {
  test("upsertSummary creates once and then updates", async () => {
    await store.upsertSummary("case-s", { history: ["Fever"], final_status: "SUMMARY_GENERATED" });
    await store.upsertSummary("case-s", { final_status: "VALIDATED" });

    const summary = await store.getSummary("case-s");
    expect(summary?.history).toEqual(["Fever"]);
    expect(summary?.diagnosis).toEqual([]);
    expect(summary?.final_status).toBe("VALIDATED");
    expect(db.count("summaries")).toBe(1);
  });

  test("replaceMedications swaps the whole list", async () => {
    await store.replaceMedications("case-m", [
      { name: "Paracetamol", dose: "1 g", frequency: "Every 6 hours" },
      { name: "Ibuprofen", dose: "400 mg", frequency: "Twice daily" },
    ]);
    await store.replaceMedications("case-m", [
      { name: "Amoxicillin", dose: "500 mg", frequency: "Three times daily" },
    ]);

    expect(await store.getMedications("case-m")).toEqual([
      { name: "Amoxicillin", dose: "500 mg", frequency: "Three times daily" },
    ]);
  });

  test("saveCheckpoint overwrites the single checkpoint of a case", async () => {
    const state: CheckpointState = {
      case_id: "case-c",
      run_id: "run-1",
      run_number: 1,
      phase: "deciding",
      current_action: null,
      messages: ["[TRIGGER] Workflow started"],
      completed_actions: [],
      last_decision: null,
      step_count: 0,
      invocations: 1,
    };
    await store.saveCheckpoint(state);
    await store.saveCheckpoint({ ...state, phase: "completed", completed_actions: ["cleanup"] });

    const checkpoint = await store.getCheckpoint("case-c");
    expect(checkpoint?.phase).toBe("completed");
    expect(checkpoint?.completed_actions).toEqual(["cleanup"]);
    expect(db.count("checkpoints")).toBe(1);
  });

  test("appendLog numbers entries per case", async () => {
    await store.appendLog("case-l", "first", "INFO");
    await store.appendLog("case-other", "elsewhere", "INFO");
    await store.appendLog("case-l", "second", "STEP");

    const logs = await store.getLogs("case-l");
    expect(logs.map((l) => [l.seq, l.message, l.log_type])).toEqual([
      [1, "first", "INFO"],
      [2, "second", "STEP"],
    ]);
  });

  test("createCase writes the case, its status and its log together", async () => {
    const created = await store.createCase({
      caseId: "case-new",
      patientId: "patient-9",
      doctorId: "doctor-2",
      specialty: "Cardiology",
      rawTranscript: "Doctor: Any chest pain?",
    });

    expect(created.specialty).toBe("Cardiology");
    expect(await store.statuses.current("case-new")).toBe("CREATED");
    expect((await store.getLogs("case-new"))[0]?.message).toBe("Case created for patient patient-9 with transcript");
  });
});
