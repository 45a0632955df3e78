import { describe, expect, test, beforeEach, afterEach, vi } from "vitest";
import { rm, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import { DatabaseEngine } from "../engine.ts";
import { Collection, type RecordChange } from "../collection.ts";
import { WriteAheadLog } from "../wal.ts";
import { PersistenceError, UniqueConstraintError } from "../errors.ts";

let testDir: string;
let db: DatabaseEngine;

const newCase = (caseId: string) => ({
  case_id: caseId,
  patient_id: "patient-1",
  doctor_id: "doctor-1",
});

beforeEach(async () => {
  testDir = join(tmpdir(), `caseflow-db-test-${randomUUID()}`);
  await mkdir(testDir, { recursive: true });

  db = new DatabaseEngine(testDir);
  await db.init();
});

afterEach(async () => {
  vi.restoreAllMocks();
  await db.shutdown();
  await rm(testDir, { recursive: true, force: true });
});

describe("DatabaseEngine", () => {
  test("creates a record with system fields and defaults", async () => {
    const record = await db.create("cases", newCase("case-1"));

    expect(record._id).toBeDefined();
    expect(record._created_at).toBeDefined();
    expect(record._version).toBe(1);
    expect(record.case_id).toBe("case-1");
    expect(record.specialty).toBe("General"); // default value
    expect(record.raw_transcript).toBeNull();
    expect(record.cleaned_transcript).toBeNull();
  });

  test("reads a record by ID", async () => {
    const created = await db.create("cases", newCase("case-read"));
    const found = await db.read("cases", created._id);

    expect(found?._id).toBe(created._id);
    expect(found?.case_id).toBe("case-read");
  });

  test("returns null for non-existent record", async () => {
    expect(await db.read("cases", "non-existent-id")).toBeNull();
  });

  test("lists records with pagination", async () => {
    await db.create("cases", newCase("case-a"));
    await db.create("cases", newCase("case-b"));
    await db.create("cases", newCase("case-c"));

    const result = await db.list("cases", { limit: 2 });

    expect(result.data).toHaveLength(2);
    expect(result.pagination.total).toBe(3);
    expect(result.pagination.has_more).toBe(true);
  });

  test("sorts numeric fields numerically", async () => {
    for (const seq of [10, 2, 1]) {
      await db.create("statuses", { case_id: "case-sort", status: "CREATED", seq });
    }

    const result = await db.list("statuses", { sort_by: "seq", sort_order: "asc" });
    expect(result.data.map((r) => r.seq)).toEqual([1, 2, 10]);
  });

  test("updates a record and bumps its version", async () => {
    const created = await db.create("cases", newCase("case-update"));
    const updated = await db.update("cases", created._id, { raw_transcript: "Patient reports chest pain." });

    expect(updated?.raw_transcript).toBe("Patient reports chest pain.");
    expect(updated?._version).toBe(2);
  });

  test("ignores writes to immutable fields", async () => {
    const created = await db.create("cases", newCase("case-fixed"));
    const updated = await db.update("cases", created._id, { case_id: "case-other" });

    expect(updated?.case_id).toBe("case-fixed");
  });

  test("rejects a duplicate unique value", async () => {
    await db.create("cases", newCase("case-dup"));
    await expect(db.create("cases", newCase("case-dup"))).rejects.toBeInstanceOf(UniqueConstraintError);
  });

  test("deletes a record", async () => {
    const created = await db.create("cases", newCase("case-delete"));

    expect(await db.delete("cases", created._id)).toBe(true);
    expect(await db.read("cases", created._id)).toBeNull();
    expect(await db.delete("cases", created._id)).toBe(false);
    expect(db.count("cases")).toBe(0);
  });

  test("finds records through an index, oldest first", async () => {
    await db.create("logs", { case_id: "case-x", seq: 1, message: "first" });
    await db.create("logs", { case_id: "case-y", seq: 1, message: "other case" });
    await db.create("logs", { case_id: "case-x", seq: 2, message: "second" });

    const logs = await db.find("logs", { case_id: "case-x" });
    expect(logs.map((l) => l.message)).toEqual(["first", "second"]);
  });

  test("rebuilds indexes after a restart", async () => {
    await db.create("cases", newCase("case-persist"));
    await db.shutdown();

    db = new DatabaseEngine(testDir);
    await db.init();

    const found = await db.findOne("cases", { case_id: "case-persist" });
    expect(found?.case_id).toBe("case-persist");
    expect(db.count("cases")).toBe(1);
  });
});

describe("transactions", () => {
  test("commits every staged write together", async () => {
    await db.transaction(async (tx) => {
      await tx.create("cases", newCase("case-tx"));
      await tx.create("logs", { case_id: "case-tx", seq: 1, message: "opened" });
    });

    expect(await db.findOne("cases", { case_id: "case-tx" })).not.toBeNull();
    expect(await db.find("logs", { case_id: "case-tx" })).toHaveLength(1);
  });

  test("reads inside a transaction see its staged writes", async () => {
    await db.transaction(async (tx) => {
      const created = await tx.create("cases", newCase("case-staged"));
      const seen = await tx.findOne("cases", { case_id: "case-staged" });
      expect(seen?._id).toBe(created._id);

      await tx.update("cases", created._id, { specialty: "Cardiology" });
      expect((await tx.read("cases", created._id))?.specialty).toBe("Cardiology");

      // Not visible outside until commit
      expect(await db.findOne("cases", { case_id: "case-staged" })).toBeNull();
    });

    const committed = await db.findOne("cases", { case_id: "case-staged" });
    expect(committed?.specialty).toBe("Cardiology");
    expect(committed?._version).toBe(2);
  });

  test("writes nothing when the body throws", async () => {
    await expect(
      db.transaction(async (tx) => {
        await tx.create("cases", newCase("case-abandoned"));
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(await db.findOne("cases", { case_id: "case-abandoned" })).toBeNull();
    expect(db.count("cases")).toBe(0);
  });

  test("rejects two staged records sharing a unique value", async () => {
    await expect(
      db.transaction(async (tx) => {
        await tx.create("cases", newCase("case-twice"));
        await tx.create("cases", newCase("case-twice"));
      }),
    ).rejects.toBeInstanceOf(UniqueConstraintError);

    expect(db.count("cases")).toBe(0);
  });

  test("checks uniqueness before writing anything", async () => {
    await db.create("cases", newCase("case-taken"));

    await expect(
      db.transaction(async (tx) => {
        await tx.create("logs", { case_id: "case-taken", seq: 1, message: "should not land" });
        await tx.create("cases", newCase("case-taken"));
      }),
    ).rejects.toBeInstanceOf(UniqueConstraintError);

    expect(await db.find("logs", { case_id: "case-taken" })).toHaveLength(0);
  });

  test("rolls back applied writes when a later write fails", async () => {
    const original = Collection.prototype.applyChange;
    let calls = 0;
    vi.spyOn(Collection.prototype, "applyChange").mockImplementation(
      async function (this: Collection, change: RecordChange, transactionId?: string | null) {
        calls++;
        if (calls === 2) throw new Error("disk full");
        return original.call(this, change, transactionId);
      },
    );

    await expect(
      db.transaction(async (tx) => {
        await tx.create("cases", newCase("case-rollback"));
        await tx.create("logs", { case_id: "case-rollback", seq: 1, message: "fails" });
      }),
    ).rejects.toBeInstanceOf(PersistenceError);

    expect(await db.findOne("cases", { case_id: "case-rollback" })).toBeNull();
    expect(db.count("cases")).toBe(0);
    expect(db.count("logs")).toBe(0);
  });

  test("tags WAL entries with the transaction id", async () => {
    await db.transaction(async (tx) => {
      await tx.create("cases", newCase("case-wal"));
      await tx.create("logs", { case_id: "case-wal", seq: 1, message: "logged" });
    });

    const entries = await new WriteAheadLog(db.dbPath).readAll();
    const ids = new Set(entries.map((e) => e.transaction_id));

    expect(entries).toHaveLength(2);
    expect(ids.size).toBe(1);
    expect(entries[0]?.transaction_id).not.toBeNull();
    expect(entries.map((e) => e.operation)).toEqual(["create", "create"]);
  });
});
