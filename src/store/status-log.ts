/**
 * Append-only status history per case. "Current status" is the entry with
 * the highest `seq`, so entries written in the same millisecond still have
 * a total order.
 */

import type { DatabaseEngine } from "../database/engine.ts";
import type { DataAccess } from "../database/transaction.ts";
import { COLLECTIONS } from "../database/collections.ts";
import { PersistenceError } from "../database/errors.ts";
import {
  StatusEntrySchema,
  type StatusEntry,
  type StatusLabel,
} from "../types/case.ts";

/**
 * Hands out per-case sequence numbers for an append-only collection.
 * Seeded lazily from the highest committed `seq`; numbers taken by a
 * transaction that is later discarded leave a gap.
 */
export class SequenceCounter {
  private db: DatabaseEngine;
  private collection: string;
  private last = new Map<string, number>();
  private loading = new Map<string, Promise<number>>();

  constructor(db: DatabaseEngine, collection: string) {
    this.db = db;
    this.collection = collection;
  }

  async next(caseId: string): Promise<number> {
    if (!this.last.has(caseId)) await this.load(caseId);
    const value = (this.last.get(caseId) ?? 0) + 1;
    this.last.set(caseId, value);
    return value;
  }

  private async load(caseId: string): Promise<void> {
    let pending = this.loading.get(caseId);
    if (!pending) {
      pending = this.readMax(caseId);
      this.loading.set(caseId, pending);
    }
    try {
      const max = await pending;
      if (!this.last.has(caseId)) this.last.set(caseId, max);
    } finally {
      this.loading.delete(caseId);
    }
  }

  private async readMax(caseId: string): Promise<number> {
    const records = await this.db.find(this.collection, { case_id: caseId });
    let max = 0;
    for (const record of records) {
      if (typeof record.seq === "number" && record.seq > max) max = record.seq;
    }
    return max;
  }
}

export class StatusLog {
  private db: DatabaseEngine;
  private sequence: SequenceCounter;

  constructor(db: DatabaseEngine) {
    this.db = db;
    this.sequence = new SequenceCounter(db, COLLECTIONS.statuses);
  }

  /** Append a status entry, inside `access` when it is a transaction */
  async append(
    caseId: string,
    status: StatusLabel,
    access: DataAccess = this.db,
  ): Promise<StatusEntry> {
    const seq = await this.sequence.next(caseId);
    const record = await access.create(COLLECTIONS.statuses, {
      case_id: caseId,
      status,
      seq,
    });
    return toEntry(record);
  }

  /** Most recent entry, or null for a case without history */
  async latest(caseId: string, access: DataAccess = this.db): Promise<StatusEntry | null> {
    const entries = await this.history(caseId, access);
    return entries.at(-1) ?? null;
  }

  async current(caseId: string, access: DataAccess = this.db): Promise<StatusLabel | "UNKNOWN"> {
    return (await this.latest(caseId, access))?.status ?? "UNKNOWN";
  }

  /** Full history in `seq` order */
  async history(caseId: string, access: DataAccess = this.db): Promise<StatusEntry[]> {
    const records = await access.find(COLLECTIONS.statuses, { case_id: caseId });
    return records.map(toEntry).sort((a, b) => a.seq - b.seq);
  }
}

function toEntry(record: unknown): StatusEntry {
  const parsed = StatusEntrySchema.safeParse(record);
  if (!parsed.success) {
    throw new PersistenceError(COLLECTIONS.statuses, `invalid status entry: ${parsed.error.message}`);
  }
  return parsed.data;
}
