/**
 * Transaction — stages writes in memory and commits them together.
 *
 * Reads inside the transaction see its own staged writes. Nothing touches
 * disk until `commit`, which takes every involved collection lock (in name
 * order), re-checks versions and unique fields, then applies each change
 * through the WAL. A failure part-way reverts the changes already applied.
 */

import { randomUUID } from "node:crypto";
import type { QueryFilters, RecordData, StoredRecord } from "../types/database.ts";
import type { Collection, RecordChange } from "./collection.ts";
import { PersistenceError, UniqueConstraintError, describeError } from "./errors.ts";

/** Read/write surface shared by the engine and open transactions */
export interface DataAccess {
  create(collection: string, data: RecordData): Promise<StoredRecord>;
  read(collection: string, id: string): Promise<StoredRecord | null>;
  find(collection: string, filters?: QueryFilters): Promise<StoredRecord[]>;
  findOne(collection: string, filters: QueryFilters): Promise<StoredRecord | null>;
  update(collection: string, id: string, data: RecordData): Promise<StoredRecord | null>;
  delete(collection: string, id: string): Promise<boolean>;
}

type TransactionState = "open" | "committed" | "discarded";

export class Transaction implements DataAccess {
  readonly id = randomUUID();
  private staged = new Map<string, Map<string, RecordChange>>();
  private state: TransactionState = "open";
  private resolve: (name: string) => Collection;

  constructor(resolve: (name: string) => Collection) {
    this.resolve = resolve;
  }

  async create(collection: string, data: RecordData): Promise<StoredRecord> {
    const record = this.resolve(collection).build(data);
    this.stage(collection, { id: record._id, previous: null, next: record });
    return record;
  }

  async read(collection: string, id: string): Promise<StoredRecord | null> {
    this.assertOpen();
    const change = this.staged.get(collection)?.get(id);
    if (change) return change.next;
    return this.resolve(collection).read(id);
  }

  async find(collection: string, filters: QueryFilters = {}): Promise<StoredRecord[]> {
    this.assertOpen();
    const onDisk = await this.resolve(collection).find(filters);
    const changes = this.staged.get(collection);
    if (!changes) return onDisk;

    const visible = onDisk.filter((r) => !changes.has(r._id));
    for (const change of changes.values()) {
      if (change.next && matches(change.next, filters)) visible.push(change.next);
    }
    return visible.sort((a, b) => a._created_at.localeCompare(b._created_at));
  }

  async findOne(collection: string, filters: QueryFilters): Promise<StoredRecord | null> {
    const [first] = await this.find(collection, filters);
    return first ?? null;
  }

  async update(collection: string, id: string, data: RecordData): Promise<StoredRecord | null> {
    const current = await this.read(collection, id);
    if (!current) return null;

    const next = this.resolve(collection).merge(current, data);
    this.stage(collection, { id, previous: this.diskState(collection, id, current), next });
    return next;
  }

  async delete(collection: string, id: string): Promise<boolean> {
    const current = await this.read(collection, id);
    if (!current) return false;

    this.stage(collection, { id, previous: this.diskState(collection, id, current), next: null });
    return true;
  }

  /** Number of records this transaction would write */
  get size(): number {
    let total = 0;
    for (const changes of this.staged.values()) total += changes.size;
    return total;
  }

  /** Apply every staged change, or none of them */
  async commit(): Promise<void> {
    this.assertOpen();
    this.state = "committed";

    const names = Array.from(this.staged.keys()).sort();
    await this.lockAll(names, async () => {
      const plan: Array<{ collection: Collection; change: RecordChange }> = [];
      for (const name of names) {
        const collection = this.resolve(name);
        const changes = Array.from(this.staged.get(name)?.values() ?? []);
        assertStagedUnique(collection, changes);
        for (const change of changes) {
          if (!change.previous && !change.next) continue; // created then deleted
          await this.verify(collection, change);
          plan.push({ collection, change });
        }
      }

      const applied: typeof plan = [];
      try {
        for (const step of plan) {
          await step.collection.applyChange(step.change, this.id);
          applied.push(step);
        }
      } catch (err) {
        await this.revert(applied);
        throw err instanceof PersistenceError
          ? err
          : new PersistenceError("transaction", describeError(err), { cause: err });
      }
    });
  }

  /** Drop every staged change */
  discard(): void {
    this.staged.clear();
    this.state = "discarded";
  }

  // --- Private helpers ---

  private stage(collection: string, change: RecordChange): void {
    this.assertOpen();
    let changes = this.staged.get(collection);
    if (!changes) {
      changes = new Map();
      this.staged.set(collection, changes);
    }
    changes.set(change.id, change);
  }

  /** The on-disk version a staged change started from */
  private diskState(collection: string, id: string, current: StoredRecord): StoredRecord | null {
    const earlier = this.staged.get(collection)?.get(id);
    return earlier ? earlier.previous : current;
  }

  /** Reject commits whose starting point moved underneath them */
  private async verify(collection: Collection, change: RecordChange): Promise<void> {
    if (change.previous) {
      const onDisk = await collection.read(change.id);
      if (!onDisk || onDisk._version !== change.previous._version) {
        throw new PersistenceError(
          collection.name,
          `record "${change.id}" was modified concurrently`,
        );
      }
    }
    if (change.next) {
      await collection.enforceUniqueness(change.next, change.id);
    }
  }

  private async revert(applied: Array<{ collection: Collection; change: RecordChange }>): Promise<void> {
    for (const { collection, change } of [...applied].reverse()) {
      try {
        await collection.revertChange(change);
      } catch (err) {
        console.error(
          `[db] Rollback of ${collection.name}/${change.id} in transaction ${this.id} failed: ${describeError(err)}`,
        );
      }
    }
  }

  private async lockAll(names: string[], fn: () => Promise<void>): Promise<void> {
    const [first, ...rest] = names;
    if (first === undefined) return fn();
    return this.resolve(first).withLock(() => this.lockAll(rest, fn));
  }

  private assertOpen(): void {
    if (this.state !== "open") {
      throw new Error(`Transaction ${this.id} is already ${this.state}`);
    }
  }
}

/** Two staged records in one commit may not share a unique value */
function assertStagedUnique(collection: Collection, changes: RecordChange[]): void {
  for (const field of collection.definition.fields.filter((f) => f.unique)) {
    const seen = new Set<string>();
    for (const change of changes) {
      const value = change.next?.[field.name];
      if (value === undefined || value === null) continue;
      const key = String(value);
      if (seen.has(key)) throw new UniqueConstraintError(collection.name, field.name, value);
      seen.add(key);
    }
  }
}

function matches(record: StoredRecord, filters: QueryFilters): boolean {
  return Object.entries(filters).every(([field, value]) => record[field] === value);
}
