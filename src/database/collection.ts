/**
 * Collection — handles CRUD operations for a single record type.
 * Uses atomic file rename for writes and in-memory indexes for queries.
 */

import {
  mkdir,
  readFile,
  readdir,
  rename,
  writeFile,
  unlink,
} from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type {
  CollectionDefinition,
  PaginationMeta,
  QueryFilters,
  QueryOptions,
  RecordData,
  StoredRecord,
} from "../types/database.ts";
import type { KeyedLock } from "./lock.ts";
import type { WriteAheadLog } from "./wal.ts";
import type { IndexManager } from "./index-manager.ts";
import {
  PersistenceError,
  UniqueConstraintError,
  describeError,
  isMissingFile,
} from "./errors.ts";

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

export interface ListResult {
  data: StoredRecord[];
  pagination: PaginationMeta;
}

/** One record's transition inside a commit: create, update or delete */
export interface RecordChange {
  id: string;
  previous: StoredRecord | null;
  next: StoredRecord | null;
}

export class Collection {
  readonly name: string;
  readonly definition: CollectionDefinition;
  private dir: string;
  private lock: KeyedLock;
  private wal: WriteAheadLog;
  private indexManager: IndexManager;

  constructor(
    definition: CollectionDefinition,
    dbPath: string,
    lock: KeyedLock,
    wal: WriteAheadLog,
    indexManager: IndexManager,
  ) {
    this.name = definition.name;
    this.definition = definition;
    this.dir = join(dbPath, definition.name);
    this.lock = lock;
    this.wal = wal;
    this.indexManager = indexManager;
  }

  /** Ensure the collection directory exists and indexes are built */
  async init(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await this.indexManager.buildForCollection(this.dir, this.definition);
  }

  /** Create a new record */
  async create(data: RecordData): Promise<StoredRecord> {
    const record = this.build(data);
    await this.withLock(async () => {
      await this.enforceUniqueness(record);
      await this.applyChange({ id: record._id, previous: null, next: record });
    });
    return record;
  }

  /** Read a single record by ID */
  async read(id: string): Promise<StoredRecord | null> {
    let content: string;
    try {
      content = await readFile(join(this.dir, this.recordFile(id)), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new PersistenceError(this.name, describeError(err), { cause: err });
    }
    return this.applySchemaEvolution(this.parse(content, id));
  }

  /** List records with filtering, sorting, and pagination */
  async list(options: QueryOptions = {}): Promise<ListResult> {
    const limit = Math.min(options.limit ?? DEFAULT_LIMIT, MAX_LIMIT);
    const offset = options.offset ?? 0;

    let records = await this.find(options.filters ?? {});
    const total = records.length;

    if (options.sort_by) {
      records = this.applySort(records, options.sort_by, options.sort_order ?? "asc");
    }

    return {
      data: records.slice(offset, offset + limit),
      pagination: {
        total,
        limit,
        offset,
        has_more: offset + limit < total,
      },
    };
  }

  /** All records matching the filters, oldest first */
  async find(filters: QueryFilters = {}): Promise<StoredRecord[]> {
    const records = await this.candidates(filters);
    return this.linearFilter(records, filters).sort((a, b) =>
      a._created_at.localeCompare(b._created_at),
    );
  }

  /** First record matching the filters, or null */
  async findOne(filters: QueryFilters): Promise<StoredRecord | null> {
    const [first] = await this.find(filters);
    return first ?? null;
  }

  /** Update an existing record */
  async update(id: string, data: RecordData): Promise<StoredRecord | null> {
    return this.withLock(async () => {
      const existing = await this.read(id);
      if (!existing) return null;

      const updated = this.merge(existing, data);
      await this.enforceUniqueness(updated, id);
      await this.applyChange({ id, previous: existing, next: updated });
      return updated;
    });
  }

  /** Delete a record by ID */
  async delete(id: string): Promise<boolean> {
    return this.withLock(async () => {
      const existing = await this.read(id);
      if (!existing) return false;

      await this.applyChange({ id, previous: existing, next: null });
      return true;
    });
  }

  /** Record count according to the index manager */
  count(): number {
    return this.indexManager.getCount(this.name);
  }

  // --- Building blocks shared with transactions ---

  /** Build a new record with system fields and defaults */
  build(data: RecordData): StoredRecord {
    const now = new Date().toISOString();

    const record: StoredRecord = {
      _id: randomUUID(),
      _created_at: now,
      _updated_at: now,
      _version: 1,
    };

    for (const field of this.definition.fields) {
      if (field.name in data) {
        record[field.name] = data[field.name];
      } else if (field.default !== undefined) {
        record[field.name] = structuredClone(field.default);
      }
    }

    return record;
  }

  /** Apply an update, respecting immutable fields */
  merge(existing: StoredRecord, data: RecordData): StoredRecord {
    const updated: StoredRecord = { ...existing };
    const immutableFields = new Set(
      this.definition.fields.filter((f) => f.immutable).map((f) => f.name),
    );

    for (const [key, value] of Object.entries(data)) {
      if (immutableFields.has(key)) continue;
      if (key.startsWith("_")) continue; // System fields are immutable
      updated[key] = value;
    }

    updated._updated_at = new Date().toISOString();
    updated._version = existing._version + 1;
    return updated;
  }

  /** Reject a record whose unique fields collide with another record */
  async enforceUniqueness(record: StoredRecord, excludeId?: string): Promise<void> {
    for (const field of this.definition.fields.filter((f) => f.unique)) {
      const value = record[field.name];
      if (value === undefined || value === null) continue;

      const ids = this.indexManager.lookup(this.name, field.name, value) ?? [];
      if (ids.some((id) => id !== excludeId && id !== record._id)) {
        throw new UniqueConstraintError(this.name, field.name, value);
      }
    }
  }

  /**
   * Persist one change: WAL first, then the atomic write or unlink, then
   * the indexes. The caller must hold the collection lock.
   */
  async applyChange(change: RecordChange, transactionId: string | null = null): Promise<void> {
    const { id, previous, next } = change;
    const operation = !previous ? "create" : next ? "update" : "delete";

    try {
      await this.wal.log(operation, this.name, id, previous, next, transactionId);
      if (next) {
        await this.atomicWrite(this.recordFile(id), next);
      } else {
        await unlink(join(this.dir, this.recordFile(id)));
      }
    } catch (err) {
      throw new PersistenceError(this.name, describeError(err), { cause: err });
    }

    if (!previous && next) this.indexManager.onRecordCreated(this.name, next);
    else if (previous && next) this.indexManager.onRecordUpdated(this.name, previous, next);
    else if (previous) this.indexManager.onRecordDeleted(this.name, previous);
  }

  /** Undo a change applied by `applyChange` */
  async revertChange(change: RecordChange): Promise<void> {
    await this.applyChange({
      id: change.id,
      previous: change.next,
      next: change.previous,
    });
  }

  /** Run `fn` while holding this collection's lock */
  withLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.lock.withLock(this.name, randomUUID(), fn);
  }

  // --- Private helpers ---

  /** Lazy schema evolution: patch record to match current fields on read */
  private applySchemaEvolution(record: StoredRecord): StoredRecord {
    for (const field of this.definition.fields) {
      if (!(field.name in record)) {
        record[field.name] = field.default === undefined ? null : structuredClone(field.default);
      }
    }
    return record;
  }

  private parse(content: string, id: string): StoredRecord {
    try {
      return JSON.parse(content) as StoredRecord;
    } catch (err) {
      throw new PersistenceError(this.name, `record "${id}" is corrupt: ${describeError(err)}`);
    }
  }

  /** Write a record atomically using temp file + rename */
  private async atomicWrite(filename: string, record: StoredRecord): Promise<void> {
    const tempPath = join(this.dir, `${filename}.tmp`);
    const finalPath = join(this.dir, filename);

    await writeFile(tempPath, JSON.stringify(record, null, 2));
    await rename(tempPath, finalPath);
  }

  /** Convention: {prefix}-{id}.json */
  private recordFile(id: string): string {
    return `${this.definition.prefix}-${id}.json`;
  }

  /** Narrow the candidate set through the first indexed filter, if any */
  private async candidates(filters: QueryFilters): Promise<StoredRecord[]> {
    for (const [field, value] of Object.entries(filters)) {
      const ids = this.indexManager.lookup(this.name, field, value);
      if (ids === null) continue;

      const records: StoredRecord[] = [];
      for (const id of ids) {
        const record = await this.read(id);
        if (record) records.push(record);
      }
      return records;
    }
    return this.getAllRecords();
  }

  /** Read all records from disk */
  private async getAllRecords(): Promise<StoredRecord[]> {
    let files: string[];
    try {
      files = await readdir(this.dir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw new PersistenceError(this.name, describeError(err), { cause: err });
    }

    const records: StoredRecord[] = [];
    for (const file of files.filter((f) => f.endsWith(".json") && !f.startsWith("_"))) {
      const content = await readFile(join(this.dir, file), "utf-8");
      records.push(this.applySchemaEvolution(this.parse(content, file)));
    }
    return records;
  }

  private linearFilter(records: StoredRecord[], filters: QueryFilters): StoredRecord[] {
    const entries = Object.entries(filters);
    if (entries.length === 0) return records;
    return records.filter((record) =>
      entries.every(([field, value]) => record[field] === value),
    );
  }

  private applySort(
    records: StoredRecord[],
    sortBy: string,
    order: "asc" | "desc",
  ): StoredRecord[] {
    return [...records].sort((a, b) => {
      const aVal = a[sortBy];
      const bVal = b[sortBy];

      if (aVal === bVal) return 0;
      if (aVal === undefined || aVal === null) return 1;
      if (bVal === undefined || bVal === null) return -1;

      const comparison =
        typeof aVal === "number" && typeof bVal === "number"
          ? aVal - bVal
          : String(aVal).localeCompare(String(bVal));
      return order === "asc" ? comparison : -comparison;
    });
  }
}
