/**
 * Database engine — the main facade for all database operations.
 * Manages collections, locks, WAL, indexes and multi-record transactions.
 */

import { mkdir, writeFile, readFile } from "node:fs/promises";
import { join } from "node:path";
import type {
  CollectionDefinition,
  QueryFilters,
  QueryOptions,
  RecordData,
  StoredRecord,
} from "../types/database.ts";
import { Collection, type ListResult } from "./collection.ts";
import { COLLECTION_DEFINITIONS } from "./collections.ts";
import { KeyedLock } from "./lock.ts";
import { WriteAheadLog } from "./wal.ts";
import { IndexManager } from "./index-manager.ts";
import { Transaction, type DataAccess } from "./transaction.ts";
import { describeError, isMissingFile } from "./errors.ts";

const INDEX_PERSIST_INTERVAL_MS = 30_000;

interface DatabaseMeta {
  created_at: string;
  version: number;
}

export class DatabaseEngine implements DataAccess {
  readonly dbPath: string;
  private definitions: CollectionDefinition[];
  private collections = new Map<string, Collection>();
  private lock = new KeyedLock("collection");
  private wal: WriteAheadLog;
  private indexManager = new IndexManager();
  private persistTimer: ReturnType<typeof setInterval> | null = null;

  constructor(dataPath: string, definitions: CollectionDefinition[] = COLLECTION_DEFINITIONS) {
    this.dbPath = join(dataPath, "db");
    this.definitions = definitions;
    this.wal = new WriteAheadLog(this.dbPath);
  }

  /** Initialize the database: ensure dirs exist, load metadata, build indexes */
  async init(): Promise<void> {
    await mkdir(this.dbPath, { recursive: true });
    await this.wal.init();
    await this.ensureMeta();

    const removed = await this.wal.cleanup();
    if (removed > 0) {
      console.error(`[db] Pruned ${removed} expired WAL entries`);
    }

    for (const definition of this.definitions) {
      const collection = new Collection(
        definition,
        this.dbPath,
        this.lock,
        this.wal,
        this.indexManager,
      );
      await collection.init();
      this.collections.set(definition.name, collection);
    }

    this.startIndexPersistence();
  }

  /** List all collection names */
  getCollectionNames(): string[] {
    return Array.from(this.collections.keys());
  }

  /**
   * Run `fn` against a transaction and commit its writes together.
   * If `fn` throws, nothing it staged reaches disk.
   */
  async transaction<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
    const tx = new Transaction((name) => this.requireCollection(name));
    let result: T;
    try {
      result = await fn(tx);
    } catch (err) {
      tx.discard();
      throw err;
    }
    await tx.commit();
    return result;
  }

  /** Create a record in a collection */
  async create(collectionName: string, data: RecordData): Promise<StoredRecord> {
    return this.requireCollection(collectionName).create(data);
  }

  /** Read a record by ID */
  async read(collectionName: string, id: string): Promise<StoredRecord | null> {
    return this.requireCollection(collectionName).read(id);
  }

  /** List records with optional filtering, sorting, pagination */
  async list(collectionName: string, options?: QueryOptions): Promise<ListResult> {
    return this.requireCollection(collectionName).list(options);
  }

  /** All records matching the filters, oldest first */
  async find(collectionName: string, filters?: QueryFilters): Promise<StoredRecord[]> {
    return this.requireCollection(collectionName).find(filters);
  }

  async findOne(collectionName: string, filters: QueryFilters): Promise<StoredRecord | null> {
    return this.requireCollection(collectionName).findOne(filters);
  }

  /** Update a record */
  async update(
    collectionName: string,
    id: string,
    data: RecordData,
  ): Promise<StoredRecord | null> {
    return this.requireCollection(collectionName).update(id, data);
  }

  /** Delete a record */
  async delete(collectionName: string, id: string): Promise<boolean> {
    return this.requireCollection(collectionName).delete(id);
  }

  /** Number of records in a collection */
  count(collectionName: string): number {
    return this.requireCollection(collectionName).count();
  }

  /** Gracefully shut down: persist indexes, stop timers */
  async shutdown(): Promise<void> {
    if (this.persistTimer) {
      clearInterval(this.persistTimer);
      this.persistTimer = null;
    }
    await this.persistAllIndexes();
  }

  // --- Private helpers ---

  private requireCollection(name: string): Collection {
    const collection = this.collections.get(name);
    if (!collection) {
      throw new Error(
        `Collection "${name}" not found. Available: ${this.getCollectionNames().join(", ")}`,
      );
    }
    return collection;
  }

  private async ensureMeta(): Promise<void> {
    const metaPath = join(this.dbPath, "_meta.json");
    try {
      await readFile(metaPath, "utf-8");
    } catch (err) {
      if (!isMissingFile(err)) throw err;
      const meta: DatabaseMeta = {
        created_at: new Date().toISOString(),
        version: 1,
      };
      await writeFile(metaPath, JSON.stringify(meta, null, 2));
    }
  }

  private startIndexPersistence(): void {
    this.persistTimer = setInterval(() => {
      void this.persistAllIndexes();
    }, INDEX_PERSIST_INTERVAL_MS);

    // Don't prevent process exit
    this.persistTimer.unref();
  }

  private async persistAllIndexes(): Promise<void> {
    for (const [name] of this.collections) {
      try {
        await this.indexManager.persist(join(this.dbPath, name), name);
      } catch (err) {
        // Non-fatal: the next start rebuilds from the record files
        console.error(`[db] Index persistence for "${name}" failed: ${describeError(err)}`);
      }
    }
  }
}
