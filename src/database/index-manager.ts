/**
 * In-memory field indexes for the collections.
 *
 * Built on startup from the record files (or from `_index.json` when its
 * count still matches the files on disk), kept current on every write and
 * persisted periodically for the next warm start.
 */

import { readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describeError, isMissingFile } from "./errors.ts";
import type {
  CollectionDefinition,
  CollectionIndexes,
  PersistedIndex,
  StoredRecord,
} from "../types/database.ts";

const INDEX_FILE = "_index.json";

export class IndexManager {
  private indexes = new Map<string, CollectionIndexes>();
  private counts = new Map<string, number>();

  async buildForCollection(collectionDir: string, definition: CollectionDefinition): Promise<void> {
    const name = definition.name;
    const files = await listRecordFiles(collectionDir);

    const persisted = await readPersisted(collectionDir);
    if (persisted && persisted.count === files.length) {
      this.indexes.set(name, toIndexes(persisted));
      this.counts.set(name, persisted.count);
      return;
    }

    const indexes: CollectionIndexes = new Map();
    for (const field of definition.fields) {
      if (field.indexed || field.unique) indexes.set(field.name, new Map());
    }
    for (const file of files) {
      const record = JSON.parse(await readFile(join(collectionDir, file), "utf-8")) as StoredRecord;
      addToIndexes(indexes, record);
    }

    this.indexes.set(name, indexes);
    this.counts.set(name, files.length);
  }

  onRecordCreated(collection: string, record: StoredRecord): void {
    const indexes = this.indexes.get(collection);
    if (!indexes) return;

    addToIndexes(indexes, record);
    this.counts.set(collection, this.getCount(collection) + 1);
  }

  onRecordUpdated(collection: string, before: StoredRecord, after: StoredRecord): void {
    const indexes = this.indexes.get(collection);
    if (!indexes) return;

    removeFromIndexes(indexes, before);
    addToIndexes(indexes, after);
  }

  onRecordDeleted(collection: string, record: StoredRecord): void {
    const indexes = this.indexes.get(collection);
    if (!indexes) return;

    removeFromIndexes(indexes, record);
    this.counts.set(collection, Math.max(0, this.getCount(collection) - 1));
  }

  /** Record IDs with `field = value`; null when the field is not indexed */
  lookup(collection: string, field: string, value: unknown): string[] | null {
    const fieldIndex = this.indexes.get(collection)?.get(field);
    if (!fieldIndex) return null;
    return fieldIndex.get(String(value)) ?? [];
  }

  getCount(collection: string): number {
    return this.counts.get(collection) ?? 0;
  }

  async persist(collectionDir: string, collection: string): Promise<void> {
    const indexes = this.indexes.get(collection);
    if (!indexes) return;

    const persisted: PersistedIndex = { count: this.getCount(collection), indexes: {} };
    for (const [field, fieldIndex] of indexes) {
      persisted.indexes[field] = Object.fromEntries(fieldIndex);
    }
    await writeFile(join(collectionDir, INDEX_FILE), JSON.stringify(persisted, null, 2));
  }
}

async function listRecordFiles(collectionDir: string): Promise<string[]> {
  try {
    const files = await readdir(collectionDir);
    return files.filter((f) => f.endsWith(".json") && !f.startsWith("_")).sort();
  } catch (err) {
    if (isMissingFile(err)) return [];
    throw err;
  }
}

/** The persisted index, or null when absent or unreadable (it is rebuilt then) */
async function readPersisted(collectionDir: string): Promise<PersistedIndex | null> {
  let content: string;
  try {
    content = await readFile(join(collectionDir, INDEX_FILE), "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
  try {
    return JSON.parse(content) as PersistedIndex;
  } catch (err) {
    console.error(`[db] Ignoring corrupt ${INDEX_FILE} in ${collectionDir}: ${describeError(err)}`);
    return null;
  }
}

function toIndexes(persisted: PersistedIndex): CollectionIndexes {
  const indexes: CollectionIndexes = new Map();
  for (const [field, values] of Object.entries(persisted.indexes)) {
    indexes.set(field, new Map(Object.entries(values)));
  }
  return indexes;
}

function addToIndexes(indexes: CollectionIndexes, record: StoredRecord): void {
  for (const [field, fieldIndex] of indexes) {
    const value = record[field];
    if (value === undefined || value === null) continue;

    const key = String(value);
    const ids = fieldIndex.get(key) ?? [];
    ids.push(record._id);
    fieldIndex.set(key, ids);
  }
}

function removeFromIndexes(indexes: CollectionIndexes, record: StoredRecord): void {
  for (const [field, fieldIndex] of indexes) {
    const value = record[field];
    if (value === undefined || value === null) continue;

    const key = String(value);
    const remaining = (fieldIndex.get(key) ?? []).filter((id) => id !== record._id);
    if (remaining.length > 0) fieldIndex.set(key, remaining);
    else fieldIndex.delete(key);
  }
}
