/**
 * Write-ahead log. One JSON file per write, written before the record file
 * changes and carrying both the previous and the new state. Writes staged by
 * a transaction share its `transaction_id`.
 */

import { mkdir, writeFile, readdir, readFile, unlink } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import { isMissingFile } from "./errors.ts";
import type { DbOperation, StoredRecord, WalEntry } from "../types/database.ts";

const DEFAULT_RETENTION_DAYS = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

export class WriteAheadLog {
  private logDir: string;
  private retentionDays: number;

  constructor(dbPath: string, retentionDays = DEFAULT_RETENTION_DAYS) {
    this.logDir = join(dbPath, "_log");
    this.retentionDays = retentionDays;
  }

  async init(): Promise<void> {
    await mkdir(this.logDir, { recursive: true });
  }

  /** Record a write before it is applied; returns the operation id */
  async log(
    operation: DbOperation,
    collection: string,
    recordId: string,
    previousState: StoredRecord | null,
    newState: StoredRecord | null,
    transactionId: string | null = null,
  ): Promise<string> {
    const entry: WalEntry = {
      operation_id: randomUUID(),
      transaction_id: transactionId,
      operation,
      collection,
      record_id: recordId,
      previous_state: previousState,
      new_state: newState,
      timestamp: new Date().toISOString(),
    };

    // Timestamp first so a plain sort of the file names is write order
    const stamp = entry.timestamp.replace(/[:.]/g, "-");
    const filename = `${stamp}-${operation}-${collection}-${recordId}-${entry.operation_id.slice(0, 8)}.json`;
    await writeFile(join(this.logDir, filename), JSON.stringify(entry, null, 2));
    return entry.operation_id;
  }

  /** Every entry in write order */
  async readAll(): Promise<WalEntry[]> {
    return (await this.entries()).map(({ entry }) => entry);
  }

  /** Delete entries older than the retention period; returns how many went */
  async cleanup(): Promise<number> {
    const cutoff = Date.now() - this.retentionDays * DAY_MS;
    let removed = 0;
    for (const { file, entry } of await this.entries()) {
      if (new Date(entry.timestamp).getTime() >= cutoff) continue;
      await unlink(join(this.logDir, file));
      removed++;
    }
    return removed;
  }

  private async entries(): Promise<Array<{ file: string; entry: WalEntry }>> {
    let files: string[];
    try {
      files = await readdir(this.logDir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    const result: Array<{ file: string; entry: WalEntry }> = [];
    for (const file of files.filter((f) => f.endsWith(".json")).sort()) {
      const entry = JSON.parse(await readFile(join(this.logDir, file), "utf-8")) as WalEntry;
      result.push({ file, entry });
    }
    return result;
  }
}
