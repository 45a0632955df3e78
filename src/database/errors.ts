/** Storage-level errors shared by collections, transactions and the engine */

/** A read or write against the data directory failed */
export class PersistenceError extends Error {
  readonly code = "persistence_error";
  readonly collection: string;

  constructor(collection: string, message: string, options?: { cause?: unknown }) {
    super(`Persistence failure in "${collection}": ${message}`, options);
    this.name = "PersistenceError";
    this.collection = collection;
  }
}

export class UniqueConstraintError extends Error {
  readonly code = "unique_violation";
  readonly field: string;
  readonly value: unknown;

  constructor(collection: string, field: string, value: unknown) {
    super(
      `Unique constraint violation in "${collection}": field "${field}" with value "${String(value)}" already exists`,
    );
    this.name = "UniqueConstraintError";
    this.field = field;
    this.value = value;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
