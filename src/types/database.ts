/** System fields automatically added to every record */
export interface SystemFields {
  _id: string;
  _created_at: string;
  _updated_at: string;
  _version: number;
}

/** A stored record: collection fields + system fields */
export type StoredRecord = SystemFields & { [key: string]: unknown };

/** Plain field data passed to create/update */
export type RecordData = { [key: string]: unknown };

/** Write operations recorded in the WAL */
export type DbOperation = "create" | "update" | "delete";

/** Write-ahead log entry */
export interface WalEntry {
  operation_id: string;
  transaction_id: string | null;
  operation: DbOperation;
  collection: string;
  record_id: string;
  previous_state: StoredRecord | null;
  new_state: StoredRecord | null;
  timestamp: string;
}

/** A field of a collection definition */
export interface FieldDefinition {
  name: string;
  /** Value used when a create omits the field (cloned per record) */
  default?: unknown;
  unique?: boolean;
  indexed?: boolean;
  immutable?: boolean;
}

/** Static description of one collection */
export interface CollectionDefinition {
  /** Plural directory name, e.g. "cases" */
  name: string;
  /** Record file prefix, e.g. "case" */
  prefix: string;
  fields: FieldDefinition[];
}

/** In-memory index: field value → array of record IDs */
export type FieldIndex = Map<string, string[]>;

/** Collection-level index map: field name → index */
export type CollectionIndexes = Map<string, FieldIndex>;

/** Persisted index file format */
export interface PersistedIndex {
  count: number;
  indexes: {
    [fieldName: string]: {
      [value: string]: string[];
    };
  };
}

/** Query filters: field name → expected value */
export interface QueryFilters {
  [field: string]: unknown;
}

/** Query options for list operations */
export interface QueryOptions {
  filters?: QueryFilters;
  sort_by?: string;
  sort_order?: "asc" | "desc";
  limit?: number;
  offset?: number;
}

/** Pagination metadata returned with list results */
export interface PaginationMeta {
  total: number;
  limit: number;
  offset: number;
  has_more: boolean;
}
