/**
 * Core types shared by the codec, stores, importer and exporter.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export const CONFLICT_POLICIES = ['overwrite', 'ignore', 'restrict'] as const;

/**
 * How an import treats a key that already exists in the store.
 *
 * - `'overwrite'` (default): replace the stored value.
 * - `'ignore'`: keep the stored value, silently.
 * - `'restrict'`: keep the stored value and fail the import with a ConflictError
 *   once every non-colliding key has been written.
 */
export type ConflictPolicy = (typeof CONFLICT_POLICIES)[number];

export const DEFAULT_CONFLICT_POLICY: ConflictPolicy = 'overwrite';

export interface ImportEntry {
  key: string;
  value: JsonValue;
}

/** Ordered pairs; input order is processing order. */
export type ImportBatch = ImportEntry[];

export type ImportOutcome = 'added' | 'overwritten' | 'skipped' | 'rejected' | 'failed';

export interface ImportRecord {
  key: string;
  outcome: ImportOutcome;
  /** Only set for `failed` records. */
  error?: string;
}

export interface ImportSummary {
  policy: ConflictPolicy;
  /** One record per batch entry, in input order. */
  records: ImportRecord[];
  added: string[];
  overwritten: string[];
  skipped: string[];
  rejected: string[];
  failed: string[];
}

export interface SetOptions {
  /** Store the value as JSON text even when it is a string. */
  serializeJson?: boolean;
}

export interface GetOptions {
  /** Parse the stored text as JSON before returning it. */
  deserializeJson?: boolean;
  /** Returned instead of throwing NotFoundError when the key is absent. */
  defaultValue?: JsonValue;
}
