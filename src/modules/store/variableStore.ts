/**
 * Key-value store the variable commands run against.
 *
 * Values are always text; the codec decides how typed values map onto it.
 * Supports both synchronous and asynchronous implementations. Use InMemoryStore
 * for tests and short-lived processes, FileVariableStore for values that must
 * survive restarts, or supply your own implementation backed by Redis, SQLite,
 * a secrets manager, etc.
 *
 * `get` returns null only when the key is absent; a stored `"null"` text is a value.
 */
export interface VariableStore {
  get(key: string): string | null | Promise<string | null>;
  set(key: string, value: string): void | Promise<void>;
  delete(key: string): boolean | Promise<boolean>;
  list(): string[] | Promise<string[]>;
}
