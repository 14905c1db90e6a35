import type { VariableStore } from './variableStore';

/**
 * Variable store that lives in the current process.
 *
 * Values are the encoded text the codec produces (`"42"`, `"null"`, a string
 * verbatim), never decoded values, so `get` returns `null` only for a key that
 * was never set or has been deleted. Used by tests and embedders that need no
 * persistence.
 *
 * @example
 * const store = new InMemoryStore({ greeting: 'hello', retries: '3' });
 * await new Variables({ store }).get('retries', { deserializeJson: true }); // 3
 */
export class InMemoryStore implements VariableStore {
  private variables = new Map<string, string>();

  /** `seed` maps keys to encoded text, as if each had been passed to `set`. */
  constructor(seed: Record<string, string> = {}) {
    this.restore(seed);
  }

  get(key: string): string | null {
    return this.variables.get(key) ?? null;
  }

  set(key: string, value: string): void {
    this.variables.set(key, value);
  }

  delete(key: string): boolean {
    return this.variables.delete(key);
  }

  /** Keys in insertion order; callers sort when they need to. */
  list(): string[] {
    return Array.from(this.variables.keys());
  }

  /**
   * Copy of every key and its encoded text, sorted by key. A key named
   * `__proto__` comes back as an own member.
   */
  snapshot(): Record<string, string> {
    const entries = [...this.variables].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries);
  }

  /** Replaces the whole contents with `seed`. */
  restore(seed: Record<string, string>): void {
    this.variables = new Map(Object.entries(seed));
  }
}
