import type { JsonValue } from '../../types';
import { decodeRichest, stringifyCanonical } from '../codec';
import type { VariableStore } from '../store/variableStore';

/**
 * Renders the whole store as one JSON document.
 *
 * Keys are sorted lexically, each value is decoded to its richest form, and
 * the output always ends with a newline, so two exports of an unchanged store
 * are byte-identical. The store is only read.
 */
export class ExportSerializer {
  constructor(private store: VariableStore) {}

  /**
   * Reads every variable into a plain object whose keys are in sorted order.
   * Keys that vanish between list() and get() are left out.
   */
  public async collect(): Promise<Record<string, JsonValue>> {
    const keys = [...(await this.store.list())].sort();
    // No prototype, so a variable named `__proto__` is an ordinary member.
    const entries: Record<string, JsonValue> = Object.create(null);
    for (const key of keys) {
      const raw = await this.store.get(key);
      if (raw !== null) {
        entries[key] = decodeRichest(raw);
      }
    }
    return entries;
  }

  public async render(): Promise<string> {
    return renderExport(await this.collect());
  }
}

export function renderExport(entries: Record<string, JsonValue>): string {
  return `${stringifyCanonical(entries)}\n`;
}
