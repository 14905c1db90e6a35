import * as fs from 'node:fs';
import * as path from 'node:path';
import type { VariableStore } from './variableStore';

const INDEX_FILE = '_index.json';

/**
 * Persistent store that writes each variable as a file under a directory
 * (default: `.varkeep/`).
 *
 * Key → filename mapping: keys are base64url-encoded, so any key yields a safe,
 * reversible filename. An index file (`_index.json`) tracks the active keys.
 *
 * All operations are synchronous.
 */
export class FileVariableStore implements VariableStore {
  private readonly dir: string;
  private readonly indexPath: string;
  private index: Set<string>;

  constructor(storageDir = '.varkeep') {
    this.dir = storageDir;
    this.indexPath = path.join(storageDir, INDEX_FILE);
    this.index = new Set(this._loadIndex());
  }

  get(key: string): string | null {
    const file = this._keyToFile(key);
    if (!fs.existsSync(file)) return null;
    return fs.readFileSync(file, 'utf-8');
  }

  set(key: string, value: string): void {
    this._ensureDir();
    fs.writeFileSync(this._keyToFile(key), value, 'utf-8');
    if (!this.index.has(key)) {
      this.index.add(key);
      this._saveIndex();
    }
  }

  delete(key: string): boolean {
    const file = this._keyToFile(key);
    if (!fs.existsSync(file)) return false;
    fs.unlinkSync(file);
    this.index.delete(key);
    this._saveIndex();
    return true;
  }

  list(): string[] {
    return Array.from(this.index);
  }

  // ─── Private helpers ────────────────────────────────────────────────────

  private _keyToFile(key: string): string {
    const safe = Buffer.from(key).toString('base64url');
    return path.join(this.dir, `${safe}.var`);
  }

  private _ensureDir(): void {
    if (!fs.existsSync(this.dir)) {
      fs.mkdirSync(this.dir, { recursive: true });
    }
  }

  private _loadIndex(): string[] {
    if (!fs.existsSync(this.indexPath)) return [];
    const raw = fs.readFileSync(this.indexPath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new Error(`FileVariableStore: index ${this.indexPath} is not valid JSON`, {
        cause: err,
      });
    }
    if (!Array.isArray(parsed) || !parsed.every((k): k is string => typeof k === 'string')) {
      throw new Error(`FileVariableStore: index ${this.indexPath} must be an array of keys`);
    }
    return parsed;
  }

  private _saveIndex(): void {
    this._ensureDir();
    fs.writeFileSync(this.indexPath, JSON.stringify(Array.from(this.index)), 'utf-8');
  }
}
