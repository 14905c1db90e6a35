import * as fs from 'node:fs';
import { DecodeError, NotFoundError, VariableError } from '../../errors';
import {
  type ConflictPolicy,
  DEFAULT_CONFLICT_POLICY,
  type GetOptions,
  type ImportBatch,
  type ImportSummary,
  type JsonValue,
  type SetOptions,
} from '../../types';
import { type Logger, silentLogger } from '../../utils/logger';
import { assertJsonValue, decodeValue, encodeJson, encodeValue } from '../codec';
import { ExportSerializer, renderExport } from '../exporter';
import { ImportMerger, parseImportDocument, variableKeySchema } from '../importer';
import type { VariableStore } from '../store/variableStore';

export interface VariablesConfig {
  store: VariableStore;
  logger?: Logger;
}

/**
 * Typed variable operations over one explicitly supplied store handle.
 *
 * @example
 * const vars = new Variables({ store: new FileVariableStore('.varkeep') });
 * await vars.set('retries', 3);
 * await vars.get('retries', { deserializeJson: true }); // 3
 */
export class Variables {
  private store: VariableStore;
  private logger: Logger;
  private merger: ImportMerger;
  private serializer: ExportSerializer;

  constructor(config: VariablesConfig) {
    this.store = config.store;
    this.logger = config.logger ?? silentLogger;
    this.merger = new ImportMerger({ store: this.store, logger: this.logger });
    this.serializer = new ExportSerializer(this.store);
  }

  async set(key: string, value: JsonValue, options: SetOptions = {}): Promise<void> {
    validateKey(key);
    const checked = assertJsonValue(key, value);
    await this.store.set(key, options.serializeJson ? encodeJson(checked) : encodeValue(checked));
  }

  /**
   * Reads a variable. Falls back to `defaultValue` when the key is absent;
   * without one, throws NotFoundError.
   */
  async get(key: string, options: GetOptions = {}): Promise<JsonValue> {
    const raw = await this.store.get(key);
    if (raw === null) {
      if (options.defaultValue !== undefined) return options.defaultValue;
      throw new NotFoundError(key);
    }
    return decodeValue(raw, { key, deserializeJson: options.deserializeJson });
  }

  async delete(key: string): Promise<boolean> {
    return await this.store.delete(key);
  }

  /** All keys, sorted. */
  async list(): Promise<string[]> {
    return [...(await this.store.list())].sort();
  }

  async importVariables(
    batch: ImportBatch,
    policy: ConflictPolicy = DEFAULT_CONFLICT_POLICY,
  ): Promise<ImportSummary> {
    return await this.merger.merge(batch, policy);
  }

  /**
   * Reads a JSON object from `filePath` and imports it. The file is read in one
   * call, so nothing stays open if decoding fails.
   */
  async importFile(
    filePath: string,
    policy: ConflictPolicy = DEFAULT_CONFLICT_POLICY,
  ): Promise<ImportSummary> {
    let text: string;
    try {
      text = await fs.promises.readFile(filePath, 'utf-8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new VariableError(`Cannot read import file: ${reason}`, filePath, { cause: err });
    }
    const batch = parseImportDocument(text, filePath);
    this.logger.debug(`read ${batch.length} variable(s) from ${filePath}`);
    return await this.importVariables(batch, policy);
  }

  async exportVariables(): Promise<string> {
    return await this.serializer.render();
  }

  /** Writes the export document to `filePath` and returns how many keys it holds. */
  async exportFile(filePath: string): Promise<number> {
    const entries = await this.serializer.collect();
    await fs.promises.writeFile(filePath, renderExport(entries), 'utf-8');
    return Object.keys(entries).length;
  }

  /**
   * Returns the ImportMerger for callers that want to drive it directly.
   */
  public importer(): ImportMerger {
    return this.merger;
  }

  public exporter(): ExportSerializer {
    return this.serializer;
  }
}

function validateKey(key: string): void {
  const result = variableKeySchema.safeParse(key);
  if (!result.success) {
    throw new DecodeError(key, result.error.issues.map((issue) => issue.message).join('; '));
  }
}
