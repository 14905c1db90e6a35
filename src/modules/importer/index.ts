import { z } from 'zod';
import { ConflictError, DecodeError } from '../../errors';
import {
  type ConflictPolicy,
  DEFAULT_CONFLICT_POLICY,
  type ImportBatch,
  type ImportOutcome,
  type ImportSummary,
  type JsonValue,
} from '../../types';
import { type Logger, silentLogger } from '../../utils/logger';
import { assertJsonValue, encodeValue, hasUnsafeInteger, isJsonValue } from '../codec';
import type { VariableStore } from '../store/variableStore';

export const MAX_KEY_LENGTH = 250;

export const variableKeySchema = z
  .string()
  .min(1, 'key must not be empty')
  .max(MAX_KEY_LENGTH, `key must be at most ${MAX_KEY_LENGTH} characters`);

/**
 * Parses the text of an import file into a batch, preserving the order in which
 * keys appear. `source` names the file in errors.
 */
export function parseImportDocument(text: string, source: string): ImportBatch {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DecodeError(source, `malformed JSON (${reason})`, err);
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new DecodeError(source, 'top level must be a JSON object of key/value pairs');
  }

  // Object.entries keeps an own `__proto__` member that JSON.parse produced.
  const batch: ImportBatch = [];
  const issues: string[] = [];
  for (const [key, value] of Object.entries(parsed)) {
    const checkedKey = variableKeySchema.safeParse(key);
    if (!checkedKey.success) {
      issues.push(`"${key}": ${checkedKey.error.issues.map((issue) => issue.message).join(', ')}`);
    } else if (!isJsonValue(value)) {
      issues.push(`"${key}": value is not JSON-representable`);
    } else {
      batch.push({ key, value });
    }
  }
  if (issues.length > 0) {
    throw new DecodeError(source, issues.join('; '));
  }

  const lossy = batch.find((entry) => hasUnsafeInteger(entry.value));
  if (lossy) {
    throw new DecodeError(
      lossy.key,
      `${source} holds an integer outside the safe range; store it as a string to keep its digits`,
    );
  }

  return batch;
}

export function emptySummary(policy: ConflictPolicy): ImportSummary {
  return { policy, records: [], added: [], overwritten: [], skipped: [], rejected: [], failed: [] };
}

export interface ImportMergerConfig {
  store: VariableStore;
  logger?: Logger;
}

/**
 * Reconciles an incoming batch against the store, one key at a time.
 *
 * | existing? | policy    | action          |
 * |-----------|-----------|-----------------|
 * | no        | any       | write           |
 * | yes       | overwrite | write (replace) |
 * | yes       | ignore    | no-op           |
 * | yes       | restrict  | no-op + reject  |
 *
 * Each key's read-decide-write is an independent store call; nothing is locked
 * across the batch.
 */
export class ImportMerger {
  private store: VariableStore;
  private logger: Logger;

  constructor(config: ImportMergerConfig) {
    this.store = config.store;
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Applies `batch` under `policy` and returns the per-key classification.
   *
   * With `restrict`, a ConflictError listing every rejected key is thrown after
   * the whole batch has been processed, so all non-colliding keys are already
   * written when it surfaces. A key whose write throws is recorded as `failed`
   * and the batch carries on.
   */
  public async merge(
    batch: ImportBatch,
    policy: ConflictPolicy = DEFAULT_CONFLICT_POLICY,
  ): Promise<ImportSummary> {
    const summary = emptySummary(policy);

    for (const { key, value } of batch) {
      const existing = await this.store.get(key);
      const outcome = await this._apply(key, value, existing !== null, policy, summary);
      this.logger.debug(`import ${key}: ${outcome}`);
    }

    if (policy === 'restrict' && summary.rejected.length > 0) {
      throw new ConflictError(summary);
    }

    return summary;
  }

  private async _apply(
    key: string,
    value: JsonValue,
    exists: boolean,
    policy: ConflictPolicy,
    summary: ImportSummary,
  ): Promise<ImportOutcome> {
    if (exists && policy === 'ignore') {
      return this._record(summary, key, 'skipped');
    }
    if (exists && policy === 'restrict') {
      return this._record(summary, key, 'rejected');
    }

    try {
      const checkedKey = variableKeySchema.safeParse(key);
      if (!checkedKey.success) {
        throw new DecodeError(key, checkedKey.error.issues.map((i) => i.message).join('; '));
      }
      await this.store.set(key, encodeValue(assertJsonValue(key, value)));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`failed to import "${key}": ${message}`);
      return this._record(summary, key, 'failed', message);
    }

    return this._record(summary, key, exists ? 'overwritten' : 'added');
  }

  private _record(
    summary: ImportSummary,
    key: string,
    outcome: ImportOutcome,
    error?: string,
  ): ImportOutcome {
    summary.records.push(error === undefined ? { key, outcome } : { key, outcome, error });
    summary[outcome].push(key);
    return outcome;
  }
}

/** Number of keys the import wrote. */
export function countWritten(summary: ImportSummary): number {
  return summary.added.length + summary.overwritten.length;
}
