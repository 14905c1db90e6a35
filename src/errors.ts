import type { ImportSummary } from './types';

/**
 * Base class for every error this package raises on purpose.
 * `key` names the variable (or import file) the error is about.
 */
export class VariableError extends Error {
  constructor(
    message: string,
    readonly key: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends VariableError {
  constructor(key: string) {
    super(`Variable "${key}" does not exist`, key);
  }
}

export class DecodeError extends VariableError {
  constructor(key: string, reason: string, cause?: unknown) {
    super(`Cannot decode "${key}": ${reason}`, key, { cause });
  }
}

/**
 * Raised by a `restrict` import after the batch has run.
 * Non-colliding keys are already written when this is thrown.
 */
export class ConflictError extends VariableError {
  readonly keys: string[];
  readonly summary: ImportSummary;

  constructor(summary: ImportSummary) {
    const keys = [...summary.rejected];
    super(`Failed. These keys already exist: ${keys.join(', ')}`, keys.join(','));
    this.keys = keys;
    this.summary = summary;
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}
