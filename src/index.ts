export { createProgram, type CliContext } from './cli';
export { type ConfigOverrides, DEFAULT_STORE_DIR, loadConfig, type VarkeepConfig } from './config';
export { ConfigError, ConflictError, DecodeError, NotFoundError, VariableError } from './errors';
export {
  assertJsonValue,
  decodeRichest,
  decodeValue,
  encodeJson,
  encodeValue,
  hasUnsafeInteger,
  isJsonValue,
  stringifyCanonical,
} from './modules/codec';
export { ExportSerializer, renderExport } from './modules/exporter';
export {
  countWritten,
  ImportMerger,
  type ImportMergerConfig,
  MAX_KEY_LENGTH,
  parseImportDocument,
} from './modules/importer';
export { FileVariableStore } from './modules/store/fileVariableStore';
export { InMemoryStore } from './modules/store/inMemoryStore';
export type { VariableStore } from './modules/store/variableStore';
export { Variables, type VariablesConfig } from './modules/variables';
export * from './types';
export { createLogger, LOG_LEVELS, type Logger, type LoggerOptions, type LogLevel } from './utils/logger';
