import { Chalk, type ChalkInstance } from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Force colours on or off. Defaults to chalk's terminal detection. */
  color?: boolean;
  /** Diagnostic sink, stderr by default. */
  write?: (line: string) => void;
}

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

/**
 * Leveled diagnostics for the CLI. Command results (values, key lists, exports)
 * never go through here; they are written to stdout by the command itself.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = RANK[options.level ?? 'info'];
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const paint: ChalkInstance =
    options.color === undefined ? new Chalk() : new Chalk({ level: options.color ? 1 : 0 });

  const emit = (level: Exclude<LogLevel, 'silent'>, line: string) => {
    if (RANK[level] >= threshold) write(line);
  };

  return {
    debug: (message) => emit('debug', paint.dim(message)),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', paint.yellow(`Warning: ${message}`)),
    error: (message) => emit('error', paint.red(`Error: ${message}`)),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
