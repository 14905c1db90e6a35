import { z } from 'zod';
import { ConfigError } from './errors';
import { LOG_LEVELS, type LogLevel } from './utils/logger';

export const DEFAULT_STORE_DIR = '.varkeep';

const configSchema = z.object({
  storeDir: z.string().min(1, 'storeDir must not be empty').default(DEFAULT_STORE_DIR),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type VarkeepConfig = z.infer<typeof configSchema>;

export interface ConfigOverrides {
  storeDir?: string;
  logLevel?: LogLevel | string;
}

/**
 * Resolves the runtime config: explicit overrides (CLI flags) win over
 * `VARKEEP_HOME` / `VARKEEP_LOG_LEVEL`, which win over the defaults.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): VarkeepConfig {
  const result = configSchema.safeParse({
    storeDir: overrides.storeDir ?? (env.VARKEEP_HOME || undefined),
    logLevel: overrides.logLevel ?? (env.VARKEEP_LOG_LEVEL || undefined),
  });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}
