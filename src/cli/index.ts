import { Command, Option } from 'commander';
import { type VarkeepConfig, loadConfig } from '../config';
import { ConfigError, ConflictError, VariableError } from '../errors';
import { decodeValue, stringifyCanonical } from '../modules/codec';
import { countWritten } from '../modules/importer';
import { FileVariableStore } from '../modules/store/fileVariableStore';
import type { VariableStore } from '../modules/store/variableStore';
import { Variables } from '../modules/variables';
import { CONFLICT_POLICIES, type ConflictPolicy, DEFAULT_CONFLICT_POLICY, type ImportSummary } from '../types';
import { LOG_LEVELS, type Logger, createLogger } from '../utils/logger';

export const VERSION = '0.1.0';

export interface CliContext {
  /** Result sink, stdout by default. Receives whole chunks including newlines. */
  stdout?: (text: string) => void;
  /** Diagnostic sink, one line per call, stderr by default. */
  stderr?: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  color?: boolean;
  setExitCode?: (code: number) => void;
  /** Builds the store from the resolved config. Defaults to a FileVariableStore. */
  createStore?: (config: VarkeepConfig) => VariableStore;
}

interface Session {
  variables: Variables;
  logger: Logger;
}

type GlobalOptions = { storeDir?: string; logLevel?: string };

/**
 * Builds the `varkeep` program. Nothing here touches process state beyond the
 * defaults of `context`, so tests can run commands in-process:
 *
 * @example
 * await createProgram({ stdout: (t) => chunks.push(t) })
 *   .parseAsync(['variables', 'get', 'foo'], { from: 'user' });
 */
export function createProgram(context: CliContext = {}): Command {
  const out =
    context.stdout ??
    ((text: string) => {
      process.stdout.write(text);
    });
  const setExitCode =
    context.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const createStore =
    context.createStore ?? ((config: VarkeepConfig) => new FileVariableStore(config.storeDir));

  const program = new Command('varkeep')
    .description('Manage named variables in a persistent key-value store')
    .version(VERSION)
    .option('--store-dir <dir>', 'directory holding the variable store (env: VARKEEP_HOME)')
    .addOption(
      new Option('--log-level <level>', 'diagnostic verbosity (env: VARKEEP_LOG_LEVEL)').choices(
        LOG_LEVELS,
      ),
    );

  const run = async (action: (session: Session) => Promise<void>): Promise<void> => {
    let logger = createLogger({ color: context.color, write: context.stderr });
    try {
      const config = loadConfig(program.opts<GlobalOptions>(), context.env ?? process.env);
      logger = createLogger({ level: config.logLevel, color: context.color, write: context.stderr });
      await action({ logger, variables: new Variables({ store: createStore(config), logger }) });
    } catch (err) {
      if (err instanceof VariableError || err instanceof ConfigError) {
        logger.error(err.message);
        setExitCode(1);
        return;
      }
      throw err;
    }
  };

  program.addCommand(makeVariablesCommand({ run, out, setExitCode }));
  return program;
}

interface CommandDeps {
  run: (action: (session: Session) => Promise<void>) => Promise<void>;
  out: (text: string) => void;
  setExitCode: (code: number) => void;
}

function makeVariablesCommand(deps: CommandDeps): Command {
  const { run, out, setExitCode } = deps;
  const variables = new Command('variables').description('Manage variables');

  variables
    .command('set')
    .description('Set the value of a variable')
    .argument('<key>', 'variable key')
    .argument('<value>', 'variable value')
    .option('-j, --json', 'parse the value as JSON and store it as JSON', false)
    .action((key: string, value: string, opts: { json: boolean }) =>
      run(async ({ variables: vars, logger }) => {
        if (opts.json) {
          await vars.set(key, decodeValue(value, { key, deserializeJson: true }), {
            serializeJson: true,
          });
        } else {
          await vars.set(key, value);
        }
        logger.debug(`set ${key}`);
      }),
    );

  variables
    .command('get')
    .description('Print the value of a variable')
    .argument('<key>', 'variable key')
    .option('-d, --default <value>', 'printed when the variable does not exist')
    .option('-j, --json', 'deserialize the stored value as JSON', false)
    .action((key: string, opts: { default?: string; json: boolean }) =>
      run(async ({ variables: vars }) => {
        const value = await vars.get(key, {
          deserializeJson: opts.json,
          defaultValue: opts.default,
        });
        out(`${typeof value === 'string' ? value : stringifyCanonical(value)}\n`);
      }),
    );

  variables
    .command('list')
    .description('List variable keys')
    .action(() =>
      run(async ({ variables: vars }) => {
        for (const key of await vars.list()) {
          out(`${key}\n`);
        }
      }),
    );

  variables
    .command('delete')
    .description('Delete a variable')
    .argument('<key>', 'variable key')
    .action((key: string) =>
      run(async ({ variables: vars, logger }) => {
        if (await vars.delete(key)) {
          logger.info(`Deleted variable "${key}"`);
        } else {
          logger.warn(`Variable "${key}" does not exist`);
        }
      }),
    );

  variables
    .command('import')
    .description('Import variables from a JSON file')
    .argument('<file>', 'JSON object of key/value pairs')
    .addOption(
      new Option('-c, --conflict-disposition <policy>', 'what to do with keys that already exist')
        .choices(CONFLICT_POLICIES)
        .default(DEFAULT_CONFLICT_POLICY),
    )
    .action((file: string, opts: { conflictDisposition: ConflictPolicy }) =>
      run(async ({ variables: vars, logger }) => {
        let summary: ImportSummary;
        try {
          summary = await vars.importFile(file, opts.conflictDisposition);
        } catch (err) {
          if (err instanceof ConflictError) reportImport(err.summary, out, logger);
          throw err;
        }
        reportImport(summary, out, logger);
        if (summary.failed.length > 0) setExitCode(1);
      }),
    );

  variables
    .command('export')
    .description('Export all variables to a JSON file ("-" for stdout)')
    .argument('<file>', 'destination path')
    .action((file: string) =>
      run(async ({ variables: vars }) => {
        if (file === '-') {
          out(await vars.exportVariables());
          return;
        }
        const count = await vars.exportFile(file);
        out(`${count} variables successfully exported to ${file}\n`);
      }),
    );

  return variables;
}

function reportImport(summary: ImportSummary, out: (text: string) => void, logger: Logger): void {
  out(`${countWritten(summary)} of ${summary.records.length} variables successfully updated.\n`);
  if (summary.skipped.length > 0) {
    logger.info(`${summary.skipped.length} existing variable(s) left unchanged.`);
  }
  if (summary.failed.length > 0) {
    logger.error(`${summary.failed.length} variable(s) failed to be updated.`);
  }
}
