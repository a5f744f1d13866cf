/**
 * @fileoverview CLI dispatcher
 *
 * Commands:
 *   entity-resolver resolve <query> --groups <list>  - Resolve entities in a query
 *   entity-resolver sync <file>                      - Index entity snapshots
 *   entity-resolver delete <canonical>               - Remove an entity
 *   entity-resolver stats                            - Show index statistics
 *   entity-resolver inspect [--limit n]              - Show sample records
 */

import { createEntityResolver, type EntityResolver } from '../api/resolver.js';
import { loadConfig, type ResolverConfig } from '../config/index.js';
import { RESOLVER_VERSION } from '../version.js';
import { deleteCommand } from './commands/delete.js';
import { inspectCommand } from './commands/inspect.js';
import { resolveCommand } from './commands/resolve.js';
import { statsCommand } from './commands/stats.js';
import { syncCommand } from './commands/sync.js';
import type { CliOutput, CommandContext } from './context.js';
import { resolveDbPath } from './db_path.js';
import { classifyError, createError, formatError, formatErrorJson, getExitCode } from './errors.js';
import { getCommandHelp } from './help.js';

type Command = 'resolve' | 'sync' | 'delete' | 'stats' | 'inspect';

const COMMANDS: Record<Command, (context: CommandContext) => Promise<void>> = {
  resolve: resolveCommand,
  sync: syncCommand,
  delete: deleteCommand,
  stats: statsCommand,
  inspect: inspectCommand,
};

function isCommand(value: string): value is Command {
  return Object.hasOwn(COMMANDS, value);
}

export interface CliDependencies {
  out?: CliOutput;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  createResolver?: (config: ResolverConfig) => Promise<EntityResolver>;
}

const CONSOLE_OUTPUT: CliOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

/**
 * Run one CLI invocation and return its exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const out = deps.out ?? CONSOLE_OUTPUT;
  const env = deps.env ?? process.env;
  const cwd = deps.cwd ?? process.cwd();
  const createResolver = deps.createResolver ?? ((config: ResolverConfig) => createEntityResolver({ config }));
  const jsonMode = argv.includes('--json');

  const [first, ...rest] = argv;
  if (first === '--version' || first === '-v') {
    out.log(`entity-resolver ${RESOLVER_VERSION.string}`);
    return 0;
  }
  if (first === undefined || first === 'help' || first === '--help' || first === '-h') {
    out.log(getCommandHelp(first === 'help' ? rest[0] : undefined));
    return 0;
  }
  if (rest.includes('--help') || rest.includes('-h')) {
    out.log(getCommandHelp(first));
    return 0;
  }

  try {
    if (!isCommand(first)) {
      throw createError('INVALID_ARGUMENT', `Unknown command: ${first}`, { available: Object.keys(COMMANDS) });
    }
    await COMMANDS[first]({
      args: rest,
      out,
      openResolver: async (configPath) => {
        const config = loadConfig({ configPath, env });
        if (!config.ok) throw classifyError(config.error);
        return createResolver({ ...config.value, dbPath: resolveDbPath(config.value.dbPath, cwd) });
      },
    });
    return 0;
  } catch (error) {
    const cliError = classifyError(error);
    out.error(jsonMode ? formatErrorJson(cliError) : formatError(cliError));
    return getExitCode(cliError);
  }
}
