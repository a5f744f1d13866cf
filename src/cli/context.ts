/**
 * @fileoverview Shared plumbing for CLI commands
 */

import type { EntityResolver } from '../api/resolver.js';
import { getErrorMessage } from '../utils/errors.js';
import { createError } from './errors.js';

/** Options every command accepts. */
export const GLOBAL_OPTIONS = {
  config: { type: 'string' },
  json: { type: 'boolean', default: false },
} as const;

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export interface CommandContext {
  /** Arguments after the command name. */
  args: string[];
  out: CliOutput;
  /** Load configuration (from `configPath` when given) and open a resolver. */
  openResolver(configPath: string | undefined): Promise<EntityResolver>;
}

/**
 * Run a `parseArgs` call, reporting malformed arguments as INVALID_ARGUMENT.
 */
export function parseCommandArgs<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

/**
 * Open a resolver, hand it to `run`, and always close it afterwards.
 */
export async function withResolver<T>(
  context: CommandContext,
  configPath: string | undefined,
  run: (resolver: EntityResolver) => Promise<T>,
): Promise<T> {
  const resolver = await context.openResolver(configPath);
  try {
    return await run(resolver);
  } finally {
    await resolver.close();
  }
}

export function printJson(out: CliOutput, value: unknown): void {
  out.log(JSON.stringify(value, null, 2));
}
