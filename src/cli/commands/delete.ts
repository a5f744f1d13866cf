/**
 * @fileoverview Delete command - Remove every record of an entity
 */

import { parseArgs } from 'node:util';
import { GLOBAL_OPTIONS, parseCommandArgs, printJson, withResolver, type CommandContext } from '../context.js';
import { classifyError, createError } from '../errors.js';

export async function deleteCommand(context: CommandContext): Promise<void> {
  const { values, positionals } = parseCommandArgs(() =>
    parseArgs({
      args: context.args,
      options: { ...GLOBAL_OPTIONS },
      allowPositionals: true,
      strict: true,
    }),
  );

  const canonical = positionals.join(' ').trim();
  if (!canonical) {
    throw createError('INVALID_ARGUMENT', 'A canonical entity name is required. Usage: entity-resolver delete <canonical>');
  }

  const result = await withResolver(context, values.config, (resolver) => resolver.delete(canonical));
  if (!result.ok) {
    throw classifyError(result.error);
  }

  if (values.json === true) {
    printJson(context.out, result.value);
  } else {
    context.out.log(`Removed ${result.value.removed} records for "${result.value.canonical}"`);
  }
}
