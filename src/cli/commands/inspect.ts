/**
 * @fileoverview Inspect command - Show a sample of indexed records
 */

import { parseArgs } from 'node:util';
import { GLOBAL_OPTIONS, parseCommandArgs, printJson, withResolver, type CommandContext } from '../context.js';
import { createError } from '../errors.js';
import { formatTable } from '../progress.js';

export async function inspectCommand(context: CommandContext): Promise<void> {
  const { values } = parseCommandArgs(() =>
    parseArgs({
      args: context.args,
      options: { ...GLOBAL_OPTIONS, limit: { type: 'string', default: '5' } },
      allowPositionals: false,
      strict: true,
    }),
  );

  const limit = Number(values.limit ?? '5');
  if (!Number.isInteger(limit) || limit < 1) {
    throw createError('INVALID_ARGUMENT', `--limit must be a positive integer, got "${values.limit ?? ''}"`);
  }

  const report = await withResolver(context, values.config, (resolver) => resolver.inspect(limit));

  if (values.json === true) {
    printJson(context.out, report);
    return;
  }

  context.out.log(`Total records: ${report.totalRecords}`);
  if (report.sample.length === 0) return;
  context.out.log('');
  for (const line of formatTable(
    ['Id', 'Canonical', 'Alias', 'Group', 'Record type'],
    report.sample.map((record) => [record.id, record.canonical, record.alias, record.group, record.recordType]),
  )) {
    context.out.log(line);
  }
}
