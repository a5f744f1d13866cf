/**
 * @fileoverview Stats command - Show index statistics
 */

import { parseArgs } from 'node:util';
import { GLOBAL_OPTIONS, parseCommandArgs, printJson, withResolver, type CommandContext } from '../context.js';
import { formatKeyValue, formatTable } from '../progress.js';

export async function statsCommand(context: CommandContext): Promise<void> {
  const { values } = parseCommandArgs(() =>
    parseArgs({
      args: context.args,
      options: { ...GLOBAL_OPTIONS },
      allowPositionals: false,
      strict: true,
    }),
  );

  const stats = await withResolver(context, values.config, (resolver) => resolver.stats());

  if (values.json === true) {
    printJson(context.out, stats);
    return;
  }

  const lines = [
    'Entity Index',
    ...formatKeyValue([
      { key: 'Records', value: stats.totalRecords },
      { key: 'Vector dimension', value: stats.vectorDimension || null },
      { key: 'Approximate search', value: stats.usingApproximate ? 'hnsw' : 'exact' },
    ]),
  ];
  const groups = Object.entries(stats.perGroupCounts).sort(([a], [b]) => a.localeCompare(b));
  if (groups.length > 0) {
    lines.push('', ...formatTable(['Group', 'Records'], groups.map(([group, count]) => [group, String(count)])));
  }
  for (const line of lines) {
    context.out.log(line);
  }
}
