/**
 * @fileoverview Resolve command - Map query fragments to indexed entities
 */

import { parseArgs } from 'node:util';
import type { ResolutionResult } from '../../query/pipeline.js';
import { GLOBAL_OPTIONS, parseCommandArgs, printJson, withResolver, type CommandContext } from '../context.js';
import { classifyError, createError } from '../errors.js';
import { formatTable } from '../progress.js';

export function parseList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export async function resolveCommand(context: CommandContext): Promise<void> {
  const { values, positionals } = parseCommandArgs(() =>
    parseArgs({
      args: context.args,
      options: {
        ...GLOBAL_OPTIONS,
        groups: { type: 'string' },
        domain: { type: 'string' },
        debug: { type: 'boolean', default: false },
      },
      allowPositionals: true,
      strict: true,
    }),
  );

  const query = positionals.join(' ').trim();
  if (!query) {
    throw createError('INVALID_ARGUMENT', 'A query is required. Usage: entity-resolver resolve "<query>" --groups <g1,g2>');
  }
  const entityGroups = parseList(values.groups);
  if (entityGroups.length === 0) {
    throw createError('INVALID_ARGUMENT', '--groups must name at least one entity group');
  }

  const result = await withResolver(context, values.config, (resolver) =>
    resolver.resolve(query, {
      entityGroups,
      businessDomain: values.domain,
      debug: values.debug === true,
    }),
  );
  if (!result.ok) {
    throw classifyError(result.error);
  }

  if (values.json === true) {
    printJson(context.out, result.value);
    return;
  }
  for (const line of formatResolution(result.value)) {
    context.out.log(line);
  }
}

export function formatResolution(result: ResolutionResult): string[] {
  const lines = [`Query: ${result.originalQuery}`, `Normalized: ${result.normalizedQuery}`, ''];

  if (result.entityMappings.length === 0) {
    lines.push('No entities matched.');
  } else {
    lines.push(
      ...formatTable(
        ['Text', 'Entity', 'Type', 'Confidence', 'Distance'],
        result.entityMappings.map((mapping) => [
          mapping.text,
          mapping.entity,
          mapping.candidateType,
          mapping.confidence.toFixed(3),
          mapping.distance.toFixed(3),
        ]),
      ),
    );
    lines.push('', `Record types: ${result.context.dt.join(', ') || '-'}`);
    lines.push(`Related record types: ${result.context.rdt.join(', ') || '-'}`);
  }

  for (const line of result.diagnostics.trace ?? []) {
    lines.push(`  ${line}`);
  }
  return lines;
}
