/**
 * @fileoverview Sync command - Index entity snapshots from a JSON file
 */

import { parseArgs } from 'node:util';
import { readSnapshotFile } from '../../ingest/snapshot_file.js';
import type { SyncReport } from '../../storage/entity_index.js';
import { GLOBAL_OPTIONS, parseCommandArgs, printJson, withResolver, type CommandContext } from '../context.js';
import { classifyError, createError } from '../errors.js';
import { createProgressBar, formatDuration, formatTable } from '../progress.js';

interface SyncFailure {
  canonical: string;
  code: string;
  message: string;
}

export async function syncCommand(context: CommandContext): Promise<void> {
  const { values, positionals } = parseCommandArgs(() =>
    parseArgs({
      args: context.args,
      options: { ...GLOBAL_OPTIONS },
      allowPositionals: true,
      strict: true,
    }),
  );

  const filePath = positionals[0];
  if (!filePath) {
    throw createError('INVALID_ARGUMENT', 'A snapshot file is required. Usage: entity-resolver sync <file.json>');
  }
  const snapshots = await readSnapshotFile(filePath);
  if (!snapshots.ok) {
    throw classifyError(snapshots.error);
  }

  const json = values.json === true;
  const startedAt = Date.now();
  const synced: SyncReport[] = [];
  const failed: SyncFailure[] = [];

  await withResolver(context, values.config, async (resolver) => {
    const progress = !json && snapshots.value.length > 1 && process.stderr.isTTY
      ? createProgressBar({ total: snapshots.value.length })
      : null;
    try {
      for (const snapshot of snapshots.value) {
        const result = await resolver.sync(snapshot);
        if (result.ok) {
          synced.push(result.value);
        } else {
          failed.push({ canonical: snapshot.canonicalName, code: result.error.code, message: result.error.message });
        }
        progress?.increment(1, { task: snapshot.canonicalName });
      }
    } finally {
      progress?.stop();
    }
  });

  if (json) {
    printJson(context.out, { synced, failed });
  } else {
    if (synced.length > 0) {
      for (const line of formatTable(
        ['Entity', 'Aliases', 'Groups', 'Records', 'Stale removed'],
        synced.map((report) => [
          report.canonical,
          String(report.aliases.length),
          report.groups.join(', '),
          String(report.recordIds.length),
          report.staleCleanupFailed ? 'failed' : String(report.staleRemoved),
        ]),
      )) {
        context.out.log(line);
      }
    }
    for (const failure of failed) {
      context.out.error(`  [FAIL] ${failure.canonical || '(unnamed)'}: ${failure.message}`);
    }
    context.out.log(`Synced ${synced.length} of ${snapshots.value.length} entities in ${formatDuration(Date.now() - startedAt)}`);
  }

  if (failed.length > 0) {
    throw createError('SYNC_FAILED', `${failed.length} of ${snapshots.value.length} entities failed to sync`, { failed });
  }
}
