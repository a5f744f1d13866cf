/**
 * @fileoverview Entity snapshots from JSON
 *
 * Accepts a single snapshot object or an array of them. Keys may be written
 * camelCase (`canonicalName`) or snake_case (`canonical_name`), and group
 * rows as `{ entityGroup }` or `{ entity_group }`.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import type { EntitySnapshot } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';

const GroupRowSchema = z
  .object({
    entityGroup: z.string().optional(),
    entity_group: z.string().optional(),
  })
  .transform((row) => ({ entityGroup: row.entityGroup ?? row.entity_group ?? '' }));

const SnapshotSchema = z
  .object({
    canonicalName: z.string().optional(),
    canonical_name: z.string().optional(),
    aliases: z.string().nullish(),
    groups: z.array(z.union([z.string(), GroupRowSchema])).nullish(),
    recordType: z.string().nullish(),
    doc_type: z.string().nullish(),
    relatedRecordTypes: z.array(z.string()).nullish(),
    related_doctypes: z.array(z.string()).nullish(),
  })
  .transform((raw): EntitySnapshot => ({
    canonicalName: raw.canonicalName ?? raw.canonical_name ?? '',
    aliases: raw.aliases ?? null,
    groups: raw.groups ?? null,
    recordType: raw.recordType ?? raw.doc_type ?? null,
    relatedRecordTypes: raw.relatedRecordTypes ?? raw.related_doctypes ?? null,
  }));

const SnapshotFileSchema = z.union([SnapshotSchema.array(), SnapshotSchema.transform((snapshot) => [snapshot])]);

export function parseSnapshots(raw: unknown): Result<EntitySnapshot[], ValidationError> {
  const parsed = SnapshotFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return Err(new ValidationError(
      issue?.path.join('.') || 'snapshot',
      'an entity snapshot or an array of snapshots',
      issue?.message ?? 'invalid value'
    ));
  }
  return Ok(parsed.data);
}

export async function readSnapshotFile(filePath: string): Promise<Result<EntitySnapshot[], ValidationError>> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    return Err(new ValidationError('file', 'a readable JSON file', `${filePath} (${getErrorMessage(error)})`));
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return Err(new ValidationError('file', 'valid JSON', getErrorMessage(error)));
  }
  return parseSnapshots(raw);
}
