/**
 * @fileoverview Snapshot normalization
 *
 * Turns an {@link EntitySnapshot} into the alias and group lists that drive
 * record generation: one record per (group, alias) pair.
 */

import { ValidationError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { DEFAULT_ENTITY_GROUP, type EntitySnapshot, type IndexMetadata } from '../types.js';

export const RECORD_ID_SEPARATOR = '::';

export interface PreparedEntity {
  canonical: string;
  aliases: string[];
  groups: string[];
  recordType: string;
  relatedRecordTypes: string;
}

export interface PendingRecord {
  id: string;
  alias: string;
  metadata: IndexMetadata;
}

export function recordId(group: string, canonical: string, alias: string): string {
  return [group, canonical, alias].join(RECORD_ID_SEPARATOR);
}

/**
 * Split a comma-joined alias list. Blank entries are dropped and later
 * spellings of an alias already seen (case-insensitive) are ignored. The
 * lower-cased canonical name is appended when no alias already covers it.
 */
export function normalizeAliases(rawAliases: string | null | undefined, canonical: string): string[] {
  const aliases: string[] = [];
  const seen = new Set<string>();
  for (const part of (rawAliases ?? '').split(',')) {
    const alias = part.trim();
    const key = alias.toLowerCase();
    if (!alias || seen.has(key)) continue;
    seen.add(key);
    aliases.push(alias);
  }
  const canonicalLower = canonical.toLowerCase();
  if (!seen.has(canonicalLower)) {
    aliases.push(canonicalLower);
  }
  return aliases;
}

export function normalizeGroups(groups: EntitySnapshot['groups']): string[] {
  const names: string[] = [];
  for (const group of groups ?? []) {
    const name = (typeof group === 'string' ? group : group.entityGroup).trim();
    if (name && !names.includes(name)) names.push(name);
  }
  return names.length > 0 ? names : [DEFAULT_ENTITY_GROUP];
}

function joinList(values: readonly string[] | null | undefined): string {
  return (values ?? [])
    .map((value) => value.trim())
    .filter((value) => value.length > 0)
    .join(',');
}

export function prepareEntity(snapshot: EntitySnapshot): Result<PreparedEntity, ValidationError> {
  const canonical = typeof snapshot.canonicalName === 'string' ? snapshot.canonicalName.trim() : '';
  if (!canonical) {
    return Err(new ValidationError('canonicalName', 'a non-empty string', JSON.stringify(snapshot.canonicalName ?? null)));
  }
  return Ok({
    canonical,
    aliases: normalizeAliases(snapshot.aliases, canonical),
    groups: normalizeGroups(snapshot.groups),
    recordType: snapshot.recordType?.trim() ?? '',
    relatedRecordTypes: joinList(snapshot.relatedRecordTypes),
  });
}

/**
 * Records in group-major order, aliases in list order within each group.
 */
export function buildPendingRecords(entity: PreparedEntity): PendingRecord[] {
  const records: PendingRecord[] = [];
  for (const group of entity.groups) {
    for (const alias of entity.aliases) {
      records.push({
        id: recordId(group, entity.canonical, alias),
        alias,
        metadata: {
          canonical: entity.canonical,
          alias,
          group,
          recordType: entity.recordType,
          relatedRecordTypes: entity.relatedRecordTypes,
        },
      });
    }
  }
  return records;
}
