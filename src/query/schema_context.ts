/**
 * @fileoverview Schema-graph pass-through
 *
 * After resolution, the record types of the resolved entities can be handed
 * to a schema graph that knows which other record types link to them. The
 * result is attached to the resolution unchanged in meaning; it does not
 * affect matching.
 */

import { logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

export interface RelatedRecordType {
  type: string;
  /** Which of the found record types `type` links to. */
  linkedTypes: string[];
}

export interface SchemaGraphProvider {
  /** Record types linked to the given ones, most connected first. */
  getRelatedRecordTypes(recordTypes: readonly string[]): Promise<RelatedRecordType[]>;
}

export interface RankedRelatedRecordType extends RelatedRecordType {
  connectionStrength: number;
}

export interface SchemaContext {
  foundRecordTypes: string[];
  /** Absent when the provider failed. */
  related?: RankedRelatedRecordType[];
  relatedCount?: number;
}

export const MAX_RELATED_RECORD_TYPES = 10;

export async function buildSchemaContext(
  foundRecordTypes: readonly string[],
  provider: SchemaGraphProvider
): Promise<SchemaContext> {
  const found = [...foundRecordTypes];
  try {
    const related = await provider.getRelatedRecordTypes(found);
    return {
      foundRecordTypes: found,
      related: related.slice(0, MAX_RELATED_RECORD_TYPES).map((entry) => ({
        type: entry.type,
        linkedTypes: [...entry.linkedTypes],
        connectionStrength: entry.linkedTypes.length,
      })),
      relatedCount: related.length,
    };
  } catch (error) {
    logWarning('Schema context building failed', { error: getErrorMessage(error) });
    return { foundRecordTypes: found };
  }
}

/**
 * In-memory schema graph: each record type lists the record types its link
 * fields point at.
 */
export class StaticSchemaGraph implements SchemaGraphProvider {
  constructor(
    private readonly links: ReadonlyMap<string, readonly string[]>,
    private readonly minLinks: number = 2
  ) {}

  static fromRecord(links: Readonly<Record<string, readonly string[]>>, minLinks?: number): StaticSchemaGraph {
    return new StaticSchemaGraph(new Map(Object.entries(links)), minLinks);
  }

  async getRelatedRecordTypes(recordTypes: readonly string[]): Promise<RelatedRecordType[]> {
    const wanted = new Set(recordTypes);
    const related: RelatedRecordType[] = [];
    for (const [type, targets] of this.links) {
      const linkedTypes = Array.from(new Set(targets.filter((target) => wanted.has(target))));
      if (linkedTypes.length >= this.minLinks) {
        related.push({ type, linkedTypes });
      }
    }
    return related.sort((a, b) => b.linkedTypes.length - a.linkedTypes.length);
  }
}
