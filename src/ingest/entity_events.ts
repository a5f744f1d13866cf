/**
 * @fileoverview Entity lifecycle ingestion
 *
 * Applies create / update / delete notifications to the entity index:
 * create and update re-sync the entity (update passes the previous snapshot
 * so a rename drops the old canonical's records); delete removes it.
 */

import type { DeleteError } from '../core/errors.js';
import type { Result } from '../core/result.js';
import type { EntityEvent, EntityEventBus } from '../events.js';
import type { DeleteReport, EntityVectorIndex, SyncError, SyncReport } from '../storage/entity_index.js';
import { logError, logWarning } from '../telemetry/logger.js';

export type EntityEventOutcome =
  | { type: 'sync'; result: Result<SyncReport, SyncError> }
  | { type: 'delete'; result: Result<DeleteReport, DeleteError> };

export class EntityEventHandler {
  constructor(private readonly index: Pick<EntityVectorIndex, 'sync' | 'delete'>) {}

  async handle(event: EntityEvent): Promise<EntityEventOutcome> {
    switch (event.type) {
      case 'entity_created':
        return { type: 'sync', result: await this.index.sync(event.entity) };
      case 'entity_updated':
        return { type: 'sync', result: await this.index.sync(event.entity, event.previous ?? undefined) };
      case 'entity_deleted':
        return { type: 'delete', result: await this.index.delete(event.entity.canonicalName) };
    }
  }

  /**
   * Subscribe to every entity event on `bus`. Failed syncs are logged as
   * errors; failed deletes only as warnings since they are not critical.
   */
  attach(bus: EntityEventBus): () => void {
    return bus.on('*', async (event) => {
      const outcome = await this.handle(event);
      if (outcome.result.ok) return;
      const error = outcome.result.error;
      const context = { canonical: event.entity.canonicalName, code: error.code, error: error.message };
      if (outcome.type === 'delete') {
        logWarning('Entity delete failed', context);
      } else {
        logError('Entity sync failed', context);
      }
    });
  }
}
