import { logError } from './telemetry/logger.js';
import type { EntitySnapshot } from './types.js';
import { getErrorMessage } from './utils/errors.js';

export type EntityEventType = 'entity_created' | 'entity_updated' | 'entity_deleted';

/**
 * Lifecycle notification from the record-storage layer that owns entity
 * definitions. `previous` is the snapshot before an update, when known.
 */
export interface EntityEvent {
  type: EntityEventType;
  entity: EntitySnapshot;
  previous?: EntitySnapshot | null;
  timestamp: Date;
}

export type EntityEventListener = (event: EntityEvent) => void | Promise<void>;

export class EntityEventBus {
  private handlers = new Map<EntityEventType | '*', Set<EntityEventListener>>();

  on(eventType: EntityEventType | '*', handler: EntityEventListener): () => void {
    const handlers = this.handlers.get(eventType) ?? new Set<EntityEventListener>();
    handlers.add(handler);
    this.handlers.set(eventType, handlers);
    return () => {
      this.handlers.get(eventType)?.delete(handler);
    };
  }

  once(eventType: EntityEventType | '*', handler: EntityEventListener): () => void {
    const wrappedHandler: EntityEventListener = async (event) => {
      this.handlers.get(eventType)?.delete(wrappedHandler);
      await handler(event);
    };
    return this.on(eventType, wrappedHandler);
  }

  /**
   * Runs listeners one at a time, specific ones before wildcard ones. A
   * failing listener is logged and does not stop the others.
   */
  async emit(event: EntityEvent): Promise<void> {
    const listeners = [...(this.handlers.get(event.type) ?? []), ...(this.handlers.get('*') ?? [])];
    for (const handler of listeners) {
      try {
        await handler(event);
      } catch (error: unknown) {
        logError(`Entity event handler error for ${event.type}`, {
          canonical: event.entity.canonicalName,
          error: getErrorMessage(error),
        });
      }
    }
  }

  off(eventType: EntityEventType | '*'): void { this.handlers.delete(eventType); }
  clear(): void { this.handlers.clear(); }
}

export function createEntityCreatedEvent(entity: EntitySnapshot): EntityEvent {
  return { type: 'entity_created', entity, timestamp: new Date() };
}

export function createEntityUpdatedEvent(entity: EntitySnapshot, previous?: EntitySnapshot | null): EntityEvent {
  return { type: 'entity_updated', entity, previous: previous ?? null, timestamp: new Date() };
}

export function createEntityDeletedEvent(entity: EntitySnapshot): EntityEvent {
  return { type: 'entity_deleted', entity, timestamp: new Date() };
}
