// @module: relay-registry
// @tags: connections, concurrency, state

import type { FastifyBaseLogger } from 'fastify';
import { RegistryReentrancyError } from './errors.js';
import type { Clock, ConnectionHandle, PlayerRecord } from './types.js';

export type RegistryVisitor = (handle: ConnectionHandle, record: PlayerRecord) => boolean | void;

/**
 * Process-wide index of live connections to player records, and of player ids back to
 * connections. Every operation runs as one synchronous critical section over both maps;
 * nothing inside a section awaits or closes a connection.
 */
export interface ConnectionRegistry {
  readonly size: number;
  /** Returns the record displaced by a duplicate-identity takeover, if any. */
  add(handle: ConnectionHandle, record: PlayerRecord): PlayerRecord | null;
  update(handle: ConnectionHandle, x: number, y: number): boolean;
  delete(handle: ConnectionHandle): PlayerRecord | null;
  get(handle: ConnectionHandle): PlayerRecord | null;
  snapshot(): PlayerRecord[];
  /** Visitors must not call back into the registry; return `false` to stop early. */
  forEach(visitor: RegistryVisitor): void;
  sweepStale(timeoutMs: number): PlayerRecord[];
}

export interface ConnectionRegistryOptions {
  logger: FastifyBaseLogger;
  now?: Clock;
}

const copyRecord = (record: PlayerRecord): PlayerRecord => ({
  id: record.id,
  x: record.x,
  y: record.y,
  lastSeen: record.lastSeen,
});

const closeQuietly = (
  logger: FastifyBaseLogger,
  handle: ConnectionHandle,
  reason: string,
): void => {
  try {
    handle.close(reason);
  } catch (error) {
    logger.error({ err: error, connectionId: handle.id }, 'Failed to close connection');
  }
};

export const createConnectionRegistry = ({
  logger,
  now = Date.now,
}: ConnectionRegistryOptions): ConnectionRegistry => {
  const records = new Map<ConnectionHandle, PlayerRecord>();
  const handles = new Map<string, ConnectionHandle>();
  let locked = false;

  const withLock = <T>(operation: string, body: () => T): T => {
    if (locked) {
      throw new RegistryReentrancyError(operation);
    }

    locked = true;
    try {
      return body();
    } finally {
      locked = false;
    }
  };

  const removeEntry = (handle: ConnectionHandle, record: PlayerRecord): void => {
    records.delete(handle);
    if (handles.get(record.id) === handle) {
      handles.delete(record.id);
    }
  };

  const add = (handle: ConnectionHandle, record: PlayerRecord): PlayerRecord | null => {
    const displaced = withLock('add', () => {
      const previousHandle = handles.get(record.id);
      let previous: { handle: ConnectionHandle; record: PlayerRecord } | null = null;

      if (previousHandle && previousHandle !== handle) {
        const previousRecord = records.get(previousHandle);
        records.delete(previousHandle);
        handles.delete(record.id);
        if (previousRecord) {
          previous = { handle: previousHandle, record: copyRecord(previousRecord) };
        }
      }

      const existing = records.get(handle);
      if (existing && existing.id !== record.id) {
        removeEntry(handle, existing);
      }

      records.set(handle, copyRecord(record));
      handles.set(record.id, handle);
      return previous;
    });

    if (displaced) {
      logger.warn(
        { playerId: record.id, connectionId: displaced.handle.id },
        'Player id already registered; closing previous connection',
      );
      closeQuietly(logger, displaced.handle, 'Replaced by a newer connection');
    }

    logger.info({ playerId: record.id, total: records.size }, 'Added player');
    return displaced ? displaced.record : null;
  };

  const update = (handle: ConnectionHandle, x: number, y: number): boolean => {
    const applied = withLock('update', () => {
      const record = records.get(handle);
      if (!record) {
        return false;
      }

      record.x = x;
      record.y = y;
      record.lastSeen = Math.max(record.lastSeen, now());
      return true;
    });

    if (!applied) {
      logger.warn({ connectionId: handle.id }, 'Tried to update an unknown connection');
    }

    return applied;
  };

  const remove = (handle: ConnectionHandle): PlayerRecord | null => {
    const removed = withLock('delete', () => {
      const record = records.get(handle);
      if (!record) {
        return null;
      }

      removeEntry(handle, record);
      return record;
    });

    if (!removed) {
      logger.debug({ connectionId: handle.id }, 'Tried to delete an unknown connection');
      return null;
    }

    logger.info({ playerId: removed.id, total: records.size }, 'Removed player');
    return removed;
  };

  const get = (handle: ConnectionHandle): PlayerRecord | null =>
    withLock('get', () => {
      const record = records.get(handle);
      return record ? copyRecord(record) : null;
    });

  const snapshot = (): PlayerRecord[] =>
    withLock('snapshot', () => Array.from(records.values(), copyRecord));

  const forEach = (visitor: RegistryVisitor): void => {
    withLock('forEach', () => {
      for (const [handle, record] of records) {
        if (visitor(handle, copyRecord(record)) === false) {
          break;
        }
      }
    });
  };

  const sweepStale = (timeoutMs: number): PlayerRecord[] => {
    const evicted = withLock('sweepStale', () => {
      const cutoff = now();
      const stale: Array<{ handle: ConnectionHandle; record: PlayerRecord }> = [];

      for (const [handle, record] of records) {
        if (cutoff - record.lastSeen > timeoutMs) {
          stale.push({ handle, record });
        }
      }

      for (const { handle, record } of stale) {
        removeEntry(handle, record);
      }

      return stale;
    });

    for (const { handle, record } of evicted) {
      logger.info({ playerId: record.id }, 'Removing inactive player');
      closeQuietly(logger, handle, 'Inactive');
    }

    return evicted.map(({ record }) => record);
  };

  return {
    get size() {
      return records.size;
    },
    add,
    update,
    delete: remove,
    get,
    snapshot,
    forEach,
    sweepStale,
  };
};
