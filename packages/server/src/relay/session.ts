// @module: relay-session
// @tags: websocket, handshake, receive-loop

import type { FastifyBaseLogger } from 'fastify';
import { MOVE_MESSAGE_TYPE, parseInboundMessage } from '@posrelay/schemas';
import type { MetricsBundle } from '../metrics/registry.js';
import { withDeadline } from './deadline.js';
import type { BroadcastDispatcher } from './dispatcher.js';
import { ConnectionClosedError, DeadlineExceededError, DispatcherClosedError } from './errors.js';
import type { IdentityGenerator } from './identity.js';
import type { ConnectionRegistry } from './registry.js';
import type { Clock, ConnectionHandle, MoveEvent, PlayerRecord } from './types.js';

export type SessionState = 'connecting' | 'synced' | 'active' | 'closed';

export interface SessionTimeouts {
  readTimeoutMs: number;
  writeTimeoutMs: number;
  syncWriteTimeoutMs: number;
}

export interface ConnectionSessionOptions {
  handle: ConnectionHandle;
  registry: ConnectionRegistry;
  dispatcher: BroadcastDispatcher;
  identity: IdentityGenerator;
  metrics: MetricsBundle;
  logger: FastifyBaseLogger;
  timeouts: SessionTimeouts;
  now?: Clock;
}

export interface ConnectionSession {
  readonly state: SessionState;
  readonly playerId: string | null;
  /** Runs the session to completion. Never rejects. */
  run(): Promise<void>;
}

const describeExit = (error: unknown): { level: 'info' | 'warn'; reason: string } => {
  if (error instanceof ConnectionClosedError) {
    return { level: 'info', reason: error.message };
  }

  if (error instanceof DeadlineExceededError) {
    return { level: 'warn', reason: 'read deadline exceeded' };
  }

  if (error instanceof DispatcherClosedError) {
    return { level: 'info', reason: 'server shutting down' };
  }

  return { level: 'warn', reason: error instanceof Error ? error.message : String(error) };
};

export const createConnectionSession = ({
  handle,
  registry,
  dispatcher,
  identity,
  metrics,
  logger: parentLogger,
  timeouts,
  now = Date.now,
}: ConnectionSessionOptions): ConnectionSession => {
  let state: SessionState = 'connecting';
  let playerId: string | null = null;
  let logger = parentLogger;

  const connect = (): string => {
    const id = identity.resolve(handle.resumeRequest);
    logger = parentLogger.child({ playerId: id });

    const record: PlayerRecord = { id, x: 0, y: 0, lastSeen: now() };
    const displaced = registry.add(handle, record);
    if (displaced) {
      metrics.identityTakeovers.inc();
    }

    return id;
  };

  const sync = async (id: string): Promise<void> => {
    const resumeToken = identity.issueResumeToken(id);
    await withDeadline(
      handle.send(resumeToken === null ? { id, x: 0, y: 0 } : { id, x: 0, y: 0, resumeToken }),
      timeouts.syncWriteTimeoutMs,
      'initial state write',
    );
    state = 'synced';

    const peers = registry.snapshot().filter((peer) => peer.id !== id);
    logger.debug({ peers: peers.length }, 'Sending existing players to new player');

    for (const peer of peers) {
      try {
        await withDeadline(
          handle.send({ type: MOVE_MESSAGE_TYPE, playerId: peer.id, x: peer.x, y: peer.y }),
          timeouts.writeTimeoutMs,
          'peer sync write',
        );
      } catch (error) {
        logger.warn({ err: error, peerId: peer.id }, 'Error sending existing player data');
        if (handle.closed) {
          throw error;
        }
      }
    }
  };

  const receive = async (id: string): Promise<void> => {
    state = 'active';

    for (;;) {
      const raw = await withDeadline(handle.read(), timeouts.readTimeoutMs, 'read');
      const decoded = parseInboundMessage(raw);

      if (!decoded.ok) {
        metrics.decodeErrors.inc();
        logger.warn({ reason: decoded.reason, detail: decoded.message }, 'Error parsing message');
        continue;
      }

      const message = decoded.value;
      if (message.kind !== 'move') {
        logger.debug({ type: message.type }, 'Ignoring message with unknown type');
        continue;
      }

      const event: MoveEvent = {
        type: MOVE_MESSAGE_TYPE,
        playerId: id,
        x: message.move.x,
        y: message.move.y,
      };

      registry.update(handle, event.x, event.y);
      metrics.moveEvents.inc();
      await dispatcher.publish(event);
    }
  };

  const run = async (): Promise<void> => {
    metrics.activeConnections.inc();
    try {
      const id = connect();
      playerId = id;
      logger.info({ connectionId: handle.id }, 'New player connected');

      await sync(id);
      await receive(id);
    } catch (error) {
      const exit = describeExit(error);
      if (state === 'connecting') {
        logger.warn({ err: error }, 'Session failed before sync completed');
      } else {
        logger[exit.level]({ reason: exit.reason }, 'Session ended');
      }
    } finally {
      state = 'closed';
      handle.close('Session closed');
      registry.delete(handle);
      metrics.activeConnections.dec();
    }
  };

  return {
    get state() {
      return state;
    },
    get playerId() {
      return playerId;
    },
    run,
  };
};
