// @module: relay-transport
// @tags: socket.io, websocket, adapter

import type { FastifyBaseLogger } from 'fastify';
import type { Socket } from 'socket.io';
import { z } from 'zod';
import type { ServerConfig } from '../config.js';
import type { MetricsBundle } from '../metrics/registry.js';
import type { BroadcastDispatcher } from '../relay/dispatcher.js';
import { ConnectionClosedError } from '../relay/errors.js';
import type { IdentityGenerator } from '../relay/identity.js';
import { DEFAULT_INBOX_LIMIT, MessageInbox } from '../relay/inbox.js';
import type { ConnectionRegistry } from '../relay/registry.js';
import { createConnectionSession } from '../relay/session.js';
import type { ConnectionHandle, OutboundMessage, ResumeRequest } from '../relay/types.js';

const MESSAGE_EVENT = 'message';

const handshakeAuthSchema = z.object({
  playerId: z.string().min(1),
  resumeToken: z.string().min(1),
});

interface ConnectionContext {
  logger: FastifyBaseLogger;
  socket: Socket;
}

interface RealtimeDependencies {
  config: ServerConfig;
  registry: ConnectionRegistry;
  dispatcher: BroadcastDispatcher;
  identity: IdentityGenerator;
  metrics: MetricsBundle;
}

export interface RealtimeServer {
  handleConnection(context: ConnectionContext): void;
  shutdown(): Promise<void>;
}

const readResumeRequest = (socket: Socket): ResumeRequest | null => {
  const parsed = handshakeAuthSchema.safeParse(socket.handshake.auth);
  return parsed.success ? parsed.data : null;
};

export interface SocketHandleOptions {
  inboxLimit?: number;
}

export const createSocketHandle = (
  socket: Socket,
  logger: FastifyBaseLogger,
  { inboxLimit = DEFAULT_INBOX_LIMIT }: SocketHandleOptions = {},
): ConnectionHandle => {
  const inbox = new MessageInbox({ limit: inboxLimit });
  const resumeRequest = readResumeRequest(socket);

  const disconnect = (reason: string): void => {
    if (socket.connected) {
      logger.debug({ reason }, 'Disconnecting relay socket');
      socket.disconnect(true);
    }
  };

  socket.on(MESSAGE_EVENT, (raw: unknown) => {
    if (!inbox.push(raw) && socket.connected) {
      logger.warn({ limit: inboxLimit }, 'Inbound queue overflow; dropping connection');
      disconnect('inbound queue overflow');
    }
  });

  socket.on('disconnect', (reason: string) => {
    inbox.close(new ConnectionClosedError(`Connection closed: ${reason}`));
  });

  socket.on('error', (error: Error) => {
    logger.error({ err: error }, 'Socket.IO transport error');
  });

  return {
    id: socket.id,
    resumeRequest,
    get closed() {
      return inbox.closed || !socket.connected;
    },
    /**
     * Resolves as soon as Socket.IO has buffered the frame. `emit` gives no completion
     * signal, so write deadlines wrapped around this call only catch a socket that is
     * already disconnected; a slow reader never makes it time out.
     */
    send(message: OutboundMessage): Promise<void> {
      if (!socket.connected) {
        return Promise.reject(new ConnectionClosedError());
      }

      socket.emit(MESSAGE_EVENT, message);
      return Promise.resolve();
    },
    read(): Promise<unknown> {
      return inbox.next();
    },
    close(reason: string): void {
      inbox.close(new ConnectionClosedError(`Connection closed: ${reason}`));
      disconnect(reason);
    },
  };
};

export const createRealtimeServer = ({
  config,
  registry,
  dispatcher,
  identity,
  metrics,
}: RealtimeDependencies): RealtimeServer => {
  const active = new Map<ConnectionHandle, Promise<void>>();

  const handleConnection = ({ logger: parentLogger, socket }: ConnectionContext): void => {
    const logger = parentLogger.child({ scope: 'ws', connectionId: socket.id });
    const handle = createSocketHandle(socket, logger, { inboxLimit: config.INBOUND_QUEUE_LIMIT });

    const session = createConnectionSession({
      handle,
      registry,
      dispatcher,
      identity,
      metrics,
      logger,
      timeouts: {
        readTimeoutMs: config.READ_TIMEOUT_MS,
        writeTimeoutMs: config.WRITE_TIMEOUT_MS,
        syncWriteTimeoutMs: config.SYNC_WRITE_TIMEOUT_MS,
      },
    });

    const running = session.run().finally(() => {
      active.delete(handle);
    });
    active.set(handle, running);
  };

  const shutdown = async (): Promise<void> => {
    const sessions = Array.from(active.entries());
    for (const [handle] of sessions) {
      handle.close('Server shutting down');
    }
    await Promise.all(sessions.map(([, running]) => running));
  };

  return {
    handleConnection,
    shutdown,
  };
};
