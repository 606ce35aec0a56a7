// @module: server-runtime
// @tags: fastify, websocket, infrastructure

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { Server as SocketIOServer } from 'socket.io';
import type { ReadinessController } from './readiness.js';
import type { ServerConfig } from './config.js';
import { resolveCorsOrigins } from './config.js';
import { statusRoutes } from './api/status.js';
import { createMetricsBundle } from './metrics/registry.js';
import { createBroadcastDispatcher } from './relay/dispatcher.js';
import { createIdentityGenerator } from './relay/identity.js';
import { createConnectionRegistry } from './relay/registry.js';
import { createIdleSweeper } from './relay/sweeper.js';
import { createRealtimeServer } from './ws/connection.js';

const MAX_WS_MESSAGE_BYTES = 64 * 1024;

export interface CreateServerOptions {
  config: ServerConfig;
  readiness: ReadinessController;
}

export const createServer = async ({
  config,
  readiness,
}: CreateServerOptions): Promise<FastifyInstance> => {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      transport: config.NODE_ENV === 'development' ? { target: 'pino-pretty' } : undefined,
    },
  });

  const metrics = createMetricsBundle();
  const registry = createConnectionRegistry({
    logger: app.log.child({ scope: 'registry' }),
  });
  const identity = createIdentityGenerator({
    logger: app.log.child({ scope: 'identity' }),
    allowResume: config.ALLOW_IDENTITY_RESUME,
  });
  const dispatcher = createBroadcastDispatcher({
    registry,
    logger: app.log.child({ scope: 'dispatcher' }),
    metrics,
    writeTimeoutMs: config.WRITE_TIMEOUT_MS,
  });
  const sweeper = createIdleSweeper({
    registry,
    logger: app.log.child({ scope: 'sweeper' }),
    metrics,
    intervalMs: config.SWEEP_INTERVAL_MS,
    staleTimeoutMs: config.STALE_TIMEOUT_MS,
  });
  const realtime = createRealtimeServer({
    config,
    registry,
    dispatcher,
    identity,
    metrics,
  });

  app.decorate('readiness', readiness);
  app.decorate('relayRegistry', registry);
  const corsOrigins = resolveCorsOrigins(config.CLIENT_ORIGIN);
  await app.register(cors, {
    origin: corsOrigins,
    credentials: true,
  });

  await app.register(statusRoutes, { registry });

  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    const controller = app.readiness;
    if (!controller.isReady() || !dispatcher.running) {
      await reply.code(503).send({ status: controller.reason() });
      return;
    }

    return { status: 'ready' };
  });

  app.get('/metrics', async (request, reply) => {
    reply.header('Content-Type', metrics.registry.contentType);
    return reply.send(await metrics.registry.metrics());
  });

  const io = new SocketIOServer(app.server, {
    path: config.WS_PATH,
    maxHttpBufferSize: MAX_WS_MESSAGE_BYTES,
    transports: ['websocket'],
    cors: {
      origin: corsOrigins,
      credentials: true,
    },
  });

  dispatcher.start();
  sweeper.start();

  io.on('connection', (socket) => {
    realtime.handleConnection({
      logger: app.log,
      socket,
    });
  });

  // Open sockets would hold the HTTP server open, so they go before Fastify closes it.
  app.addHook('preClose', async () => {
    sweeper.stop();
    await realtime.shutdown();
  });

  app.addHook('onClose', async () => {
    await new Promise<void>((resolve) => {
      io.close(() => resolve());
    });
    await dispatcher.stop();
  });

  return app;
};
