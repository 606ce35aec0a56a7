import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { statusResponseSchema } from '@posrelay/schemas';
import type { ConnectionRegistry } from '../relay/registry.js';
import type { Clock } from '../relay/types.js';
import { buildStatusResponse, renderStatusPage } from '../status/page.js';

interface StatusPluginOptions {
  registry: ConnectionRegistry;
  now?: Clock;
}

export const statusRoutes: FastifyPluginAsync<StatusPluginOptions> = async (
  app: FastifyInstance,
  options: StatusPluginOptions,
): Promise<void> => {
  const { registry, now = Date.now } = options;

  app.get('/status', async (request, reply) => {
    reply.header('Cache-Control', 'no-store');
    reply.type('text/html; charset=utf-8');
    return reply.send(renderStatusPage(registry.snapshot(), now()));
  });

  app.get('/status.json', async (request, reply) => {
    reply.header('Cache-Control', 'no-store');
    return statusResponseSchema.parse(buildStatusResponse(registry.snapshot(), now()));
  });
};
