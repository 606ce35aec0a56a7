import 'fastify';
import type { ReadinessController } from '../readiness.js';
import type { ConnectionRegistry } from '../relay/registry.js';

declare module 'fastify' {
  interface FastifyInstance {
    readiness: ReadinessController;
    relayRegistry: ConnectionRegistry;
  }
}
