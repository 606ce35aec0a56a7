import { collectDefaultMetrics, Counter, Gauge, Registry } from 'prom-client';

export interface MetricsBundle {
  registry: Registry;
  activeConnections: Gauge;
  moveEvents: Counter;
  broadcastWrites: Counter<'result'>;
  decodeErrors: Counter;
  sweptConnections: Counter;
  identityTakeovers: Counter;
}

export const createMetricsBundle = ({ defaultMetrics = true } = {}): MetricsBundle => {
  const registry = new Registry();
  if (defaultMetrics) {
    collectDefaultMetrics({ register: registry });
  }

  const activeConnections = new Gauge({
    name: 'relay_connections',
    help: 'Number of active relay connections',
    registers: [registry],
  });

  const moveEvents = new Counter({
    name: 'relay_move_events_total',
    help: 'Count of accepted move messages',
    registers: [registry],
  });

  const broadcastWrites = new Counter({
    name: 'relay_broadcast_writes_total',
    help: 'Count of fan-out writes by outcome',
    labelNames: ['result'] as const,
    registers: [registry],
  });

  const decodeErrors = new Counter({
    name: 'relay_decode_errors_total',
    help: 'Count of inbound messages that failed to decode',
    registers: [registry],
  });

  const sweptConnections = new Counter({
    name: 'relay_swept_connections_total',
    help: 'Count of connections evicted for inactivity',
    registers: [registry],
  });

  const identityTakeovers = new Counter({
    name: 'relay_identity_takeovers_total',
    help: 'Count of connections closed because a newer one claimed the same player id',
    registers: [registry],
  });

  return {
    registry,
    activeConnections,
    moveEvents,
    broadcastWrites,
    decodeErrors,
    sweptConnections,
    identityTakeovers,
  };
};
