import type { FastifyBaseLogger } from 'fastify';
import type { MetricsBundle } from '../metrics/registry.js';
import type { ConnectionRegistry } from './registry.js';
import type { PlayerRecord } from './types.js';

export interface IdleSweeper {
  start(): void;
  stop(): void;
  tick(): PlayerRecord[];
}

export interface IdleSweeperOptions {
  registry: ConnectionRegistry;
  logger: FastifyBaseLogger;
  metrics: MetricsBundle;
  intervalMs: number;
  staleTimeoutMs: number;
}

export const createIdleSweeper = ({
  registry,
  logger,
  metrics,
  intervalMs,
  staleTimeoutMs,
}: IdleSweeperOptions): IdleSweeper => {
  let timer: NodeJS.Timeout | null = null;

  const tick = (): PlayerRecord[] => {
    const evicted = registry.sweepStale(staleTimeoutMs);
    if (evicted.length > 0) {
      metrics.sweptConnections.inc(evicted.length);
      logger.info(
        { evicted: evicted.map((record) => record.id), remaining: registry.size },
        'Swept inactive connections',
      );
    }

    return evicted;
  };

  return {
    start(): void {
      if (timer) {
        return;
      }

      timer = setInterval(() => {
        try {
          tick();
        } catch (error) {
          logger.error({ err: error }, 'Idle sweep failed');
        }
      }, intervalMs);
      timer.unref();
    },
    stop(): void {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },
    tick,
  };
};
