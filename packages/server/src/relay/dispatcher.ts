// @module: relay-dispatcher
// @tags: broadcast, fan-out, queue

import type { FastifyBaseLogger } from 'fastify';
import type { MetricsBundle } from '../metrics/registry.js';
import { withDeadline } from './deadline.js';
import { DispatcherClosedError } from './errors.js';
import type { ConnectionRegistry } from './registry.js';
import type { ConnectionHandle, MoveEvent } from './types.js';

export interface DeliveryReport {
  attempted: number;
  delivered: number;
  failed: number;
}

export interface BroadcastDispatcher {
  readonly running: boolean;
  /** Resolves once the worker has taken the event. */
  publish(event: MoveEvent): Promise<void>;
  start(): void;
  stop(): Promise<void>;
}

export interface BroadcastDispatcherOptions {
  registry: ConnectionRegistry;
  logger: FastifyBaseLogger;
  metrics: MetricsBundle;
  writeTimeoutMs: number;
  onDelivered?: (event: MoveEvent, report: DeliveryReport) => void;
}

interface QueuedEvent {
  event: MoveEvent;
  accept: () => void;
  reject: (error: Error) => void;
}

interface DeliveryTarget {
  handle: ConnectionHandle;
  playerId: string;
}

export const createBroadcastDispatcher = ({
  registry,
  logger,
  metrics,
  writeTimeoutMs,
  onDelivered,
}: BroadcastDispatcherOptions): BroadcastDispatcher => {
  const queue: QueuedEvent[] = [];
  let wakeWorker: (() => void) | null = null;
  let closed = false;
  let worker: Promise<void> | null = null;

  const signal = (): void => {
    if (wakeWorker) {
      const wake = wakeWorker;
      wakeWorker = null;
      wake();
    }
  };

  const take = async (): Promise<QueuedEvent | null> => {
    while (!closed) {
      const next = queue.shift();
      if (next) {
        return next;
      }

      await new Promise<void>((resolve) => {
        wakeWorker = resolve;
      });
    }

    return null;
  };

  const writeTo = async (target: DeliveryTarget, event: MoveEvent): Promise<boolean> => {
    try {
      await withDeadline(target.handle.send(event), writeTimeoutMs, 'broadcast write');
      metrics.broadcastWrites.inc({ result: 'ok' });
      return true;
    } catch (error) {
      metrics.broadcastWrites.inc({ result: 'error' });
      logger.warn(
        { err: error, from: event.playerId, to: target.playerId },
        'Error broadcasting movement',
      );
      return false;
    }
  };

  const deliver = async (event: MoveEvent): Promise<DeliveryReport> => {
    const targets: DeliveryTarget[] = [];
    registry.forEach((handle, record) => {
      if (record.id !== event.playerId) {
        targets.push({ handle, playerId: record.id });
      }
    });

    // Writes happen after the registry section is released.
    const results = await Promise.all(targets.map((target) => writeTo(target, event)));
    const delivered = results.filter(Boolean).length;

    return {
      attempted: targets.length,
      delivered,
      failed: targets.length - delivered,
    };
  };

  const run = async (): Promise<void> => {
    logger.info('Broadcast dispatcher started');

    for (;;) {
      const next = await take();
      if (!next) {
        break;
      }

      next.accept();
      const report = await deliver(next.event);
      logger.debug(
        { playerId: next.event.playerId, ...report },
        'Broadcast complete',
      );
      onDelivered?.(next.event, report);
    }

    logger.info('Broadcast dispatcher stopped');
  };

  const publish = (event: MoveEvent): Promise<void> => {
    if (closed) {
      return Promise.reject(new DispatcherClosedError());
    }

    return new Promise<void>((accept, reject) => {
      queue.push({ event, accept, reject });
      signal();
    });
  };

  const start = (): void => {
    if (worker || closed) {
      return;
    }

    worker = run().catch((error: unknown) => {
      logger.error({ err: error }, 'Broadcast dispatcher failed');
    });
  };

  const stop = async (): Promise<void> => {
    if (closed) {
      await worker;
      return;
    }

    closed = true;
    for (const pending of queue.splice(0)) {
      pending.reject(new DispatcherClosedError());
    }
    signal();
    await worker;
  };

  return {
    get running() {
      return worker !== null && !closed;
    },
    publish,
    start,
    stop,
  };
};
