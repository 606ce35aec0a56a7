import { describe, expect, it } from 'vitest';
import { RegistryReentrancyError } from '../relay/errors.js';
import { createConnectionRegistry, type ConnectionRegistry } from '../relay/registry.js';
import type { ConnectionHandle, PlayerRecord } from '../relay/types.js';
import { FakeConnection, silentLogger } from './helpers/fakeConnection.js';

const createTestRegistry = (start = 1_000) => {
  let current = start;
  const registry = createConnectionRegistry({ logger: silentLogger(), now: () => current });
  return {
    registry,
    advance(ms: number) {
      current += ms;
    },
    setNow(value: number) {
      current = value;
    },
  };
};

const record = (id: string, lastSeen = 1_000): PlayerRecord => ({ id, x: 0, y: 0, lastSeen });

const entries = (registry: ConnectionRegistry): Array<[ConnectionHandle, PlayerRecord]> => {
  const collected: Array<[ConnectionHandle, PlayerRecord]> = [];
  registry.forEach((handle, player) => {
    collected.push([handle, player]);
  });
  return collected;
};

describe('ConnectionRegistry', () => {
  it('adds connections and exposes them through snapshot', () => {
    const { registry } = createTestRegistry();
    const alice = new FakeConnection();
    const bob = new FakeConnection();

    expect(registry.add(alice, record('aaaaaaaa'))).toBeNull();
    expect(registry.add(bob, record('bbbbbbbb'))).toBeNull();

    expect(registry.size).toBe(2);
    expect(registry.snapshot().map((player) => player.id).sort()).toEqual([
      'aaaaaaaa',
      'bbbbbbbb',
    ]);
  });

  it('closes and evicts the previous holder of a duplicate player id', () => {
    const { registry } = createTestRegistry();
    const stale = new FakeConnection();
    const fresh = new FakeConnection();

    registry.add(stale, { id: 'aaaaaaaa', x: 5, y: 6, lastSeen: 1_000 });
    const displaced = registry.add(fresh, record('aaaaaaaa'));

    expect(displaced).toEqual({ id: 'aaaaaaaa', x: 5, y: 6, lastSeen: 1_000 });
    expect(stale.closed).toBe(true);
    expect(stale.closeReasons).toEqual(['Replaced by a newer connection']);
    expect(fresh.closed).toBe(false);
    expect(registry.size).toBe(1);
    expect(registry.get(stale)).toBeNull();
    expect(registry.get(fresh)?.id).toBe('aaaaaaaa');
  });

  it('keeps the newer entry when the displaced session deletes itself afterwards', () => {
    const { registry } = createTestRegistry();
    const stale = new FakeConnection();
    const fresh = new FakeConnection();

    registry.add(stale, record('aaaaaaaa'));
    registry.add(fresh, record('aaaaaaaa'));

    expect(registry.delete(stale)).toBeNull();
    expect(entries(registry).map(([handle]) => handle)).toEqual([fresh]);
  });

  it('updates position and refreshes lastSeen', () => {
    const { registry, advance } = createTestRegistry();
    const alice = new FakeConnection();
    registry.add(alice, record('aaaaaaaa'));

    advance(2_500);
    expect(registry.update(alice, 1.25, -3)).toBe(true);

    expect(registry.get(alice)).toEqual({ id: 'aaaaaaaa', x: 1.25, y: -3, lastSeen: 3_500 });
  });

  it('never moves lastSeen backwards', () => {
    const { registry, setNow } = createTestRegistry(5_000);
    const alice = new FakeConnection();
    registry.add(alice, record('aaaaaaaa', 5_000));

    setNow(4_000);
    registry.update(alice, 1, 1);

    expect(registry.get(alice)?.lastSeen).toBe(5_000);
  });

  it('treats updates to unknown connections as no-ops', () => {
    const { registry } = createTestRegistry();
    const ghost = new FakeConnection();

    expect(registry.update(ghost, 1, 2)).toBe(false);
    expect(registry.size).toBe(0);
  });

  it('deletes idempotently', () => {
    const { registry } = createTestRegistry();
    const alice = new FakeConnection();
    const bob = new FakeConnection();
    registry.add(alice, record('aaaaaaaa'));
    registry.add(bob, record('bbbbbbbb'));

    expect(registry.delete(alice)?.id).toBe('aaaaaaaa');
    const afterFirst = registry.snapshot();
    expect(registry.delete(alice)).toBeNull();

    expect(registry.snapshot()).toEqual(afterFirst);
    expect(registry.size).toBe(1);
  });

  it('returns copies rather than live records', () => {
    const { registry } = createTestRegistry();
    const alice = new FakeConnection();
    registry.add(alice, record('aaaaaaaa'));

    const [copy] = registry.snapshot();
    copy.x = 99;
    registry.forEach((_, player) => {
      player.y = 42;
    });

    expect(registry.get(alice)).toEqual(record('aaaaaaaa'));
  });

  it('stops iteration when the visitor returns false', () => {
    const { registry } = createTestRegistry();
    registry.add(new FakeConnection(), record('aaaaaaaa'));
    registry.add(new FakeConnection(), record('bbbbbbbb'));
    registry.add(new FakeConnection(), record('cccccccc'));

    let visited = 0;
    registry.forEach(() => {
      visited += 1;
      return false;
    });

    expect(visited).toBe(1);
  });

  it('rejects re-entrant calls from a visitor and releases the lock afterwards', () => {
    const { registry } = createTestRegistry();
    const alice = new FakeConnection();
    registry.add(alice, record('aaaaaaaa'));

    expect(() =>
      registry.forEach((handle) => {
        registry.delete(handle);
      }),
    ).toThrow(RegistryReentrancyError);

    expect(registry.delete(alice)?.id).toBe('aaaaaaaa');
  });

  it('sweeps connections idle for longer than the timeout', () => {
    const { registry, advance } = createTestRegistry(0);
    const idle = new FakeConnection();
    const busy = new FakeConnection();
    registry.add(idle, record('aaaaaaaa', 0));
    registry.add(busy, record('bbbbbbbb', 0));

    advance(20_000);
    registry.update(busy, 1, 1);
    advance(11_000);

    const evicted = registry.sweepStale(30_000);

    expect(evicted.map((player) => player.id)).toEqual(['aaaaaaaa']);
    expect(idle.closeReasons).toEqual(['Inactive']);
    expect(busy.closed).toBe(false);
    expect(entries(registry).map(([handle]) => handle)).toEqual([busy]);
  });

  it('does not sweep a connection exactly at the timeout boundary', () => {
    const { registry, advance } = createTestRegistry(0);
    const alice = new FakeConnection();
    registry.add(alice, record('aaaaaaaa', 0));

    advance(30_000);

    expect(registry.sweepStale(30_000)).toEqual([]);
    expect(registry.size).toBe(1);
  });

  it('keeps both indexes consistent across mixed operations', () => {
    const { registry, advance } = createTestRegistry(0);
    const handles = Array.from({ length: 6 }, () => new FakeConnection());
    const ids = ['aaaaaaaa', 'bbbbbbbb', 'cccccccc', 'aaaaaaaa', 'dddddddd', 'bbbbbbbb'];

    handles.forEach((handle, index) => {
      registry.add(handle, record(ids[index], 0));
      advance(1_000);
    });
    registry.update(handles[4], 3, 3);
    registry.delete(handles[2]);
    advance(30_000);
    registry.update(handles[5], 1, 1);
    registry.sweepStale(30_000);

    const live = entries(registry);
    const liveIds = live.map(([, player]) => player.id);
    expect(new Set(liveIds).size).toBe(liveIds.length);
    expect(live.map(([handle]) => handle)).toEqual([handles[4], handles[5]]);
    expect(liveIds).toEqual(['dddddddd', 'bbbbbbbb']);
    expect(handles[0].closed).toBe(true);
    expect(handles[1].closed).toBe(true);
    expect(handles[3].closed).toBe(true);
  });
});
