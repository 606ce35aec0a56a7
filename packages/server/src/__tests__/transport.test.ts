import { afterEach, describe, expect, it, vi } from 'vitest';
import { withDeadline } from '../relay/deadline.js';
import { ConnectionClosedError, DeadlineExceededError } from '../relay/errors.js';
import { MessageInbox } from '../relay/inbox.js';

describe('withDeadline', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the operation result when it settles in time', async () => {
    await expect(withDeadline(Promise.resolve('done'), 1_000, 'write')).resolves.toBe('done');
  });

  it('rejects with DeadlineExceededError once the timeout elapses', async () => {
    vi.useFakeTimers();
    const pending = withDeadline(new Promise<never>(() => {}), 5_000, 'read');
    const assertion = expect(pending).rejects.toThrow(
      new DeadlineExceededError('read', 5_000).message,
    );

    await vi.advanceTimersByTimeAsync(5_000);
    await assertion;
  });

  it('propagates the operation error unchanged', async () => {
    const failure = new Error('socket reset');
    await expect(withDeadline(Promise.reject(failure), 1_000, 'write')).rejects.toBe(failure);
  });
});

describe('MessageInbox', () => {
  it('hands buffered payloads out in arrival order', async () => {
    const inbox = new MessageInbox();
    inbox.push('first');
    inbox.push('second');

    await expect(inbox.next()).resolves.toBe('first');
    await expect(inbox.next()).resolves.toBe('second');
    expect(inbox.size).toBe(0);
  });

  it('resolves a waiting reader when a payload arrives', async () => {
    const inbox = new MessageInbox();
    const reading = inbox.next();
    inbox.push({ type: 'move' });

    await expect(reading).resolves.toEqual({ type: 'move' });
  });

  it('rejects the pending and later reads once closed', async () => {
    const inbox = new MessageInbox();
    const reading = inbox.next();
    inbox.close();
    inbox.push('ignored');

    await expect(reading).rejects.toBeInstanceOf(ConnectionClosedError);
    await expect(inbox.next()).rejects.toBeInstanceOf(ConnectionClosedError);
    expect(inbox.closed).toBe(true);
  });

  it('allows only one outstanding reader', async () => {
    const inbox = new MessageInbox();
    const first = inbox.next();

    await expect(inbox.next()).rejects.toThrow('MessageInbox supports a single reader');

    inbox.push('payload');
    await expect(first).resolves.toBe('payload');
  });

  it('closes with an overflow error once more than the limit is buffered', async () => {
    const inbox = new MessageInbox({ limit: 2 });

    expect(inbox.push('one')).toBe(true);
    expect(inbox.push('two')).toBe(true);
    expect(inbox.push('three')).toBe(false);

    expect(inbox.closed).toBe(true);
    expect(inbox.size).toBe(0);
    expect(inbox.push('four')).toBe(false);
    await expect(inbox.next()).rejects.toThrow(
      new ConnectionClosedError('inbound queue overflow'),
    );
  });

  it('does not count payloads handed straight to a waiting reader', async () => {
    const inbox = new MessageInbox({ limit: 1 });

    for (let i = 0; i < 5; i += 1) {
      const reading = inbox.next();
      expect(inbox.push(i)).toBe(true);
      await expect(reading).resolves.toBe(i);
    }
    expect(inbox.closed).toBe(false);
  });
});
