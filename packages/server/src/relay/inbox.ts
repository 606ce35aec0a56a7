import { ConnectionClosedError } from './errors.js';

interface PendingRead {
  resolve: (payload: unknown) => void;
  reject: (error: Error) => void;
}

export const DEFAULT_INBOX_LIMIT = 256;

/**
 * FIFO of inbound payloads for one connection with at most one outstanding reader.
 * Buffering more than `limit` unread payloads closes the inbox.
 */
export class MessageInbox {
  private readonly limit: number;
  private readonly buffered: unknown[] = [];
  private pending: PendingRead | null = null;
  private closedWith: Error | null = null;

  constructor({ limit = DEFAULT_INBOX_LIMIT }: { limit?: number } = {}) {
    this.limit = limit;
  }

  get closed(): boolean {
    return this.closedWith !== null;
  }

  get size(): number {
    return this.buffered.length;
  }

  /** Returns false when the payload was dropped: the inbox is closed or just overflowed. */
  push(payload: unknown): boolean {
    if (this.closedWith) {
      return false;
    }

    if (this.pending) {
      const reader = this.pending;
      this.pending = null;
      reader.resolve(payload);
      return true;
    }

    if (this.buffered.length >= this.limit) {
      this.close(new ConnectionClosedError('inbound queue overflow'));
      return false;
    }

    this.buffered.push(payload);
    return true;
  }

  next(): Promise<unknown> {
    if (this.buffered.length > 0) {
      return Promise.resolve(this.buffered.shift());
    }

    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }

    if (this.pending) {
      return Promise.reject(new Error('MessageInbox supports a single reader'));
    }

    return new Promise<unknown>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  close(error: Error = new ConnectionClosedError()): void {
    if (this.closedWith) {
      return;
    }

    this.closedWith = error;
    this.buffered.length = 0;
    if (this.pending) {
      const reader = this.pending;
      this.pending = null;
      reader.reject(error);
    }
  }
}
