import type { MoveMessage, PlayerStateMessage } from '@posrelay/schemas';

export interface PlayerRecord {
  id: string;
  x: number;
  y: number;
  /** Epoch milliseconds of the last valid message. */
  lastSeen: number;
}

export type MoveEvent = Readonly<MoveMessage>;

export type OutboundMessage = PlayerStateMessage | MoveEvent;

/**
 * Opaque capability for one live connection. The registry keys on the handle object itself,
 * so a reconnect always yields a distinct key even when the player id is reused.
 */
export interface ConnectionHandle {
  /** Transport token, used for log correlation only. */
  readonly id: string;
  /** Identity the client asked to resume, with the token it was issued. */
  readonly resumeRequest: ResumeRequest | null;
  readonly closed: boolean;
  send(message: OutboundMessage): Promise<void>;
  read(): Promise<unknown>;
  close(reason: string): void;
}

export type Clock = () => number;

export interface ResumeRequest {
  playerId: string;
  resumeToken: string;
}
