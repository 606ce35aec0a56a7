import { z } from 'zod';
import { parseFrame, type FrameParseResult } from './envelope.js';

export const MOVE_MESSAGE_TYPE = 'move';

const coordinateSchema = z.number().finite('coordinate must be a finite number');

export const playerIdSchema = z
  .string()
  .regex(/^[0-9a-f]{8,64}$/, 'player id must be 8-64 lowercase hex characters');

export const moveMessageSchema = z.object({
  type: z.literal(MOVE_MESSAGE_TYPE),
  playerId: z.string().min(1),
  x: coordinateSchema,
  y: coordinateSchema,
});

export type MoveMessage = z.infer<typeof moveMessageSchema>;

// Inbound moves may carry any claimed playerId (or none); the server overwrites it.
export const inboundMoveSchema = z.object({
  type: z.literal(MOVE_MESSAGE_TYPE),
  playerId: z.string().optional(),
  x: coordinateSchema,
  y: coordinateSchema,
});

export type InboundMove = z.infer<typeof inboundMoveSchema>;

export const playerStateMessageSchema = z.object({
  id: z.string().min(1),
  x: coordinateSchema,
  y: coordinateSchema,
  /** Present only when the server accepts identity resumption. */
  resumeToken: z.string().regex(/^[0-9a-f]{64}$/).optional(),
});

export type PlayerStateMessage = z.infer<typeof playerStateMessageSchema>;

export type InboundMessage =
  | { kind: 'move'; move: InboundMove }
  | { kind: 'unknown'; type: string };

export const parseInboundMessage = (raw: unknown): FrameParseResult<InboundMessage> => {
  const frame = parseFrame(raw);
  if (!frame.ok) {
    return frame;
  }

  if (frame.value.type !== MOVE_MESSAGE_TYPE) {
    return { ok: true, value: { kind: 'unknown', type: frame.value.type } };
  }

  const move = inboundMoveSchema.safeParse(frame.value);
  if (!move.success) {
    return { ok: false, reason: 'invalid_payload', message: move.error.message };
  }

  return { ok: true, value: { kind: 'move', move: move.data } };
};
