// @module: shared-ws-frame
// @tags: websocket, schema, helpers
import { z } from 'zod';

export type MessageFrame<Type extends string = string> = {
  type: Type;
} & Record<string, unknown>;

export const messageFrameSchema = z
  .object({
    type: z.string().min(1, 'type is required'),
  })
  .passthrough();

export type FrameParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'invalid_json' | 'invalid_frame' | 'invalid_payload'; message: string };

// Socket.IO delivers parsed objects, but clients that emit raw text still go through JSON.parse.
export const parseFrame = (raw: unknown): FrameParseResult<MessageFrame> => {
  let candidate: unknown = raw;

  if (typeof raw === 'string') {
    try {
      candidate = JSON.parse(raw);
    } catch (error) {
      return {
        ok: false,
        reason: 'invalid_json',
        message: error instanceof Error ? error.message : 'Invalid JSON',
      };
    }
  }

  const result = messageFrameSchema.safeParse(candidate);
  if (!result.success) {
    return { ok: false, reason: 'invalid_frame', message: result.error.message };
  }

  return { ok: true, value: result.data };
};
