import { z } from 'zod';

export const statusPlayerSchema = z.object({
  id: z.string().min(1),
  x: z.number(),
  y: z.number(),
  lastSeenMs: z.number().int().min(0),
});

export const statusResponseSchema = z.object({
  count: z.number().int().min(0),
  generatedAt: z.string().datetime(),
  players: z.array(statusPlayerSchema),
});

export type StatusPlayer = z.infer<typeof statusPlayerSchema>;
export type StatusResponse = z.infer<typeof statusResponseSchema>;
