import { createHmac, randomBytes, timingSafeEqual } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import { playerIdSchema } from '@posrelay/schemas';
import type { Clock, ResumeRequest } from './types.js';

const PLAYER_ID_BYTES = 8;
const RESUME_SECRET_BYTES = 32;

export interface IdentityGenerator {
  generate(): string;
  /** Token proving ownership of `playerId`, or `null` when resumption is disabled. */
  issueResumeToken(playerId: string): string | null;
  /** Reuses the requested id only when resumption is allowed and the token matches. */
  resolve(request: ResumeRequest | null): string;
}

export interface IdentityGeneratorOptions {
  logger: FastifyBaseLogger;
  allowResume: boolean;
  randomSource?: (size: number) => Buffer;
  resumeSecret?: Buffer;
  now?: Clock;
}

export const createIdentityGenerator = ({
  logger,
  allowResume,
  randomSource = randomBytes,
  resumeSecret = randomBytes(RESUME_SECRET_BYTES),
  now = Date.now,
}: IdentityGeneratorOptions): IdentityGenerator => {
  let fallbackCounter = 0;

  const fallbackId = (): string => {
    fallbackCounter = (fallbackCounter + 1) % 0x10000;
    return `${now().toString(16)}${fallbackCounter.toString(16).padStart(4, '0')}`;
  };

  const generate = (): string => {
    try {
      return randomSource(PLAYER_ID_BYTES).toString('hex');
    } catch (error) {
      logger.error({ err: error }, 'Entropy source failed; using timestamp identifier');
      return fallbackId();
    }
  };

  const sign = (playerId: string): Buffer =>
    createHmac('sha256', resumeSecret).update(playerId).digest();

  const issueResumeToken = (playerId: string): string | null =>
    allowResume ? sign(playerId).toString('hex') : null;

  const tokenMatches = (playerId: string, token: string): boolean => {
    const expected = sign(playerId);
    const presented = Buffer.from(token, 'hex');
    return presented.length === expected.length && timingSafeEqual(presented, expected);
  };

  const resolve = (request: ResumeRequest | null): string => {
    if (request === null || !allowResume) {
      return generate();
    }

    const parsed = playerIdSchema.safeParse(request.playerId);
    if (!parsed.success) {
      logger.warn({ requestedId: request.playerId }, 'Ignoring malformed requested identity');
      return generate();
    }

    if (!tokenMatches(parsed.data, request.resumeToken)) {
      logger.warn({ requestedId: parsed.data }, 'Rejected resume with an invalid token');
      return generate();
    }

    return parsed.data;
  };

  return { generate, issueResumeToken, resolve };
};
