import { z } from 'zod';

const numericEnv = (value: unknown, defaultValue: number): number => {
  if (value === undefined || value === null || value === "") {
    return defaultValue;
  }

  if (typeof value === "number") {
    return value;
  }

  if (typeof value === "string") {
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed)) {
      throw new Error(`Expected numeric string but received ${value}`);
    }

    return parsed;
  }

  throw new Error(`Unsupported numeric env value: ${String(value)}`);
};

const booleanEnv = (value: unknown, defaultValue: boolean): boolean => {
  if (value === undefined || value === null || value === "") {
    return defaultValue;
  }

  if (typeof value === "boolean") {
    return value;
  }

  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(normalized)) {
      return true;
    }
    if (["0", "false", "no", "off"].includes(normalized)) {
      return false;
    }
  }

  throw new Error(`Unsupported boolean env value: ${String(value)}`);
};

const durationMs = (defaultValue: number, minimum: number) =>
  z.preprocess((value) => numericEnv(value, defaultValue), z.number().int().min(minimum));

const configSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    HOST: z.string().default("0.0.0.0"),
    PORT: z
      .preprocess((value) => numericEnv(value, 8080), z.number().int().min(0).max(65535)),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    CLIENT_ORIGIN: z.string().default("http://localhost:5173"),
    WS_PATH: z.string().startsWith("/", "WS_PATH must start with /").default("/game"),
    READ_TIMEOUT_MS: durationMs(120_000, 1),
    WRITE_TIMEOUT_MS: durationMs(5_000, 1),
    SYNC_WRITE_TIMEOUT_MS: durationMs(10_000, 1),
    SWEEP_INTERVAL_MS: durationMs(10_000, 1),
    STALE_TIMEOUT_MS: durationMs(30_000, 1),
    INBOUND_QUEUE_LIMIT: z
      .preprocess((value) => numericEnv(value, 256), z.number().int().min(1)),
    ALLOW_IDENTITY_RESUME: z.preprocess((value) => booleanEnv(value, false), z.boolean()),
  })
  .refine((config) => config.STALE_TIMEOUT_MS > config.SWEEP_INTERVAL_MS, {
    message: "STALE_TIMEOUT_MS must be longer than SWEEP_INTERVAL_MS",
    path: ["STALE_TIMEOUT_MS"],
  });

export type ServerConfig = z.infer<typeof configSchema>;

const LOCALHOST_HOSTNAMES = new Set(["localhost", "127.0.0.1", "[::1]"]);

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const buildLocalhostPattern = (parsed: URL): RegExp => {
  const hosts = Array.from(LOCALHOST_HOSTNAMES, escapeRegExp).join("|");
  return new RegExp(`^${escapeRegExp(parsed.protocol)}//(${hosts})(:\\d+)?$`);
};

export const resolveCorsOrigins = (origin: string): string | RegExp => {
  let parsed: URL;
  try {
    parsed = new URL(origin);
  } catch (error) {
    return origin;
  }

  if (!LOCALHOST_HOSTNAMES.has(parsed.hostname)) {
    return parsed.origin;
  }

  return buildLocalhostPattern(parsed);
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  const parsed = configSchema.parse({
    NODE_ENV: env.NODE_ENV,
    HOST: env.HOST,
    PORT: env.PORT,
    LOG_LEVEL: env.LOG_LEVEL,
    CLIENT_ORIGIN: env.CLIENT_ORIGIN,
    WS_PATH: env.WS_PATH,
    READ_TIMEOUT_MS: env.READ_TIMEOUT_MS,
    WRITE_TIMEOUT_MS: env.WRITE_TIMEOUT_MS,
    SYNC_WRITE_TIMEOUT_MS: env.SYNC_WRITE_TIMEOUT_MS,
    SWEEP_INTERVAL_MS: env.SWEEP_INTERVAL_MS,
    STALE_TIMEOUT_MS: env.STALE_TIMEOUT_MS,
    INBOUND_QUEUE_LIMIT: env.INBOUND_QUEUE_LIMIT,
    ALLOW_IDENTITY_RESUME: env.ALLOW_IDENTITY_RESUME,
  });

  return parsed;
};
