import { z } from 'zod';
import { roomIdSchema } from '@huddle/schemas';

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

const listEnv = (value: unknown): string[] => {
  if (typeof value !== "string") {
    return [];
  }

  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
};

const configSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z
    .preprocess((value) => numericEnv(value, 3001), z.number().int().min(0).max(65535)),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  JWT_SECRET: z
    .string()
    .min(1, "JWT_SECRET is required")
    .default("development-insecure-secret"),
  JWT_ISSUER: z.string().default("huddle"),
  JWT_AUDIENCE: z.string().default("huddle.client"),
  TOKEN_TTL_SECONDS: z
    .preprocess((value) => numericEnv(value, 3600), z.number().int().min(60)),
  CLIENT_ORIGIN: z.string().default("http://localhost:5173"),
  ADMIN_API_KEY: z
    .string()
    .min(8, "ADMIN_API_KEY must be at least 8 characters")
    .default("development-admin-key"),
  WS_PATH: z.string().startsWith("/", "WS_PATH must start with /").default("/ws"),
  MAX_WS_MESSAGE_BYTES: z
    .preprocess((value) => numericEnv(value, 64 * 1024), z.number().int().min(1024)),
  ROOM_EVENT_BUFFER: z
    .preprocess((value) => numericEnv(value, 256), z.number().int().min(1)),
  BOOTSTRAP_ROOMS: z
    .preprocess(listEnv, z.array(roomIdSchema))
    .transform((roomIds) => Array.from(new Set(roomIds))),
});

export type ServerConfig = z.infer<typeof configSchema>;

const LOCALHOST_HOSTNAMES = new Set(["localhost", "127.0.0.1", "[::1]"]);

const buildLocalhostAllowList = (parsed: URL): string[] => {
  const portSuffix = parsed.port ? `:${parsed.port}` : "";
  const protocolPrefix = `${parsed.protocol}//`;

  const origins = new Set<string>();
  for (const hostname of LOCALHOST_HOSTNAMES) {
    origins.add(`${protocolPrefix}${hostname}${portSuffix}`);
  }

  return Array.from(origins);
};

export const resolveCorsOrigins = (origin: string): string | string[] => {
  let parsed: URL;
  try {
    parsed = new URL(origin);
  } catch {
    return origin;
  }

  if (!LOCALHOST_HOSTNAMES.has(parsed.hostname)) {
    return parsed.origin;
  }

  return buildLocalhostAllowList(parsed);
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  const parsed = configSchema.parse({
    NODE_ENV: env.NODE_ENV,
    HOST: env.HOST,
    PORT: env.PORT,
    LOG_LEVEL: env.LOG_LEVEL,
    JWT_SECRET: env.JWT_SECRET,
    JWT_ISSUER: env.JWT_ISSUER,
    JWT_AUDIENCE: env.JWT_AUDIENCE,
    TOKEN_TTL_SECONDS: env.TOKEN_TTL_SECONDS,
    CLIENT_ORIGIN: env.CLIENT_ORIGIN,
    ADMIN_API_KEY: env.ADMIN_API_KEY,
    WS_PATH: env.WS_PATH,
    MAX_WS_MESSAGE_BYTES: env.MAX_WS_MESSAGE_BYTES,
    ROOM_EVENT_BUFFER: env.ROOM_EVENT_BUFFER,
    BOOTSTRAP_ROOMS: env.BOOTSTRAP_ROOMS,
  });

  return parsed;
};
