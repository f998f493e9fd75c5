import crypto from "node:crypto";
import { Redis } from "ioredis";
import { z } from "zod";
import { PROVIDER_LABELS } from "../shared/providers.js";
import { config } from "./config.js";
import type { SessionConnection } from "./types.js";

const redis = new Redis(config.REDIS_URL);

const redisKeyPrefix = "skiff";
const sessionKey = (token: string) => `${redisKeyPrefix}:session:${token}`;

const storedConnectionSchema = z.object({
  provider: z.enum(PROVIDER_LABELS),
  endpoint: z.string().min(1),
  region: z.string().min(1),
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
});

const parseStoredConnection = (data: string): SessionConnection | null => {
  let payload: unknown;

  try {
    payload = JSON.parse(data);
  } catch {
    return null;
  }

  const parsed = storedConnectionSchema.safeParse(payload);
  return parsed.success ? parsed.data : null;
};

export const createSession = async (connection: SessionConnection): Promise<string> => {
  const token = crypto.randomBytes(48).toString("base64url");
  const payload = JSON.stringify(connection);
  await redis.set(sessionKey(token), payload, "EX", config.SESSION_TTL_SECONDS);
  return token;
};

export const getSessionConnection = async (token: string): Promise<SessionConnection | null> => {
  const data = await redis.get(sessionKey(token));

  if (!data) {
    return null;
  }

  const connection = parseStoredConnection(data);

  if (!connection) {
    await redis.del(sessionKey(token));
    return null;
  }

  // Sliding expiration: every authenticated request renews the TTL.
  await redis.expire(sessionKey(token), config.SESSION_TTL_SECONDS);
  return connection;
};

export const deleteSession = async (token: string): Promise<void> => {
  await redis.del(sessionKey(token));
};

export const closeRedis = async (): Promise<void> => {
  await redis.quit();
};
