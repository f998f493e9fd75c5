import os from "node:os";
import path from "node:path";
import { ObjectCannedACL } from "@aws-sdk/client-s3";
import { z } from "zod";

export const parseEnvBool = (val: unknown, def: boolean): boolean => {
  if (typeof val === "boolean") return val;
  if (typeof val === "string") {
    const v = val.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(v)) return true;
    if (["0", "false", "no", "off", ""].includes(v)) return false;
  }
  if (typeof val === "number") return val !== 0;
  return def;
};

const envBool = (def: boolean) => z.preprocess((v) => parseEnvBool(v, def), z.boolean());

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().default(3000),
  REDIS_URL: z.string().min(1),
  S3_FORCE_PATH_STYLE: envBool(true),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(86400),
  COOKIE_NAME: z.string().default("skiff_session"),
  MAX_UPLOAD_SIZE_MB: z.coerce.number().positive().default(100),
  UPLOAD_ACL: z.nativeEnum(ObjectCannedACL).default(ObjectCannedACL.private),
  DOWNLOAD_DIR: z.string().min(1).default(path.join(os.homedir(), "Downloads")),
  BUCKET_PROPAGATION_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  AUDIT_LOG_SINK: z.enum(["filesystem", "none"]).default("filesystem"),
  AUDIT_LOG_DIR: z.string().default("audit-logs"),
  AUDIT_LOG_RETENTION_DAYS: z.coerce.number().int().min(1).default(30),
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_RELEASE: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
  SENTRY_ENABLE_LOGS: envBool(true),
  SENTRY_ENABLE_METRICS: envBool(true),
});

export type ServerConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("Invalid environment configuration", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const config: ServerConfig = parsed.data;

export const cookieConfig = {
  httpOnly: true,
  sameSite: "lax" as const,
  path: "/",
  secure: config.NODE_ENV === "production",
  maxAge: config.SESSION_TTL_SECONDS,
};
