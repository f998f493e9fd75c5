import type { FastifyInstance } from "fastify";
import { ENDPOINT_EXAMPLES, PROVIDER_LABELS, PROVIDER_PRESETS } from "../shared/providers.js";
import { config, parseEnvBool } from "./config.js";

type Env = Record<string, string | undefined>;

/**
 * Browser Sentry settings come from FRONTEND_SENTRY_* variables read at request
 * time, so one build can be pointed at different projects.
 */
export const buildRuntimeConfig = (env: Env = process.env) => {
  return {
    sentry: {
      dsn: env.FRONTEND_SENTRY_DSN || undefined,
      environment: env.FRONTEND_SENTRY_ENVIRONMENT || config.NODE_ENV,
      release: env.FRONTEND_SENTRY_RELEASE || undefined,
      tracesSampleRate: env.FRONTEND_SENTRY_TRACES_SAMPLE_RATE || "0.1",
      enableLogs: parseEnvBool(env.FRONTEND_SENTRY_ENABLE_LOGS, true),
      enableMetrics: parseEnvBool(env.FRONTEND_SENTRY_ENABLE_METRICS, true),
      replaysSessionSampleRate: env.FRONTEND_SENTRY_REPLAYS_SESSION_SAMPLE_RATE || "0.1",
      replaysOnErrorSampleRate: env.FRONTEND_SENTRY_REPLAYS_ON_ERROR_SAMPLE_RATE || "1.0",
    },
  };
};

export function registerRuntimeConfigRoute(app: FastifyInstance): void {
  app.get("/api/runtime-config", async () => buildRuntimeConfig());

  app.get("/api/providers", async () => ({
    providers: PROVIDER_LABELS.map((label) => PROVIDER_PRESETS[label]),
    examples: ENDPOINT_EXAMPLES,
  }));
}
