import * as Sentry from "@sentry/react";
import { getRuntimeConfig } from "./lib/api";
import type { RuntimeSentryConfig } from "./lib/types";

export const parseRate = (value: string | number | undefined, fallback: number): number => {
  if (value === undefined) {
    return fallback;
  }

  const parsed = typeof value === "number" ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) && parsed >= 0 && parsed <= 1 ? parsed : fallback;
};

const fetchRuntimeSentryConfig = async (): Promise<RuntimeSentryConfig | null> => {
  try {
    const body = await getRuntimeConfig();
    return body.sentry ?? null;
  } catch (error) {
    console.warn("Runtime config unavailable; Sentry stays disabled", error);
    return null;
  }
};

export const initializeSentry = async (): Promise<void> => {
  const runtimeConfig = await fetchRuntimeSentryConfig();

  if (!runtimeConfig?.dsn) {
    return;
  }

  Sentry.init({
    dsn: runtimeConfig.dsn,
    environment: runtimeConfig.environment ?? import.meta.env.MODE,
    release: runtimeConfig.release,
    tracesSampleRate: parseRate(runtimeConfig.tracesSampleRate, 0.1),
    enableLogs: runtimeConfig.enableLogs ?? true,
    enableMetrics: runtimeConfig.enableMetrics ?? true,
    // Request bodies carry storage credentials.
    sendDefaultPii: false,
    integrations: [Sentry.browserTracingIntegration(), Sentry.replayIntegration()],
    replaysSessionSampleRate: parseRate(runtimeConfig.replaysSessionSampleRate, 0.1),
    replaysOnErrorSampleRate: parseRate(runtimeConfig.replaysOnErrorSampleRate, 1),
  });

  Sentry.logger.info("Frontend initialized", { mode: import.meta.env.MODE });
  Sentry.metrics.count("frontend.app.boot", 1);
};
