import "dotenv/config";
import * as Sentry from "@sentry/node";

const dsn = process.env.SENTRY_DSN;

const isDisabled = (value: string | undefined): boolean =>
  ["0", "false", "no", "off"].includes((value ?? "").trim().toLowerCase());

// Loaded before anything else so instrumentation can patch fastify and the S3 client.
if (dsn) {
  Sentry.init({
    dsn,
    environment: process.env.SENTRY_ENVIRONMENT || process.env.NODE_ENV || "development",
    release: process.env.SENTRY_RELEASE,
    tracesSampleRate: Number(process.env.SENTRY_TRACES_SAMPLE_RATE || 0.1),
    enableLogs: !isDisabled(process.env.SENTRY_ENABLE_LOGS),
    enableMetrics: !isDisabled(process.env.SENTRY_ENABLE_METRICS),
    sendDefaultPii: false,
    integrations: [
      Sentry.consoleLoggingIntegration({
        levels: ["warn", "error"],
      }),
    ],
  });
}
