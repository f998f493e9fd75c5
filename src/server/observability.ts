import * as Sentry from "@sentry/node";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { config } from "./config.js";

declare module "fastify" {
  interface FastifyRequest {
    receivedAtMs?: number;
  }
}

type MetricAttributes = Record<string, string | number | boolean>;

type SentryLogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const REDACTED = "[REDACTED]";

const SENSITIVE_KEYS = new Set([
  "secretaccesskey",
  "accesskeyid",
  "password",
  "authorization",
  "cookie",
]);

const getRouteName = (request: FastifyRequest): string => {
  return request.routeOptions.url || request.url;
};

export const sanitizeAttributes = (value: unknown): unknown => {
  if (!value || typeof value !== "object") {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(sanitizeAttributes);
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [
      key,
      SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : sanitizeAttributes(entry),
    ]),
  );
};

// Metric attributes only carry scalar values; anything else is dropped.
const toMetricAttributes = (attributes?: Record<string, unknown>): MetricAttributes => {
  const output: MetricAttributes = {};

  for (const [key, value] of Object.entries(attributes ?? {})) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      output[key] = REDACTED;
    } else if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      output[key] = value;
    }
  }

  return output;
};

const sentryEnabled = (): boolean => Boolean(config.SENTRY_DSN);
const sentryMetricsEnabled = (): boolean => sentryEnabled() && config.SENTRY_ENABLE_METRICS;

let connectSuccessTotal = 0;
let connectFailureTotal = 0;

export const sentryLog = (
  level: SentryLogLevel,
  message: string,
  attributes?: Record<string, unknown>,
): void => {
  if (!sentryEnabled() || !config.SENTRY_ENABLE_LOGS) {
    return;
  }

  Sentry.logger[level](message, toMetricAttributes(attributes));
};

export const sentryCountMetric = (
  name: string,
  value: number,
  attributes?: Record<string, unknown>,
): void => {
  if (!sentryMetricsEnabled()) {
    return;
  }

  Sentry.metrics.count(name, value, { attributes: toMetricAttributes(attributes) });
};

export const sentryGaugeMetric = (
  name: string,
  value: number,
  attributes?: Record<string, unknown>,
): void => {
  if (!sentryMetricsEnabled()) {
    return;
  }

  Sentry.metrics.gauge(name, value, { attributes: toMetricAttributes(attributes) });
};

export const sentryDistributionMetric = (
  name: string,
  value: number,
  unit: "none" | "millisecond" = "none",
  attributes?: Record<string, unknown>,
): void => {
  if (!sentryMetricsEnabled()) {
    return;
  }

  Sentry.metrics.distribution(name, value, {
    unit,
    attributes: toMetricAttributes(attributes),
  });
};

export const recordConnectResult = (
  isSuccess: boolean,
  attributes?: Record<string, unknown>,
): void => {
  if (isSuccess) {
    connectSuccessTotal += 1;
  } else {
    connectFailureTotal += 1;
  }

  sentryGaugeMetric("connect.success", connectSuccessTotal, attributes);
  sentryGaugeMetric("connect.failure", connectFailureTotal, attributes);
};

export const registerObservabilityHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", (request, _, done) => {
    request.receivedAtMs = Date.now();

    if (sentryEnabled() && config.SENTRY_ENABLE_LOGS) {
      Sentry.getIsolationScope().setAttributes({
        route: getRouteName(request),
        method: request.method,
      });
    }

    sentryCountMetric("http.requests.total", 1, {
      method: request.method,
      route: getRouteName(request),
    });

    done();
  });

  app.addHook("onResponse", (request, reply, done) => {
    if (!sentryEnabled()) {
      done();
      return;
    }

    const durationMs = Date.now() - (request.receivedAtMs ?? Date.now());
    const attributes = {
      method: request.method,
      route: getRouteName(request),
      status_code: reply.statusCode,
    };

    sentryLog("info", "API request completed", { ...attributes, duration_ms: durationMs });
    sentryDistributionMetric("http.server.duration", durationMs, "millisecond", attributes);

    if (reply.statusCode >= 500) {
      sentryCountMetric("http.requests.errors", 1, attributes);
    }

    done();
  });
};

export const captureServerError = (
  error: unknown,
  request?: FastifyRequest,
  reply?: FastifyReply,
): void => {
  if (!sentryEnabled()) {
    return;
  }

  Sentry.withScope((scope) => {
    if (request) {
      scope.setTags({
        method: request.method,
        route: getRouteName(request),
      });
      scope.setContext("request", {
        method: request.method,
        url: request.url,
        query: sanitizeAttributes(request.query),
      });
    }

    if (reply) {
      scope.setTag("status_code", reply.statusCode.toString());
    }

    Sentry.captureException(error);
  });
};

export const shutdownObservability = async (): Promise<void> => {
  if (!sentryEnabled()) {
    return;
  }

  await Sentry.flush(2000);
};
