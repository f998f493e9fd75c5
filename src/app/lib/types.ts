import type { EndpointExample, ProviderPreset } from "../../shared/providers";
import type { ConnectionSummary } from "../../shared/types";

export type LoginResponse = {
  ok: boolean;
  buckets: string[];
};

export type SessionInfoResponse = { ok: true } & ConnectionSummary;

export type CreateBucketResponse = {
  ok: boolean;
  bucket: string;
  // Absent when the bucket was created but could not be re-listed.
  buckets?: string[];
};

export type ObjectKeysResponse = {
  bucket: string;
  keys: string[];
};

export type UploadResponse = {
  ok: boolean;
  key: string;
};

export type SavedDownloadResponse = {
  ok: boolean;
  path: string;
};

export type ProvidersResponse = {
  providers: ProviderPreset[];
  examples: EndpointExample[];
};

export type RuntimeSentryConfig = {
  dsn?: string;
  environment?: string;
  release?: string;
  tracesSampleRate?: string | number;
  enableLogs?: boolean;
  enableMetrics?: boolean;
  replaysSessionSampleRate?: string | number;
  replaysOnErrorSampleRate?: string | number;
};

export type RuntimeConfigResponse = {
  sentry?: RuntimeSentryConfig;
};
