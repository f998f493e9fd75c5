import { createHash } from "node:crypto";
import { config } from "../config.js";
import { toErrorMessage } from "../errors.js";
import { FilesystemAuditSink } from "./fs-sink.js";
import type { AuditEvent, AuditSink } from "./types.js";

const MAX_ERROR_LENGTH = 1000;

class NoopAuditSink implements AuditSink {
  async write(): Promise<void> {
    return;
  }

  async shutdown(): Promise<void> {
    return;
  }
}

let auditSink: AuditSink = new NoopAuditSink();

export const buildResourcePath = (event: AuditEvent): string | undefined => {
  if (!event.bucket) {
    return event.resourcePath;
  }

  return event.key ? `${event.bucket}/${event.key}` : event.bucket;
};

const normalizeEvent = (event: AuditEvent): AuditEvent => {
  return {
    ...event,
    timestamp: event.timestamp || new Date().toISOString(),
    error: event.error ? event.error.slice(0, MAX_ERROR_LENGTH) : undefined,
    resourcePath: event.resourcePath || buildResourcePath(event),
  };
};

export const initializeAuditLogger = (sink?: AuditSink): AuditSink => {
  if (sink) {
    auditSink = sink;
  } else if (config.AUDIT_LOG_SINK === "filesystem") {
    auditSink = new FilesystemAuditSink(config.AUDIT_LOG_DIR, config.AUDIT_LOG_RETENTION_DAYS);
  } else {
    auditSink = new NoopAuditSink();
  }

  return auditSink;
};

export const shutdownAuditLogger = async (): Promise<void> => {
  await auditSink.shutdown();
};

const sha256 = (value?: string): string | undefined => {
  if (!value) {
    return undefined;
  }

  return createHash("sha256").update(value).digest("hex");
};

export const hashAccessKeyId = (accessKeyId?: string): string | undefined => sha256(accessKeyId);

export const hashSessionToken = (token?: string): string | undefined => sha256(token);

/** Never throws: an audit failure is logged and the request carries on. */
export const recordAuditEvent = async (event: AuditEvent): Promise<void> => {
  try {
    await auditSink.write(normalizeEvent(event));
  } catch (error) {
    console.error("Failed to write audit event", toErrorMessage(error));
  }
};

export type { AuditEvent, AuditSink } from "./types.js";
