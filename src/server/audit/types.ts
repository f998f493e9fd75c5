export type AuditResult = "success" | "failure";

export type AuditEvent = {
  timestamp?: string;
  sessionToken?: string;
  accessKeyHash?: string;
  provider?: string;
  operation: string;
  bucket?: string;
  key?: string;
  resourcePath?: string;
  result: AuditResult;
  error?: string;
  durationMs?: number;
};

export type AuditColumn = keyof AuditEvent;

export type AuditSink = {
  write(event: AuditEvent): Promise<void>;
  shutdown(): Promise<void>;
};
