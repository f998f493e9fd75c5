import { promises as fs } from "node:fs";
import path from "node:path";
import type { AuditColumn, AuditEvent, AuditSink } from "./types.js";

export const AUDIT_COLUMNS: readonly AuditColumn[] = [
  "timestamp",
  "sessionToken",
  "accessKeyHash",
  "provider",
  "operation",
  "bucket",
  "key",
  "resourcePath",
  "result",
  "error",
  "durationMs",
];

const FILE_PATTERN = /^audit-log_(\d{8})\.csv$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export const toCsvValue = (value: string | number | undefined): string => {
  if (value === undefined) {
    return "";
  }

  const text = String(value);

  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }

  return text;
};

export const toCsvLine = (event: AuditEvent): string => {
  return AUDIT_COLUMNS.map((column) => toCsvValue(event[column])).join(",");
};

export const formatDateKey = (date: Date): string => {
  return date.toISOString().slice(0, 10).replace(/-/g, "");
};

export const auditFileName = (dateKey: string): string => `audit-log_${dateKey}.csv`;

/**
 * Appends audit events to one CSV file per UTC day and removes files older than
 * the retention window. Writes are serialized so concurrent requests cannot
 * interleave a header with a row.
 */
export class FilesystemAuditSink implements AuditSink {
  private readonly dir: string;
  private readonly retentionDays: number;
  private lastCleanupKey: string | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(dir: string, retentionDays: number) {
    this.dir = dir;
    this.retentionDays = retentionDays;
  }

  write(event: AuditEvent): Promise<void> {
    const next = this.queue.then(() => this.append(event));
    // A failed write must not block the ones queued after it.
    this.queue = next.catch(() => undefined);
    return next;
  }

  async shutdown(): Promise<void> {
    await this.queue;
    await this.cleanup(formatDateKey(new Date()));
  }

  private async append(event: AuditEvent): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });

    const dateKey = formatDateKey(event.timestamp ? new Date(event.timestamp) : new Date());
    const filePath = path.join(this.dir, auditFileName(dateKey));
    const isNewFile = await fs
      .stat(filePath)
      .then((stats) => stats.size === 0)
      .catch(() => true);
    const header = isNewFile ? `${AUDIT_COLUMNS.join(",")}\n` : "";

    await fs.appendFile(filePath, `${header}${toCsvLine(event)}\n`);

    if (this.lastCleanupKey !== dateKey) {
      await this.cleanup(dateKey);
    }
  }

  private async cleanup(dateKey: string): Promise<void> {
    if (this.retentionDays <= 0) {
      return;
    }

    this.lastCleanupKey = dateKey;
    const cutoffKey = formatDateKey(new Date(Date.now() - this.retentionDays * DAY_MS));
    const entries = await fs.readdir(this.dir).catch((): string[] => []);

    const expired = entries.filter((entry) => {
      const match = FILE_PATTERN.exec(entry);
      return match !== null && match[1] < cutoffKey;
    });

    await Promise.all(expired.map((entry) => fs.rm(path.join(this.dir, entry), { force: true })));
  }
}
