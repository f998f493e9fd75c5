import type { ProviderLabel } from "./providers.js";

export type ConnectionConfig = {
  provider: ProviderLabel;
  endpoint: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
};

export type ConnectionSummary = Pick<ConnectionConfig, "provider" | "endpoint" | "region">;

export type DownloadDestination = {
  directory?: string;
  filename?: string;
};
