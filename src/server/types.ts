import type { Readable } from "node:stream";
import type { ConnectionConfig } from "../shared/types.js";

export type { ApiErrorShape } from "../shared/errors.js";
export type { ConnectionConfig, ConnectionSummary } from "../shared/types.js";

export type SessionConnection = ConnectionConfig;

export type ObjectKeysResponse = {
  bucket: string;
  keys: string[];
};

export type CreateBucketResult = {
  bucket: string;
  locationConstraint?: string;
};

export type ObjectStream = {
  body?: Readable;
  contentType?: string;
};
