import {
  ConsoleError,
  isConsoleErrorCode,
  isConsoleErrorKind,
  type ApiErrorShape,
} from "../../shared/errors";
import type { ConnectionConfig, DownloadDestination } from "../../shared/types";
import type { StorageGateway } from "./session-controller";
import type { UploadSource } from "./session-machine";
import type {
  CreateBucketResponse,
  LoginResponse,
  ObjectKeysResponse,
  ProvidersResponse,
  RuntimeConfigResponse,
  SavedDownloadResponse,
  SessionInfoResponse,
  UploadResponse,
} from "./types";

const readErrorBody = async (response: Response): Promise<Partial<ApiErrorShape>> => {
  const body: unknown = await response.json().catch(() => ({}));

  if (!body || typeof body !== "object") {
    return {};
  }

  return {
    error: "error" in body && typeof body.error === "string" ? body.error : undefined,
    kind: "kind" in body && isConsoleErrorKind(body.kind) ? body.kind : undefined,
    code: "code" in body && isConsoleErrorCode(body.code) ? body.code : undefined,
  };
};

const toResponseError = async (response: Response, fallback: string): Promise<ConsoleError> => {
  const body = await readErrorBody(response);
  const message = body.error || `${fallback} (${response.status})`;

  if (body.kind) {
    return new ConsoleError(message, body.kind, body.code);
  }

  if (response.status === 401 || response.status === 403) {
    return new ConsoleError(message, "AuthError");
  }

  if (response.status === 404) {
    return new ConsoleError(message, "NotFoundError");
  }

  return new ConsoleError(message, "ProviderError", "Other");
};

const request = async (input: string, init?: RequestInit): Promise<Response> => {
  try {
    return await fetch(input, { credentials: "include", ...init });
  } catch {
    throw new ConsoleError("Request failed due to network error", "ProviderError", "Other");
  }
};

const parseResponse = async <T>(response: Response, fallback = "Request failed"): Promise<T> => {
  if (!response.ok) {
    throw await toResponseError(response, fallback);
  }

  return response.json() as Promise<T>;
};

export const getSessionInfo = async (): Promise<SessionInfoResponse | null> => {
  const response = await request("/api/auth/me");

  if (!response.ok) {
    return null;
  }

  return response.json() as Promise<SessionInfoResponse>;
};

export const login = async (config: ConnectionConfig): Promise<string[]> => {
  const response = await request("/api/auth/login", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(config),
  });

  const body = await parseResponse<LoginResponse>(response, "Authentication failed");
  return body.buckets;
};

export const logout = async (): Promise<void> => {
  const response = await request("/api/auth/logout", { method: "POST" });
  await parseResponse<{ ok: boolean }>(response, "Sign out failed");
};

export const createBucket = async (name: string): Promise<string[] | null> => {
  const response = await request("/api/s3/buckets", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ name }),
  });

  const body = await parseResponse<CreateBucketResponse>(response, "Create bucket failed");
  return body.buckets ?? null;
};

export const getObjectKeys = async (bucket: string): Promise<string[]> => {
  const params = new URLSearchParams({ bucket });
  const response = await request(`/api/s3/objects?${params.toString()}`);
  const body = await parseResponse<ObjectKeysResponse>(response);
  return body.keys;
};

export const uploadFile = async (bucket: string, source: UploadSource): Promise<string> => {
  const params = new URLSearchParams({ bucket });
  const formData = new FormData();
  formData.append("file", source.body, source.name);

  const response = await request(`/api/s3/upload?${params.toString()}`, {
    method: "POST",
    body: formData,
  });

  const body = await parseResponse<UploadResponse>(response, "Upload failed");
  return body.key;
};

export const saveObjectToPath = async (
  bucket: string,
  key: string,
  destination: DownloadDestination,
): Promise<string> => {
  const response = await request("/api/s3/download-to-path", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ bucket, key, ...destination }),
  });

  const body = await parseResponse<SavedDownloadResponse>(response, "Download failed");
  return body.path;
};

export const deleteObject = async (bucket: string, key: string): Promise<void> => {
  const params = new URLSearchParams({ bucket, key });
  const response = await request(`/api/s3/object?${params.toString()}`, {
    method: "DELETE",
  });

  await parseResponse<{ ok: boolean }>(response, "Delete failed");
};

export const getDownloadUrl = (bucket: string, key: string): string => {
  const params = new URLSearchParams({ bucket, key });
  return `/api/s3/download?${params.toString()}`;
};

export const getProviders = async (): Promise<ProvidersResponse> => {
  const response = await request("/api/providers", { credentials: "same-origin" });
  return parseResponse<ProvidersResponse>(response);
};

export const getRuntimeConfig = async (): Promise<RuntimeConfigResponse> => {
  const response = await request("/api/runtime-config", { credentials: "same-origin" });
  return parseResponse<RuntimeConfigResponse>(response);
};

export const createHttpStorageGateway = (): StorageGateway => ({
  authenticateAndListBuckets: login,
  createBucket,
  listObjects: getObjectKeys,
  uploadObject: uploadFile,
  downloadObject: saveObjectToPath,
  deleteObject,
  endSession: logout,
});
