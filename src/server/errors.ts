import type { ConsoleErrorCode, ConsoleErrorKind } from "../shared/errors.js";

export { toErrorMessage } from "../shared/errors.js";

type AppErrorOptions = {
  kind?: ConsoleErrorKind;
  code?: ConsoleErrorCode;
};

export class AppError extends Error {
  statusCode: number;
  exposeDetails: boolean;
  kind?: ConsoleErrorKind;
  code?: ConsoleErrorCode;

  constructor(message: string, statusCode = 500, exposeDetails = false, options: AppErrorOptions = {}) {
    super(message);
    this.statusCode = statusCode;
    this.exposeDetails = exposeDetails;
    this.kind = options.kind;
    this.code = options.code;
  }
}

const ALREADY_EXISTS_CODES = new Set(["BucketAlreadyExists", "BucketAlreadyOwnedByYou"]);
const NOT_FOUND_CODES = new Set(["NoSuchKey", "NoSuchBucket", "NotFound"]);
const AUTH_CODES = new Set([
  "InvalidAccessKeyId",
  "SignatureDoesNotMatch",
  "AccessDenied",
  "InvalidToken",
  "ExpiredToken",
]);

const readField = (source: unknown, key: string): unknown => {
  if (!source || typeof source !== "object") {
    return undefined;
  }

  return Reflect.get(source, key);
};

const readString = (source: unknown, key: string): string | undefined => {
  const value = readField(source, key);
  return typeof value === "string" && value ? value : undefined;
};

export const readProviderError = (error: unknown): { code?: string; statusCode?: number } => {
  const statusCode = readField(readField(error, "$metadata"), "httpStatusCode");

  return {
    code: readString(error, "Code") ?? readString(error, "code") ?? readString(error, "name"),
    statusCode: typeof statusCode === "number" ? statusCode : undefined,
  };
};

/**
 * Maps an error thrown by the storage SDK onto the console's error taxonomy.
 * Errors that are already {@link AppError}s pass through untouched.
 */
export const toAppError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  const message = error instanceof Error ? error.message : "Unknown provider error";
  const { code, statusCode } = readProviderError(error);

  if (code && ALREADY_EXISTS_CODES.has(code)) {
    return new AppError(message, 409, true, { kind: "ProviderError", code: "AlreadyExists" });
  }

  if (code === "InvalidBucketName") {
    return new AppError(message, 400, true, { kind: "ProviderError", code: "InvalidName" });
  }

  if ((code && NOT_FOUND_CODES.has(code)) || statusCode === 404) {
    return new AppError(message, 404, true, { kind: "NotFoundError" });
  }

  if ((code && AUTH_CODES.has(code)) || statusCode === 403) {
    return new AppError(message, 403, true, { kind: "AuthError" });
  }

  return new AppError(message, 502, true, { kind: "ProviderError", code: "Other" });
};
