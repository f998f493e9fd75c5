import { BUCKET_NAME_RULES, type BucketNameRule } from "./bucket-name.js";

export const CONSOLE_ERROR_KINDS = [
  "AuthError",
  "ValidationError",
  "ProviderError",
  "NotFoundError",
] as const;

export type ConsoleErrorKind = (typeof CONSOLE_ERROR_KINDS)[number];

export const PROVIDER_ERROR_CODES = ["AlreadyExists", "InvalidName", "Other"] as const;

export type ProviderErrorCode = (typeof PROVIDER_ERROR_CODES)[number];

export type ConsoleErrorCode = ProviderErrorCode | BucketNameRule;

export type ApiErrorShape = {
  error: string;
  kind?: ConsoleErrorKind;
  code?: ConsoleErrorCode;
  details?: string;
};

export class ConsoleError extends Error {
  readonly kind: ConsoleErrorKind;
  readonly code?: ConsoleErrorCode;

  constructor(message: string, kind: ConsoleErrorKind, code?: ConsoleErrorCode) {
    super(message);
    this.name = "ConsoleError";
    this.kind = kind;
    this.code = code;
  }
}

export const isConsoleErrorKind = (value: unknown): value is ConsoleErrorKind => {
  return CONSOLE_ERROR_KINDS.some((kind) => kind === value);
};

export const isConsoleErrorCode = (value: unknown): value is ConsoleErrorCode => {
  return (
    PROVIDER_ERROR_CODES.some((code) => code === value) ||
    BUCKET_NAME_RULES.some((rule) => rule === value)
  );
};

export const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  return "Unknown error";
};
