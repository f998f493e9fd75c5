import { describe, it, expect } from "vitest";
import { AppError, readProviderError, toAppError, toErrorMessage } from "../src/server/errors.js";
import { ConsoleError, isConsoleErrorCode, isConsoleErrorKind } from "../src/shared/errors.js";
import { providerError } from "./test-utils.js";

describe("errors", () => {
  describe("AppError", () => {
    it("should create an error with default statusCode and exposeDetails", () => {
      const error = new AppError("Test error");

      expect(error.message).toBe("Test error");
      expect(error.statusCode).toBe(500);
      expect(error.exposeDetails).toBe(false);
      expect(error.kind).toBeUndefined();
    });

    it("should carry the error kind and code", () => {
      const error = new AppError("Invalid bucket name", 400, true, {
        kind: "ValidationError",
        code: "LengthError",
      });

      expect(error).toBeInstanceOf(Error);
      expect(error).toMatchObject({
        statusCode: 400,
        exposeDetails: true,
        kind: "ValidationError",
        code: "LengthError",
      });
    });
  });

  describe("toErrorMessage", () => {
    it("should extract message from Error instance", () => {
      expect(toErrorMessage(new Error("Something went wrong"))).toBe("Something went wrong");
      expect(toErrorMessage(new AppError("Custom error", 400))).toBe("Custom error");
    });

    it("should return 'Unknown error' for non-Error values", () => {
      expect(toErrorMessage("string error")).toBe("Unknown error");
      expect(toErrorMessage(42)).toBe("Unknown error");
      expect(toErrorMessage(null)).toBe("Unknown error");
      expect(toErrorMessage(undefined)).toBe("Unknown error");
      expect(toErrorMessage({ code: "ERR" })).toBe("Unknown error");
    });
  });

  describe("readProviderError", () => {
    it("should read the code from the error name and the status from $metadata", () => {
      expect(readProviderError(providerError("NoSuchKey", "missing", 404))).toEqual({
        code: "NoSuchKey",
        statusCode: 404,
      });
    });

    it("should prefer an explicit Code field", () => {
      const error = Object.assign(new Error("denied"), { name: "S3ServiceException", Code: "AccessDenied" });

      expect(readProviderError(error).code).toBe("AccessDenied");
    });

    it("should tolerate values that are not objects", () => {
      expect(readProviderError("boom")).toEqual({ code: undefined, statusCode: undefined });
    });
  });

  describe("toAppError", () => {
    it.each([
      ["BucketAlreadyExists", 409, 409, "ProviderError", "AlreadyExists"],
      ["BucketAlreadyOwnedByYou", 409, 409, "ProviderError", "AlreadyExists"],
      ["InvalidBucketName", 400, 400, "ProviderError", "InvalidName"],
      ["NoSuchBucket", 404, 404, "NotFoundError", undefined],
      ["NoSuchKey", 404, 404, "NotFoundError", undefined],
      ["NotFound", undefined, 404, "NotFoundError", undefined],
      ["InvalidAccessKeyId", 403, 403, "AuthError", undefined],
      ["SignatureDoesNotMatch", 403, 403, "AuthError", undefined],
      ["AccessDenied", 403, 403, "AuthError", undefined],
      ["SomethingElse", 403, 403, "AuthError", undefined],
      ["UnknownEndpoint", 404, 404, "NotFoundError", undefined],
      ["InternalError", 500, 502, "ProviderError", "Other"],
      ["TimeoutError", undefined, 502, "ProviderError", "Other"],
    ])("should map %s (%s) to %i %s", (name, httpStatus, statusCode, kind, code) => {
      const error = toAppError(providerError(name, "provider said no", httpStatus));

      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({
        message: "provider said no",
        statusCode,
        exposeDetails: true,
        kind,
        code,
      });
    });

    it("should pass AppErrors through unchanged", () => {
      const original = new AppError("Not connected", 401, true, { kind: "AuthError" });

      expect(toAppError(original)).toBe(original);
    });

    it("should describe values that are not errors", () => {
      expect(toAppError("boom")).toMatchObject({
        message: "Unknown provider error",
        statusCode: 502,
        kind: "ProviderError",
        code: "Other",
      });
    });
  });

  describe("shared error taxonomy", () => {
    it("should recognise kinds and codes", () => {
      expect(isConsoleErrorKind("NotFoundError")).toBe(true);
      expect(isConsoleErrorKind("TeapotError")).toBe(false);
      expect(isConsoleErrorCode("AlreadyExists")).toBe(true);
      expect(isConsoleErrorCode("PunycodePrefixError")).toBe(true);
      expect(isConsoleErrorCode("Teapot")).toBe(false);
    });

    it("should name console errors", () => {
      const error = new ConsoleError("Bucket exists", "ProviderError", "AlreadyExists");

      expect(error.name).toBe("ConsoleError");
      expect(error).toBeInstanceOf(Error);
    });
  });
});
