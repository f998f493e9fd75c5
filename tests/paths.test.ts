import { describe, it, expect } from "vitest";
import path from "node:path";
import { normalizeUploadPath, resolveDownloadPath } from "../src/server/paths.js";

describe("paths", () => {
  describe("normalizeUploadPath", () => {
    it("should keep a plain file name", () => {
      expect(normalizeUploadPath("notes.txt")).toBe("notes.txt");
    });

    it("should convert backslashes and drop empty segments", () => {
      expect(normalizeUploadPath("\\reports\\\\2024//q1.csv")).toBe("reports/2024/q1.csv");
    });

    it("should trim whitespace around segments", () => {
      expect(normalizeUploadPath(" reports / q1.csv ")).toBe("reports/q1.csv");
    });

    it("should reject an empty path", () => {
      expect(() => normalizeUploadPath(" / ")).toThrow("Upload path is required.");
    });

    it("should reject relative segments", () => {
      expect(() => normalizeUploadPath("reports/../q1.csv")).toThrow(
        "Upload path contains invalid segments.",
      );
      expect(() => normalizeUploadPath("./q1.csv")).toThrow("Upload path contains invalid segments.");
    });

    it("should reject NUL characters", () => {
      expect(() => normalizeUploadPath("q1\u0000.csv")).toThrow(
        "Upload path contains invalid characters.",
      );
    });

    it("should reject keys longer than 1024 bytes", () => {
      expect(normalizeUploadPath("a".repeat(1024))).toHaveLength(1024);
      expect(() => normalizeUploadPath("a".repeat(1025))).toThrow("Upload path is too long.");
    });

    it("should report failures as validation errors", () => {
      let caught: unknown;

      try {
        normalizeUploadPath("..");
      } catch (error) {
        caught = error;
      }

      expect(caught).toMatchObject({ statusCode: 400, kind: "ValidationError" });
    });
  });

  describe("resolveDownloadPath", () => {
    const root = path.resolve("/srv/downloads");

    it("should default to the key's last segment in the root", () => {
      expect(resolveDownloadPath(root, "reports/q1.csv")).toBe(path.join(root, "q1.csv"));
    });

    it("should place the file in a sub-directory of the root", () => {
      expect(resolveDownloadPath(root, "q1.csv", { directory: "exports/2024" })).toBe(
        path.join(root, "exports", "2024", "q1.csv"),
      );
    });

    it("should use the requested file name", () => {
      expect(resolveDownloadPath(root, "q1.csv", { filename: " renamed.csv " })).toBe(
        path.join(root, "renamed.csv"),
      );
    });

    it("should reject directories outside the root", () => {
      expect(() => resolveDownloadPath(root, "q1.csv", { directory: "../elsewhere" })).toThrow(
        "Download directory must be inside the download root.",
      );
      expect(() => resolveDownloadPath(root, "q1.csv", { directory: "/etc" })).toThrow(
        "Download directory must be inside the download root.",
      );
    });

    it("should accept directory names that merely start with dots", () => {
      expect(resolveDownloadPath(root, "q1.csv", { directory: "..cache" })).toBe(
        path.join(root, "..cache", "q1.csv"),
      );
    });

    it("should reject file names with separators", () => {
      expect(() => resolveDownloadPath(root, "q1.csv", { filename: "../q1.csv" })).toThrow(
        "Download file name is invalid.",
      );
    });

    it("should reject keys that end in a separator without a file name", () => {
      expect(() => resolveDownloadPath(root, "reports/")).toThrow("Download file name is invalid.");
    });
  });
});
