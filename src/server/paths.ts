import path from "node:path";
import type { DownloadDestination } from "../shared/types.js";
import { AppError } from "./errors.js";

const MAX_KEY_BYTES = 1024;

const invalidPath = (message: string): AppError =>
  new AppError(message, 400, true, { kind: "ValidationError" });

/**
 * Turns a client-supplied file name into an object key: backslashes become
 * slashes, empty and leading separators are dropped, and `.`/`..` segments are
 * refused.
 */
export const normalizeUploadPath = (value: string): string => {
  const segments = value
    .replace(/\\+/g, "/")
    .split("/")
    .map((segment) => segment.trim())
    .filter(Boolean);

  if (!segments.length) {
    throw invalidPath("Upload path is required.");
  }

  for (const segment of segments) {
    if (segment === "." || segment === "..") {
      throw invalidPath("Upload path contains invalid segments.");
    }

    if (segment.includes("\u0000")) {
      throw invalidPath("Upload path contains invalid characters.");
    }
  }

  const key = segments.join("/");

  if (Buffer.byteLength(key, "utf8") > MAX_KEY_BYTES) {
    throw invalidPath("Upload path is too long.");
  }

  return key;
};

const isInside = (root: string, target: string): boolean => {
  const relative = path.relative(root, target);
  return relative.split(path.sep)[0] !== ".." && !path.isAbsolute(relative);
};

/**
 * Resolves where a server-side download is written. The directory is taken
 * relative to `root` and may not leave it; the file name defaults to the last
 * segment of the object key.
 */
export const resolveDownloadPath = (
  root: string,
  key: string,
  destination: DownloadDestination = {},
): string => {
  const base = path.resolve(root);
  const directory = destination.directory ? path.resolve(base, destination.directory) : base;

  if (!isInside(base, directory)) {
    throw invalidPath("Download directory must be inside the download root.");
  }

  const filename = destination.filename?.trim() || key.split("/").pop() || "";

  if (!filename || filename === "." || filename === ".." || /[\\/\u0000]/.test(filename)) {
    throw invalidPath("Download file name is invalid.");
  }

  return path.join(directory, filename);
};
