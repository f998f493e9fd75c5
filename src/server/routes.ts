import { setTimeout as delay } from "node:timers/promises";
import type { FastifyInstance, FastifyRequest } from "fastify";
import { z } from "zod";
import { validateBucketName } from "../shared/bucket-name.js";
import { hashAccessKeyId, hashSessionToken, recordAuditEvent } from "./audit/index.js";
import type { AuditEvent } from "./audit/index.js";
import { getRequestConnection, requireSession } from "./auth.js";
import { config } from "./config.js";
import { AppError, toAppError, toErrorMessage } from "./errors.js";
import { sentryCountMetric } from "./observability.js";
import { normalizeUploadPath, resolveDownloadPath } from "./paths.js";
import {
  authenticateAndListBuckets,
  createBucket,
  deleteObject,
  downloadObjectToPath,
  getObject,
  listObjectKeys,
  uploadObject,
} from "./s3.js";

const createBucketSchema = z.object({
  name: z.string().min(1),
});

const bucketSchema = z.object({
  bucket: z.string().min(1),
});

const bucketAndKeySchema = z.object({
  bucket: z.string().min(1),
  key: z.string().min(1),
});

const downloadToPathSchema = bucketAndKeySchema.extend({
  directory: z.string().optional(),
  filename: z.string().optional(),
});

const invalidInput = (message: string): AppError =>
  new AppError(message, 400, true, { kind: "ValidationError" });

const recordS3Event = (request: FastifyRequest, event: AuditEvent): void => {
  void recordAuditEvent({
    sessionToken: hashSessionToken(request.sessionToken),
    accessKeyHash: hashAccessKeyId(request.sessionConnection?.accessKeyId),
    provider: request.sessionConnection?.provider,
    ...event,
  });
};

/**
 * Runs a storage call, records its audit event either way and converts
 * provider failures into the console's error taxonomy.
 */
const auditedS3Call = async <T>(
  request: FastifyRequest,
  event: Omit<AuditEvent, "result" | "durationMs" | "error">,
  run: () => Promise<T>,
): Promise<T> => {
  const startedAt = Date.now();

  try {
    const result = await run();
    recordS3Event(request, { ...event, result: "success", durationMs: Date.now() - startedAt });
    return result;
  } catch (error) {
    recordS3Event(request, {
      ...event,
      result: "failure",
      error: toErrorMessage(error),
      durationMs: Date.now() - startedAt,
    });
    throw toAppError(error);
  }
};

const contentDispositionFor = (key: string): string => {
  const filename = key.split("/").pop() || key;
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, "_");
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
};

export const registerS3Routes = (app: FastifyInstance): void => {
  app.get("/api/s3/buckets", { preHandler: requireSession }, async (request) => {
    const connection = getRequestConnection(request);
    const buckets = await auditedS3Call(request, { operation: "s3.list_buckets" }, () =>
      authenticateAndListBuckets(connection),
    );
    return { buckets };
  });

  app.post("/api/s3/buckets", { preHandler: requireSession }, async (request) => {
    const connection = getRequestConnection(request);
    const parsed = createBucketSchema.safeParse(request.body);

    if (!parsed.success) {
      throw invalidInput("Please enter a bucket name");
    }

    const { name } = parsed.data;
    const validation = validateBucketName(name);

    if (!validation.valid) {
      recordS3Event(request, {
        operation: "s3.create_bucket",
        bucket: name,
        result: "failure",
        error: validation.rule,
      });
      throw new AppError(`Invalid bucket name: ${validation.message}`, 400, true, {
        kind: "ValidationError",
        code: validation.rule,
      });
    }

    await auditedS3Call(request, { operation: "s3.create_bucket", bucket: name }, () =>
      createBucket(connection, name),
    );

    // Fresh buckets can take a moment to appear in ListBuckets.
    if (config.BUCKET_PROPAGATION_DELAY_MS > 0) {
      await delay(config.BUCKET_PROPAGATION_DELAY_MS);
    }

    sentryCountMetric("s3.buckets.created", 1, { provider: connection.provider });

    let listed: string[];

    try {
      listed = await auditedS3Call(request, { operation: "s3.list_buckets" }, () =>
        authenticateAndListBuckets(connection),
      );
    } catch (error) {
      // The bucket exists; the client keeps its own listing and adds the name.
      request.log.warn({ err: error, bucket: name }, "Bucket created but listing failed");
      return { ok: true, bucket: name };
    }

    const buckets = listed.includes(name) ? listed : [...listed, name];
    return { ok: true, bucket: name, buckets };
  });

  app.get("/api/s3/objects", { preHandler: requireSession }, async (request) => {
    const connection = getRequestConnection(request);
    const parsed = bucketSchema.safeParse(request.query);

    if (!parsed.success) {
      throw invalidInput("Invalid list object query params");
    }

    const { bucket } = parsed.data;
    const keys = await auditedS3Call(request, { operation: "s3.list_objects", bucket }, () =>
      listObjectKeys(connection, bucket),
    );

    return { bucket, keys };
  });

  app.post("/api/s3/upload", { preHandler: requireSession }, async (request) => {
    const connection = getRequestConnection(request);
    const query = bucketSchema.safeParse(request.query);

    if (!query.success) {
      throw invalidInput("Invalid upload query params");
    }

    const { bucket } = query.data;
    const file = await request.file();

    if (!file) {
      recordS3Event(request, {
        operation: "s3.upload",
        result: "failure",
        bucket,
        error: "missing_file",
      });
      throw invalidInput("No file uploaded");
    }

    const key = normalizeUploadPath(file.filename);
    const buffer = await file.toBuffer();

    await auditedS3Call(request, { operation: "s3.upload", bucket, key }, () =>
      uploadObject(connection, bucket, key, buffer, file.mimetype),
    );

    return { ok: true, key };
  });

  app.get("/api/s3/download", { preHandler: requireSession }, async (request, reply) => {
    const connection = getRequestConnection(request);
    const parsed = bucketAndKeySchema.safeParse(request.query);

    if (!parsed.success) {
      throw invalidInput("Invalid download query params");
    }

    const { bucket, key } = parsed.data;
    const object = await auditedS3Call(request, { operation: "s3.download", bucket, key }, () =>
      getObject(connection, bucket, key),
    );

    if (!object.body) {
      throw new AppError("Object has no body", 404, true, { kind: "NotFoundError" });
    }

    reply.header("Content-Type", object.contentType || "application/octet-stream");
    reply.header("Content-Disposition", contentDispositionFor(key));

    return reply.send(object.body);
  });

  app.post("/api/s3/download-to-path", { preHandler: requireSession }, async (request) => {
    const connection = getRequestConnection(request);
    const parsed = downloadToPathSchema.safeParse(request.body);

    if (!parsed.success) {
      throw invalidInput("Invalid download payload");
    }

    const { bucket, key, directory, filename } = parsed.data;
    const destinationPath = resolveDownloadPath(config.DOWNLOAD_DIR, key, {
      directory,
      filename,
    });
    const savedPath = await auditedS3Call(
      request,
      { operation: "s3.download_to_path", bucket, key, resourcePath: destinationPath },
      () => downloadObjectToPath(connection, bucket, key, destinationPath),
    );

    return { ok: true, path: savedPath };
  });

  app.delete("/api/s3/object", { preHandler: requireSession }, async (request) => {
    const connection = getRequestConnection(request);
    const parsed = bucketAndKeySchema.safeParse(request.query);

    if (!parsed.success) {
      throw invalidInput("Invalid delete object query params");
    }

    const { bucket, key } = parsed.data;
    await auditedS3Call(request, { operation: "s3.delete_object", bucket, key }, () =>
      deleteObject(connection, bucket, key),
    );

    return { ok: true };
  });
};
