import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import {
  type BucketLocationConstraint,
  CreateBucketCommand,
  type CreateBucketCommandInput,
  DeleteObjectCommand,
  GetObjectCommand,
  type GetObjectCommandOutput,
  ListBucketsCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { lookup as lookupMimeType } from "mime-types";
import { needsLocationConstraint } from "../shared/providers.js";
import { config } from "./config.js";
import { AppError } from "./errors.js";
import { sentryDistributionMetric, sentryGaugeMetric } from "./observability.js";
import type { CreateBucketResult, ObjectStream, SessionConnection } from "./types.js";

let uploadFilesInFlight = 0;
let downloadFilesInFlight = 0;

const trackS3Latency = async <T>(
  operation: string,
  run: () => Promise<T>,
  attributes?: Record<string, unknown>,
): Promise<T> => {
  const startedAt = Date.now();

  try {
    const result = await run();
    sentryDistributionMetric(`s3.${operation}.latency`, Date.now() - startedAt, "millisecond", {
      ...attributes,
      status: "success",
    });
    return result;
  } catch (error) {
    sentryDistributionMetric(`s3.${operation}.latency`, Date.now() - startedAt, "millisecond", {
      ...attributes,
      status: "failure",
    });
    throw error;
  }
};

const reportTransferGauges = (attributes?: Record<string, unknown>): void => {
  sentryGaugeMetric("s3.upload.files_in_flight", uploadFilesInFlight, attributes);
  sentryGaugeMetric("s3.download.files_in_flight", downloadFilesInFlight, attributes);
};

const finishDownload = (bucket: string): void => {
  downloadFilesInFlight = Math.max(0, downloadFilesInFlight - 1);
  reportTransferGauges({ bucket });
};

export const inferContentType = (key: string): string => {
  return lookupMimeType(key) || "application/octet-stream";
};

// S3-compatible providers accept region names outside the SDK's list of AWS regions.
const toLocationConstraint = (region: string): BucketLocationConstraint =>
  region as BucketLocationConstraint;

export const getS3Client = (connection: SessionConnection): S3Client => {
  return new S3Client({
    endpoint: connection.endpoint,
    region: connection.region,
    forcePathStyle: config.S3_FORCE_PATH_STYLE,
    credentials: {
      accessKeyId: connection.accessKeyId,
      secretAccessKey: connection.secretAccessKey,
    },
  });
};

/**
 * Lists the buckets visible to the connection. This is also how credentials are
 * checked on login: an S3 provider has no cheaper authenticated call.
 */
export const authenticateAndListBuckets = async (
  connection: SessionConnection,
): Promise<string[]> => {
  const client = getS3Client(connection);
  const response = await trackS3Latency(
    "list_buckets",
    () => client.send(new ListBucketsCommand({})),
    { provider: connection.provider },
  );

  return (response.Buckets ?? []).flatMap((bucket) => (bucket.Name ? [bucket.Name] : []));
};

export const createBucket = async (
  connection: SessionConnection,
  name: string,
): Promise<CreateBucketResult> => {
  const client = getS3Client(connection);
  const input: CreateBucketCommandInput = { Bucket: name };
  const locationConstraint = needsLocationConstraint(connection.provider, connection.region)
    ? connection.region
    : undefined;

  if (locationConstraint) {
    input.CreateBucketConfiguration = {
      LocationConstraint: toLocationConstraint(locationConstraint),
    };
  }

  await trackS3Latency("create_bucket", () => client.send(new CreateBucketCommand(input)), {
    bucket: name,
    provider: connection.provider,
  });

  return { bucket: name, locationConstraint };
};

export const listObjectKeys = async (
  connection: SessionConnection,
  bucket: string,
): Promise<string[]> => {
  const client = getS3Client(connection);
  const keys: string[] = [];
  let continuationToken: string | undefined;

  do {
    const response = await trackS3Latency(
      "list_objects_v2",
      () =>
        client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            ContinuationToken: continuationToken,
          }),
        ),
      { bucket },
    );

    for (const item of response.Contents ?? []) {
      if (item.Key) {
        keys.push(item.Key);
      }
    }

    continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
  } while (continuationToken);

  return keys;
};

export const uploadObject = async (
  connection: SessionConnection,
  bucket: string,
  key: string,
  body: Buffer,
  contentType?: string,
): Promise<void> => {
  const client = getS3Client(connection);
  uploadFilesInFlight += 1;
  reportTransferGauges({ bucket });

  try {
    await trackS3Latency(
      "put_object",
      () =>
        client.send(
          new PutObjectCommand({
            Bucket: bucket,
            Key: key,
            Body: body,
            ACL: config.UPLOAD_ACL,
            ContentType: contentType || inferContentType(key),
          }),
        ),
      {
        bucket,
        file_size_bytes: body.length,
      },
    );
  } finally {
    uploadFilesInFlight = Math.max(0, uploadFilesInFlight - 1);
    reportTransferGauges({ bucket });
  }
};

export const getObject = async (
  connection: SessionConnection,
  bucket: string,
  key: string,
): Promise<ObjectStream> => {
  const client = getS3Client(connection);
  downloadFilesInFlight += 1;
  reportTransferGauges({ bucket });

  let response: GetObjectCommandOutput;

  try {
    response = await trackS3Latency(
      "get_object",
      () => client.send(new GetObjectCommand({ Bucket: bucket, Key: key })),
      { bucket },
    );
  } catch (error) {
    finishDownload(bucket);
    throw error;
  }

  const body = response.Body;

  if (body instanceof Readable) {
    let finalized = false;

    const finalize = () => {
      if (finalized) {
        return;
      }

      finalized = true;
      finishDownload(bucket);
    };

    body.once("end", finalize);
    body.once("close", finalize);
    body.once("error", finalize);
    return { body, contentType: response.ContentType };
  }

  finishDownload(bucket);
  return { contentType: response.ContentType };
};

/**
 * Streams an object into `destinationPath`, creating its directory before the
 * object is requested.
 * Returns the path that was written.
 */
export const downloadObjectToPath = async (
  connection: SessionConnection,
  bucket: string,
  key: string,
  destinationPath: string,
): Promise<string> => {
  // The directory must exist before the object body starts streaming.
  await mkdir(path.dirname(destinationPath), { recursive: true });
  const { body } = await getObject(connection, bucket, key);

  if (!body) {
    throw new AppError("Object has no readable body", 502, true, {
      kind: "ProviderError",
      code: "Other",
    });
  }

  await pipeline(body, createWriteStream(destinationPath));

  return destinationPath;
};

export const deleteObject = async (
  connection: SessionConnection,
  bucket: string,
  key: string,
): Promise<void> => {
  const client = getS3Client(connection);
  await trackS3Latency(
    "delete_object",
    () =>
      client.send(
        new DeleteObjectCommand({
          Bucket: bucket,
          Key: key,
        }),
      ),
    {
      bucket,
    },
  );
};
