import { describe, it, expect, vi, beforeEach, afterAll } from "vitest";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import {
  CreateBucketCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
} from "@aws-sdk/client-s3";
import {
  authenticateAndListBuckets,
  createBucket,
  deleteObject,
  downloadObjectToPath,
  getS3Client,
  inferContentType,
  listObjectKeys,
  uploadObject,
} from "../src/server/s3.js";
import { TEST_CONNECTION } from "./test-utils.js";

const { sendMock, clientOptions } = vi.hoisted(() => ({
  sendMock: vi.fn(),
  clientOptions: [] as unknown[],
}));

vi.mock("@aws-sdk/client-s3", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@aws-sdk/client-s3")>();

  class S3Client {
    send = sendMock;

    constructor(options: unknown) {
      clientOptions.push(options);
    }
  }

  return { ...actual, S3Client };
});

const commandAt = (index: number): unknown => sendMock.mock.calls[index]?.[0];

const tempRoot = path.join(os.tmpdir(), `skiff-s3-test-${process.pid}`);

describe("s3", () => {
  beforeEach(() => {
    sendMock.mockReset();
    clientOptions.length = 0;
  });

  afterAll(async () => {
    await rm(tempRoot, { recursive: true, force: true });
  });

  it("builds a client from the session connection", () => {
    getS3Client(TEST_CONNECTION);

    expect(clientOptions).toEqual([
      {
        endpoint: "http://storage.test:9000",
        region: "test-region-1",
        forcePathStyle: true,
        credentials: {
          accessKeyId: "test-access-key",
          secretAccessKey: "test-secret",
        },
      },
    ]);
  });

  it("returns bucket names and skips unnamed entries", async () => {
    sendMock.mockResolvedValueOnce({ Buckets: [{ Name: "a" }, {}, { Name: "b" }] });

    await expect(authenticateAndListBuckets(TEST_CONNECTION)).resolves.toEqual(["a", "b"]);
  });

  it("returns an empty list when the provider omits Buckets", async () => {
    sendMock.mockResolvedValueOnce({});

    await expect(authenticateAndListBuckets(TEST_CONNECTION)).resolves.toEqual([]);
  });

  it("propagates authentication failures", async () => {
    sendMock.mockRejectedValueOnce(new Error("The AWS Access Key Id you provided does not exist"));

    await expect(authenticateAndListBuckets(TEST_CONNECTION)).rejects.toThrow(
      "The AWS Access Key Id you provided does not exist",
    );
  });

  describe("createBucket", () => {
    it("omits the location constraint for AWS in us-east-1", async () => {
      sendMock.mockResolvedValueOnce({});
      const connection = { ...TEST_CONNECTION, provider: "AWS" as const, region: "us-east-1" };

      await expect(createBucket(connection, "new-bucket")).resolves.toEqual({
        bucket: "new-bucket",
        locationConstraint: undefined,
      });

      expect(commandAt(0)).toBeInstanceOf(CreateBucketCommand);
      expect(commandAt(0)).toMatchObject({ input: { Bucket: "new-bucket" } });
      expect(commandAt(0)).not.toHaveProperty("input.CreateBucketConfiguration");
    });

    it("sends the region as the location constraint for other AWS regions", async () => {
      sendMock.mockResolvedValueOnce({});
      const connection = { ...TEST_CONNECTION, provider: "AWS" as const, region: "eu-west-1" };

      await expect(createBucket(connection, "new-bucket")).resolves.toEqual({
        bucket: "new-bucket",
        locationConstraint: "eu-west-1",
      });
      expect(commandAt(0)).toMatchObject({
        input: {
          Bucket: "new-bucket",
          CreateBucketConfiguration: { LocationConstraint: "eu-west-1" },
        },
      });
    });

    it("always sends the location constraint to other providers", async () => {
      sendMock.mockResolvedValueOnce({});
      const connection = {
        ...TEST_CONNECTION,
        provider: "ArvanCloud" as const,
        region: "ir-thr-at1",
      };

      await createBucket(connection, "new-bucket");

      expect(commandAt(0)).toMatchObject({
        input: { CreateBucketConfiguration: { LocationConstraint: "ir-thr-at1" } },
      });
    });

    it("sends custom regions verbatim", async () => {
      sendMock.mockResolvedValueOnce({});

      await createBucket(TEST_CONNECTION, "new-bucket");

      expect(commandAt(0)).toMatchObject({
        input: { CreateBucketConfiguration: { LocationConstraint: "test-region-1" } },
      });
    });
  });

  it("follows continuation tokens until the listing is complete", async () => {
    sendMock
      .mockResolvedValueOnce({
        Contents: [{ Key: "f1.txt" }, { Key: "f2.txt" }],
        IsTruncated: true,
        NextContinuationToken: "t1",
      })
      .mockResolvedValueOnce({
        Contents: [{ Key: "f3.txt" }, {}],
        IsTruncated: false,
        NextContinuationToken: "ignored",
      });

    await expect(listObjectKeys(TEST_CONNECTION, "a")).resolves.toEqual([
      "f1.txt",
      "f2.txt",
      "f3.txt",
    ]);

    expect(sendMock).toHaveBeenCalledTimes(2);
    expect(commandAt(0)).toBeInstanceOf(ListObjectsV2Command);
    expect(commandAt(0)).toMatchObject({ input: { Bucket: "a", ContinuationToken: undefined } });
    expect(commandAt(1)).toMatchObject({ input: { Bucket: "a", ContinuationToken: "t1" } });
  });

  it("returns no keys for an empty bucket", async () => {
    sendMock.mockResolvedValueOnce({ KeyCount: 0 });

    await expect(listObjectKeys(TEST_CONNECTION, "a")).resolves.toEqual([]);
  });

  it("uploads with the configured ACL and an inferred content type", async () => {
    sendMock.mockResolvedValueOnce({});
    const body = Buffer.from("hello");

    await uploadObject(TEST_CONNECTION, "a", "notes.txt", body);

    expect(commandAt(0)).toBeInstanceOf(PutObjectCommand);
    expect(commandAt(0)).toMatchObject({
      input: {
        Bucket: "a",
        Key: "notes.txt",
        Body: body,
        ACL: "private",
        ContentType: "text/plain",
      },
    });
  });

  it("prefers the content type sent with the upload", async () => {
    sendMock.mockResolvedValueOnce({});

    await uploadObject(TEST_CONNECTION, "a", "data.bin", Buffer.from("x"), "image/png");

    expect(commandAt(0)).toMatchObject({ input: { ContentType: "image/png" } });
  });

  it("falls back to a binary content type for unknown extensions", () => {
    expect(inferContentType("archive.unknownext")).toBe("application/octet-stream");
    expect(inferContentType("photo.png")).toBe("image/png");
  });

  it("writes a downloaded object into a new directory", async () => {
    sendMock.mockResolvedValueOnce({ Body: Readable.from([Buffer.from("file contents")]) });
    const destination = path.join(tempRoot, "nested", "dir", "f1.txt");

    await expect(downloadObjectToPath(TEST_CONNECTION, "a", "f1.txt", destination)).resolves.toBe(
      destination,
    );
    await expect(readFile(destination, "utf8")).resolves.toBe("file contents");
  });

  it("does not request the object when the directory cannot be created", async () => {
    await mkdir(tempRoot, { recursive: true });
    const blocker = path.join(tempRoot, "blocker");
    await writeFile(blocker, "not a directory");

    await expect(
      downloadObjectToPath(TEST_CONNECTION, "a", "f1.txt", path.join(blocker, "f1.txt")),
    ).rejects.toMatchObject({ code: "ENOTDIR" });
    expect(sendMock).not.toHaveBeenCalled();
  });

  it("rejects a download without a readable body", async () => {
    sendMock.mockResolvedValueOnce({ Body: undefined });

    await expect(
      downloadObjectToPath(TEST_CONNECTION, "a", "f1.txt", path.join(tempRoot, "missing.txt")),
    ).rejects.toMatchObject({
      message: "Object has no readable body",
      statusCode: 502,
      kind: "ProviderError",
      code: "Other",
    });
  });

  it("deletes a single key", async () => {
    sendMock.mockResolvedValueOnce({});

    await deleteObject(TEST_CONNECTION, "a", "f1.txt");

    expect(commandAt(0)).toBeInstanceOf(DeleteObjectCommand);
    expect(commandAt(0)).toMatchObject({ input: { Bucket: "a", Key: "f1.txt" } });
  });
});
