import type { SessionConnection } from "../src/server/types.js";

export const TEST_CONNECTION: SessionConnection = {
  provider: "Custom",
  endpoint: "http://storage.test:9000",
  region: "test-region-1",
  accessKeyId: "test-access-key",
  secretAccessKey: "test-secret",
};

type Entry = {
  value: string;
  expiresAt: number | null;
};

/**
 * In-process stand-in for the ioredis client, covering the commands the
 * session store uses. Installed with `vi.mock("ioredis", ...)`.
 */
export class MemoryRedis {
  static instances: MemoryRedis[] = [];

  readonly url: string;
  closed = false;
  private readonly store = new Map<string, Entry>();

  constructor(url: string) {
    this.url = url;
    MemoryRedis.instances.push(this);
  }

  static latest(): MemoryRedis {
    const instance = MemoryRedis.instances.at(-1);

    if (!instance) {
      throw new Error("No MemoryRedis client has been created");
    }

    return instance;
  }

  private read(key: string): Entry | undefined {
    const entry = this.store.get(key);

    if (entry && entry.expiresAt !== null && entry.expiresAt <= Date.now()) {
      this.store.delete(key);
      return undefined;
    }

    return entry;
  }

  async get(key: string): Promise<string | null> {
    return this.read(key)?.value ?? null;
  }

  async set(key: string, value: string, mode?: "EX", seconds?: number): Promise<"OK"> {
    const expiresAt = mode === "EX" && seconds !== undefined ? Date.now() + seconds * 1000 : null;
    this.store.set(key, { value, expiresAt });
    return "OK";
  }

  async expire(key: string, seconds: number): Promise<number> {
    const entry = this.read(key);

    if (!entry) {
      return 0;
    }

    entry.expiresAt = Date.now() + seconds * 1000;
    return 1;
  }

  async ttl(key: string): Promise<number> {
    const entry = this.read(key);

    if (!entry) {
      return -2;
    }

    if (entry.expiresAt === null) {
      return -1;
    }

    return Math.ceil((entry.expiresAt - Date.now()) / 1000);
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0;

    for (const key of keys) {
      if (this.store.delete(key)) {
        removed += 1;
      }
    }

    return removed;
  }

  async quit(): Promise<"OK"> {
    this.closed = true;
    return "OK";
  }

  keys(): string[] {
    return Array.from(this.store.keys()).filter((key) => this.read(key) !== undefined);
  }

  clear(): void {
    this.store.clear();
  }
}

export const sessionKeyFor = (token: string): string => `skiff:session:${token}`;

/** Builds a multipart/form-data body with a single file field. */
export const buildMultipartFile = (
  filename: string,
  content: string,
  contentType = "text/plain",
): { payload: string; headers: Record<string, string> } => {
  const boundary = "----skiff-test-boundary";
  const payload = [
    `--${boundary}`,
    `Content-Disposition: form-data; name="file"; filename="${filename}"`,
    `Content-Type: ${contentType}`,
    "",
    content,
    `--${boundary}--`,
    "",
  ].join("\r\n");

  return {
    payload,
    headers: { "content-type": `multipart/form-data; boundary=${boundary}` },
  };
};

/** Provider SDK errors carry their code in `name` and the HTTP status in `$metadata`. */
export const providerError = (name: string, message: string, httpStatusCode?: number): Error => {
  return Object.assign(new Error(message), {
    name,
    $metadata: httpStatusCode === undefined ? {} : { httpStatusCode },
  });
};
