import { vi } from "vitest";
import type { S3Event, S3EventRecord } from "aws-lambda";
import type {
  JsonObject,
  ObjectStore,
  PutObjectRequest,
  StoredObject,
} from "../src/types.js";

export class InMemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, StoredObject>();
  readonly puts: PutObjectRequest[] = [];
  readonly failPutsFor = new Set<string>();

  seed(bucket: string, key: string, body: string | Uint8Array, contentEncoding?: string) {
    this.objects.set(`${bucket}/${key}`, {
      body: typeof body === "string" ? new TextEncoder().encode(body) : body,
      contentEncoding,
    });
  }

  async getObject(bucket: string, key: string): Promise<StoredObject> {
    const stored = this.objects.get(`${bucket}/${key}`);
    if (!stored) throw new Error(`NoSuchKey: ${bucket}/${key}`);
    return stored;
  }

  async putObject(request: PutObjectRequest): Promise<void> {
    if (this.failPutsFor.has(request.key)) {
      throw new Error(`AccessDenied: ${request.key}`);
    }
    this.puts.push(request);
    this.objects.set(`${request.bucket}/${request.key}`, {
      body: new TextEncoder().encode(request.body),
    });
  }

  text(bucket: string, key: string): string | undefined {
    const stored = this.objects.get(`${bucket}/${key}`);
    return stored ? new TextDecoder().decode(stored.body) : undefined;
  }
}

export function s3Event(bucket: string, ...keys: string[]): S3Event {
  const Records = keys.map(
    (key): S3EventRecord => ({
      eventVersion: "2.1",
      eventSource: "aws:s3",
      awsRegion: "us-east-1",
      eventTime: "2026-02-07T00:00:00.000Z",
      eventName: "ObjectCreated:Put",
      userIdentity: { principalId: "test" },
      requestParameters: { sourceIPAddress: "127.0.0.1" },
      responseElements: {
        "x-amz-request-id": "test-request",
        "x-amz-id-2": "test-id",
      },
      s3: {
        s3SchemaVersion: "1.0",
        configurationId: "raw-created",
        bucket: {
          name: bucket,
          ownerIdentity: { principalId: "test" },
          arn: `arn:aws:s3:::${bucket}`,
        },
        object: { key, size: 0, eTag: "test-etag", sequencer: "0" },
      },
    })
  );
  return { Records };
}

export function envelope(
  data: JsonObject,
  metadata: JsonObject
): JsonObject {
  return { data, metadata: { "record-type": "data", ...metadata } };
}

export function quietConsole(): void {
  for (const method of ["log", "warn", "error", "debug"] as const) {
    vi.spyOn(console, method).mockImplementation(() => undefined);
  }
}
