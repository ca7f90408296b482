import {
  S3Client,
  GetObjectCommand,
  PutObjectCommand,
} from "@aws-sdk/client-s3";
import { StorageError } from "../errors.js";
import type { ObjectStore, PutObjectRequest, StoredObject } from "../types.js";

export class S3Utils implements ObjectStore {
  private client: S3Client;

  constructor(client?: S3Client, region?: string) {
    this.client = client ?? new S3Client({ region });
  }

  async getObject(bucket: string, key: string): Promise<StoredObject> {
    try {
      const { Body, ContentEncoding } = await this.client.send(
        new GetObjectCommand({ Bucket: bucket, Key: key })
      );

      if (!Body) {
        throw new Error("Empty response body");
      }

      return {
        body: await Body.transformToByteArray(),
        contentEncoding: ContentEncoding,
      };
    } catch (error) {
      console.error(`[S3Utils] Error reading s3://${bucket}/${key}:`, error);
      throw new StorageError("get", bucket, key, error);
    }
  }

  async putObject({
    bucket,
    key,
    body,
    contentType,
  }: PutObjectRequest): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
          ServerSideEncryption: "AES256",
        })
      );
    } catch (error) {
      console.error(`[S3Utils] Error writing s3://${bucket}/${key}:`, error);
      throw new StorageError("put", bucket, key, error);
    }
  }
}
