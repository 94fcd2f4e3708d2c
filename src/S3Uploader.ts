import { promises as fs } from "fs";
import path from "path";
import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { error, info } from "./log";

/** The slice of object storage the uploader needs. */
export interface ObjectStorage {
  putObject(bucket: string, key: string, body: Buffer, contentType: string): Promise<void>;
}

export function createS3Storage(region: string): ObjectStorage {
  const client = new S3Client({ region });
  return {
    async putObject(bucket, key, body, contentType) {
      await client.send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: body, ContentType: contentType }));
    },
  };
}

export interface S3UploaderOptions {
  bucket: string;
  prefix?: string;
  region: string;
  storage?: ObjectStorage;
}

export function objectKey(prefix: string, filePath: string): string {
  const name = path.basename(filePath);
  if (!prefix) return name;
  return `${prefix.replace(/\/+$/, "")}/${name}`;
}

export class S3Uploader {
  private readonly bucket: string;
  private readonly prefix: string;
  private readonly storage: ObjectStorage;

  constructor(options: S3UploaderOptions) {
    this.bucket = options.bucket;
    this.prefix = options.prefix ?? "";
    this.storage = options.storage ?? createS3Storage(options.region);
  }

  /**
   * Upload a local file. Returns its `s3://` URL, or null when no bucket is
   * configured or the upload failed (the failure is logged).
   */
  async uploadFile(filePath: string): Promise<string | null> {
    if (!this.bucket) {
      info("No S3 bucket configured. File saved locally only.");
      return null;
    }

    const key = objectKey(this.prefix, filePath);
    try {
      const body = await fs.readFile(filePath);
      await this.storage.putObject(this.bucket, key, body, "application/json");
      const url = `s3://${this.bucket}/${key}`;
      info(`Uploaded to S3: ${url}`);
      return url;
    } catch (err) {
      error(`Failed to upload ${filePath} to S3`, err);
      return null;
    }
  }
}
