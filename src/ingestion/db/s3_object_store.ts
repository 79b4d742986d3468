/**
 * S3-backed ObjectStore. Reads the object body into memory while enforcing
 * the configured size limit, so oversized uploads are never buffered whole.
 */
import { GetObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { Readable } from "stream";
import { IngestionError, classifyAwsError } from "../errors";
import type { ObjectStore } from "../types/contracts";

export interface S3ObjectStoreOptions {
  client?: S3Client;
}

export class S3ObjectStore implements ObjectStore {
  private readonly s3: S3Client;

  constructor(options: S3ObjectStoreOptions = {}) {
    this.s3 = options.client ?? new S3Client({});
  }

  async getObject(params: {
    bucket: string;
    key: string;
    maxBytes: number;
    signal?: AbortSignal;
  }): Promise<Buffer> {
    const { bucket, key, maxBytes, signal } = params;
    try {
      const out = await this.s3.send(
        new GetObjectCommand({ Bucket: bucket, Key: key }),
        { abortSignal: signal }
      );
      const body = out.Body;

      if (out.ContentLength !== undefined && out.ContentLength > maxBytes) {
        if (body instanceof Readable) body.destroy();
        throw tooLarge(bucket, key, out.ContentLength, maxBytes);
      }
      if (!body) {
        return Buffer.alloc(0);
      }
      if (body instanceof Readable) {
        return await readLimited(body, { bucket, key, maxBytes });
      }

      const bytes = await body.transformToByteArray();
      if (bytes.byteLength > maxBytes) {
        throw tooLarge(bucket, key, bytes.byteLength, maxBytes);
      }
      return Buffer.from(bytes);
    } catch (err) {
      throw classifyAwsError(err, {
        operation: `s3:GetObject ${bucket}/${key}`,
        notFoundCode: "ObjectNotFound",
        unavailableCode: "StorageUnavailable",
      });
    }
  }
}

async function readLimited(
  stream: Readable,
  info: { bucket: string; key: string; maxBytes: number }
): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of stream) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    total += buf.length;
    if (total > info.maxBytes) {
      stream.destroy();
      throw tooLarge(info.bucket, info.key, total, info.maxBytes);
    }
    chunks.push(buf);
  }
  return Buffer.concat(chunks, total);
}

function tooLarge(
  bucket: string,
  key: string,
  size: number,
  limit: number
): IngestionError {
  return new IngestionError(
    `Object ${bucket}/${key} exceeds the ${limit} byte limit (read ${size} bytes)`,
    "SizeLimitExceeded",
    { bucket, key, size, limit }
  );
}
