/**
 * Dead-letter location on S3.
 *
 * Layout under `<bucket>/<prefix>/`:
 * - `objects/<objectName>`            quarantined source object
 * - `rejects/<objectName>.json`       rejected rows of an object
 *
 * Keys derive from the object name only, so repeated deliveries overwrite
 * rather than pile up.
 */
import {
  CopyObjectCommand,
  DeleteObjectCommand,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { classifyAwsError } from "../errors";
import type { DeadLetterSink } from "../types/contracts";
import type { RejectedRecord } from "../types/domain";

export interface S3DeadLetterSinkOptions {
  bucket: string;
  prefix: string;
  client?: S3Client;
  now?: () => Date;
}

export class S3DeadLetterSink implements DeadLetterSink {
  private readonly s3: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;
  private readonly now: () => Date;

  constructor(options: S3DeadLetterSinkOptions) {
    this.s3 = options.client ?? new S3Client({});
    this.bucket = options.bucket;
    this.prefix = options.prefix.replace(/^\/+/, "").replace(/\/+$/, "");
    this.now = options.now ?? (() => new Date());
  }

  /**
   * True for keys this sink writes into, so they can be skipped when the
   * dead-letter bucket also emits notifications.
   */
  owns(bucket: string, key: string): boolean {
    return bucket === this.bucket && key.startsWith(`${this.prefix}/`);
  }

  quarantineKey(objectName: string): string {
    return `${this.prefix}/objects/${objectName}`;
  }

  reportKey(objectName: string): string {
    return `${this.prefix}/rejects/${objectName}.json`;
  }

  async quarantine(params: {
    bucket: string;
    objectName: string;
    reason: string;
  }): Promise<string> {
    const { bucket, objectName, reason } = params;
    const target = this.quarantineKey(objectName);
    try {
      await this.s3.send(
        new CopyObjectCommand({
          Bucket: this.bucket,
          Key: target,
          CopySource: `${bucket}/${encodeURIComponent(objectName).replace(/%2F/g, "/")}`,
          MetadataDirective: "REPLACE",
          Metadata: {
            "source-bucket": bucket,
            "quarantined-at": this.now().toISOString(),
            reason: reason.slice(0, 1024),
          },
        })
      );
      await this.s3.send(new DeleteObjectCommand({ Bucket: bucket, Key: objectName }));
    } catch (err) {
      throw classifyAwsError(err, {
        operation: `s3:quarantine ${bucket}/${objectName}`,
        notFoundCode: "ObjectNotFound",
        unavailableCode: "StorageUnavailable",
      });
    }
    return target;
  }

  async writeRejectReport(params: {
    objectName: string;
    batchId: string;
    rejected: RejectedRecord[];
  }): Promise<string> {
    const { objectName, batchId, rejected } = params;
    const key = this.reportKey(objectName);
    const report = {
      objectName,
      batchId,
      generatedAt: this.now().toISOString(),
      count: rejected.length,
      rejected,
    };
    try {
      await this.s3.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: JSON.stringify(report, null, 2),
          ContentType: "application/json",
        })
      );
    } catch (err) {
      throw classifyAwsError(err, {
        operation: `s3:PutObject ${this.bucket}/${key}`,
        unavailableCode: "StorageUnavailable",
      });
    }
    return key;
  }
}
