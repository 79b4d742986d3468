import type { S3Event, S3EventRecord } from "aws-lambda";
import type { IngestionEvent } from "../types/domain";

/**
 * S3 notification keys are URL-encoded with '+' for spaces.
 */
export function decodeObjectKey(key: string): string {
  return decodeURIComponent(key.replace(/\+/g, " "));
}

function isFinalize(record: S3EventRecord): boolean {
  return record.eventName.startsWith("ObjectCreated:");
}

/**
 * Finalize notifications of an S3 event as IngestionEvents. Other event
 * kinds (removals, restores) are not ingestion triggers and are dropped.
 */
export function toIngestionEvents(event: S3Event): IngestionEvent[] {
  return (event.Records ?? []).filter(isFinalize).map(record => ({
    bucket: record.s3.bucket.name,
    objectName: decodeObjectKey(record.s3.object.key),
    eventId:
      record.s3.object.sequencer ||
      record.responseElements?.["x-amz-request-id"] ||
      `${record.eventTime}#${record.s3.object.key}`,
    sizeBytes: record.s3.object.size ?? 0,
  }));
}
