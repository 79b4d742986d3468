// Lambda handler for S3 ObjectCreated notifications on the ride exports bucket.
//
// Trigger: S3 event notification (async invocation, at-least-once delivery)
// Behavior:
//   - Each finalize record is loaded into the RideBookings warehouse table as one
//     idempotent batch keyed by the object name.
//   - Permanent failures are quarantined under DEAD_LETTER_PREFIX and not retried.
//   - Any retryable failure makes the handler throw so Lambda redelivers the event.
// Env:
//   - SOURCE_BUCKET (required), RIDES_TABLE, MAX_OBJECT_BYTES, INVOCATION_TIMEOUT_MS,
//     DEADLINE_SAFETY_MS, DEAD_LETTER_BUCKET, DEAD_LETTER_PREFIX
import type { Context, S3Event } from "aws-lambda";
import { S3Client } from "@aws-sdk/client-s3";
import { handleS3Event } from "@src/ingestion/business/handle_s3_event";
import { IngestionConfig, loadIngestionConfig } from "@src/ingestion/config";
import { DynamoWarehouseTable } from "@src/ingestion/db/dynamo_warehouse_table";
import { S3DeadLetterSink } from "@src/ingestion/db/s3_dead_letter_sink";
import { S3ObjectStore } from "@src/ingestion/db/s3_object_store";
import { withRequestContext } from "@src/util/logger";

interface Runtime {
  config: IngestionConfig;
  objectStore: S3ObjectStore;
  warehouse: DynamoWarehouseTable;
  deadLetter: S3DeadLetterSink;
}

let runtime: Runtime | undefined;

// Clients are reused across warm invocations; nothing else survives between them
function getRuntime(): Runtime {
  if (runtime) return runtime;
  const config = loadIngestionConfig();
  const s3 = new S3Client({});
  runtime = {
    config,
    objectStore: new S3ObjectStore({ client: s3 }),
    warehouse: new DynamoWarehouseTable({ tableName: config.tableId }),
    deadLetter: new S3DeadLetterSink({
      client: s3,
      bucket: config.deadLetter.bucket,
      prefix: config.deadLetter.prefix,
    }),
  };
  return runtime;
}

export const handler = async (event: S3Event, context: Context) => {
  const logger = withRequestContext("functions/ingest_object", context);
  const result = await handleS3Event(event, {
    ...getRuntime(),
    logger,
    remainingTimeMs: context.getRemainingTimeInMillis(),
  });
  return { status: "ok", ...result };
};
