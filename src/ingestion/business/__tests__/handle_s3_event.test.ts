import { InMemoryDynamoDb } from "@src/ingestion/__tests__/support/in_memory_dynamo";
import { InMemoryS3Client } from "@src/ingestion/__tests__/support/in_memory_s3";
import { rideCsv, rideLine } from "@src/ingestion/__tests__/support/rides";
import { s3Event } from "@src/ingestion/__tests__/support/s3_events";
import type { IngestionConfig } from "@src/ingestion/config";
import { DynamoWarehouseTable } from "@src/ingestion/db/dynamo_warehouse_table";
import { S3DeadLetterSink } from "@src/ingestion/db/s3_dead_letter_sink";
import { S3ObjectStore } from "@src/ingestion/db/s3_object_store";
import {
  HandleS3EventDependencies,
  RetryableIngestionFailure,
  handleS3Event,
} from "../handle_s3_event";

const BUCKET = "ride-exports";

const config: IngestionConfig = {
  projectId: "rideshare-ingest",
  stage: "test",
  tableId: "rideshare-ingest-test-RideBookingsTable",
  sourceBucket: BUCKET,
  maxObjectBytes: 1024 * 1024,
  invocationTimeoutMs: 60_000,
  deadlineSafetyMs: 5_000,
  deadLetter: { bucket: BUCKET, prefix: "dead-letter" },
};

function setup() {
  const s3 = new InMemoryS3Client();
  const dynamo = new InMemoryDynamoDb();
  const deps: HandleS3EventDependencies = {
    config,
    objectStore: new S3ObjectStore({ client: s3.client() }),
    warehouse: new DynamoWarehouseTable({
      tableName: config.tableId,
      client: dynamo.client(),
      backoffMs: 0,
    }),
    deadLetter: new S3DeadLetterSink({
      bucket: BUCKET,
      prefix: "dead-letter",
      client: s3.client(),
    }),
  };
  return { s3, dynamo, deps };
}

describe("handleS3Event", () => {
  it("loads every created object and skips other notifications", async () => {
    const { s3, deps } = setup();
    s3.putObject(BUCKET, "rides/a.csv", rideCsv([rideLine()]));
    s3.putObject(BUCKET, "rides/b c.csv", rideCsv([rideLine(), rideLine({ bookingId: "CNR0000002" })]));

    const output = await handleS3Event(
      s3Event([
        { bucket: BUCKET, key: "rides/a.csv", sequencer: "seq-1" },
        { bucket: BUCKET, key: "rides/old.csv", eventName: "ObjectRemoved:Delete" },
        { bucket: BUCKET, key: "rides/b+c.csv", sequencer: "seq-2" },
      ]),
      deps
    );

    expect(output).toEqual({
      processed: 2,
      results: [
        {
          objectName: "rides/a.csv",
          status: "Success",
          rowsLoaded: 1,
          rowsRejected: 0,
          summary: "Success: 1 row(s) loaded, 0 row(s) rejected from rides/a.csv",
        },
        {
          objectName: "rides/b c.csv",
          status: "Success",
          rowsLoaded: 2,
          rowsRejected: 0,
          summary: "Success: 2 row(s) loaded, 0 row(s) rejected from rides/b c.csv",
        },
      ],
    });
  });

  it("absorbs a duplicated notification within one event", async () => {
    const { s3, dynamo, deps } = setup();
    s3.putObject(BUCKET, "rides/a.csv", rideCsv([rideLine()]));
    const record = { bucket: BUCKET, key: "rides/a.csv", sequencer: "seq-1" };

    const output = await handleS3Event(s3Event([record, record]), deps);

    expect(output.results.map(result => result.rowsLoaded)).toEqual([1, 0]);
    expect(
      dynamo.items(config.tableId).filter(item => item.entity === "RIDE")
    ).toHaveLength(1);
  });

  it("returns permanent failures without asking for redelivery", async () => {
    const { deps } = setup();

    const output = await handleS3Event(
      s3Event([{ bucket: "other-bucket", key: "rides/a.csv" }]),
      deps
    );

    expect(output.results[0].status).toBe("Permanent");
  });

  it("throws so the event is redelivered when a load is retryable", async () => {
    const { s3, dynamo, deps } = setup();
    s3.putObject(BUCKET, "rides/a.csv", rideCsv([rideLine()]));
    dynamo.beforeSend = () => {
      throw Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
    };

    const failure = await handleS3Event(
      s3Event([{ bucket: BUCKET, key: "rides/a.csv" }]),
      deps
    ).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(RetryableIngestionFailure);
    if (failure instanceof RetryableIngestionFailure) {
      expect(failure.results).toHaveLength(1);
      expect(failure.results[0].error?.code).toBe("WarehouseUnavailable");
      expect(failure.message).toBe(
        "Retryable ingestion failure for 1 object(s): " + failure.results[0].summary
      );
    }
  });

  it("keeps the safety margin out of the load budget", async () => {
    const { s3, deps } = setup();
    s3.putObject(BUCKET, "rides/a.csv", rideCsv([rideLine()]));

    await expect(
      handleS3Event(s3Event([{ bucket: BUCKET, key: "rides/a.csv" }]), {
        ...deps,
        remainingTimeMs: 4_000,
      })
    ).rejects.toThrow(
      "Retryable ingestion failure for 1 object(s): Retryable: 0 row(s) loaded, 0 row(s) rejected from rides/a.csv; " +
        "DeadlineExceeded: Invocation deadline reached during fetch"
    );
    expect(s3.commands).toHaveLength(0);
  });
});
