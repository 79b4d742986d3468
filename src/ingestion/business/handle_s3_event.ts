/**
 * Use case behind the ingest Lambda: run every finalize notification of one
 * S3 event through the listener and translate the results into the
 * platform's redelivery contract (throw => Lambda retries the event).
 */
import type { S3Event } from "aws-lambda";
import type { Logger } from "pino";
import { getLogger } from "@src/util/logger";
import type { IngestionConfig } from "../config";
import type { DeadLetterSink, ObjectStore, WarehouseTable } from "../types/contracts";
import type { LoadResult, LoadStatus } from "../types/domain";
import { Deadline } from "./deadline";
import { onObjectFinalized } from "./on_object_finalized";
import { toIngestionEvents } from "./s3_event";

export interface HandleS3EventDependencies {
  config: IngestionConfig;
  objectStore: ObjectStore;
  warehouse: WarehouseTable;
  deadLetter?: DeadLetterSink;
  logger?: Logger;
  /** Remaining invocation time as reported by the runtime. */
  remainingTimeMs?: number;
}

export interface HandleS3EventOutput {
  processed: number;
  results: Array<{
    objectName: string;
    status: LoadStatus;
    rowsLoaded: number;
    rowsRejected: number;
    summary: string;
  }>;
}

export class RetryableIngestionFailure extends Error {
  readonly results: LoadResult[];

  constructor(results: LoadResult[]) {
    super(
      `Retryable ingestion failure for ${results.length} object(s): ` +
        results.map(result => result.summary).join(" | ")
    );
    this.name = "RetryableIngestionFailure";
    this.results = results;
  }
}

export async function handleS3Event(
  event: S3Event,
  deps: HandleS3EventDependencies
): Promise<HandleS3EventOutput> {
  const logger = deps.logger ?? getLogger("ingestion/handle_s3_event");
  const { config } = deps;
  const deadline = Deadline.fromRemaining(
    deps.remainingTimeMs ?? config.invocationTimeoutMs,
    config.deadlineSafetyMs
  );

  const events = toIngestionEvents(event);
  logger.debug({ count: events.length }, "received finalize notifications");

  const results: LoadResult[] = [];
  for (const ingestionEvent of events) {
    results.push(
      await onObjectFinalized(ingestionEvent, {
        config,
        objectStore: deps.objectStore,
        warehouse: deps.warehouse,
        deadLetter: deps.deadLetter,
        deadline,
        logger,
      })
    );
  }

  const retryable = results.filter(result => result.status === "Retryable");
  if (retryable.length > 0) {
    // Objects that already loaded are no-ops on redelivery
    throw new RetryableIngestionFailure(retryable);
  }

  return {
    processed: results.length,
    results: results.map(result => ({
      objectName: result.objectName,
      status: result.status,
      rowsLoaded: result.rowsLoaded,
      rowsRejected: result.rowsRejected,
      summary: result.summary,
    })),
  };
}
