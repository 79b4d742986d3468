/**
 * Record Loader: fetch one object, parse it into ride rows and hand a single
 * idempotent batch to the warehouse.
 */
import type { Logger } from "pino";
import { getLogger } from "@src/util/logger";
import type { IngestionConfig } from "../config";
import { IngestionError, classifyAwsError } from "../errors";
import type { ObjectStore, WarehouseTable } from "../types/contracts";
import type { LoadError, LoadResult, LoadStatus } from "../types/domain";
import { computeBatchId } from "./batch_id";
import type { Deadline } from "./deadline";
import { toWarehouseRow } from "./enrich_rides";
import { ParsedRides, parseRideBookings } from "./parse_rides";

export interface LoadObjectInput {
  bucket: string;
  objectName: string;
  /** Size announced by the notification; checked before any byte is fetched. */
  sizeBytes?: number;
}

export interface LoadObjectDependencies {
  objectStore: ObjectStore;
  warehouse: WarehouseTable;
  config: Pick<IngestionConfig, "tableId" | "maxObjectBytes">;
  deadline: Deadline;
  logger?: Logger;
}

export async function loadObject(
  input: LoadObjectInput,
  deps: LoadObjectDependencies
): Promise<LoadResult> {
  const { objectName, bucket } = input;
  const { config, deadline } = deps;
  const logger = (deps.logger ?? getLogger("ingestion/load_object")).child({
    objectName,
  });
  const batchId = computeBatchId(objectName);
  let parsed: ParsedRides | undefined;

  try {
    if (input.sizeBytes !== undefined && input.sizeBytes > config.maxObjectBytes) {
      throw sizeLimitError(objectName, input.sizeBytes, config.maxObjectBytes);
    }

    const body = await deadline.race(
      () =>
        deps.objectStore.getObject({
          bucket,
          key: objectName,
          maxBytes: config.maxObjectBytes,
          signal: deadline.signal,
        }),
      "fetch"
    );
    if (body.length > config.maxObjectBytes) {
      throw sizeLimitError(objectName, body.length, config.maxObjectBytes);
    }

    parsed = parseRideBookings(body);
    const { records, rejected } = parsed;
    logger.debug(
      { batchId, dataRows: parsed.dataRows, valid: records.length, rejected: rejected.length },
      "parsed object"
    );

    if (records.length === 0 && rejected.length > 0) {
      throw new IngestionError(
        `All ${rejected.length} data rows failed validation`,
        "SchemaViolation",
        { rejected: rejected.length }
      );
    }

    if (records.length === 0) {
      return finish(logger, {
        status: "Success",
        objectName,
        batchId,
        rowsLoaded: 0,
        rowsRejected: 0,
        duplicate: false,
        rejected: [],
      });
    }

    const rows = records.map(toWarehouseRow);
    const outcome = await deadline.race(
      () =>
        deps.warehouse.insertBatch({
          tableId: config.tableId,
          rows,
          idempotencyKey: batchId,
          objectName,
          deadline,
        }),
      "load"
    );

    return finish(logger, {
      status: rejected.length > 0 ? "PartialSuccess" : "Success",
      objectName,
      batchId,
      rowsLoaded: outcome === "inserted" ? records.length : 0,
      rowsRejected: rejected.length,
      duplicate: outcome === "conflict-ignored",
      rejected,
    });
  } catch (err) {
    const error =
      err instanceof IngestionError
        ? err
        : classifyAwsError(err, { operation: "load" });
    const status: LoadStatus = error.retryable ? "Retryable" : "Permanent";
    if (error.code === "Unexpected") {
      logger.error({ err }, "unexpected failure while loading object");
    }
    const rejected = parsed?.rejected ?? [];
    return finish(logger, {
      status,
      objectName,
      batchId,
      rowsLoaded: 0,
      rowsRejected: rejected.length,
      duplicate: false,
      rejected,
      error: toLoadError(error),
    });
  }
}

function sizeLimitError(
  objectName: string,
  size: number,
  limit: number
): IngestionError {
  return new IngestionError(
    `Object ${objectName} is ${size} bytes, above the ${limit} byte limit`,
    "SizeLimitExceeded",
    { size, limit }
  );
}

export function toLoadError(error: IngestionError): LoadError {
  return { code: error.code, message: error.message };
}

export function summarize(result: Omit<LoadResult, "summary">): string {
  const parts = [
    `${result.status}: ${result.rowsLoaded} row(s) loaded, ${result.rowsRejected} row(s) rejected from ${result.objectName}`,
  ];
  if (result.duplicate) parts.push("batch already committed");
  if (result.error) parts.push(`${result.error.code}: ${result.error.message}`);
  return parts.join("; ");
}

function finish(logger: Logger, result: Omit<LoadResult, "summary">): LoadResult {
  const summary = summarize(result);
  const fields = {
    status: result.status,
    batchId: result.batchId,
    rowsLoaded: result.rowsLoaded,
    rowsRejected: result.rowsRejected,
    duplicate: result.duplicate,
    errorCode: result.error?.code,
  };
  if (result.status === "Retryable" || result.error?.code === "ObjectNotFound") {
    logger.warn(fields, summary);
  } else if (result.status === "Permanent") {
    logger.error(fields, summary);
  } else {
    logger.info(fields, summary);
  }
  return { ...result, summary };
}
