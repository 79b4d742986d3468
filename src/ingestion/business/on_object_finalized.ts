/**
 * Ingestion Trigger Listener.
 *
 * Stateless per delivery: it validates routing, runs the loader and decides
 * what goes to the dead-letter location. Duplicate deliveries are absorbed by
 * the loader's batch id, not here.
 */
import type { Logger } from "pino";
import { getLogger } from "@src/util/logger";
import type { IngestionConfig } from "../config";
import { IngestionError } from "../errors";
import type { DeadLetterSink } from "../types/contracts";
import type {
  DeadLetterOutcome,
  IngestionErrorCode,
  IngestionEvent,
  LoadResult,
} from "../types/domain";
import {
  LoadObjectDependencies,
  loadObject,
  summarize,
  toLoadError,
} from "./load_object";

export interface OnObjectFinalizedDependencies extends LoadObjectDependencies {
  config: Pick<IngestionConfig, "tableId" | "maxObjectBytes" | "sourceBucket">;
  deadLetter?: DeadLetterSink;
}

const QUARANTINE_CODES: ReadonlySet<IngestionErrorCode> = new Set([
  "SizeLimitExceeded",
  "MalformedObject",
  "SchemaViolation",
]);

export async function onObjectFinalized(
  event: IngestionEvent,
  deps: OnObjectFinalizedDependencies
): Promise<LoadResult> {
  const logger = (deps.logger ?? getLogger("ingestion/on_object_finalized")).child({
    eventId: event.eventId,
    bucket: event.bucket,
    objectName: event.objectName,
  });

  const misrouted = checkRouting(event, deps);
  if (misrouted) {
    logger.warn({ reason: misrouted.message }, "rejecting misrouted event");
    const partial = {
      status: "Permanent" as const,
      objectName: event.objectName,
      rowsLoaded: 0,
      rowsRejected: 0,
      duplicate: false,
      rejected: [],
      error: toLoadError(misrouted),
    };
    return { ...partial, summary: summarize(partial) };
  }

  const result = await loadObject(
    {
      bucket: event.bucket,
      objectName: event.objectName,
      sizeBytes: event.sizeBytes,
    },
    { ...deps, logger }
  );

  if (!deps.deadLetter || result.status === "Retryable") {
    return result;
  }
  const deadLetter = await sendToDeadLetter(deps.deadLetter, event, result, logger);
  return deadLetter ? { ...result, deadLetter } : result;
}

function checkRouting(
  event: IngestionEvent,
  deps: OnObjectFinalizedDependencies
): IngestionError | undefined {
  if (event.bucket !== deps.config.sourceBucket) {
    return new IngestionError(
      `Event for bucket ${event.bucket} does not match source bucket ${deps.config.sourceBucket}`,
      "MisroutedEvent",
      { bucket: event.bucket }
    );
  }
  if (deps.deadLetter?.owns(event.bucket, event.objectName)) {
    return new IngestionError(
      `Object ${event.objectName} lies in the dead-letter location`,
      "MisroutedEvent",
      { objectName: event.objectName }
    );
  }
  return undefined;
}

async function sendToDeadLetter(
  sink: DeadLetterSink,
  event: IngestionEvent,
  result: LoadResult,
  logger: Logger
): Promise<DeadLetterOutcome | undefined> {
  const quarantine =
    result.status === "Permanent" &&
    result.error !== undefined &&
    QUARANTINE_CODES.has(result.error.code);
  const report = result.rejected.length > 0 && result.batchId !== undefined;
  if (!quarantine && !report) return undefined;

  const outcome: DeadLetterOutcome = {};
  try {
    if (report && result.batchId) {
      outcome.reportKey = await sink.writeRejectReport({
        objectName: event.objectName,
        batchId: result.batchId,
        rejected: result.rejected,
      });
    }
    if (quarantine) {
      outcome.quarantinedKey = await sink.quarantine({
        bucket: event.bucket,
        objectName: event.objectName,
        reason: result.summary,
      });
    }
    logger.info(outcome, "dead-letter written");
  } catch (err) {
    outcome.error = err instanceof Error ? err.message : String(err);
    logger.error({ err }, "dead-letter write failed");
  }
  return outcome;
}
