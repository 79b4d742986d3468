import { DynamoTable, getDynamoTableName, resolveAppName } from "@src/util/dynamodb";
import { getNumber, getRequiredString, getStage, getString } from "@src/util/env";

export interface IngestionConfig {
  projectId: string;
  stage: string;
  /** Warehouse table receiving ride rows. */
  tableId: string;
  sourceBucket: string;
  maxObjectBytes: number;
  invocationTimeoutMs: number;
  deadlineSafetyMs: number;
  deadLetter: {
    bucket: string;
    prefix: string;
  };
}

export const DEFAULT_MAX_OBJECT_BYTES = 50 * 1024 * 1024;
export const DEFAULT_INVOCATION_TIMEOUT_MS = 60_000;
export const DEFAULT_DEADLINE_SAFETY_MS = 5_000;

export function loadIngestionConfig(): IngestionConfig {
  const stage = getStage();
  const projectId = resolveAppName();
  const tableId = getString(
    "RIDES_TABLE",
    getDynamoTableName(DynamoTable.RideBookings, { appName: projectId, stage })
  );
  const sourceBucket = getRequiredString("SOURCE_BUCKET");

  const maxObjectBytes = getNumber("MAX_OBJECT_BYTES", DEFAULT_MAX_OBJECT_BYTES);
  const invocationTimeoutMs = getNumber(
    "INVOCATION_TIMEOUT_MS",
    DEFAULT_INVOCATION_TIMEOUT_MS
  );
  const deadlineSafetyMs = getNumber(
    "DEADLINE_SAFETY_MS",
    DEFAULT_DEADLINE_SAFETY_MS
  );
  if (maxObjectBytes <= 0) {
    throw new Error(`MAX_OBJECT_BYTES must be positive: ${maxObjectBytes}`);
  }
  if (invocationTimeoutMs <= 0) {
    throw new Error(
      `INVOCATION_TIMEOUT_MS must be positive: ${invocationTimeoutMs}`
    );
  }

  return {
    projectId,
    stage,
    tableId,
    sourceBucket,
    maxObjectBytes,
    invocationTimeoutMs,
    deadlineSafetyMs,
    deadLetter: {
      bucket: getString("DEAD_LETTER_BUCKET", sourceBucket),
      prefix: getString("DEAD_LETTER_PREFIX", "dead-letter").replace(/\/+$/, ""),
    },
  };
}
