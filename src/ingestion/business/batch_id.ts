import { createHash } from "crypto";

const BATCH_PREFIX = "BATCH#";

/**
 * Deterministic batch identifier for an object. Derived from the object name
 * only, so every redelivery of the same upload maps to the same batch.
 */
export function computeBatchId(objectName: string): string {
  const digest = createHash("sha256").update(objectName, "utf8").digest("hex");
  return `${BATCH_PREFIX}${digest.slice(0, 32)}`;
}

export function isBatchId(value: string): boolean {
  return /^BATCH#[0-9a-f]{32}$/.test(value);
}
