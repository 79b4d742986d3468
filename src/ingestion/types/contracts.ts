import type { Deadline } from "../business/deadline";
import type {
  BatchSummary,
  InsertOutcome,
  RejectedRecord,
  WarehouseRow,
} from "./domain";

/**
 * Read access to the storage bucket holding uploaded ride exports.
 */
export interface ObjectStore {
  /**
   * Returns the full object body. Throws `ObjectNotFound` when the key is gone
   * and `SizeLimitExceeded` as soon as more than `maxBytes` have been read.
   */
  getObject(params: {
    bucket: string;
    key: string;
    maxBytes: number;
    signal?: AbortSignal;
  }): Promise<Buffer>;
}

/**
 * Append-only structured store for ride rows.
 */
export interface WarehouseTable {
  /**
   * Atomically inserts one batch. A second call with the same idempotency key
   * resolves to "conflict-ignored" and writes nothing visible.
   */
  insertBatch(params: {
    tableId: string;
    rows: WarehouseRow[];
    idempotencyKey: string;
    objectName: string;
    deadline: Deadline;
  }): Promise<InsertOutcome>;
}

/**
 * Read side of the warehouse; only committed batches are visible.
 */
export interface WarehouseReader {
  listCommittedBatches(params: {
    limit: number;
    cursor?: Record<string, unknown>;
  }): Promise<{ items: BatchSummary[]; cursor?: Record<string, unknown> }>;
  getBatchRows(params: { batchId: string }): Promise<WarehouseRow[] | null>;
}

/**
 * Side channel for objects and rows that cannot be loaded.
 */
export interface DeadLetterSink {
  /** Whether `bucket/key` lies inside the dead-letter location. */
  owns(bucket: string, key: string): boolean;
  quarantine(params: {
    bucket: string;
    objectName: string;
    reason: string;
  }): Promise<string>;
  writeRejectReport(params: {
    objectName: string;
    batchId: string;
    rejected: RejectedRecord[];
  }): Promise<string>;
}
