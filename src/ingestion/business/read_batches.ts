/**
 * Read side of the ride warehouse: committed batches and their rows.
 * Shared by the REST handlers and the local scripts.
 */
import { DynamoTable, getDynamoTableName } from "@src/util/dynamodb";
import { getLogger } from "@src/util/logger";
import { getString } from "@src/util/env";
import { DynamoWarehouseTable } from "../db/dynamo_warehouse_table";
import type { WarehouseReader } from "../types/contracts";
import type { BatchSummary, WarehouseRow } from "../types/domain";
import { isBatchId } from "./batch_id";

const DEFAULT_LIMIT = 20;

export type BatchCursor = Record<string, unknown>;

export interface ReadBatchesDependencies {
  reader?: WarehouseReader;
}

function defaultReader(): WarehouseReader {
  return new DynamoWarehouseTable({
    tableName: getString(
      "RIDES_TABLE",
      getDynamoTableName(DynamoTable.RideBookings)
    ),
  });
}

export interface ListBatchesInput {
  limit?: number;
  cursor?: BatchCursor;
}

export interface ListBatchesOutput {
  count: number;
  items: BatchSummary[];
  nextCursor?: BatchCursor;
}

export async function listBatches(
  input: ListBatchesInput,
  deps: ReadBatchesDependencies = {}
): Promise<ListBatchesOutput> {
  const reader = deps.reader ?? defaultReader();
  const page = await reader.listCommittedBatches({
    limit: input.limit ?? DEFAULT_LIMIT,
    cursor: input.cursor,
  });
  getLogger("ingestion/read_batches").debug(
    { count: page.items.length, more: Boolean(page.cursor) },
    "listed committed batches"
  );
  return { count: page.items.length, items: page.items, nextCursor: page.cursor };
}

export interface GetBatchRowsOutput {
  batchId: string;
  count: number;
  rows: WarehouseRow[];
}

export async function getBatchRows(
  input: { batchId: string },
  deps: ReadBatchesDependencies = {}
): Promise<GetBatchRowsOutput> {
  const { batchId } = input;
  if (!isBatchId(batchId)) {
    throw new Error(`Invalid batch id: ${batchId}`);
  }
  const reader = deps.reader ?? defaultReader();
  const rows = await reader.getBatchRows({ batchId });
  if (!rows) {
    throw new Error(`Batch not found: ${batchId}`);
  }
  return { batchId, count: rows.length, rows };
}
