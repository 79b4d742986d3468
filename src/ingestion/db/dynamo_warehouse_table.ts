/**
 * DynamoDB warehouse for ride rows with idempotent, all-or-nothing batches.
 *
 * Item layout (single table, pk/sk):
 * - Batch marker: pk = "BATCH#<hash>", sk = "META#BATCH"
 *   status PENDING -> COMMITTED; committed markers carry gsi1pk/gsi1sk for
 *   the `byStatus` index used to list loaded batches.
 * - Ride row:     pk = "BATCH#<hash>", sk = "ROW#<line, zero-padded>"
 *
 * A batch becomes visible only once its marker is COMMITTED. The marker is
 * claimed with a conditional put (lease + claim token), rows are written
 * under deterministic keys, and the commit is a conditional update guarded by
 * the claim token. An abandoned claim can be taken over once its lease ends;
 * the takeover deletes rows the abandoned attempt wrote outside the new row set.
 * Every write of a load carries the deadline's abort signal.
 */
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import {
  BatchWriteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  UpdateCommand,
} from "@aws-sdk/lib-dynamodb";
import type { BatchWriteCommandInput } from "@aws-sdk/lib-dynamodb";
import { randomUUID } from "crypto";
import { z } from "zod";
import { getLogger } from "@src/util/logger";
import type { Deadline } from "../business/deadline";
import { IngestionError, classifyAwsError } from "../errors";
import type { WarehouseReader, WarehouseTable } from "../types/contracts";
import type {
  BatchSummary,
  InsertOutcome,
  WarehouseRow,
} from "../types/domain";

export const META_SK = "META#BATCH";
export const ROW_SK_PREFIX = "ROW#";
export const COMMITTED_GSI_PK = "BATCHES#COMMITTED";
export const STATUS_INDEX = "byStatus";

const BATCH_WRITE_LIMIT = 25;
const MAX_UNPROCESSED_ATTEMPTS = 5;
const DEFAULT_LEASE_GRACE_MS = 30_000;
const DEFAULT_BACKOFF_MS = 100;
const MIN_LIMIT = 1;
const MAX_LIMIT = 100;

export interface DynamoWarehouseTableOptions {
  tableName: string;
  client?: DynamoDBDocumentClient;
  /** Extra lease time beyond the invocation deadline. */
  leaseGraceMs?: number;
  backoffMs?: number;
  now?: () => number;
  newToken?: () => string;
}

const batchMarkerSchema = z.object({
  batchId: z.string(),
  objectName: z.string(),
  rowCount: z.number(),
  status: z.enum(["PENDING", "COMMITTED"]),
  createdAt: z.string(),
  committedAt: z.string().optional(),
});

const nullableNumber = z.number().nullable();
const nullableString = z.string().nullable();

const storedRideSchema = z.object({
  line: z.number(),
  bookedAt: z.string(),
  date: z.string(),
  time: z.string(),
  bookingId: z.string(),
  bookingStatus: z.string(),
  customerId: z.string(),
  vehicleType: z.string(),
  pickupLocation: z.string(),
  dropLocation: z.string(),
  avgVtat: nullableNumber,
  avgCtat: nullableNumber,
  cancelledRidesByCustomer: nullableNumber,
  reasonForCancellingByCustomer: nullableString,
  cancelledRidesByDriver: nullableNumber,
  driverCancellationReason: nullableString,
  incompleteRides: nullableNumber,
  incompleteRidesReason: nullableString,
  bookingValue: nullableNumber,
  rideDistance: nullableNumber,
  driverRatings: nullableNumber,
  customerRating: nullableNumber,
  paymentMethod: nullableString,
  hour: z.number(),
  day: z.number(),
  month: z.number(),
  weekday: z.number(),
  isWeekend: z.boolean(),
  timeOfDay: z.enum(["morning", "afternoon", "evening", "night"]),
  cancelledByDriver: z.boolean(),
  cancelledByCustomer: z.boolean(),
  incomplete: z.boolean(),
  driverRatingsMissing: z.boolean(),
  customerRatingMissing: z.boolean(),
  bookingValueMissing: z.boolean(),
  paymentMethodMissing: z.boolean(),
});

export function rowSortKey(line: number): string {
  return `${ROW_SK_PREFIX}${String(line).padStart(8, "0")}`;
}

type WriteRequest = NonNullable<BatchWriteCommandInput["RequestItems"]>[string][number];

type ClaimOutcome = "claimed" | "taken-over" | "committed";

function isConditionalCheckFailed(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "name" in err &&
    err.name === "ConditionalCheckFailedException"
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class DynamoWarehouseTable implements WarehouseTable, WarehouseReader {
  private readonly table: string;
  private readonly doc: DynamoDBDocumentClient;
  private readonly leaseGraceMs: number;
  private readonly backoffMs: number;
  private readonly now: () => number;
  private readonly newToken: () => string;
  private readonly logger = getLogger("ingestion/dynamo_warehouse_table");

  constructor(options: DynamoWarehouseTableOptions) {
    this.table = options.tableName;
    this.doc =
      options.client ?? DynamoDBDocumentClient.from(new DynamoDBClient({}));
    this.leaseGraceMs = options.leaseGraceMs ?? DEFAULT_LEASE_GRACE_MS;
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
    this.now = options.now ?? Date.now;
    this.newToken = options.newToken ?? randomUUID;
  }

  async insertBatch(params: {
    tableId: string;
    rows: WarehouseRow[];
    idempotencyKey: string;
    objectName: string;
    deadline: Deadline;
  }): Promise<InsertOutcome> {
    const { tableId, rows, idempotencyKey: batchId, objectName, deadline } =
      params;
    const token = this.newToken();
    const signal = deadline.signal;

    const claim = await this.claim({
      tableId,
      batchId,
      objectName,
      rowCount: rows.length,
      token,
      leaseMs: deadline.remainingMs() + this.leaseGraceMs,
      signal,
    });
    if (claim === "committed") {
      this.logger.info({ batchId, objectName }, "batch already committed");
      return "conflict-ignored";
    }

    const items = rows.map(row => ({
      pk: batchId,
      sk: rowSortKey(row.line),
      entity: "RIDE",
      batchId,
      objectName,
      ...row,
    }));

    if (claim === "taken-over") {
      deadline.check("warehouse stale row cleanup");
      await this.removeStaleRows({
        tableId,
        batchId,
        keep: new Set(items.map(item => item.sk)),
        signal,
      });
    }

    for (let i = 0; i < items.length; i += BATCH_WRITE_LIMIT) {
      deadline.check("warehouse row write");
      await this.writeChunk(
        tableId,
        items.slice(i, i + BATCH_WRITE_LIMIT).map(Item => ({ PutRequest: { Item } })),
        signal
      );
    }

    deadline.check("warehouse commit");
    await this.commit({ tableId, batchId, token, signal });
    this.logger.info(
      { batchId, objectName, rows: rows.length },
      "batch committed"
    );
    return "inserted";
  }

  /**
   * "claimed" for a new marker, "taken-over" when an abandoned PENDING claim
   * was replaced, "committed" when the batch is already loaded. Throws
   * BatchInFlight while another delivery holds a live claim.
   */
  private async claim(params: {
    tableId: string;
    batchId: string;
    objectName: string;
    rowCount: number;
    token: string;
    leaseMs: number;
    signal: AbortSignal;
  }): Promise<ClaimOutcome> {
    const { tableId, batchId, objectName, rowCount, token, leaseMs, signal } =
      params;
    const nowMs = this.now();
    try {
      const out = await this.doc.send(
        new PutCommand({
          TableName: tableId,
          Item: {
            pk: batchId,
            sk: META_SK,
            entity: "BATCH",
            batchId,
            objectName,
            rowCount,
            status: "PENDING",
            claimToken: token,
            leaseExpiresAt: nowMs + leaseMs,
            createdAt: new Date(nowMs).toISOString(),
          },
          ConditionExpression:
            "attribute_not_exists(pk) OR (#status = :pending AND leaseExpiresAt < :now)",
          ExpressionAttributeNames: { "#status": "status" },
          ExpressionAttributeValues: { ":pending": "PENDING", ":now": nowMs },
          ReturnValues: "ALL_OLD",
        }),
        { abortSignal: signal }
      );
      if (out.Attributes) {
        this.logger.warn(
          { batchId, objectName, previousClaim: out.Attributes.createdAt },
          "took over an abandoned batch claim"
        );
        return "taken-over";
      }
      return "claimed";
    } catch (err) {
      if (!isConditionalCheckFailed(err)) {
        throw classifyAwsError(err, { operation: "dynamodb:claim batch" });
      }
    }

    const marker = await this.getMarker(tableId, batchId, signal);
    if (marker?.status === "COMMITTED") {
      return "committed";
    }
    throw new IngestionError(
      `Batch ${batchId} is being loaded by another delivery`,
      "BatchInFlight",
      { batchId, objectName }
    );
  }

  /**
   * Deletes rows an abandoned attempt wrote under keys the current attempt
   * does not write, so the committed batch holds one version of the object.
   */
  private async removeStaleRows(params: {
    tableId: string;
    batchId: string;
    keep: ReadonlySet<string>;
    signal: AbortSignal;
  }): Promise<void> {
    const { tableId, batchId, keep, signal } = params;
    const stale: WriteRequest[] = [];
    let cursor: Record<string, unknown> | undefined;
    do {
      const out = await this.doc
        .send(
          new QueryCommand({
            TableName: tableId,
            KeyConditionExpression: "pk = :pk AND begins_with(sk, :row)",
            ExpressionAttributeValues: { ":pk": batchId, ":row": ROW_SK_PREFIX },
            ProjectionExpression: "pk, sk",
            ExclusiveStartKey: cursor,
          }),
          { abortSignal: signal }
        )
        .catch((err: unknown) => {
          throw classifyAwsError(err, { operation: "dynamodb:list stale rows" });
        });
      for (const item of out.Items ?? []) {
        const sk: unknown = item.sk;
        if (typeof sk === "string" && !keep.has(sk)) {
          stale.push({ DeleteRequest: { Key: { pk: batchId, sk } } });
        }
      }
      cursor = out.LastEvaluatedKey;
    } while (cursor);

    for (let i = 0; i < stale.length; i += BATCH_WRITE_LIMIT) {
      await this.writeChunk(tableId, stale.slice(i, i + BATCH_WRITE_LIMIT), signal);
    }
    if (stale.length > 0) {
      this.logger.info({ batchId, removed: stale.length }, "removed stale rows");
    }
  }

  private async writeChunk(
    tableId: string,
    requests: WriteRequest[],
    signal: AbortSignal
  ): Promise<void> {
    let pending = requests;
    for (let attempt = 0; attempt < MAX_UNPROCESSED_ATTEMPTS; attempt += 1) {
      if (attempt > 0) await sleep(this.backoffMs * 2 ** (attempt - 1));
      const out = await this.doc
        .send(new BatchWriteCommand({ RequestItems: { [tableId]: pending } }), {
          abortSignal: signal,
        })
        .catch((err: unknown) => {
          throw classifyAwsError(err, { operation: "dynamodb:write rows" });
        });
      const unprocessed = out.UnprocessedItems?.[tableId] ?? [];
      pending = unprocessed.flatMap((request): WriteRequest[] => {
        if (request.PutRequest?.Item) {
          return [{ PutRequest: { Item: request.PutRequest.Item } }];
        }
        if (request.DeleteRequest?.Key) {
          return [{ DeleteRequest: { Key: request.DeleteRequest.Key } }];
        }
        return [];
      });
      if (pending.length === 0) return;
    }
    throw new IngestionError(
      `${pending.length} row(s) still unprocessed after ${MAX_UNPROCESSED_ATTEMPTS} attempts`,
      "QuotaExceeded",
      { tableId, unprocessed: pending.length }
    );
  }

  private async commit(params: {
    tableId: string;
    batchId: string;
    token: string;
    signal: AbortSignal;
  }): Promise<void> {
    const { tableId, batchId, token, signal } = params;
    const committedAt = new Date(this.now()).toISOString();
    try {
      await this.doc.send(
        new UpdateCommand({
          TableName: tableId,
          Key: { pk: batchId, sk: META_SK },
          UpdateExpression:
            "SET #status = :committed, committedAt = :at, gsi1pk = :gsi1pk, gsi1sk = :gsi1sk REMOVE leaseExpiresAt, claimToken",
          ConditionExpression: "#status = :pending AND claimToken = :token",
          ExpressionAttributeNames: { "#status": "status" },
          ExpressionAttributeValues: {
            ":committed": "COMMITTED",
            ":pending": "PENDING",
            ":token": token,
            ":at": committedAt,
            ":gsi1pk": COMMITTED_GSI_PK,
            ":gsi1sk": `${committedAt}#${batchId}`,
          },
        }),
        { abortSignal: signal }
      );
    } catch (err) {
      if (isConditionalCheckFailed(err)) {
        throw new IngestionError(
          `Lost the claim on batch ${batchId} before commit`,
          "BatchInFlight",
          { batchId }
        );
      }
      throw classifyAwsError(err, { operation: "dynamodb:commit batch" });
    }
  }

  private async getMarker(
    tableId: string,
    batchId: string,
    signal?: AbortSignal
  ): Promise<BatchSummary | null> {
    const out = await this.doc
      .send(
        new GetCommand({
          TableName: tableId,
          Key: { pk: batchId, sk: META_SK },
          ConsistentRead: true,
        }),
        { abortSignal: signal }
      )
      .catch((err: unknown) => {
        throw classifyAwsError(err, { operation: "dynamodb:get batch marker" });
      });
    return out.Item ? batchMarkerSchema.parse(out.Item) : null;
  }

  async listCommittedBatches(params: {
    limit: number;
    cursor?: Record<string, unknown>;
  }): Promise<{ items: BatchSummary[]; cursor?: Record<string, unknown> }> {
    const out = await this.doc.send(
      new QueryCommand({
        TableName: this.table,
        IndexName: STATUS_INDEX,
        KeyConditionExpression: "gsi1pk = :pk",
        ExpressionAttributeValues: { ":pk": COMMITTED_GSI_PK },
        ScanIndexForward: false,
        Limit: this.clampLimit(params.limit),
        ExclusiveStartKey: params.cursor,
      })
    );
    return {
      items: (out.Items ?? []).map(item => batchMarkerSchema.parse(item)),
      cursor: out.LastEvaluatedKey,
    };
  }

  /**
   * Rows of a committed batch in source line order; null when the batch is
   * unknown or not committed yet.
   */
  async getBatchRows(params: { batchId: string }): Promise<WarehouseRow[] | null> {
    const marker = await this.getMarker(this.table, params.batchId);
    if (!marker || marker.status !== "COMMITTED") return null;

    const rows: WarehouseRow[] = [];
    let cursor: Record<string, unknown> | undefined;
    do {
      const out = await this.doc.send(
        new QueryCommand({
          TableName: this.table,
          KeyConditionExpression: "pk = :pk AND begins_with(sk, :row)",
          ExpressionAttributeValues: {
            ":pk": params.batchId,
            ":row": ROW_SK_PREFIX,
          },
          ExclusiveStartKey: cursor,
        })
      );
      for (const item of out.Items ?? []) {
        rows.push(storedRideSchema.parse(item));
      }
      cursor = out.LastEvaluatedKey;
    } while (cursor);
    return rows;
  }

  private clampLimit(value: number): number {
    if (!Number.isFinite(value)) return MIN_LIMIT;
    return Math.min(Math.max(Math.trunc(value), MIN_LIMIT), MAX_LIMIT);
  }
}
