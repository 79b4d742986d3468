// Lambda handler listing committed load batches, newest first.
//
// Endpoint: GET /batches
// Inputs (query params):
//   - limit: optional number (default 20, clamped to 1..100)
//   - cursor: optional opaque cursor returned by a previous page
// Env:
//   - RIDES_TABLE (optional override of the RideBookings table name)
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { BatchCursor, listBatches } from "@src/ingestion/business/read_batches";
import { getLogger } from "@src/util/logger";

export const handler = async (
  event: Pick<APIGatewayProxyEventV2, "queryStringParameters">
) => {
  try {
    const qs = event.queryStringParameters ?? {};
    const limit = qs.limit ? Number(qs.limit) : undefined;
    if (limit !== undefined && !Number.isFinite(limit)) {
      return response(400, { error: "limit must be a number" });
    }
    const cursor = qs.cursor ? decodeCursor(qs.cursor) : undefined;
    if (qs.cursor && !cursor) {
      return response(400, { error: "cursor is invalid" });
    }

    const result = await listBatches({ limit, cursor });
    return response(200, {
      ...result,
      nextCursor: result.nextCursor ? encodeCursor(result.nextCursor) : undefined,
    });
  } catch (err) {
    getLogger("functions/list_batches").error({ err }, "list_batches error");
    return response(500, { error: "Internal server error" });
  }
};

export function decodeCursor(value: string): BatchCursor | undefined {
  try {
    const json = Buffer.from(value, "base64").toString("utf8");
    const obj: unknown = JSON.parse(json);
    if (typeof obj !== "object" || obj === null || Array.isArray(obj)) {
      return undefined;
    }
    return Object.fromEntries(Object.entries(obj));
  } catch {
    return undefined;
  }
}

export function encodeCursor(cursor: BatchCursor): string {
  return Buffer.from(JSON.stringify(cursor), "utf8").toString("base64");
}

function response(statusCode: number, body: unknown) {
  return {
    statusCode,
    headers: {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": "*",
    },
    body: JSON.stringify(body),
  };
}
