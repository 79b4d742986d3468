// Lambda handler returning the rows of one committed load batch.
//
// Endpoint: GET /batches/{batchId}/rows
// Inputs (path params):
//   - batchId: string (required), e.g. BATCH#<32 hex chars>; may arrive URL-encoded
// Returns 404 while the batch is unknown or not yet committed.
import type { APIGatewayProxyEventV2 } from "aws-lambda";
import { getBatchRows } from "@src/ingestion/business/read_batches";
import { getLogger } from "@src/util/logger";

export const handler = async (
  event: Pick<APIGatewayProxyEventV2, "pathParameters">
) => {
  try {
    const rawId = event.pathParameters?.batchId;
    if (!rawId) {
      return response(400, { error: "batchId is required" });
    }
    const batchId = decodeURIComponent(rawId);

    const result = await getBatchRows({ batchId });
    return response(200, result);
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    if (message.startsWith("Invalid batch id")) {
      return response(400, { error: "Bad Request", message });
    }
    if (message.startsWith("Batch not found")) {
      return response(404, { error: "Not Found", message });
    }
    getLogger("functions/get_batch_rows").error({ err }, "get_batch_rows error");
    return response(500, { error: "Internal server error", message });
  }
};

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
