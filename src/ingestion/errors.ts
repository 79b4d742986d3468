import type { IngestionErrorCode } from "./types/domain";

const RETRYABLE_CODES: ReadonlySet<IngestionErrorCode> = new Set([
  "WarehouseUnavailable",
  "StorageUnavailable",
  "QuotaExceeded",
  "BatchInFlight",
  "DeadlineExceeded",
  "Unexpected",
]);

export function isRetryableCode(code: IngestionErrorCode): boolean {
  return RETRYABLE_CODES.has(code);
}

export class IngestionError extends Error {
  readonly code: IngestionErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: IngestionErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "IngestionError";
    this.code = code;
    this.retryable = isRetryableCode(code);
    this.details = details;
  }
}

const THROTTLING_NAMES = new Set([
  "ProvisionedThroughputExceededException",
  "ThrottlingException",
  "RequestLimitExceeded",
  "LimitExceededException",
  "SlowDown",
  "TooManyRequestsException",
]);

const NOT_FOUND_NAMES = new Set(["NoSuchKey", "NotFound", "NoSuchBucket"]);

const NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
]);

interface AwsLikeError {
  name?: unknown;
  code?: unknown;
  status?: number;
  retryable: boolean;
}

function asAwsLike(err: unknown): AwsLikeError {
  if (typeof err !== "object" || err === null) return { retryable: false };
  const metadata = "$metadata" in err ? err.$metadata : undefined;
  const status =
    typeof metadata === "object" &&
    metadata !== null &&
    "httpStatusCode" in metadata &&
    typeof metadata.httpStatusCode === "number"
      ? metadata.httpStatusCode
      : undefined;
  return {
    name: "name" in err ? err.name : undefined,
    code: "code" in err ? err.code : undefined,
    status,
    retryable: "$retryable" in err && err.$retryable !== undefined,
  };
}

/**
 * Maps an AWS SDK (or network) failure onto the ingestion taxonomy.
 * `notFoundCode` decides what a 404 means at the calling boundary and
 * `unavailableCode` which dependency a 5xx is blamed on.
 */
export function classifyAwsError(
  err: unknown,
  context: {
    operation: string;
    notFoundCode?: IngestionErrorCode;
    unavailableCode?: IngestionErrorCode;
  }
): IngestionError {
  if (err instanceof IngestionError) return err;

  const aws = asAwsLike(err);
  const name = typeof aws.name === "string" ? aws.name : "";
  const code = typeof aws.code === "string" ? aws.code : "";
  const status = aws.status;
  const message = err instanceof Error ? err.message : String(err);
  const details = { operation: context.operation, name, status };

  if (name === "AbortError") {
    return new IngestionError(
      `${context.operation} aborted: ${message}`,
      "DeadlineExceeded",
      details,
      { cause: err }
    );
  }

  if (THROTTLING_NAMES.has(name) || status === 429) {
    return new IngestionError(
      `${context.operation} throttled: ${message}`,
      "QuotaExceeded",
      details,
      { cause: err }
    );
  }

  if (context.notFoundCode && (NOT_FOUND_NAMES.has(name) || status === 404)) {
    return new IngestionError(
      `${context.operation}: ${message}`,
      context.notFoundCode,
      details,
      { cause: err }
    );
  }

  if (
    (status !== undefined && status >= 500) ||
    NETWORK_CODES.has(code) ||
    name === "TimeoutError" ||
    name === "InternalServerError" ||
    name === "ServiceUnavailable" ||
    aws.retryable
  ) {
    return new IngestionError(
      `${context.operation} unavailable: ${message}`,
      context.unavailableCode ?? "WarehouseUnavailable",
      details,
      { cause: err }
    );
  }

  return new IngestionError(
    `${context.operation} failed: ${message}`,
    "Unexpected",
    details,
    { cause: err }
  );
}
