import { IngestionError, classifyAwsError, isRetryableCode } from "../errors";
import { awsError } from "./support/in_memory_s3";

describe("IngestionError", () => {
  it("derives retryability from the code", () => {
    expect(new IngestionError("x", "WarehouseUnavailable").retryable).toBe(true);
    expect(new IngestionError("x", "BatchInFlight").retryable).toBe(true);
    expect(new IngestionError("x", "SchemaViolation").retryable).toBe(false);
    expect(new IngestionError("x", "ObjectNotFound").retryable).toBe(false);
    expect(isRetryableCode("MisroutedEvent")).toBe(false);
    expect(isRetryableCode("Unexpected")).toBe(true);
  });
});

describe("classifyAwsError", () => {
  it("passes ingestion errors through untouched", () => {
    const original = new IngestionError("too big", "SizeLimitExceeded");
    expect(classifyAwsError(original, { operation: "s3:GetObject" })).toBe(original);
  });

  it("maps aborted requests to DeadlineExceeded", () => {
    const err = classifyAwsError(awsError("AbortError", "Request aborted"), {
      operation: "s3:GetObject",
    });
    expect(err.code).toBe("DeadlineExceeded");
    expect(err.message).toBe("s3:GetObject aborted: Request aborted");
  });

  it("maps throttling to QuotaExceeded", () => {
    const throttled = awsError(
      "ProvisionedThroughputExceededException",
      "Rate exceeded",
      400
    );
    expect(classifyAwsError(throttled, { operation: "dynamodb:put" }).code).toBe(
      "QuotaExceeded"
    );
    expect(
      classifyAwsError(awsError("Unknown", "slow down", 429), { operation: "op" }).code
    ).toBe("QuotaExceeded");
  });

  it("maps 404s to the caller's not-found code", () => {
    const err = classifyAwsError(awsError("NoSuchKey", "The specified key does not exist.", 404), {
      operation: "s3:GetObject ride-exports/a.csv",
      notFoundCode: "ObjectNotFound",
    });
    expect(err.code).toBe("ObjectNotFound");
    expect(err.retryable).toBe(false);
    expect(err.message).toBe(
      "s3:GetObject ride-exports/a.csv: The specified key does not exist."
    );
  });

  it("blames 5xx and network failures on the named dependency", () => {
    expect(
      classifyAwsError(awsError("InternalError", "oops", 503), {
        operation: "s3:GetObject",
        unavailableCode: "StorageUnavailable",
      }).code
    ).toBe("StorageUnavailable");
    const reset = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    expect(classifyAwsError(reset, { operation: "dynamodb:put" }).code).toBe(
      "WarehouseUnavailable"
    );
  });

  it("treats anything else as Unexpected", () => {
    const err = classifyAwsError(new Error("boom"), { operation: "dynamodb:put" });
    expect(err.code).toBe("Unexpected");
    expect(err.message).toBe("dynamodb:put failed: boom");
    expect(err.cause).toBeInstanceOf(Error);
    expect(classifyAwsError("boom", { operation: "op" }).message).toBe("op failed: boom");
  });
});
