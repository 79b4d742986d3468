import { loadIngestionConfig } from "../config";

describe("loadIngestionConfig", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const name of [
      "SST_STAGE",
      "STAGE",
      "APP_NAME",
      "RIDES_TABLE",
      "SOURCE_BUCKET",
      "MAX_OBJECT_BYTES",
      "INVOCATION_TIMEOUT_MS",
      "DEADLINE_SAFETY_MS",
      "DEAD_LETTER_BUCKET",
      "DEAD_LETTER_PREFIX",
    ]) {
      delete process.env[name];
    }
    process.env.NODE_ENV = "test";
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("requires the source bucket", () => {
    expect(() => loadIngestionConfig()).toThrow(
      "Missing required env var: SOURCE_BUCKET__dev or SOURCE_BUCKET"
    );
  });

  test("applies defaults", () => {
    process.env.SOURCE_BUCKET = "ride-exports";
    expect(loadIngestionConfig()).toEqual({
      projectId: "rideshare-ingest",
      stage: "dev",
      tableId: "rideshare-ingest-dev-RideBookingsTable",
      sourceBucket: "ride-exports",
      maxObjectBytes: 52_428_800,
      invocationTimeoutMs: 60_000,
      deadlineSafetyMs: 5_000,
      deadLetter: { bucket: "ride-exports", prefix: "dead-letter" },
    });
  });

  test("reads stage-specific and explicit overrides", () => {
    process.env.SST_STAGE = "prod";
    process.env.APP_NAME = "rides";
    process.env.SOURCE_BUCKET = "ride-exports";
    process.env.SOURCE_BUCKET__prod = "ride-exports-prod";
    process.env.MAX_OBJECT_BYTES = "1024";
    process.env.DEAD_LETTER_BUCKET = "ride-quarantine";
    process.env.DEAD_LETTER_PREFIX = "failed/";

    const config = loadIngestionConfig();

    expect(config.stage).toBe("prod");
    expect(config.tableId).toBe("rides-prod-RideBookingsTable");
    expect(config.sourceBucket).toBe("ride-exports-prod");
    expect(config.maxObjectBytes).toBe(1024);
    expect(config.deadLetter).toEqual({ bucket: "ride-quarantine", prefix: "failed" });
  });

  test("RIDES_TABLE overrides the derived table name", () => {
    process.env.SOURCE_BUCKET = "ride-exports";
    process.env.RIDES_TABLE = "rides-local";
    expect(loadIngestionConfig().tableId).toBe("rides-local");
  });

  test("rejects invalid limits", () => {
    process.env.SOURCE_BUCKET = "ride-exports";
    process.env.MAX_OBJECT_BYTES = "0";
    expect(() => loadIngestionConfig()).toThrow("MAX_OBJECT_BYTES must be positive: 0");

    process.env.MAX_OBJECT_BYTES = "lots";
    expect(() => loadIngestionConfig()).toThrow(
      "Env var MAX_OBJECT_BYTES is not a number: lots"
    );
  });
});
