import { listBatches } from "@src/ingestion/business/read_batches";
import { decodeCursor, encodeCursor, handler } from "../list_batches";

jest.mock("@src/ingestion/business/read_batches", () => ({
  listBatches: jest.fn(),
}));

const listBatchesMock = jest.mocked(listBatches);

describe("list_batches handler", () => {
  beforeEach(() => {
    listBatchesMock.mockReset();
  });

  it("returns a page with an opaque next cursor", async () => {
    listBatchesMock.mockResolvedValue({
      count: 0,
      items: [],
      nextCursor: { pk: "BATCH#1", sk: "META#BATCH" },
    });

    const res = await handler({ queryStringParameters: { limit: "5" } });

    expect(res.statusCode).toBe(200);
    expect(listBatchesMock).toHaveBeenCalledWith({ limit: 5, cursor: undefined });
    const body = JSON.parse(res.body);
    expect(decodeCursor(body.nextCursor)).toEqual({ pk: "BATCH#1", sk: "META#BATCH" });
  });

  it("decodes the cursor of a previous page", async () => {
    listBatchesMock.mockResolvedValue({ count: 0, items: [] });
    const cursor = encodeCursor({ pk: "BATCH#1", sk: "META#BATCH" });

    const res = await handler({ queryStringParameters: { cursor } });

    expect(res.statusCode).toBe(200);
    expect(listBatchesMock).toHaveBeenCalledWith({
      limit: undefined,
      cursor: { pk: "BATCH#1", sk: "META#BATCH" },
    });
    expect(JSON.parse(res.body)).toEqual({ count: 0, items: [] });
  });

  it("rejects a non-numeric limit", async () => {
    const res = await handler({ queryStringParameters: { limit: "ten" } });
    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body)).toEqual({ error: "limit must be a number" });
    expect(listBatchesMock).not.toHaveBeenCalled();
  });

  it("rejects a cursor that is not encoded JSON", async () => {
    const res = await handler({ queryStringParameters: { cursor: "%%%" } });
    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body)).toEqual({ error: "cursor is invalid" });
  });

  it("hides internal failures", async () => {
    listBatchesMock.mockRejectedValue(new Error("table missing"));
    const res = await handler({ queryStringParameters: undefined });
    expect(res.statusCode).toBe(500);
    expect(JSON.parse(res.body)).toEqual({ error: "Internal server error" });
  });
});
