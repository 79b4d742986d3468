import { IngestionError } from "@src/ingestion/errors";
import {
  RIDE_HEADER,
  rideCsv,
  rideLine,
  rideRecord,
} from "@src/ingestion/__tests__/support/rides";
import { RIDE_COLUMNS } from "../ride_schema";
import { parseRideBookings } from "../parse_rides";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error");
}

describe("parseRideBookings", () => {
  it("parses a valid row into a typed record", () => {
    const parsed = parseRideBookings(Buffer.from(rideCsv([rideLine()])));
    expect(parsed.dataRows).toBe(1);
    expect(parsed.rejected).toEqual([]);
    expect(parsed.records).toEqual([rideRecord()]);
  });

  it("unwraps triple-quoted identifiers from the export", () => {
    const parsed = parseRideBookings(
      rideCsv([rideLine({ bookingId: '"""CNR0000002"""', customerId: '"""CID000002"""' })])
    );
    expect(parsed.records[0].bookingId).toBe("CNR0000002");
    expect(parsed.records[0].customerId).toBe("CID000002");
  });

  it("rejects exactly the bad rows of a large object with their line numbers", () => {
    const lines: string[] = [];
    for (let i = 0; i < 100; i += 1) {
      const bookingId = `CNR${String(i).padStart(7, "0")}`;
      if (i === 9) lines.push(rideLine({ bookingId, bookingValue: "abc" }));
      else if (i === 49) lines.push(rideLine({ bookingId, date: "2024-02-30" }));
      else if (i === 98) lines.push(`${rideLine({ bookingId })},extra`);
      else lines.push(rideLine({ bookingId }));
    }

    const parsed = parseRideBookings(rideCsv(lines));

    expect(parsed.dataRows).toBe(100);
    expect(parsed.records).toHaveLength(97);
    expect(parsed.rejected.map(({ line, kind, reason }) => ({ line, kind, reason }))).toEqual([
      { line: 11, kind: "SchemaViolation", reason: "Booking Value: is not a number: abc" },
      {
        line: 51,
        kind: "SchemaViolation",
        reason: "Date: is not a valid datetime: 2024-02-30 08:15:00",
      },
      { line: 100, kind: "ParseError", reason: "expected 21 columns, found 22" },
    ]);
    expect(parsed.rejected[0].raw).toBe(
      rideLine({ bookingId: "CNR0000009", bookingValue: "abc" })
    );
  });

  it("rejects a row whose number overflows to infinity", () => {
    const huge = "9".repeat(400);
    const parsed = parseRideBookings(rideCsv([rideLine({ bookingValue: huge })]));
    expect(parsed.records).toEqual([]);
    expect(parsed.rejected).toEqual([
      {
        line: 2,
        kind: "SchemaViolation",
        reason: "Booking Value: is not a finite number",
        raw: rideLine({ bookingValue: huge }),
      },
    ]);
  });

  it("records malformed CSV rows as parse errors", () => {
    const parsed = parseRideBookings(
      rideCsv([rideLine(), rideLine({ pickupLocation: 'Old "Town' })])
    );
    expect(parsed.records).toHaveLength(1);
    expect(parsed.rejected).toEqual([
      {
        line: 3,
        kind: "ParseError",
        reason: "unexpected quote in column 7",
        raw: rideLine({ pickupLocation: 'Old "Town' }),
      },
    ]);
  });

  it("matches columns by name regardless of case and order", () => {
    const reversed = [...RIDE_COLUMNS].reverse();
    const header = reversed.map(column => column.header.toUpperCase()).join(",");
    const row = rideLine().split(",").reverse().join(",");

    const parsed = parseRideBookings(`${header}\n${row}\n`);

    expect(parsed.rejected).toEqual([]);
    expect(parsed.records).toEqual([rideRecord()]);
  });

  it("fails the object when required columns are missing", () => {
    const header = RIDE_COLUMNS.slice(0, -1)
      .map(column => column.header)
      .join(",");
    const err = captureError(() => parseRideBookings(`${header}\n`));
    expect(err).toBeInstanceOf(IngestionError);
    expect(err).toMatchObject({
      code: "MalformedObject",
      retryable: false,
      message: "Header is missing required columns: Payment Method",
    });
  });

  it("fails the object when the header itself is not valid CSV", () => {
    const err = captureError(() => parseRideBookings(`"Date,Time\n`));
    expect(err).toMatchObject({
      code: "MalformedObject",
      message: "Header row is not valid CSV: unterminated quoted field",
    });
  });

  it("returns no rows for an empty object or a header-only object", () => {
    expect(parseRideBookings("")).toEqual({ records: [], rejected: [], dataRows: 0 });
    expect(parseRideBookings(`${RIDE_HEADER}\n`)).toEqual({
      records: [],
      rejected: [],
      dataRows: 0,
    });
  });
});
