import { IngestionError } from "../errors";
import type { RejectedRecord, RideRecord } from "../types/domain";
import { readCsvRows } from "./csv";
import {
  RIDE_COLUMNS,
  RideColumnKey,
  cleanCell,
  describeIssues,
  normalizeColumnName,
  rideCellsSchema,
} from "./ride_schema";

export interface ParsedRides {
  records: RideRecord[];
  rejected: RejectedRecord[];
  /** Data rows seen, excluding the header and blank lines. */
  dataRows: number;
}

/**
 * Parses a ride bookings export. Row-level problems become RejectedRecords;
 * only an unusable header fails the whole object.
 */
export function parseRideBookings(body: Buffer | string): ParsedRides {
  const text = typeof body === "string" ? body : body.toString("utf8");
  const rows = readCsvRows(text);
  if (rows.length === 0) {
    return { records: [], rejected: [], dataRows: 0 };
  }

  const [header, ...data] = rows;
  if (header.error) {
    throw new IngestionError(
      `Header row is not valid CSV: ${header.error}`,
      "MalformedObject",
      { line: header.line }
    );
  }
  const positions = resolveColumnPositions(header.fields);
  const expectedWidth = header.fields.length;

  const records: RideRecord[] = [];
  const rejected: RejectedRecord[] = [];

  for (const row of data) {
    if (row.error) {
      rejected.push({
        line: row.line,
        kind: "ParseError",
        reason: row.error,
        raw: row.raw,
      });
      continue;
    }
    if (row.fields.length !== expectedWidth) {
      rejected.push({
        line: row.line,
        kind: "ParseError",
        reason: `expected ${expectedWidth} columns, found ${row.fields.length}`,
        raw: row.raw,
      });
      continue;
    }

    const cells: Record<string, string | null> = {};
    for (const column of RIDE_COLUMNS) {
      const index = positions.get(column.key);
      cells[column.key] = index === undefined ? null : cleanCell(row.fields[index]);
    }

    const parsed = rideCellsSchema.safeParse(cells);
    if (!parsed.success) {
      rejected.push({
        line: row.line,
        kind: "SchemaViolation",
        reason: describeIssues(parsed.error),
        raw: row.raw,
      });
      continue;
    }
    records.push({ line: row.line, ...parsed.data });
  }

  return { records, rejected, dataRows: data.length };
}

function resolveColumnPositions(
  headerFields: string[]
): Map<RideColumnKey, number> {
  const byName = new Map<string, number>();
  headerFields.forEach((name, index) => {
    const normalized = normalizeColumnName(cleanCell(name) ?? "");
    if (!byName.has(normalized)) byName.set(normalized, index);
  });

  const missing: string[] = [];
  const positions = new Map<RideColumnKey, number>();
  for (const column of RIDE_COLUMNS) {
    const index = byName.get(normalizeColumnName(column.header));
    if (index === undefined) {
      missing.push(column.header);
    } else {
      positions.set(column.key, index);
    }
  }

  if (missing.length > 0) {
    throw new IngestionError(
      `Header is missing required columns: ${missing.join(", ")}`,
      "MalformedObject",
      { missing }
    );
  }
  return positions;
}
