/**
 * Column contract of the ride bookings export and the per-row validation rules.
 */
import { z } from "zod";
import type { RideRecord } from "../types/domain";

export const RIDE_COLUMNS = [
  { header: "Date", key: "date" },
  { header: "Time", key: "time" },
  { header: "Booking ID", key: "bookingId" },
  { header: "Booking Status", key: "bookingStatus" },
  { header: "Customer ID", key: "customerId" },
  { header: "Vehicle Type", key: "vehicleType" },
  { header: "Pickup Location", key: "pickupLocation" },
  { header: "Drop Location", key: "dropLocation" },
  { header: "Avg VTAT", key: "avgVtat" },
  { header: "Avg CTAT", key: "avgCtat" },
  { header: "Cancelled Rides by Customer", key: "cancelledRidesByCustomer" },
  { header: "Reason for cancelling by Customer", key: "reasonForCancellingByCustomer" },
  { header: "Cancelled Rides by Driver", key: "cancelledRidesByDriver" },
  { header: "Driver Cancellation Reason", key: "driverCancellationReason" },
  { header: "Incomplete Rides", key: "incompleteRides" },
  { header: "Incomplete Rides Reason", key: "incompleteRidesReason" },
  { header: "Booking Value", key: "bookingValue" },
  { header: "Ride Distance", key: "rideDistance" },
  { header: "Driver Ratings", key: "driverRatings" },
  { header: "Customer Rating", key: "customerRating" },
  { header: "Payment Method", key: "paymentMethod" },
] as const;

export type RideColumnKey = (typeof RIDE_COLUMNS)[number]["key"];

const MISSING_LITERALS = new Set(["", "null", "NULL", "NA", "NaN", "nan"]);

/**
 * "Booking ID" -> "booking_id"
 */
export function normalizeColumnName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, "_");
}

/**
 * Trims a cell, drops wrapping quotes left over from double-quoted exports and
 * maps missing-value literals to null.
 */
export function cleanCell(value: string | undefined): string | null {
  if (value === undefined) return null;
  let cleaned = value.trim();
  while (cleaned.length >= 2 && cleaned.startsWith('"') && cleaned.endsWith('"')) {
    cleaned = cleaned.slice(1, -1).trim();
  }
  return MISSING_LITERALS.has(cleaned) ? null : cleaned;
}

const DECIMAL = /^-?\d+(\.\d+)?$/;
const DATE = /^\d{4}-\d{2}-\d{2}$/;
const TIME = /^\d{2}:\d{2}:\d{2}$/;

function requiredText() {
  return z
    .string({ invalid_type_error: "is required", required_error: "is required" })
    .min(1, "is required");
}

function optionalText() {
  return z.string().nullable();
}

function optionalNumber(bounds: { min?: number; max?: number } = {}) {
  return z
    .string()
    .nullable()
    .transform((value, ctx) => {
      if (value === null) return null;
      if (!DECIMAL.test(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `is not a number: ${value}`,
        });
        return z.NEVER;
      }
      const n = Number(value);
      if (!Number.isFinite(n)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "is not a finite number",
        });
        return z.NEVER;
      }
      if (bounds.min !== undefined && n < bounds.min) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `must be >= ${bounds.min}`,
        });
        return z.NEVER;
      }
      if (bounds.max !== undefined && n > bounds.max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `must be <= ${bounds.max}`,
        });
        return z.NEVER;
      }
      return n;
    });
}

const NON_NEGATIVE = { min: 0 };
const RATING = { min: 0, max: 5 };

export const rideCellsSchema = z
  .object({
    date: requiredText().regex(DATE, "must be YYYY-MM-DD"),
    time: requiredText().regex(TIME, "must be HH:MM:SS"),
    bookingId: requiredText(),
    bookingStatus: requiredText(),
    customerId: requiredText(),
    vehicleType: requiredText(),
    pickupLocation: requiredText(),
    dropLocation: requiredText(),
    avgVtat: optionalNumber(NON_NEGATIVE),
    avgCtat: optionalNumber(NON_NEGATIVE),
    cancelledRidesByCustomer: optionalNumber(NON_NEGATIVE),
    reasonForCancellingByCustomer: optionalText(),
    cancelledRidesByDriver: optionalNumber(NON_NEGATIVE),
    driverCancellationReason: optionalText(),
    incompleteRides: optionalNumber(NON_NEGATIVE),
    incompleteRidesReason: optionalText(),
    bookingValue: optionalNumber(NON_NEGATIVE),
    rideDistance: optionalNumber(NON_NEGATIVE),
    driverRatings: optionalNumber(RATING),
    customerRating: optionalNumber(RATING),
    paymentMethod: optionalText(),
  })
  .superRefine((row, ctx) => {
    // Shape errors are already reported by the field rules
    if (!DATE.test(row.date) || !TIME.test(row.time)) return;
    if (!isCalendarDateTime(row.date, row.time)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["date"],
        message: `is not a valid datetime: ${row.date} ${row.time}`,
      });
    }
  })
  .transform(
    (row): Omit<RideRecord, "line"> => ({
      ...row,
      bookedAt: `${row.date}T${row.time}`,
    })
  );

function isCalendarDateTime(date: string, time: string): boolean {
  const [y, m, d] = date.split("-").map(Number);
  const [hh, mm, ss] = time.split(":").map(Number);
  const ts = Date.UTC(y, m - 1, d, hh, mm, ss);
  const parsed = new Date(ts);
  return (
    parsed.getUTCFullYear() === y &&
    parsed.getUTCMonth() === m - 1 &&
    parsed.getUTCDate() === d &&
    parsed.getUTCHours() === hh &&
    parsed.getUTCMinutes() === mm &&
    parsed.getUTCSeconds() === ss
  );
}

const HEADER_BY_KEY = new Map<string, string>(
  RIDE_COLUMNS.map(column => [column.key, column.header])
);

/**
 * Renders zod issues with the export's column names.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const key = issue.path[0];
      const column =
        typeof key === "string" ? HEADER_BY_KEY.get(key) ?? key : "row";
      return `${column}: ${issue.message}`;
    })
    .join("; ");
}
