import { RIDE_COLUMNS, RideColumnKey } from "@src/ingestion/business/ride_schema";
import type { RideRecord } from "@src/ingestion/types/domain";

export const RIDE_HEADER = RIDE_COLUMNS.map(column => column.header).join(",");

const BASE_CELLS: Record<RideColumnKey, string> = {
  date: "2024-03-23",
  time: "08:15:00",
  bookingId: "CNR0000001",
  bookingStatus: "Completed",
  customerId: "CID000001",
  vehicleType: "Auto",
  pickupLocation: "Old Town",
  dropLocation: "Harbor View",
  avgVtat: "4.9",
  avgCtat: "14.0",
  cancelledRidesByCustomer: "null",
  reasonForCancellingByCustomer: "null",
  cancelledRidesByDriver: "null",
  driverCancellationReason: "null",
  incompleteRides: "null",
  incompleteRidesReason: "null",
  bookingValue: "245",
  rideDistance: "10.5",
  driverRatings: "4.5",
  customerRating: "4.8",
  paymentMethod: "UPI",
};

/** One CSV data line in header order. */
export function rideLine(overrides: Partial<Record<RideColumnKey, string>> = {}): string {
  const cells = { ...BASE_CELLS, ...overrides };
  return RIDE_COLUMNS.map(column => cells[column.key]).join(",");
}

export function rideCsv(lines: string[]): string {
  return [RIDE_HEADER, ...lines].join("\n") + "\n";
}

/** The record `rideLine()` parses to when it sits on `line`. */
export function rideRecord(overrides: Partial<RideRecord> = {}): RideRecord {
  return {
    line: 2,
    bookedAt: "2024-03-23T08:15:00",
    date: "2024-03-23",
    time: "08:15:00",
    bookingId: "CNR0000001",
    bookingStatus: "Completed",
    customerId: "CID000001",
    vehicleType: "Auto",
    pickupLocation: "Old Town",
    dropLocation: "Harbor View",
    avgVtat: 4.9,
    avgCtat: 14,
    cancelledRidesByCustomer: null,
    reasonForCancellingByCustomer: null,
    cancelledRidesByDriver: null,
    driverCancellationReason: null,
    incompleteRides: null,
    incompleteRidesReason: null,
    bookingValue: 245,
    rideDistance: 10.5,
    driverRatings: 4.5,
    customerRating: 4.8,
    paymentMethod: "UPI",
    ...overrides,
  };
}
