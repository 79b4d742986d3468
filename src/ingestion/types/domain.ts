/**
 * Domain types for the ride bookings ingestion hand-off.
 */

/**
 * One storage finalize notification. `eventId` may repeat across redeliveries.
 */
export interface IngestionEvent {
  bucket: string;
  objectName: string;
  eventId: string;
  sizeBytes: number;
}

export type TimeOfDay = "morning" | "afternoon" | "evening" | "night";

/**
 * A parsed and validated ride booking row.
 */
export interface RideRecord {
  line: number;
  bookedAt: string; // YYYY-MM-DDTHH:MM:SS, no zone
  date: string;
  time: string;
  bookingId: string;
  bookingStatus: string;
  customerId: string;
  vehicleType: string;
  pickupLocation: string;
  dropLocation: string;
  avgVtat: number | null;
  avgCtat: number | null;
  cancelledRidesByCustomer: number | null;
  reasonForCancellingByCustomer: string | null;
  cancelledRidesByDriver: number | null;
  driverCancellationReason: string | null;
  incompleteRides: number | null;
  incompleteRidesReason: string | null;
  bookingValue: number | null;
  rideDistance: number | null;
  driverRatings: number | null;
  customerRating: number | null;
  paymentMethod: string | null;
}

/**
 * Analytical columns derived from a RideRecord.
 */
export interface RideFeatures {
  hour: number;
  day: number;
  month: number;
  weekday: number; // Monday=0, Sunday=6
  isWeekend: boolean;
  timeOfDay: TimeOfDay;
  cancelledByDriver: boolean;
  cancelledByCustomer: boolean;
  incomplete: boolean;
  driverRatingsMissing: boolean;
  customerRatingMissing: boolean;
  bookingValueMissing: boolean;
  paymentMethodMissing: boolean;
}

export type WarehouseRow = RideRecord & RideFeatures;

export type RejectionKind = "ParseError" | "SchemaViolation";

export interface RejectedRecord {
  line: number;
  kind: RejectionKind;
  reason: string;
  raw: string;
}

export type LoadStatus = "Success" | "PartialSuccess" | "Retryable" | "Permanent";

export type IngestionErrorCode =
  | "MisroutedEvent"
  | "ObjectNotFound"
  | "MalformedObject"
  | "SchemaViolation"
  | "SizeLimitExceeded"
  | "WarehouseUnavailable"
  | "StorageUnavailable"
  | "QuotaExceeded"
  | "BatchInFlight"
  | "DeadlineExceeded"
  | "Unexpected";

export interface LoadError {
  code: IngestionErrorCode;
  message: string;
}

export interface DeadLetterOutcome {
  quarantinedKey?: string;
  reportKey?: string;
  error?: string;
}

export interface LoadResult {
  status: LoadStatus;
  objectName: string;
  batchId?: string;
  rowsLoaded: number;
  rowsRejected: number;
  /** True when the batch had already been committed by an earlier delivery. */
  duplicate: boolean;
  rejected: RejectedRecord[];
  error?: LoadError;
  deadLetter?: DeadLetterOutcome;
  summary: string;
}

export type InsertOutcome = "inserted" | "conflict-ignored";

export type BatchStatus = "PENDING" | "COMMITTED";

export interface BatchSummary {
  batchId: string;
  objectName: string;
  rowCount: number;
  status: BatchStatus;
  createdAt: string;
  committedAt?: string;
}
