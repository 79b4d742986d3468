import type {
  RideFeatures,
  RideRecord,
  TimeOfDay,
  WarehouseRow,
} from "../types/domain";

export function segmentTimeOfDay(hour: number): TimeOfDay {
  if (hour >= 6 && hour <= 11) return "morning";
  if (hour >= 12 && hour <= 16) return "afternoon";
  if (hour >= 17 && hour <= 22) return "evening";
  return "night";
}

/**
 * Derives the analytical columns stored next to each ride. The booking time
 * is a local wall-clock time, so calendar parts are read in UTC to avoid any
 * shift from the host's zone.
 */
export function deriveRideFeatures(record: RideRecord): RideFeatures {
  const at = new Date(`${record.bookedAt}Z`);
  const hour = at.getUTCHours();
  // getUTCDay: Sunday=0; shift so Monday=0
  const weekday = (at.getUTCDay() + 6) % 7;

  return {
    hour,
    day: at.getUTCDate(),
    month: at.getUTCMonth() + 1,
    weekday,
    isWeekend: weekday === 5 || weekday === 6,
    timeOfDay: segmentTimeOfDay(hour),
    cancelledByDriver: record.cancelledRidesByDriver !== null,
    cancelledByCustomer: record.cancelledRidesByCustomer !== null,
    incomplete: record.incompleteRides !== null,
    driverRatingsMissing: record.driverRatings === null,
    customerRatingMissing: record.customerRating === null,
    bookingValueMissing: record.bookingValue === null,
    paymentMethodMissing: record.paymentMethod === null,
  };
}

export function toWarehouseRow(record: RideRecord): WarehouseRow {
  return { ...record, ...deriveRideFeatures(record) };
}
