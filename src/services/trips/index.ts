export { RedisTripStore } from './redis-store.js';
export { createBookingConfirmation, generateBookingId, creatorDisplayName } from './booking.js';
export type {
  TripStatus,
  TripRecord,
  NewTrip,
  ShareRecord,
  NewShare,
  BookingConfirmation,
  TripStore,
} from './types.js';
