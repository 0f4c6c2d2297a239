// Booking confirmations and share attribution
// Booking is a status change; no payment is taken

import crypto from 'crypto';
import type { Identity } from '../auth/identity.js';
import type { BookingConfirmation, TripRecord } from './types.js';

export const ANONYMOUS_CREATOR = 'Anonymous Traveler';

export function generateBookingId(randomInt: (min: number, max: number) => number = crypto.randomInt): string {
  return `ATP-${randomInt(100000, 1000000)}`;
}

export function createBookingConfirmation(
  trip: TripRecord,
  options: { now?: Date; bookingId?: string } = {},
): BookingConfirmation {
  const now = options.now ?? new Date();
  return {
    booking_id: options.bookingId ?? generateBookingId(),
    status: 'confirmed',
    trip_id: trip.id,
    trip_data: trip.itinerary_content,
    payment_method: 'Credit Card',
    booking_date: now.toISOString().slice(0, 10),
    total_amount: trip.itinerary_content.itinerary.cost_breakdown.total_estimate_inr,
  };
}

export function creatorDisplayName(identity: Identity): string {
  if (identity.name) return identity.name;
  const local = identity.email?.split('@')[0];
  return local || ANONYMOUS_CREATOR;
}
