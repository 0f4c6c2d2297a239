// Saved trips, share links and booking confirmations

import type { PlannedTrip } from '../planner/itinerary.js';

export type TripStatus = 'planned' | 'booked';

export interface TripRecord {
  id: string;
  user_id: string;
  source: string;
  destination: string;
  itinerary_content: PlannedTrip;
  status: TripStatus;
  created_at: string;
}

export interface NewTrip {
  user_id: string;
  source: string;
  destination: string;
  itinerary_content: PlannedTrip;
}

export interface ShareRecord {
  share_id: string;
  original_trip_id: string;
  created_by: string;
  creator_name: string;
  created_at: string;
  is_public: boolean;
  view_count: number;
}

export interface NewShare {
  original_trip_id: string;
  created_by: string;
  creator_name: string;
}

export interface BookingConfirmation {
  booking_id: string;
  status: 'confirmed';
  trip_id: string;
  trip_data: PlannedTrip;
  payment_method: string;
  booking_date: string;
  total_amount: number;
}

export interface TripStore {
  createTrip(trip: NewTrip): Promise<TripRecord>;
  getTrip(id: string): Promise<TripRecord | null>;
  listTripsByUser(userId: string): Promise<TripRecord[]>;
  updateTripStatus(id: string, status: TripStatus): Promise<TripRecord | null>;

  createShare(share: NewShare): Promise<ShareRecord>;
  getShare(shareId: string): Promise<ShareRecord | null>;
  incrementShareViews(shareId: string): Promise<number>;
  listSharesByUser(userId: string): Promise<ShareRecord[]>;
  deleteShare(shareId: string): Promise<boolean>;
}
