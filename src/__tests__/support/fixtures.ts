import type { ItineraryDocument, PlannedTrip, TripRequest } from '../../services/planner/itinerary.js';
import type { Identity, IdentityVerifier } from '../../services/auth/identity.js';
import { AppError } from '../../utils/errors.js';

export const sampleRequest: TripRequest = {
  source: 'Delhi',
  destination: 'Jaipur',
  start_date: '2026-11-20',
  return_date: '2026-11-21',
  budget: 20000,
  interests: ['heritage'],
  language: 'English',
};

export function sampleItinerary(total = 15000): ItineraryDocument {
  return {
    plan: [
      {
        day: 1,
        date: '2026-11-20',
        theme: 'Forts and bazaars',
        activities: [
          {
            time: '09:00',
            description: 'Amber Fort tour',
            location_name: 'Amber Fort',
            latitude: 26.9855,
            longitude: 75.8513,
          },
        ],
      },
    ],
    cost_breakdown: {
      accommodation_estimate_inr: 7000,
      transport_estimate_inr: 3000,
      activities_estimate_inr: 2000,
      food_estimate_inr: 3000,
      total_estimate_inr: total,
    },
  };
}

export function samplePlannedTrip(): PlannedTrip {
  return { request: sampleRequest, itinerary: sampleItinerary(), warnings: [] };
}

/** Accepts the listed placeholder tokens and nothing else. */
export class StubIdentityVerifier implements IdentityVerifier {
  constructor(private readonly identities: Record<string, Identity>) {}

  async verify(token: string): Promise<Identity> {
    const identity = this.identities[token];
    if (!identity) throw AppError.invalidToken('Invalid or expired token');
    return identity;
  }
}

export const TOKENS = {
  asha: 'token-asha',
  ravi: 'token-ravi',
};

export const stubVerifier = new StubIdentityVerifier({
  [TOKENS.asha]: { uid: 'user-asha', name: 'Asha' },
  [TOKENS.ravi]: { uid: 'user-ravi', email: 'ravi@example.com' },
});

export function bearer(token: string): Record<string, string> {
  return { authorization: `Bearer ${token}` };
}
