// Itinerary document schemas
// Model output is validated against these; unknown keys are kept

import { z } from 'zod';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const TripRequestSchema = z.object({
  source: z.string().trim().min(1, 'Source is required'),
  destination: z.string().trim().min(1, 'Destination is required'),
  start_date: z.string().regex(DATE_PATTERN, 'Dates must be YYYY-MM-DD'),
  return_date: z.string().regex(DATE_PATTERN, 'Dates must be YYYY-MM-DD'),
  budget: z.coerce.number().positive('Budget must be a positive amount in INR'),
  interests: z.array(z.string().trim().min(1)).default([]),
  transport_mode: z.string().trim().optional(),
  language: z.string().trim().min(1).default('English'),
  additional_reqs: z.string().trim().max(2000).optional(),
}).refine(req => req.return_date >= req.start_date, {
  message: 'Return date must not be before the start date',
  path: ['return_date'],
});

export const ActivitySchema = z.object({
  time: z.string(),
  description: z.string(),
  location_name: z.string(),
  latitude: z.number(),
  longitude: z.number(),
}).passthrough();

export const DayPlanSchema = z.object({
  day: z.number().int(),
  date: z.string(),
  theme: z.string(),
  activities: z.array(ActivitySchema),
}).passthrough();

// Categories vary by trip; only the total is required
export const CostBreakdownSchema = z.object({
  total_estimate_inr: z.number(),
}).catchall(z.number());

export const ItineraryDocumentSchema = z.object({
  plan: z.array(DayPlanSchema),
  cost_breakdown: CostBreakdownSchema,
}).passthrough();

export const ActivityListSchema = z.array(ActivitySchema);

export const PlannedTripSchema = z.object({
  request: TripRequestSchema,
  itinerary: ItineraryDocumentSchema,
  warnings: z.array(z.string()).default([]),
});

export type TripRequest = z.infer<typeof TripRequestSchema>;
export type Activity = z.infer<typeof ActivitySchema>;
export type DayPlan = z.infer<typeof DayPlanSchema>;
export type CostBreakdown = z.infer<typeof CostBreakdownSchema>;
export type ItineraryDocument = z.infer<typeof ItineraryDocumentSchema>;
export type PlannedTrip = z.infer<typeof PlannedTripSchema>;
