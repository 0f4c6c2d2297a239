// Itinerary generation routes
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { env } from '../env.js';
import { enforceRateLimitIfEnabled } from '../security/route-guards.js';
import {
  ActivitySchema,
  PlannedTripSchema,
  TripRequestSchema,
  type TripPlanner,
} from '../services/planner/index.js';
import { invalidBody, sendError } from '../utils/errors.js';

const RegenerateSchema = z.object({
  original: PlannedTripSchema,
  change_request: z.string().trim().min(1, 'Please enter your requested changes before regenerating.').max(2000),
});

const AdjustForWeatherSchema = z.object({
  destination: z.string().trim().min(1, 'Destination is required'),
  activities: z.array(ActivitySchema).min(1, 'At least one activity is required'),
});

export interface ItineraryRouteOptions {
  planner: Pick<TripPlanner, 'planTrip' | 'regenerate' | 'adjustForWeather'>;
}

export async function itineraryRoutes(server: FastifyInstance, options: ItineraryRouteOptions) {
  const { planner } = options;
  const rateLimit = { routeKey: 'itineraries', maxRequests: env.RATE_LIMIT_PLANS_PER_WINDOW };

  // POST /v1/itineraries - Plan a new trip
  server.post('/itineraries', async (request, reply) => {
    if (!enforceRateLimitIfEnabled(request, reply, rateLimit)) return reply;

    const parsed = TripRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendError(reply, invalidBody(parsed.error));
    }

    try {
      return await planner.planTrip(parsed.data);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // POST /v1/itineraries/regenerate - Rework an itinerary with the traveller's changes
  server.post('/itineraries/regenerate', async (request, reply) => {
    if (!enforceRateLimitIfEnabled(request, reply, rateLimit)) return reply;

    const parsed = RegenerateSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendError(reply, invalidBody(parsed.error));
    }

    try {
      return await planner.regenerate(parsed.data.original, parsed.data.change_request);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // POST /v1/itineraries/adjust-for-weather - Swap one day's activities for current conditions
  server.post('/itineraries/adjust-for-weather', async (request, reply) => {
    if (!enforceRateLimitIfEnabled(request, reply, rateLimit)) return reply;

    const parsed = AdjustForWeatherSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendError(reply, invalidBody(parsed.error));
    }

    try {
      return await planner.adjustForWeather(parsed.data.destination, parsed.data.activities);
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
