// Saved trip routes: save, list, view, book, export and share
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { requireUser } from '../security/route-guards.js';
import type { IdentityVerifier } from '../services/auth/identity.js';
import { PlannedTripSchema } from '../services/planner/index.js';
import { createBookingConfirmation, creatorDisplayName, type TripRecord, type TripStore } from '../services/trips/index.js';
import { pdfContentDisposition, renderQrDataUrl, renderTripPdf } from '../services/export/index.js';
import { AppError, invalidBody, sendError } from '../utils/errors.js';

const SaveTripSchema = z.object({
  source: z.string().trim().min(1),
  destination: z.string().trim().min(1),
  itinerary_content: PlannedTripSchema,
});

export interface TripRouteOptions {
  store: TripStore;
  verifier: IdentityVerifier;
  publicBaseUrl: string;
}

async function loadOwnedTrip(store: TripStore, tripId: string, userId: string): Promise<TripRecord> {
  const trip = await store.getTrip(tripId);
  if (!trip) {
    throw AppError.notFound('Trip not found');
  }
  if (trip.user_id !== userId) {
    throw AppError.forbidden('You are not authorized to access this trip');
  }
  return trip;
}

export async function tripRoutes(server: FastifyInstance, options: TripRouteOptions) {
  const { store, verifier, publicBaseUrl } = options;

  // POST /v1/trips - Save a planned trip
  server.post('/trips', async (request, reply) => {
    const user = await requireUser(request, reply, verifier);
    if (!user) return reply;

    const parsed = SaveTripSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendError(reply, invalidBody(parsed.error));
    }

    try {
      const trip = await store.createTrip({ user_id: user.uid, ...parsed.data });
      return reply.code(201).send({ status: 'success', trip_id: trip.id });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // GET /v1/trips - List the caller's trips, newest first
  server.get('/trips', async (request, reply) => {
    const user = await requireUser(request, reply, verifier);
    if (!user) return reply;

    try {
      const trips = await store.listTripsByUser(user.uid);
      return { trips };
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // GET /v1/trips/:id - Trip details
  server.get<{ Params: { id: string } }>('/trips/:id', async (request, reply) => {
    const user = await requireUser(request, reply, verifier);
    if (!user) return reply;

    try {
      const trip = await loadOwnedTrip(store, request.params.id, user.uid);
      return { trip, today: new Date().toISOString().slice(0, 10) };
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // POST /v1/trips/:id/book - Mark the trip booked and issue a confirmation
  server.post<{ Params: { id: string } }>('/trips/:id/book', async (request, reply) => {
    const user = await requireUser(request, reply, verifier);
    if (!user) return reply;

    try {
      const trip = await loadOwnedTrip(store, request.params.id, user.uid);
      const booked = await store.updateTripStatus(trip.id, 'booked');
      if (!booked) {
        throw AppError.notFound('Trip not found');
      }
      const confirmation = createBookingConfirmation(booked);
      request.log.info({ tripId: trip.id, bookingId: confirmation.booking_id }, 'Trip booked');
      return confirmation;
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // GET /v1/trips/:id/export - Download the itinerary as a PDF
  server.get<{ Params: { id: string } }>('/trips/:id/export', async (request, reply) => {
    const user = await requireUser(request, reply, verifier);
    if (!user) return reply;

    try {
      const trip = await loadOwnedTrip(store, request.params.id, user.uid);
      const pdf = await renderTripPdf(trip.itinerary_content);
      return reply
        .header('Content-Type', 'application/pdf')
        .header('Content-Disposition', pdfContentDisposition(trip.destination))
        .send(pdf);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // POST /v1/trips/:id/share - Create a public share link with a QR code
  server.post<{ Params: { id: string } }>('/trips/:id/share', async (request, reply) => {
    const user = await requireUser(request, reply, verifier);
    if (!user) return reply;

    try {
      const trip = await loadOwnedTrip(store, request.params.id, user.uid);
      const share = await store.createShare({
        original_trip_id: trip.id,
        created_by: user.uid,
        creator_name: creatorDisplayName(user),
      });
      const shareUrl = `${publicBaseUrl}/shared/${share.share_id}`;
      return reply.code(201).send({
        share_id: share.share_id,
        share_url: shareUrl,
        qr_code: await renderQrDataUrl(shareUrl),
      });
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
