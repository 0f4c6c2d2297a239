// Share link routes: analytics, removal and the public shared view
import type { FastifyInstance } from 'fastify';
import { requireUser } from '../security/route-guards.js';
import type { IdentityVerifier } from '../services/auth/identity.js';
import type { TripStore } from '../services/trips/types.js';
import { AppError, sendError } from '../utils/errors.js';

export interface ShareRouteOptions {
  store: TripStore;
  verifier: IdentityVerifier;
}

export async function shareRoutes(server: FastifyInstance, options: ShareRouteOptions) {
  const { store, verifier } = options;

  // GET /v1/shares - View counts for the caller's share links
  server.get('/shares', async (request, reply) => {
    const user = await requireUser(request, reply, verifier);
    if (!user) return reply;

    try {
      const shares = await store.listSharesByUser(user.uid);
      return shares.map(share => ({
        share_id: share.share_id,
        view_count: share.view_count,
        created_at: share.created_at,
      }));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // DELETE /v1/shares/:shareId - Revoke a share link
  server.delete<{ Params: { shareId: string } }>('/shares/:shareId', async (request, reply) => {
    const user = await requireUser(request, reply, verifier);
    if (!user) return reply;

    try {
      const share = await store.getShare(request.params.shareId);
      if (!share) {
        throw AppError.notFound('Share link not found');
      }
      if (share.created_by !== user.uid) {
        throw AppError.forbidden('You are not authorized to delete this share link');
      }
      await store.deleteShare(share.share_id);
      return { status: 'deleted' };
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // GET /v1/shared/:shareId - Public view of a shared trip
  server.get<{ Params: { shareId: string } }>('/shared/:shareId', async (request, reply) => {
    try {
      const share = await store.getShare(request.params.shareId);
      if (!share || !share.is_public) {
        throw AppError.notFound('Shared trip not found');
      }

      const trip = await store.getTrip(share.original_trip_id);
      if (!trip) {
        throw AppError.notFound('Shared trip not found');
      }

      const viewCount = await store.incrementShareViews(share.share_id);
      return {
        itinerary_data: trip.itinerary_content,
        share: { ...share, view_count: viewCount },
        creator_info: share.creator_name,
      };
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
