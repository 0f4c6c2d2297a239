import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../server.js';
import { MemoryTripStore } from '../../__tests__/support/memory-trip-store.js';
import { TOKENS, bearer, samplePlannedTrip, stubVerifier } from '../../__tests__/support/fixtures.js';

describe.sequential('Share routes', () => {
  const store = new MemoryTripStore();
  const planner = { planTrip: vi.fn(), regenerate: vi.fn(), adjustForWeather: vi.fn() };
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildServer({ planner, store, verifier: stubVerifier, publicBaseUrl: 'http://test.local' });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  async function shareTrip(): Promise<string> {
    const trip = await store.createTrip({
      user_id: 'user-ravi',
      source: 'Delhi',
      destination: 'Jaipur',
      itinerary_content: samplePlannedTrip(),
    });
    const response = await app.inject({ method: 'POST', url: `/v1/trips/${trip.id}/share`, headers: bearer(TOKENS.ravi) });
    expect(response.statusCode).toBe(201);
    return response.json().share_id;
  }

  it('shows a shared trip publicly and counts the view', async () => {
    const shareId = await shareTrip();

    const response = await app.inject({ method: 'GET', url: `/v1/shared/${shareId}` });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.itinerary_data).toEqual(samplePlannedTrip());
    expect(body.share.view_count).toBe(1);
    expect(body.creator_info).toBe('ravi');

    const again = await app.inject({ method: 'GET', url: `/v1/shared/${shareId}` });
    expect(again.json().share.view_count).toBe(2);
  });

  it('returns 404 for an unknown share', async () => {
    const response = await app.inject({ method: 'GET', url: '/v1/shared/missing' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'not_found', message: 'Shared trip not found', statusCode: 404 });
  });

  it('lists view counts for the caller\'s shares', async () => {
    const shareId = await shareTrip();
    await app.inject({ method: 'GET', url: `/v1/shared/${shareId}` });

    const response = await app.inject({ method: 'GET', url: '/v1/shares', headers: bearer(TOKENS.ravi) });

    expect(response.statusCode).toBe(200);
    const shares: Array<{ share_id: string; view_count: number; created_at: string }> = response.json();
    expect(shares[0]).toEqual({
      share_id: shareId,
      view_count: 1,
      created_at: store.shares.get(shareId)?.created_at,
    });

    const none = await app.inject({ method: 'GET', url: '/v1/shares', headers: bearer(TOKENS.asha) });
    expect(none.json()).toEqual([]);
  });

  it('lets only the creator delete a share', async () => {
    const shareId = await shareTrip();

    const denied = await app.inject({ method: 'DELETE', url: `/v1/shares/${shareId}`, headers: bearer(TOKENS.asha) });
    expect(denied.statusCode).toBe(403);

    const deleted = await app.inject({ method: 'DELETE', url: `/v1/shares/${shareId}`, headers: bearer(TOKENS.ravi) });
    expect(deleted.statusCode).toBe(200);
    expect(deleted.json()).toEqual({ status: 'deleted' });

    const gone = await app.inject({ method: 'GET', url: `/v1/shared/${shareId}` });
    expect(gone.statusCode).toBe(404);
  });
});
