import { afterAll, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import RedisMock from 'ioredis-mock';
import { RedisTripStore } from '../redis-store.js';
import { samplePlannedTrip } from '../../../__tests__/support/fixtures.js';

describe('RedisTripStore', () => {
  const redis = new RedisMock();
  const store = new RedisTripStore(redis);

  const newTrip = (userId: string, destination = 'Jaipur') => ({
    user_id: userId,
    source: 'Delhi',
    destination,
    itinerary_content: samplePlannedTrip(),
  });

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-02-01T10:00:00Z'));
    await redis.flushall();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  afterAll(async () => {
    await store.close();
  });

  it('stores and reads back a trip', async () => {
    const created = await store.createTrip(newTrip('user-asha'));

    expect(created.status).toBe('planned');
    expect(created.created_at).toBe('2026-02-01T10:00:00.000Z');
    await expect(store.getTrip(created.id)).resolves.toEqual(created);
    await expect(store.getTrip('missing')).resolves.toBeNull();
  });

  it('lists a user\'s trips newest first', async () => {
    const first = await store.createTrip(newTrip('user-asha', 'Jaipur'));
    vi.setSystemTime(new Date('2026-02-02T10:00:00Z'));
    const second = await store.createTrip(newTrip('user-asha', 'Goa'));
    await store.createTrip(newTrip('user-ravi', 'Kochi'));

    const trips = await store.listTripsByUser('user-asha');

    expect(trips.map(trip => trip.id)).toEqual([second.id, first.id]);
  });

  it('updates the trip status', async () => {
    const created = await store.createTrip(newTrip('user-asha'));

    const updated = await store.updateTripStatus(created.id, 'booked');

    expect(updated?.status).toBe('booked');
    expect((await store.getTrip(created.id))?.status).toBe('booked');
    await expect(store.updateTripStatus('missing', 'booked')).resolves.toBeNull();
  });

  it('ignores documents that fail validation', async () => {
    await redis.set('trip:broken', JSON.stringify({ id: 'broken' }));
    await redis.set('trip:garbled', '{not json');

    await expect(store.getTrip('broken')).resolves.toBeNull();
    await expect(store.getTrip('garbled')).resolves.toBeNull();
  });

  it('counts share views', async () => {
    const share = await store.createShare({
      original_trip_id: 'trip-1',
      created_by: 'user-asha',
      creator_name: 'Asha',
    });

    expect(share.view_count).toBe(0);
    expect(share.is_public).toBe(true);
    await expect(store.incrementShareViews(share.share_id)).resolves.toBe(1);
    await expect(store.incrementShareViews(share.share_id)).resolves.toBe(2);
    expect((await store.getShare(share.share_id))?.view_count).toBe(2);
  });

  it('lists and deletes a user\'s shares', async () => {
    const share = await store.createShare({
      original_trip_id: 'trip-1',
      created_by: 'user-asha',
      creator_name: 'Asha',
    });

    expect((await store.listSharesByUser('user-asha')).map(s => s.share_id)).toEqual([share.share_id]);
    await expect(store.deleteShare(share.share_id)).resolves.toBe(true);
    await expect(store.getShare(share.share_id)).resolves.toBeNull();
    await expect(store.listSharesByUser('user-asha')).resolves.toEqual([]);
    await expect(store.deleteShare(share.share_id)).resolves.toBe(false);
  });
});
