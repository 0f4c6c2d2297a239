// Redis-backed trip store
// Documents are JSON strings under trip:<id> and share:<id>; per-user sorted sets index them by creation time

import crypto from 'crypto';
import { Redis } from 'ioredis';
import { z } from 'zod';
import { PlannedTripSchema } from '../planner/itinerary.js';
import type {
  NewShare,
  NewTrip,
  ShareRecord,
  TripRecord,
  TripStatus,
  TripStore,
} from './types.js';

const TripRecordSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  source: z.string(),
  destination: z.string(),
  itinerary_content: PlannedTripSchema,
  status: z.enum(['planned', 'booked']),
  created_at: z.string(),
});

const StoredShareSchema = z.object({
  share_id: z.string(),
  original_trip_id: z.string(),
  created_by: z.string(),
  creator_name: z.string(),
  created_at: z.string(),
  is_public: z.boolean(),
});

const tripKey = (id: string) => `trip:${id}`;
const userTripsKey = (userId: string) => `user:${userId}:trips`;
const shareKey = (id: string) => `share:${id}`;
const shareViewsKey = (id: string) => `share:${id}:views`;
const userSharesKey = (userId: string) => `user:${userId}:shares`;

function parseStored<T>(raw: string | null, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  if (!raw) return null;
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export class RedisTripStore implements TripStore {
  constructor(private readonly redis: Redis) {}

  static fromUrl(url: string): RedisTripStore {
    return new RedisTripStore(new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 3 }));
  }

  async createTrip(trip: NewTrip): Promise<TripRecord> {
    const now = new Date();
    const record: TripRecord = {
      id: crypto.randomUUID(),
      ...trip,
      status: 'planned',
      created_at: now.toISOString(),
    };
    await this.redis
      .multi()
      .set(tripKey(record.id), JSON.stringify(record))
      .zadd(userTripsKey(record.user_id), now.getTime(), record.id)
      .exec();
    return record;
  }

  async getTrip(id: string): Promise<TripRecord | null> {
    return parseStored(await this.redis.get(tripKey(id)), TripRecordSchema);
  }

  async listTripsByUser(userId: string): Promise<TripRecord[]> {
    const ids = await this.redis.zrevrange(userTripsKey(userId), 0, -1);
    if (ids.length === 0) return [];
    const raws = await this.redis.mget(ids.map(tripKey));
    const trips: TripRecord[] = [];
    for (const raw of raws) {
      const trip = parseStored(raw, TripRecordSchema);
      if (trip) trips.push(trip);
    }
    return trips;
  }

  async updateTripStatus(id: string, status: TripStatus): Promise<TripRecord | null> {
    const trip = await this.getTrip(id);
    if (!trip) return null;
    const updated: TripRecord = { ...trip, status };
    await this.redis.set(tripKey(id), JSON.stringify(updated));
    return updated;
  }

  async createShare(share: NewShare): Promise<ShareRecord> {
    const now = new Date();
    const stored = {
      share_id: crypto.randomUUID(),
      ...share,
      created_at: now.toISOString(),
      is_public: true,
    };
    await this.redis
      .multi()
      .set(shareKey(stored.share_id), JSON.stringify(stored))
      .set(shareViewsKey(stored.share_id), '0')
      .zadd(userSharesKey(share.created_by), now.getTime(), stored.share_id)
      .exec();
    return { ...stored, view_count: 0 };
  }

  async getShare(shareId: string): Promise<ShareRecord | null> {
    const [raw, views] = await this.redis.mget(shareKey(shareId), shareViewsKey(shareId));
    const stored = parseStored(raw ?? null, StoredShareSchema);
    if (!stored) return null;
    return { ...stored, view_count: Number(views ?? 0) || 0 };
  }

  async incrementShareViews(shareId: string): Promise<number> {
    return this.redis.incr(shareViewsKey(shareId));
  }

  async listSharesByUser(userId: string): Promise<ShareRecord[]> {
    const ids = await this.redis.zrevrange(userSharesKey(userId), 0, -1);
    const shares: ShareRecord[] = [];
    for (const id of ids) {
      const share = await this.getShare(id);
      if (share) shares.push(share);
    }
    return shares;
  }

  async deleteShare(shareId: string): Promise<boolean> {
    const share = await this.getShare(shareId);
    if (!share) return false;
    await this.redis
      .multi()
      .del(shareKey(shareId), shareViewsKey(shareId))
      .zrem(userSharesKey(share.created_by), shareId)
      .exec();
    return true;
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
