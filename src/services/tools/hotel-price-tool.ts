// Hotel Price Tool
// Average nightly hotel price for a city via the Booking.com RapidAPI endpoints.
// Pricing is only a planning hint: every failure degrades to the default price.

import { z } from 'zod';
import type { ToolDefinition, ToolArguments } from './types.js';
import { TTLCache } from '../../utils/ttl-cache.js';
import { moduleLogger, type Logger } from '../../logger.js';

export const HOTEL_PRICE_TOOL_NAME = 'get_average_hotel_price';

const RAPIDAPI_HOST = 'booking-com.p.rapidapi.com';
const LOCATIONS_URL = `https://${RAPIDAPI_HOST}/v1/hotels/locations`;
const SEARCH_URL = `https://${RAPIDAPI_HOST}/v2/hotels/search`;
const LOCATIONS_TIMEOUT_MS = 10_000;
const SEARCH_TIMEOUT_MS = 20_000;
const CHECKIN_OFFSET_DAYS = 60;
const SAMPLE_SIZE = 5;

const LocationSchema = z.object({
  dest_type: z.string().optional(),
  dest_id: z.union([z.string(), z.number()]).optional(),
});

const SearchPayloadSchema = z.object({
  results: z.array(z.unknown()).optional(),
});

const HotelSchema = z.object({
  priceBreakdown: z.object({
    grossPrice: z.object({
      value: z.union([z.number(), z.string()]).nullish(),
    }).nullish(),
  }).nullish(),
});

export interface HotelPriceOptions {
  apiKey: string;
  defaultPrice: number;
  fetch?: typeof fetch;
  today?: () => Date;
  cache?: TTLCache<string, number>;
  logger?: Logger;
}

function addDays(base: Date, days: number): string {
  const date = new Date(base.getTime());
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

async function resolveCityId(
  destination: string,
  headers: Record<string, string>,
  fetchFn: typeof fetch,
): Promise<string | null> {
  const url = new URL(LOCATIONS_URL);
  url.searchParams.set('name', destination);
  url.searchParams.set('locale', 'en-gb');

  const response = await fetchFn(url.toString(), {
    headers,
    signal: AbortSignal.timeout(LOCATIONS_TIMEOUT_MS),
  });
  if (!response.ok) {
    throw new Error(`locations lookup failed (${response.status})`);
  }

  const payload: unknown = await response.json();
  const locations = Array.isArray(payload) ? payload : [];
  for (const entry of locations) {
    const parsed = LocationSchema.safeParse(entry);
    if (parsed.success && parsed.data.dest_type === 'city' && parsed.data.dest_id !== undefined) {
      return String(parsed.data.dest_id);
    }
  }
  return null;
}

async function searchGrossPrices(
  destId: string,
  headers: Record<string, string>,
  fetchFn: typeof fetch,
  today: Date,
): Promise<number[]> {
  const url = new URL(SEARCH_URL);
  const params: Record<string, string> = {
    order_by: 'popularity',
    adults_number: '1',
    units: 'metric',
    room_number: '1',
    checkout_date: addDays(today, CHECKIN_OFFSET_DAYS + 1),
    checkin_date: addDays(today, CHECKIN_OFFSET_DAYS),
    filter_by_currency: 'INR',
    dest_type: 'city',
    locale: 'en-gb',
    dest_id: destId,
  };
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }

  const response = await fetchFn(url.toString(), {
    headers,
    signal: AbortSignal.timeout(SEARCH_TIMEOUT_MS),
  });
  if (!response.ok) {
    throw new Error(`hotel search failed (${response.status})`);
  }

  const payload = SearchPayloadSchema.safeParse(await response.json());
  if (!payload.success) return [];

  const prices: number[] = [];
  for (const hotel of (payload.data.results ?? []).slice(0, SAMPLE_SIZE)) {
    const parsed = HotelSchema.safeParse(hotel);
    const raw = parsed.success ? parsed.data.priceBreakdown?.grossPrice?.value : undefined;
    if (raw === undefined || raw === null) continue;
    const value = Number(raw);
    if (Number.isFinite(value)) prices.push(value);
  }
  return prices;
}

/**
 * Resolves the destination to a Booking.com city id, then averages the gross
 * price of the first few popular hotels for a one-night stay two months out.
 * Returns `defaultPrice` on any failure; never rejects.
 */
export async function lookupAverageHotelPrice(destination: string, options: HotelPriceOptions): Promise<number> {
  const log = options.logger ?? moduleLogger('hotel-price-tool');
  const fetchFn = options.fetch ?? fetch;
  const city = destination.trim();

  const degrade = (reason: string, err?: unknown): number => {
    log.warn({ destination: city, reason, err, fallback: options.defaultPrice }, 'Hotel price lookup degraded');
    return options.defaultPrice;
  };

  if (!options.apiKey) {
    log.info('RAPIDAPI_KEY not set, using default hotel price');
    return options.defaultPrice;
  }
  if (!city) return degrade('empty destination');

  const cacheKey = city.toLowerCase();
  const cached = options.cache?.get(cacheKey);
  if (cached !== undefined) return cached;

  const headers = {
    'X-RapidAPI-Key': options.apiKey,
    'X-RapidAPI-Host': RAPIDAPI_HOST,
  };

  let destId: string | null;
  try {
    destId = await resolveCityId(city, headers, fetchFn);
  } catch (err) {
    return degrade('destination id lookup failed', err);
  }
  if (!destId) return degrade('no city match');

  let prices: number[];
  try {
    prices = await searchGrossPrices(destId, headers, fetchFn, options.today?.() ?? new Date());
  } catch (err) {
    return degrade('hotel search failed', err);
  }
  if (prices.length === 0) return degrade('no prices in search results');

  const average = prices.reduce((sum, price) => sum + price, 0) / prices.length;
  log.info({ destination: city, average, sampled: prices.length }, 'Average hotel price resolved');
  options.cache?.set(cacheKey, average);
  return average;
}

export function createHotelPriceTool(options: HotelPriceOptions): ToolDefinition {
  return {
    name: HOTEL_PRICE_TOOL_NAME,
    description: 'Gets the average hotel price per night for a given Indian city to help create a realistic budget.',
    parameters: [
      {
        name: 'destination',
        type: 'string',
        description: 'The city in India for which to find the hotel price.',
        required: true,
      },
    ],
    execute: async (args: ToolArguments) => {
      const destination = typeof args.destination === 'string' ? args.destination : '';
      const price = await lookupAverageHotelPrice(destination, options);
      return { price };
    },
  };
}
