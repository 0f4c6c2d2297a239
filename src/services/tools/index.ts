// Tool System Initialization
// Builds the tool sets offered to the model for each planning flow

import { env } from '../../env.js';
import { moduleLogger } from '../../logger.js';
import { TTLCache } from '../../utils/ttl-cache.js';
import { ToolRegistry } from './registry.js';
import { createHotelPriceTool } from './hotel-price-tool.js';
import { createWeatherTool } from './weather-tool.js';
import type { ToolDefinition } from './types.js';

export { ToolRegistry, DuplicateToolError } from './registry.js';
export { HOTEL_PRICE_TOOL_NAME, lookupAverageHotelPrice } from './hotel-price-tool.js';
export { WEATHER_TOOL_NAME, lookupTodaysWeather } from './weather-tool.js';
export type {
  ToolDefinition,
  ToolDeclaration,
  ToolParameter,
  ToolArguments,
  ToolPayload,
  ToolCallRequest,
  ToolCallResult,
} from './types.js';

export interface TripTools {
  hotelPrice: ToolDefinition;
  weather: ToolDefinition;
}

export interface TripToolOptions {
  rapidApiKey?: string;
  openWeatherApiKey?: string;
  defaultHotelPrice?: number;
  hotelPriceCacheTtlMs?: number;
  fetch?: typeof fetch;
}

export function createTripTools(options: TripToolOptions = {}): TripTools {
  const log = moduleLogger('tools');
  const rapidApiKey = options.rapidApiKey ?? env.RAPIDAPI_KEY;
  const openWeatherApiKey = options.openWeatherApiKey ?? env.OPENWEATHER_API_KEY;

  if (!rapidApiKey) log.warn('RAPIDAPI_KEY not set, hotel prices fall back to defaults');
  if (!openWeatherApiKey) log.warn('OPENWEATHER_API_KEY not set, weather lookups will report an error');

  return {
    hotelPrice: createHotelPriceTool({
      apiKey: rapidApiKey,
      defaultPrice: options.defaultHotelPrice ?? env.DEFAULT_HOTEL_PRICE,
      cache: new TTLCache<string, number>({ ttlMs: options.hotelPriceCacheTtlMs ?? env.HOTEL_PRICE_CACHE_TTL_MS }),
      fetch: options.fetch,
    }),
    weather: createWeatherTool({
      apiKey: openWeatherApiKey,
      fetch: options.fetch,
    }),
  };
}

// Itinerary generation and regeneration may price hotels and check the weather
export function planningRegistry(tools: TripTools): ToolRegistry {
  return new ToolRegistry([tools.hotelPrice, tools.weather]);
}

// Weather adjustment only needs the forecast
export function weatherRegistry(tools: TripTools): ToolRegistry {
  return new ToolRegistry([tools.weather]);
}
