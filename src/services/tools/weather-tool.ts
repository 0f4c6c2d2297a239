// Weather Tool
// Current conditions for a city from OpenWeatherMap.
// Failures come back as { error } so the model can plan without weather.

import { z } from 'zod';
import type { ToolDefinition, ToolArguments } from './types.js';
import { moduleLogger, type Logger } from '../../logger.js';

export const WEATHER_TOOL_NAME = 'get_todays_weather';

const WEATHER_URL = 'https://api.openweathermap.org/data/2.5/weather';
const WEATHER_TIMEOUT_MS = 10_000;

const WeatherPayloadSchema = z.object({
  weather: z.array(z.object({
    main: z.string().optional(),
    description: z.string().optional(),
  })).optional(),
  main: z.object({
    temp: z.number().optional(),
  }).optional(),
});

export interface WeatherReport {
  condition: string;
  description: string;
  temperature_celsius: number;
}

export interface WeatherFailure {
  error: string;
}

export type WeatherResult = WeatherReport | WeatherFailure;

export interface WeatherOptions {
  apiKey: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

export async function lookupTodaysWeather(destination: string, options: WeatherOptions): Promise<WeatherResult> {
  const log = options.logger ?? moduleLogger('weather-tool');
  const fetchFn = options.fetch ?? fetch;

  const degrade = (error: string, err?: unknown): WeatherFailure => {
    log.warn({ destination, err, reason: error }, 'Weather lookup degraded');
    return { error };
  };

  if (!options.apiKey) {
    return degrade('Weather service is not configured.');
  }

  const url = new URL(WEATHER_URL);
  url.searchParams.set('q', destination);
  url.searchParams.set('appid', options.apiKey);
  url.searchParams.set('units', 'metric');

  try {
    const response = await fetchFn(url.toString(), {
      signal: AbortSignal.timeout(WEATHER_TIMEOUT_MS),
    });
    if (!response.ok) {
      return degrade(`Could not retrieve weather: ${response.status}`);
    }

    const parsed = WeatherPayloadSchema.safeParse(await response.json());
    if (!parsed.success) {
      return degrade('Could not retrieve weather: unexpected response format');
    }

    const current = parsed.data.weather?.[0];
    const report: WeatherReport = {
      condition: current?.main ?? 'Unknown',
      description: `Current condition is ${current?.description ?? 'No description'}`,
      temperature_celsius: parsed.data.main?.temp ?? 0,
    };
    log.info({ destination, report }, 'Weather resolved');
    return report;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return degrade(`Could not retrieve weather: ${message}`, err);
  }
}

export function createWeatherTool(options: WeatherOptions): ToolDefinition {
  return {
    name: WEATHER_TOOL_NAME,
    description: 'Gets the current weather forecast for a specific city in India. Use this to make real-time adjustments to a travel plan.',
    parameters: [
      {
        name: 'destination',
        type: 'string',
        description: "The city name, e.g., 'Mumbai'.",
        required: true,
      },
    ],
    execute: async (args: ToolArguments) => {
      const destination = typeof args.destination === 'string' ? args.destination.trim() : '';
      const result = await lookupTodaysWeather(destination, options);
      return { ...result };
    },
  };
}
