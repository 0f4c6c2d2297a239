import { describe, it, expect, vi } from 'vitest';
import { createWeatherTool, lookupTodaysWeather } from '../weather-tool.js';
import { logger } from '../../../logger.js';

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('Weather lookup', () => {
  it('reports the current condition in metric units', async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValueOnce(jsonResponse({
      weather: [{ main: 'Rain', description: 'light rain' }],
      main: { temp: 27.4 },
    }));

    const result = await lookupTodaysWeather('Mumbai', { apiKey: 'test-secret', fetch: fetchMock, logger });

    expect(result).toEqual({
      condition: 'Rain',
      description: 'Current condition is light rain',
      temperature_celsius: 27.4,
    });
    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.searchParams.get('q')).toBe('Mumbai');
    expect(url.searchParams.get('units')).toBe('metric');
  });

  it('fills in missing fields', async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValueOnce(jsonResponse({ weather: [] }));

    const result = await lookupTodaysWeather('Pune', { apiKey: 'test-secret', fetch: fetchMock, logger });

    expect(result).toEqual({
      condition: 'Unknown',
      description: 'Current condition is No description',
      temperature_celsius: 0,
    });
  });

  it('returns an error payload when not configured', async () => {
    const fetchMock = vi.fn<FetchFn>();

    const result = await lookupTodaysWeather('Pune', { apiKey: '', fetch: fetchMock, logger });

    expect(result).toEqual({ error: 'Weather service is not configured.' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('returns an error payload on HTTP failure', async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValueOnce(jsonResponse({ message: 'city not found' }, 404));

    const result = await lookupTodaysWeather('Atlantis', { apiKey: 'test-secret', fetch: fetchMock, logger });

    expect(result).toEqual({ error: 'Could not retrieve weather: 404' });
  });

  it('returns an error payload when the request throws', async () => {
    const fetchMock = vi.fn<FetchFn>().mockRejectedValueOnce(new Error('socket hang up'));

    const result = await lookupTodaysWeather('Goa', { apiKey: 'test-secret', fetch: fetchMock, logger });

    expect(result).toEqual({ error: 'Could not retrieve weather: socket hang up' });
  });

  it('exposes the lookup as a tool', async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValueOnce(jsonResponse({
      weather: [{ main: 'Clear', description: 'clear sky' }],
      main: { temp: 31 },
    }));
    const tool = createWeatherTool({ apiKey: 'test-secret', fetch: fetchMock, logger });

    expect(tool.name).toBe('get_todays_weather');
    expect(tool.parameters.map(p => p.name)).toEqual(['destination']);
    await expect(tool.execute({ destination: 'Goa' })).resolves.toEqual({
      condition: 'Clear',
      description: 'Current condition is clear sky',
      temperature_celsius: 31,
    });
  });
});
