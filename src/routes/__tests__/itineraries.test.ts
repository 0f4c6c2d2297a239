import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../server.js';
import { AppError } from '../../utils/errors.js';
import { MemoryTripStore } from '../../__tests__/support/memory-trip-store.js';
import { sampleItinerary, samplePlannedTrip, sampleRequest, stubVerifier } from '../../__tests__/support/fixtures.js';

describe('Itinerary routes', () => {
  const planner = {
    planTrip: vi.fn(),
    regenerate: vi.fn(),
    adjustForWeather: vi.fn(),
  };
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildServer({ planner, store: new MemoryTripStore(), verifier: stubVerifier });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    planner.planTrip.mockReset();
    planner.regenerate.mockReset();
    planner.adjustForWeather.mockReset();
  });

  it('plans a trip', async () => {
    const planned = samplePlannedTrip();
    planner.planTrip.mockResolvedValueOnce(planned);

    const response = await app.inject({
      method: 'POST',
      url: '/v1/itineraries',
      payload: { ...sampleRequest, budget: '20000' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual(planned);
    expect(planner.planTrip).toHaveBeenCalledWith(sampleRequest);
  });

  it('rejects an invalid trip request', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/itineraries',
      payload: { ...sampleRequest, budget: -5 },
    });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.error).toBe('validation_error');
    expect(body.details).toEqual([{ path: 'budget', message: 'Budget must be a positive amount in INR' }]);
    expect(planner.planTrip).not.toHaveBeenCalled();
  });

  it('rejects a return date before the start date', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/itineraries',
      payload: { ...sampleRequest, return_date: '2026-11-19' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().details).toEqual([
      { path: 'return_date', message: 'Return date must not be before the start date' },
    ]);
  });

  it('reports a busy model service', async () => {
    planner.planTrip.mockRejectedValueOnce(AppError.serviceBusy());

    const response = await app.inject({ method: 'POST', url: '/v1/itineraries', payload: sampleRequest });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({
      error: 'service_busy',
      message: 'Our AI service is currently busy. Please try again in a few minutes.',
      statusCode: 503,
    });
  });

  it('never leaks unexpected error text', async () => {
    planner.planTrip.mockRejectedValueOnce(new Error('connection string postgres://internal'));

    const response = await app.inject({ method: 'POST', url: '/v1/itineraries', payload: sampleRequest });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      error: 'internal_error',
      message: 'An unexpected error occurred',
      statusCode: 500,
    });
  });

  it('regenerates an itinerary', async () => {
    const original = samplePlannedTrip();
    const revised = { ...original, itinerary: sampleItinerary(12000) };
    planner.regenerate.mockResolvedValueOnce(revised);

    const response = await app.inject({
      method: 'POST',
      url: '/v1/itineraries/regenerate',
      payload: { original, change_request: 'More street food' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual(revised);
    expect(planner.regenerate).toHaveBeenCalledWith(original, 'More street food');
  });

  it('requires a change request to regenerate', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/itineraries/regenerate',
      payload: { original: samplePlannedTrip(), change_request: '   ' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().details).toEqual([
      { path: 'change_request', message: 'Please enter your requested changes before regenerating.' },
    ]);
  });

  it('adjusts activities for the weather', async () => {
    const activities = sampleItinerary().plan[0].activities;
    const adjusted = [{ ...activities[0], description: 'City Palace museum' }];
    planner.adjustForWeather.mockResolvedValueOnce(adjusted);

    const response = await app.inject({
      method: 'POST',
      url: '/v1/itineraries/adjust-for-weather',
      payload: { destination: 'Jaipur', activities },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual(adjusted);
    expect(planner.adjustForWeather).toHaveBeenCalledWith('Jaipur', activities);
  });
});
