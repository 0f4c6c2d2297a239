import { afterEach, describe, expect, it, vi } from 'vitest';
import { MAX_TIMER_MS, parsePositiveInt } from '../env.js';

describe('Environment parsing', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    vi.resetModules();
  });

  it('parses positive integers and falls back on bad input', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(parsePositiveInt(undefined, 5, 'MAX_TOOL_CALLS')).toBe(5);
    expect(parsePositiveInt('7', 5, 'MAX_TOOL_CALLS')).toBe(7);
    expect(parsePositiveInt('-1', 5, 'MAX_TOOL_CALLS')).toBe(5);
    expect(parsePositiveInt('lots', 5, 'MAX_TOOL_CALLS')).toBe(5);
    expect(error).toHaveBeenCalledTimes(2);
  });

  it('caps values at the given maximum', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(parsePositiveInt('3000000000', 120000, 'PLANNER_DEADLINE_MS', MAX_TIMER_MS)).toBe(2147483647);
    expect(parsePositiveInt('90000', 120000, 'PLANNER_DEADLINE_MS', MAX_TIMER_MS)).toBe(90000);
  });

  it('keeps timer settings within what setTimeout accepts', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.stubEnv('PLANNER_DEADLINE_MS', '3000000000');
    vi.stubEnv('RETRY_DELAY_MS', '9999999999');
    vi.resetModules();

    const { env } = await import('../env.js');

    expect(env.PLANNER_DEADLINE_MS).toBe(MAX_TIMER_MS);
    expect(env.RETRY_DELAY_MS).toBe(MAX_TIMER_MS);
  });
});
