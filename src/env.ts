// Environment configuration for the trip planner API
// Loads provider credentials, tool keys and planner limits from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

// Largest delay setTimeout accepts; longer values fire immediately
export const MAX_TIMER_MS = 2_147_483_647;

export function parsePositiveInt(
  value: string | undefined,
  defaultValue: number,
  name: string,
  max: number = Number.MAX_SAFE_INTEGER,
): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  if (parsed > max) {
    console.error(`${name} "${value}" is above ${max}, using ${max}`);
    return max;
  }
  return parsed;
}

function parsePositiveFloat(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed <= 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  const items = strEnv(value).split(',').map(item => item.trim()).filter(Boolean);
  return items.length > 0 ? items : fallback;
}

export type RetryBackoff = 'flat' | 'exponential';

function parseBackoff(value: string | undefined): RetryBackoff {
  return strEnv(value).toLowerCase() === 'exponential' ? 'exponential' : 'flat';
}

const NODE_ENV = process.env.NODE_ENV || 'development';

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8080),
  HOST: process.env.HOST || '0.0.0.0',
  NODE_ENV,
  PUBLIC_BASE_URL: strEnv(process.env.PUBLIC_BASE_URL, 'http://localhost:8080').replace(/\/+$/, ''),
  FORCE_HTTPS: process.env.FORCE_HTTPS === 'true',
  CORS_ORIGINS: parseList(process.env.CORS_ORIGINS, [
    'http://localhost:3000',
    'http://127.0.0.1:3000',
    'http://localhost:8080',
    'http://127.0.0.1:8080',
  ]),

  // Google Vertex AI
  VERTEX_PROJECT_ID: strEnv(process.env.VERTEX_PROJECT_ID || process.env.GOOGLE_PROJECT_ID),
  VERTEX_LOCATION: strEnv(process.env.VERTEX_LOCATION, 'asia-south1'),
  VERTEX_MODEL: strEnv(process.env.VERTEX_MODEL, 'gemini-2.5-flash'),
  VERTEX_TIMEOUT_MS: parsePositiveInt(process.env.VERTEX_TIMEOUT_MS, 60000, 'VERTEX_TIMEOUT_MS', MAX_TIMER_MS),

  // Tool APIs
  RAPIDAPI_KEY: strEnv(process.env.RAPIDAPI_KEY),
  OPENWEATHER_API_KEY: strEnv(process.env.OPENWEATHER_API_KEY),
  DEFAULT_HOTEL_PRICE: parsePositiveFloat(process.env.DEFAULT_HOTEL_PRICE, 3500.0, 'DEFAULT_HOTEL_PRICE'),
  HOTEL_PRICE_CACHE_TTL_MS: parsePositiveInt(
    process.env.HOTEL_PRICE_CACHE_TTL_MS,
    6 * 60 * 60 * 1000,
    'HOTEL_PRICE_CACHE_TTL_MS',
  ),

  // Planner limits
  MAX_TOOL_CALLS: parsePositiveInt(process.env.MAX_TOOL_CALLS, 5, 'MAX_TOOL_CALLS'),
  MAX_RETRIES: parsePositiveInt(process.env.MAX_RETRIES, 3, 'MAX_RETRIES'),
  RETRY_DELAY_MS: parsePositiveInt(process.env.RETRY_DELAY_MS, 2000, 'RETRY_DELAY_MS', MAX_TIMER_MS),
  RETRY_BACKOFF: parseBackoff(process.env.RETRY_BACKOFF),
  PLANNER_DEADLINE_MS: parsePositiveInt(process.env.PLANNER_DEADLINE_MS, 120000, 'PLANNER_DEADLINE_MS', MAX_TIMER_MS),
  BUDGET_REPAIR_ENABLED: process.env.BUDGET_REPAIR_ENABLED !== 'false',

  // Storage and identity
  REDIS_URL: strEnv(process.env.REDIS_URL, 'redis://127.0.0.1:6379'),
  IDENTITY_TOKEN_SECRET: strEnv(process.env.IDENTITY_TOKEN_SECRET),
  IDENTITY_TOKEN_ISSUER: strEnv(process.env.IDENTITY_TOKEN_ISSUER),

  // Rate limiting for itinerary generation
  RATE_LIMITING_ENABLED: process.env.RATE_LIMITING_ENABLED === 'true',
  RATE_LIMIT_WINDOW_MS: parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 60 * 60 * 1000, 'RATE_LIMIT_WINDOW_MS'),
  RATE_LIMIT_PLANS_PER_WINDOW: parsePositiveInt(
    process.env.RATE_LIMIT_PLANS_PER_WINDOW,
    10,
    'RATE_LIMIT_PLANS_PER_WINDOW',
  ),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || (NODE_ENV === 'test' ? 'silent' : 'info'),
  LOG_PRETTY: process.env.LOG_PRETTY
    ? process.env.LOG_PRETTY === 'true'
    : NODE_ENV !== 'production' && NODE_ENV !== 'test',
};

// Keys whose absence prevents itinerary generation
export function missingRequiredConfig(): string[] {
  const required: Record<string, string> = {
    VERTEX_PROJECT_ID: env.VERTEX_PROJECT_ID,
  };
  return Object.entries(required)
    .filter(([, value]) => !value)
    .map(([key]) => key);
}

export function optionalConfigWarnings(): Record<string, string> {
  const optional: Array<[string, string, string]> = [
    ['RAPIDAPI_KEY', env.RAPIDAPI_KEY, 'Hotel pricing will use default values'],
    ['OPENWEATHER_API_KEY', env.OPENWEATHER_API_KEY, 'Weather features will be disabled'],
  ];
  const warnings: Record<string, string> = {};
  for (const [key, value, warning] of optional) {
    if (!value) warnings[key] = warning;
  }
  return warnings;
}

export function isProviderConfigured(provider: string): boolean {
  switch (provider) {
    case 'vertex':
      return !!env.VERTEX_PROJECT_ID;
    default:
      return false;
  }
}

// Log configuration on startup (redact secrets)
export function logConfiguration(log: (message: string) => void = console.log) {
  log('Trip planner configuration:');
  log(`  Environment: ${env.NODE_ENV}`);
  log(`  Server: ${env.HOST}:${env.PORT}`);
  log(`  Vertex: ${env.VERTEX_PROJECT_ID ? `${env.VERTEX_MODEL} @ ${env.VERTEX_LOCATION}` : 'not configured'}`);
  log(`  Tool call budget: ${env.MAX_TOOL_CALLS}`);
  log(`  Retries: ${env.MAX_RETRIES} attempts, ${env.RETRY_DELAY_MS}ms ${env.RETRY_BACKOFF} backoff`);
  log(`  Planner deadline: ${env.PLANNER_DEADLINE_MS}ms`);
  log(`  Budget repair enabled: ${env.BUDGET_REPAIR_ENABLED}`);
  log(`  Identity tokens: ${env.IDENTITY_TOKEN_SECRET ? 'configured' : 'NOT configured'}`);
  log(`  Rate limiting enabled: ${env.RATE_LIMITING_ENABLED}`);
  if (env.RATE_LIMITING_ENABLED) {
    log(`  Plans per window: ${env.RATE_LIMIT_PLANS_PER_WINDOW} / ${env.RATE_LIMIT_WINDOW_MS}ms`);
  }
  for (const [key, warning] of Object.entries(optionalConfigWarnings())) {
    log(`  ⚠️  ${key} not set. ${warning}`);
  }
}
