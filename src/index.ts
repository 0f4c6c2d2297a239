// Trip Planner API
// Port: 8080 by default

// Load environment variables from .env file
import 'dotenv/config';

import { env, logConfiguration, missingRequiredConfig } from './env.js';
import { logger } from './logger.js';
import { buildServer } from './server.js';
import { createModelClient } from './providers/index.js';
import { createTripTools } from './services/tools/index.js';
import { RetryController } from './services/orchestrator/index.js';
import { TripPlanner } from './services/planner/index.js';
import { RedisTripStore } from './services/trips/index.js';
import {
  DisabledIdentityVerifier,
  JwtIdentityVerifier,
  type IdentityVerifier,
} from './services/auth/identity.js';

const missing = missingRequiredConfig();
if (missing.length > 0) {
  logger.fatal({ missing }, 'Missing required configuration');
  process.exit(1);
}

if (env.NODE_ENV === 'production' && !env.IDENTITY_TOKEN_SECRET) {
  logger.fatal('IDENTITY_TOKEN_SECRET must be set in production');
  process.exit(1);
}

const verifier: IdentityVerifier = env.IDENTITY_TOKEN_SECRET
  ? new JwtIdentityVerifier({ secret: env.IDENTITY_TOKEN_SECRET, issuer: env.IDENTITY_TOKEN_ISSUER || undefined })
  : new DisabledIdentityVerifier();

const store = RedisTripStore.fromUrl(env.REDIS_URL);

const planner = new TripPlanner({
  model: createModelClient('vertex'),
  tools: createTripTools(),
  retry: new RetryController({
    maxAttempts: env.MAX_RETRIES,
    delayMs: env.RETRY_DELAY_MS,
    backoff: env.RETRY_BACKOFF,
  }),
  callBudget: env.MAX_TOOL_CALLS,
  deadlineMs: env.PLANNER_DEADLINE_MS,
  budgetRepair: env.BUDGET_REPAIR_ENABLED,
});

const server = await buildServer({ planner, store, verifier });

const shutdown = async (signal: string) => {
  server.log.info({ signal }, 'Shutting down');
  try {
    await server.close();
    await store.close();
  } finally {
    process.exit(0);
  }
};
process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));

// Start server
try {
  await server.listen({ port: env.PORT, host: env.HOST });
  logConfiguration(message => server.log.info(message));
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
