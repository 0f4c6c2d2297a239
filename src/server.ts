// HTTP server assembly
// Collaborators are injected so tests can build the same server around stubs

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './env.js';
import { registerSecurityHeaders } from './security/headers.js';
import { itineraryRoutes } from './routes/itineraries.js';
import { tripRoutes } from './routes/trips.js';
import { shareRoutes } from './routes/shares.js';
import type { TripPlanner } from './services/planner/planner.js';
import type { TripStore } from './services/trips/types.js';
import type { IdentityVerifier } from './services/auth/identity.js';

export const API_VERSION = '1.0.0';

export interface ServerDependencies {
  planner: Pick<TripPlanner, 'planTrip' | 'regenerate' | 'adjustForWeather'>;
  store: TripStore;
  verifier: IdentityVerifier;
  publicBaseUrl?: string;
}

export async function buildServer(deps: ServerDependencies): Promise<FastifyInstance> {
  const server = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      ...(env.LOG_PRETTY
        ? {
            transport: {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            },
          }
        : {}),
    },
    bodyLimit: 1024 * 1024,
  });

  await server.register(cors, {
    origin: env.CORS_ORIGINS,
    credentials: true,
  });

  registerSecurityHeaders(server, {
    hsts: env.FORCE_HTTPS || env.NODE_ENV === 'production',
  });

  // Main health endpoint with /v1 prefix
  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
    };
  });

  // Legacy redirect
  server.get('/health', async (_request, reply) => {
    return reply.code(301).redirect('/v1/health');
  });

  await server.register(itineraryRoutes, { prefix: '/v1', planner: deps.planner });
  await server.register(tripRoutes, {
    prefix: '/v1',
    store: deps.store,
    verifier: deps.verifier,
    publicBaseUrl: deps.publicBaseUrl ?? env.PUBLIC_BASE_URL,
  });
  await server.register(shareRoutes, { prefix: '/v1', store: deps.store, verifier: deps.verifier });

  return server;
}
