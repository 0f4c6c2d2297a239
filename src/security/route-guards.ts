import type { FastifyReply, FastifyRequest } from 'fastify';
import { env } from '../env.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';
import type { Identity, IdentityVerifier } from '../services/auth/identity.js';
import { FixedWindowLimiter } from './rate-limiter.js';

const limiter = new FixedWindowLimiter();

function headerValue(header: string | string[] | undefined): string {
  if (Array.isArray(header)) return header[0] ?? '';
  return header ?? '';
}

export function extractAuthToken(request: FastifyRequest): string {
  const match = /^Bearer\s+(\S+)\s*$/i.exec(headerValue(request.headers.authorization).trim());
  return match?.[1] ?? '';
}

/**
 * Verifies the bearer token. Sends 401 and resolves to null when the caller
 * is not signed in.
 */
export async function requireUser(
  request: FastifyRequest,
  reply: FastifyReply,
  verifier: IdentityVerifier,
): Promise<Identity | null> {
  const token = extractAuthToken(request);
  if (!token) {
    const error = AppError.unauthorized('Missing bearer token');
    reply.code(error.statusCode).send(formatErrorResponse(error));
    return null;
  }

  try {
    return await verifier.verify(token);
  } catch (err) {
    const error = err instanceof AppError ? err : AppError.invalidToken();
    request.log.warn({ code: error.code }, 'Bearer token rejected');
    reply.code(error.statusCode).send(formatErrorResponse(error));
    return null;
  }
}

// RFC 1918 ranges and loopback
const TRUSTED_PROXY_RANGES = [
  /^10\./,
  /^172\.(1[6-9]|2[0-9]|3[0-1])\./,
  /^192\.168\./,
  /^127\./,
  /^::1$/,
];

export function isTrustedProxy(ip: string): boolean {
  return TRUSTED_PROXY_RANGES.some(range => range.test(ip));
}

export function getRealClientIP(request: FastifyRequest): string {
  if (!isTrustedProxy(request.ip)) return request.ip;

  const forwarded = headerValue(request.headers['x-forwarded-for']);
  if (forwarded) {
    // The rightmost untrusted address is the real client
    const hops = forwarded.split(',').map(ip => ip.trim()).filter(Boolean);
    const client = [...hops].reverse().find(ip => !isTrustedProxy(ip));
    return client ?? hops[0] ?? request.ip;
  }

  return headerValue(request.headers['x-real-ip']) || request.ip;
}

export interface RateLimitOptions {
  routeKey: string;
  maxRequests: number;
}

export function enforceRateLimitIfEnabled(
  request: FastifyRequest,
  reply: FastifyReply,
  options: RateLimitOptions,
): boolean {
  if (!env.RATE_LIMITING_ENABLED) return true;

  const decision = limiter.consume(
    // Keyed by address: planning routes never verify bearer tokens
    `${options.routeKey}:ip:${getRealClientIP(request)}`,
    options.maxRequests,
    env.RATE_LIMIT_WINDOW_MS,
  );
  if (decision.allowed) return true;

  const error = AppError.rateLimited(decision.retryAfterSeconds, 'Too many requests. Please try again later.');
  request.log.info({ route: options.routeKey }, 'Planning rate limit reached');
  reply.header('Retry-After', String(decision.retryAfterSeconds));
  reply.code(error.statusCode).send(formatErrorResponse(error));
  return false;
}

export function resetRateLimits(): void {
  limiter.clear();
}
