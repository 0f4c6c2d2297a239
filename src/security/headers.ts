import type { FastifyInstance } from 'fastify';

export interface SecurityHeaderOptions {
  hsts: boolean;
}

// JSON API: nothing is rendered, so the policy only needs to forbid everything
const CONTENT_SECURITY_POLICY = "default-src 'none'; frame-ancestors 'none'";

export function registerSecurityHeaders(server: FastifyInstance, options: SecurityHeaderOptions): void {
  server.addHook('onSend', async (_request, reply, payload) => {
    reply.header('Content-Security-Policy', CONTENT_SECURITY_POLICY);
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('X-XSS-Protection', '1; mode=block');
    if (options.hsts) {
      reply.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    return payload;
  });
}
