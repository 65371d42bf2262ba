/**
 * backend/src/shared/http/cors.ts
 *
 * WHY:
 * - Browsers on other origins call this API; every response needs the same
 *   access-control headers, whatever route or status produced it.
 *
 * HOW IT WORKS:
 * - buildCorsHeaders() is pure: request Origin in, header map out.
 * - registerCors() applies it in `onSend`, the last stage before bytes go out,
 *   so error-handler and not-found replies are decorated too.
 *
 * RULES:
 * - Never touch status or body here.
 */

import type { FastifyInstance } from 'fastify';

export const CORS_ALLOW_METHODS = 'POST, GET, PATCH, OPTIONS';

export type CorsHeaders = {
  'access-control-allow-origin': string;
  'access-control-allow-methods': string;
  'access-control-allow-headers': string;
  'access-control-allow-credentials': string;
};

export function buildCorsHeaders(origin: string | undefined): CorsHeaders {
  return {
    'access-control-allow-origin': origin ?? '*',
    'access-control-allow-methods': CORS_ALLOW_METHODS,
    'access-control-allow-headers': '*',
    'access-control-allow-credentials': 'true',
  };
}

export function registerCors(app: FastifyInstance) {
  app.addHook('onSend', (req, reply, payload, done) => {
    reply.headers(buildCorsHeaders(req.headers.origin));
    done(null, payload);
  });
}
