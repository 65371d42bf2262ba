/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * ORDER:
 * - request context first (requestId for every later log line),
 * - CORS on every outgoing response,
 * - global error handler.
 */

import Fastify from 'fastify';

import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerCors } from '../shared/http/cors';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer() {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);
  registerCors(app);
  registerErrorHandler(app);

  // Basic request logging (includes requestId + host)
  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
    });
    done();
  });

  return app;
}
