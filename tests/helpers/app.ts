/**
 * Test app factory.
 *
 * Creates an Express app instance for integration testing without starting
 * the server or listening on a port.
 */

import express from 'express';
import authRouter from '../../src/routes/auth.js';
import { healthHandler } from '../../src/routes/health.js';
import { requestContext } from '../../src/middleware/request-context.js';

/**
 * Create a test Express app with all routes configured.
 */
export function createTestApp(): express.Application {
  const app = express();

  app.use(requestContext);

  // Health check endpoint
  app.get('/health', healthHandler);

  // Auth routes (OAuth flow)
  app.use(authRouter);

  return app;
}
