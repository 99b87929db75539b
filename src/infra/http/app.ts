import express from 'express';
import type { Logger } from '../logging/logger.js';
import { createAuthRoutes, AuthRouteDependencies } from './routes/auth.js';
import { createHealthRoutes, HealthCheck } from './routes/health.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';

export interface AppDependencies extends AuthRouteDependencies {
  healthCheck: HealthCheck;
  logger: Logger;
  /** Base URL advertised in the OpenAPI document. */
  publicUrl: string;
}

/**
 * Build the Express application around already-constructed services.
 */
export function createApp(deps: AppDependencies): express.Application {
  const app = express();

  app.use(express.json());
  app.use(createApiRateLimiter());

  app.use(createHealthRoutes(deps.healthCheck));
  app.use(createSwaggerRoutes(deps.publicUrl));
  app.use('/api/auth', createAuthRoutes(deps));

  // Error handler (must be last)
  app.use(createErrorHandler(deps.logger));

  return app;
}
