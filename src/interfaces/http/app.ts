/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Builds a fresh Express app per call, so integration tests can register
 * their fakes in the container first and then create the app.
 *
 * Middleware order:
 *   1. requestTimer  - stamps req.requestStartTime for meta.totalTimeMs.
 *   2. helmet()      - security headers.
 *   3. cors()        - cross-origin access for browser clients.
 *   4. compression() - gzip for larger result sets.
 *   5. express.json() - parses request bodies.
 *   6. requestLogger - pino-http access log.
 *   7. Routes        - health, schema, query.
 *   8. errorHandler  - last, catches everything above.
 *
 * `import '@core/container'` bootstraps the DI registrations before any
 * route module resolves a service.
 */
import '@core/container';

import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { queryRoutes } from '@interfaces/http/routes/queryRoutes';
import { schemaRoutes } from '@interfaces/http/routes/schemaRoutes';

export function createApp(): express.Express {
  const app = express();

  // Request timing (must be first)
  app.use(requestTimer);

  // Security & compression
  app.use(helmet());
  app.use(cors());
  app.use(compression());

  // Body parsing
  app.use(express.json({ limit: '100kb' }));

  // Request logging
  app.use(requestLogger);

  // Routes
  app.use('/api/v1', healthRoutes);
  app.use('/api/v1', schemaRoutes);
  app.use('/api/v1', queryRoutes);

  // Global error handler (must be registered last)
  app.use(errorHandler);

  return app;
}
