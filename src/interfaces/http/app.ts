/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Each cluster worker calls createApp() for its own instance, and integration
 * tests build a fresh one after overriding container registrations.
 *
 * Middleware order:
 *   1. helmet()       security headers
 *   2. cors()
 *   3. compression()
 *   4. express.json() body parsing (syntax errors go to errorHandler)
 *   5. requestLogger
 *   6. routes         /health, /api/...
 *   7. notFound       404 envelope for unknown paths
 *   8. errorHandler   must be last
 *
 * The `import '@core/container'` side effect makes sure the container is
 * populated before songRoutes builds its controller.
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { notFound } from '@interfaces/http/middleware/notFound';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { songRoutes } from '@interfaces/http/routes/songRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(compression());

  app.use(express.json());

  app.use(requestLogger);

  app.use(healthRoutes);
  app.use('/api', songRoutes);

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
