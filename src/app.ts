import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { env } from './config/env.config';
import { logger } from './config/logger.config';
import { isAllowedOrigin, isAllowedDevOrigin } from './config/cors.config';
import { requestTimingMiddleware } from './middleware/request-timing.middleware';
import { requestIdMiddleware } from './middleware/request-id.middleware';
// Bootstrap DI container (auto-runs on import, must be before routes)
import './bootstrap';
import { createApiRoutes } from './routes';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';

const corsOptions: cors.CorsOptions = {
  origin: (origin, callback) => {
    // Allow requests with no origin (curl, server-to-server)
    if (!origin) return callback(null, true);

    if (env.NODE_ENV !== 'production' && isAllowedDevOrigin(origin)) {
      return callback(null, true);
    }

    if (isAllowedOrigin(origin)) {
      return callback(null, true);
    }

    logger.warn('CORS rejected origin', { origin });
    return callback(new Error('Not allowed by CORS'));
  },
  methods: ['GET', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'X-Request-ID'],
};

export function createApp(): Express {
  const app = express();

  // Trust proxy for correct IP detection behind load balancers
  app.set('trust proxy', 1);

  app.use(
    helmet({
      // API server, no HTML served
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    })
  );
  app.use(cors(corsOptions));
  app.use(requestIdMiddleware);
  app.use(requestTimingMiddleware);

  app.use('/api', createApiRoutes());

  app.use(notFoundHandler);
  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
