import express, { Application } from 'express';
import helmet from 'helmet';
import compression from 'compression';
import { Logger } from 'winston';

import { RecommendationConfig, recommendationConfig } from './config/recommendation.config';
import { createCorsMiddleware } from './middleware/cors';
import { errorHandler } from './middleware/errorHandler';
import { logger as defaultLogger } from './utils/logger';
import { createApiRoutes } from './routes';

export function createApp(
  config: RecommendationConfig = recommendationConfig,
  logger: Logger = defaultLogger
): Application {
  const app: Application = express();

  app.use(helmet());
  app.use(createCorsMiddleware(config.server.corsOrigins));

  // Trust proxy for accurate IP addresses
  app.set('trust proxy', 1);

  app.use(compression());
  app.use(express.json({ limit: '10mb' }));

  app.use('/api', createApiRoutes(config, logger));

  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: process.env.NODE_ENV || 'development',
    });
  });

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: 'Endpoint not found',
      path: req.originalUrl,
      method: req.method,
    });
  });

  app.use(errorHandler);

  return app;
}
