import { recommendationConfig, validateRecommendationConfig } from './config/recommendation.config';
import { createApp } from './app';
import { logger } from './utils/logger';

const configCheck = validateRecommendationConfig(recommendationConfig);
if (!configCheck.valid) {
  logger.error('Invalid configuration', { errors: configCheck.errors });
  process.exit(1);
}

const app = createApp(recommendationConfig, logger);
const PORT = recommendationConfig.server.port;

const server = app.listen(PORT, () => {
  logger.info(`Recommendation API server running on port ${PORT}`);
  logger.info(`Environment: ${process.env.NODE_ENV || 'development'}`);
  logger.info('Diversity sampling', {
    pool: recommendationConfig.diversity.pool,
    seeded: recommendationConfig.diversity.seed !== undefined,
  });
});

// Graceful shutdown handling
const gracefulShutdown = (signal: string) => {
  logger.info(`${signal} received, shutting down gracefully`);

  server.close(error => {
    if (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force close after 15 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 15000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

export default app;
