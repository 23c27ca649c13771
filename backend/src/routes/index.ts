import { Router } from 'express';
import { Logger } from 'winston';
import { RecommendationConfig } from '../config/recommendation.config';
import { RecommendationController } from '../controllers/recommendation.controller';
import { RecommendationEngine } from '../services/recommendation';
import { createRecommendationRoutes } from './recommendation.routes';

export function createApiRoutes(config: RecommendationConfig, logger: Logger): Router {
  const router = Router();

  const engine = new RecommendationEngine(config, logger);
  const controller = new RecommendationController(engine, logger);

  router.use('/recommendations', createRecommendationRoutes(controller, config));

  return router;
}
