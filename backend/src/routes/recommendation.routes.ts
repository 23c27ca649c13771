import express, { Router } from 'express';
import rateLimit from 'express-rate-limit';
import { body, ValidationChain } from 'express-validator';
import { RecommendationController } from '../controllers/recommendation.controller';
import { RecommendationConfig } from '../config/recommendation.config';
import { validateRequest } from '../middleware/validateRequest';
import { logger } from '../utils/logger';

const hasUniqueTagNames = (tags: unknown): boolean => {
  if (!Array.isArray(tags)) return true;
  const names = new Set<unknown>();
  for (const tag of tags) {
    const name: unknown = typeof tag === 'object' && tag !== null && 'name' in tag ? tag.name : undefined;
    if (names.has(name)) {
      throw new Error(`Duplicate tag name "${String(name)}"`);
    }
    names.add(name);
  }
  return true;
};

const hasUniqueWorkIds = (works: unknown): boolean => {
  if (!Array.isArray(works)) return true;
  const ids = new Set<unknown>();
  for (const work of works) {
    const id: unknown = typeof work === 'object' && work !== null && 'id' in work ? work.id : undefined;
    if (ids.has(id)) {
      throw new Error(`Duplicate work id "${String(id)}"`);
    }
    ids.add(id);
  }
  return true;
};

// isFloat accepts exponents like "1e400" that convert to Infinity
const isFiniteNumber = (value: unknown): boolean => Number.isFinite(Number(value));

const finiteFloat = (
  chain: ValidationChain,
  message: string,
  options: { min?: number; max?: number } = {}
): ValidationChain =>
  chain
    .isFloat(options)
    .withMessage(message)
    .bail()
    .custom(isFiniteNumber)
    .withMessage(message)
    .toFloat();

export function snapshotValidators(config: RecommendationConfig) {
  return [
    body('userProfile')
      .isObject()
      .withMessage('User profile is required'),
    body('userProfile.tags')
      .isArray()
      .withMessage('User profile tags must be an array')
      .bail()
      .custom(hasUniqueTagNames),
    body('userProfile.tags.*.name')
      .isString()
      .notEmpty()
      .withMessage('Each tag must have a name'),
    finiteFloat(body('userProfile.tags.*.value'), 'Tag value must be a number'),

    body('works')
      .isArray({ max: config.limits.maxCatalogSize })
      .withMessage(`Works must be an array with at most ${config.limits.maxCatalogSize} items`)
      .bail()
      .custom(hasUniqueWorkIds),
    body('works.*.id')
      .isString()
      .notEmpty()
      .withMessage('Each work must have an ID'),
    body('works.*.tags')
      .isArray()
      .withMessage('Work tags must be an array')
      .bail()
      .custom(hasUniqueTagNames),
    body('works.*.tags.*.name')
      .isString()
      .notEmpty()
      .withMessage('Each tag must have a name'),
    finiteFloat(body('works.*.tags.*.value'), 'Tag value must be a number'),
    finiteFloat(body('works.*.viewCount'), 'View count must be a non-negative number', { min: 0 }),
    finiteFloat(body('works.*.interactionTime'), 'Interaction time must be a non-negative number', { min: 0 }),

    body('similarUsers')
      .isArray()
      .withMessage('Similar users must be an array'),
    body('similarUsers.*.id')
      .isString()
      .notEmpty()
      .withMessage('Each similar user must have an ID'),
    finiteFloat(body('similarUsers.*.similarity'), 'Similarity must be a number'),
    body('similarUsers.*.likedWorks')
      .isArray()
      .withMessage('Liked works must be an array'),
    body('similarUsers.*.likedWorks.*')
      .isString()
      .notEmpty()
      .withMessage('Liked work IDs must be strings'),

    body('params.numRecommendations')
      .isInt({ min: 0, max: config.limits.maxRecommendations })
      .withMessage(`Number of recommendations must be between 0 and ${config.limits.maxRecommendations}`)
      .toInt(),
    finiteFloat(
      body('params.randomFactor').default(config.diversity.defaultRandomFactor),
      'Random factor must be between 0 and 1',
      { min: 0, max: 1 }
    ),

    body('metricsConfig.useMetrics')
      .isBoolean()
      .withMessage('useMetrics must be a boolean')
      .toBoolean(true),
    finiteFloat(body('metricsConfig.weightViews'), 'weightViews must be a number'),
    finiteFloat(body('metricsConfig.weightTime'), 'weightTime must be a number'),
    finiteFloat(body('metricsConfig.weightTags'), 'weightTags must be a number'),

    body('weights')
      .optional()
      .isObject()
      .withMessage('Weights must be an object'),
    finiteFloat(
      body('weights.content').if(body('weights').exists()),
      'Content weight must be a number'
    ),
    finiteFloat(
      body('weights.collaborative').if(body('weights').exists()),
      'Collaborative weight must be a number'
    ),

    body('seed')
      .optional()
      .isInt()
      .withMessage('Seed must be an integer')
      .toInt(),
    body('pool')
      .optional()
      .isIn(['top', 'tail'])
      .withMessage('Pool must be "top" or "tail"'),
  ];
}

/**
 * Recommendation Routes
 *
 * - POST /            JSON snapshot
 * - POST /snapshot    text/plain snapshot in the section-tagged format
 * - GET  /health
 */
export function createRecommendationRoutes(
  controller: RecommendationController,
  config: RecommendationConfig
): Router {
  const router = Router();

  router.use(rateLimit({
    windowMs: config.rateLimit.windowMs,
    max: config.rateLimit.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      logger.warn('Recommendation rate limit exceeded', { ip: req.ip, path: req.path });
      res.status(429).json({
        success: false,
        error: 'Too many recommendation requests from this IP, please try again later.',
      });
    },
  }));

  router.post('/',
    snapshotValidators(config),
    validateRequest,
    controller.recommend.bind(controller)
  );

  router.post('/snapshot',
    express.text({ type: 'text/plain', limit: '10mb' }),
    controller.recommendFromSnapshot.bind(controller)
  );

  router.get('/health',
    controller.healthCheck.bind(controller)
  );

  return router;
}
