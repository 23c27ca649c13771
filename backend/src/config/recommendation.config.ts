import { config } from 'dotenv';
import { DiversityPool } from '../types/recommendation';

// Load environment variables
config();

export interface RecommendationConfig {
  server: {
    port: number;
    corsOrigins: string[];
  };
  rateLimit: {
    windowMs: number;
    max: number;
  };
  fusion: {
    contentWeight: number;
    collaborativeWeight: number;
  };
  diversity: {
    defaultRandomFactor: number;
    pool: DiversityPool;
    seed?: number;
  };
  limits: {
    maxRecommendations: number;
    maxCatalogSize: number;
  };
}

const parseOptionalInt = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') return undefined;
  // parseInt would read "12abc" as 12
  return /^\s*-?\d+\s*$/.test(value) ? parseInt(value, 10) : NaN;
};

const parsePool = (value: string | undefined): DiversityPool =>
  value === 'tail' ? 'tail' : 'top';

export function loadRecommendationConfig(env: NodeJS.ProcessEnv = process.env): RecommendationConfig {
  return {
    server: {
      port: parseInt(env.PORT || '5000', 10),
      corsOrigins: (env.CORS_ORIGINS || 'http://localhost:3000,http://localhost:5173')
        .split(',')
        .map(origin => origin.trim())
        .filter(origin => origin.length > 0),
    },
    rateLimit: {
      windowMs: parseInt(env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
      max: parseInt(env.RATE_LIMIT_MAX || '100', 10),
    },
    fusion: {
      contentWeight: parseFloat(env.CONTENT_WEIGHT || '0.5'),
      collaborativeWeight: parseFloat(env.COLLABORATIVE_WEIGHT || '0.5'),
    },
    diversity: {
      defaultRandomFactor: parseFloat(env.DEFAULT_RANDOM_FACTOR || '0.2'),
      pool: parsePool(env.DIVERSITY_POOL),
      seed: parseOptionalInt(env.RECOMMENDATION_SEED),
    },
    limits: {
      maxRecommendations: parseInt(env.MAX_RECOMMENDATIONS || '50', 10),
      maxCatalogSize: parseInt(env.MAX_CATALOG_SIZE || '10000', 10),
    },
  };
}

export const recommendationConfig: RecommendationConfig = loadRecommendationConfig();

// Validation
export function validateRecommendationConfig(
  cfg: RecommendationConfig = recommendationConfig
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!Number.isInteger(cfg.server.port) || cfg.server.port <= 0) {
    errors.push('PORT must be a positive integer');
  }

  if (!Number.isFinite(cfg.fusion.contentWeight)) {
    errors.push('CONTENT_WEIGHT must be a number');
  }

  if (!Number.isFinite(cfg.fusion.collaborativeWeight)) {
    errors.push('COLLABORATIVE_WEIGHT must be a number');
  }

  const randomFactor = cfg.diversity.defaultRandomFactor;
  if (!Number.isFinite(randomFactor) || randomFactor < 0 || randomFactor > 1) {
    errors.push('DEFAULT_RANDOM_FACTOR must be between 0 and 1');
  }

  if (cfg.diversity.seed !== undefined && !Number.isInteger(cfg.diversity.seed)) {
    errors.push('RECOMMENDATION_SEED must be an integer');
  }

  if (!Number.isInteger(cfg.limits.maxRecommendations) || cfg.limits.maxRecommendations <= 0) {
    errors.push('MAX_RECOMMENDATIONS must be greater than 0');
  }

  if (!Number.isInteger(cfg.limits.maxCatalogSize) || cfg.limits.maxCatalogSize <= 0) {
    errors.push('MAX_CATALOG_SIZE must be greater than 0');
  }

  if (cfg.rateLimit.windowMs <= 0 || cfg.rateLimit.max <= 0) {
    errors.push('RATE_LIMIT_WINDOW_MS and RATE_LIMIT_MAX must be greater than 0');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

