import { Request, Response, NextFunction } from 'express';
import { Logger } from 'winston';
import { RecommendationEngine, RecommendOptions } from '../services/recommendation';
import { parseSnapshot } from '../services/snapshot/SnapshotParser';
import { toRecommendationView } from '../services/snapshot/RecommendationSerializer';
import { AppError } from '../middleware/errorHandler';
import {
  DiversityPool,
  FusionWeights,
  MetricsConfig,
  RecommendationParams,
  RecommendationResult,
  RecommendationSnapshot,
  SimilarUser,
  UserProfile,
  Work,
} from '../types/recommendation';

export interface RecommendationRequestBody {
  userProfile: UserProfile;
  works: Work[];
  similarUsers: SimilarUser[];
  params: RecommendationParams;
  metricsConfig: MetricsConfig;
  weights?: FusionWeights;
  seed?: number;
  pool?: DiversityPool;
}

/**
 * Recommendation Controller - HTTP entry points for one-shot scoring runs
 */
export class RecommendationController {
  constructor(
    private engine: RecommendationEngine,
    private logger: Logger
  ) {}

  /**
   * POST /api/recommendations
   * Body has already passed the route validators
   */
  async recommend(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const body: RecommendationRequestBody = req.body;
      const snapshot: RecommendationSnapshot = {
        userProfile: body.userProfile,
        works: body.works,
        similarUsers: body.similarUsers,
        params: body.params,
        metricsConfig: body.metricsConfig,
        ...(body.weights && { weights: body.weights }),
      };

      const result = this.engine.recommend(snapshot, { seed: body.seed, pool: body.pool });
      this.respond(res, result);
    } catch (error) {
      this.logger.error('Recommendations API error:', error);
      next(error);
    }
  }

  /**
   * POST /api/recommendations/snapshot
   * text/plain body in the section-tagged snapshot format
   */
  async recommendFromSnapshot(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      if (typeof req.body !== 'string' || req.body.trim() === '') {
        throw new AppError('Snapshot body must be non-empty text/plain', 400, 'EMPTY_SNAPSHOT');
      }

      const snapshot = parseSnapshot(req.body);
      const result = this.engine.recommend(snapshot, this.optionsFromQuery(req));
      this.respond(res, result);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/recommendations/health
   */
  async healthCheck(req: Request, res: Response): Promise<void> {
    res.json({
      success: true,
      data: {
        status: 'healthy',
        timestamp: new Date().toISOString(),
      },
    });
  }

  private optionsFromQuery(req: Request): RecommendOptions {
    const { seed, pool } = req.query;
    const options: RecommendOptions = {};

    if (typeof seed === 'string' && seed !== '') {
      const parsed = Number(seed);
      if (!Number.isInteger(parsed)) {
        throw new AppError('Seed must be an integer', 400, 'INVALID_SEED');
      }
      options.seed = parsed;
    }

    if (pool === 'top' || pool === 'tail') {
      options.pool = pool;
    } else if (pool !== undefined) {
      throw new AppError('Pool must be "top" or "tail"', 400, 'INVALID_POOL');
    }

    return options;
  }

  private respond(res: Response, result: RecommendationResult): void {
    res.json({
      success: true,
      data: {
        recommendations: toRecommendationView(result.recommendations),
        stats: result.stats,
      },
    });
  }
}
