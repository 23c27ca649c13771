import { Logger } from 'winston';
import { RecommendationConfig } from '../../config/recommendation.config';
import {
  DiversityPool,
  RecommendationResult,
  RecommendationSnapshot,
} from '../../types/recommendation';
import { CollaborativeRanker } from './CollaborativeRanker';
import { ContentRanker } from './ContentRanker';
import { DiversitySampler } from './DiversitySampler';
import { FusionStage } from './FusionStage';

export interface RecommendOptions {
  seed?: number;
  pool?: DiversityPool;
}

/**
 * Runs one scoring pass over a snapshot: content and collaborative
 * rankings, weighted fusion, then diversity sampling.
 */
export class RecommendationEngine {
  private contentRanker: ContentRanker;
  private collaborativeRanker: CollaborativeRanker;
  private fusionStage: FusionStage;
  private diversitySampler: DiversitySampler;

  constructor(
    private config: RecommendationConfig,
    private logger: Logger
  ) {
    this.contentRanker = new ContentRanker();
    this.collaborativeRanker = new CollaborativeRanker();
    this.fusionStage = new FusionStage();
    this.diversitySampler = new DiversitySampler(config.diversity.pool);
  }

  recommend(snapshot: RecommendationSnapshot, options: RecommendOptions = {}): RecommendationResult {
    const startTime = Date.now();
    const { userProfile, works, similarUsers, params, metricsConfig } = snapshot;

    const contentRanked = this.contentRanker.rank(userProfile, works, metricsConfig);
    const collaborativeRanked = this.collaborativeRanker.rank(similarUsers);

    const weights = snapshot.weights ?? {
      content: this.config.fusion.contentWeight,
      collaborative: this.config.fusion.collaborativeWeight,
    };
    const fused = this.fusionStage.combine(
      contentRanked,
      collaborativeRanked,
      weights.content,
      weights.collaborative
    );

    const recommendations = this.diversitySampler.sample(
      fused,
      params.numRecommendations,
      params.randomFactor,
      {
        seed: options.seed ?? this.config.diversity.seed,
        pool: options.pool,
      }
    );

    const stats = {
      catalogSize: works.length,
      contentRanked: contentRanked.length,
      collaborativeRanked: collaborativeRanked.length,
      fused: fused.length,
      returned: recommendations.length,
      processingTime: Date.now() - startTime,
    };

    this.logger.info('Recommendations generated', stats);
    if (recommendations.length === 0) {
      this.logger.debug('Empty recommendation list', {
        numRecommendations: params.numRecommendations,
        catalogSize: works.length,
        similarUsers: similarUsers.length,
      });
    }

    return { recommendations, stats };
  }
}
