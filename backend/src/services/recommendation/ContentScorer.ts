import { MetricsConfig, UserProfile, Work } from '../../types/recommendation';
import { SimilarityEngine } from './SimilarityEngine';

export class ContentScorer {
  constructor(private similarityEngine: SimilarityEngine = new SimilarityEngine()) {}

  /**
   * Tag similarity weighted by `weightTags`, plus the work's view count and
   * interaction time relative to the catalog maxima when metrics are enabled.
   */
  score(
    user: UserProfile,
    work: Work,
    config: MetricsConfig,
    maxViews: number,
    maxTime: number
  ): number {
    let score = config.weightTags * this.similarityEngine.similarity(user, work);

    if (config.useMetrics) {
      const normViews = maxViews > 0 ? work.viewCount / maxViews : 0;
      const normTime = maxTime > 0 ? work.interactionTime / maxTime : 0;
      score += config.weightViews * normViews + config.weightTime * normTime;
    }

    return score;
  }
}
