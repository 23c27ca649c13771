import { MetricsConfig, ScoredItem, UserProfile, Work } from '../../types/recommendation';
import { ContentScorer } from './ContentScorer';
import { sortByScoreDescending } from './ranking';

export class ContentRanker {
  constructor(private scorer: ContentScorer = new ContentScorer()) {}

  /**
   * Scores every work in the catalog. No work is filtered out, whatever
   * its score.
   */
  rank(user: UserProfile, catalog: readonly Work[], config: MetricsConfig): ScoredItem[] {
    let maxViews = 0;
    let maxTime = 0;
    for (const work of catalog) {
      if (work.viewCount > maxViews) maxViews = work.viewCount;
      if (work.interactionTime > maxTime) maxTime = work.interactionTime;
    }

    const scored = catalog.map(work => ({
      workId: work.id,
      score: this.scorer.score(user, work, config, maxViews, maxTime),
    }));

    return sortByScoreDescending(scored);
  }
}
