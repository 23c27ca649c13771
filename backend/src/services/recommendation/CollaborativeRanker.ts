import { ScoredItem, SimilarUser } from '../../types/recommendation';
import { rankScoreMap } from './ranking';

export class CollaborativeRanker {
  /**
   * Sums each similar user's similarity into every work they liked.
   * Works nobody liked do not appear.
   */
  rank(similarUsers: readonly SimilarUser[]): ScoredItem[] {
    const scores = new Map<string, number>();

    for (const user of similarUsers) {
      for (const workId of user.likedWorks) {
        scores.set(workId, (scores.get(workId) ?? 0) + user.similarity);
      }
    }

    return rankScoreMap(scores);
  }
}
