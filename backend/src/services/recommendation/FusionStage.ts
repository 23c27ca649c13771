import { ScoredItem } from '../../types/recommendation';
import { rankScoreMap } from './ranking';

export const DEFAULT_CONTENT_WEIGHT = 0.5;
export const DEFAULT_COLLABORATIVE_WEIGHT = 0.5;

export class FusionStage {
  /**
   * Linear blend of the two rankings. A work present in only one list keeps
   * that list's weighted contribution; the other side counts as 0.
   * Weights are taken as given, including negative values.
   */
  combine(
    contentRanked: readonly ScoredItem[],
    collabRanked: readonly ScoredItem[],
    contentWeight: number = DEFAULT_CONTENT_WEIGHT,
    collabWeight: number = DEFAULT_COLLABORATIVE_WEIGHT
  ): ScoredItem[] {
    const combined = new Map<string, number>();

    for (const item of contentRanked) {
      combined.set(item.workId, (combined.get(item.workId) ?? 0) + contentWeight * item.score);
    }

    for (const item of collabRanked) {
      combined.set(item.workId, (combined.get(item.workId) ?? 0) + collabWeight * item.score);
    }

    return rankScoreMap(combined);
  }
}
