import { ScoredItem } from '../../types/recommendation';

/**
 * Returns a copy sorted by descending score. Array.prototype.sort is stable,
 * so equal scores keep their input order.
 */
export function sortByScoreDescending(items: readonly ScoredItem[]): ScoredItem[] {
  return [...items].sort((a, b) => b.score - a.score);
}

// Map iteration follows insertion order, which becomes the tie order
export function rankScoreMap(scores: ReadonlyMap<string, number>): ScoredItem[] {
  return sortByScoreDescending(
    Array.from(scores, ([workId, score]) => ({ workId, score }))
  );
}
