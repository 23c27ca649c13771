import { ScoredItem } from '../../types/recommendation';

export interface RecommendationView {
  id: string;
  score: number;
}

export function toRecommendationView(items: readonly ScoredItem[]): RecommendationView[] {
  return items.map(item => ({ id: item.workId, score: item.score }));
}

export function serializeRecommendations(items: readonly ScoredItem[]): string {
  return `${JSON.stringify({ recommendations: toRecommendationView(items) }, null, 2)}\n`;
}
