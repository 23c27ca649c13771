export interface Tag {
  name: string;
  value: number;
}

export interface UserProfile {
  tags: Tag[];
}

/**
 * A catalog item. `viewCount` and `interactionTime` are raw usage metrics;
 * they are normalized against the catalog maximum when scored.
 */
export interface Work {
  id: string;
  tags: Tag[];
  viewCount: number;
  interactionTime: number;
}

export interface SimilarUser {
  id: string;
  similarity: number;
  likedWorks: string[];
}

export interface MetricsConfig {
  useMetrics: boolean;
  weightViews: number;
  weightTime: number;
  weightTags: number;
}

export interface ScoredItem {
  workId: string;
  score: number;
}

export interface FusionWeights {
  content: number;
  collaborative: number;
}

/**
 * Where the randomly drawn part of the output comes from.
 * - `top`: the same top-ranked slice as the guaranteed part
 * - `tail`: the works ranked below that slice
 */
export type DiversityPool = 'top' | 'tail';

export interface RecommendationParams {
  numRecommendations: number;
  randomFactor: number;
}

export interface RecommendationSnapshot {
  userProfile: UserProfile;
  works: Work[];
  similarUsers: SimilarUser[];
  params: RecommendationParams;
  metricsConfig: MetricsConfig;
  weights?: FusionWeights;
}

export interface RecommendationStats {
  catalogSize: number;
  contentRanked: number;
  collaborativeRanked: number;
  fused: number;
  returned: number;
  processingTime: number;
}

export interface RecommendationResult {
  recommendations: ScoredItem[];
  stats: RecommendationStats;
}
