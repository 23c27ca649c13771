export { SimilarityEngine } from './SimilarityEngine';
export { ContentScorer } from './ContentScorer';
export { ContentRanker } from './ContentRanker';
export { CollaborativeRanker } from './CollaborativeRanker';
export {
  FusionStage,
  DEFAULT_CONTENT_WEIGHT,
  DEFAULT_COLLABORATIVE_WEIGHT,
} from './FusionStage';
export { DiversitySampler } from './DiversitySampler';
export type { SampleOptions } from './DiversitySampler';
export { RecommendationEngine } from './RecommendationEngine';
export type { RecommendOptions } from './RecommendationEngine';
export { createRandomSource, mulberry32 } from './random';
export type { RandomSource } from './random';
