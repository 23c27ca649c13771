import { RecommendationEngine } from '../../../services/recommendation/RecommendationEngine';
import {
  createSampleSnapshot,
  createTestConfig,
  createTestLogger,
  ids,
  scoreMap,
} from '../../testUtils';

describe('RecommendationEngine', () => {
  const logger = createTestLogger();

  it('runs the full pipeline on the sample snapshot', () => {
    const engine = new RecommendationEngine(createTestConfig(), logger);

    const result = engine.recommend(createSampleSnapshot(), { seed: 1 });

    expect(ids(result.recommendations).sort()).toEqual(['A', 'B']);
    const scores = scoreMap(result.recommendations);
    expect(scores.A).toBeCloseTo(0.5, 10);
    expect(scores.B).toBeCloseTo(0.4, 10);
    expect(result.stats).toEqual({
      catalogSize: 2,
      contentRanked: 2,
      collaborativeRanked: 1,
      fused: 2,
      returned: 2,
      processingTime: expect.any(Number),
    });
  });

  it('prefers snapshot weights over configured ones', () => {
    const engine = new RecommendationEngine(createTestConfig({ CONTENT_WEIGHT: '0.2' }), logger);

    const result = engine.recommend(
      createSampleSnapshot({ weights: { content: 1, collaborative: 0 } }),
      { seed: 1 }
    );

    expect(scoreMap(result.recommendations)).toEqual({ A: 1, B: 0 });
  });

  it('falls back to configured weights', () => {
    const engine = new RecommendationEngine(
      createTestConfig({ CONTENT_WEIGHT: '0', COLLABORATIVE_WEIGHT: '1' }),
      logger
    );

    const result = engine.recommend(createSampleSnapshot(), { seed: 1 });

    expect(scoreMap(result.recommendations)).toEqual({ A: 0, B: 0.8 });
  });

  it('uses the configured diversity pool unless overridden', () => {
    const snapshot = createSampleSnapshot({ params: { numRecommendations: 1, randomFactor: 1 } });

    const topEngine = new RecommendationEngine(createTestConfig(), logger);
    expect(topEngine.recommend(snapshot, { seed: 1 }).recommendations).toEqual([]);

    const tailEngine = new RecommendationEngine(createTestConfig({ DIVERSITY_POOL: 'tail' }), logger);
    const tailResult = tailEngine.recommend(snapshot, { seed: 1 });
    expect(tailResult.recommendations).toHaveLength(1);
    expect(['A', 'B']).toContain(tailResult.recommendations[0].workId);

    expect(topEngine.recommend(snapshot, { seed: 1, pool: 'tail' }).recommendations).toHaveLength(1);
  });

  it('uses the configured seed when none is passed', () => {
    const engine = new RecommendationEngine(createTestConfig({ RECOMMENDATION_SEED: '12' }), logger);
    const snapshot = createSampleSnapshot({
      params: { numRecommendations: 2, randomFactor: 0 },
    });

    const first = engine.recommend(snapshot).recommendations;
    const second = engine.recommend(snapshot).recommendations;

    expect(second).toEqual(first);
  });

  it('returns an empty list for an empty snapshot', () => {
    const engine = new RecommendationEngine(createTestConfig(), logger);

    const result = engine.recommend(createSampleSnapshot({ works: [], similarUsers: [] }));

    expect(result.recommendations).toEqual([]);
    expect(result.stats.fused).toBe(0);
  });

  it('logs a summary of each run', () => {
    const engine = new RecommendationEngine(createTestConfig(), logger);
    const info = jest.spyOn(logger, 'info');

    engine.recommend(createSampleSnapshot(), { seed: 1 });

    expect(info).toHaveBeenCalledWith(
      'Recommendations generated',
      expect.objectContaining({ catalogSize: 2, returned: 2 })
    );
  });

  it('does not modify the snapshot', () => {
    const engine = new RecommendationEngine(createTestConfig(), logger);
    const snapshot = createSampleSnapshot();
    const before = JSON.stringify(snapshot);

    engine.recommend(snapshot, { seed: 3 });

    expect(JSON.stringify(snapshot)).toBe(before);
  });
});
