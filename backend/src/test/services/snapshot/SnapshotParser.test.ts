import { parseSnapshot, SnapshotParseError } from '../../../services/snapshot/SnapshotParser';
import { AppError } from '../../../middleware/errorHandler';
import { createSampleSnapshot, sampleSnapshotText } from '../../testUtils';

const captureError = (text: string): SnapshotParseError => {
  try {
    parseSnapshot(text);
  } catch (error) {
    if (error instanceof SnapshotParseError) return error;
    throw error;
  }
  throw new Error('expected parseSnapshot to throw');
};

describe('parseSnapshot', () => {
  it('parses every section of a snapshot', () => {
    expect(parseSnapshot(sampleSnapshotText)).toEqual(createSampleSnapshot());
  });

  it('reads the optional fusion weights section', () => {
    const snapshot = parseSnapshot(`${sampleSnapshotText}FUSION_WEIGHTS\n0.7 0.3\n`);
    expect(snapshot.weights).toEqual({ content: 0.7, collaborative: 0.3 });
  });

  it('leaves weights unset when the section is absent', () => {
    expect(parseSnapshot(sampleSnapshotText).weights).toBeUndefined();
  });

  it('skips lines before a section header', () => {
    const snapshot = parseSnapshot(`# exported snapshot\n\n${sampleSnapshotText}`);
    expect(snapshot.works.map(work => work.id)).toEqual(['A', 'B']);
  });

  it('accepts CRLF line endings and tokens spread across lines', () => {
    const text = sampleSnapshotText.replace('PARAMS\n2 0\n', 'PARAMS\n2\n0\n').replace(/\n/g, '\r\n');
    expect(parseSnapshot(text)).toEqual(createSampleSnapshot());
  });

  it('treats any non-zero use_metrics flag as enabled', () => {
    const text = sampleSnapshotText.replace('METRICS_CONFIG\n0 0 0 1', 'METRICS_CONFIG\n2 0.3 0.2 0.5');
    expect(parseSnapshot(text).metricsConfig).toEqual({
      useMetrics: true,
      weightViews: 0.3,
      weightTime: 0.2,
      weightTags: 0.5,
    });
  });

  it('reads empty sections', () => {
    const text = 'USER_PROFILE\n0\nWORKS\n0\nSIMILAR_USERS\n0\nPARAMS\n0 0.5\nMETRICS_CONFIG\n1 1 1 1\n';
    expect(parseSnapshot(text)).toEqual({
      userProfile: { tags: [] },
      works: [],
      similarUsers: [],
      params: { numRecommendations: 0, randomFactor: 0.5 },
      metricsConfig: { useMetrics: true, weightViews: 1, weightTime: 1, weightTags: 1 },
    });
  });

  describe('errors', () => {
    it('is an operational AppError with a 400 status', () => {
      const error = captureError('');
      expect(error).toBeInstanceOf(AppError);
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('SNAPSHOT_PARSE_ERROR');
    });

    it('reports a missing section', () => {
      const error = captureError('USER_PROFILE\n1\nscifi 1.0\n');
      expect(error.section).toBe('WORKS');
      expect(error.message).toBe('WORKS (line 4): missing section header "WORKS"');
    });

    it('reports a non-numeric value with its line', () => {
      const error = captureError('USER_PROFILE\n1\nscifi 1.0\nWORKS\n1\nA\n1\nscifi abc\n');
      expect(error.section).toBe('WORKS');
      expect(error.line).toBe(8);
      expect(error.message).toBe('WORKS (line 8): expected value of tag "scifi" to be a number, got "abc"');
    });

    it('rejects hexadecimal and binary literals as tag values', () => {
      expect(captureError('USER_PROFILE\n1\nscifi 0x10\n').message).toBe(
        'USER_PROFILE (line 3): expected value of tag "scifi" to be a number, got "0x10"'
      );
      expect(captureError('USER_PROFILE\n1\nscifi 0b1\n').message).toBe(
        'USER_PROFILE (line 3): expected value of tag "scifi" to be a number, got "0b1"'
      );
    });

    it('rejects an exponent without digits', () => {
      expect(captureError('USER_PROFILE\n1\nscifi 1e\n').message).toBe(
        'USER_PROFILE (line 3): expected value of tag "scifi" to be a number, got "1e"'
      );
    });

    it('rejects values that overflow to infinity', () => {
      expect(captureError('USER_PROFILE\n1\nscifi 1e400\n').line).toBe(3);
    });

    it('accepts signed decimals with exponents', () => {
      const snapshot = parseSnapshot(sampleSnapshotText.replace('scifi 1.0\nWORKS', 'scifi -.5e1\nWORKS'));
      expect(snapshot.userProfile.tags).toEqual([{ name: 'scifi', value: -5 }]);
    });

    it('rejects a negative count', () => {
      const error = captureError('USER_PROFILE\n-1\n');
      expect(error.message).toBe(
        'USER_PROFILE (line 2): expected user tag count to be a non-negative integer, got "-1"'
      );
    });

    it('rejects duplicate tag names', () => {
      const error = captureError('USER_PROFILE\n2\nscifi 1\nscifi 2\n');
      expect(error.message).toBe('USER_PROFILE (line 4): duplicate tag "scifi" for user profile');
    });

    it('rejects duplicate work ids', () => {
      const text = sampleSnapshotText.replace('B\n1\ndrama 1.0', 'A\n1\ndrama 1.0');
      const error = captureError(text);
      expect(error.section).toBe('WORKS');
      expect(error.message).toMatch(/duplicate work id "A"$/);
    });

    it('reports truncated input', () => {
      const error = captureError('USER_PROFILE\n2\nscifi 1\n');
      expect(error.message).toBe(
        'USER_PROFILE (line 4): unexpected end of input, expected tag name for user profile'
      );
    });

    it('requires an integer recommendation count', () => {
      const text = sampleSnapshotText.replace('PARAMS\n2 0', 'PARAMS\n2.5 0');
      const error = captureError(text);
      expect(error.section).toBe('PARAMS');
      expect(error.message).toMatch(/expected number of recommendations to be an integer, got "2\.5"$/);
    });
  });
});
