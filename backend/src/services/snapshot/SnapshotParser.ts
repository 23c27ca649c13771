import { AppError } from '../../middleware/errorHandler';
import {
  FusionWeights,
  MetricsConfig,
  RecommendationParams,
  RecommendationSnapshot,
  SimilarUser,
  Tag,
  UserProfile,
  Work,
} from '../../types/recommendation';

export type SnapshotSection =
  | 'USER_PROFILE'
  | 'WORKS'
  | 'SIMILAR_USERS'
  | 'PARAMS'
  | 'METRICS_CONFIG'
  | 'FUSION_WEIGHTS';

export class SnapshotParseError extends AppError {
  constructor(
    message: string,
    public section: SnapshotSection,
    public line: number
  ) {
    super(`${section} (line ${line}): ${message}`, 400, 'SNAPSHOT_PARSE_ERROR');
    this.name = 'SnapshotParseError';
  }
}

interface Token {
  text: string;
  line: number;
}

// Plain decimal with optional exponent; no hex, binary or octal literals
const DECIMAL_NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Reads whitespace-separated tokens across lines. Section headers are
 * located by scanning whole lines, skipping anything in between.
 */
class TokenCursor {
  private lineIndex = 0;
  private pending: Token[] = [];
  private section: SnapshotSection = 'USER_PROFILE';

  constructor(private lines: string[]) {}

  seekSection(section: SnapshotSection, required: boolean): boolean {
    this.section = section;
    this.pending = [];
    while (this.lineIndex < this.lines.length) {
      const line = this.lines[this.lineIndex++];
      if (line.trim() === section) return true;
    }
    if (required) {
      this.fail(`missing section header "${section}"`);
    }
    return false;
  }

  next(what: string): Token {
    while (this.pending.length === 0) {
      if (this.lineIndex >= this.lines.length) {
        this.fail(`unexpected end of input, expected ${what}`);
      }
      const lineNumber = this.lineIndex + 1;
      const words = this.lines[this.lineIndex++].trim().split(/\s+/).filter(w => w.length > 0);
      this.pending = words.map(text => ({ text, line: lineNumber }));
    }
    const token = this.pending.shift();
    if (!token) {
      return this.fail(`expected ${what}`);
    }
    return token;
  }

  nextNumber(what: string): number {
    const token = this.next(what);
    const value = DECIMAL_NUMBER.test(token.text) ? Number(token.text) : NaN;
    if (!Number.isFinite(value)) {
      this.fail(`expected ${what} to be a number, got "${token.text}"`, token.line);
    }
    return value;
  }

  nextCount(what: string): number {
    const token = this.next(what);
    if (!/^\d+$/.test(token.text)) {
      this.fail(`expected ${what} to be a non-negative integer, got "${token.text}"`, token.line);
    }
    return parseInt(token.text, 10);
  }

  nextInteger(what: string): number {
    const token = this.next(what);
    if (!/^-?\d+$/.test(token.text)) {
      this.fail(`expected ${what} to be an integer, got "${token.text}"`, token.line);
    }
    return parseInt(token.text, 10);
  }

  fail(message: string, line: number = this.lineIndex): never {
    throw new SnapshotParseError(message, this.section, Math.max(line, 1));
  }
}

function readTags(cursor: TokenCursor, count: number, owner: string): Tag[] {
  const tags: Tag[] = [];
  const seen = new Set<string>();

  for (let i = 0; i < count; i++) {
    const name = cursor.next(`tag name for ${owner}`);
    const value = cursor.nextNumber(`value of tag "${name.text}"`);
    if (seen.has(name.text)) {
      cursor.fail(`duplicate tag "${name.text}" for ${owner}`, name.line);
    }
    seen.add(name.text);
    tags.push({ name: name.text, value });
  }

  return tags;
}

function readUserProfile(cursor: TokenCursor): UserProfile {
  cursor.seekSection('USER_PROFILE', true);
  const count = cursor.nextCount('user tag count');
  return { tags: readTags(cursor, count, 'user profile') };
}

function readWorks(cursor: TokenCursor): Work[] {
  cursor.seekSection('WORKS', true);
  const count = cursor.nextCount('work count');
  const works: Work[] = [];
  const ids = new Set<string>();

  for (let i = 0; i < count; i++) {
    const id = cursor.next('work id');
    if (ids.has(id.text)) {
      cursor.fail(`duplicate work id "${id.text}"`, id.line);
    }
    ids.add(id.text);

    const tagCount = cursor.nextCount(`tag count of work "${id.text}"`);
    const tags = readTags(cursor, tagCount, `work "${id.text}"`);
    const viewCount = cursor.nextNumber(`view count of work "${id.text}"`);
    const interactionTime = cursor.nextNumber(`interaction time of work "${id.text}"`);

    works.push({ id: id.text, tags, viewCount, interactionTime });
  }

  return works;
}

function readSimilarUsers(cursor: TokenCursor): SimilarUser[] {
  cursor.seekSection('SIMILAR_USERS', true);
  const count = cursor.nextCount('similar user count');
  const users: SimilarUser[] = [];

  for (let i = 0; i < count; i++) {
    const id = cursor.next('similar user id').text;
    const similarity = cursor.nextNumber(`similarity of user "${id}"`);
    const likedCount = cursor.nextCount(`liked work count of user "${id}"`);
    const likedWorks: string[] = [];
    for (let j = 0; j < likedCount; j++) {
      likedWorks.push(cursor.next(`liked work id of user "${id}"`).text);
    }
    users.push({ id, similarity, likedWorks });
  }

  return users;
}

function readParams(cursor: TokenCursor): RecommendationParams {
  cursor.seekSection('PARAMS', true);
  return {
    numRecommendations: cursor.nextInteger('number of recommendations'),
    randomFactor: cursor.nextNumber('random factor'),
  };
}

function readMetricsConfig(cursor: TokenCursor): MetricsConfig {
  cursor.seekSection('METRICS_CONFIG', true);
  return {
    useMetrics: cursor.nextInteger('use_metrics flag') !== 0,
    weightViews: cursor.nextNumber('views weight'),
    weightTime: cursor.nextNumber('time weight'),
    weightTags: cursor.nextNumber('tags weight'),
  };
}

function readFusionWeights(cursor: TokenCursor): FusionWeights | undefined {
  if (!cursor.seekSection('FUSION_WEIGHTS', false)) return undefined;
  return {
    content: cursor.nextNumber('content weight'),
    collaborative: cursor.nextNumber('collaborative weight'),
  };
}

/**
 * Parses the section-tagged snapshot format (USER_PROFILE, WORKS,
 * SIMILAR_USERS, PARAMS, METRICS_CONFIG, optional FUSION_WEIGHTS).
 */
export function parseSnapshot(text: string): RecommendationSnapshot {
  const cursor = new TokenCursor(text.split(/\r?\n/));

  const userProfile = readUserProfile(cursor);
  const works = readWorks(cursor);
  const similarUsers = readSimilarUsers(cursor);
  const params = readParams(cursor);
  const metricsConfig = readMetricsConfig(cursor);
  const weights = readFusionWeights(cursor);

  return {
    userProfile,
    works,
    similarUsers,
    params,
    metricsConfig,
    ...(weights && { weights }),
  };
}
