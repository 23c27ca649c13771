#!/usr/bin/env node
import { readFile } from 'fs/promises';
import { parseArgs } from 'util';
import {
  RecommendationConfig,
  recommendationConfig,
  validateRecommendationConfig,
} from './config/recommendation.config';
import { RecommendationEngine, RecommendOptions } from './services/recommendation';
import { parseSnapshot } from './services/snapshot/SnapshotParser';
import { serializeRecommendations } from './services/snapshot/RecommendationSerializer';
import { AppError } from './middleware/errorHandler';
import { logger } from './utils/logger';

const usage = 'Usage: recommend [snapshot-file] [--seed <int>] [--pool top|tail]';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

export function parseCliOptions(argv: string[]): { file?: string; options: RecommendOptions } {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      seed: { type: 'string' },
      pool: { type: 'string' },
    },
  });

  const options: RecommendOptions = {};

  if (values.seed !== undefined) {
    const seed = Number(values.seed);
    if (!Number.isInteger(seed)) {
      throw new AppError(`--seed must be an integer, got "${values.seed}"`, 400, 'INVALID_SEED');
    }
    options.seed = seed;
  }

  if (values.pool !== undefined) {
    if (values.pool !== 'top' && values.pool !== 'tail') {
      throw new AppError(`--pool must be "top" or "tail", got "${values.pool}"`, 400, 'INVALID_POOL');
    }
    options.pool = values.pool;
  }

  return { file: positionals[0], options };
}

export async function run(
  argv: string[],
  config: RecommendationConfig = recommendationConfig
): Promise<string> {
  const configCheck = validateRecommendationConfig(config);
  if (!configCheck.valid) {
    throw new AppError(
      `Invalid configuration: ${configCheck.errors.join('; ')}`,
      500,
      'INVALID_CONFIG'
    );
  }

  const { file, options } = parseCliOptions(argv);
  const text = file ? await readFile(file, 'utf8') : await readStdin();

  const snapshot = parseSnapshot(text);
  const engine = new RecommendationEngine(config, logger);
  const result = engine.recommend(snapshot, options);

  return serializeRecommendations(result.recommendations);
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then(output => {
      process.stdout.write(output);
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`recommend: ${message}\n${usage}\n`);
      process.exitCode = 1;
    });
}
