import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'fs';
import path from 'path';
import logger from './logger';
import env from './env';
import { describeError } from './errors';
import { DEFAULT_CONCURRENCY, DEFAULT_RATE_LIMIT_MS } from './constants';

// --- Zod Schemas ---

const OutputSchema = z.object({
  dir: z.string().optional(),
  baseName: z.string().min(1).optional(),
  timestamped: z.boolean().optional(),
});

// Overrides may only be gentler on TMDB: fewer slots, longer pauses
const PipelineSchema = z.object({
  concurrency: z.number().int().min(1).max(DEFAULT_CONCURRENCY).optional(),
  rateLimitMs: z.number().int().min(DEFAULT_RATE_LIMIT_MS).optional(),
});

const FileConfigSchema = z.object({
  wikiUrl: z.string().url().optional(),
  output: OutputSchema.default({}),
  pipeline: PipelineSchema.default({}),
  dryRun: z.boolean().optional(),
}).default({});

export interface Config {
  wikiUrl: string;
  tmdb: {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
  };
  output: {
    dir: string;
    baseName: string;
    timestamped: boolean;
  };
  pipeline: {
    concurrency: number;
    rateLimitMs: number;
  };
  dryRun: boolean;
}

// --- Loader Logic ---

function readYaml(filePath: string): unknown {
  logger.info(`Loading configuration from ${filePath}`);
  try {
    const fileContents = fs.readFileSync(filePath, 'utf8');
    return yaml.load(fileContents);
  } catch (e) {
    logger.error(`Failed to parse config.yaml: ${describeError(e)}`);
    process.exit(1);
  }
}

function loadConfig(): Config {
  const configPath = path.resolve(process.cwd(), 'config', 'config.yaml');
  const fallbackPath = path.resolve(process.cwd(), 'config.yaml'); // Support root config.yaml too

  let loadedConfig: unknown = undefined;

  if (fs.existsSync(configPath)) {
    loadedConfig = readYaml(configPath);
  } else if (fs.existsSync(fallbackPath)) {
    loadedConfig = readYaml(fallbackPath);
  } else {
    logger.debug('No config.yaml found. Using Environment Variables only.');
  }

  // An empty YAML document loads as null/undefined
  const result = FileConfigSchema.safeParse(loadedConfig ?? undefined);
  if (!result.success) {
    logger.error('Configuration validation failed:');
    result.error.issues.forEach(err => {
      logger.error(`- ${err.path.join('.')}: ${err.message}`);
    });
    process.exit(1);
  }

  const fileConfig = result.data;

  // --- Hybrid Merge: file values win, ENV fills the gaps ---

  return {
    wikiUrl: fileConfig.wikiUrl ?? env.WIKI_URL,
    tmdb: {
      apiKey: env.TMDB_API_KEY,
      baseUrl: env.TMDB_BASE_URL,
      timeoutMs: env.REQUEST_TIMEOUT_MS,
    },
    output: {
      dir: fileConfig.output.dir ?? env.OUTPUT_DIR,
      baseName: fileConfig.output.baseName ?? env.OUTPUT_BASENAME,
      timestamped: fileConfig.output.timestamped ?? env.WRITE_TIMESTAMPED,
    },
    pipeline: {
      concurrency: fileConfig.pipeline.concurrency ?? env.CONCURRENCY,
      rateLimitMs: fileConfig.pipeline.rateLimitMs ?? env.RATE_LIMIT_MS,
    },
    // Either source can switch dry run on
    dryRun: env.DRY_RUN || fileConfig.dryRun === true,
  };
}

export { loadConfig };
