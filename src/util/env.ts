import { z } from 'zod';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_RATE_LIMIT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_TMDB_BASE_URL,
  DEFAULT_WIKI_URL,
} from './constants';

const booleanString = (fallback: 'true' | 'false') =>
  z.string().default(fallback).transform(val => val.toLowerCase() === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  TMDB_API_KEY: z.string({
    required_error: 'TMDB_API_KEY environment variable not set. Get your API key from https://www.themoviedb.org/settings/api'
  }).min(1, 'TMDB_API_KEY must not be empty. Get your API key from https://www.themoviedb.org/settings/api'),
  TMDB_BASE_URL: z.string().url().default(DEFAULT_TMDB_BASE_URL),
  WIKI_URL: z.string().url().default(DEFAULT_WIKI_URL),
  OUTPUT_DIR: z.string().default('.'),
  OUTPUT_BASENAME: z.string().min(1).default('scott_hasnt_seen'),
  WRITE_TIMESTAMPED: booleanString('true'),
  CONCURRENCY: z.string().default(String(DEFAULT_CONCURRENCY)).transform(Number).pipe(z.number().int().min(1).max(DEFAULT_CONCURRENCY)),
  RATE_LIMIT_MS: z.string().default(String(DEFAULT_RATE_LIMIT_MS)).transform(Number).pipe(z.number().int().min(DEFAULT_RATE_LIMIT_MS)),
  REQUEST_TIMEOUT_MS: z.string().default(String(DEFAULT_REQUEST_TIMEOUT_MS)).transform(Number).pipe(z.number().int().positive()),
  DRY_RUN: booleanString('false'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Environment validation failed:');
    result.error.issues.forEach(error => {
      console.error(`- ${error.path.join('.')}: ${error.message}`);
    });
    process.exit(1);
  }

  return result.data;
}

const env = validateEnv();
export default env;
export { envSchema };
