import 'dotenv/config';
import * as fs from 'fs';
import * as path from 'path';
import {
  CategoriesFileSchema,
  CategoryConfig,
  ScheduleConfig,
  ScheduleFileSchema,
} from './schema';

export type { CategoryConfig, EventWindow, PriorityBucket, ScheduleConfig } from './schema';

function readJsonFile(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

function numberFrom(value: string | undefined, fallback: string, name: string): number {
  const n = Number(value || fallback);
  if (!Number.isFinite(n)) {
    throw new Error(`Invalid numeric value for ${name}: ${value}`);
  }
  return n;
}

function flagFrom(value: string | undefined, fallback: 'true' | 'false'): boolean {
  const v = (value || fallback).toLowerCase();
  return v === 'true' || v === '1';
}

export function loadCategories(filePath: string): CategoryConfig[] {
  const parsed = CategoriesFileSchema.parse(readJsonFile(filePath));
  const names = new Set<string>();
  for (const c of parsed.categories) {
    if (names.has(c.name)) throw new Error(`Duplicate category '${c.name}' in ${filePath}`);
    names.add(c.name);
  }
  return parsed.categories;
}

/**
 * Load the posting schedule and check every category it references exists
 */
export function loadSchedule(filePath: string, categories: CategoryConfig[]): ScheduleConfig {
  const schedule = ScheduleFileSchema.parse(readJsonFile(filePath));
  const known = new Set(categories.map(c => c.name));
  const referenced = [
    ...schedule.priorityBuckets.flatMap(b => b.categories),
    ...schedule.eventWindows.flatMap(w => w.categories.map(c => c.category)),
  ];
  for (const name of referenced) {
    if (!known.has(name)) throw new Error(`Schedule in ${filePath} references unknown category '${name}'`);
  }
  return schedule;
}

export function buildConfig(env: NodeJS.ProcessEnv = process.env) {
  const configDir = env.CONFIG_DIR || path.join(process.cwd(), 'config');
  const categories = loadCategories(path.join(configDir, 'categories.json'));
  const schedule = loadSchedule(path.join(configDir, 'schedule.json'), categories);
  return {
    TWITTER_API_KEY: env.TWITTER_API_KEY || '',
    TWITTER_API_SECRET: env.TWITTER_API_SECRET || '',
    TWITTER_ACCESS_TOKEN: env.TWITTER_ACCESS_TOKEN || '',
    TWITTER_ACCESS_SECRET: env.TWITTER_ACCESS_SECRET || '',
    OPENAI_API_KEY: env.OPENAI_API_KEY || '',
    OPENAI_BASE_URL: env.OPENAI_BASE_URL || undefined,
    OPENAI_MODEL: env.OPENAI_MODEL || 'gpt-4o-mini',
    // Monthly platform caps (free tier: 100 reads, 500 writes)
    MONTHLY_READ_LIMIT: numberFrom(env.MONTHLY_READ_LIMIT, '100', 'MONTHLY_READ_LIMIT'),
    MONTHLY_WRITE_LIMIT: numberFrom(env.MONTHLY_WRITE_LIMIT, '500', 'MONTHLY_WRITE_LIMIT'),
    MIN_POST_INTERVAL_MINUTES: numberFrom(env.MIN_POST_INTERVAL_MINUTES, '90', 'MIN_POST_INTERVAL_MINUTES'),
    // Platform limit on posts in any rolling 24h window
    MAX_POSTS_PER_24H: numberFrom(env.MAX_POSTS_PER_24H, '17', 'MAX_POSTS_PER_24H'),
    TICK_INTERVAL_SECONDS: numberFrom(env.TICK_INTERVAL_SECONDS, '30', 'TICK_INTERVAL_SECONDS'),
    COLLECTION_INTERVAL_HOURS: numberFrom(env.COLLECTION_INTERVAL_HOURS, '12', 'COLLECTION_INTERVAL_HOURS'),
    MATURATION_HOURS: numberFrom(env.MATURATION_HOURS, '24', 'MATURATION_HOURS'),
    STALE_AFTER_HOURS: numberFrom(env.STALE_AFTER_HOURS, '168', 'STALE_AFTER_HOURS'),
    MIN_SAMPLE_SIZE: numberFrom(env.MIN_SAMPLE_SIZE, '5', 'MIN_SAMPLE_SIZE'),
    EXPLOIT_PROBABILITY: numberFrom(env.EXPLOIT_PROBABILITY, '0.8', 'EXPLOIT_PROBABILITY'),
    TOP_TIER_SIZE: numberFrom(env.TOP_TIER_SIZE, '3', 'TOP_TIER_SIZE'),
    LIKE_WEIGHT: numberFrom(env.LIKE_WEIGHT, '1', 'LIKE_WEIGHT'),
    RESHARE_WEIGHT: numberFrom(env.RESHARE_WEIGHT, '2', 'RESHARE_WEIGHT'),
    REPLY_WEIGHT: numberFrom(env.REPLY_WEIGHT, '3', 'REPLY_WEIGHT'),
    PUBLISH_MAX_RETRIES: numberFrom(env.PUBLISH_MAX_RETRIES, '3', 'PUBLISH_MAX_RETRIES'),
    RETRY_BASE_DELAY_MS: numberFrom(env.RETRY_BASE_DELAY_MS, '5000', 'RETRY_BASE_DELAY_MS'),
    EXTERNAL_TIMEOUT_MS: numberFrom(env.EXTERNAL_TIMEOUT_MS, '15000', 'EXTERNAL_TIMEOUT_MS'),
    OUTCOME_RETENTION_DAYS: numberFrom(env.OUTCOME_RETENTION_DAYS, '90', 'OUTCOME_RETENTION_DAYS'),
    POSTED_RETENTION_DAYS: numberFrom(env.POSTED_RETENTION_DAYS, '90', 'POSTED_RETENTION_DAYS'),
    DATA_DIR: env.DATA_DIR || process.cwd(),
    PORT: numberFrom(env.PORT, '10000', 'PORT'),
    SHORTEN_URLS: flagFrom(env.SHORTEN_URLS, 'true'),
    // Fixed seed makes category choices reproducible across runs
    RANDOM_SEED: env.RANDOM_SEED ? numberFrom(env.RANDOM_SEED, '0', 'RANDOM_SEED') : undefined,
    DRY_RUN: flagFrom(env.DRY_RUN, 'false'),
    CATEGORIES: categories,
    SCHEDULE: schedule,
  };
}

export type AppConfig = ReturnType<typeof buildConfig>;

export const config = buildConfig();
