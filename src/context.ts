import * as path from 'path';
import { AppConfig } from './config';
import { PerformanceLearner } from './learning/performanceLearner';
import { CategorySelector } from './scheduler/categorySelector';
import { Clock } from './types';
import { ContentTracker } from './utils/contentTracker';
import { logger } from './utils/logger';
import { QuotaLedger } from './utils/quotaLedger';
import { RandomSource, createSeededRandom, mathRandom } from './utils/random';

export const QUOTA_FILE = '.quota-ledger.json';
export const POSTED_LOG_FILE = '.posted-items.jsonl';
export const OUTCOME_FILE = '.post-outcomes.json';

/**
 * The stores and policies one agent process works with. Built once at
 * startup and passed to whatever needs them.
 */
export interface AgentContext {
  quota: QuotaLedger;
  tracker: ContentTracker;
  learner: PerformanceLearner;
  selector: CategorySelector;
  random: RandomSource;
  now: Clock;
}

export type ContextSettings = Pick<AppConfig,
  | 'DATA_DIR'
  | 'MONTHLY_READ_LIMIT'
  | 'MONTHLY_WRITE_LIMIT'
  | 'POSTED_RETENTION_DAYS'
  | 'OUTCOME_RETENTION_DAYS'
  | 'LIKE_WEIGHT'
  | 'RESHARE_WEIGHT'
  | 'REPLY_WEIGHT'
  | 'MIN_SAMPLE_SIZE'
  | 'COLLECTION_INTERVAL_HOURS'
  | 'MATURATION_HOURS'
  | 'STALE_AFTER_HOURS'
  | 'EXPLOIT_PROBABILITY'
  | 'TOP_TIER_SIZE'
  | 'RANDOM_SEED'
  | 'CATEGORIES'
  | 'SCHEDULE'>;

export function createAgentContext(settings: ContextSettings, now: Clock = () => new Date()): AgentContext {
  const dataFile = (name: string) => path.join(settings.DATA_DIR, name);
  const random = settings.RANDOM_SEED !== undefined ? createSeededRandom(settings.RANDOM_SEED) : mathRandom;

  const quota = new QuotaLedger({
    filePath: dataFile(QUOTA_FILE),
    caps: { read: settings.MONTHLY_READ_LIMIT, write: settings.MONTHLY_WRITE_LIMIT },
    now,
  });
  const tracker = new ContentTracker({
    filePath: dataFile(POSTED_LOG_FILE),
    retentionDays: settings.POSTED_RETENTION_DAYS,
    now,
  });
  const learner = new PerformanceLearner({
    filePath: dataFile(OUTCOME_FILE),
    now,
    weights: { likes: settings.LIKE_WEIGHT, reshares: settings.RESHARE_WEIGHT, replies: settings.REPLY_WEIGHT },
    minSampleSize: settings.MIN_SAMPLE_SIZE,
    collectionIntervalHours: settings.COLLECTION_INTERVAL_HOURS,
    maturationHours: settings.MATURATION_HOURS,
    staleAfterHours: settings.STALE_AFTER_HOURS,
    retentionDays: settings.OUTCOME_RETENTION_DAYS,
  });
  const selector = new CategorySelector({
    categories: settings.CATEGORIES,
    priorityBuckets: settings.SCHEDULE.priorityBuckets,
    exploitProbability: settings.EXPLOIT_PROBABILITY,
    topTierSize: settings.TOP_TIER_SIZE,
    random,
  });

  return { quota, tracker, learner, selector, random, now };
}

/**
 * Final write of every store; returns false when any of them could not be saved
 */
export function flushAll(context: Pick<AgentContext, 'quota' | 'tracker' | 'learner'>): boolean {
  const results = [context.quota.flush(), context.tracker.flush(), context.learner.flush()];
  const ok = results.every(Boolean);
  if (ok) {
    logger.info('All stores flushed');
  }
  return ok;
}
