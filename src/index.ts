import 'dotenv/config';
import * as http from 'http';
import * as path from 'path';
import { config } from './config';
import { AgentContext, createAgentContext, flushAll } from './context';
import { RssFeedSource } from './feeds/rssFeed';
import { TextGenerator } from './llm/textGenerator';
import { SchedulerLoop } from './scheduler/schedulerLoop';
import { TwitterClient } from './twitter/client';
import { PromptContext } from './types';
import { initializeGracefulShutdown, onForcedExit, onShutdown, shutdownManager } from './utils/gracefulShutdown';
import { buildStatusReport, closeStatusServer, startStatusServer } from './utils/healthCheck';
import { acquireLock } from './utils/instanceLock';
import { logger, errorMessage } from './utils/logger';
import { shortenUrl } from './utils/urlShortener';
import { getVersion } from './utils/version';
import { PostWorker } from './workers/postWorker';

const LOCK_FILE = '.agent-lock';

export class FatalStartupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FatalStartupError';
  }
}

function validateEnv(): boolean {
  const missing: string[] = [];
  if (!config.DRY_RUN) {
    if (!config.TWITTER_API_KEY) missing.push('TWITTER_API_KEY');
    if (!config.TWITTER_API_SECRET) missing.push('TWITTER_API_SECRET');
    if (!config.TWITTER_ACCESS_TOKEN) missing.push('TWITTER_ACCESS_TOKEN');
    if (!config.TWITTER_ACCESS_SECRET) missing.push('TWITTER_ACCESS_SECRET');
  }
  if (missing.length > 0) {
    logger.error('Missing required X credentials:');
    missing.forEach(v => logger.error(` - ${v}`));
    logger.error('Set these environment variables and restart.');
    return false;
  }
  if (!config.OPENAI_API_KEY) {
    logger.warn('OPENAI_API_KEY not set; every post will use the templated fallback text');
  }
  logger.info('Environment validated successfully.');
  return true;
}

function logBanner(context: AgentContext) {
  const { SCHEDULE } = config;
  const quota = context.quota.status();
  logger.info('='.repeat(60));
  logger.info(`Matchday news poster v${getVersion()}${config.DRY_RUN ? ' [DRY_RUN]' : ''}`);
  logger.info(`  Regular slots (UTC): ${SCHEDULE.regularSlots.join(', ')}`);
  for (const bucket of SCHEDULE.priorityBuckets) {
    logger.info(`  ${bucket.name} slots: ${bucket.slots.join(', ')} -> ${bucket.categories.join(', ')} (p=${bucket.probability})`);
  }
  for (const w of SCHEDULE.eventWindows) {
    const mix = w.categories.map(c => `${c.category} x${c.weight}`).join(', ');
    logger.info(`  Event window '${w.name}': ${w.start}-${w.end} UTC, slots ${w.slots.join(', ')} -> ${mix}`);
  }
  logger.info(`  Quota ${quota.period}: reads ${quota.read.used}/${quota.read.cap}, writes ${quota.write.used}/${quota.write.cap}`);
  logger.info(`  Post spacing: ${config.MIN_POST_INTERVAL_MINUTES} min, max ${config.MAX_POSTS_PER_24H} per 24h`);
  const stats = context.learner.stats();
  logger.info(`  Learning: ${stats.analyzed}/${stats.minSampleSize} analysed posts, ${stats.pending} awaiting metrics`);
  logger.info('='.repeat(60));
}

async function main() {
  // Global safety net for unhandled rejections
  process.on('unhandledRejection', (reason: unknown) => {
    const msg = reason instanceof Error ? reason.stack || reason.message : String(reason);
    logger.error(`Unhandled promise rejection: ${msg}`);
  });

  if (!validateEnv()) {
    process.exit(1);
  }

  // Ensure only one instance works on the data directory
  let releaseLock: () => void;
  try {
    releaseLock = acquireLock(path.join(config.DATA_DIR, LOCK_FILE));
  } catch (error) {
    logger.error(`${errorMessage(error)}. Exiting.`);
    process.exit(1);
  }

  let context: AgentContext | null = null;
  let loop: SchedulerLoop | null = null;
  let server: http.Server | null = null;

  // Handlers run in registration order
  onShutdown('stop scheduler', async () => {
    if (loop) await loop.stop();
  });
  onShutdown('flush stores', () => {
    if (context) flushAll(context);
  });
  onShutdown('close status server', async () => {
    if (server) await closeStatusServer(server);
  });
  onShutdown('release instance lock', () => releaseLock());
  onForcedExit('flush stores', () => {
    if (context) flushAll(context);
  });
  initializeGracefulShutdown();

  try {
    const ctx = createAgentContext(config);
    context = ctx;

    const twitter = new TwitterClient({
      appKey: config.TWITTER_API_KEY,
      appSecret: config.TWITTER_API_SECRET,
      accessToken: config.TWITTER_ACCESS_TOKEN,
      accessSecret: config.TWITTER_ACCESS_SECRET,
    }, config.EXTERNAL_TIMEOUT_MS);

    if (!config.DRY_RUN) {
      try {
        const me = await twitter.verifyCredentials();
        logger.info(`Authenticated as @${me.username}`);
      } catch (error) {
        throw new FatalStartupError(`X credential check failed: ${errorMessage(error)}`);
      }
    }

    const feeds = new RssFeedSource(config.CATEGORIES, { timeoutMs: config.EXTERNAL_TIMEOUT_MS });
    const generator = config.OPENAI_API_KEY
      ? new TextGenerator({
        apiKey: config.OPENAI_API_KEY,
        baseURL: config.OPENAI_BASE_URL,
        model: config.OPENAI_MODEL,
        timeoutMs: config.EXTERNAL_TIMEOUT_MS,
      })
      : null;
    const generateText = async (prompt: PromptContext): Promise<string> => {
      if (!generator) throw new Error('text generation is not configured');
      return generator.generateText(prompt);
    };

    const worker = new PostWorker({
      collaborators: {
        fetchCandidateItems: category => feeds.fetchCandidateItems(category),
        generateText,
        publish: text => twitter.publish(text),
        shortenUrl: url => shortenUrl(url),
      },
      quota: ctx.quota,
      tracker: ctx.tracker,
      learner: ctx.learner,
      selector: ctx.selector,
      categories: config.CATEGORIES,
      priorityBuckets: config.SCHEDULE.priorityBuckets,
      random: ctx.random,
      retry: { maxRetries: config.PUBLISH_MAX_RETRIES, baseDelayMs: config.RETRY_BASE_DELAY_MS },
      now: ctx.now,
      dryRun: config.DRY_RUN,
      shortenUrls: config.SHORTEN_URLS,
    });

    const scheduler = new SchedulerLoop({
      quota: ctx.quota,
      tracker: ctx.tracker,
      learner: ctx.learner,
      worker,
      fetchEngagement: ids => twitter.fetchEngagement(ids),
      schedule: config.SCHEDULE,
      minPostIntervalMinutes: config.MIN_POST_INTERVAL_MINUTES,
      maxPostsPer24h: config.MAX_POSTS_PER_24H,
      tickIntervalMs: config.TICK_INTERVAL_SECONDS * 1000,
      now: ctx.now,
    });
    loop = scheduler;

    logBanner(ctx);

    const startedAt = ctx.now();
    try {
      server = await startStatusServer(config.PORT, () => buildStatusReport({
        quota: ctx.quota,
        tracker: ctx.tracker,
        learner: ctx.learner,
        loop: scheduler,
        eventWindows: config.SCHEDULE.eventWindows,
        startedAt,
        now: ctx.now,
      }));
    } catch (error) {
      // Posting does not depend on the status surface
      logger.error(`Status server could not start on port ${config.PORT}: ${errorMessage(error)}`);
    }

    scheduler.start();
    logger.info('Agent is running. Press Ctrl+C to stop.');
  } catch (error) {
    logger.error(`Fatal startup error: ${errorMessage(error)}`);
    await shutdownManager.shutdown('fatal startup error', 1);
  }
}

main().catch(error => {
  logger.error(`Error in main execution: ${errorMessage(error)}`);
  process.exit(1);
});
