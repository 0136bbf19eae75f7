import { ScheduleConfig } from '../config';
import { FetchMetrics, PerformanceLearner } from '../learning/performanceLearner';
import { Clock } from '../types';
import { ContentTracker } from '../utils/contentTracker';
import { logger, errorMessage } from '../utils/logger';
import { QuotaLedger } from '../utils/quotaLedger';
import { PostAttemptResult, PostWorker } from '../workers/postWorker';
import { describeMoment, isPostingDue, minIntervalElapsed, minuteKey } from './timeWindowPolicy';

export type LoopState = 'idle' | 'checking' | 'posting' | 'analyzing' | 'draining' | 'stopped';

export interface SchedulerLoopDeps {
  quota: QuotaLedger;
  tracker: ContentTracker;
  learner: PerformanceLearner;
  worker: Pick<PostWorker, 'run'>;
  fetchEngagement: FetchMetrics;
  schedule: Pick<ScheduleConfig, 'regularSlots' | 'eventWindows'>;
  minPostIntervalMinutes: number;
  maxPostsPer24h: number;
  tickIntervalMs: number;
  now?: Clock;
}

export type TickResult =
  | { action: 'post'; post: PostAttemptResult }
  | { action: 'analyze'; updated: number }
  | { action: 'none'; reason: string }
  | { action: 'error'; message: string };

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Drives the agent: wakes on a fixed interval, evaluates each calendar
 * minute once, and runs at most one posting or analysis step per wake.
 * Ticks are chained with setTimeout so two never overlap.
 */
export class SchedulerLoop {
  private state: LoopState = 'idle';
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<TickResult> | null = null;
  private lastEvaluatedMinute: string | null = null;
  private lastPruneDay: string | null = null;
  private running = false;
  private abort: AbortController | null = null;
  private readonly now: Clock;

  constructor(private readonly deps: SchedulerLoopDeps) {
    this.now = deps.now || (() => new Date());
  }

  public getState(): LoopState {
    return this.state;
  }

  private isShuttingDown(): boolean {
    return this.state === 'draining' || this.state === 'stopped';
  }

  /**
   * Reason posting is blocked at this moment, or null when all gates pass
   */
  private postingBlockedBy(now: Date): string | null {
    const { quota, tracker } = this.deps;
    if (!quota.canConsume('write')) return 'write quota exhausted';
    if (!minIntervalElapsed(now, tracker.lastPostedAt(), this.deps.minPostIntervalMinutes)) {
      return `minimum interval of ${this.deps.minPostIntervalMinutes} min not elapsed`;
    }
    const recent = tracker.countPostedSince(new Date(now.getTime() - DAY_MS));
    if (recent >= this.deps.maxPostsPer24h) {
      return `24-hour post limit reached (${recent}/${this.deps.maxPostsPer24h})`;
    }
    return null;
  }

  private pruneDaily(now: Date) {
    const day = now.toISOString().slice(0, 10);
    if (this.lastPruneDay === day) return;
    this.lastPruneDay = day;
    this.deps.tracker.prune();
  }

  private async step(): Promise<TickResult> {
    const now = this.now();
    const key = minuteKey(now);
    if (key === this.lastEvaluatedMinute) {
      return { action: 'none', reason: 'minute already evaluated' };
    }
    this.lastEvaluatedMinute = key;
    this.pruneDaily(now);

    const due = isPostingDue(now, this.deps.schedule);
    if (due.due) {
      const blocked = this.postingBlockedBy(now);
      if (blocked) {
        logger.info(`Posting slot ${describeMoment(now)} skipped: ${blocked}`);
      } else {
        this.state = 'posting';
        const post = await this.deps.worker.run(due.window, this.abort?.signal);
        return { action: 'post', post };
      }
    }

    if (this.deps.learner.shouldCollect(this.deps.quota)) {
      this.state = 'analyzing';
      const summary = await this.deps.learner.collectAndAnalyze(this.deps.fetchEngagement, this.deps.quota);
      return { action: 'analyze', updated: summary.updated };
    }
    return { action: 'none', reason: due.due ? 'posting blocked' : 'not a posting slot' };
  }

  /**
   * One wake-up. Errors are logged and reported, never thrown.
   */
  public async tick(): Promise<TickResult> {
    if (this.isShuttingDown()) return { action: 'none', reason: 'stopped' };
    if (this.inFlight) return { action: 'none', reason: 'tick in progress' };
    this.state = 'checking';
    this.abort = new AbortController();
    const run = this.step()
      .catch((error: unknown): TickResult => {
        logger.error(`Scheduler tick failed: ${errorMessage(error)}`);
        return { action: 'error', message: errorMessage(error) };
      })
      .finally(() => {
        this.inFlight = null;
        this.abort = null;
        if (!this.isShuttingDown()) this.state = 'idle';
      });
    this.inFlight = run;
    return run;
  }

  private scheduleNext(delayMs: number) {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick()
        .then(() => {
          if (this.running) this.scheduleNext(this.deps.tickIntervalMs);
        })
        .catch((error: unknown) => logger.error(`Unexpected scheduler failure: ${errorMessage(error)}`));
    }, delayMs);
  }

  public start() {
    if (this.running) return;
    this.running = true;
    this.state = 'idle';
    logger.info(`Scheduler started; checking every ${Math.round(this.deps.tickIntervalMs / 1000)}s`);
    this.scheduleNext(0);
  }

  /**
   * Stop waking up, cut any publish backoff short and wait for the step in
   * progress to finish
   */
  public async stop(): Promise<void> {
    if (this.state === 'stopped') return;
    this.running = false;
    this.state = 'draining';
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      this.abort?.abort();
      logger.info('Waiting for the current scheduler step to finish...');
      await this.inFlight;
    }
    this.state = 'stopped';
    logger.info('Scheduler stopped');
  }
}
