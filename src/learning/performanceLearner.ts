/**
 * Performance learner
 *
 * Keeps one outcome record per published post. Once a post has matured,
 * a collection pass fetches its engagement in batches and the insights
 * (category and time-slot rankings, style recommendations) are recomputed
 * from the whole log. Insights stay null until enough posts are analysed.
 */

import { z } from 'zod';
import { logger, errorMessage } from '../utils/logger';
import { atomicWriteJsonSync, safeReadJsonSync } from '../utils/safeFileOps';
import { PersistenceGuard, PersistenceMode } from '../utils/persistence';
import { QuotaLedger } from '../utils/quotaLedger';
import {
  Clock,
  ContentAttributes,
  EngagementMetrics,
  LearningInsights,
  PostOutcomeRecord,
  RankedScore,
  StyleRecommendation,
} from '../types';

const HOUR_MS = 60 * 60 * 1000;

const MetricsSchema = z.object({
  likes: z.number().nonnegative(),
  reshares: z.number().nonnegative(),
  replies: z.number().nonnegative(),
  impressions: z.number().nonnegative(),
});

const OutcomeSchema = z.object({
  postId: z.string().min(1),
  text: z.string(),
  category: z.string(),
  postedAt: z.string(),
  timeSlot: z.string(),
  attributes: z.object({
    hasEmoji: z.boolean(),
    hasQuestion: z.boolean(),
    hasHashtag: z.boolean(),
    hasLink: z.boolean(),
    wordCount: z.number(),
    charCount: z.number(),
  }),
  engagement: MetricsSchema.optional(),
  engagementRate: z.number().optional(),
  collectedAt: z.string().optional(),
});

const RankedSchema = z.object({ key: z.string(), avgEngagementRate: z.number(), posts: z.number() });

const LearnerStateSchema = z.object({
  records: z.array(OutcomeSchema),
  lastCollectionAt: z.string().nullable(),
  insights: z.object({
    perCategoryAvgEngagement: z.record(z.number()),
    rankedCategories: z.array(RankedSchema),
    rankedTimeSlots: z.array(RankedSchema),
    styleRecommendations: z.record(z.object({ useEmoji: z.boolean(), useQuestion: z.boolean() })),
    lastUpdated: z.string(),
    sampleSize: z.number(),
  }).nullable(),
});

type LearnerState = z.infer<typeof LearnerStateSchema>;

export interface EngagementWeights {
  likes: number;
  reshares: number;
  replies: number;
}

export const DEFAULT_WEIGHTS: EngagementWeights = { likes: 1, reshares: 2, replies: 3 };

export type FetchMetrics = (postIds: string[]) => Promise<Record<string, EngagementMetrics>>;

export type ReadQuota = Pick<QuotaLedger, 'canConsume' | 'consume'>;

export interface PerformanceLearnerOptions {
  filePath: string;
  now?: Clock;
  weights?: EngagementWeights;
  minSampleSize?: number;
  collectionIntervalHours?: number;
  maturationHours?: number;
  // Posts older than this are no longer chased for metrics
  staleAfterHours?: number;
  batchSize?: number;
  retentionDays?: number;
}

export interface CollectionSummary {
  requested: number;
  updated: number;
  batches: number;
  failed: boolean;
  insights: LearningInsights | null;
}

export function engagementRate(m: EngagementMetrics, weights: EngagementWeights = DEFAULT_WEIGHTS): number {
  if (m.impressions <= 0) return 0;
  return (m.likes * weights.likes + m.reshares * weights.reshares + m.replies * weights.replies) / m.impressions;
}

interface Bucket {
  sum: number;
  count: number;
  latest: number;
}

function rank(records: PostOutcomeRecord[], keyOf: (r: PostOutcomeRecord) => string): RankedScore[] {
  const buckets = new Map<string, Bucket>();
  for (const r of records) {
    const key = keyOf(r);
    const b = buckets.get(key) || { sum: 0, count: 0, latest: 0 };
    b.sum += r.engagementRate ?? 0;
    b.count += 1;
    b.latest = Math.max(b.latest, new Date(r.postedAt).getTime());
    buckets.set(key, b);
  }
  return Array.from(buckets.entries())
    .map(([key, b]) => ({ key, avg: b.sum / b.count, posts: b.count, latest: b.latest }))
    .sort((a, b) => {
      if (b.avg !== a.avg) return b.avg - a.avg;
      // Ties: most recently posted first, then name, never map order
      if (b.latest !== a.latest) return b.latest - a.latest;
      return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
    })
    .map(({ key, avg, posts }) => ({ key, avgEngagementRate: avg, posts }));
}

function mean(records: PostOutcomeRecord[]): number {
  if (records.length === 0) return 0;
  return records.reduce((sum, r) => sum + (r.engagementRate ?? 0), 0) / records.length;
}

type StyleAttribute = 'hasEmoji' | 'hasQuestion';

/**
 * Whether posts with the attribute outperform posts without it. Needs both
 * groups to be present; otherwise undefined.
 */
function attributeWins(records: PostOutcomeRecord[], attribute: StyleAttribute): boolean | undefined {
  const withAttr = records.filter(r => r.attributes[attribute]);
  const without = records.filter(r => !r.attributes[attribute]);
  if (withAttr.length === 0 || without.length === 0) return undefined;
  return mean(withAttr) >= mean(without);
}

export interface InsightOptions {
  minSampleSize: number;
  now: Date;
}

/**
 * Derive insights from a snapshot of the outcome log. Deterministic for a
 * given input; null below the minimum sample size.
 */
export function computeInsights(records: readonly PostOutcomeRecord[], options: InsightOptions): LearningInsights | null {
  const analyzed = records.filter(r => r.engagementRate !== undefined);
  if (analyzed.length < options.minSampleSize) return null;

  const rankedCategories = rank(analyzed, r => r.category);
  const rankedTimeSlots = rank(analyzed, r => r.timeSlot);

  const perCategoryAvgEngagement: Record<string, number> = {};
  const styleRecommendations: Record<string, StyleRecommendation> = {};
  const overallEmoji = attributeWins(analyzed, 'hasEmoji');
  const overallQuestion = attributeWins(analyzed, 'hasQuestion');

  for (const entry of rankedCategories) {
    perCategoryAvgEngagement[entry.key] = entry.avgEngagementRate;
    const inCategory = analyzed.filter(r => r.category === entry.key);
    styleRecommendations[entry.key] = {
      useEmoji: attributeWins(inCategory, 'hasEmoji') ?? overallEmoji ?? true,
      useQuestion: attributeWins(inCategory, 'hasQuestion') ?? overallQuestion ?? true,
    };
  }

  return {
    perCategoryAvgEngagement,
    rankedCategories,
    rankedTimeSlots,
    styleRecommendations,
    lastUpdated: options.now.toISOString(),
    sampleSize: analyzed.length,
  };
}

export class PerformanceLearner {
  private records: PostOutcomeRecord[] = [];
  private lastCollectionAt: Date | null = null;
  private insights: LearningInsights | null = null;
  private readonly filePath: string;
  private readonly now: Clock;
  private readonly weights: EngagementWeights;
  private readonly minSampleSize: number;
  private readonly collectionIntervalMs: number;
  private readonly maturationMs: number;
  private readonly staleAfterMs: number;
  private readonly batchSize: number;
  private readonly retentionMs: number;
  private readonly persistence = new PersistenceGuard('outcome log');

  constructor(options: PerformanceLearnerOptions) {
    this.filePath = options.filePath;
    this.now = options.now || (() => new Date());
    this.weights = options.weights || DEFAULT_WEIGHTS;
    this.minSampleSize = options.minSampleSize ?? 5;
    this.collectionIntervalMs = (options.collectionIntervalHours ?? 12) * HOUR_MS;
    this.maturationMs = (options.maturationHours ?? 24) * HOUR_MS;
    this.staleAfterMs = (options.staleAfterHours ?? 7 * 24) * HOUR_MS;
    this.batchSize = Math.max(1, options.batchSize ?? 100);
    this.retentionMs = (options.retentionDays ?? 90) * 24 * HOUR_MS;
    this.loadState();
  }

  private loadState() {
    const raw = safeReadJsonSync(this.filePath);
    if (raw === undefined) return;
    const parsed = LearnerStateSchema.safeParse(raw);
    if (!parsed.success) {
      logger.error(`Outcome log at ${this.filePath} is malformed; starting with an empty log: ${parsed.error.message}`);
      return;
    }
    this.records = parsed.data.records;
    this.lastCollectionAt = parsed.data.lastCollectionAt ? new Date(parsed.data.lastCollectionAt) : null;
    this.insights = parsed.data.insights;
    logger.info(`Loaded ${this.records.length} post outcome record(s); insights ${this.insights ? `from ${this.insights.sampleSize} analysed posts` : 'not yet available'}`);
  }

  private snapshot(): LearnerState {
    return {
      records: this.records,
      lastCollectionAt: this.lastCollectionAt ? this.lastCollectionAt.toISOString() : null,
      insights: this.insights,
    };
  }

  private save(): boolean {
    return this.persistence.write(() => atomicWriteJsonSync(this.filePath, this.snapshot()));
  }

  /**
   * Append an outcome record for a fresh post. A post id that is already
   * recorded is rejected so aggregates never count it twice.
   */
  public record(postId: string, text: string, category: string, timeSlot: string, attributes: ContentAttributes): boolean {
    if (this.records.some(r => r.postId === postId)) {
      logger.warn(`Outcome for post ${postId} already recorded; ignoring duplicate record`);
      return false;
    }
    const now = this.now();
    const cutoff = now.getTime() - this.retentionMs;
    this.records = this.records.filter(r => new Date(r.postedAt).getTime() >= cutoff);
    this.records.push({ postId, text, category, postedAt: now.toISOString(), timeSlot, attributes });
    this.save();
    return true;
  }

  /**
   * Matured, not yet stale records still waiting for metrics
   */
  public pendingRecords(): PostOutcomeRecord[] {
    const now = this.now().getTime();
    return this.records.filter(r => {
      if (r.engagement) return false;
      const age = now - new Date(r.postedAt).getTime();
      return age >= this.maturationMs && age <= this.staleAfterMs;
    });
  }

  public shouldCollect(quota: Pick<QuotaLedger, 'canConsume'>): boolean {
    if (this.lastCollectionAt && this.now().getTime() - this.lastCollectionAt.getTime() < this.collectionIntervalMs) {
      return false;
    }
    if (this.pendingRecords().length === 0) return false;
    return quota.canConsume('read');
  }

  /**
   * Fetch metrics for pending posts, one read unit per batch, then rebuild
   * insights. A failing batch changes nothing and ends the pass; the next
   * attempt waits for the regular collection interval.
   */
  public async collectAndAnalyze(fetchMetrics: FetchMetrics, quota: ReadQuota): Promise<CollectionSummary> {
    this.lastCollectionAt = this.now();
    const pending = this.pendingRecords();
    const summary: CollectionSummary = { requested: 0, updated: 0, batches: 0, failed: false, insights: this.insights };

    for (let i = 0; i < pending.length; i += this.batchSize) {
      const batch = pending.slice(i, i + this.batchSize).map(r => r.postId);
      if (!quota.consume('read')) {
        logger.info(`Read quota exhausted; ${pending.length - i} post(s) left for a later collection`);
        break;
      }
      let metrics: Record<string, EngagementMetrics>;
      try {
        metrics = await fetchMetrics(batch);
      } catch (error) {
        logger.error(`Engagement collection failed for a batch of ${batch.length} post(s): ${errorMessage(error)}`);
        summary.failed = true;
        break;
      }
      summary.batches += 1;
      summary.requested += batch.length;
      summary.updated += this.applyMetrics(batch, metrics);
    }

    this.insights = computeInsights(this.records, { minSampleSize: this.minSampleSize, now: this.now() });
    summary.insights = this.insights;
    this.save();

    const analyzed = this.records.filter(r => r.engagementRate !== undefined).length;
    if (this.insights) {
      const top = this.insights.rankedCategories.slice(0, 3).map(r => `${r.key} ${(r.avgEngagementRate * 100).toFixed(2)}%`);
      logger.info(`Insights updated from ${this.insights.sampleSize} posts. Top categories: ${top.join(', ')}`);
    } else {
      logger.info(`Not enough analysed posts for insights yet (${analyzed}/${this.minSampleSize})`);
    }
    return summary;
  }

  private applyMetrics(batch: string[], metrics: Record<string, EngagementMetrics>): number {
    const collectedAt = this.now().toISOString();
    const wanted = new Set(batch);
    let updated = 0;
    this.records = this.records.map(r => {
      if (!wanted.has(r.postId) || r.engagement) return r;
      const parsed = MetricsSchema.safeParse(metrics[r.postId]);
      if (!parsed.success || parsed.data.impressions <= 0) return r;
      updated++;
      return {
        ...r,
        engagement: parsed.data,
        engagementRate: engagementRate(parsed.data, this.weights),
        collectedAt,
      };
    });
    return updated;
  }

  public getInsights(): LearningInsights | null {
    return this.insights;
  }

  public getRecords(): PostOutcomeRecord[] {
    return this.records.map(r => ({ ...r }));
  }

  public stats() {
    const analyzed = this.records.filter(r => r.engagementRate !== undefined).length;
    return {
      records: this.records.length,
      analyzed,
      pending: this.pendingRecords().length,
      minSampleSize: this.minSampleSize,
      lastCollectionAt: this.lastCollectionAt ? this.lastCollectionAt.toISOString() : null,
    };
  }

  public persistenceMode(): PersistenceMode {
    return this.persistence.getMode();
  }

  public flush(): boolean {
    return this.persistence.flush(() => atomicWriteJsonSync(this.filePath, this.snapshot()));
  }
}
