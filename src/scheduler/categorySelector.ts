import { CategoryConfig, EventWindow, PriorityBucket } from '../config';
import { LearningInsights } from '../types';
import { logger } from '../utils/logger';
import { RandomSource, pickUniform, pickWeighted } from '../utils/random';
import { formatMinute } from './timeWindowPolicy';

export type SelectionReason =
  | 'event-window'
  | 'learned-top-tier'
  | 'learned-explore'
  | 'priority-bucket'
  | 'random';

export interface CategorySelection {
  category: string;
  reason: SelectionReason;
  // Event window or priority bucket that produced the choice
  source?: string;
}

export interface CategorySelectorOptions {
  categories: readonly CategoryConfig[];
  priorityBuckets: readonly PriorityBucket[];
  exploitProbability: number;
  topTierSize: number;
  random: RandomSource;
}

export class CategorySelector {
  private readonly all: string[];
  private readonly pool: string[];

  constructor(private readonly options: CategorySelectorOptions) {
    this.all = options.categories.map(c => c.name);
    // Event-only categories never enter regular scheduling
    this.pool = options.categories.filter(c => !c.eventOnly).map(c => c.name);
  }

  public regularPool(): string[] {
    return [...this.pool];
  }

  public select(now: Date, insights: LearningInsights | null, window: EventWindow | null): CategorySelection {
    if (window) {
      return this.fromEventWindow(window);
    }
    const learned = insights ? this.fromInsights(insights) : null;
    if (learned) return learned;
    return this.coldStart(now);
  }

  /**
   * Event content follows real-world fixtures, so learned scores are ignored here
   */
  private fromEventWindow(window: EventWindow): CategorySelection {
    const category = pickWeighted(
      window.categories.map(c => ({ value: c.category, weight: c.weight })),
      this.options.random,
    );
    if (!category) {
      throw new Error(`Event window '${window.name}' has no selectable category`);
    }
    logger.info(`EVENT WINDOW MODE (${window.name}) - Selected: ${category}`);
    return { category, reason: 'event-window', source: window.name };
  }

  private fromInsights(insights: LearningInsights): CategorySelection | null {
    const ranked = insights.rankedCategories
      .map(r => r.key)
      .filter(name => this.pool.includes(name));
    const topTier = ranked.slice(0, Math.max(1, this.options.topTierSize));
    if (topTier.length === 0) return null;

    const { random } = this.options;
    if (random.next() < this.options.exploitProbability) {
      const category = pickUniform(topTier, random);
      if (category) {
        logger.info(`  -> Learned top-tier category: ${category} (tier: ${topTier.join(', ')})`);
        return { category, reason: 'learned-top-tier' };
      }
    }
    const category = pickUniform(this.pool, random);
    if (!category) return null;
    logger.info(`  -> Exploration category: ${category}`);
    return { category, reason: 'learned-explore' };
  }

  private coldStart(now: Date): CategorySelection {
    const minute = formatMinute(now);
    const { random } = this.options;
    for (const bucket of this.options.priorityBuckets) {
      if (!bucket.slots.includes(minute)) continue;
      const available = bucket.categories.filter(name => this.pool.includes(name));
      if (available.length > 0 && random.next() < bucket.probability) {
        const category = pickUniform(available, random);
        if (category) {
          logger.info(`  -> ${bucket.name} category for ${minute}: ${category}`);
          return { category, reason: 'priority-bucket', source: bucket.name };
        }
      }
    }
    const category = pickUniform(this.pool.length > 0 ? this.pool : this.all, random);
    if (!category) {
      throw new Error('No categories configured');
    }
    logger.info(`  -> Random category: ${category}`);
    return { category, reason: 'random' };
  }

  /**
   * A different regular category to try when the first one had nothing new
   */
  public selectBackup(exclude: string): string | null {
    const candidates = this.pool.filter(name => name !== exclude);
    return pickUniform(candidates, this.options.random) ?? null;
  }
}
