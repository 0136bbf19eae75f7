import { CategoryConfig, EventWindow, PriorityBucket } from '../config';
import {
  DEFAULT_STYLE,
  buildPrompt,
  composePost,
  contextualCta,
  fallbackText,
} from '../content/composer';
import { extractAttributes } from '../learning/contentAttributes';
import { PerformanceLearner } from '../learning/performanceLearner';
import { CategorySelector } from '../scheduler/categorySelector';
import { describeMoment, formatMinute } from '../scheduler/timeWindowPolicy';
import { CandidateItem, Clock, Collaborators } from '../types';
import { ContentTracker, titleFingerprint } from '../utils/contentTracker';
import { logger, errorMessage } from '../utils/logger';
import { QuotaLedger } from '../utils/quotaLedger';
import { RandomSource } from '../utils/random';
import { RetryOptions, publishWithRetry } from '../utils/retry';

export type PostCollaborators = Pick<Collaborators, 'fetchCandidateItems' | 'generateText' | 'publish' | 'shortenUrl'>;

export interface PostWorkerDeps {
  collaborators: PostCollaborators;
  quota: QuotaLedger;
  tracker: ContentTracker;
  learner: PerformanceLearner;
  selector: CategorySelector;
  categories: readonly CategoryConfig[];
  priorityBuckets: readonly PriorityBucket[];
  random: RandomSource;
  retry: RetryOptions;
  now?: Clock;
  dryRun?: boolean;
  shortenUrls?: boolean;
}

export type PostStatus = 'posted' | 'dry-run' | 'no-content' | 'quota-exhausted' | 'aborted' | 'failed';

export interface PostAttemptResult {
  status: PostStatus;
  category: string;
  postId?: string;
  text?: string;
  reason?: string;
}

export class PostWorker {
  private readonly now: Clock;
  private readonly byName: Map<string, CategoryConfig>;
  // Items the platform rejected as duplicate content during this process
  private readonly rejected = new Set<string>();

  constructor(private readonly deps: PostWorkerDeps) {
    this.now = deps.now || (() => new Date());
    this.byName = new Map(deps.categories.map(c => [c.name, c]));
  }

  private isPremiumSlot(now: Date): boolean {
    const minute = formatMinute(now);
    return this.deps.priorityBuckets.some(b => b.premiumTone && b.slots.includes(minute));
  }

  private isFresh(item: CandidateItem): boolean {
    const fingerprint = titleFingerprint(item.title);
    if (this.rejected.has(item.identifier) || this.rejected.has(fingerprint)) return false;
    return !this.deps.tracker.isDuplicate(item.identifier) && !this.deps.tracker.isDuplicate(fingerprint);
  }

  private async freshCandidates(category: string): Promise<CandidateItem[]> {
    let items: CandidateItem[];
    try {
      items = await this.deps.collaborators.fetchCandidateItems(category);
    } catch (err) {
      logger.warn(`Fetching candidates for ${category} failed: ${errorMessage(err)}`);
      return [];
    }
    const fresh = items.filter(item => this.isFresh(item));
    if (items.length > 0 && fresh.length === 0) {
      logger.info(`All ${items.length} item(s) for ${category} were already posted`);
    }
    return fresh;
  }

  private backupFor(category: string, window: EventWindow | null): string | null {
    if (window) {
      return window.categories.map(c => c.category).find(name => name !== category) ?? null;
    }
    return this.deps.selector.selectBackup(category);
  }

  private async generate(item: CandidateItem, category: CategoryConfig, premium: boolean, useQuestion: boolean): Promise<string> {
    const cta = contextualCta(category, this.deps.random);
    const prompt = buildPrompt(item.title, category, premium, cta, { useEmoji: true, useQuestion });
    try {
      return await this.deps.collaborators.generateText(prompt);
    } catch (err) {
      logger.warn(`Text generation failed, using fallback text: ${errorMessage(err)}`);
      return fallbackText(item.title, cta);
    }
  }

  /**
   * One posting attempt for the current slot. At most one item is published.
   * Aborting the signal cuts publish retries short.
   */
  public async run(window: EventWindow | null, signal?: AbortSignal): Promise<PostAttemptResult> {
    const { quota, tracker, learner, selector } = this.deps;
    const now = this.now();
    const insights = learner.getInsights();
    const selection = selector.select(now, insights, window);
    let categoryName = selection.category;
    logger.info(`Posting slot ${describeMoment(now)}: category ${categoryName} (${selection.reason})`);

    let candidates = await this.freshCandidates(categoryName);
    if (candidates.length === 0) {
      const backup = this.backupFor(categoryName, window);
      if (backup) {
        logger.info(`No new items for ${categoryName}; trying backup category ${backup}`);
        categoryName = backup;
        candidates = await this.freshCandidates(backup);
      }
    }
    const category = this.byName.get(categoryName);
    if (!category || candidates.length === 0) {
      logger.info(`No new articles to post for ${categoryName}`);
      return { status: 'no-content', category: categoryName };
    }

    const style = insights?.styleRecommendations[categoryName] ?? DEFAULT_STYLE;
    const premium = category.group === 'business' || this.isPremiumSlot(now);

    for (const item of candidates) {
      if (!quota.canConsume('write')) {
        return { status: 'quota-exhausted', category: categoryName };
      }

      const text = await this.generate(item, category, premium, style.useQuestion);
      const url = this.deps.shortenUrls === false ? item.sourceUrl : await this.deps.collaborators.shortenUrl(item.sourceUrl);
      const full = composePost({ text, category, url, style, random: this.deps.random });

      if (this.deps.dryRun) {
        logger.info(`[DRY_RUN] Would post (${full.length} chars): ${full.replace(/\n/g, ' ')}`);
        return { status: 'dry-run', category: categoryName, text: full };
      }

      const { result, attempts } = await publishWithRetry(
        t => this.deps.collaborators.publish(t),
        full,
        { ...this.deps.retry, signal },
      );

      if (result.success) {
        quota.consume('write');
        tracker.markPosted(item.identifier, titleFingerprint(item.title));
        if (result.postId) {
          learner.record(result.postId, full, categoryName, formatMinute(now), extractAttributes(full));
        } else {
          logger.warn('Publish succeeded without a post id; engagement for this post cannot be tracked');
        }
        logger.info(`POSTED successfully - ${categoryName}: ${item.title.slice(0, 50)}... (attempts: ${attempts})`);
        return { status: 'posted', category: categoryName, postId: result.postId, text: full };
      }

      if (result.usageCapExceeded) {
        quota.markExhausted('write');
        return { status: 'quota-exhausted', category: categoryName, reason: result.message };
      }
      if (result.errorKind === 'duplicate') {
        this.rejected.add(item.identifier);
        this.rejected.add(titleFingerprint(item.title));
        logger.info(`Platform rejected '${item.title.slice(0, 50)}' as duplicate content; skipping it`);
        continue;
      }
      if (result.errorKind === 'permission_denied') {
        logger.error(`Publishing not permitted; aborting this slot: ${result.message || 'permission denied'}`);
        return { status: 'aborted', category: categoryName, reason: result.message };
      }
      return { status: 'failed', category: categoryName, reason: result.message };
    }

    logger.info(`No publishable items left for ${categoryName}`);
    return { status: 'no-content', category: categoryName };
  }
}
