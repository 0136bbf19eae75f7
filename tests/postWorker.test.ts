/**
 * Tests for the posting pipeline
 */

import * as path from 'path';
import { PerformanceLearner } from '../src/learning/performanceLearner';
import { CategorySelector } from '../src/scheduler/categorySelector';
import { CandidateItem, PromptContext, PublishResult } from '../src/types';
import { ContentTracker, titleFingerprint } from '../src/utils/contentTracker';
import { QuotaLedger } from '../src/utils/quotaLedger';
import { SchedulerLoop } from '../src/scheduler/schedulerLoop';
import { ShutdownManager } from '../src/utils/gracefulShutdown';
import { PostWorker, PostWorkerDeps } from '../src/workers/postWorker';
import { EUROPEAN_NIGHTS, PREMIUM_BUCKET, TEST_CATEGORIES, makeTempDir, manualClock, removeDir, scriptedRandom } from './helpers';

const emojiOf = (name: string) => TEST_CATEGORIES.find(c => c.name === name)?.emoji ?? '';

const item = (slug: string, title: string): CandidateItem => ({
  identifier: `https://news.example.com/${slug}`,
  title,
  sourceUrl: `https://news.example.com/${slug}`,
});

const POLE = item('pole', 'Verstappen takes pole');
const CRASH = item('crash', 'Late crash in qualifying');
const STAGE = item('stage', 'Breakaway wins mountain stage');

describe('PostWorker', () => {
  let dir: string;
  let clock: ReturnType<typeof manualClock>;
  let quota: QuotaLedger;
  let tracker: ContentTracker;
  let learner: PerformanceLearner;
  let feeds: Record<string, CandidateItem[]>;
  let fetchCandidateItems: jest.Mock<Promise<CandidateItem[]>, [string]>;
  let generateText: jest.Mock<Promise<string>, [PromptContext]>;
  let publish: jest.Mock<Promise<PublishResult>, [string]>;
  let shortenUrl: jest.Mock<Promise<string>, [string]>;

  beforeEach(() => {
    dir = makeTempDir();
    // Tuesday, outside every window and priority slot
    clock = manualClock('2025-05-20T09:00:00Z');
    quota = new QuotaLedger({ filePath: path.join(dir, 'quota.json'), caps: { read: 100, write: 500 }, now: clock.now });
    tracker = new ContentTracker({ filePath: path.join(dir, 'posted.jsonl'), now: clock.now });
    learner = new PerformanceLearner({ filePath: path.join(dir, 'outcomes.json'), now: clock.now });
    feeds = { F1: [POLE, CRASH], Cycling: [STAGE] };
    fetchCandidateItems = jest.fn<Promise<CandidateItem[]>, [string]>(async category => feeds[category] ?? []);
    generateText = jest.fn<Promise<string>, [PromptContext]>(async prompt => prompt.user.includes('Verstappen') ? 'Verstappen takes pole' : 'Fresh headline');
    publish = jest.fn<Promise<PublishResult>, [string]>(async () => ({ success: true, postId: '1001' }));
    shortenUrl = jest.fn<Promise<string>, [string]>(async () => 'https://tiny.example/abc');
  });

  afterEach(() => {
    removeDir(dir);
  });

  function makeWorker(draws: number[], overrides: Partial<PostWorkerDeps> = {}) {
    const random = scriptedRandom(draws);
    const selector = new CategorySelector({
      categories: TEST_CATEGORIES,
      priorityBuckets: [PREMIUM_BUCKET],
      exploitProbability: 0.8,
      topTierSize: 3,
      random,
    });
    return new PostWorker({
      collaborators: { fetchCandidateItems, generateText, publish, shortenUrl },
      quota,
      tracker,
      learner,
      selector,
      categories: TEST_CATEGORIES,
      priorityBuckets: [PREMIUM_BUCKET],
      random,
      retry: { maxRetries: 1, baseDelayMs: 0, sleep: async () => undefined },
      now: clock.now,
      ...overrides,
    });
  }

  describe('successful post', () => {
    it('should publish the composed text and record it everywhere', async () => {
      const result = await makeWorker([0]).run(null);
      const text = `${emojiOf('F1')} Verstappen takes pole\n\nhttps://tiny.example/abc`;

      expect(result).toEqual({ status: 'posted', category: 'F1', postId: '1001', text });
      expect(publish).toHaveBeenCalledTimes(1);
      expect(publish).toHaveBeenCalledWith(text);
      expect(shortenUrl).toHaveBeenCalledWith('https://news.example.com/pole');
      expect(quota.status().write.used).toBe(1);
      expect(tracker.isDuplicate('https://news.example.com/pole')).toBe(true);
      expect(tracker.isDuplicate(titleFingerprint('Verstappen takes pole'))).toBe(true);

      const [record] = learner.getRecords();
      expect(record).toMatchObject({ postId: '1001', category: 'F1', timeSlot: '09:00', text });
      expect(record.attributes).toMatchObject({ hasEmoji: true, hasLink: true, hasQuestion: false });
    });

    it('should debit quota, then mark the item, then record the outcome', async () => {
      const consume = jest.spyOn(quota, 'consume');
      const markPosted = jest.spyOn(tracker, 'markPosted');
      const record = jest.spyOn(learner, 'record');

      await makeWorker([0]).run(null);

      const [consumedAt] = consume.mock.invocationCallOrder;
      const [markedAt] = markPosted.mock.invocationCallOrder;
      const [recordedAt] = record.mock.invocationCallOrder;
      expect(consumedAt).toBeLessThan(markedAt);
      expect(markedAt).toBeLessThan(recordedAt);
    });

    it('should use the engaging prompt for a global category', async () => {
      await makeWorker([0]).run(null);
      const [[prompt]] = generateText.mock.calls;
      expect(prompt.system).toBe('Create viral Twitter content that drives engagement.');
      expect(prompt.temperature).toBe(0.8);
    });

    it('should use the professional prompt for a business category', async () => {
      feeds.Crypto = [item('etf', 'Bitcoin ETF inflows rise')];
      // Uniform pick over F1, Cycling, Crypto, Tesla
      const result = await makeWorker([0.5]).run(null);

      expect(result.category).toBe('Crypto');
      const [[prompt]] = generateText.mock.calls;
      expect(prompt.system).toBe('You create professional content for Crypto targeting business professionals.');
      expect(prompt.temperature).toBe(0.7);
    });

    it('should post the raw link when shortening is off', async () => {
      const result = await makeWorker([0], { shortenUrls: false }).run(null);
      expect(shortenUrl).not.toHaveBeenCalled();
      expect(result.text).toBe(`${emojiOf('F1')} Verstappen takes pole\n\nhttps://news.example.com/pole`);
    });
  });

  describe('candidate selection', () => {
    it('should skip items that were already posted', async () => {
      tracker.markPosted(POLE.identifier, titleFingerprint(POLE.title));
      await makeWorker([0]).run(null);

      expect(publish).toHaveBeenCalledWith(`${emojiOf('F1')} Fresh headline\n\nhttps://tiny.example/abc`);
    });

    it('should skip a syndicated copy of a posted headline', async () => {
      tracker.markPosted('https://other.example.com/story', titleFingerprint('VERSTAPPEN takes pole!'));
      await makeWorker([0]).run(null);

      expect(generateText).toHaveBeenCalledTimes(1);
      expect(generateText.mock.calls[0][0].user).toContain('Late crash in qualifying');
    });

    it('should try a backup category when the first has nothing new', async () => {
      feeds.F1 = [];
      // F1 by the first draw, then Cycling from the remaining pool
      const result = await makeWorker([0, 0]).run(null);

      expect(fetchCandidateItems.mock.calls).toEqual([['F1'], ['Cycling']]);
      expect(result.status).toBe('posted');
      expect(result.category).toBe('Cycling');
      expect(result.text).toBe(`${emojiOf('Cycling')} Fresh headline\n\nhttps://tiny.example/abc`);
    });

    it('should use the other window category as the backup inside an event window', async () => {
      clock.set('2025-05-20T18:10:00Z');
      feeds['Champions League'] = [item('ucl', 'Semi-final line-ups confirmed')];
      const result = await makeWorker([0.75]).run(EUROPEAN_NIGHTS);

      expect(fetchCandidateItems.mock.calls).toEqual([['Europa League'], ['Champions League']]);
      expect(result.category).toBe('Champions League');
    });

    it('should report no content when neither category has anything new', async () => {
      feeds = {};
      const result = await makeWorker([0, 0]).run(null);

      expect(result).toEqual({ status: 'no-content', category: 'Cycling' });
      expect(generateText).not.toHaveBeenCalled();
    });

    it('should treat a failing feed fetch as no items', async () => {
      fetchCandidateItems.mockRejectedValueOnce(new Error('ENOTFOUND'));
      const result = await makeWorker([0, 0]).run(null);
      expect(result.category).toBe('Cycling');
      expect(result.status).toBe('posted');
    });
  });

  describe('text generation', () => {
    it('should fall back to templated text when generation fails', async () => {
      generateText.mockRejectedValue(new Error('generate timed out after 15000ms'));
      await makeWorker([0]).run(null);

      expect(publish).toHaveBeenCalledWith(
        `${emojiOf('F1')} Breaking: Verstappen takes pole... What's your take on this?\n\nhttps://tiny.example/abc`,
      );
    });
  });

  describe('publish outcomes', () => {
    it('should move to the next candidate after a duplicate rejection', async () => {
      publish
        .mockResolvedValueOnce({ success: false, errorKind: 'duplicate', message: 'Status is a duplicate.' })
        .mockResolvedValueOnce({ success: true, postId: '1002' });
      const result = await makeWorker([0]).run(null);

      expect(publish).toHaveBeenCalledTimes(2);
      expect(result).toMatchObject({ status: 'posted', postId: '1002' });
      expect(quota.status().write.used).toBe(1);
      expect(tracker.isDuplicate(POLE.identifier)).toBe(false);
      expect(tracker.isDuplicate(CRASH.identifier)).toBe(true);
    });

    it('should remember rejected items for the rest of the process', async () => {
      publish
        .mockResolvedValueOnce({ success: false, errorKind: 'duplicate' })
        .mockResolvedValueOnce({ success: true, postId: '1002' });
      const worker = makeWorker([0, 0, 0]);
      await worker.run(null);

      clock.advanceMinutes(120);
      feeds.Cycling = [];
      const second = await worker.run(null);
      expect(second).toEqual({ status: 'no-content', category: 'Cycling' });
      expect(publish).toHaveBeenCalledTimes(2);
    });

    it('should abort the slot when publishing is not permitted', async () => {
      publish.mockResolvedValue({ success: false, errorKind: 'permission_denied', message: '403 Forbidden' });
      const result = await makeWorker([0]).run(null);

      expect(result).toEqual({ status: 'aborted', category: 'F1', reason: '403 Forbidden' });
      expect(publish).toHaveBeenCalledTimes(1);
      expect(quota.status().write.used).toBe(0);
      expect(tracker.size()).toBe(0);
      expect(learner.getRecords()).toEqual([]);
    });

    it('should mark the write quota exhausted on a usage cap rejection', async () => {
      publish.mockResolvedValue({ success: false, errorKind: 'unknown', usageCapExceeded: true, message: 'UsageCapExceeded' });
      const result = await makeWorker([0]).run(null);

      expect(result.status).toBe('quota-exhausted');
      expect(quota.status().write).toEqual({ used: 500, remaining: 0, cap: 500 });
      expect(publish).toHaveBeenCalledTimes(1);
    });

    it('should report a failure after retries run out', async () => {
      publish.mockResolvedValue({ success: false, errorKind: 'transient', message: '503' });
      const result = await makeWorker([0]).run(null);

      expect(result).toEqual({ status: 'failed', category: 'F1', reason: '503' });
      expect(publish).toHaveBeenCalledTimes(2);
      expect(quota.status().write.used).toBe(0);
    });

    it('should stop retrying once the run is aborted', async () => {
      publish.mockResolvedValue({ success: false, errorKind: 'transient', message: '503' });
      const controller = new AbortController();
      const worker = makeWorker([0], { retry: { maxRetries: 3, baseDelayMs: 60_000 } });
      setTimeout(() => controller.abort(), 10);

      const result = await worker.run(null, controller.signal);

      expect(result).toEqual({ status: 'failed', category: 'F1', reason: '503' });
      expect(publish).toHaveBeenCalledTimes(1);
    });

    it('should let shutdown flush the stores while a publish is backing off', async () => {
      publish.mockResolvedValue({ success: false, errorKind: 'transient', message: '503' });
      const loop = new SchedulerLoop({
        quota,
        tracker,
        learner,
        worker: makeWorker([0], { retry: { maxRetries: 3, baseDelayMs: 5000 } }),
        fetchEngagement: async () => ({}),
        schedule: { regularSlots: ['09:00'], eventWindows: [] },
        minPostIntervalMinutes: 90,
        maxPostsPer24h: 17,
        tickIntervalMs: 30_000,
        now: clock.now,
      });
      const calls: string[] = [];
      const exit = jest.fn<void, [number]>(code => {
        calls.push(`exit(${code})`);
      });
      const manager = new ShutdownManager({ exit, timeoutMs: 1000 });
      manager.registerHandler('stop scheduler', () => loop.stop());
      manager.registerHandler('flush stores', () => {
        calls.push('flush');
      });

      const ticking = loop.tick();
      // First attempt has failed and the 5 s backoff is running
      await new Promise(resolve => setTimeout(resolve, 20));
      await manager.shutdown('SIGTERM');

      expect(calls).toEqual(['flush', 'exit(0)']);
      expect(await ticking).toEqual({ action: 'post', post: { status: 'failed', category: 'F1', reason: '503' } });
      expect(publish).toHaveBeenCalledTimes(1);
    });

    it('should not generate anything once the write quota is spent', async () => {
      quota = new QuotaLedger({ filePath: path.join(dir, 'spent.json'), caps: { read: 100, write: 0 }, now: clock.now });
      const result = await makeWorker([0], { quota }).run(null);

      expect(result).toEqual({ status: 'quota-exhausted', category: 'F1' });
      expect(generateText).not.toHaveBeenCalled();
      expect(publish).not.toHaveBeenCalled();
    });
  });

  describe('dry run', () => {
    it('should compose without publishing or recording', async () => {
      const result = await makeWorker([0], { dryRun: true }).run(null);

      expect(result).toEqual({
        status: 'dry-run',
        category: 'F1',
        text: `${emojiOf('F1')} Verstappen takes pole\n\nhttps://tiny.example/abc`,
      });
      expect(publish).not.toHaveBeenCalled();
      expect(quota.status().write.used).toBe(0);
      expect(tracker.size()).toBe(0);
    });
  });
});
