/**
 * Tests for the status report and its HTTP endpoint
 */

import * as http from 'http';
import * as path from 'path';
import { PerformanceLearner } from '../src/learning/performanceLearner';
import { LearningInsights } from '../src/types';
import { ContentTracker } from '../src/utils/contentTracker';
import {
  StatusReport,
  StatusSources,
  buildStatusReport,
  closeStatusServer,
  createStatusServer,
  startStatusServer,
} from '../src/utils/healthCheck';
import { QuotaLedger } from '../src/utils/quotaLedger';
import { EUROPEAN_NIGHTS, makeTempDir, manualClock, removeDir } from './helpers';

interface Reply {
  status: number;
  body: string;
  contentType?: string;
}

function request(server: http.Server, method: string, urlPath: string): Promise<Reply> {
  const address = server.address();
  if (!address || typeof address === 'string') {
    return Promise.reject(new Error('server is not listening on a port'));
  }
  return new Promise((resolve, reject) => {
    const req = http.request({ host: '127.0.0.1', port: address.port, method, path: urlPath, agent: false }, res => {
      let body = '';
      res.setEncoding('utf8');
      res.on('data', chunk => {
        body += chunk;
      });
      res.on('end', () => resolve({ status: res.statusCode ?? 0, body, contentType: res.headers['content-type'] }));
    });
    req.on('error', reject);
    req.end();
  });
}

function listen(server: http.Server): Promise<void> {
  return new Promise(resolve => server.listen(0, '127.0.0.1', () => resolve()));
}

describe('healthCheck', () => {
  let dir: string;
  let clock: ReturnType<typeof manualClock>;
  let quota: QuotaLedger;
  let tracker: ContentTracker;
  let learner: PerformanceLearner;

  beforeEach(() => {
    dir = makeTempDir();
    // Tuesday
    clock = manualClock('2025-05-20T10:00:00Z');
    quota = new QuotaLedger({ filePath: path.join(dir, 'quota.json'), caps: { read: 100, write: 500 }, now: clock.now });
    tracker = new ContentTracker({ filePath: path.join(dir, 'posted.jsonl'), now: clock.now });
    learner = new PerformanceLearner({ filePath: path.join(dir, 'outcomes.json'), now: clock.now });
  });

  afterEach(() => {
    removeDir(dir);
  });

  const sources = (overrides: Partial<StatusSources> = {}): StatusSources => ({
    quota,
    tracker,
    learner,
    loop: { getState: () => 'idle' },
    eventWindows: [EUROPEAN_NIGHTS],
    startedAt: new Date('2025-05-20T09:00:00Z'),
    now: clock.now,
    ...overrides,
  });

  describe('buildStatusReport', () => {
    it('should describe a fresh agent as healthy', () => {
      const report = buildStatusReport(sources());

      expect(report).toMatchObject({
        status: 'healthy',
        issues: [],
        timestamp: '2025-05-20T10:00:00.000Z',
        moment: 'Tuesday 10:00 UTC',
        mode: 'regular scheduling',
        loopState: 'idle',
        quota: {
          period: '2025-05',
          read: { used: 0, remaining: 100, cap: 100 },
          write: { used: 0, remaining: 500, cap: 500 },
        },
        lastPostAt: null,
        postsLast24h: 0,
        learning: { records: 0, analyzed: 0, pending: 0, lastCollectionAt: null, topCategories: [], topTimeSlots: [] },
        persistence: { quota: 'durable', postedItems: 'durable', outcomes: 'durable' },
        uptime: 3600,
      });
      expect(report.memory.heapUsed).toBeGreaterThan(0);
    });

    it('should name the active event window', () => {
      clock.set('2025-05-20T18:10:00Z');
      expect(buildStatusReport(sources()).mode).toBe('event window: European nights');
    });

    it('should report recent posts', () => {
      clock.set('2025-05-20T08:00:00Z');
      tracker.markPosted('https://news.example.com/a');
      clock.set('2025-05-20T10:00:00Z');

      const report = buildStatusReport(sources());
      expect(report.lastPostAt).toBe('2025-05-20T08:00:00.000Z');
      expect(report.postsLast24h).toBe(1);
    });

    it('should show the top learned categories and time slots', () => {
      const insights: LearningInsights = {
        perCategoryAvgEngagement: { Crypto: 0.04, F1: 0.02, Tesla: 0.01, Cycling: 0.005 },
        rankedCategories: [
          { key: 'Crypto', avgEngagementRate: 0.04, posts: 3 },
          { key: 'F1', avgEngagementRate: 0.02, posts: 2 },
          { key: 'Tesla', avgEngagementRate: 0.01, posts: 2 },
          { key: 'Cycling', avgEngagementRate: 0.005, posts: 1 },
        ],
        rankedTimeSlots: [{ key: '18:00', avgEngagementRate: 0.03, posts: 8 }],
        styleRecommendations: {},
        lastUpdated: '2025-05-20T06:00:00.000Z',
        sampleSize: 8,
      };
      const stubLearner: StatusSources['learner'] = {
        getInsights: () => insights,
        stats: () => ({ records: 9, analyzed: 8, pending: 1, minSampleSize: 5, lastCollectionAt: '2025-05-20T06:00:00.000Z' }),
        persistenceMode: () => 'durable',
      };

      const { learning } = buildStatusReport(sources({ learner: stubLearner }));
      expect(learning.topCategories.map(r => r.key)).toEqual(['Crypto', 'F1', 'Tesla']);
      expect(learning.topTimeSlots).toEqual([{ key: '18:00', avgEngagementRate: 0.03, posts: 8 }]);
      expect(learning).toMatchObject({ records: 9, analyzed: 8, pending: 1, lastCollectionAt: '2025-05-20T06:00:00.000Z' });
    });

    it('should be degraded when the write quota is gone', () => {
      quota.markExhausted('write');
      const report = buildStatusReport(sources());
      expect(report.status).toBe('degraded');
      expect(report.issues).toEqual(['Monthly write quota exhausted']);
    });

    it('should be degraded when a store lost its disk', () => {
      const broken = new ContentTracker({ filePath: path.join(dir, 'missing', 'posted.jsonl'), now: clock.now });
      broken.markPosted('https://news.example.com/a');

      const report = buildStatusReport(sources({ tracker: broken }));
      expect(report.issues).toEqual(['postedItems store is memory-only']);
      expect(report.persistence.postedItems).toBe('memory-only');
    });
  });

  describe('status server', () => {
    let server: http.Server;
    let report: StatusReport;

    beforeEach(async () => {
      report = buildStatusReport(sources());
      server = createStatusServer(() => report);
      await listen(server);
    });

    afterEach(async () => {
      await closeStatusServer(server);
    });

    it('should serve the report as JSON', async () => {
      const reply = await request(server, 'GET', '/status');
      expect(reply.status).toBe(200);
      expect(reply.contentType).toBe('application/json; charset=utf-8');
      expect(JSON.parse(reply.body)).toEqual(report);
    });

    it('should serve the root path with a query string', async () => {
      const reply = await request(server, 'GET', '/?pretty=1');
      expect(reply.status).toBe(200);
      expect(JSON.parse(reply.body).mode).toBe('regular scheduling');
    });

    it('should answer HEAD for uptime probes', async () => {
      const reply = await request(server, 'HEAD', '/');
      expect(reply.status).toBe(200);
      expect(reply.body).toBe('');
    });

    it('should return 404 for other paths and methods', async () => {
      const unknown = await request(server, 'GET', '/metrics');
      expect(unknown.status).toBe(404);
      expect(JSON.parse(unknown.body)).toEqual({ error: 'Not found' });

      expect((await request(server, 'POST', '/status')).status).toBe(404);
    });
  });

  describe('status server failures', () => {
    it('should return 500 when the report cannot be built', async () => {
      const server = createStatusServer(() => {
        throw new Error('learner unavailable');
      });
      await listen(server);
      try {
        const reply = await request(server, 'GET', '/');
        expect(reply.status).toBe(500);
        expect(JSON.parse(reply.body)).toEqual({ error: 'Status unavailable' });
      } finally {
        await closeStatusServer(server);
      }
    });
  });

  describe('startStatusServer', () => {
    it('should resolve once listening', async () => {
      const server = await startStatusServer(0, () => buildStatusReport(sources()));
      try {
        expect(server.listening).toBe(true);
      } finally {
        await closeStatusServer(server);
      }
    });
  });
});
