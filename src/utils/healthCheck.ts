/**
 * Status reporting
 * Read-only snapshot of quota, posting and learning state, served over HTTP
 */

import * as http from 'http';
import { EventWindow } from '../config';
import { PerformanceLearner } from '../learning/performanceLearner';
import { describeMoment, activeEventWindow } from '../scheduler/timeWindowPolicy';
import { LoopState } from '../scheduler/schedulerLoop';
import { Clock, QuotaStatus, RankedScore } from '../types';
import { ContentTracker } from './contentTracker';
import { logger } from './logger';
import { PersistenceMode } from './persistence';
import { QuotaLedger } from './quotaLedger';

export interface StatusSources {
  quota: Pick<QuotaLedger, 'status' | 'persistenceMode'>;
  tracker: Pick<ContentTracker, 'lastPostedAt' | 'countPostedSince' | 'persistenceMode'>;
  learner: Pick<PerformanceLearner, 'getInsights' | 'stats' | 'persistenceMode'>;
  loop: { getState(): LoopState };
  eventWindows: readonly EventWindow[];
  startedAt: Date;
  now: Clock;
}

export interface StatusReport {
  status: 'healthy' | 'degraded';
  issues: string[];
  timestamp: string;
  moment: string;
  mode: string;
  loopState: LoopState;
  quota: QuotaStatus;
  lastPostAt: string | null;
  postsLast24h: number;
  learning: {
    records: number;
    analyzed: number;
    pending: number;
    lastCollectionAt: string | null;
    topCategories: RankedScore[];
    topTimeSlots: RankedScore[];
  };
  persistence: Record<'quota' | 'postedItems' | 'outcomes', PersistenceMode>;
  uptime: number;
  memory: {
    heapUsed: number;
    heapTotal: number;
    rss: number;
  };
}

export function buildStatusReport(sources: StatusSources): StatusReport {
  const now = sources.now();
  const quota = sources.quota.status();
  const window = activeEventWindow(now, sources.eventWindows);
  const insights = sources.learner.getInsights();
  const stats = sources.learner.stats();
  const lastPost = sources.tracker.lastPostedAt();
  const persistence = {
    quota: sources.quota.persistenceMode(),
    postedItems: sources.tracker.persistenceMode(),
    outcomes: sources.learner.persistenceMode(),
  };
  const memUsage = process.memoryUsage();

  const issues: string[] = [];
  for (const [store, mode] of Object.entries(persistence)) {
    if (mode === 'memory-only') issues.push(`${store} store is memory-only`);
  }
  if (quota.write.remaining <= 0) issues.push('Monthly write quota exhausted');

  return {
    status: issues.length === 0 ? 'healthy' : 'degraded',
    issues,
    timestamp: now.toISOString(),
    moment: describeMoment(now),
    mode: window ? `event window: ${window.name}` : 'regular scheduling',
    loopState: sources.loop.getState(),
    quota,
    lastPostAt: lastPost ? lastPost.toISOString() : null,
    postsLast24h: sources.tracker.countPostedSince(new Date(now.getTime() - 24 * 60 * 60 * 1000)),
    learning: {
      records: stats.records,
      analyzed: stats.analyzed,
      pending: stats.pending,
      lastCollectionAt: stats.lastCollectionAt,
      topCategories: insights ? insights.rankedCategories.slice(0, 3) : [],
      topTimeSlots: insights ? insights.rankedTimeSlots.slice(0, 3) : [],
    },
    persistence,
    uptime: Math.floor((now.getTime() - sources.startedAt.getTime()) / 1000),
    memory: {
      heapUsed: memUsage.heapUsed,
      heapTotal: memUsage.heapTotal,
      rss: memUsage.rss,
    },
  };
}

const STATUS_PATHS = new Set(['/', '/status']);

export function createStatusServer(getReport: () => StatusReport): http.Server {
  return http.createServer((req, res) => {
    const pathname = (req.url || '/').split('?')[0];
    if (!STATUS_PATHS.has(pathname) || (req.method !== 'GET' && req.method !== 'HEAD')) {
      res.writeHead(404, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Not found' }));
      return;
    }
    if (req.method === 'HEAD') {
      res.writeHead(200);
      res.end();
      return;
    }
    try {
      const body = JSON.stringify(getReport(), null, 2);
      res.writeHead(200, { 'Content-Type': 'application/json; charset=utf-8' });
      res.end(body);
    } catch (err) {
      logger.error(`Status report failed: ${err}`);
      res.writeHead(500, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Status unavailable' }));
    }
  });
}

/**
 * Start the status server; resolves once it is listening
 */
export function startStatusServer(port: number, getReport: () => StatusReport): Promise<http.Server> {
  const server = createStatusServer(getReport);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      logger.info(`Status server listening on port ${port}`);
      resolve(server);
    });
  });
}

export function closeStatusServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });
}
