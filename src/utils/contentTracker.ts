/**
 * Content tracker to guarantee a source item is published at most once.
 * Identifiers (source URLs and title fingerprints) live in an in-memory map
 * loaded at startup from an append-only log of JSON lines.
 */

import * as crypto from 'crypto';
import { z } from 'zod';
import { logger } from './logger';
import { atomicWriteFileSync, readLinesSync, safeAppendFileSync } from './safeFileOps';
import { PersistenceGuard, PersistenceMode } from './persistence';
import { Clock, PostedItemRecord } from '../types';

const PostedItemSchema = z.object({
  identifier: z.string().min(1),
  postedAt: z.string(),
});

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ContentTrackerOptions {
  filePath: string;
  retentionDays?: number;
  now?: Clock;
}

/**
 * Fingerprint a headline so the same story syndicated under two URLs is
 * recognised: case, punctuation and spacing are ignored
 */
export function titleFingerprint(title: string): string {
  const normalized = title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  return 'title:' + crypto.createHash('sha256').update(normalized).digest('hex').slice(0, 16);
}

export class ContentTracker {
  private posted: Map<string, Date> = new Map();
  private readonly filePath: string;
  private readonly retentionDays: number;
  private readonly now: Clock;
  private readonly persistence = new PersistenceGuard('posted-items log');

  constructor(options: ContentTrackerOptions) {
    this.filePath = options.filePath;
    this.retentionDays = options.retentionDays ?? 90;
    this.now = options.now || (() => new Date());
    this.loadState();
  }

  private loadState() {
    let skipped = 0;
    for (const line of readLinesSync(this.filePath)) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        skipped++;
        continue;
      }
      const entry = PostedItemSchema.safeParse(parsed);
      const dt = entry.success ? new Date(entry.data.postedAt) : null;
      if (!entry.success || !dt || !isFinite(dt.getTime())) {
        skipped++;
        continue;
      }
      // Keep the first sighting; later duplicates in the log are ignored
      if (!this.posted.has(entry.data.identifier)) this.posted.set(entry.data.identifier, dt);
    }
    if (this.posted.size > 0 || skipped > 0) {
      logger.info(`Loaded ${this.posted.size} posted identifiers from tracker${skipped ? ` (${skipped} unreadable line(s) skipped)` : ''}`);
    }
  }

  private normalize(identifier: string): string {
    return identifier.trim();
  }

  public isDuplicate(identifier: string): boolean {
    return this.posted.has(this.normalize(identifier));
  }

  /**
   * Record a confirmed publish under one or more identifiers sharing one
   * timestamp. Idempotent: known identifiers are not appended again.
   */
  public markPosted(...identifiers: string[]): void {
    const postedAt = this.now();
    const records: PostedItemRecord[] = [];
    for (const identifier of identifiers) {
      const key = this.normalize(identifier);
      if (!key || this.posted.has(key)) continue;
      this.posted.set(key, postedAt);
      records.push({ identifier: key, postedAt: postedAt.toISOString() });
    }
    if (records.length === 0) return;
    const lines = records.map(r => JSON.stringify(r) + '\n').join('');
    this.persistence.write(() => safeAppendFileSync(this.filePath, lines));
    logger.info(`Marked ${records.map(r => r.identifier).join(', ')} as posted`);
  }

  /**
   * Most recent publish time, which doubles as the last-post timestamp
   */
  public lastPostedAt(): Date | null {
    let latest: Date | null = null;
    for (const dt of this.posted.values()) {
      if (!latest || dt > latest) latest = dt;
    }
    return latest;
  }

  /**
   * Number of distinct publishes since the given time; identifiers marked
   * together share a timestamp and count once
   */
  public countPostedSince(since: Date): number {
    const stamps = new Set<number>();
    for (const dt of this.posted.values()) {
      if (dt >= since) stamps.add(dt.getTime());
    }
    return stamps.size;
  }

  public size(): number {
    return this.posted.size;
  }

  private serialize(): string {
    return Array.from(this.posted.entries())
      .sort((a, b) => a[1].getTime() - b[1].getTime())
      .map(([identifier, dt]) => JSON.stringify({ identifier, postedAt: dt.toISOString() }) + '\n')
      .join('');
  }

  /**
   * Drop identifiers older than the lookback window and compact the log.
   * Everything inside the window stays, so duplicate checks for recent items
   * are unaffected.
   */
  public prune(): number {
    const cutoff = new Date(this.now().getTime() - this.retentionDays * DAY_MS);
    let removed = 0;
    for (const [id, dt] of Array.from(this.posted.entries())) {
      if (dt < cutoff) {
        this.posted.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      this.persistence.write(() => atomicWriteFileSync(this.filePath, this.serialize()));
      logger.info(`Pruned ${removed} posted identifiers (retention ${this.retentionDays}d)`);
    }
    return removed;
  }

  public persistenceMode(): PersistenceMode {
    return this.persistence.getMode();
  }

  /**
   * Rewrite the whole log from memory; used at shutdown so entries that
   * could not be appended earlier still reach disk when possible
   */
  public flush(): boolean {
    if (this.persistence.getMode() === 'durable') return true;
    return this.persistence.flush(() => atomicWriteFileSync(this.filePath, this.serialize()));
  }
}
