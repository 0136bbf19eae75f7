import { z } from 'zod';
import { logger } from './logger';
import { atomicWriteJsonSync, safeReadJsonSync } from './safeFileOps';
import { PersistenceGuard, PersistenceMode } from './persistence';
import { Clock, QuotaKind, QuotaRecord, QuotaStatus } from '../types';

// Persist monthly read/write usage to survive restarts
// Structure: { "period": "2025-11", "readsUsed": 12, "writesUsed": 40, "lastReset": "ISO" }

const QuotaRecordSchema = z.object({
  period: z.string().regex(/^\d{4}-\d{2}$/),
  readsUsed: z.number().int().nonnegative(),
  writesUsed: z.number().int().nonnegative(),
  lastReset: z.string(),
});

export interface QuotaCaps {
  read: number;
  write: number;
}

export interface QuotaLedgerOptions {
  filePath: string;
  caps: QuotaCaps;
  now?: Clock;
}

export function periodKey(d: Date): string {
  return `${d.getUTCFullYear()}-${String(d.getUTCMonth() + 1).padStart(2, '0')}`;
}

export class QuotaLedger {
  private record: QuotaRecord;
  private readonly caps: QuotaCaps;
  private readonly filePath: string;
  private readonly now: Clock;
  private readonly persistence = new PersistenceGuard('quota ledger');

  constructor(options: QuotaLedgerOptions) {
    this.filePath = options.filePath;
    this.caps = options.caps;
    this.now = options.now || (() => new Date());
    this.record = this.load();
  }

  private load(): QuotaRecord {
    const parsed = QuotaRecordSchema.safeParse(safeReadJsonSync(this.filePath));
    if (parsed.success) {
      logger.info(`Loaded quota usage for ${parsed.data.period}: reads ${parsed.data.readsUsed}/${this.caps.read}, writes ${parsed.data.writesUsed}/${this.caps.write}`);
      return parsed.data;
    }
    const fresh = this.emptyRecord(this.now());
    this.save(fresh);
    return fresh;
  }

  private emptyRecord(at: Date): QuotaRecord {
    return { period: periodKey(at), readsUsed: 0, writesUsed: 0, lastReset: at.toISOString() };
  }

  private save(record: QuotaRecord): boolean {
    return this.persistence.write(() => atomicWriteJsonSync(this.filePath, record));
  }

  /**
   * Reset both counters when the wall clock has moved into a new month
   */
  private rollover(): void {
    const at = this.now();
    const current = periodKey(at);
    if (this.record.period === current) return;
    logger.info(`Quota period rolled over from ${this.record.period} to ${current}; counters reset`);
    this.record = this.emptyRecord(at);
    this.save(this.record);
  }

  private used(kind: QuotaKind): number {
    return kind === 'read' ? this.record.readsUsed : this.record.writesUsed;
  }

  public canConsume(kind: QuotaKind, amount = 1): boolean {
    this.rollover();
    return this.used(kind) + amount <= this.caps[kind];
  }

  /**
   * Debit the counter. Returns false, without mutating anything, when the
   * debit would exceed the cap or the amount is not a positive integer.
   */
  public consume(kind: QuotaKind, amount = 1): boolean {
    if (!Number.isInteger(amount) || amount <= 0) {
      logger.warn(`Rejected quota debit of ${amount} ${kind} unit(s)`);
      return false;
    }
    if (!this.canConsume(kind, amount)) {
      logger.info(`Monthly ${kind} quota exhausted (${this.used(kind)}/${this.caps[kind]} for ${this.record.period})`);
      return false;
    }
    if (kind === 'read') {
      this.record = { ...this.record, readsUsed: this.record.readsUsed + amount };
    } else {
      this.record = { ...this.record, writesUsed: this.record.writesUsed + amount };
    }
    this.save(this.record);
    logger.info(`Monthly usage: ${this.used(kind)}/${this.caps[kind]} ${kind}s for ${this.record.period}`);
    return true;
  }

  /**
   * The platform reported its own usage cap as exceeded; stop spending
   * this resource until the period rolls over
   */
  public markExhausted(kind: QuotaKind): void {
    this.rollover();
    if (kind === 'read') {
      this.record = { ...this.record, readsUsed: this.caps.read };
    } else {
      this.record = { ...this.record, writesUsed: this.caps.write };
    }
    this.save(this.record);
    logger.warn(`Monthly ${kind} cap reached externally (platform reported usage cap exceeded). Marked as ${this.caps[kind]}/${this.caps[kind]} for ${this.record.period}`);
  }

  public status(): QuotaStatus {
    const current = periodKey(this.now());
    const stale = this.record.period !== current;
    const readsUsed = stale ? 0 : this.record.readsUsed;
    const writesUsed = stale ? 0 : this.record.writesUsed;
    return {
      period: current,
      read: { used: readsUsed, remaining: Math.max(0, this.caps.read - readsUsed), cap: this.caps.read },
      write: { used: writesUsed, remaining: Math.max(0, this.caps.write - writesUsed), cap: this.caps.write },
    };
  }

  public persistenceMode(): PersistenceMode {
    return this.persistence.getMode();
  }

  public flush(): boolean {
    return this.persistence.flush(() => atomicWriteJsonSync(this.filePath, this.record));
  }
}
