import { logger } from './logger';

export type PersistenceMode = 'durable' | 'memory-only';

/**
 * Tracks whether a store can still reach disk. The first failed write
 * switches it to memory-only for the rest of the process lifetime.
 */
export class PersistenceGuard {
  private mode: PersistenceMode = 'durable';

  constructor(private readonly storeName: string) {}

  write(op: () => boolean): boolean {
    if (this.mode === 'memory-only') return false;
    const ok = op();
    if (!ok) {
      this.mode = 'memory-only';
      logger.warn(`[PERSISTENCE] ${this.storeName} could not be written; continuing in memory-only mode until restart. State changes from now on are not durable.`);
    }
    return ok;
  }

  /**
   * Last-chance write at shutdown, attempted even in memory-only mode
   */
  flush(op: () => boolean): boolean {
    const ok = op();
    if (!ok) {
      logger.warn(`[PERSISTENCE] Final flush of ${this.storeName} failed; in-memory state is lost on exit`);
    } else if (this.mode === 'memory-only') {
      logger.info(`[PERSISTENCE] Final flush of ${this.storeName} succeeded after earlier failures`);
    }
    return ok;
  }

  getMode(): PersistenceMode {
    return this.mode;
  }
}
