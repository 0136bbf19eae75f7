/**
 * Single-instance lock for the agent
 * Prevents two processes from sharing the same data directory
 */

import * as fs from 'fs';
import { z } from 'zod';
import { logger, errorMessage } from './logger';

const LockSchema = z.object({
  pid: z.number().int(),
  timestamp: z.number(),
});

export class LockHeldError extends Error {
  constructor(readonly pid: number, readonly since: Date) {
    super(`Agent is already running (PID: ${pid}, started: ${since.toISOString()})`);
    this.name = 'LockHeldError';
  }
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0); // Signal 0 checks if process exists
    return true;
  } catch (e) {
    // EPERM means the process exists but belongs to someone else
    return e instanceof Error && 'code' in e && e.code === 'EPERM';
  }
}

/**
 * Take the lock file or throw LockHeldError when another live process
 * holds it. Stale or unreadable lock files are replaced. Returns the
 * release function; releasing only removes a lock this process owns.
 */
export function acquireLock(lockFile: string, pid: number = process.pid): () => void {
  if (fs.existsSync(lockFile)) {
    let existing: z.infer<typeof LockSchema> | null = null;
    try {
      const parsed = LockSchema.safeParse(JSON.parse(fs.readFileSync(lockFile, 'utf-8')));
      existing = parsed.success ? parsed.data : null;
    } catch (e) {
      logger.warn(`Unreadable lock file ${lockFile}: ${errorMessage(e)}`);
    }
    if (existing && existing.pid !== pid && isAlive(existing.pid)) {
      throw new LockHeldError(existing.pid, new Date(existing.timestamp));
    }
    logger.warn(`Removing stale lock file${existing ? ` from PID ${existing.pid}` : ''}`);
    fs.unlinkSync(lockFile);
  }

  fs.writeFileSync(lockFile, JSON.stringify({ pid, timestamp: Date.now() }, null, 2), 'utf-8');
  logger.info(`Acquired instance lock (PID: ${pid})`);

  return () => {
    try {
      if (!fs.existsSync(lockFile)) return;
      const current = LockSchema.safeParse(JSON.parse(fs.readFileSync(lockFile, 'utf-8')));
      if (current.success && current.data.pid === pid) {
        fs.unlinkSync(lockFile);
        logger.info(`Released instance lock (PID: ${pid})`);
      }
    } catch (e) {
      logger.warn(`Failed to release instance lock: ${errorMessage(e)}`);
    }
  };
}
