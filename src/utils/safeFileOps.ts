/**
 * Synchronous file helpers shared by the file-backed stores.
 * Writers never throw: they log and report failure so the caller can
 * switch to memory-only operation.
 */

import * as fs from 'fs';
import { logger } from './logger';

/**
 * Read a JSON file. Returns undefined when it is missing or unreadable;
 * callers validate the shape themselves.
 */
export function safeReadJsonSync(filePath: string): unknown {
  try {
    if (!fs.existsSync(filePath)) {
      return undefined;
    }
    const raw = fs.readFileSync(filePath, 'utf-8');
    return JSON.parse(raw);
  } catch (error) {
    logger.warn(`Failed to read JSON from ${filePath}: ${error}`);
    return undefined;
  }
}

/**
 * Write JSON through a temp file and rename, so a crash mid-write leaves
 * the previous document intact
 */
export function atomicWriteJsonSync<T>(filePath: string, data: T): boolean {
  const tmp = filePath + '.tmp';
  try {
    fs.writeFileSync(tmp, JSON.stringify(data, null, 2), 'utf-8');
    fs.renameSync(tmp, filePath);
    return true;
  } catch (error) {
    logger.error(`Failed to write JSON to ${filePath}: ${error}`);
    try {
      if (fs.existsSync(tmp)) fs.unlinkSync(tmp);
    } catch {
      // tmp file is overwritten on the next attempt
    }
    return false;
  }
}

/**
 * Write a text file through a temp file and rename
 */
export function atomicWriteFileSync(filePath: string, content: string): boolean {
  const tmp = filePath + '.tmp';
  try {
    fs.writeFileSync(tmp, content, 'utf-8');
    fs.renameSync(tmp, filePath);
    return true;
  } catch (error) {
    logger.error(`Failed to write ${filePath}: ${error}`);
    return false;
  }
}

/**
 * Append to a file with error handling
 */
export function safeAppendFileSync(filePath: string, content: string): boolean {
  try {
    fs.appendFileSync(filePath, content, 'utf-8');
    return true;
  } catch (error) {
    logger.error(`Failed to append to ${filePath}: ${error}`);
    return false;
  }
}

/**
 * Read the non-empty lines of a text file; a missing file has none
 */
export function readLinesSync(filePath: string): string[] {
  try {
    if (!fs.existsSync(filePath)) return [];
    return fs.readFileSync(filePath, 'utf-8').split('\n').filter(line => line.trim());
  } catch (error) {
    logger.warn(`Failed to read lines from ${filePath}: ${error}`);
    return [];
  }
}
