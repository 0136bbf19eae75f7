/**
 * Shared fixtures for the store and scheduler tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CategoryConfig, EventWindow, PriorityBucket } from '../src/config';
import { RandomSource } from '../src/utils/random';

export function makeTempDir(prefix = 'poster-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Clock the test moves by hand
 */
export function manualClock(iso: string) {
  let current = new Date(iso);
  return {
    now: () => new Date(current.getTime()),
    set: (next: string) => {
      current = new Date(next);
    },
    advanceMinutes: (minutes: number) => {
      current = new Date(current.getTime() + minutes * 60 * 1000);
    },
    advanceHours: (hours: number) => {
      current = new Date(current.getTime() + hours * 60 * 60 * 1000);
    },
  };
}

/**
 * Random source replaying fixed draws; throws when a test draws more than it scripted
 */
export function scriptedRandom(values: number[]): RandomSource & { remaining: () => number } {
  const queue = [...values];
  return {
    next: () => {
      const v = queue.shift();
      if (v === undefined) throw new Error('scriptedRandom exhausted');
      return v;
    },
    remaining: () => queue.length,
  };
}

export function category(name: string, overrides: Partial<CategoryConfig> = {}): CategoryConfig {
  return {
    name,
    group: 'global',
    eventOnly: false,
    emoji: '',
    feeds: [`https://feeds.example.com/${encodeURIComponent(name)}.xml`],
    ctaTemplates: [],
    hashtags: { primary: [], secondary: [], trending: [] },
    ...overrides,
  };
}

export const TEST_CATEGORIES: CategoryConfig[] = [
  category('Champions League', { group: 'football', eventOnly: true, emoji: '⚽' }),
  category('Europa League', { group: 'football', eventOnly: true, emoji: '⚽' }),
  category('F1', { emoji: '🏎️' }),
  category('Cycling', { emoji: '🚴' }),
  category('Crypto', { group: 'business', emoji: '📊' }),
  category('Tesla', { group: 'business', emoji: '⚡' }),
];

// Tue/Wed/Thu, numbered Sunday-first
export const EUROPEAN_NIGHTS: EventWindow = {
  name: 'European nights',
  weekdays: [2, 3, 4],
  start: '16:00',
  end: '02:00',
  slots: ['16:00', '18:10', '01:30'],
  categories: [
    { category: 'Champions League', weight: 7 },
    { category: 'Europa League', weight: 3 },
  ],
};

export const PREMIUM_BUCKET: PriorityBucket = {
  name: 'premium',
  slots: ['08:00', '12:00'],
  categories: ['Crypto', 'Tesla'],
  probability: 0.7,
  premiumTone: true,
};
