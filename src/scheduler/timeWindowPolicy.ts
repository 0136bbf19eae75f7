/**
 * Posting-time decisions. Everything here is a pure function of the clock
 * reading it is given; all times are UTC.
 */

import { EventWindow, ScheduleConfig } from '../config';

export const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

export function formatMinute(now: Date): string {
  return `${String(now.getUTCHours()).padStart(2, '0')}:${String(now.getUTCMinutes()).padStart(2, '0')}`;
}

/**
 * Key identifying one calendar minute, used to evaluate each minute once
 */
export function minuteKey(now: Date): string {
  return now.toISOString().slice(0, 16);
}

function minutesOfDay(hhmm: string): number {
  const [h, m] = hhmm.split(':').map(Number);
  return h * 60 + m;
}

export function isScheduledSlot(now: Date, slots: readonly string[]): boolean {
  return slots.includes(formatMinute(now));
}

/**
 * True when now's weekday is allowed and its time of day falls in
 * [start, end). An end at or before the start wraps past midnight.
 */
export function isEventWindow(
  now: Date,
  window: Pick<EventWindow, 'weekdays' | 'start' | 'end'>,
): boolean {
  if (!window.weekdays.includes(now.getUTCDay())) return false;
  const t = now.getUTCHours() * 60 + now.getUTCMinutes();
  const start = minutesOfDay(window.start);
  const end = minutesOfDay(window.end);
  if (end > start) return t >= start && t < end;
  return t >= start || t < end;
}

/**
 * First matching window in declared order, so overlaps resolve to exactly one
 */
export function activeEventWindow(now: Date, windows: readonly EventWindow[]): EventWindow | null {
  return windows.find(w => isEventWindow(now, w)) ?? null;
}

export function minIntervalElapsed(now: Date, lastPostAt: Date | null, minMinutes: number): boolean {
  if (!lastPostAt) return true;
  return now.getTime() - lastPostAt.getTime() >= minMinutes * 60 * 1000;
}

export interface DueCheck {
  due: boolean;
  // Set only when the minute is one of the active window's own slots
  window: EventWindow | null;
}

/**
 * Event windows overlay the regular schedule: a minute is due when it is a
 * regular slot or a slot of the active window. Only window slots carry the
 * window, so regular slots keep the learned or cold-start category choice.
 */
export function isPostingDue(now: Date, schedule: Pick<ScheduleConfig, 'regularSlots' | 'eventWindows'>): DueCheck {
  const window = activeEventWindow(now, schedule.eventWindows);
  if (window && isScheduledSlot(now, window.slots)) {
    return { due: true, window };
  }
  return { due: isScheduledSlot(now, schedule.regularSlots), window: null };
}

export function describeMoment(now: Date): string {
  return `${DAY_NAMES[now.getUTCDay()]} ${formatMinute(now)} UTC`;
}
