import { z } from 'zod';

const TIME_OF_DAY = /^([01]\d|2[0-3]):[0-5]\d$/;

const timeOfDay = z.string().regex(TIME_OF_DAY, 'expected HH:MM (24h)');

const WEEKDAYS = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'] as const;

const weekday = z.enum(WEEKDAYS).transform(day => WEEKDAYS.indexOf(day));

export const CategorySchema = z.object({
  name: z.string().min(1),
  group: z.enum(['business', 'global', 'football']),
  // Event-only categories are posted only inside their event windows
  eventOnly: z.boolean().default(false),
  emoji: z.string().default(''),
  feeds: z.array(z.string().url()).min(1),
  ctaTemplates: z.array(z.string().min(1)).default([]),
  hashtags: z.object({
    primary: z.array(z.string()).default([]),
    secondary: z.array(z.string()).default([]),
    trending: z.array(z.string()).default([]),
  }).default({}),
});

export const CategoriesFileSchema = z.object({
  categories: z.array(CategorySchema).min(1),
});

export const EventWindowSchema = z.object({
  name: z.string().min(1),
  weekdays: z.array(weekday).min(1),
  start: timeOfDay,
  end: timeOfDay,
  slots: z.array(timeOfDay).min(1),
  categories: z.array(z.object({
    category: z.string().min(1),
    weight: z.number().positive(),
  })).min(1),
});

export const PriorityBucketSchema = z.object({
  name: z.string().min(1),
  slots: z.array(timeOfDay).min(1),
  categories: z.array(z.string().min(1)).min(1),
  probability: z.number().min(0).max(1),
  // Slots of a premium-tone bucket get the professional prompt for any category
  premiumTone: z.boolean().default(false),
});

export const ScheduleFileSchema = z.object({
  regularSlots: z.array(timeOfDay).min(1),
  priorityBuckets: z.array(PriorityBucketSchema).default([]),
  // Declared order is priority order when windows overlap
  eventWindows: z.array(EventWindowSchema).default([]),
});

export type CategoryConfig = z.infer<typeof CategorySchema>;
export type EventWindow = z.infer<typeof EventWindowSchema>;
export type PriorityBucket = z.infer<typeof PriorityBucketSchema>;
export type ScheduleConfig = z.infer<typeof ScheduleFileSchema>;
