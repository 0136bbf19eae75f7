/**
 * Post text assembly: prompt construction for the text generator, the
 * templated fallback used when generation fails, and final composition
 * (emoji prefix, link, hashtags, length limit).
 */

import { CategoryConfig } from '../config';
import { PromptContext, StyleRecommendation } from '../types';
import { RandomSource, pickUniform } from '../utils/random';

export const MAX_POST_LENGTH = 280;
// Hashtags are only added while the post stays under this length
export const HASHTAG_BUDGET = 275;
export const DEFAULT_CTA = "What's your take on this?";

const LEADING_EMOJI = /^\p{Extended_Pictographic}/u;

export const DEFAULT_STYLE: StyleRecommendation = { useEmoji: true, useQuestion: true };

/** Length in code points, which is what the platform limit is close to */
export function postLength(text: string): number {
  return Array.from(text).length;
}

export function truncatePost(text: string, limit = MAX_POST_LENGTH): string {
  const chars = Array.from(text);
  if (chars.length <= limit) return text;
  return chars.slice(0, limit - 3).join('') + '...';
}

export function contextualCta(category: CategoryConfig, random: RandomSource): string {
  return pickUniform(category.ctaTemplates, random) ?? DEFAULT_CTA;
}

export function buildPrompt(
  title: string,
  category: CategoryConfig,
  premium: boolean,
  cta: string,
  style: StyleRecommendation = DEFAULT_STYLE,
): PromptContext {
  if (premium) {
    const closing = style.useQuestion ? `- End with: ${cta}` : '- End with a clear takeaway, not a question';
    return {
      system: `You create professional content for ${category.name} targeting business professionals.`,
      user: `Create a Twitter post about: ${title}\n\nCategory: ${category.name}\n\nRequirements:\n- Professional tone for decision-makers\n- Strategic insights\n${closing}\n- Under 200 characters\n\nWrite ONLY the tweet text:`,
      maxTokens: 100,
      temperature: 0.7,
    };
  }
  const hook = style.useQuestion ? '- Ask thought-provoking questions' : '- State the key fact plainly';
  return {
    system: 'Create viral Twitter content that drives engagement.',
    user: `Create an engaging Twitter post about: ${title}\n\nCategory: ${category.name}\nRequirements:\n- Under 200 characters\n${hook}\n- Drive engagement\n\nWrite ONLY the tweet text:`,
    maxTokens: 100,
    temperature: 0.8,
  };
}

export function fallbackText(title: string, cta: string): string {
  return `Breaking: ${title.slice(0, 150)}... ${cta}`;
}

export function pickHashtags(category: CategoryConfig, random: RandomSource): string[] {
  const primary = pickUniform(category.hashtags.primary, random);
  if (!primary) return [];
  const secondary = pickUniform(category.hashtags.secondary, random);
  return secondary ? [primary, secondary] : [primary];
}

export interface ComposeInput {
  text: string;
  category: CategoryConfig;
  url: string;
  style?: StyleRecommendation;
  random: RandomSource;
}

export function composePost(input: ComposeInput): string {
  const style = input.style || DEFAULT_STYLE;
  let body = input.text.trim();
  if (style.useEmoji && input.category.emoji && !LEADING_EMOJI.test(body)) {
    body = `${input.category.emoji} ${body}`;
  }

  let full = `${body}\n\n${input.url}`;
  const hashtags = pickHashtags(input.category, input.random);
  if (hashtags.length > 0) {
    const withTags = `${full} ${hashtags.join(' ')}`;
    if (postLength(withTags) <= HASHTAG_BUDGET) full = withTags;
  }
  return truncatePost(full);
}
