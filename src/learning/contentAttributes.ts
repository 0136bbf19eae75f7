import { ContentAttributes } from '../types';

const EMOJI = /\p{Extended_Pictographic}/u;
const HASHTAG = /(^|\s)#[\p{L}\p{N}_]+/u;
const LINK = /https?:\/\/\S+/;

/**
 * Attributes of a published text that the learner correlates with engagement
 */
export function extractAttributes(text: string): ContentAttributes {
  const trimmed = text.trim();
  // Links and hashtags are not part of the prose being measured
  const prose = trimmed.replace(/https?:\/\/\S+/g, ' ').replace(/(^|\s)#[\p{L}\p{N}_]+/gu, ' ');
  const words = prose.split(/\s+/).filter(w => /[\p{L}\p{N}]/u.test(w));
  return {
    hasEmoji: EMOJI.test(trimmed),
    hasQuestion: prose.includes('?'),
    hasHashtag: HASHTAG.test(trimmed),
    hasLink: LINK.test(trimmed),
    wordCount: words.length,
    charCount: Array.from(trimmed).length,
  };
}
