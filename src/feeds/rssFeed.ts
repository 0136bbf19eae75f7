import fetch from 'node-fetch';
import { CategoryConfig } from '../config';
import { CandidateItem } from '../types';
import { logger, errorMessage } from '../utils/logger';

const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

function stripCdata(value: string): string {
  return value.replace(/^\s*<!\[CDATA\[([\s\S]*?)\]\]>\s*$/, '$1');
}

function decodeEntities(value: string): string {
  return value
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number(code)))
    .replace(/&#x([0-9a-f]+);/gi, (_, code: string) => String.fromCodePoint(parseInt(code, 16)))
    .replace(/&quot;/g, '"')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&apos;/g, '\'')
    .replace(/&amp;/g, '&'); // Decode &amp; LAST to prevent double-unescaping
}

function cleanText(raw: string): string {
  return decodeEntities(stripCdata(raw))
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function tagContent(block: string, tag: string): string | undefined {
  const match = block.match(new RegExp(`<${tag}\\b[^>]*>([\\s\\S]*?)<\\/${tag}>`));
  return match?.[1];
}

function isHttpUrl(value: string): boolean {
  return /^https?:\/\/\S+$/.test(value);
}

function rssLink(block: string): string | undefined {
  const link = tagContent(block, 'link');
  if (link !== undefined) {
    const url = decodeEntities(stripCdata(link)).trim();
    if (isHttpUrl(url)) return url;
  }
  // Some feeds only carry the article URL as a permalink guid
  const guid = tagContent(block, 'guid');
  if (guid !== undefined) {
    const url = decodeEntities(stripCdata(guid)).trim();
    if (isHttpUrl(url)) return url;
  }
  return undefined;
}

function atomLink(block: string): string | undefined {
  const links = Array.from(block.matchAll(/<link\b([^>]*?)\/?>/g)).map(m => m[1]);
  const attr = (attrs: string, name: string) => attrs.match(new RegExp(`${name}\\s*=\\s*["']([^"']*)["']`))?.[1];
  const preferred = links.find(attrs => {
    const rel = attr(attrs, 'rel');
    return rel === undefined || rel === 'alternate';
  }) ?? links[0];
  if (preferred === undefined) return undefined;
  const href = attr(preferred, 'href');
  if (href === undefined) return undefined;
  const url = decodeEntities(href).trim();
  return isHttpUrl(url) ? url : undefined;
}

/**
 * Extract up to `limit` title/link pairs from an RSS or Atom document.
 * Entries without a usable title or http(s) link are skipped.
 */
export function parseFeed(xml: string, limit = 3): CandidateItem[] {
  const rssItems = Array.from(xml.matchAll(/<item\b[^>]*>([\s\S]*?)<\/item>/g)).map(m => m[1]);
  const isAtom = rssItems.length === 0;
  const blocks = isAtom
    ? Array.from(xml.matchAll(/<entry\b[^>]*>([\s\S]*?)<\/entry>/g)).map(m => m[1])
    : rssItems;

  const items: CandidateItem[] = [];
  for (const block of blocks) {
    if (items.length >= limit) break;
    const rawTitle = tagContent(block, 'title');
    const title = rawTitle !== undefined ? cleanText(rawTitle) : '';
    const url = isAtom ? atomLink(block) : rssLink(block);
    if (!title || !url) continue;
    items.push({ identifier: url, title, sourceUrl: url });
  }
  return items;
}

export interface RssFeedSourceOptions {
  timeoutMs?: number;
  // Feeds tried per category, in declared order
  maxFeeds?: number;
  maxItems?: number;
}

export class RssFeedSource {
  private readonly byName: Map<string, CategoryConfig>;
  private readonly timeoutMs: number;
  private readonly maxFeeds: number;
  private readonly maxItems: number;

  constructor(categories: readonly CategoryConfig[], options: RssFeedSourceOptions = {}) {
    this.byName = new Map(categories.map(c => [c.name, c]));
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.maxFeeds = options.maxFeeds ?? 2;
    this.maxItems = options.maxItems ?? 3;
  }

  public async fetchFeed(feedUrl: string): Promise<CandidateItem[]> {
    try {
      const resp = await fetch(feedUrl, {
        headers: {
          'User-Agent': USER_AGENT,
          'Accept': 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
        },
        timeout: this.timeoutMs,
      });
      if (!resp.ok) {
        logger.warn(`RSS feed ${feedUrl} returned ${resp.status}`);
        return [];
      }
      return parseFeed(await resp.text(), this.maxItems);
    } catch (err) {
      logger.warn(`Error fetching RSS from ${feedUrl}: ${errorMessage(err)}`);
      return [];
    }
  }

  /**
   * Items from the first feed of the category that yields any
   */
  public async fetchCandidateItems(categoryName: string): Promise<CandidateItem[]> {
    const category = this.byName.get(categoryName);
    if (!category) {
      logger.warn(`No feeds configured for category '${categoryName}'`);
      return [];
    }
    for (const feedUrl of category.feeds.slice(0, this.maxFeeds)) {
      const items = await this.fetchFeed(feedUrl);
      if (items.length > 0) {
        logger.info(`Fetched ${items.length} item(s) for ${categoryName} from ${feedUrl}`);
        return items;
      }
    }
    return [];
  }
}
