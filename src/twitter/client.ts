import { TwitterApi } from 'twitter-api-v2';
import { logger } from '../utils/logger';
import { TimeoutError, withTimeout } from '../utils/retry';
import { EngagementMetrics, PublishErrorKind, PublishResult } from '../types';

export interface TwitterCredentials {
  appKey: string;
  appSecret: string;
  accessToken: string;
  accessSecret: string;
}

export interface ClassifiedPublishError {
  kind: PublishErrorKind;
  usageCapExceeded: boolean;
  message: string;
}

// Max ids per lookup request on the v2 tweets endpoint
export const LOOKUP_BATCH_SIZE = 100;

const NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'ESOCKETTIMEDOUT']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function numberField(obj: Record<string, unknown>, key: string): number | undefined {
  const v = obj[key];
  return typeof v === 'number' ? v : undefined;
}

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
  const v = obj[key];
  return typeof v === 'string' ? v : undefined;
}

/**
 * Collect every human-readable fragment an SDK error carries: the message,
 * the v2 problem title/detail, and v1-style `errors[]` entries.
 */
function describe(err: Record<string, unknown>): { text: string; errorCodes: number[] } {
  const parts: string[] = [];
  const errorCodes: number[] = [];
  const message = stringField(err, 'message');
  if (message) parts.push(message);
  const data = err.data;
  if (isRecord(data)) {
    for (const key of ['title', 'detail', 'reason']) {
      const v = stringField(data, key);
      if (v) parts.push(v);
    }
    const errors = data.errors;
    if (Array.isArray(errors)) {
      for (const e of errors) {
        if (!isRecord(e)) continue;
        const m = stringField(e, 'message');
        if (m) parts.push(m);
        const c = numberField(e, 'code');
        if (c !== undefined) errorCodes.push(c);
      }
    }
  }
  return { text: parts.join(' | '), errorCodes };
}

/**
 * Map a thrown publish error onto the categories the post worker acts on
 */
export function classifyPublishError(error: unknown): ClassifiedPublishError {
  if (error instanceof TimeoutError) {
    return { kind: 'transient', usageCapExceeded: false, message: error.message };
  }
  if (!isRecord(error)) {
    return { kind: 'unknown', usageCapExceeded: false, message: String(error) };
  }

  const { text, errorCodes } = describe(error);
  const lower = text.toLowerCase();
  const status = numberField(error, 'code') ?? numberField(error, 'status') ?? numberField(error, 'statusCode');
  const message = text || 'unknown publish error';

  if (lower.includes('usagecapexceeded') || lower.includes('usage cap')) {
    return { kind: 'unknown', usageCapExceeded: true, message };
  }
  // 187 is the platform's "status is a duplicate" code
  if (errorCodes.includes(187) || lower.includes('duplicate')) {
    return { kind: 'duplicate', usageCapExceeded: false, message };
  }
  if (status === 401 || status === 403) {
    return { kind: 'permission_denied', usageCapExceeded: false, message };
  }
  if (status === 429 || (status !== undefined && status >= 500)) {
    return { kind: 'transient', usageCapExceeded: false, message };
  }

  // Network failures surface as ApiRequestError with the socket error inside
  const inner = isRecord(error.requestError) ? error.requestError : error;
  const code = stringField(inner, 'code') ?? stringField(error, 'code');
  if ((code && NETWORK_CODES.has(code)) || lower.includes('timeout') || lower.includes('socket hang up')) {
    return { kind: 'transient', usageCapExceeded: false, message };
  }
  return { kind: 'unknown', usageCapExceeded: false, message };
}

export class TwitterClient {
  private readonly client: TwitterApi;

  constructor(credentials: TwitterCredentials, private readonly timeoutMs = 15000) {
    this.client = new TwitterApi({
      appKey: credentials.appKey,
      appSecret: credentials.appSecret,
      accessToken: credentials.accessToken,
      accessSecret: credentials.accessSecret,
    });
  }

  /**
   * Confirms the credentials work; throws otherwise
   */
  public async verifyCredentials(): Promise<{ id: string; username: string }> {
    const me = await withTimeout(this.client.v2.me(), this.timeoutMs, 'Credential check');
    return { id: me.data.id, username: me.data.username };
  }

  public async publish(text: string): Promise<PublishResult> {
    try {
      const result = await withTimeout(this.client.v2.tweet(text), this.timeoutMs, 'Publish');
      logger.info(`Posted (ID: ${result.data.id})`);
      return { success: true, postId: result.data.id };
    } catch (error: unknown) {
      const classified = classifyPublishError(error);
      const line = `Failed to publish (${classified.kind}${classified.usageCapExceeded ? ', usage cap' : ''}): ${classified.message}`;
      if (classified.kind === 'transient') {
        logger.warn(line);
      } else {
        logger.error(line);
      }
      return {
        success: false,
        errorKind: classified.kind,
        message: classified.message,
        usageCapExceeded: classified.usageCapExceeded,
      };
    }
  }

  /**
   * Public metrics for up to 100 posts. Posts the platform no longer
   * returns (deleted, protected) are simply absent from the result.
   */
  public async fetchEngagement(postIds: string[]): Promise<Record<string, EngagementMetrics>> {
    if (postIds.length === 0) return {};
    if (postIds.length > LOOKUP_BATCH_SIZE) {
      throw new Error(`At most ${LOOKUP_BATCH_SIZE} ids per engagement lookup, got ${postIds.length}`);
    }
    const resp = await withTimeout(
      this.client.v2.tweets(postIds, { 'tweet.fields': ['public_metrics'] }),
      this.timeoutMs,
      'Engagement lookup',
    );
    const metrics: Record<string, EngagementMetrics> = {};
    for (const tweet of resp.data ?? []) {
      const m = tweet.public_metrics;
      if (!m) continue;
      metrics[tweet.id] = {
        likes: m.like_count,
        reshares: m.retweet_count + m.quote_count,
        replies: m.reply_count,
        impressions: m.impression_count ?? 0,
      };
    }
    if (resp.errors && resp.errors.length > 0) {
      logger.debug(`Engagement lookup skipped ${resp.errors.length} unavailable post(s)`);
    }
    return metrics;
  }
}
