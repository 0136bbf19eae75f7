import fetch from 'node-fetch';
import { logger, errorMessage } from './logger';

const TINYURL_ENDPOINT = 'http://tinyurl.com/api-create.php';

/**
 * Shorten a link through TinyURL. Never throws: any failure or unexpected
 * answer returns the original URL.
 */
export async function shortenUrl(longUrl: string, timeoutMs = 5000): Promise<string> {
  try {
    const resp = await fetch(`${TINYURL_ENDPOINT}?url=${encodeURIComponent(longUrl)}`, { timeout: timeoutMs });
    if (!resp.ok) {
      logger.debug(`URL shortener returned ${resp.status}; using long URL`);
      return longUrl;
    }
    const short = (await resp.text()).trim();
    return short.startsWith('http') ? short : longUrl;
  } catch (err) {
    logger.debug(`URL shortener failed (${errorMessage(err)}); using long URL`);
    return longUrl;
  }
}
