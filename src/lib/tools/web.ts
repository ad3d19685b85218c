import { load, type CheerioAPI } from 'cheerio';
import { z } from 'zod';
import { fetchWithRetry } from '@/lib/utils/retry';
import { logger } from '@/lib/utils/logger';
import { ExternalServiceError, getErrorMessage, toError } from '@/lib/utils/errors';
import { sanitizeUrl, sanitizeText, MAX_RESULTS } from '@/lib/utils/validation';
import type { SearchResult } from '@/lib/agents/types';

export const MAX_CONTENT_LENGTH = 8000;
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;
export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

const NON_CONTENT_SELECTOR = 'script, style, nav, footer, header';

/**
 * Reduces an HTML document to its readable text: non-content elements are
 * dropped with their subtrees, each line is trimmed and split on double spaces
 * (merged headline fragments), blank fragments are removed and the result is
 * cut at {@link MAX_CONTENT_LENGTH} characters, counted by code point so a
 * surrogate pair is never split.
 */
export function extractContent(html: string): string {
  const $: CheerioAPI = load(html);
  $(NON_CONTENT_SELECTOR).remove();

  const chunks = $.root()
    .text()
    .split(/\r\n|\r|\n/)
    .map(line => line.trim())
    .flatMap(line => line.split('  '))
    .map(phrase => phrase.trim())
    .filter(Boolean);

  return Array.from(chunks.join('\n')).slice(0, MAX_CONTENT_LENGTH).join('');
}

export type FetchArticleOptions = {
  timeoutMs?: number;
  maxAttempts?: number;
  userAgent?: string;
};

// Never throws: an unreachable or unparseable page contributes no content.
export async function fetchArticleContent(url: string, options: FetchArticleOptions = {}): Promise<string> {
  try {
    const sanitizedUrl = sanitizeUrl(url);
    logger.info('Fetching article content', { component: 'web', url: sanitizedUrl });

    const response = await fetchWithRetry(sanitizedUrl, {
      headers: { 'User-Agent': options.userAgent ?? BROWSER_USER_AGENT }
    }, {
      maxAttempts: options.maxAttempts ?? 1,
      timeoutMs: options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
    });

    const html = await response.text();
    const text = extractContent(html);
    logger.debug('Article content extracted', { component: 'web', url: sanitizedUrl, htmlSize: html.length, textLength: text.length });

    return text;
  } catch (error) {
    logger.error('Failed to fetch article content', { component: 'web', url }, toError(error));
    return '';
  }
}

const SERPAPI_ENDPOINT = 'https://serpapi.com/search.json';

const serpApiResponseSchema = z.object({
  error: z.string().optional(),
  organic_results: z.array(z.record(z.unknown())).optional(),
});

function field(obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  return typeof value === 'string' ? value : '';
}

export type SearchOptions = {
  apiKey: string;
  maxAttempts?: number;
};

// Never throws: provider failures are logged and reported as no results.
export async function searchWeb(query: string, numResults: number, options: SearchOptions): Promise<SearchResult[]> {
  const sanitizedQuery = sanitizeText(query);
  const max = Math.min(Math.max(Math.trunc(numResults), 1), MAX_RESULTS);
  logger.info('Starting web search', { component: 'web', query: sanitizedQuery, max });

  try {
    const params = new URLSearchParams({
      engine: 'google',
      q: sanitizedQuery,
      num: String(max),
      api_key: options.apiKey,
    });

    const response = await fetchWithRetry(`${SERPAPI_ENDPOINT}?${params.toString()}`, {}, {
      maxAttempts: options.maxAttempts ?? 1,
    });
    const parsed = serpApiResponseSchema.safeParse(await response.json());

    if (!parsed.success) {
      throw new ExternalServiceError('SerpAPI', 'Unexpected response payload');
    }
    if (parsed.data.error) {
      throw new ExternalServiceError('SerpAPI', parsed.data.error);
    }
    if (!parsed.data.organic_results) {
      logger.warn('No search results found', { component: 'web', query: sanitizedQuery });
      return [];
    }

    const results: SearchResult[] = parsed.data.organic_results.slice(0, max).map((obj) => ({
      title: sanitizeText(field(obj, 'title')),
      snippet: sanitizeText(field(obj, 'snippet')),
      url: field(obj, 'link'),
    }));

    logger.info('Web search completed', {
      component: 'web',
      query: sanitizedQuery,
      resultsCount: results.length
    });

    return results;
  } catch (error) {
    // The request URL carries the API key, so only the message is logged.
    logger.error('Web search failed', {
      component: 'web',
      query: sanitizedQuery,
      error: getErrorMessage(error)
    });
    return [];
  }
}
