import type { SearchResult, SourceDocument } from './types';
import { logger } from '@/lib/utils/logger';

export type SearchFn = (query: string, numResults: number) => Promise<SearchResult[]>;
export type FetchArticleFn = (url: string) => Promise<string>;

/**
 * Fetches every search result and keeps those that yielded text. Fetches run
 * concurrently; the returned documents keep the search order.
 */
export async function gatherSources(
  results: SearchResult[],
  fetchArticle: FetchArticleFn,
  onFetched?: (done: number, total: number) => void
): Promise<SourceDocument[]> {
  let done = 0;
  const contents = await Promise.all(results.map(async (r) => {
    const content = await fetchArticle(r.url);
    onFetched?.(++done, results.length);
    return content;
  }));

  const sources: SourceDocument[] = [];
  results.forEach((r, i) => {
    const content = contents[i];
    if (!content) {
      logger.debug('Skipping source without content', { component: 'researcher', url: r.url });
      return;
    }
    sources.push({ title: r.title, content, url: r.url });
  });
  return sources;
}

export function combineSources(sources: SourceDocument[]): string {
  return sources.map(s => `SOURCE: ${s.title}\n${s.content}`).join('\n\n');
}
