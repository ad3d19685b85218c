import { gatherSources, combineSources, type SearchFn, type FetchArticleFn } from './agents/researcher';
import { KnowledgeTreeBuilder } from './agents/organizer';
import type { ResearchInput, ResearchOutcome, ResearchProgress } from './agents/types';
import type { AppConfig } from './config';
import { createTextOrganizer } from './llm';
import { searchWeb, fetchArticleContent } from './tools/web';
import { logger } from './utils/logger';

export type ResearchDependencies = {
  search: SearchFn;
  fetchArticle: FetchArticleFn;
  builder: KnowledgeTreeBuilder;
};

export function createResearchDependencies(config: AppConfig): ResearchDependencies {
  return {
    search: (query, numResults) => searchWeb(query, numResults, {
      apiKey: config.serpApiKey,
      maxAttempts: config.httpMaxAttempts,
    }),
    fetchArticle: (url) => fetchArticleContent(url, {
      timeoutMs: config.fetchTimeoutMs,
      maxAttempts: config.httpMaxAttempts,
    }),
    builder: new KnowledgeTreeBuilder(createTextOrganizer(config.llm, config.httpMaxAttempts)),
  };
}

export async function researchTopic(
  input: ResearchInput,
  deps: ResearchDependencies,
  onProgress?: (event: ResearchProgress) => void
): Promise<ResearchOutcome> {
  const startTime = Date.now();
  const { topic, numResults } = input;
  const report = (event: ResearchProgress) => onProgress?.(event);

  logger.info('Starting research', { component: 'orchestrator', topic, numResults });

  report({ phase: 'search', message: 'Searching the web for information…', progress: 0.2 });
  const results = await deps.search(topic, numResults);

  if (!results.length) {
    logger.warn('Research stopped: no search results', { component: 'orchestrator', topic });
    report({ phase: 'done', message: 'No search results found.', progress: 1 });
    return { status: 'no-results', topic };
  }

  report({ phase: 'fetch', message: `Extracting content from ${results.length} websites…`, progress: 0.4 });
  const sources = await gatherSources(results, deps.fetchArticle, (done, total) => {
    report({ phase: 'fetch', message: `Fetched ${done} of ${total} pages`, progress: 0.4 + (done / total) * 0.4 });
  });

  logger.info('Sources gathered', {
    component: 'orchestrator',
    topic,
    searchResults: results.length,
    usableSources: sources.length,
  });

  report({ phase: 'organize', message: 'Generating knowledge tree…', progress: 0.8 });
  const generated = await deps.builder.generateKnowledgeTree(topic, combineSources(sources));
  const tree = { ...generated.value, sources: sources.map(s => s.url) };

  logger.info('Research completed', {
    component: 'orchestrator',
    topic,
    status: generated.status,
    subtopics: tree.subtopics.length,
    duration: Date.now() - startTime,
  });
  report({ phase: 'done', message: 'Knowledge tree generated.', progress: 1 });

  return generated.status === 'ok'
    ? { status: 'ok', tree }
    : { status: 'degraded', tree, reason: generated.reason };
}
