import { describe, expect, it, vi } from 'vitest';
import type { OrganizeOptions, TextOrganizer } from '@/lib/llm';
import { KnowledgeTreeBuilder } from './agents/organizer';
import type { ResearchProgress, SearchResult } from './agents/types';
import { researchTopic, type ResearchDependencies } from './orchestrator';

const treeAnswer = JSON.stringify({
  topic: 'Tides',
  subtopics: [{ name: 'Causes', key_points: [{ point: 'Moon', explanation: 'Lunar gravity pulls the oceans.' }] }],
});

function setup(options: {
  results: SearchResult[];
  pages?: Record<string, string>;
  answer?: string | Error;
}) {
  const search = vi.fn(async (_query: string, _numResults: number) => options.results);
  const fetchArticle = vi.fn(async (url: string) => options.pages?.[url] ?? '');
  const organize = vi.fn(async (_prompt: string, _options?: OrganizeOptions) => {
    const answer = options.answer ?? treeAnswer;
    if (answer instanceof Error) throw answer;
    return answer;
  });
  const organizer: TextOrganizer = { provider: 'fake', model: 'fake-model', organize };
  const deps: ResearchDependencies = { search, fetchArticle, builder: new KnowledgeTreeBuilder(organizer) };
  return { deps, search, fetchArticle, organize };
}

const results: SearchResult[] = [
  { title: 'Alpha', snippet: 'a', url: 'https://a.example' },
  { title: 'Beta', snippet: 'b', url: 'https://b.example' },
  { title: 'Gamma', snippet: 'c', url: 'https://c.example' },
];

describe('researchTopic', () => {
  it('reports no results without fetching or calling the model', async () => {
    const { deps, search, fetchArticle, organize } = setup({ results: [] });

    const outcome = await researchTopic({ topic: 'Tides', numResults: 3 }, deps);

    expect(outcome).toEqual({ status: 'no-results', topic: 'Tides' });
    expect(search).toHaveBeenCalledWith('Tides', 3);
    expect(fetchArticle).toHaveBeenCalledTimes(0);
    expect(organize).toHaveBeenCalledTimes(0);
  });

  it('skips empty pages and keeps the search order of the rest', async () => {
    const { deps, organize } = setup({
      results,
      pages: { 'https://a.example': 'alpha text', 'https://c.example': 'gamma text' },
    });

    const outcome = await researchTopic({ topic: 'Tides', numResults: 3 }, deps);

    expect(outcome.status).toBe('ok');
    if (outcome.status === 'no-results') return;
    expect(outcome.tree.sources).toEqual(['https://a.example', 'https://c.example']);

    const [prompt] = organize.mock.calls[0];
    expect(prompt).toContain('SOURCE: Alpha\nalpha text\n\nSOURCE: Gamma\ngamma text');
    expect(prompt).not.toContain('SOURCE: Beta');
  });

  it('keeps source order when fetches finish out of order', async () => {
    const { deps, fetchArticle, organize } = setup({ results });
    const delays: Record<string, number> = { 'https://a.example': 30, 'https://b.example': 0, 'https://c.example': 10 };
    fetchArticle.mockImplementation(async (url: string) => {
      await new Promise(resolve => setTimeout(resolve, delays[url]));
      return `text of ${url}`;
    });

    const outcome = await researchTopic({ topic: 'Tides', numResults: 3 }, deps);

    if (outcome.status === 'no-results') throw new Error('expected a tree');
    expect(outcome.tree.sources).toEqual(['https://a.example', 'https://b.example', 'https://c.example']);
    const [prompt] = organize.mock.calls[0];
    expect(prompt).toContain([
      'SOURCE: Alpha\ntext of https://a.example',
      'SOURCE: Beta\ntext of https://b.example',
      'SOURCE: Gamma\ntext of https://c.example',
    ].join('\n\n'));
  });

  it('attaches sources to a degraded tree as well', async () => {
    const { deps } = setup({
      results,
      pages: { 'https://b.example': 'beta text' },
      answer: new Error('model unavailable'),
    });

    const outcome = await researchTopic({ topic: 'Tides', numResults: 3 }, deps);

    expect(outcome).toEqual({
      status: 'degraded',
      reason: 'model unavailable',
      tree: {
        topic: 'Tides',
        subtopics: [
          {
            name: 'Error generating knowledge tree',
            key_points: [{ point: 'Error', explanation: 'Failed to generate knowledge tree: model unavailable' }],
          },
        ],
        sources: ['https://b.example'],
      },
    });
  });

  it('still asks the model when every page came back empty', async () => {
    const { deps, organize } = setup({ results });

    const outcome = await researchTopic({ topic: 'Tides', numResults: 3 }, deps);

    expect(organize).toHaveBeenCalledTimes(1);
    if (outcome.status === 'no-results') throw new Error('expected a tree');
    expect(outcome.tree.sources).toEqual([]);
  });

  it('reports progress through every phase', async () => {
    const { deps } = setup({ results, pages: { 'https://a.example': 'alpha text' } });
    const events: ResearchProgress[] = [];

    await researchTopic({ topic: 'Tides', numResults: 3 }, deps, (event) => events.push(event));

    expect(events.map(e => e.phase)).toEqual(['search', 'fetch', 'fetch', 'fetch', 'fetch', 'organize', 'done']);
    expect(events[events.length - 1].progress).toBe(1);
  });
});
