"use client";
import { useReducer, useState } from 'react';
import ReactMarkdown from 'react-markdown';
import remarkGfm from 'remark-gfm';
import { z } from 'zod';
import { useErrorHandler } from '@/lib/components/ErrorBoundary';
import {
  explorerReducer,
  initialExplorerState,
  selectCurrentExpansion,
  selectCurrentSubtopic,
} from '@/lib/session';
import { readSse } from '@/lib/sse';
import {
  expandedSubtopicSchema,
  researchOutcomeSchema,
  researchProgressSchema,
} from '@/lib/agents/types';

const errorBodySchema = z.object({ error: z.string() });
const streamErrorSchema = z.object({ message: z.string() });

const expandResponseSchema = z.object({
  expansion: expandedSubtopicSchema,
  reason: z.string().optional(),
});

async function responseError(res: Response): Promise<string> {
  const parsed = errorBodySchema.safeParse(await res.json().catch(() => null));
  return parsed.success ? parsed.data.error : `Server error: ${res.status}`;
}

export default function Home() {
  const [topic, setTopic] = useState('');
  const [numResults, setNumResults] = useState(3);
  const [loading, setLoading] = useState(false);
  const [expanding, setExpanding] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [progress, setProgress] = useState<string[]>([]);
  const [explorer, dispatch] = useReducer(explorerReducer, initialExplorerState);

  const reportError = useErrorHandler();
  const subtopic = selectCurrentSubtopic(explorer);
  const expansion = selectCurrentExpansion(explorer);

  const generate = async () => {
    setError(null);
    setProgress([]);

    if (!topic.trim()) {
      setError('Please enter a topic to research.');
      return;
    }

    setLoading(true);
    try {
      const res = await fetch('/api/research/stream', {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ topic, numResults }),
      });

      if (!res.ok) throw new Error(await responseError(res));
      if (!res.body) throw new Error('No response body received');

      for await (const message of readSse(res.body)) {
        const payload: unknown = JSON.parse(message.data);

        if (message.event === 'status') {
          const status = researchProgressSchema.safeParse(payload);
          if (status.success) setProgress(prev => [...prev, status.data.message]);
        } else if (message.event === 'error') {
          throw new Error(streamErrorSchema.parse(payload).message);
        } else if (message.event === 'done') {
          const outcome = researchOutcomeSchema.parse(payload);
          if (outcome.status === 'no-results') {
            setError('No search results found. Please try a different topic.');
          } else {
            dispatch({
              type: 'treeLoaded',
              tree: outcome.tree,
              warning: outcome.status === 'degraded' ? outcome.reason : undefined,
            });
          }
        }
      }
    } catch (err) {
      const e = err instanceof Error ? err : new Error('Unknown error occurred');
      setError(`An error occurred: ${e.message}`);
      reportError(e, { componentStack: 'Home/generate' });
    } finally {
      setLoading(false);
    }
  };

  const expand = async () => {
    if (!explorer.tree || !subtopic || expansion) return;

    const treeVersion = explorer.treeVersion;
    setExpanding(true);
    setError(null);
    try {
      const res = await fetch('/api/expand', {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ topic: explorer.tree.topic, subtopic: subtopic.name, tree: explorer.tree }),
      });
      if (!res.ok) throw new Error(await responseError(res));

      const body = expandResponseSchema.parse(await res.json());
      dispatch({ type: 'expansionLoaded', treeVersion, name: subtopic.name, expansion: body.expansion });
    } catch (err) {
      const e = err instanceof Error ? err : new Error('Unknown error occurred');
      setError(`An error occurred while expanding the subtopic: ${e.message}`);
      reportError(e, { componentStack: 'Home/expand' });
    } finally {
      setExpanding(false);
    }
  };

  return (
    <main className="mx-auto max-w-6xl p-6 space-y-6">
      <div className="text-center">
        <h1 className="text-3xl font-bold text-gray-900">Knowledge Tree Explorer</h1>
        <p className="text-gray-600 mt-2">
          Research any topic on the web and explore it as a tree of subtopics and key points
        </p>
      </div>

      <section className="space-y-4">
        <div>
          <label className="block text-sm font-medium text-gray-700">Topic to research</label>
          <input
            className="w-full mt-1 border border-gray-300 rounded-md px-3 py-2 focus:outline-none focus:ring-2 focus:ring-emerald-500"
            value={topic}
            onChange={(e) => setTopic(e.target.value)}
            placeholder="e.g. Quantum Computing"
            maxLength={200}
            disabled={loading}
          />
        </div>

        <div>
          <label className="block text-sm font-medium text-gray-700">
            Number of search results to analyze: {numResults}
          </label>
          <input
            type="range"
            className="w-full mt-1"
            min={1}
            max={10}
            value={numResults}
            onChange={(e) => setNumResults(parseInt(e.target.value, 10))}
            disabled={loading}
          />
        </div>

        <button
          disabled={loading}
          onClick={generate}
          className="w-full bg-emerald-600 text-white px-4 py-2 rounded-md font-medium hover:bg-emerald-700 disabled:opacity-50 disabled:cursor-not-allowed"
        >
          {loading ? 'Researching…' : 'Generate Knowledge Tree'}
        </button>

        {error && (
          <div className="bg-red-50 border border-red-200 text-red-700 px-4 py-3 rounded-md text-sm">
            {error}
          </div>
        )}

        {loading && progress.length > 0 && (
          <ul className="bg-emerald-50 border border-emerald-200 rounded-md p-4 list-disc list-inside text-sm text-emerald-900">
            {progress.map((p, i) => <li key={i}>{p}</li>)}
          </ul>
        )}
      </section>

      {explorer.tree && (
        <section className="space-y-6">
          <h2 className="text-2xl font-semibold">Knowledge Tree: {explorer.tree.topic}</h2>

          {explorer.treeWarning && (
            <div className="bg-amber-50 border border-amber-200 text-amber-800 px-4 py-3 rounded-md text-sm">
              The model output could not be organized: {explorer.treeWarning}
            </div>
          )}

          <div className="grid md:grid-cols-3 gap-6">
            <div className="space-y-2">
              <h3 className="text-lg font-medium">Topic Structure</h3>
              {explorer.tree.subtopics.map((s, i) => (
                <button
                  key={`${i}-${s.name}`}
                  onClick={() => dispatch({ type: 'subtopicSelected', name: s.name })}
                  className={`block w-full text-left px-3 py-2 rounded-md border ${
                    s.name === explorer.currentSubtopic ? 'border-emerald-500 bg-emerald-50' : 'border-gray-200'
                  }`}
                >
                  📚 {s.name}
                </button>
              ))}
            </div>

            <div className="md:col-span-2 space-y-4">
              {subtopic && (
                <>
                  <h3 className="text-lg font-medium">Subtopic: {subtopic.name}</h3>
                  {subtopic.key_points.map((kp, i) => (
                    <div key={i} className="border-b border-gray-200 pb-3">
                      <p className="font-semibold">{kp.point}</p>
                      <p className="italic text-gray-700">{kp.explanation}</p>
                    </div>
                  ))}

                  {!expansion && (
                    <button
                      disabled={expanding}
                      onClick={expand}
                      className="bg-gray-800 text-white px-4 py-2 rounded-md text-sm disabled:opacity-50"
                    >
                      {expanding ? 'Expanding subtopic…' : '🔍 Expand this subtopic'}
                    </button>
                  )}
                </>
              )}

              {expansion && (
                <div className="space-y-3">
                  <h3 className="text-lg font-medium">Detailed: {expansion.subtopic}</h3>
                  <p><strong>Overview:</strong> {expansion.overview}</p>
                  {expansion.aspects.map((aspect, i) => (
                    <details key={i} className="border border-gray-200 rounded-md p-3">
                      <summary className="cursor-pointer font-medium">🔎 {aspect.name}</summary>
                      <div className="prose max-w-none mt-2">
                        <ReactMarkdown remarkPlugins={[remarkGfm]}>{aspect.details}</ReactMarkdown>
                      </div>
                      {aspect.examples.length > 0 && (
                        <>
                          <p className="font-semibold mt-2">Examples:</p>
                          <ul className="list-disc list-inside">
                            {aspect.examples.map((example, j) => <li key={j}>{example}</li>)}
                          </ul>
                        </>
                      )}
                    </details>
                  ))}
                </div>
              )}
            </div>
          </div>

          <div>
            <h2 className="text-xl font-semibold">Sources</h2>
            <ol className="list-decimal list-inside text-sm">
              {explorer.tree.sources.map((source) => (
                <li key={source}>
                  <a className="text-emerald-700 hover:underline" href={source} target="_blank" rel="noreferrer">
                    {source}
                  </a>
                </li>
              ))}
            </ol>
          </div>
        </section>
      )}
    </main>
  );
}
