import { z } from 'zod';

export type SearchResult = {
  title: string;
  snippet: string;
  url: string;
};

export type SourceDocument = {
  title: string;
  content: string;
  url: string;
};

// LLM output is coerced field by field: a missing or mistyped string becomes ''
// and a missing list becomes []. Entries of a list that cannot be coerced are
// dropped one by one. Counts are never enforced.
const text = () => z.string().catch('');

function listOf<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(z.unknown())
    .catch([])
    .transform(entries =>
      entries.flatMap((entry): z.infer<T>[] => {
        const parsed = item.safeParse(entry);
        return parsed.success ? [parsed.data] : [];
      })
    );
}

export const keyPointSchema = z.object({
  point: text(),
  explanation: text(),
});

export const subtopicSchema = z.object({
  name: text(),
  key_points: listOf(keyPointSchema),
});

export const knowledgeTreeSchema = z.object({
  topic: text(),
  subtopics: listOf(subtopicSchema),
  sources: listOf(z.string()),
});

export const aspectSchema = z.object({
  name: text(),
  details: text(),
  examples: listOf(z.string()),
});

export const expandedSubtopicSchema = z.object({
  subtopic: text(),
  overview: text(),
  aspects: listOf(aspectSchema),
});

export type KeyPoint = z.infer<typeof keyPointSchema>;
export type Subtopic = z.infer<typeof subtopicSchema>;
export type KnowledgeTree = z.infer<typeof knowledgeTreeSchema>;
export type Aspect = z.infer<typeof aspectSchema>;
export type ExpandedSubtopic = z.infer<typeof expandedSubtopicSchema>;

/**
 * Outcome of an LLM-backed generation. `value` is always shape-valid; when the
 * call or the decode failed it is a placeholder and `reason` says why.
 */
export type Generated<T> =
  | { status: 'ok'; value: T }
  | { status: 'degraded'; value: T; reason: string };

export type ResearchInput = {
  topic: string;
  numResults: number;
};

export const researchOutcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('no-results'), topic: z.string() }),
  z.object({ status: z.literal('ok'), tree: knowledgeTreeSchema }),
  z.object({ status: z.literal('degraded'), tree: knowledgeTreeSchema, reason: z.string() }),
]);

export type ResearchOutcome = z.infer<typeof researchOutcomeSchema>;

export const researchProgressSchema = z.object({
  phase: z.enum(['search', 'fetch', 'organize', 'done']),
  message: z.string(),
  /** Fraction of the run completed, 0..1. */
  progress: z.number(),
});

export type ResearchProgress = z.infer<typeof researchProgressSchema>;
