import type { ZodType, ZodTypeDef } from 'zod';
import type { TextOrganizer } from '@/lib/llm';
import { extractJson } from '@/lib/utils/json';
import { logger } from '@/lib/utils/logger';
import { MalformedResponseError, getErrorMessage, toError } from '@/lib/utils/errors';
import { knowledgeTreePrompt, expansionPrompt } from './prompts';
import {
  ExpandedSubtopic,
  Generated,
  KnowledgeTree,
  expandedSubtopicSchema,
  knowledgeTreeSchema,
} from './types';

export const ORGANIZE_TEMPERATURE = 0.2;
export const TREE_FAILURE_SUBTOPIC = 'Error generating knowledge tree';
export const TREE_FAILURE_POINT = 'Error';

export function fallbackTree(topic: string, reason: string): KnowledgeTree {
  return {
    topic,
    subtopics: [
      {
        name: TREE_FAILURE_SUBTOPIC,
        key_points: [
          { point: TREE_FAILURE_POINT, explanation: `Failed to generate knowledge tree: ${reason}` },
        ],
      },
    ],
    sources: [],
  };
}

export function fallbackExpansion(subtopic: string, reason: string): ExpandedSubtopic {
  return {
    subtopic,
    overview: `Failed to expand subtopic: ${reason}`,
    aspects: [],
  };
}

function decode<T>(raw: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const json: unknown = JSON.parse(extractJson(raw));
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedResponseError('Model response is not a JSON object of the expected shape', {
      issues: parsed.error.issues.map(issue => issue.message),
    });
  }
  return parsed.data;
}

/**
 * Asks the model to organize source text into a knowledge tree and to expand
 * single subtopics. Neither operation throws: failures come back as a
 * `degraded` result carrying a placeholder of the same shape.
 */
export class KnowledgeTreeBuilder {
  constructor(private readonly organizer: TextOrganizer) {}

  async generateKnowledgeTree(topic: string, content: string): Promise<Generated<KnowledgeTree>> {
    logger.info('Generating knowledge tree', {
      component: 'organizer',
      topic,
      contentLength: content.length,
      provider: this.organizer.provider,
      model: this.organizer.model,
    });

    try {
      const raw = await this.organizer.organize(knowledgeTreePrompt(topic, content), { temperature: ORGANIZE_TEMPERATURE });
      const tree = decode(raw, knowledgeTreeSchema);
      logger.info('Knowledge tree generated', { component: 'organizer', topic, subtopics: tree.subtopics.length });
      return { status: 'ok', value: { ...tree, topic: tree.topic || topic } };
    } catch (error) {
      const reason = getErrorMessage(error);
      logger.error('Error generating knowledge tree', { component: 'organizer', topic }, toError(error));
      return { status: 'degraded', value: fallbackTree(topic, reason), reason };
    }
  }

  async expandSubtopic(topic: string, subtopic: string, content: string): Promise<Generated<ExpandedSubtopic>> {
    logger.info('Expanding subtopic', { component: 'organizer', topic, subtopic });

    try {
      const raw = await this.organizer.organize(expansionPrompt(topic, subtopic, content), { temperature: ORGANIZE_TEMPERATURE });
      const expansion = decode(raw, expandedSubtopicSchema);
      logger.info('Subtopic expanded', { component: 'organizer', topic, subtopic, aspects: expansion.aspects.length });
      return { status: 'ok', value: { ...expansion, subtopic: expansion.subtopic || subtopic } };
    } catch (error) {
      const reason = getErrorMessage(error);
      logger.error('Error expanding subtopic', { component: 'organizer', topic, subtopic }, toError(error));
      return { status: 'degraded', value: fallbackExpansion(subtopic, reason), reason };
    }
  }
}
