import { NextRequest, NextResponse } from 'next/server';
import { KnowledgeTreeBuilder } from '@/lib/agents/organizer';
import { createTextOrganizer } from '@/lib/llm';
import { getConfig } from '@/lib/config';
import { logger } from '@/lib/utils/logger';
import { validateInput, expandRequestSchema, checkRateLimit } from '@/lib/utils/validation';
import { RateLimitError } from '@/lib/utils/errors';
import { clientIdentifier, errorResponse, newRequestId, readJson } from '@/lib/utils/responses';

export async function POST(req: NextRequest) {
  const startTime = Date.now();
  const requestId = newRequestId();

  try {
    const clientIP = clientIdentifier(req);
    if (!checkRateLimit(`expand:${clientIP}`, 10, 60000)) {
      logger.warn('Rate limit exceeded', { component: 'api/expand', clientIP, requestId });
      throw new RateLimitError('Too many requests. Please try again later.');
    }

    const data = validateInput(expandRequestSchema, await readJson(req), 'Invalid request data');
    const config = getConfig();
    const builder = new KnowledgeTreeBuilder(createTextOrganizer(config.llm, config.httpMaxAttempts));

    // The tree itself is the material the expansion works from.
    const generated = await builder.expandSubtopic(data.topic, data.subtopic, JSON.stringify(data.tree));

    logger.info('Expand request completed', {
      component: 'api/expand',
      requestId,
      subtopic: data.subtopic,
      status: generated.status,
      duration: Date.now() - startTime
    });

    return NextResponse.json(generated.status === 'ok'
      ? { ok: true, status: generated.status, expansion: generated.value }
      : { ok: true, status: generated.status, expansion: generated.value, reason: generated.reason });
  } catch (error) {
    return errorResponse(error, { component: 'api/expand', requestId, startTime });
  }
}
