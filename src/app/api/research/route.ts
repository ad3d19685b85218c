import { NextRequest, NextResponse } from 'next/server';
import { researchTopic, createResearchDependencies } from '@/lib/orchestrator';
import { getConfig } from '@/lib/config';
import { logger } from '@/lib/utils/logger';
import { validateInput, researchRequestSchema, checkRateLimit, getRateLimitInfo } from '@/lib/utils/validation';
import { RateLimitError } from '@/lib/utils/errors';
import { clientIdentifier, errorResponse, newRequestId, readJson } from '@/lib/utils/responses';

const RESEARCH_RATE_LIMIT = 5;

export async function POST(req: NextRequest) {
  const startTime = Date.now();
  const requestId = newRequestId();

  try {
    const clientIP = clientIdentifier(req);
    if (!checkRateLimit(`research:${clientIP}`, RESEARCH_RATE_LIMIT, 60000)) {
      logger.warn('Rate limit exceeded', { component: 'api/research', clientIP, requestId });
      throw new RateLimitError('Too many requests. Please try again later.');
    }

    const data = validateInput(researchRequestSchema, await readJson(req), 'Invalid request data');
    logger.info('Research request validated', { component: 'api/research', requestId, topic: data.topic, numResults: data.numResults });

    const outcome = await researchTopic(data, createResearchDependencies(getConfig()));
    const remaining = getRateLimitInfo(`research:${clientIP}`)?.remaining ?? RESEARCH_RATE_LIMIT;
    const headers = { 'x-ratelimit-remaining': String(remaining) };

    logger.info('Research request completed', {
      component: 'api/research',
      requestId,
      status: outcome.status,
      duration: Date.now() - startTime
    });

    if (outcome.status === 'no-results') {
      return NextResponse.json(
        { ok: false, status: outcome.status, error: 'No search results found. Please try a different topic.' },
        { status: 404, headers }
      );
    }

    return NextResponse.json({ ok: true, ...outcome }, { headers });
  } catch (error) {
    return errorResponse(error, { component: 'api/research', requestId, startTime });
  }
}
