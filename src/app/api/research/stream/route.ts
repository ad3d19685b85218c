import { NextRequest } from 'next/server';
import { researchTopic, createResearchDependencies } from '@/lib/orchestrator';
import { getConfig } from '@/lib/config';
import { logger } from '@/lib/utils/logger';
import { validateInput, researchRequestSchema, checkRateLimit } from '@/lib/utils/validation';
import { RateLimitError, getErrorMessage, toError } from '@/lib/utils/errors';
import { clientIdentifier, errorResponse, newRequestId, readJson } from '@/lib/utils/responses';
import { SseWriter } from '@/lib/sse';

export async function POST(req: NextRequest) {
  const startTime = Date.now();
  const requestId = newRequestId();

  try {
    const clientIP = clientIdentifier(req);
    if (!checkRateLimit(`research:${clientIP}`, 5, 60000)) {
      throw new RateLimitError('Too many requests. Please try again later.');
    }
    const data = validateInput(researchRequestSchema, await readJson(req), 'Invalid request data');
    const deps = createResearchDependencies(getConfig());

    let writer: SseWriter | undefined;
    const stream = new ReadableStream<Uint8Array>({
      async start(controller) {
        const sse = new SseWriter(controller);
        writer = sse;

        try {
          const outcome = await researchTopic(data, deps, (progress) => {
            sse.send('status', progress);
          });
          if (!sse.send('done', outcome)) {
            logger.info('Client left before the research finished', { component: 'api/research/stream', requestId });
          }
        } catch (e: unknown) {
          logger.error('Research stream failed', { component: 'api/research/stream', requestId }, toError(e));
          sse.send('error', { message: getErrorMessage(e) });
        } finally {
          sse.close();
          logger.info('Research stream closed', { component: 'api/research/stream', requestId, duration: Date.now() - startTime });
        }
      },
      cancel() {
        writer?.markClosed();
      },
    });

    return new Response(stream, {
      headers: {
        'content-type': 'text/event-stream',
        'cache-control': 'no-cache, no-transform',
        connection: 'keep-alive',
      },
    });
  } catch (error) {
    return errorResponse(error, { component: 'api/research/stream', requestId, startTime });
  }
}
