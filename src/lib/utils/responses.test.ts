import { describe, expect, it } from 'vitest';
import { errorResponse } from './responses';
import { ConfigurationError, RateLimitError, ValidationError } from './errors';

const context = { component: 'test', requestId: 'req-1', startTime: Date.now() };

describe('errorResponse', () => {
  it('uses the status and message of operational errors', async () => {
    const res = errorResponse(new ValidationError('Invalid request data: topic: Required'), context);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: 'Invalid request data: topic: Required' });
  });

  it('maps rate limiting to 429', () => {
    expect(errorResponse(new RateLimitError(), context).status).toBe(429);
  });

  it('hides the details of unexpected and configuration errors', async () => {
    for (const error of [new Error('boom'), new ConfigurationError('Invalid configuration: GOOGLE_API_KEY missing')]) {
      const res = errorResponse(error, context);
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ ok: false, error: 'An unexpected error occurred. Please try again.' });
    }
  });
});
