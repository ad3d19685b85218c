import { z } from 'zod';
import { knowledgeTreeSchema } from '@/lib/agents/types';
import { ValidationError } from './errors';

export const MAX_RESULTS = 10;

// Request schemas
export const researchRequestSchema = z.object({
  topic: z.string()
    .trim()
    .min(1, 'Please enter a topic to research.')
    .max(200, 'Topic must be less than 200 characters'),

  numResults: z.number()
    .int('Number of results must be an integer')
    .min(1, 'At least one search result is required')
    .max(MAX_RESULTS, `Maximum ${MAX_RESULTS} search results allowed`)
    .default(3),
});

export type ResearchRequest = z.infer<typeof researchRequestSchema>;

export const expandRequestSchema = z.object({
  topic: z.string().trim().min(1, 'Topic is required').max(200, 'Topic must be less than 200 characters'),
  subtopic: z.string().trim().min(1, 'Subtopic is required').max(500, 'Subtopic name too long'),
  tree: knowledgeTreeSchema,
});

export type ExpandRequest = z.infer<typeof expandRequestSchema>;

// Sanitization functions
export function sanitizeText(input: string): string {
  return input
    .replace(/[<>]/g, '') // Remove potential HTML
    .replace(/[\x00-\x1f\x7f-\x9f]/g, '') // Remove control characters
    .trim();
}

export function sanitizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ValidationError('Invalid URL format', { url });
  }
  // Only allow http and https protocols
  if (!['http:', 'https:'].includes(parsed.protocol)) {
    throw new ValidationError('Invalid protocol', { url, protocol: parsed.protocol });
  }
  return parsed.toString();
}

export function validateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  errorMessage: string = 'Validation failed'
): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }
  const fieldErrors = result.error.issues.map((e: z.ZodIssue) =>
    e.path.length ? `${e.path.join('.')}: ${e.message}` : e.message
  );
  throw new ValidationError(`${errorMessage}: ${fieldErrors.join(', ')}`, { issues: fieldErrors });
}

// Rate limiting utilities
const requestCounts = new Map<string, { count: number; resetTime: number; limit: number }>();

export function checkRateLimit(
  identifier: string,
  maxRequests: number = 10,
  windowMs: number = 60000 // 1 minute
): boolean {
  const now = Date.now();

  const existing = requestCounts.get(identifier);

  if (!existing || now > existing.resetTime) {
    requestCounts.set(identifier, { count: 1, resetTime: now + windowMs, limit: maxRequests });
    return true;
  }

  if (existing.count >= maxRequests) {
    return false;
  }

  existing.count++;
  return true;
}

export function getRateLimitInfo(identifier: string): {
  remaining: number;
  resetTime: number;
} | null {
  const existing = requestCounts.get(identifier);
  if (!existing) {
    return null;
  }

  return {
    remaining: Math.max(0, existing.limit - existing.count),
    resetTime: existing.resetTime
  };
}

export function resetRateLimits(): void {
  requestCounts.clear();
}
