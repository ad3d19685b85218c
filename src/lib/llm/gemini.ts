import { z } from 'zod';
import { fetchWithRetry } from '@/lib/utils/retry';
import { ExternalServiceError, NetworkError } from '@/lib/utils/errors';
import type { OrganizeOptions, TextOrganizer } from './types';

const GEMINI_ENDPOINT = 'https://generativelanguage.googleapis.com/v1beta/models';

export type GeminiOptions = {
  apiKey: string;
  model: string;
  maxAttempts?: number;
};

const generateContentSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).default([]),
    }).optional(),
    finishReason: z.string().optional(),
  })).default([]),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

export async function generateContent(prompt: string, options: GeminiOptions, temperature = 0.2): Promise<string> {
  let res: Response;
  try {
    res = await fetchWithRetry(`${GEMINI_ENDPOINT}/${encodeURIComponent(options.model)}:generateContent`, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'x-goog-api-key': options.apiKey,
      },
      body: JSON.stringify({
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: { temperature },
      }),
    }, { maxAttempts: options.maxAttempts ?? 1 });
  } catch (error) {
    if (error instanceof NetworkError) {
      throw new ExternalServiceError('Gemini', error.message, error.context);
    }
    throw error;
  }

  const parsed = generateContentSchema.safeParse(await res.json());
  if (!parsed.success) throw new ExternalServiceError('Gemini', 'unexpected response payload');

  const blockReason = parsed.data.promptFeedback?.blockReason;
  if (blockReason) throw new ExternalServiceError('Gemini', `prompt blocked (${blockReason})`);

  const parts = parsed.data.candidates[0]?.content?.parts ?? [];
  const text = parts.map(part => part.text ?? '').join('');
  if (!text) throw new ExternalServiceError('Gemini', 'returned no content');
  return text;
}

export class GeminiTextOrganizer implements TextOrganizer {
  readonly provider = 'gemini';
  readonly model: string;

  constructor(private readonly options: GeminiOptions) {
    this.model = options.model;
  }

  organize(prompt: string, { temperature = 0.2 }: OrganizeOptions = {}): Promise<string> {
    return generateContent(prompt, this.options, temperature);
  }
}
