import { z } from 'zod';
import { fetchWithRetry } from '@/lib/utils/retry';
import { ExternalServiceError, NetworkError } from '@/lib/utils/errors';
import type { OrganizeOptions, TextOrganizer } from './types';

export type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string };

export type OpenAIOptions = {
  apiKey: string;
  model: string;
  baseUrl?: string;
  maxAttempts?: number;
};

const chatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
  })),
});

export async function chatComplete(messages: ChatMessage[], options: OpenAIOptions, temperature = 0.2): Promise<string> {
  const baseUrl = options.baseUrl ?? 'https://api.openai.com/v1';
  let res: Response;
  try {
    res = await fetchWithRetry(`${baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        authorization: `Bearer ${options.apiKey}`,
      },
      body: JSON.stringify({ model: options.model, messages, temperature }),
    }, { maxAttempts: options.maxAttempts ?? 1 });
  } catch (error) {
    if (error instanceof NetworkError) {
      throw new ExternalServiceError('OpenAI', error.message, error.context);
    }
    throw error;
  }
  const parsed = chatCompletionSchema.safeParse(await res.json());
  const content = parsed.success ? parsed.data.choices[0]?.message.content : undefined;
  if (typeof content !== 'string') throw new ExternalServiceError('OpenAI', 'returned no content');
  return content;
}

export class OpenAITextOrganizer implements TextOrganizer {
  readonly provider = 'openai';
  readonly model: string;

  constructor(private readonly options: OpenAIOptions) {
    this.model = options.model;
  }

  organize(prompt: string, { temperature = 0.2 }: OrganizeOptions = {}): Promise<string> {
    return chatComplete([
      { role: 'system', content: 'You are a knowledge organizer who answers with well-formed JSON.' },
      { role: 'user', content: prompt },
    ], this.options, temperature);
  }
}
