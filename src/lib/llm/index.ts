import type { LLMConfig } from '@/lib/config';
import { GeminiTextOrganizer } from './gemini';
import { OpenAITextOrganizer } from './openai';
import type { TextOrganizer } from './types';

export type { TextOrganizer, OrganizeOptions } from './types';

export function createTextOrganizer(config: LLMConfig, maxAttempts = 1): TextOrganizer {
  switch (config.provider) {
    case 'openai':
      return new OpenAITextOrganizer({ apiKey: config.apiKey, model: config.model, baseUrl: config.baseUrl, maxAttempts });
    case 'gemini':
      return new GeminiTextOrganizer({ apiKey: config.apiKey, model: config.model, maxAttempts });
  }
}
