import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';
import { ConfigurationError } from './utils/errors';

describe('loadConfig', () => {
  it('defaults to Gemini with a single request attempt', () => {
    const config = loadConfig({ SERPAPI_API_KEY: 'serp-test', GOOGLE_API_KEY: 'google-test' });

    expect(config).toEqual({
      serpApiKey: 'serp-test',
      llm: { provider: 'gemini', apiKey: 'google-test', model: 'gemini-2.0-flash' },
      fetchTimeoutMs: 10000,
      httpMaxAttempts: 1,
    });
  });

  it('configures OpenAI with a trimmed base url and custom model', () => {
    const config = loadConfig({
      SERPAPI_API_KEY: 'serp-test',
      LLM_PROVIDER: 'openai',
      OPENAI_API_KEY: 'openai-test',
      OPENAI_BASE_URL: 'http://localhost:8080/v1/',
      LLM_MODEL: 'local-model',
      FETCH_TIMEOUT_MS: '5000',
      HTTP_MAX_ATTEMPTS: '3',
    });

    expect(config.llm).toEqual({
      provider: 'openai',
      apiKey: 'openai-test',
      model: 'local-model',
      baseUrl: 'http://localhost:8080/v1',
    });
    expect(config.fetchTimeoutMs).toBe(5000);
    expect(config.httpMaxAttempts).toBe(3);
  });

  it('rejects a missing search key', () => {
    expect(() => loadConfig({ GOOGLE_API_KEY: 'google-test' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ GOOGLE_API_KEY: 'google-test' })).toThrow('SERPAPI_API_KEY is required');
  });

  it('rejects a missing key for the selected provider', () => {
    expect(() => loadConfig({ SERPAPI_API_KEY: 'serp-test', GOOGLE_API_KEY: '' }))
      .toThrow('GOOGLE_API_KEY is required when LLM_PROVIDER is gemini');
    expect(() => loadConfig({ SERPAPI_API_KEY: 'serp-test', LLM_PROVIDER: 'openai', GOOGLE_API_KEY: 'google-test' }))
      .toThrow('OPENAI_API_KEY is required when LLM_PROVIDER is openai');
  });
});
