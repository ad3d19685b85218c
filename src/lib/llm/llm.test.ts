import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createTextOrganizer } from './index';
import { GeminiTextOrganizer } from './gemini';
import { OpenAITextOrganizer } from './openai';
import { ExternalServiceError } from '@/lib/utils/errors';

const mockFetch = vi.fn();

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, statusText: status === 200 ? 'OK' : 'Error' });
}

beforeEach(() => {
  vi.stubGlobal('fetch', mockFetch);
});

afterEach(() => {
  mockFetch.mockReset();
  vi.unstubAllGlobals();
});

describe('createTextOrganizer', () => {
  it('builds the client for the configured provider', () => {
    expect(createTextOrganizer({ provider: 'gemini', apiKey: 'test-key', model: 'gemini-2.0-flash' }))
      .toBeInstanceOf(GeminiTextOrganizer);
    expect(createTextOrganizer({ provider: 'openai', apiKey: 'test-key', model: 'gpt-4o-mini', baseUrl: 'https://api.openai.com/v1' }))
      .toBeInstanceOf(OpenAITextOrganizer);
  });
});

describe('GeminiTextOrganizer', () => {
  const organizer = new GeminiTextOrganizer({ apiKey: 'test-key', model: 'gemini-2.0-flash' });

  it('sends the prompt with the requested temperature and joins the answer parts', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({
      candidates: [{ content: { parts: [{ text: '{"topic":' }, { text: ' "x"}' }] } }],
    }));

    await expect(organizer.organize('Organize this', { temperature: 0.2 })).resolves.toBe('{"topic": "x"}');

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash:generateContent');
    expect(init.headers['x-goog-api-key']).toBe('test-key');
    expect(JSON.parse(init.body)).toEqual({
      contents: [{ role: 'user', parts: [{ text: 'Organize this' }] }],
      generationConfig: { temperature: 0.2 },
    });
  });

  it('fails on an empty answer', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ candidates: [] }));

    await expect(organizer.organize('Organize this')).rejects.toThrow('Gemini error: returned no content');
  });

  it('fails when the prompt is blocked', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ promptFeedback: { blockReason: 'SAFETY' } }));

    await expect(organizer.organize('Organize this')).rejects.toThrow('Gemini error: prompt blocked (SAFETY)');
  });

  it('wraps HTTP failures as provider errors', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: { message: 'bad key' } }, 400));

    await expect(organizer.organize('Organize this')).rejects.toBeInstanceOf(ExternalServiceError);
  });
});

describe('OpenAITextOrganizer', () => {
  const organizer = new OpenAITextOrganizer({ apiKey: 'test-key', model: 'gpt-4o-mini', baseUrl: 'http://localhost:1234/v1' });

  it('posts a chat completion and returns the message content', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: 'answer' } }] }));

    await expect(organizer.organize('Organize this', { temperature: 0.2 })).resolves.toBe('answer');

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('http://localhost:1234/v1/chat/completions');
    expect(init.headers.authorization).toBe('Bearer test-key');
    const body = JSON.parse(init.body);
    expect(body.model).toBe('gpt-4o-mini');
    expect(body.temperature).toBe(0.2);
    expect(body.messages[body.messages.length - 1]).toEqual({ role: 'user', content: 'Organize this' });
  });

  it('fails when the completion has no content', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: null } }] }));

    await expect(organizer.organize('Organize this')).rejects.toThrow('OpenAI error: returned no content');
  });
});
