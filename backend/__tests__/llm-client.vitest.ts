import { describe, expect, it, vi } from 'vitest';

import { DEFAULT_CONFIG } from '../config.js';
import { ConfigError, LLMRequestError } from '../errors.js';
import {
  OpenAICompatibleClient,
  REPAIR_SYSTEM_PROMPT,
  buildRepairPrompt,
  createLLMClient,
  type FetchFunction,
} from '../llm-client.js';

interface RecordedRequest {
  url: string;
  headers: Headers;
  body: unknown;
}

type FakeReply = { content: string } | { status: number; text?: string; headers?: Record<string, string> };

const completion = (content: string): Response =>
  new Response(
    JSON.stringify({
      choices: [{ message: { role: 'assistant', content } }],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    }),
    { status: 200, headers: { 'content-type': 'application/json' } }
  );

const createFakeFetch = (replies: FakeReply[]) => {
  const requests: RecordedRequest[] = [];
  const fetch: FetchFunction = async (url, init) => {
    requests.push({
      url,
      headers: new Headers(init.headers),
      body: typeof init.body === 'string' ? JSON.parse(init.body) : null,
    });
    const reply = replies[Math.min(requests.length - 1, replies.length - 1)];
    if ('content' in reply) {
      return completion(reply.content);
    }
    return new Response(reply.text ?? '', { status: reply.status, headers: reply.headers });
  };
  return { fetch, requests };
};

const createClient = (replies: FakeReply[], options: { referer?: string; title?: string } = {}) => {
  const fake = createFakeFetch(replies);
  const sleep = vi.fn(async (_ms: number) => undefined);
  const client = new OpenAICompatibleClient({
    apiKey: 'test-key',
    model: 'test-model',
    baseUrl: 'https://llm.example.test/v1/',
    fetch: fake.fetch,
    sleep,
    ...options,
  });
  return { client, requests: fake.requests, sleep };
};

describe('OpenAICompatibleClient', () => {
  describe('generate', () => {
    it('posts the system and user messages to the chat completions endpoint', async () => {
      const { client, requests } = createClient([{ content: 'Create main.txt' }]);

      const reply = await client.generate('Summarize the issue', 'Be brief.');

      expect(reply).toBe('Create main.txt');
      expect(requests).toHaveLength(1);
      expect(requests[0].url).toBe('https://llm.example.test/v1/chat/completions');
      expect(requests[0].headers.get('authorization')).toBe('Bearer test-key');
      expect(requests[0].body).toEqual({
        model: 'test-model',
        messages: [
          { role: 'system', content: 'Be brief.' },
          { role: 'user', content: 'Summarize the issue' },
        ],
      });
    });

    it('sends attribution headers when configured', async () => {
      const { client, requests } = createClient([{ content: 'ok' }], { referer: 'https://example.test', title: 'demo' });

      await client.generate('ping');

      expect(requests[0].headers.get('http-referer')).toBe('https://example.test');
      expect(requests[0].headers.get('x-title')).toBe('demo');
      expect(requests[0].body).toEqual({ model: 'test-model', messages: [{ role: 'user', content: 'ping' }] });
    });

    it('retries server errors', async () => {
      const { client, requests, sleep } = createClient([{ status: 502, text: 'bad gateway' }, { content: 'recovered' }]);

      await expect(client.generate('ping')).resolves.toBe('recovered');
      expect(requests).toHaveLength(2);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('waits for the retry-after delay when rate limited', async () => {
      const { client, sleep } = createClient([
        { status: 429, headers: { 'retry-after': '2' } },
        { content: 'ok' },
      ]);

      await expect(client.generate('ping')).resolves.toBe('ok');
      expect(sleep).toHaveBeenCalledWith(2000);
    });

    it('gives up after three attempts', async () => {
      const { client, requests } = createClient([{ status: 503 }]);

      const error = await client.generate('ping').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(LLMRequestError);
      expect(error instanceof LLMRequestError && error.status).toBe(503);
      expect(requests).toHaveLength(3);
    });

    it('does not retry client errors', async () => {
      const { client, requests } = createClient([{ status: 401, text: 'invalid key' }]);

      const error = await client.generate('ping').catch((caught: unknown) => caught);

      expect(error instanceof LLMRequestError && error.retryable).toBe(false);
      expect(error instanceof LLMRequestError && error.message).toBe(
        'POST /chat/completions failed: 401 \ninvalid key'
      );
      expect(requests).toHaveLength(1);
    });
  });

  describe('generateStructured', () => {
    it('requests JSON mode and parses the reply', async () => {
      const { client, requests } = createClient([{ content: 'Sure: {"summary": "Done", "tasks": []}' }]);

      const result = await client.generateStructured('Review this', 'Return JSON.');

      expect(result).toEqual({ summary: 'Done', tasks: [] });
      expect(requests).toHaveLength(1);
      expect(requests[0].body).toMatchObject({ response_format: { type: 'json_object' } });
    });

    it('asks the model to repair invalid JSON', async () => {
      const { client, requests } = createClient([{ content: '{summary: Done' }, { content: '{"summary": "Done"}' }]);

      const result = await client.generateStructured('Review this');

      expect(result).toEqual({ summary: 'Done' });
      expect(requests).toHaveLength(2);
      expect(requests[1].body).toEqual({
        model: 'test-model',
        messages: [
          { role: 'system', content: REPAIR_SYSTEM_PROMPT },
          { role: 'user', content: buildRepairPrompt('{summary: Done') },
        ],
      });
    });

    it('falls back to a plain completion when JSON mode is rejected', async () => {
      const { client, requests } = createClient([
        { status: 400, text: 'response_format is not supported' },
        { content: '{"restart": false}' },
      ]);

      await expect(client.generateStructured('Triage')).resolves.toEqual({ restart: false });
      expect(requests).toHaveLength(2);
      expect(requests[1].body).toEqual({ model: 'test-model', messages: [{ role: 'user', content: 'Triage' }] });
    });
  });
});

describe('createLLMClient', () => {
  it('requires an API key', () => {
    expect(() => createLLMClient({ ...DEFAULT_CONFIG.llm })).toThrow(ConfigError);
  });

  it('builds a client from settings', () => {
    const client = createLLMClient({ ...DEFAULT_CONFIG.llm, apiKey: 'test-key' });
    expect(client).toBeInstanceOf(OpenAICompatibleClient);
  });
});
