import { describe, expect, it } from 'vitest';
import { OpenAiChatClient, ScoringClientError, type OpenAiChatConfig } from '@/llm/client';

const CONFIG: OpenAiChatConfig = {
  apiKey: 'test-secret',
  model: 'test-model',
  baseUrl: 'https://llm.example.test/v1/',
  temperature: 0.3,
  maxTokens: 2000,
  timeoutMs: 20_000,
  maxRetries: 2,
};

interface Captured {
  url: string;
  init: RequestInit | undefined;
}

function scriptedFetch(responses: Array<() => Response>): { fetchFn: typeof fetch; calls: Captured[] } {
  const calls: Captured[] = [];
  const fetchFn: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    const next = responses[Math.min(calls.length - 1, responses.length - 1)];
    return next();
  };
  return { fetchFn, calls };
}

function completion(content: string | null): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 });
}

describe('OpenAiChatClient', () => {
  it('posts a JSON-mode chat completion and returns the message text', async () => {
    const { fetchFn, calls } = scriptedFetch([() => completion('{"AAPL": {"BuyScore": 7}}')]);
    const client = new OpenAiChatClient(CONFIG, fetchFn, async () => {});

    await expect(client.complete('score these')).resolves.toBe('{"AAPL": {"BuyScore": 7}}');

    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('https://llm.example.test/v1/chat/completions');
    expect(calls[0].init?.method).toBe('POST');
    expect(new Headers(calls[0].init?.headers).get('Authorization')).toBe('Bearer test-secret');

    const body: unknown = JSON.parse(String(calls[0].init?.body));
    expect(body).toMatchObject({
      model: 'test-model',
      temperature: 0.3,
      max_tokens: 2000,
      response_format: { type: 'json_object' },
    });
    expect(body).toHaveProperty(['messages', 1], { role: 'user', content: 'score these' });
  });

  it('retries throttling and server errors with backoff', async () => {
    const delays: number[] = [];
    const { fetchFn, calls } = scriptedFetch([
      () => new Response('slow down', { status: 429 }),
      () => new Response('oops', { status: 503 }),
      () => completion('{}'),
    ]);
    const client = new OpenAiChatClient(CONFIG, fetchFn, async (ms) => {
      delays.push(ms);
    });

    await expect(client.complete('p')).resolves.toBe('{}');
    expect(calls).toHaveLength(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('fails fast on client errors', async () => {
    const { fetchFn, calls } = scriptedFetch([() => new Response('bad key', { status: 401 })]);
    const client = new OpenAiChatClient(CONFIG, fetchFn, async () => {});

    const error = await client.complete('p').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ScoringClientError);
    expect(error).toMatchObject({ status: 401 });
    expect(calls).toHaveLength(1);
  });

  it('gives up after the retry budget', async () => {
    const { fetchFn, calls } = scriptedFetch([() => new Response('down', { status: 500 })]);
    const client = new OpenAiChatClient(CONFIG, fetchFn, async () => {});

    await expect(client.complete('p')).rejects.toThrow('Chat completion returned HTTP 500');
    expect(calls).toHaveLength(3);
  });

  it('rejects a reply without message content', async () => {
    const { fetchFn } = scriptedFetch([() => completion(null)]);
    const client = new OpenAiChatClient(CONFIG, fetchFn, async () => {});
    await expect(client.complete('p')).rejects.toThrow('Chat completion returned no message content');
  });
});
