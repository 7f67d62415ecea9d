/**
 * @fileoverview Tests for the LM Studio client against a stubbed fetch
 */

import { describe, it, expect } from 'vitest';
import { TransportError } from '../../core/errors.js';
import { LmStudioClient } from '../lmstudio_client.js';
import { systemMessage, userMessage } from '../completion_client.js';

interface Captured {
  url: string;
  body: unknown;
}

function stubFetch(respond: () => Response, captured: Captured[] = []): typeof fetch {
  return async (input, init) => {
    captured.push({ url: String(input), body: typeof init?.body === 'string' ? JSON.parse(init.body) : null });
    return respond();
  };
}

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { role: 'assistant', content } }] }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('LmStudioClient', () => {
  it('posts a non-streaming chat completion', async () => {
    const captured: Captured[] = [];
    const client = new LmStudioClient({
      baseUrl: 'http://127.0.0.1:9999/',
      fetchImpl: stubFetch(() => completion('{"ok":true}'), captured),
    });

    const text = await client.complete([systemMessage('sys'), userMessage('hi')], {
      modelId: 'qwen-small',
      maxTokens: 300,
      contextSize: 2048,
      temperature: 0,
    });

    expect(text).toBe('{"ok":true}');
    expect(captured[0]).toEqual({
      url: 'http://127.0.0.1:9999/v1/chat/completions',
      body: {
        messages: [
          { role: 'system', content: 'sys' },
          { role: 'user', content: 'hi' },
        ],
        temperature: 0,
        max_tokens: 300,
        stream: false,
        model: 'qwen-small',
        n_ctx: 2048,
      },
    });
  });

  it('lets the server pick the model and token limit by default', () => {
    const body = new LmStudioClient().buildRequest([userMessage('hi')]);
    expect(body).toEqual({ messages: [{ role: 'user', content: 'hi' }], temperature: 0.7, max_tokens: -1, stream: false });
  });

  it('maps HTTP errors to http_status', async () => {
    const client = new LmStudioClient({ fetchImpl: stubFetch(() => new Response('model not loaded', { status: 503 })) });
    const error = await client.complete([userMessage('hi')]).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ reason: 'http_status', status: 503, retryable: true });
    expect(error instanceof Error ? error.message : '').toBe('Transport http_status: HTTP 503: model not loaded');
  });

  it('maps a response without choices to empty_response', async () => {
    const client = new LmStudioClient({
      fetchImpl: stubFetch(() => new Response(JSON.stringify({ choices: [] }), { status: 200 })),
    });
    await expect(client.complete([userMessage('hi')])).rejects.toMatchObject({ reason: 'empty_response' });
  });

  it('maps connection failures to unreachable', async () => {
    const client = new LmStudioClient({
      fetchImpl: async () => {
        throw new TypeError('fetch failed');
      },
    });
    await expect(client.complete([userMessage('hi')])).rejects.toMatchObject({ reason: 'unreachable' });
  });

  it('aborts a request that outlives its timeout', async () => {
    const client = new LmStudioClient({
      fetchImpl: (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        }),
    });
    await expect(client.complete([userMessage('hi')], { timeoutMs: 20 })).rejects.toMatchObject({ reason: 'timeout' });
  });
});
