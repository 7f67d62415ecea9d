/**
 * @fileoverview LM Studio (OpenAI-compatible) chat-completion client
 *
 * Non-streaming POST to `/v1/chat/completions`. Timeouts abort the
 * underlying request so a slow local server does not keep sockets busy.
 */

import type { ChatMessage, CompletionClient, CompletionOptions } from './completion_client.js';
import { Errors, TransportError } from '../core/errors.js';
import { TimeoutError, withTimeout } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import { isRecord } from '../utils/json_extract.js';
import { logDebug } from '../telemetry/logger.js';

export const DEFAULT_LMSTUDIO_URL = 'http://localhost:1234';
const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_TIMEOUT_MS = 30_000;

export interface LmStudioClientOptions {
  baseUrl?: string;
  /** Used when a call names no model */
  defaultModelId?: string;
  defaultTimeoutMs?: number;
  fetchImpl?: typeof fetch;
}

interface ChatCompletionRequest {
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  stream: false;
  model?: string;
  n_ctx?: number;
}

function extractContent(payload: unknown): string | null {
  if (!isRecord(payload) || !Array.isArray(payload.choices) || payload.choices.length === 0) return null;
  const first: unknown = payload.choices[0];
  if (!isRecord(first)) return null;
  const message = first.message;
  if (isRecord(message) && typeof message.content === 'string') return message.content;
  return typeof first.text === 'string' ? first.text : null;
}

export class LmStudioClient implements CompletionClient {
  private readonly baseUrl: string;
  private readonly defaultModelId: string;
  private readonly defaultTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: LmStudioClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_LMSTUDIO_URL).replace(/\/+$/, '');
    this.defaultModelId = options.defaultModelId ?? '';
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  get endpoint(): string {
    return `${this.baseUrl}/v1/chat/completions`;
  }

  buildRequest(messages: ChatMessage[], options: CompletionOptions = {}): ChatCompletionRequest {
    const body: ChatCompletionRequest = {
      messages,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      max_tokens: options.maxTokens ?? -1,
      stream: false,
    };
    const model = options.modelId || this.defaultModelId;
    if (model) body.model = model;
    if (options.contextSize && options.contextSize > 0) body.n_ctx = options.contextSize;
    return body;
  }

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.signal?.aborted) controller.abort();

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const body = this.buildRequest(messages, options);
    logDebug('LM Studio request', { endpoint: this.endpoint, model: body.model, messages: messages.length });

    try {
      return await withTimeout(this.send(body, controller.signal), timeoutMs, {
        context: 'chat completion',
        onTimeout: () => controller.abort(),
      });
    } catch (error) {
      if (error instanceof TransportError) throw error;
      if (error instanceof TimeoutError) throw Errors.transport('timeout', error.message);
      if (options.signal?.aborted) throw Errors.transport('aborted', 'request cancelled');
      throw Errors.transport('unreachable', `${this.endpoint}: ${getErrorMessage(error)}`);
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  private async send(body: ChatCompletionRequest, signal: AbortSignal): Promise<string> {
    const response = await this.fetchImpl(this.endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });
    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw Errors.transport('http_status', `HTTP ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`, response.status);
    }
    const payload: unknown = await response.json();
    const content = extractContent(payload);
    if (content === null) {
      throw Errors.transport('empty_response', 'response contained no choices');
    }
    return content;
  }
}
