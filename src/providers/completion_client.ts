/**
 * @fileoverview Chat-completion capability consumed by the engine
 *
 * Everything that talks to a model goes through {@link CompletionClient};
 * tests substitute in-process fakes.
 */

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  /** Model identifier; empty lets the server use whatever it has loaded */
  modelId?: string;
  temperature?: number;
  /** -1 or undefined leaves the limit to the server */
  maxTokens?: number;
  contextSize?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CompletionClient {
  /**
   * Run one chat completion and return the assistant text.
   * Rejects with TransportError on network, status or timeout failures.
   */
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}

export function systemMessage(content: string): ChatMessage {
  return { role: 'system', content };
}

export function userMessage(content: string): ChatMessage {
  return { role: 'user', content };
}
