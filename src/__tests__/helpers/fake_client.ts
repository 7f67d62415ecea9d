/**
 * @fileoverview Scripted completion clients for tests
 */

import type { ChatMessage, CompletionClient, CompletionOptions } from '../../providers/completion_client.js';
import { TransportError } from '../../core/errors.js';

export interface RecordedCall {
  messages: ChatMessage[];
  options: CompletionOptions;
}

export type Responder = (messages: ChatMessage[], options: CompletionOptions, call: number) => string | Error | Promise<string | Error>;

/**
 * Completion client driven by a responder function. Returned errors are
 * thrown; every call is recorded.
 */
export class FakeCompletionClient implements CompletionClient {
  readonly calls: RecordedCall[] = [];
  private inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly responder: Responder, private readonly delayMs = 0) {}

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const call = this.calls.length;
    this.calls.push({ messages, options });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      const answer = await this.responder(messages, options, call);
      if (answer instanceof Error) throw answer;
      return answer;
    } finally {
      this.inFlight--;
    }
  }

  get callCount(): number {
    return this.calls.length;
  }
}

export function userText(messages: readonly ChatMessage[]): string {
  return messages.filter((message) => message.role === 'user').map((message) => message.content).join('\n');
}

export function systemText(messages: readonly ChatMessage[]): string {
  return messages.filter((message) => message.role === 'system').map((message) => message.content).join('\n');
}

export function unreachable(): TransportError {
  return new TransportError('unreachable', true, 'connection refused');
}
