/**
 * @fileoverview Canned answers for every prompt the tiers send
 */

import type { ChatMessage } from '../../providers/completion_client.js';
import { FakeCompletionClient, systemText, userText } from './fake_client.js';

export type PromptRole =
  | 'ranking_worker'
  | 'ranking_adjudicator'
  | 'summary_adjudicator'
  | 'file_summary'
  | 'detailed'
  | 'deep'
  | 'full';

const ROLE_PREFIXES: ReadonlyArray<[PromptRole, string]> = [
  ['ranking_worker', 'You are a file importance analyzer'],
  ['ranking_adjudicator', 'Adjudicate crowd answers into a single JSON. Output'],
  ['summary_adjudicator', 'Adjudicate worker summaries'],
  ['file_summary', 'You are analyzing code files'],
  ['detailed', 'You are a skeptical architect'],
  ['deep', 'You are a principal engineer'],
  ['full', 'You are a CTO-level reviewer'],
];

export function promptRole(messages: readonly ChatMessage[]): PromptRole | null {
  const system = systemText(messages);
  return ROLE_PREFIXES.find(([, prefix]) => system.startsWith(prefix))?.[0] ?? null;
}

export const CANNED: Record<PromptRole, string> = {
  ranking_worker:
    '[{"path":"main.go","importance":10,"reason":"entrypoint","category":"entry"},{"path":"cmd/run.go","importance":7,"reason":"command","category":"core"}]',
  ranking_adjudicator:
    '{"rankings":[{"path":"main.go","importance":10,"reason":"entrypoint","category":"entry"},{"path":"ghost.go","importance":9}],"confidence":0.8}',
  summary_adjudicator: [
    '# Project Summary',
    '',
    '**Purpose**: terminal chat',
    '',
    '**Important files**:',
    '',
    '- `main.go` (entry): program entry',
    '- ghost.go (core): not tracked',
    '',
    '**Confidence**: 0.7',
  ].join('\n'),
  file_summary: '{"purpose":"entry point","keyElements":["main"],"dependencies":["fmt"],"notes":""}',
  detailed:
    '{"architecture":"single binary CLI","purpose":"terminal chat","techStack":["Go"],"entryPoints":["main.go"],"confidence":0.7}',
  deep: '{"architecture":"layered CLI","purpose":"terminal chat","refinementNotes":["cmd package owns commands"],"architecturalInsights":["single process"],"confidence":0.6}',
  full: '{"businessValue":"chat from the terminal","technicalDebt":["no tests"],"recommendations":["add tests"],"documentationGaps":[],"confidence":0.5}',
};

export type Override = (messages: ChatMessage[]) => string | Error | undefined;

/**
 * Client answering each prompt with its canned reply unless an override
 * for that role returns something.
 */
export function scriptedModel(overrides: Partial<Record<PromptRole, Override>> = {}): FakeCompletionClient {
  return new FakeCompletionClient((messages) => {
    const role = promptRole(messages);
    if (role === null) return new Error(`unexpected prompt: ${userText(messages).slice(0, 80)}`);
    return overrides[role]?.(messages) ?? CANNED[role];
  });
}

export function callsFor(client: FakeCompletionClient, role: PromptRole): number {
  return client.calls.filter((call) => promptRole(call.messages) === role).length;
}
