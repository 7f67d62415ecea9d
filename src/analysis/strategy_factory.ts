import type { CompletionClient } from '../providers/completion_client.js';
import type { ConsensusStrategyName } from '../config/engine_config.js';
import type { ConsensusStrategy } from './consensus.js';
import { LlmAdjudicator, type LlmAdjudicatorSettings } from './adjudicator.js';
import { LocalTally } from './local_tally.js';

export function createConsensusStrategy(
  name: ConsensusStrategyName,
  client: CompletionClient,
  settings: LlmAdjudicatorSettings = {},
): ConsensusStrategy {
  switch (name) {
    case 'local_tally':
      return new LocalTally();
    case 'adjudicator':
      return new LlmAdjudicator(client, settings);
  }
}
