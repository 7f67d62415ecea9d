/**
 * @fileoverview Test helpers for tierscan tests
 *
 * Centralized utilities for test setup, teardown, and common operations.
 */

export {
  createTempWorkspace,
  cleanupWorkspace,
  createTestFile,
  createWorkspaceWithFiles,
} from './workspace.js';

export { FakeCompletionClient, userText, systemText, unreachable, type Responder } from './fake_client.js';

export { scriptedModel, callsFor, promptRole, CANNED, type PromptRole, type Override } from './scripted_model.js';

import { createDefaultConfig, type EngineConfig, type EngineConfigInput } from '../../config/engine_config.js';
import { createFileLister, type FileLister } from '../../files/file_lister.js';

/** Defaults with the warm-up pause disabled. */
export function testConfig(overrides: EngineConfigInput = {}): EngineConfig {
  return createDefaultConfig({
    ...overrides,
    analysis: { warmupDelayMs: 0, ...overrides.analysis },
  });
}

/** Walks the directory; temp workspaces are not git repositories. */
export function walkLister(): FileLister {
  return createFileLister({ walkOnly: true });
}
