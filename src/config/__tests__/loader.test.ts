/**
 * @fileoverview Tests for configuration loading
 */

import { describe, it, expect, afterEach } from 'vitest';
import { ConfigurationError } from '../../core/errors.js';
import { createDefaultConfig, resolveTierTunables, tierModelKey } from '../engine_config.js';
import { expandEnv, loadConfig, parseConfigText } from '../loader.js';
import { cleanupWorkspace, createWorkspaceWithFiles } from '../../__tests__/helpers/index.js';

describe('expandEnv', () => {
  it('expands bare and braced references', () => {
    const env = { MODEL: 'qwen', PORT: '1234' };
    expect(expandEnv('$MODEL-${PORT}', env)).toBe('qwen-1234');
  });

  it('expands unknown names to an empty string', () => {
    expect(expandEnv('x${NOPE}y', {})).toBe('xy');
  });
});

describe('parseConfigText', () => {
  it('accepts comments and trailing commas in JSON', () => {
    const text = '{\n  // local server\n  "lmStudioUrl": "http://127.0.0.1:9000",\n}';
    expect(parseConfigText(text, 'config.jsonc')).toEqual({ lmStudioUrl: 'http://127.0.0.1:9000' });
  });

  it('parses YAML by extension', () => {
    expect(parseConfigText('analysis:\n  warmupDelayMs: 0\n', 'config.yaml')).toEqual({ analysis: { warmupDelayMs: 0 } });
  });

  it('raises ConfigurationError for unparseable text', () => {
    expect(() => parseConfigText('{ nope', 'config.json')).toThrow(ConfigurationError);
  });
});

describe('loadConfig', () => {
  let workspace = '';

  afterEach(async () => {
    if (workspace) await cleanupWorkspace(workspace);
    workspace = '';
  });

  it('returns defaults when no configuration file exists', async () => {
    workspace = await createWorkspaceWithFiles({ 'README.md': '# demo' });
    const { config, source } = await loadConfig(workspace, { env: {} });
    expect(source).toBeNull();
    expect(config.lmStudioUrl).toBe('http://localhost:1234');
    expect(config.analysis.warmupDelayMs).toBe(3000);
    expect(config.analysis.startup.crowdSize).toBe(10);
    expect(config.analysis.quick.workers).toBe(5);
    expect(config.analysis.quick.finalTopK).toBe(100);
    expect(config.llm.largest.requestTimeoutMs).toBe(600_000);
  });

  it('reads .tierscan/config.jsonc with environment expansion', async () => {
    workspace = await createWorkspaceWithFiles({
      '.tierscan/config.jsonc': '{ "llm": { "smallest": { "modelId": "${SMALL_MODEL}" } } }',
    });
    const { config, source } = await loadConfig(workspace, { env: { SMALL_MODEL: 'tiny-1b' } });
    expect(source?.endsWith('config.jsonc')).toBe(true);
    expect(config.llm.smallest.modelId).toBe('tiny-1b');
  });

  it('lets TIERSCAN_LMSTUDIO_URL override the file', async () => {
    workspace = await createWorkspaceWithFiles({
      '.tierscan/config.json': '{ "lmStudioUrl": "http://localhost:1111" }',
    });
    const { config } = await loadConfig(workspace, { env: { TIERSCAN_LMSTUDIO_URL: 'http://localhost:2222' } });
    expect(config.lmStudioUrl).toBe('http://localhost:2222');
  });

  it('names the offending key when validation fails', async () => {
    workspace = await createWorkspaceWithFiles({
      '.tierscan/config.yaml': 'analysis:\n  quick:\n    workers: 0\n',
    });
    await expect(loadConfig(workspace, { env: {} })).rejects.toThrow('analysis.quick.workers');
  });

  it('rejects unknown keys', async () => {
    workspace = await createWorkspaceWithFiles({ '.tierscan/config.json': '{ "colour": "blue" }' });
    await expect(loadConfig(workspace, { env: {} })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('takes only the debug flag for the startup scan', async () => {
    workspace = await createWorkspaceWithFiles({ '.tierscan/config.json': '{ "analysis": { "startup": { "debug": true } } }' });
    const { config } = await loadConfig(workspace, { env: {} });
    expect(config.analysis.startup.debug).toBe(true);
    expect(Object.keys(config.analysis.startup)).not.toContain('clean');

    await cleanupWorkspace(workspace);
    workspace = await createWorkspaceWithFiles({ '.tierscan/config.json': '{ "analysis": { "startup": { "autorun": true } } }' });
    await expect(loadConfig(workspace, { env: {} })).rejects.toThrow("analysis.startup: Unrecognized key(s) in object: 'autorun'");
  });
});

describe('resolveTierTunables', () => {
  it('takes token caps from the model policy unless the tier overrides them', () => {
    const config = createDefaultConfig({
      llm: { medium: { modelId: 'mid', maxTokensWorker: 900 } },
      analysis: { detailed: { maxTokensAdjudicator: 1500 } },
    });
    const tunables = resolveTierTunables(config, 'detailed');
    expect(tunables.maxTokensWorker).toBe(900);
    expect(tunables.maxTokensAdjudicator).toBe(1500);
    expect(tunables.requestTimeoutMs).toBe(120_000);
    expect(tunables.workers).toBe(1);
    expect(tunables.workerModelId).toBe('mid');
  });

  it('uses the quick tier settings directly', () => {
    const tunables = resolveTierTunables(createDefaultConfig(), 'quick');
    expect(tunables).toMatchObject({ workers: 5, workerConcurrency: 2, maxTokensWorker: 300, contextSize: 2048, requestTimeoutMs: 10_000 });
  });

  it('keys freshness on both model ids', () => {
    const config = createDefaultConfig({ llm: { largest: { modelId: 'big' } } });
    expect(tierModelKey(config, 'deep')).toBe('default|big');
  });
});
