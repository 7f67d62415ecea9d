/**
 * Shared Vitest setup for tierscan.
 *
 * In unit mode the global fetch is replaced so that a test which forgets to
 * inject a fake completion client fails fast instead of reaching a local
 * inference server. Tests that exercise the HTTP client stub fetch themselves.
 */

import { vi, beforeEach, afterEach } from 'vitest';

const TIERSCAN_TEST_MODE = process.env.TIERSCAN_TEST_MODE ?? 'unit';

if (TIERSCAN_TEST_MODE === 'unit') {
  beforeEach(() => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('network disabled in unit tests')));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });
}
