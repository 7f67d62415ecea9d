/**
 * @fileoverview Knowledge documents on disk
 *
 * Each tier owns `.tierscan/knowledge/<tier>/` and writes its markdown
 * documents there only after the tier succeeded. Higher tiers read the
 * previous tier's directory as seed context.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { stateDir } from '../config/loader.js';
import { Errors } from '../core/errors.js';
import { writeFileAtomic } from './json_file.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import type { AnalysisTier } from '../config/engine_config.js';
import type { KnowledgeFiles } from '../analysis/types.js';

const SAFE_NAME = /^[A-Za-z0-9_.-]+\.md$/;

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function writeDocuments(dir: string, files: KnowledgeFiles): Promise<string[]> {
  await fs.mkdir(dir, { recursive: true });
  const written: string[] = [];
  for (const [name, content] of Object.entries(files)) {
    const target = path.join(dir, name);
    await writeFileAtomic(target, content.endsWith('\n') ? content : `${content}\n`);
    written.push(target);
  }
  return written;
}

export class KnowledgeStore {
  readonly root: string;

  constructor(readonly projectPath: string) {
    this.root = path.join(stateDir(projectPath), 'knowledge');
  }

  tierDir(tier: AnalysisTier): string {
    return path.join(this.root, tier);
  }

  /**
   * Without `clean`, documents are written one by one over the existing
   * directory. With it, the full set is staged in a sibling directory and
   * swapped in, so readers see either the old set or the new one.
   *
   * @param clean - remove documents left over from a previous run
   */
  async write(tier: AnalysisTier, files: KnowledgeFiles, clean = false): Promise<string[]> {
    const dir = this.tierDir(tier);
    for (const name of Object.keys(files)) {
      if (!SAFE_NAME.test(name)) {
        throw Errors.storage('write', `refusing knowledge file with unsafe name: ${name}`, path.join(dir, name), false);
      }
    }
    if (!clean) {
      const written = await writeDocuments(dir, files);
      logDebug('Wrote knowledge files', { tier, count: written.length });
      return written;
    }

    const suffix = `${process.pid}.${Date.now()}`;
    const staging = `${dir}.staging.${suffix}`;
    const retired = `${dir}.retired.${suffix}`;
    try {
      await writeDocuments(staging, files);
      await fs.rename(dir, retired).catch((error: unknown) => {
        if (!isMissing(error)) throw error;
      });
      await fs.rename(staging, dir);
    } catch (error) {
      await fs.rename(retired, dir).catch(() => undefined);
      await fs.rm(staging, { recursive: true, force: true });
      throw Errors.storage('write', `failed to replace knowledge documents: ${getErrorMessage(error)}`, dir, true);
    }
    await fs.rm(retired, { recursive: true, force: true });
    logDebug('Replaced knowledge files', { tier, count: Object.keys(files).length });
    return Object.keys(files).map((name) => path.join(dir, name));
  }

  /** Null when the tier has never written anything. */
  async read(tier: AnalysisTier): Promise<KnowledgeFiles | null> {
    const dir = this.tierDir(tier);
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch {
      return null;
    }
    const files: KnowledgeFiles = {};
    for (const name of names.filter((entry) => SAFE_NAME.test(entry)).sort()) {
      files[name] = await fs.readFile(path.join(dir, name), 'utf8');
    }
    return Object.keys(files).length > 0 ? files : null;
  }
}
