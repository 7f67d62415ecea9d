/**
 * @fileoverview Persisted startup-scan record
 *
 * Keeps the last adjudicated answer and its iteration number so the next
 * scan can refine it instead of starting over.
 */

import * as path from 'node:path';
import { z } from 'zod';
import { Errors } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { readJsonFile, writeJsonAtomic } from './json_file.js';
import { stateDir } from '../config/loader.js';
import type { AdjudicatedAnswer } from '../analysis/types.js';

export const ScanRecordSchema = z.object({
  version: z.literal(1),
  projectPath: z.string(),
  answer: z.object({
    type: z.string(),
    language: z.string(),
    framework: z.string(),
    purpose: z.string(),
    confidence: z.number().min(0).max(1),
  }),
  iteration: z.number().int().min(1),
  fileCount: z.number().int().min(0),
  contentHash: z.string().optional(),
  generatedAt: z.string(),
});

export type ScanRecord = z.infer<typeof ScanRecordSchema>;

export class ScanStore {
  readonly directory: string;
  readonly filePath: string;

  constructor(readonly projectPath: string) {
    this.directory = path.join(stateDir(projectPath), 'state');
    this.filePath = path.join(this.directory, 'startup_scan.json');
  }

  async load(): Promise<ScanRecord | null> {
    const read = await readJsonFile(this.filePath);
    if (read.status === 'absent') return null;
    if (read.status === 'corrupt') {
      logWarning('Ignoring unreadable startup scan record', Errors.corruption(this.filePath, read.reason).toJSON().details);
      return null;
    }
    const parsed = ScanRecordSchema.safeParse(read.value);
    if (!parsed.success) {
      const reason = parsed.error.issues[0]?.message ?? 'invalid record';
      logWarning('Ignoring invalid startup scan record', Errors.corruption(this.filePath, reason).toJSON().details);
      return null;
    }
    return parsed.data;
  }

  async save(record: ScanRecord): Promise<void> {
    await writeJsonAtomic(this.filePath, record);
  }
}

export function scanRecordAnswer(record: ScanRecord): AdjudicatedAnswer {
  return { ...record.answer };
}
