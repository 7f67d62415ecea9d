/**
 * @fileoverview Project file enumeration
 *
 * Lists the files the engine analyzes: `git ls-files` when the project is a
 * repository, otherwise a directory walk that skips hidden entries and
 * build/vendor directories. Either way the result holds only indexable
 * extensions, as POSIX-style relative paths in sorted order.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { execa } from 'execa';
import { glob } from 'glob';
import { logDebug } from '../telemetry/logger.js';

// ============================================================================
// DEFAULT OPTIONS
// ============================================================================

export const INDEXABLE_EXTENSIONS: readonly string[] = [
  '.go', '.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx', '.py', '.rs',
  '.java', '.kt', '.scala', '.c', '.h', '.cpp', '.cc', '.hpp', '.cs', '.swift',
  '.md', '.yaml', '.yml', '.json', '.toml',
  '.sh', '.bash', '.zsh', '.fish',
  '.vim', '.lua', '.rb', '.php',
];

export const DEFAULT_EXCLUDE_DIRS: readonly string[] = [
  'node_modules', 'dist', 'build', 'target', 'vendor',
  '__pycache__', 'coverage',
];

export type FileListSource = 'git' | 'walk';

export interface FileListing {
  files: string[];
  source: FileListSource;
}

export interface FileLister {
  list(projectPath: string): Promise<FileListing>;
}

export interface FileListerOptions {
  extensions?: readonly string[];
  excludeDirs?: readonly string[];
  /** Skip `git ls-files` and always walk the tree */
  walkOnly?: boolean;
}

// ============================================================================
// HELPERS
// ============================================================================

export function isIndexable(filePath: string, extensions: readonly string[] = INDEXABLE_EXTENSIONS): boolean {
  return extensions.includes(path.extname(filePath).toLowerCase());
}

function toPosix(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

/**
 * Split NUL-separated `git ls-files -z` output. Paths arrive verbatim, without
 * the C-style quoting git applies to unusual names in line mode.
 */
export function parseLsFilesOutput(stdout: string): string[] {
  return stdout.split('\0').filter((entry) => entry.length > 0);
}

function isHiddenOrExcluded(relPath: string, excludeDirs: readonly string[]): boolean {
  const segments = relPath.split('/');
  return segments.some((segment, index) =>
    segment.startsWith('.') || (index < segments.length - 1 && excludeDirs.includes(segment)),
  );
}

// ============================================================================
// LISTER
// ============================================================================

export class ProjectFileLister implements FileLister {
  private readonly extensions: readonly string[];
  private readonly excludeDirs: readonly string[];
  private readonly walkOnly: boolean;

  constructor(options: FileListerOptions = {}) {
    this.extensions = options.extensions ?? INDEXABLE_EXTENSIONS;
    this.excludeDirs = options.excludeDirs ?? DEFAULT_EXCLUDE_DIRS;
    this.walkOnly = options.walkOnly ?? false;
  }

  async list(projectPath: string): Promise<FileListing> {
    const tracked = this.walkOnly ? null : await this.gitTrackedFiles(projectPath);
    if (tracked) {
      return { files: this.normalize(tracked), source: 'git' };
    }
    const walked = await glob('**/*', {
      cwd: projectPath,
      nodir: true,
      dot: false,
      follow: false,
      ignore: this.excludeDirs.map((dir) => `**/${dir}/**`),
    });
    return { files: this.normalize(walked), source: 'walk' };
  }

  private normalize(files: string[]): string[] {
    const unique = new Set<string>();
    for (const file of files) {
      const rel = toPosix(file);
      if (!rel || isHiddenOrExcluded(rel, this.excludeDirs) || !isIndexable(rel, this.extensions)) continue;
      unique.add(rel);
    }
    return [...unique].sort();
  }

  private async gitTrackedFiles(projectPath: string): Promise<string[] | null> {
    try {
      const result = await execa('git', ['ls-files', '-z'], { cwd: projectPath, reject: false });
      if (result.exitCode !== 0) {
        logDebug('git ls-files unavailable, walking directory', { projectPath, exitCode: result.exitCode });
        return null;
      }
      return parseLsFilesOutput(result.stdout);
    } catch (error) {
      logDebug('git ls-files failed to start, walking directory', { projectPath, error: String(error) });
      return null;
    }
  }
}

export function createFileLister(options?: FileListerOptions): FileLister {
  return new ProjectFileLister(options);
}
