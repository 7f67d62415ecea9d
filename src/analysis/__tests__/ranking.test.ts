/**
 * @fileoverview Tests for quick-tier ranking helpers
 */

import { describe, it, expect } from 'vitest';
import {
  compactCrowdLines,
  finalizeRankings,
  mergeRankings,
  parseAdjudicatedRanking,
  parseSummaryConsensus,
  parseWorkerOutput,
  partitionPaths,
  prefilterForRanking,
  renderStructureHints,
  summarizeStructure,
  truncate,
  type WorkerRanking,
} from '../tiers/ranking.js';

function ranking(path: string, importance: number, reason = '', category: WorkerRanking['category'] = 'other'): WorkerRanking {
  return { path, importance, reason, category };
}

describe('parseWorkerOutput', () => {
  it('decodes an array reply, dropping duplicates and normalizing fields', () => {
    const raw = `Here you go:
[{"path":"main.go","importance":14,"reason":"entry","category":"ENTRY"},
 {"path":"main.go","importance":3},
 {"path":"util.go","importance":4,"category":"helpers"}]`;
    const parsed = parseWorkerOutput(raw, 20);
    expect(parsed).toEqual({
      ok: true,
      value: {
        rankings: [ranking('main.go', 10, 'entry', 'entry'), ranking('util.go', 4)],
        summary: '',
      },
    });
  });

  it('accepts the object form with a summary', () => {
    const parsed = parseWorkerOutput('{"rankings":[],"summary":"a small chat client"}', 20);
    expect(parsed.ok && parsed.value.summary).toBe('a small chat client');
  });

  it('caps the entries per worker', () => {
    const parsed = parseWorkerOutput('[{"path":"a.go"},{"path":"b.go"},{"path":"c.go"}]', 2);
    expect(parsed.ok && parsed.value.rankings.map((entry) => entry.path)).toEqual(['a.go', 'b.go']);
  });

  it('rejects a reply without entries', () => {
    expect(parseWorkerOutput('[]', 20).ok).toBe(false);
    expect(parseWorkerOutput('no json here', 20).ok).toBe(false);
  });
});

describe('mergeRankings', () => {
  it('counts votes, averages importance and orders by votes then importance then path', () => {
    const merged = mergeRankings(
      [
        [ranking('b.go', 8, '', 'other'), ranking('a.go', 4, 'helpers')],
        [ranking('b.go', 6, 'core loop', 'core'), ranking('c.go', 9)],
        [ranking('a.go', 6)],
      ],
      20,
    );
    expect(merged).toEqual([
      { path: 'b.go', importance: 7, reason: 'core loop', category: 'core', votes: 2 },
      { path: 'a.go', importance: 5, reason: 'helpers', category: 'other', votes: 2 },
      { path: 'c.go', importance: 9, reason: '', category: 'other', votes: 1 },
    ]);
  });

  it('takes only each worker\'s top entries by importance', () => {
    const merged = mergeRankings([[ranking('low.go', 1), ranking('high.go', 9)]], 1);
    expect(merged.map((entry) => entry.path)).toEqual(['high.go']);
  });
});

describe('finalizeRankings', () => {
  it('drops untracked paths and attaches crowd votes', () => {
    const merged = mergeRankings([[ranking('main.go', 9)], [ranking('main.go', 9)]], 20);
    const final = finalizeRankings(
      [ranking('ghost.go', 10), ranking('main.go', 9, 'entry', 'entry'), ranking('README.md', 3)],
      merged,
      new Set(['main.go', 'README.md']),
      10,
    );
    expect(final).toEqual([
      { path: 'main.go', importance: 9, reason: 'entry', category: 'entry', votes: 2 },
      { path: 'README.md', importance: 3, reason: '', category: 'other', votes: 0 },
    ]);
  });
});

describe('parseAdjudicatedRanking', () => {
  it('reads rankings with a clamped confidence', () => {
    const parsed = parseAdjudicatedRanking('{"rankings":[{"path":"main.go","importance":9}],"confidence":1.4}');
    expect(parsed.ok && parsed.value.confidence).toBe(1);
  });

  it('accepts a bare array at confidence 0', () => {
    const parsed = parseAdjudicatedRanking('[{"path":"main.go","importance":9}]');
    expect(parsed.ok && parsed.value).toEqual({ rankings: [ranking('main.go', 9)], confidence: 0 });
  });
});

describe('parseSummaryConsensus', () => {
  it('reads important files in listed order with the stated confidence', () => {
    const raw = [
      '```markdown',
      '# Project Summary',
      '',
      '**Important files**:',
      '',
      '- `main.go` (entry): starts the program',
      '- cmd/run.go (Core): runs commands',
      '- main.go (entry): repeated',
      '- notes (unknown)',
      '',
      '**Notes**:',
      '- no tests found',
      '',
      '**Confidence**: 0.65',
      '```',
    ].join('\n');
    const parsed = parseSummaryConsensus(raw);
    expect(parsed.ok && parsed.value.rankings).toEqual([
      ranking('main.go', 10, 'starts the program', 'entry'),
      ranking('cmd/run.go', 9, 'runs commands', 'core'),
    ]);
    expect(parsed.ok && parsed.value.confidence).toBe(0.65);
    expect(parsed.ok && parsed.value.markdown.startsWith('# Project Summary')).toBe(true);
  });

  it('defaults a missing confidence to 0', () => {
    const parsed = parseSummaryConsensus('# Project Summary\n\n- lib.go (util): helpers');
    expect(parsed.ok && parsed.value.confidence).toBe(0);
  });

  it('rejects output without the summary heading', () => {
    expect(parseSummaryConsensus('main.go is the entry').ok).toBe(false);
  });
});

describe('path lists', () => {
  it('removes vendored and build paths before ranking', () => {
    expect(prefilterForRanking(['src/a.ts', 'node_modules/x/index.js', 'pkg/vendor/y.go', 'dist/out.js'])).toEqual(['src/a.ts']);
  });

  it('gives every worker the whole list when it fits', () => {
    expect(partitionPaths(['a', 'b', 'c'], 2, 10)).toEqual([['a', 'b', 'c'], ['a', 'b', 'c']]);
  });

  it('splits long lists into contiguous chunks', () => {
    expect(partitionPaths(['a', 'b', 'c', 'd', 'e'], 2, 4)).toEqual([['a', 'b', 'c'], ['d', 'e']]);
  });
});

describe('structure hints', () => {
  it('counts top-level directories and extensions', () => {
    const structure = summarizeStructure(['main.go', 'cmd/run.go', 'cmd/help.go', 'docs/README.md', 'Makefile']);
    expect(structure.topDirectories).toEqual([
      { name: '.', count: 2 },
      { name: 'cmd', count: 2 },
      { name: 'docs', count: 1 },
    ]);
    expect(structure.topFileTypes).toEqual([
      { name: '.go', count: 3 },
      { name: '(none)', count: 1 },
      { name: '.md', count: 1 },
    ]);
    expect(renderStructureHints(structure).split('\n')[1]).toBe('- .: 2');
  });

  it('renders one compact line per merged path', () => {
    const lines = compactCrowdLines([{ path: 'main.go', importance: 7.5, reason: 'entry', category: 'entry', votes: 3 }]);
    expect(lines).toEqual(['main.go • votes:3 • imp:7.50 • reason:entry']);
  });

  it('truncates with an ellipsis', () => {
    expect(truncate('abcdefghij', 6)).toBe('abc...');
  });
});
