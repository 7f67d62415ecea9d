/**
 * @fileoverview Tests for JSON extraction from model output
 */

import { describe, it, expect } from 'vitest';
import { ParseError } from '../../core/errors.js';
import {
  extractBalancedObject,
  parseArraySpan,
  parseBalancedObject,
  readNumber,
  readString,
  readStringArray,
  stripCodeFences,
} from '../json_extract.js';

describe('stripCodeFences', () => {
  it('removes a fenced json block', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('leaves unfenced text alone', () => {
    expect(stripCodeFences('  {"a":1} ')).toBe('{"a":1}');
  });
});

describe('extractBalancedObject', () => {
  it('ignores braces inside strings and trailing prose', () => {
    const raw = 'Here you go: {"purpose":"parse {templates}","n":1} and {"other":true}';
    expect(extractBalancedObject(raw)).toBe('{"purpose":"parse {templates}","n":1}');
  });

  it('returns null for an unterminated object', () => {
    expect(extractBalancedObject('{"a": 1')).toBeNull();
  });
});

describe('parseBalancedObject', () => {
  it('decodes an object wrapped in prose', () => {
    const result = parseBalancedObject('Sure!\n{"type":"CLI"}\nHope that helps.');
    expect(result).toEqual({ ok: true, value: { type: 'CLI' } });
  });

  it('returns a ParseError when there is no payload', () => {
    const result = parseBalancedObject('I cannot answer that.', 'scan vote');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ParseError);
      expect(result.error.format).toBe('scan vote');
    }
  });
});

describe('parseArraySpan', () => {
  it('decodes the first-to-last bracket span', () => {
    expect(parseArraySpan('ranking: [{"path":"a.ts"}] done')).toEqual({ ok: true, value: [{ path: 'a.ts' }] });
  });
});

describe('record readers', () => {
  const record = { name: '  tierscan ', count: '7', bad: 'x', list: ['a', 3, ' b ', ''] };

  it('reads trimmed strings and stringifies scalars', () => {
    expect(readString(record, 'name')).toBe('tierscan');
    expect(readString({ n: 5 }, 'n')).toBe('5');
    expect(readString(record, 'missing')).toBe('');
  });

  it('reads numbers from numbers and numeric strings', () => {
    expect(readNumber(record, 'count')).toBe(7);
    expect(readNumber(record, 'bad')).toBeUndefined();
  });

  it('keeps only non-empty string entries', () => {
    expect(readStringArray(record, 'list')).toEqual(['a', 'b']);
    expect(readStringArray(record, 'name')).toEqual([]);
  });
});
