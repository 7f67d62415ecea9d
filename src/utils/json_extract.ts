/**
 * @fileoverview Permissive JSON extraction from model output
 *
 * Local models wrap JSON in prose and code fences. These helpers cut the
 * JSON payload out of the raw text before decoding it.
 *
 * @packageDocumentation
 */

import type { Result } from '../core/result.js';
import { Ok, Err } from '../core/result.js';
import { ParseError } from '../core/errors.js';

const EXCERPT_LENGTH = 160;

function excerpt(text: string): string {
  return text.length > EXCERPT_LENGTH ? `${text.slice(0, EXCERPT_LENGTH)}...` : text;
}

/**
 * Substring from the first `{` to the last `}` (inclusive), or null.
 */
export function extractObjectSpan(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end === -1 || end < start) return null;
  return text.slice(start, end + 1);
}

/**
 * Substring from the first `[` to the last `]` (inclusive), or null.
 */
export function extractArraySpan(text: string): string | null {
  const start = text.indexOf('[');
  const end = text.lastIndexOf(']');
  if (start === -1 || end === -1 || end < start) return null;
  return text.slice(start, end + 1);
}

/**
 * Remove a surrounding Markdown code fence, if present.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```[a-zA-Z0-9_-]*\s*\n([\s\S]*?)\n?```\s*$/.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

/**
 * First balanced `{...}` object in the text, skipping braces inside strings.
 */
export function extractBalancedObject(text: string): string | null {
  const source = stripCodeFences(text);
  const start = source.indexOf('{');
  if (start === -1) return null;
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < source.length; i++) {
    const ch = source[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return source.slice(start, i + 1);
    }
  }
  return null;
}

function decode(span: string | null, format: string, raw: string): Result<unknown, ParseError> {
  if (span === null) {
    return Err(new ParseError(format, 'no JSON payload found in response', excerpt(raw)));
  }
  try {
    return Ok(JSON.parse(span));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return Err(new ParseError(format, message, excerpt(span)));
  }
}

/**
 * Decode the first-`{`-to-last-`}` span of a response.
 */
export function parseObjectSpan(raw: string, format = 'json object'): Result<unknown, ParseError> {
  return decode(extractObjectSpan(raw), format, raw);
}

/**
 * Decode the first-`[`-to-last-`]` span of a response.
 */
export function parseArraySpan(raw: string, format = 'json array'): Result<unknown, ParseError> {
  return decode(extractArraySpan(raw), format, raw);
}

/**
 * Decode the first balanced object, falling back to the wide span.
 */
export function parseBalancedObject(raw: string, format = 'json object'): Result<unknown, ParseError> {
  const balanced = decode(extractBalancedObject(raw), format, raw);
  return balanced.ok ? balanced : parseObjectSpan(raw, format);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

export function readNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function readStringArray(record: Record<string, unknown>, key: string): string[] {
  const value = record[key];
  if (!Array.isArray(value)) return [];
  return value
    .map((entry) => (typeof entry === 'string' ? entry.trim() : ''))
    .filter((entry) => entry.length > 0);
}
