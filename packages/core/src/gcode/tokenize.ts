/**
 * G-code line tokenizer
 *
 * Turns one source line into letter/number words. Comments (`;` to end of
 * line and parenthesised), line numbers (`N`) and `*` checksums are dropped.
 */

import type { Word } from './types.js';

const WORD_PATTERN = /([A-Z])\s*([^A-Z\s]*)/g;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

/**
 * Remove comments and checksum, returning the upper-cased command text
 */
export function stripComments(text: string): string {
  let out = text;
  const semi = out.indexOf(';');
  if (semi >= 0) {
    out = out.slice(0, semi);
  }
  out = out.replace(/\([^)]*\)?/g, ' ');
  const star = out.indexOf('*');
  if (star >= 0) {
    out = out.slice(0, star);
  }
  return out.trim().toUpperCase();
}

/**
 * Parse the numeric part of a word; NaN when it is not a plain decimal or
 * does not fit in a double
 */
export function parseWordValue(raw: string): number {
  if (!NUMBER_PATTERN.test(raw)) {
    return Number.NaN;
  }
  const value = Number.parseFloat(raw);
  return Number.isFinite(value) ? value : Number.NaN;
}

/**
 * Tokenize a line into words. Blank and comment-only lines give `[]`.
 */
export function tokenizeLine(text: string): Word[] {
  const body = stripComments(text);
  if (body === '') {
    return [];
  }

  const words: Word[] = [];
  for (const match of body.matchAll(WORD_PATTERN)) {
    const [, letter, raw] = match;
    if (letter === 'N') {
      continue;
    }
    words.push({ letter, raw, value: parseWordValue(raw) });
  }
  return words;
}
