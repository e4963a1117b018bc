/**
 * Filters deciding whether an extracted fragment is natural language worth
 * translating. Lengths are counted in code points.
 */

const TECHNICAL_MARKERS = [
  'TODO', 'FIXME', 'NOTE', 'HACK', 'XXX', 'BUG',
  'DEPRECATED', 'WARNING', 'ERROR',
];

/** Markers only reject text shorter than this */
const MARKER_LENGTH_LIMIT = 20;

const PYTHON_KEYWORDS = new Set([
  'self', 'cls', 'args', 'kwargs',
  'return', 'def', 'class', 'import',
]);

const NOTEBOOK_CODE_HINTS = ['import ', 'def ', 'class ', 'return ', '=', '{', '}'];

const ALPHABETIC = /\p{Alphabetic}/u;
const WHITESPACE = /\s/u;

function codePoints(text: string): string[] {
  return [...text];
}

function isCjk(char: string): boolean {
  const cp = char.codePointAt(0) ?? 0;
  return (cp >= 0x4e00 && cp <= 0x9fff) // CJK Unified Ideographs
    || (cp >= 0x3400 && cp <= 0x4dbf) // CJK Extension A
    || (cp >= 0x3040 && cp <= 0x30ff) // Hiragana + Katakana
    || (cp >= 0xac00 && cp <= 0xd7af); // Hangul
}

function countWhere(chars: string[], predicate: (char: string) => boolean): number {
  let count = 0;
  for (const char of chars) {
    if (predicate(char)) count++;
  }
  return count;
}

function hasTechnicalMarker(text: string, length: number): boolean {
  if (length >= MARKER_LENGTH_LIMIT) {
    return false;
  }
  const upper = text.toUpperCase();
  return TECHNICAL_MARKERS.some(marker => upper.includes(marker));
}

/**
 * Comments in C-style, hash-style and double-dash languages
 */
export function isTranslatableCode(text: string): boolean {
  const trimmed = text.trim();
  const chars = codePoints(trimmed);

  if (countWhere(chars, c => !WHITESPACE.test(c)) < 3) {
    return false;
  }

  if (trimmed.includes('://')) {
    return false;
  }

  const alphaCount = countWhere(chars, c => ALPHABETIC.test(c));
  if (alphaCount * 3 < chars.length) {
    return false;
  }

  return !hasTechnicalMarker(trimmed, chars.length);
}

/**
 * Python comments and docstrings.
 * CJK, Kana and Hangul count as meaningful characters alongside letters.
 */
export function isTranslatablePython(text: string): boolean {
  const trimmed = text.trim();
  const chars = codePoints(trimmed);

  if (countWhere(chars, c => !WHITESPACE.test(c)) < 3) {
    return false;
  }

  // URLs and emails
  if (trimmed.includes('://') || (trimmed.includes('@') && trimmed.includes('.'))) {
    return false;
  }

  const meaningful = countWhere(chars, c => ALPHABETIC.test(c) || isCjk(c));
  if (meaningful * 3 < chars.length) {
    return false;
  }

  if (PYTHON_KEYWORDS.has(trimmed)) {
    return false;
  }

  return !hasTechnicalMarker(trimmed, chars.length);
}

/**
 * Notebook code-cell comments. Only already-foreign text qualifies:
 * at least one non-ASCII character is required.
 */
export function isTranslatableNotebookComment(text: string): boolean {
  const chars = codePoints(text);

  if (chars.length < 3) {
    return false;
  }

  if (NOTEBOOK_CODE_HINTS.some(hint => text.includes(hint))) {
    return false;
  }

  if (text.includes('http://') || text.includes('https://')) {
    return false;
  }

  const alphaCount = countWhere(chars, c => ALPHABETIC.test(c));
  if (alphaCount * 2 < chars.length) {
    return false;
  }

  return chars.some(c => (c.codePointAt(0) ?? 0) > 127);
}
