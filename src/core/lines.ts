/**
 * Line helpers shared by the line-based extractors.
 *
 * Files are split on '\n' only, so a '\r' before the newline stays on its
 * line and joining with '\n' restores the original bytes, trailing newline
 * included.
 */

export interface SourceLines {
  /** Raw physical lines, '\r' kept */
  raw: string[];
  /** Number of lines a line iterator would report */
  count: number;
}

export function splitSourceLines(content: string): SourceLines {
  const raw = content.split('\n');
  const count = content.length === 0
    ? 0
    : content.endsWith('\n') ? raw.length - 1 : raw.length;
  return { raw, count };
}

/**
 * Line text without its '\r'
 */
export function lineBody(raw: string): string {
  return raw.endsWith('\r') ? raw.slice(0, -1) : raw;
}

/**
 * Put back the '\r' the original line carried
 */
export function restoreEnding(original: string, replacement: string): string {
  return original.endsWith('\r') ? `${replacement}\r` : replacement;
}

/**
 * Translated text must fit on one physical line
 */
export function foldToSingleLine(text: string): string {
  return text.replace(/\s*\r?\n\s*/g, ' ').trim();
}

export function leadingWhitespace(line: string): string {
  const match = line.match(/^\s*/);
  return match ? match[0] : '';
}
