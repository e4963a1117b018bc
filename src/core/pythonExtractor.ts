/**
 * Python Extractor
 *
 * Extracts full-line `#` comments and triple-quoted docstrings. Shebangs,
 * encoding declarations and tool pragmas are left alone.
 *
 * Docstrings spanning several lines record their span so reconstruction can
 * collapse them to a single line without disturbing the rest of the file.
 */

import {
  Extractor,
  anchorKey,
  createUnit,
  extensionOf,
  unchangedAnchors,
} from './extractor';
import {
  foldToSingleLine,
  leadingWhitespace,
  lineBody,
  restoreEnding,
  splitSourceLines,
} from './lines';
import { isTranslatablePython } from './translatability';
import { ParseResult, TranslatableUnit, unitSpan } from './types';

const SUPPORTED_EXTENSIONS: readonly string[] = ['.py', '.pyi', '.pyw'];

/** Bytes sniffed when a file has no Python extension */
const SNIFF_LENGTH = 500;
const PYTHON_HINTS = ['def ', 'class ', 'import '];

const COMMENT_RE = /^\s*#\s*(.+)$/;
const SINGLE_DOCSTRING_RE = /^\s*("""|''')(.+?)\1/;
const DOCSTRING_START_RE = /^\s*("""|''')\s*(.*)$/;
const TRIPLE_QUOTES = ['"""', "'''"] as const;

/** PEP 263 encoding declaration, honoured on lines 1-2 only */
const CODING_RE = /^[ \t\f]*#.*?coding[:=][ \t]*[-\w.]+/;
const PRAGMA_RE = /^(type:|noqa\b|pylint:|fmt:)/i;

/**
 * Shebang, encoding declaration or tool pragma
 */
function isDirective(body: string, text: string, lineNum: number): boolean {
  if (lineNum === 1 && body.trimStart().startsWith('#!')) {
    return true;
  }
  if (lineNum <= 2 && CODING_RE.test(body)) {
    return true;
  }
  return PRAGMA_RE.test(text);
}

/**
 * Quote of a triple-quoted string opened after code on this line and left
 * open (`SQL = """`, `run("""`, `r"""`). Such strings are values, not docstrings.
 */
function openStringQuote(body: string): string | undefined {
  const trimmed = body.trimStart();
  let quote: string | undefined;
  let firstAt = -1;

  for (const candidate of TRIPLE_QUOTES) {
    const at = trimmed.indexOf(candidate);
    if (at !== -1 && (firstAt === -1 || at < firstAt)) {
      quote = candidate;
      firstAt = at;
    }
  }

  if (quote === undefined || firstAt === 0) {
    return undefined;
  }
  return (trimmed.split(quote).length - 1) % 2 === 1 ? quote : undefined;
}

export class PythonExtractor implements Extractor {
  readonly name = 'PythonExtractor';

  supportedExtensions(): readonly string[] {
    return SUPPORTED_EXTENSIONS;
  }

  canParse(filePath: string, content?: string): boolean {
    if (SUPPORTED_EXTENSIONS.includes(extensionOf(filePath))) {
      return true;
    }

    if (content === undefined) {
      return false;
    }

    const sample = content.slice(0, SNIFF_LENGTH);
    return PYTHON_HINTS.some(hint => sample.includes(hint));
  }

  extractUnits(content: string, filePath: string): ParseResult {
    const { raw, count } = splitSourceLines(content);
    const units: TranslatableUnit[] = [];

    let i = 0;
    while (i < count) {
      const lineNum = i + 1;
      const body = lineBody(raw[i]);

      const commentMatch = body.match(COMMENT_RE);
      if (commentMatch) {
        const text = commentMatch[1].trim();
        if (!isDirective(body, text, lineNum) && isTranslatablePython(text)) {
          units.push(createUnit({
            content: text,
            unitType: 'comment',
            position: { line: lineNum, column: body.indexOf('#') + 1 },
            priority: 'medium',
            context: `Line ${lineNum}: ${body.trim()}`,
          }));
        }
        i++;
        continue;
      }

      const singleMatch = body.match(SINGLE_DOCSTRING_RE);
      if (singleMatch) {
        const text = singleMatch[2].trim();
        if (isTranslatablePython(text)) {
          units.push(createUnit({
            content: text,
            unitType: 'docstring',
            position: { line: lineNum, column: leadingWhitespace(body).length + 1 },
            priority: 'high',
            context: `Docstring at line ${lineNum}`,
          }));
        }
        i++;
        continue;
      }

      const openQuote = openStringQuote(body);
      if (openQuote !== undefined) {
        let closeIndex = -1;
        for (let j = i + 1; j < count; j++) {
          if (lineBody(raw[j]).includes(openQuote)) {
            closeIndex = j;
            break;
          }
        }
        if (closeIndex === -1) {
          break;
        }
        i = closeIndex + 1;
        continue;
      }

      const startMatch = body.match(DOCSTRING_START_RE);
      if (!startMatch) {
        i++;
        continue;
      }

      const quote = startMatch[1];
      const firstLine = startMatch[2].trim();

      // Opens and closes on this line without text (e.g. an empty docstring)
      if (firstLine.length > 0 && body.trimEnd().endsWith(quote)) {
        i++;
        continue;
      }

      const parts: string[] = firstLine.length > 0 ? [firstLine] : [];
      let endIndex = -1;

      for (let j = i + 1; j < count; j++) {
        const current = lineBody(raw[j]);
        const closeAt = current.indexOf(quote);
        if (closeAt !== -1) {
          const last = current.slice(0, closeAt).trim();
          if (last.length > 0) parts.push(last);
          endIndex = j;
          break;
        }
        const middle = current.trim();
        if (middle.length > 0) parts.push(middle);
      }

      if (endIndex === -1) {
        // Unterminated: the rest of the file is inside the string
        break;
      }

      const text = parts.join(' ');
      if (isTranslatablePython(text)) {
        const endLine = endIndex + 1;
        units.push(createUnit({
          content: text,
          unitType: 'docstring',
          position: { line: lineNum, column: leadingWhitespace(body).length + 1 },
          priority: 'high',
          context: `Multi-line docstring at lines ${lineNum}-${endLine}`,
          metadata: { span: endLine - lineNum + 1, endLine },
        }));
      }

      i = endIndex + 1;
    }

    return {
      units,
      fileType: 'python',
      encoding: 'utf-8',
      lineCount: count,
      metadata: {
        extractor: this.name,
        filePath,
      },
    };
  }

  reconstruct(original: string, units: readonly TranslatableUnit[], filePath: string): string {
    if (units.length === 0) {
      return original;
    }

    const { raw } = splitSourceLines(original);
    const unchanged = unchangedAnchors(this.extractUnits(original, filePath).units, units);
    const replacements = new Map<number, string>();
    const removed = new Set<number>();

    for (const unit of units) {
      if (unchanged.has(anchorKey(unit))) {
        continue;
      }

      const index = unit.position.line - 1;
      if (index < 0 || index >= raw.length) {
        continue;
      }

      const body = lineBody(raw[index]);
      const content = foldToSingleLine(unit.content);

      if (unit.unitType === 'comment') {
        const hashAt = body.indexOf('#');
        if (hashAt !== -1) {
          replacements.set(index, `${body.slice(0, hashAt)}# ${content}`);
        }
      } else if (unit.unitType === 'docstring') {
        const quote = body.includes('"""') ? '"""' : "'''";
        replacements.set(index, `${leadingWhitespace(body)}${quote}${content}${quote}`);

        // Collapsed to one line: the rest of the original span goes away
        for (let offset = 1; offset < unitSpan(unit); offset++) {
          removed.add(index + offset);
        }
      }
    }

    const output: string[] = [];
    raw.forEach((line, index) => {
      if (removed.has(index)) {
        return;
      }
      const replacement = replacements.get(index);
      output.push(replacement === undefined ? line : restoreEnding(line, replacement));
    });

    return output.join('\n');
  }
}
