/**
 * Generic Code Extractor
 *
 * Extracts comments from C-style, hash-style and double-dash languages by
 * scanning line by line. No parsing: marker tables decide what a comment is.
 *
 * Supports: JavaScript/TypeScript, Java, C/C++, C#, Go, Rust, Swift, Kotlin,
 * Scala, PHP, Dart, Objective-C/MATLAB, shell, R, Ruby, Lua and SQL.
 */

import { log } from '../logging/log';
import {
  Extractor,
  anchorKey,
  createUnit,
  extensionOf,
  unchangedAnchors,
} from './extractor';
import { foldToSingleLine, lineBody, restoreEnding, splitSourceLines } from './lines';
import { isTranslatableCode } from './translatability';
import { ParseResult, TranslatableUnit } from './types';

interface CommentStyle {
  lineMarkers: readonly string[];
  blockStart?: string;
  blockEnd?: string;
}

const C_STYLE: CommentStyle = { lineMarkers: ['//'], blockStart: '/*', blockEnd: '*/' };
const HASH_STYLE: CommentStyle = { lineMarkers: ['#'] };
const DASH_STYLE: CommentStyle = { lineMarkers: ['--'], blockStart: '/*', blockEnd: '*/' };

const C_STYLE_EXTENSIONS = [
  '.js', '.ts', '.jsx', '.tsx', '.mjs', '.cjs',
  '.java', '.c', '.cpp', '.h', '.hpp', '.cs',
  '.go', '.rs', '.swift', '.kt', '.scala',
  '.php', '.dart', '.m',
];
const HASH_STYLE_EXTENSIONS = ['.sh', '.bash', '.r', '.rb'];
const DASH_STYLE_EXTENSIONS = ['.lua', '.sql'];

const SUPPORTED_EXTENSIONS: readonly string[] = [
  ...C_STYLE_EXTENSIONS,
  ...HASH_STYLE_EXTENSIONS,
  ...DASH_STYLE_EXTENSIONS,
];

function styleFor(filePath: string): CommentStyle {
  const ext = extensionOf(filePath);
  if (HASH_STYLE_EXTENSIONS.includes(ext)) return HASH_STYLE;
  if (DASH_STYLE_EXTENSIONS.includes(ext)) return DASH_STYLE;
  return C_STYLE;
}

interface MarkerHit {
  index: number;
  marker: string;
}

/**
 * Earliest single-line marker on a line. A `//` right after `:` belongs to
 * a URL scheme and is skipped.
 */
function findLineMarker(body: string, markers: readonly string[]): MarkerHit | undefined {
  let best: MarkerHit | undefined;

  for (const marker of markers) {
    let index = body.indexOf(marker);
    while (index > 0 && marker === '//' && body[index - 1] === ':') {
      index = body.indexOf(marker, index + marker.length);
    }
    if (index !== -1 && (best === undefined || index < best.index)) {
      best = { index, marker };
    }
  }

  return best;
}

/**
 * Strip the doc-comment gutter (`*`, `**`) from one line of block text
 */
function cleanBlockText(text: string): string {
  return text.trim().replace(/^\*+\s*/, '').trim();
}

type ScanState =
  | { kind: 'normal' }
  | { kind: 'inBlock'; startLine: number; startColumn: number; parts: string[] };

export class GenericCodeExtractor implements Extractor {
  readonly name = 'GenericCodeExtractor';

  supportedExtensions(): readonly string[] {
    return SUPPORTED_EXTENSIONS;
  }

  canParse(filePath: string, _content?: string): boolean {
    return SUPPORTED_EXTENSIONS.includes(extensionOf(filePath));
  }

  extractUnits(content: string, filePath: string): ParseResult {
    const style = styleFor(filePath);
    const { raw, count } = splitSourceLines(content);
    const units: TranslatableUnit[] = [];
    let state: ScanState = { kind: 'normal' };

    const emitLine = (text: string, line: number, hit: MarkerHit) => {
      if (!isTranslatableCode(text)) return;
      units.push(createUnit({
        content: text,
        unitType: 'comment',
        position: { line, column: hit.index + 1 },
        priority: 'medium',
        context: `Single-line comment at line ${line}`,
        metadata: { commentKind: 'line', marker: hit.marker },
      }));
    };

    const emitBlock = (text: string, startLine: number, startColumn: number, endLine: number) => {
      if (!isTranslatableCode(text)) return;
      const span = endLine - startLine + 1;
      units.push(createUnit({
        content: text,
        unitType: 'comment',
        position: { line: startLine, column: startColumn },
        priority: 'medium',
        context: span === 1
          ? `Block comment at line ${startLine}`
          : `Block comment at lines ${startLine}-${endLine}`,
        metadata: span === 1
          ? { commentKind: 'block', marker: style.blockStart }
          : { commentKind: 'block', marker: style.blockStart, span, endLine },
      }));
    };

    for (let i = 0; i < count; i++) {
      const lineNum = i + 1;
      const body = lineBody(raw[i]);

      if (state.kind === 'inBlock') {
        const endIndex = style.blockEnd ? body.indexOf(style.blockEnd) : -1;
        if (endIndex === -1) {
          state.parts.push(cleanBlockText(body));
          continue;
        }
        state.parts.push(cleanBlockText(body.slice(0, endIndex)));
        const text = state.parts.filter(part => part.length > 0).join(' ');
        emitBlock(text, state.startLine, state.startColumn, lineNum);
        // The closing line belongs to the block; nothing else is taken from it
        state = { kind: 'normal' };
        continue;
      }

      // Shebang
      if (lineNum === 1 && body.startsWith('#!')) {
        continue;
      }

      const lineHit = findLineMarker(body, style.lineMarkers);
      const blockIndex = style.blockStart ? body.indexOf(style.blockStart) : -1;

      if (lineHit && (blockIndex === -1 || lineHit.index < blockIndex)) {
        emitLine(body.slice(lineHit.index + lineHit.marker.length).trim(), lineNum, lineHit);
        continue;
      }

      if (blockIndex === -1 || !style.blockStart || !style.blockEnd) {
        continue;
      }

      const afterStart = body.slice(blockIndex + style.blockStart.length);
      const endIndex = afterStart.indexOf(style.blockEnd);
      if (endIndex !== -1) {
        emitBlock(cleanBlockText(afterStart.slice(0, endIndex)), lineNum, blockIndex + 1, lineNum);
      } else {
        state = {
          kind: 'inBlock',
          startLine: lineNum,
          startColumn: blockIndex + 1,
          parts: [cleanBlockText(afterStart)],
        };
      }
    }

    // An unterminated block comment is dropped

    return {
      units,
      fileType: 'generic_code',
      encoding: 'utf-8',
      lineCount: count,
      metadata: {
        extractor: this.name,
        filePath,
        extension: extensionOf(filePath),
      },
    };
  }

  reconstruct(original: string, units: readonly TranslatableUnit[], filePath: string): string {
    if (units.length === 0) {
      return original;
    }

    const style = styleFor(filePath);
    const { raw } = splitSourceLines(original);
    const unchanged = unchangedAnchors(this.extractUnits(original, filePath).units, units);

    // Descending line order; replacement is by index so earlier lines never shift
    const ordered = [...units].sort((a, b) => b.position.line - a.position.line);

    for (const unit of ordered) {
      if (unchanged.has(anchorKey(unit))) {
        continue;
      }

      const index = unit.position.line - 1;
      if (index < 0 || index >= raw.length) {
        continue;
      }

      const body = lineBody(raw[index]);
      const content = foldToSingleLine(unit.content);
      const rewritten = unit.metadata?.commentKind === 'block'
        ? this.rewriteBlockComment(body, unit, style, content)
        : this.rewriteLineComment(body, style, content);

      if (rewritten !== undefined) {
        raw[index] = restoreEnding(raw[index], rewritten);
      }
    }

    return raw.join('\n');
  }

  /**
   * Replace everything after the first single-line marker
   */
  private rewriteLineComment(body: string, style: CommentStyle, content: string): string | undefined {
    const hit = findLineMarker(body, style.lineMarkers);
    if (!hit) {
      return undefined;
    }
    return `${body.slice(0, hit.index)}${hit.marker} ${content}`;
  }

  /**
   * Replace the text between block markers on one line.
   * Block comments spanning several lines are left as they are.
   */
  private rewriteBlockComment(
    body: string,
    unit: TranslatableUnit,
    style: CommentStyle,
    content: string
  ): string | undefined {
    if (!style.blockStart || !style.blockEnd) {
      return undefined;
    }

    if ((unit.metadata?.span ?? 1) > 1) {
      log(`[GenericExtractor] Skipping multi-line block comment at line ${unit.position.line}`);
      return undefined;
    }

    const hinted = unit.position.column - 1;
    const start = body.startsWith(style.blockStart, hinted) ? hinted : body.indexOf(style.blockStart);
    if (start === -1) {
      return undefined;
    }

    const innerStart = start + style.blockStart.length;
    const innerEnd = body.indexOf(style.blockEnd, innerStart);
    if (innerEnd === -1) {
      return undefined;
    }

    const inner = body.slice(innerStart, innerEnd);
    const gutter = inner.match(/^\s*\**\s*/)?.[0] ?? '';
    const padding = inner.match(/\s*$/)?.[0] ?? '';

    return body.slice(0, innerStart) + gutter + content + padding + body.slice(innerEnd);
  }
}
