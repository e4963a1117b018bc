/**
 * Notebook Extractor (.ipynb)
 *
 * Works on the cell list rather than on lines:
 * - Markdown cells: the whole cell source is one unit, anchored at the cell index
 * - Code cells: `#` comment lines holding non-ASCII text, anchored at
 *   cellIndex * 1000 + line offset
 *
 * Reconstruction locates cells through the unit metadata, so markdown cells
 * and code-cell comment lines are both written back in place.
 */

import { ExtractionError, ReconstructionError } from './errors';
import {
  Extractor,
  anchorKey,
  createUnit,
  extensionOf,
  unchangedAnchors,
} from './extractor';
import { foldToSingleLine, lineBody, restoreEnding, splitSourceLines } from './lines';
import { isTranslatableNotebookComment } from './translatability';
import { ParseResult, TranslatableUnit } from './types';

/** Anchor encoding for code-cell comments */
const CELL_LINE_STRIDE = 1000;

const CODE_COMMENT_RE = /^\s*#\s*(.+)$/;

type JsonObject = Record<string, unknown>;

interface CellSource {
  text: string;
  /** nbformat allows both a list of lines and a single string */
  form: 'list' | 'string';
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSource(cell: JsonObject): CellSource | undefined {
  const source = cell.source;
  if (typeof source === 'string') {
    return { text: source, form: 'string' };
  }
  if (Array.isArray(source)) {
    const text = source.filter((part): part is string => typeof part === 'string').join('');
    return { text, form: 'list' };
  }
  return undefined;
}

/**
 * Split text into nbformat source lines, each keeping its '\n'
 */
function toSourceList(text: string): string[] {
  const lines = text.split('\n');
  const result = lines.map((line, i) => (i < lines.length - 1 ? `${line}\n` : line));
  if (result.length > 0 && result[result.length - 1] === '') {
    result.pop();
  }
  return result;
}

function readCells(document: JsonObject): JsonObject[] {
  const cells = document.cells;
  if (!Array.isArray(cells)) {
    return [];
  }
  return cells.map(cell => (isJsonObject(cell) ? cell : {}));
}

/**
 * Indent width of the original document; nbformat writes 1
 */
function detectIndent(original: string): number {
  const match = original.match(/\n( +)"/);
  return match ? match[1].length : 1;
}

function locateCell(unit: TranslatableUnit): { cellIndex: number; lineOffset: number } {
  const line = unit.position.line;
  if (unit.unitType === 'text_node') {
    return { cellIndex: unit.metadata?.cellIndex ?? line, lineOffset: 0 };
  }
  return {
    cellIndex: unit.metadata?.cellIndex ?? Math.floor(line / CELL_LINE_STRIDE),
    lineOffset: unit.metadata?.lineOffset ?? line % CELL_LINE_STRIDE,
  };
}

export class NotebookExtractor implements Extractor {
  readonly name = 'NotebookExtractor';

  supportedExtensions(): readonly string[] {
    return ['.ipynb'];
  }

  canParse(filePath: string, _content?: string): boolean {
    return extensionOf(filePath) === '.ipynb';
  }

  extractUnits(content: string, filePath: string): ParseResult {
    const document = this.parseDocument(content, filePath, 'extract');
    const units: TranslatableUnit[] = [];

    readCells(document).forEach((cell, cellIndex) => {
      const source = readSource(cell);
      if (!source) {
        return;
      }

      if (cell.cell_type === 'markdown') {
        const text = source.text.trim();
        // Fence and heading checks look at the raw source, before trimming
        if (text.length === 0 || source.text.startsWith('```')) {
          return;
        }
        units.push(createUnit({
          content: text,
          unitType: 'text_node',
          position: { line: cellIndex, column: 0 },
          priority: source.text.startsWith('#') ? 'high' : 'medium',
          context: `Markdown cell ${cellIndex}`,
          metadata: { cellIndex },
        }));
        return;
      }

      if (cell.cell_type === 'code') {
        source.text.split('\n').forEach((rawLine, lineOffset) => {
          const match = lineBody(rawLine).match(CODE_COMMENT_RE);
          if (!match) {
            return;
          }
          const text = match[1].trim();
          if (!isTranslatableNotebookComment(text)) {
            return;
          }
          units.push(createUnit({
            content: text,
            unitType: 'comment',
            position: { line: cellIndex * CELL_LINE_STRIDE + lineOffset, column: 0 },
            priority: 'medium',
            context: `Code cell ${cellIndex}, line ${lineOffset + 1}`,
            metadata: { cellIndex, lineOffset },
          }));
        });
      }
    });

    return {
      units,
      fileType: 'jupyter_notebook',
      encoding: 'utf-8',
      lineCount: splitSourceLines(content).count,
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

    const document = this.parseDocument(original, filePath, 'reconstruct');
    const cells = readCells(document);
    const unchanged = unchangedAnchors(this.extractUnits(original, filePath).units, units);
    const rewritten = new Map<number, string>();

    for (const unit of units) {
      if (unchanged.has(anchorKey(unit))) {
        continue;
      }

      const { cellIndex, lineOffset } = locateCell(unit);
      const cell = cells[cellIndex];
      const source = cell ? readSource(cell) : undefined;
      if (!cell || !source) {
        continue;
      }

      const current = rewritten.get(cellIndex) ?? source.text;

      if (unit.unitType === 'text_node' && cell.cell_type === 'markdown') {
        const lead = current.match(/^\s*/)?.[0] ?? '';
        const trail = current.match(/\s*$/)?.[0] ?? '';
        rewritten.set(cellIndex, `${lead}${unit.content.trim()}${trail}`);
      } else if (unit.unitType === 'comment' && cell.cell_type === 'code') {
        const lines = current.split('\n');
        if (lineOffset >= lines.length) {
          continue;
        }
        const body = lineBody(lines[lineOffset]);
        const hashAt = body.indexOf('#');
        if (hashAt === -1) {
          continue;
        }
        lines[lineOffset] = restoreEnding(
          lines[lineOffset],
          `${body.slice(0, hashAt)}# ${foldToSingleLine(unit.content)}`
        );
        rewritten.set(cellIndex, lines.join('\n'));
      }
    }

    if (rewritten.size === 0) {
      return original;
    }

    for (const [cellIndex, text] of rewritten) {
      const cell = cells[cellIndex];
      cell.source = readSource(cell)?.form === 'string' ? text : toSourceList(text);
    }

    try {
      const serialized = JSON.stringify(document, null, detectIndent(original));
      return original.endsWith('\n') ? `${serialized}\n` : serialized;
    } catch (error) {
      throw new ReconstructionError(`Failed to serialize notebook ${filePath}`, filePath, error);
    }
  }

  private parseDocument(content: string, filePath: string, phase: 'extract' | 'reconstruct'): JsonObject {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const message = `Invalid notebook JSON in ${filePath}: ${reason}`;
      throw phase === 'extract'
        ? new ExtractionError(message, filePath, error)
        : new ReconstructionError(message, filePath, error);
    }

    if (!isJsonObject(parsed)) {
      const message = `Notebook ${filePath} is not a JSON object`;
      throw phase === 'extract'
        ? new ExtractionError(message, filePath)
        : new ReconstructionError(message, filePath);
    }

    return parsed;
  }
}
