import * as path from 'path';
import { detectLanguage } from './languageDetector';
import { ParseResult, Position, Priority, TranslatableUnit, UnitMetadata, UnitType } from './types';

/**
 * Capability set shared by every format extractor.
 *
 * `extractUnits` and `reconstruct` are pure: the path is only used for
 * extension sniffing and metadata, never for I/O.
 */
export interface Extractor {
  readonly name: string;

  supportedExtensions(): readonly string[];

  /**
   * Whether this extractor handles the file. Content, when given, may be
   * sniffed by extractors that support it.
   */
  canParse(filePath: string, content?: string): boolean;

  extractUnits(content: string, filePath: string): ParseResult;

  /**
   * Rebuild the file text from the original and units whose content
   * holds the translation
   */
  reconstruct(original: string, units: readonly TranslatableUnit[], filePath: string): string;
}

/**
 * Lower-cased extension including the dot ('' when there is none)
 */
export function extensionOf(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

export interface UnitInit {
  content: string;
  unitType: UnitType;
  position: Position;
  priority: Priority;
  context?: string;
  metadata?: UnitMetadata;
}

/**
 * Build a unit and tag it with its detected language
 */
export function createUnit(init: UnitInit): TranslatableUnit {
  const unit: TranslatableUnit = {
    content: init.content,
    unitType: init.unitType,
    position: init.position,
    priority: init.priority,
  };
  if (init.context !== undefined) unit.context = init.context;
  if (init.metadata !== undefined) unit.metadata = init.metadata;

  const language = detectLanguage(init.content);
  if (language !== undefined) unit.detectedLanguage = language;

  return unit;
}

/**
 * Key identifying the construct a unit was extracted from
 */
export function anchorKey(unit: TranslatableUnit): string {
  return `${unit.unitType}@${unit.position.line}:${unit.position.column}`;
}

/**
 * Anchors whose content is unchanged from a fresh extraction of the
 * original. Reconstructors leave those constructs byte-for-byte alone.
 */
export function unchangedAnchors(
  extracted: readonly TranslatableUnit[],
  units: readonly TranslatableUnit[]
): Set<string> {
  const originalContent = new Map<string, string>();
  for (const unit of extracted) {
    originalContent.set(anchorKey(unit), unit.content);
  }

  const unchanged = new Set<string>();
  for (const unit of units) {
    const key = anchorKey(unit);
    if (originalContent.get(key) === unit.content) {
      unchanged.add(key);
    }
  }
  return unchanged;
}
