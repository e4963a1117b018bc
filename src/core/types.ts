/**
 * Kinds of translatable fragment. The kind decides how a unit is written
 * back into its file.
 */
export type UnitType = 'comment' | 'docstring' | 'string_literal' | 'text_node' | 'metadata';

/**
 * Translation priority, ordered high > medium > low > ignore
 */
export type Priority = 'high' | 'medium' | 'low' | 'ignore';

const PRIORITY_RANK: Record<Priority, number> = {
  high: 3,
  medium: 2,
  low: 1,
  ignore: 0,
};

export const PRIORITIES: readonly Priority[] = ['high', 'medium', 'low', 'ignore'];

/**
 * Negative when `a` ranks below `b`, zero when equal, positive when above
 */
export function comparePriority(a: Priority, b: Priority): number {
  return PRIORITY_RANK[a] - PRIORITY_RANK[b];
}

/**
 * True when the unit should be kept under a minimum priority.
 * Ignore-priority units never pass.
 */
export function meetsPriority(unit: Pick<TranslatableUnit, 'priority'>, minPriority: Priority): boolean {
  if (unit.priority === 'ignore') {
    return false;
  }
  return comparePriority(unit.priority, minPriority) >= 0;
}

export function isPriority(value: unknown): value is Priority {
  return PRIORITIES.some(priority => priority === value);
}

/**
 * 1-based anchor into the original file (start line for multi-line constructs)
 */
export interface Position {
  line: number;
  column: number;
}

/**
 * Format-specific extras attached to a unit
 */
export interface UnitMetadata {
  /** Physical lines the construct occupies; absent means 1 */
  span?: number;
  /** Last physical line of a multi-line construct */
  endLine?: number;
  /** Generic-code comments: which marker family produced the unit */
  commentKind?: 'line' | 'block';
  /** The marker text (`//`, `#`, `--`, `/*`) */
  marker?: string;
  /** Notebook units: index of the owning cell */
  cellIndex?: number;
  /** Notebook code-cell comments: 0-based line inside the cell source */
  lineOffset?: number;
}

/**
 * One extractable natural-language fragment
 */
export interface TranslatableUnit {
  /** Natural-language text without comment or quote delimiters */
  content: string;
  unitType: UnitType;
  position: Position;
  priority: Priority;
  /** Human-readable provenance, not used for reconstruction */
  context?: string;
  metadata?: UnitMetadata;
  /** Language code set by the language detector */
  detectedLanguage?: string;
}

/**
 * Output of one extraction pass
 */
export interface ParseResult {
  /** Units in first-seen order */
  units: TranslatableUnit[];
  fileType: string;
  encoding: string;
  lineCount: number;
  metadata?: Record<string, string | number>;
}

/**
 * Physical lines covered by a unit
 */
export function unitSpan(unit: TranslatableUnit): number {
  return unit.metadata?.span ?? 1;
}

/**
 * Copy of a unit carrying new content; everything else is kept
 */
export function withContent(unit: TranslatableUnit, content: string): TranslatableUnit {
  return {
    ...unit,
    position: { ...unit.position },
    metadata: unit.metadata ? { ...unit.metadata } : undefined,
    content,
  };
}
