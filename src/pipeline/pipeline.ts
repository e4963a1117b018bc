/**
 * File-level pipeline: extract, filter, translate and rebuild one file
 */

import { ParseCache } from '../cache/parseCache';
import { Settings } from '../config/settings';
import { UnsupportedFileError } from '../core/errors';
import { Extractor } from '../core/extractor';
import { ExtractorRegistry, createDefaultRegistry } from '../core/registry';
import { ParseResult, Priority, TranslatableUnit, meetsPriority, withContent } from '../core/types';
import { log } from '../logging/log';
import { TranslatorOverrides, createTranslator } from '../translators';
import { TranslationResult, Translator } from '../translators/types';

export interface ScanOptions {
  /** Defaults to the built-in registry */
  registry?: ExtractorRegistry;
  cache?: ParseCache;
  /** Lowest priority kept (default: low) */
  minPriority?: Priority;
}

export interface TranslateFileOptions extends ScanOptions {
  translator: Translator;
  /** Source language passed to the translator (default: auto) */
  sourceLanguage?: string;
  targetLanguage: string;
  /** Leave units already detected as the target language (default: true) */
  skipTargetLanguage?: boolean;
  /** Only translate units detected as one of these; undetected units always pass */
  sourceLanguages?: readonly string[];
  /** Translate but return the original content */
  dryRun?: boolean;
}

export interface TranslateFileStats {
  /** Units kept after priority filtering */
  total: number;
  translated: number;
  failed: number;
  skipped: number;
}

export interface TranslateFileResult {
  content: string;
  changed: boolean;
  /** Units sent for translation, carrying translated text where it succeeded */
  units: TranslatableUnit[];
  /** Same order as `units` */
  results: TranslationResult[];
  stats: TranslateFileStats;
}

/**
 * translateFile options for the configured backend, languages and priority floor
 */
export function optionsFromSettings(
  settings: Settings,
  overrides: TranslatorOverrides = {}
): TranslateFileOptions {
  return {
    translator: createTranslator(settings.translator, settings, overrides),
    sourceLanguage: settings.sourceLanguage,
    targetLanguage: settings.targetLanguage,
    minPriority: settings.minPriority,
    skipTargetLanguage: settings.skipTargetLanguage,
  };
}

let defaultRegistry: ExtractorRegistry | null = null;

function getDefaultRegistry(): ExtractorRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createDefaultRegistry();
  }
  return defaultRegistry;
}

interface Scan {
  extractor: Extractor;
  result: ParseResult;
}

function scan(content: string, filePath: string, options: ScanOptions): Scan {
  const registry = options.registry ?? getDefaultRegistry();
  const extractor = registry.find(filePath, content);
  if (!extractor) {
    throw new UnsupportedFileError(filePath);
  }

  const key = ParseCache.generateKey(filePath, content);
  let result = options.cache?.get(key);
  if (!result) {
    result = extractor.extractUnits(content, filePath);
    options.cache?.set(key, result);
  } else {
    log(`[Pipeline] Cache hit for ${filePath}`);
  }

  const minPriority = options.minPriority ?? 'low';
  return {
    extractor,
    result: { ...result, units: result.units.filter(unit => meetsPriority(unit, minPriority)) },
  };
}

/**
 * Extract the translatable units of a file, filtered by priority
 */
export function scanFile(content: string, filePath: string, options: ScanOptions = {}): ParseResult {
  return scan(content, filePath, options).result;
}

function isSameLanguage(translator: Translator, a: string, b: string): boolean {
  return translator.normalizeLanguageCode(a) === translator.normalizeLanguageCode(b);
}

function selectUnits(units: readonly TranslatableUnit[], options: TranslateFileOptions): TranslatableUnit[] {
  const { translator, targetLanguage, sourceLanguages } = options;
  const skipTarget = options.skipTargetLanguage ?? true;

  return units.filter(unit => {
    const detected = unit.detectedLanguage;
    if (detected === undefined) {
      return true;
    }
    if (skipTarget && isSameLanguage(translator, detected, targetLanguage)) {
      return false;
    }
    if (sourceLanguages && sourceLanguages.length > 0) {
      return sourceLanguages.some(language => isSameLanguage(translator, detected, language));
    }
    return true;
  });
}

/**
 * Translate the natural-language parts of a file and rebuild it
 */
export async function translateFile(
  content: string,
  filePath: string,
  options: TranslateFileOptions
): Promise<TranslateFileResult> {
  const { extractor, result } = scan(content, filePath, options);
  const selected = selectUnits(result.units, options);
  const total = result.units.length;

  if (selected.length === 0) {
    log(`[Pipeline] Nothing to translate in ${filePath}`);
    return {
      content,
      changed: false,
      units: [],
      results: [],
      stats: { total, translated: 0, failed: 0, skipped: total },
    };
  }

  log(`[Pipeline] Translating ${selected.length}/${total} units in ${filePath} with ${options.translator.name}`);

  const results = await options.translator.translateBatch(
    selected.map(unit => unit.content),
    options.sourceLanguage ?? 'auto',
    options.targetLanguage
  );

  const units = selected.map((unit, index) => {
    const translation = results[index];
    return translation && translation.status === 'success'
      ? withContent(unit, translation.translatedText)
      : withContent(unit, unit.content);
  });

  const translated = results.filter(r => r.status === 'success').length;
  const failed = results.filter(r => r.status === 'failed').length;
  const stats: TranslateFileStats = {
    total,
    translated,
    failed,
    skipped: total - translated - failed,
  };

  if (options.dryRun) {
    return { content, changed: false, units, results, stats };
  }

  const rebuilt = extractor.reconstruct(content, units, filePath);
  log(`[Pipeline] ${filePath}: ${translated} translated, ${failed} failed, ${stats.skipped} skipped`);

  return { content: rebuilt, changed: rebuilt !== content, units, results, stats };
}
