/**
 * langshift
 *
 * Translates comments, docstrings and notebook text in source files while
 * leaving the code around them untouched.
 */

export * from './core/types';
export * from './core/errors';
export { extensionOf, createUnit, anchorKey, unchangedAnchors } from './core/extractor';
export type { Extractor, UnitInit } from './core/extractor';
export { detectLanguage } from './core/languageDetector';
export {
  isTranslatableCode,
  isTranslatablePython,
  isTranslatableNotebookComment,
} from './core/translatability';
export { GenericCodeExtractor } from './core/genericExtractor';
export { PythonExtractor } from './core/pythonExtractor';
export { NotebookExtractor } from './core/notebookExtractor';
export { ExtractorRegistry, createDefaultRegistry } from './core/registry';
export { ParseCache } from './cache/parseCache';
export * from './translators';
export {
  DEFAULT_SETTINGS,
  getConfigPath,
  getSettings,
  loadSettings,
  parseSettings,
  reloadSettings,
} from './config/settings';
export type { Settings, WebTranslatorSettings, MockTranslatorSettings } from './config/settings';
export { optionsFromSettings, scanFile, translateFile } from './pipeline/pipeline';
export type {
  ScanOptions,
  TranslateFileOptions,
  TranslateFileResult,
  TranslateFileStats,
} from './pipeline/pipeline';
export { log, setLogStream } from './logging/log';
