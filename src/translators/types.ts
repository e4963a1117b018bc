export type TranslationStatus = 'success' | 'failed' | 'partial' | 'skipped';

/**
 * Result of translating one text
 */
export interface TranslationResult {
  originalText: string;
  /** Falls back to originalText when the translation failed */
  translatedText: string;
  sourceLanguage: string;
  targetLanguage: string;
  status: TranslationStatus;
  /** 0.0 to 1.0 */
  confidence: number;
  metadata?: Record<string, string>;
}

/**
 * Capability set of a translation backend
 */
export interface Translator {
  readonly name: string;

  supportedLanguages(): string[];

  isLanguageSupported(code: string): boolean;

  normalizeLanguageCode(code: string): string;

  /**
   * Throws UnsupportedLanguageError when either side is unsupported after
   * normalization
   */
  validateLanguages(source: string, target: string): void;

  translate(text: string, source: string, target: string): Promise<TranslationResult>;

  /**
   * Same length and order as `texts`; a failing item becomes a failed
   * result instead of failing the batch
   */
  translateBatch(texts: readonly string[], source: string, target: string): Promise<TranslationResult[]>;

  estimateCost(text: string, source: string, target: string): number;

  getUsageInfo(): Record<string, string>;
}

export function successResult(
  originalText: string,
  translatedText: string,
  sourceLanguage: string,
  targetLanguage: string,
  confidence: number,
  metadata?: Record<string, string>
): TranslationResult {
  return {
    originalText,
    translatedText,
    sourceLanguage,
    targetLanguage,
    status: 'success',
    confidence,
    metadata,
  };
}

export function failedResult(
  originalText: string,
  sourceLanguage: string,
  targetLanguage: string,
  errorMessage: string
): TranslationResult {
  return {
    originalText,
    translatedText: originalText,
    sourceLanguage,
    targetLanguage,
    status: 'failed',
    confidence: 0,
    metadata: { error: errorMessage },
  };
}

export function withMetadata(result: TranslationResult, key: string, value: string): TranslationResult {
  return { ...result, metadata: { ...result.metadata, [key]: value } };
}
