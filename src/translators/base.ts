import {
  InvalidInputError,
  UnsupportedLanguageError,
  describeError,
} from '../core/errors';
import { log } from '../logging/log';
import { Semaphore } from './semaphore';
import { RandomSource, SleepFn, defaultSleep } from './timing';
import { TranslationResult, Translator, failedResult, withMetadata } from './types';

/** Default number of in-flight requests during a batch */
export const DEFAULT_CONCURRENCY = 3;

/**
 * Options every backend accepts
 */
export interface TranslatorRuntimeOptions {
  /** Source of randomness for pacing and jitter (default: Math.random) */
  random?: RandomSource;
  sleep?: SleepFn;
  /** Batch concurrency (default: 3) */
  concurrency?: number;
}

/**
 * Shared half of every backend: input checks, language validation and
 * bounded-concurrency batching. Subclasses supply the actual translation.
 */
export abstract class BaseTranslator implements Translator {
  abstract readonly name: string;

  protected readonly random: RandomSource;
  protected readonly sleep: SleepFn;
  protected readonly concurrency: number;

  constructor(options: TranslatorRuntimeOptions = {}) {
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  }

  abstract supportedLanguages(): string[];

  /**
   * Translate already validated and normalized input
   */
  protected abstract translateText(text: string, source: string, target: string): Promise<TranslationResult>;

  normalizeLanguageCode(code: string): string {
    return code.trim().toLowerCase();
  }

  isLanguageSupported(code: string): boolean {
    return this.supportedLanguages().includes(this.normalizeLanguageCode(code));
  }

  /**
   * `auto` lets the backend detect the source language
   */
  protected isSourceAccepted(code: string): boolean {
    return this.normalizeLanguageCode(code) === 'auto' || this.isLanguageSupported(code);
  }

  validateLanguages(source: string, target: string): void {
    if (!this.isSourceAccepted(source)) {
      throw new UnsupportedLanguageError(source);
    }
    if (!this.isLanguageSupported(target)) {
      throw new UnsupportedLanguageError(target);
    }
  }

  async translate(text: string, source: string, target: string): Promise<TranslationResult> {
    if (text.trim().length === 0) {
      throw new InvalidInputError('Text cannot be empty');
    }

    this.validateLanguages(source, target);

    return this.translateText(
      text,
      this.normalizeLanguageCode(source),
      this.normalizeLanguageCode(target)
    );
  }

  async translateBatch(texts: readonly string[], source: string, target: string): Promise<TranslationResult[]> {
    this.validateLanguages(source, target);

    const sourceLang = this.normalizeLanguageCode(source);
    const targetLang = this.normalizeLanguageCode(target);
    const semaphore = new Semaphore(this.concurrency);

    log(`[${this.name}] Translating batch of ${texts.length} texts ${sourceLang} → ${targetLang}`);

    const tasks = texts.map((text, index) =>
      semaphore.run(async (): Promise<TranslationResult> => {
        try {
          const result = await this.translate(text, source, target);
          return withMetadata(result, 'batch_index', String(index));
        } catch (error) {
          log(`[${this.name}] Batch item ${index} failed: ${describeError(error)}`);
          return withMetadata(
            failedResult(text, sourceLang, targetLang, describeError(error)),
            'batch_index',
            String(index)
          );
        }
      })
    );

    // Completion order is free; Promise.all keeps input order
    return Promise.all(tasks);
  }

  estimateCost(_text: string, _source: string, _target: string): number {
    return 0;
  }

  getUsageInfo(): Record<string, string> {
    return {
      name: this.name,
      languages: String(this.supportedLanguages().length),
    };
  }
}
