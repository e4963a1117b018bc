/**
 * Mock translator for tests and offline runs
 *
 * Produces deterministic `[Label] text` output. Delay, simulated failures
 * and confidence are drawn from the injected random source.
 */

import { TranslationFailedError } from '../core/errors';
import { BaseTranslator, TranslatorRuntimeOptions } from './base';
import { uniformFloat, uniformInt } from './timing';
import { TranslationResult, successResult } from './types';

export interface MockTranslatorConfig extends TranslatorRuntimeOptions {
  /** Simulated latency range in ms (default: 100-500) */
  delayRangeMs?: readonly [number, number];
  /** Failure probability, fixed or per text (default: 0) */
  errorRate?: number | ((text: string) => number);
  /** Confidence range (default: 0.8-1.0) */
  confidenceRange?: readonly [number, number];
}

/** Output label per target language */
const LANGUAGE_LABELS: Record<string, string> = {
  en: 'EN',
  zh: '中文',
  ja: '日本語',
  ko: '한국어',
  fr: 'Français',
  de: 'Deutsch',
  es: 'Español',
  it: 'Italiano',
  pt: 'Português',
  ru: 'Русский',
  ar: 'العربية',
  hi: 'हिन्दी',
  th: 'ไทย',
  vi: 'Tiếng Việt',
  id: 'Bahasa Indonesia',
};

const SUPPORTED_LANGUAGES = Object.keys(LANGUAGE_LABELS);

export class MockTranslator extends BaseTranslator {
  readonly name = 'Mock';

  private readonly delayRangeMs: readonly [number, number];
  private readonly errorRate: number | ((text: string) => number);
  private readonly confidenceRange: readonly [number, number];

  constructor(config: MockTranslatorConfig = {}) {
    super(config);
    this.delayRangeMs = config.delayRangeMs ?? [100, 500];
    this.errorRate = config.errorRate ?? 0;
    this.confidenceRange = config.confidenceRange ?? [0.8, 1.0];
  }

  supportedLanguages(): string[] {
    return [...SUPPORTED_LANGUAGES];
  }

  /**
   * Regional variants collapse to their base code; every Chinese variant
   * becomes `zh`
   */
  normalizeLanguageCode(code: string): string {
    const normalized = code.trim().toLowerCase();
    if (normalized.startsWith('zh')) {
      return 'zh';
    }
    const base = normalized.split(/[-_]/)[0];
    return base !== normalized && SUPPORTED_LANGUAGES.includes(base) ? base : normalized;
  }

  protected async translateText(text: string, source: string, target: string): Promise<TranslationResult> {
    // Draw everything before waiting so the sequence does not depend on timing
    const delayMs = uniformInt(this.random, this.delayRangeMs);
    const roll = this.random();
    const confidence = uniformFloat(this.random, this.confidenceRange);

    await this.sleep(delayMs);

    const rate = typeof this.errorRate === 'function' ? this.errorRate(text) : this.errorRate;
    if (roll < rate) {
      throw new TranslationFailedError('Mock translation failed (simulated error)', this.name, 'MOCK_ERROR');
    }

    return successResult(text, this.generateTranslation(text, source, target), source, target, confidence, {
      mock: 'true',
      delay_ms: String(delayMs),
      translator: this.name,
    });
  }

  private generateTranslation(text: string, source: string, target: string): string {
    if (source === target) {
      return text;
    }
    const label = LANGUAGE_LABELS[target] ?? target;
    return `[${label}] ${text}`;
  }

  getUsageInfo(): Record<string, string> {
    const errorRate = typeof this.errorRate === 'function' ? 'per-text' : String(this.errorRate);
    return {
      ...super.getUsageInfo(),
      cost_per_character: '0.0',
      max_batch_size: '1000',
      rate_limit: 'None (mock)',
      delay_range: `${this.delayRangeMs[0]}-${this.delayRangeMs[1]}ms`,
      error_rate: errorRate,
    };
  }
}
