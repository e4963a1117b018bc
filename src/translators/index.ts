import { InvalidInputError } from '../core/errors';
import { Settings } from '../config/settings';
import { GoogleTranslator, GoogleTranslatorConfig } from './google';
import { MockTranslator, MockTranslatorConfig } from './mock';
import { Translator } from './types';

export * from './types';
export { BaseTranslator, DEFAULT_CONCURRENCY } from './base';
export type { TranslatorRuntimeOptions } from './base';
export { MockTranslator } from './mock';
export type { MockTranslatorConfig } from './mock';
export { GoogleTranslator, DEFAULT_SERVICE_URL, parseTranslateResponse } from './google';
export type { GoogleTranslatorConfig, FetchLike, FetchResponseLike } from './google';
export { Semaphore } from './semaphore';
export { withRetry, isRetryableError } from './retry';
export type { RetryOptions } from './retry';
export { createSeededRandom, defaultSleep } from './timing';
export type { RandomSource, SleepFn } from './timing';

export type TranslatorName = 'google' | 'mock';

/**
 * Runtime overrides applied on top of settings (random source, sleep, fetch)
 */
export type TranslatorOverrides = Pick<GoogleTranslatorConfig, 'random' | 'sleep' | 'fetch'>;

/**
 * Build a backend from settings
 */
export function createTranslator(
  name: string,
  settings: Pick<Settings, 'web' | 'mock'>,
  overrides: TranslatorOverrides = {}
): Translator {
  switch (name.trim().toLowerCase()) {
    case 'google': {
      const config: GoogleTranslatorConfig = { ...settings.web, ...overrides };
      return new GoogleTranslator(config);
    }
    case 'mock': {
      const config: MockTranslatorConfig = {
        ...settings.mock,
        random: overrides.random,
        sleep: overrides.sleep,
      };
      return new MockTranslator(config);
    }
    default:
      throw new InvalidInputError(`Unknown translator '${name}' (expected 'google' or 'mock')`);
  }
}
