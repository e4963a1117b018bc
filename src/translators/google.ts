/**
 * Web Translator
 *
 * Calls the public Google Translate endpoint over HTTP (node-fetch).
 * Every attempt is paced with a random delay; failed attempts are retried
 * with linear backoff.
 */

import fetch from 'node-fetch';
import { NetworkError, TranslationFailedError } from '../core/errors';
import { log } from '../logging/log';
import { BaseTranslator, TranslatorRuntimeOptions } from './base';
import { withRetry } from './retry';
import { uniformInt } from './timing';
import { TranslationResult, successResult } from './types';

export const DEFAULT_SERVICE_URL = 'https://translate.googleapis.com/translate_a/single';

/** The part of a fetch Response the translator reads */
export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export type FetchLike = (url: string, init?: { timeout?: number }) => Promise<FetchResponseLike>;

const nodeFetch: FetchLike = (url, init) => fetch(url, init);

export interface GoogleTranslatorConfig extends TranslatorRuntimeOptions {
  serviceUrl?: string;
  /** Request timeout (default: 30000) */
  timeoutMs?: number;
  /** Total attempts per text (default: 3) */
  retryCount?: number;
  /** Pacing delay before each attempt (default: 300-600) */
  delayRangeMs?: readonly [number, number];
  fetch?: FetchLike;
}

const SUPPORTED_LANGUAGES = [
  'en', 'zh-CN', 'zh-TW', 'ja', 'ko', 'fr', 'de', 'es', 'it', 'pt',
  'ru', 'ar', 'hi', 'th', 'vi', 'id', 'nl', 'sv', 'da', 'no',
  'fi', 'pl', 'tr', 'cs', 'hu', 'ro', 'bg', 'el', 'he', 'uk',
];

const LANGUAGE_ALIASES: Record<string, string> = {
  zh: 'zh-CN',
  'zh-cn': 'zh-CN',
  'zh-hans': 'zh-CN',
  'zh-tw': 'zh-TW',
  'zh-hk': 'zh-TW',
  'zh-hant': 'zh-TW',
};

/**
 * Pull the translated text out of a `translate_a/single` response.
 *
 * The body is `[[["segment", "source", ...], ...], ...]`; segments are
 * concatenated in order.
 */
export function parseTranslateResponse(body: unknown, translatorName: string): string {
  const segments = Array.isArray(body) ? body[0] : undefined;
  if (!Array.isArray(segments)) {
    throw new TranslationFailedError('Unexpected response format', translatorName, 'EXTRACTION_ERROR');
  }

  const first = segments[0];
  if (!Array.isArray(first) || typeof first[0] !== 'string') {
    throw new TranslationFailedError('Unexpected response format', translatorName, 'EXTRACTION_ERROR');
  }

  let text = '';
  for (const segment of segments) {
    if (Array.isArray(segment) && typeof segment[0] === 'string') {
      text += segment[0];
    }
  }
  return text;
}

export class GoogleTranslator extends BaseTranslator {
  readonly name = 'Google Translate';

  private readonly serviceUrl: string;
  private readonly timeoutMs: number;
  private readonly retryCount: number;
  private readonly delayRangeMs: readonly [number, number];
  private readonly fetch: FetchLike;

  constructor(config: GoogleTranslatorConfig = {}) {
    super(config);
    this.serviceUrl = config.serviceUrl ?? DEFAULT_SERVICE_URL;
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.retryCount = config.retryCount ?? 3;
    this.delayRangeMs = config.delayRangeMs ?? [300, 600];
    this.fetch = config.fetch ?? nodeFetch;
  }

  supportedLanguages(): string[] {
    return [...SUPPORTED_LANGUAGES];
  }

  normalizeLanguageCode(code: string): string {
    const normalized = code.trim().toLowerCase();
    const alias = LANGUAGE_ALIASES[normalized];
    if (alias) {
      return alias;
    }
    const base = normalized.split(/[-_]/)[0];
    return base !== normalized && SUPPORTED_LANGUAGES.includes(base) ? base : normalized;
  }

  protected async translateText(text: string, source: string, target: string): Promise<TranslationResult> {
    return withRetry(
      async attempt => {
        const delayMs = uniformInt(this.random, this.delayRangeMs);
        await this.sleep(delayMs);

        const translated = await this.request(text, source, target);

        return successResult(text, translated, source, target, 0.9, {
          translator: this.name,
          attempt: String(attempt),
          delay_ms: String(delayMs),
        });
      },
      { attempts: this.retryCount, baseDelayMs: 500, sleep: this.sleep, label: this.name }
    );
  }

  private async request(text: string, source: string, target: string): Promise<string> {
    const params = new URLSearchParams({ client: 'gtx', sl: source, tl: target, dt: 't', q: text });

    let response: FetchResponseLike;
    try {
      response = await this.fetch(`${this.serviceUrl}?${params.toString()}`, { timeout: this.timeoutMs });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log(`[${this.name}] Request failed: ${reason}`);
      throw new NetworkError(reason, error);
    }

    if (!response.ok) {
      throw new TranslationFailedError(
        `HTTP ${response.status} ${response.statusText}`.trim(),
        this.name,
        String(response.status)
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TranslationFailedError(`Failed to parse response: ${reason}`, this.name, 'PARSE_ERROR');
    }

    return parseTranslateResponse(body, this.name);
  }

  getUsageInfo(): Record<string, string> {
    return {
      ...super.getUsageInfo(),
      cost_per_character: '0.0',
      max_batch_size: '100',
      rate_limit: 'Limited (delays added)',
      timeout: `${this.timeoutMs / 1000}s`,
      retry_count: String(this.retryCount),
    };
  }
}
