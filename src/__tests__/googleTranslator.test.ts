/**
 * Tests for GoogleTranslator
 *
 * HTTP is replaced with an injected fetch; pacing and backoff go through an
 * injected sleep so nothing waits for real.
 */

import { NetworkError, TranslationFailedError, UnsupportedLanguageError } from '../core/errors';
import {
  FetchLike,
  FetchResponseLike,
  GoogleTranslator,
  parseTranslateResponse,
} from '../translators/google';

const okResponse = (body: unknown): FetchResponseLike => ({
  ok: true,
  status: 200,
  statusText: 'OK',
  json: async () => body,
});

const errorResponse = (status: number, statusText: string): FetchResponseLike => ({
  ok: false,
  status,
  statusText,
  json: async () => ({}),
});

const translationBody = (...segments: string[]) => [
  segments.map(segment => [segment, 'source text', null, null, 10]),
  null,
  'en',
];

describe('GoogleTranslator', () => {
  let sleep: jest.Mock<Promise<void>, [number]>;

  const createTranslator = (fetch: FetchLike, retryCount = 3) =>
    new GoogleTranslator({ fetch, sleep, random: () => 0.5, retryCount });

  beforeEach(() => {
    sleep = jest.fn(async (_ms: number) => {});
  });

  describe('Language handling', () => {
    const translator = new GoogleTranslator();

    it('should map Chinese variants onto zh-CN and zh-TW', () => {
      expect(translator.normalizeLanguageCode('zh')).toBe('zh-CN');
      expect(translator.normalizeLanguageCode('zh-Hans')).toBe('zh-CN');
      expect(translator.normalizeLanguageCode('ZH-TW')).toBe('zh-TW');
      expect(translator.normalizeLanguageCode('zh-hk')).toBe('zh-TW');
    });

    it('should collapse other regional variants', () => {
      expect(translator.normalizeLanguageCode('en-GB')).toBe('en');
      expect(translator.normalizeLanguageCode('pt-BR')).toBe('pt');
    });

    it('should support languages the mock backend lacks', () => {
      expect(translator.isLanguageSupported('nl')).toBe(true);
      expect(translator.isLanguageSupported('uk')).toBe(true);
      expect(translator.isLanguageSupported('sw')).toBe(false);
    });

    it('should reject unsupported targets before any request', async () => {
      const fetch = jest.fn<Promise<FetchResponseLike>, [string, { timeout?: number }?]>();
      const guarded = new GoogleTranslator({ fetch, sleep });

      await expect(guarded.translate('hello', 'en', 'sw')).rejects.toBeInstanceOf(UnsupportedLanguageError);
      expect(fetch).not.toHaveBeenCalled();
    });
  });

  describe('translate', () => {
    it('should send the query and join every segment', async () => {
      const fetch = jest.fn(async (_url: string, _init?: { timeout?: number }) =>
        okResponse(translationBody('Bonjour ', 'le monde'))
      );

      const result = await createTranslator(fetch).translate('Hello world', 'en', 'fr');

      expect(result.translatedText).toBe('Bonjour le monde');
      expect(result.status).toBe('success');
      expect(result.confidence).toBe(0.9);
      expect(result.metadata).toEqual({ translator: 'Google Translate', attempt: '1', delay_ms: '450' });

      expect(fetch).toHaveBeenCalledTimes(1);
      const [url, init] = fetch.mock.calls[0];
      const parsed = new URL(url);
      expect(`${parsed.origin}${parsed.pathname}`).toBe('https://translate.googleapis.com/translate_a/single');
      expect(parsed.searchParams.get('client')).toBe('gtx');
      expect(parsed.searchParams.get('sl')).toBe('en');
      expect(parsed.searchParams.get('tl')).toBe('fr');
      expect(parsed.searchParams.get('dt')).toBe('t');
      expect(parsed.searchParams.get('q')).toBe('Hello world');
      expect(init).toEqual({ timeout: 30000 });
    });

    it('should pace the request with a random delay', async () => {
      const fetch = jest.fn(async () => okResponse(translationBody('Hallo')));

      await createTranslator(fetch).translate('Hello', 'en', 'de');

      expect(sleep.mock.calls).toEqual([[450]]);
    });

    it('should send normalized language codes', async () => {
      const fetch = jest.fn(async (_url: string) => okResponse(translationBody('Hello')));

      const result = await createTranslator(fetch).translate('你好', 'zh', 'en-US');

      const parsed = new URL(fetch.mock.calls[0][0]);
      expect(parsed.searchParams.get('sl')).toBe('zh-CN');
      expect(parsed.searchParams.get('tl')).toBe('en');
      expect(result.sourceLanguage).toBe('zh-CN');
      expect(result.targetLanguage).toBe('en');
    });

    it('should let the service detect the source with auto', async () => {
      const fetch = jest.fn(async (_url: string) => okResponse(translationBody('Good morning')));

      await createTranslator(fetch).translate('Guten Morgen', 'auto', 'en');

      expect(new URL(fetch.mock.calls[0][0]).searchParams.get('sl')).toBe('auto');
    });

    it('should use a custom service URL and timeout', async () => {
      const fetch = jest.fn(async (_url: string, _init?: { timeout?: number }) => okResponse(translationBody('Hola')));
      const translator = new GoogleTranslator({
        fetch,
        sleep,
        serviceUrl: 'http://localhost:8080/translate',
        timeoutMs: 5000,
      });

      await translator.translate('Hello', 'en', 'es');

      expect(fetch.mock.calls[0][0].startsWith('http://localhost:8080/translate?')).toBe(true);
      expect(fetch.mock.calls[0][1]).toEqual({ timeout: 5000 });
    });
  });

  describe('Retry', () => {
    it('should retry after a network failure and report the final attempt', async () => {
      const fetch = jest.fn<Promise<FetchResponseLike>, [string, { timeout?: number }?]>()
        .mockRejectedValueOnce(new Error('socket hang up'))
        .mockResolvedValueOnce(okResponse(translationBody('Salut')));

      const result = await createTranslator(fetch).translate('Hi there', 'en', 'fr');

      expect(result.translatedText).toBe('Salut');
      expect(result.metadata?.attempt).toBe('2');
      expect(fetch).toHaveBeenCalledTimes(2);
      expect(sleep.mock.calls).toEqual([[450], [500], [450]]);
    });

    it('should surface the last HTTP error after all attempts', async () => {
      const fetch = jest.fn(async () => errorResponse(503, 'Service Unavailable'));

      const failure = createTranslator(fetch).translate('Hello', 'en', 'fr');

      await expect(failure).rejects.toBeInstanceOf(TranslationFailedError);
      await expect(failure).rejects.toMatchObject({
        errorCode: '503',
        translatorName: 'Google Translate',
        message: 'Translation failed: HTTP 503 Service Unavailable',
      });
      expect(fetch).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls).toEqual([[450], [500], [450], [1000], [450]]);
    });

    it('should wrap transport failures in NetworkError', async () => {
      const fetch = jest.fn(async (): Promise<FetchResponseLike> => {
        throw new Error('getaddrinfo ENOTFOUND');
      });

      const failure = createTranslator(fetch, 1).translate('Hello', 'en', 'fr');

      await expect(failure).rejects.toBeInstanceOf(NetworkError);
      await expect(failure).rejects.toThrow('Network error: getaddrinfo ENOTFOUND');
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('should report unreadable bodies as parse errors', async () => {
      const fetch = jest.fn(async (): Promise<FetchResponseLike> => ({
        ok: true,
        status: 200,
        statusText: 'OK',
        json: async () => {
          throw new SyntaxError('Unexpected token <');
        },
      }));

      await expect(createTranslator(fetch, 1).translate('Hello', 'en', 'fr')).rejects.toMatchObject({
        errorCode: 'PARSE_ERROR',
        message: 'Translation failed: Failed to parse response: Unexpected token <',
      });
    });

    it('should report unexpected response shapes as extraction errors', async () => {
      const fetch = jest.fn(async () => okResponse({ error: 'quota' }));

      await expect(createTranslator(fetch, 1).translate('Hello', 'en', 'fr')).rejects.toMatchObject({
        errorCode: 'EXTRACTION_ERROR',
      });
    });
  });

  describe('translateBatch', () => {
    it('should degrade failing items without failing the batch', async () => {
      const fetch = jest.fn(async (url: string) => {
        const q = new URL(url).searchParams.get('q');
        return q === 'broken' ? errorResponse(500, 'Internal Server Error') : okResponse(translationBody(`fr:${q}`));
      });

      const results = await createTranslator(fetch, 1).translateBatch(['one', 'broken', 'three'], 'en', 'fr');

      expect(results.map(r => r.translatedText)).toEqual(['fr:one', 'broken', 'fr:three']);
      expect(results.map(r => r.status)).toEqual(['success', 'failed', 'success']);
      expect(results[1].metadata).toEqual({
        error: 'Translation failed: HTTP 500 Internal Server Error (translator: Google Translate)',
        batch_index: '1',
      });
    });
  });

  it('should describe itself', () => {
    const translator = new GoogleTranslator({ timeoutMs: 10000, retryCount: 2 });

    expect(translator.estimateCost('Hello', 'en', 'fr')).toBe(0);
    expect(translator.getUsageInfo()).toEqual({
      name: 'Google Translate',
      languages: '30',
      cost_per_character: '0.0',
      max_batch_size: '100',
      rate_limit: 'Limited (delays added)',
      timeout: '10s',
      retry_count: '2',
    });
  });
});

describe('parseTranslateResponse', () => {
  it('should concatenate string segments and skip others', () => {
    const body = [[['Erste ', 'First '], ['Zweite', 'Second'], [null, null, 'transliteration']]];

    expect(parseTranslateResponse(body, 'Web')).toBe('Erste Zweite');
  });

  it('should reject bodies without a first segment', () => {
    expect(() => parseTranslateResponse([], 'Web')).toThrow(TranslationFailedError);
    expect(() => parseTranslateResponse([[]], 'Web')).toThrow('Unexpected response format');
    expect(() => parseTranslateResponse([[[42]]], 'Web')).toThrow(TranslationFailedError);
    expect(() => parseTranslateResponse('text', 'Web')).toThrow(TranslationFailedError);
  });
});
